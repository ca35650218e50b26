/**
 * Base generator: allocation plan, prompt, model call, validation
 */

import type { ZodType, ZodTypeDef } from 'zod';
import type { IdentifierAllocator } from '../ids/allocator.js';
import {
  type ContentModel,
  type ContentRequest,
  type ContentResponse,
  OutputError,
  ValidationError
} from '../types.js';
import { formatIssues } from '../utils/format.js';
import { createLogger, type Logger } from '../utils/logger.js';
import { extractJson } from './json.js';

export interface GeneratorContext {
  model: ContentModel;
  allocator: IdentifierAllocator;
  temperature: number;
  /** Output ceiling of one call, in tokens */
  maxOutputTokens: number;
  injectInvariants: boolean;
  logger?: Logger;
  now?: () => Date;
}

const SYSTEM_PROMPT = [
  'You generate synthetic school rostering data for integration testing.',
  'You answer with exactly one JSON document and nothing else.',
  'You use the identifiers you are given verbatim and never invent new ones.'
].join(' ');

export abstract class BaseGenerator<TInput, TPlan, TOutput, TResult> {
  protected context: GeneratorContext;
  protected logger: Logger;

  constructor(context: GeneratorContext) {
    this.context = context;
    this.logger = context.logger ?? createLogger();
  }

  /** Unit label used in logs and errors, e.g. "district" or "school" */
  protected abstract describe(input: TInput): string;

  /** Reserve the identifiers this call will use */
  protected abstract plan(input: TInput): TPlan;

  protected abstract estimateOutputTokens(plan: TPlan): number;

  protected abstract generatePrompt(input: TInput, plan: TPlan): string;

  protected abstract readonly outputSchema: ZodType<TOutput, ZodTypeDef, unknown>;

  /** Merge, inject and check; throws on any violated invariant */
  protected abstract buildResult(input: TInput, plan: TPlan, output: TOutput): TResult;

  async generate(input: TInput): Promise<TResult> {
    const startTime = Date.now();
    const unit = this.describe(input);
    const plan = this.plan(input);

    const estimated = this.estimateOutputTokens(plan);
    if (estimated > this.context.maxOutputTokens) {
      throw new ValidationError(
        `Request for ${unit} needs about ${estimated} output tokens, over the ${this.context.maxOutputTokens} token ceiling`,
        { unit, estimated, ceiling: this.context.maxOutputTokens }
      );
    }

    const request: ContentRequest = {
      system: SYSTEM_PROMPT,
      prompt: this.generatePrompt(input, plan),
      temperature: this.context.temperature,
      maxOutputTokens: this.context.maxOutputTokens
    };

    this.logger.debug({ unit, model: this.context.model.model, estimated }, 'Requesting generation');
    const response = await this.context.model.complete(request);
    const output = this.parseResult(response, unit);
    const result = this.buildResult(input, plan, output);

    this.logger.info(
      { unit, model: response.model, duration: Date.now() - startTime, usage: response.usage },
      'Generation complete'
    );
    return result;
  }

  protected parseResult(response: ContentResponse, unit: string): TOutput {
    if (response.truncated) {
      throw new OutputError(`Output for ${unit} was truncated (${response.finishReason})`, 'TRUNCATED_OUTPUT', {
        unit,
        finishReason: response.finishReason,
        length: response.text.length
      });
    }

    const json = extractJson(response.text);
    const parsed = this.outputSchema.safeParse(json);
    if (!parsed.success) {
      throw new ValidationError(`Output for ${unit} does not match the schema: ${formatIssues(parsed.error)}`, {
        unit,
        issues: parsed.error.issues
      });
    }
    return parsed.data;
  }

  protected asOf(): Date {
    return this.context.now ? this.context.now() : new Date();
  }
}

/**
 * Compare the identifiers a model returned with those it was given.
 */
export function diffIdentifiers(label: string, expected: string[], actual: string[]): string[] {
  const problems: string[] = [];
  const expectedSet = new Set(expected);
  const seen = new Set<string>();

  for (const id of actual) {
    if (!expectedSet.has(id)) {
      problems.push(`${label} ${id} was not allocated`);
    } else if (seen.has(id)) {
      problems.push(`${label} ${id} appears more than once`);
    }
    seen.add(id);
  }
  for (const id of expected) {
    if (!seen.has(id)) {
      problems.push(`${label} ${id} is missing`);
    }
  }
  return problems;
}

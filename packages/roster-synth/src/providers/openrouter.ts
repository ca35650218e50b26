/**
 * OpenRouter chat-completions content model
 */

import { z } from 'zod';
import { APIError, type ContentModel, type ContentRequest, type ContentResponse } from '../types.js';

export interface OpenRouterModelConfig {
  apiKey: string;
  model: string;
  baseURL?: string;
  timeout?: number;
  fetch?: typeof fetch;
}

interface OpenRouterMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

const OpenRouterResponseSchema = z.object({
  id: z.string().optional(),
  model: z.string().optional(),
  choices: z
    .array(
      z.object({
        message: z.object({ role: z.string().optional(), content: z.string().nullish() }).optional(),
        finish_reason: z.string().nullish()
      })
    )
    .optional(),
  usage: z
    .object({
      prompt_tokens: z.number(),
      completion_tokens: z.number(),
      total_tokens: z.number()
    })
    .optional()
});

type OpenRouterResponse = z.infer<typeof OpenRouterResponseSchema>;

export class OpenRouterContentModel implements ContentModel {
  readonly provider = 'openrouter' as const;
  readonly model: string;
  private apiKey: string;
  private baseURL: string;
  private timeout: number;
  private fetchImpl: typeof fetch;

  constructor(config: OpenRouterModelConfig) {
    this.apiKey = config.apiKey;
    this.model = config.model;
    this.baseURL = config.baseURL ?? 'https://openrouter.ai/api/v1';
    this.timeout = config.timeout ?? 120000;
    this.fetchImpl = config.fetch ?? fetch.bind(globalThis);
  }

  async complete(request: ContentRequest): Promise<ContentResponse> {
    const messages: OpenRouterMessage[] = [
      { role: 'system', content: request.system },
      { role: 'user', content: request.prompt }
    ];

    let data: OpenRouterResponse;
    try {
      const response = await this.fetchImpl(`${this.baseURL}/chat/completions`, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          'Authorization': `Bearer ${this.apiKey}`,
          'X-Title': 'roster-synth'
        },
        body: JSON.stringify({
          model: this.model,
          messages,
          temperature: request.temperature,
          max_tokens: request.maxOutputTokens,
          response_format: { type: 'json_object' },
          stream: false
        }),
        signal: AbortSignal.timeout(this.timeout)
      });

      if (!response.ok) {
        const body = await response.text();
        throw new Error(`HTTP ${response.status}: ${response.statusText} ${body}`.trim());
      }

      data = OpenRouterResponseSchema.parse(await response.json());
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : 'Unknown error';
      throw new APIError(`OpenRouter API error: ${errorMessage}`, {
        model: this.model,
        error
      });
    }

    const choice = data.choices?.[0];
    const finishReason = choice?.finish_reason ?? 'unknown';
    return {
      text: choice?.message?.content ?? '',
      finishReason,
      truncated: finishReason === 'length',
      model: data.model ?? this.model,
      usage: data.usage
        ? { promptTokens: data.usage.prompt_tokens, outputTokens: data.usage.completion_tokens }
        : undefined
    };
  }
}

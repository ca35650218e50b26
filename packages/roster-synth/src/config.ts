/**
 * Configuration loading: defaults, environment, then explicit options
 */

import {
  type RosterSynthConfig,
  RosterSynthConfigSchema,
  type RosterSynthOptions,
  ValidationError
} from './types.js';
import { formatIssues } from './utils/format.js';

type Env = Record<string, string | undefined>;

function fromEnv(env: Env, provider: string | undefined): Record<string, unknown> {
  const options: Record<string, unknown> = {};
  const set = (key: keyof RosterSynthOptions, value: unknown) => {
    if (value !== undefined && value !== '') options[key] = value;
  };

  set('provider', env.ROSTER_SYNTH_PROVIDER);
  set('model', env.ROSTER_SYNTH_MODEL);
  set('idMode', env.ROSTER_SYNTH_ID_MODE);
  set('outputDir', env.ROSTER_SYNTH_OUTPUT_DIR);
  set('logLevel', env.LOG_LEVEL);
  if (env.ROSTER_SYNTH_TEMPERATURE) {
    set('temperature', Number(env.ROSTER_SYNTH_TEMPERATURE));
  }

  const effectiveProvider = provider ?? env.ROSTER_SYNTH_PROVIDER ?? 'gemini';
  set(
    'apiKey',
    effectiveProvider === 'openrouter'
      ? env.OPENROUTER_API_KEY
      : env.GEMINI_API_KEY || env.API_KEY
  );
  return options;
}

/**
 * Resolve the run configuration. Explicit options win over environment
 * variables, which win over schema defaults.
 */
export function loadConfig(options: RosterSynthOptions = {}, env: Env = process.env): RosterSynthConfig {
  const defined = Object.fromEntries(
    Object.entries(options).filter(([, value]) => value !== undefined)
  );
  const result = RosterSynthConfigSchema.safeParse({
    ...fromEnv(env, options.provider),
    ...defined
  });

  if (!result.success) {
    throw new ValidationError(`Invalid configuration: ${formatIssues(result.error)}`, {
      issues: result.error.issues
    });
  }
  return result.data;
}

/**
 * US state lookup used for district state assignment and alphanumeric IDs
 */

import { readFileSync } from 'fs';
import { z } from 'zod';
import { ValidationError } from '../types.js';

const UsStateSchema = z.object({
  code: z.string().length(2),
  name: z.string().min(1)
});

export type UsState = z.infer<typeof UsStateSchema>;

let states: UsState[] | undefined;

export function listStates(): UsState[] {
  if (!states) {
    const raw = readFileSync(new URL('../../data/us-states.json', import.meta.url), 'utf8');
    states = z.array(UsStateSchema).min(1).parse(JSON.parse(raw));
  }
  return states;
}

/**
 * Resolve a state from its two-letter code or full name
 */
export function resolveState(input: string): UsState {
  const needle = input.trim().toLowerCase();
  const state = listStates().find(
    s => s.code.toLowerCase() === needle || s.name.toLowerCase() === needle
  );
  if (!state) {
    throw new ValidationError(`Unknown US state: ${input}`, { input });
  }
  return state;
}

/**
 * State for the district at `index`: the configured one if present,
 * otherwise the list in order, wrapping around.
 */
export function stateForDistrict(index: number, configured: string[] = []): UsState {
  const explicit = configured[index];
  if (explicit !== undefined) {
    return resolveState(explicit);
  }
  const all = listStates();
  const fallback = all[index % all.length];
  if (!fallback) {
    throw new ValidationError('State list is empty');
  }
  return fallback;
}

/**
 * Generator exports
 */

export { BaseGenerator, diffIdentifiers, type GeneratorContext } from './base.js';
export { SchemaGenerator, type SchemaGeneratorInput, type SkeletonPlan } from './schema.js';
export { RosterGenerator, type RosterGeneratorInput, type RosterPlan } from './roster.js';
export { estimateRosterTokens, estimateSkeletonTokens, TOKENS_PER_RECORD } from './budget.js';
export { extractJson, looksTruncated } from './json.js';

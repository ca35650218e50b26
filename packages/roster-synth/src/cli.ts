#!/usr/bin/env node
/**
 * roster-synth CLI
 *
 * Commands:
 * - generate: write one <District>_Data directory of CSV tables per district
 * - plan: show districts, states and output-size estimates without calling a model
 */

import { Command, InvalidArgumentError, Option } from 'commander';
import chalk from 'chalk';
import type { z } from 'zod';
import { GenerateCommands, type GenerateOptions } from './commands/generate.js';
import { IdModeSchema, ModelProviderSchema } from './types.js';

function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError('Not an integer.');
  }
  return parsed;
}

function parseNumber(value: string): number {
  const parsed = Number(value);
  if (Number.isNaN(parsed)) {
    throw new InvalidArgumentError('Not a number.');
  }
  return parsed;
}

function parseList(value: string): string[] {
  return value.split(',').map(item => item.trim()).filter(item => item.length > 0);
}

function parseChoice<T extends [string, ...string[]]>(schema: z.ZodEnum<T>) {
  return (value: string): T[number] => {
    const result = schema.safeParse(value);
    if (!result.success) {
      throw new InvalidArgumentError(`Expected one of: ${schema.options.join(', ')}.`);
    }
    return result.data;
  };
}

function withRunOptions(command: Command): Command {
  return command
    .option('-d, --districts <number>', 'Number of districts', parseInteger)
    .option('-n, --names <list>', 'Comma-separated district names', parseList)
    .option('--states <list>', 'Comma-separated two-letter state codes, one per district', parseList)
    .option('-s, --schools <number>', 'Schools per district', parseInteger)
    .option('-t, --teachers <number>', 'Teachers per school', parseInteger)
    .option('--staff <number>', 'Staff per school', parseInteger)
    .option('--sections <number>', 'Sections per school', parseInteger)
    .option('--students <number>', 'Students per section', parseInteger)
    .addOption(
      new Option('--id-mode <mode>', 'Identifier format').argParser(parseChoice(IdModeSchema))
    )
    .addOption(
      new Option('-p, --provider <name>', 'Model provider').argParser(parseChoice(ModelProviderSchema))
    )
    .option('-m, --model <name>', 'Model name')
    .option('--temperature <number>', 'Sampling temperature (0-2)', parseNumber)
    .option('--max-tokens <number>', 'Output token ceiling per call', parseInteger)
    .option('-o, --output <dir>', 'Output root directory')
    .option('--no-inject', 'Check invariants without injecting them')
    .option('-v, --verbose', 'Enable debug logging');
}

const program = new Command();

program
  .name('roster-synth')
  .description('Synthetic school rostering datasets with referential integrity')
  .version('0.1.0');

withRunOptions(
  program.command('generate').description('Generate district datasets and write them as CSV')
).action(async (options: GenerateOptions) => {
  try {
    const ok = await GenerateCommands.generate(options);
    if (!ok) process.exitCode = 1;
  } catch (err) {
    console.error(chalk.red('Error:'), err instanceof Error ? err.message : String(err));
    process.exitCode = 1;
  }
});

withRunOptions(
  program.command('plan').description('Show the generation plan without calling a model')
).action((options: GenerateOptions) => {
  try {
    const ok = GenerateCommands.plan(options);
    if (!ok) process.exitCode = 1;
  } catch (err) {
    console.error(chalk.red('Error:'), err instanceof Error ? err.message : String(err));
    process.exitCode = 1;
  }
});

await program.parseAsync();

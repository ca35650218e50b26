/**
 * Generate and plan commands
 */

import chalk from 'chalk';
import ora from 'ora';
import Table from 'cli-table3';
import { loadConfig } from '../config.js';
import { RosterSynth, type RunPlan, type RunReport } from '../index.js';
import type { IdMode, LogLevel, ModelProvider, RosterSynthOptions } from '../types.js';
import { createLogger } from '../utils/logger.js';

export interface GenerateOptions {
  districts?: number;
  names?: string[];
  states?: string[];
  schools?: number;
  teachers?: number;
  staff?: number;
  sections?: number;
  students?: number;
  idMode?: IdMode;
  provider?: ModelProvider;
  model?: string;
  temperature?: number;
  maxTokens?: number;
  output?: string;
  inject: boolean;
  verbose?: boolean;
}

export function toSynthOptions(options: GenerateOptions): RosterSynthOptions {
  const logLevel: LogLevel | undefined = options.verbose ? 'debug' : undefined;
  return {
    districts: options.districts,
    districtNames: options.names,
    states: options.states,
    schoolsPerDistrict: options.schools,
    teachersPerSchool: options.teachers,
    staffPerSchool: options.staff,
    sectionsPerSchool: options.sections,
    studentsPerSection: options.students,
    idMode: options.idMode,
    provider: options.provider,
    model: options.model,
    temperature: options.temperature,
    maxOutputTokens: options.maxTokens,
    outputDir: options.output,
    injectInvariants: options.inject,
    logLevel
  };
}

function createSynth(options: GenerateOptions): RosterSynth {
  const synthOptions = toSynthOptions(options);
  const { logLevel } = loadConfig(synthOptions);
  const logger = createLogger({ level: logLevel, pretty: process.stdout.isTTY });
  return new RosterSynth(synthOptions, { logger });
}

export function renderReport(report: RunReport): string {
  const table = new Table({
    head: ['District', 'State', 'Status', 'Schools', 'Teachers', 'Staff', 'Students', 'Sections', 'Enrollments'].map(
      h => chalk.cyan(h)
    )
  });

  for (const d of report.districts) {
    table.push([
      d.district.name,
      d.district.state,
      d.status === 'written' ? chalk.green(d.status) : chalk.red(d.status),
      d.counts.schools,
      d.counts.teachers,
      d.counts.staff,
      d.counts.students,
      d.counts.sections,
      d.counts.enrollments
    ]);
  }
  return table.toString();
}

export class GenerateCommands {
  static async generate(options: GenerateOptions): Promise<boolean> {
    const synth = createSynth(options);
    const districts = synth.getConfig().districts;
    const spinner = ora(`Generating ${districts} district(s)...`).start();

    let report: RunReport;
    try {
      report = await synth.run();
    } catch (err) {
      spinner.fail(chalk.red('Generation failed'));
      console.error(chalk.red(err instanceof Error ? err.message : String(err)));
      return false;
    }

    const failed = report.districts.filter(d => d.status === 'failed');
    if (failed.length === 0) {
      spinner.succeed(chalk.green(`Generated ${report.districts.length} district(s) with ${report.model}`));
    } else {
      spinner.warn(chalk.yellow(`${failed.length} of ${report.districts.length} district(s) failed`));
    }

    console.log(chalk.bold.blue('\nRun Summary:'));
    console.log(renderReport(report));

    for (const d of report.districts) {
      if (d.outputDir) {
        console.log(`  ${chalk.green(d.district.name + ':')} ${d.outputDir}`);
      }
      if (d.error) {
        console.log(`  ${chalk.red(d.district.name + ':')} [${d.error.code}] ${d.error.message}`);
      }
      for (const school of d.schoolFailures) {
        console.log(
          `  ${chalk.yellow(`${d.district.name} / ${school.schoolName} (${school.schoolId}):`)} [${school.code}] ${school.message}`
        );
      }
    }

    return failed.length === 0;
  }

  static plan(options: GenerateOptions): boolean {
    const synth = new RosterSynth(toSynthOptions(options), { logger: createLogger({ level: 'silent' }) });
    const plan: RunPlan = synth.plan();

    console.log(chalk.bold.blue('\nGeneration Plan:'));
    console.log(chalk.gray('-'.repeat(40)));
    console.log(`  ${chalk.green('Model:')}      ${plan.model}`);
    console.log(`  ${chalk.green('ID mode:')}    ${plan.idMode}`);
    console.log(`  ${chalk.green('Ceiling:')}    ${plan.ceiling} tokens`);
    console.log(`  ${chalk.green('Output:')}     ${plan.outputDir}`);

    const table = new Table({
      head: ['District', 'State', 'Domain', 'Schools', 'Students', 'Skeleton tokens', 'Roster tokens', 'Fits'].map(h =>
        chalk.cyan(h)
      )
    });
    for (const d of plan.districts) {
      table.push([
        d.district.name,
        d.district.state,
        d.district.emailDomain,
        d.schools,
        d.students,
        d.skeletonTokens,
        d.rosterTokens,
        d.fits ? chalk.green('yes') : chalk.red('no')
      ]);
    }
    console.log(table.toString());

    return plan.districts.every(d => d.fits);
  }
}

/**
 * roster-synth - synthetic school rostering datasets with cross-table
 * referential integrity, generated one district and one school at a time.
 *
 * @packageDocumentation
 */

import 'dotenv/config';
import { assembleDistrict, assertDisjointIdentifiers } from './assembler/index.js';
import { loadConfig } from './config.js';
import { estimateRosterTokens, estimateSkeletonTokens } from './generators/budget.js';
import type { GeneratorContext } from './generators/base.js';
import { RosterGenerator } from './generators/roster.js';
import { SchemaGenerator } from './generators/schema.js';
import { IdentifierAllocator } from './ids/allocator.js';
import { stateForDistrict } from './ids/states.js';
import { writeDistrictTables } from './output/csv.js';
import { createContentModel } from './providers/index.js';
import { ModelRouter } from './routing/index.js';
import {
  type ContentModel,
  type DistrictSkeleton,
  type DistrictSpec,
  type DistrictTables,
  type IdMode,
  type RosterSynthConfig,
  type RosterSynthOptions,
  type SchoolRoster,
  SynthError,
  type TableName
} from './types.js';
import { createLogger, type Logger } from './utils/logger.js';
import { districtNameAt, emailDomainFor } from './utils/naming.js';

export interface RosterSynthDeps {
  /** Content model to use instead of the configured provider */
  model?: ContentModel;
  logger?: Logger;
  now?: () => Date;
  /** Randomness for alphanumeric identifiers */
  random?: () => number;
  /** Allocator to draw identifiers from instead of a fresh one per run; its mode wins over `idMode` */
  allocator?: IdentifierAllocator;
  env?: Record<string, string | undefined>;
}

export interface FailureInfo {
  code: string;
  message: string;
}

export interface SchoolFailure extends FailureInfo {
  schoolId: string;
  schoolName: string;
}

export interface DistrictReport {
  district: DistrictSpec;
  status: 'written' | 'failed';
  outputDir?: string;
  schoolFailures: SchoolFailure[];
  error?: FailureInfo;
  counts: Record<TableName, number>;
}

export interface RunReport {
  idMode: IdMode;
  model: string;
  outputDir: string;
  startedAt: Date;
  finishedAt: Date;
  districts: DistrictReport[];
}

export interface DistrictPlan {
  district: DistrictSpec;
  schools: number;
  teachers: number;
  staff: number;
  sections: number;
  students: number;
  skeletonTokens: number;
  rosterTokens: number;
  /** Both calls fit under the output ceiling */
  fits: boolean;
}

export interface RunPlan {
  idMode: IdMode;
  model: string;
  ceiling: number;
  outputDir: string;
  districts: DistrictPlan[];
}

interface ActiveModel {
  model: ContentModel;
  ceiling: number;
}

const EMPTY_COUNTS: Record<TableName, number> = {
  schools: 0,
  teachers: 0,
  staff: 0,
  students: 0,
  sections: 0,
  enrollments: 0
};

export function describeError(error: unknown): FailureInfo {
  if (error instanceof SynthError) {
    return { code: error.code, message: error.message };
  }
  return {
    code: 'UNKNOWN_ERROR',
    message: error instanceof Error ? error.message : String(error)
  };
}

/**
 * Main RosterSynth class: districts in order, Phase 1 then Phase 2 per
 * school, assembly and CSV output.
 */
export class RosterSynth {
  private config: RosterSynthConfig;
  private deps: RosterSynthDeps;
  private logger: Logger;

  constructor(options: RosterSynthOptions = {}, deps: RosterSynthDeps = {}) {
    this.config = loadConfig(options, deps.env);
    this.deps = deps;
    this.logger = deps.logger ?? createLogger({ level: this.config.logLevel });
  }

  getConfig(): RosterSynthConfig {
    return { ...this.config };
  }

  /**
   * Districts with their names, states and email domains
   */
  resolveDistricts(): DistrictSpec[] {
    const { districts, districtNames = [], states = [] } = this.config;
    return Array.from({ length: districts }, (_, index) => {
      const name = districtNameAt(districtNames, index);
      return {
        index,
        name,
        state: stateForDistrict(index, states).code,
        emailDomain: emailDomainFor(name)
      };
    });
  }

  /**
   * Resolved districts and output-size estimates, without calling a model
   */
  plan(): RunPlan {
    const { model, ceiling } = this.describeModel();
    const c = this.config;
    const skeletonTokens = estimateSkeletonTokens({
      schools: c.schoolsPerDistrict,
      teachersPerSchool: c.teachersPerSchool,
      staffPerSchool: c.staffPerSchool
    });
    const rosterTokens = estimateRosterTokens({
      sections: c.sectionsPerSchool,
      studentsPerSection: c.studentsPerSection
    });

    return {
      idMode: c.idMode,
      model,
      ceiling,
      outputDir: c.outputDir,
      districts: this.resolveDistricts().map(district => ({
        district,
        schools: c.schoolsPerDistrict,
        teachers: c.schoolsPerDistrict * c.teachersPerSchool,
        staff: c.schoolsPerDistrict * c.staffPerSchool,
        sections: c.schoolsPerDistrict * c.sectionsPerSchool,
        students: c.schoolsPerDistrict * c.sectionsPerSchool * c.studentsPerSection,
        skeletonTokens,
        rosterTokens,
        fits: skeletonTokens <= ceiling && rosterTokens <= ceiling
      }))
    };
  }

  async run(): Promise<RunReport> {
    const startedAt = new Date();
    const { model, ceiling } = this.resolveModel();
    const allocator =
      this.deps.allocator ?? new IdentifierAllocator({ mode: this.config.idMode, random: this.deps.random });

    const context: GeneratorContext = {
      model,
      allocator,
      temperature: this.config.temperature,
      maxOutputTokens: ceiling,
      injectInvariants: this.config.injectInvariants,
      logger: this.logger,
      now: this.deps.now
    };
    const schemaGenerator = new SchemaGenerator(context);
    const rosterGenerator = new RosterGenerator(context);

    this.logger.info(
      { districts: this.config.districts, idMode: allocator.mode, model: model.model, ceiling },
      'Starting run'
    );

    const reports: DistrictReport[] = [];
    const written: DistrictTables[] = [];

    for (const district of this.resolveDistricts()) {
      const report: DistrictReport = {
        district,
        status: 'failed',
        schoolFailures: [],
        counts: { ...EMPTY_COUNTS }
      };
      reports.push(report);

      let skeleton: DistrictSkeleton;
      try {
        allocator.registerDistrict(district.index, district.state);
        skeleton = await schemaGenerator.generate({
          district,
          schools: this.config.schoolsPerDistrict,
          teachersPerSchool: this.config.teachersPerSchool,
          staffPerSchool: this.config.staffPerSchool
        });
      } catch (error) {
        report.error = describeError(error);
        this.logger.error({ district: district.name, ...report.error }, 'District skeleton failed');
        continue;
      }

      const rosters: SchoolRoster[] = [];
      for (const handoff of skeleton.handoffs) {
        try {
          rosters.push(
            await rosterGenerator.generate({
              district: skeleton.district,
              handoff,
              sectionsPerSchool: this.config.sectionsPerSchool,
              studentsPerSection: this.config.studentsPerSection
            })
          );
        } catch (error) {
          const failure = describeError(error);
          report.schoolFailures.push({
            schoolId: handoff.school.School_id,
            schoolName: handoff.school.School_name,
            ...failure
          });
          this.logger.error(
            { district: district.name, school: handoff.school.School_id, ...failure },
            'School roster failed'
          );
        }
      }

      try {
        const tables = assembleDistrict(skeleton, rosters);
        assertDisjointIdentifiers([...written, tables]);
        report.outputDir = await writeDistrictTables(this.config.outputDir, district.name, tables);
        report.status = 'written';
        report.counts = {
          schools: tables.schools.length,
          teachers: tables.teachers.length,
          staff: tables.staff.length,
          students: tables.students.length,
          sections: tables.sections.length,
          enrollments: tables.enrollments.length
        };
        written.push(tables);
        this.logger.info({ district: district.name, outputDir: report.outputDir, counts: report.counts }, 'District written');
      } catch (error) {
        report.error = describeError(error);
        this.logger.error({ district: district.name, ...report.error }, 'District assembly failed');
      }
    }

    return {
      idMode: allocator.mode,
      model: model.model,
      outputDir: this.config.outputDir,
      startedAt,
      finishedAt: new Date(),
      districts: reports
    };
  }

  private describeModel(): { model: string; ceiling: number } {
    if (this.deps.model) {
      return { model: this.deps.model.model, ceiling: this.config.maxOutputTokens };
    }
    const route = new ModelRouter({ defaultProvider: this.config.provider, providerKeys: {} }).selectModel({
      provider: this.config.provider,
      preferredModel: this.config.model,
      capabilities: ['json']
    });
    return { model: route.model, ceiling: Math.min(this.config.maxOutputTokens, route.maxOutputTokens) };
  }

  private resolveModel(): ActiveModel {
    if (this.deps.model) {
      return { model: this.deps.model, ceiling: this.config.maxOutputTokens };
    }
    const { model, route } = createContentModel(this.config);
    return { model, ceiling: Math.min(this.config.maxOutputTokens, route.maxOutputTokens) };
  }
}

/**
 * Create a new RosterSynth instance
 */
export function createRosterSynth(options?: RosterSynthOptions, deps?: RosterSynthDeps): RosterSynth {
  return new RosterSynth(options, deps);
}

// Export types and utilities
export * from './types.js';
export * from './generators/index.js';
export * from './assembler/index.js';
export * from './output/csv.js';
export * from './routing/index.js';
export * from './providers/index.js';
export { loadConfig } from './config.js';
export {
  IdentifierAllocator,
  SEQUENTIAL_BLOCK_SIZE,
  SEQUENTIAL_LAYOUT,
  type AllocatorOptions,
  type DistrictIdSpace,
  type IdKind
} from './ids/allocator.js';
export { findLazyPattern, isLazyPattern } from './ids/lazy-patterns.js';
export { listStates, resolveState, stateForDistrict, type UsState } from './ids/states.js';
export { createLogger, silentLogger, type Logger, type LoggerOptions } from './utils/logger.js';
export { districtNameAt, emailDomainFor } from './utils/naming.js';

// Default export
export default RosterSynth;

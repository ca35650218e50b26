/**
 * Core types and interfaces for roster-synth
 */

import { z } from 'zod';
import { districtDirectoryName, districtNameAt, emailDomainFor } from './utils/naming.js';

// Configuration schemas
export const ModelProviderSchema = z.enum(['gemini', 'openrouter']);
export type ModelProvider = z.infer<typeof ModelProviderSchema>;

export const IdModeSchema = z.enum(['sequential', 'alphanumeric']);
export type IdMode = z.infer<typeof IdModeSchema>;

export const LogLevelSchema = z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']);
export type LogLevel = z.infer<typeof LogLevelSchema>;

export const RosterSynthConfigSchema = z
  .object({
    provider: ModelProviderSchema.default('gemini'),
    apiKey: z.string().min(1).optional(),
    model: z.string().min(1).optional(),
    temperature: z.number().min(0).max(2).default(0.7),
    maxOutputTokens: z.number().int().positive().default(32768),
    timeout: z.number().int().positive().default(120000),
    idMode: IdModeSchema.default('sequential'),
    districts: z.number().int().min(1).default(1),
    districtNames: z.array(z.string().trim().min(1)).optional(),
    states: z.array(z.string().trim().length(2)).optional(),
    schoolsPerDistrict: z.number().int().min(1).default(3),
    teachersPerSchool: z.number().int().min(2).default(10),
    staffPerSchool: z.number().int().min(1).default(10),
    sectionsPerSchool: z.number().int().min(2).default(10),
    studentsPerSection: z.number().int().min(1).default(12),
    outputDir: z.string().min(1).default('output'),
    injectInvariants: z.boolean().default(true),
    logLevel: LogLevelSchema.default('info')
  })
  .superRefine((config, ctx) => {
    // The administrator and the dual-role entry must be different people
    if (config.schoolsPerDistrict * config.staffPerSchool < 2) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['staffPerSchool'],
        message: 'A district needs at least 2 staff records'
      });
    }
    if (config.districtNames && config.districtNames.length > config.districts) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['districtNames'],
        message: `Got ${config.districtNames.length} district names for ${config.districts} districts`
      });
    }
    // Each district needs its own output directory and email domain
    const names = Array.from({ length: config.districts }, (_, i) => districtNameAt(config.districtNames ?? [], i));
    const derived = [
      { label: 'output directory', of: districtDirectoryName },
      { label: 'email domain', of: emailDomainFor }
    ];
    for (const { label, of } of derived) {
      const seen = new Map<string, string>();
      for (const name of names) {
        const value = of(name);
        const other = seen.get(value);
        if (other !== undefined) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ['districtNames'],
            message: `District names "${other}" and "${name}" share the ${label} ${value}`
          });
        }
        seen.set(value, name);
      }
    }
  });

export type RosterSynthConfig = z.output<typeof RosterSynthConfigSchema>;
export type RosterSynthOptions = z.input<typeof RosterSynthConfigSchema>;

// Record field helpers
export const GRADES = ['PK', 'K', '1', '2', '3', '4', '5', '6', '7', '8', '9', '10', '11', '12'] as const;
export type Grade = (typeof GRADES)[number];

export function normalizeGrade(value: string): string {
  const upper = value.trim().toUpperCase();
  if (['KG', 'KINDERGARTEN', '0', '00'].includes(upper)) return 'K';
  if (['PRE-K', 'PREK', 'PRE-KINDERGARTEN', 'P', '-1'].includes(upper)) return 'PK';
  const ordinal = upper.match(/^0*(\d{1,2})(?:ST|ND|RD|TH)?$/);
  if (ordinal) return ordinal[1] ?? upper;
  return upper;
}

const IdField = z.union([z.string(), z.number()]).transform(value => String(value).trim());
const Text = z.string().trim().min(1);
const OptionalId = z
  .union([z.string(), z.number(), z.null()])
  .optional()
  .transform(value => (value === null || value === undefined ? '' : String(value).trim()));

export const GradeSchema = z
  .union([z.string(), z.number()])
  .transform(value => normalizeGrade(String(value)))
  .pipe(z.enum(GRADES));

export const GenderSchema = z
  .string()
  .transform(value => {
    const upper = value.trim().toUpperCase();
    if (upper === 'MALE') return 'M';
    if (upper === 'FEMALE') return 'F';
    if (['NONBINARY', 'NON-BINARY', 'OTHER', 'U'].includes(upper)) return 'X';
    return upper;
  })
  .pipe(z.enum(['M', 'F', 'X']));

/**
 * `Date` rolls 2016-02-30 over to March, so the parsed date must format
 * back to the input.
 */
export function isCalendarDate(value: string): boolean {
  const time = Date.parse(`${value}T00:00:00Z`);
  return !Number.isNaN(time) && new Date(time).toISOString().slice(0, 10) === value;
}

export const DateSchema = z
  .string()
  .trim()
  .regex(/^\d{4}-\d{2}-\d{2}$/, 'Expected YYYY-MM-DD')
  .refine(isCalendarDate, 'Invalid calendar date');

// Phase 1 model output
export const SchoolDraftSchema = z.object({
  School_id: IdField,
  School_name: Text,
  Low_grade: GradeSchema,
  High_grade: GradeSchema,
  Principal: Text,
  Principal_email: Text,
  School_address: Text,
  School_city: Text,
  School_state: Text,
  School_zip: IdField,
  School_phone: Text
});

export const TeacherDraftSchema = z.object({
  School_id: IdField,
  Teacher_id: IdField,
  Teacher_email: Text,
  First_name: Text,
  Last_name: Text,
  Title: Text
});

export const StaffDraftSchema = z.object({
  School_id: IdField,
  Staff_id: IdField,
  Staff_email: Text,
  First_name: Text,
  Last_name: Text,
  Department: Text,
  Title: Text
});

export const SkeletonOutputSchema = z.object({
  schools: z.array(SchoolDraftSchema).min(1),
  teachers: z.array(TeacherDraftSchema).min(1),
  staff: z.array(StaffDraftSchema).min(1)
});
export type SkeletonOutput = z.output<typeof SkeletonOutputSchema>;

// Phase 2 model output
export const StudentDraftSchema = z.object({
  Student_id: IdField,
  First_name: Text,
  Last_name: Text,
  Grade: GradeSchema,
  Gender: GenderSchema,
  DOB: DateSchema,
  Student_email: Text
});

export const SectionDraftSchema = z.object({
  Section_id: IdField,
  Teacher_id: IdField,
  Teacher_2_id: OptionalId,
  Name: Text,
  Grade: GradeSchema,
  Subject: Text
});

export const EnrollmentDraftSchema = z.object({
  Section_id: IdField,
  Student_id: IdField
});

export const RosterOutputSchema = z.object({
  students: z.array(StudentDraftSchema).min(1),
  sections: z.array(SectionDraftSchema).min(1),
  enrollments: z.array(EnrollmentDraftSchema).min(1)
});
export type RosterOutput = z.output<typeof RosterOutputSchema>;

export type SchoolDraft = z.output<typeof SchoolDraftSchema>;
export type TeacherDraft = z.output<typeof TeacherDraftSchema>;
export type StaffDraft = z.output<typeof StaffDraftSchema>;
export type StudentDraft = z.output<typeof StudentDraftSchema>;
export type SectionDraft = z.output<typeof SectionDraftSchema>;
export type EnrollmentDraft = z.output<typeof EnrollmentDraftSchema>;

// Table rows
export interface DistrictRecord {
  Index: number;
  District_name: string;
  State: string;
  Email_domain: string;
  Id_prefix: string;
}

export interface SchoolRecord extends SchoolDraft {
  School_number: string;
}

export interface TeacherRecord extends TeacherDraft {
  Teacher_number: string;
  State_teacher_id: string;
}

export type StaffRecord = StaffDraft;

export interface StudentRecord extends StudentDraft {
  School_id: string;
  Student_number: string;
  State_id: string;
}

export interface SectionRecord extends SectionDraft {
  School_id: string;
}

export interface EnrollmentRecord extends EnrollmentDraft {
  School_id: string;
}

export const TABLE_COLUMNS = {
  schools: [
    'School_id', 'School_name', 'School_number', 'Low_grade', 'High_grade',
    'Principal', 'Principal_email', 'School_address', 'School_city',
    'School_state', 'School_zip', 'School_phone'
  ],
  teachers: [
    'School_id', 'Teacher_id', 'Teacher_number', 'State_teacher_id',
    'Teacher_email', 'First_name', 'Last_name', 'Title'
  ],
  staff: ['School_id', 'Staff_id', 'Staff_email', 'First_name', 'Last_name', 'Department', 'Title'],
  students: [
    'School_id', 'Student_id', 'Student_number', 'State_id', 'Last_name',
    'First_name', 'Grade', 'Gender', 'DOB', 'Student_email'
  ],
  sections: ['School_id', 'Section_id', 'Teacher_id', 'Teacher_2_id', 'Name', 'Grade', 'Subject'],
  enrollments: ['School_id', 'Section_id', 'Student_id']
} as const;

export type TableName = keyof typeof TABLE_COLUMNS;

export interface DistrictTables {
  district: DistrictRecord;
  schools: SchoolRecord[];
  teachers: TeacherRecord[];
  staff: StaffRecord[];
  students: StudentRecord[];
  sections: SectionRecord[];
  enrollments: EnrollmentRecord[];
}

export const DISTRICT_ADMIN_TITLE = 'District Administrator';

// Pipeline hand-off
export interface DistrictSpec {
  index: number;
  name: string;
  state: string;
  emailDomain: string;
}

export interface SchoolHandoff {
  school: SchoolRecord;
  teacherIds: string[];
}

export interface DistrictSkeleton {
  district: DistrictRecord;
  schools: SchoolRecord[];
  teachers: TeacherRecord[];
  staff: StaffRecord[];
  handoffs: SchoolHandoff[];
}

export interface SchoolRoster {
  schoolId: string;
  students: StudentRecord[];
  sections: SectionRecord[];
  enrollments: EnrollmentRecord[];
}

// Content model seam
export interface ContentRequest {
  system: string;
  prompt: string;
  temperature: number;
  maxOutputTokens: number;
}

export interface ContentResponse {
  text: string;
  finishReason: string;
  truncated: boolean;
  model: string;
  usage?: {
    promptTokens: number;
    outputTokens: number;
  };
}

export interface ContentModel {
  readonly provider: ModelProvider;
  readonly model: string;
  complete(request: ContentRequest): Promise<ContentResponse>;
}

// Model routing
export interface ModelRoute {
  provider: ModelProvider;
  model: string;
  priority: number;
  maxOutputTokens: number;
  capabilities: string[];
}

// Error types
export class SynthError extends Error {
  constructor(
    message: string,
    public code: string,
    public details?: unknown
  ) {
    super(message);
    this.name = 'SynthError';
  }
}

export class ValidationError extends SynthError {
  constructor(message: string, details?: unknown) {
    super(message, 'VALIDATION_ERROR', details);
    this.name = 'ValidationError';
  }
}

export class APIError extends SynthError {
  constructor(message: string, details?: unknown) {
    super(message, 'API_ERROR', details);
    this.name = 'APIError';
  }
}

export type OutputErrorCode = 'TRUNCATED_OUTPUT' | 'MALFORMED_OUTPUT';

export class OutputError extends SynthError {
  constructor(message: string, code: OutputErrorCode, details?: unknown) {
    super(message, code, details);
    this.name = 'OutputError';
  }
}

export interface IntegrityViolation {
  table: TableName;
  column: string;
  value: string;
  message: string;
}

export class IntegrityError extends SynthError {
  constructor(
    message: string,
    public violations: IntegrityViolation[]
  ) {
    super(message, 'INTEGRITY_ERROR', { violations });
    this.name = 'IntegrityError';
  }
}

/**
 * Prompt-driven fixture builders: read the identifiers a generator put in
 * its prompt and answer with records that use them.
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import {
  DISTRICT_ADMIN_TITLE,
  type ContentRequest,
  type EnrollmentDraft,
  type Grade,
  type SchoolDraft,
  type SectionDraft,
  type StaffDraft,
  type StudentDraft,
  type TeacherDraft
} from '../../src/types.js';
import { jsonResponse, type Responder } from './fake-model.js';

export const FIXED_NOW = new Date('2026-10-19T00:00:00Z');
export const fixedNow = (): Date => FIXED_NOW;

const NamesSchema = z.object({
  first: z.array(z.string()).min(1),
  last: z.array(z.string()).min(1)
});

const NAMES = NamesSchema.parse(
  JSON.parse(readFileSync(new URL('../fixtures/names.json', import.meta.url), 'utf8'))
);

export interface PersonName {
  first: string;
  last: string;
}

/**
 * Hands out distinct first/last name pairs in a fixed order.
 */
export class NameBook {
  private index = 0;

  next(): PersonName {
    const i = this.index++;
    const first = NAMES.first[i % NAMES.first.length] ?? 'Amelia';
    const last = NAMES.last[Math.floor(i / NAMES.first.length) % NAMES.last.length] ?? 'Abernathy';
    return { first, last };
  }
}

export function emailFor(name: PersonName, domain: string): string {
  return `${name.first}.${name.last}@${domain}`.toLowerCase();
}

const IdListSchema = z.array(z.string());
const SkeletonIdsSchema = z.array(
  z.object({
    School_id: z.string(),
    Teacher_ids: IdListSchema,
    Staff_ids: IdListSchema
  })
);

function capture(prompt: string, pattern: RegExp, label: string): string {
  const match = prompt.match(pattern);
  const value = match?.[1];
  if (value === undefined) {
    throw new Error(`Prompt has no ${label}`);
  }
  return value;
}

export interface SkeletonPromptIds {
  schools: z.infer<typeof SkeletonIdsSchema>;
  domain: string;
  state: string;
}

export function parseSkeletonPrompt(prompt: string): SkeletonPromptIds {
  const ids = capture(prompt, /Identifiers to use, grouped by school:\n([\s\S]*?)\n\nRequirements:/, 'identifiers');
  return {
    schools: SkeletonIdsSchema.parse(JSON.parse(ids)),
    domain: capture(prompt, /ends with "@([^"]+)"/, 'email domain'),
    state: capture(prompt, /School_state "([A-Z]{2})"/, 'state')
  };
}

export interface RosterPromptIds {
  teacherIds: string[];
  sectionIds: string[];
  studentIds: string[];
  domain: string;
}

export function parseRosterPrompt(prompt: string): RosterPromptIds {
  const list = (pattern: RegExp, label: string) => IdListSchema.parse(JSON.parse(capture(prompt, pattern, label)));
  return {
    teacherIds: list(/Teacher_ids at this school: (\[.*\])/, 'teacher IDs'),
    sectionIds: list(/Section_ids to use: (\[.*\])/, 'section IDs'),
    studentIds: list(/Student_ids to use: (\[.*\])/, 'student IDs'),
    domain: capture(prompt, /ends with "@([^"]+)"/, 'email domain')
  };
}

export interface SkeletonBody {
  schools: SchoolDraft[];
  teachers: TeacherDraft[];
  staff: StaffDraft[];
}

export interface SkeletonFixtureOptions {
  /** Emit the District Administrator and dual-role records directly */
  complete?: boolean;
  names?: NameBook;
  mutate?: (body: SkeletonBody) => void;
}

export function buildSkeleton(prompt: string, options: SkeletonFixtureOptions = {}): SkeletonBody {
  const { schools, domain, state } = parseSkeletonPrompt(prompt);
  const names = options.names ?? new NameBook();
  const body: SkeletonBody = { schools: [], teachers: [], staff: [] };

  schools.forEach((school, s) => {
    const principal = names.next();
    body.schools.push({
      School_id: school.School_id,
      School_name: `${principal.last} Academy`,
      Low_grade: 'K',
      High_grade: '12',
      Principal: `${principal.first} ${principal.last}`,
      Principal_email: emailFor(principal, domain),
      School_address: `${100 + s} Main Street`,
      School_city: 'Springfield',
      School_state: state,
      School_zip: '62701',
      School_phone: '555-0100'
    });

    for (const teacherId of school.Teacher_ids) {
      const name = names.next();
      body.teachers.push({
        School_id: school.School_id,
        Teacher_id: teacherId,
        Teacher_email: emailFor(name, domain),
        First_name: name.first,
        Last_name: name.last,
        Title: 'Classroom Teacher'
      });
    }

    for (const staffId of school.Staff_ids) {
      const name = names.next();
      body.staff.push({
        School_id: school.School_id,
        Staff_id: staffId,
        Staff_email: emailFor(name, domain),
        First_name: name.first,
        Last_name: name.last,
        Department: 'Student Services',
        Title: 'Counselor'
      });
    }
  });

  if (options.complete) {
    const admin = body.staff[0];
    if (admin) {
      admin.Title = DISTRICT_ADMIN_TITLE;
      admin.Department = 'District Office';
    }
    const dual = body.staff[body.staff.length - 1];
    const teacher = body.teachers.find(t => t.School_id === dual?.School_id);
    if (dual && teacher && dual !== admin) {
      dual.Staff_email = teacher.Teacher_email;
      dual.First_name = teacher.First_name;
      dual.Last_name = teacher.Last_name;
    }
  }

  options.mutate?.(body);
  return body;
}

export interface RosterBody {
  students: StudentDraft[];
  sections: SectionDraft[];
  enrollments: EnrollmentDraft[];
}

export interface RosterFixtureOptions {
  /** Emit a co-taught section and multi-section students directly */
  complete?: boolean;
  grade?: Grade;
  dob?: string;
  names?: NameBook;
  mutate?: (body: RosterBody) => void;
}

const SUBJECTS = ['Mathematics', 'Science', 'Reading', 'History'];

export function buildRoster(prompt: string, options: RosterFixtureOptions = {}): RosterBody {
  const { teacherIds, sectionIds, studentIds, domain } = parseRosterPrompt(prompt);
  const names = options.names ?? new NameBook();
  const grade = options.grade ?? '5';
  const body: RosterBody = { students: [], sections: [], enrollments: [] };

  sectionIds.forEach((sectionId, i) => {
    const subject = SUBJECTS[i % SUBJECTS.length] ?? 'Mathematics';
    body.sections.push({
      Section_id: sectionId,
      Teacher_id: teacherIds[i % teacherIds.length] ?? '',
      Teacher_2_id: options.complete && i === 0 ? teacherIds[1] ?? '' : '',
      Name: `${subject} ${i + 1}`,
      Grade: grade,
      Subject: subject
    });
  });

  studentIds.forEach((studentId, j) => {
    const name = names.next();
    body.students.push({
      Student_id: studentId,
      First_name: name.first,
      Last_name: name.last,
      Grade: grade,
      Gender: j % 2 === 0 ? 'F' : 'M',
      DOB: options.dob ?? '2016-03-15',
      Student_email: emailFor(name, domain)
    });
  });

  const perSection = Math.ceil(studentIds.length / Math.max(1, sectionIds.length));
  studentIds.forEach((studentId, j) => {
    const sectionId = sectionIds[Math.min(Math.floor(j / perSection), sectionIds.length - 1)];
    if (sectionId) body.enrollments.push({ Section_id: sectionId, Student_id: studentId });
  });

  // Sections in pairs share one student; an odd last section takes the first pair's
  if (options.complete && sectionIds.length > 1) {
    for (let i = 0; i + 1 < sectionIds.length; i += 2) {
      const studentId = studentIds[i * perSection];
      const partner = sectionIds[i + 1];
      if (studentId && partner) body.enrollments.push({ Section_id: partner, Student_id: studentId });
    }
    const last = sectionIds[sectionIds.length - 1];
    const shared = studentIds[0];
    if (sectionIds.length % 2 === 1 && last && shared) {
      body.enrollments.push({ Section_id: last, Student_id: shared });
    }
  }

  options.mutate?.(body);
  return body;
}

/**
 * Answers skeleton prompts and roster prompts alike, drawing every name
 * from one shared book so emails never repeat.
 */
export function districtResponder(
  options: { skeleton?: SkeletonFixtureOptions; roster?: RosterFixtureOptions } = {}
): Responder {
  const names = new NameBook();
  return (request: ContentRequest) =>
    request.prompt.includes('Identifiers to use, grouped by school')
      ? jsonResponse(buildSkeleton(request.prompt, { ...options.skeleton, names }))
      : jsonResponse(buildRoster(request.prompt, { ...options.roster, names }));
}

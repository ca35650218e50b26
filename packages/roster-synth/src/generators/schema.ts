/**
 * Phase 1: district skeleton generator (district, schools, teachers, staff)
 */

import type { DistrictIdSpace } from '../ids/allocator.js';
import { resolveState } from '../ids/states.js';
import {
  checkSkeletonInvariants,
  injectSkeletonInvariants,
  type SkeletonRecords
} from '../invariants/skeleton.js';
import {
  DISTRICT_ADMIN_TITLE,
  type DistrictSkeleton,
  type DistrictSpec,
  type SchoolRecord,
  type SkeletonOutput,
  SkeletonOutputSchema,
  type StaffRecord,
  TABLE_COLUMNS,
  type TeacherRecord,
  ValidationError
} from '../types.js';
import { summarize } from '../utils/format.js';
import { BaseGenerator, diffIdentifiers } from './base.js';
import { estimateSkeletonTokens } from './budget.js';

export interface SchemaGeneratorInput {
  district: DistrictSpec;
  schools: number;
  teachersPerSchool: number;
  staffPerSchool: number;
}

interface PlannedTeacher {
  teacherId: string;
  teacherNumber: string;
  stateTeacherId: string;
}

interface PlannedSchool {
  schoolId: string;
  schoolNumber: string;
  teachers: PlannedTeacher[];
  staffIds: string[];
}

export interface SkeletonPlan {
  space: DistrictIdSpace;
  schools: PlannedSchool[];
}

const DRAFT_FIELDS = {
  schools: TABLE_COLUMNS.schools.filter(c => c !== 'School_number'),
  teachers: TABLE_COLUMNS.teachers.filter(c => c !== 'Teacher_number' && c !== 'State_teacher_id'),
  staff: TABLE_COLUMNS.staff
};

export class SchemaGenerator extends BaseGenerator<
  SchemaGeneratorInput,
  SkeletonPlan,
  SkeletonOutput,
  DistrictSkeleton
> {
  protected readonly outputSchema = SkeletonOutputSchema;

  protected describe(input: SchemaGeneratorInput): string {
    return `district "${input.district.name}"`;
  }

  protected plan(input: SchemaGeneratorInput): SkeletonPlan {
    const { allocator } = this.context;
    const index = input.district.index;
    const space = allocator.space(index);

    const schools: PlannedSchool[] = [];
    for (let s = 0; s < input.schools; s++) {
      schools.push({
        schoolId: allocator.next(index, 'school'),
        schoolNumber: allocator.next(index, 'schoolNumber'),
        teachers: Array.from({ length: input.teachersPerSchool }, () => ({
          teacherId: allocator.next(index, 'teacher'),
          teacherNumber: allocator.next(index, 'teacherNumber'),
          stateTeacherId: allocator.next(index, 'stateTeacherId')
        })),
        staffIds: allocator.take(index, 'staff', input.staffPerSchool)
      });
    }
    return { space, schools };
  }

  protected estimateOutputTokens(plan: SkeletonPlan): number {
    const first = plan.schools[0];
    return estimateSkeletonTokens({
      schools: plan.schools.length,
      teachersPerSchool: first?.teachers.length ?? 0,
      staffPerSchool: first?.staffIds.length ?? 0
    });
  }

  protected generatePrompt(input: SchemaGeneratorInput, plan: SkeletonPlan): string {
    const { district } = input;
    const state = resolveState(district.state);
    const identifiers = plan.schools.map(school => ({
      School_id: school.schoolId,
      Teacher_ids: school.teachers.map(t => t.teacherId),
      Staff_ids: school.staffIds
    }));

    return `Create the structural skeleton of the "${district.name}" school district in ${state.name} (${state.code}).

Identifiers to use, grouped by school:
${JSON.stringify(identifiers, null, 2)}

Requirements:
1. One "schools" record per School_id with a realistic school name, Low_grade and High_grade (PK, K or 1-12, Low_grade not above High_grade), a principal's full name and email, a street address, city and ZIP code in ${state.name}, School_state "${state.code}" and a phone number.
2. One "teachers" record per Teacher_id, carrying the School_id it is listed under, a realistic first and last name and a job title.
3. One "staff" record per Staff_id, carrying the School_id it is listed under, a Department and a Title.
4. Exactly one staff record in the whole district has the Title "${DISTRICT_ADMIN_TITLE}".
5. Exactly one other staff record is also one of the teachers: it repeats that teacher's First_name, Last_name and email address but keeps its own Staff_id.
6. Every other email address is unique within its file and ends with "@${district.emailDomain}".
7. Names are realistic, contain letters only (no digits or special characters) and are never placeholders like "Teacher One". No two people share a full name.

Return ONLY a JSON object of this form, no additional text:
{
  "schools": [{ ${DRAFT_FIELDS.schools.map(f => `"${f}"`).join(', ')} }],
  "teachers": [{ ${DRAFT_FIELDS.teachers.map(f => `"${f}"`).join(', ')} }],
  "staff": [{ ${DRAFT_FIELDS.staff.map(f => `"${f}"`).join(', ')} }]
}`;
  }

  protected buildResult(
    input: SchemaGeneratorInput,
    plan: SkeletonPlan,
    output: SkeletonOutput
  ): DistrictSkeleton {
    const unit = this.describe(input);
    const problems = this.checkIdentifiers(plan, output);
    if (problems.length > 0) {
      throw new ValidationError(`Output for ${unit} does not match its allocation: ${summarize(problems)}`, {
        unit,
        problems
      });
    }

    const schoolsById = new Map(output.schools.map(s => [s.School_id, s]));
    const teachersById = new Map(output.teachers.map(t => [t.Teacher_id, t]));
    const staffById = new Map(output.staff.map(s => [s.Staff_id, s]));

    const schools: SchoolRecord[] = [];
    const teachers: TeacherRecord[] = [];
    const staff: StaffRecord[] = [];

    // Plan order, with locally held codes merged in
    for (const planned of plan.schools) {
      const school = schoolsById.get(planned.schoolId);
      if (school) schools.push({ ...school, School_number: planned.schoolNumber });

      for (const t of planned.teachers) {
        const teacher = teachersById.get(t.teacherId);
        if (teacher) {
          teachers.push({
            ...teacher,
            Teacher_number: t.teacherNumber,
            State_teacher_id: t.stateTeacherId
          });
        }
      }
      for (const staffId of planned.staffIds) {
        const member = staffById.get(staffId);
        if (member) staff.push({ ...member });
      }
    }

    const records: SkeletonRecords = {
      emailDomain: input.district.emailDomain,
      schools,
      teachers,
      staff
    };

    if (this.context.injectInvariants) {
      for (const note of injectSkeletonInvariants(records)) {
        this.logger.debug({ unit }, note);
      }
    }

    const violations = checkSkeletonInvariants(records);
    if (violations.length > 0) {
      throw new ValidationError(`Skeleton for ${unit} violates invariants: ${summarize(violations)}`, {
        unit,
        violations
      });
    }

    return {
      district: {
        Index: input.district.index,
        District_name: input.district.name,
        State: plan.space.state,
        Email_domain: input.district.emailDomain,
        Id_prefix: plan.space.prefix
      },
      schools,
      teachers,
      staff,
      handoffs: plan.schools.flatMap(planned => {
        const school = schools.find(s => s.School_id === planned.schoolId);
        return school ? [{ school, teacherIds: planned.teachers.map(t => t.teacherId) }] : [];
      })
    };
  }

  private checkIdentifiers(plan: SkeletonPlan, output: SkeletonOutput): string[] {
    const schoolOf = new Map<string, string>();
    for (const school of plan.schools) {
      for (const t of school.teachers) schoolOf.set(t.teacherId, school.schoolId);
      for (const id of school.staffIds) schoolOf.set(id, school.schoolId);
    }

    const problems = [
      ...diffIdentifiers('School', plan.schools.map(s => s.schoolId), output.schools.map(s => s.School_id)),
      ...diffIdentifiers(
        'Teacher',
        plan.schools.flatMap(s => s.teachers.map(t => t.teacherId)),
        output.teachers.map(t => t.Teacher_id)
      ),
      ...diffIdentifiers('Staff', plan.schools.flatMap(s => s.staffIds), output.staff.map(s => s.Staff_id))
    ];

    for (const teacher of output.teachers) {
      const expected = schoolOf.get(teacher.Teacher_id);
      if (expected && expected !== teacher.School_id) {
        problems.push(`Teacher ${teacher.Teacher_id} belongs to school ${expected}, not ${teacher.School_id}`);
      }
    }
    for (const member of output.staff) {
      const expected = schoolOf.get(member.Staff_id);
      if (expected && expected !== member.School_id) {
        problems.push(`Staff ${member.Staff_id} belongs to school ${expected}, not ${member.School_id}`);
      }
    }
    return problems;
  }
}

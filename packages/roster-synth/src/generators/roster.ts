/**
 * Phase 2: per-school roster generator (students, sections, enrollments)
 */

import { schoolYearStart, toCalendarDate, formatDate } from '../invariants/grades.js';
import {
  checkRosterInvariants,
  injectRosterInvariants,
  type RosterRecords
} from '../invariants/roster.js';
import {
  type DistrictRecord,
  type EnrollmentRecord,
  type RosterOutput,
  RosterOutputSchema,
  type SchoolHandoff,
  type SchoolRoster,
  type SectionRecord,
  type StudentRecord,
  TABLE_COLUMNS,
  ValidationError
} from '../types.js';
import { summarize } from '../utils/format.js';
import { BaseGenerator, diffIdentifiers } from './base.js';
import { estimateRosterTokens } from './budget.js';

export interface RosterGeneratorInput {
  district: DistrictRecord;
  handoff: SchoolHandoff;
  sectionsPerSchool: number;
  studentsPerSection: number;
}

interface PlannedStudent {
  studentId: string;
  studentNumber: string;
  stateId: string;
}

export interface RosterPlan {
  sectionIds: string[];
  students: PlannedStudent[];
}

const STUDENT_FIELDS = TABLE_COLUMNS.students.filter(
  c => c !== 'School_id' && c !== 'Student_number' && c !== 'State_id'
);
const SECTION_FIELDS = TABLE_COLUMNS.sections.filter(c => c !== 'School_id');

export class RosterGenerator extends BaseGenerator<
  RosterGeneratorInput,
  RosterPlan,
  RosterOutput,
  SchoolRoster
> {
  protected readonly outputSchema = RosterOutputSchema;

  protected describe(input: RosterGeneratorInput): string {
    return `school ${input.handoff.school.School_id}`;
  }

  protected plan(input: RosterGeneratorInput): RosterPlan {
    const { allocator } = this.context;
    const index = input.district.Index;
    const schoolNumber = input.handoff.school.School_number;

    const sectionIds = allocator.take(index, 'section', input.sectionsPerSchool);
    const students = Array.from({ length: input.sectionsPerSchool * input.studentsPerSection }, () => ({
      studentId: allocator.next(index, 'student', { schoolNumber }),
      studentNumber: allocator.next(index, 'studentNumber'),
      stateId: allocator.next(index, 'stateStudentId')
    }));
    return { sectionIds, students };
  }

  protected estimateOutputTokens(plan: RosterPlan): number {
    const sections = plan.sectionIds.length;
    return estimateRosterTokens({
      sections,
      studentsPerSection: sections > 0 ? Math.ceil(plan.students.length / sections) : 0
    });
  }

  protected generatePrompt(input: RosterGeneratorInput, plan: RosterPlan): string {
    const { school, teacherIds } = input.handoff;
    const start = formatDate(schoolYearStart(toCalendarDate(this.asOf())));
    const perSection = input.studentsPerSection;

    return `Create the class roster of ${school.School_name} (School_id ${school.School_id}) in the "${input.district.District_name}" school district, ${input.district.State}. The school serves grades ${school.Low_grade} to ${school.High_grade}.

Teacher_ids at this school: ${JSON.stringify(teacherIds)}
Section_ids to use: ${JSON.stringify(plan.sectionIds)}
Student_ids to use: ${JSON.stringify(plan.students.map(s => s.studentId))}

Requirements:
1. One "sections" record per Section_id. Teacher_id is one of this school's Teacher_ids. Teacher_2_id is empty ("") unless the section is co-taught; at least one section is co-taught by a second, different teacher of this school. Grade lies between ${school.Low_grade} and ${school.High_grade}.
2. One "students" record per Student_id, with Grade between ${school.Low_grade} and ${school.High_grade}, Gender M, F or X and DOB as YYYY-MM-DD. On ${start}, the start of the school year, a kindergartner is 5 or 6 years old and each later grade one year older (a grade 3 student is 8 or 9, PK is 4 or 5).
3. Every student email is unique and ends with "@${input.district.Email_domain}".
4. "enrollments" pairs a Section_id with a Student_id. About ${perSection} students per section, every student enrolled at least once, no pair repeated, and every section has exactly one student who is also enrolled in another section.
5. Names are realistic, contain letters only and are never placeholders like "Student One". No two students share a full name.

Return ONLY a JSON object of this form, no additional text:
{
  "students": [{ ${STUDENT_FIELDS.map(f => `"${f}"`).join(', ')} }],
  "sections": [{ ${SECTION_FIELDS.map(f => `"${f}"`).join(', ')} }],
  "enrollments": [{ "Section_id", "Student_id" }]
}`;
  }

  protected buildResult(input: RosterGeneratorInput, plan: RosterPlan, output: RosterOutput): SchoolRoster {
    const unit = this.describe(input);
    const schoolId = input.handoff.school.School_id;

    const problems = [
      ...diffIdentifiers('Section', plan.sectionIds, output.sections.map(s => s.Section_id)),
      ...diffIdentifiers('Student', plan.students.map(s => s.studentId), output.students.map(s => s.Student_id))
    ];
    if (problems.length > 0) {
      throw new ValidationError(`Output for ${unit} does not match its allocation: ${summarize(problems)}`, {
        unit,
        problems
      });
    }

    const sectionsById = new Map(output.sections.map(s => [s.Section_id, s]));
    const studentsById = new Map(output.students.map(s => [s.Student_id, s]));

    const sections: SectionRecord[] = plan.sectionIds.flatMap(id => {
      const section = sectionsById.get(id);
      return section ? [{ ...section, School_id: schoolId }] : [];
    });
    const students: StudentRecord[] = plan.students.flatMap(planned => {
      const student = studentsById.get(planned.studentId);
      return student
        ? [{
            ...student,
            School_id: schoolId,
            Student_number: planned.studentNumber,
            State_id: planned.stateId
          }]
        : [];
    });
    const enrollments: EnrollmentRecord[] = output.enrollments.map(e => ({ ...e, School_id: schoolId }));

    const records: RosterRecords = {
      school: input.handoff.school,
      teacherIds: input.handoff.teacherIds,
      emailDomain: input.district.Email_domain,
      asOf: toCalendarDate(this.asOf()),
      students,
      sections,
      enrollments
    };

    if (this.context.injectInvariants) {
      for (const note of injectRosterInvariants(records)) {
        this.logger.debug({ unit }, note);
      }
    }

    const violations = checkRosterInvariants(records);
    if (violations.length > 0) {
      throw new ValidationError(`Roster for ${unit} violates invariants: ${summarize(violations)}`, {
        unit,
        violations
      });
    }

    return { schoolId, students, sections, enrollments: records.enrollments };
  }
}

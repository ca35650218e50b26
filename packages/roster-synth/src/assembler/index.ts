/**
 * Dataset assembly and referential integrity checks
 */

import { findDualRolePairs, isDistrictAdministrator } from '../invariants/skeleton.js';
import { normalizeEmail } from '../invariants/names.js';
import {
  DISTRICT_ADMIN_TITLE,
  type DistrictSkeleton,
  type DistrictTables,
  IntegrityError,
  type IntegrityViolation,
  type SchoolRoster,
  type TableName
} from '../types.js';

function uniqueKeys<T>(
  violations: IntegrityViolation[],
  table: TableName,
  column: string,
  rows: T[],
  key: (row: T) => string
): Map<string, T> {
  const index = new Map<string, T>();
  for (const row of rows) {
    const value = key(row);
    if (index.has(value)) {
      violations.push({ table, column, value, message: `Duplicate ${column} ${value}` });
    } else {
      index.set(value, row);
    }
  }
  return index;
}

function uniqueEmails<T>(
  violations: IntegrityViolation[],
  table: TableName,
  column: string,
  rows: T[],
  email: (row: T) => string
): void {
  const seen = new Set<string>();
  for (const row of rows) {
    const value = normalizeEmail(email(row));
    if (seen.has(value)) {
      violations.push({ table, column, value, message: `Email ${value} is used more than once` });
    }
    seen.add(value);
  }
}

/**
 * Build the six district tables from the skeleton and the rosters of the
 * schools that succeeded. Throws an IntegrityError listing every violation.
 */
export function assembleDistrict(skeleton: DistrictSkeleton, rosters: SchoolRoster[]): DistrictTables {
  const tables: DistrictTables = {
    district: skeleton.district,
    schools: skeleton.schools,
    teachers: skeleton.teachers,
    staff: skeleton.staff,
    students: rosters.flatMap(r => r.students),
    sections: rosters.flatMap(r => r.sections),
    enrollments: rosters.flatMap(r => r.enrollments)
  };

  const violations = validateTables(tables);
  if (violations.length > 0) {
    throw new IntegrityError(
      `District "${skeleton.district.District_name}" failed integrity checks with ${violations.length} violation(s)`,
      violations
    );
  }
  return tables;
}

export function validateTables(tables: DistrictTables): IntegrityViolation[] {
  const violations: IntegrityViolation[] = [];

  const schools = uniqueKeys(violations, 'schools', 'School_id', tables.schools, s => s.School_id);
  const teachers = uniqueKeys(violations, 'teachers', 'Teacher_id', tables.teachers, t => t.Teacher_id);
  uniqueKeys(violations, 'staff', 'Staff_id', tables.staff, s => s.Staff_id);
  const students = uniqueKeys(violations, 'students', 'Student_id', tables.students, s => s.Student_id);
  const sections = uniqueKeys(violations, 'sections', 'Section_id', tables.sections, s => s.Section_id);
  uniqueKeys(violations, 'enrollments', 'Section_id+Student_id', tables.enrollments, e => `${e.Section_id}+${e.Student_id}`);

  const requireSchool = (table: TableName, value: string) => {
    if (!schools.has(value)) {
      violations.push({ table, column: 'School_id', value, message: `Unknown school ${value}` });
    }
  };

  for (const teacher of tables.teachers) requireSchool('teachers', teacher.School_id);
  for (const member of tables.staff) requireSchool('staff', member.School_id);
  for (const student of tables.students) requireSchool('students', student.School_id);

  for (const section of tables.sections) {
    requireSchool('sections', section.School_id);
    const columns = [['Teacher_id', section.Teacher_id], ['Teacher_2_id', section.Teacher_2_id]] as const;
    for (const [column, value] of columns) {
      if (column === 'Teacher_2_id' && value === '') continue;
      const teacher = teachers.get(value);
      if (!teacher) {
        violations.push({ table: 'sections', column, value, message: `Section ${section.Section_id} references unknown teacher ${value}` });
      } else if (teacher.School_id !== section.School_id) {
        violations.push({
          table: 'sections',
          column,
          value,
          message: `Section ${section.Section_id} at ${section.School_id} is taught by teacher of school ${teacher.School_id}`
        });
      }
    }
  }

  for (const enrollment of tables.enrollments) {
    requireSchool('enrollments', enrollment.School_id);
    const section = sections.get(enrollment.Section_id);
    const student = students.get(enrollment.Student_id);
    if (!section) {
      violations.push({ table: 'enrollments', column: 'Section_id', value: enrollment.Section_id, message: `Unknown section ${enrollment.Section_id}` });
    } else if (section.School_id !== enrollment.School_id) {
      violations.push({
        table: 'enrollments',
        column: 'Section_id',
        value: enrollment.Section_id,
        message: `Section ${section.Section_id} belongs to ${section.School_id}, enrollment says ${enrollment.School_id}`
      });
    }
    if (!student) {
      violations.push({ table: 'enrollments', column: 'Student_id', value: enrollment.Student_id, message: `Unknown student ${enrollment.Student_id}` });
    } else if (student.School_id !== enrollment.School_id) {
      violations.push({
        table: 'enrollments',
        column: 'Student_id',
        value: enrollment.Student_id,
        message: `Student ${student.Student_id} belongs to ${student.School_id}, enrollment says ${enrollment.School_id}`
      });
    }
  }

  uniqueEmails(violations, 'teachers', 'Teacher_email', tables.teachers, t => t.Teacher_email);
  uniqueEmails(violations, 'staff', 'Staff_email', tables.staff, s => s.Staff_email);
  uniqueEmails(violations, 'students', 'Student_email', tables.students, s => s.Student_email);

  const admins = tables.staff.filter(isDistrictAdministrator);
  if (admins.length !== 1) {
    violations.push({
      table: 'staff',
      column: 'Title',
      value: DISTRICT_ADMIN_TITLE,
      message: `Expected exactly one ${DISTRICT_ADMIN_TITLE}, found ${admins.length}`
    });
  }

  const pairs = findDualRolePairs(tables.teachers, tables.staff);
  if (pairs.length !== 1) {
    violations.push({
      table: 'staff',
      column: 'Staff_email',
      value: pairs.map(p => p.staff.Staff_id).join(','),
      message: `Expected exactly one dual-role staff record, found ${pairs.length}`
    });
  }

  return violations;
}

/**
 * No identifier may appear in more than one district.
 */
export function assertDisjointIdentifiers(all: DistrictTables[]): void {
  const owner = new Map<string, string>();
  const violations: IntegrityViolation[] = [];

  for (const tables of all) {
    const name = tables.district.District_name;
    const ids: [TableName, string, string[]][] = [
      ['schools', 'School_id', tables.schools.map(s => s.School_id)],
      ['schools', 'School_number', tables.schools.map(s => s.School_number)],
      ['teachers', 'Teacher_id', tables.teachers.map(t => t.Teacher_id)],
      ['teachers', 'Teacher_number', tables.teachers.map(t => t.Teacher_number)],
      ['teachers', 'State_teacher_id', tables.teachers.map(t => t.State_teacher_id)],
      ['staff', 'Staff_id', tables.staff.map(s => s.Staff_id)],
      ['students', 'Student_id', tables.students.map(s => s.Student_id)],
      ['students', 'Student_number', tables.students.map(s => s.Student_number)],
      ['students', 'State_id', tables.students.map(s => s.State_id)],
      ['sections', 'Section_id', tables.sections.map(s => s.Section_id)]
    ];

    for (const [table, column, values] of ids) {
      for (const value of new Set(values)) {
        const previous = owner.get(value);
        if (previous !== undefined && previous !== name) {
          violations.push({ table, column, value, message: `Identifier ${value} appears in "${previous}" and "${name}"` });
        }
        owner.set(value, name);
      }
    }
  }

  if (violations.length > 0) {
    throw new IntegrityError(`${violations.length} identifier(s) shared between districts`, violations);
  }
}

/**
 * District skeleton invariants: District Administrator, dual-role staff,
 * real names and per-type email uniqueness.
 */

import {
  DISTRICT_ADMIN_TITLE,
  type SchoolRecord,
  type StaffRecord,
  type TeacherRecord
} from '../types.js';
import { gradeRank } from './grades.js';
import { findDuplicates, fullName, hasDomain, isRealName, normalizeEmail } from './names.js';

export interface SkeletonRecords {
  emailDomain: string;
  schools: SchoolRecord[];
  teachers: TeacherRecord[];
  staff: StaffRecord[];
}

export interface DualRolePair {
  staff: StaffRecord;
  teacher: TeacherRecord;
}

export function isDistrictAdministrator(staff: StaffRecord): boolean {
  return staff.Title.trim().toLowerCase() === DISTRICT_ADMIN_TITLE.toLowerCase();
}

export function findDualRolePairs(teachers: TeacherRecord[], staff: StaffRecord[]): DualRolePair[] {
  const byEmail = new Map(teachers.map(t => [normalizeEmail(t.Teacher_email), t]));
  const pairs: DualRolePair[] = [];
  for (const member of staff) {
    const teacher = byEmail.get(normalizeEmail(member.Staff_email));
    if (teacher) pairs.push({ staff: member, teacher });
  }
  return pairs;
}

/**
 * Make sure some staff record carries the District Administrator title,
 * normalising the spelling of any existing one.
 */
export function injectDistrictAdministrator(records: SkeletonRecords): string | undefined {
  const admins = records.staff.filter(isDistrictAdministrator);
  for (const admin of admins) {
    admin.Title = DISTRICT_ADMIN_TITLE;
  }
  if (admins.length > 0) return undefined;

  const dualRole = new Set(findDualRolePairs(records.teachers, records.staff).map(p => p.staff));
  const candidate = records.staff.find(member => !dualRole.has(member));
  if (!candidate) return undefined;

  candidate.Title = DISTRICT_ADMIN_TITLE;
  candidate.Department = 'District Office';
  return `Staff ${candidate.Staff_id} designated ${DISTRICT_ADMIN_TITLE}`;
}

/**
 * Turn one staff record into the dual-role entry when the model left none:
 * it takes over the name and email of a teacher at the same school.
 */
export function injectDualRole(records: SkeletonRecords): string | undefined {
  if (findDualRolePairs(records.teachers, records.staff).length > 0) return undefined;

  const candidate = [...records.staff].reverse().find(member => !isDistrictAdministrator(member));
  if (!candidate) return undefined;

  const teacher =
    records.teachers.find(t => t.School_id === candidate.School_id) ?? records.teachers[0];
  if (!teacher) return undefined;

  candidate.Staff_email = teacher.Teacher_email;
  candidate.First_name = teacher.First_name;
  candidate.Last_name = teacher.Last_name;
  return `Staff ${candidate.Staff_id} made dual-role with teacher ${teacher.Teacher_id}`;
}

export function injectSkeletonInvariants(records: SkeletonRecords): string[] {
  return [injectDualRole(records), injectDistrictAdministrator(records)].filter(
    (note): note is string => note !== undefined
  );
}

export function checkSkeletonInvariants(records: SkeletonRecords): string[] {
  const problems: string[] = [];
  const { emailDomain, schools, teachers, staff } = records;

  for (const school of schools) {
    if (gradeRank(school.Low_grade) > gradeRank(school.High_grade)) {
      problems.push(`School ${school.School_id} has Low_grade ${school.Low_grade} above High_grade ${school.High_grade}`);
    }
    if (!school.Principal.split(/\s+/).every(isRealName)) {
      problems.push(`School ${school.School_id} has a placeholder principal name "${school.Principal}"`);
    }
  }

  for (const teacher of teachers) {
    if (!isRealName(teacher.First_name) || !isRealName(teacher.Last_name)) {
      problems.push(`Teacher ${teacher.Teacher_id} has a placeholder name "${teacher.First_name} ${teacher.Last_name}"`);
    }
    if (!hasDomain(teacher.Teacher_email, emailDomain)) {
      problems.push(`Teacher ${teacher.Teacher_id} email ${teacher.Teacher_email} is not under ${emailDomain}`);
    }
  }

  for (const member of staff) {
    if (!isRealName(member.First_name) || !isRealName(member.Last_name)) {
      problems.push(`Staff ${member.Staff_id} has a placeholder name "${member.First_name} ${member.Last_name}"`);
    }
    if (!hasDomain(member.Staff_email, emailDomain)) {
      problems.push(`Staff ${member.Staff_id} email ${member.Staff_email} is not under ${emailDomain}`);
    }
  }

  for (const email of findDuplicates(teachers.map(t => t.Teacher_email))) {
    problems.push(`Teacher email ${email} is used more than once`);
  }
  for (const email of findDuplicates(staff.map(s => s.Staff_email))) {
    problems.push(`Staff email ${email} is used more than once`);
  }

  // The dual-role staff record is the same person as its teacher
  const pairs = findDualRolePairs(teachers, staff);
  const dualRoleStaff = new Set(pairs.map(pair => pair.staff));
  const people = [
    ...teachers.map(t => fullName(t.First_name, t.Last_name)),
    ...staff.filter(member => !dualRoleStaff.has(member)).map(m => fullName(m.First_name, m.Last_name))
  ];
  for (const name of findDuplicates(people)) {
    problems.push(`Full name ${name} is used by more than one person`);
  }

  const admins = staff.filter(isDistrictAdministrator);
  if (admins.length !== 1) {
    problems.push(`Expected exactly one ${DISTRICT_ADMIN_TITLE}, found ${admins.length}`);
  }

  if (pairs.length !== 1) {
    problems.push(`Expected exactly one dual-role staff record, found ${pairs.length}`);
  }
  for (const pair of pairs) {
    if (pair.staff.Staff_id === pair.teacher.Teacher_id) {
      problems.push(`Dual-role staff ${pair.staff.Staff_id} reuses the teacher's ID`);
    }
  }

  return problems;
}

/**
 * School roster invariants: co-teaching, multi-section students,
 * enrollment coverage and grade/age consistency.
 */

import type { EnrollmentRecord, SchoolRecord, SectionRecord, StudentRecord } from '../types.js';
import { alignDobToGrade, type CalendarDate, isDobConsistent, isGradeInRange } from './grades.js';
import { findDuplicates, fullName, hasDomain, isRealName } from './names.js';

export interface RosterRecords {
  school: SchoolRecord;
  teacherIds: string[];
  emailDomain: string;
  asOf: CalendarDate;
  students: StudentRecord[];
  sections: SectionRecord[];
  enrollments: EnrollmentRecord[];
}

function sectionsByStudent(enrollments: EnrollmentRecord[]): Map<string, Set<string>> {
  const map = new Map<string, Set<string>>();
  for (const e of enrollments) {
    const sections = map.get(e.Student_id) ?? new Set<string>();
    sections.add(e.Section_id);
    map.set(e.Student_id, sections);
  }
  return map;
}

function studentsBySection(enrollments: EnrollmentRecord[]): Map<string, string[]> {
  const map = new Map<string, string[]>();
  for (const e of enrollments) {
    const students = map.get(e.Section_id) ?? [];
    if (!students.includes(e.Student_id)) students.push(e.Student_id);
    map.set(e.Section_id, students);
  }
  return map;
}

/**
 * Give the first section a second teacher when no section has one.
 */
export function injectCoTeaching(records: RosterRecords): string | undefined {
  if (records.sections.some(section => section.Teacher_2_id !== '')) return undefined;

  const section = records.sections[0];
  if (!section) return undefined;
  const coTeacher = records.teacherIds.find(id => id !== section.Teacher_id);
  if (!coTeacher) return undefined;

  section.Teacher_2_id = coTeacher;
  return `Section ${section.Section_id} co-taught by ${coTeacher}`;
}

function multiSectionMembers(enrollments: EnrollmentRecord[], sectionId: string): string[] {
  const perStudent = sectionsByStudent(enrollments);
  const members = studentsBySection(enrollments).get(sectionId) ?? [];
  return members.filter(id => (perStudent.get(id)?.size ?? 0) > 1);
}

/**
 * A section may hold only one student who is also enrolled elsewhere; every
 * further one is withdrawn from that section and keeps their other sections.
 */
export function trimMultiSectionStudents(records: RosterRecords): string[] {
  const notes: string[] = [];
  const { sections, enrollments } = records;

  for (const section of sections) {
    const [, ...extra] = multiSectionMembers(enrollments, section.Section_id);
    for (const studentId of extra) {
      const at = enrollments.findIndex(e => e.Section_id === section.Section_id && e.Student_id === studentId);
      if (at < 0) continue;
      enrollments.splice(at, 1);
      notes.push(`Student ${studentId} withdrawn from ${section.Section_id}`);
    }
  }
  return notes;
}

/**
 * Give every section exactly one student who is also enrolled elsewhere.
 * Sections are paired: the first student of a section joins the next one.
 * A section whose neighbour is already covered takes in that neighbour's
 * multi-section student instead.
 */
export function injectMultiSectionStudents(records: RosterRecords): string[] {
  const notes: string[] = [];
  const { sections, enrollments } = records;
  if (sections.length < 2) return notes;

  const enrol = (studentId: string, sectionId: string) => {
    enrollments.push({ School_id: records.school.School_id, Section_id: sectionId, Student_id: studentId });
    notes.push(`Student ${studentId} also enrolled in ${sectionId}`);
  };

  for (let i = 0; i < sections.length; i++) {
    const section = sections[i];
    const target = sections[(i + 1) % sections.length];
    if (!section || !target) continue;
    if (multiSectionMembers(enrollments, section.Section_id).length > 0) continue;

    const targetCovered = multiSectionMembers(enrollments, target.Section_id).length > 0;
    const own = targetCovered ? undefined : studentsBySection(enrollments).get(section.Section_id)?.[0];
    if (own) {
      enrol(own, target.Section_id);
      continue;
    }

    const donor = sections
      .slice(i + 1)
      .concat(sections.slice(0, i))
      .map(other => multiSectionMembers(enrollments, other.Section_id)[0])
      .find(id => id !== undefined);
    if (donor) enrol(donor, section.Section_id);
  }
  return notes;
}

/**
 * Shift birth years so every student's age matches their grade.
 */
export function repairBirthDates(records: RosterRecords): string[] {
  const notes: string[] = [];
  for (const student of records.students) {
    if (!isDobConsistent(student.DOB, student.Grade, records.asOf)) {
      const repaired = alignDobToGrade(student.DOB, student.Grade, records.asOf);
      notes.push(`Student ${student.Student_id} DOB ${student.DOB} -> ${repaired}`);
      student.DOB = repaired;
    }
  }
  return notes;
}

export function injectRosterInvariants(records: RosterRecords): string[] {
  const coTeaching = injectCoTeaching(records);
  return [
    ...(coTeaching ? [coTeaching] : []),
    ...trimMultiSectionStudents(records),
    ...injectMultiSectionStudents(records),
    ...repairBirthDates(records)
  ];
}

export function checkRosterInvariants(records: RosterRecords): string[] {
  const problems: string[] = [];
  const { school, students, sections, enrollments, emailDomain, asOf } = records;
  const teacherIds = new Set(records.teacherIds);
  const studentIds = new Set(students.map(s => s.Student_id));
  const sectionIds = new Set(sections.map(s => s.Section_id));

  for (const section of sections) {
    if (!teacherIds.has(section.Teacher_id)) {
      problems.push(`Section ${section.Section_id} references teacher ${section.Teacher_id} outside school ${school.School_id}`);
    }
    if (section.Teacher_2_id !== '') {
      if (!teacherIds.has(section.Teacher_2_id)) {
        problems.push(`Section ${section.Section_id} references co-teacher ${section.Teacher_2_id} outside school ${school.School_id}`);
      } else if (section.Teacher_2_id === section.Teacher_id) {
        problems.push(`Section ${section.Section_id} lists teacher ${section.Teacher_id} twice`);
      }
    }
    if (!isGradeInRange(section.Grade, school.Low_grade, school.High_grade)) {
      problems.push(`Section ${section.Section_id} grade ${section.Grade} is outside ${school.Low_grade}-${school.High_grade}`);
    }
  }
  if (!sections.some(section => section.Teacher_2_id !== '')) {
    problems.push(`School ${school.School_id} has no co-taught section`);
  }

  const pairs = new Set<string>();
  for (const e of enrollments) {
    if (!sectionIds.has(e.Section_id)) {
      problems.push(`Enrollment references unknown section ${e.Section_id}`);
    }
    if (!studentIds.has(e.Student_id)) {
      problems.push(`Enrollment references unknown student ${e.Student_id}`);
    }
    const key = `${e.Section_id}|${e.Student_id}`;
    if (pairs.has(key)) {
      problems.push(`Student ${e.Student_id} is enrolled in section ${e.Section_id} twice`);
    }
    pairs.add(key);
  }

  const perStudent = sectionsByStudent(enrollments);

  for (const student of students) {
    if (!perStudent.has(student.Student_id)) {
      problems.push(`Student ${student.Student_id} has no enrollment`);
    }
    if (!isGradeInRange(student.Grade, school.Low_grade, school.High_grade)) {
      problems.push(`Student ${student.Student_id} grade ${student.Grade} is outside ${school.Low_grade}-${school.High_grade}`);
    }
    if (!isDobConsistent(student.DOB, student.Grade, asOf)) {
      problems.push(`Student ${student.Student_id} DOB ${student.DOB} does not match grade ${student.Grade}`);
    }
    if (!isRealName(student.First_name) || !isRealName(student.Last_name)) {
      problems.push(`Student ${student.Student_id} has a placeholder name "${student.First_name} ${student.Last_name}"`);
    }
    if (!hasDomain(student.Student_email, emailDomain)) {
      problems.push(`Student ${student.Student_id} email ${student.Student_email} is not under ${emailDomain}`);
    }
  }

  for (const email of findDuplicates(students.map(s => s.Student_email))) {
    problems.push(`Student email ${email} is used more than once`);
  }
  for (const name of findDuplicates(students.map(s => fullName(s.First_name, s.Last_name)))) {
    problems.push(`Student name ${name} is used more than once`);
  }

  if (sections.length > 1) {
    for (const section of sections) {
      const multi = multiSectionMembers(enrollments, section.Section_id).length;
      if (multi === 0) {
        problems.push(`Section ${section.Section_id} has no student enrolled in another section`);
      } else if (multi > 1) {
        problems.push(`Section ${section.Section_id} has ${multi} students enrolled in another section`);
      }
    }
  }

  return problems;
}

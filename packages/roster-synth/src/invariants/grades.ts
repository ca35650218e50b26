/**
 * Grade ordering and grade/age consistency
 */

import { GRADES, type Grade } from '../types.js';

// A kindergartner turns 5 by the start of the school year
const KINDERGARTEN_AGE = 5;
const SCHOOL_YEAR_START_MONTH = 9;

export interface CalendarDate {
  year: number;
  month: number;
  day: number;
}

export function gradeRank(grade: Grade): number {
  return GRADES.indexOf(grade) - 1;
}

export function isGradeInRange(grade: Grade, low: Grade, high: Grade): boolean {
  const rank = gradeRank(grade);
  return rank >= gradeRank(low) && rank <= gradeRank(high);
}

export function parseDate(value: string): CalendarDate {
  const [year = NaN, month = NaN, day = NaN] = value.split('-').map(Number);
  return { year, month, day };
}

export function formatDate(date: CalendarDate): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  return `${String(date.year).padStart(4, '0')}-${pad(date.month)}-${pad(date.day)}`;
}

export function toCalendarDate(date: Date): CalendarDate {
  return { year: date.getUTCFullYear(), month: date.getUTCMonth() + 1, day: date.getUTCDate() };
}

/**
 * Completed years between `birth` and `on`
 */
export function ageOn(birth: CalendarDate, on: CalendarDate): number {
  const beforeBirthday = on.month < birth.month || (on.month === birth.month && on.day < birth.day);
  return on.year - birth.year - (beforeBirthday ? 1 : 0);
}

/**
 * September 1st of the school year that contains `asOf`
 */
export function schoolYearStart(asOf: CalendarDate): CalendarDate {
  const year = asOf.month >= SCHOOL_YEAR_START_MONTH - 1 ? asOf.year : asOf.year - 1;
  return { year, month: SCHOOL_YEAR_START_MONTH, day: 1 };
}

export function expectedAge(grade: Grade): number {
  return KINDERGARTEN_AGE + gradeRank(grade);
}

/**
 * A student is consistent with their grade when their age at the start of
 * the current school year is the expected age or one year older.
 */
export function isDobConsistent(dob: string, grade: Grade, asOf: CalendarDate): boolean {
  const age = ageOn(parseDate(dob), schoolYearStart(asOf));
  const expected = expectedAge(grade);
  return age === expected || age === expected + 1;
}

function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

/**
 * Move a birth date to the year that gives the expected age for `grade`,
 * keeping month and day.
 */
export function alignDobToGrade(dob: string, grade: Grade, asOf: CalendarDate): string {
  const birth = parseDate(dob);
  const start = schoolYearStart(asOf);
  const expected = expectedAge(grade);

  const candidate = (year: number): CalendarDate => ({
    year,
    month: birth.month,
    day: birth.month === 2 && birth.day === 29 && !isLeapYear(year) ? 28 : birth.day
  });

  const sameYear = candidate(start.year - expected);
  if (ageOn(sameYear, start) === expected) {
    return formatDate(sameYear);
  }
  return formatDate(candidate(start.year - expected - 1));
}

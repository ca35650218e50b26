/**
 * Output-size estimates for generation calls.
 *
 * Rough per-record token costs of the JSON the model is asked to return;
 * a call is only issued when its estimate fits under the output ceiling.
 */

export const TOKENS_PER_RECORD = {
  school: 90,
  teacher: 45,
  staff: 50,
  student: 60,
  section: 40,
  enrollment: 18
} as const;

const DOCUMENT_OVERHEAD = 200;

export interface SkeletonVolume {
  schools: number;
  teachersPerSchool: number;
  staffPerSchool: number;
}

export interface RosterVolume {
  sections: number;
  studentsPerSection: number;
}

export function estimateSkeletonTokens(volume: SkeletonVolume): number {
  const { schools, teachersPerSchool, staffPerSchool } = volume;
  return (
    DOCUMENT_OVERHEAD +
    schools * TOKENS_PER_RECORD.school +
    schools * teachersPerSchool * TOKENS_PER_RECORD.teacher +
    schools * staffPerSchool * TOKENS_PER_RECORD.staff
  );
}

export function estimateRosterTokens(volume: RosterVolume): number {
  const { sections, studentsPerSection } = volume;
  const students = sections * studentsPerSection;
  // One extra enrollment per section for its multi-section student
  const enrollments = students + sections;
  return (
    DOCUMENT_OVERHEAD +
    students * TOKENS_PER_RECORD.student +
    sections * TOKENS_PER_RECORD.section +
    enrollments * TOKENS_PER_RECORD.enrollment
  );
}

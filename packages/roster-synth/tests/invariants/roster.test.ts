/**
 * School roster invariants - Unit Tests
 */

import { describe, it, expect, beforeEach } from 'vitest';
import {
  checkRosterInvariants,
  injectRosterInvariants,
  repairBirthDates,
  type RosterRecords
} from '../../src/invariants/roster.js';
import type { SectionRecord, StudentRecord } from '../../src/types.js';

const DOMAIN = 'district1.net';

function student(id: string, first: string, last: string): StudentRecord {
  return {
    School_id: '100000',
    Student_id: id,
    Student_number: `N${id}`,
    State_id: `S${id}`,
    First_name: first,
    Last_name: last,
    Grade: '5',
    Gender: 'F',
    DOB: '2016-03-15',
    Student_email: `${first}.${last}@${DOMAIN}`.toLowerCase()
  };
}

function section(id: string, teacherId: string): SectionRecord {
  return {
    School_id: '100000',
    Section_id: id,
    Teacher_id: teacherId,
    Teacher_2_id: '',
    Name: `Mathematics ${id}`,
    Grade: '5',
    Subject: 'Mathematics'
  };
}

describe('roster invariants', () => {
  let records: RosterRecords;

  beforeEach(() => {
    records = {
      school: {
        School_id: '100000',
        School_name: 'Lakeside Elementary',
        School_number: '100500',
        Low_grade: 'K',
        High_grade: '8',
        Principal: 'Grace Hopper',
        Principal_email: `grace.hopper@${DOMAIN}`,
        School_address: '12 Elm Street',
        School_city: 'Springfield',
        School_state: 'IL',
        School_zip: '62701',
        School_phone: '555-0100'
      },
      teacherIds: ['101000', '101001'],
      emailDomain: DOMAIN,
      asOf: { year: 2026, month: 10, day: 19 },
      students: [
        student('120000', 'Amelia', 'Abernathy'),
        student('120001', 'Bennett', 'Bautista'),
        student('120002', 'Camila', 'Castellano'),
        student('120003', 'Dmitri', 'Delacroix')
      ],
      sections: [section('115000', '101000'), section('115001', '101001')],
      enrollments: [
        { School_id: '100000', Section_id: '115000', Student_id: '120000' },
        { School_id: '100000', Section_id: '115000', Student_id: '120001' },
        { School_id: '100000', Section_id: '115001', Student_id: '120002' },
        { School_id: '100000', Section_id: '115001', Student_id: '120003' }
      ]
    };
  });

  describe('checkRosterInvariants', () => {
    it('should report missing co-teaching and multi-section students', () => {
      expect(checkRosterInvariants(records)).toEqual([
        'School 100000 has no co-taught section',
        'Section 115000 has no student enrolled in another section',
        'Section 115001 has no student enrolled in another section'
      ]);
    });

    it('should report teachers from outside the school', () => {
      const first = records.sections[0];
      if (first) {
        first.Teacher_id = '201000';
        first.Teacher_2_id = '101001';
      }

      expect(checkRosterInvariants(records)).toContain(
        'Section 115000 references teacher 201000 outside school 100000'
      );
    });

    it('should report a section listing one teacher twice', () => {
      const first = records.sections[0];
      if (first) first.Teacher_2_id = '101000';

      expect(checkRosterInvariants(records)).toContain('Section 115000 lists teacher 101000 twice');
    });

    it('should report broken and repeated enrollments', () => {
      records.enrollments.push(
        { School_id: '100000', Section_id: '115000', Student_id: '129999' },
        { School_id: '100000', Section_id: '115001', Student_id: '120003' }
      );

      const problems = checkRosterInvariants(records);

      expect(problems).toContain('Enrollment references unknown student 129999');
      expect(problems).toContain('Student 120003 is enrolled in section 115001 twice');
    });

    it('should report students without enrollment or outside the grade range', () => {
      records.students.push({ ...student('120004', 'Elena', 'Eriksen'), Grade: '9', DOB: '2011-03-15' });

      const problems = checkRosterInvariants(records);

      expect(problems).toContain('Student 120004 has no enrollment');
      expect(problems).toContain('Student 120004 grade 9 is outside K-8');
    });

    it('should report a section with more than one multi-section student', () => {
      records.enrollments.push(
        { School_id: '100000', Section_id: '115001', Student_id: '120000' },
        { School_id: '100000', Section_id: '115000', Student_id: '120002' }
      );

      expect(checkRosterInvariants(records)).toEqual([
        'School 100000 has no co-taught section',
        'Section 115000 has 2 students enrolled in another section',
        'Section 115001 has 2 students enrolled in another section'
      ]);
    });

    it('should report two students sharing a full name', () => {
      records.students.push({ ...student('120004', 'Amelia', 'Abernathy'), Student_email: `a.abernathy@${DOMAIN}` });
      records.enrollments.push({ School_id: '100000', Section_id: '115000', Student_id: '120004' });

      expect(checkRosterInvariants(records)).toContain('Student name amelia abernathy is used more than once');
    });

    it('should report birth dates that do not fit the grade', () => {
      const first = records.students[0];
      if (first) first.DOB = '2019-03-15';

      expect(checkRosterInvariants(records)).toContain('Student 120000 DOB 2019-03-15 does not match grade 5');
    });
  });

  describe('injectRosterInvariants', () => {
    it('should add a co-teacher and one multi-section student per section', () => {
      const notes = injectRosterInvariants(records);

      expect(notes).toEqual([
        'Section 115000 co-taught by 101001',
        'Student 120000 also enrolled in 115001'
      ]);
      expect(records.sections[0]?.Teacher_2_id).toBe('101001');
      expect(records.enrollments).toHaveLength(5);
      expect(checkRosterInvariants(records)).toEqual([]);
    });

    it('should reuse a multi-section student for the odd section out', () => {
      records.students.push(student('120004', 'Elena', 'Eriksen'), student('120005', 'Felix', 'Fontaine'));
      records.sections.push(section('115002', '101000'));
      records.enrollments.push(
        { School_id: '100000', Section_id: '115002', Student_id: '120004' },
        { School_id: '100000', Section_id: '115002', Student_id: '120005' }
      );

      const notes = injectRosterInvariants(records);

      expect(notes).toEqual([
        'Section 115000 co-taught by 101001',
        'Student 120000 also enrolled in 115001',
        'Student 120000 also enrolled in 115002'
      ]);
      expect(checkRosterInvariants(records)).toEqual([]);
    });

    it('should withdraw extra multi-section students from a section', () => {
      records.enrollments.push(
        { School_id: '100000', Section_id: '115001', Student_id: '120000' },
        { School_id: '100000', Section_id: '115000', Student_id: '120002' }
      );

      const notes = injectRosterInvariants(records);

      expect(notes).toEqual(['Section 115000 co-taught by 101001', 'Student 120002 withdrawn from 115000']);
      expect(records.enrollments).toHaveLength(5);
      expect(checkRosterInvariants(records)).toEqual([]);
    });

    it('should leave a single section without a multi-section student', () => {
      records.sections = [section('115000', '101000')];
      records.enrollments = records.students.map(s => ({
        School_id: '100000',
        Section_id: '115000',
        Student_id: s.Student_id
      }));

      injectRosterInvariants(records);

      expect(records.enrollments).toHaveLength(4);
      expect(checkRosterInvariants(records)).toEqual([]);
    });
  });

  describe('repairBirthDates', () => {
    it('should move inconsistent birth years', () => {
      const first = records.students[0];
      if (first) first.DOB = '2010-03-15';

      expect(repairBirthDates(records)).toEqual(['Student 120000 DOB 2010-03-15 -> 2016-03-15']);
      expect(records.students[0]?.DOB).toBe('2016-03-15');
    });
  });
});

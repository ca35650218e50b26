/**
 * CSV writer - Unit Tests
 */

import { mkdtemp, readdir, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { assembleDistrict } from '../../src/assembler/index.js';
import { districtDirectoryName, toCsv, writeDistrictTables } from '../../src/output/csv.js';
import { generateDistrict } from '../helpers/district.js';

describe('toCsv', () => {
  it('should write a header and one line per row', () => {
    expect(toCsv(['a', 'b'], [{ a: 'x', b: 'y' }, { a: '1', b: '2' }])).toBe('a,b\nx,y\n1,2\n');
  });

  it('should quote commas, quotes and line breaks', () => {
    const csv = toCsv(['name', 'note'], [{ name: 'Lakeside, East', note: 'say "hi"\nthen leave' }]);

    expect(csv).toBe('name,note\n"Lakeside, East","say ""hi""\nthen leave"\n');
  });

  it('should write only the header for empty tables', () => {
    expect(toCsv(['School_id', 'Section_id'], [])).toBe('School_id,Section_id\n');
  });

  it('should follow the column order, not the key order', () => {
    expect(toCsv(['b', 'a'], [{ a: '1', b: '2' }])).toBe('b,a\n2,1\n');
  });
});

describe('districtDirectoryName', () => {
  it('should sanitize district names', () => {
    expect(districtDirectoryName('District 1')).toBe('District_1_Data');
    expect(districtDirectoryName(" St. Mary's  Unified ")).toBe('St_Mary_s_Unified_Data');
    expect(districtDirectoryName('!!!')).toBe('District_Data');
  });
});

describe('writeDistrictTables', () => {
  let root: string;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'roster-synth-csv-'));
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it('should write the six tables into the district directory', async () => {
    const { skeleton, rosters } = await generateDistrict();
    const tables = assembleDistrict(skeleton, rosters);

    const dir = await writeDistrictTables(root, 'District 1', tables);

    expect(dir).toBe(join(root, 'District_1_Data'));
    expect((await readdir(dir)).sort()).toEqual([
      'enrollments.csv',
      'schools.csv',
      'sections.csv',
      'staff.csv',
      'students.csv',
      'teachers.csv'
    ]);

    const schools = (await readFile(join(dir, 'schools.csv'), 'utf8')).split('\n');
    expect(schools[0]).toBe(
      'School_id,School_name,School_number,Low_grade,High_grade,Principal,Principal_email,School_address,School_city,School_state,School_zip,School_phone'
    );
    expect(schools[1]?.startsWith('100000,')).toBe(true);

    const students = (await readFile(join(dir, 'students.csv'), 'utf8')).split('\n');
    expect(students[0]).toBe(
      'School_id,Student_id,Student_number,State_id,Last_name,First_name,Grade,Gender,DOB,Student_email'
    );
    expect(students[1]?.startsWith('100000,120000,145000,170000,')).toBe(true);

    const enrollments = (await readFile(join(dir, 'enrollments.csv'), 'utf8')).trimEnd().split('\n');
    expect(enrollments).toHaveLength(15);
    expect(enrollments[1]).toBe('100000,115000,120000');
  });

  it('should replace a previous run and leave no staging directory', async () => {
    const { skeleton, rosters } = await generateDistrict();
    const tables = assembleDistrict(skeleton, rosters);

    await writeDistrictTables(root, 'District 1', tables);
    await writeDistrictTables(root, 'District 1', { ...tables, students: [], enrollments: [] });

    expect(await readdir(root)).toEqual(['District_1_Data']);
    const students = await readFile(join(root, 'District_1_Data', 'students.csv'), 'utf8');
    expect(students.split('\n')).toEqual([
      'School_id,Student_id,Student_number,State_id,Last_name,First_name,Grade,Gender,DOB,Student_email',
      ''
    ]);
  });
});

/**
 * CSV serialization and per-district file output
 */

import { mkdir, rename, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { type DistrictTables, TABLE_COLUMNS, type TableName } from '../types.js';
import { districtDirectoryName } from '../utils/naming.js';

export { districtDirectoryName };

export const TABLE_NAMES: readonly TableName[] = [
  'schools',
  'teachers',
  'staff',
  'students',
  'sections',
  'enrollments'
];

export const TABLE_FILES: Record<TableName, string> = {
  schools: 'schools.csv',
  teachers: 'teachers.csv',
  staff: 'staff.csv',
  students: 'students.csv',
  sections: 'sections.csv',
  enrollments: 'enrollments.csv'
};

function escapeField(value: unknown): string {
  const text = value === null || value === undefined ? '' : String(value);
  return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

/**
 * Header row plus one line per row, in the given column order.
 */
export function toCsv<T extends object>(columns: readonly (keyof T & string)[], rows: readonly T[]): string {
  const lines = [
    columns.map(escapeField).join(','),
    ...rows.map(row => columns.map(column => escapeField(row[column])).join(','))
  ];
  return `${lines.join('\n')}\n`;
}

export function renderTables(tables: DistrictTables): Record<TableName, string> {
  return {
    schools: toCsv(TABLE_COLUMNS.schools, tables.schools),
    teachers: toCsv(TABLE_COLUMNS.teachers, tables.teachers),
    staff: toCsv(TABLE_COLUMNS.staff, tables.staff),
    students: toCsv(TABLE_COLUMNS.students, tables.students),
    sections: toCsv(TABLE_COLUMNS.sections, tables.sections),
    enrollments: toCsv(TABLE_COLUMNS.enrollments, tables.enrollments)
  };
}

/**
 * Write the six tables into `<rootDir>/<DistrictName>_Data/`. Files go to a
 * staging directory first, which then replaces the target in one rename.
 */
export async function writeDistrictTables(
  rootDir: string,
  districtName: string,
  tables: DistrictTables
): Promise<string> {
  const target = join(rootDir, districtDirectoryName(districtName));
  const staging = `${target}.staging-${process.pid}-${Date.now()}`;
  const contents = renderTables(tables);

  await mkdir(staging, { recursive: true });
  try {
    for (const table of TABLE_NAMES) {
      await writeFile(join(staging, TABLE_FILES[table]), contents[table], 'utf8');
    }
    await rm(target, { recursive: true, force: true });
    await rename(staging, target);
  } catch (error) {
    await rm(staging, { recursive: true, force: true });
    throw error;
  }
  return target;
}

/**
 * Identifier allocation across districts
 *
 * Every district owns a disjoint identifier space: a numeric block in
 * sequential mode, or a unique numeric prefix behind the state code in
 * alphanumeric mode. All issued identifiers are also tracked run-wide so a
 * collision can never be handed out twice.
 */

import { type IdMode, SynthError, ValidationError } from '../types.js';
import { isLazyPattern } from './lazy-patterns.js';

export type IdKind =
  | 'school'
  | 'schoolNumber'
  | 'teacher'
  | 'teacherNumber'
  | 'stateTeacherId'
  | 'staff'
  | 'section'
  | 'student'
  | 'studentNumber'
  | 'stateStudentId';

export const SEQUENTIAL_BLOCK_SIZE = 100_000;

export const SEQUENTIAL_LAYOUT: Record<IdKind, { offset: number; capacity: number }> = {
  school: { offset: 0, capacity: 500 },
  schoolNumber: { offset: 500, capacity: 500 },
  teacher: { offset: 1_000, capacity: 3_000 },
  teacherNumber: { offset: 4_000, capacity: 3_000 },
  stateTeacherId: { offset: 7_000, capacity: 3_000 },
  staff: { offset: 10_000, capacity: 5_000 },
  section: { offset: 15_000, capacity: 5_000 },
  student: { offset: 20_000, capacity: 25_000 },
  studentNumber: { offset: 45_000, capacity: 25_000 },
  stateStudentId: { offset: 70_000, capacity: 25_000 }
};

// Students carry their school number instead of a tag
const ALPHANUMERIC_TAGS: Record<Exclude<IdKind, 'student' | 'schoolNumber'>, string> = {
  school: 'SC',
  teacher: 'T',
  teacherNumber: 'TN',
  stateTeacherId: 'ST',
  staff: 'SF',
  section: 'SE',
  studentNumber: 'SN',
  stateStudentId: 'SS'
};

const FIRST_ALPHANUMERIC_PREFIX = 101;
const LAST_ALPHANUMERIC_PREFIX = 999;

export interface DistrictIdSpace {
  index: number;
  state: string;
  /** Block base in sequential mode, three-digit district prefix in alphanumeric mode */
  prefix: string;
}

export interface AllocationContext {
  schoolNumber?: string;
}

export interface AllocatorOptions {
  mode: IdMode;
  /** Source of randomness in [0, 1); defaults to Math.random */
  random?: () => number;
  maxAttempts?: number;
  suffixLength?: number;
}

export class IdentifierAllocator {
  readonly mode: IdMode;
  private random: () => number;
  private maxAttempts: number;
  private suffixLength: number;
  private spaces = new Map<number, DistrictIdSpace>();
  private counters = new Map<string, number>();
  private issued = new Set<string>();
  private nextPrefix = FIRST_ALPHANUMERIC_PREFIX;

  constructor(options: AllocatorOptions) {
    this.mode = options.mode;
    this.random = options.random ?? Math.random;
    this.maxAttempts = options.maxAttempts ?? 1000;
    this.suffixLength = options.suffixLength ?? 6;
  }

  /**
   * Reserve the identifier space of a district. Registering the same
   * district again with the same state returns the existing space.
   */
  registerDistrict(index: number, state: string): DistrictIdSpace {
    if (!Number.isInteger(index) || index < 0) {
      throw new ValidationError(`District index must be a non-negative integer, got ${index}`);
    }
    const code = state.trim().toUpperCase();
    if (!/^[A-Z]{2}$/.test(code)) {
      throw new ValidationError(`State must be a two-letter code, got "${state}"`);
    }

    const existing = this.spaces.get(index);
    if (existing) {
      if (existing.state !== code) {
        throw new ValidationError(`District ${index} is already registered for ${existing.state}`, {
          existing,
          state: code
        });
      }
      return existing;
    }

    let prefix: string;
    if (this.mode === 'sequential') {
      prefix = String((index + 1) * SEQUENTIAL_BLOCK_SIZE);
    } else {
      while (this.nextPrefix <= LAST_ALPHANUMERIC_PREFIX && isLazyPattern(String(this.nextPrefix))) {
        this.nextPrefix++;
      }
      if (this.nextPrefix > LAST_ALPHANUMERIC_PREFIX) {
        throw new ValidationError('No district prefixes left for alphanumeric IDs');
      }
      prefix = String(this.nextPrefix++);
    }

    const space: DistrictIdSpace = { index, state: code, prefix };
    this.spaces.set(index, space);
    return space;
  }

  space(index: number): DistrictIdSpace {
    const space = this.spaces.get(index);
    if (!space) {
      throw new ValidationError(`District ${index} has no registered ID space`);
    }
    return space;
  }

  next(districtIndex: number, kind: IdKind, context: AllocationContext = {}): string {
    const space = this.space(districtIndex);
    return this.mode === 'sequential'
      ? this.nextSequential(space, kind)
      : this.nextAlphanumeric(space, kind, context);
  }

  take(districtIndex: number, kind: IdKind, count: number, context: AllocationContext = {}): string[] {
    if (!Number.isInteger(count) || count < 0) {
      throw new ValidationError(`Cannot allocate ${count} identifiers`);
    }
    return Array.from({ length: count }, () => this.next(districtIndex, kind, context));
  }

  has(id: string): boolean {
    return this.issued.has(id);
  }

  issuedCount(): number {
    return this.issued.size;
  }

  private nextSequential(space: DistrictIdSpace, kind: IdKind): string {
    const { offset, capacity } = SEQUENTIAL_LAYOUT[kind];
    const key = `${space.index}:${kind}`;
    const used = this.counters.get(key) ?? 0;
    if (used >= capacity) {
      throw new ValidationError(
        `District ${space.index} exhausted its ${kind} range (${capacity} identifiers)`,
        { district: space.index, kind, capacity }
      );
    }
    this.counters.set(key, used + 1);

    const id = String((space.index + 1) * SEQUENTIAL_BLOCK_SIZE + offset + used);
    return this.claim(id, space, kind);
  }

  private nextAlphanumeric(space: DistrictIdSpace, kind: IdKind, context: AllocationContext): string {
    if (kind === 'student' && !context.schoolNumber) {
      throw new ValidationError('Student identifiers need the school number', { district: space.index });
    }

    for (let attempt = 0; attempt < this.maxAttempts; attempt++) {
      const suffix = this.randomDigits(kind === 'schoolNumber' ? 4 : this.suffixLength);

      let id: string;
      if (kind === 'schoolNumber') {
        id = `${space.prefix}${suffix}`;
      } else if (kind === 'student') {
        // The school number already starts with the district prefix
        id = `${space.state}${context.schoolNumber}${suffix}`;
      } else {
        id = `${space.state}${space.prefix}${ALPHANUMERIC_TAGS[kind]}${suffix}`;
      }

      // Checked on the composed digits, prefix included
      if (!isLazyPattern(id) && !this.issued.has(id)) {
        return this.claim(id, space, kind);
      }
    }

    throw new SynthError(
      `Could not allocate a ${kind} identifier for district ${space.index} after ${this.maxAttempts} attempts`,
      'ID_SPACE_EXHAUSTED',
      { district: space.index, kind }
    );
  }

  private claim(id: string, space: DistrictIdSpace, kind: IdKind): string {
    if (this.issued.has(id)) {
      throw new SynthError(`Identifier ${id} was already issued`, 'ID_COLLISION', {
        district: space.index,
        kind
      });
    }
    this.issued.add(id);
    return id;
  }

  private randomDigits(length: number): string {
    let digits = '';
    for (let i = 0; i < length; i++) {
      digits += String(Math.min(9, Math.floor(this.random() * 10)));
    }
    return digits;
  }
}

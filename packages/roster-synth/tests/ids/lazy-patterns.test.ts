/**
 * Lazy pattern blocklist - Unit Tests
 */

import { describe, it, expect } from 'vitest';
import { findLazyPattern, isLazyPattern } from '../../src/ids/lazy-patterns.js';

describe('lazy patterns', () => {
  it('should name the pattern a suffix matches', () => {
    expect(findLazyPattern('111111')).toBe('all-same-digit');
    expect(findLazyPattern('120009')).toBe('repeated-digit-run');
    expect(findLazyPattern('123456')).toBe('ascending-run');
    expect(findLazyPattern('598765')).toBe('descending-run');
    expect(findLazyPattern('121212')).toBe('alternating-pair');
    expect(findLazyPattern('4545')).toBe('alternating-pair');
  });

  it('should accept suffixes without a pattern', () => {
    expect(isLazyPattern('583920')).toBe(false);
    expect(isLazyPattern('4540')).toBe(false);
    expect(isLazyPattern('691704')).toBe(false);
  });

  it('should only look at digits', () => {
    expect(isLazyPattern('TX-5-8-3-9-2-0')).toBe(false);
    expect(findLazyPattern('SC')).toBeUndefined();
  });
});

/**
 * Blocklist of low-entropy digit patterns that alphanumeric IDs must avoid.
 */

export interface LazyPattern {
  name: string;
  test(digits: string): boolean;
}

function hasMonotonicRun(digits: string, step: 1 | -1, length: number): boolean {
  let run = 1;
  for (let i = 1; i < digits.length; i++) {
    run = Number(digits[i]) - Number(digits[i - 1]) === step ? run + 1 : 1;
    if (run >= length) return true;
  }
  return false;
}

export const LAZY_PATTERNS: LazyPattern[] = [
  {
    name: 'all-same-digit',
    test: digits => digits.length > 1 && /^(\d)\1+$/.test(digits)
  },
  {
    name: 'repeated-digit-run',
    test: digits => /(\d)\1\1/.test(digits)
  },
  {
    name: 'ascending-run',
    test: digits => hasMonotonicRun(digits, 1, 4)
  },
  {
    name: 'descending-run',
    test: digits => hasMonotonicRun(digits, -1, 4)
  },
  {
    name: 'alternating-pair',
    test: digits => digits.length >= 4 && /^(\d\d)\1+\d?$/.test(digits)
  }
];

/**
 * Name of the first blocklisted pattern found in the digits of `value`, if any
 */
export function findLazyPattern(value: string): string | undefined {
  const digits = value.replace(/\D/g, '');
  if (digits.length === 0) return undefined;
  return LAZY_PATTERNS.find(pattern => pattern.test(digits))?.name;
}

export function isLazyPattern(value: string): boolean {
  return findLazyPattern(value) !== undefined;
}

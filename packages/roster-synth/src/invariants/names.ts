/**
 * Checks on generated person names and email addresses
 */

const NAME_PATTERN = /^\p{L}[\p{L}'’ .-]*$/u;

const PLACEHOLDER_WORDS = new Set([
  'teacher', 'staff', 'student', 'principal', 'test', 'placeholder', 'name',
  'first', 'last', 'firstname', 'lastname', 'unknown', 'tbd', 'sample', 'example',
  'doe'
]);

/**
 * Letters only, no digits, no placeholder words like "Teacher" or "Doe"
 */
export function isRealName(name: string): boolean {
  const trimmed = name.trim();
  if (!NAME_PATTERN.test(trimmed)) return false;
  return trimmed
    .toLowerCase()
    .split(/[\s.-]+/)
    .filter(Boolean)
    .every(word => !PLACEHOLDER_WORDS.has(word));
}

export function fullName(first: string, last: string): string {
  return `${first.trim()} ${last.trim()}`;
}

export function normalizeEmail(email: string): string {
  return email.trim().toLowerCase();
}

export function hasDomain(email: string, domain: string): boolean {
  const normalized = normalizeEmail(email);
  return /^[^@\s]+@[^@\s]+$/.test(normalized) && normalized.endsWith(`@${domain.toLowerCase()}`);
}

/**
 * Values that occur more than once, compared case-insensitively
 */
export function findDuplicates(values: string[]): string[] {
  const seen = new Set<string>();
  const duplicates = new Set<string>();
  for (const value of values) {
    const key = value.trim().toLowerCase();
    if (seen.has(key)) duplicates.add(key);
    seen.add(key);
  }
  return [...duplicates];
}

import type { CellValue, ClassifierPolicy } from './excel-types';

/** Placeholders the statistical extracts print instead of a number: "-" (nothing) and "X" (suppressed). */
export const DEFAULT_PLACEHOLDERS: readonly string[] = ['-', 'X'];

// Thousands separators seen in extracts: dot, comma, plain, no-break and narrow no-break spaces.
const THOUSANDS_SEPARATORS_REGEX = /[., \u00a0\u202f]/g;

export function isPlaceholder(value: CellValue, placeholders: readonly string[] = DEFAULT_PLACEHOLDERS): boolean {
  return typeof value === 'string' && placeholders.includes(value.trim());
}

/**
 * Decides whether a cell holds data rather than header or note text:
 * any number, a digit string once thousands separators are removed, or a placeholder.
 * An empty string counts only when the policy allows it.
 */
export function isDataLike(value: CellValue, policy: ClassifierPolicy = {}): boolean {
  if (typeof value === 'number') return Number.isFinite(value);
  if (typeof value !== 'string') return false;

  const trimmed = value.trim();
  if (trimmed === '') return policy.allowEmpty ?? false;
  if (isPlaceholder(trimmed, policy.placeholders ?? DEFAULT_PLACEHOLDERS)) return true;

  return /^\d+$/.test(trimmed.replace(THOUSANDS_SEPARATORS_REGEX, ''));
}

/**
 * Utility functions for turning operator-typed text into numbers.
 * Invalid input never raises; it coerces to zero.
 */

const DECIMAL_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/i;
const INTEGER_PATTERN = /^[+-]?\d+$/;

/**
 * Parses a decimal string, returning 0 for empty, malformed or non-finite input
 * Examples: "12.5" -> 12.5, " 3 " -> 3, "1e3" -> 1000, "₱10" -> 0, "" -> 0
 */
export function coerceDecimal(value: string | null | undefined): number {
  if (!value) {
    return 0;
  }

  const trimmed = value.trim();
  if (!DECIMAL_PATTERN.test(trimmed)) {
    return 0;
  }

  const parsed = Number(trimmed);
  // "-0" is stored as "0", so it must read back as 0
  return Number.isFinite(parsed) && parsed !== 0 ? parsed : 0;
}

/**
 * Parses a whole-number string, returning 0 for anything else
 * Examples: "12" -> 12, "-4" -> -4, "007" -> 7, "3.5" -> 0, "abc" -> 0
 */
export function coerceInteger(value: string | null | undefined): number {
  if (!value) {
    return 0;
  }

  const trimmed = value.trim();
  if (!INTEGER_PATTERN.test(trimmed)) {
    return 0;
  }

  const parsed = parseInt(trimmed, 10);
  return Number.isSafeInteger(parsed) && parsed !== 0 ? parsed : 0;
}

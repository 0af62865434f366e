/**
 * Type Guards
 */

export function isString(value: unknown): value is string {
  return typeof value === 'string';
}

export function isNonEmptyString(value: unknown): value is string {
  return isString(value) && value.trim().length > 0;
}

export function isDefined<T>(value: T | undefined | null): value is T {
  return value !== undefined && value !== null;
}

/**
 * True for strings made only of ASCII digits ("007", "24"); rejects
 * signs, decimals and whitespace that parseInt would tolerate.
 */
export function isDigitString(value: string): boolean {
  return /^[0-9]+$/.test(value);
}

/**
 * Type guard for plain objects (not null, not arrays).
 *
 * @param value - The value to check.
 * @returns True if the value is an object with string keys.
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value)
}

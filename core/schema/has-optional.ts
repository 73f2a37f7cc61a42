/**
 * Check that an optional field is either absent or of the given type.
 *
 * @param object - Object holding the field.
 * @param key - Field name.
 * @param type - Expected `typeof` result.
 * @returns True when the field is absent or has that type.
 */
export function hasOptional(
  object: Record<string, unknown>,
  key: string,
  type: 'boolean' | 'string' | 'number',
): boolean {
  let value = object[key]
  return value === undefined || typeof value === type
}

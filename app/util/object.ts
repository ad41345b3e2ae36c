/**
 * Returns true if the value is a plain JSON object (not an array and not null)
 * @param value - The value to check
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Returns true if the value is an array of finite numbers
 * @param value - The value to check
 */
export function isNumberArray(value: unknown): value is number[] {
  return Array.isArray(value) && value.every((v) => typeof v === 'number' && Number.isFinite(v));
}

/**
 * Recursively freezes an object graph so that readers holding a reference can never
 * observe a mutation.
 *
 * @param object - The object to freeze
 * @returns the same object, frozen
 */
export function deepFreeze<T>(object: T): T {
  if (object && typeof object === 'object' && !Object.isFrozen(object)) {
    Object.freeze(object);
    for (const value of Object.values(object)) {
      deepFreeze(value);
    }
  }
  return object;
}

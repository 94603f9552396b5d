/**
 * Plain-object helpers
 */

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (value === null || typeof value !== 'object' || Array.isArray(value)) {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Deep freeze an object so configuration cannot change between resolution cycles
 */
export function deepFreeze<T extends object>(obj: T): Readonly<T> {
  for (const name of Object.getOwnPropertyNames(obj)) {
    const value: unknown = Reflect.get(obj, name);

    // Only freeze plain objects and arrays, skip functions and primitives
    if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
      deepFreeze(value);
    }
  }

  return Object.freeze(obj);
}

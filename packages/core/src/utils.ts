// Value helpers shared by fields, containers and validators

/**
 * Marker for "no value supplied", distinct from null and undefined
 */
export const UNSET: unique symbol = Symbol('unset value');

export type Unset = typeof UNSET;

export function isUnset(value: unknown): value is Unset {
  return value === UNSET;
}

/**
 * Get the JSON type name of a value
 */
export function getType(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  return typeof value;
}

/**
 * Check if a value is a plain object (not array, null, or other)
 */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * JSON-oriented emptiness: empty strings, arrays and objects count as blank
 * alongside null, undefined, false, 0 and NaN.
 */
export function isBlank(value: unknown): boolean {
  if (value === null || value === undefined || value === false || value === '') return true;
  if (typeof value === 'number') return value === 0 || Number.isNaN(value);
  if (Array.isArray(value)) return value.length === 0;
  if (isPlainObject(value)) return Object.keys(value).length === 0;
  return false;
}

/**
 * Replace `{name}` placeholders with values from params.
 * Unknown placeholders are left as they are.
 *
 * @example
 * ```ts
 * interpolate('Field must be at least {min} characters long.', { min: 3 })
 * // => 'Field must be at least 3 characters long.'
 * ```
 */
export function interpolate(template: string, params: Record<string, unknown>): string {
  return template.replace(/\{(\w+)\}/g, (match, key: string) =>
    key in params ? String(params[key]) : match,
  );
}

/**
 * Read a property from an arbitrary object without widening it to a record
 */
export function readProperty(target: object, key: string): unknown {
  return Reflect.get(target, key);
}

/**
 * Own or inherited property check. Members of `Object.prototype`
 * (`constructor`, `toString`, ...) don't count.
 */
export function hasProperty(target: object, key: string): boolean {
  let current: object | null = target;
  while (current !== null && current !== Object.prototype) {
    if (Object.hasOwn(current, key)) return true;
    current = Object.getPrototypeOf(current);
  }
  return false;
}

/**
 * Structural equality for JSON-like values: primitives, arrays and plain objects
 */
export function deepEqual(a: unknown, b: unknown): boolean {
  if (a === b) return true;
  if (a === null || b === null) return false;
  if (typeof a !== typeof b) return false;

  if (Array.isArray(a) && Array.isArray(b)) {
    if (a.length !== b.length) return false;
    return a.every((item, index) => deepEqual(item, b[index]));
  }

  if (isPlainObject(a) && isPlainObject(b)) {
    const keysA = Object.keys(a);
    const keysB = Object.keys(b);
    if (keysA.length !== keysB.length) return false;
    return keysA.every((key) => Object.hasOwn(b, key) && deepEqual(a[key], b[key]));
  }

  return false;
}

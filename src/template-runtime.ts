/**
 * Internal runtime helpers shared by the expression evaluator and the
 * directives.
 */

// never reachable from expressions
const BLOCKED_MEMBERS = new Set([ '__proto__', 'constructor', 'prototype' ]);

/**
 * Read a data property from an object without executing accessors.
 * Own properties win; methods are also found on the prototype chain of
 * non-plain objects (class instances, arrays, dates).
 *
 * @param obj - Object to read from.
 * @param key - Property key.
 * @returns Property value, or undefined.
 */
const tplReadProperty = (obj: object, key: string): unknown => {
  const own = Object.getOwnPropertyDescriptor(obj, key);
  if (own) {
    // Do not execute accessors (getters) during template rendering.
    const value: unknown = ('value' in own) ? own.value : undefined;
    return value;
  }
  let proto: unknown = Object.getPrototypeOf(obj);
  while (proto && proto !== Object.prototype) {
    const desc = Object.getOwnPropertyDescriptor(proto, key);
    if (desc) {
      const value: unknown = desc.value;
      return (typeof value === 'function') ? value : undefined;
    }
    proto = Object.getPrototypeOf(proto);
  }
  return undefined;
};

/**
 * Member access used by `a.b` and `a[b]`.
 *
 * - null/undefined yield undefined instead of throwing
 * - `Map` entries are looked up by key
 * - strings and arrays expose `length`, indexes and their methods
 * - objects expose own data properties and prototype methods
 *
 * @param obj - Value to read from.
 * @param key - Property name or index.
 * @returns Resolved value or undefined.
 */
export const tplResolveMember = (obj: unknown, key: unknown): unknown => {
  if (obj === undefined || obj === null) return undefined;
  if (obj instanceof Map) {
    if (obj.has(key)) {
      const value: unknown = obj.get(key);
      return value;
    }
  }
  const prop = (typeof key === 'number') ? String(key) : key;
  if (typeof prop !== 'string' || BLOCKED_MEMBERS.has(prop)) return undefined;
  if (typeof obj === 'string') {
    if (prop === 'length') return obj.length;
    if (/^\d+$/.test(prop)) return obj[Number(prop)];
    const method: unknown = tplReadProperty(String.prototype, prop);
    return (typeof method === 'function') ? method : undefined;
  }
  if (typeof obj === 'number' || typeof obj === 'boolean') {
    const proto: object = (typeof obj === 'number') ? Number.prototype : Boolean.prototype;
    return tplReadProperty(proto, prop);
  }
  if (typeof obj !== 'object' && typeof obj !== 'function') return undefined;
  if (Array.isArray(obj) && prop === 'length') return obj.length;
  return tplReadProperty(obj, prop);
};

/**
 * Truthiness for control flow:
 * - Arrays: true if non-empty
 * - Maps and Sets: true if non-empty
 * - Plain objects: true if they have at least one own key
 * - Other values: Boolean coercion
 *
 * @param v - Value to test.
 * @returns Truthiness result.
 */
export const tplTruthy = (v: unknown): boolean => {
  if (Array.isArray(v)) return v.length > 0;
  if (v instanceof Map || v instanceof Set) return v.size > 0;
  if (v && typeof v === 'object' && Object.getPrototypeOf(v) === Object.prototype) return Object.keys(v).length > 0;
  return Boolean(v);
};

/**
 * Convert a value to output text; null and undefined become the empty string.
 *
 * @param v - Value to convert.
 */
export const tplStringify = (v: unknown): string => {
  if (typeof v === 'string') return v;
  if (v === undefined || v === null) return '';
  return String(v);
};

/**
 * Whether a value can be iterated by the iteration directive. Strings count.
 *
 * @param v - Value to test.
 */
export const tplIsIterable = (v: unknown): v is Iterable<unknown> => {
  if (typeof v === 'string') return true;
  return typeof v === 'object' && v !== null && Symbol.iterator in v && typeof v[Symbol.iterator] === 'function';
};

/**
 * Items produced by iterating a value:
 * - iterables (arrays, strings, Map, Set, generators) yield their items
 * - plain objects yield `[key, value]` pairs
 *
 * @param v - Value to iterate.
 * @returns Iterable over the items.
 * @throws TypeError when the value cannot be iterated.
 */
export const tplIterate = (v: unknown): Iterable<unknown> => {
  if (tplIsIterable(v)) return v;
  if (v && typeof v === 'object') return Object.entries(v);
  throw new TypeError(`${typeof v} value is not iterable`);
};

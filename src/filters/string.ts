import { tplStringify } from '../template-runtime.js';

/**
 * Built-in `string` filter.
 *
 * Turns a value into plain output text. A `Stream` is serialized through its
 * `toString()`, so `${ page | string }` prints its markup escaped instead of
 * splicing its elements. Null and undefined give the empty string.
 *
 * @param val - Input value.
 */
export function filterString (val: unknown): string {
  return tplStringify(val);
}

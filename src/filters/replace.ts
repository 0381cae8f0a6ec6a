import { tplStringify } from '../template-runtime.js';

/**
 * Built-in `replace` filter: literal, global replacement (no regex).
 *
 * @param val - Input value.
 * @param args - `[from, to]` arguments; an empty `from` leaves the value unchanged.
 * @returns String with occurrences of `from` replaced by `to`.
 */
export function filterReplace (val: unknown, args: unknown[]): string {
  const src = tplStringify(val);
  const from = tplStringify(args[0]);
  if (from === '') return src;
  return src.split(from).join(tplStringify(args[1]));
}

import { Stream } from '../stream.js';
import { tplStringify } from '../template-runtime.js';

/**
 * Values `JSON.stringify` would lose: maps become objects with stringified
 * keys, sets become arrays and streams become their markup text.
 */
const jsonReplacer = (_key: string, v: unknown): unknown => {
  if (v instanceof Map) return Object.fromEntries([ ...v ].map(([ k, x ]): [ string, unknown ] => [ tplStringify(k), x ]));
  if (v instanceof Set) return [ ...v ];
  if (v instanceof Stream) return v.render();
  return v;
};

/**
 * Built-in `json` filter.
 *
 * @param val - Input value.
 * @param args - Optional `[indent]`.
 * @returns JSON text; empty for undefined and functions, which have no JSON form.
 */
export function filterJson (val: unknown, args: unknown[]): string {
  const indent = (typeof args[0] === 'number') ? args[0] : undefined;
  const s: string | undefined = JSON.stringify(val, jsonReplacer, indent);
  return s ?? '';
}

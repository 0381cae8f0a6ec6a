import { tplStringify } from '../template-runtime.js';

/**
 * Built-in `urlencode` filter.
 *
 * A `Map` or plain object becomes a query string (`a=1&b=x+y`), in
 * insertion order. Anything else is percent-encoded as a single URI
 * component.
 *
 * @param val - Input value.
 */
export function filterUrlencode (val: unknown): string {
  let pairs: [ string, string ][] | undefined;
  if (val instanceof Map) {
    pairs = [ ...val ].map(([ k, v ]): [ string, string ] => [ tplStringify(k), tplStringify(v) ]);
  } else if (val && typeof val === 'object' && Object.getPrototypeOf(val) === Object.prototype) {
    pairs = Object.entries(val).map(([ k, v ]): [ string, string ] => [ k, tplStringify(v) ]);
  }
  if (pairs) return new URLSearchParams(pairs).toString();
  return encodeURIComponent(tplStringify(val));
}

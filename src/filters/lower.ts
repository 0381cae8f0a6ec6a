import { Stream } from '../stream.js';
import { tplStringify } from '../template-runtime.js';

/**
 * Built-in `lower` filter. Lowercases the text events of a `Stream` and
 * keeps its elements; other values are lowercased as output text.
 *
 * @param val - Input value.
 */
export function filterLower (val: unknown): Stream | string {
  if (val instanceof Stream) {
    return val.filter(function * (events) {
      for (const ev of events) yield (ev.type === 'text') ? { ...ev, text: ev.text.toLowerCase() } : ev;
    });
  }
  return tplStringify(val).toLowerCase();
}

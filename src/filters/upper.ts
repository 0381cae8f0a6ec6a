import { Stream } from '../stream.js';
import { tplStringify } from '../template-runtime.js';

/**
 * Built-in `upper` filter.
 *
 * A `Stream` (generated output, a template function call, a `select()`
 * result) stays markup: its text events are uppercased, tag and attribute
 * names are left alone. Expressions inside a function body are evaluated
 * after the filter ran and keep their case. Any other value is converted to
 * output text first, so null and undefined give the empty string.
 *
 * @param val - Input value.
 */
export function filterUpper (val: unknown): Stream | string {
  if (val instanceof Stream) {
    return val.filter(function * (events) {
      for (const ev of events) yield (ev.type === 'text') ? { ...ev, text: ev.text.toUpperCase() } : ev;
    });
  }
  return tplStringify(val).toUpperCase();
}

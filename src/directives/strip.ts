import type {
  MarkupEvent,
  StripDirective,
} from '../types.js';

import type {
  Context,
} from '../context.js';

import {
  siteExpression,
  type DirectiveSite,
} from './site.js';

import {
  tplTruthy,
} from '../template-runtime.js';

/**
 * Parse `mw:strip="expr"`. An empty value strips unconditionally.
 *
 * @param value - Condition source, possibly empty.
 * @param site - Directive location.
 */
export const createStripDirective = (value: string, site: DirectiveSite): StripDirective => ({
  kind: 'strip',
  expr: (value.trim() === '') ? null : siteExpression(site, value),
});

/**
 * Drop the first and last event of the element (its tags) when the
 * condition holds.
 *
 * @param d - Directive.
 * @param stream - Element events.
 * @param ctx - Runtime context.
 */
export function * applyStripDirective (d: StripDirective, stream: Iterable<MarkupEvent>, ctx: Context): Generator<MarkupEvent, void, undefined> {
  const strip = (d.expr === null) || tplTruthy(d.expr.evaluate(ctx));
  if (!strip) {
    yield * stream;
    return;
  }
  let first = true;
  let previous: MarkupEvent | undefined;
  for (const ev of stream) {
    if (first) {
      first = false;
      continue;
    }
    if (previous) yield previous;
    previous = ev;
  }
}

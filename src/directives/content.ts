import type {
  ContentDirective,
  MarkupEvent,
} from '../types.js';

import {
  siteExpression,
  type DirectiveSite,
} from './site.js';

/**
 * Parse `mw:content="expr"`.
 *
 * @param value - Expression source.
 * @param site - Directive location.
 */
export const createContentDirective = (value: string, site: DirectiveSite): ContentDirective => ({
  kind: 'content',
  expr: siteExpression(site, value),
});

/**
 * Keep the element's start tag, put the expression result in place of its
 * children, and re-emit the last event (the end tag).
 *
 * @param d - Directive.
 * @param stream - Element events.
 */
export function * applyContentDirective (d: ContentDirective, stream: Iterable<MarkupEvent>): Generator<MarkupEvent, void, undefined> {
  let first = true;
  let last: MarkupEvent | undefined;
  for (const ev of stream) {
    if (first) {
      first = false;
      if (ev.type === 'start') yield ev;
      yield { type: 'expr', expr: d.expr, pos: ev.pos };
    } else {
      last = ev;
    }
  }
  if (last) yield last;
}

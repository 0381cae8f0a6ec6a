import type {
  MarkupEvent,
  ReplaceDirective,
} from '../types.js';

import {
  siteExpression,
  type DirectiveSite,
} from './site.js';

/**
 * Parse `mw:replace="expr"`.
 *
 * @param value - Expression source.
 * @param site - Directive location.
 */
export const createReplaceDirective = (value: string, site: DirectiveSite): ReplaceDirective => ({
  kind: 'replace',
  expr: siteExpression(site, value),
});

/**
 * Replace the whole element, tags included, by the expression result.
 */
export function * applyReplaceDirective (d: ReplaceDirective, stream: Iterable<MarkupEvent>): Generator<MarkupEvent, void, undefined> {
  for (const ev of stream) {
    yield { type: 'expr', expr: d.expr, pos: ev.pos };
    return;
  }
}

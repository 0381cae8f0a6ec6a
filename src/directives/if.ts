import type {
  IfDirective,
  MarkupEvent,
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
 * Parse `mw:if="expr"`.
 *
 * @param value - Condition source.
 * @param site - Directive location.
 */
export const createIfDirective = (value: string, site: DirectiveSite): IfDirective => ({
  kind: 'if',
  expr: siteExpression(site, value),
});

/**
 * Pass the element through when the condition is truthy, drop it otherwise.
 *
 * @param d - Directive.
 * @param stream - Element events.
 * @param ctx - Runtime context.
 */
export function * applyIfDirective (d: IfDirective, stream: Iterable<MarkupEvent>, ctx: Context): Generator<MarkupEvent, void, undefined> {
  if (tplTruthy(d.expr.evaluate(ctx))) yield * stream;
}

import type {
  ForDirective,
  MarkupEvent,
} from '../types.js';

import type {
  Context,
  ContextFrame,
} from '../context.js';

import {
  siteExpression,
  siteSyntaxError,
  type DirectiveSite,
} from './site.js';

import {
  tplIsIterable,
  tplIterate,
} from '../template-runtime.js';

/**
 * Parse `mw:for="a, b in expr"`.
 *
 * @param value - Loop targets and iterable expression.
 * @param site - Directive location.
 * @throws TemplateSyntaxError when the `in` keyword or a target is missing.
 */
export const createForDirective = (value: string, site: DirectiveSite): ForDirective => {
  const idx = value.indexOf(' in ');
  if (idx === -1) {
    throw siteSyntaxError(site, `Invalid "for" directive "${value}": expected "<names> in <expression>"`);
  }
  const targets = value.slice(0, idx).split(',').map((t) => t.trim());
  for (const t of targets) {
    if (!/^[A-Za-z_$][\w$]*$/.test(t)) {
      throw siteSyntaxError(site, `Invalid loop variable "${t}" in "for" directive`);
    }
  }
  return { kind: 'for', targets, expr: siteExpression(site, value.slice(idx + 4).trim()) };
};

/**
 * Loop frame for one item: one target binds the whole item, several targets
 * unpack it positionally.
 */
const forFrame = (targets: readonly string[], item: unknown): ContextFrame => {
  if (targets.length === 1) return { [targets[0]]: item };
  if (!tplIsIterable(item)) {
    throw new TypeError(`Cannot unpack ${item === null ? 'null' : typeof item} value into ${targets.length} names`);
  }
  const parts = [ ...item ];
  const frame: ContextFrame = {};
  targets.forEach((name, i) => {
    frame[name] = parts[i];
  });
  return frame;
};

/**
 * Replay the element once per item. An undefined or null iterable produces
 * nothing at all.
 *
 * @param d - Directive.
 * @param stream - Element events; buffered before the first iteration.
 * @param ctx - Runtime context.
 */
export function * applyForDirective (d: ForDirective, stream: Iterable<MarkupEvent>, ctx: Context): Generator<MarkupEvent, void, undefined> {
  const iterable = d.expr.evaluate(ctx);
  if (iterable === undefined || iterable === null) return;
  const events = [ ...stream ];
  for (const item of tplIterate(iterable)) {
    yield * ctx.scoped(forFrame(d.targets, item), events);
  }
}

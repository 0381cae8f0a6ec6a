import type {
  Directive,
  DirectiveExpander,
  MarkupEvent,
  MatchDirective,
  MatchInvocation,
} from '../types.js';

import type {
  Context,
} from '../context.js';

import type {
  DirectiveSite,
} from './site.js';

import {
  Path,
} from '../path.js';

import {
  Stream,
} from '../stream.js';

import {
  createMatchFilter,
} from '../template-stream-filters.js';

/**
 * Parse `mw:match="path"` and register the runtime filter that looks for
 * elements matching the path.
 *
 * @param value - Path pattern.
 * @param site - Directive location.
 */
export const createMatchDirective = (value: string, site: DirectiveSite): MatchDirective => {
  const directive: MatchDirective = { kind: 'match', path: new Path(value) };
  site.template.filters.push(createMatchFilter(directive));
  return directive;
};

/**
 * Capture the element as replacement body on first use. Produces no output.
 *
 * @param d - Directive.
 * @param stream - Raw element events.
 * @param inner - Directives of the element applied on every replay.
 */
export function * applyMatchDirective (d: MatchDirective, stream: Iterable<MarkupEvent>, inner: readonly Directive[]): Generator<MarkupEvent, void, undefined> {
  if (!d.body) d.body = { events: [ ...stream ], directives: inner };
}

/**
 * Replay the replacement body for one matched element with `select()` bound
 * to a query over that element.
 *
 * @param inv - Matched element and the directive that matched it.
 * @param ctx - Runtime context.
 * @param expand - Applies the body's remaining directives.
 */
export function * applyMatchInvocation (inv: MatchInvocation, ctx: Context, expand: DirectiveExpander): Generator<MarkupEvent, void, undefined> {
  const body = inv.match.body;
  if (!body) return;
  const content = inv.content;
  const select = (path: string): Stream => new Stream(new Path(path).select(content, 'element'));
  yield * ctx.scoped({ select }, expand(body.directives, body.events, ctx));
}

import type {
  DefDirective,
  Directive,
  DirectiveExpander,
  MarkupEvent,
  TplParam,
} from '../types.js';

import type {
  Context,
} from '../context.js';

import {
  siteSyntaxError,
  type DirectiveSite,
} from './site.js';

import {
  parseExpressionSource,
} from '../expression-parser.js';

import {
  Expression,
} from '../expression.js';

import {
  TemplateFunction,
} from '../template-function.js';

/**
 * Parse a function signature: `name` or `name(a, b, c='default')`.
 *
 * @param value - Signature source.
 * @param site - Directive location.
 * @throws TemplateSyntaxError when the value is not a signature.
 */
export const createDefDirective = (value: string, site: DirectiveSite): DefDirective => {
  const source = value.trim();
  const node = parseExpressionSource(source);
  if (node.type === 'name') return { kind: 'def', name: node.name, params: [] };
  if (node.type !== 'call' || node.callee.type !== 'name') {
    throw siteSyntaxError(site, `Invalid function signature "${source}"`);
  }
  const params: TplParam[] = [];
  for (const arg of node.args) {
    if (arg.type !== 'name') throw siteSyntaxError(site, `Invalid parameter in function signature "${source}"`);
    params.push({ name: arg.name });
  }
  const lookup = site.template.config.lookupErrors;
  for (const n of node.named) {
    params.push({ name: n.name, defaultExpr: Expression.fromNode(source, n.value, { lookup }) });
  }
  return { kind: 'def', name: node.callee.name, params };
};

/**
 * Capture the element as function body on first use and bind a template
 * function under its name in the innermost frame. Produces no output.
 *
 * @param d - Directive.
 * @param stream - Raw element events.
 * @param inner - Directives of the element applied on every call.
 * @param ctx - Runtime context.
 * @param expand - Applies `inner` to the body when the function is called.
 */
export function * applyDefDirective (
  d: DefDirective,
  stream: Iterable<MarkupEvent>,
  inner: readonly Directive[],
  ctx: Context,
  expand: DirectiveExpander,
): Generator<MarkupEvent, void, undefined> {
  if (!d.body) d.body = { events: [ ...stream ], directives: inner };
  const body = d.body;
  const params = d.params.map((p) => ({
    name: p.name,
    hasDefault: p.defaultExpr !== undefined,
    defaultValue: p.defaultExpr?.evaluate(ctx),
  }));
  ctx.set(d.name, new TemplateFunction(d.name, params, () => expand(body.directives, body.events, ctx), ctx));
}

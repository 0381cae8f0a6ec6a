import type {
  BuiltinDirective,
  BuiltinDirectiveName,
  Directive,
  MarkupEvent,
  StreamTransform,
} from './types.js';

import type {
  Context,
} from './context.js';

import type {
  DirectiveSite,
} from './directives/site.js';

export type {
  DirectiveSite,
} from './directives/site.js';

import { applyAttrsDirective, createAttrsDirective } from './directives/attrs.js';
import { applyContentDirective, createContentDirective } from './directives/content.js';
import { applyDefDirective, createDefDirective } from './directives/def.js';
import { applyForDirective, createForDirective } from './directives/for.js';
import { applyIfDirective, createIfDirective } from './directives/if.js';
import { applyMatchDirective, applyMatchInvocation, createMatchDirective } from './directives/match.js';
import { applyReplaceDirective, createReplaceDirective } from './directives/replace.js';
import { applyStripDirective, createStripDirective } from './directives/strip.js';

/**
 * Namespace URI of directive attributes. Templates usually bind it to the
 * `mw` prefix: `<html xmlns:mw="urn:markweave:directives">`.
 */
export const DIRECTIVE_NAMESPACE = 'urn:markweave:directives';

/**
 * Definition of a user directive.
 * - order: position in the canonical priority list; built-ins use 10 to 80,
 *   lower runs outermost
 * - create: turns the attribute value into the stream transformation
 */
export interface TemplateDirectiveDefinition {
  order: number;
  create: (value: string, site: DirectiveSite) => StreamTransform;
}

interface BuiltinDirectiveEntry {
  order: number;
  create: (value: string, site: DirectiveSite) => BuiltinDirective;
}

/**
 * Built-in directives in canonical priority order.
 */
const BUILTIN_DIRECTIVES: Readonly<Record<BuiltinDirectiveName, BuiltinDirectiveEntry>> = {
  def: { order: 10, create: createDefDirective },
  match: { order: 20, create: createMatchDirective },
  for: { order: 30, create: createForDirective },
  if: { order: 40, create: createIfDirective },
  replace: { order: 50, create: createReplaceDirective },
  content: { order: 60, create: createContentDirective },
  attrs: { order: 70, create: createAttrsDirective },
  strip: { order: 80, create: createStripDirective },
};

const isBuiltinDirectiveName = (name: string): name is BuiltinDirectiveName =>
  Object.prototype.hasOwnProperty.call(BUILTIN_DIRECTIVES, name);

const customDirectiveRegistry = new Map<string, TemplateDirectiveDefinition>();

/**
 * Register (or override) a user directive.
 *
 * @param name - Local name of the attribute in the directive namespace.
 * @param definition - Priority and factory.
 * @throws TypeError on an invalid name or when the name is a built-in one.
 */
export const registerTemplateDirective = (name: string, definition: TemplateDirectiveDefinition): void => {
  if (!/^[a-z][\w-]*$/.test(name)) {
    throw new TypeError(`Invalid directive name: ${name}`);
  }
  if (isBuiltinDirectiveName(name)) {
    throw new TypeError(`Cannot override built-in directive "${name}"`);
  }
  if (!Number.isFinite(definition.order)) {
    throw new TypeError('Directive order must be a finite number');
  }
  customDirectiveRegistry.set(name, definition);
};

/**
 * Remove a user directive again.
 *
 * @param name - Directive name.
 * @returns Whether a directive was registered under the name.
 */
export const unregisterTemplateDirective = (name: string): boolean => customDirectiveRegistry.delete(name);

/**
 * Whether a directive name is known.
 */
export const isTemplateDirective = (name: string): boolean =>
  isBuiltinDirectiveName(name) || customDirectiveRegistry.has(name);

/**
 * Priority of a parsed directive; lower runs outermost.
 */
export const tplDirectiveOrder = (d: Directive): number => {
  switch (d.kind) {
    case 'custom': return d.order;
    case 'match-invocation': return 0;
    default: return BUILTIN_DIRECTIVES[d.kind].order;
  }
};

/**
 * Build a directive from an attribute of the directive namespace.
 *
 * @param name - Attribute local name.
 * @param value - Attribute value.
 * @param site - Location and owning template.
 * @returns Parsed directive, or null when the name is unknown.
 */
export const tplCreateDirective = (name: string, value: string, site: DirectiveSite): Directive | null => {
  if (isBuiltinDirectiveName(name)) return BUILTIN_DIRECTIVES[name].create(value, site);
  const custom = customDirectiveRegistry.get(name);
  if (!custom) return null;
  return { kind: 'custom', name, order: custom.order, apply: custom.create(value, site) };
};

/**
 * Sort directives into canonical priority order (stable).
 */
export const tplSortDirectives = (directives: readonly Directive[]): Directive[] =>
  [ ...directives ].sort((a, b) => tplDirectiveOrder(a) - tplDirectiveOrder(b));

/**
 * Run one directive over the element stream it is attached to.
 *
 * `def` and `match` keep the raw events and the directives after them for
 * replay; every other directive wraps the result of the directives after it.
 *
 * @param d - Directive.
 * @param inner - Directives that follow `d` in canonical order.
 * @param stream - Events of the element, its start event first.
 * @param ctx - Runtime context.
 * @returns Transformed events.
 */
const applyDirective = (d: Directive, inner: readonly Directive[], stream: Iterable<MarkupEvent>, ctx: Context): Iterable<MarkupEvent> => {
  switch (d.kind) {
    case 'def': return applyDefDirective(d, stream, inner, ctx, applyDirectives);
    case 'match': return applyMatchDirective(d, stream, inner);
    case 'match-invocation': return applyMatchInvocation(d, ctx, applyDirectives);
  }
  const out = applyDirectives(inner, stream, ctx);
  switch (d.kind) {
    case 'for': return applyForDirective(d, out, ctx);
    case 'if': return applyIfDirective(d, out, ctx);
    case 'replace': return applyReplaceDirective(d, out);
    case 'content': return applyContentDirective(d, out);
    case 'attrs': return applyAttrsDirective(d, out, ctx);
    case 'strip': return applyStripDirective(d, out, ctx);
    case 'custom': return d.apply(out, ctx);
  }
};

/**
 * Apply a directive list held by a SUB event. The list is in canonical
 * order: the first directive wraps all others and the last one wraps the
 * raw events.
 *
 * @param directives - Directives in canonical order.
 * @param stream - Element events.
 * @param ctx - Runtime context.
 */
export const applyDirectives = (directives: readonly Directive[], stream: Iterable<MarkupEvent>, ctx: Context): Iterable<MarkupEvent> => {
  if (directives.length === 0) return stream;
  const [ outer, ...inner ] = directives;
  return applyDirective(outer, inner, stream, ctx);
};

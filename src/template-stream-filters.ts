import type {
  Attr,
  AttrValue,
  EndEvent,
  MarkupEvent,
  MatchDirective,
  StartEvent,
  TemplateStreamFilter,
  TextEvent,
} from './types.js';

import type {
  Context,
} from './context.js';

import type {
  Template,
} from './template.js';

import {
  TemplateNotFound,
  TemplateSyntaxError,
  tplTranslateError,
} from './errors.js';

import {
  Stream,
} from './stream.js';

import {
  tplStringify,
} from './template-runtime.js';

/**
 * Namespace URI of include elements.
 */
export const XINCLUDE_NAMESPACE = 'http://www.w3.org/2001/XInclude';

/**
 * Anything that resolves template names, e.g. a `TemplateLoader`.
 */
export interface TemplateSource {
  load (name: string, relativeTo?: string): Template;
}

/**
 * Pull the rest of an element whose start event was just read.
 *
 * @param it - Iterator positioned after the start event.
 * @returns Child events and the matching end event (undefined if the
 *   stream ended first).
 */
const takeSubtree = (it: Iterator<MarkupEvent>): { inner: MarkupEvent[]; end: EndEvent | undefined } => {
  const inner: MarkupEvent[] = [];
  let depth = 1;
  for (let r = it.next(); !r.done; r = it.next()) {
    const ev = r.value;
    if (ev.type === 'start') {
      depth++;
    } else if (ev.type === 'end') {
      depth--;
      if (depth === 0) return { inner, end: ev };
    }
    inner.push(ev);
  }
  return { inner, end: undefined };
};

/*
 * Eval filter
 */

/**
 * Attribute with its expression fragments evaluated, or null when every
 * part of the value evaluated to null or undefined.
 */
const evalAttrValue = (value: AttrValue, ctx: Context): string | null => {
  if (typeof value === 'string') return value;
  const parts: string[] = [];
  for (const frag of value) {
    if (frag.type === 'text') {
      parts.push(frag.text);
      continue;
    }
    const v = frag.expr.evaluate(ctx);
    if (v !== null && v !== undefined) parts.push(tplStringify(v));
  }
  return (parts.length > 0) ? parts.join('') : null;
};

const evalStart = (ev: StartEvent, ctx: Context): StartEvent => {
  if (ev.attrs.every((a) => typeof a.value === 'string')) return ev;
  const attrs: Attr[] = [];
  for (const attr of ev.attrs) {
    const value = evalAttrValue(attr.value, ctx);
    if (value !== null) attrs.push({ name: attr.name, value });
  }
  return { ...ev, attrs };
};

/**
 * Result of an expression event: nothing for null and undefined, text for
 * strings, a directive-less SUB for streams so that they are expanded in
 * turn, and the string form of anything else.
 */
const evalResult = (value: unknown, ev: MarkupEvent): MarkupEvent | null => {
  if (value === null || value === undefined) return null;
  if (typeof value === 'string') return { type: 'text', text: value, pos: ev.pos };
  if (value instanceof Stream) return { type: 'sub', directives: [], stream: value, pos: ev.pos };
  return { type: 'text', text: tplStringify(value), pos: ev.pos };
};

/**
 * Pre-filter evaluating expression events and interpolated attributes.
 * Errors are reported at the position of the event being evaluated.
 */
export const evalFilter: TemplateStreamFilter = function * (stream, ctx, template) {
  for (const ev of stream) {
    try {
      if (ev.type === 'start') {
        yield evalStart(ev, ctx);
      } else if (ev.type === 'expr') {
        const out = evalResult(ev.expr.evaluate(ctx), ev);
        if (out) yield out;
      } else {
        yield ev;
      }
    } catch (err) {
      throw tplTranslateError(err, template.filename, ev.pos);
    }
  }
};

/*
 * Match filter
 */

/**
 * Runtime filter of one match directive. An element whose ancestor chain
 * satisfies the pattern is consumed together with its subtree and replaced
 * by a SUB event that replays the match body. The matched element's own
 * children are expanded first, so nested matches see expanded content.
 *
 * @param match - Directive owning the pattern and the body.
 */
export const createMatchFilter = (match: MatchDirective): TemplateStreamFilter => function * (stream, ctx, template, scope) {
  if (scope.excluded.has(match)) {
    yield * stream;
    return;
  }
  const chain: StartEvent[] = [ ...scope.ancestors ];
  const it = stream[Symbol.iterator]();
  // closing the upstream iterator lets scoped frames below pop on early exit
  try {
    for (let r = it.next(); !r.done; r = it.next()) {
      const ev = r.value;
      if (ev.type === 'start') {
        chain.push(ev);
        if (match.path.matches(chain)) {
          const { inner, end } = takeSubtree(it);
          const expanded = template.transform(inner, ctx, { ancestors: [ ...chain ], excluded: scope.excluded, pos: ev.pos });
          const content: MarkupEvent[] = [ ev, ...expanded ];
          if (end) content.push(end);
          chain.pop();
          yield {
            type: 'sub',
            directives: [ { kind: 'match-invocation', match, content } ],
            stream: [],
            pos: ev.pos,
          };
          continue;
        }
      } else if (ev.type === 'end') {
        chain.pop();
      }
      yield ev;
    }
  } finally {
    it.return?.();
  }
};

/*
 * Whitespace filter
 */

const reTrailingSpace = /[ \t]+(?=\n)/g;
const reLineCollapse = /\n{2,}/g;

/**
 * Post-filter merging adjacent text events, removing spaces and tabs before
 * line breaks and collapsing runs of empty lines.
 */
export const whitespaceFilter: TemplateStreamFilter = function * (stream) {
  let buffered: TextEvent | null = null;
  let text = '';
  const flush = (): TextEvent | null => {
    if (!buffered) return null;
    const out = text.replace(reTrailingSpace, '').replace(reLineCollapse, '\n');
    const ev: TextEvent | null = out ? { type: 'text', text: out, pos: buffered.pos } : null;
    buffered = null;
    text = '';
    return ev;
  };

  for (const ev of stream) {
    if (ev.type === 'text') {
      if (!buffered) buffered = ev;
      text += ev.text;
      continue;
    }
    const pending = flush();
    if (pending) yield pending;
    yield ev;
  }
  const pending = flush();
  if (pending) yield pending;
};

/*
 * Include filter
 */

const isIncludeElement = (ev: MarkupEvent, localName: string): ev is StartEvent =>
  ev.type === 'start' && ev.tag.namespace === XINCLUDE_NAMESPACE && ev.tag.localName === localName;

/**
 * Children of the first `fallback` element among the include's children,
 * or null if there is none.
 */
const includeFallback = (inner: readonly MarkupEvent[]): MarkupEvent[] | null => {
  const it = inner[Symbol.iterator]();
  let depth = 0;
  for (let r = it.next(); !r.done; r = it.next()) {
    const ev = r.value;
    if (depth === 0 && isIncludeElement(ev, 'fallback')) return takeSubtree(it).inner;
    if (ev.type === 'start') depth++;
    else if (ev.type === 'end') depth--;
  }
  return null;
};

/**
 * Pre-filter replacing `<xi:include href="..."/>` elements by the generated
 * output of the referenced template. When the template cannot be found the
 * children of an `<xi:fallback>` element are used instead; without one the
 * lookup error propagates. XInclude namespace declarations are dropped.
 *
 * @param source - Resolves template names.
 */
export const createIncludeFilter = (source: TemplateSource): TemplateStreamFilter => function * (stream, ctx, template) {
  const prefixes = new Set<string>();
  const it = stream[Symbol.iterator]();
  try {
    for (let r = it.next(); !r.done; r = it.next()) {
      const ev = r.value;
      if (ev.type === 'start-ns' && ev.uri === XINCLUDE_NAMESPACE) {
        prefixes.add(ev.prefix);
        continue;
      }
      if (ev.type === 'end-ns' && prefixes.has(ev.prefix)) {
        prefixes.delete(ev.prefix);
        continue;
      }
      if (!isIncludeElement(ev, 'include')) {
        yield ev;
        continue;
      }

      const href = ev.attrs.find((a) => a.name.name === 'href')?.value;
      if (typeof href !== 'string' || href === '') {
        throw new TemplateSyntaxError('Include element without "href" attribute', template.filename, ev.pos[0], ev.pos[1]);
      }
      const { inner } = takeSubtree(it);
      let included: Template;
      try {
        included = source.load(href, template.filename);
      } catch (err) {
        const fallback = (err instanceof TemplateNotFound) ? includeFallback(inner) : null;
        if (fallback === null) throw err;
        template.logger.info('Include not found, using fallback', { href, filename: template.filename });
        yield { type: 'sub', directives: [], stream: fallback, pos: ev.pos };
        continue;
      }
      yield { type: 'sub', directives: [], stream: included.generate(ctx), pos: ev.pos };
    }
  } finally {
    it.return?.();
  }
};

import type {
  Attr,
  AttrFragment,
  AttrValue,
  Directive,
  ExprEvent,
  MarkupEvent,
  Pos,
  QName,
  SourceEvent,
  TextEvent,
} from './types.js';

import type {
  Template,
} from './template.js';

import {
  Expression,
  type ExpressionOptions,
} from './expression.js';

import {
  BadDirectiveError,
  tplTranslateError,
} from './errors.js';

import {
  DIRECTIVE_NAMESPACE,
  tplCreateDirective,
  tplSortDirectives,
} from './template-directives.js';

/**
 * Piece of interpolated text: literal text or expression source.
 */
export type TplTextPart =
  | { type: 'text'; text: string }
  | { type: 'expr'; source: string };

const reShortExpr = /(?<!\$)\$([A-Za-z_]\w*(?:\.[A-Za-z_]\w*)*)/g;

/**
 * End offset (exclusive) of a braced expression whose `{` sits at `open`,
 * or -1 when braces or quotes are not balanced before the end of the text.
 *
 * @param text - Text being scanned.
 * @param open - Offset of the opening brace.
 */
const tplBraceEnd = (text: string, open: number): number => {
  let depth = 0;
  let quote: string | null = null;
  for (let i = open; i < text.length; i++) {
    const ch = text[i];
    if (quote) {
      if (ch === '\\') i++;
      else if (ch === quote) quote = null;
    } else if (ch === '"' || ch === '\'') {
      quote = ch;
    } else if (ch === '{') {
      depth++;
    } else if (ch === '}') {
      depth--;
      if (depth === 0) return i + 1;
    }
  }
  return -1;
};

/**
 * Split text on `${...}` expressions. A `$` written twice before `{`
 * escapes the expression, and an empty `${}` is kept as text.
 *
 * @param text - Source text.
 * @returns Literal and expression parts in order; literal parts are not yet unescaped.
 */
const tplSplitBraced = (text: string): TplTextPart[] => {
  const parts: TplTextPart[] = [];
  let literalStart = 0;
  let i = text.indexOf('${');
  while (i !== -1) {
    if (i > 0 && text[i - 1] === '$') {
      i = text.indexOf('${', i + 2);
      continue;
    }
    const end = tplBraceEnd(text, i + 1);
    if (end === -1) break;
    const source = text.slice(i + 2, end - 1).trim();
    // `${}` stays literal
    if (source === '') {
      i = text.indexOf('${', end);
      continue;
    }
    if (i > literalStart) parts.push({ type: 'text', text: text.slice(literalStart, i) });
    parts.push({ type: 'expr', source });
    literalStart = end;
    i = text.indexOf('${', end);
  }
  if (literalStart < text.length) parts.push({ type: 'text', text: text.slice(literalStart) });
  return parts;
};

/**
 * Split literal text on short `$name.path` expressions.
 */
const tplSplitShort = (text: string): TplTextPart[] => {
  const parts: TplTextPart[] = [];
  let last = 0;
  for (const m of text.matchAll(reShortExpr)) {
    const at = m.index ?? 0;
    if (at > last) parts.push({ type: 'text', text: text.slice(last, at) });
    parts.push({ type: 'expr', source: m[1] });
    last = at + m[0].length;
  }
  if (last < text.length) parts.push({ type: 'text', text: text.slice(last) });
  return parts;
};

/**
 * Split text into literal and expression parts. Braced expressions are
 * found first; the remaining literal text is then scanned for the short
 * form. `$$` in literal text stands for a single `$`.
 *
 * @param text - Source text.
 *
 * @example
 * ```ts
 * tplSplitInterpolation('Hi ${user.name}, $$5 for $item');
 * // [ text 'Hi ', expr 'user.name', text ', $5 for ', expr 'item' ]
 * ```
 */
export const tplSplitInterpolation = (text: string): TplTextPart[] => {
  const parts: TplTextPart[] = [];
  for (const braced of tplSplitBraced(text)) {
    if (braced.type === 'expr') {
      parts.push(braced);
      continue;
    }
    for (const part of tplSplitShort(braced.text)) {
      parts.push((part.type === 'text') ? { type: 'text', text: part.text.replaceAll('$$', '$') } : part);
    }
  }
  return parts;
};

/**
 * Interpolate a text event. Every resulting event carries the position of
 * the original text.
 *
 * @param text - Text content.
 * @param pos - Position of the text event.
 * @param options - Expression options.
 */
export const tplInterpolate = (text: string, pos: Pos, options: ExpressionOptions = {}): (TextEvent | ExprEvent)[] =>
  tplSplitInterpolation(text).map((part) => (part.type === 'text')
    ? { type: 'text', text: part.text, pos }
    : { type: 'expr', expr: new Expression(part.source, options), pos });

/**
 * Interpolate an attribute value. Values without expressions stay plain
 * strings.
 *
 * @param value - Attribute value.
 * @param options - Expression options.
 */
export const tplInterpolateAttr = (value: string, options: ExpressionOptions = {}): AttrValue => {
  const parts = tplSplitInterpolation(value);
  if (parts.every((p) => p.type === 'text')) return parts.map((p) => (p.type === 'text') ? p.text : '').join('');
  return parts.map((p): AttrFragment => (p.type === 'text')
    ? { type: 'text', text: p.text }
    : { type: 'expr', expr: new Expression(p.source, options) });
};

const tplAttrText = (value: AttrValue): string =>
  (typeof value === 'string') ? value : value.map((f) => (f.type === 'text') ? f.text : '').join('');

interface TplPendingScope {
  tag: QName;
  directives: Directive[];
  /** Output offset of the element's start event. */
  offset: number;
}

/**
 * Compile parsed markup into the template's event list.
 *
 * - the directive namespace declaration is removed
 * - directive attributes are turned into directives; the element then
 *   becomes one SUB event holding the directives and its events
 * - text and attribute values are interpolated
 *
 * @param source - Events from the markup parser.
 * @param template - Template being compiled; receives filters registered by directives.
 * @returns Compiled events.
 * @throws BadDirectiveError for unknown names in the directive namespace.
 * @throws TemplateSyntaxError for malformed directive values.
 */
export const tplCompile = (source: Iterable<SourceEvent>, template: Template): MarkupEvent[] => {
  const stream: MarkupEvent[] = [];
  const pending = new Map<number, TplPendingScope>();
  // prefix -> number of open declarations binding it to the directive namespace
  const directivePrefixes = new Map<string, number>();
  const options: ExpressionOptions = { lookup: template.config.lookupErrors };
  let depth = 0;

  for (const ev of source) {
    switch (ev.type) {
      case 'start-ns':
        if (ev.uri === DIRECTIVE_NAMESPACE) {
          directivePrefixes.set(ev.prefix, (directivePrefixes.get(ev.prefix) ?? 0) + 1);
        } else {
          stream.push(ev);
        }
        break;

      case 'end-ns': {
        const open = directivePrefixes.get(ev.prefix);
        if (open === undefined) {
          stream.push(ev);
        } else if (open > 1) {
          directivePrefixes.set(ev.prefix, open - 1);
        } else {
          directivePrefixes.delete(ev.prefix);
        }
        break;
      }

      case 'start': {
        const directives: Directive[] = [];
        const attrs: Attr[] = [];
        for (const attr of ev.attrs) {
          if (attr.name.namespace === DIRECTIVE_NAMESPACE) {
            let directive: Directive | null;
            try {
              directive = tplCreateDirective(attr.name.localName, tplAttrText(attr.value), { template, pos: ev.pos });
            } catch (err) {
              throw tplTranslateError(err, template.filename, ev.pos);
            }
            if (!directive) throw new BadDirectiveError(attr.name.localName, template.filename, ev.pos[0]);
            directives.push(directive);
          } else {
            const value = (typeof attr.value === 'string') ? tplInterpolateAttr(attr.value, options) : attr.value;
            attrs.push({ name: attr.name, value });
          }
        }
        if (directives.length > 0) {
          pending.set(depth, { tag: ev.tag, directives: tplSortDirectives(directives), offset: stream.length });
        }
        stream.push({ ...ev, attrs });
        depth++;
        break;
      }

      case 'end': {
        depth--;
        stream.push(ev);
        const scope = pending.get(depth);
        if (scope && scope.tag.name === ev.tag.name) {
          pending.delete(depth);
          const substream = stream.splice(scope.offset);
          stream.push({ type: 'sub', directives: scope.directives, stream: substream, pos: substream[0].pos });
        }
        break;
      }

      case 'text':
        stream.push(...tplInterpolate(ev.text, ev.pos, options));
        break;

      default:
        stream.push(ev);
    }
  }

  return stream;
};

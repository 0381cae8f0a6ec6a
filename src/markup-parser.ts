import type {
  Pos,
  QName,
  SourceEvent,
  StartEvent,
} from './types.js';

import {
  MarkupParseError,
} from './errors.js';

import {
  unescapeMarkup,
} from './html-utils.js';

const XML_NS = 'http://www.w3.org/XML/1998/namespace';

// Name characters, `:` included so that QNames lex as one token.
const reNameStart = /[A-Za-z_:\u00C0-\u00D6\u00D8-\u00F6\u00F8-\u02FF\u0370-\u037D\u037F-\u1FFF\u200C\u200D\u2070-\u218F\u2C00-\u2FEF\u3001-\uD7FF\uF900-\uFDCF\uFDF0-\uFFFD]/;
const reName = /^[A-Za-z_:\u00C0-\u00D6\u00D8-\u00F6\u00F8-\u02FF\u0370-\u037D\u037F-\u1FFF\u200C\u200D\u2070-\u218F\u2C00-\u2FEF\u3001-\uD7FF\uF900-\uFDCF\uFDF0-\uFFFD][\w.\-:\u00B7\u00C0-\u00D6\u00D8-\u00F6\u00F8-\u037D\u037F-\u1FFF\u200C\u200D\u203F\u2040\u2070-\u218F\u2C00-\u2FEF\u3001-\uD7FF\uF900-\uFDCF\uFDF0-\uFFFD]*/;

interface OpenElement {
  tag: QName;
  /** Prefixes declared on this element, in declaration order. */
  declared: string[];
}

/**
 * Single-pass XML tokenizer producing position-tagged events.
 */
class MarkupReader {
  private readonly src: string;
  private readonly filename: string;
  private readonly lineStarts: number[] = [ 0 ];
  private pos = 0;
  private readonly open: OpenElement[] = [];

  /**
   * Namespace scope stack. Each layer maps prefix to URI; `''` is the
   * default namespace.
   */
  private readonly nsStack: Map<string, string>[] = [ new Map([ [ 'xml', XML_NS ] ]) ];

  constructor (src: string, filename: string) {
    this.src = src;
    this.filename = filename;
    for (let i = 0; i < src.length; i++) {
      if (src.charCodeAt(i) === 0x0a) this.lineStarts.push(i + 1);
    }
  }

  * events (): Generator<SourceEvent, void, undefined> {
    // BOM
    if (this.src.charCodeAt(0) === 0xfeff) this.pos = 1;

    while (this.pos < this.src.length) {
      const at = this.position(this.pos);
      if (this.startsWith('<!--')) {
        const end = this.indexOrFail('-->', this.pos + 4, 'Unterminated comment');
        yield { type: 'comment', text: this.src.slice(this.pos + 4, end), pos: at };
        this.pos = end + 3;
      } else if (this.startsWith('<![CDATA[')) {
        const end = this.indexOrFail(']]>', this.pos + 9, 'Unterminated CDATA section');
        yield { type: 'text', text: this.src.slice(this.pos + 9, end), pos: at };
        this.pos = end + 3;
      } else if (this.startsWith('<?')) {
        const end = this.indexOrFail('?>', this.pos + 2, 'Unterminated processing instruction');
        const body = this.src.slice(this.pos + 2, end);
        const m = /^(\S+)\s*([\s\S]*)$/.exec(body);
        if (!m) this.fail('Processing instruction without target', this.pos);
        yield { type: 'pi', target: m[1], data: m[2].trimEnd(), pos: at };
        this.pos = end + 2;
      } else if (/^<!DOCTYPE/i.test(this.src.slice(this.pos, this.pos + 9))) {
        yield this.readDoctype(at);
      } else if (this.startsWith('</')) {
        yield * this.readEndTag(at);
      } else if (this.src[this.pos] === '<' && reNameStart.test(this.src[this.pos + 1] ?? '')) {
        yield * this.readStartTag(at);
      } else {
        // text runs up to the next markup character
        let end = this.src.indexOf('<', this.pos + 1);
        if (end === -1) end = this.src.length;
        yield { type: 'text', text: unescapeMarkup(this.src.slice(this.pos, end)), pos: at };
        this.pos = end;
      }
    }

    const unclosed = this.open.pop();
    if (unclosed) this.fail(`Unclosed element <${unclosed.tag.name}>`, this.src.length);
  }

  private * readStartTag (at: Pos): Generator<SourceEvent, void, undefined> {
    this.pos++;
    const rawName = this.readName();
    const rawAttrs: { name: string; value: string }[] = [];
    const nsDecls = new Map<string, string>();

    while (true) {
      const hadSpace = this.skipWhitespace();
      if (this.startsWith('/>') || this.src[this.pos] === '>') break;
      if (this.pos >= this.src.length) this.fail(`Unterminated start tag <${rawName}>`, this.pos);
      if (!hadSpace) this.fail(`Expected whitespace before attribute in <${rawName}>`, this.pos);
      const name = this.readName();
      this.skipWhitespace();
      if (this.src[this.pos] !== '=') this.fail(`Attribute "${name}" without value`, this.pos);
      this.pos++;
      this.skipWhitespace();
      const quote = this.src[this.pos];
      if (quote !== '"' && quote !== '\'') this.fail(`Unquoted value for attribute "${name}"`, this.pos);
      const end = this.indexOrFail(quote, this.pos + 1, `Unterminated value for attribute "${name}"`);
      const value = unescapeMarkup(this.src.slice(this.pos + 1, end));
      this.pos = end + 1;

      if (name === 'xmlns') {
        nsDecls.set('', value);
      } else if (name.startsWith('xmlns:')) {
        nsDecls.set(name.slice(6), value);
      } else {
        rawAttrs.push({ name, value });
      }
    }

    const selfClosing = this.startsWith('/>');
    this.pos += selfClosing ? 2 : 1;

    for (const [ prefix, uri ] of nsDecls) {
      yield { type: 'start-ns', prefix, uri, pos: at };
    }
    this.nsStack.push(nsDecls);

    const tag = this.qname(rawName, true);
    const start: StartEvent = {
      type: 'start',
      tag,
      attrs: rawAttrs.map((a) => ({ name: this.qname(a.name, false), value: a.value })),
      pos: at,
    };
    yield start;

    const element: OpenElement = { tag, declared: [ ...nsDecls.keys() ] };
    if (selfClosing) {
      yield * this.closeElement(element, at);
    } else {
      this.open.push(element);
    }
  }

  private * readEndTag (at: Pos): Generator<SourceEvent, void, undefined> {
    this.pos += 2;
    const name = this.readName();
    this.skipWhitespace();
    if (this.src[this.pos] !== '>') this.fail(`Malformed end tag </${name}>`, this.pos);
    this.pos++;

    const element = this.open.pop();
    if (!element) this.fail(`Unexpected end tag </${name}>`, this.offsetOf(at));
    if (element.tag.name !== name) {
      this.fail(`Mismatched end tag </${name}>, expected </${element.tag.name}>`, this.offsetOf(at));
    }
    yield * this.closeElement(element, at);
  }

  private * closeElement (element: OpenElement, at: Pos): Generator<SourceEvent, void, undefined> {
    yield { type: 'end', tag: element.tag, pos: at };
    this.nsStack.pop();
    for (const prefix of [ ...element.declared ].reverse()) {
      yield { type: 'end-ns', prefix, pos: at };
    }
  }

  private readDoctype (at: Pos): SourceEvent {
    this.pos += 9;
    this.skipWhitespace();
    const name = this.readName();
    this.skipWhitespace();
    let publicId: string | null = null;
    let systemId: string | null = null;
    const kw = this.src.slice(this.pos, this.pos + 6).toUpperCase();
    if (kw === 'PUBLIC') {
      this.pos += 6;
      this.skipWhitespace();
      publicId = this.readQuoted();
      this.skipWhitespace();
      if (this.src[this.pos] === '"' || this.src[this.pos] === '\'') systemId = this.readQuoted();
    } else if (kw === 'SYSTEM') {
      this.pos += 6;
      this.skipWhitespace();
      systemId = this.readQuoted();
    }
    this.skipWhitespace();
    // the internal subset is skipped, not interpreted
    if (this.src[this.pos] === '[') {
      this.pos = this.indexOrFail(']', this.pos, 'Unterminated DOCTYPE internal subset') + 1;
      this.skipWhitespace();
    }
    if (this.src[this.pos] !== '>') this.fail('Malformed DOCTYPE', this.pos);
    this.pos++;
    return { type: 'doctype', name, publicId, systemId, pos: at };
  }

  /**
   * Resolve a raw name against the namespace scopes.
   *
   * @param raw - Name as written.
   * @param isElement - Elements take the default namespace, attributes do not.
   */
  private qname (raw: string, isElement: boolean): QName {
    const colon = raw.indexOf(':');
    const prefix = (colon > 0) ? raw.slice(0, colon) : null;
    const localName = (colon > 0) ? raw.slice(colon + 1) : raw;
    let namespace: string | null = null;
    if (prefix !== null || isElement) {
      const key = prefix ?? '';
      for (let i = this.nsStack.length - 1; i >= 0; i--) {
        const uri = this.nsStack[i].get(key);
        if (uri !== undefined) {
          namespace = (uri === '') ? null : uri;
          break;
        }
      }
    }
    return { name: raw, localName, prefix, namespace };
  }

  private readName (): string {
    const m = reName.exec(this.src.slice(this.pos, this.pos + 256));
    if (!m) this.fail('Expected a name', this.pos);
    this.pos += m[0].length;
    return m[0];
  }

  private readQuoted (): string {
    const quote = this.src[this.pos];
    if (quote !== '"' && quote !== '\'') this.fail('Expected a quoted literal', this.pos);
    const end = this.indexOrFail(quote, this.pos + 1, 'Unterminated literal');
    const value = this.src.slice(this.pos + 1, end);
    this.pos = end + 1;
    return value;
  }

  /** Skip whitespace; returns whether any was skipped. */
  private skipWhitespace (): boolean {
    const start = this.pos;
    while (this.pos < this.src.length && /\s/.test(this.src[this.pos])) this.pos++;
    return this.pos > start;
  }

  private startsWith (s: string): boolean {
    return this.src.startsWith(s, this.pos);
  }

  private indexOrFail (needle: string, from: number, message: string): number {
    const idx = this.src.indexOf(needle, from);
    if (idx === -1) this.fail(message, this.pos);
    return idx;
  }

  private position (offset: number): Pos {
    let lo = 0;
    let hi = this.lineStarts.length - 1;
    while (lo < hi) {
      const mid = (lo + hi + 1) >> 1;
      if (this.lineStarts[mid] <= offset) lo = mid;
      else hi = mid - 1;
    }
    return [ lo + 1, offset - this.lineStarts[lo] + 1 ];
  }

  private offsetOf (pos: Pos): number {
    return this.lineStarts[pos[0] - 1] + pos[1] - 1;
  }

  private fail (message: string, offset: number): never {
    const [ line, column ] = this.position(offset);
    throw new MarkupParseError(message, this.filename, line, column);
  }
}

/**
 * Tokenize markup source into a lazy stream of events.
 *
 * Namespace declarations are reported as `start-ns` events before the start
 * event of the declaring element and as `end-ns` events after its end event;
 * they do not appear among the element's attributes. A self-closing tag
 * produces a start event immediately followed by an end event.
 *
 * @param source - Markup source text.
 * @param filename - Name used in error messages.
 * @returns Generator over the parsed events.
 * @throws MarkupParseError on malformed markup, when the offending event is pulled.
 */
export function * parseMarkup (source: string, filename = '<string>'): Generator<SourceEvent, void, undefined> {
  yield * new MarkupReader(source, filename).events();
}

import type {
  AttrValue,
  MarkupEvent,
  StartEvent,
  StartNsEvent,
} from './types.js';

import {
  TemplateError,
} from './errors.js';

import {
  escapeMarkup,
} from './html-utils.js';

/**
 * Plain attribute text. Values that still hold expression fragments were not
 * run through the eval filter and cannot be written.
 *
 * @param value - Attribute value.
 * @param name - Attribute name, for the error message.
 */
const serializerAttrText = (value: AttrValue, name: string): string => {
  if (typeof value === 'string') return value;
  throw new TemplateError(`Attribute "${name}" still contains unevaluated expressions`);
};

const serializerStartTag = (ev: StartEvent, nsDecls: readonly StartNsEvent[]): string => {
  let out = `<${ev.tag.name}`;
  for (const ns of nsDecls) {
    const attrName = ns.prefix ? `xmlns:${ns.prefix}` : 'xmlns';
    out += ` ${attrName}="${escapeMarkup(ns.uri)}"`;
  }
  for (const attr of ev.attrs) {
    out += ` ${attr.name.name}="${escapeMarkup(serializerAttrText(attr.value, attr.name.name))}"`;
  }
  return out;
};

/**
 * Serialize a fully evaluated event stream to XML text, one chunk at a time.
 *
 * - namespace declarations are written as `xmlns` attributes on the next
 *   start tag
 * - a start event directly followed by its end event becomes `<x/>`
 * - text is escaped for `&`, `<` and `>`; attribute values for `"` as well
 *
 * @param stream - Events to write. Must not contain `expr` or `sub` events.
 * @returns Generator over output chunks.
 * @throws TemplateError on events that have not been evaluated.
 */
export function * serializeMarkup (stream: Iterable<MarkupEvent>): Generator<string, void, undefined> {
  let pendingNs: StartNsEvent[] = [];
  let openTag: StartEvent | null = null;

  for (const ev of stream) {
    if (openTag) {
      if (ev.type === 'end') {
        yield '/>';
        openTag = null;
        continue;
      }
      yield '>';
      openTag = null;
    }

    switch (ev.type) {
      case 'start-ns':
        pendingNs.push(ev);
        break;
      case 'end-ns':
        break;
      case 'start':
        yield serializerStartTag(ev, pendingNs);
        pendingNs = [];
        openTag = ev;
        break;
      case 'end':
        yield `</${ev.tag.name}>`;
        break;
      case 'text':
        yield escapeMarkup(ev.text, false);
        break;
      case 'comment':
        yield `<!--${ev.text}-->`;
        break;
      case 'pi':
        yield ev.data ? `<?${ev.target} ${ev.data}?>` : `<?${ev.target}?>`;
        break;
      case 'doctype': {
        let out = `<!DOCTYPE ${ev.name}`;
        if (ev.publicId !== null) {
          out += ` PUBLIC "${ev.publicId}"`;
          if (ev.systemId !== null) out += ` "${ev.systemId}"`;
        } else if (ev.systemId !== null) {
          out += ` SYSTEM "${ev.systemId}"`;
        }
        yield `${out}>`;
        break;
      }
      case 'expr':
      case 'sub':
        throw new TemplateError(`Cannot serialize unevaluated "${ev.type}" event`);
    }
  }

  if (openTag) yield '>';
}

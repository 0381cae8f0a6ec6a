import type {
  Attr,
  AttrsDirective,
  MarkupEvent,
  StartEvent,
} from '../types.js';

import type {
  Context,
} from '../context.js';

import {
  siteExpression,
  type DirectiveSite,
} from './site.js';

import {
  tplIsIterable,
  tplStringify,
  tplTruthy,
} from '../template-runtime.js';

/**
 * Parse `mw:attrs="expr"`.
 *
 * @param value - Expression source.
 * @param site - Directive location.
 */
export const createAttrsDirective = (value: string, site: DirectiveSite): AttrsDirective => ({
  kind: 'attrs',
  expr: siteExpression(site, value),
});

/**
 * Name/value pairs of an attribute mapping: a `Map`, a list of pairs or a
 * plain object.
 *
 * @param value - Evaluated directive value.
 * @throws TypeError for list items that are not pairs.
 */
const attrsEntries = (value: unknown): [ string, unknown ][] => {
  if (value instanceof Map) {
    return [ ...value ].map(([ k, v ]: [ unknown, unknown ]): [ string, unknown ] => [ tplStringify(k), v ]);
  }
  if (Array.isArray(value)) {
    return value.map((pair: unknown): [ string, unknown ] => {
      if (!Array.isArray(pair) || pair.length !== 2) {
        throw new TypeError('Attribute list items must be [name, value] pairs');
      }
      const [ k, v ]: unknown[] = pair;
      return [ tplStringify(k), v ];
    });
  }
  if (value && typeof value === 'object' && !tplIsIterable(value)) {
    return Object.entries(value);
  }
  throw new TypeError(`Cannot merge attributes from ${typeof value} value`);
};

/**
 * Start event with the mapping merged into its attributes. A null or
 * undefined value removes the attribute; other values are stringified and
 * trimmed, replacing an existing attribute in place or appending a new one.
 *
 * @param ev - Start event.
 * @param value - Evaluated directive value.
 */
const attrsMerge = (ev: StartEvent, value: unknown): StartEvent => {
  const attrs: Attr[] = [ ...ev.attrs ];
  for (const [ name, v ] of attrsEntries(value)) {
    const idx = attrs.findIndex((a) => a.name.name === name);
    if (v === null || v === undefined) {
      if (idx >= 0) attrs.splice(idx, 1);
      continue;
    }
    const text = tplStringify(v).trim();
    if (idx >= 0) {
      attrs[idx] = { name: attrs[idx].name, value: text };
    } else {
      const colon = name.indexOf(':');
      attrs.push({
        name: {
          name,
          localName: (colon > 0) ? name.slice(colon + 1) : name,
          prefix: (colon > 0) ? name.slice(0, colon) : null,
          namespace: null,
        },
        value: text,
      });
    }
  }
  return { ...ev, attrs };
};

/**
 * Merge the evaluated mapping into the attributes of the element's start
 * tag. A falsy value leaves the element untouched.
 *
 * @param d - Directive.
 * @param stream - Element events.
 * @param ctx - Runtime context.
 */
export function * applyAttrsDirective (d: AttrsDirective, stream: Iterable<MarkupEvent>, ctx: Context): Generator<MarkupEvent, void, undefined> {
  let first = true;
  for (const ev of stream) {
    if (first && ev.type === 'start') {
      const value = d.expr.evaluate(ctx);
      yield tplTruthy(value) ? attrsMerge(ev, value) : ev;
    } else {
      yield ev;
    }
    first = false;
  }
}

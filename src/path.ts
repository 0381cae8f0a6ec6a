import type {
  MarkupEvent,
  StartEvent,
  TextEvent,
} from './types.js';

import {
  ExpressionSyntaxError,
} from './errors.js';

type PathAxis = 'child' | 'descendant';

type PathNodeTest =
  | { type: 'name'; name: string }
  | { type: 'any-element' }
  | { type: 'text' }
  | { type: 'node' };

interface PathPredicate {
  attr: string;
  /** Required value, or null for a presence test. */
  value: string | null;
}

interface PathStep {
  axis: PathAxis;
  test: PathNodeTest;
  predicates: PathPredicate[];
}

/** Node as seen by the step matcher: an element, or a text node. */
type PathNode = StartEvent | TextEvent;

/**
 * How `select()` positions the context node:
 * - `root`: a virtual document root above the first element of the stream
 * - `element`: the first element of the stream itself
 */
export type PathSelectMode = 'root' | 'element';

const reStepName = /^[A-Za-z_][\w.\-]*(?::[A-Za-z_][\w.\-]*)?/;

/**
 * Small path language over markup event streams.
 *
 * Supported: child (`a/b`) and descendant (`a//b`, `//b`) steps, an absolute
 * leading `/`, a leading `./`, the node tests `name`, `prefix:name`, `*`,
 * `text()` and `node()`, a final attribute step `@name` or `@*`, and the
 * predicates `[@attr]`, `[@attr="v"]` and `[@attr='v']`.
 *
 * @example
 * ```ts
 * new Path('div/greeting').matches(ancestorChain);
 * new Path('@name').select(events, 'element');
 * ```
 */
export class Path {
  readonly source: string;
  readonly absolute: boolean;
  private readonly steps: PathStep[];
  /** Trailing `@name` step, `*` for every attribute. */
  private readonly attribute: string | null;

  constructor (source: string) {
    this.source = source;
    const src = source.trim();
    const steps: PathStep[] = [];
    let attribute: string | null = null;
    let i = 0;

    function fail (message: string): never {
      throw new ExpressionSyntaxError(message, source, i);
    }

    if (src.startsWith('.//')) i = 1;
    else if (src.startsWith('./')) i = 2;
    else if (src === '.') i = 1;
    this.absolute = (i === 0 && src.startsWith('/'));

    while (i < src.length) {
      let axis: PathAxis = 'child';
      if (src.startsWith('//', i)) {
        axis = 'descendant';
        i += 2;
      } else if (src[i] === '/') {
        i++;
      } else if (steps.length > 0 || attribute !== null) {
        fail('Expected "/"');
      }
      if (i >= src.length) fail('Expected a step');
      if (attribute !== null) fail('Attribute step must be last');

      if (src[i] === '@') {
        i++;
        if (src[i] === '*') {
          attribute = '*';
          i++;
        } else {
          const m = reStepName.exec(src.slice(i));
          if (!m) fail('Expected attribute name');
          attribute = m[0];
          i += m[0].length;
        }
        // `a//@x` reads as "attributes of any descendant"
        if (axis === 'descendant') steps.push({ axis, test: { type: 'any-element' }, predicates: [] });
        continue;
      }

      let test: PathNodeTest;
      if (src.startsWith('text()', i)) {
        test = { type: 'text' };
        i += 6;
      } else if (src.startsWith('node()', i)) {
        test = { type: 'node' };
        i += 6;
      } else if (src[i] === '*') {
        test = { type: 'any-element' };
        i++;
      } else {
        const m = reStepName.exec(src.slice(i));
        if (!m) fail('Expected a node test');
        test = { type: 'name', name: m[0] };
        i += m[0].length;
      }

      const predicates: PathPredicate[] = [];
      while (src[i] === '[') {
        const m = /^\[\s*@([A-Za-z_][\w.\-:]*)\s*(?:=\s*(?:"([^"]*)"|'([^']*)'))?\s*\]/.exec(src.slice(i));
        if (!m) fail('Malformed predicate');
        predicates.push({ attr: m[1], value: m[2] ?? m[3] ?? null });
        i += m[0].length;
      }
      steps.push({ axis, test, predicates });
    }

    this.steps = steps;
    this.attribute = attribute;
  }

  /**
   * Pattern test used by structural matching: whether the last element of
   * the ancestor chain is selected by this path. Relative paths match at
   * any depth; absolute paths are anchored at the first chain entry.
   *
   * @param chain - Open elements from the outermost down to the candidate.
   */
  matches (chain: readonly StartEvent[]): boolean {
    if (this.attribute !== null) return false;
    return this.matchNodes(chain, this.absolute);
  }

  /**
   * Select the parts of a stream addressed by this path.
   *
   * Matched elements produce their complete subtree, matched text nodes
   * themselves and attribute steps one text event per attribute value.
   *
   * @param stream - Events to select from. Consumed once.
   * @param mode - Where the context node sits.
   * @returns Generator over the selected events.
   */
  * select (stream: Iterable<MarkupEvent>, mode: PathSelectMode = 'root'): Generator<MarkupEvent, void, undefined> {
    const base = (mode === 'element') ? 1 : 0;
    const open: StartEvent[] = [];
    let captureDepth = -1;

    for (const ev of stream) {
      if (captureDepth >= 0) {
        yield ev;
        if (ev.type === 'start') {
          open.push(ev);
        } else if (ev.type === 'end') {
          open.pop();
          if (open.length === captureDepth) captureDepth = -1;
        }
        continue;
      }

      if (ev.type === 'start') {
        open.push(ev);
        const rel = open.slice(base);
        if (this.attribute !== null) {
          // `@x` on its own addresses the context element
          const addressed = (this.steps.length === 0)
            ? (mode === 'element' && open.length === 1)
            : (rel.length > 0 && this.matchNodes(rel, true));
          if (addressed) yield * this.attributeEvents(ev);
        } else if (rel.length > 0 && this.matchNodes(rel, true)) {
          yield ev;
          captureDepth = open.length - 1;
        }
      } else if (ev.type === 'end') {
        open.pop();
      } else if (ev.type === 'text' && this.attribute === null) {
        if (this.matchNodes([ ...open.slice(base), ev ], true)) yield ev;
      }
    }
  }

  toString (): string {
    return this.source;
  }

  private * attributeEvents (ev: StartEvent): Generator<TextEvent, void, undefined> {
    for (const attr of ev.attrs) {
      if (typeof attr.value !== 'string') continue;
      if (this.attribute === '*' || this.attribute === attr.name.name) {
        yield { type: 'text', text: attr.value, pos: ev.pos };
      }
    }
  }

  /**
   * Match the steps against a node chain, last step against the last node.
   *
   * @param nodes - Chain of nodes, outermost first.
   * @param anchored - Whether the first step must match the first node
   *   (child axis) rather than any node.
   */
  private matchNodes (nodes: readonly PathNode[], anchored: boolean): boolean {
    const steps = this.steps;
    if (steps.length === 0 || nodes.length === 0) return false;

    const matchAt = (s: number, k: number): boolean => {
      const step = steps[s];
      if (!pathTestNode(step, nodes[k])) return false;
      if (s === 0) return !anchored || step.axis === 'descendant' || k === 0;
      if (step.axis === 'child') return k > 0 && matchAt(s - 1, k - 1);
      for (let j = k - 1; j >= 0; j--) {
        if (matchAt(s - 1, j)) return true;
      }
      return false;
    };

    return matchAt(steps.length - 1, nodes.length - 1);
  }
}

const pathTestNode = (step: PathStep, node: PathNode): boolean => {
  if (node.type === 'text') {
    return step.test.type === 'text' || step.test.type === 'node';
  }
  switch (step.test.type) {
    case 'text':
      return false;
    case 'name':
      if (node.tag.name !== step.test.name) return false;
      break;
    case 'any-element':
    case 'node':
      break;
  }
  return step.predicates.every((pred) => {
    const attr = node.attrs.find((a) => a.name.name === pred.attr);
    if (!attr) return false;
    return pred.value === null || attr.value === pred.value;
  });
};

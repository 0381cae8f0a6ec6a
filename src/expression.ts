import type {
  Context,
} from './context.js';

import {
  parseExpressionSource,
  type ExprNode,
} from './expression-parser.js';

import {
  applyTemplateFilter,
} from './template-filters.js';

import {
  tplIterate,
  tplResolveMember,
  tplStringify,
  tplTruthy,
} from './template-runtime.js';

import {
  TemplateFunction,
} from './template-function.js';

/**
 * How names that no frame defines are treated: `lenient` resolves them to
 * undefined, `strict` raises a ReferenceError.
 */
export type LookupMode = 'lenient' | 'strict';

export interface ExpressionOptions {
  lookup?: LookupMode;
}

/**
 * Functions callable by name when the context does not define the name.
 */
const BUILTINS: Readonly<Record<string, (ctx: Context, args: unknown[]) => unknown>> = {
  len: (_ctx, [ v ]) => {
    if (typeof v === 'string' || Array.isArray(v)) return v.length;
    if (v instanceof Map || v instanceof Set) return v.size;
    if (v && typeof v === 'object') return Object.keys(v).length;
    throw new TypeError(`len() of unsized ${typeof v} value`);
  },
  range: (_ctx, args) => {
    const nums = args.map(exprToNumber);
    const [ start, stop, step ] = (nums.length === 1) ? [ 0, nums[0], 1 ] : [ nums[0], nums[1], nums[2] ?? 1 ];
    if (!step) throw new RangeError('range() step must not be zero');
    const out: number[] = [];
    for (let i = start; step > 0 ? i < stop : i > stop; i += step) out.push(i);
    return out;
  },
  enumerate: (_ctx, [ v, start ]) => {
    let i = (start === undefined) ? 0 : exprToNumber(start);
    const out: [ number, unknown ][] = [];
    for (const item of tplIterate(v)) out.push([ i++, item ]);
    return out;
  },
  defined: (ctx, [ name ]) => typeof name === 'string' && ctx.has(name),
  str: (_ctx, [ v ]) => tplStringify(v),
  int: (_ctx, [ v ]) => Math.trunc(exprToNumber(v)),
  float: (_ctx, [ v ]) => exprToNumber(v),
};

const exprToNumber = (v: unknown): number => (typeof v === 'number') ? v : Number(v);

const exprCompare = (op: '<' | '<=' | '>' | '>=', a: unknown, b: unknown): boolean => {
  if (typeof a === 'string' && typeof b === 'string') {
    switch (op) {
      case '<': return a < b;
      case '<=': return a <= b;
      case '>': return a > b;
      case '>=': return a >= b;
    }
  }
  const x = exprToNumber(a);
  const y = exprToNumber(b);
  switch (op) {
    case '<': return x < y;
    case '<=': return x <= y;
    case '>': return x > y;
    case '>=': return x >= y;
  }
};

const exprContains = (container: unknown, item: unknown): boolean => {
  if (typeof container === 'string') return typeof item === 'string' && container.includes(item);
  if (Array.isArray(container)) return container.includes(item);
  if (container instanceof Map || container instanceof Set) return container.has(item);
  if (container && typeof container === 'object') {
    return typeof item === 'string' && Object.prototype.hasOwnProperty.call(container, item);
  }
  throw new TypeError(`Cannot test membership in ${container === null ? 'null' : typeof container} value`);
};

/**
 * Compiled expression of the template expression language.
 *
 * Compilation happens on first evaluation; the resulting syntax tree is
 * cached on the instance.
 *
 * @example
 * ```ts
 * new Expression('user.name | upper').evaluate(new Context({ user: { name: 'ada' } }));
 * // 'ADA'
 * ```
 */
export class Expression {
  readonly source: string;
  private readonly lookup: LookupMode;
  private ast: ExprNode | null = null;

  constructor (source: string, options: ExpressionOptions = {}) {
    this.source = source;
    this.lookup = options.lookup ?? 'lenient';
  }

  /**
   * Wrap an already parsed node, e.g. a default value taken from a
   * function signature.
   */
  static fromNode (source: string, node: ExprNode, options: ExpressionOptions = {}): Expression {
    const expr = new Expression(source, options);
    expr.ast = node;
    return expr;
  }

  /**
   * Parse the source if that has not happened yet.
   *
   * @throws ExpressionSyntaxError on malformed source.
   */
  compile (): ExprNode {
    if (this.ast === null) this.ast = parseExpressionSource(this.source);
    return this.ast;
  }

  /**
   * Evaluate the expression against a context.
   *
   * @param ctx - Variable scopes.
   * @returns Expression value.
   */
  evaluate (ctx: Context): unknown {
    return this.evalNode(this.compile(), ctx);
  }

  toString (): string {
    return this.source;
  }

  private evalNode (node: ExprNode, ctx: Context): unknown {
    switch (node.type) {
      case 'literal':
        return node.value;
      case 'name':
        return this.lookupName(node.name, ctx);
      case 'member':
        return tplResolveMember(this.evalNode(node.object, ctx), node.property);
      case 'index':
        return tplResolveMember(this.evalNode(node.object, ctx), this.evalNode(node.index, ctx));
      case 'call':
        return this.evalCall(node, ctx);
      case 'unary': {
        const v = this.evalNode(node.operand, ctx);
        if (node.op === '!') return !tplTruthy(v);
        return (node.op === '-') ? -exprToNumber(v) : exprToNumber(v);
      }
      case 'binary':
        return this.evalBinary(node.op, this.evalNode(node.left, ctx), this.evalNode(node.right, ctx));
      case 'logical': {
        const left = this.evalNode(node.left, ctx);
        if (node.op === '??') return left ?? this.evalNode(node.right, ctx);
        if (node.op === '&&') return tplTruthy(left) ? this.evalNode(node.right, ctx) : left;
        return tplTruthy(left) ? left : this.evalNode(node.right, ctx);
      }
      case 'conditional':
        return tplTruthy(this.evalNode(node.test, ctx))
          ? this.evalNode(node.consequent, ctx)
          : this.evalNode(node.alternate, ctx);
      case 'array':
        return node.items.map((item) => this.evalNode(item, ctx));
      case 'object':
        return Object.fromEntries(node.entries.map((e) => [ e.key, this.evalNode(e.value, ctx) ]));
      case 'pipe':
        return applyTemplateFilter(
          node.filter,
          this.evalNode(node.value, ctx),
          node.args.map((a) => this.evalNode(a, ctx)),
        );
    }
  }

  private lookupName (name: string, ctx: Context): unknown {
    if (ctx.has(name)) return ctx.get(name);
    if (this.lookup === 'strict') throw new ReferenceError(`"${name}" is not defined`);
    return undefined;
  }

  private evalCall (node: Extract<ExprNode, { type: 'call' }>, ctx: Context): unknown {
    const args = node.args.map((a) => this.evalNode(a, ctx));
    const named: Record<string, unknown> = {};
    for (const n of node.named) named[n.name] = this.evalNode(n.value, ctx);

    if (node.callee.type === 'name' && !ctx.has(node.callee.name) &&
        Object.prototype.hasOwnProperty.call(BUILTINS, node.callee.name)) {
      return BUILTINS[node.callee.name](ctx, args);
    }

    let thisArg: unknown;
    let callee: unknown;
    if (node.callee.type === 'member' || node.callee.type === 'index') {
      thisArg = this.evalNode(node.callee.object, ctx);
      const key = (node.callee.type === 'member') ? node.callee.property : this.evalNode(node.callee.index, ctx);
      callee = tplResolveMember(thisArg, key);
    } else {
      callee = this.evalNode(node.callee, ctx);
    }

    if (callee instanceof TemplateFunction) return callee.call(args, named);
    if (typeof callee !== 'function') {
      const what = (node.callee.type === 'name') ? `"${node.callee.name}"` : 'Value';
      throw new TypeError(`${what} is not callable`);
    }
    if (node.named.length > 0) args.push(named);
    const result: unknown = Reflect.apply(callee, thisArg, args);
    return result;
  }

  private evalBinary (op: Extract<ExprNode, { type: 'binary' }>['op'], a: unknown, b: unknown): unknown {
    switch (op) {
      case '+':
        if (typeof a === 'number' && typeof b === 'number') return a + b;
        if (Array.isArray(a) && Array.isArray(b)) return [ ...a, ...b ];
        return tplStringify(a) + tplStringify(b);
      case '-': return exprToNumber(a) - exprToNumber(b);
      case '*': return exprToNumber(a) * exprToNumber(b);
      case '/': return exprToNumber(a) / exprToNumber(b);
      case '%': return exprToNumber(a) % exprToNumber(b);
      case '==': return a === b;
      case '!=': return a !== b;
      case '<':
      case '<=':
      case '>':
      case '>=':
        return exprCompare(op, a, b);
      case 'in': return exprContains(b, a);
      case 'not in': return !exprContains(b, a);
    }
  }
}

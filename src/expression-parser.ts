import { ExpressionSyntaxError } from './errors.js';

/**
 * AST of the expression language.
 *
 * Every node records the 0-based offset of its first token in the source so
 * that errors can point at the offending part of the expression.
 */
export type ExprNode =
  | { type: 'literal'; value: unknown; offset: number }
  | { type: 'name'; name: string; offset: number }
  | { type: 'member'; object: ExprNode; property: string; offset: number }
  | { type: 'index'; object: ExprNode; index: ExprNode; offset: number }
  | { type: 'call'; callee: ExprNode; args: ExprNode[]; named: ExprNamedArg[]; offset: number }
  | { type: 'unary'; op: ExprUnaryOp; operand: ExprNode; offset: number }
  | { type: 'binary'; op: ExprBinaryOp; left: ExprNode; right: ExprNode; offset: number }
  | { type: 'logical'; op: '&&' | '||' | '??'; left: ExprNode; right: ExprNode; offset: number }
  | { type: 'conditional'; test: ExprNode; consequent: ExprNode; alternate: ExprNode; offset: number }
  | { type: 'array'; items: ExprNode[]; offset: number }
  | { type: 'object'; entries: { key: string; value: ExprNode }[]; offset: number }
  | { type: 'pipe'; value: ExprNode; filter: string; args: ExprNode[]; offset: number };

export interface ExprNamedArg {
  name: string;
  value: ExprNode;
}

export type ExprUnaryOp = '!' | '-' | '+';

export type ExprBinaryOp = '+' | '-' | '*' | '/' | '%' | '==' | '!=' | '<' | '<=' | '>' | '>=' | 'in' | 'not in';

type Tok =
  | { t: 'num'; v: number; at: number }
  | { t: 'str'; v: string; at: number }
  | { t: 'ident'; v: string; at: number }
  | { t: 'punct'; v: string; at: number }
  | { t: 'eof'; at: number };

// longest first
const PUNCTUATORS = [
  '===', '!==',
  '==', '!=', '<=', '>=', '&&', '||', '??',
  '(', ')', '[', ']', '{', '}', ',', '.', ':', '?', '!', '<', '>', '+', '-', '*', '/', '%', '|', '=',
];

const KEYWORD_LITERALS: Record<string, unknown> = {
  true: true,
  false: false,
  null: null,
  none: null,
  undefined,
};

/**
 * Split an expression source into tokens.
 *
 * @param src - Expression source.
 * @returns Token list terminated by an `eof` token.
 */
const tokenize = (src: string): Tok[] => {
  const tokens: Tok[] = [];
  let i = 0;
  while (i < src.length) {
    const ch = src[i];
    if (/\s/.test(ch)) {
      i++;
      continue;
    }
    // quoted string literal
    if (ch === '"' || ch === '\'') {
      const start = i;
      i++;
      let inner = '';
      let closed = false;
      while (i < src.length) {
        const c = src[i];
        if (c === '\\' && i + 1 < src.length) {
          const nx = src[i + 1];
          inner += (nx === 'n') ? '\n' : (nx === 't') ? '\t' : (nx === 'r') ? '\r' : nx;
          i += 2;
          continue;
        }
        if (c === ch) {
          closed = true;
          i++;
          break;
        }
        inner += c;
        i++;
      }
      if (!closed) throw new ExpressionSyntaxError('Unterminated string literal', src, start);
      tokens.push({ t: 'str', v: inner, at: start });
      continue;
    }
    const rem = src.slice(i);
    const mNum = /^(?:\d+(?:\.\d+)?(?:[eE][+-]?\d+)?|\.\d+)/.exec(rem);
    if (mNum) {
      tokens.push({ t: 'num', v: Number(mNum[0]), at: i });
      i += mNum[0].length;
      continue;
    }
    const mIdent = /^[A-Za-z_$][\w$]*/.exec(rem);
    if (mIdent) {
      tokens.push({ t: 'ident', v: mIdent[0], at: i });
      i += mIdent[0].length;
      continue;
    }
    const punct = PUNCTUATORS.find((p) => rem.startsWith(p));
    if (!punct) throw new ExpressionSyntaxError(`Unexpected character "${ch}"`, src, i);
    tokens.push({ t: 'punct', v: punct, at: i });
    i += punct.length;
  }
  tokens.push({ t: 'eof', at: src.length });
  return tokens;
};

/**
 * Parse an expression source into an AST.
 *
 * Precedence, lowest first: pipe `|`, conditional `?:`, `??`, `||`/`or`,
 * `&&`/`and`, `!`/`not`, comparison (`==`, `!=`, `<`, `<=`, `>`, `>=`, `in`,
 * `not in`), additive, multiplicative, unary sign, postfix (member, index,
 * call).
 *
 * @param src - Expression source.
 * @returns Parsed AST.
 * @throws ExpressionSyntaxError on malformed input.
 */
export const parseExpressionSource = (src: string): ExprNode => {
  const tokens = tokenize(src);
  let p = 0;

  const peek = (ahead = 0): Tok => tokens[Math.min(p + ahead, tokens.length - 1)];
  const eat = (): Tok => {
    const t = peek();
    if (t.t !== 'eof') p++;
    return t;
  };
  function fail (message: string, t: Tok = peek()): never {
    throw new ExpressionSyntaxError(message, src, t.at);
  }
  const isPunct = (v: string, t: Tok = peek()): boolean => t.t === 'punct' && t.v === v;
  const isWord = (v: string, t: Tok = peek()): boolean => t.t === 'ident' && t.v === v;
  const expect = (v: string): Tok => {
    if (!isPunct(v)) fail(`Expected "${v}"`);
    return eat();
  };
  const describe = (t: Tok): string => (t.t === 'eof') ? 'end of expression' : `"${String(t.v)}"`;

  /** Comma separated list up to the closing punctuator; supports `name=value` entries when allowed. */
  const parseArgs = (close: string, allowNamed: boolean): { args: ExprNode[]; named: ExprNamedArg[] } => {
    const args: ExprNode[] = [];
    const named: ExprNamedArg[] = [];
    while (!isPunct(close)) {
      const t = peek();
      if (allowNamed && t.t === 'ident' && isPunct('=', peek(1))) {
        eat();
        eat();
        named.push({ name: t.v, value: parsePipe() });
      } else {
        if (named.length > 0) fail('Positional argument follows named argument');
        args.push(parsePipe());
      }
      if (!isPunct(',')) break;
      eat();
    }
    expect(close);
    return { args, named };
  };

  const parsePrimary = (): ExprNode => {
    const t = eat();
    if (t.t === 'num' || t.t === 'str') return { type: 'literal', value: t.v, offset: t.at };
    if (t.t === 'ident') {
      const lower = t.v.toLowerCase();
      if (Object.prototype.hasOwnProperty.call(KEYWORD_LITERALS, lower)) {
        return { type: 'literal', value: KEYWORD_LITERALS[lower], offset: t.at };
      }
      return { type: 'name', name: t.v, offset: t.at };
    }
    if (t.t === 'punct') {
      if (t.v === '(') {
        const inner = parsePipe();
        expect(')');
        return inner;
      }
      if (t.v === '[') {
        return { type: 'array', items: parseArgs(']', false).args, offset: t.at };
      }
      if (t.v === '{') {
        const entries: { key: string; value: ExprNode }[] = [];
        while (!isPunct('}')) {
          const k = eat();
          if (k.t !== 'ident' && k.t !== 'str' && k.t !== 'num') fail('Expected object key', k);
          const key = String(k.v);
          expect(':');
          entries.push({ key, value: parsePipe() });
          if (!isPunct(',')) break;
          eat();
        }
        expect('}');
        return { type: 'object', entries, offset: t.at };
      }
    }
    return fail(`Unexpected ${describe(t)}`, t);
  };

  const parsePostfix = (): ExprNode => {
    let node = parsePrimary();
    while (true) {
      const t = peek();
      if (isPunct('.', t)) {
        eat();
        const name = eat();
        if (name.t !== 'ident') fail('Expected property name after "."', name);
        node = { type: 'member', object: node, property: name.v, offset: t.at };
      } else if (isPunct('[', t)) {
        eat();
        const index = parsePipe();
        expect(']');
        node = { type: 'index', object: node, index, offset: t.at };
      } else if (isPunct('(', t)) {
        eat();
        const { args, named } = parseArgs(')', true);
        node = { type: 'call', callee: node, args, named, offset: t.at };
      } else {
        return node;
      }
    }
  };

  const parseUnary = (): ExprNode => {
    const t = peek();
    if (isPunct('-', t) || isPunct('+', t)) {
      eat();
      return { type: 'unary', op: (t.t === 'punct' && t.v === '-') ? '-' : '+', operand: parseUnary(), offset: t.at };
    }
    return parsePostfix();
  };

  const parseMultiplicative = (): ExprNode => {
    let left = parseUnary();
    while (isPunct('*') || isPunct('/') || isPunct('%')) {
      const t = eat();
      const op = (t.t === 'punct' && t.v === '*') ? '*' : (t.t === 'punct' && t.v === '/') ? '/' : '%';
      left = { type: 'binary', op, left, right: parseUnary(), offset: t.at };
    }
    return left;
  };

  const parseAdditive = (): ExprNode => {
    let left = parseMultiplicative();
    while (isPunct('+') || isPunct('-')) {
      const t = eat();
      left = { type: 'binary', op: (t.t === 'punct' && t.v === '+') ? '+' : '-', left, right: parseMultiplicative(), offset: t.at };
    }
    return left;
  };

  const COMPARISONS: Record<string, ExprBinaryOp> = {
    '==': '==', '===': '==', '!=': '!=', '!==': '!=', '<': '<', '<=': '<=', '>': '>', '>=': '>=',
  };

  const parseComparison = (): ExprNode => {
    let left = parseAdditive();
    while (true) {
      const t = peek();
      if (t.t === 'punct' && Object.prototype.hasOwnProperty.call(COMPARISONS, t.v)) {
        eat();
        left = { type: 'binary', op: COMPARISONS[t.v], left, right: parseAdditive(), offset: t.at };
      } else if (isWord('in', t)) {
        eat();
        left = { type: 'binary', op: 'in', left, right: parseAdditive(), offset: t.at };
      } else if (isWord('not', t) && isWord('in', peek(1))) {
        eat();
        eat();
        left = { type: 'binary', op: 'not in', left, right: parseAdditive(), offset: t.at };
      } else {
        return left;
      }
    }
  };

  const parseNot = (): ExprNode => {
    const t = peek();
    if (isPunct('!', t) || (isWord('not', t) && !isWord('in', peek(1)))) {
      eat();
      return { type: 'unary', op: '!', operand: parseNot(), offset: t.at };
    }
    return parseComparison();
  };

  const parseAnd = (): ExprNode => {
    let left = parseNot();
    while (isPunct('&&') || isWord('and')) {
      const t = eat();
      left = { type: 'logical', op: '&&', left, right: parseNot(), offset: t.at };
    }
    return left;
  };

  const parseOr = (): ExprNode => {
    let left = parseAnd();
    while (isPunct('||') || isWord('or')) {
      const t = eat();
      left = { type: 'logical', op: '||', left, right: parseAnd(), offset: t.at };
    }
    return left;
  };

  const parseNullish = (): ExprNode => {
    let left = parseOr();
    while (isPunct('??')) {
      const t = eat();
      left = { type: 'logical', op: '??', left, right: parseOr(), offset: t.at };
    }
    return left;
  };

  const parseConditional = (): ExprNode => {
    const test = parseNullish();
    const t = peek();
    if (!isPunct('?', t)) return test;
    eat();
    const consequent = parseConditional();
    expect(':');
    const alternate = parseConditional();
    return { type: 'conditional', test, consequent, alternate, offset: t.at };
  };

  const parsePipe = (): ExprNode => {
    let value = parseConditional();
    while (isPunct('|')) {
      const bar = eat();
      const name = eat();
      if (name.t !== 'ident') fail('Expected filter name after "|"', name);
      let args: ExprNode[] = [];
      if (isPunct('(')) {
        eat();
        args = parseArgs(')', false).args;
      }
      value = { type: 'pipe', value, filter: name.v, args, offset: bar.at };
    }
    return value;
  };

  if (peek().t === 'eof') fail('Empty expression');
  const ast = parsePipe();
  const rest = peek();
  if (rest.t !== 'eof') fail(`Unexpected ${describe(rest)}`, rest);
  return ast;
};

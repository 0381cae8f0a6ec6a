import type { Context } from './context.js';
import type { Expression } from './expression.js';
import type { Path } from './path.js';
import type { Template } from './template.js';

/**
 * Source position of an event: 1-based line and column of the construct
 * in the template source. Positions are copied, never recomputed.
 */
export type Pos = readonly [ line: number, column: number ];

/**
 * Qualified name of an element or attribute.
 * - name: the name as written in the source, including any prefix
 * - localName: the part after the colon
 * - namespace: resolved namespace URI, or null
 */
export interface QName {
  readonly name: string;
  readonly localName: string;
  readonly prefix: string | null;
  readonly namespace: string | null;
}

/**
 * One piece of an interpolated attribute value: literal text or an expression.
 */
export type AttrFragment =
  | { readonly type: 'text'; readonly text: string }
  | { readonly type: 'expr'; readonly expr: Expression };

/**
 * Attribute value: a plain string, or a list of fragments while the value
 * still contains expressions that have not been evaluated.
 */
export type AttrValue = string | readonly AttrFragment[];

export interface Attr {
  readonly name: QName;
  readonly value: AttrValue;
}

export type Attrs = readonly Attr[];

export interface StartEvent {
  readonly type: 'start';
  readonly tag: QName;
  readonly attrs: Attrs;
  readonly pos: Pos;
}

export interface EndEvent {
  readonly type: 'end';
  readonly tag: QName;
  readonly pos: Pos;
}

export interface TextEvent {
  readonly type: 'text';
  readonly text: string;
  readonly pos: Pos;
}

export interface StartNsEvent {
  readonly type: 'start-ns';
  readonly prefix: string;
  readonly uri: string;
  readonly pos: Pos;
}

export interface EndNsEvent {
  readonly type: 'end-ns';
  readonly prefix: string;
  readonly pos: Pos;
}

export interface CommentEvent {
  readonly type: 'comment';
  readonly text: string;
  readonly pos: Pos;
}

export interface PiEvent {
  readonly type: 'pi';
  readonly target: string;
  readonly data: string;
  readonly pos: Pos;
}

export interface DoctypeEvent {
  readonly type: 'doctype';
  readonly name: string;
  readonly publicId: string | null;
  readonly systemId: string | null;
  readonly pos: Pos;
}

/**
 * Expression placeholder produced by interpolation and by the
 * content/replace directives. Evaluated by the eval pre-filter.
 */
export interface ExprEvent {
  readonly type: 'expr';
  readonly expr: Expression;
  readonly pos: Pos;
}

/**
 * Directive scope: the events of one element subtree together with the
 * directives that must be applied to them, in canonical priority order.
 */
export interface SubEvent {
  readonly type: 'sub';
  readonly directives: readonly Directive[];
  readonly stream: Iterable<MarkupEvent>;
  readonly pos: Pos;
}

/** Events produced by the markup parser. */
export type SourceEvent =
  | StartEvent
  | EndEvent
  | TextEvent
  | StartNsEvent
  | EndNsEvent
  | CommentEvent
  | PiEvent
  | DoctypeEvent;

/** Union of all events flowing through the engine. */
export type MarkupEvent = SourceEvent | ExprEvent | SubEvent;

/**
 * Transformation of an event stream. Directives and stream filters are
 * both expressed in these terms.
 */
export type StreamTransform = (stream: Iterable<MarkupEvent>, ctx: Context) => Iterable<MarkupEvent>;

/**
 * Where in the output a transform pass runs.
 */
export interface TransformScope {
  /** Open elements enclosing the events of this pass, outermost first. */
  readonly ancestors: readonly StartEvent[];
  /** Matches whose own replacement output this pass expands. */
  readonly excluded: ReadonlySet<MatchDirective>;
  /** Position reported for errors raised before the first event. */
  readonly pos: Pos | undefined;
}

/**
 * Stream filter installed on a template (pre-filters, runtime filters,
 * post-filters). Receives the template it runs for.
 */
export type TemplateStreamFilter = (
  stream: Iterable<MarkupEvent>,
  ctx: Context,
  template: Template,
  scope: TransformScope,
) => Iterable<MarkupEvent>;

/*
 * Directives
 */

/**
 * Parsed formal parameter of a template function.
 */
export interface TplParam {
  name: string;
  /** Default value expression; evaluated when the function is defined. */
  defaultExpr?: Expression;
}

/**
 * Element subtree kept by `def` and `match`, together with the directives of
 * the same element that come after them in canonical order. Those run each
 * time the body is replayed.
 */
export interface CapturedBody {
  readonly events: readonly MarkupEvent[];
  readonly directives: readonly Directive[];
}

/**
 * Applies a directive list to element events.
 */
export type DirectiveExpander = (directives: readonly Directive[], stream: Iterable<MarkupEvent>, ctx: Context) => Iterable<MarkupEvent>;

export interface DefDirective {
  readonly kind: 'def';
  readonly name: string;
  readonly params: readonly TplParam[];
  /** Function body, filled on first application. */
  body?: CapturedBody;
}

export interface MatchDirective {
  readonly kind: 'match';
  readonly path: Path;
  /** Replacement body, filled on first application. */
  body?: CapturedBody;
}

export interface ForDirective {
  readonly kind: 'for';
  readonly targets: readonly string[];
  readonly expr: Expression;
}

export interface IfDirective {
  readonly kind: 'if';
  readonly expr: Expression;
}

export interface ReplaceDirective {
  readonly kind: 'replace';
  readonly expr: Expression;
}

export interface ContentDirective {
  readonly kind: 'content';
  readonly expr: Expression;
}

export interface AttrsDirective {
  readonly kind: 'attrs';
  readonly expr: Expression;
}

export interface StripDirective {
  readonly kind: 'strip';
  /** Null when the attribute value was empty, meaning "always strip". */
  readonly expr: Expression | null;
}

/**
 * Directive contributed through `registerTemplateDirective()`.
 */
export interface CustomDirective {
  readonly kind: 'custom';
  readonly name: string;
  readonly order: number;
  readonly apply: StreamTransform;
}

/**
 * Anonymous directive produced by a structural match at runtime: replays the
 * match body for one matched subtree.
 */
export interface MatchInvocation {
  readonly kind: 'match-invocation';
  readonly match: MatchDirective;
  readonly content: readonly MarkupEvent[];
}

export type BuiltinDirective =
  | DefDirective
  | MatchDirective
  | ForDirective
  | IfDirective
  | ReplaceDirective
  | ContentDirective
  | AttrsDirective
  | StripDirective;

export type Directive = BuiltinDirective | CustomDirective | MatchInvocation;

export type BuiltinDirectiveName = BuiltinDirective['kind'];

/**
 * Value filter handler used by the expression pipe operator
 * (`${ value | upper }`).
 */
export type TemplateFilterHandler = (value: unknown, args: unknown[]) => unknown;

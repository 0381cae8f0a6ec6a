import type {
  MarkupEvent,
  MatchDirective,
  Pos,
  SourceEvent,
  StartEvent,
  SubEvent,
  TemplateStreamFilter,
  TransformScope,
} from './types.js';

import {
  Context,
  type ContextFrame,
} from './context.js';

import {
  getDefaultLogger,
  parseTemplateOptions,
  type TemplateConfig,
  type TemplateOptions,
} from './config.js';

import type {
  Logger,
} from './logger.js';

import {
  tplTranslateError,
} from './errors.js';

import {
  parseMarkup,
} from './markup-parser.js';

import {
  Stream,
} from './stream.js';

import {
  tplCompile,
} from './template-parser.js';

import {
  applyDirectives,
  DIRECTIVE_NAMESPACE,
} from './template-directives.js';

import {
  evalFilter,
  whitespaceFilter,
} from './template-stream-filters.js';

const ROOT_SCOPE: TransformScope = {
  ancestors: [],
  excluded: new Set(),
  pos: undefined,
};

/**
 * Scope for the events a SUB expands to. Replaying a match body excludes
 * that match, so its own output is not matched again.
 */
const subScope = (ev: SubEvent, chain: readonly StartEvent[], scope: TransformScope): TransformScope => {
  let excluded = scope.excluded;
  for (const d of ev.directives) {
    if (d.kind === 'match-invocation' && !excluded.has(d.match)) {
      excluded = new Set<MatchDirective>([ ...excluded, d.match ]);
    }
  }
  return { ancestors: [ ...chain ], excluded, pos: ev.pos };
};

/**
 * Compiled markup template.
 *
 * The source is parsed once; `generate()` can then be called any number of
 * times with different data.
 *
 * @example
 * ```ts
 * const tmpl = new Template('<ul xmlns:mw="urn:markweave:directives">'
 *   + '<li mw:for="item in items">$item</li></ul>');
 * tmpl.generate({ items: [ 1, 2 ] }).render();
 * // '<ul><li>1</li><li>2</li></ul>'
 * ```
 */
export class Template {
  static readonly NAMESPACE = DIRECTIVE_NAMESPACE;

  readonly config: Readonly<TemplateConfig>;
  readonly filename: string;
  readonly logger: Logger;

  /** Compiled events. */
  readonly stream: readonly MarkupEvent[];

  /** Applied to every transform pass before the runtime filters. */
  readonly preFilters: TemplateStreamFilter[];
  /** Runtime filters, e.g. the ones registered by match directives. */
  readonly filters: TemplateStreamFilter[];
  /** Applied once to the complete output. */
  readonly postFilters: TemplateStreamFilter[];

  /**
   * @param source - Markup source, or events from a markup parser.
   * @param options - Template options.
   * @param logger - Logger, defaults to the shared one.
   * @throws TemplateSyntaxError when the markup or a directive is malformed.
   * @throws TemplateConfigError on invalid options.
   */
  constructor (source: string | Iterable<SourceEvent>, options: TemplateOptions = {}, logger?: Logger) {
    this.config = parseTemplateOptions(options);
    this.filename = this.config.filename;
    this.logger = logger ?? getDefaultLogger();
    this.preFilters = [ evalFilter ];
    this.filters = [];
    this.postFilters = this.config.stripWhitespace ? [ whitespaceFilter ] : [];

    // directives register runtime filters while the template compiles
    const events = (typeof source === 'string') ? parseMarkup(source, this.filename) : source;
    this.stream = tplCompile(events, this);

    this.logger.debug('Template parsed', {
      filename: this.filename,
      events: this.stream.length,
      filters: this.filters.length,
    });
  }

  /**
   * Generate the output stream for the given data.
   *
   * @param ctx - Context, or the data of a new context's base frame.
   * @returns Lazy output stream.
   */
  generate (ctx: Context | ContextFrame = {}): Stream {
    const context = (ctx instanceof Context) ? ctx : new Context(ctx);
    let out: Iterable<MarkupEvent> = this.transform(this.stream, context);
    for (const filter of this.postFilters) out = filter(out, context, this, ROOT_SCOPE);
    return new Stream(out);
  }

  /**
   * Run events through the pre-filters and runtime filters and expand SUB
   * events recursively.
   *
   * @param stream - Events to transform.
   * @param ctx - Runtime context.
   * @param scope - Enclosing elements and excluded matches of this pass.
   * @throws TemplateRuntimeError when an expression fails.
   */
  * transform (stream: Iterable<MarkupEvent>, ctx: Context, scope: TransformScope = ROOT_SCOPE): Generator<MarkupEvent, void, undefined> {
    let filtered: Iterable<MarkupEvent> = stream;
    for (const filter of this.preFilters) filtered = filter(filtered, ctx, this, scope);
    for (const filter of this.filters) filtered = filter(filtered, ctx, this, scope);

    const chain: StartEvent[] = [ ...scope.ancestors ];
    let pos: Pos | undefined = scope.pos;
    try {
      for (const ev of filtered) {
        pos = ev.pos;
        if (ev.type === 'sub') {
          const expanded = applyDirectives(ev.directives, ev.stream, ctx);
          yield * this.transform(expanded, ctx, subScope(ev, chain, scope));
          continue;
        }
        if (ev.type === 'start') chain.push(ev);
        else if (ev.type === 'end') chain.pop();
        yield ev;
      }
    } catch (err) {
      throw tplTranslateError(err, this.filename, pos);
    }
  }

  toString (): string {
    return `<Template "${this.filename}">`;
  }
}

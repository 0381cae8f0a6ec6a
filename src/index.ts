/*!
 * markweave
 *
 * Streaming markup template engine: templates are well-formed XML whose
 * elements carry directive attributes (def, match, for, if, replace,
 * content, attrs, strip) and `${expression}` interpolation.
 *
 * Licensed under the MIT License.
 */

import {
  Template,
} from './template.js';

import {
  Context,
  type ContextFrame,
} from './context.js';

export {
  Template,
} from './template.js';

export {
  Context,
  type ContextFrame,
} from './context.js';

export {
  Stream,
} from './stream.js';

export {
  Path,
  type PathSelectMode,
} from './path.js';

export {
  Expression,
  type ExpressionOptions,
  type LookupMode,
} from './expression.js';

export {
  TemplateFunction,
} from './template-function.js';

export {
  TemplateLoader,
} from './template-loader.js';

export {
  parseMarkup,
} from './markup-parser.js';

export {
  serializeMarkup,
} from './markup-serializer.js';

export {
  tplCompile,
  tplInterpolate,
  tplSplitInterpolation,
} from './template-parser.js';

export {
  DIRECTIVE_NAMESPACE,
  isTemplateDirective,
  registerTemplateDirective,
  unregisterTemplateDirective,
  type DirectiveSite,
  type TemplateDirectiveDefinition,
} from './template-directives.js';

export {
  XINCLUDE_NAMESPACE,
  type TemplateSource,
} from './template-stream-filters.js';

export {
  registerTemplateFilter,
} from './template-filters.js';

export {
  escapeMarkup,
  unescapeMarkup,
} from './html-utils.js';

export {
  BadDirectiveError,
  ExpressionSyntaxError,
  ImplementationError,
  MarkupParseError,
  TemplateError,
  TemplateNotFound,
  TemplateRuntimeError,
  TemplateSyntaxError,
} from './errors.js';

export {
  LOG_LEVEL_ENV,
  TemplateConfigError,
  type LoaderOptions,
  type TemplateOptions,
} from './config.js';

export {
  createLogger,
  type LogLevel,
  type Logger,
  type LoggerOptions,
  type LogSink,
} from './logger.js';

export type * from './types.js';

/**
 * Render a template string using the provided data as the base frame.
 * Data objects are merged left to right, so later objects override
 * properties of earlier ones.
 *
 * @param source - Template markup.
 * @param data - Data objects for the base frame. May be repeated.
 * @returns Rendered markup.
 * @throws TemplateSyntaxError for malformed markup or directives.
 * @throws TemplateRuntimeError when an expression fails.
 */
export function renderTemplate (source: string, ...data: ContextFrame[]): string {
  return new Template(source).generate(new Context(...data)).render();
}

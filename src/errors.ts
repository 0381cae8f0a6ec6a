import type { Pos } from './types.js';

/**
 * Base class for errors related to template processing.
 *
 * When a location is known, the message is suffixed with the filename and
 * line number, e.g. `Bad directive "loop" (page.xml, line 3)`.
 */
export class TemplateError extends Error {
  readonly filename: string;
  readonly line: number;
  readonly column: number;

  constructor (message: string, filename = '<string>', line = -1, column = -1, options?: { cause?: unknown }) {
    super(line > 0 ? `${message} (${filename}, line ${line})` : message, options);
    this.name = 'TemplateError';
    this.filename = filename;
    this.line = line;
    this.column = column;
  }
}

/**
 * Raised for malformed markup, directive values and expressions.
 */
export class TemplateSyntaxError extends TemplateError {
  constructor (message: string, filename?: string, line?: number, column?: number, options?: { cause?: unknown }) {
    super(message, filename, line, column, options);
    this.name = 'TemplateSyntaxError';
  }
}

/**
 * Raised when an attribute in the directive namespace has a local name that
 * does not match any registered directive.
 */
export class BadDirectiveError extends TemplateSyntaxError {
  readonly directive: string;

  constructor (directive: string, filename?: string, line?: number) {
    super(`Bad directive "${directive}"`, filename, line);
    this.name = 'BadDirectiveError';
    this.directive = directive;
  }
}

/**
 * Raised by the markup parser when the source cannot be tokenized.
 */
export class MarkupParseError extends TemplateSyntaxError {
  constructor (message: string, filename: string, line: number, column: number) {
    super(message, filename, line, column);
    this.name = 'MarkupParseError';
  }
}

/**
 * Raised when an expression fails while the template is being generated.
 * The original error is available as `cause`.
 */
export class TemplateRuntimeError extends TemplateError {
  constructor (message: string, filename?: string, line?: number, column?: number, options?: { cause?: unknown }) {
    super(message, filename, line, column, options);
    this.name = 'TemplateRuntimeError';
  }
}

/**
 * Raised when a template could not be located on the search path.
 */
export class TemplateNotFound extends TemplateError {
  readonly searchPath: readonly string[];

  constructor (name: string, searchPath: readonly string[]) {
    super(`Template "${name}" not found (search path: ${searchPath.length > 0 ? searchPath.join(', ') : 'empty'})`);
    this.name = 'TemplateNotFound';
    this.searchPath = searchPath;
  }
}

/**
 * Compile error of the expression language. `offset` is the 0-based index
 * into the expression source where the problem was detected.
 */
export class ExpressionSyntaxError extends SyntaxError {
  readonly offset: number;
  readonly source: string;

  constructor (message: string, source: string, offset: number) {
    super(`${message} in expression "${source}" at offset ${offset}`);
    this.name = 'ExpressionSyntaxError';
    this.source = source;
    this.offset = offset;
  }
}

/**
 * Programmer error: an internal invariant does not hold.
 */
export class ImplementationError extends Error {
  constructor (message: string) {
    super(message);
    this.name = 'ImplementationError';
  }
}

/**
 * Attach template location to an error escaping the transform.
 *
 * Template errors pass through untouched so that the innermost location wins.
 * Expression syntax errors add their offset to the event column.
 *
 * @param err - Caught error.
 * @param filename - Template filename.
 * @param pos - Position of the event being processed, if any.
 * @returns Error to rethrow.
 */
export const tplTranslateError = (err: unknown, filename: string, pos: Pos | undefined): Error => {
  if (err instanceof TemplateError || err instanceof ImplementationError) return err;
  const [ line, column ] = pos ?? [ -1, -1 ];
  if (err instanceof ExpressionSyntaxError) {
    return new TemplateSyntaxError(err.message, filename, line, column + err.offset, { cause: err });
  }
  const message = (err instanceof Error) ? err.message : String(err);
  return new TemplateRuntimeError(message, filename, line, column, { cause: err });
};

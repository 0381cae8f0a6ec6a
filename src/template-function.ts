import type {
  MarkupEvent,
} from './types.js';

import type {
  Context,
  ContextFrame,
} from './context.js';

import {
  Stream,
} from './stream.js';

/**
 * Formal parameter of a template function with its default value, which is
 * evaluated once when the function is defined.
 */
export interface TemplateFunctionParam {
  name: string;
  hasDefault: boolean;
  defaultValue?: unknown;
}

/**
 * Named template function created by the `def` directive.
 *
 * Holds the expansion of the captured element subtree and the context it
 * was defined in. Calling it binds the arguments in a new frame of that
 * context and replays the subtree; the frame is popped once the returned stream is exhausted or
 * abandoned.
 */
export class TemplateFunction {
  readonly name: string;
  readonly params: readonly TemplateFunctionParam[];
  private readonly expandBody: () => Iterable<MarkupEvent>;
  private readonly ctx: Context;

  constructor (name: string, params: readonly TemplateFunctionParam[], expandBody: () => Iterable<MarkupEvent>, ctx: Context) {
    this.name = name;
    this.params = params;
    this.expandBody = expandBody;
    this.ctx = ctx;
  }

  /**
   * Invoke the function. Each parameter takes the next positional argument,
   * else the named argument of the same name, else its default.
   *
   * @param args - Positional arguments.
   * @param named - Named arguments.
   * @returns Stream over the expanded body.
   */
  call (args: readonly unknown[], named: Readonly<Record<string, unknown>> = {}): Stream {
    const frame: ContextFrame = {};
    let next = 0;
    for (const param of this.params) {
      if (next < args.length) {
        frame[param.name] = args[next++];
      } else if (Object.prototype.hasOwnProperty.call(named, param.name)) {
        frame[param.name] = named[param.name];
      } else {
        frame[param.name] = param.hasDefault ? param.defaultValue : undefined;
      }
    }
    return new Stream(this.ctx.scoped(frame, this.expandBody()));
  }

  toString (): string {
    return `<TemplateFunction ${this.name}(${this.params.map((p) => p.name).join(', ')})>`;
  }
}

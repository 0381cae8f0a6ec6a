import { ImplementationError } from './errors.js';
import type { MarkupEvent } from './types.js';

/**
 * A scope frame: name to value bindings local to one directive activation.
 */
export type ContextFrame = Record<string, unknown>;

/**
 * Container for template input data.
 *
 * A context is a stack of scope frames. Directives such as loops push a frame
 * with the bindings that are only visible inside the loop and pop it again
 * when the loop is done. Lookups walk from the most recently pushed frame down
 * to the base frame; the base frame is never popped.
 *
 * @example
 * ```ts
 * const ctx = new Context({ one: 'foo', other: 1 });
 * ctx.push({ one: 'frost' });
 * ctx.get('one'); // 'frost'
 * ctx.get('other'); // 1
 * ctx.pop();
 * ctx.get('one'); // 'foo'
 * ```
 */
export class Context {
  private readonly frames: ContextFrame[];

  constructor (...data: ContextFrame[]) {
    // later data objects override earlier ones; accessors are not executed
    const base: ContextFrame = {};
    for (const d of data) {
      for (const key of Object.keys(d)) {
        const desc = Object.getOwnPropertyDescriptor(d, key);
        if (desc && 'value' in desc) base[key] = desc.value;
      }
    }
    this.frames = [ base ];
  }

  /** Number of frames currently on the stack, the base frame included. */
  get depth (): number {
    return this.frames.length;
  }

  /**
   * Look a name up, starting at the innermost frame.
   *
   * @param name - Variable name.
   * @returns The bound value, or undefined if no frame defines the name.
   */
  get (name: string): unknown {
    for (let i = this.frames.length - 1; i >= 0; i--) {
      const frame = this.frames[i];
      if (Object.prototype.hasOwnProperty.call(frame, name)) return frame[name];
    }
    return undefined;
  }

  /**
   * Whether any frame defines the name (even with an undefined value).
   *
   * @param name - Variable name.
   */
  has (name: string): boolean {
    return this.frames.some((frame) => Object.prototype.hasOwnProperty.call(frame, name));
  }

  /**
   * Bind a name in the innermost frame.
   *
   * @param name - Variable name.
   * @param value - Value to bind.
   */
  set (name: string, value: unknown): void {
    this.frames[this.frames.length - 1][name] = value;
  }

  /**
   * Push a new innermost frame.
   *
   * @param frame - Bindings of the new frame. The object is copied.
   */
  push (frame: ContextFrame = {}): void {
    this.frames.push({ ...frame });
  }

  /**
   * Remove the innermost frame.
   *
   * @throws ImplementationError when only the base frame is left.
   */
  pop (): void {
    if (this.frames.length <= 1) {
      throw new ImplementationError('Pop from empty context stack');
    }
    this.frames.pop();
  }

  /**
   * Replay events with an extra frame pushed. The frame is popped when the
   * events are exhausted, when consumption throws, and when the consumer
   * stops iterating early.
   *
   * @param frame - Bindings visible while the events are consumed.
   * @param events - Events to replay.
   */
  * scoped (frame: ContextFrame, events: Iterable<MarkupEvent>): Generator<MarkupEvent, void, undefined> {
    this.push(frame);
    try {
      yield * events;
    } finally {
      this.pop();
    }
  }

  toString (): string {
    return `Context(${this.frames.map((f) => `{${Object.keys(f).join(', ')}}`).reverse().join(' ')})`;
  }
}

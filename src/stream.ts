import type {
  MarkupEvent,
} from './types.js';

import {
  Path,
  type PathSelectMode,
} from './path.js';

import {
  serializeMarkup,
} from './markup-serializer.js';

/**
 * Event stream returned by `Template.generate()`, template function calls
 * and `select()`. Single pass: iterating it a second time yields nothing
 * unless it wraps an array.
 */
export class Stream implements Iterable<MarkupEvent> {
  private readonly events: Iterable<MarkupEvent>;

  constructor (events: Iterable<MarkupEvent>) {
    this.events = events;
  }

  [Symbol.iterator] (): Iterator<MarkupEvent> {
    return this.events[Symbol.iterator]();
  }

  /**
   * Serialize the stream to markup text.
   *
   * @returns Markup string.
   */
  render (): string {
    let out = '';
    for (const chunk of serializeMarkup(this.events)) out += chunk;
    return out;
  }

  /**
   * Select parts of the stream with a path.
   *
   * @param path - Path source, e.g. `body/p[@class="note"]` or `@href`.
   * @param mode - Context node position.
   */
  select (path: string | Path, mode: PathSelectMode = 'root'): Stream {
    const compiled = (typeof path === 'string') ? new Path(path) : path;
    return new Stream(compiled.select(this.events, mode));
  }

  /**
   * Apply a transformation to the stream.
   *
   * @param fn - Function producing the new events.
   */
  filter (fn: (events: Iterable<MarkupEvent>) => Iterable<MarkupEvent>): Stream {
    return new Stream(fn(this.events));
  }

  toArray (): MarkupEvent[] {
    return [ ...this.events ];
  }

  toString (): string {
    return this.render();
  }
}

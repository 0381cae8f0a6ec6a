import { assert } from 'chai';

import {
  Stream,
  parseMarkup,
  type MarkupEvent,
} from '../src/index.js';

describe('stream', function () {
  it('renders its events', function () {
    const stream = new Stream(parseMarkup('<a><b>x</b></a>'));
    assert.strictEqual(stream.render(), '<a><b>x</b></a>');
  });

  it('uses the rendered markup as string form', function () {
    assert.strictEqual(String(new Stream(parseMarkup('<a/>'))), '<a/>');
  });

  it('is single pass over generators', function () {
    const stream = new Stream(parseMarkup('<a/>'));
    assert.lengthOf(stream.toArray(), 2);
    assert.lengthOf(stream.toArray(), 0);
  });

  it('can be replayed when it wraps an array', function () {
    const stream = new Stream([ ...parseMarkup('<a/>') ]);
    assert.strictEqual(stream.render(), '<a/>');
    assert.strictEqual(stream.render(), '<a/>');
  });

  it('applies transformations lazily', function () {
    let pulled = 0;
    const upper = function * (events: Iterable<MarkupEvent>): Generator<MarkupEvent, void, undefined> {
      for (const ev of events) {
        pulled++;
        yield (ev.type === 'text') ? { ...ev, text: ev.text.toUpperCase() } : ev;
      }
    };
    const stream = new Stream(parseMarkup('<a>hi</a>')).filter(upper);
    assert.strictEqual(pulled, 0);
    assert.strictEqual(stream.render(), '<a>HI</a>');
    assert.strictEqual(pulled, 3);
  });

  it('selects with a path', function () {
    const stream = new Stream(parseMarkup('<a><b>1</b><c>2</c><b>3</b></a>'));
    assert.strictEqual(stream.select('a/b').render(), '<b>1</b><b>3</b>');
  });
});

import { assert } from 'chai';

import {
  Context,
  ImplementationError,
  type MarkupEvent,
} from '../src/index.js';

describe('context', function () {
  it('looks names up from the innermost frame outwards', function () {
    const ctx = new Context({ one: 'foo', other: 1 });
    ctx.push({ one: 'frost' });
    assert.strictEqual(ctx.get('one'), 'frost');
    assert.strictEqual(ctx.get('other'), 1);
    ctx.pop();
    assert.strictEqual(ctx.get('one'), 'foo');
  });

  it('merges constructor data left to right', function () {
    const ctx = new Context({ a: 1, b: 1 }, { b: 2 });
    assert.strictEqual(ctx.get('a'), 1);
    assert.strictEqual(ctx.get('b'), 2);
  });

  it('distinguishes unbound names from undefined values', function () {
    const ctx = new Context({ u: undefined });
    assert.isTrue(ctx.has('u'));
    assert.isFalse(ctx.has('x'));
    assert.isUndefined(ctx.get('x'));
  });

  it('binds names in the innermost frame', function () {
    const ctx = new Context();
    ctx.push();
    ctx.set('x', 1);
    assert.strictEqual(ctx.get('x'), 1);
    ctx.pop();
    assert.isFalse(ctx.has('x'));
  });

  it('refuses to pop the base frame', function () {
    const ctx = new Context();
    assert.throws(() => ctx.pop(), ImplementationError, 'Pop from empty context stack');
  });

  it('pops a scoped frame when iteration stops early', function () {
    const ctx = new Context();
    const events: MarkupEvent[] = [
      { type: 'text', text: 'a', pos: [ 1, 1 ] },
      { type: 'text', text: 'b', pos: [ 1, 2 ] },
    ];
    for (const ev of ctx.scoped({ x: 1 }, events)) {
      assert.strictEqual(ev.type, 'text');
      assert.strictEqual(ctx.depth, 2);
      assert.strictEqual(ctx.get('x'), 1);
      break;
    }
    assert.strictEqual(ctx.depth, 1);
    assert.isFalse(ctx.has('x'));
  });

  it('does not execute getters of data objects', function () {
    let executed = false;
    const data: Record<string, unknown> = { plain: 1 };
    Object.defineProperty(data, 'lazy', {
      enumerable: true,
      get () {
        executed = true;
        return 'L';
      },
    });
    const ctx = new Context(data);
    assert.strictEqual(ctx.get('plain'), 1);
    assert.isFalse(ctx.has('lazy'));
    assert.isFalse(executed);
  });

  it('lists frame keys innermost first', function () {
    const ctx = new Context({ a: 1 });
    ctx.push({ b: 2 });
    assert.strictEqual(ctx.toString(), 'Context({b} {a})');
  });
});

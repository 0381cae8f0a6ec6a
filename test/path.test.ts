import { assert } from 'chai';

import {
  ExpressionSyntaxError,
  Path,
  Stream,
  parseMarkup,
  type StartEvent,
} from '../src/index.js';

const el = (name: string, attrs: Record<string, string> = {}): StartEvent => ({
  type: 'start',
  tag: { name, localName: name, prefix: null, namespace: null },
  attrs: Object.entries(attrs).map(([ k, v ]) => ({ name: { name: k, localName: k, prefix: null, namespace: null }, value: v })),
  pos: [ 1, 1 ],
});

describe('path', function () {
  describe('matches', function () {
    it('matches relative child paths at any depth', function () {
      const path = new Path('div/greeting');
      assert.isTrue(path.matches([ el('div'), el('greeting') ]));
      assert.isTrue(path.matches([ el('body'), el('div'), el('greeting') ]));
      assert.isFalse(path.matches([ el('greeting') ]));
      assert.isFalse(path.matches([ el('div'), el('span'), el('greeting') ]));
    });

    it('matches descendant steps', function () {
      assert.isTrue(new Path('//greeting').matches([ el('a'), el('b'), el('greeting') ]));
      assert.isTrue(new Path('div//greeting').matches([ el('div'), el('p'), el('greeting') ]));
      assert.isFalse(new Path('div//greeting').matches([ el('p'), el('greeting') ]));
    });

    it('anchors absolute paths at the outermost element', function () {
      const path = new Path('/html/body');
      assert.isTrue(path.absolute);
      assert.isTrue(path.matches([ el('html'), el('body') ]));
      assert.isFalse(path.matches([ el('x'), el('html'), el('body') ]));
    });

    it('evaluates attribute predicates and wildcards', function () {
      assert.isTrue(new Path('p[@class="note"]').matches([ el('p', { class: 'note' }) ]));
      assert.isFalse(new Path('p[@class=\'note\']').matches([ el('p', { class: 'other' }) ]));
      assert.isTrue(new Path('p[@id]').matches([ el('p', { id: '1' }) ]));
      assert.isFalse(new Path('p[@id]').matches([ el('p') ]));
      assert.isTrue(new Path('*').matches([ el('anything') ]));
    });

    it('never matches attribute paths against elements', function () {
      assert.isFalse(new Path('@name').matches([ el('greeting', { name: 'x' }) ]));
    });
  });

  describe('select', function () {
    const doc = '<html><body><p class="a">one</p><p>two</p></body></html>';
    const select = (path: string): string => new Stream(parseMarkup(doc)).select(path).render();

    it('selects element subtrees from the document root', function () {
      assert.strictEqual(select('html/body/p'), '<p class="a">one</p><p>two</p>');
      assert.strictEqual(select('body/p'), '');
      assert.strictEqual(select('//p[@class="a"]'), '<p class="a">one</p>');
    });

    it('selects text nodes', function () {
      assert.strictEqual(select('//p/text()'), 'onetwo');
    });

    it('selects attribute values as text', function () {
      assert.strictEqual(select('//p/@class'), 'a');
      assert.strictEqual(select('html/body/p/@*'), 'a');
    });

    it('selects relative to the first element in element mode', function () {
      const src = '<greeting name="Dude" lang="en"><b>x</b>tail</greeting>';
      const sel = (path: string): string => new Stream(parseMarkup(src)).select(path, 'element').render();
      assert.strictEqual(sel('@name'), 'Dude');
      assert.strictEqual(sel('@*'), 'Dudeen');
      assert.strictEqual(sel('b'), '<b>x</b>');
      assert.strictEqual(sel('*'), '<b>x</b>');
      assert.strictEqual(sel('text()'), 'tail');
      assert.strictEqual(sel('./b/text()'), 'x');
    });
  });

  describe('syntax', function () {
    it('rejects a missing step', function () {
      assert.throws(() => new Path('a/'), ExpressionSyntaxError, 'Expected a step');
    });

    it('rejects steps after an attribute step', function () {
      assert.throws(() => new Path('@x/y'), ExpressionSyntaxError, 'Attribute step must be last');
    });

    it('rejects malformed predicates', function () {
      assert.throws(() => new Path('p[@x=1]'), ExpressionSyntaxError, 'Malformed predicate');
    });

    it('keeps its source as string form', function () {
      assert.strictEqual(String(new Path('a//b')), 'a//b');
    });
  });
});

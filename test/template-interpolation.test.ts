import { assert } from 'chai';

import {
  Stream,
  parseMarkup,
  renderTemplate,
  tplSplitInterpolation,
} from '../src/index.js';

import { renderDiv } from './test-utils/markup.js';

describe('template rendering / interpolation', function () {
  describe('splitting', function () {
    it('finds braced and short expressions', function () {
      assert.deepEqual(tplSplitInterpolation('Hi ${user.name}, $$5 for $item'), [
        { type: 'text', text: 'Hi ' },
        { type: 'expr', source: 'user.name' },
        { type: 'text', text: ', $5 for ' },
        { type: 'expr', source: 'item' },
      ]);
    });

    it('keeps text without expressions as one part', function () {
      assert.deepEqual(tplSplitInterpolation('plain text'), [ { type: 'text', text: 'plain text' } ]);
      assert.deepEqual(tplSplitInterpolation(''), []);
    });

    it('balances braces and quotes inside braced expressions', function () {
      assert.deepEqual(tplSplitInterpolation('${ {\'k\': \'}\'}[\'k\'] }!'), [
        { type: 'expr', source: '{\'k\': \'}\'}[\'k\']' },
        { type: 'text', text: '!' },
      ]);
    });

    it('keeps an unterminated expression as text', function () {
      assert.deepEqual(tplSplitInterpolation('a ${b'), [ { type: 'text', text: 'a ${b' } ]);
    });

    it('keeps an empty expression as text', function () {
      assert.deepEqual(tplSplitInterpolation('a ${} b'), [ { type: 'text', text: 'a ${} b' } ]);
      assert.deepEqual(tplSplitInterpolation('${ }${x}'), [
        { type: 'text', text: '${ }' },
        { type: 'expr', source: 'x' },
      ]);
    });

    it('does not take a trailing dot into a short expression', function () {
      assert.deepEqual(tplSplitInterpolation('Cost: $price.'), [
        { type: 'text', text: 'Cost: ' },
        { type: 'expr', source: 'price' },
        { type: 'text', text: '.' },
      ]);
    });
  });

  describe('text', function () {
    it('interpolates braced expressions', function () {
      assert.strictEqual(renderDiv('Hello ${name}!', { name: 'World' }), '<div>Hello World!</div>');
    });

    it('interpolates short expressions with member paths', function () {
      assert.strictEqual(renderDiv('Hello $name.first!', { name: { first: 'Ada' } }), '<div>Hello Ada!</div>');
    });

    it('renders an empty expression literally', function () {
      assert.strictEqual(renderDiv('a ${} b'), '<div>a ${} b</div>');
    });

    it('turns $$ into a literal dollar sign', function () {
      assert.strictEqual(renderDiv('Price: $$5 and $${x}', { x: 1 }), '<div>Price: $5 and ${x}</div>');
    });

    it('stringifies values and skips null and undefined', function () {
      assert.strictEqual(renderDiv('[${n}|${t}|${f}|${list}|${nothing}|${missing}]', {
        n: 0,
        t: true,
        f: false,
        list: [ 1, 2 ],
        nothing: null,
      }), '<div>[0|true|false|1,2||]</div>');
    });

    it('escapes markup characters in values', function () {
      assert.strictEqual(renderDiv('${v}', { v: '<b>&</b>' }), '<div>&lt;b&gt;&amp;&lt;/b&gt;</div>');
    });

    it('splices stream values as markup', function () {
      const snippet = new Stream([ ...parseMarkup('<i>x</i>') ]);
      assert.strictEqual(renderDiv('a${snippet}b', { snippet }), '<div>a<i>x</i>b</div>');
    });

    it('leaves text without a dollar sign alone', function () {
      assert.strictEqual(renderTemplate('<p>100 % {plain}</p>'), '<p>100 % {plain}</p>');
    });
  });

  describe('attributes', function () {
    it('interpolates attribute values', function () {
      assert.strictEqual(renderTemplate('<a href="/u/${id}?tab=$tab">go</a>', { id: 7, tab: 'info' }),
        '<a href="/u/7?tab=info">go</a>');
    });

    it('drops attributes whose expressions all evaluate to null or undefined', function () {
      assert.strictEqual(renderTemplate('<a title="${missing}" rel="${none}">go</a>', { none: null }), '<a>go</a>');
    });

    it('keeps attributes with literal text around empty expressions', function () {
      assert.strictEqual(renderTemplate('<a class="x${missing}">go</a>'), '<a class="x">go</a>');
    });

    it('keeps literal attribute values and unescapes $$', function () {
      assert.strictEqual(renderTemplate('<a title="$$x" lang="en">go</a>'), '<a title="$x" lang="en">go</a>');
    });

    it('escapes quotes in attribute values', function () {
      assert.strictEqual(renderTemplate('<a title="${v}"/>', { v: '"><x' }), '<a title="&quot;&gt;&lt;x"/>');
    });
  });
});

import { assert } from 'chai';

import { renderDiv } from './test-utils/markup.js';

describe('template rendering / if directive', function () {
  it('keeps the element when the condition is truthy', function () {
    assert.strictEqual(renderDiv('<p mw:if="show">shown</p>', { show: true }), '<div><p>shown</p></div>');
  });

  it('drops the element and its content when the condition is falsy', function () {
    assert.strictEqual(renderDiv('<p mw:if="show">hidden</p>', { show: false }), '<div/>');
    assert.strictEqual(renderDiv('<p mw:if="show">hidden</p>'), '<div/>');
  });

  it('treats empty arrays and objects as falsy', function () {
    assert.strictEqual(renderDiv('<p mw:if="items">x</p>', { items: [] }), '<div/>');
    assert.strictEqual(renderDiv('<p mw:if="obj">x</p>', { obj: {} }), '<div/>');
    assert.strictEqual(renderDiv('<p mw:if="items">x</p>', { items: [ 0 ] }), '<div><p>x</p></div>');
    assert.strictEqual(renderDiv('<p mw:if="obj">x</p>', { obj: { a: 1 } }), '<div><p>x</p></div>');
  });

  it('evaluates comparisons and boolean operators', function () {
    const body = '<p mw:if="count &gt; 1 and not hidden">many</p>';
    assert.strictEqual(renderDiv(body, { count: 2, hidden: false }), '<div><p>many</p></div>');
    assert.strictEqual(renderDiv(body, { count: 2, hidden: true }), '<div/>');
    assert.strictEqual(renderDiv(body, { count: 1, hidden: false }), '<div/>');
  });

  it('does not evaluate the content of a dropped element', function () {
    let called = false;
    const fail = (): string => {
      called = true;
      throw new Error('should not run');
    };
    assert.strictEqual(renderDiv('<p mw:if="false">${fail()}</p>', { fail }), '<div/>');
    assert.isFalse(called);
  });

  it('supports nesting', function () {
    const body = '<section mw:if="a"><p mw:if="b">ab</p><p>a</p></section>';
    assert.strictEqual(renderDiv(body, { a: true, b: false }), '<div><section><p>a</p></section></div>');
    assert.strictEqual(renderDiv(body, { a: true, b: true }), '<div><section><p>ab</p><p>a</p></section></div>');
    assert.strictEqual(renderDiv(body, { a: false, b: true }), '<div/>');
  });

  it('keeps the other attributes of the element', function () {
    assert.strictEqual(renderDiv('<p class="note" mw:if="1">x</p>'), '<div><p class="note">x</p></div>');
  });
});

import { assert } from 'chai';

import {
  Template,
} from '../src/index.js';

import { MW, renderDiv } from './test-utils/markup.js';

describe('template rendering / match directive', function () {
  it('replaces matched elements by the match body', function () {
    const body = '<span mw:match="greeting">Hello ${select(\'@name\')}</span><greeting name="Dude"/>';
    assert.strictEqual(renderDiv(body), '<div><span>Hello Dude</span></div>');
  });

  it('replaces every matching element', function () {
    const body = '<span mw:match="greeting">Hello ${select(\'@name\')}</span><greeting name="A"/><greeting name="B"/>';
    assert.strictEqual(renderDiv(body), '<div><span>Hello A</span><span>Hello B</span></div>');
  });

  it('matches paths against the ancestors of an element', function () {
    const body = '<span mw:match="p/greeting">Hi</span><greeting/><p><greeting/></p>';
    assert.strictEqual(renderDiv(body), '<div><greeting/><p><span>Hi</span></p></div>');
  });

  it('selects children of the matched element', function () {
    const body = '<section mw:match="box"><h2>${select(\'@title\')}</h2>${select(\'*\')}</section>'
      + '<box title="T"><p>one</p><p>two</p></box>';
    assert.strictEqual(renderDiv(body), '<div><section><h2>T</h2><p>one</p><p>two</p></section></div>');
  });

  it('sees evaluated attribute values of the matched element', function () {
    const body = '<span mw:match="greeting">Hello ${select(\'@name\')}</span><greeting name="${who}"/>';
    assert.strictEqual(renderDiv(body, { who: 'Dude' }), '<div><span>Hello Dude</span></div>');
  });

  it('applies the first registered match when several match', function () {
    const body = '<b mw:match="item">first</b><i mw:match="item">second</i><item/>';
    assert.strictEqual(renderDiv(body), '<div><b>first</b></div>');
  });

  it('matches inside the output of other matches', function () {
    const body = '<em mw:match="note">!${select(\'text()\')}</em>'
      + '<strong mw:match="warn"><note>${select(\'text()\')}</note></strong>'
      + '<warn>careful</warn>';
    assert.strictEqual(renderDiv(body), '<div><strong><em>!careful</em></strong></div>');
  });

  it('does not match its own output again', function () {
    const body = '<greeting mw:match="greeting" class="wrapped">${select(\'text()\')}</greeting><greeting>hi</greeting>';
    assert.strictEqual(renderDiv(body), '<div><greeting class="wrapped">hi</greeting></div>');
  });

  it('matches elements produced by other directives', function () {
    const body = '<li mw:match="item">- ${select(\'@v\')}</li><item mw:for="v in values" v="$v"/>';
    assert.strictEqual(renderDiv(body, { values: [ 'a', 'b' ] }), '<div><li>- a</li><li>- b</li></div>');
  });

  it('expands directives in the matched content before selecting it', function () {
    const body = '<ul mw:match="list">${select(\'*\')}</ul><list><li mw:for="x in xs">$x</li></list>';
    assert.strictEqual(renderDiv(body, { xs: [ 1, 2 ] }), '<div><ul><li>1</li><li>2</li></ul></div>');
  });

  it('applies the other directives of the match element on every replay', function () {
    const tmpl = new Template(`<div ${MW}><span mw:match="item" mw:strip="plain">x</span><item/></div>`);
    assert.strictEqual(tmpl.generate({ plain: true }).render(), '<div>x</div>');
    assert.strictEqual(tmpl.generate({ plain: false }).render(), '<div><span>x</span></div>');
  });

  it('consumes matches found before the match body is known', function () {
    assert.strictEqual(renderDiv('<greeting/><span mw:match="greeting">x</span>'), '<div/>');
  });
});

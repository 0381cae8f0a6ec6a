import { assert } from 'chai';

import {
  BadDirectiveError,
  MarkupParseError,
  renderTemplate,
  Template,
  TemplateError,
  TemplateRuntimeError,
  TemplateSyntaxError,
} from '../src/index.js';

import { MW } from './test-utils/markup.js';

const boom = (): never => {
  throw new Error('boom');
};

describe('template errors', function () {
  describe('at compile time', function () {
    const source = `<div ${MW}>\n<p mw:loop="x"/></div>`;

    it('rejects unknown directives', function () {
      try {
        new Template(source);
        assert.fail('expected a bad directive error');
      } catch (err) {
        assert.instanceOf(err, BadDirectiveError);
        assert.instanceOf(err, TemplateSyntaxError);
        assert.strictEqual(err.message, 'Bad directive "loop" (<string>, line 2)');
        assert.strictEqual(err.directive, 'loop');
        assert.strictEqual(err.line, 2);
      }
    });

    it('reports the template filename', function () {
      assert.throws(() => new Template(source, { filename: 'page.xml' }), BadDirectiveError,
        'Bad directive "loop" (page.xml, line 2)');
    });

    it('rejects malformed markup', function () {
      assert.throws(() => new Template('<p>unclosed'), MarkupParseError);
    });

  });

  describe('at render time', function () {
    it('wraps failures with their location', function () {
      const tmpl = new Template('<div>\n  <p>${fail()}</p>\n</div>');
      try {
        tmpl.generate({ fail: boom }).render();
        assert.fail('expected a runtime error');
      } catch (err) {
        assert.instanceOf(err, TemplateRuntimeError);
        assert.strictEqual(err.message, 'boom (<string>, line 2)');
        assert.strictEqual(err.line, 2);
        assert.strictEqual(err.column, 6);
        assert.instanceOf(err.cause, Error);
      }
    });

    it('reports expression syntax errors at their column', function () {
      try {
        renderTemplate('<p>${a +}</p>');
        assert.fail('expected a syntax error');
      } catch (err) {
        assert.instanceOf(err, TemplateSyntaxError);
        assert.strictEqual(err.line, 1);
        assert.strictEqual(err.column, 7);
      }
    });

    it('reports malformed directive expressions once they run', function () {
      const tmpl = new Template(`<div ${MW}><p mw:if="a +">x</p></div>`);
      assert.throws(() => tmpl.generate().render(), TemplateSyntaxError);
    });

    it('reports failures in attribute values at the element', function () {
      assert.throws(() => renderTemplate('<p title="${fail()}"/>', { fail: boom }), TemplateRuntimeError,
        'boom (<string>, line 1)');
    });

    it('reports undefined names under strict lookup', function () {
      const tmpl = new Template('<p>$nope</p>', { lookupErrors: 'strict' });
      assert.throws(() => tmpl.generate().render(), TemplateRuntimeError, '"nope" is not defined (<string>, line 1)');
    });

    it('surfaces errors only when the output is consumed', function () {
      const stream = new Template('<p>${fail()}</p>').generate({ fail: boom });
      assert.throws(() => stream.render(), TemplateRuntimeError);
    });

    it('keeps the innermost location', function () {
      const source = `<div ${MW}>\n<ul mw:for="i in items">\n<li>\${fail()}</li>\n</ul></div>`;
      assert.throws(() => renderTemplate(source, { items: [ 1 ], fail: boom }), TemplateRuntimeError,
        'boom (<string>, line 3)');
    });

    it('uses the element location for directive failures', function () {
      const source = `<div ${MW}>\n\n<p mw:if="fail()">x</p></div>`;
      try {
        renderTemplate(source, { fail: boom });
        assert.fail('expected a runtime error');
      } catch (err) {
        assert.instanceOf(err, TemplateError);
        assert.strictEqual(err.line, 3);
        assert.strictEqual(err.column, 1);
      }
    });
  });
});

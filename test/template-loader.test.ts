import fs from 'node:fs';
import path from 'node:path';

import { assert } from 'chai';

import {
  Template,
  TemplateLoader,
  TemplateNotFound,
} from '../src/index.js';

import { captureLogger, templateDir } from './test-utils/markup.js';

const XI = 'xmlns:xi="http://www.w3.org/2001/XInclude"';

describe('template loader', function () {
  let files: ReturnType<typeof templateDir>;

  beforeEach(function () {
    files = templateDir({
      'page.xml': `<html ${XI}><xi:include href="header.xml"/><p>body</p></html>`,
      'header.xml': '<h1>$title</h1>',
      'sub/page.xml': `<main ${XI}><xi:include href="./part.xml"/></main>`,
      'sub/part.xml': '<em>part</em>',
    });
  });

  afterEach(function () {
    files.cleanup();
  });

  it('loads templates from the search path', function () {
    const loader = new TemplateLoader({ searchPath: files.dir });
    const tmpl = loader.load('header.xml');
    assert.instanceOf(tmpl, Template);
    assert.strictEqual(tmpl.filename, path.join(files.dir, 'header.xml'));
    assert.strictEqual(tmpl.generate({ title: 'Home' }).render(), '<h1>Home</h1>');
  });

  it('caches loaded templates', function () {
    const loader = new TemplateLoader({ searchPath: [ files.dir ] });
    const tmpl = loader.load('header.xml');
    assert.strictEqual(loader.load('header.xml'), tmpl);
    loader.clear();
    assert.notStrictEqual(loader.load('header.xml'), tmpl);
  });

  it('tries each search path entry in turn', function () {
    const other = templateDir({ 'only-here.xml': '<i/>' });
    try {
      const loader = new TemplateLoader({ searchPath: [ files.dir, other.dir ] });
      assert.strictEqual(loader.load('only-here.xml').filename, path.join(other.dir, 'only-here.xml'));
    } finally {
      other.cleanup();
    }
  });

  it('reports templates that cannot be found', function () {
    const loader = new TemplateLoader({ searchPath: files.dir });
    try {
      loader.load('nope.xml');
      assert.fail('expected a lookup error');
    } catch (err) {
      assert.instanceOf(err, TemplateNotFound);
      assert.deepEqual(err.searchPath, [ files.dir ]);
      assert.strictEqual(err.message, `Template "nope.xml" not found (search path: ${files.dir})`);
    }
  });

  describe('includes', function () {
    it('inserts the output of included templates', function () {
      const loader = new TemplateLoader({ searchPath: files.dir });
      assert.strictEqual(loader.load('page.xml').generate({ title: 'Home' }).render(),
        '<html><h1>Home</h1><p>body</p></html>');
    });

    it('resolves relative names against the including template', function () {
      const loader = new TemplateLoader({ searchPath: files.dir });
      assert.strictEqual(loader.load('sub/page.xml').generate().render(), '<main><em>part</em></main>');
    });

    it('uses the fallback content for missing templates', function () {
      files.write('fallback.xml', `<html ${XI}><xi:include href="missing.xml"><xi:fallback><b>$who</b></xi:fallback></xi:include></html>`);
      const { logger, lines } = captureLogger('info');
      const loader = new TemplateLoader({ searchPath: files.dir }, logger);
      assert.strictEqual(loader.load('fallback.xml').generate({ who: 'none' }).render(), '<html><b>none</b></html>');
      assert.lengthOf(lines, 1);
      assert.include(lines[0], '[INFO ] Include not found, using fallback {"href":"missing.xml"');
    });

    it('fails on missing templates without fallback when rendered', function () {
      files.write('broken.xml', `<html ${XI}><xi:include href="missing.xml"/></html>`);
      const loader = new TemplateLoader({ searchPath: files.dir });
      const tmpl = loader.load('broken.xml');
      assert.throws(() => tmpl.generate().render(), TemplateNotFound, 'Template "missing.xml" not found');
    });
  });

  describe('auto reload', function () {
    it('reloads templates whose file changed', function () {
      const loader = new TemplateLoader({ searchPath: files.dir, autoReload: true });
      const tmpl = loader.load('header.xml');
      assert.strictEqual(loader.load('header.xml'), tmpl);

      const file = files.write('header.xml', '<h2>$title</h2>');
      const later = new Date(Date.now() + 60_000);
      fs.utimesSync(file, later, later);

      const reloaded = loader.load('header.xml');
      assert.notStrictEqual(reloaded, tmpl);
      assert.strictEqual(reloaded.generate({ title: 'New' }).render(), '<h2>New</h2>');
    });

    it('keeps cached templates when disabled', function () {
      const loader = new TemplateLoader({ searchPath: files.dir });
      const tmpl = loader.load('header.xml');
      const file = files.write('header.xml', '<h2/>');
      const later = new Date(Date.now() + 60_000);
      fs.utimesSync(file, later, later);
      assert.strictEqual(loader.load('header.xml'), tmpl);
    });
  });
});

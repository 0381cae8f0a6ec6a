import { assert } from 'chai';

import {
  escapeMarkup,
  unescapeMarkup,
} from '../src/html-utils.js';

describe('markup escaping', function () {
  describe('escapeMarkup', function () {
    it('should escape tags and double quotes', function () {
      assert.strictEqual(escapeMarkup('<script>alert("XSS")</script>'), '&lt;script&gt;alert(&quot;XSS&quot;)&lt;/script&gt;');
    });

    it('should escape comparison and ampersand characters', function () {
      assert.strictEqual(escapeMarkup('5 > 3 & 2 < 4'), '5 &gt; 3 &amp; 2 &lt; 4');
    });

    it('should leave quotes alone in text context', function () {
      assert.strictEqual(escapeMarkup('"a" & \'b\'', false), '"a" &amp; \'b\'');
    });

    it('should handle empty string and unicode input', function () {
      assert.strictEqual(escapeMarkup(''), '');
      assert.strictEqual(escapeMarkup('äöü 😀'), 'äöü 😀');
    });
  });

  describe('unescapeMarkup', function () {
    it('should unescape the predefined entities', function () {
      assert.strictEqual(unescapeMarkup('&lt;div&gt;Hello &amp; &quot;World&quot;&apos;&lt;/div&gt;'), '<div>Hello & "World"\'</div>');
    });

    it('should decode character references', function () {
      assert.strictEqual(unescapeMarkup('&#65;&#x42;&#X43;'), 'ABC');
    });

    it('should keep unknown entities and invalid references', function () {
      assert.strictEqual(unescapeMarkup('&nbsp;&#0;'), '&nbsp;&#0;');
    });

    it('should be inverse of escapeMarkup for typical inputs', function () {
      const original = '<p class="x">Me & You</p>';
      assert.strictEqual(unescapeMarkup(escapeMarkup(original)), original);
    });

    it('should leave plain strings unchanged', function () {
      assert.strictEqual(unescapeMarkup('plain'), 'plain');
    });
  });
});

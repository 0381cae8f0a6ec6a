import { assert } from 'chai';

import {
  LOG_LEVEL_ENV,
  TemplateConfigError,
  parseLoaderOptions,
  parseTemplateOptions,
  resolveLogLevel,
} from '../src/config.js';

describe('config', function () {
  describe('template options', function () {
    it('applies defaults', function () {
      assert.deepEqual(parseTemplateOptions({}), {
        filename: '<string>',
        stripWhitespace: true,
        lookupErrors: 'lenient',
      });
      assert.deepEqual(parseTemplateOptions(undefined), parseTemplateOptions({}));
    });

    it('returns frozen configuration', function () {
      assert.isTrue(Object.isFrozen(parseTemplateOptions({ filename: 'a.xml' })));
    });

    it('rejects unknown keys and invalid values', function () {
      try {
        parseTemplateOptions({ lookupErrors: 'loud', extra: 1 });
        assert.fail('expected a config error');
      } catch (err) {
        assert.instanceOf(err, TemplateConfigError);
        assert.strictEqual(err.message, 'Invalid template options: 2 validation error(s)');
        assert.sameMembers(err.issues.map((i) => i.code), [ 'invalid_enum_value', 'unrecognized_keys' ]);
        const lines = err.format().split('\n');
        assert.strictEqual(lines[0], 'Configuration validation failed:');
        assert.include(lines, '  - lookupErrors: ' + err.issues.filter((i) => i.code === 'invalid_enum_value')[0].message);
      }
    });
  });

  describe('loader options', function () {
    it('accepts a single search path directory', function () {
      const config = parseLoaderOptions({ searchPath: 'templates' });
      assert.deepEqual(config.searchPath, [ 'templates' ]);
      assert.isFalse(config.autoReload);
      assert.strictEqual(config.encoding, 'utf8');
    });

    it('does not take a filename', function () {
      assert.throws(() => parseLoaderOptions({ filename: 'x.xml' }), TemplateConfigError, 'Invalid loader options');
    });
  });

  describe('log level', function () {
    it('reads the level from the environment', function () {
      assert.strictEqual(resolveLogLevel({ [LOG_LEVEL_ENV]: 'DEBUG' }), 'debug');
      assert.strictEqual(resolveLogLevel({ [LOG_LEVEL_ENV]: 'silent' }), 'silent');
    });

    it('defaults to warn', function () {
      assert.strictEqual(resolveLogLevel({}), 'warn');
      assert.strictEqual(resolveLogLevel({ [LOG_LEVEL_ENV]: '' }), 'warn');
    });

    it('rejects unknown levels', function () {
      assert.throws(() => resolveLogLevel({ [LOG_LEVEL_ENV]: 'verbose' }), TemplateConfigError,
        'Invalid MARKWEAVE_LOG_LEVEL value "verbose"');
    });
  });
});

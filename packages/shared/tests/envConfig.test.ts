import assert from 'node:assert/strict';
import { test } from 'node:test';
import { z } from 'zod';

import {
  EnvConfigError,
  booleanVar,
  integerVar,
  loadEnvConfig,
  numberVar,
  stringListVar,
  stringVar
} from '../src/index';

const schema = z.object({
  ENABLED: booleanVar({ defaultValue: true }),
  MAX_ENTRIES: integerVar({ defaultValue: 16, min: 1, max: 64 }),
  RATIO: numberVar({ defaultValue: 0.5 }),
  LEVEL: stringVar({ defaultValue: 'info', lowercase: true, allowed: ['info', 'debug'] }),
  PALETTE: stringListVar({ defaultValue: ['gray', 'red'], minLength: 2 })
});

test('loadEnvConfig falls back to defaults for unset and blank variables', () => {
  const config = loadEnvConfig(schema, { env: { RATIO: '   ' } });
  assert.deepEqual(config, {
    ENABLED: true,
    MAX_ENTRIES: 16,
    RATIO: 0.5,
    LEVEL: 'info',
    PALETTE: ['gray', 'red']
  });
});

test('loadEnvConfig parses provided values', () => {
  const config = loadEnvConfig(schema, {
    env: {
      ENABLED: 'off',
      MAX_ENTRIES: ' 32 ',
      RATIO: '1.25',
      LEVEL: 'DEBUG',
      PALETTE: 'blue, green,  yellow'
    }
  });
  assert.equal(config.ENABLED, false);
  assert.equal(config.MAX_ENTRIES, 32);
  assert.equal(config.RATIO, 1.25);
  assert.equal(config.LEVEL, 'debug');
  assert.deepEqual(config.PALETTE, ['blue', 'green', 'yellow']);
});

test('loadEnvConfig reports every invalid variable at once', () => {
  assert.throws(
    () =>
      loadEnvConfig(schema, {
        context: 'test',
        env: { ENABLED: 'maybe', MAX_ENTRIES: '2.5', LEVEL: 'trace', PALETTE: 'red' }
      }),
    (error: unknown) => {
      assert.ok(error instanceof EnvConfigError);
      assert.deepEqual(error.issues, [
        "ENABLED: Invalid ENABLED. Accepted boolean values: '1', 'true', 'yes', 'on', '0', 'false', 'no', 'off'",
        'MAX_ENTRIES: Expected MAX_ENTRIES to be an integer',
        'LEVEL: LEVEL must be one of info, debug',
        'PALETTE: PALETTE must list at least 2 entries'
      ]);
      assert.ok(error.message.startsWith('[test] Invalid environment configuration'));
      return true;
    }
  );
});

test('integerVar enforces bounds and required variables', () => {
  const bounded = z.object({
    SIZE: integerVar({ min: 1, max: 4 }),
    TOKEN: stringVar({ required: true })
  });
  assert.throws(
    () => loadEnvConfig(bounded, { env: { SIZE: '9' } }),
    (error: unknown) => {
      assert.ok(error instanceof EnvConfigError);
      assert.deepEqual(error.issues, ['SIZE: SIZE must be <= 4', 'TOKEN: Missing required TOKEN']);
      return true;
    }
  );
});

test('stringListVar yields an empty list when unset without a default', () => {
  const config = loadEnvConfig(z.object({ TAGS: stringListVar() }), { env: {} });
  assert.deepEqual(config.TAGS, []);
});

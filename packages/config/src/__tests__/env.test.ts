import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import { loadEnv } from '../env.js';

void describe('loadEnv', () => {
  void it('applies defaults for an empty environment', () => {
    assert.deepEqual(loadEnv({}), {
      nodeEnv: 'development',
      logLevel: 'info',
      strictExit: false,
    });
  });

  void it('reads trimmed values', () => {
    const env = loadEnv({ NODE_ENV: ' production ', LOG_LEVEL: 'warn', REVIEWS_STRICT_EXIT: 'YES' });
    assert.equal(env.nodeEnv, 'production');
    assert.equal(env.logLevel, 'warn');
    assert.equal(env.strictExit, true);
  });

  void it('treats a blank strict flag as unset', () => {
    assert.equal(loadEnv({ REVIEWS_STRICT_EXIT: '   ' }).strictExit, false);
    assert.equal(loadEnv({ REVIEWS_STRICT_EXIT: 'off' }).strictExit, false);
  });

  void it('rejects unknown values', () => {
    assert.throws(() => loadEnv({ NODE_ENV: 'qa' }), { message: 'Invalid NODE_ENV: qa' });
    assert.throws(() => loadEnv({ LOG_LEVEL: 'trace' }), { message: 'Invalid LOG_LEVEL: trace' });
    assert.throws(() => loadEnv({ REVIEWS_STRICT_EXIT: 'maybe' }), {
      message: 'Invalid REVIEWS_STRICT_EXIT: maybe',
    });
  });
});

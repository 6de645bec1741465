import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import { MAX_LOGGED_TEXT_LENGTH, redactDeep } from '../redaction.js';

void describe('redactDeep', () => {
  void it('masks reviewer identity keys at any depth', () => {
    const out = redactDeep(
      { review: { email: 'reader@example.com', reviewer_name: 'Sam', rating: 4 } },
      'test'
    );
    assert.deepEqual(out, {
      review: { email: '[REDACTED_PII]', reviewer_name: '[REDACTED_PII]', rating: 4 },
    });
  });

  void it('masks bare email values under unrelated keys', () => {
    assert.deepEqual(redactDeep({ contact: 'jane.doe@example.com' }, 'test'), {
      contact: 'j***@***.com',
    });
  });

  void it('shortens long review text', () => {
    const text = 'a'.repeat(MAX_LOGGED_TEXT_LENGTH + 50);
    assert.deepEqual(redactDeep({ text }, 'development'), {
      text: `${'a'.repeat(MAX_LOGGED_TEXT_LENGTH)}… [50 more chars]`,
    });
  });

  void it('keeps full stacks outside production', () => {
    const error = new Error('boom');
    error.stack = 'Error: boom\n    at one\n    at two\n    at three';
    assert.deepEqual(redactDeep(error, 'staging'), {
      name: 'Error',
      message: 'boom',
      stack: 'Error: boom\n    at one\n    at two\n    at three',
    });
  });

  void it('truncates stacks to three lines in production', () => {
    const error = new Error('boom');
    error.stack = 'Error: boom\n    at one\n    at two\n    at three';
    assert.deepEqual(redactDeep({ error }, 'production'), {
      error: { name: 'Error', message: 'boom', stack: 'Error: boom\n    at one\n    at two' },
    });
  });

  void it('passes primitives and null through', () => {
    assert.deepEqual(redactDeep({ count: 3, ok: true, missing: null }, 'test'), {
      count: 3,
      ok: true,
      missing: null,
    });
  });
});

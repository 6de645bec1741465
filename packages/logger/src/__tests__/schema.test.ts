import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import { createLogger } from '../schema.js';

function captureLogger(level: 'debug' | 'info' | 'warn' = 'debug') {
  const lines: Record<string, unknown>[] = [];
  const logger = createLogger({
    service: 'review-enhancer-test',
    env: 'test',
    level,
    version: '1.2.3',
    destination: {
      write: (msg: string) => {
        lines.push(JSON.parse(msg));
      },
    },
  });
  return { logger, lines };
}

void describe('createLogger', () => {
  void it('writes one JSON line with base fields and snake_case context', () => {
    const { logger, lines } = captureLogger();
    logger.info({ filePath: 'data/Reviews1.json', updatedCount: 2 }, 'file processed');

    assert.equal(lines.length, 1);
    const line = lines[0];
    assert.ok(line);
    assert.equal(line['level'], 'info');
    assert.equal(line['message'], 'file processed');
    assert.equal(line['service'], 'review-enhancer-test');
    assert.equal(line['env'], 'test');
    assert.equal(line['version'], '1.2.3');
    assert.equal(line['file_path'], 'data/Reviews1.json');
    assert.equal(line['updated_count'], 2);
    assert.equal(typeof line['timestamp'], 'string');
  });

  void it('merges child context and redacts reviewer identity', () => {
    const { logger, lines } = captureLogger();
    logger.child({ runId: 'run-1' }).warn({ reviewerName: 'Sam' }, 'non-object review');

    assert.equal(lines.length, 1);
    assert.equal(lines[0]?.['run_id'], 'run-1');
    assert.equal(lines[0]?.['reviewer_name'], '[REDACTED_PII]');
    assert.equal(lines[0]?.['level'], 'warn');
  });

  void it('drops events below the configured level', () => {
    const { logger, lines } = captureLogger('warn');
    logger.debug({}, 'scan started');
    logger.info({}, 'file processed');
    logger.error({}, 'write failed');

    assert.deepEqual(
      lines.map((l) => l['message']),
      ['write failed']
    );
  });
});

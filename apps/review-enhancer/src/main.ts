#!/usr/bin/env -S node --import tsx
import 'dotenv/config';

import { loadEnv } from '@reviews/config';
import { createLogger } from '@reviews/logger';

import { USAGE, parseCli } from './cli.js';
import { exitCodeFor, runReviewEnhancer } from './run.js';
import { stdoutReporter } from './status.js';

const env = loadEnv();
const logger = createLogger({
  service: 'review-enhancer',
  env: env.nodeEnv,
  level: env.logLevel,
});

const cli = parseCli(process.argv.slice(2));

if (cli.help) {
  stdoutReporter.line(USAGE);
} else {
  try {
    const result = await runReviewEnhancer({
      directory: cli.directory,
      report: stdoutReporter,
      logger,
    });
    process.exitCode = exitCodeFor(result, { strictExit: env.strictExit });
  } catch (error) {
    logger.fatal({ error, directory: cli.directory }, 'review enhancer run failed');
    process.exitCode = 1;
  }
}

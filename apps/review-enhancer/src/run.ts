import type { Logger } from '@reviews/logger';

import { findReviewFiles } from './files/review-files.js';
import { processReviewFile } from './reviews/process-file.js';
import type { StatusReporter } from './status.js';

export const DEFAULT_REVIEWS_DIRECTORY = 'data';

export type RunOptions = Readonly<{
  directory: string;
  report: StatusReporter;
  logger: Logger;
}>;

export type FileOutcome = Readonly<{
  filePath: string;
  ok: boolean;
}>;

export type RunResult = Readonly<{
  directory: string;
  total: number;
  succeeded: number;
  failed: number;
  files: readonly FileOutcome[];
}>;

export async function runReviewEnhancer(options: RunOptions): Promise<RunResult> {
  const { directory, report } = options;
  const logger = options.logger.child({ directory });

  const reviewFiles = await findReviewFiles(directory);

  if (reviewFiles.length === 0) {
    report.line(`No Review files found in directory '${directory}'`);
    logger.info({}, 'no review files found');
    return { directory, total: 0, succeeded: 0, failed: 0, files: [] };
  }

  report.line(`Found ${reviewFiles.length} Review files to process:`);
  for (const filePath of reviewFiles) {
    report.line(`  - ${filePath}`);
  }
  report.line();
  logger.debug({ fileCount: reviewFiles.length }, 'review files located');

  // One file at a time, in located order.
  const files: FileOutcome[] = [];
  for (const filePath of reviewFiles) {
    const ok = await processReviewFile(filePath, { report, logger });
    files.push({ filePath, ok });
  }

  const succeeded = files.filter((f) => f.ok).length;
  const total = files.length;

  report.line();
  report.line(`Processing complete. Successfully updated ${succeeded}/${total} files.`);
  logger.info({ total, succeeded, failed: total - succeeded }, 'review enhancer run finished');

  return { directory, total, succeeded, failed: total - succeeded, files };
}

export function exitCodeFor(result: RunResult, policy: Readonly<{ strictExit: boolean }>): number {
  return policy.strictExit && result.failed > 0 ? 1 : 0;
}

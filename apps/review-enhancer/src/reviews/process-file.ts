import type { Logger } from '@reviews/logger';

import { describeReviewFileError, toReviewFileError } from '../errors.js';
import { readReviewFile, writeReviewFile } from '../files/review-files.js';
import type { StatusReporter } from '../status.js';
import { augmentReviews } from './augment.js';

export type ProcessReviewFileDeps = Readonly<{
  report: StatusReporter;
  logger: Logger;
}>;

/**
 * Decode, augment and rewrite one review file. Never throws: every failure is
 * reported and turned into `false`, leaving the file as it was on disk.
 */
export async function processReviewFile(
  filePath: string,
  deps: ProcessReviewFileDeps
): Promise<boolean> {
  const logger = deps.logger.child({ filePath });

  try {
    const decoded = await readReviewFile(filePath);

    const result = augmentReviews(decoded, { filePath, report: deps.report, logger });
    if (result.kind === 'skipped') {
      return false;
    }

    await writeReviewFile(filePath, result.reviews);

    deps.report.line(`Successfully processed ${filePath}: Updated ${result.updated} reviews.`);
    logger.info({ updatedCount: result.updated, totalCount: result.reviews.length }, 'review file updated');
    return true;
  } catch (error) {
    const failure = toReviewFileError(error, filePath);
    deps.report.line(describeReviewFileError(failure));
    logger.error({ kind: failure.kind, error: failure }, 'review file failed');
    return false;
  }
}

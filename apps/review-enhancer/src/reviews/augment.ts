import type { Logger } from '@reviews/logger';

import type { StatusReporter } from '../status.js';
import { describeJsonType, isReviewList, isReviewRecord } from './schema.js';
import { countWords } from './word-count.js';

export const WORD_COUNT_FIELD = 'wordCount';
export const TEXT_FIELD = 'text';

export type AugmentContext = Readonly<{
  filePath: string;
  report: StatusReporter;
  logger: Logger;
}>;

export type AugmentResult =
  | Readonly<{ kind: 'augmented'; reviews: unknown[]; updated: number }>
  | Readonly<{ kind: 'skipped'; reason: 'not-a-list' }>;

/**
 * Sets `wordCount` on every object in a decoded review file. The list is
 * updated in place; elements that are not objects stay where they are,
 * untouched, and are not counted.
 */
export function augmentReviews(value: unknown, ctx: AugmentContext): AugmentResult {
  if (!isReviewList(value)) {
    ctx.report.line(`Warning: ${ctx.filePath} does not contain a list of reviews. Skipping.`);
    ctx.logger.warn({ topLevelType: describeJsonType(value) }, 'review file is not a list');
    return { kind: 'skipped', reason: 'not-a-list' };
  }

  let updated = 0;
  value.forEach((review, index) => {
    if (!isReviewRecord(review)) {
      ctx.report.line(`Warning: Found non-object review in ${ctx.filePath}. Skipping.`);
      ctx.logger.warn(
        { index, elementType: describeJsonType(review), element: review },
        'non-object review left as-is'
      );
      return;
    }

    review[WORD_COUNT_FIELD] = countWords(review[TEXT_FIELD] ?? null);
    updated += 1;
  });

  return { kind: 'augmented', reviews: value, updated };
}

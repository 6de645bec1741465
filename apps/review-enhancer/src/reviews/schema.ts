import { z } from 'zod';

export const ReviewRecordSchema = z.record(z.string(), z.unknown());

export const ReviewFileSchema = z.array(z.unknown());

export type ReviewRecord = z.infer<typeof ReviewRecordSchema>;

export type JsonTypeName = 'array' | 'object' | 'string' | 'number' | 'boolean' | 'null';

// Guards only: parsed output is a copy, and records are updated in place.
export function isReviewList(value: unknown): value is unknown[] {
  return ReviewFileSchema.safeParse(value).success;
}

export function isReviewRecord(value: unknown): value is ReviewRecord {
  return ReviewRecordSchema.safeParse(value).success;
}

export function describeJsonType(value: unknown): JsonTypeName {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  switch (typeof value) {
    case 'string':
      return 'string';
    case 'number':
      return 'number';
    case 'boolean':
      return 'boolean';
    default:
      return 'object';
  }
}

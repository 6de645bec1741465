import { access, readdir, readFile, realpath, rename, rm, stat, writeFile } from 'node:fs/promises';
import { constants, type Dirent } from 'node:fs';
import * as path from 'node:path';

import { ReviewFileDecodeError, ReviewFileIoError, isErrnoException } from '../errors.js';

export const REVIEW_FILE_PREFIX = 'Reviews';
export const REVIEW_FILE_SUFFIX = '.json';

export const JSON_INDENT = 2;

export function isReviewFileName(name: string): boolean {
  return name.startsWith(REVIEW_FILE_PREFIX) && name.endsWith(REVIEW_FILE_SUFFIX);
}

/**
 * Lists `Reviews*.json` entries directly inside `directory`, sorted by path.
 * A missing directory (or a path that is not one) yields an empty list.
 */
export async function findReviewFiles(directory: string): Promise<string[]> {
  let entries: Dirent[];
  try {
    entries = await readdir(directory === '' ? '.' : directory, { withFileTypes: true });
  } catch (error) {
    if (isErrnoException(error) && (error.code === 'ENOENT' || error.code === 'ENOTDIR')) {
      return [];
    }
    throw error;
  }

  return entries
    .filter((ent) => (ent.isFile() || ent.isSymbolicLink()) && isReviewFileName(ent.name))
    .map((ent) => path.join(directory, ent.name))
    .sort();
}

export async function readReviewFile(filePath: string): Promise<unknown> {
  let bytes: Buffer;
  try {
    bytes = await readFile(filePath);
  } catch (error) {
    throw new ReviewFileIoError({ filePath, operation: 'read', cause: error });
  }

  try {
    // fatal: invalid UTF-8 throws instead of decoding to U+FFFD.
    const raw = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true }).decode(bytes);
    const decoded: unknown = JSON.parse(raw);
    return decoded;
  } catch (error) {
    throw new ReviewFileDecodeError({ filePath, cause: error });
  }
}

export function encodeReviews(reviews: readonly unknown[]): string {
  return JSON.stringify(reviews, null, JSON_INDENT);
}

/**
 * Replaces the file's contents in one step: the encoding goes to a sibling
 * temp file which is then renamed over the target. Symlinks are followed so
 * the link itself survives, and the original permission bits are kept. A
 * target the caller may not write to fails with EACCES before anything is
 * written.
 */
export async function writeReviewFile(filePath: string, reviews: readonly unknown[]): Promise<void> {
  const payload = encodeReviews(reviews);

  let tmpPath: string | null = null;
  try {
    const target = await realpath(filePath);
    await access(target, constants.W_OK);
    const { mode } = await stat(target);
    tmpPath = path.join(path.dirname(target), `.${path.basename(target)}.${process.pid}.tmp`);

    await writeFile(tmpPath, payload, { encoding: 'utf8', mode: mode & 0o777 });
    await rename(tmpPath, target);
    tmpPath = null;
  } catch (error) {
    if (tmpPath) await rm(tmpPath, { force: true });
    throw new ReviewFileIoError({ filePath, operation: 'write', cause: error });
  }
}

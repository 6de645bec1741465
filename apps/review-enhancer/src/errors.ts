export type ReviewFileErrorKind = 'decode' | 'io' | 'unexpected';

export type ReviewFileIoOperation = 'read' | 'write' | 'other';

export class ReviewFileError extends Error {
  public readonly kind: ReviewFileErrorKind;
  public readonly filePath: string;

  constructor(options: {
    kind: ReviewFileErrorKind;
    filePath: string;
    message: string;
    cause?: unknown;
  }) {
    super(options.message, { cause: options.cause });
    Object.setPrototypeOf(this, ReviewFileError.prototype);
    this.name = 'ReviewFileError';
    this.kind = options.kind;
    this.filePath = options.filePath;
  }
}

export class ReviewFileDecodeError extends ReviewFileError {
  constructor(options: { filePath: string; cause: unknown }) {
    super({
      kind: 'decode',
      filePath: options.filePath,
      message: errorMessage(options.cause),
      cause: options.cause,
    });
    Object.setPrototypeOf(this, ReviewFileDecodeError.prototype);
    this.name = 'ReviewFileDecodeError';
  }
}

export class ReviewFileIoError extends ReviewFileError {
  public readonly operation: ReviewFileIoOperation;
  public readonly code?: string;

  constructor(options: { filePath: string; operation: ReviewFileIoOperation; cause: unknown }) {
    super({
      kind: 'io',
      filePath: options.filePath,
      message: errorMessage(options.cause),
      cause: options.cause,
    });
    Object.setPrototypeOf(this, ReviewFileIoError.prototype);
    this.name = 'ReviewFileIoError';
    this.operation = options.operation;
    if (isErrnoException(options.cause) && options.cause.code) {
      this.code = options.cause.code;
    }
  }
}

export class UnexpectedReviewFileError extends ReviewFileError {
  constructor(options: { filePath: string; cause: unknown }) {
    super({
      kind: 'unexpected',
      filePath: options.filePath,
      message: errorMessage(options.cause),
      cause: options.cause,
    });
    Object.setPrototypeOf(this, UnexpectedReviewFileError.prototype);
    this.name = 'UnexpectedReviewFileError';
  }
}

export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error && typeof error.code === 'string';
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

/**
 * Normalises anything thrown while handling one review file. Errors that
 * already carry a kind pass through; bare filesystem errors become I/O
 * failures and everything else is unexpected.
 */
export function toReviewFileError(error: unknown, filePath: string): ReviewFileError {
  if (error instanceof ReviewFileError) return error;
  if (isErrnoException(error)) {
    return new ReviewFileIoError({ filePath, operation: 'other', cause: error });
  }
  return new UnexpectedReviewFileError({ filePath, cause: error });
}

export function describeReviewFileError(error: ReviewFileError): string {
  switch (error.kind) {
    case 'decode':
      return `Error parsing JSON in ${error.filePath}: ${error.message}`;
    case 'io':
      return `Error processing file ${error.filePath}: ${error.message}`;
    case 'unexpected':
      return `Unexpected error processing ${error.filePath}: ${error.message}`;
  }
}

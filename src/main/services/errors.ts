/**
 * Error classes for albumsmith
 *
 * Each failure surface of the organizer has its own category so the CLI can
 * log and report failures per track with their context.
 */

/**
 * Error categories.
 * - DefinitionError: album.yaml missing, unreadable or malformed
 * - CoverError: reading, transforming or caching a cover image failed
 * - TagError: reading, writing or verifying an ID3 tag failed
 * - FileError: copying or renaming an audio file failed
 */
export type ErrorCategory = 'DefinitionError' | 'CoverError' | 'TagError' | 'FileError';

interface AlbumErrorOptions {
  filePath?: string;
  step?: string;
  cause?: Error;
}

/**
 * Base class for all albumsmith errors.
 */
export class AlbumError extends Error {
  readonly category: ErrorCategory;
  /** The file being handled when the error occurred (if applicable) */
  readonly filePath: string | null;
  /** The step where the error occurred */
  readonly step: string;
  /** The wrapped error (if any) */
  readonly cause: Error | null;
  readonly timestamp: Date;

  constructor(message: string, category: ErrorCategory, options?: AlbumErrorOptions) {
    super(message);
    this.name = category;
    this.category = category;
    this.filePath = options?.filePath ?? null;
    this.step = options?.step ?? category;
    this.cause = options?.cause ?? null;
    this.timestamp = new Date();

    Object.setPrototypeOf(this, new.target.prototype);
  }

  /**
   * Returns a structured object representation of the error for logging.
   */
  toLogObject(): {
    category: ErrorCategory;
    message: string;
    filePath: string | null;
    step: string;
    timestamp: string;
    cause: string | null;
  } {
    return {
      category: this.category,
      message: this.message,
      filePath: this.filePath,
      step: this.step,
      timestamp: this.timestamp.toISOString(),
      cause: this.cause?.message ?? null,
    };
  }
}

/**
 * Thrown when an album definition cannot be loaded or does not match the
 * expected shape. `issues` lists every problem found, one per entry.
 */
export class DefinitionError extends AlbumError {
  readonly issues: string[];

  constructor(message: string, options?: AlbumErrorOptions & { issues?: string[] }) {
    super(message, 'DefinitionError', { step: 'loading', ...options });
    this.issues = options?.issues ?? [];
  }
}

/** Where in the cover pipeline a `CoverError` happened */
export type CoverErrorReason =
  | 'cache-read'
  | 'unsupported-format'
  | 'source-read'
  | 'transform'
  | 'cache-write';

/**
 * Thrown when a cover exists but cannot be loaded, transformed or cached.
 * A missing cover is not an error.
 */
export class CoverError extends AlbumError {
  readonly reason: CoverErrorReason;

  constructor(message: string, reason: CoverErrorReason, options?: AlbumErrorOptions) {
    super(message, 'CoverError', { step: reason, ...options });
    this.reason = reason;
  }

  override toLogObject(): ReturnType<AlbumError['toLogObject']> & { reason: CoverErrorReason } {
    return {
      ...super.toLogObject(),
      reason: this.reason,
    };
  }
}

/**
 * Thrown when an ID3 tag cannot be read, written or does not match the
 * album definition.
 */
export class TagError extends AlbumError {
  constructor(message: string, options?: AlbumErrorOptions) {
    super(message, 'TagError', { step: 'tagging', ...options });
  }
}

/**
 * Thrown when an audio file cannot be copied or renamed.
 */
export class FileError extends AlbumError {
  constructor(message: string, options?: AlbumErrorOptions) {
    super(message, 'FileError', { step: 'writing', ...options });
  }
}

export function isAlbumError(error: unknown): error is AlbumError {
  return error instanceof AlbumError;
}

/**
 * Wraps any thrown value in an `AlbumError` of the given category.
 * `AlbumError`s are returned unchanged.
 */
export function wrapError(
  error: unknown,
  category: Exclude<ErrorCategory, 'CoverError'>,
  options?: { filePath?: string; step?: string },
): AlbumError {
  if (error instanceof AlbumError) {
    return error;
  }

  const cause = error instanceof Error ? error : new Error(String(error));
  const message = cause.message || 'Unknown error';

  switch (category) {
    case 'DefinitionError':
      return new DefinitionError(message, { ...options, cause });
    case 'TagError':
      return new TagError(message, { ...options, cause });
    case 'FileError':
      return new FileError(message, { ...options, cause });
  }
}

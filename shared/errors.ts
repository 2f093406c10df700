export type FetchErrorKind = 'transient' | 'permanent';

export class FetchError extends Error {
  readonly kind: FetchErrorKind;
  readonly url: string;
  readonly status?: number;
  readonly attempts: number;
  /** Server-requested delay (Retry-After) before the next attempt. */
  readonly retryAfterMs?: number;

  constructor(
    kind: FetchErrorKind,
    url: string,
    message: string,
    options: { status?: number; attempts?: number; retryAfterMs?: number; cause?: unknown } = {},
  ) {
    super(message, { cause: options.cause });
    this.name = 'FetchError';
    this.kind = kind;
    this.url = url;
    this.status = options.status;
    this.attempts = options.attempts ?? 1;
    this.retryAfterMs = options.retryAfterMs;
  }
}

export class ExtractionError extends Error {
  readonly reason = 'unparseable' as const;
  readonly url: string;

  constructor(url: string, message: string) {
    super(message);
    this.name = 'ExtractionError';
    this.url = url;
  }
}

export class MetricsError extends Error {
  readonly reason = 'empty_text' as const;

  constructor(message = 'Text contains no sentences') {
    super(message);
    this.name = 'MetricsError';
  }
}

export class AlignmentError extends Error {
  readonly reason = 'ambiguous_date' as const;
  readonly articleId: string;

  constructor(articleId: string, message: string) {
    super(message);
    this.name = 'AlignmentError';
    this.articleId = articleId;
  }
}

/** Unrecoverable: bad settings or missing credentials. */
export class ConfigurationError extends Error {
  constructor(message: string, options: { cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = 'ConfigurationError';
  }
}

/** Unrecoverable: the cache or output storage cannot be used. */
export class StorageError extends Error {
  readonly path: string;

  constructor(path: string, message: string, options: { cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = 'StorageError';
    this.path = path;
  }
}

export const errorMessage = (error: unknown): string => (error instanceof Error ? error.message : String(error));

export const isFatalError = (error: unknown): error is ConfigurationError | StorageError =>
  error instanceof ConfigurationError || error instanceof StorageError;

export const hasErrorCode = (error: unknown, code: string): boolean =>
  error instanceof Error && 'code' in error && error.code === code;

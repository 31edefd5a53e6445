/**
 * STAC Ingestor Error Types
 *
 * Every failure the core raises is an IngestorError carrying a stable `code`
 * and the HTTP status an adapter should answer with. Validation failures are
 * user-fixable and name every offending input; loader failures are recorded
 * onto ingestion records instead of being thrown at interactive callers.
 */

export type ValidationErrorCode =
  | 'VALIDATION_ERROR'
  | 'ASSET_UNREACHABLE'
  | 'UNKNOWN_COLLECTION'
  | 'SAMPLE_FILE_MISMATCH'
  | 'NO_DATE_FOUND'
  | 'INVALID_TIME_DENSITY';

export type IngestorErrorCode =
  | ValidationErrorCode
  | 'NOT_FOUND'
  | 'INVALID_STATE_TRANSITION'
  | 'INVALID_CURSOR'
  | 'BULK_LOAD_FAILURE'
  | 'PUBLISH_ERROR'
  | 'NUMERIC_PRECISION';

/**
 * A single structural problem in a submitted payload
 */
export interface ValidationIssue {
  /** Dotted path into the payload, empty for the root */
  readonly path: string;
  readonly message: string;
}

export abstract class IngestorError extends Error {
  abstract readonly code: IngestorErrorCode;
  abstract readonly httpStatus: number;

  constructor(message: string, options?: { readonly cause?: unknown }) {
    super(message, options);
    // Maintain proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }

  /**
   * Create a formatted error message for logging
   */
  toLogString(): string {
    const parts = [`${this.name} [${this.code}]: ${this.message}`];
    if (this.cause instanceof Error) {
      parts.push(`  Caused by: ${this.cause.message}`);
    }
    return parts.join('\n');
  }
}

// ============================================================================
// Validation
// ============================================================================

/**
 * Submission rejected before persistence
 */
export class ValidationError extends IngestorError {
  readonly code: ValidationErrorCode = 'VALIDATION_ERROR';
  readonly httpStatus = 422;

  constructor(
    message: string,
    public readonly issues: readonly ValidationIssue[] = [],
    options?: { readonly cause?: unknown }
  ) {
    super(message, options);
    this.name = 'ValidationError';
  }

  override toLogString(): string {
    const lines = [super.toLogString()];
    for (const issue of this.issues) {
      lines.push(`  - ${issue.path || '<root>'}: ${issue.message}`);
    }
    return lines.join('\n');
  }
}

export class AssetUnreachableError extends ValidationError {
  override readonly code: ValidationErrorCode = 'ASSET_UNREACHABLE';

  constructor(
    public readonly href: string,
    public readonly reason: string,
    public readonly statusCode?: number,
    options?: { readonly cause?: unknown }
  ) {
    super(
      `Asset not accessible: ${statusCode !== undefined ? `${statusCode} ` : ''}${reason} (${href})`,
      [{ path: href, message: reason }],
      options
    );
    this.name = 'AssetUnreachableError';
  }
}

/**
 * Several assets of one item failed their probe
 */
export class UnreachableAssetsError extends ValidationError {
  override readonly code: ValidationErrorCode = 'ASSET_UNREACHABLE';

  constructor(public readonly failures: readonly AssetUnreachableError[]) {
    super(
      `${failures.length} assets not accessible: ${failures.map((f) => f.href).join(', ')}`,
      failures.flatMap((failure) => failure.issues)
    );
    this.name = 'UnreachableAssetsError';
  }
}

export class UnknownCollectionError extends ValidationError {
  override readonly code: ValidationErrorCode = 'UNKNOWN_COLLECTION';

  constructor(public readonly collectionId: string, detail?: string) {
    super(
      `Invalid collection '${collectionId}'${detail ? `, ${detail}` : ''}`,
      [{ path: 'collection', message: `collection '${collectionId}' is not registered` }]
    );
    this.name = 'UnknownCollectionError';
  }
}

export class SampleFileMismatchError extends ValidationError {
  override readonly code: ValidationErrorCode = 'SAMPLE_FILE_MISMATCH';

  constructor(public readonly files: readonly string[]) {
    super(
      `Sample files do not match any discovery item: ${files.join(', ')}`,
      files.map((file) => ({
        path: 'sample_files',
        message: `${file} does not match any discovery item`,
      }))
    );
    this.name = 'SampleFileMismatchError';
  }
}

export class NoDateFoundError extends ValidationError {
  override readonly code: ValidationErrorCode = 'NO_DATE_FOUND';

  constructor(public readonly filename: string) {
    super(`No dates found in filename: ${filename}`, [
      { path: filename, message: 'no date found' },
    ]);
    this.name = 'NoDateFoundError';
  }
}

export class InvalidTimeDensityError extends ValidationError {
  override readonly code: ValidationErrorCode = 'INVALID_TIME_DENSITY';

  constructor(
    public readonly isPeriodic: boolean,
    public readonly timeDensity: string | null
  ) {
    super(
      isPeriodic
        ? `Periodic datasets require time_density of day, month or year (got ${timeDensity ?? 'null'})`
        : `Non-periodic datasets must not declare a time_density (got ${timeDensity})`,
      [{ path: 'time_density', message: 'inconsistent with is_periodic' }]
    );
    this.name = 'InvalidTimeDensityError';
  }
}

// ============================================================================
// Lookup and lifecycle
// ============================================================================

export class NotFoundError extends IngestorError {
  readonly code = 'NOT_FOUND';
  readonly httpStatus = 404;

  constructor(
    public readonly resource: string,
    public readonly key: string
  ) {
    super(`No ${resource} found with key ${key}`);
    this.name = 'NotFoundError';
  }
}

export class InvalidStateTransitionError extends IngestorError {
  readonly code = 'INVALID_STATE_TRANSITION';
  readonly httpStatus = 409;

  constructor(
    public readonly from: string,
    public readonly to: string,
    public readonly key?: string
  ) {
    super(`Cannot transition ingestion${key ? ` ${key}` : ''} from ${from} to ${to}`);
    this.name = 'InvalidStateTransitionError';
  }
}

export class InvalidCursorError extends IngestorError {
  readonly code = 'INVALID_CURSOR';
  readonly httpStatus = 422;

  constructor(
    public readonly cursor: string,
    reason: string
  ) {
    super(`Invalid pagination cursor: ${reason}`);
    this.name = 'InvalidCursorError';
  }
}

// ============================================================================
// Catalog store
// ============================================================================

export class BulkLoadFailureError extends IngestorError {
  readonly code = 'BULK_LOAD_FAILURE';
  readonly httpStatus = 502;

  constructor(
    public readonly itemCount: number,
    options: { readonly cause: unknown }
  ) {
    super(
      `Bulk load of ${itemCount} items failed: ${describeError(options.cause)}`,
      options
    );
    this.name = 'BulkLoadFailureError';
  }
}

export class PublishError extends IngestorError {
  readonly code = 'PUBLISH_ERROR';
  readonly httpStatus = 400;

  constructor(
    public readonly collectionId: string,
    reason: string,
    options?: { readonly cause?: unknown }
  ) {
    super(`Failed to publish collection '${collectionId}': ${reason}`, options);
    this.name = 'PublishError';
  }
}

/**
 * Raised by the fast change-feed decoder when a number cannot be represented
 * as a double without rounding
 */
export class NumericPrecisionError extends IngestorError {
  readonly code = 'NUMERIC_PRECISION';
  readonly httpStatus = 500;

  constructor(
    public readonly path: string,
    public readonly literal: string
  ) {
    super(`Number at ${path || '<root>'} loses precision as a double: ${literal}`);
    this.name = 'NumericPrecisionError';
  }
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * Type guard for errors raised by this package
 */
export function isIngestorError(error: unknown): error is IngestorError {
  return error instanceof IngestorError;
}

export function isValidationError(error: unknown): error is ValidationError {
  return error instanceof ValidationError;
}

/**
 * Best-effort human readable message for any thrown value
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

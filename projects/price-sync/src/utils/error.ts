// src/utils/error.ts
import { getLogger } from '../infrastructure/logging';

/**
 * Base application error class
 */
export class AppError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = this.constructor.name;
    // Ensure instanceof works correctly in TypeScript
    Object.setPrototypeOf(this, AppError.prototype);
  }

  /**
   * Get a structured representation of the error for logging
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      details: this.details,
      stack: this.stack
    };
  }
}

/**
 * Invalid or missing configuration
 */
export class ConfigurationError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONFIGURATION_ERROR', details);
    Object.setPrototypeOf(this, ConfigurationError.prototype);
  }
}

/**
 * Vendor API rejected the credentials or returned no token. Never retried.
 */
export class AuthFailure extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'AUTH_FAILURE', details);
    Object.setPrototypeOf(this, AuthFailure.prototype);
  }
}

export interface FetchFailureContext {
  endpoint: string;
  /** Absent for non-paginated calls such as login */
  page?: number;
  priceListId?: number;
  attempts: number;
  status: number | null;
  lastError: string;
}

/**
 * A vendor API request that kept failing after every allowed attempt
 */
export class FetchFailure extends AppError {
  public readonly endpoint: string;
  public readonly page?: number;
  public readonly priceListId?: number;
  public readonly attempts: number;

  constructor(message: string, context: FetchFailureContext, code = 'FETCH_FAILURE') {
    super(message, code, { ...context });
    this.endpoint = context.endpoint;
    this.page = context.page;
    this.priceListId = context.priceListId;
    this.attempts = context.attempts;
    Object.setPrototypeOf(this, FetchFailure.prototype);
  }
}

/**
 * HTTP 429 from the vendor. Retried like any other fetch failure.
 */
export class RateLimitResponse extends FetchFailure {
  constructor(message: string, context: FetchFailureContext) {
    super(message, context, 'RATE_LIMITED');
    Object.setPrototypeOf(this, RateLimitResponse.prototype);
  }
}

/**
 * A page past the configured cap still had data
 */
export class PaginationLimitExceeded extends AppError {
  constructor(endpoint: string, maxPages: number, priceListId?: number) {
    super(
      `Pagination of ${endpoint} found data past ${maxPages} pages`,
      'PAGINATION_LIMIT_EXCEEDED',
      { endpoint, maxPages, priceListId }
    );
    Object.setPrototypeOf(this, PaginationLimitExceeded.prototype);
  }
}

export type MergeInconsistencyKind = 'duplicate-sku' | 'duplicate-price' | 'orphan-price';

/**
 * Data anomaly found while joining articles and prices.
 * Resolved by the merge tie-break rules and only ever logged.
 */
export class MergeInconsistency extends AppError {
  constructor(
    public readonly kind: MergeInconsistencyKind,
    public readonly sku: string,
    public readonly priceListId?: number
  ) {
    super(describeInconsistency(kind, sku, priceListId), 'MERGE_INCONSISTENCY', { kind, sku, priceListId });
    Object.setPrototypeOf(this, MergeInconsistency.prototype);
  }
}

function describeInconsistency(kind: MergeInconsistencyKind, sku: string, priceListId?: number): string {
  switch (kind) {
    case 'duplicate-sku':
      return `SKU ${sku} appears more than once in the catalog, keeping the first occurrence`;
    case 'duplicate-price':
      return `SKU ${sku} has several prices in list ${priceListId}, keeping the last one fetched`;
    case 'orphan-price':
      return `SKU ${sku} has prices but is not in the catalog, dropping it`;
  }
}

/**
 * Spreadsheet API error while writing the output
 */
export class WriteFailure extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'WRITE_FAILURE', details);
    Object.setPrototypeOf(this, WriteFailure.prototype);
  }
}

/**
 * Another run holds the job lock
 */
export class JobLockedError extends AppError {
  constructor(lockFile: string, heldSince: string) {
    super(`Another run holds ${lockFile} since ${heldSince}`, 'JOB_LOCKED', { lockFile, heldSince });
    Object.setPrototypeOf(this, JobLockedError.prototype);
  }
}

/**
 * Global error handler for uncaught exceptions
 */
export function setupGlobalErrorHandlers(): void {
  process.on('uncaughtException', (error) => {
    // Get logger lazily to avoid initialization issues
    const logger = getLogger();
    logger.error('Uncaught Exception', { error: serializeError(error) });
    process.exit(1);
  });

  process.on('unhandledRejection', (reason) => {
    const logger = getLogger();
    logger.error('Unhandled Rejection', { reason: serializeError(reason) });
    process.exit(1);
  });
}

/**
 * Safely serialize an error to a JSON-compatible object
 */
export function serializeError(error: unknown): Record<string, unknown> {
  if (error instanceof AppError) {
    return error.toJSON();
  }

  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      stack: error.stack
    };
  }

  return {
    error: String(error)
  };
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

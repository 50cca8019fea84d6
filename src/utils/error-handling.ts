import { Logger } from './logger';

export type ErrorSeverity = 'low' | 'medium' | 'high' | 'critical';

export interface ErrorContext {
  service: string;
  operation: string;
  metadata?: Record<string, unknown>;
}

export class ServiceError extends Error {
  public readonly code: string;
  public readonly service: string;
  public readonly operation: string;
  public readonly severity: ErrorSeverity;
  public readonly context: ErrorContext;
  public readonly originalError?: Error;
  public readonly timestamp: Date;

  constructor(
    message: string,
    code: string,
    context: ErrorContext,
    originalError?: Error,
    severity: ErrorSeverity = 'medium'
  ) {
    super(message);
    this.name = 'ServiceError';
    this.code = code;
    this.service = context.service;
    this.operation = context.operation;
    this.severity = severity;
    this.context = context;
    this.originalError = originalError;
    this.timestamp = new Date();
  }
}

/**
 * An external price source failed: network error, timeout, non-success status
 * or malformed payload. Always recovered by the caller.
 */
export class SourceUnavailableError extends ServiceError {
  constructor(source: string, reason: string, context: ErrorContext, originalError?: Error) {
    super(`${source} unavailable: ${reason}`, 'SOURCE_UNAVAILABLE', context, originalError, 'low');
    this.name = 'SourceUnavailableError';
  }
}

export class NotFoundError extends ServiceError {
  constructor(message: string, context: ErrorContext) {
    super(message, 'COMMODITY_NOT_FOUND', context, undefined, 'low');
    this.name = 'NotFoundError';
  }
}

export class EmptyInputError extends ServiceError {
  constructor(message: string, context: ErrorContext) {
    super(message, 'NO_PRICE_DATA', context, undefined, 'low');
    this.name = 'EmptyInputError';
  }
}

/**
 * A reference data file was missing or corrupt at startup. The loader continues
 * with an empty table.
 */
export class ConfigLoadError extends ServiceError {
  public readonly filePath: string;

  constructor(filePath: string, context: ErrorContext, originalError?: Error) {
    super(`Failed to load reference data from ${filePath}`, 'CONFIG_LOAD_FAILURE', context, originalError, 'medium');
    this.name = 'ConfigLoadError';
    this.filePath = filePath;
  }
}

export class ValidationError extends ServiceError {
  constructor(message: string, context: ErrorContext) {
    super(message, 'VALIDATION_ERROR', context, undefined, 'low');
    this.name = 'ValidationError';
  }
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

export interface ErrorStats {
  total: number;
  bySeverity: Record<string, number>;
  byService: Record<string, number>;
  byCode: Record<string, number>;
  recentCount: number;
}

const MAX_RECORDED_ERRORS = 1000;
const RECENT_WINDOW_MS = 60 * 60 * 1000;

function countBy(errors: readonly ServiceError[], key: (error: ServiceError) => string): Record<string, number> {
  const counts: Record<string, number> = {};
  for (const error of errors) {
    const bucket = key(error);
    counts[bucket] = (counts[bucket] ?? 0) + 1;
  }
  return counts;
}

export class ErrorHandler {
  private static shared?: ErrorHandler;
  private readonly logger = new Logger('ErrorHandler');
  private recorded: ServiceError[] = [];

  public static getInstance(): ErrorHandler {
    if (!ErrorHandler.shared) {
      ErrorHandler.shared = new ErrorHandler();
    }
    return ErrorHandler.shared;
  }

  /**
   * Keeps the error in a bounded in-memory log and logs it at a level matching
   * its severity.
   */
  public recordError(error: ServiceError): void {
    this.recorded.push(error);
    if (this.recorded.length > MAX_RECORDED_ERRORS) {
      this.recorded.splice(0, this.recorded.length - MAX_RECORDED_ERRORS);
    }

    const metadata = {
      code: error.code,
      service: error.service,
      operation: error.operation,
      severity: error.severity,
      ...error.context.metadata,
      originalError: error.originalError?.message
    };

    if (error.severity === 'low' || error.severity === 'medium') {
      this.logger.warn(error.message, metadata);
    } else {
      this.logger.error(error.message, metadata);
    }
  }

  /**
   * Runs an operation whose failure must not reach the caller. A thrown value is
   * recorded (wrapped in a SourceUnavailableError unless it already is a
   * ServiceError) and the fallback is returned in its place.
   */
  public async withSoftFailure<T>(
    source: string,
    run: () => Promise<T>,
    fallback: T,
    context: ErrorContext
  ): Promise<T> {
    try {
      return await run();
    } catch (thrown) {
      const cause = toError(thrown);
      this.recordError(
        thrown instanceof ServiceError ? thrown : new SourceUnavailableError(source, cause.message, context, cause)
      );
      return fallback;
    }
  }

  public getRecentErrors(limit = 50): ServiceError[] {
    return this.recorded.slice(-limit);
  }

  public getErrorStats(): ErrorStats {
    const since = Date.now() - RECENT_WINDOW_MS;

    return {
      total: this.recorded.length,
      bySeverity: countBy(this.recorded, error => error.severity),
      byService: countBy(this.recorded, error => error.service),
      byCode: countBy(this.recorded, error => error.code),
      recentCount: this.recorded.filter(error => error.timestamp.getTime() > since).length
    };
  }

  public clear(): void {
    this.recorded = [];
  }
}

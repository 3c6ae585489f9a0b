/**
 * Standardized error handling for the hypergraph RAG system
 *
 * Provides the error classes raised at capability boundaries (embedding,
 * generation, storage) together with categorized logging and
 * OperationResult wrappers used by ingestion and the HTTP layer.
 */

/**
 * Error categories for classification and handling
 */
export enum ErrorCategory {
  STORAGE = 'storage',
  EMBEDDING = 'embedding',
  GENERATION = 'generation',
  EXTRACTION = 'extraction',
  SIMPLIFICATION = 'simplification',
  RETRIEVAL = 'retrieval',
  CONFIGURATION = 'configuration',
  VALIDATION = 'validation',
  NETWORK = 'network'
}

/**
 * Error severity levels for prioritization
 */
export enum ErrorSeverity {
  LOW = 'low',
  MEDIUM = 'medium',
  HIGH = 'high',
  CRITICAL = 'critical'
}

/**
 * Base class for every error this library raises on purpose
 */
export class HypergraphRAGError extends Error {
  readonly category: ErrorCategory;

  constructor(message: string, category: ErrorCategory, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'HypergraphRAGError';
    this.category = category;
  }
}

/**
 * The embedding capability failed (network, bad response, count mismatch)
 */
export class EmbeddingError extends HypergraphRAGError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, ErrorCategory.EMBEDDING, options);
    this.name = 'EmbeddingError';
  }
}

/**
 * The text-generation capability failed or returned undecodable output
 */
export class GenerationError extends HypergraphRAGError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, ErrorCategory.GENERATION, options);
    this.name = 'GenerationError';
  }
}

/**
 * Caller supplied malformed input
 */
export class ValidationError extends HypergraphRAGError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, ErrorCategory.VALIDATION, options);
    this.name = 'ValidationError';
  }
}

export class StorageError extends HypergraphRAGError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, ErrorCategory.STORAGE, options);
    this.name = 'StorageError';
  }
}

/**
 * Coerce an unknown thrown value into an Error
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Structured error information
 */
export interface ErrorInfo {
  category: ErrorCategory;
  severity: ErrorSeverity;
  message: string;
  originalError?: Error;
  context?: Record<string, unknown>;
  timestamp: Date;
  recoveryHint?: string;
}

/**
 * Error result for operations that can fail without aborting the caller
 */
export interface ErrorResult<T = unknown> {
  success: false;
  error: ErrorInfo;
  partialData?: T;
}

export interface SuccessResult<T = unknown> {
  success: true;
  data: T;
}

/**
 * Combined result type for fallible operations
 */
export type OperationResult<T = unknown> = SuccessResult<T> | ErrorResult<T>;

/**
 * Retry tuning for wrapOperationWithRetry
 */
export interface RetryOptions {
  /** Total attempts, the first one included */
  maxRetries?: number;
  /** Delay before the second attempt; doubles on each further attempt */
  baseDelayMs?: number;
  /** Failures this rejects end the loop at once */
  shouldRetry?: (error: Error) => boolean;
}

/**
 * Standard error handler with categorization and recovery hints
 */
export class ErrorHandler {
  private static errorCounts = new Map<string, number>();
  private static maxRetries = 3;
  private static baseDelayMs = 1000;

  /**
   * Handle an error with categorization and logging
   */
  static handle(
    category: ErrorCategory,
    severity: ErrorSeverity,
    message: string,
    originalError?: Error,
    context?: Record<string, unknown>,
    recoveryHint?: string
  ): ErrorInfo {
    const errorInfo: ErrorInfo = {
      category,
      severity,
      message,
      originalError,
      context,
      timestamp: new Date(),
      recoveryHint
    };

    this.logError(errorInfo);
    this.trackErrorFrequency(category, message);

    return errorInfo;
  }

  static createErrorResult<T>(
    category: ErrorCategory,
    severity: ErrorSeverity,
    message: string,
    originalError?: Error,
    context?: Record<string, unknown>,
    partialData?: T,
    recoveryHint?: string
  ): ErrorResult<T> {
    const error = this.handle(category, severity, message, originalError, context, recoveryHint);

    return {
      success: false,
      error,
      partialData
    };
  }

  static createSuccessResult<T>(data: T): SuccessResult<T> {
    return {
      success: true,
      data
    };
  }

  /**
   * Wrap an operation so that a failure becomes an ErrorResult
   */
  static async wrapOperation<T>(
    operation: () => Promise<T>,
    category: ErrorCategory,
    operationName: string,
    context?: Record<string, unknown>
  ): Promise<OperationResult<T>> {
    try {
      const result = await operation();
      return this.createSuccessResult(result);
    } catch (error) {
      return this.createErrorResult<T>(
        category,
        ErrorSeverity.MEDIUM,
        `Failed to ${operationName}`,
        toError(error),
        context,
        undefined,
        `Check ${category} configuration and retry`
      );
    }
  }

  /**
   * Wrap an operation with retry and exponential backoff
   */
  static async wrapOperationWithRetry<T>(
    operation: () => Promise<T>,
    category: ErrorCategory,
    operationName: string,
    context?: Record<string, unknown>,
    options: RetryOptions = {}
  ): Promise<OperationResult<T>> {
    const maxRetries = options.maxRetries ?? this.maxRetries;
    const baseDelayMs = options.baseDelayMs ?? this.baseDelayMs;
    let lastError: Error | undefined;
    let attempts = 0;

    for (let attempt = 1; attempt <= maxRetries; attempt++) {
      attempts = attempt;
      try {
        const result = await operation();

        if (attempt > 1) {
          console.log(`✅ ${operationName} succeeded on attempt ${attempt}/${maxRetries}`);
        }

        return this.createSuccessResult(result);
      } catch (error) {
        lastError = toError(error);

        if (options.shouldRetry && !options.shouldRetry(lastError)) {
          break;
        }

        if (attempt < maxRetries) {
          console.warn(`⚠️ ${operationName} failed (attempt ${attempt}/${maxRetries}), retrying...`);
          await this.sleep(Math.pow(2, attempt - 1) * baseDelayMs);
        }
      }
    }

    return this.createErrorResult<T>(
      category,
      ErrorSeverity.HIGH,
      `Failed to ${operationName} after ${attempts} ${attempts === 1 ? 'attempt' : 'attempts'}`,
      lastError,
      { ...context, attempts },
      undefined,
      `Check ${category} configuration and network connectivity`
    );
  }

  /**
   * Unwrap a result, rethrowing the original error on failure
   */
  static unwrap<T>(result: OperationResult<T>): T {
    if (result.success) {
      return result.data;
    }
    throw result.error.originalError ?? new Error(result.error.message);
  }

  private static logError(errorInfo: ErrorInfo): void {
    const emoji = this.getSeverityEmoji(errorInfo.severity);

    const logMessage = [
      `${emoji} [${errorInfo.category.toUpperCase()}] ${errorInfo.message}`,
      `   Severity: ${errorInfo.severity}`,
      `   Time: ${errorInfo.timestamp.toISOString()}`,
      errorInfo.context ? `   Context: ${JSON.stringify(errorInfo.context)}` : '',
      errorInfo.recoveryHint ? `   💡 Hint: ${errorInfo.recoveryHint}` : '',
      errorInfo.originalError ? `   Original: ${errorInfo.originalError.message}` : ''
    ].filter(Boolean).join('\n');

    if (errorInfo.severity === ErrorSeverity.CRITICAL) {
      console.error(logMessage);
    } else if (errorInfo.severity === ErrorSeverity.HIGH) {
      console.warn(logMessage);
    } else {
      console.log(logMessage);
    }
  }

  /**
   * Track error frequency for monitoring
   */
  private static trackErrorFrequency(category: ErrorCategory, message: string): void {
    const key = `${category}:${message}`;
    const currentCount = this.errorCounts.get(key) ?? 0;
    this.errorCounts.set(key, currentCount + 1);

    if (currentCount > 5) {
      console.warn(`🔔 Frequent error detected: ${key} (${currentCount + 1} times)`);
    }
  }

  private static getSeverityEmoji(severity: ErrorSeverity): string {
    switch (severity) {
      case ErrorSeverity.CRITICAL: return '🚨';
      case ErrorSeverity.HIGH: return '⚠️';
      case ErrorSeverity.MEDIUM: return '⚡';
      case ErrorSeverity.LOW: return 'ℹ️';
    }
  }

  private static sleep(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
  }

  static getErrorStats(): Record<string, number> {
    return Object.fromEntries(this.errorCounts.entries());
  }

  static resetErrorStats(): void {
    this.errorCounts.clear();
  }
}

/**
 * Canonical Error Types
 *
 * Single source of truth for the analyzer's error taxonomy. Config builds
 * before core, so the classes live here where both can import them.
 *
 * Recoverable:
 * - DataSourceError: snapshot or block fetch failed, cycle continues on cached data
 * - EnhancementError: scoring stage failed, unmodified opportunities pass through
 * - DispatchError: alert send failed, counted and not retried
 *
 * Fatal:
 * - ConfigurationError: invalid thresholds or caps at startup
 */

// =============================================================================
// Error Codes
// =============================================================================

export enum ErrorCode {
  // General errors (1000-1999)
  UNKNOWN_ERROR = 1000,
  INVALID_ARGUMENT = 1001,
  INVALID_STATE = 1005,

  // Data source errors (2000-2999)
  DATA_SOURCE_FAILED = 2000,
  DATA_SOURCE_TIMEOUT = 2001,
  BLOCK_SOURCE_FAILED = 2002,

  // Scoring errors (3000-3999)
  ENHANCEMENT_FAILED = 3000,
  ENHANCEMENT_INVALID_RESULT = 3001,
  DETECTION_FAILED = 3002,

  // Dispatch errors (4000-4999)
  DISPATCH_FAILED = 4000,
  DISPATCH_TIMEOUT = 4001,

  // Validation errors (6000-6999)
  VALIDATION_FAILED = 6000,
  INVALID_CONFIG = 6002,

  // Service lifecycle errors (7000-7999)
  SERVICE_ALREADY_RUNNING = 7001,
  SHUTDOWN_TIMEOUT = 7003,
  CYCLE_FAILED = 7005
}

export enum ErrorSeverity {
  /** Informational - expected errors that don't require action */
  INFO = 'info',
  /** Warning - unexpected but recoverable errors */
  WARNING = 'warning',
  /** Error - failures that may impact functionality */
  ERROR = 'error',
  /** Critical - severe failures requiring immediate attention */
  CRITICAL = 'critical'
}

interface AnalyzerErrorOptions {
  severity?: ErrorSeverity;
  context?: Record<string, unknown>;
  cause?: Error;
}

// =============================================================================
// Base Error
// =============================================================================

/**
 * Base error class for the analyzer.
 * Carries structured information for logging and the health endpoint.
 *
 * @example
 * ```typescript
 * throw new AnalyzerError('Ledger rejected entry', ErrorCode.INVALID_STATE, {
 *   context: { poolId },
 * });
 * ```
 */
export class AnalyzerError extends Error {
  readonly code: ErrorCode;
  readonly severity: ErrorSeverity;
  readonly timestamp: number;
  readonly context?: Record<string, unknown>;
  readonly cause?: Error;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.UNKNOWN_ERROR,
    options: AnalyzerErrorOptions = {}
  ) {
    super(message);
    this.name = 'AnalyzerError';
    this.code = code;
    this.severity = options.severity ?? ErrorSeverity.ERROR;
    this.timestamp = Date.now();
    this.context = options.context;
    this.cause = options.cause;

    // Ensure instanceof works correctly across module boundaries
    Object.setPrototypeOf(this, new.target.prototype);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      severity: this.severity,
      timestamp: this.timestamp,
      context: this.context,
      cause: this.cause?.message,
      stack: this.stack
    };
  }
}

// =============================================================================
// Taxonomy
// =============================================================================

/**
 * Snapshot or block reference fetch failed.
 * Recovered by falling back to cached snapshots.
 */
export class DataSourceError extends AnalyzerError {
  readonly source: string;

  constructor(
    message: string,
    source: string,
    options: { code?: ErrorCode; cause?: Error; context?: Record<string, unknown> } = {}
  ) {
    super(message, options.code ?? ErrorCode.DATA_SOURCE_FAILED, {
      severity: ErrorSeverity.WARNING,
      cause: options.cause,
      context: { ...options.context, source }
    });
    this.name = 'DataSourceError';
    this.source = source;
  }
}

/**
 * Score enhancement (correlation or external reasoning) failed.
 * Recovered by passing the detector output through unmodified.
 */
export class EnhancementError extends AnalyzerError {
  readonly opportunityId?: string;

  constructor(
    message: string,
    options: { code?: ErrorCode; opportunityId?: string; cause?: Error; context?: Record<string, unknown> } = {}
  ) {
    super(message, options.code ?? ErrorCode.ENHANCEMENT_FAILED, {
      severity: ErrorSeverity.WARNING,
      cause: options.cause,
      context: { ...options.context, opportunityId: options.opportunityId }
    });
    this.name = 'EnhancementError';
    this.opportunityId = options.opportunityId;
  }
}

/**
 * Alert send failed. Logged and counted, never retried within the cycle.
 */
export class DispatchError extends AnalyzerError {
  readonly opportunityId: string;

  constructor(
    message: string,
    opportunityId: string,
    options: { code?: ErrorCode; cause?: Error; context?: Record<string, unknown> } = {}
  ) {
    super(message, options.code ?? ErrorCode.DISPATCH_FAILED, {
      severity: ErrorSeverity.WARNING,
      cause: options.cause,
      context: { ...options.context, opportunityId }
    });
    this.name = 'DispatchError';
    this.opportunityId = opportunityId;
  }
}

/**
 * Invalid threshold or cap values. Fatal: the scheduler must not start.
 */
export class ConfigurationError extends AnalyzerError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(message, ErrorCode.INVALID_CONFIG, {
      severity: ErrorSeverity.CRITICAL,
      context: { issues }
    });
    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}

/**
 * Invalid input (external alert payloads, malformed snapshots).
 */
export class ValidationError extends AnalyzerError {
  readonly field?: string;

  constructor(message: string, options: { field?: string; context?: Record<string, unknown> } = {}) {
    super(message, ErrorCode.VALIDATION_FAILED, {
      severity: ErrorSeverity.WARNING,
      context: { ...options.context, field: options.field }
    });
    this.name = 'ValidationError';
    this.field = options.field;
  }
}

/**
 * Timeout error for async operations that exceed their time limit.
 *
 * @example
 * ```typescript
 * throw new TimeoutError('snapshot fetch', 5000, 'mev-analyzer');
 * ```
 */
export class TimeoutError extends Error {
  constructor(
    /** What operation timed out */
    public readonly operation: string,
    /** The timeout duration in milliseconds */
    public readonly timeoutMs: number,
    /** Optional service name for context */
    public readonly service?: string
  ) {
    super(`Timeout: ${operation} exceeded ${timeoutMs}ms${service ? ` in ${service}` : ''}`);
    this.name = 'TimeoutError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Standardized error types for sortbench.
 *
 * All errors extend from SortbenchError, providing:
 * - Error code for programmatic handling
 * - Cause chaining for debugging
 *
 * ## Usage
 *
 * ```typescript
 * import { BenchmarkError, ConfigError } from './errors.js';
 *
 * throw new BenchmarkError('Unknown algorithm: foo', 'UNKNOWN_ALGORITHM');
 *
 * try {
 *   JSON.parse(text);
 * } catch (err) {
 *   throw new ConfigError('Config file is not valid JSON', 'CONFIG_INVALID', err);
 * }
 * ```
 *
 * @module utils/errors
 */

/**
 * Base error class for all sortbench errors.
 *
 * - `code`: Programmatic error identifier (e.g., 'UNKNOWN_ALGORITHM')
 * - `cause`: Original error that caused this one (for chaining)
 * - `name`: Error class name (e.g., 'ConfigError')
 */
export class SortbenchError extends Error {
  /** Error code for programmatic handling */
  readonly code: string;

  /** Original error that caused this one */
  declare readonly cause?: Error;

  constructor(message: string, code: string, cause?: unknown) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;

    // Normalize cause to Error
    if (cause instanceof Error) {
      this.cause = cause;
    } else if (cause !== undefined) {
      this.cause = new Error(String(cause));
    }

    // Capture stack trace (V8 only)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Get a formatted string including cause chain.
   */
  toDetailedString(): string {
    let result = `${this.name} [${this.code}]: ${this.message}`;

    if (this.cause) {
      result += `\n  Caused by: ${this.cause.message}`;
      if (this.cause instanceof SortbenchError) {
        result += ` [${this.cause.code}]`;
      }
    }

    return result;
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Ordering Errors
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Raised by the natural ordering when two elements have no defined order.
 *
 * Common codes:
 * - `INCOMPARABLE_ELEMENTS`: elements are not both numbers, strings, bigints or dates
 */
export class OrderingError extends SortbenchError {
  constructor(message: string, code: string, cause?: unknown) {
    super(message, code, cause);
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Gap Sequence Errors
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Raised by shellsort when a gap generator breaks the sequence invariant.
 *
 * Common codes:
 * - `INVALID_GAP_SEQUENCE`: gap not a positive integer below the length,
 *   not strictly increasing, or not starting at 1
 */
export class GapSequenceError extends SortbenchError {
  constructor(message: string, code: string, cause?: unknown) {
    super(message, code, cause);
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Benchmark Errors
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Errors from the benchmark harness.
 *
 * Common codes:
 * - `UNKNOWN_ALGORITHM`: requested algorithm id is not registered
 * - `INVALID_INPUT`: input sizes or values cannot be used
 */
export class BenchmarkError extends SortbenchError {
  constructor(message: string, code: string, cause?: unknown) {
    super(message, code, cause);
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Configuration Errors
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Errors in configuration loading or validation.
 *
 * Common codes:
 * - `CONFIG_INVALID`: Configuration validation failed
 */
export class ConfigError extends SortbenchError {
  constructor(message: string, code: string, cause?: unknown) {
    super(message, code, cause);
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Helper Functions
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Check if an error is a sortbench error with a specific code.
 */
export function isErrorWithCode(error: unknown, code: string): boolean {
  return error instanceof SortbenchError && error.code === code;
}

export function isOrderingError(error: unknown): error is OrderingError {
  return error instanceof OrderingError;
}

export function isGapSequenceError(error: unknown): error is GapSequenceError {
  return error instanceof GapSequenceError;
}

export function isBenchmarkError(error: unknown): error is BenchmarkError {
  return error instanceof BenchmarkError;
}

export function isConfigError(error: unknown): error is ConfigError {
  return error instanceof ConfigError;
}

/**
 * Wrap an unknown error in a SortbenchError.
 *
 * If the error is already a SortbenchError, returns it unchanged.
 * Otherwise wraps it in a new SortbenchError with UNKNOWN code.
 */
export function wrapError(error: unknown, message?: string): SortbenchError {
  if (error instanceof SortbenchError) {
    return error;
  }

  const errorMessage = message ?? (error instanceof Error ? error.message : String(error));
  return new SortbenchError(errorMessage, 'UNKNOWN', error);
}

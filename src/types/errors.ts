/**
 * pg-fluent - Error Types
 *
 * Custom error classes for pg-fluent operations.
 */

/**
 * Base error class for pg-fluent
 */
export class SqlError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = "SqlError";
  }
}

/**
 * Execution target is unset. Thrown, never returned as a failure.
 */
export class ConfigurationError extends SqlError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, "CONFIGURATION_ERROR", details);
    this.name = "ConfigurationError";
  }
}

/**
 * No query text was configured before execution
 */
export class MissingQueryError extends SqlError {
  constructor(
    message = "No query provided to execute. Please use Sql.query",
    details?: Record<string, unknown>,
  ) {
    super(message, "MISSING_QUERY", details);
    this.name = "MissingQueryError";
  }
}

/**
 * Single-row fetch found an empty result set
 */
export class NoResultsError extends SqlError {
  constructor(
    message = "Expected at least one row to be returned from the result set. Instead it was empty",
    details?: Record<string, unknown>,
  ) {
    super(message, "NO_RESULTS", details);
    this.name = "NoResultsError";
  }
}

/**
 * Validation error for configuration values
 */
export class ValidationError extends SqlError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, "VALIDATION_ERROR", details);
    this.name = "ValidationError";
  }
}

/**
 * Column value did not match the type a row decoder asked for
 */
export class QueryError extends SqlError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, "QUERY_ERROR", details);
    this.name = "QueryError";
  }
}

/**
 * The driver does not offer the requested surface (e.g. blocking I/O)
 */
export class UnsupportedOperationError extends SqlError {
  constructor(operation: string, details?: Record<string, unknown>) {
    super(
      `Operation '${operation}' is not supported by this driver`,
      "UNSUPPORTED_OPERATION",
      { operation, ...details },
    );
    this.name = "UnsupportedOperationError";
  }
}

/**
 * Wraps a thrown value that is not an Error instance
 */
export class DriverFaultError extends SqlError {
  constructor(cause: unknown) {
    super(`Driver raised a non-error value: ${String(cause)}`, "DRIVER_FAULT");
    this.name = "DriverFaultError";
    this.cause = cause;
  }
}

/**
 * Normalize a caught value into an Error, keeping Error instances untouched
 */
export function toError(fault: unknown): Error {
  return fault instanceof Error ? fault : new DriverFaultError(fault);
}

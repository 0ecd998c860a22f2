/**
 * Error Hierarchy
 *
 * Centralized error definitions for the exporter. Every error raised by the
 * engine is a `DomainError` so failures can be summarized by `code`.
 */

import { isAxiosError } from "axios";

export type ErrorContext = Record<string, unknown>;

export abstract class DomainError extends Error {
  abstract readonly code: string;
  abstract readonly statusCode: number;

  constructor(
    message: string,
    public readonly context?: ErrorContext
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON() {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      statusCode: this.statusCode,
      context: this.context
    };
  }
}

// Configuration Errors
export class ConfigurationError extends DomainError {
  readonly code = "CONFIGURATION_ERROR";
  readonly statusCode = 400;
}

// Remote API Errors

/**
 * The credential was rejected (401/403). Fatal for the whole run.
 */
export class AuthError extends DomainError {
  readonly code = "AUTH_ERROR";
  readonly statusCode = 401;
}

/**
 * The server asked us to slow down (429).
 */
export class RateLimitError extends DomainError {
  readonly code = "RATE_LIMIT_ERROR";
  readonly statusCode = 429;

  constructor(
    message: string,
    public readonly retryAfterMs: number,
    context?: ErrorContext
  ) {
    super(message, { ...context, retryAfterMs });
  }
}

/**
 * Network failures, timeouts and 5xx responses. Retried with backoff.
 */
export class TransientError extends DomainError {
  readonly code = "TRANSIENT_ERROR";
  readonly statusCode = 503;

  constructor(
    message: string,
    public readonly status?: number,
    context?: ErrorContext
  ) {
    super(message, { ...context, status });
  }
}

/**
 * A 4xx response other than 401/403/408/429. Never retried.
 */
export class RequestError extends DomainError {
  readonly code = "REQUEST_ERROR";
  readonly statusCode = 400;

  constructor(
    message: string,
    public readonly status: number,
    context?: ErrorContext
  ) {
    super(message, { ...context, status });
  }
}

/**
 * The server broke the protocol: a repeating cursor or a malformed body.
 */
export class ProtocolError extends DomainError {
  readonly code = "PROTOCOL_ERROR";
  readonly statusCode = 502;
}

// Page Export Errors
export class ExportJobFailedError extends DomainError {
  readonly code = "EXPORT_JOB_FAILED";
  readonly statusCode = 422;
}

export class ExportTimeoutError extends DomainError {
  readonly code = "EXPORT_TIMEOUT";
  readonly statusCode = 408;
}

// Run Errors
export class ConcurrencyError extends DomainError {
  readonly code = "CONCURRENCY_ERROR";
  readonly statusCode = 409;
}

export class CancelledError extends DomainError {
  readonly code = "CANCELLED";
  readonly statusCode = 499;
}

export class FileSystemError extends DomainError {
  readonly code = "FILESYSTEM_ERROR";
  readonly statusCode = 500;
}

export class InternalError extends DomainError {
  readonly code = "INTERNAL_ERROR";
  readonly statusCode = 500;
}

// Error Factory
export class ErrorFactory {
  /**
   * Converts an axios error that carries no response (the request never
   * completed) into a `TransientError`. Anything else is returned unchanged.
   */
  static fromAxiosError(error: unknown, operation: string): unknown {
    if (!isAxiosError(error) || error.response || error.code === "ERR_CANCELED") {
      return error;
    }

    return new TransientError(`Network error during ${operation}: ${error.message}`, undefined, {
      operation,
      code: error.code
    });
  }

  static fromFileSystemError(error: unknown, operation: string, path: string): FileSystemError {
    const message = error instanceof Error ? error.message : String(error);
    return new FileSystemError(`File system error during ${operation}: ${message}`, {
      operation,
      path
    });
  }
}

/**
 * Reduces any thrown value to a code and message for run summaries.
 */
export const describeError = (error: unknown): { code: string; message: string } => {
  if (error instanceof DomainError) {
    return { code: error.code, message: error.message };
  }
  if (error instanceof Error) {
    return { code: "UNEXPECTED_ERROR", message: error.message };
  }
  return { code: "UNEXPECTED_ERROR", message: String(error) };
};

/**
 * Application Error Hierarchy
 *
 * Standardized error handling with error class hierarchy.
 * All engine errors extend from AppError so transports can serialize them
 * uniformly through toJSON().
 */

import type { SerializedError } from "@framecast/types";

/**
 * Base application error class
 *
 * Provides standardized error structure with error codes, status codes, and cause tracking.
 */
export class AppError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly statusCode?: number,
    public readonly cause?: Error,
    public readonly metadata?: Record<string, unknown>
  ) {
    super(message);
    this.name = this.constructor.name;

    if (typeof Error.captureStackTrace === "function") {
      Error.captureStackTrace(this, this.constructor);
    }

    // Maintain proper prototype chain
    Object.setPrototypeOf(this, new.target.prototype);
  }

  /**
   * Convert error to JSON for transport serialization
   */
  toJSON(): SerializedError & { cause?: { name: string; message: string } } {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      statusCode: this.statusCode,
      cause: this.cause
        ? {
            name: this.cause.name,
            message: this.cause.message,
          }
        : undefined,
      metadata: this.metadata,
    };
  }

  /**
   * Check if error is of a specific type
   */
  static isAppError(error: unknown): error is AppError {
    return error instanceof AppError;
  }
}

/**
 * Rejected stream configuration (rate, quality, region, preset)
 */
export class InvalidConfigError extends AppError {
  constructor(message: string, cause?: Error, metadata?: Record<string, unknown>) {
    super(message, "INVALID_CONFIG", 400, cause, metadata);
  }
}

/**
 * A stream or cache capacity limit would be exceeded
 */
export class ResourceExhaustedError extends AppError {
  constructor(message: string, cause?: Error, metadata?: Record<string, unknown>) {
    super(message, "RESOURCE_EXHAUSTED", 429, cause, metadata);
  }
}

/**
 * Capture-related errors
 */
export class CaptureError extends AppError {
  constructor(message: string, cause?: Error, metadata?: Record<string, unknown>) {
    super(message, "CAPTURE_ERROR", 500, cause, metadata);
  }
}

/**
 * Encoding errors
 */
export class EncodeError extends AppError {
  constructor(message: string, cause?: Error, metadata?: Record<string, unknown>) {
    super(message, "ENCODE_ERROR", 500, cause, metadata);
  }
}

/**
 * Requested resource URI is not (or no longer) cached.
 * Expected for slow consumers; not logged as an error.
 */
export class ResourceNotFoundError extends AppError {
  constructor(uri: string) {
    super(`Resource not found: ${uri}`, "NOT_FOUND", 404, undefined, { uri });
  }
}

/**
 * Unknown stream id
 */
export class StreamNotFoundError extends AppError {
  constructor(streamId: string) {
    super(`Stream not found: ${streamId}`, "STREAM_NOT_FOUND", 404, undefined, { streamId });
  }
}

/**
 * Illegal lifecycle transition (e.g. restarting a stopped stream)
 */
export class StreamStateError extends AppError {
  constructor(message: string, metadata?: Record<string, unknown>) {
    super(message, "INVALID_STATE", 409, undefined, metadata);
  }
}

/**
 * Operation abandoned because its stream was stopped
 */
export class CancelledError extends AppError {
  constructor(message: string = "Operation cancelled") {
    super(message, "CANCELLED", 499);
  }
}

/**
 * Configuration errors
 */
export class ConfigError extends AppError {
  constructor(message: string, cause?: Error, metadata?: Record<string, unknown>) {
    super(message, "CONFIG_ERROR", 500, cause, metadata);
  }
}

/**
 * Safely extract error message from unknown error
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === "string") {
    return error;
  }
  return "Unknown error occurred";
}

/**
 * Normalize an unknown thrown value into an Error
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(getErrorMessage(error));
}

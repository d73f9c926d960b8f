/**
 * Error handling utilities with standardized error payloads
 */

import type { ErrorPayload } from "../../types.js";

/**
 * Standard error codes
 */
export enum ErrorCode {
  INVALID_INPUT = "INVALID_INPUT",
  MALFORMED_RECORD = "MALFORMED_RECORD",
  FILE_ERROR = "FILE_ERROR",
  INTERNAL_ERROR = "INTERNAL_ERROR",
}

/**
 * Create a standardized error payload
 */
export function createError(
  code: ErrorCode | string,
  message: string,
  details?: Record<string, unknown>,
  retryable: boolean = false
): ErrorPayload {
  return {
    code,
    message,
    details,
    retryable,
  };
}

/**
 * Create an error for invalid input
 */
export function invalidInputError(
  field: string,
  value: unknown,
  reason?: string
): ErrorPayload {
  return createError(
    ErrorCode.INVALID_INPUT,
    `Invalid input for ${field}: ${String(value)}${reason ? ` (${reason})` : ""}`,
    { field, value, reason },
    false
  );
}

/**
 * Create an error for a record that is not a JSON object
 */
export function malformedRecordError(
  reason: string,
  details?: Record<string, unknown>
): ErrorPayload {
  return createError(
    ErrorCode.MALFORMED_RECORD,
    `Malformed record: ${reason}`,
    {
      reason,
      ...details,
    },
    false
  );
}

/**
 * Create an error for filesystem failures
 */
export function fileError(
  path: string,
  operation: string,
  reason?: string
): ErrorPayload {
  return createError(
    ErrorCode.FILE_ERROR,
    `File error during ${operation} of ${path}${reason ? `: ${reason}` : ""}`,
    {
      path,
      operation,
      reason,
    },
    false
  );
}

/**
 * Create an error for internal/unexpected errors
 */
export function internalError(
  message: string,
  details?: Record<string, unknown>
): ErrorPayload {
  return createError(
    ErrorCode.INTERNAL_ERROR,
    `Internal error: ${message}`,
    details,
    false
  );
}

/**
 * Whether a thrown value is a Node.js system error such as ENOENT or EACCES
 */
export function isSystemError(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error && typeof error.code === "string";
}

/**
 * Convert an Error object to a standardized error payload
 */
export function errorToPayload(error: unknown, context?: Record<string, unknown>): ErrorPayload {
  if (isSystemError(error)) {
    return createError(
      ErrorCode.FILE_ERROR,
      error.message,
      {
        name: error.name,
        errno_code: error.code,
        path: error.path,
        ...context,
      },
      false
    );
  }

  if (error instanceof Error) {
    return createError(
      ErrorCode.INTERNAL_ERROR,
      error.message,
      {
        name: error.name,
        stack: error.stack,
        ...context,
      },
      false
    );
  }

  return createError(
    ErrorCode.INTERNAL_ERROR,
    String(error),
    context,
    false
  );
}

/**
 * Whether a tool result is an error payload rather than a success value
 */
export function isErrorPayload(value: unknown): value is ErrorPayload {
  return (
    typeof value === "object" &&
    value !== null &&
    "code" in value &&
    "message" in value &&
    typeof value.code === "string"
  );
}

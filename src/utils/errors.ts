import { ZodError } from "zod";
import type { FastifyRequest } from "fastify";
import { getRequestId } from "./request-id.js";

/**
 * Error codes for structured error responses
 */
export type ErrorCode = "BAD_INPUT" | "NOT_FOUND" | "INTERNAL";

/**
 * Structured error response (error.v1 schema)
 */
export interface ErrorV1 {
  schema: "error.v1";
  code: ErrorCode;
  message: string;
  details?: Record<string, unknown>;
  request_id?: string;
}

/**
 * Build a structured error response
 */
export function buildErrorV1(
  code: ErrorCode,
  message: string,
  details?: Record<string, unknown>,
  requestId?: string
): ErrorV1 {
  const error: ErrorV1 = {
    schema: "error.v1",
    code,
    message,
  };

  if (details && Object.keys(details).length > 0) {
    error.details = details;
  }

  if (requestId) {
    error.request_id = requestId;
  }

  return error;
}

/**
 * Convert Zod validation error to ErrorV1
 */
export function zodErrorToErrorV1(error: ZodError, requestId?: string): ErrorV1 {
  return buildErrorV1(
    "BAD_INPUT",
    "Validation failed",
    {
      validation_errors: error.flatten(),
    },
    requestId
  );
}

/**
 * Strip file paths and inline secrets from a message
 */
export function sanitizeErrorMessage(message: string): string {
  return message
    .replace(/\/[\w/.@-]+/g, "[path]")
    .replace(/[A-Z_]+_?KEY=\S+/gi, "[KEY_REDACTED]")
    .replace(/[A-Z_]+_?SECRET=\S+/gi, "[SECRET_REDACTED]")
    .replace(/\bsk-[A-Za-z0-9_-]{8,}/g, "[KEY_REDACTED]");
}

function hasStatusCode(error: Error): error is Error & { statusCode: number } {
  return "statusCode" in error && typeof error.statusCode === "number";
}

/**
 * Convert any error to ErrorV1 (never leaks stack traces)
 */
export function toErrorV1(error: unknown, request?: FastifyRequest): ErrorV1 {
  const requestId = request ? getRequestId(request) : undefined;

  if (error instanceof ZodError) {
    return zodErrorToErrorV1(error, requestId);
  }

  if (error instanceof Error) {
    // Fastify body parsing and content-type failures carry a 4xx statusCode
    if (hasStatusCode(error) && error.statusCode >= 400 && error.statusCode < 500) {
      return buildErrorV1("BAD_INPUT", sanitizeErrorMessage(error.message), undefined, requestId);
    }
    const message = sanitizeErrorMessage(error.message || "An unexpected error occurred");
    return buildErrorV1("INTERNAL", message, undefined, requestId);
  }

  if (typeof error === "string") {
    return buildErrorV1("INTERNAL", sanitizeErrorMessage(error), undefined, requestId);
  }

  return buildErrorV1("INTERNAL", "An unexpected error occurred", undefined, requestId);
}

/**
 * Map error code to HTTP status code
 */
export function getStatusCodeForErrorCode(code: ErrorCode): number {
  switch (code) {
    case "BAD_INPUT":
      return 400;
    case "NOT_FOUND":
      return 404;
    case "INTERNAL":
      return 500;
  }
}

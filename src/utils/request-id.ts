import { randomUUID } from "node:crypto";
import type { FastifyRequest } from "fastify";

/**
 * Request ID header name (standard X-Request-Id)
 */
export const REQUEST_ID_HEADER = "X-Request-Id";
export const REQUEST_ID_HEADER_LOWER = "x-request-id";

/**
 * Generate a new request ID (UUID v4)
 */
export function generateRequestId(): string {
  return randomUUID();
}

/**
 * Fastify `genReqId` hook: honour an incoming X-Request-Id, otherwise mint one
 */
export function resolveRequestId(headers: FastifyRequest["headers"]): string {
  const incomingId = headers[REQUEST_ID_HEADER_LOWER];

  if (typeof incomingId === "string" && incomingId.trim().length > 0) {
    return incomingId.trim().slice(0, 128);
  }

  return generateRequestId();
}

/**
 * Get request ID from Fastify request
 */
export function getRequestId(request?: FastifyRequest): string {
  if (!request) {
    return "unknown";
  }
  return request.id || "unknown";
}

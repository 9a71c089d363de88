/**
 * Centralized Logger Configuration
 *
 * Single source of truth for Pino logger options and redaction paths.
 * Used by both server.ts (Fastify) and telemetry.ts (standalone Pino).
 *
 * SECURITY: provider keys must never reach log output. Update this list
 * when adding new secret headers or fields.
 */

import type { LoggerOptions } from "pino";

/**
 * Paths to redact from all log output (Pino path syntax)
 */
export const REDACT_PATHS = [
  "*.apiKey",
  "*.api_key",
  "*.openaiApiKey",
  "*.anthropicApiKey",
  "*.secret",
  "*.token",
  "*.authorization",
  "*.headers.authorization",
  "*.headers.x-api-key",
  "*.headers.cookie",
] as const;

export const REDACT_CENSOR = "[REDACTED]";

export function createRedactConfig() {
  return {
    paths: [...REDACT_PATHS],
    censor: REDACT_CENSOR,
  };
}

/**
 * Create full Pino logger options
 */
export function createLoggerConfig(level: string): LoggerOptions {
  return {
    level,
    redact: createRedactConfig(),
  };
}

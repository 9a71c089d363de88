import { env } from "node:process";
import pino from "pino";
import { StatsD } from "hot-shots";
import { isTest } from "../config/index.js";
import { createLoggerConfig } from "./logger-config.js";

/**
 * Pino logger with secret redaction
 *
 * SECURITY: Redaction paths centralized in src/utils/logger-config.ts
 * so Fastify and standalone Pino loggers stay in sync.
 */
export const log = pino(createLoggerConfig(env.LOG_LEVEL || "info"));

export type TelemetryLeaf = string | number | boolean | null | undefined;
export type TelemetryShape = {
  [key: string]: TelemetryLeaf | TelemetryShape | Array<TelemetryLeaf | TelemetryShape>;
};
export type Event = Record<string, unknown>;

type TelemetrySink = (eventName: string, data: TelemetryShape) => void;

/**
 * Test sink for capturing telemetry events in tests
 * Only usable when NODE_ENV=test or VITEST is set
 */
let testSink: TelemetrySink | null = null;

export function setTestSink(sink: TelemetrySink | null): void {
  if (!isTest()) {
    throw new Error("setTestSink() can only be used in test environment");
  }
  testSink = sink;
}

/**
 * Frozen telemetry event names
 * DO NOT rename without updating dashboards
 */
export const TelemetryEvents = {
  // Run lifecycle
  ValidationStarted: "validation.run.started",
  ValidationCompleted: "validation.run.completed",
  ValidationFailed: "validation.run.failed",
  ValidationDeadlineExceeded: "validation.run.deadline_exceeded",

  // Wave scheduling
  WaveStarted: "validation.wave.started",
  WaveCompleted: "validation.wave.completed",

  // Per-specialist outcomes
  SpecialistCompleted: "validation.specialist.completed",
  SpecialistRepaired: "validation.specialist.repaired",
  SpecialistFallback: "validation.specialist.fallback",

  // Catalog configuration
  DanglingDependency: "validation.catalog.dangling_dependency",

  // Upstream calls
  LlmRetry: "llm.retry",
  LlmRetrySuccess: "llm.retry.success",
  LlmRetryExhausted: "llm.retry.exhausted",
  JsonExtractionRequired: "llm.json_extraction.required",
} as const;

export type TelemetryEventName = (typeof TelemetryEvents)[keyof typeof TelemetryEvents];

/**
 * All valid event names
 */
export const VALID_EVENT_NAMES: Set<string> = new Set(Object.values(TelemetryEvents));

/**
 * Datadog StatsD client (optional, configured via DD_AGENT_HOST)
 */
let datadogClient: StatsD | null = null;

if (env.DD_AGENT_HOST) {
  datadogClient = new StatsD({
    host: env.DD_AGENT_HOST,
    port: Number(env.DD_AGENT_PORT) || 8125,
    prefix: "idea_validation.",
    globalTags: {
      service: env.DD_SERVICE || "idea-validation-service",
      env: env.DD_ENV || env.NODE_ENV || "development",
    },
    errorHandler: (error: Error) => {
      log.error({ error }, "Datadog StatsD error");
    },
  });
  log.info({ dd_host: env.DD_AGENT_HOST }, "Datadog StatsD client initialized");
}

export const statsd = datadogClient;

function isTelemetryLeaf(value: unknown): value is TelemetryLeaf {
  return (
    value === null ||
    value === undefined ||
    typeof value === "string" ||
    typeof value === "number" ||
    typeof value === "boolean"
  );
}

function sanitizeTelemetryValue(
  value: unknown
): TelemetryLeaf | TelemetryShape | Array<TelemetryLeaf | TelemetryShape> | undefined {
  if (isTelemetryLeaf(value)) {
    return value;
  }

  if (Array.isArray(value)) {
    const sanitizedArray: Array<TelemetryLeaf | TelemetryShape> = [];
    for (const item of value) {
      const sanitizedItem = sanitizeTelemetryValue(item);
      // Nested arrays are flattened out of telemetry
      if (sanitizedItem !== undefined && !Array.isArray(sanitizedItem)) {
        sanitizedArray.push(sanitizedItem);
      }
    }
    return sanitizedArray;
  }

  if (typeof value === "object") {
    return sanitizeTelemetryData(Object.fromEntries(Object.entries(value)));
  }

  return undefined;
}

function sanitizeTelemetryData(data: Event): TelemetryShape {
  const result: TelemetryShape = {};
  for (const [key, value] of Object.entries(data)) {
    const sanitized = sanitizeTelemetryValue(value);
    if (sanitized !== undefined) {
      result[key] = sanitized;
    }
  }
  return result;
}

function tag(value: TelemetryShape[string], fallback: string): string {
  return typeof value === "string" || typeof value === "number" || typeof value === "boolean"
    ? String(value)
    : fallback;
}

/**
 * Emit a telemetry event
 *
 * Logs through pino, forwards to the test sink when installed, and maps
 * known events onto Datadog metrics when StatsD is configured.
 */
export function emit(event: string, data: Event): void {
  const eventData = sanitizeTelemetryData(data);
  if (testSink) {
    testSink(event, eventData);
  }

  if (event === TelemetryEvents.DanglingDependency) {
    log.warn({ event, ...eventData }, "Dependency has no match in the dispatched specialist set");
  } else {
    log.info({ event, ...eventData });
  }

  if (!VALID_EVENT_NAMES.has(event)) {
    log.warn({ event }, "Unknown telemetry event (not in frozen enum)");
  }

  if (!datadogClient) return;

  try {
    switch (event) {
      case TelemetryEvents.ValidationCompleted: {
        if (typeof eventData.duration_ms === "number") {
          datadogClient.histogram("run.duration_ms", eventData.duration_ms, {
            outcome: tag(eventData.outcome, "unknown"),
          });
        }
        if (typeof eventData.overall_score === "number") {
          datadogClient.histogram("run.overall_score", eventData.overall_score);
        }
        if (typeof eventData.fallback_count === "number") {
          datadogClient.gauge("run.fallback_count", eventData.fallback_count);
        }
        datadogClient.increment("run.completed", 1, {
          outcome: tag(eventData.outcome, "unknown"),
        });
        break;
      }

      case TelemetryEvents.ValidationFailed: {
        datadogClient.increment("run.failed", 1, {
          error: tag(eventData.error, "unknown"),
        });
        break;
      }

      case TelemetryEvents.ValidationDeadlineExceeded: {
        datadogClient.increment("run.deadline_exceeded", 1);
        break;
      }

      case TelemetryEvents.SpecialistCompleted: {
        if (typeof eventData.latency_ms === "number") {
          datadogClient.histogram("specialist.latency_ms", eventData.latency_ms, {
            cluster: tag(eventData.cluster, "unknown"),
            source: tag(eventData.source, "unknown"),
          });
        }
        break;
      }

      case TelemetryEvents.SpecialistRepaired: {
        datadogClient.increment("specialist.repaired", 1, {
          cluster: tag(eventData.cluster, "unknown"),
        });
        break;
      }

      case TelemetryEvents.SpecialistFallback: {
        datadogClient.increment("specialist.fallback", 1, {
          cluster: tag(eventData.cluster, "unknown"),
          reason: tag(eventData.reason, "unknown"),
        });
        break;
      }

      case TelemetryEvents.LlmRetry: {
        datadogClient.increment("llm.retry", 1, {
          adapter: tag(eventData.adapter, "unknown"),
        });
        break;
      }

      case TelemetryEvents.LlmRetryExhausted: {
        datadogClient.increment("llm.retry.exhausted", 1, {
          adapter: tag(eventData.adapter, "unknown"),
        });
        break;
      }

      case TelemetryEvents.JsonExtractionRequired: {
        datadogClient.increment("llm.json_extraction.required", 1, {
          method: tag(eventData.extraction_method, "unknown"),
        });
        break;
      }

      default:
        break;
    }
  } catch (error) {
    // Never let telemetry break a validation run
    log.error({ error, event }, "Failed to send Datadog metrics");
  }
}

/**
 * Flush Datadog metrics (for graceful shutdown)
 */
export async function flushMetrics(): Promise<void> {
  const client = datadogClient;
  if (!client) return;

  await new Promise<void>((resolve, reject) => {
    client.close((error) => {
      if (error) {
        log.error({ error }, "Error flushing Datadog metrics");
        reject(error);
      } else {
        log.info("Datadog metrics flushed");
        resolve();
      }
    });
  });
}

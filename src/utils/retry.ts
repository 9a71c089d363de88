import { emit, TelemetryEvents } from "./telemetry.js";

/**
 * Retry configuration options
 */
export interface RetryConfig {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  backoffFactor: number;
  jitterPercent: number;
}

/**
 * Default retry configuration
 * - 2 attempts total (1 initial + 1 retry) per specialist call
 * - Exponential backoff: 250ms, 500ms, ... (with jitter)
 * - ±20% jitter to prevent thundering herd across a wave
 */
export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxAttempts: 2,
  baseDelayMs: 250,
  maxDelayMs: 5000,
  backoffFactor: 2,
  jitterPercent: 20,
};

export interface RetryContext {
  adapter: string;
  model: string;
  operation: string;
}

/**
 * Error messages that should trigger retries
 */
const RETRYABLE_ERROR_PATTERNS = [
  // Network/timeout errors
  /timeout/i,
  /timed out/i,
  /ETIMEDOUT/i,
  /ECONNRESET/i,
  /ECONNREFUSED/i,
  /socket hang up/i,

  // Rate limit errors
  /rate.?limit/i,
  /too many requests/i,

  // Server overload errors
  /overloaded/i,
  /service unavailable/i,
  /temporarily unavailable/i,
];

/**
 * HTTP status codes that should trigger retries
 */
const RETRYABLE_STATUS_CODES = new Set([
  408, // Request Timeout
  429, // Too Many Requests
  500, // Internal Server Error
  502, // Bad Gateway
  503, // Service Unavailable
  504, // Gateway Timeout
]);

function numericField(error: object, field: "status" | "statusCode"): number | undefined {
  const value: unknown = Reflect.get(error, field);
  return typeof value === "number" ? value : undefined;
}

/**
 * Check if an error is retryable
 */
export function isRetryableError(error: unknown): boolean {
  if (!error) return false;

  // A cancelled call is never retried
  if (error instanceof Error && error.name === "UpstreamAbortedError") {
    return false;
  }

  if (typeof error === "object") {
    const status = numericField(error, "status") ?? numericField(error, "statusCode");
    if (status !== undefined && RETRYABLE_STATUS_CODES.has(status)) {
      return true;
    }
  }

  const message = error instanceof Error ? error.message : String(error);
  return RETRYABLE_ERROR_PATTERNS.some((pattern) => pattern.test(message));
}

/**
 * Calculate delay with exponential backoff and jitter
 */
export function calculateBackoffDelay(
  attempt: number,
  config: RetryConfig = DEFAULT_RETRY_CONFIG
): number {
  const exponentialDelay = config.baseDelayMs * Math.pow(config.backoffFactor, attempt - 1);
  const cappedDelay = Math.min(exponentialDelay, config.maxDelayMs);

  const jitterRange = (cappedDelay * config.jitterPercent) / 100;
  const jitter = Math.random() * jitterRange * 2 - jitterRange;

  return Math.max(0, Math.floor(cappedDelay + jitter));
}

/**
 * Sleep for specified milliseconds, waking early if the signal aborts
 */
function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

/**
 * Execute a function with automatic retries
 *
 * Only retryable errors (see isRetryableError) are retried; everything else
 * is rethrown immediately. An aborted signal stops further attempts.
 *
 * @returns Result of the first successful attempt
 * @throws Last error if all attempts fail
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  context: RetryContext,
  config: RetryConfig = DEFAULT_RETRY_CONFIG,
  signal?: AbortSignal
): Promise<T> {
  let lastError: unknown;

  for (let attempt = 1; attempt <= config.maxAttempts; attempt++) {
    try {
      const result = await fn(attempt);

      if (attempt > 1) {
        emit(TelemetryEvents.LlmRetrySuccess, {
          adapter: context.adapter,
          model: context.model,
          operation: context.operation,
          attempt,
          total_attempts: attempt,
        });
      }

      return result;
    } catch (error) {
      lastError = error;

      if (!isRetryableError(error) || signal?.aborted) {
        throw error;
      }

      if (attempt >= config.maxAttempts) {
        emit(TelemetryEvents.LlmRetryExhausted, {
          adapter: context.adapter,
          model: context.model,
          operation: context.operation,
          total_attempts: attempt,
          error_message: error instanceof Error ? error.message : String(error),
        });
        throw error;
      }

      const delay = calculateBackoffDelay(attempt, config);
      const errorMessage = error instanceof Error ? error.message : String(error);

      emit(TelemetryEvents.LlmRetry, {
        adapter: context.adapter,
        model: context.model,
        operation: context.operation,
        attempt,
        max_attempts: config.maxAttempts,
        delay_ms: delay,
        reason: errorMessage.substring(0, 100),
      });

      await sleep(delay, signal);
      if (signal?.aborted) {
        throw error;
      }
    }
  }

  throw lastError;
}

/**
 * Shared error types for LLM adapter failures
 */

/**
 * Upstream timeout error - thrown when an LLM API call exceeds its per-call timeout
 */
export class UpstreamTimeoutError extends Error {
  readonly name = "UpstreamTimeoutError";

  constructor(
    message: string,
    public readonly provider: string,
    public readonly operation: string,
    public readonly timeoutPhase: "connect" | "headers" | "body",
    public readonly elapsedMs: number,
    public readonly cause?: unknown
  ) {
    super(message);
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, UpstreamTimeoutError);
    }
  }
}

/**
 * Upstream aborted error - the caller cancelled the call (run deadline reached)
 */
export class UpstreamAbortedError extends Error {
  readonly name = "UpstreamAbortedError";

  constructor(
    message: string,
    public readonly provider: string,
    public readonly operation: string,
    public readonly elapsedMs: number,
    public readonly cause?: unknown
  ) {
    super(message);
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, UpstreamAbortedError);
    }
  }
}

/**
 * Upstream HTTP error - thrown when an LLM API returns a non-2xx status
 *
 * Carries the provider error code and request ID for cross-referencing
 * with provider logs.
 */
export class UpstreamHTTPError extends Error {
  readonly name = "UpstreamHTTPError";

  constructor(
    message: string,
    public readonly provider: string,
    public readonly status: number,
    public readonly code: string | undefined,
    public readonly requestId: string | undefined,
    public readonly elapsedMs: number,
    public readonly cause?: unknown
  ) {
    super(message);
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, UpstreamHTTPError);
    }
  }
}

import type { CallOpts } from "./types.js";
import { UpstreamAbortedError, UpstreamTimeoutError } from "./errors.js";

/**
 * Per-call abort plumbing shared by the network adapters.
 *
 * Combines the adapter's own timeout with the caller's cancellation signal
 * and remembers which one fired, so failures can be classified afterwards.
 */
export interface CallSignal {
  signal: AbortSignal;
  /** Clear the timer and detach from the caller's signal */
  cleanup(): void;
  /**
   * Map a failure to UpstreamTimeoutError / UpstreamAbortedError when the
   * call was aborted; returns undefined otherwise
   */
  classifyAbort(error: unknown, provider: string, operation: string): Error | undefined;
}

export function createCallSignal(opts: CallOpts): CallSignal {
  const controller = new AbortController();
  const startTime = Date.now();
  let reason: "timeout" | "cancelled" | null = null;

  const timeoutId = setTimeout(() => {
    reason = "timeout";
    controller.abort();
  }, opts.timeoutMs);

  const onExternalAbort = () => {
    reason ??= "cancelled";
    controller.abort();
  };

  if (opts.abortSignal?.aborted) {
    onExternalAbort();
  } else {
    opts.abortSignal?.addEventListener("abort", onExternalAbort, { once: true });
  }

  return {
    signal: controller.signal,
    cleanup() {
      clearTimeout(timeoutId);
      opts.abortSignal?.removeEventListener("abort", onExternalAbort);
    },
    classifyAbort(error, provider, operation) {
      const isAbortError = error instanceof Error && error.name === "AbortError";
      if (!controller.signal.aborted && !isAbortError) {
        return undefined;
      }
      const elapsedMs = Date.now() - startTime;
      if (reason === "cancelled") {
        return new UpstreamAbortedError(`${provider} ${operation} cancelled`, provider, operation, elapsedMs, error);
      }
      return new UpstreamTimeoutError(
        `${provider} ${operation} timed out after ${opts.timeoutMs}ms`,
        provider,
        operation,
        "body",
        elapsedMs,
        error
      );
    },
  };
}

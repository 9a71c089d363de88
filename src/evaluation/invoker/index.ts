/**
 * Specialist Invoker
 *
 * One specialist, one proposal, one deadline. Builds the prompt, calls the
 * inference service (retrying transient failures), interprets the reply and
 * always resolves to a SpecialistEvaluation; failures become fallback
 * records and are never rethrown.
 */

import type { LLMAdapter } from "../../adapters/llm/types.js";
import { UpstreamAbortedError, UpstreamTimeoutError } from "../../adapters/llm/errors.js";
import { withRetry, DEFAULT_RETRY_CONFIG, type RetryConfig } from "../../utils/retry.js";
import { emit, log, TelemetryEvents } from "../../utils/telemetry.js";
import type {
  ClusterDefinition,
  DependencyContextEntry,
  FallbackReason,
  Proposal,
  Specialist,
  SpecialistEvaluation,
} from "../types.js";
import { buildSpecialistPrompt, summarizeDependencyContext } from "./prompt.js";
import { interpretResponse, materialize, type InterpretedResponse } from "./response-parser.js";

export interface InvokerOptions {
  maxTokens: number;
  temperature: number;
  /** Per-attempt timeout; further capped by the run deadline */
  timeoutMs: number;
  retry?: RetryConfig;
}

export interface InvocationRequest {
  specialist: Specialist;
  cluster: ClusterDefinition;
  proposal: Proposal;
  dependencyContext: readonly DependencyContextEntry[];
  requestId: string;
  /** Run-level cancellation */
  signal?: AbortSignal;
  /** Epoch ms after which no attempt may still be running */
  deadlineAt?: number;
}

/**
 * Settle as soon as `signal` aborts, even if the adapter ignores it. The
 * abandoned call's eventual outcome is discarded.
 */
function abandonOnAbort<T>(call: Promise<T>, signal: AbortSignal, provider: string): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const startTime = Date.now();
    const onAbort = () => {
      reject(new UpstreamAbortedError(`${provider} complete cancelled`, provider, "complete", Date.now() - startTime));
    };
    if (signal.aborted) {
      onAbort();
    } else {
      signal.addEventListener("abort", onAbort, { once: true });
    }
    void call.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(error);
      }
    );
  });
}

export function classifyFailure(error: unknown): FallbackReason {
  if (error instanceof UpstreamAbortedError) return "cancelled";
  if (error instanceof UpstreamTimeoutError) return "timeout";
  if (error instanceof Error && error.message.includes("empty_response")) return "empty_response";
  return "upstream_error";
}

export class SpecialistInvoker {
  private readonly retry: RetryConfig;

  constructor(
    private readonly adapter: LLMAdapter,
    private readonly options: InvokerOptions
  ) {
    this.retry = options.retry ?? DEFAULT_RETRY_CONFIG;
  }

  async invoke(request: InvocationRequest): Promise<SpecialistEvaluation> {
    const { specialist, cluster, proposal, requestId, signal, deadlineAt } = request;
    const startTime = Date.now();
    const context = summarizeDependencyContext(request.dependencyContext);
    let attempts = 0;
    let interpreted: InterpretedResponse;

    if (signal?.aborted || (deadlineAt !== undefined && deadlineAt <= startTime)) {
      interpreted = { kind: "fallback", reason: "cancelled" };
    } else {
      const { system, prompt } = buildSpecialistPrompt(specialist, cluster, proposal, context);
      try {
        const result = await withRetry(
          (attempt) => {
            attempts = attempt;
            const remaining = deadlineAt === undefined ? this.options.timeoutMs : deadlineAt - Date.now();
            const call = this.adapter.complete(
              { system, prompt, maxTokens: this.options.maxTokens, temperature: this.options.temperature },
              {
                requestId,
                timeoutMs: Math.max(1, Math.min(this.options.timeoutMs, remaining)),
                abortSignal: signal,
              }
            );
            return signal ? abandonOnAbort(call, signal, this.adapter.name) : call;
          },
          { adapter: this.adapter.name, model: this.adapter.model, operation: `specialist:${specialist.id}` },
          this.retry,
          signal
        );
        interpreted = interpretResponse(result.text, specialist.subParameter, {
          task: specialist.id,
          model: result.model,
          correlationId: requestId,
        });
      } catch (error) {
        const reason = signal?.aborted ? "cancelled" : classifyFailure(error);
        log.warn(
          {
            request_id: requestId,
            specialist_id: specialist.id,
            reason,
            error: error instanceof Error ? error.message : String(error),
          },
          "Specialist call failed; using fallback record"
        );
        interpreted = { kind: "fallback", reason };
      }
    }

    const materialized = materialize(interpreted, specialist.subParameter);
    const processingTimeMs = Date.now() - startTime;

    const evaluation: SpecialistEvaluation = {
      specialistId: specialist.id,
      cluster: specialist.cluster,
      parameter: specialist.parameter,
      subParameter: specialist.subParameter,
      record: materialized.record,
      source: materialized.source,
      ...(materialized.fallbackReason ? { fallbackReason: materialized.fallbackReason } : {}),
      repairs: materialized.repairs,
      attempts,
      processingTimeMs,
      informedBy: context.map((entry) => entry.subParameter),
    };

    this.report(evaluation, requestId);
    return evaluation;
  }

  private report(evaluation: SpecialistEvaluation, requestId: string): void {
    const base = {
      request_id: requestId,
      specialist_id: evaluation.specialistId,
      cluster: evaluation.cluster,
    };

    if (evaluation.source === "repaired") {
      emit(TelemetryEvents.SpecialistRepaired, { ...base, repairs: evaluation.repairs });
    }
    if (evaluation.source === "fallback") {
      emit(TelemetryEvents.SpecialistFallback, { ...base, reason: evaluation.fallbackReason });
    }
    emit(TelemetryEvents.SpecialistCompleted, {
      ...base,
      source: evaluation.source,
      score: evaluation.record.score,
      attempts: evaluation.attempts,
      latency_ms: evaluation.processingTimeMs,
    });
  }
}

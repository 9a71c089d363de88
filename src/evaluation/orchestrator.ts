/**
 * Orchestrator
 *
 * Public entry point of the evaluation core. Drives the planner's waves
 * strictly in sequence; inside a wave every specialist goes through one
 * bounded worker pool. validateIdea() never throws: anything that stops a
 * run becomes a fallback ValidationResult with an `error` field.
 */

import { randomUUID } from "node:crypto";
import type { LLMAdapter } from "../adapters/llm/types.js";
import { generateRequestId } from "../utils/request-id.js";
import { DEFAULT_RETRY_CONFIG } from "../utils/retry.js";
import { emit, log, TelemetryEvents } from "../utils/telemetry.js";
import { WorkerPool } from "../utils/worker-pool.js";
import { aggregate } from "./aggregator/index.js";
import { ValidationRunError } from "./errors.js";
import { buildFallbackResult } from "./fallback-result.js";
import { SpecialistInvoker } from "./invoker/index.js";
import { materialize } from "./invoker/response-parser.js";
import { planWaves, type ExecutionPlan } from "./planner.js";
import type { SpecialistRegistry } from "./registry/index.js";
import type {
  DependencyContextEntry,
  FrameworkInfo,
  Proposal,
  Specialist,
  SpecialistEvaluation,
  ValidationResult,
} from "./types.js";

export interface OrchestratorOptions {
  concurrency: number;
  specialistTimeoutMs: number;
  runDeadlineMs: number;
  maxAttempts: number;
  maxTokens: number;
  temperature: number;
}

export interface OrchestratorDeps {
  registry: SpecialistRegistry;
  adapter: LLMAdapter;
  options: OrchestratorOptions;
}

export interface ValidateIdeaInput {
  name: string;
  concept: string;
  /** Relative weights between clusters for the overall score */
  clusterWeights?: Record<string, number>;
  /** Whole-run deadline in ms; capped at the configured run deadline */
  deadlineMs?: number;
  /** Restrict the run to these clusters */
  clusters?: string[];
  requestId?: string;
}

export class ValidationOrchestrator {
  private readonly registry: SpecialistRegistry;
  private readonly invoker: SpecialistInvoker;
  private readonly options: OrchestratorOptions;
  private readonly fullPlan: ExecutionPlan;

  /**
   * @throws CatalogConfigurationError if the catalog's dependencies form a cycle
   */
  constructor(deps: OrchestratorDeps) {
    this.registry = deps.registry;
    this.options = deps.options;
    this.fullPlan = planWaves(deps.registry.allSpecialists(), deps.registry);
    this.invoker = new SpecialistInvoker(deps.adapter, {
      maxTokens: deps.options.maxTokens,
      temperature: deps.options.temperature,
      timeoutMs: deps.options.specialistTimeoutMs,
      retry: { ...DEFAULT_RETRY_CONFIG, maxAttempts: deps.options.maxAttempts },
    });

    log.info(
      {
        specialists: deps.registry.size,
        waves: this.fullPlan.waves.length,
        concurrency: deps.options.concurrency,
        provider: deps.adapter.name,
        model: deps.adapter.model,
      },
      "Validation orchestrator ready"
    );
  }

  frameworkInfo(): FrameworkInfo {
    return { ...this.registry.frameworkInfo(), waveCount: this.fullPlan.waves.length };
  }

  async validateIdea(input: ValidateIdeaInput): Promise<ValidationResult> {
    const startedAt = Date.now();
    const validationId = `val_${randomUUID()}`;
    const timestamp = new Date(startedAt).toISOString();
    let requestId = generateRequestId();
    let proposal: Proposal = { name: "", concept: "" };

    try {
      requestId = input.requestId ?? requestId;
      proposal = { name: trimmedText(input.name), concept: trimmedText(input.concept) };
      return await this.run(input, { validationId, timestamp, requestId, proposal, startedAt });
    } catch (error) {
      const message =
        error instanceof ValidationRunError
          ? `${error.code}: ${error.message}`
          : `internal_error: ${error instanceof Error ? error.message : String(error)}`;

      log.error({ request_id: requestId, validation_id: validationId, error: message }, "Validation run failed");
      emit(TelemetryEvents.ValidationFailed, {
        request_id: requestId,
        validation_id: validationId,
        error: error instanceof ValidationRunError ? error.code : "internal_error",
      });

      return buildFallbackResult({
        validationId,
        timestamp,
        proposal,
        processingTimeMs: Date.now() - startedAt,
        error: message,
      });
    }
  }

  private async run(
    input: ValidateIdeaInput,
    meta: { validationId: string; timestamp: string; requestId: string; proposal: Proposal; startedAt: number }
  ): Promise<ValidationResult> {
    const { validationId, timestamp, requestId, proposal, startedAt } = meta;

    if (!proposal.name || !proposal.concept) {
      throw new ValidationRunError("invalid_proposal", "name and concept are required");
    }
    validateWeights(input.clusterWeights);

    const plan = this.planFor(input.clusters);
    const specialistCount = plan.waves.reduce((count, wave) => count + wave.length, 0);
    const deadlineMs = Math.min(
      input.deadlineMs !== undefined && Number.isFinite(input.deadlineMs) && input.deadlineMs > 0
        ? input.deadlineMs
        : this.options.runDeadlineMs,
      this.options.runDeadlineMs
    );
    const deadlineAt = startedAt + deadlineMs;

    emit(TelemetryEvents.ValidationStarted, {
      request_id: requestId,
      validation_id: validationId,
      specialists: specialistCount,
      waves: plan.waves.length,
      deadline_ms: deadlineMs,
      custom_weights: input.clusterWeights !== undefined,
    });

    const controller = new AbortController();
    const deadlineTimer = setTimeout(() => {
      emit(TelemetryEvents.ValidationDeadlineExceeded, {
        request_id: requestId,
        validation_id: validationId,
        deadline_ms: deadlineMs,
      });
      controller.abort();
    }, Math.max(0, deadlineAt - Date.now()));

    const pool = new WorkerPool(this.options.concurrency);
    const completed = new Map<string, SpecialistEvaluation>();

    try {
      for (const [index, wave] of plan.waves.entries()) {
        const waveStart = Date.now();
        emit(TelemetryEvents.WaveStarted, {
          request_id: requestId,
          wave: index,
          size: wave.length,
          cancelled: controller.signal.aborted,
        });

        const settled = await pool.map(wave, (specialist) =>
          this.invokeSpecialist(specialist, proposal, plan, completed, {
            requestId,
            signal: controller.signal,
            deadlineAt,
          })
        );

        let fallbacks = 0;
        for (const [position, outcome] of settled.entries()) {
          const specialist = wave[position];
          if (!specialist) continue;
          const evaluation =
            outcome.status === "fulfilled" ? outcome.value : this.internalFallback(specialist, outcome.reason);
          if (evaluation.source === "fallback") fallbacks++;
          completed.set(specialist.id, evaluation);
        }

        emit(TelemetryEvents.WaveCompleted, {
          request_id: requestId,
          wave: index,
          size: wave.length,
          fallbacks,
          duration_ms: Date.now() - waveStart,
        });
      }
    } finally {
      clearTimeout(deadlineTimer);
    }

    const result = aggregate([...completed.values()], {
      validationId,
      timestamp,
      proposal,
      processingTimeMs: Date.now() - startedAt,
      clusterWeights: input.clusterWeights,
      clusterDisplayNames: Object.fromEntries(
        this.registry.clusters().map((cluster) => [cluster.name, cluster.displayName])
      ),
    });

    emit(TelemetryEvents.ValidationCompleted, {
      request_id: requestId,
      validation_id: validationId,
      overall_score: result.overallScore,
      outcome: result.outcome,
      consensus_level: result.consensusLevel,
      specialists: result.totalSpecialistsConsulted,
      fallback_count: result.fallbackCount,
      deadline_exceeded: controller.signal.aborted,
      duration_ms: result.processingTimeMs,
    });

    return result;
  }

  private planFor(clusters: string[] | undefined): ExecutionPlan {
    if (!clusters || clusters.length === 0) {
      return this.fullPlan;
    }

    const unknown = clusters.filter((name) => !this.registry.cluster(name));
    if (unknown.length > 0) {
      throw new ValidationRunError("unknown_cluster", `unknown cluster(s): ${unknown.join(", ")}`);
    }

    const selected = new Set(clusters);
    const subset = this.registry.allSpecialists().filter((specialist) => selected.has(specialist.cluster));
    if (subset.length === 0) {
      throw new ValidationRunError("no_specialists", "no specialists selected for this run");
    }
    return planWaves(subset, this.registry);
  }

  private invokeSpecialist(
    specialist: Specialist,
    proposal: Proposal,
    plan: ExecutionPlan,
    completed: ReadonlyMap<string, SpecialistEvaluation>,
    run: { requestId: string; signal: AbortSignal; deadlineAt: number }
  ): Promise<SpecialistEvaluation> {
    const cluster = this.registry.cluster(specialist.cluster);
    if (!cluster) {
      return Promise.reject(new Error(`cluster "${specialist.cluster}" missing from registry`));
    }

    const dependencyContext: DependencyContextEntry[] = [];
    for (const dependency of plan.dependenciesOf.get(specialist.id) ?? []) {
      const upstream = completed.get(dependency.id);
      if (upstream) {
        dependencyContext.push({
          subParameter: upstream.subParameter,
          score: upstream.record.score,
          explanation: upstream.record.explanation,
        });
      }
    }

    return this.invoker.invoke({
      specialist,
      cluster,
      proposal,
      dependencyContext,
      requestId: run.requestId,
      signal: run.signal,
      deadlineAt: run.deadlineAt,
    });
  }

  private internalFallback(specialist: Specialist, reason: unknown): SpecialistEvaluation {
    log.error(
      { specialist_id: specialist.id, error: reason instanceof Error ? reason.message : String(reason) },
      "Specialist invocation rejected unexpectedly"
    );
    const materialized = materialize({ kind: "fallback", reason: "upstream_error" }, specialist.subParameter);
    return {
      specialistId: specialist.id,
      cluster: specialist.cluster,
      parameter: specialist.parameter,
      subParameter: specialist.subParameter,
      record: materialized.record,
      source: materialized.source,
      fallbackReason: "upstream_error",
      repairs: [],
      attempts: 0,
      processingTimeMs: 0,
      informedBy: [],
    };
  }
}

/** Untyped callers may pass anything; non-strings read as blank */
function trimmedText(value: unknown): string {
  return typeof value === "string" ? value.trim() : "";
}

function validateWeights(weights: Record<string, number> | undefined): void {
  if (!weights) return;
  for (const [cluster, weight] of Object.entries(weights)) {
    if (!Number.isFinite(weight) || weight < 0) {
      throw new ValidationRunError(
        "invalid_cluster_weights",
        `weight for "${cluster}" must be a finite number >= 0`
      );
    }
  }
}

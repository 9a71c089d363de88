/**
 * Orchestrator integration tests
 *
 * Real registry, planner, invoker and aggregator driven by an in-process
 * adapter stand-in.
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { FixturesAdapter } from "../../src/adapters/llm/fixtures.js";
import { CatalogConfigurationError } from "../../src/evaluation/errors.js";
import { ValidationOrchestrator, type OrchestratorOptions } from "../../src/evaluation/orchestrator.js";
import { SpecialistRegistry } from "../../src/evaluation/registry/index.js";
import { TelemetryEvents } from "../../src/utils/telemetry.js";
import { smallCatalog, twoClusterCatalog } from "../helpers/catalog.js";
import { jsonReply, StubAdapter, subParameterOf, waitForAbort, type Responder } from "../helpers/stub-adapter.js";
import { TelemetrySink } from "../helpers/telemetry-sink.js";

const OPTIONS: OrchestratorOptions = {
  concurrency: 2,
  specialistTimeoutMs: 1_000,
  runDeadlineMs: 5_000,
  maxAttempts: 1,
  maxTokens: 500,
  temperature: 0,
};

const SCORES: Record<string, number> = {
  "Market Size": 80,
  "Customer Need": 60,
  Pricing: 40,
  Roadmap: 90,
  Staffing: 70,
};

const byScoreTable: Responder = (args) => jsonReply(SCORES[subParameterOf(args.prompt)] ?? 0);

const PROPOSAL = { name: "Campus Bikes", concept: "Shared bikes for university campuses." };

function orchestrator(responder: Responder, options: Partial<OrchestratorOptions> = {}, catalog = smallCatalog()) {
  const adapter = new StubAdapter(responder);
  const instance = new ValidationOrchestrator({
    registry: SpecialistRegistry.fromCatalog(catalog),
    adapter,
    options: { ...OPTIONS, ...options },
  });
  return { adapter, instance };
}

describe("ValidationOrchestrator", () => {
  const sink = new TelemetrySink();

  beforeEach(() => {
    sink.clear();
    sink.install();
  });

  afterEach(() => {
    sink.uninstall();
  });

  it("runs waves in dependency order and passes upstream results along", async () => {
    const { adapter, instance } = orchestrator(byScoreTable);

    const result = await instance.validateIdea(PROPOSAL);

    expect(adapter.calledSubParameters()).toEqual(["Market Size", "Customer Need", "Pricing", "Roadmap", "Staffing"]);
    expect(result.evaluations.Alpha?.Demand?.["Customer Need"]?.informedBy).toEqual(["Market Size"]);
    expect(result.evaluations.Alpha?.Positioning?.Pricing?.informedBy).toEqual(["Market Size", "Customer Need"]);
    expect(result.evaluations.Beta?.Delivery?.Roadmap?.informedBy).toEqual(["Pricing"]);
    expect(result.evaluations.Beta?.Delivery?.Staffing?.informedBy).toEqual(["Roadmap"]);

    const pricingPrompt = adapter.calls[2]?.args.prompt ?? "";
    expect(pricingPrompt).toContain("- Market Size: 80/100 - Assessed at 80.");
    expect(pricingPrompt).toContain("- Customer Need: 60/100 - Assessed at 60.");
  });

  it("aggregates cluster and overall scores", async () => {
    const { instance } = orchestrator(byScoreTable);

    const result = await instance.validateIdea(PROPOSAL);

    expect(result.validationId).toMatch(/^val_[0-9a-f-]{36}$/);
    expect(result.proposal).toEqual(PROPOSAL);
    expect(result.clusterScores).toEqual({ Alpha: 60, Beta: 80 });
    expect(result.overallScore).toBe(70);
    expect(result.outcome).toBe("Good");
    expect(result.totalSpecialistsConsulted).toBe(5);
    expect(result.fallbackCount).toBe(0);
    expect(result.error).toBeUndefined();
    expect(result.clusterSummaries.map((summary) => summary.displayName)).toEqual(["Alpha Cluster", "Beta"]);
  });

  it("applies custom cluster weights", async () => {
    const { instance } = orchestrator(byScoreTable);

    const result = await instance.validateIdea({ ...PROPOSAL, clusterWeights: { Alpha: 3, Beta: 1 } });

    expect(result.overallScore).toBe(65);
  });

  it("isolates a failing specialist behind a fallback record", async () => {
    const { instance } = orchestrator((args, opts) => {
      if (subParameterOf(args.prompt) === "Pricing") {
        throw new Error("invalid request body");
      }
      return byScoreTable(args, opts);
    });

    const result = await instance.validateIdea(PROPOSAL);
    const pricing = result.evaluations.Alpha?.Positioning?.Pricing;

    expect(pricing).toMatchObject({ source: "fallback", fallbackReason: "upstream_error", attempts: 1 });
    expect(pricing?.record.score).toBe(50);
    expect(pricing?.record.confidence).toBe(0.5);
    expect(result.fallbackCount).toBe(1);
    expect(result.totalSpecialistsConsulted).toBe(5);
    expect(result.evaluations.Beta?.Delivery?.Roadmap?.source).toBe("parsed");
    expect(sink.named(TelemetryEvents.SpecialistFallback)).toHaveLength(1);
  });

  it("cancels outstanding work when the run deadline passes", async () => {
    const { adapter, instance } = orchestrator((_args, opts) => waitForAbort(opts.abortSignal));

    const result = await instance.validateIdea({ ...PROPOSAL, deadlineMs: 50 });
    const all = Object.values(result.evaluations).flatMap((parameters) =>
      Object.values(parameters).flatMap((subs) => Object.values(subs))
    );

    expect(adapter.calls).toHaveLength(1);
    expect(result.totalSpecialistsConsulted).toBe(5);
    expect(result.fallbackCount).toBe(5);
    expect(all.map((evaluation) => evaluation.fallbackReason)).toEqual([
      "cancelled",
      "cancelled",
      "cancelled",
      "cancelled",
      "cancelled",
    ]);
    expect(sink.named(TelemetryEvents.ValidationDeadlineExceeded)).toHaveLength(1);
    expect(sink.named(TelemetryEvents.ValidationCompleted)[0]?.data.deadline_exceeded).toBe(true);
  });

  it("keeps records that finished before the deadline", async () => {
    const { instance } = orchestrator(
      (args, opts) => (subParameterOf(args.prompt) === "A One" ? jsonReply(90) : waitForAbort(opts.abortSignal)),
      {},
      twoClusterCatalog()
    );

    const result = await instance.validateIdea({ ...PROPOSAL, deadlineMs: 50 });

    expect(result.evaluations.A?.PA?.["A One"]).toMatchObject({ source: "parsed", record: { score: 90 } });
    expect(result.evaluations.B?.PB?.["B One"]).toMatchObject({ source: "fallback", fallbackReason: "cancelled" });
    expect(result.clusterScores).toEqual({ A: 90, B: 50 });
    expect(result.fallbackCount).toBe(1);
  });

  it("never runs more calls than the concurrency limit", async () => {
    let inFlight = 0;
    let peak = 0;
    const slow: Responder = async () => {
      inFlight++;
      peak = Math.max(peak, inFlight);
      await new Promise((resolve) => setTimeout(resolve, 10));
      inFlight--;
      return jsonReply(70);
    };

    const { instance } = orchestrator(slow, { concurrency: 1 }, twoClusterCatalog());
    const result = await instance.validateIdea(PROPOSAL);

    expect(peak).toBe(1);
    expect(result.totalSpecialistsConsulted).toBe(2);
  });

  it("restricts a run to the requested clusters and reports dangling dependencies", async () => {
    const { adapter, instance } = orchestrator(byScoreTable);

    const result = await instance.validateIdea({ ...PROPOSAL, clusters: ["Beta"] });

    expect(adapter.calledSubParameters()).toEqual(["Roadmap", "Staffing"]);
    expect(result.clusterScores).toEqual({ Beta: 80 });
    expect(result.evaluations.Beta?.Delivery?.Roadmap?.informedBy).toEqual([]);
    expect(sink.named(TelemetryEvents.DanglingDependency).map((event) => event.data)).toEqual([
      { specialist_id: "roadmap", dependency: "Pricing" },
    ]);
  });

  it("emits run and wave lifecycle events", async () => {
    const { instance } = orchestrator(byScoreTable);

    await instance.validateIdea({ ...PROPOSAL, requestId: "req-42" });

    expect(sink.named(TelemetryEvents.ValidationStarted)[0]?.data).toMatchObject({
      request_id: "req-42",
      specialists: 5,
      waves: 5,
      deadline_ms: 5_000,
      custom_weights: false,
    });
    expect(sink.named(TelemetryEvents.WaveStarted)).toHaveLength(5);
    expect(sink.named(TelemetryEvents.WaveCompleted).map((event) => event.data.size)).toEqual([1, 1, 1, 1, 1]);
    expect(sink.named(TelemetryEvents.SpecialistCompleted)).toHaveLength(5);
    expect(sink.named(TelemetryEvents.ValidationCompleted)[0]?.data).toMatchObject({
      request_id: "req-42",
      overall_score: 70,
      outcome: "Good",
      fallback_count: 0,
      deadline_exceeded: false,
    });
  });

  describe("run-level failures", () => {
    it("rejects a blank proposal without calling the adapter", async () => {
      const { adapter, instance } = orchestrator(byScoreTable);

      const result = await instance.validateIdea({ name: "   ", concept: "Something" });

      expect(result.error).toBe("invalid_proposal: name and concept are required");
      expect(result.overallScore).toBe(50);
      expect(result.outcome).toBe("Moderate");
      expect(result.totalSpecialistsConsulted).toBe(0);
      expect(adapter.calls).toHaveLength(0);
      expect(sink.named(TelemetryEvents.ValidationFailed)[0]?.data.error).toBe("invalid_proposal");
    });

    it("treats a non-string name from an untyped caller as blank", async () => {
      const { adapter, instance } = orchestrator(byScoreTable);
      const input = { ...PROPOSAL };
      Reflect.set(input, "name", 42);

      const result = await instance.validateIdea(input);

      expect(result.error).toBe("invalid_proposal: name and concept are required");
      expect(adapter.calls).toHaveLength(0);
    });

    it("turns a failure while reading the input into a fallback result", async () => {
      const { instance } = orchestrator(byScoreTable);
      const input = {
        concept: "Shared bikes.",
        get name(): string {
          throw new Error("name unavailable");
        },
      };

      const result = await instance.validateIdea(input);

      expect(result.error).toBe("internal_error: name unavailable");
      expect(result.proposal).toEqual({ name: "", concept: "" });
      expect(result.totalSpecialistsConsulted).toBe(0);
    });

    it("rejects unknown clusters", async () => {
      const { instance } = orchestrator(byScoreTable);

      const result = await instance.validateIdea({ ...PROPOSAL, clusters: ["Beta", "Gamma"] });

      expect(result.error).toBe("unknown_cluster: unknown cluster(s): Gamma");
    });

    it("rejects negative or non-finite weights", async () => {
      const { instance } = orchestrator(byScoreTable);

      const negative = await instance.validateIdea({ ...PROPOSAL, clusterWeights: { Alpha: -1 } });
      const notANumber = await instance.validateIdea({ ...PROPOSAL, clusterWeights: { Beta: Number.NaN } });

      expect(negative.error).toBe('invalid_cluster_weights: weight for "Alpha" must be a finite number >= 0');
      expect(notANumber.error).toBe('invalid_cluster_weights: weight for "Beta" must be a finite number >= 0');
    });
  });

  it("describes the framework", () => {
    const { instance } = orchestrator(byScoreTable);

    expect(instance.frameworkInfo()).toEqual({
      catalogVersion: "test-1",
      totalSpecialists: 5,
      dependentSpecialists: 4,
      waveCount: 5,
      clusters: [
        { name: "Alpha", displayName: "Alpha Cluster", weight: 60, specialists: 3 },
        { name: "Beta", displayName: "Beta", weight: 40, specialists: 2 },
      ],
    });
  });

  it("refuses a catalog with a dependency cycle", () => {
    const catalog = twoClusterCatalog();
    const [first, second] = catalog.clusters;
    const a = first?.parameters[0]?.specialists[0];
    const b = second?.parameters[0]?.specialists[0];
    if (!a || !b) throw new Error("fixture catalog changed");
    a.dependencies = ["B One"];
    b.dependencies = ["A One"];

    expect(() => orchestrator(byScoreTable, {}, catalog)).toThrow(CatalogConfigurationError);
  });

  it("evaluates the bundled catalog end to end", async () => {
    const instance = new ValidationOrchestrator({
      registry: SpecialistRegistry.load(),
      adapter: new FixturesAdapter(),
      options: { ...OPTIONS, concurrency: 10 },
    });

    const result = await instance.validateIdea(PROPOSAL);

    expect(instance.frameworkInfo().waveCount).toBe(7);
    expect(result.totalSpecialistsConsulted).toBe(109);
    expect(result.fallbackCount).toBe(0);
    expect(Object.keys(result.clusterScores)).toHaveLength(7);
    expect(result.overallScore).toBeGreaterThanOrEqual(40);
    expect(result.overallScore).toBeLessThanOrEqual(90);
  });
});

/**
 * Aggregator Unit Tests
 *
 * Cluster and overall scores, custom weights, consensus, ordering and the
 * derived narrative outputs.
 */

import { describe, it, expect } from "vitest";
import {
  aggregate,
  classifyOutcome,
  computeConsensus,
  computeOverallScore,
  estimateReadiness,
  type AggregateOptions,
} from "../../src/evaluation/aggregator/index.js";
import { buildFallbackResult } from "../../src/evaluation/fallback-result.js";
import { evaluation } from "../helpers/evaluations.js";

const options: AggregateOptions = {
  validationId: "val_test",
  timestamp: "2026-01-01T00:00:00.000Z",
  proposal: { name: "MealMate", concept: "Weekly meal kits" },
  processingTimeMs: 1234,
};

describe("classifyOutcome", () => {
  it.each([
    [100, "Excellent"],
    [80, "Excellent"],
    [79.99, "Good"],
    [60, "Good"],
    [59.99, "Moderate"],
    [40, "Moderate"],
    [39.99, "Weak"],
    [0, "Weak"],
  ])("classifies %d as %s", (score, outcome) => {
    expect(classifyOutcome(score)).toBe(outcome);
  });
});

describe("computeOverallScore", () => {
  const scores = new Map([
    ["A", 80],
    ["B", 40],
  ]);

  it("averages cluster scores without weights", () => {
    expect(computeOverallScore(scores)).toBe(60);
  });

  it("normalises custom weights by their sum", () => {
    expect(computeOverallScore(scores, { A: 1, B: 3 })).toBe(50);
  });

  it("gives an unnamed dispatched cluster the mean supplied weight", () => {
    expect(computeOverallScore(scores, { A: 2 })).toBe(60);
    expect(computeOverallScore(new Map([...scores, ["C", 10]]), { A: 4, B: 2 })).toBe((80 * 4 + 40 * 2 + 10 * 3) / 9);
  });

  it("ignores weights for clusters that were not dispatched", () => {
    expect(computeOverallScore(scores, { Z: 5 })).toBe(60);
  });

  it("falls back to the plain mean when weights sum to zero", () => {
    expect(computeOverallScore(scores, { A: 0, B: 0 })).toBe(60);
  });

  it("returns 0 when nothing was scored", () => {
    expect(computeOverallScore(new Map())).toBe(0);
  });
});

describe("computeConsensus", () => {
  it("is 1 for identical scores", () => {
    expect(computeConsensus([75, 75, 75, 75, 75])).toBe(1);
  });

  it("is 1 for fewer than two scores", () => {
    expect(computeConsensus([42])).toBe(1);
    expect(computeConsensus([])).toBe(1);
  });

  it("is one minus the coefficient of variation", () => {
    expect(computeConsensus([10, 30, 50, 70, 90])).toBeCloseTo(1 - Math.sqrt(800) / 50, 10);
  });

  it("is clamped at 0 for extreme spread", () => {
    expect(computeConsensus([0, 0, 0, 100])).toBe(0);
  });

  it("treats all-zero scores as full agreement", () => {
    expect(computeConsensus([0, 0, 0])).toBe(1);
  });
});

describe("aggregate", () => {
  it("scores two clusters 80 and 40 as Good 60", () => {
    const result = aggregate(
      [evaluation({ cluster: "A", sub: "a1", score: 80 }), evaluation({ cluster: "B", sub: "b1", score: 40 })],
      options
    );

    expect(result.clusterScores).toEqual({ A: 80, B: 40 });
    expect(result.overallScore).toBe(60);
    expect(result.outcome).toBe("Good");
  });

  it("applies custom cluster weights", () => {
    const result = aggregate(
      [evaluation({ cluster: "A", sub: "a1", score: 80 }), evaluation({ cluster: "B", sub: "b1", score: 40 })],
      { ...options, clusterWeights: { A: 1, B: 3 } }
    );

    expect(result.overallScore).toBe(50);
    expect(result.outcome).toBe("Moderate");
  });

  it("orders the tree by code unit regardless of arrival order", () => {
    const inputs = [
      evaluation({ cluster: "alpha", parameter: "p", sub: "s2", score: 50 }),
      evaluation({ cluster: "Zeta", parameter: "q", sub: "z", score: 70 }),
      evaluation({ cluster: "alpha", parameter: "p", sub: "S1", score: 60 }),
    ];

    const forward = aggregate(inputs, options);
    const backward = aggregate([...inputs].reverse(), options);

    expect(Object.keys(forward.clusterScores)).toEqual(["Zeta", "alpha"]);
    expect(Object.keys(forward.evaluations.alpha?.p ?? {})).toEqual(["S1", "s2"]);
    expect(backward).toEqual(forward);
  });

  it("does not round scores", () => {
    const result = aggregate(
      [
        evaluation({ cluster: "A", sub: "a1", score: 70 }),
        evaluation({ cluster: "A", sub: "a2", score: 71 }),
        evaluation({ cluster: "A", sub: "a3", score: 71 }),
      ],
      options
    );

    expect(result.clusterScores.A).toBe(212 / 3);
    expect(result.overallScore).toBe(212 / 3);
  });

  it("lists weak areas ascending and keeps the first five as next steps", () => {
    const scores = [55, 30, 70, 59.9, 10, 20, 45, 50];
    const result = aggregate(
      scores.map((score, i) => evaluation({ cluster: "A", sub: `s${i}`, score })),
      options
    );

    expect(result.weakAreas.map((area) => area.score)).toEqual([10, 20, 30, 45, 50, 55, 59.9]);
    expect(result.nextSteps.map((area) => area.subParameter)).toEqual(["s4", "s5", "s1", "s6", "s7"]);
    expect(result.nextSteps[0]).toEqual({
      cluster: "A",
      parameter: "A Param",
      subParameter: "s4",
      score: 10,
      action: "Improve s4",
    });
  });

  it("counts fallbacks and consulted specialists", () => {
    const result = aggregate(
      [
        evaluation({ cluster: "A", sub: "a1", score: 50, source: "fallback" }),
        evaluation({ cluster: "A", sub: "a2", score: 70, source: "repaired" }),
      ],
      options
    );

    expect(result.totalSpecialistsConsulted).toBe(2);
    expect(result.fallbackCount).toBe(1);
    expect(result.processingTimeMs).toBe(1234);
    expect(result.error).toBeUndefined();
  });

  describe("narrative outputs", () => {
    const result = aggregate(
      [
        evaluation({
          cluster: "B",
          parameter: "P2",
          sub: "s3",
          score: 30,
          record: { recommendations: ["Fix s3", "Shared rec"], riskFactors: ["Cash runway short"] },
        }),
        evaluation({
          cluster: "A",
          parameter: "P1",
          sub: "s2",
          score: 60,
          informedBy: ["s1"],
          record: { recommendations: ["shared REC", "Fix s2"] },
        }),
        evaluation({ cluster: "A", parameter: "P1", sub: "s1", score: 80, record: { recommendations: ["Fix s1"] } }),
      ],
      { ...options, clusterDisplayNames: { A: "Alpha Display" } }
    );

    it("writes collaboration insights in order", () => {
      expect(result.collaborationInsights).toEqual([
        "Score distribution across 3 specialists: 1 high (70+), 1 medium (40-69), 1 low (below 40)",
        "Mixed signals: 1 specialist scored in the medium band, where more evidence could move the assessment either way",
        "Moderate consensus among specialists (consensus level 0.64)",
        "1 evaluation built on upstream specialist results as dependency context",
        "Strongest area: Alpha Display (score 70.0)",
        "Area for improvement: B (score 30.0)",
      ]);
    });

    it("summarizes every cluster", () => {
      expect(result.clusterSummaries).toEqual([
        {
          cluster: "A",
          displayName: "Alpha Display",
          score: 70,
          outcome: "Good",
          specialistCount: 2,
          strongest: { subParameter: "s1", score: 80 },
          weakest: { subParameter: "s2", score: 60 },
        },
        {
          cluster: "B",
          displayName: "B",
          score: 30,
          outcome: "Weak",
          specialistCount: 1,
          strongest: { subParameter: "s3", score: 30 },
          weakest: { subParameter: "s3", score: 30 },
        },
      ]);
    });

    it("collects recommendations from the weakest records first", () => {
      expect(result.keyRecommendations).toEqual(["Fix s3", "Shared rec", "Fix s2", "Fix s1"]);
    });

    it("reports risk factors of weak records", () => {
      expect(result.criticalRisks).toEqual(["Cash runway short"]);
    });

    it("derives readiness from the outcome band", () => {
      expect(result.overallScore).toBe(50);
      expect(result.readiness).toEqual({
        outcome: "Moderate",
        stage: "Concept refinement",
        timeline: "6-12 months",
        nextRequirements: [
          "Interview target customers to confirm the core problem",
          "Build a minimum viable product for the riskiest assumption",
          "Strengthen s3 (currently 30.0)",
        ],
      });
    });
  });

  it("derives risks from very low scores when none were reported", () => {
    const result = aggregate(
      [evaluation({ cluster: "A", sub: "Runway", score: 20 }), evaluation({ cluster: "A", sub: "Brand", score: 55 })],
      options
    );

    expect(result.criticalRisks).toEqual(["Risk in Runway: Runway scored 20."]);
  });

  it("skips fallback records for recommendations and risks", () => {
    const result = aggregate(
      [evaluation({ cluster: "A", sub: "Lost", score: 50, source: "fallback", record: { riskFactors: ["x"] } })],
      options
    );

    expect(result.keyRecommendations).toEqual([]);
    expect(result.criticalRisks).toEqual([]);
    expect(result.collaborationInsights).toContain("1 specialist fell back to a neutral score after a failed assessment");
  });
});

describe("estimateReadiness", () => {
  it("maps each band to a stage", () => {
    expect(estimateReadiness(85, []).stage).toBe("Investment ready");
    expect(estimateReadiness(65, []).timeline).toBe("3-6 months");
    expect(estimateReadiness(10, []).stage).toBe("Early ideation");
  });
});

describe("buildFallbackResult", () => {
  it("produces a neutral, well-formed result carrying the error", () => {
    const result = buildFallbackResult({
      validationId: "val_x",
      timestamp: options.timestamp,
      proposal: options.proposal,
      processingTimeMs: 3,
      error: "invalid_proposal: name and concept are required",
    });

    expect(result).toMatchObject({
      overallScore: 50,
      outcome: "Moderate",
      clusterScores: {},
      evaluations: {},
      weakAreas: [],
      totalSpecialistsConsulted: 0,
      fallbackCount: 0,
      error: "invalid_proposal: name and concept are required",
      readiness: { stage: "Concept refinement" },
    });
  });
});

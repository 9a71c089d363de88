import type { ReadinessEstimate, ValidationOutcome, WeakArea } from "../types.js";
import { classifyOutcome } from "./outcome.js";

const READINESS_BY_OUTCOME: Record<ValidationOutcome, Omit<ReadinessEstimate, "outcome">> = {
  Excellent: {
    stage: "Investment ready",
    timeline: "0-3 months",
    nextRequirements: [
      "Prepare investor materials and a data room",
      "Scale the most efficient acquisition channels",
    ],
  },
  Good: {
    stage: "Market validation",
    timeline: "3-6 months",
    nextRequirements: [
      "Run a paid pilot with target customers",
      "Validate unit economics with real usage data",
    ],
  },
  Moderate: {
    stage: "Concept refinement",
    timeline: "6-12 months",
    nextRequirements: [
      "Interview target customers to confirm the core problem",
      "Build a minimum viable product for the riskiest assumption",
    ],
  },
  Weak: {
    stage: "Early ideation",
    timeline: "12+ months",
    nextRequirements: [
      "Revisit the problem definition and target segment",
      "Research competitors and substitutes in depth",
    ],
  },
};

const FOCUS_AREAS = 2;

/**
 * Maturity estimate derived from the outcome band of the overall score,
 * plus the weakest areas as explicit focus items.
 */
export function estimateReadiness(overallScore: number, weakAreas: readonly WeakArea[]): ReadinessEstimate {
  const outcome = classifyOutcome(overallScore);
  const base = READINESS_BY_OUTCOME[outcome];
  const focus = weakAreas
    .slice(0, FOCUS_AREAS)
    .map((area) => `Strengthen ${area.subParameter} (currently ${area.score.toFixed(1)})`);

  return {
    outcome,
    stage: base.stage,
    timeline: base.timeline,
    nextRequirements: [...base.nextRequirements, ...focus],
  };
}

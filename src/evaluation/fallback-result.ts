import type { Proposal, ValidationResult } from "./types.js";
import { FALLBACK_SCORE } from "./invoker/repair.js";
import { classifyOutcome, estimateReadiness } from "./aggregator/index.js";

export interface FallbackResultInput {
  validationId: string;
  timestamp: string;
  proposal: Proposal;
  processingTimeMs: number;
  error: string;
}

/**
 * Well-formed result for a run that could not proceed: neutral score,
 * empty collections and an explicit error.
 */
export function buildFallbackResult(input: FallbackResultInput): ValidationResult {
  return {
    validationId: input.validationId,
    timestamp: input.timestamp,
    proposal: input.proposal,
    overallScore: FALLBACK_SCORE,
    outcome: classifyOutcome(FALLBACK_SCORE),
    clusterScores: {},
    evaluations: {},
    consensusLevel: 0,
    collaborationInsights: [],
    overallSummary: `Validation of "${input.proposal.name}" could not be completed: ${input.error}`,
    weakAreas: [],
    nextSteps: [],
    clusterSummaries: [],
    keyRecommendations: [],
    criticalRisks: [],
    readiness: estimateReadiness(FALLBACK_SCORE, []),
    totalSpecialistsConsulted: 0,
    fallbackCount: 0,
    processingTimeMs: input.processingTimeMs,
    error: input.error,
  };
}

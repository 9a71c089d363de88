/**
 * Aggregator
 *
 * Pure fold of per-specialist evaluations into a ValidationResult. Output
 * ordering depends only on (cluster, parameter, sub-parameter), never on
 * the order in which evaluations arrived.
 */

import type {
  EvaluationTree,
  Proposal,
  SpecialistEvaluation,
  ValidationResult,
  WeakArea,
} from "../types.js";
import { compareText } from "../text.js";
import { classifyOutcome } from "./outcome.js";
import { estimateReadiness } from "./readiness.js";
import {
  buildClusterSummaries,
  buildCollaborationInsights,
  buildCriticalRisks,
  buildKeyRecommendations,
} from "./insights.js";
import { buildOverallSummary } from "./summary.js";

export { classifyOutcome, OUTCOME_BANDS } from "./outcome.js";
export { estimateReadiness } from "./readiness.js";

export const WEAK_AREA_THRESHOLD = 60;
export const MAX_NEXT_STEPS = 5;

export interface AggregateOptions {
  validationId: string;
  timestamp: string;
  proposal: Proposal;
  processingTimeMs: number;
  /** Relative weights between clusters for the overall score */
  clusterWeights?: Readonly<Record<string, number>>;
  clusterDisplayNames?: Readonly<Record<string, string>>;
}

export function compareEvaluations(a: SpecialistEvaluation, b: SpecialistEvaluation): number {
  return (
    compareText(a.cluster, b.cluster) ||
    compareText(a.parameter, b.parameter) ||
    compareText(a.subParameter, b.subParameter) ||
    compareText(a.specialistId, b.specialistId)
  );
}

function mean(values: readonly number[]): number {
  return values.reduce((sum, value) => sum + value, 0) / values.length;
}

/**
 * Mean score per cluster, keyed in sorted cluster order.
 */
export function computeClusterScores(sorted: readonly SpecialistEvaluation[]): Map<string, number> {
  const grouped = new Map<string, number[]>();
  for (const evaluation of sorted) {
    const scores = grouped.get(evaluation.cluster) ?? [];
    scores.push(evaluation.record.score);
    grouped.set(evaluation.cluster, scores);
  }
  return new Map([...grouped].map(([cluster, scores]) => [cluster, mean(scores)]));
}

function isUsableWeight(weight: number | undefined): weight is number {
  return typeof weight === "number" && Number.isFinite(weight) && weight >= 0;
}

/**
 * Unweighted mean of cluster scores, or the weighted mean normalised by the
 * weight sum when custom weights are supplied. A dispatched cluster missing
 * from the weights gets the mean of the supplied ones.
 */
export function computeOverallScore(
  clusterScores: ReadonlyMap<string, number>,
  clusterWeights?: Readonly<Record<string, number>>
): number {
  const clusters = [...clusterScores.keys()];
  if (clusters.length === 0) {
    return 0;
  }

  const supplied = clusterWeights
    ? clusters.flatMap((cluster) => {
        const weight = Object.hasOwn(clusterWeights, cluster) ? clusterWeights[cluster] : undefined;
        return isUsableWeight(weight) ? [[cluster, weight] as const] : [];
      })
    : [];

  if (supplied.length === 0) {
    return mean([...clusterScores.values()]);
  }

  const weights = new Map<string, number>(supplied);
  const defaultWeight = mean(supplied.map(([, weight]) => weight));
  let weightedSum = 0;
  let totalWeight = 0;
  for (const [cluster, score] of clusterScores) {
    const weight = weights.get(cluster) ?? defaultWeight;
    weightedSum += score * weight;
    totalWeight += weight;
  }

  return totalWeight > 0 ? weightedSum / totalWeight : mean([...clusterScores.values()]);
}

/**
 * 1 - coefficient of variation (population standard deviation / mean),
 * clamped to [0, 1].
 */
export function computeConsensus(scores: readonly number[]): number {
  if (scores.length < 2) {
    return 1;
  }
  const average = mean(scores);
  const variance = mean(scores.map((score) => (score - average) ** 2));
  if (variance === 0) {
    return 1;
  }
  if (average <= 0) {
    return 0;
  }
  const consensus = 1 - Math.sqrt(variance) / average;
  return Math.min(1, Math.max(0, consensus));
}

function buildTree(sorted: readonly SpecialistEvaluation[]): EvaluationTree {
  const tree: EvaluationTree = {};
  for (const evaluation of sorted) {
    const parameters = (tree[evaluation.cluster] ??= {});
    const subParameters = (parameters[evaluation.parameter] ??= {});
    subParameters[evaluation.subParameter] = evaluation;
  }
  return tree;
}

export function findWeakAreas(sorted: readonly SpecialistEvaluation[]): WeakArea[] {
  return sorted
    .filter((evaluation) => evaluation.record.score < WEAK_AREA_THRESHOLD)
    .sort((a, b) => a.record.score - b.record.score)
    .map((evaluation) => ({
      cluster: evaluation.cluster,
      parameter: evaluation.parameter,
      subParameter: evaluation.subParameter,
      score: evaluation.record.score,
      action: evaluation.record.recommendations[0] ?? `Strengthen ${evaluation.subParameter}`,
    }));
}

export function aggregate(evaluations: readonly SpecialistEvaluation[], options: AggregateOptions): ValidationResult {
  const sorted = [...evaluations].sort(compareEvaluations);
  const displayNames = options.clusterDisplayNames ?? {};

  const clusterScores = computeClusterScores(sorted);
  const overallScore = computeOverallScore(clusterScores, options.clusterWeights);
  const consensusLevel = computeConsensus(sorted.map((evaluation) => evaluation.record.score));
  const weakAreas = findWeakAreas(sorted);
  const clusterSummaries = buildClusterSummaries(sorted, clusterScores, displayNames);

  return {
    validationId: options.validationId,
    timestamp: options.timestamp,
    proposal: { name: options.proposal.name, concept: options.proposal.concept },
    overallScore,
    outcome: classifyOutcome(overallScore),
    clusterScores: Object.fromEntries(clusterScores),
    evaluations: buildTree(sorted),
    consensusLevel,
    collaborationInsights: buildCollaborationInsights(sorted, clusterScores, consensusLevel, displayNames),
    overallSummary: buildOverallSummary(options.proposal, overallScore, sorted, clusterSummaries),
    weakAreas,
    nextSteps: weakAreas.slice(0, MAX_NEXT_STEPS),
    clusterSummaries,
    keyRecommendations: buildKeyRecommendations(sorted),
    criticalRisks: buildCriticalRisks(sorted),
    readiness: estimateReadiness(overallScore, weakAreas),
    totalSpecialistsConsulted: sorted.length,
    fallbackCount: sorted.filter((evaluation) => evaluation.source === "fallback").length,
    processingTimeMs: options.processingTimeMs,
  };
}

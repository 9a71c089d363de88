/**
 * Narrative outputs derived from the sorted evaluations: collaboration
 * insights, per-cluster summaries, key recommendations and critical risks.
 */

import type { ClusterSummary, SpecialistEvaluation } from "../types.js";
import { firstSentences } from "../text.js";
import { classifyOutcome } from "./outcome.js";

export const HIGH_BAND_MIN = 70;
export const MEDIUM_BAND_MIN = 40;
export const MAX_KEY_RECOMMENDATIONS = 5;
export const MAX_CRITICAL_RISKS = 5;

const RISK_SCORE_CEILING = 60;
const DERIVED_RISK_SCORE_CEILING = 40;

function plural(count: number, singular: string, pluralForm = `${singular}s`): string {
  return `${count} ${count === 1 ? singular : pluralForm}`;
}

function byScoreAscending(evaluations: readonly SpecialistEvaluation[]): SpecialistEvaluation[] {
  // Array.prototype.sort is stable, so equal scores keep tree order
  return [...evaluations].sort((a, b) => a.record.score - b.record.score);
}

function displayName(cluster: string, displayNames: Readonly<Record<string, string>>): string {
  return displayNames[cluster] ?? cluster;
}

export function buildCollaborationInsights(
  evaluations: readonly SpecialistEvaluation[],
  clusterScores: ReadonlyMap<string, number>,
  consensusLevel: number,
  displayNames: Readonly<Record<string, string>>
): string[] {
  const insights: string[] = [];
  const scores = evaluations.map((evaluation) => evaluation.record.score);
  const high = scores.filter((score) => score >= HIGH_BAND_MIN).length;
  const medium = scores.filter((score) => score >= MEDIUM_BAND_MIN && score < HIGH_BAND_MIN).length;
  const low = scores.length - high - medium;

  insights.push(
    `Score distribution across ${plural(scores.length, "specialist")}: ${high} high (70+), ${medium} medium (40-69), ${low} low (below 40)`
  );
  if (medium > 0) {
    insights.push(
      `Mixed signals: ${plural(medium, "specialist")} scored in the medium band, where more evidence could move the assessment either way`
    );
  }

  const consensus = consensusLevel.toFixed(2);
  if (consensusLevel >= 0.8) {
    insights.push(`High consensus among specialists (consensus level ${consensus})`);
  } else if (consensusLevel >= 0.6) {
    insights.push(`Moderate consensus among specialists (consensus level ${consensus})`);
  } else {
    insights.push(
      `Significant disagreement among specialists (consensus level ${consensus}); the idea shows mixed strengths and weaknesses`
    );
  }

  const informed = evaluations.filter((evaluation) => evaluation.informedBy.length > 0).length;
  if (informed > 0) {
    insights.push(`${plural(informed, "evaluation")} built on upstream specialist results as dependency context`);
  }

  const fallbacks = evaluations.filter((evaluation) => evaluation.source === "fallback").length;
  if (fallbacks > 0) {
    insights.push(`${plural(fallbacks, "specialist")} fell back to a neutral score after a failed assessment`);
  }

  let strongest: [string, number] | undefined;
  let weakest: [string, number] | undefined;
  for (const [cluster, score] of clusterScores) {
    if (!strongest || score > strongest[1]) strongest = [cluster, score];
    if (!weakest || score < weakest[1]) weakest = [cluster, score];
  }
  if (strongest) {
    insights.push(`Strongest area: ${displayName(strongest[0], displayNames)} (score ${strongest[1].toFixed(1)})`);
  }
  if (weakest && clusterScores.size > 1) {
    insights.push(`Area for improvement: ${displayName(weakest[0], displayNames)} (score ${weakest[1].toFixed(1)})`);
  }

  return insights;
}

export function buildClusterSummaries(
  evaluations: readonly SpecialistEvaluation[],
  clusterScores: ReadonlyMap<string, number>,
  displayNames: Readonly<Record<string, string>>
): ClusterSummary[] {
  const summaries: ClusterSummary[] = [];

  for (const [cluster, score] of clusterScores) {
    const members = evaluations.filter((evaluation) => evaluation.cluster === cluster);
    const first = members[0];
    if (!first) continue;

    let strongest = first;
    let weakest = first;
    for (const member of members) {
      if (member.record.score > strongest.record.score) strongest = member;
      if (member.record.score < weakest.record.score) weakest = member;
    }

    summaries.push({
      cluster,
      displayName: displayName(cluster, displayNames),
      score,
      outcome: classifyOutcome(score),
      specialistCount: members.length,
      strongest: { subParameter: strongest.subParameter, score: strongest.record.score },
      weakest: { subParameter: weakest.subParameter, score: weakest.record.score },
    });
  }

  return summaries;
}

function collectUnique(values: Iterable<string>, limit: number): string[] {
  const seen = new Set<string>();
  const collected: string[] = [];
  for (const value of values) {
    const key = value.toLowerCase();
    if (seen.has(key)) continue;
    seen.add(key);
    collected.push(value);
    if (collected.length >= limit) break;
  }
  return collected;
}

/**
 * Recommendations from the lowest-scoring real assessments first. Fallback
 * records only hold placeholders and are skipped.
 */
export function buildKeyRecommendations(evaluations: readonly SpecialistEvaluation[]): string[] {
  const assessed = byScoreAscending(evaluations).filter((evaluation) => evaluation.source !== "fallback");
  return collectUnique(
    assessed.flatMap((evaluation) => evaluation.record.recommendations),
    MAX_KEY_RECOMMENDATIONS
  );
}

/**
 * Risk factors reported by weak areas, lowest score first. When no
 * specialist named a risk, the weakest sub-parameters become risks.
 */
export function buildCriticalRisks(evaluations: readonly SpecialistEvaluation[]): string[] {
  const assessed = byScoreAscending(evaluations).filter((evaluation) => evaluation.source !== "fallback");

  const reported = collectUnique(
    assessed
      .filter((evaluation) => evaluation.record.score < RISK_SCORE_CEILING)
      .flatMap((evaluation) => evaluation.record.riskFactors),
    MAX_CRITICAL_RISKS
  );
  if (reported.length > 0) {
    return reported;
  }

  return collectUnique(
    assessed
      .filter((evaluation) => evaluation.record.score < DERIVED_RISK_SCORE_CEILING)
      .map((evaluation) => `Risk in ${evaluation.subParameter}: ${firstSentences(evaluation.record.explanation, 1)}`),
    MAX_CRITICAL_RISKS
  );
}

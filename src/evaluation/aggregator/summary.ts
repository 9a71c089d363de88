/**
 * Narrative overall summary of a run: concept overview, top strengths and
 * challenges quoted from specialist explanations, per-cluster performance
 * and a closing assessment keyed on the outcome band.
 */

import type { ClusterSummary, Proposal, SpecialistEvaluation, ValidationOutcome } from "../types.js";
import { firstSentences, truncateChars } from "../text.js";
import { classifyOutcome } from "./outcome.js";

export const MAX_SUMMARY_HIGHLIGHTS = 3;
export const CONCEPT_OVERVIEW_MAX_CHARS = 200;

const INTERPRETATION: Record<ValidationOutcome, string> = {
  Excellent: "exceptional potential with outstanding market viability",
  Good: "strong potential with good market prospects",
  Moderate: "moderate potential requiring significant improvements",
  Weak: "limited potential with substantial challenges",
};

const FINAL_ASSESSMENT: Record<ValidationOutcome, string> = {
  Excellent: "demonstrates strong potential for success with proper execution",
  Good: "shows promise and needs targeted improvements in a few areas",
  Moderate: "shows promise but requires significant improvements in key areas",
  Weak: "faces substantial challenges that must be addressed before proceeding",
};

function highlight(evaluation: SpecialistEvaluation): string {
  const sentence = firstSentences(evaluation.record.explanation, 1) || evaluation.subParameter;
  return `- ${evaluation.subParameter} (${evaluation.record.score.toFixed(1)}/100): ${sentence}`;
}

function section(title: string, lines: readonly string[], empty: string): string {
  return `${title}:\n${lines.length > 0 ? lines.join("\n") : `- ${empty}`}`;
}

/**
 * Strengths are assessed records in the Excellent band, challenges those in
 * the Weak band; fallback records are never quoted.
 */
export function buildOverallSummary(
  proposal: Proposal,
  overallScore: number,
  sorted: readonly SpecialistEvaluation[],
  clusterSummaries: readonly ClusterSummary[]
): string {
  const outcome = classifyOutcome(overallScore);
  const assessed = sorted.filter((evaluation) => evaluation.source !== "fallback");

  const strengths = assessed
    .filter((evaluation) => classifyOutcome(evaluation.record.score) === "Excellent")
    .sort((a, b) => b.record.score - a.record.score)
    .slice(0, MAX_SUMMARY_HIGHLIGHTS)
    .map(highlight);
  const challenges = assessed
    .filter((evaluation) => classifyOutcome(evaluation.record.score) === "Weak")
    .sort((a, b) => a.record.score - b.record.score)
    .slice(0, MAX_SUMMARY_HIGHLIGHTS)
    .map(highlight);
  const clusters = clusterSummaries.map(
    (summary) => `- ${summary.displayName}: ${summary.score.toFixed(1)}/100 (${summary.outcome})`
  );

  return [
    `"${proposal.name}" was evaluated by ${sorted.length} specialists and scored ${overallScore.toFixed(1)}/100 (${outcome}): ${INTERPRETATION[outcome]}.`,
    `CONCEPT OVERVIEW:\n${truncateChars(proposal.concept, CONCEPT_OVERVIEW_MAX_CHARS)}`,
    section("KEY STRENGTHS", strengths, "No standout strengths identified"),
    section("CRITICAL CHALLENGES", challenges, "No major fundamental issues identified"),
    section("CLUSTER PERFORMANCE", clusters, "No clusters evaluated"),
    `FINAL ASSESSMENT:\nThis concept ${FINAL_ASSESSMENT[outcome]}.`,
  ].join("\n\n");
}

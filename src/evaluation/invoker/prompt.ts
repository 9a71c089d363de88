import type { ClusterDefinition, DependencyContextEntry, Proposal, Specialist } from "../types.js";
import { truncateChars } from "../text.js";
import { detectIndustry } from "./industry.js";

export const MAX_DEPENDENCY_CONTEXT_ENTRIES = 8;
export const DEPENDENCY_EXPLANATION_MAX_CHARS = 240;
export const EXPLANATION_MAX_WORDS = 75;

const SCORING_RUBRIC = [
  "90-100: Outstanding - exceeds expectations significantly",
  "80-89: Strong - above market standards",
  "70-79: Good - meets expectations well",
  "60-69: Acceptable - meets basic requirements",
  "50-59: Below expectations - needs improvement",
  "40-49: Weak - major improvements required",
  "30-39: Poor - fundamental problems",
  "0-29: Critical - not viable",
];

export interface SpecialistPrompt {
  system: string;
  prompt: string;
}

/**
 * Trim dependency context to what a downstream specialist needs: the score
 * and a short explanation per upstream result.
 */
export function summarizeDependencyContext(entries: readonly DependencyContextEntry[]): DependencyContextEntry[] {
  return entries.slice(0, MAX_DEPENDENCY_CONTEXT_ENTRIES).map((entry) => ({
    subParameter: entry.subParameter,
    score: entry.score,
    explanation: truncateChars(entry.explanation, DEPENDENCY_EXPLANATION_MAX_CHARS),
  }));
}

function formatDependencyContext(entries: readonly DependencyContextEntry[]): string {
  if (entries.length === 0) {
    return "No upstream assessments are available; evaluate independently.";
  }
  return entries
    .map((entry) => `- ${entry.subParameter}: ${Math.round(entry.score)}/100 - ${entry.explanation}`)
    .join("\n");
}

export function buildSpecialistPrompt(
  specialist: Specialist,
  cluster: ClusterDefinition,
  proposal: Proposal,
  dependencyContext: readonly DependencyContextEntry[]
): SpecialistPrompt {
  const industry = detectIndustry(proposal.name, proposal.concept);

  const system = `${cluster.persona}
Your role: ${specialist.role}.
You assess exactly one sub-parameter of a venture proposal and answer with a single JSON object.`;

  const prompt = `## Proposal
Name: ${proposal.name}
Concept: ${proposal.concept}
Industry context: ${industry}

## Your Assignment
Cluster: ${cluster.displayName} (${cluster.weight}% of the overall assessment)
Parameter: ${specialist.parameter}
Sub-parameter: ${specialist.subParameter}
Goal: Evaluate ${specialist.subParameter} for this ${industry} proposal with concrete, evidence-based reasoning.

## Upstream Assessments
${formatDependencyContext(dependencyContext)}

## Scoring Rubric (0-100)
${SCORING_RUBRIC.join("\n")}

## Response Format
Respond with ONLY this JSON object:
{
  "score": <number 0-100>,
  "confidence_level": <number 0.0-1.0>,
  "explanation": "<at most ${EXPLANATION_MAX_WORDS} words>",
  "strengths": ["<2-3 items>"],
  "weaknesses": ["<2-3 items>"],
  "key_insights": ["<2-3 items>"],
  "recommendations": ["<2-3 actionable items>"],
  "risk_factors": ["<0-3 items>"],
  "assumptions": ["<0-3 items>"]
}`;

  return { system, prompt };
}

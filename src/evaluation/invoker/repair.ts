/**
 * Repair step for specialist responses: clamps ranges and guarantees the
 * non-empty list invariant with deterministic, sub-parameter-referencing
 * placeholders.
 */

import type { EvaluationRecord, FallbackReason } from "../types.js";
import { collapseWhitespace } from "../text.js";

export const FALLBACK_SCORE = 50;
export const FALLBACK_CONFIDENCE = 0.5;
export const DEFAULT_CONFIDENCE = 0.7;
export const SALVAGED_CONFIDENCE = 0.6;
export const MAX_LIST_ITEMS = 5;

export type RequiredListField = "strengths" | "weaknesses" | "keyInsights" | "recommendations";
export type OptionalListField = "riskFactors" | "assumptions";

const PLACEHOLDERS: Record<RequiredListField, (subParameter: string) => string[]> = {
  strengths: (sub) => [
    `${sub} shows potential that further evidence could confirm`,
    `The proposal gives a starting point to build on for ${sub}`,
  ],
  weaknesses: (sub) => [
    `${sub} lacks supporting evidence in the proposal`,
    `Key assumptions about ${sub} remain unvalidated`,
  ],
  keyInsights: (sub) => [
    `${sub} needs deeper analysis before it can be relied on`,
    `Concrete evidence on ${sub} would materially change this assessment`,
    `${sub} should be revisited once market feedback is available`,
  ],
  recommendations: (sub) => [
    `Gather concrete evidence for ${sub}`,
    `Define measurable targets for ${sub}`,
    `Review ${sub} with domain experts`,
  ],
};

export function placeholderList(field: RequiredListField, subParameter: string): string[] {
  return PLACEHOLDERS[field](subParameter);
}

export function clampScore(score: number): number {
  return Math.min(100, Math.max(0, score));
}

export function clampConfidence(confidence: number): number {
  return Math.min(1, Math.max(0, confidence));
}

function listItemText(item: unknown): string | undefined {
  if (typeof item === "string") return collapseWhitespace(item);
  if (typeof item === "number" || typeof item === "boolean") return String(item);
  return undefined;
}

/**
 * Normalize a raw list value: strings only, trimmed, de-duplicated
 * (case-insensitive), capped at MAX_LIST_ITEMS. Records every change in
 * `repairs`.
 */
export function cleanList(value: unknown, field: RequiredListField | OptionalListField, repairs: string[]): string[] {
  if (value === undefined || value === null) {
    return [];
  }

  let items: unknown[];
  if (Array.isArray(value)) {
    items = value;
  } else {
    items = [value];
    repairs.push(`${field}_coerced`);
  }

  const seen = new Set<string>();
  const cleaned: string[] = [];
  let dropped = false;
  for (const item of items) {
    const text = listItemText(item);
    if (!text) {
      dropped = true;
      continue;
    }
    const key = text.toLowerCase();
    if (seen.has(key)) {
      dropped = true;
      continue;
    }
    seen.add(key);
    cleaned.push(text);
  }
  if (dropped) {
    repairs.push(`${field}_cleaned`);
  }

  if (cleaned.length > MAX_LIST_ITEMS) {
    repairs.push(`${field}_truncated`);
    return cleaned.slice(0, MAX_LIST_ITEMS);
  }
  return cleaned;
}

/**
 * Like cleanList, but an empty result is replaced with placeholders.
 */
export function requiredList(value: unknown, field: RequiredListField, subParameter: string, repairs: string[]): string[] {
  const cleaned = cleanList(value, field, repairs);
  if (cleaned.length > 0) {
    return cleaned;
  }
  repairs.push(`${field}_placeholder`);
  return placeholderList(field, subParameter);
}

export function describeFallbackReason(reason: FallbackReason): string {
  switch (reason) {
    case "timeout":
      return "the inference call timed out";
    case "cancelled":
      return "the run deadline was reached before the call completed";
    case "upstream_error":
      return "the inference service returned an error";
    case "empty_response":
      return "the inference service returned an empty response";
    case "unparseable":
      return "the response could not be interpreted";
  }
}

/**
 * Neutral record used whenever a specialist cannot produce a usable result.
 */
export function buildFallbackRecord(subParameter: string, reason: FallbackReason): EvaluationRecord {
  return {
    score: FALLBACK_SCORE,
    confidence: FALLBACK_CONFIDENCE,
    explanation: `Fallback evaluation used for ${subParameter}: ${describeFallbackReason(reason)}. The score is set to a neutral ${FALLBACK_SCORE} until a successful assessment is available.`,
    strengths: placeholderList("strengths", subParameter),
    weaknesses: placeholderList("weaknesses", subParameter),
    keyInsights: placeholderList("keyInsights", subParameter),
    recommendations: placeholderList("recommendations", subParameter),
    riskFactors: [],
    assumptions: [],
  };
}

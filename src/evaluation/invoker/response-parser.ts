/**
 * Interpretation of raw specialist responses.
 *
 * The service's reply is modelled as a tagged result:
 * - parsed:   schema-valid JSON that needed no changes
 * - repaired: a usable record after one or more repairs (listed)
 * - fallback: nothing usable; carries the reason
 */

import { z } from "zod";
import { extractJsonFromResponse } from "../../utils/json-extractor.js";
import type { EvaluationRecord, EvaluationSource, FallbackReason } from "../types.js";
import { collapseWhitespace, firstSentences, truncateWords } from "../text.js";
import { EXPLANATION_MAX_WORDS } from "./prompt.js";
import {
  DEFAULT_CONFIDENCE,
  SALVAGED_CONFIDENCE,
  buildFallbackRecord,
  clampConfidence,
  clampScore,
  cleanList,
  placeholderList,
  requiredList,
} from "./repair.js";

const NumberLike = z.union([z.number(), z.string()]);

/**
 * Lenient view of the JSON a specialist is asked for. Only `score` is
 * required; camelCase aliases are accepted for the list fields.
 */
export const RawSpecialistResponse = z.object({
  score: NumberLike,
  confidence_level: NumberLike.optional(),
  confidence: NumberLike.optional(),
  explanation: z.string().optional(),
  strengths: z.unknown().optional(),
  weaknesses: z.unknown().optional(),
  key_insights: z.unknown().optional(),
  keyInsights: z.unknown().optional(),
  recommendations: z.unknown().optional(),
  risk_factors: z.unknown().optional(),
  riskFactors: z.unknown().optional(),
  assumptions: z.unknown().optional(),
});

type RawSpecialistResponseT = z.infer<typeof RawSpecialistResponse>;

export type InterpretedResponse =
  | { kind: "parsed"; record: EvaluationRecord }
  | { kind: "repaired"; record: EvaluationRecord; repairs: string[] }
  | { kind: "fallback"; reason: FallbackReason };

export interface MaterializedEvaluation {
  record: EvaluationRecord;
  source: EvaluationSource;
  repairs: string[];
  fallbackReason?: FallbackReason;
}

export interface InterpretOptions {
  task?: string;
  model?: string;
  correlationId?: string;
}

// "score" then at most a quote and a ":", "=", "is" or "of" before the number
const SCORE_TOKEN = /\bscore\b["']?\s*(?:[:=]|\bis\b|\bof\b)?\s*(-?\d+(?:\.\d+)?)(?:\s*(?:\/|out of)\s*(5|10|100)\b)?/i;

function toNumber(value: number | string): number | undefined {
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : undefined;
  }
  const match = /-?\d+(?:\.\d+)?/.exec(value);
  return match ? Number.parseFloat(match[0]) : undefined;
}

function normalizeConfidence(raw: number | string | undefined, repairs: string[]): number {
  const value = raw === undefined ? undefined : toNumber(raw);
  if (value === undefined) {
    repairs.push("confidence_defaulted");
    return DEFAULT_CONFIDENCE;
  }
  if (typeof raw === "string") {
    repairs.push("confidence_coerced");
  }
  if (value > 1 && value <= 100) {
    repairs.push("confidence_percent");
    return value / 100;
  }
  if (value < 0 || value > 1) {
    repairs.push("confidence_clamped");
    return clampConfidence(value);
  }
  return value;
}

function normalizeExplanation(raw: string | undefined, subParameter: string, score: number, repairs: string[]): string {
  const text = raw?.trim();
  if (!text) {
    repairs.push("explanation_synthesized");
    return `${subParameter} was assessed at ${Math.round(score)}/100 without a written rationale.`;
  }
  if (collapseWhitespace(text).split(" ").length > EXPLANATION_MAX_WORDS) {
    repairs.push("explanation_truncated");
  }
  return truncateWords(text, EXPLANATION_MAX_WORDS);
}

function normalizeParsed(raw: RawSpecialistResponseT, subParameter: string, repairs: string[]): EvaluationRecord | undefined {
  const rawScore = toNumber(raw.score);
  if (rawScore === undefined) {
    return undefined;
  }
  if (typeof raw.score === "string") {
    repairs.push("score_coerced");
  }
  const score = clampScore(rawScore);
  if (score !== rawScore) {
    repairs.push("score_clamped");
  }

  return {
    score,
    confidence: normalizeConfidence(raw.confidence_level ?? raw.confidence, repairs),
    explanation: normalizeExplanation(raw.explanation, subParameter, score, repairs),
    strengths: requiredList(raw.strengths, "strengths", subParameter, repairs),
    weaknesses: requiredList(raw.weaknesses, "weaknesses", subParameter, repairs),
    keyInsights: requiredList(raw.key_insights ?? raw.keyInsights, "keyInsights", subParameter, repairs),
    recommendations: requiredList(raw.recommendations, "recommendations", subParameter, repairs),
    riskFactors: cleanList(raw.risk_factors ?? raw.riskFactors, "riskFactors", repairs),
    assumptions: cleanList(raw.assumptions, "assumptions", repairs),
  };
}

/**
 * Best-effort salvage from free text: a `score` token followed by a number.
 * "4/5" and "4 out of 5" scale by 20, "7/10" by 10.
 */
export function salvageFromText(
  text: string,
  subParameter: string
): { record: EvaluationRecord; repairs: string[] } | undefined {
  const match = SCORE_TOKEN.exec(text);
  if (!match?.[1]) {
    return undefined;
  }

  const repairs = ["text_salvage"];
  let score = Number.parseFloat(match[1]);
  if (match[2] === "5") {
    score *= 20;
    repairs.push("score_rescaled");
  } else if (match[2] === "10") {
    score *= 10;
    repairs.push("score_rescaled");
  }
  const clamped = clampScore(score);
  if (clamped !== score) {
    repairs.push("score_clamped");
  }

  const explanation = normalizeExplanation(firstSentences(text, 3), subParameter, clamped, repairs);
  repairs.push("strengths_placeholder", "weaknesses_placeholder", "keyInsights_placeholder", "recommendations_placeholder");

  return {
    record: {
      score: clamped,
      confidence: SALVAGED_CONFIDENCE,
      explanation,
      strengths: placeholderList("strengths", subParameter),
      weaknesses: placeholderList("weaknesses", subParameter),
      keyInsights: placeholderList("keyInsights", subParameter),
      recommendations: placeholderList("recommendations", subParameter),
      riskFactors: [],
      assumptions: [],
    },
    repairs,
  };
}

/**
 * Steps 1-3 of response handling: structured parse, text salvage, repair.
 */
export function interpretResponse(text: string, subParameter: string, options: InterpretOptions = {}): InterpretedResponse {
  if (!text.trim()) {
    return { kind: "fallback", reason: "empty_response" };
  }

  let json: unknown;
  let wasExtracted = false;
  try {
    const extraction = extractJsonFromResponse(text, { ...options, logWarnings: false });
    json = extraction.json;
    wasExtracted = extraction.wasExtracted;
  } catch {
    json = undefined;
  }

  if (json !== undefined) {
    const parsed = RawSpecialistResponse.safeParse(json);
    if (parsed.success) {
      const repairs: string[] = wasExtracted ? ["json_extracted"] : [];
      const record = normalizeParsed(parsed.data, subParameter, repairs);
      if (record) {
        return repairs.length === 0 ? { kind: "parsed", record } : { kind: "repaired", record, repairs };
      }
    }
  }

  const salvaged = salvageFromText(text, subParameter);
  if (salvaged) {
    return { kind: "repaired", record: salvaged.record, repairs: salvaged.repairs };
  }

  return { kind: "fallback", reason: "unparseable" };
}

/**
 * Step 4: turn any interpretation into a canonical record.
 */
export function materialize(interpreted: InterpretedResponse, subParameter: string): MaterializedEvaluation {
  switch (interpreted.kind) {
    case "parsed":
      return { record: interpreted.record, source: "parsed", repairs: [] };
    case "repaired":
      return { record: interpreted.record, source: "repaired", repairs: interpreted.repairs };
    case "fallback":
      return {
        record: buildFallbackRecord(subParameter, interpreted.reason),
        source: "fallback",
        repairs: [],
        fallbackReason: interpreted.reason,
      };
    default: {
      const unreachable: never = interpreted;
      return unreachable;
    }
  }
}

/**
 * JSON Extractor Utility
 *
 * Extracts valid JSON from LLM responses that may contain conversational
 * preamble, suffix text, or markdown code blocks, even when the model was
 * told to answer with JSON only.
 */

import { log, emit, TelemetryEvents } from "./telemetry.js";

export type JsonExtractionMethod = "fast_path" | "code_block" | "boundary" | "bracket_matching";

/**
 * Result of JSON extraction
 */
export interface JsonExtractionResult {
  /** The extracted and parsed JSON */
  json: unknown;
  /** True if the raw content wasn't valid JSON as-is */
  wasExtracted: boolean;
  extractionMethod: JsonExtractionMethod;
  preambleLength: number;
  suffixLength: number;
}

export interface JsonExtractionOptions {
  /** Task name for telemetry (e.g. the specialist id) */
  task?: string;
  model?: string;
  correlationId?: string;
  logWarnings?: boolean;
}

/**
 * Extract JSON from an LLM response.
 *
 * Strategy (in order):
 * 1. Parse raw content as-is (fast path)
 * 2. Scan every markdown code block (```json ... ```)
 * 3. Bracket-match from each candidate `{` or `[` until valid JSON is found
 *
 * @throws Error if no valid JSON can be extracted
 */
export function extractJsonFromResponse(
  content: string,
  options: JsonExtractionOptions = {}
): JsonExtractionResult {
  const { task, model, correlationId, logWarnings = true } = options;
  const trimmed = content.trim();

  const report = (
    json: unknown,
    extractionMethod: JsonExtractionMethod,
    preambleLength: number,
    suffixLength: number
  ): JsonExtractionResult => {
    if (logWarnings) {
      log.warn(
        {
          task,
          model,
          correlationId,
          extraction_method: extractionMethod,
          preamble_length: preambleLength,
          suffix_length: suffixLength,
        },
        "JSON extraction required - model returned text around the JSON"
      );
    }
    emit(TelemetryEvents.JsonExtractionRequired, {
      task,
      model,
      preamble_length: preambleLength,
      suffix_length: suffixLength,
      extraction_method: extractionMethod,
    });
    return { json, wasExtracted: true, extractionMethod, preambleLength, suffixLength };
  };

  // === Fast path: already valid JSON ===
  if (trimmed.startsWith("{") || trimmed.startsWith("[")) {
    try {
      const json: unknown = JSON.parse(trimmed);
      return { json, wasExtracted: false, extractionMethod: "fast_path", preambleLength: 0, suffixLength: 0 };
    } catch {
      // Trailing text after a valid object is common; try matching from the start
      const early = extractJsonWithBracketMatching(trimmed, 0);
      if (early) {
        return report(early.json, "boundary", 0, trimmed.length - early.content.length);
      }
    }
  }

  // === Markdown code blocks ===
  const codeBlockRegex = /```(?:json)?\s*([\s\S]*?)```/g;
  let codeBlockMatch: RegExpExecArray | null;
  while ((codeBlockMatch = codeBlockRegex.exec(trimmed)) !== null) {
    const blockContent = (codeBlockMatch[1] ?? "").trim();
    try {
      const json: unknown = JSON.parse(blockContent);
      const blockEnd = codeBlockMatch.index + codeBlockMatch[0].length;
      return report(json, "code_block", codeBlockMatch.index, trimmed.length - blockEnd);
    } catch {
      // Not JSON; try the next block
      continue;
    }
  }

  // === Bracket matching from each candidate start ===
  const candidates: number[] = [];
  for (let i = 0; i < trimmed.length; i++) {
    if (trimmed[i] === "{" || trimmed[i] === "[") {
      candidates.push(i);
    }
  }

  if (candidates.length === 0) {
    throw new Error("No JSON structure found in response: missing opening delimiter");
  }

  for (const [position, index] of candidates.entries()) {
    const bracketResult = extractJsonWithBracketMatching(trimmed, index);
    if (bracketResult) {
      const suffixLength = trimmed.length - (index + bracketResult.content.length);
      return report(bracketResult.json, position === 0 ? "boundary" : "bracket_matching", index, suffixLength);
    }
  }

  throw new Error(
    `Failed to extract valid JSON from response: tried ${candidates.length} candidate position(s)`
  );
}

/**
 * Scan from `startIndex`, counting brackets outside strings, and parse the
 * first balanced structure.
 */
function extractJsonWithBracketMatching(
  content: string,
  startIndex: number
): { json: unknown; content: string } | null {
  const openBracket = content[startIndex];
  if (openBracket !== "{" && openBracket !== "[") {
    return null;
  }

  let depth = 0;
  let inString = false;
  let escape = false;

  for (let i = startIndex; i < content.length; i++) {
    const char = content[i];

    if (escape) {
      escape = false;
      continue;
    }

    if (char === "\\") {
      escape = true;
      continue;
    }

    if (char === '"') {
      inString = !inString;
      continue;
    }

    if (inString) continue;

    if (char === "{" || char === "[") depth++;
    if (char === "}" || char === "]") depth--;

    if (depth === 0) {
      const jsonStr = content.slice(startIndex, i + 1);
      try {
        const json: unknown = JSON.parse(jsonStr);
        return { json, content: jsonStr };
      } catch {
        return null;
      }
    }
  }

  // Unbalanced brackets
  return null;
}

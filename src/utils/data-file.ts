import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";

/**
 * Read a JSON data file that ships under src/.
 *
 * Resolved relative to THIS FILE so it works both in dev mode
 * (src/utils/data-file.ts) and from the compiled tree
 * (dist/src/utils/data-file.js), where tsc does not copy JSON.
 *
 * @param relativePath Path below src/, e.g. "evaluation/registry/catalog.json"
 */
export function readBundledJson(relativePath: string): unknown {
  const candidates = [
    new URL(`../${relativePath}`, import.meta.url),
    new URL(`../../../src/${relativePath}`, import.meta.url),
  ];

  let lastError: unknown;
  for (const candidate of candidates) {
    try {
      const parsed: unknown = JSON.parse(readFileSync(fileURLToPath(candidate), "utf-8"));
      return parsed;
    } catch (error) {
      lastError = error;
    }
  }
  throw new Error(`Unable to read bundled data file ${relativePath}`, { cause: lastError });
}

/**
 * Read a JSON file from an explicit filesystem path
 */
export function readJsonFile(path: string): unknown {
  const parsed: unknown = JSON.parse(readFileSync(path, "utf-8"));
  return parsed;
}

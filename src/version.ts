import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { z } from "zod";

const PackageJson = z.object({ version: z.string().optional() });

function readVersion(relative: string): string | undefined {
  const pkgPath = new URL(relative, import.meta.url);
  const parsed = PackageJson.safeParse(JSON.parse(readFileSync(fileURLToPath(pkgPath), "utf-8")));
  return parsed.success ? parsed.data.version : undefined;
}

/**
 * Service version (single source of truth)
 *
 * Reads from package.json by default, with optional env override.
 * Resolved through import.meta.url so it works from src/ (dev) and
 * dist/src/ (prod).
 */
export const SERVICE_VERSION =
  process.env.SERVICE_VERSION ??
  ((): string => {
    try {
      return readVersion("../package.json") ?? "0.0.0";
    } catch {
      // dist/src/version.js sits one level deeper
      try {
        return readVersion("../../package.json") ?? "0.0.0";
      } catch {
        return "0.0.0";
      }
    }
  })();

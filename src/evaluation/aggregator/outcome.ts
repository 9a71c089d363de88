import type { ValidationOutcome } from "../types.js";

/**
 * Lower bound of each outcome band, highest first. The only place score
 * tiers are defined; readiness and cluster summaries reuse it.
 */
export const OUTCOME_BANDS: ReadonlyArray<{ outcome: ValidationOutcome; min: number }> = [
  { outcome: "Excellent", min: 80 },
  { outcome: "Good", min: 60 },
  { outcome: "Moderate", min: 40 },
  { outcome: "Weak", min: -Infinity },
];

export function classifyOutcome(score: number): ValidationOutcome {
  for (const band of OUTCOME_BANDS) {
    if (score >= band.min) {
      return band.outcome;
    }
  }
  return "Weak";
}

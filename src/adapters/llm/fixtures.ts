import { createHash } from "node:crypto";
import type { LLMAdapter, CompleteArgs, CompleteResult, CallOpts } from "./types.js";
import { UpstreamAbortedError } from "./errors.js";

/**
 * Offline adapter for local development and demos (LLM_PROVIDER=fixtures).
 *
 * Produces a well-formed specialist response whose score is derived from a
 * SHA-256 of the prompt, so the same prompt always yields the same answer.
 */
export class FixturesAdapter implements LLMAdapter {
  readonly name = "fixtures" as const;
  readonly model = "fixture-v1";

  async complete(args: CompleteArgs, opts: CallOpts): Promise<CompleteResult> {
    if (opts.abortSignal?.aborted) {
      throw new UpstreamAbortedError("fixtures complete cancelled", "fixtures", "complete", 0);
    }

    const digest = createHash("sha256").update(args.prompt).digest();
    const score = 40 + (digest.readUInt16BE(0) % 51);
    const confidence = Math.round((0.6 + (digest[2] ?? 0) / 1275) * 100) / 100;
    const subject = /^Sub-parameter:\s*(.+)$/m.exec(args.prompt)?.[1]?.trim() || "this area";

    const body = {
      score,
      confidence_level: confidence,
      explanation: `Fixture assessment of ${subject}: the proposal shows a ${score >= 60 ? "credible" : "partial"} case in this area.`,
      strengths: [`Clear intent around ${subject}`, `Early evidence supporting ${subject}`],
      weaknesses: [`Limited validation data for ${subject}`, `Assumptions about ${subject} are untested`],
      key_insights: [
        `${subject} is a deciding factor for early traction`,
        `Comparable ventures treat ${subject} as a priority`,
      ],
      recommendations: [`Run a focused experiment on ${subject}`, `Collect customer evidence on ${subject}`],
      risk_factors: score < 60 ? [`Weak position on ${subject}`] : [],
      assumptions: [`Target users value ${subject}`],
    };

    const text = JSON.stringify(body);
    return {
      text,
      model: this.model,
      usage: { input_tokens: Math.ceil(args.prompt.length / 4), output_tokens: Math.ceil(text.length / 4) },
    };
  }
}

import Anthropic from "@anthropic-ai/sdk";
import { config } from "../../config/index.js";
import { log } from "../../utils/telemetry.js";
import type { LLMAdapter, CompleteArgs, CompleteResult, CallOpts } from "./types.js";
import { UpstreamHTTPError } from "./errors.js";
import { createCallSignal } from "./call-signal.js";

export const ANTHROPIC_DEFAULT_MODEL = "claude-3-haiku-20240307";

let client: Anthropic | null = null;

function getClient(): Anthropic {
  const apiKey = config.llm.anthropicApiKey;
  if (!apiKey) {
    throw new Error("ANTHROPIC_API_KEY environment variable is required but not set");
  }
  if (!client) {
    client = new Anthropic({ apiKey, maxRetries: 0 });
  }
  return client;
}

export class AnthropicAdapter implements LLMAdapter {
  readonly name = "anthropic" as const;
  readonly model: string;

  constructor(model?: string) {
    // Haiku keeps a 100+ specialist panel affordable
    this.model = model || ANTHROPIC_DEFAULT_MODEL;
  }

  async complete(args: CompleteArgs, opts: CallOpts): Promise<CompleteResult> {
    const callSignal = createCallSignal(opts);
    const startTime = Date.now();

    try {
      const apiClient = getClient();
      const response = await apiClient.messages.create(
        {
          model: this.model,
          max_tokens: args.maxTokens,
          temperature: args.temperature,
          ...(args.system ? { system: args.system } : {}),
          messages: [{ role: "user", content: args.prompt }],
        },
        {
          signal: callSignal.signal,
          headers: { "X-Request-Id": opts.requestId },
        }
      );

      const text = response.content
        .flatMap((block) => (block.type === "text" ? [block.text] : []))
        .join("\n")
        .trim();

      if (!text) {
        throw new Error("anthropic_empty_response");
      }

      return {
        text,
        model: response.model || this.model,
        usage: {
          input_tokens: response.usage.input_tokens,
          output_tokens: response.usage.output_tokens,
        },
      };
    } catch (error) {
      const elapsedMs = Date.now() - startTime;

      const aborted = callSignal.classifyAbort(error, "anthropic", "complete");
      if (aborted) {
        log.warn({ request_id: opts.requestId, elapsed_ms: elapsedMs, error: aborted.name }, "Anthropic call aborted");
        throw aborted;
      }

      if (error instanceof Anthropic.APIError && typeof error.status === "number") {
        const providerRequestId = error.headers?.["request-id"] ?? undefined;
        log.error(
          { status: error.status, provider_request_id: providerRequestId, elapsed_ms: elapsedMs },
          "Anthropic API returned non-2xx status"
        );
        throw new UpstreamHTTPError(
          `Anthropic complete failed: ${error.message || "unknown error"}`,
          "anthropic",
          error.status,
          undefined,
          providerRequestId,
          elapsedMs,
          error
        );
      }

      throw error;
    } finally {
      callSignal.cleanup();
    }
  }
}

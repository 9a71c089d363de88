import OpenAI from "openai";
import { config } from "../../config/index.js";
import { log } from "../../utils/telemetry.js";
import type { LLMAdapter, CompleteArgs, CompleteResult, CallOpts } from "./types.js";
import { UpstreamHTTPError } from "./errors.js";
import { createCallSignal } from "./call-signal.js";

export const OPENAI_DEFAULT_MODEL = "gpt-4o-mini";

// Lazy initialization to allow constructing the adapter without an API key
let client: OpenAI | null = null;

function getClient(): OpenAI {
  const apiKey = config.llm.openaiApiKey;
  if (!apiKey) {
    throw new Error("OPENAI_API_KEY environment variable is required but not set");
  }
  if (!client) {
    // Retries are owned by withRetry() in the specialist invoker
    client = new OpenAI({ apiKey, maxRetries: 0 });
  }
  return client;
}

export class OpenAIAdapter implements LLMAdapter {
  readonly name = "openai" as const;
  readonly model: string;

  constructor(model?: string) {
    this.model = model || OPENAI_DEFAULT_MODEL;
  }

  async complete(args: CompleteArgs, opts: CallOpts): Promise<CompleteResult> {
    const callSignal = createCallSignal(opts);
    const startTime = Date.now();

    try {
      const apiClient = getClient();
      const messages: OpenAI.Chat.ChatCompletionMessageParam[] = [];
      if (args.system) {
        messages.push({ role: "system", content: args.system });
      }
      messages.push({ role: "user", content: args.prompt });

      const response = await apiClient.chat.completions.create(
        {
          model: this.model,
          messages,
          temperature: args.temperature,
          max_tokens: args.maxTokens,
          response_format: { type: "json_object" },
        },
        {
          signal: callSignal.signal,
          headers: { "X-Request-Id": opts.requestId },
        }
      );

      const content = response.choices[0]?.message?.content;
      if (!content) {
        throw new Error("openai_empty_response");
      }

      return {
        text: content,
        model: response.model || this.model,
        usage: {
          input_tokens: response.usage?.prompt_tokens ?? 0,
          output_tokens: response.usage?.completion_tokens ?? 0,
        },
      };
    } catch (error) {
      const elapsedMs = Date.now() - startTime;

      const aborted = callSignal.classifyAbort(error, "openai", "complete");
      if (aborted) {
        log.warn({ request_id: opts.requestId, elapsed_ms: elapsedMs, error: aborted.name }, "OpenAI call aborted");
        throw aborted;
      }

      if (error instanceof OpenAI.APIError && typeof error.status === "number") {
        const providerRequestId = error.headers?.["x-request-id"] ?? undefined;
        log.error(
          { status: error.status, provider_request_id: providerRequestId, elapsed_ms: elapsedMs },
          "OpenAI API returned non-2xx status"
        );
        throw new UpstreamHTTPError(
          `OpenAI complete failed: ${error.message || "unknown error"}`,
          "openai",
          error.status,
          typeof error.code === "string" ? error.code : undefined,
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

/**
 * Provider router.
 *
 * Selects the LLM adapter (OpenAI, Anthropic, Fixtures) from configuration.
 * Called once at startup; the resulting adapter is injected into the
 * orchestrator rather than looked up per call.
 */

import { log } from "../../utils/telemetry.js";
import type { LLMConfig } from "../../config/index.js";
import type { LLMAdapter } from "./types.js";
import { AnthropicAdapter } from "./anthropic.js";
import { OpenAIAdapter } from "./openai.js";
import { FixturesAdapter } from "./fixtures.js";

/**
 * Build the adapter for the configured provider.
 *
 * @throws Error if the provider needs an API key that is not configured
 */
export function createAdapter(llm: Pick<LLMConfig, "provider" | "model" | "openaiApiKey" | "anthropicApiKey">): LLMAdapter {
  let adapter: LLMAdapter;

  switch (llm.provider) {
    case "openai":
      if (!llm.openaiApiKey) {
        throw new Error("FATAL: LLM_PROVIDER=openai but OPENAI_API_KEY is not set");
      }
      adapter = new OpenAIAdapter(llm.model);
      break;
    case "anthropic":
      if (!llm.anthropicApiKey) {
        throw new Error("FATAL: LLM_PROVIDER=anthropic but ANTHROPIC_API_KEY is not set");
      }
      adapter = new AnthropicAdapter(llm.model);
      break;
    case "fixtures":
      adapter = new FixturesAdapter();
      break;
    default: {
      const unknownProvider: never = llm.provider;
      throw new Error(`FATAL: unknown LLM_PROVIDER ${String(unknownProvider)}`);
    }
  }

  log.info({ provider: adapter.name, model: adapter.model }, "LLM adapter selected");
  return adapter;
}

/**
 * Evaluation core
 *
 * Composition root plus the public surface of the orchestrator and its
 * collaborators.
 */

import { createAdapter } from "../adapters/llm/router.js";
import type { LLMAdapter } from "../adapters/llm/types.js";
import type { Config } from "../config/index.js";
import { ValidationOrchestrator } from "./orchestrator.js";
import { SpecialistRegistry } from "./registry/index.js";

export interface ValidationService {
  registry: SpecialistRegistry;
  adapter: LLMAdapter;
  orchestrator: ValidationOrchestrator;
}

/**
 * Wire registry, adapter and orchestrator from configuration. Catalog and
 * provider problems throw here, at startup.
 */
export function createValidationService(
  cfg: Pick<Config, "llm" | "validation">,
  adapter: LLMAdapter = createAdapter(cfg.llm)
): ValidationService {
  const registry = SpecialistRegistry.load(cfg.validation.catalogPath);
  const orchestrator = new ValidationOrchestrator({
    registry,
    adapter,
    options: {
      concurrency: cfg.validation.concurrency,
      specialistTimeoutMs: cfg.validation.specialistTimeoutMs,
      runDeadlineMs: cfg.validation.runDeadlineMs,
      maxAttempts: cfg.validation.maxAttempts,
      maxTokens: cfg.llm.maxTokens,
      temperature: cfg.llm.temperature,
    },
  });
  return { registry, adapter, orchestrator };
}

export { ValidationOrchestrator } from "./orchestrator.js";
export type { OrchestratorOptions, ValidateIdeaInput } from "./orchestrator.js";
export { SpecialistRegistry } from "./registry/index.js";
export { planWaves } from "./planner.js";
export type { ExecutionPlan } from "./planner.js";
export { SpecialistInvoker } from "./invoker/index.js";
export { aggregate, classifyOutcome } from "./aggregator/index.js";
export { serializeValidationResult, serializeFrameworkInfo } from "./serialization.js";
export { CatalogConfigurationError, ValidationRunError } from "./errors.js";
export type * from "./types.js";

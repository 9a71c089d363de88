/**
 * Validation routes
 *
 * POST /v1/validate  - run every specialist against one proposal
 * GET  /v1/specialists - catalog summary
 * GET  /healthz      - liveness plus provider and catalog facts
 */

import type { FastifyInstance } from "fastify";
import type { LLMAdapter } from "../adapters/llm/types.js";
import type { ValidationOrchestrator } from "../evaluation/orchestrator.js";
import { serializeFrameworkInfo, serializeValidationResult } from "../evaluation/serialization.js";
import { ValidateIdeaInput } from "../schemas/validation.js";
import { zodErrorToErrorV1 } from "../utils/errors.js";
import { getRequestId } from "../utils/request-id.js";
import { SERVICE_VERSION } from "../version.js";

export interface ValidateRouteDeps {
  orchestrator: ValidationOrchestrator;
  adapter: Pick<LLMAdapter, "name" | "model">;
}

export const SERVICE_NAME = "idea-validation-service";

export default async function validateRoutes(app: FastifyInstance, deps: ValidateRouteDeps) {
  const { orchestrator, adapter } = deps;

  app.post("/v1/validate", async (request, reply) => {
    const requestId = getRequestId(request);
    const parsed = ValidateIdeaInput.safeParse(request.body);
    if (!parsed.success) {
      return reply.code(400).send(zodErrorToErrorV1(parsed.error, requestId));
    }

    const input = parsed.data;
    const result = await orchestrator.validateIdea({
      name: input.name,
      concept: input.concept,
      clusterWeights: input.cluster_weights,
      clusters: input.clusters,
      deadlineMs: input.deadline_ms,
      requestId,
    });

    request.log.info(
      {
        request_id: requestId,
        validation_id: result.validationId,
        overall_score: result.overallScore,
        fallback_count: result.fallbackCount,
      },
      "Validation finished"
    );

    return reply.code(200).send(serializeValidationResult(result));
  });

  app.get("/v1/specialists", async (_request, reply) => {
    return reply.code(200).send(serializeFrameworkInfo(orchestrator.frameworkInfo()));
  });

  app.get("/healthz", async () => ({
    ok: true,
    service: SERVICE_NAME,
    version: SERVICE_VERSION,
    provider: adapter.name,
    model: adapter.model,
    specialists: orchestrator.frameworkInfo().totalSpecialists,
  }));
}

// Load environment variables from .env file (local development only)
import "dotenv/config";

import Fastify from "fastify";
import type { LLMAdapter } from "./adapters/llm/types.js";
import { config, getConfig } from "./config/index.js";
import { createValidationService } from "./evaluation/index.js";
import type { ValidationOrchestrator } from "./evaluation/orchestrator.js";
import validateRoutes, { SERVICE_NAME } from "./routes/v1.validate.js";
import { buildErrorV1, getStatusCodeForErrorCode, toErrorV1 } from "./utils/errors.js";
import { createLoggerConfig } from "./utils/logger-config.js";
import { getRequestId, REQUEST_ID_HEADER, resolveRequestId } from "./utils/request-id.js";
import { flushMetrics } from "./utils/telemetry.js";
import { SERVICE_VERSION } from "./version.js";

export interface BuildDeps {
  orchestrator: ValidationOrchestrator;
  adapter: LLMAdapter;
}

export async function build(deps: BuildDeps) {
  const app = Fastify({
    logger: createLoggerConfig(config.server.logLevel),
    bodyLimit: config.server.bodyLimitBytes,
    genReqId: (request) => resolveRequestId(request.headers),
  });

  // Response hook: Add X-Request-Id header to every response
  app.addHook("onSend", async (request, reply, payload) => {
    reply.header(REQUEST_ID_HEADER, getRequestId(request));
    return payload;
  });

  await app.register(validateRoutes, { orchestrator: deps.orchestrator, adapter: deps.adapter });

  app.setNotFoundHandler((request, reply) => {
    const requestId = getRequestId(request);
    return reply
      .status(404)
      .send(buildErrorV1("NOT_FOUND", `Route ${request.method} ${request.url} not found`, undefined, requestId));
  });

  // Centralized error handler: structured error.v1 responses with request_id
  app.setErrorHandler((error, request, reply) => {
    const errorV1 = toErrorV1(error, request);
    const statusCode = getStatusCodeForErrorCode(errorV1.code);

    if (statusCode >= 500) {
      request.log.error(
        { error, request_id: errorV1.request_id, method: request.method, url: request.url },
        `[${errorV1.code}] ${errorV1.message}`
      );
    } else {
      request.log.warn(
        { request_id: errorV1.request_id, code: errorV1.code, method: request.method, url: request.url },
        `[${errorV1.code}] ${errorV1.message}`
      );
    }

    return reply.status(statusCode).send(errorV1);
  });

  return app;
}

// If running directly (not imported), start the server
if (import.meta.url === `file://${process.argv[1]}`) {
  const start = async () => {
    const { adapter, orchestrator } = createValidationService(getConfig());
    const app = await build({ adapter, orchestrator });

    app.log.info(
      {
        service: SERVICE_NAME,
        version: SERVICE_VERSION,
        provider: adapter.name,
        model: adapter.model,
        specialists: orchestrator.frameworkInfo().totalSpecialists,
        waves: orchestrator.frameworkInfo().waveCount,
        concurrency: config.validation.concurrency,
        run_deadline_ms: config.validation.runDeadlineMs,
        body_limit_mb: (config.server.bodyLimitBytes / 1024 / 1024).toFixed(1),
      },
      "Idea validation service starting"
    );

    const shutdown = (signal: string) => {
      app.log.info({ signal }, "Shutting down");
      app
        .close()
        .then(() => flushMetrics())
        .then(() => process.exit(0))
        .catch((err: unknown) => {
          app.log.error({ err }, "Shutdown failed");
          process.exit(1);
        });
    };
    process.once("SIGINT", shutdown);
    process.once("SIGTERM", shutdown);

    await app.listen({ port: config.server.port, host: "0.0.0.0" });
  };

  start().catch((err: unknown) => {
    console.error("Failed to start server:", err);
    process.exit(1);
  });
}

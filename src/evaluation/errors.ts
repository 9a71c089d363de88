/**
 * Error types for the evaluation core.
 *
 * Configuration errors are fatal and only ever thrown while the registry
 * or orchestrator is being constructed. Run errors never escape
 * validateIdea(); they become the `error` field of a fallback result.
 */

export type CatalogErrorReason = "invalid_catalog" | "duplicate_specialist" | "unknown_dependency" | "dependency_cycle";

export class CatalogConfigurationError extends Error {
  readonly name = "CatalogConfigurationError";

  constructor(
    public readonly reason: CatalogErrorReason,
    message: string,
    public readonly details: Record<string, unknown> = {}
  ) {
    super(message);
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, CatalogConfigurationError);
    }
  }
}

export type RunErrorCode = "invalid_proposal" | "invalid_cluster_weights" | "unknown_cluster" | "no_specialists";

export class ValidationRunError extends Error {
  readonly name = "ValidationRunError";

  constructor(
    public readonly code: RunErrorCode,
    message: string
  ) {
    super(message);
  }
}

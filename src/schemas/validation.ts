import { z } from "zod";
import { VALIDATION_OUTCOMES } from "../evaluation/types.js";

export const ValidateIdeaInput = z
  .object({
    name: z.string().trim().min(1).max(200),
    concept: z.string().trim().min(1).max(10000),
    cluster_weights: z.record(z.string(), z.number().finite().min(0)).optional(),
    clusters: z.array(z.string().min(1)).min(1).optional(),
    deadline_ms: z.number().int().positive().optional(),
  })
  .strict();

const Outcome = z.enum(VALIDATION_OUTCOMES);

const PersistedEvaluation = z.object({
  specialist_id: z.string(),
  score: z.number().min(0).max(100),
  confidence: z.number().min(0).max(1),
  explanation: z.string(),
  strengths: z.array(z.string()),
  weaknesses: z.array(z.string()),
  key_insights: z.array(z.string()),
  recommendations: z.array(z.string()),
  risk_factors: z.array(z.string()),
  assumptions: z.array(z.string()),
  source: z.enum(["parsed", "repaired", "fallback"]),
  fallback_reason: z.enum(["timeout", "cancelled", "upstream_error", "empty_response", "unparseable"]).optional(),
  repairs: z.array(z.string()),
  attempts: z.number().int().min(0),
  informed_by: z.array(z.string()),
  processing_time_ms: z.number().min(0),
});

const PersistedWeakArea = z.object({
  cluster: z.string(),
  parameter: z.string(),
  sub_parameter: z.string(),
  score: z.number(),
  action: z.string(),
});

const ScoredName = z.object({ sub_parameter: z.string(), score: z.number() });

/**
 * Stable snake_case document for a finished validation run.
 */
export const PersistedValidationResultV1 = z.object({
  schema: z.literal("validation_result.v1"),
  validation_id: z.string(),
  timestamp: z.string(),
  proposal: z.object({ name: z.string(), concept: z.string() }),
  overall_score: z.number().min(0).max(100),
  validation_outcome: Outcome,
  cluster_scores: z.record(z.string(), z.number()),
  consensus_level: z.number().min(0).max(1),
  evaluations: z.record(z.string(), z.record(z.string(), z.record(z.string(), PersistedEvaluation))),
  collaboration_insights: z.array(z.string()),
  overall_summary: z.string(),
  weak_areas: z.array(PersistedWeakArea),
  next_steps: z.array(PersistedWeakArea),
  cluster_summaries: z.array(
    z.object({
      cluster: z.string(),
      display_name: z.string(),
      score: z.number(),
      outcome: Outcome,
      specialist_count: z.number().int(),
      strongest: ScoredName,
      weakest: ScoredName,
    })
  ),
  key_recommendations: z.array(z.string()),
  critical_risks: z.array(z.string()),
  readiness: z.object({
    outcome: Outcome,
    stage: z.string(),
    timeline: z.string(),
    next_requirements: z.array(z.string()),
  }),
  total_specialists_consulted: z.number().int().min(0),
  fallback_count: z.number().int().min(0),
  processing_time_ms: z.number().min(0),
  error: z.string().optional(),
});

export type PersistedValidationResultV1T = z.infer<typeof PersistedValidationResultV1>;

export const FrameworkInfoV1 = z.object({
  schema: z.literal("framework_info.v1"),
  catalog_version: z.string(),
  total_specialists: z.number().int(),
  dependent_specialists: z.number().int(),
  wave_count: z.number().int(),
  clusters: z.array(
    z.object({
      name: z.string(),
      display_name: z.string(),
      weight: z.number(),
      specialists: z.number().int(),
    })
  ),
});

export type FrameworkInfoV1T = z.infer<typeof FrameworkInfoV1>;

import type {
  FrameworkInfoV1T,
  PersistedValidationResultV1T,
} from "../schemas/validation.js";
import type { FrameworkInfo, SpecialistEvaluation, ValidationResult, WeakArea } from "./types.js";

type PersistedEvaluation = PersistedValidationResultV1T["evaluations"][string][string][string];
type PersistedWeakArea = PersistedValidationResultV1T["weak_areas"][number];

function serializeEvaluation(evaluation: SpecialistEvaluation): PersistedEvaluation {
  const { record } = evaluation;
  return {
    specialist_id: evaluation.specialistId,
    score: record.score,
    confidence: record.confidence,
    explanation: record.explanation,
    strengths: [...record.strengths],
    weaknesses: [...record.weaknesses],
    key_insights: [...record.keyInsights],
    recommendations: [...record.recommendations],
    risk_factors: [...record.riskFactors],
    assumptions: [...record.assumptions],
    source: evaluation.source,
    ...(evaluation.fallbackReason ? { fallback_reason: evaluation.fallbackReason } : {}),
    repairs: [...evaluation.repairs],
    attempts: evaluation.attempts,
    informed_by: [...evaluation.informedBy],
    processing_time_ms: evaluation.processingTimeMs,
  };
}

function serializeWeakArea(area: WeakArea): PersistedWeakArea {
  return {
    cluster: area.cluster,
    parameter: area.parameter,
    sub_parameter: area.subParameter,
    score: area.score,
    action: area.action,
  };
}

/**
 * Convert a ValidationResult to its `validation_result.v1` document.
 * Key order of the evaluations tree and cluster_scores is preserved.
 */
export function serializeValidationResult(result: ValidationResult): PersistedValidationResultV1T {
  const evaluations: PersistedValidationResultV1T["evaluations"] = {};
  for (const [cluster, parameters] of Object.entries(result.evaluations)) {
    const clusterNode: Record<string, Record<string, PersistedEvaluation>> = {};
    for (const [parameter, subs] of Object.entries(parameters)) {
      const parameterNode: Record<string, PersistedEvaluation> = {};
      for (const [sub, evaluation] of Object.entries(subs)) {
        parameterNode[sub] = serializeEvaluation(evaluation);
      }
      clusterNode[parameter] = parameterNode;
    }
    evaluations[cluster] = clusterNode;
  }

  const document: PersistedValidationResultV1T = {
    schema: "validation_result.v1",
    validation_id: result.validationId,
    timestamp: result.timestamp,
    proposal: { name: result.proposal.name, concept: result.proposal.concept },
    overall_score: result.overallScore,
    validation_outcome: result.outcome,
    cluster_scores: { ...result.clusterScores },
    consensus_level: result.consensusLevel,
    evaluations,
    collaboration_insights: [...result.collaborationInsights],
    overall_summary: result.overallSummary,
    weak_areas: result.weakAreas.map(serializeWeakArea),
    next_steps: result.nextSteps.map(serializeWeakArea),
    cluster_summaries: result.clusterSummaries.map((summary) => ({
      cluster: summary.cluster,
      display_name: summary.displayName,
      score: summary.score,
      outcome: summary.outcome,
      specialist_count: summary.specialistCount,
      strongest: { sub_parameter: summary.strongest.subParameter, score: summary.strongest.score },
      weakest: { sub_parameter: summary.weakest.subParameter, score: summary.weakest.score },
    })),
    key_recommendations: [...result.keyRecommendations],
    critical_risks: [...result.criticalRisks],
    readiness: {
      outcome: result.readiness.outcome,
      stage: result.readiness.stage,
      timeline: result.readiness.timeline,
      next_requirements: [...result.readiness.nextRequirements],
    },
    total_specialists_consulted: result.totalSpecialistsConsulted,
    fallback_count: result.fallbackCount,
    processing_time_ms: result.processingTimeMs,
  };

  if (result.error !== undefined) {
    document.error = result.error;
  }
  return document;
}

export function serializeFrameworkInfo(info: FrameworkInfo): FrameworkInfoV1T {
  return {
    schema: "framework_info.v1",
    catalog_version: info.catalogVersion,
    total_specialists: info.totalSpecialists,
    dependent_specialists: info.dependentSpecialists,
    wave_count: info.waveCount,
    clusters: info.clusters.map((cluster) => ({
      name: cluster.name,
      display_name: cluster.displayName,
      weight: cluster.weight,
      specialists: cluster.specialists,
    })),
  };
}

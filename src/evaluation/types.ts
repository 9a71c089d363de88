/**
 * Core data model of the evaluation orchestrator.
 */

export const VALIDATION_OUTCOMES = ["Excellent", "Good", "Moderate", "Weak"] as const;
export type ValidationOutcome = (typeof VALIDATION_OUTCOMES)[number];

/**
 * A statically configured evaluator of one sub-parameter. Immutable for the
 * lifetime of the process.
 */
export interface Specialist {
  readonly id: string;
  readonly cluster: string;
  readonly parameter: string;
  readonly subParameter: string;
  /** Relative weight inside its parameter; informational, not used in averaging */
  readonly weight: number;
  /** Sub-parameter or parameter names whose results should be available first */
  readonly dependencies: readonly string[];
  readonly role: string;
  /** Position in catalog declaration order */
  readonly order: number;
}

export interface ClusterDefinition {
  readonly name: string;
  readonly displayName: string;
  /** Share of the overall assessment quoted to the specialist in its prompt */
  readonly weight: number;
  readonly persona: string;
  readonly parameters: readonly string[];
  readonly specialistIds: readonly string[];
}

export interface Proposal {
  name: string;
  concept: string;
}

/**
 * Canonical output of one specialist for one run. After repair every list
 * except riskFactors and assumptions is non-empty.
 */
export interface EvaluationRecord {
  score: number;
  confidence: number;
  explanation: string;
  strengths: string[];
  weaknesses: string[];
  keyInsights: string[];
  recommendations: string[];
  riskFactors: string[];
  assumptions: string[];
}

export type EvaluationSource = "parsed" | "repaired" | "fallback";

export type FallbackReason = "timeout" | "cancelled" | "upstream_error" | "empty_response" | "unparseable";

/** An EvaluationRecord together with who produced it and how */
export interface SpecialistEvaluation {
  specialistId: string;
  cluster: string;
  parameter: string;
  subParameter: string;
  record: EvaluationRecord;
  source: EvaluationSource;
  fallbackReason?: FallbackReason;
  /** Repairs applied to the raw response, empty for parsed records */
  repairs: string[];
  attempts: number;
  processingTimeMs: number;
  /** Sub-parameters whose results were quoted as dependency context */
  informedBy: string[];
}

/** Summary of an upstream result handed to a dependent specialist */
export interface DependencyContextEntry {
  subParameter: string;
  score: number;
  explanation: string;
}

export interface WeakArea {
  cluster: string;
  parameter: string;
  subParameter: string;
  score: number;
  action: string;
}

export interface ClusterSummary {
  cluster: string;
  displayName: string;
  score: number;
  outcome: ValidationOutcome;
  specialistCount: number;
  strongest: { subParameter: string; score: number };
  weakest: { subParameter: string; score: number };
}

export interface ReadinessEstimate {
  outcome: ValidationOutcome;
  stage: string;
  timeline: string;
  nextRequirements: string[];
}

/** cluster → parameter → sub-parameter → evaluation */
export type EvaluationTree = Record<string, Record<string, Record<string, SpecialistEvaluation>>>;

export interface ValidationResult {
  validationId: string;
  timestamp: string;
  proposal: Proposal;
  overallScore: number;
  outcome: ValidationOutcome;
  clusterScores: Record<string, number>;
  evaluations: EvaluationTree;
  consensusLevel: number;
  collaborationInsights: string[];
  /** Narrative summary of the whole run */
  overallSummary: string;
  weakAreas: WeakArea[];
  nextSteps: WeakArea[];
  clusterSummaries: ClusterSummary[];
  keyRecommendations: string[];
  criticalRisks: string[];
  readiness: ReadinessEstimate;
  totalSpecialistsConsulted: number;
  fallbackCount: number;
  processingTimeMs: number;
  /** Present only on a run-level fallback result */
  error?: string;
}

export interface FrameworkInfo {
  catalogVersion: string;
  totalSpecialists: number;
  clusters: Array<{ name: string; displayName: string; weight: number; specialists: number }>;
  dependentSpecialists: number;
  waveCount: number;
}

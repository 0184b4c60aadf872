import { z } from "zod";

export type Severity = "HIGH" | "MEDIUM" | "LOW";

export const SEVERITY_RANK: Record<Severity, number> = { HIGH: 3, MEDIUM: 2, LOW: 1 };

export type SectionName = "Goals" | "Non-goals" | "Scope" | "Metrics" | "Risks" | "Tradeoffs" | "Rollout";

export type Claim = {
  readonly id: string;
  readonly text: string;
  readonly severity: Severity;
  readonly section: SectionName;
  /** Identifier of the artifact the claim came from (usually its path). */
  readonly sourceArtifact: string;
  /** 1-based line within the artifact. */
  readonly line: number;
};

export const EvidenceItemSchema = z.object({
  text: z.string(),
  sourceRef: z.string().min(1),
  sourceType: z.string().min(1)
});

export type EvidenceItem = z.infer<typeof EvidenceItemSchema>;

/** An evidence item as held by the graph, keyed by a content-derived id. */
export type StoredEvidence = EvidenceItem & { readonly id: string };

export type Binding = {
  readonly claimId: string;
  readonly evidenceId: string;
  readonly score: number;
};

export const INTERVENTION_TYPES = [
  "REQUEST_EVIDENCE",
  "REQUEST_METRICS",
  "REQUEST_OPTIONS",
  "REQUEST_RISKS",
  "ESCALATE"
] as const;

export type InterventionType = (typeof INTERVENTION_TYPES)[number];

export type Intervention = {
  type: InterventionType;
  rationale: string;
  suggestedNextSteps: string[];
  /** Claim ids, section names or limit names the intervention is about. */
  targetIds: string[];
};

export type BoundaryType = "empty_metrics" | "missing_tradeoffs";

export type Boundary = {
  type: BoundaryType;
  section: string;
  rationale: string;
};

export type SupervisorSummary = {
  runId: string;
  eventCount: number;
  artifactCount: number;
  interventionCount: number;
  uncoveredClaimCount: number;
  uncoveredHighClaimCount: number;
  claimCount: number;
  evidenceCount: number;
  toolCallCount: number;
};

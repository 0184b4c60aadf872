import {
  SEVERITY_RANK,
  type Binding,
  type Claim,
  type EvidenceItem,
  type Severity,
  type StoredEvidence
} from "../types/supervision";
import { hashParts } from "./hash";

export const DEFAULT_COVERAGE_THRESHOLD = 0.2;

export function evidenceId(item: EvidenceItem): string {
  return `ev_${hashParts([item.sourceRef, item.text])}`;
}

/**
 * Claims, evidence items and the bindings between them for one run.
 * Coverage is always computed from current state, never cached.
 */
export class EvidenceGraph {
  private readonly claimsById = new Map<string, Claim>();
  private readonly evidenceById = new Map<string, StoredEvidence>();
  private bindingList: Binding[] = [];

  constructor(readonly coverageThreshold = DEFAULT_COVERAGE_THRESHOLD) {}

  get claims(): Claim[] {
    return [...this.claimsById.values()];
  }

  get evidence(): StoredEvidence[] {
    return [...this.evidenceById.values()];
  }

  get bindings(): readonly Binding[] {
    return this.bindingList;
  }

  getClaim(id: string): Claim | undefined {
    return this.claimsById.get(id);
  }

  /** Returns false when a claim with the same id is already present. */
  addClaim(claim: Claim): boolean {
    if (this.claimsById.has(claim.id)) return false;
    this.claimsById.set(claim.id, claim);
    return true;
  }

  /**
   * Replace every binding and the evidence set they point to. Bindings to
   * unknown claims are dropped.
   */
  replaceBindings(evidence: StoredEvidence[], bindings: Binding[]) {
    this.evidenceById.clear();
    for (const e of evidence) this.evidenceById.set(e.id, e);

    this.bindingList = bindings.filter(
      (b) => this.claimsById.has(b.claimId) && this.evidenceById.has(b.evidenceId)
    );
  }

  bindingsFor(claimId: string): Binding[] {
    return this.bindingList.filter((b) => b.claimId === claimId);
  }

  isCovered(claimId: string): boolean {
    return this.bindingList.some((b) => b.claimId === claimId && b.score >= this.coverageThreshold);
  }

  /** Claims of severity `minSeverity` or above with no qualifying binding. */
  uncovered(minSeverity: Severity = "HIGH"): Claim[] {
    const min = SEVERITY_RANK[minSeverity];
    return this.claims.filter((c) => SEVERITY_RANK[c.severity] >= min && !this.isCovered(c.id));
  }

  /** Distinct evidence items backing at least one qualifying binding. */
  boundEvidence(): StoredEvidence[] {
    const ids = new Set(
      this.bindingList.filter((b) => b.score >= this.coverageThreshold).map((b) => b.evidenceId)
    );
    return this.evidence.filter((e) => ids.has(e.id));
  }
}

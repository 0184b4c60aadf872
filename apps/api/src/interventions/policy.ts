import type { Boundary, Claim, Intervention } from "../types/supervision";

export type PolicyThresholds = {
  /** Uncovered HIGH claims at which the policy escalates instead of asking for evidence. */
  escalateUncoveredHigh: number;
  /** Tool calls beyond which low evidence counts as runaway tool use. */
  toolCallLimit: number;
  /** Bound evidence items below which runaway tool use escalates. */
  minEvidence: number;
};

export const DEFAULT_POLICY_THRESHOLDS: PolicyThresholds = {
  escalateUncoveredHigh: 3,
  toolCallLimit: 50,
  minEvidence: 5
};

export type PolicyFacts = {
  uncoveredHigh: Claim[];
  boundaries: Boundary[];
  toolCallCount: number;
  evidenceCount: number;
};

function clip(text: string, max = 80) {
  return text.length > max ? `${text.slice(0, max)}…` : text;
}

/**
 * Decision table over the current facts; first matching rule wins.
 */
export function evaluatePolicy(
  facts: PolicyFacts,
  thresholds: PolicyThresholds = DEFAULT_POLICY_THRESHOLDS
): Intervention | null {
  const uncovered = facts.uncoveredHigh;
  const ids = uncovered.map((c) => c.id);

  if (uncovered.length >= thresholds.escalateUncoveredHigh) {
    return {
      type: "ESCALATE",
      rationale: `${uncovered.length} HIGH severity claims lack evidence: ${ids.join(", ")}`,
      suggestedNextSteps: [
        "Review the uncovered claims listed in the escalation packet",
        "Gather supporting evidence from the issue tracker",
        "Consider reducing scope or clarifying requirements"
      ],
      targetIds: ids
    };
  }

  if (uncovered.length > 0) {
    return {
      type: "REQUEST_EVIDENCE",
      rationale: `HIGH severity claims need evidence: ${ids.join(", ")}`,
      suggestedNextSteps: [
        ...uncovered.map((c) => `Find evidence for ${c.id} (${c.section}): ${clip(c.text)}`),
        "Search issues and milestone notes for matching keywords"
      ],
      targetIds: ids
    };
  }

  const emptyMetrics = facts.boundaries.find((b) => b.type === "empty_metrics");
  if (emptyMetrics) {
    return {
      type: "REQUEST_METRICS",
      rationale: emptyMetrics.rationale,
      suggestedNextSteps: [
        "Add measurable success metrics",
        "Include specific targets such as '95% uptime' or 'p95 latency under 200 ms'"
      ],
      targetIds: [emptyMetrics.section]
    };
  }

  const missingTradeoffs = facts.boundaries.find((b) => b.type === "missing_tradeoffs");
  if (missingTradeoffs) {
    return {
      type: "REQUEST_OPTIONS",
      rationale: missingTradeoffs.rationale,
      suggestedNextSteps: [
        "Add a Tradeoffs or Alternatives section",
        "Explain the options considered and why they were rejected"
      ],
      targetIds: [missingTradeoffs.section]
    };
  }

  if (facts.toolCallCount > thresholds.toolCallLimit && facts.evidenceCount < thresholds.minEvidence) {
    return {
      type: "ESCALATE",
      rationale: `Agent made ${facts.toolCallCount} tool calls but only ${facts.evidenceCount} evidence items are bound`,
      suggestedNextSteps: [
        "Review the agent's tool usage",
        "Check whether the agent is stuck in a loop",
        "Check whether the evidence source has enough data"
      ],
      targetIds: ["tool_call_limit"]
    };
  }

  return null;
}

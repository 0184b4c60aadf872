import type { Binding, Claim, EvidenceItem, StoredEvidence } from "../types/supervision";
import type { TraceEvent } from "../types/trace";
import { evidenceId, type EvidenceGraph } from "./graph";
import { overlapScore, tokenize } from "./tokens";

export type BindingOptions = {
  /** Minimum overlap for a binding to exist. */
  threshold: number;
  /** Bindings kept per claim. */
  topK: number;
};

export const DEFAULT_BINDING_OPTIONS: BindingOptions = { threshold: 0.2, topK: 3 };

const OBSERVATION_TEXT_FIELDS = ["title", "body", "content", "text", "summary"] as const;

function observationText(result: unknown): string {
  if (typeof result === "string") return result;
  if (typeof result !== "object" || result === null) return "";

  const fields = new Map(Object.entries(result));
  return OBSERVATION_TEXT_FIELDS.map((k) => fields.get(k))
    .filter((v): v is string => typeof v === "string" && v.trim().length > 0)
    .join(" ");
}

/** Evidence candidates derived from tool observations in the trace. */
export function evidenceFromEvents(events: Iterable<TraceEvent>): EvidenceItem[] {
  const items: EvidenceItem[] = [];
  let index = 0;

  for (const event of events) {
    index += 1;
    if (event.type !== "observation") continue;

    const text = observationText(event.payload.result ?? event.payload.data);
    if (!text.trim()) continue;

    items.push({ text, sourceRef: `trace:${event.timestamp}#${index}`, sourceType: "tool_observation" });
  }

  return items;
}

/**
 * Full recompute of claim/evidence bindings. Ties are broken by evidence
 * id, so the result does not depend on the order candidates arrive in.
 */
export function bindEvidence(args: {
  claims: Claim[];
  events: Iterable<TraceEvent>;
  items: EvidenceItem[];
  graph: EvidenceGraph;
  options?: Partial<BindingOptions>;
}): { candidates: StoredEvidence[]; bindings: Binding[] } {
  const { threshold, topK } = { ...DEFAULT_BINDING_OPTIONS, ...args.options };

  const byId = new Map<string, StoredEvidence>();
  for (const item of [...args.items, ...evidenceFromEvents(args.events)]) {
    const id = evidenceId(item);
    if (!byId.has(id)) byId.set(id, { ...item, id });
  }

  const candidates = [...byId.values()].sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0));
  const tokenized = candidates.map((c) => ({ id: c.id, tokens: tokenize(c.text) }));

  const bindings: Binding[] = [];
  for (const claim of args.claims) {
    const claimTokens = tokenize(claim.text);

    const scored = tokenized
      .map((c) => ({ claimId: claim.id, evidenceId: c.id, score: overlapScore(claimTokens, c.tokens) }))
      .filter((b) => b.score > 0 && b.score >= threshold);

    scored.sort((a, b) => b.score - a.score || (a.evidenceId < b.evidenceId ? -1 : 1));
    bindings.push(...scored.slice(0, Math.max(0, topK)));
  }

  args.graph.replaceBindings(candidates, bindings);
  return { candidates, bindings };
}

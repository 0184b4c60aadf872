export { SupervisorHook } from "./supervisor/hook";
export type {
  EvidenceSource,
  HandlerResponse,
  InterventionContext,
  InterventionHandler,
  SupervisorHookOptions,
  SupervisorLogger
} from "./supervisor/hook";

export { JsonlTraceStore, MemoryTraceStore, loadEvents } from "./trace/store";
export type { TraceStore } from "./trace/store";
export { TraceEmitter } from "./trace/emitter";
export { createEventClock, eventFromRecord, newEvent } from "./trace/events";

export { extractClaims, parseSections } from "./evidence/claims";
export { EvidenceGraph } from "./evidence/graph";
export { bindEvidence, evidenceFromEvents } from "./evidence/bind";
export { detectBoundaries } from "./boundaries/detect";
export { evaluatePolicy } from "./interventions/policy";
export { renderEscalationPacket, writeEscalationPacket } from "./packets/escalation";

export { MilestoneBundleEvidenceSource, StaticEvidenceSource } from "./sources/milestone";
export { IssueTrackerEvidenceSource, fetchMilestoneBundle } from "./sources/github";

export * from "./errors";
export type * from "./types/supervision";
export type * from "./types/trace";
export { EVENT_TYPES } from "./types/trace";

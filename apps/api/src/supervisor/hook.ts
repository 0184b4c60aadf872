import { readFile } from "node:fs/promises";
import { basename, extname } from "node:path";
import { createId } from "@paralleldrive/cuid2";
import { detectBoundaries, type ArtifactSnapshot } from "../boundaries/detect";
import { ArtifactUnreadable, EvidenceSourceFailure, HandlerFailure } from "../errors";
import { bindEvidence } from "../evidence/bind";
import { extractClaims } from "../evidence/claims";
import { EvidenceGraph } from "../evidence/graph";
import { evaluatePolicy } from "../interventions/policy";
import { writeEscalationPacket } from "../packets/escalation";
import { mergeConfig, type SupervisorConfig } from "../services/config";
import { createLogger, type Logger } from "../services/logger";
import { createEventClock, newEvent, type EventClock } from "../trace/events";
import type { TraceStore } from "../trace/store";
import type { EvidenceItem, Intervention, SupervisorSummary } from "../types/supervision";
import type { TraceEvent } from "../types/trace";

export interface EvidenceSource {
  getEvidenceItems(): EvidenceItem[] | Promise<EvidenceItem[]>;
}

export type InterventionContext = {
  runId: string;
  recentEvents: readonly TraceEvent[];
  artifacts: ReadonlyMap<string, string>;
  graph: EvidenceGraph;
  interventionCount: number;
};

export type HandlerResponse = { stop?: boolean; [key: string]: unknown };

export interface InterventionHandler {
  handle(
    intervention: Intervention,
    context: InterventionContext
  ): HandlerResponse | null | undefined | Promise<HandlerResponse | null | undefined>;
}

export type SupervisorLogger = Pick<Logger, "debug" | "info" | "warn" | "error">;

export type SupervisorHookOptions = {
  traceStore: TraceStore;
  runId?: string;
  /** Escalation packets are only written when this is set. */
  packetsDir?: string;
  evidenceSource?: EvidenceSource;
  interventionHandler?: InterventionHandler;
  config?: Parameters<typeof mergeConfig>[0];
  logger?: SupervisorLogger;
  clock?: EventClock;
};

/**
 * Facade an agent loop calls into. Owns the evidence graph and the run's
 * counters; callers must await each call before making the next one.
 */
export class SupervisorHook {
  readonly runId: string;
  readonly graph: EvidenceGraph;

  private readonly store: TraceStore;
  private readonly config: SupervisorConfig;
  private readonly log: SupervisorLogger;
  private readonly clock: EventClock;
  private readonly packetsDir?: string;
  private readonly evidenceSource?: EvidenceSource;
  private readonly handler?: InterventionHandler;

  private readonly artifactPaths = new Map<string, string>();
  private latestArtifact: ArtifactSnapshot | null = null;
  private readonly issued: Intervention[] = [];

  private eventsConsumed = 0;
  private toolCallCount = 0;
  private escalations = 0;

  constructor(opts: SupervisorHookOptions) {
    this.store = opts.traceStore;
    this.runId = opts.runId ?? createId();
    this.packetsDir = opts.packetsDir;
    this.evidenceSource = opts.evidenceSource;
    this.handler = opts.interventionHandler;
    this.config = mergeConfig(opts.config);
    this.graph = new EvidenceGraph(this.config.binding.threshold);
    this.log = opts.logger ?? createLogger("supervisor").child({ runId: this.runId });
    this.clock = opts.clock ?? createEventClock();
  }

  get interventions(): readonly Intervention[] {
    return this.issued;
  }

  get artifacts(): ReadonlyMap<string, string> {
    return this.artifactPaths;
  }

  /**
   * Extract claims from a freshly written artifact and rebind evidence.
   * Throws ArtifactUnreadable without touching any state if the file
   * cannot be read.
   */
  async onArtifactCreated(path: string, name?: string): Promise<void> {
    let content: string;
    try {
      content = await readFile(path, "utf8");
    } catch (err) {
      throw new ArtifactUnreadable(path, err);
    }

    const claims = extractClaims(content, path);
    let added = 0;
    for (const claim of claims) if (this.graph.addClaim(claim)) added += 1;

    this.artifactPaths.set(name ?? basename(path, extname(path)), path);
    this.latestArtifact = { id: path, content };
    this.log.debug({ path, claims: claims.length, added }, "artifact registered");

    await this.bindEvidenceNow();
  }

  /** Recompute every binding from the trace and the evidence source. */
  async bindEvidenceNow(): Promise<void> {
    const items = await this.collectSourceItems();
    const { candidates, bindings } = bindEvidence({
      claims: this.graph.claims,
      events: this.store.iterate(),
      items,
      graph: this.graph,
      options: this.config.binding
    });
    this.log.debug({ candidates: candidates.length, bindings: bindings.length }, "evidence bound");
  }

  /**
   * Re-evaluate the policy against the cumulative state of the run.
   * `recentEvents` defaults to the trailing window of the trace and is
   * passed to the intervention handler.
   */
  async onStep(recentEvents?: readonly TraceEvent[]): Promise<Intervention | null> {
    const all = [...this.store.iterate()];
    this.consume(all);

    const window = recentEvents ?? all.slice(-this.config.windowSize);
    const verdict = evaluatePolicy(
      {
        uncoveredHigh: this.graph.uncovered("HIGH"),
        boundaries: detectBoundaries(this.latestArtifact),
        toolCallCount: this.toolCallCount,
        evidenceCount: this.graph.boundEvidence().length
      },
      this.config.policy
    );
    if (!verdict) return null;

    this.issued.push(verdict);
    const intervention = await this.consultHandler(verdict, window);
    this.issued[this.issued.length - 1] = intervention;

    this.store.append(
      newEvent(
        "intervention",
        {
          type: intervention.type,
          rationale: intervention.rationale,
          suggested_next_steps: intervention.suggestedNextSteps,
          target_ids: intervention.targetIds
        },
        this.clock
      )
    );
    this.log.info({ type: intervention.type, targets: intervention.targetIds }, "intervention issued");

    if (intervention.type === "ESCALATE") await this.escalate(intervention);
    return intervention;
  }

  /** Read-only: leaves the step counters untouched. */
  getSummary(): SupervisorSummary {
    const all = [...this.store.iterate()];

    return {
      runId: this.runId,
      eventCount: all.length,
      artifactCount: this.artifactPaths.size,
      interventionCount: this.issued.length,
      uncoveredClaimCount: this.graph.uncovered("LOW").length,
      uncoveredHighClaimCount: this.graph.uncovered("HIGH").length,
      claimCount: this.graph.claims.length,
      evidenceCount: this.graph.boundEvidence().length,
      toolCallCount: all.filter((e) => e.type === "tool_call").length
    };
  }

  private consume(events: TraceEvent[]) {
    for (const event of events.slice(this.eventsConsumed)) {
      if (event.type === "tool_call") this.toolCallCount += 1;
    }
    this.eventsConsumed = events.length;
  }

  private async collectSourceItems(): Promise<EvidenceItem[]> {
    if (!this.evidenceSource) return [];
    try {
      return await this.evidenceSource.getEvidenceItems();
    } catch (err) {
      const failure = new EvidenceSourceFailure(err);
      this.log.warn({ err: failure }, "evidence source failed; binding with trace evidence only");
      return [];
    }
  }

  private async consultHandler(verdict: Intervention, recentEvents: readonly TraceEvent[]): Promise<Intervention> {
    if (!this.handler) return verdict;

    let response: HandlerResponse | null | undefined;
    try {
      response = await this.handler.handle(verdict, {
        runId: this.runId,
        recentEvents,
        artifacts: this.artifactPaths,
        graph: this.graph,
        interventionCount: this.issued.length
      });
    } catch (err) {
      const failure = new HandlerFailure(err);
      this.log.error({ err: failure }, "intervention handler failed; keeping policy verdict");
      return verdict;
    }

    if (!response?.stop || verdict.type === "ESCALATE") return verdict;
    return {
      ...verdict,
      type: "ESCALATE",
      rationale: `Handler requested escalation: ${verdict.rationale}`
    };
  }

  // One packet per ESCALATE firing; repeats are not suppressed.
  private async escalate(intervention: Intervention) {
    this.escalations += 1;
    const uncoveredHigh = this.graph.uncovered("HIGH");

    const packetPath = this.packetsDir
      ? await writeEscalationPacket(this.packetsDir, {
          runId: this.runId,
          sequence: this.escalations,
          intervention,
          uncoveredHigh,
          evidence: this.graph.boundEvidence()
        })
      : null;

    this.store.append(
      newEvent(
        "decision",
        {
          kind: "escalation",
          run_id: this.runId,
          packet_path: packetPath,
          sequence: this.escalations,
          uncovered_claims_count: uncoveredHigh.length
        },
        this.clock
      )
    );
    this.log.warn({ packetPath, sequence: this.escalations }, "run escalated");
  }
}

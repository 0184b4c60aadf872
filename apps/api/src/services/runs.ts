import { mkdirSync } from "node:fs";
import { join, resolve } from "node:path";
import { createId } from "@paralleldrive/cuid2";
import { StaticEvidenceSource } from "../sources/milestone";
import { EvidenceSourceFailure } from "../errors";
import { SupervisorHook, type EvidenceSource, type SupervisorLogger } from "../supervisor/hook";
import { createEventClock, type EventClock } from "../trace/events";
import { JsonlTraceStore } from "../trace/store";
import type { EvidenceItem } from "../types/supervision";
import type { SupervisorConfig } from "./config";
import { createLogger } from "./logger";

export type RunSession = {
  runId: string;
  runDir: string;
  store: JsonlTraceStore;
  hook: SupervisorHook;
  clock: EventClock;
  evidence: StaticEvidenceSource;
};

/**
 * Live supervision runs, one trace store and hook each.
 * Layout per run: <runsDir>/<runId>/trace/events.jsonl and packets/.
 */
export class RunRegistry {
  private readonly runs = new Map<string, RunSession>();
  private readonly runsDir: string;

  constructor(
    runsDir: string,
    private readonly config: SupervisorConfig,
    private readonly evidenceSource?: EvidenceSource,
    private readonly log: SupervisorLogger = createLogger("runs")
  ) {
    this.runsDir = resolve(runsDir);
  }

  create(opts: { evidence?: EvidenceItem[] } = {}): RunSession {
    const runId = createId();
    const runDir = join(this.runsDir, runId);
    mkdirSync(join(runDir, "artifacts"), { recursive: true });

    const store = new JsonlTraceStore(join(runDir, "trace", "events.jsonl"));
    const clock = createEventClock();
    const evidence = new StaticEvidenceSource(opts.evidence);

    const hook = new SupervisorHook({
      traceStore: store,
      runId,
      packetsDir: join(runDir, "packets"),
      evidenceSource: this.withSharedSource(runId, evidence),
      config: this.config,
      clock
    });

    const session: RunSession = { runId, runDir, store, hook, clock, evidence };
    this.runs.set(runId, session);
    return session;
  }

  /**
   * The run's own items plus the shared source's. A failing shared source
   * only drops its own items.
   */
  private withSharedSource(runId: string, evidence: StaticEvidenceSource): EvidenceSource {
    const shared = this.evidenceSource;
    if (!shared) return evidence;

    return {
      getEvidenceItems: async () => {
        let sharedItems: EvidenceItem[];
        try {
          sharedItems = await shared.getEvidenceItems();
        } catch (err) {
          const failure = new EvidenceSourceFailure(err);
          this.log.warn({ err: failure, runId }, "shared evidence source failed; using run evidence only");
          sharedItems = [];
        }
        return [...evidence.getEvidenceItems(), ...sharedItems];
      }
    };
  }

  get(runId: string): RunSession | undefined {
    return this.runs.get(runId);
  }

  close(runId: string): boolean {
    const session = this.runs.get(runId);
    if (!session) return false;
    session.store.close();
    this.runs.delete(runId);
    return true;
  }

  closeAll() {
    for (const id of [...this.runs.keys()]) this.close(id);
  }
}

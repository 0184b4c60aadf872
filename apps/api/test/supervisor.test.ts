import { existsSync, mkdtempSync, readdirSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { ArtifactUnreadable, EvidenceSourceFailure, HandlerFailure } from "../src/errors";
import { StaticEvidenceSource } from "../src/sources/milestone";
import { SupervisorHook, type InterventionContext, type SupervisorHookOptions } from "../src/supervisor/hook";
import { TraceEmitter } from "../src/trace/emitter";
import { JsonlTraceStore, MemoryTraceStore, type TraceStore } from "../src/trace/store";
import type { Intervention } from "../src/types/supervision";

const PRD = [
  "## Goals",
  "- Support offline checkout for mobile shoppers.",
  "- Encrypt stored payment tokens at rest.",
  "- Deliver receipts within one minute.",
  "",
  "## Metrics",
  "- Checkout completion rate above 80%.",
  "",
  "## Tradeoffs",
  "- Favor consistency over availability."
].join("\n");

function fakeLogger() {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

function eventsOf(store: TraceStore) {
  return [...store.iterate()];
}

describe("SupervisorHook", () => {
  let dir: string;
  let prdPath: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "supervisor-"));
    prdPath = join(dir, "prd.md");
    writeFileSync(prdPath, PRD);
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  function hookWith(opts: Partial<SupervisorHookOptions> = {}) {
    const store = opts.traceStore ?? new JsonlTraceStore(join(dir, "trace", "events.jsonl"));
    const hook = new SupervisorHook({
      runId: "run-a",
      packetsDir: join(dir, "packets"),
      logger: fakeLogger(),
      ...opts,
      traceStore: store
    });
    return { hook, store };
  }

  function goalIds(hook: SupervisorHook) {
    return hook.graph.claims.filter((c) => c.section === "Goals").map((c) => c.id);
  }

  it("escalates when three HIGH claims have no evidence", async () => {
    const { hook, store } = hookWith();
    await hook.onArtifactCreated(prdPath);

    const intervention = await hook.onStep();
    const ids = goalIds(hook);

    expect(ids).toHaveLength(3);
    expect(intervention?.type).toBe("ESCALATE");
    expect(intervention?.targetIds).toEqual(ids);
    expect(intervention?.rationale).toBe(`3 HIGH severity claims lack evidence: ${ids.join(", ")}`);

    const packetPath = join(dir, "packets", "packet_1.md");
    const packet = readFileSync(packetPath, "utf8");
    expect(packet.split("\n").slice(0, 5)).toEqual([
      "# Escalation Packet 1",
      "",
      "**Run ID**: run-a",
      expect.stringMatching(/^\*\*Generated\*\*: \d{4}-\d{2}-\d{2}T/),
      "**Trigger**: ESCALATE"
    ]);
    for (const id of ids) expect(packet).toContain(`- \`${id}\` (Goals, ${prdPath}:`);
    expect(packet).toContain("## Evidence Gathered\n\nNo evidence gathered yet.\n");

    const events = eventsOf(store);
    expect(events.map((e) => e.type)).toEqual(["intervention", "decision"]);
    expect(events[0]?.payload).toEqual({
      type: "ESCALATE",
      rationale: intervention?.rationale,
      suggested_next_steps: intervention?.suggestedNextSteps,
      target_ids: ids
    });
    expect(events[1]?.payload).toEqual({
      kind: "escalation",
      run_id: "run-a",
      packet_path: packetPath,
      sequence: 1,
      uncovered_claims_count: 3
    });
  });

  it("writes one packet per escalation", async () => {
    const { hook } = hookWith();
    await hook.onArtifactCreated(prdPath);
    await hook.onStep();
    await hook.onStep();

    expect(hook.interventions).toHaveLength(2);
    expect(existsSync(join(dir, "packets", "packet_1.md"))).toBe(true);
    expect(readFileSync(join(dir, "packets", "packet_2.md"), "utf8")).toContain("# Escalation Packet 2");
  });

  it("requests evidence for the remaining claim, then clears once the trace covers it", async () => {
    const evidence = new StaticEvidenceSource([
      { text: "Offline checkout support for mobile", sourceRef: "issue:10", sourceType: "issue" },
      { text: "Encrypt payment tokens", sourceRef: "issue:11", sourceType: "issue" }
    ]);
    const { hook, store } = hookWith({ evidenceSource: evidence });
    await hook.onArtifactCreated(prdPath);

    const [offline, encrypt, receipts] = goalIds(hook);
    const first = await hook.onStep();
    expect(first?.type).toBe("REQUEST_EVIDENCE");
    expect(first?.targetIds).toEqual([receipts]);
    expect(first?.rationale).toBe(`HIGH severity claims need evidence: ${receipts}`);
    expect(hook.graph.isCovered(offline ?? "")).toBe(true);
    expect(hook.graph.isCovered(encrypt ?? "")).toBe(true);

    new TraceEmitter(store).emitObservation("Receipts deliver within one minute via email queue");
    await hook.bindEvidenceNow();

    expect(await hook.onStep()).toBeNull();
    expect(hook.getSummary()).toEqual({
      runId: "run-a",
      eventCount: 2,
      artifactCount: 1,
      interventionCount: 1,
      uncoveredClaimCount: 1,
      uncoveredHighClaimCount: 0,
      claimCount: 5,
      evidenceCount: 3,
      toolCallCount: 0
    });
  });

  it("escalates runaway tool use without evidence", async () => {
    const store = new MemoryTraceStore();
    const { hook } = hookWith({ traceStore: store, packetsDir: undefined });
    const emitter = new TraceEmitter(store);

    for (let i = 0; i < 50; i++) emitter.emitToolCall("search", { page: i });
    expect(await hook.onStep()).toBeNull();

    emitter.emitToolCall("search", { page: 50 });
    const intervention = await hook.onStep();

    expect(intervention?.type).toBe("ESCALATE");
    expect(intervention?.rationale).toBe("Agent made 51 tool calls but only 0 evidence items are bound");
    expect(intervention?.targetIds).toEqual(["tool_call_limit"]);

    const decision = eventsOf(store).at(-1);
    expect(decision?.type).toBe("decision");
    expect(decision?.payload.packet_path).toBeNull();
    expect(hook.getSummary().toolCallCount).toBe(51);
  });

  it("asks for metrics, then options, as the artifact is revised", async () => {
    const { hook } = hookWith();
    const draft = join(dir, "draft.md");
    writeFileSync(draft, "## Scope\n- Only the web checkout flow.\n\n## Metrics\n- Shoppers feel the checkout is faster.");
    await hook.onArtifactCreated(draft);

    const metrics = await hook.onStep();
    expect(metrics?.type).toBe("REQUEST_METRICS");
    expect(metrics?.rationale).toBe(
      `Metrics section in ${draft} has no measurable targets (numbers, units or percentages)`
    );

    writeFileSync(draft, "## Scope\n- Only the web checkout flow.\n\n## Metrics\n- Checkout p95 under 300 ms.");
    await hook.onArtifactCreated(draft);

    const options = await hook.onStep();
    expect(options?.type).toBe("REQUEST_OPTIONS");
    expect(options?.targetIds).toEqual(["Tradeoffs"]);
    expect(hook.artifacts.get("draft")).toBe(draft);
    expect(hook.getSummary().artifactCount).toBe(1);
  });

  it("rejects an unreadable artifact without changing state", async () => {
    const { hook } = hookWith();
    const missing = join(dir, "missing.md");

    await expect(hook.onArtifactCreated(missing)).rejects.toBeInstanceOf(ArtifactUnreadable);
    await expect(hook.onArtifactCreated(missing)).rejects.toThrow(`Artifact could not be read: ${missing}`);
    expect(hook.getSummary()).toMatchObject({ artifactCount: 0, claimCount: 0 });
  });

  it("logs a failing evidence source and binds without it", async () => {
    const logger = fakeLogger();
    const { hook } = hookWith({
      logger,
      evidenceSource: {
        getEvidenceItems: async () => {
          throw new Error("tracker offline");
        }
      }
    });

    await hook.onArtifactCreated(prdPath);

    expect(logger.warn).toHaveBeenCalledTimes(1);
    const [fields] = logger.warn.mock.calls[0] ?? [];
    expect(fields.err).toBeInstanceOf(EvidenceSourceFailure);
    expect(fields.err.message).toBe("Evidence source failed: tracker offline");
    expect((await hook.onStep())?.type).toBe("ESCALATE");
  });

  it("keeps the policy verdict when the handler throws", async () => {
    const logger = fakeLogger();
    const { hook } = hookWith({
      logger,
      packetsDir: undefined,
      interventionHandler: {
        handle: () => {
          throw new Error("boom");
        }
      }
    });
    await hook.onArtifactCreated(prdPath);

    const intervention = await hook.onStep();

    expect(intervention?.type).toBe("ESCALATE");
    expect(logger.error).toHaveBeenCalledTimes(1);
    const [fields] = logger.error.mock.calls[0] ?? [];
    expect(fields.err).toBeInstanceOf(HandlerFailure);
    expect(fields.err.message).toBe("Intervention handler failed: boom");
  });

  it("escalates when the handler asks to stop", async () => {
    const evidence = new StaticEvidenceSource([
      { text: "Offline checkout support for mobile", sourceRef: "issue:10", sourceType: "issue" },
      { text: "Encrypt payment tokens", sourceRef: "issue:11", sourceType: "issue" }
    ]);
    const { hook, store } = hookWith({
      evidenceSource: evidence,
      interventionHandler: { handle: async () => ({ stop: true }) }
    });
    await hook.onArtifactCreated(prdPath);

    const receipts = goalIds(hook)[2];
    const intervention = await hook.onStep();

    expect(intervention?.type).toBe("ESCALATE");
    expect(intervention?.rationale).toBe(`Handler requested escalation: HIGH severity claims need evidence: ${receipts}`);
    expect(hook.interventions).toEqual([intervention]);
    expect(eventsOf(store).map((e) => [e.type, e.payload.type ?? e.payload.kind])).toEqual([
      ["intervention", "ESCALATE"],
      ["decision", "escalation"]
    ]);
    expect(existsSync(join(dir, "packets", "packet_1.md"))).toBe(true);
  });

  it("gives the handler the trailing window of the trace", async () => {
    const store = new MemoryTraceStore();
    const seen: Array<{ intervention: Intervention; context: InterventionContext }> = [];
    const { hook } = hookWith({
      traceStore: store,
      config: { windowSize: 2 },
      interventionHandler: {
        handle: (intervention, context) => {
          seen.push({ intervention, context });
          return null;
        }
      }
    });

    const draft = join(dir, "scope.md");
    writeFileSync(draft, "## Scope\n- Only the web checkout flow.");
    await hook.onArtifactCreated(draft, "scope-doc");

    const emitter = new TraceEmitter(store);
    emitter.emitLlmCall("model-a");
    emitter.emitToolCall("search", { q: "a" });
    emitter.emitToolCall("search", { q: "b" });

    const intervention = await hook.onStep();

    expect(intervention?.type).toBe("REQUEST_OPTIONS");
    expect(seen).toHaveLength(1);
    expect(seen[0]?.context.recentEvents.map((e) => e.type)).toEqual(["tool_call", "tool_call"]);
    expect(seen[0]?.context.interventionCount).toBe(1);
    expect(seen[0]?.context.runId).toBe("run-a");
    expect(seen[0]?.context.artifacts.get("scope-doc")).toBe(draft);
  });

  it("passes explicit recent events to the handler", async () => {
    const store = new MemoryTraceStore();
    const handle = vi.fn((_intervention: Intervention, _context: InterventionContext) => undefined);
    const { hook } = hookWith({ traceStore: store, interventionHandler: { handle } });

    const draft = join(dir, "scope.md");
    writeFileSync(draft, "## Scope\n- Only the web checkout flow.");
    await hook.onArtifactCreated(draft);
    await hook.onStep([]);

    expect(handle).toHaveBeenCalledTimes(1);
    expect(handle.mock.calls[0]?.[1].recentEvents).toEqual([]);
  });

  it("reads the summary without touching the trace or the step counters", async () => {
    const store = new MemoryTraceStore();
    const { hook } = hookWith({ traceStore: store, packetsDir: undefined });
    const emitter = new TraceEmitter(store);
    for (let i = 0; i < 51; i++) emitter.emitToolCall("search", { page: i });

    const before = hook.getSummary();
    expect(hook.getSummary()).toEqual(before);
    expect(before).toMatchObject({ eventCount: 51, toolCallCount: 51, interventionCount: 0 });
    expect(eventsOf(store)).toHaveLength(51);

    const intervention = await hook.onStep();
    expect(intervention?.rationale).toBe("Agent made 51 tool calls but only 0 evidence items are bound");
  });

  it("does not duplicate claims when an artifact is registered again", async () => {
    const { hook } = hookWith();
    await hook.onArtifactCreated(prdPath);
    await hook.onArtifactCreated(prdPath);

    expect(hook.graph.claims).toHaveLength(5);
  });

  describe("scenarios", () => {
    const TWO_GOALS = [
      "## Goals",
      "- Support offline checkout for mobile shoppers.",
      "- Encrypt stored payment tokens at rest.",
      "",
      "## Metrics",
      "- Checkout completion rate above 80%.",
      "",
      "## Tradeoffs",
      "- Favor consistency over availability."
    ].join("\n");

    it("requests evidence for two uncovered goals, then escalates once a third is added", async () => {
      writeFileSync(prdPath, TWO_GOALS);
      const { hook } = hookWith();
      await hook.onArtifactCreated(prdPath);

      const [offline, encrypt] = goalIds(hook);
      const first = await hook.onStep();
      expect(first?.type).toBe("REQUEST_EVIDENCE");
      expect(first?.targetIds).toEqual([offline, encrypt]);

      writeFileSync(
        prdPath,
        TWO_GOALS.replace(
          "- Encrypt stored payment tokens at rest.",
          "- Encrypt stored payment tokens at rest.\n- Deliver receipts within one minute."
        )
      );
      await hook.onArtifactCreated(prdPath);

      const ids = goalIds(hook);
      expect(ids.slice(0, 2)).toEqual([offline, encrypt]);

      const second = await hook.onStep();
      expect(second?.type).toBe("ESCALATE");
      expect(second?.targetIds).toEqual(ids);
      expect(readdirSync(join(dir, "packets"))).toEqual(["packet_1.md"]);
    });

    it("escalates 51 tool calls backed by only four evidence items", async () => {
      const evidence = new StaticEvidenceSource([
        { text: "Offline checkout support for mobile", sourceRef: "issue:10", sourceType: "issue" },
        { text: "Encrypt payment tokens", sourceRef: "issue:11", sourceType: "issue" },
        { text: "Receipts deliver within one minute", sourceRef: "issue:12", sourceType: "issue" },
        { text: "Consistency over availability debate", sourceRef: "issue:13", sourceType: "issue" }
      ]);
      const store = new MemoryTraceStore();
      const { hook } = hookWith({ traceStore: store, evidenceSource: evidence });
      await hook.onArtifactCreated(prdPath);
      expect(hook.graph.boundEvidence()).toHaveLength(4);

      const emitter = new TraceEmitter(store);
      for (let i = 0; i < 51; i++) emitter.emitToolCall("search", { page: i });

      const intervention = await hook.onStep();
      expect(intervention?.type).toBe("ESCALATE");
      expect(intervention?.rationale).toBe("Agent made 51 tool calls but only 4 evidence items are bound");

      const packet = readFileSync(join(dir, "packets", "packet_1.md"), "utf8").split("\n");
      expect(packet).toContain("## Evidence Gathered");
      expect(packet).toContain("- Encrypt payment tokens (from `issue:11`)");
      expect(packet).toContain("- Consistency over availability debate (from `issue:13`)");
    });

    it("requests metrics when targets are vague and tradeoffs are present", async () => {
      writeFileSync(
        prdPath,
        "## Scope\n- Only the web checkout flow.\n\n## Metrics\n- Shoppers feel the checkout is faster.\n\n## Tradeoffs\n- Favor consistency over availability."
      );
      const { hook } = hookWith();
      await hook.onArtifactCreated(prdPath);

      const intervention = await hook.onStep();
      expect(intervention?.type).toBe("REQUEST_METRICS");
      expect(intervention?.targetIds).toEqual(["Metrics"]);
    });
  });
});

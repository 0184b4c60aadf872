import type { EventPayload } from "../types/trace";
import { createEventClock, newEvent, type EventClock } from "./events";
import type { TraceStore } from "./store";

export type LlmUsage = {
  promptTokens?: number;
  completionTokens?: number;
  totalTokens?: number;
};

/**
 * Typed helpers an agent loop uses to record what it does.
 * Every event goes through one clock so timestamps follow append order.
 */
export class TraceEmitter {
  constructor(
    private readonly store: TraceStore,
    private readonly clock: EventClock = createEventClock()
  ) {}

  emitLlmCall(model: string, usage?: LlmUsage, metadata: EventPayload = {}) {
    const payload: EventPayload = { model };
    if (usage?.promptTokens != null) payload.prompt_tokens = usage.promptTokens;
    if (usage?.completionTokens != null) payload.completion_tokens = usage.completionTokens;
    if (usage?.totalTokens != null) payload.total_tokens = usage.totalTokens;
    this.emit("llm_call", { ...payload, ...metadata });
  }

  emitToolCall(tool: string, parameters: EventPayload, toolCallId?: string, metadata: EventPayload = {}) {
    this.emit("tool_call", {
      tool,
      parameters,
      ...(toolCallId ? { tool_call_id: toolCallId } : {}),
      ...metadata
    });
  }

  /**
   * Strings are wrapped as `{ content }` so the binder can read them;
   * objects are kept as-is, anything else is stringified.
   */
  emitObservation(result: unknown, toolCallId?: string, metadata: EventPayload = {}) {
    const wrapped =
      typeof result === "string"
        ? { content: result }
        : typeof result === "object" && result !== null && !Array.isArray(result)
          ? result
          : { value: String(result) };

    this.emit("observation", {
      result: wrapped,
      ...(toolCallId ? { tool_call_id: toolCallId } : {}),
      ...metadata
    });
  }

  emitArtifact(path: string, kind = "document", name?: string, metadata: EventPayload = {}) {
    this.emit("artifact_created", { path, kind, ...(name ? { name } : {}), ...metadata });
  }

  emitDecision(kind: string, payload: EventPayload = {}) {
    this.emit("decision", { kind, ...payload });
  }

  private emit(type: Parameters<typeof newEvent>[0], payload: EventPayload) {
    this.store.append(newEvent(type, payload, this.clock));
  }
}

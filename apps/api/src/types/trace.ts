import { z } from "zod";

export const EVENT_TYPES = [
  "llm_call",
  "tool_call",
  "observation",
  "artifact_created",
  "decision",
  "intervention"
] as const;

export type EventType = (typeof EVENT_TYPES)[number];

export type EventPayload = Record<string, unknown>;

/**
 * One record in a run's trace. Never mutated after append;
 * append order is timestamp order.
 */
export type TraceEvent = {
  readonly type: EventType;
  /** ISO-8601, UTC */
  readonly timestamp: string;
  readonly payload: Readonly<EventPayload>;
};

export const TraceEventSchema = z.object({
  type: z.enum(EVENT_TYPES),
  timestamp: z.string().datetime({ offset: true }),
  payload: z.record(z.unknown())
});

export function isEventType(value: unknown): value is EventType {
  return EVENT_TYPES.some((t) => t === value);
}

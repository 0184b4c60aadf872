import { isEventType, TraceEventSchema, type EventPayload, type EventType, type TraceEvent } from "../types/trace";

/** Returns the next timestamp; `candidate` (epoch ms) replaces the wall-clock reading. */
export type EventClock = (candidate?: number) => string;

/**
 * Clock that never goes backwards: a reading earlier than the previous one,
 * from the wall clock or a supplied candidate, is clamped to the previous
 * one, so append order stays timestamp order.
 */
export function createEventClock(now: () => number = Date.now): EventClock {
  let last = Number.NEGATIVE_INFINITY;
  return (candidate) => {
    const t = Math.max(candidate ?? now(), last);
    last = t;
    return new Date(t).toISOString();
  };
}

const defaultClock = createEventClock();

export function newEvent(
  type: EventType,
  payload: EventPayload = {},
  clock: EventClock = defaultClock,
  at?: number
): TraceEvent {
  return Object.freeze({
    type,
    timestamp: clock(at),
    payload: Object.freeze({ ...payload })
  });
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Convert a loosely-shaped record from an external loop into an event.
 * Unknown types fall back to `observation`; a record without a `payload`
 * object is treated as the payload itself. A record's own timestamp goes
 * through the clock, so a back-dated one lands at the previous reading.
 */
export function eventFromRecord(record: Record<string, unknown>, clock: EventClock = defaultClock): TraceEvent {
  const type = isEventType(record.type) ? record.type : "observation";
  const payload = isPlainObject(record.payload) ? record.payload : record;
  const at = typeof record.timestamp === "string" ? Date.parse(record.timestamp) : Number.NaN;

  return newEvent(type, payload, clock, Number.isNaN(at) ? undefined : at);
}

/** Returns null for lines that are blank, malformed or truncated. */
export function parseEventLine(line: string): TraceEvent | null {
  const t = line.trim();
  if (!t) return null;

  let raw: unknown;
  try {
    raw = JSON.parse(t);
  } catch {
    return null;
  }

  const parsed = TraceEventSchema.safeParse(raw);
  if (!parsed.success) return null;
  return Object.freeze({ ...parsed.data, payload: Object.freeze(parsed.data.payload) });
}

export function serializeEvent(event: TraceEvent): string {
  return JSON.stringify({ type: event.type, timestamp: event.timestamp, payload: event.payload });
}

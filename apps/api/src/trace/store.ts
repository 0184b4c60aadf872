import { closeSync, existsSync, fsyncSync, mkdirSync, openSync, readFileSync, writeSync } from "node:fs";
import { dirname } from "node:path";
import { TraceWriteFailure } from "../errors";
import type { TraceEvent } from "../types/trace";
import { parseEventLine, serializeEvent } from "./events";

/**
 * Append-only, ordered event storage for one supervision run.
 *
 * The core calls these from a single logical thread; a backend shared
 * between processes must serialize writers itself.
 */
export interface TraceStore {
  /** Fails only on unrecoverable I/O, as TraceWriteFailure. */
  append(event: TraceEvent): void;
  /**
   * Events in append order, bounded by what was appended when `iterate`
   * was called. The returned iterable can be walked more than once.
   */
  iterate(): Iterable<TraceEvent>;
  /** Idempotent. */
  close(): void;
}

function linesOf(content: string): Iterable<TraceEvent> {
  return {
    *[Symbol.iterator]() {
      for (const line of content.split("\n")) {
        const event = parseEventLine(line);
        if (event) yield event;
      }
    }
  };
}

/**
 * JSONL-backed trace: one event per line. Readers skip lines that do not
 * parse, which covers a trailing partial line left by a crashed writer.
 */
export class JsonlTraceStore implements TraceStore {
  readonly path: string;
  private fd: number | null = null;
  private closed = false;

  constructor(path: string) {
    this.path = path;
    mkdirSync(dirname(path), { recursive: true });
  }

  append(event: TraceEvent): void {
    if (this.closed) throw new TraceWriteFailure(`Trace store is closed: ${this.path}`);

    try {
      if (this.fd === null) {
        this.fd = openSync(this.path, "a");
        if (this.endsMidLine()) writeSync(this.fd, "\n");
      }
      writeSync(this.fd, `${serializeEvent(event)}\n`);
      fsyncSync(this.fd);
    } catch (err) {
      throw new TraceWriteFailure(`Failed to append event to ${this.path}`, err);
    }
  }

  iterate(): Iterable<TraceEvent> {
    if (!existsSync(this.path)) return [];
    return linesOf(readFileSync(this.path, "utf8"));
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    if (this.fd !== null) {
      closeSync(this.fd);
      this.fd = null;
    }
  }

  // A partial line from a crashed writer must not swallow the next event.
  private endsMidLine(): boolean {
    if (!existsSync(this.path)) return false;
    const content = readFileSync(this.path, "utf8");
    return content.length > 0 && !content.endsWith("\n");
  }
}

export class MemoryTraceStore implements TraceStore {
  private readonly events: TraceEvent[] = [];
  private closed = false;

  append(event: TraceEvent): void {
    if (this.closed) throw new TraceWriteFailure("Trace store is closed");
    this.events.push(event);
  }

  iterate(): Iterable<TraceEvent> {
    return this.events.slice();
  }

  close(): void {
    this.closed = true;
  }
}

/** Read a whole JSONL trace, e.g. to replay a finished run. */
export function loadEvents(path: string): TraceEvent[] {
  const store = new JsonlTraceStore(path);
  try {
    return [...store.iterate()];
  } finally {
    store.close();
  }
}

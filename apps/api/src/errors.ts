export type SupervisorErrorCode =
  | "ARTIFACT_UNREADABLE"
  | "TRACE_WRITE_FAILURE"
  | "EVIDENCE_SOURCE_FAILURE"
  | "HANDLER_FAILURE";

export class SupervisorError extends Error {
  readonly code: SupervisorErrorCode;

  constructor(code: SupervisorErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class ArtifactUnreadable extends SupervisorError {
  readonly path: string;

  constructor(path: string, cause?: unknown) {
    super("ARTIFACT_UNREADABLE", `Artifact could not be read: ${path}`, { cause });
    this.path = path;
  }
}

export class TraceWriteFailure extends SupervisorError {
  constructor(message: string, cause?: unknown) {
    super("TRACE_WRITE_FAILURE", message, { cause });
  }
}

export class EvidenceSourceFailure extends SupervisorError {
  constructor(cause: unknown) {
    super("EVIDENCE_SOURCE_FAILURE", `Evidence source failed: ${describe(cause)}`, { cause });
  }
}

export class HandlerFailure extends SupervisorError {
  constructor(cause: unknown) {
    super("HANDLER_FAILURE", `Intervention handler failed: ${describe(cause)}`, { cause });
  }
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

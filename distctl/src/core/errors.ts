/**
 * Error taxonomy for pipeline failures.
 *
 * Steps throw a `PipelineError`; the orchestrator records its `kind` next to
 * the step result and moves the job to its terminal state. Nothing retries.
 */
export type ErrorKind =
  | "resolution"
  | "build"
  | "integrity"
  | "quality_gate"
  | "install"
  | "publication"
  | "cancelled"
  | "timeout"
  | "config";

export class PipelineError extends Error {
  readonly kind: ErrorKind;
  readonly details?: Record<string, unknown>;

  constructor(kind: ErrorKind, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = "PipelineError";
    this.kind = kind;
    this.details = details;
  }
}

export class CancelledError extends PipelineError {
  constructor(message = "Run cancelled") {
    super("cancelled", message);
    this.name = "CancelledError";
  }
}

export class TimeoutError extends PipelineError {
  constructor(message: string) {
    super("timeout", message);
    this.name = "TimeoutError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function errorKind(err: unknown): ErrorKind | undefined {
  return err instanceof PipelineError ? err.kind : undefined;
}

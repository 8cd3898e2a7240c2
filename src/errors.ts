export type ErrorCode =
  | "TRANSPORT"
  | "BACKEND_UNAVAILABLE"
  | "BACKEND_REJECTED"
  | "WORKER_BUSY"
  | "CANCELLED"
  | "NO_ELIGIBLE_WORKER"
  | "VALIDATION_FAILED"
  | "DUPLICATE_REGISTRATION"
  | "CONFIG_INVALID"
  | "INTERNAL";

/** A task failure as recorded on the task and reported to the sink. */
export type FailureReason = {
  code: ErrorCode;
  message: string;
};

export class DispatchError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, opts?: { cause?: unknown }) {
    super(message, opts?.cause !== undefined ? { cause: opts.cause } : undefined);
    this.name = "DispatchError";
    this.code = code;
  }
}

export type TransportErrorKind = "network" | "timeout" | "http" | "malformed";

/** Transient failure of a single exchange. Retried inside the generation client. */
export class TransportError extends DispatchError {
  readonly kind: TransportErrorKind;
  readonly httpStatus?: number;

  constructor(kind: TransportErrorKind, message: string, opts?: { cause?: unknown; httpStatus?: number }) {
    super("TRANSPORT", message, opts);
    this.name = "TransportError";
    this.kind = kind;
    this.httpStatus = opts?.httpStatus;
  }
}

export class BackendUnavailableError extends DispatchError {
  readonly attempts: number;
  readonly lastCause: unknown;

  constructor(attempts: number, lastCause: unknown) {
    super(
      "BACKEND_UNAVAILABLE",
      `Backend unavailable after ${attempts} attempt${attempts === 1 ? "" : "s"}: ${describe(lastCause)}`,
      { cause: lastCause },
    );
    this.name = "BackendUnavailableError";
    this.attempts = attempts;
    this.lastCause = lastCause;
  }
}

/** Well-formed permanent error from the backend (unknown model, bad request). */
export class BackendRejectedError extends DispatchError {
  readonly httpStatus: number;

  constructor(httpStatus: number, message: string) {
    super("BACKEND_REJECTED", `Backend rejected request (HTTP ${httpStatus}): ${message}`);
    this.name = "BackendRejectedError";
    this.httpStatus = httpStatus;
  }
}

export class WorkerBusyError extends DispatchError {
  constructor(workerId: number, status: string) {
    super("WORKER_BUSY", `Worker ${workerId} cannot take a task while ${status}`);
    this.name = "WorkerBusyError";
  }
}

export class CancelledError extends DispatchError {
  constructor(message = "Cancelled") {
    super("CANCELLED", message);
    this.name = "CancelledError";
  }
}

export class NoEligibleWorkerError extends DispatchError {
  constructor(assignTo: string) {
    super("NO_ELIGIBLE_WORKER", `No team member matches "${assignTo}"`);
    this.name = "NoEligibleWorkerError";
  }
}

export class ValidationError extends DispatchError {
  constructor(code: "VALIDATION_FAILED" | "DUPLICATE_REGISTRATION", message: string) {
    super(code, message);
    this.name = "ValidationError";
  }
}

export class ConfigError extends DispatchError {
  constructor(message: string) {
    super("CONFIG_INVALID", message);
    this.name = "ConfigError";
  }
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function toFailure(err: unknown): FailureReason {
  if (err instanceof DispatchError) {
    return { code: err.code, message: err.message };
  }
  return { code: "INTERNAL", message: describe(err) };
}

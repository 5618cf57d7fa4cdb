export type SimulationErrorKind =
  | "RegistrationConflict"
  | "ReportTimeout"
  | "TransportFailure"
  | "MalformedPayload";

export abstract class SimulationError extends Error {
  abstract readonly kind: SimulationErrorKind;
}

export class RegistrationConflictError extends SimulationError {
  readonly kind = "RegistrationConflict";
  readonly zoneId: string;

  constructor(zoneId: string, message = `Zone ${zoneId} is already registered by a live worker.`) {
    super(message);
    this.name = "RegistrationConflictError";
    this.zoneId = zoneId;
  }
}

export class ReportTimeoutError extends SimulationError {
  readonly kind = "ReportTimeout";
  readonly zoneId: string;
  readonly step: number;

  constructor(zoneId: string, step: number) {
    super(`Zone ${zoneId} did not report step ${step} before the deadline.`);
    this.name = "ReportTimeoutError";
    this.zoneId = zoneId;
    this.step = step;
  }
}

export class TransportFailureError extends SimulationError {
  readonly kind = "TransportFailure";
  readonly status: number;
  readonly retryable: boolean;

  constructor(message: string, status: number, retryable = true, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "TransportFailureError";
    this.status = status;
    this.retryable = retryable;
  }
}

export class MalformedPayloadError extends SimulationError {
  readonly kind = "MalformedPayload";
  readonly issues: string[];

  constructor(what: string, issues: string[]) {
    const detail = issues.length ? `: ${issues.slice(0, 5).join("; ")}` : "";
    super(`Malformed ${what}${detail}`);
    this.name = "MalformedPayloadError";
    this.issues = issues;
  }
}

export class PayloadTooLargeError extends MalformedPayloadError {
  readonly limitBytes: number;

  constructor(what: string, limitBytes: number) {
    super(what, [`body exceeds ${limitBytes} bytes`]);
    this.name = "PayloadTooLargeError";
    this.limitBytes = limitBytes;
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

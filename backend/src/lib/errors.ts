export type ScheduleErrorCode =
  | "InvalidRange"
  | "InvalidPattern"
  | "InvalidProposal"
  | "StaleReference"
  | "OutOfCareWindow"
  | "OverlappingCoverage"
  | "InvalidTransition"
  | "StoreBusy"
  | "ApplyFailed"
  | "NotFound";

export type ScheduleErrorDetails = {
  proposalIndex?: number;
  proposalId?: string;
  blockIds?: string[];
  cause?: ScheduleError;
};

/** Recoverable failure caused by caller input or schedule state. */
export class ScheduleError extends Error {
  readonly code: ScheduleErrorCode;
  readonly details: ScheduleErrorDetails;

  constructor(code: ScheduleErrorCode, message: string, details: ScheduleErrorDetails = {}) {
    super(message);
    this.name = "ScheduleError";
    this.code = code;
    this.details = details;
  }

  toJSON() {
    return { code: this.code, message: this.message, ...this.details };
  }
}

export type AssistantErrorCode =
  | "NotConfigured"
  | "NoActionFound"
  | "InvalidToolInput"
  | "BlockNotFound"
  | "UnknownTool";

export class AssistantError extends Error {
  readonly code: AssistantErrorCode;

  constructor(code: AssistantErrorCode, message: string) {
    super(message);
    this.name = "AssistantError";
    this.code = code;
  }
}

/** The engine found itself in a state it should never reach. Not recoverable. */
export class InvariantViolation extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvariantViolation";
  }
}

export type Result<T> = { ok: true; value: T } | { ok: false; error: ScheduleError };

export const ok = <T>(value: T): Result<T> => ({ ok: true, value });
export const fail = <T = never>(error: ScheduleError): Result<T> => ({ ok: false, error });

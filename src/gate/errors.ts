/**
 * Input validation errors raised by the publish gate.
 *
 * Both are caller errors: the evaluator does no I/O, so nothing here is
 * retryable and no fallback decision is ever substituted.
 */

export type PublishGateErrorCode = "InvalidEventKind" | "InvalidBranchIdentifier";

/** Base class so callers can catch every gate rejection in one place. */
export class PublishGateError extends Error {
  readonly code: PublishGateErrorCode;

  constructor(code: PublishGateErrorCode, message: string) {
    super(message);
    this.name = "PublishGateError";
    this.code = code;
  }
}

/** Raised when the event kind is neither `push` nor `review-request`. */
export class InvalidEventKindError extends PublishGateError {
  /** The rejected kind as received. */
  readonly kind: string;

  constructor(kind: string) {
    super("InvalidEventKind", `Unrecognized event kind: ${JSON.stringify(kind)} (expected "push" or "review-request")`);
    this.name = "InvalidEventKindError";
    this.kind = kind;
  }
}

/** Raised when the origin branch is empty. */
export class InvalidBranchIdentifierError extends PublishGateError {
  /** The rejected branch as received. */
  readonly branch: string;

  constructor(branch: string) {
    super("InvalidBranchIdentifier", `Invalid origin branch: ${JSON.stringify(branch)} (must be a non-empty branch name)`);
    this.name = "InvalidBranchIdentifierError";
    this.branch = branch;
  }
}

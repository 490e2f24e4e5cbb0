import type { FailureStage } from "./types/state.js";

export type ValidationReason =
  | "malformed_request"
  | "amount_invalid"
  | "date_invalid"
  | "rate_limited";

/**
 * Thrown when the submission gate refuses a claim draft.
 * The caller corrects the input and resubmits.
 */
export class SubmissionValidationError extends Error {
  readonly code: ValidationReason;

  constructor(
    message: string,
    reason: ValidationReason,
    public readonly field?: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = "SubmissionValidationError";
    this.code = reason;
  }
}

/**
 * Thrown when a second attempt starts while one is in flight for the same actor
 */
export class ConcurrencyViolationError extends Error {
  readonly code = "SUBMISSION_IN_FLIGHT";

  constructor(
    public readonly actorId: string,
    public readonly inFlightAttemptId: string
  ) {
    super(`A claim submission is already in progress for ${actorId}`);
    this.name = "ConcurrencyViolationError";
  }
}

/**
 * The rate-limit oracle itself failed, so the gate could not reach a verdict
 */
export class RateLimitCheckError extends Error {
  readonly code = "RATE_LIMIT_UNAVAILABLE";

  constructor(message: string, public readonly cause?: unknown) {
    super(message);
    this.name = "RateLimitCheckError";
  }
}

/**
 * Compression or upload of evidence media failed
 */
export class MediaPipelineError extends Error {
  readonly code: string;

  constructor(
    message: string,
    public readonly stage: Extract<FailureStage, "compression" | "upload">,
    public readonly cause?: unknown
  ) {
    super(message);
    this.name = "MediaPipelineError";
    this.code = stage === "compression" ? "COMPRESSION_FAILED" : "UPLOAD_FAILED";
  }
}

/**
 * The decision service call failed or answered with something unusable.
 * A `rejected` decision is not an error.
 */
export class DecisionServiceError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly cause?: unknown
  ) {
    super(message);
    this.name = "DecisionServiceError";
  }
}

/**
 * The caller abandoned the attempt through its abort signal while a stage
 * was still waiting on a collaborator.
 */
export class SubmissionAbortedError extends Error {
  readonly code = "SUBMISSION_ABORTED";

  constructor(public readonly stage: FailureStage) {
    super(`Submission abandoned during ${stage}`);
    this.name = "SubmissionAbortedError";
  }
}

export class SubmissionConfigError extends Error {
  readonly code = "CONFIG_ERROR";

  constructor(message: string, public readonly details?: Record<string, unknown>) {
    super(message);
    this.name = "SubmissionConfigError";
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : "Unknown error";
}

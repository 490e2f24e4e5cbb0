import type { ApprovalResult } from "./claim.js";

/**
 * Pipeline stage a failure is attributed to
 */
export type FailureStage =
  | "validation"
  | "rate_limit_check"
  | "compression"
  | "upload"
  | "decision";

export type IdleState = { status: "idle" };
export type ValidatingState = { status: "validating" };
export type UploadingMediaState = { status: "uploading_media"; progress: number };
export type SubmittingState = { status: "submitting" };
export type ApprovedState = { status: "approved"; approval: ApprovalResult; claimId?: string };
export type UnderReviewState = { status: "under_review"; claimId?: string };
export type RejectedState = { status: "rejected"; message: string; claimId?: string };
export type FailedState = {
  status: "failed";
  stage: FailureStage;
  code: string;
  message: string;
  error?: Error;
};

/**
 * Lifecycle of one submission attempt
 */
export type SubmissionState =
  | IdleState
  | ValidatingState
  | UploadingMediaState
  | SubmittingState
  | ApprovedState
  | UnderReviewState
  | RejectedState
  | FailedState;

export type SubmissionStatus = SubmissionState["status"];

export type TerminalState = ApprovedState | UnderReviewState | RejectedState | FailedState;

/**
 * What `submitClaim` resolves with once an attempt reaches a terminal state
 */
export type SubmissionOutcome = TerminalState & { attemptId: string };

export interface SubmissionStateChange {
  attemptId: string;
  actorId: string;
  previous: SubmissionState;
  current: SubmissionState;
  at: string;
}

/**
 * Presentation events. The core emits them; the UI layer decides what they look like.
 */
export type SubmissionEvent =
  | { type: "submission-succeeded"; attemptId: string; actorId: string; approval: ApprovalResult }
  | { type: "celebrate"; attemptId: string; actorId: string };

export type StateChangeListener = (change: Readonly<SubmissionStateChange>) => void;
export type SubmissionEventListener = (event: Readonly<SubmissionEvent>) => void;

import type { ClaimRequest, DecisionResponse, LocalMediaReference } from "./claim.js";

export interface CollaboratorCallOptions {
  signal?: AbortSignal;
}

export interface UploadOptions extends CollaboratorCallOptions {
  /** Called with a fraction between 0 and 1 */
  onProgress?: (progress: number) => void;
}

export interface DecisionSubmitOptions extends CollaboratorCallOptions {
  /** Submitting user */
  actorId: string;
}

/**
 * Reports whether an actor is submitting claims too often
 */
export interface RateLimiter {
  isSubmittingTooFrequently(actorId: string): boolean | Promise<boolean>;
  /** Invoked once a claim has been handed to the decision service */
  recordSubmission?(actorId: string): void | Promise<void>;
}

/**
 * Compresses captured evidence and stores it durably
 */
export interface MediaPipeline {
  compress(
    media: LocalMediaReference,
    maxBytes: number,
    options?: CollaboratorCallOptions
  ): Promise<LocalMediaReference>;
  upload(
    media: LocalMediaReference,
    destination: string,
    options?: UploadOptions
  ): Promise<string>;
}

/**
 * Adjudicates a claim
 */
export interface DecisionService {
  submit(claim: Readonly<ClaimRequest>, options: DecisionSubmitOptions): Promise<DecisionResponse>;
}

/**
 * Subscribes the client to out-of-band status updates for a claim under review
 */
export interface StatusScheduler {
  scheduleUpdates(claimId: string): void | Promise<void>;
}

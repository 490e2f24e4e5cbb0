import { randomUUID } from "node:crypto";

import { classifyDecision } from "./actions/classifyDecision.js";
import { type GateResult, validateSubmission } from "./actions/validateSubmission.js";
import type { SubmissionConfig } from "./config.js";
import {
  ConcurrencyViolationError,
  DecisionServiceError,
  MediaPipelineError,
  RateLimitCheckError,
  SubmissionAbortedError,
  SubmissionValidationError,
  describeError,
} from "./errors.js";
import { type Logger, createConsoleLogger } from "./logging.js";
import { IDLE_STATE, SubmissionAttempt, isTerminal } from "./submissionAttempt.js";
import type {
  ClaimRequest,
  DecisionResponse,
  LocalMediaReference,
  SubmissionContext,
} from "./types/claim.js";
import type {
  DecisionService,
  MediaPipeline,
  RateLimiter,
  StatusScheduler,
} from "./types/collaborators.js";
import type {
  FailedState,
  FailureStage,
  StateChangeListener,
  SubmissionEvent,
  SubmissionEventListener,
  SubmissionOutcome,
  SubmissionState,
  SubmissionStateChange,
  TerminalState,
} from "./types/state.js";

export const SUBMISSION_FAILED_MESSAGE =
  "We couldn't submit your claim right now. Please try again.";

/**
 * Dependencies required by the orchestrator. Collaborators have no defaults.
 */
export interface SubmissionOrchestratorDeps {
  rateLimiter: RateLimiter;
  mediaPipeline: MediaPipeline;
  decisionService: DecisionService;
  statusScheduler: StatusScheduler;
  config: Pick<SubmissionConfig, "maxMediaBytes" | "uploadDestination">;
  logger?: Logger;
  generateId?: () => string;
  now?: () => Date;
}

/**
 * Raised inside a stage to end the attempt in a failed state
 */
class StageFailure extends Error {
  constructor(public readonly failed: FailedState) {
    super(failed.message);
    this.name = "StageFailure";
  }
}

function failure(stage: FailureStage, code: string, error?: Error): FailedState {
  return {
    status: "failed",
    stage,
    code,
    message: SUBMISSION_FAILED_MESSAGE,
    error,
  };
}

function errorCode(error: unknown, fallback: string): string {
  if (typeof error === "object" && error !== null && "code" in error) {
    const { code } = error;
    if (typeof code === "string" && code.length > 0) return code;
  }
  return fallback;
}

/**
 * Settle with the collaborator's result, or reject with SubmissionAbortedError
 * as soon as the caller's signal fires. A collaborator that never settles
 * cannot hold the attempt open past an abort.
 */
function untilAborted<T>(
  work: Promise<T>,
  stage: FailureStage,
  signal: AbortSignal | undefined
): Promise<T> {
  if (!signal) return work;

  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(new SubmissionAbortedError(stage));
    if (signal.aborted) {
      onAbort();
    } else {
      signal.addEventListener("abort", onAbort, { once: true });
    }

    work.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(error);
      }
    );
  });
}

function abortedFailure(error: unknown): StageFailure | undefined {
  if (error instanceof SubmissionAbortedError) {
    return new StageFailure(failure(error.stage, error.code, error));
  }
  return undefined;
}

/**
 * Drives claim submission attempts from draft to terminal state.
 *
 * One attempt per actor may be in flight. Within an attempt the stages run
 * strictly in order: validation, media compression and upload, decision.
 * Observers get every state change in that order, and presentation events
 * only after the state they belong to has been published.
 */
export class SubmissionOrchestrator {
  private readonly inFlight = new Map<string, SubmissionAttempt>();
  private readonly latest = new Map<string, SubmissionState>();
  private readonly stateListeners = new Set<StateChangeListener>();
  private readonly eventListeners = new Set<SubmissionEventListener>();
  private readonly logger: Logger;
  private readonly generateId: () => string;
  private readonly now: () => Date;

  constructor(private readonly deps: SubmissionOrchestratorDeps) {
    this.logger = deps.logger ?? createConsoleLogger("claims");
    this.generateId = deps.generateId ?? randomUUID;
    this.now = deps.now ?? (() => new Date());
  }

  /**
   * Register a state observer. Returns the unsubscribe function.
   */
  subscribe(listener: StateChangeListener): () => void {
    this.stateListeners.add(listener);
    return () => {
      this.stateListeners.delete(listener);
    };
  }

  onEvent(listener: SubmissionEventListener): () => void {
    this.eventListeners.add(listener);
    return () => {
      this.eventListeners.delete(listener);
    };
  }

  getState(actorId: string): SubmissionState {
    return this.latest.get(actorId) ?? IDLE_STATE;
  }

  isInFlight(actorId: string): boolean {
    return this.inFlight.has(actorId);
  }

  /**
   * Submit a claim draft.
   *
   * 1. Take the actor's in-flight guard
   * 2. Run the submission gate
   * 3. Compress and upload the evidence, if any was captured
   * 4. Ask the decision service and resolve the outcome
   *
   * Rejects with ConcurrencyViolationError when the actor already has an
   * attempt running, and with SubmissionValidationError when the gate
   * refuses the draft. Media and decision failures resolve with a `failed`
   * outcome naming the stage, just like business outcomes do. Aborting
   * `context.signal` ends the attempt as `failed` at the stage it was in.
   *
   * @param context - Who is submitting, and an optional abort signal
   * @param draft - The claim as captured; never mutated
   * @returns The terminal state of the attempt, tagged with its id
   */
  async submitClaim(context: SubmissionContext, draft: ClaimRequest): Promise<SubmissionOutcome> {
    const { actorId } = context;

    const running = this.inFlight.get(actorId);
    if (running) {
      this.logger.warn("submission: rejected concurrent attempt", {
        actorId,
        inFlightAttemptId: running.attemptId,
      });
      throw new ConcurrencyViolationError(actorId, running.attemptId);
    }

    const attempt = new SubmissionAttempt(
      this.generateId(),
      actorId,
      (change) => this.publishStateChange(change),
      this.logger,
      this.now
    );
    this.inFlight.set(actorId, attempt);

    try {
      const terminal = await this.run(attempt, context, draft);
      return { ...terminal, attemptId: attempt.attemptId };
    } finally {
      this.inFlight.delete(actorId);
    }
  }

  private async run(
    attempt: SubmissionAttempt,
    context: SubmissionContext,
    draft: ClaimRequest
  ): Promise<TerminalState> {
    try {
      attempt.transition({ status: "validating" });
      const request = await this.runGate(attempt, context, draft);

      attempt.transition({ status: "uploading_media", progress: 0 });
      const evidenceReference = await this.uploadEvidence(attempt, request, context);

      const enriched: Readonly<ClaimRequest> = Object.freeze({
        ...request,
        mediaEvidenceReference: evidenceReference,
      });
      attempt.transition({ status: "submitting" });

      return await this.submitForDecision(attempt, context, enriched);
    } catch (error) {
      if (error instanceof StageFailure) {
        return this.finishFailed(attempt, error.failed);
      }
      throw error;
    }
  }

  private async runGate(
    attempt: SubmissionAttempt,
    context: SubmissionContext,
    draft: ClaimRequest
  ): Promise<ClaimRequest> {
    let verdict: GateResult;
    try {
      verdict = await untilAborted(
        validateSubmission(draft, context.actorId, {
          rateLimiter: this.deps.rateLimiter,
          now: this.now,
        }),
        "rate_limit_check",
        context.signal
      );
    } catch (error) {
      const aborted = abortedFailure(error);
      if (aborted) throw aborted;
      if (error instanceof RateLimitCheckError) {
        throw new StageFailure(failure("rate_limit_check", error.code, error));
      }
      throw error;
    }

    if (!verdict.ok) {
      const validationError = new SubmissionValidationError(
        verdict.message,
        verdict.reason,
        verdict.field,
        verdict.details
      );
      attempt.transition({
        status: "failed",
        stage: "validation",
        code: verdict.reason,
        message: verdict.message,
        error: validationError,
      });
      this.logger.info("submission: validation failed", {
        attemptId: attempt.attemptId,
        reason: verdict.reason,
      });
      throw validationError;
    }

    return verdict.request;
  }

  private async uploadEvidence(
    attempt: SubmissionAttempt,
    request: ClaimRequest,
    context: SubmissionContext
  ): Promise<string | undefined> {
    const media = request.localMediaReference;
    if (!media) {
      this.logger.debug("submission: no media attached, skipping upload", {
        attemptId: attempt.attemptId,
      });
      return undefined;
    }

    let compressed: LocalMediaReference;
    try {
      compressed = await untilAborted(
        this.deps.mediaPipeline.compress(media, this.deps.config.maxMediaBytes, {
          signal: context.signal,
        }),
        "compression",
        context.signal
      );
    } catch (error) {
      const aborted = abortedFailure(error);
      if (aborted) throw aborted;
      const mediaError = new MediaPipelineError(
        `Media compression failed: ${describeError(error)}`,
        "compression",
        error
      );
      throw new StageFailure(failure("compression", mediaError.code, mediaError));
    }

    try {
      return await untilAborted(
        this.deps.mediaPipeline.upload(compressed, this.deps.config.uploadDestination, {
          signal: context.signal,
          onProgress: (progress) => {
            if (attempt.state.status !== "uploading_media" || !Number.isFinite(progress)) return;
            attempt.transition({
              status: "uploading_media",
              progress: Math.min(Math.max(progress, 0), 1),
            });
          },
        }),
        "upload",
        context.signal
      );
    } catch (error) {
      const aborted = abortedFailure(error);
      if (aborted) throw aborted;
      const mediaError = new MediaPipelineError(
        `Media upload failed: ${describeError(error)}`,
        "upload",
        error
      );
      throw new StageFailure(failure("upload", mediaError.code, mediaError));
    }
  }

  private async submitForDecision(
    attempt: SubmissionAttempt,
    context: SubmissionContext,
    claim: Readonly<ClaimRequest>
  ): Promise<TerminalState> {
    let decision: DecisionResponse;
    try {
      decision = await untilAborted(
        this.deps.decisionService.submit(claim, {
          actorId: context.actorId,
          signal: context.signal,
        }),
        "decision",
        context.signal
      );
    } catch (error) {
      const aborted = abortedFailure(error);
      if (aborted) throw aborted;
      const decisionError = new DecisionServiceError(
        `Decision service call failed: ${describeError(error)}`,
        errorCode(error, "DECISION_SERVICE_ERROR"),
        error
      );
      throw new StageFailure(failure("decision", decisionError.code, decisionError));
    }

    this.recordSubmission(context.actorId);

    const classification = classifyDecision(decision);
    switch (classification.kind) {
      case "incomplete": {
        const decisionError = new DecisionServiceError(
          `Decision service response incomplete: ${classification.reason}`,
          "INCOMPLETE_DECISION"
        );
        throw new StageFailure(failure("decision", decisionError.code, decisionError));
      }

      case "approved": {
        const state = this.finish(attempt, {
          status: "approved",
          approval: classification.approval,
          claimId: classification.claimId,
        });
        const base = { attemptId: attempt.attemptId, actorId: attempt.actorId };
        this.emit({ type: "submission-succeeded", ...base, approval: classification.approval });
        this.emit({ type: "celebrate", ...base });
        return state;
      }

      case "under_review": {
        const state = this.finish(attempt, {
          status: "under_review",
          claimId: classification.claimId,
        });
        if (classification.claimId === undefined) {
          this.logger.warn("submission: under review without claim id, no status updates scheduled", {
            attemptId: attempt.attemptId,
          });
        } else {
          this.scheduleStatusUpdates(attempt, classification.claimId);
        }
        return state;
      }

      case "rejected":
        return this.finish(attempt, {
          status: "rejected",
          message: classification.message,
          claimId: classification.claimId,
        });
    }
  }

  /**
   * Fire-and-forget, like status scheduling: the attempt never waits on it.
   */
  private recordSubmission(actorId: string): void {
    const onError = (error: unknown): void => {
      this.logger.error("submission: failed to record submission with rate limiter", {
        actorId,
        error: describeError(error),
      });
    };

    try {
      const pending = this.deps.rateLimiter.recordSubmission?.(actorId);
      void Promise.resolve(pending).catch(onError);
    } catch (error) {
      onError(error);
    }
  }

  private scheduleStatusUpdates(attempt: SubmissionAttempt, claimId: string): void {
    const onError = (error: unknown): void => {
      this.logger.error("submission: scheduling status updates failed", {
        attemptId: attempt.attemptId,
        claimId,
        error: describeError(error),
      });
    };

    try {
      const pending = this.deps.statusScheduler.scheduleUpdates(claimId);
      void Promise.resolve(pending).catch(onError);
    } catch (error) {
      onError(error);
    }
  }

  private finish(attempt: SubmissionAttempt, state: TerminalState): TerminalState {
    attempt.transition(state);
    const current = attempt.state;
    if (!isTerminal(current)) {
      throw new Error(`Attempt ${attempt.attemptId} did not reach a terminal state`);
    }
    this.logger.info("submission: attempt finished", {
      attemptId: attempt.attemptId,
      status: current.status,
    });
    return current;
  }

  private finishFailed(attempt: SubmissionAttempt, state: FailedState): TerminalState {
    this.logger.error("submission: attempt failed", {
      attemptId: attempt.attemptId,
      stage: state.stage,
      code: state.code,
      error: state.error ? describeError(state.error) : undefined,
    });
    return this.finish(attempt, state);
  }

  private publishStateChange(change: Readonly<SubmissionStateChange>): void {
    this.latest.set(change.actorId, change.current);
    for (const listener of this.stateListeners) {
      try {
        listener(change);
      } catch (error) {
        this.logger.error("submission: state listener threw", { error: describeError(error) });
      }
    }
  }

  private emit(event: SubmissionEvent): void {
    const frozen = Object.freeze(event);
    for (const listener of this.eventListeners) {
      try {
        listener(frozen);
      } catch (error) {
        this.logger.error("submission: event listener threw", {
          type: event.type,
          error: describeError(error),
        });
      }
    }
  }
}

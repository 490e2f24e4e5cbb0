import { describe, expect, it, vi } from "vitest";

import { RATE_LIMITED_MESSAGE } from "../src/actions/validateSubmission.js";
import { defaultSubmissionConfig } from "../src/config.js";
import {
  ConcurrencyViolationError,
  DecisionServiceError,
  MediaPipelineError,
  SubmissionValidationError,
} from "../src/errors.js";
import { SUBMISSION_FAILED_MESSAGE, SubmissionOrchestrator } from "../src/orchestrator.js";
import { DecisionClientError } from "../src/services/decisionClient.js";
import { SlidingWindowRateLimiter } from "../src/services/rateLimiter.js";
import type { DecisionResponse } from "../src/types/claim.js";
import type { SubmissionStateChange } from "../src/types/state.js";
import { NOW, TOMORROW, createFakes, deferred, makeDraft } from "./fakes.js";

const ACTOR = { actorId: "usr_987" };

function recordTimeline(orchestrator: SubmissionOrchestrator): string[] {
  const timeline: string[] = [];
  orchestrator.subscribe((change) => timeline.push(`state:${change.current.status}`));
  orchestrator.onEvent((event) => timeline.push(`event:${event.type}`));
  return timeline;
}

describe("SubmissionOrchestrator", () => {
  it("approves instantly with the payout terms from the decision", async () => {
    const { orchestrator, mediaPipeline, decisionService } = createFakes();
    const timeline = recordTimeline(orchestrator);
    const draft = makeDraft();

    const outcome = await orchestrator.submitClaim(ACTOR, draft);

    expect(outcome).toEqual({
      attemptId: "attempt-1",
      status: "approved",
      approval: { amount: 1200, processingTimeMillis: 450 },
      claimId: "C-1001",
    });
    expect(timeline).toEqual([
      "state:validating",
      "state:uploading_media",
      "state:submitting",
      "state:approved",
      "event:submission-succeeded",
      "event:celebrate",
    ]);
    expect(mediaPipeline.compress).toHaveBeenCalledWith(
      draft.localMediaReference,
      defaultSubmissionConfig.maxMediaBytes,
      { signal: undefined }
    );
    expect(mediaPipeline.upload).toHaveBeenCalledWith(
      { uri: "file:///captures/kitchen-compressed.mp4", sizeBytes: 40_000_000 },
      "claims-evidence-videos",
      expect.objectContaining({ signal: undefined })
    );
    expect(decisionService.submit).toHaveBeenCalledTimes(1);
    expect(decisionService.submit.mock.calls[0]?.[0].mediaEvidenceReference).toBe(
      "s3://bucket/evidence123"
    );
    expect(decisionService.submit.mock.calls[0]?.[1]).toEqual({ actorId: "usr_987", signal: undefined });
    expect(draft.mediaEvidenceReference).toBeUndefined();
    expect(orchestrator.getState("usr_987").status).toBe("approved");
    expect(orchestrator.isInFlight("usr_987")).toBe(false);
  });

  it("delivers the approval with the success event", async () => {
    const { orchestrator } = createFakes();
    const events: unknown[] = [];
    orchestrator.onEvent((event) => events.push(event));

    await orchestrator.submitClaim(ACTOR, makeDraft());

    expect(events).toEqual([
      {
        type: "submission-succeeded",
        attemptId: "attempt-1",
        actorId: "usr_987",
        approval: { amount: 1200, processingTimeMillis: 450 },
      },
      { type: "celebrate", attemptId: "attempt-1", actorId: "usr_987" },
    ]);
  });

  it("schedules status updates exactly once for a claim under review", async () => {
    const { orchestrator, decisionService, statusScheduler } = createFakes();
    decisionService.submit.mockResolvedValueOnce({
      status: "under_review",
      claimId: "C-9912",
      processingTimeMs: 300,
      nextSteps: "A claims specialist will review your case within 24 hours",
    });
    const timeline = recordTimeline(orchestrator);

    const outcome = await orchestrator.submitClaim(ACTOR, makeDraft());

    expect(outcome).toEqual({ attemptId: "attempt-1", status: "under_review", claimId: "C-9912" });
    expect(statusScheduler.scheduleUpdates).toHaveBeenCalledTimes(1);
    expect(statusScheduler.scheduleUpdates).toHaveBeenCalledWith("C-9912");
    expect(timeline).not.toContain("event:celebrate");
  });

  it("logs a failed status subscription without failing the attempt", async () => {
    const { orchestrator, decisionService, statusScheduler, logger } = createFakes();
    decisionService.submit.mockResolvedValueOnce({ status: "under_review", claimId: "C-9912" });
    statusScheduler.scheduleUpdates.mockImplementationOnce(() => Promise.reject(new Error("push disabled")));

    const outcome = await orchestrator.submitClaim(ACTOR, makeDraft());
    await new Promise((resolve) => setTimeout(resolve, 0));

    expect(outcome.status).toBe("under_review");
    expect(logger.error).toHaveBeenCalledWith("submission: scheduling status updates failed", {
      attemptId: "attempt-1",
      claimId: "C-9912",
      error: "push disabled",
    });
  });

  it("stays under review without scheduling when no claim id comes back", async () => {
    const { orchestrator, decisionService, statusScheduler } = createFakes();
    decisionService.submit.mockResolvedValueOnce({ status: "under_review" });

    const outcome = await orchestrator.submitClaim(ACTOR, makeDraft());

    expect(outcome).toEqual({ attemptId: "attempt-1", status: "under_review" });
    expect(statusScheduler.scheduleUpdates).not.toHaveBeenCalled();
  });

  it.each<DecisionResponse["status"]>(["rejected", "flagged"])(
    "surfaces next steps verbatim for a %s decision",
    async (status) => {
      const { orchestrator, decisionService } = createFakes();
      decisionService.submit.mockResolvedValueOnce({
        status,
        claimId: "C-3003",
        nextSteps: "Claim flagged for manual review due to similarity to recent claim",
      });

      const outcome = await orchestrator.submitClaim(ACTOR, makeDraft());

      expect(outcome).toEqual({
        attemptId: "attempt-1",
        status: "rejected",
        message: "Claim flagged for manual review due to similarity to recent claim",
        claimId: "C-3003",
      });
    }
  );

  it("ends in a failed upload state and never calls the decision service", async () => {
    const { orchestrator, mediaPipeline, decisionService } = createFakes();
    mediaPipeline.upload.mockRejectedValueOnce(new Error("connection reset"));

    const outcome = await orchestrator.submitClaim(ACTOR, makeDraft());

    expect(outcome).toMatchObject({
      status: "failed",
      stage: "upload",
      code: "UPLOAD_FAILED",
      message: SUBMISSION_FAILED_MESSAGE,
    });
    expect(outcome.status === "failed" && outcome.error).toBeInstanceOf(MediaPipelineError);
    expect(decisionService.submit).not.toHaveBeenCalled();
    expect(orchestrator.isInFlight("usr_987")).toBe(false);
  });

  it("does not upload when compression fails", async () => {
    const { orchestrator, mediaPipeline, decisionService } = createFakes();
    mediaPipeline.compress.mockRejectedValueOnce(new Error("unsupported codec"));

    const outcome = await orchestrator.submitClaim(ACTOR, makeDraft());

    expect(outcome).toMatchObject({ status: "failed", stage: "compression", code: "COMPRESSION_FAILED" });
    expect(mediaPipeline.upload).not.toHaveBeenCalled();
    expect(decisionService.submit).not.toHaveBeenCalled();
  });

  it("submits without evidence when no media was captured", async () => {
    const { orchestrator, mediaPipeline, decisionService } = createFakes();
    const timeline = recordTimeline(orchestrator);

    const outcome = await orchestrator.submitClaim(ACTOR, makeDraft({ localMediaReference: undefined }));

    expect(outcome.status).toBe("approved");
    expect(mediaPipeline.compress).not.toHaveBeenCalled();
    expect(mediaPipeline.upload).not.toHaveBeenCalled();
    expect(decisionService.submit.mock.calls[0]?.[0].mediaEvidenceReference).toBeUndefined();
    expect(timeline.slice(0, 3)).toEqual(["state:validating", "state:uploading_media", "state:submitting"]);
  });

  it("reports a decision service outage as a failure, not a rejection", async () => {
    const { orchestrator, decisionService, rateLimiter } = createFakes();
    decisionService.submit.mockRejectedValueOnce(
      new DecisionClientError("HTTP 503: unavailable", "HTTP_ERROR")
    );

    const outcome = await orchestrator.submitClaim(ACTOR, makeDraft());

    expect(outcome).toMatchObject({
      status: "failed",
      stage: "decision",
      code: "HTTP_ERROR",
      message: SUBMISSION_FAILED_MESSAGE,
    });
    expect(outcome.status === "failed" && outcome.error).toBeInstanceOf(DecisionServiceError);
    expect(decisionService.submit).toHaveBeenCalledTimes(1);
    expect(rateLimiter.recordSubmission).not.toHaveBeenCalled();
  });

  it("fails an instant approval that carries no payout", async () => {
    const { orchestrator, decisionService } = createFakes();
    decisionService.submit.mockResolvedValueOnce({ status: "instant_approved", processingTimeMs: 450 });

    const outcome = await orchestrator.submitClaim(ACTOR, makeDraft());

    expect(outcome).toMatchObject({ status: "failed", stage: "decision", code: "INCOMPLETE_DECISION" });
  });

  it("rejects a rate-limited actor before any media or decision call", async () => {
    const { orchestrator, rateLimiter, mediaPipeline, decisionService } = createFakes();
    rateLimiter.isSubmittingTooFrequently.mockResolvedValueOnce(true);

    const error = await orchestrator.submitClaim(ACTOR, makeDraft()).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(SubmissionValidationError);
    expect(error).toMatchObject({ code: "rate_limited", message: RATE_LIMITED_MESSAGE });
    expect(rateLimiter.isSubmittingTooFrequently).toHaveBeenCalledWith("usr_987");
    expect(mediaPipeline.compress).not.toHaveBeenCalled();
    expect(mediaPipeline.upload).not.toHaveBeenCalled();
    expect(decisionService.submit).not.toHaveBeenCalled();
    expect(orchestrator.getState("usr_987")).toMatchObject({
      status: "failed",
      stage: "validation",
      code: "rate_limited",
      message: RATE_LIMITED_MESSAGE,
    });
  });

  it("rejects a future incident date before consulting any collaborator", async () => {
    const { orchestrator, rateLimiter, mediaPipeline, decisionService } = createFakes();

    const error = await orchestrator
      .submitClaim(ACTOR, makeDraft({ incidentDate: TOMORROW }))
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(SubmissionValidationError);
    expect(error).toMatchObject({ code: "date_invalid", field: "incidentDate" });
    expect(rateLimiter.isSubmittingTooFrequently).not.toHaveBeenCalled();
    expect(mediaPipeline.compress).not.toHaveBeenCalled();
    expect(decisionService.submit).not.toHaveBeenCalled();
  });

  it("fails at the rate limit check stage when the oracle is down", async () => {
    const { orchestrator, rateLimiter, decisionService } = createFakes();
    rateLimiter.isSubmittingTooFrequently.mockRejectedValueOnce(new Error("redis timeout"));

    const outcome = await orchestrator.submitClaim(ACTOR, makeDraft());

    expect(outcome).toMatchObject({
      status: "failed",
      stage: "rate_limit_check",
      code: "RATE_LIMIT_UNAVAILABLE",
    });
    expect(decisionService.submit).not.toHaveBeenCalled();
  });

  it("rejects a second attempt while the first is in flight", async () => {
    const { orchestrator, decisionService } = createFakes();
    const pending = deferred<DecisionResponse>();
    decisionService.submit.mockImplementationOnce(() => pending.promise);
    const changes: SubmissionStateChange[] = [];
    orchestrator.subscribe((change) => changes.push(change));

    const first = orchestrator.submitClaim(ACTOR, makeDraft());
    expect(orchestrator.isInFlight("usr_987")).toBe(true);

    const second = await orchestrator.submitClaim(ACTOR, makeDraft()).catch((e: unknown) => e);
    expect(second).toBeInstanceOf(ConcurrencyViolationError);
    expect(second).toMatchObject({ actorId: "usr_987", inFlightAttemptId: "attempt-1" });

    pending.resolve({ status: "instant_approved", payoutAmount: 800, processingTimeMs: 120 });
    const outcome = await first;

    expect(outcome).toMatchObject({
      attemptId: "attempt-1",
      status: "approved",
      approval: { amount: 800, processingTimeMillis: 120 },
    });
    expect(decisionService.submit).toHaveBeenCalledTimes(1);
    expect(new Set(changes.map((change) => change.attemptId))).toEqual(new Set(["attempt-1"]));
    expect(orchestrator.isInFlight("usr_987")).toBe(false);
  });

  it("lets different actors submit at the same time", async () => {
    const { orchestrator } = createFakes();

    const [a, b] = await Promise.all([
      orchestrator.submitClaim({ actorId: "usr_a" }, makeDraft()),
      orchestrator.submitClaim({ actorId: "usr_b" }, makeDraft()),
    ]);

    expect(a.status).toBe("approved");
    expect(b.status).toBe("approved");
  });

  it("releases the guard after a validation failure", async () => {
    const { orchestrator } = createFakes();

    await expect(
      orchestrator.submitClaim(ACTOR, makeDraft({ estimatedAmount: 0 }))
    ).rejects.toMatchObject({ code: "amount_invalid" });
    const outcome = await orchestrator.submitClaim(ACTOR, makeDraft());

    expect(outcome).toMatchObject({ attemptId: "attempt-2", status: "approved" });
  });

  it("releases the guard when the caller abandons an upload that never settles", async () => {
    const { orchestrator, mediaPipeline, decisionService } = createFakes();
    mediaPipeline.upload.mockImplementationOnce(() => new Promise<string>(() => undefined));
    const controller = new AbortController();

    const pending = orchestrator.submitClaim({ ...ACTOR, signal: controller.signal }, makeDraft());
    await vi.waitFor(() => expect(mediaPipeline.upload).toHaveBeenCalledTimes(1));
    expect(orchestrator.getState("usr_987")).toEqual({ status: "uploading_media", progress: 0 });

    controller.abort();
    const outcome = await pending;

    expect(outcome).toMatchObject({
      attemptId: "attempt-1",
      status: "failed",
      stage: "upload",
      code: "SUBMISSION_ABORTED",
      message: SUBMISSION_FAILED_MESSAGE,
    });
    expect(orchestrator.isInFlight("usr_987")).toBe(false);
    expect(decisionService.submit).not.toHaveBeenCalled();

    const retry = await orchestrator.submitClaim(ACTOR, makeDraft());
    expect(retry).toMatchObject({ attemptId: "attempt-2", status: "approved" });
  });

  it("fails at the decision stage when aborted while waiting on the decision service", async () => {
    const { orchestrator, decisionService, rateLimiter } = createFakes();
    decisionService.submit.mockImplementationOnce(() => new Promise<DecisionResponse>(() => undefined));
    const controller = new AbortController();

    const pending = orchestrator.submitClaim({ ...ACTOR, signal: controller.signal }, makeDraft());
    await vi.waitFor(() => expect(decisionService.submit).toHaveBeenCalledTimes(1));
    controller.abort();

    await expect(pending).resolves.toMatchObject({
      status: "failed",
      stage: "decision",
      code: "SUBMISSION_ABORTED",
    });
    expect(orchestrator.isInFlight("usr_987")).toBe(false);
    expect(rateLimiter.recordSubmission).not.toHaveBeenCalled();
  });

  it("does not wait on a rate limiter that never finishes recording", async () => {
    const fakes = createFakes();
    const stuck = {
      isSubmittingTooFrequently: fakes.rateLimiter.isSubmittingTooFrequently,
      recordSubmission: vi.fn<(actorId: string) => Promise<void>>(() => new Promise<void>(() => undefined)),
    };
    const stuckOrchestrator = new SubmissionOrchestrator({
      rateLimiter: stuck,
      mediaPipeline: fakes.mediaPipeline,
      decisionService: fakes.decisionService,
      statusScheduler: fakes.statusScheduler,
      config: defaultSubmissionConfig,
      logger: fakes.logger,
      now: () => NOW,
    });

    const outcome = await stuckOrchestrator.submitClaim(ACTOR, makeDraft());

    expect(outcome.status).toBe("approved");
    expect(stuck.recordSubmission).toHaveBeenCalledWith("usr_987");
    expect(stuckOrchestrator.isInFlight("usr_987")).toBe(false);
  });

  it("tracks upload progress and ignores progress that arrives after the upload", async () => {
    const { orchestrator, mediaPipeline } = createFakes();
    const captured: { onProgress?: (progress: number) => void } = {};
    mediaPipeline.upload.mockImplementationOnce(async (_media, _destination, options) => {
      captured.onProgress = options?.onProgress;
      options?.onProgress?.(0.4);
      return "s3://bucket/evidence123";
    });
    const progress: number[] = [];
    orchestrator.subscribe((change) => {
      if (change.current.status === "uploading_media") progress.push(change.current.progress);
    });

    await orchestrator.submitClaim(ACTOR, makeDraft());
    captured.onProgress?.(0.9);

    expect(progress).toEqual([0, 0.4]);
    expect(orchestrator.getState("usr_987").status).toBe("approved");
  });

  it("keeps going when an observer throws", async () => {
    const { orchestrator, logger } = createFakes();
    orchestrator.subscribe(() => {
      throw new Error("render failed");
    });

    const outcome = await orchestrator.submitClaim(ACTOR, makeDraft());

    expect(outcome.status).toBe("approved");
    expect(logger.error).toHaveBeenCalledWith("submission: state listener threw", {
      error: "render failed",
    });
  });

  it("stops notifying after unsubscribe", async () => {
    const { orchestrator } = createFakes();
    const seen: string[] = [];
    const unsubscribe = orchestrator.subscribe((change) => seen.push(change.current.status));
    unsubscribe();

    await orchestrator.submitClaim(ACTOR, makeDraft());

    expect(seen).toEqual([]);
  });

  it("stamps state changes with the injected clock", async () => {
    const { orchestrator } = createFakes();
    const stamps: string[] = [];
    orchestrator.subscribe((change) => stamps.push(change.at));

    await orchestrator.submitClaim(ACTOR, makeDraft());

    expect(new Set(stamps)).toEqual(new Set([NOW.toISOString()]));
  });

  it("records submissions so the rate limiter can gate the next attempt", async () => {
    const fakes = createFakes();
    const rateLimiter = new SlidingWindowRateLimiter({ maxSubmissions: 1, now: () => NOW.getTime() });
    const orchestrator = new SubmissionOrchestrator({
      rateLimiter,
      mediaPipeline: fakes.mediaPipeline,
      decisionService: fakes.decisionService,
      statusScheduler: fakes.statusScheduler,
      config: defaultSubmissionConfig,
      logger: fakes.logger,
      now: () => NOW,
    });

    await orchestrator.submitClaim(ACTOR, makeDraft());

    await expect(orchestrator.submitClaim(ACTOR, makeDraft())).rejects.toMatchObject({
      code: "rate_limited",
    });
    expect(fakes.decisionService.submit).toHaveBeenCalledTimes(1);
  });
});

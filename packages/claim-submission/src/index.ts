/**
 * @claimpipe/claim-submission
 *
 * Takes a claim draft from the capture flow to a decision:
 *   - submission gate (amount, incident date, rate limit)
 *   - evidence compression and upload through the media pipeline
 *   - decision service call and mapping to approved / under review / rejected
 *   - observable state transitions and presentation events
 *
 * Usage:
 *   const config = loadSubmissionConfig();
 *   const orchestrator = new SubmissionOrchestrator({
 *     rateLimiter, mediaPipeline, statusScheduler,
 *     decisionService: createDecisionClientFromConfig(config),
 *     config,
 *   });
 *   orchestrator.subscribe((change) => render(change.current));
 *   const outcome = await orchestrator.submitClaim({ actorId: "usr_1" }, draft);
 */

export * from "./types/claim.js";
export * from "./types/collaborators.js";
export * from "./types/decision.js";
export * from "./types/state.js";
export * from "./errors.js";
export * from "./config.js";
export * from "./logging.js";
export * from "./claimSteps.js";
export * from "./actions/validateSubmission.js";
export * from "./actions/classifyDecision.js";
export * from "./services/decisionClient.js";
export * from "./services/rateLimiter.js";
export * from "./submissionAttempt.js";
export * from "./orchestrator.js";

import { type ClaimRequest, ClaimRequestSchema, MAX_CLAIM_AMOUNT } from "../types/claim.js";
import type { RateLimiter } from "../types/collaborators.js";
import { RateLimitCheckError, type ValidationReason, describeError } from "../errors.js";

export const AMOUNT_INVALID_MESSAGE = "Please enter a valid claim amount";
export const DATE_INVALID_MESSAGE = "Incident date cannot be in the future";
export const RATE_LIMITED_MESSAGE = "Please wait before submitting another claim";
export const MALFORMED_REQUEST_MESSAGE = "Claim details are incomplete";

export type GateResult =
  | { ok: true; request: ClaimRequest }
  | { ok: false; reason: ValidationReason; field?: string; message: string; details?: Record<string, unknown> };

/**
 * Dependencies required by the submission gate
 */
export interface ValidateSubmissionDeps {
  rateLimiter: RateLimiter;
  now?: () => Date;
}

/**
 * Submission gate
 *
 * Runs before anything that costs network or storage, stopping at the first failure:
 * 1. Claim draft is structurally complete
 * 2. Estimated amount is a positive number below MAX_CLAIM_AMOUNT
 * 3. Incident date is strictly in the past
 * 4. Actor is not submitting too frequently
 *
 * The rate-limit query is the only side effect.
 *
 * @param draft - Claim draft as built by the caller, not yet trusted
 * @param actorId - Key for the rate limit query
 * @param deps - Rate limiter and an optional clock
 * @returns The parsed request, or the first reason the draft was refused
 * @throws RateLimitCheckError when the rate limiter itself fails
 */
export async function validateSubmission(
  draft: unknown,
  actorId: string,
  deps: ValidateSubmissionDeps
): Promise<GateResult> {
  const now = deps.now ?? (() => new Date());

  const parseResult = ClaimRequestSchema.safeParse(draft);
  if (!parseResult.success) {
    const firstIssue = parseResult.error.issues[0];
    return {
      ok: false,
      reason: "malformed_request",
      field: firstIssue ? firstIssue.path.join(".") : undefined,
      message: MALFORMED_REQUEST_MESSAGE,
      details: { errors: parseResult.error.issues },
    };
  }
  const request = parseResult.data;

  const amount = request.estimatedAmount;
  if (!Number.isFinite(amount) || amount <= 0 || amount >= MAX_CLAIM_AMOUNT) {
    return {
      ok: false,
      reason: "amount_invalid",
      field: "estimatedAmount",
      message: AMOUNT_INVALID_MESSAGE,
    };
  }

  if (request.incidentDate.getTime() >= now().getTime()) {
    return {
      ok: false,
      reason: "date_invalid",
      field: "incidentDate",
      message: DATE_INVALID_MESSAGE,
    };
  }

  let tooFrequent: boolean;
  try {
    tooFrequent = await deps.rateLimiter.isSubmittingTooFrequently(actorId);
  } catch (error) {
    throw new RateLimitCheckError(`Rate limit check failed: ${describeError(error)}`, error);
  }

  if (tooFrequent) {
    return {
      ok: false,
      reason: "rate_limited",
      message: RATE_LIMITED_MESSAGE,
    };
  }

  return { ok: true, request };
}

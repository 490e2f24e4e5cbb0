import type { ApprovalResult, DecisionResponse } from "../types/claim.js";

export const DEFAULT_REJECTION_MESSAGE =
  "We couldn't approve this claim. Contact support for next steps.";

export type DecisionClassification =
  | { kind: "approved"; approval: ApprovalResult; claimId?: string }
  | { kind: "under_review"; claimId?: string }
  | { kind: "rejected"; message: string; claimId?: string }
  | { kind: "incomplete"; reason: string };

export function createApprovalResult(amount: number, processingTimeMillis: number): ApprovalResult {
  return Object.freeze({ amount, processingTimeMillis });
}

/**
 * Map a decision into the client state it leads to.
 *
 * `flagged` and `rejected` collapse into the same result; only the
 * guidance text the decision service sends differs.
 */
export function classifyDecision(decision: DecisionResponse): DecisionClassification {
  switch (decision.status) {
    case "instant_approved": {
      const { payoutAmount, processingTimeMs } = decision;
      if (payoutAmount === undefined || !Number.isFinite(payoutAmount) || payoutAmount < 0) {
        return { kind: "incomplete", reason: "instant approval without a valid payout amount" };
      }
      if (
        processingTimeMs === undefined ||
        !Number.isInteger(processingTimeMs) ||
        processingTimeMs < 0
      ) {
        return { kind: "incomplete", reason: "instant approval without a valid processing time" };
      }
      return {
        kind: "approved",
        approval: createApprovalResult(payoutAmount, processingTimeMs),
        claimId: decision.claimId,
      };
    }

    case "under_review":
      return { kind: "under_review", claimId: decision.claimId };

    case "rejected":
    case "flagged":
      return {
        kind: "rejected",
        message: decision.nextSteps ?? DEFAULT_REJECTION_MESSAGE,
        claimId: decision.claimId,
      };
  }
}

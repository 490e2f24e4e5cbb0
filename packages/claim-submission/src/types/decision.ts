import { z } from "zod";

import {
  ClaimLocationSchema,
  ClaimTypeSchema,
  DecisionStatusSchema,
  MAX_CLAIM_AMOUNT,
} from "./claim.js";

/**
 * Claim payload as posted to the decision service
 */
export const ClaimSubmissionWireSchema = z.object({
  policy_id: z.string(),
  user_id: z.string(),
  claim_type: ClaimTypeSchema,
  incident_date: z.string().datetime(),
  description: z.string(),
  estimated_amount: z.number().positive().lt(MAX_CLAIM_AMOUNT),
  location: ClaimLocationSchema.optional(),
  video_evidence_url: z.string().nullable(),
  photos: z.array(z.string()),
});

export type ClaimSubmissionWire = z.infer<typeof ClaimSubmissionWireSchema>;

/**
 * Decision service response body
 */
export const ClaimDecisionWireSchema = z.object({
  claim_id: z.string(),
  status: DecisionStatusSchema,
  payout_amount: z.number().nonnegative().nullish(),
  processing_time_ms: z.number().int().nonnegative(),
  confidence_score: z.number().min(0).max(1).optional(),
  next_steps: z.string().optional(),
});

export type ClaimDecisionWire = z.infer<typeof ClaimDecisionWireSchema>;

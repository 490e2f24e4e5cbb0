import { z } from "zod";

/**
 * Coverage categories a claim can be filed under
 */
export const ClaimTypeSchema = z.enum([
  "theft",
  "water_damage",
  "fire",
  "liability",
  "medical",
]);

export type ClaimType = z.infer<typeof ClaimTypeSchema>;

/**
 * Handle to a captured media artifact that has not been uploaded yet
 */
export const LocalMediaReferenceSchema = z.object({
  uri: z.string().min(1),
  sizeBytes: z.number().int().nonnegative().optional(),
  durationSeconds: z.number().nonnegative().optional(),
});

export type LocalMediaReference = z.infer<typeof LocalMediaReferenceSchema>;

/**
 * Where the incident happened, in decimal degrees
 */
export const ClaimLocationSchema = z.object({
  lat: z.number().min(-90).max(90),
  lng: z.number().min(-180).max(180),
});

export type ClaimLocation = z.infer<typeof ClaimLocationSchema>;

/**
 * Claims at or above this amount are refused by the decision service
 */
export const MAX_CLAIM_AMOUNT = 1_000_000;

/**
 * Claim draft as built by the caller.
 *
 * `estimatedAmount` is only required to be a number here (NaN included); the
 * amount rules belong to the submission gate so they report `amount_invalid`.
 */
export const ClaimRequestSchema = z.object({
  policyId: z.string().min(1),
  claimType: ClaimTypeSchema,
  description: z.string(),
  estimatedAmount: z.union([z.number(), z.nan()]),
  incidentDate: z.date(),
  location: ClaimLocationSchema.optional(),
  localMediaReference: LocalMediaReferenceSchema.optional(),
  mediaEvidenceReference: z.string().optional(),
  photos: z.array(z.string()).optional(),
});

export type ClaimRequest = z.infer<typeof ClaimRequestSchema>;

/**
 * Decision classifications returned by the decision service
 */
export const DecisionStatusSchema = z.enum([
  "instant_approved",
  "under_review",
  "rejected",
  "flagged",
]);

export type DecisionStatus = z.infer<typeof DecisionStatusSchema>;

/**
 * Decision service result, normalized to camelCase
 */
export interface DecisionResponse {
  status: DecisionStatus;
  claimId?: string;
  payoutAmount?: number;
  processingTimeMs?: number;
  nextSteps?: string;
  confidenceScore?: number;
}

/**
 * Payout terms of an instant approval
 */
export type ApprovalResult = Readonly<{
  amount: number;
  processingTimeMillis: number;
}>;

/**
 * Who is submitting. The in-flight guard and the rate limiter key on `actorId`.
 */
export interface SubmissionContext {
  actorId: string;
  /** Host-owned abort signal, forwarded to collaborators as-is */
  signal?: AbortSignal;
}

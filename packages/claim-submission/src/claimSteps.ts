/**
 * Screens of the claim capture flow, in order
 */
export const CLAIM_STEPS = [
  "incident_details",
  "damage_assessment",
  "video_evidence",
  "review",
  "submission",
] as const;

export type ClaimStep = (typeof CLAIM_STEPS)[number];

export function nextClaimStep(step: ClaimStep): ClaimStep | null {
  return CLAIM_STEPS[CLAIM_STEPS.indexOf(step) + 1] ?? null;
}

export function previousClaimStep(step: ClaimStep): ClaimStep | null {
  const index = CLAIM_STEPS.indexOf(step);
  return index > 0 ? CLAIM_STEPS[index - 1] ?? null : null;
}

/**
 * Fraction of the flow completed when `step` is showing, 0 for the first step
 */
export function claimStepProgress(step: ClaimStep): number {
  return CLAIM_STEPS.indexOf(step) / (CLAIM_STEPS.length - 1);
}

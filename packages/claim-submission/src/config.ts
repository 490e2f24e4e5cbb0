import { z } from "zod";

import { SubmissionConfigError } from "./errors.js";

export const DEFAULT_MAX_MEDIA_BYTES = 100 * 1024 * 1024;
export const DEFAULT_MAX_VIDEO_DURATION_SECONDS = 120;
export const DEFAULT_UPLOAD_DESTINATION = "claims-evidence-videos";
export const DEFAULT_DECISION_TIMEOUT_MS = 30000;

/**
 * Tunables of the submission pipeline
 */
export const SubmissionConfigSchema = z.object({
  /** Compression target for evidence media */
  maxMediaBytes: z.number().int().positive(),
  /**
   * Recording ceiling enforced by the capture stage. The pipeline does not
   * check it; it bounds what a local media reference may point at.
   */
  maxVideoDurationSeconds: z.number().positive(),
  /** Storage bucket evidence is uploaded to */
  uploadDestination: z.string().min(1),
  decisionServiceUrl: z.string().url().optional(),
  decisionServiceTimeoutMs: z.number().int().positive(),
});

export type SubmissionConfig = z.infer<typeof SubmissionConfigSchema>;

export const defaultSubmissionConfig: SubmissionConfig = {
  maxMediaBytes: DEFAULT_MAX_MEDIA_BYTES,
  maxVideoDurationSeconds: DEFAULT_MAX_VIDEO_DURATION_SECONDS,
  uploadDestination: DEFAULT_UPLOAD_DESTINATION,
  decisionServiceTimeoutMs: DEFAULT_DECISION_TIMEOUT_MS,
};

const EnvSchema = z.object({
  CLAIMS_MAX_MEDIA_BYTES: z.coerce.number().optional(),
  CLAIMS_MAX_VIDEO_DURATION_SECONDS: z.coerce.number().optional(),
  CLAIMS_UPLOAD_DESTINATION: z.string().optional(),
  DECISION_SERVICE_URL: z.string().optional(),
  DECISION_SERVICE_TIMEOUT_MS: z.coerce.number().optional(),
});

function blankToUndefined(value: string | undefined): string | undefined {
  if (value === undefined) return undefined;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

/**
 * Build the pipeline configuration from environment variables.
 * Unset or blank variables fall back to the defaults.
 */
export function loadSubmissionConfig(
  env: Record<string, string | undefined> = process.env
): SubmissionConfig {
  const cleaned = Object.fromEntries(
    Object.entries(env).map(([key, value]) => [key, blankToUndefined(value)])
  );

  const envResult = EnvSchema.safeParse(cleaned);
  if (!envResult.success) {
    throw new SubmissionConfigError("Invalid environment for claim submission", {
      errors: envResult.error.issues,
    });
  }
  const vars = envResult.data;

  const result = SubmissionConfigSchema.safeParse({
    maxMediaBytes: vars.CLAIMS_MAX_MEDIA_BYTES ?? defaultSubmissionConfig.maxMediaBytes,
    maxVideoDurationSeconds:
      vars.CLAIMS_MAX_VIDEO_DURATION_SECONDS ?? defaultSubmissionConfig.maxVideoDurationSeconds,
    uploadDestination: vars.CLAIMS_UPLOAD_DESTINATION ?? defaultSubmissionConfig.uploadDestination,
    decisionServiceUrl: vars.DECISION_SERVICE_URL,
    decisionServiceTimeoutMs:
      vars.DECISION_SERVICE_TIMEOUT_MS ?? defaultSubmissionConfig.decisionServiceTimeoutMs,
  });

  if (!result.success) {
    throw new SubmissionConfigError(
      `Invalid claim submission config: ${result.error.issues
        .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
        .join("; ")}`,
      { errors: result.error.issues }
    );
  }

  return result.data;
}

import type { SubmissionConfig } from "../config.js";
import { SubmissionConfigError } from "../errors.js";
import type { ClaimRequest, DecisionResponse } from "../types/claim.js";
import type { DecisionService, DecisionSubmitOptions } from "../types/collaborators.js";
import {
  type ClaimSubmissionWire,
  ClaimDecisionWireSchema,
} from "../types/decision.js";

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

/**
 * Configuration for the decision client
 */
export interface DecisionClientConfig {
  baseUrl: string;
  timeout?: number;
  fetch?: FetchLike;
}

/**
 * Error thrown when the decision service call fails
 */
export class DecisionClientError extends Error {
  constructor(
    message: string,
    public readonly code: "HTTP_ERROR" | "PARSE_ERROR" | "NETWORK_ERROR" | "TIMEOUT",
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = "DecisionClientError";
  }
}

export function toClaimSubmissionWire(
  claim: Readonly<ClaimRequest>,
  actorId: string
): ClaimSubmissionWire {
  return {
    policy_id: claim.policyId,
    user_id: actorId,
    claim_type: claim.claimType,
    incident_date: claim.incidentDate.toISOString(),
    description: claim.description,
    estimated_amount: claim.estimatedAmount,
    location: claim.location,
    video_evidence_url: claim.mediaEvidenceReference ?? null,
    photos: claim.photos ?? [],
  };
}

/**
 * HTTP client for the claims decision service
 *
 * Implements the DecisionService interface. Never retries: resubmitting a
 * claim could create a duplicate.
 */
export class DecisionClient implements DecisionService {
  private readonly baseUrl: string;
  private readonly timeout: number;
  private readonly fetchImpl: FetchLike;

  constructor(config: DecisionClientConfig) {
    this.baseUrl = config.baseUrl.replace(/\/$/, "");
    this.timeout = config.timeout ?? 30000;
    this.fetchImpl = config.fetch ?? ((url, init) => fetch(url, init));
  }

  async submit(
    claim: Readonly<ClaimRequest>,
    options: DecisionSubmitOptions
  ): Promise<DecisionResponse> {
    const controller = new AbortController();
    let timedOut = false;
    const timeoutId = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.timeout);
    const onAbort = () => controller.abort();
    if (options.signal?.aborted) {
      controller.abort();
    } else {
      options.signal?.addEventListener("abort", onAbort, { once: true });
    }

    try {
      const response = await this.fetchImpl(`${this.baseUrl}/v1/claims`, {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
        },
        body: JSON.stringify(toClaimSubmissionWire(claim, options.actorId)),
        signal: controller.signal,
      });

      if (!response.ok) {
        const errorBody = await response.text();
        throw new DecisionClientError(
          `HTTP ${response.status}: ${errorBody}`,
          "HTTP_ERROR",
          { status: response.status, body: errorBody }
        );
      }

      const data: unknown = await response.json();
      const parsed = ClaimDecisionWireSchema.safeParse(data);

      if (!parsed.success) {
        throw new DecisionClientError(
          `Invalid response from decision service: ${parsed.error.message}`,
          "PARSE_ERROR",
          { errors: parsed.error.issues }
        );
      }

      const body = parsed.data;
      return {
        status: body.status,
        claimId: body.claim_id,
        payoutAmount: body.payout_amount ?? undefined,
        processingTimeMs: body.processing_time_ms,
        nextSteps: body.next_steps,
        confidenceScore: body.confidence_score,
      };
    } catch (error) {
      if (error instanceof DecisionClientError) {
        throw error;
      }

      if (timedOut) {
        throw new DecisionClientError(
          `Decision service timed out after ${this.timeout}ms`,
          "TIMEOUT"
        );
      }

      const errorMessage =
        error instanceof Error ? error.message : "Unknown error";
      throw new DecisionClientError(
        `Decision service error: ${errorMessage}`,
        "NETWORK_ERROR"
      );
    } finally {
      clearTimeout(timeoutId);
      options.signal?.removeEventListener("abort", onAbort);
    }
  }
}

/**
 * Create a decision client with the given configuration
 */
export function createDecisionClient(config: DecisionClientConfig): DecisionService {
  return new DecisionClient(config);
}

/**
 * Create a decision client from loaded submission config
 *
 * @param config - Needs `decisionServiceUrl` set; the timeout comes from
 *   `decisionServiceTimeoutMs`
 * @param fetchImpl - Optional fetch override, mostly for tests
 * @throws SubmissionConfigError when no decision service URL is configured
 */
export function createDecisionClientFromConfig(
  config: Pick<SubmissionConfig, "decisionServiceUrl" | "decisionServiceTimeoutMs">,
  fetchImpl?: FetchLike
): DecisionService {
  if (config.decisionServiceUrl === undefined) {
    throw new SubmissionConfigError("DECISION_SERVICE_URL is not set", {
      path: "decisionServiceUrl",
    });
  }

  return new DecisionClient({
    baseUrl: config.decisionServiceUrl,
    timeout: config.decisionServiceTimeoutMs,
    fetch: fetchImpl,
  });
}

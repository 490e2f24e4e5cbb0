import type { RateLimiter } from "../types/collaborators.js";

export interface SlidingWindowRateLimiterConfig {
  /** Submissions allowed inside one window */
  maxSubmissions?: number;
  windowMs?: number;
  now?: () => number;
}

/**
 * In-process rate limiter keyed by actor.
 *
 * An actor is submitting too frequently once `maxSubmissions` recorded
 * submissions fall inside the trailing window.
 */
export class SlidingWindowRateLimiter implements RateLimiter {
  private readonly maxSubmissions: number;
  private readonly windowMs: number;
  private readonly now: () => number;
  private readonly history = new Map<string, number[]>();

  constructor(config: SlidingWindowRateLimiterConfig = {}) {
    this.maxSubmissions = config.maxSubmissions ?? 3;
    this.windowMs = config.windowMs ?? 10 * 60 * 1000;
    this.now = config.now ?? Date.now;
  }

  isSubmittingTooFrequently(actorId: string): boolean {
    return this.recent(actorId).length >= this.maxSubmissions;
  }

  /**
   * Record a submission. Also drops every actor whose submissions have all
   * left the window, so history stays bounded by recently active actors.
   */
  recordSubmission(actorId: string): void {
    for (const tracked of [...this.history.keys()]) {
      if (tracked !== actorId) this.recent(tracked);
    }
    const timestamps = this.recent(actorId);
    timestamps.push(this.now());
    this.history.set(actorId, timestamps);
  }

  /** Number of actors with submissions still inside the window */
  get trackedActors(): number {
    return this.history.size;
  }

  private recent(actorId: string): number[] {
    const cutoff = this.now() - this.windowMs;
    const timestamps = (this.history.get(actorId) ?? []).filter((t) => t > cutoff);
    if (timestamps.length === 0) {
      this.history.delete(actorId);
    } else {
      this.history.set(actorId, timestamps);
    }
    return timestamps;
  }
}

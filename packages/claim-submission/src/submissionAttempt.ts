import type { Logger } from "./logging.js";
import type {
  SubmissionState,
  SubmissionStateChange,
  SubmissionStatus,
  TerminalState,
} from "./types/state.js";

const ALLOWED_TRANSITIONS: Record<SubmissionStatus, readonly SubmissionStatus[]> = {
  idle: ["validating"],
  validating: ["uploading_media", "failed"],
  uploading_media: ["uploading_media", "submitting", "failed"],
  submitting: ["approved", "under_review", "rejected", "failed"],
  approved: [],
  under_review: [],
  rejected: [],
  failed: [],
};

export const IDLE_STATE: SubmissionState = Object.freeze({ status: "idle" });

export function isTerminal(state: SubmissionState): state is TerminalState {
  return ALLOWED_TRANSITIONS[state.status].length === 0;
}

/**
 * Whether `to` may follow `from`. Upload progress may only move forward.
 */
export function canTransition(from: SubmissionState, to: SubmissionState): boolean {
  if (!ALLOWED_TRANSITIONS[from.status].includes(to.status)) {
    return false;
  }
  if (from.status === "uploading_media" && to.status === "uploading_media") {
    return to.progress >= from.progress;
  }
  return true;
}

/**
 * State of one submission attempt, with a single writer.
 *
 * Every accepted transition is published before `transition` returns, so
 * anything the caller does afterwards is observed after the new state.
 */
export class SubmissionAttempt {
  private current: SubmissionState = IDLE_STATE;

  constructor(
    public readonly attemptId: string,
    public readonly actorId: string,
    private readonly publish: (change: Readonly<SubmissionStateChange>) => void,
    private readonly logger: Logger,
    private readonly now: () => Date
  ) {}

  get state(): SubmissionState {
    return this.current;
  }

  /**
   * Apply `next` if it follows the current state; stale or out-of-order
   * updates are dropped and return false.
   */
  transition(next: SubmissionState): boolean {
    const previous = this.current;
    if (!canTransition(previous, next)) {
      this.logger.warn("submission: ignored out-of-order transition", {
        attemptId: this.attemptId,
        from: previous.status,
        to: next.status,
      });
      return false;
    }

    this.current = Object.freeze({ ...next });
    this.publish(
      Object.freeze({
        attemptId: this.attemptId,
        actorId: this.actorId,
        previous,
        current: this.current,
        at: this.now().toISOString(),
      })
    );
    return true;
  }
}

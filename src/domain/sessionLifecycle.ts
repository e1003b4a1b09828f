import { SessionStatus } from "./session";
import { InvalidStateError } from "./errors";

/**
 * Session lifecycle
 *
 *   active --pause--> paused --resume--> active
 *   active|paused --end--> ended   (terminal)
 *
 * Pausing a paused session and resuming an active one are no-ops.
 */

export type LifecycleOperation =
  | "pause"
  | "resume"
  | "end"
  | "next_activity"
  | "submit_answer";

type Outcome = SessionStatus | "no-op" | "rejected";

const TRANSITIONS: Record<SessionStatus, Record<LifecycleOperation, Outcome>> = {
  active: {
    pause: "paused",
    resume: "no-op",
    end: "ended",
    next_activity: "active",
    submit_answer: "active",
  },
  paused: {
    pause: "no-op",
    resume: "active",
    end: "ended",
    next_activity: "rejected",
    submit_answer: "rejected",
  },
  ended: {
    pause: "rejected",
    resume: "rejected",
    end: "rejected",
    next_activity: "rejected",
    submit_answer: "rejected",
  },
};

const REJECTION_MESSAGES: Record<SessionStatus, string> = {
  active: "Session is active",
  paused: "Session is paused; resume it first",
  ended: "Session has ended",
};

/**
 * Resolve an operation against the current status.
 * Returns the status to move to, or null when the operation changes nothing.
 * Throws InvalidStateError when the operation is not allowed.
 */
export function transition(from: SessionStatus, operation: LifecycleOperation): SessionStatus | null {
  const outcome = TRANSITIONS[from][operation];
  if (outcome === "rejected") {
    throw new InvalidStateError(`${REJECTION_MESSAGES[from]}: cannot ${operation.replace("_", " ")}`);
  }
  if (outcome === "no-op") {
    return null;
  }
  return outcome;
}

export function assertAllowed(from: SessionStatus, operation: LifecycleOperation): void {
  transition(from, operation);
}

/**
 * The operation that moves a session into the given status.
 */
export function operationFor(to: SessionStatus): LifecycleOperation {
  switch (to) {
    case "paused":
      return "pause";
    case "active":
      return "resume";
    case "ended":
      return "end";
  }
}

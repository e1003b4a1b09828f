import { ActivitySpec } from "./activity";

export type SessionStatus = "active" | "paused" | "ended";

export const MIN_FACT_FAMILY = 1;
export const MAX_FACT_FAMILY = 12;

/**
 * One graded math-drill answer.
 * expectedAnswer is stored when the drill is generated; grading compares
 * against it rather than re-multiplying the factors.
 */
export interface Attempt {
  factorA: number;
  factorB: number;
  expectedAnswer: number;
  submittedAnswer: number | string; // raw string when it did not parse
  correct: boolean;
  timestamp: string;
}

/**
 * A graded quiz answer. Kept apart from the drill history so quizzes
 * never influence weak-area targeting.
 */
export interface QuizAttempt {
  activityId: string;
  category: string;
  answer: string;
  correctAnswer: string;
  correct: boolean;
  timestamp: string;
}

/**
 * Interleave bookkeeping, persisted with the session so it survives
 * pause and resume.
 */
export interface ScheduleState {
  activitiesServed: number;
  drillsSinceBreak: number;
  // Set when a due break could not be generated; the next activity is a drill.
  breakDeferred?: boolean;
}

/**
 * A Session is one learner's run through the times tables.
 * The whole record is stored as a single JSON document.
 */
export interface Session {
  id: string;
  studentName: string;
  maxFactFamily: number;
  status: SessionStatus;
  createdAt: string;
  lastActivityAt: string;
  pausedAt?: string;
  endedAt?: string;
  history: Attempt[];
  quizHistory: QuizAttempt[];
  activityCursor: ActivitySpec | null;
  schedule: ScheduleState;
}

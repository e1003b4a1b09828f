/**
 * Session Controller
 *
 * The façade clients talk to. It owns the session lifecycle:
 * - start / pause / resume / end
 * - serving the next activity and remembering what was served
 * - grading drill and quiz answers
 * - progress reports
 *
 * Mutations for one session run one at a time through SessionLocks.
 * Calls to the content provider happen outside the lock; their results are
 * applied afterwards through the same serialized path.
 */

import { ActivitySpec, Quiz, isCorrectMathAnswer, isCorrectQuizAnswer, normalizeQuizKey, parseMathAnswer } from "../domain/activity";
import { ActivityScheduler, PlanOptions } from "../domain/activityScheduler";
import { ContentProvider } from "../domain/contentProvider";
import { CollaboratorError, OutOfSequenceError, ValidationError } from "../domain/errors";
import * as fallback from "../domain/fallbackContent";
import { accuracy, recentStreak, toPercent, weakAreas } from "../domain/performance";
import { Attempt, QuizAttempt, Session, SessionStatus } from "../domain/session";
import { assertAllowed } from "../domain/sessionLifecycle";
import { SessionLocks } from "../stores/sessionLocks";
import { SessionStore } from "../stores/sessionStore";
import { TraceRecorder } from "./traceRecorder";

// ============================================
// Result Types
// ============================================

export interface StartResult {
  sessionId: string;
  studentName: string;
  maxFactFamily: number;
  message: string;
}

export interface MathAnswerResult {
  correct: boolean;
  expectedAnswer: number;
  submittedAnswer: number | string;
  feedback: string;
  bonusFact?: string;
  totalQuestions: number;
  accuracy: number; // percentage
  streak: number;
  weakAreas: number[];
}

export interface QuizAnswerResult {
  correct: boolean;
  feedback: string;
  correctAnswer: string;
  explanation: string;
}

export interface ProgressReport {
  sessionId: string;
  studentName: string;
  status: SessionStatus;
  totalQuestions: number;
  correctAnswers: number;
  accuracy: number; // percentage
  streak: number;
  weakAreas: number[];
  quizzesAnswered: number;
  quizzesCorrect: number;
  summary: string;
}

export interface StatusResult {
  sessionId: string;
  status: SessionStatus;
  message: string;
}

export interface EndResult {
  message: string;
  progress: ProgressReport;
}

/**
 * The quiz as echoed back by the client. Only the answer key is required.
 */
export type QuizAnswerInput = Pick<Quiz, "correctAnswer"> &
  Partial<Pick<Quiz, "id" | "category" | "explanation">>;

export interface ControllerOptions {
  bonusFactChance: number;
  weakAreaLimit: number;
  weakAreaThreshold: number;
  random?: () => number;
  now?: () => Date;
  traces?: TraceRecorder;
}

// ============================================
// Main Controller Class
// ============================================

export class SessionController {
  private random: () => number;
  private now: () => Date;

  constructor(
    private store: SessionStore,
    private scheduler: ActivityScheduler,
    private provider: ContentProvider,
    private options: ControllerOptions,
    private locks: SessionLocks = new SessionLocks()
  ) {
    this.random = options.random ?? Math.random;
    this.now = options.now ?? (() => new Date());
  }

  // ============================================
  // Lifecycle
  // ============================================

  async start(studentName: string, maxFactFamily: number): Promise<StartResult> {
    const session = this.store.create(studentName, maxFactFamily);
    console.log(`[Controller] Started session ${session.id} for ${session.studentName} (up to ${maxFactFamily})`);
    this.trace("session_started", { sessionId: session.id, maxFactFamily: session.maxFactFamily });

    const message = await this.withFallback(
      () => this.provider.welcomeMessage(session.studentName, session.maxFactFamily),
      fallback.welcomeMessage(session.studentName, session.maxFactFamily),
      "welcome message"
    );

    return {
      sessionId: session.id,
      studentName: session.studentName,
      maxFactFamily: session.maxFactFamily,
      message,
    };
  }

  async pause(sessionId: string): Promise<StatusResult> {
    const session = await this.locks.runExclusive(sessionId, () =>
      this.store.setStatus(sessionId, "paused")
    );
    console.log(`[Controller] Paused session ${sessionId}`);
    this.trace("session_paused", { sessionId, status: session.status });

    return {
      sessionId,
      status: session.status,
      message: "Session paused! You can resume anytime.",
    };
  }

  async resume(sessionId: string): Promise<StatusResult> {
    const session = await this.locks.runExclusive(sessionId, () =>
      this.store.setStatus(sessionId, "active")
    );
    console.log(`[Controller] Resumed session ${sessionId}`);
    this.trace("session_resumed", { sessionId, status: session.status });

    return {
      sessionId,
      status: session.status,
      message: `Welcome back, ${session.studentName}! Let's continue learning!`,
    };
  }

  /**
   * End the session. History is left untouched, so the final progress
   * matches the progress just before ending.
   */
  async end(sessionId: string): Promise<EndResult> {
    const session = await this.locks.runExclusive(sessionId, () =>
      this.store.setStatus(sessionId, "ended")
    );
    console.log(`[Controller] Ended session ${sessionId}`);
    this.trace("session_ended", { sessionId, totalQuestions: session.history.length });

    const progress = await this.buildProgress(session);
    const message = await this.withFallback(
      () => this.provider.farewell({
        studentName: session.studentName,
        totalQuestions: progress.totalQuestions,
        accuracy: progress.accuracy,
      }),
      fallback.farewell({
        studentName: session.studentName,
        totalQuestions: progress.totalQuestions,
        accuracy: progress.accuracy,
      }),
      "farewell"
    );

    return { message, progress };
  }

  // ============================================
  // Activities
  // ============================================

  /**
   * Serve the next activity. Content is generated from a snapshot of the
   * session without holding the lock; recording it re-checks the session
   * and rejects the request if another activity was served meanwhile.
   * A fact or quiz the provider cannot generate is reported as a
   * CollaboratorError. Nothing is served; the break is deferred, so the next
   * request gets a drill and the break is tried again after it.
   */
  async nextActivity(sessionId: string, options: PlanOptions = {}): Promise<ActivitySpec> {
    const snapshot = this.store.get(sessionId);
    assertAllowed(snapshot.status, "next_activity");

    let activity: ActivitySpec;
    try {
      activity = await this.scheduler.nextActivity(snapshot, options);
    } catch (error) {
      if (error instanceof CollaboratorError) {
        await this.deferBreak(snapshot);
      }
      throw error;
    }

    const served = await this.locks.runExclusive(sessionId, () => {
      const current = this.store.get(sessionId);
      assertAllowed(current.status, "next_activity");
      if (current.schedule.activitiesServed !== snapshot.schedule.activitiesServed) {
        throw new OutOfSequenceError("Another activity was served for this session; request again");
      }
      this.scheduler.recordServed(current, activity);
      return activity;
    });

    console.log(`[Controller] Served ${served.type} ${served.id} for session ${sessionId}`);
    this.trace("activity_served", { sessionId, type: served.type, activityId: served.id });
    return served;
  }

  async submitMathAnswer(
    sessionId: string,
    answer: string | number,
    activityId?: string
  ): Promise<MathAnswerResult> {
    const { session, attempt } = await this.locks.runExclusive(sessionId, () => {
      const current = this.store.get(sessionId);
      assertAllowed(current.status, "submit_answer");

      const drill = current.activityCursor;
      if (!drill || drill.type !== "math_drill") {
        throw new OutOfSequenceError("No math question is waiting for an answer");
      }
      if (activityId && activityId !== drill.id) {
        throw new OutOfSequenceError("Answer does not match the question that was asked");
      }

      const submittedAnswer = parseMathAnswer(answer);
      const graded: Attempt = {
        factorA: drill.factorA,
        factorB: drill.factorB,
        expectedAnswer: drill.expectedAnswer,
        submittedAnswer,
        correct: isCorrectMathAnswer(drill, submittedAnswer),
        timestamp: this.now().toISOString(),
      };

      return { session: this.store.appendAttempt(sessionId, graded), attempt: graded };
    });

    console.log(
      `[Controller] ${attempt.factorA} x ${attempt.factorB}: ${attempt.correct ? "correct" : "incorrect"} (session ${sessionId})`
    );

    const feedbackRequest = {
      studentName: session.studentName,
      correct: attempt.correct,
      factFamily: attempt.factorA,
      expectedAnswer: attempt.expectedAnswer,
    };
    const wantsBonus = attempt.correct && this.random() < this.options.bonusFactChance;

    const [feedback, bonusFact] = await Promise.all([
      this.withFallback(
        () => this.provider.drillFeedback(feedbackRequest),
        fallback.drillFeedback(feedbackRequest),
        "drill feedback"
      ),
      wantsBonus ? this.bonusFact(attempt.expectedAnswer) : Promise.resolve(undefined),
    ]);

    const result: MathAnswerResult = {
      correct: attempt.correct,
      expectedAnswer: attempt.expectedAnswer,
      submittedAnswer: attempt.submittedAnswer,
      feedback,
      totalQuestions: session.history.length,
      accuracy: toPercent(accuracy(session.history)),
      streak: recentStreak(session.history),
      weakAreas: this.weakAreasOf(session),
    };
    if (bonusFact) {
      result.bonusFact = bonusFact;
    }
    return result;
  }

  /**
   * Grade a quiz answer. With a sessionId the answer must match the quiz
   * that was served, is graded against it and is recorded in the session's
   * quiz history. Without one the echoed quiz is graded on its own.
   * Quiz results never affect drill targeting.
   */
  async submitQuizAnswer(
    quiz: QuizAnswerInput,
    answer: string,
    sessionId?: string
  ): Promise<QuizAnswerResult> {
    let correctAnswer = normalizeQuizKey(quiz.correctAnswer);
    let explanation = quiz.explanation ?? "";
    let correct: boolean;

    if (sessionId) {
      const served = await this.locks.runExclusive(sessionId, () => {
        const current = this.store.get(sessionId);
        assertAllowed(current.status, "submit_answer");

        const cursor = current.activityCursor;
        if (!cursor || cursor.type !== "quiz") {
          throw new OutOfSequenceError("No quiz is waiting for an answer");
        }
        if (quiz.id && quiz.id !== cursor.id) {
          throw new OutOfSequenceError("Answer does not match the quiz that was asked");
        }

        const graded: QuizAttempt = {
          activityId: cursor.id,
          category: cursor.category,
          answer: normalizeQuizKey(answer),
          correctAnswer: normalizeQuizKey(cursor.correctAnswer),
          correct: isCorrectQuizAnswer(cursor, answer),
          timestamp: this.now().toISOString(),
        };
        this.store.appendQuizAttempt(sessionId, graded);
        return { quiz: cursor, graded };
      });

      correctAnswer = served.graded.correctAnswer;
      explanation = served.quiz.explanation;
      correct = served.graded.correct;
    } else {
      if (!correctAnswer) {
        throw new ValidationError("quiz.correctAnswer is required");
      }
      correct = isCorrectQuizAnswer(quiz, answer);
    }

    console.log(`[Controller] Quiz answer ${correct ? "correct" : "incorrect"}`);

    const feedback = await this.withFallback(
      () => this.provider.quizFeedback({ correct, correctAnswer }),
      fallback.quizFeedback({ correct, correctAnswer }),
      "quiz feedback"
    );

    return { correct, feedback, correctAnswer, explanation };
  }

  // ============================================
  // Read-only
  // ============================================

  /**
   * Progress is available in every state, including after the session ends.
   */
  async progress(sessionId: string): Promise<ProgressReport> {
    return this.buildProgress(this.store.get(sessionId));
  }

  getSession(sessionId: string): Session {
    return this.store.get(sessionId);
  }

  listSessions(): Session[] {
    return this.store.list();
  }

  // ============================================
  // Helpers
  // ============================================

  private async buildProgress(session: Session): Promise<ProgressReport> {
    const totalQuestions = session.history.length;
    const accuracyPercent = toPercent(accuracy(session.history));
    const weak = this.weakAreasOf(session);

    const summaryRequest = {
      studentName: session.studentName,
      totalQuestions,
      accuracy: accuracyPercent,
      weakAreas: weak,
    };
    const summary = await this.withFallback(
      () => this.provider.progressSummary(summaryRequest),
      fallback.progressSummary(summaryRequest),
      "progress summary"
    );

    return {
      sessionId: session.id,
      studentName: session.studentName,
      status: session.status,
      totalQuestions,
      correctAnswers: session.history.filter(a => a.correct).length,
      accuracy: accuracyPercent,
      streak: recentStreak(session.history),
      weakAreas: weak,
      quizzesAnswered: session.quizHistory.length,
      quizzesCorrect: session.quizHistory.filter(q => q.correct).length,
      summary,
    };
  }

  /**
   * Mark the failed break as deferred, unless the session moved on while
   * the content was being generated.
   */
  private async deferBreak(snapshot: Session): Promise<void> {
    const deferred = await this.locks.runExclusive(snapshot.id, () => {
      const current = this.store.get(snapshot.id);
      if (
        current.status !== "active" ||
        current.schedule.activitiesServed !== snapshot.schedule.activitiesServed
      ) {
        return false;
      }
      this.store.deferBreak(snapshot.id);
      return true;
    });

    if (deferred) {
      console.warn(`[Controller] Break deferred for session ${snapshot.id}; serving a drill next`);
      this.trace("break_deferred", { sessionId: snapshot.id });
    }
  }

  private trace(action: string, details: Record<string, unknown>): void {
    this.options.traces?.record("Controller", action, details);
  }

  private weakAreasOf(session: Session): number[] {
    return weakAreas(session.history, this.options.weakAreaLimit, this.options.weakAreaThreshold);
  }

  private async bonusFact(value: number): Promise<string | undefined> {
    try {
      const fact = await this.provider.numberFact(value);
      return fact.content;
    } catch (error) {
      console.warn(`[Controller] Skipping bonus fact for ${value}:`, error);
      return undefined;
    }
  }

  /**
   * Cosmetic text: use the template when the provider fails.
   */
  private async withFallback(
    generate: () => Promise<string>,
    template: string,
    description: string
  ): Promise<string> {
    try {
      const text = await generate();
      return text || template;
    } catch (error) {
      console.warn(`[Controller] Using templated ${description}:`, error);
      return template;
    }
  }
}

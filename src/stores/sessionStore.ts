import fs from "fs";
import path from "path";
import { randomUUID } from "crypto";
import {
  Attempt,
  MAX_FACT_FAMILY,
  MIN_FACT_FAMILY,
  QuizAttempt,
  ScheduleState,
  Session,
  SessionStatus,
} from "../domain/session";
import { ActivitySpec } from "../domain/activity";
import { InvalidStateError, NotFoundError, ValidationError } from "../domain/errors";
import { operationFor, transition } from "../domain/sessionLifecycle";
import { DEFAULT_CONFIG } from "../config";

/**
 * SessionStore keeps each session as its own JSON file: {sessionId}.json
 *
 * Every mutation loads the record, applies the change to a copy and writes
 * the whole record back before returning. Records are written to a
 * temporary file and renamed into place, so a failed mutation leaves the
 * stored record exactly as it was.
 *
 * Mutations are not serialized here; callers go through SessionLocks.
 */
export class SessionStore {
  private dataDir: string;

  constructor(dataDir: string = DEFAULT_CONFIG.dataDir, private now: () => Date = () => new Date()) {
    this.dataDir = dataDir;
    if (!fs.existsSync(this.dataDir)) {
      fs.mkdirSync(this.dataDir, { recursive: true });
    }
  }

  /**
   * Create and persist a new active session.
   */
  create(studentName: string, maxFactFamily: number): Session {
    const name = studentName.trim();
    if (!name) {
      throw new ValidationError("studentName is required");
    }
    if (
      !Number.isInteger(maxFactFamily) ||
      maxFactFamily < MIN_FACT_FAMILY ||
      maxFactFamily > MAX_FACT_FAMILY
    ) {
      throw new ValidationError(
        `maxFactFamily must be a whole number from ${MIN_FACT_FAMILY} to ${MAX_FACT_FAMILY}`
      );
    }

    const timestamp = this.now().toISOString();
    const session: Session = {
      id: randomUUID(),
      studentName: name,
      maxFactFamily,
      status: "active",
      createdAt: timestamp,
      lastActivityAt: timestamp,
      history: [],
      quizHistory: [],
      activityCursor: null,
      schedule: { activitiesServed: 0, drillsSinceBreak: 0 },
    };

    this.write(session);
    return session;
  }

  /**
   * Load a session by ID. Each call returns a fresh copy.
   */
  get(sessionId: string): Session {
    const session = this.read(sessionId);
    if (!session) {
      throw new NotFoundError(sessionId);
    }
    return session;
  }

  /**
   * Append a graded drill. The drill has now been answered, so the cursor
   * is cleared in the same write.
   */
  appendAttempt(sessionId: string, attempt: Attempt): Session {
    return this.mutate(sessionId, (session) => {
      if (session.status === "ended") {
        throw new InvalidStateError("Session has ended: cannot record answers");
      }
      session.history.push({ ...attempt });
      session.activityCursor = null;
    });
  }

  /**
   * Append a graded quiz answer and clear the cursor.
   */
  appendQuizAttempt(sessionId: string, attempt: QuizAttempt): Session {
    return this.mutate(sessionId, (session) => {
      if (session.status === "ended") {
        throw new InvalidStateError("Session has ended: cannot record answers");
      }
      session.quizHistory.push({ ...attempt });
      session.activityCursor = null;
    });
  }

  /**
   * Move the session to a new status. Transitions that change nothing
   * (pausing a paused session) return the record without writing it.
   */
  setStatus(sessionId: string, status: SessionStatus): Session {
    const session = this.get(sessionId);
    const next = transition(session.status, operationFor(status));
    if (next === null) {
      return session;
    }

    const timestamp = this.now().toISOString();
    session.status = next;
    if (next === "paused") {
      session.pausedAt = timestamp;
    }
    if (next === "ended") {
      session.endedAt = timestamp;
      session.activityCursor = null;
    }
    session.lastActivityAt = timestamp;
    this.write(session);
    return session;
  }

  /**
   * Remember which activity was served, along with the updated
   * interleave state.
   */
  recordServed(sessionId: string, activity: ActivitySpec, schedule: ScheduleState): Session {
    return this.mutate(sessionId, (session) => {
      if (session.status !== "active") {
        throw new InvalidStateError(`Session is ${session.status}: cannot serve activities`);
      }
      session.activityCursor = activity;
      session.schedule = { ...schedule };
    });
  }

  /**
   * Mark the due break as deferred. Serving the next activity clears the
   * mark, because recordServed replaces the whole schedule.
   */
  deferBreak(sessionId: string): Session {
    return this.mutate(sessionId, (session) => {
      if (session.status !== "active") {
        throw new InvalidStateError(`Session is ${session.status}: cannot serve activities`);
      }
      session.schedule = { ...session.schedule, breakDeferred: true };
    });
  }

  /**
   * Get all sessions, most recently active first.
   */
  list(): Session[] {
    const sessions: Session[] = [];

    for (const file of this.listSessionFiles()) {
      const session = this.loadFromFile(file);
      if (session) {
        sessions.push(session);
      }
    }

    return sessions.sort((a, b) =>
      new Date(b.lastActivityAt).getTime() - new Date(a.lastActivityAt).getTime()
    );
  }

  private mutate(sessionId: string, apply: (session: Session) => void): Session {
    const session = this.get(sessionId);
    apply(session);
    session.lastActivityAt = this.now().toISOString();
    this.write(session);
    return session;
  }

  private filePath(sessionId: string): string {
    // Session IDs become file names; keep them to one path segment.
    if (!sessionId || path.basename(sessionId) !== sessionId || sessionId.startsWith(".")) {
      throw new NotFoundError(sessionId);
    }
    return path.join(this.dataDir, `${sessionId}.json`);
  }

  private write(session: Session): void {
    const filePath = this.filePath(session.id);
    const tempPath = `${filePath}.tmp`;
    fs.writeFileSync(tempPath, JSON.stringify(session, null, 2));
    fs.renameSync(tempPath, filePath);
  }

  private read(sessionId: string): Session | null {
    const filePath = this.filePath(sessionId);
    if (!fs.existsSync(filePath)) {
      return null;
    }
    const data = fs.readFileSync(filePath, "utf-8");
    return JSON.parse(data) as Session;
  }

  private listSessionFiles(): string[] {
    if (!fs.existsSync(this.dataDir)) {
      return [];
    }
    return fs.readdirSync(this.dataDir).filter(f => f.endsWith(".json"));
  }

  private loadFromFile(filename: string): Session | null {
    try {
      const data = fs.readFileSync(path.join(this.dataDir, filename), "utf-8");
      return JSON.parse(data) as Session;
    } catch (error) {
      console.warn(`[SessionStore] Skipping unreadable session file ${filename}:`, error);
      return null;
    }
  }
}

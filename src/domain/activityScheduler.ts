import { randomUUID } from "crypto";
import { ActivitySpec, MathDrill, isBreak } from "./activity";
import { ContentProvider, FACT_CATEGORIES } from "./contentProvider";
import { CollaboratorError } from "./errors";
import { ScheduleState, Session } from "./session";
import { weakAreas } from "./performance";
import * as fallback from "./fallbackContent";
import { SessionStore } from "../stores/sessionStore";

export interface SchedulerOptions {
  interleaveEvery: number;
  weakAreaThreshold: number;
  weakAreaBias: number;
  weakAreaLimit: number;
  random?: () => number;
  newId?: () => string;
}

/**
 * What the scheduler decided to serve, before any content exists.
 */
export type ActivityPlan =
  | { type: "math_drill"; factorA: number; factorB: number; targeted: boolean }
  | { type: "fact"; category: string }
  | { type: "number_fact"; number: number }
  | { type: "quiz"; category: string };

export interface PlanOptions {
  // Serve a drill even when a break is due, e.g. after fun content failed.
  drillOnly?: boolean;
}

type BreakType = "fact" | "quiz" | "number_fact";

/**
 * ActivityScheduler decides what the learner sees next.
 *
 * Math drills are the default. Once `interleaveEvery` drills have been
 * served since the last break, one fact, number fact or quiz is due; serving
 * it resets the count, so two breaks never follow each other.
 *
 * When a due break cannot be generated the caller defers it (see
 * deferBreak); the next activity is then a drill, so math never stalls on
 * the content provider.
 *
 * Drills lean toward weak fact families: when there are any, the first
 * factor comes from them with probability `weakAreaBias`. The second
 * factor is always uniform over the session's range.
 */
export class ActivityScheduler {
  private random: () => number;
  private newId: () => string;

  constructor(
    private store: SessionStore,
    private provider: ContentProvider,
    private options: SchedulerOptions
  ) {
    this.random = options.random ?? Math.random;
    this.newId = options.newId ?? randomUUID;
  }

  /**
   * Choose and generate the next activity for a session.
   * Does not record it; see recordServed.
   */
  async nextActivity(session: Session, options: PlanOptions = {}): Promise<ActivitySpec> {
    return this.generate(this.plan(session, options));
  }

  /**
   * A deferred break waits for one drill before it is tried again.
   */
  isBreakDue(schedule: ScheduleState): boolean {
    return !schedule.breakDeferred && schedule.drillsSinceBreak >= this.options.interleaveEvery;
  }

  plan(session: Session, options: PlanOptions = {}): ActivityPlan {
    if (!options.drillOnly && this.isBreakDue(session.schedule)) {
      return this.planBreak(session);
    }
    return this.planDrill(session);
  }

  /**
   * Turn a plan into content. Drill wording falls back to a template when
   * the provider fails; facts and quizzes have no fallback.
   */
  async generate(plan: ActivityPlan): Promise<ActivitySpec> {
    const id = this.newId();

    switch (plan.type) {
      case "math_drill":
        return this.generateDrill(id, plan.factorA, plan.factorB, plan.targeted);

      case "fact": {
        console.log(`[Scheduler] Requesting fun fact about ${plan.category}`);
        const fact = await this.provider.funFact(plan.category);
        return { type: "fact", id, category: fact.category, content: fact.content };
      }

      case "number_fact": {
        console.log(`[Scheduler] Requesting number fact for ${plan.number}`);
        const fact = await this.provider.numberFact(plan.number);
        return { type: "number_fact", id, number: fact.number, content: fact.content };
      }

      case "quiz": {
        console.log(`[Scheduler] Requesting quiz about ${plan.category}`);
        const quiz = await this.provider.quiz(plan.category);
        return {
          type: "quiz",
          id,
          category: quiz.category,
          question: quiz.question,
          options: { ...quiz.options },
          correctAnswer: quiz.correctAnswer,
          explanation: quiz.explanation,
        };
      }
    }
  }

  /**
   * Record the served activity as the session's cursor and advance the
   * interleave count. `session` must be the current stored record.
   */
  recordServed(session: Session, activity: ActivitySpec): Session {
    return this.store.recordServed(session.id, activity, advanceSchedule(session.schedule, activity));
  }

  private planDrill(session: Session): ActivityPlan {
    const max = session.maxFactFamily;
    const weak = weakAreas(
      session.history,
      this.options.weakAreaLimit,
      this.options.weakAreaThreshold
    ).filter(family => family <= max);

    let factorA: number;
    let targeted = false;
    if (weak.length > 0 && this.random() < this.options.weakAreaBias) {
      factorA = this.pick(weak);
      targeted = true;
    } else {
      factorA = this.randomInt(1, max);
    }
    const factorB = this.randomInt(1, max);

    return { type: "math_drill", factorA, factorB, targeted };
  }

  private planBreak(session: Session): ActivityPlan {
    const choices: BreakType[] = ["fact", "quiz"];
    const lastAttempt = session.history[session.history.length - 1];
    if (lastAttempt) {
      choices.push("number_fact");
    }

    const choice = this.pick(choices);
    if (choice === "number_fact" && lastAttempt) {
      return { type: "number_fact", number: lastAttempt.expectedAnswer };
    }
    const category = this.pick(FACT_CATEGORIES);
    return choice === "quiz" ? { type: "quiz", category } : { type: "fact", category };
  }

  private async generateDrill(
    id: string,
    factorA: number,
    factorB: number,
    targeted: boolean
  ): Promise<MathDrill> {
    const drill: MathDrill = {
      type: "math_drill",
      id,
      question: fallback.drillQuestion(factorA, factorB),
      factorA,
      factorB,
      expectedAnswer: factorA * factorB,
      targeted,
      generated: false,
    };

    try {
      const question = await this.provider.drillQuestion(factorA, factorB);
      if (question) {
        drill.question = question;
        drill.generated = true;
      }
    } catch (error) {
      // Drills never depend on the provider.
      const reason = error instanceof CollaboratorError ? error.message : String(error);
      console.warn(`[Scheduler] Using templated question for ${factorA} x ${factorB}: ${reason}`);
    }

    return drill;
  }

  private randomInt(min: number, max: number): number {
    return min + Math.floor(this.random() * (max - min + 1));
  }

  private pick<T>(items: readonly T[]): T {
    return items[Math.floor(this.random() * items.length)];
  }
}

export function advanceSchedule(schedule: ScheduleState, activity: ActivitySpec): ScheduleState {
  return {
    activitiesServed: schedule.activitiesServed + 1,
    drillsSinceBreak: isBreak(activity) ? 0 : schedule.drillsSinceBreak + 1,
  };
}

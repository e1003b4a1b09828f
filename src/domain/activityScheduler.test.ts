import { ActivityScheduler, SchedulerOptions, advanceSchedule } from "./activityScheduler";
import { ContentProvider } from "./contentProvider";
import { CollaboratorError } from "./errors";
import { Attempt, Session } from "./session";
import { ActivitySpec, MathDrill } from "./activity";
import { SessionStore } from "../stores/sessionStore";

jest.mock("../stores/sessionStore");

describe("ActivityScheduler", () => {
  let provider: jest.Mocked<ContentProvider>;
  let store: SessionStore;

  const createProvider = (): jest.Mocked<ContentProvider> => ({
    welcomeMessage: jest.fn(),
    drillQuestion: jest.fn(),
    drillFeedback: jest.fn(),
    funFact: jest.fn(),
    numberFact: jest.fn(),
    quiz: jest.fn(),
    quizFeedback: jest.fn(),
    progressSummary: jest.fn(),
    farewell: jest.fn(),
  });

  /**
   * Returns the given values in order, then 0.
   */
  const sequence = (...values: number[]) => () => values.shift() ?? 0;

  const createScheduler = (random: () => number = () => 0, overrides: Partial<SchedulerOptions> = {}) =>
    new ActivityScheduler(store, provider, {
      interleaveEvery: 3,
      weakAreaThreshold: 0.7,
      weakAreaBias: 0.7,
      weakAreaLimit: 3,
      random,
      newId: () => "activity-1",
      ...overrides,
    });

  const attempt = (factorA: number, factorB: number, correct: boolean): Attempt => ({
    factorA,
    factorB,
    expectedAnswer: factorA * factorB,
    submittedAnswer: correct ? factorA * factorB : 0,
    correct,
    timestamp: "2024-01-15T10:00:00.000Z",
  });

  const createSession = (overrides: Partial<Session> = {}): Session => ({
    id: "session-1",
    studentName: "Alex",
    maxFactFamily: 5,
    status: "active",
    createdAt: "2024-01-15T10:00:00.000Z",
    lastActivityAt: "2024-01-15T10:00:00.000Z",
    history: [],
    quizHistory: [],
    activityCursor: null,
    schedule: { activitiesServed: 0, drillsSinceBreak: 0 },
    ...overrides,
  });

  beforeEach(() => {
    jest.clearAllMocks();
    jest.spyOn(console, "log").mockImplementation(() => {});
    jest.spyOn(console, "warn").mockImplementation(() => {});
    provider = createProvider();
    store = new SessionStore();
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe("math drills", () => {
    it("serves a drill within the session's range when no break is due", async () => {
      provider.drillQuestion.mockResolvedValue("If you have 3 bags with 1 apple in each, how many apples?");
      const scheduler = createScheduler(sequence(0.5, 0.0));

      const activity = await scheduler.nextActivity(createSession());

      expect(activity).toEqual({
        type: "math_drill",
        id: "activity-1",
        question: "If you have 3 bags with 1 apple in each, how many apples?",
        factorA: 3,
        factorB: 1,
        expectedAnswer: 3,
        targeted: false,
        generated: true,
      });
      expect(provider.drillQuestion).toHaveBeenCalledWith(3, 1);
    });

    it("never draws factors outside 1..maxFactFamily", async () => {
      provider.drillQuestion.mockResolvedValue("question");
      const scheduler = createScheduler(sequence(0.999, 0.999));

      const activity = await scheduler.nextActivity(createSession({ maxFactFamily: 5 }));

      expect(activity).toMatchObject({ factorA: 5, factorB: 5, expectedAnswer: 25 });
    });

    it("uses the templated question when the provider fails", async () => {
      provider.drillQuestion.mockRejectedValue(new CollaboratorError("Content generation failed"));
      const scheduler = createScheduler(sequence(0.5, 0.0));

      const activity = await scheduler.nextActivity(createSession());

      expect(activity).toMatchObject({
        type: "math_drill",
        question: "What is 3 × 1?",
        expectedAnswer: 3,
        generated: false,
      });
    });

    it("uses the templated question when the provider returns nothing", async () => {
      provider.drillQuestion.mockResolvedValue("");
      const scheduler = createScheduler(sequence(0.2, 0.2));

      const activity = await scheduler.nextActivity(createSession());

      expect(activity).toMatchObject({ question: "What is 2 × 2?", generated: false });
    });

    it("targets a weak fact family when the bias roll succeeds", async () => {
      provider.drillQuestion.mockResolvedValue("question");
      const history = [attempt(7, 2, false), attempt(7, 3, false), attempt(2, 2, true)];
      // bias roll 0.5 < 0.7, pick the only weak family, factorB = 1 + floor(0.25 * 12)
      const scheduler = createScheduler(sequence(0.5, 0.0, 0.25));

      const activity = await scheduler.nextActivity(createSession({ maxFactFamily: 12, history }));

      expect(activity).toMatchObject({ factorA: 7, factorB: 4, expectedAnswer: 28, targeted: true });
    });

    it("draws uniformly when the bias roll fails", async () => {
      provider.drillQuestion.mockResolvedValue("question");
      const history = [attempt(7, 2, false)];
      const scheduler = createScheduler(sequence(0.9, 0.0, 0.0));

      const activity = await scheduler.nextActivity(createSession({ maxFactFamily: 12, history }));

      expect(activity).toMatchObject({ factorA: 1, factorB: 1, targeted: false });
    });
  });

  describe("breaks", () => {
    const breakDue = { activitiesServed: 3, drillsSinceBreak: 3 };

    it("serves a fun fact once enough drills have been served", async () => {
      provider.funFact.mockResolvedValue({ category: "animals", content: "Octopuses have three hearts." });
      const scheduler = createScheduler(sequence(0.0, 0.0));

      const activity = await scheduler.nextActivity(createSession({ schedule: breakDue }));

      expect(activity).toEqual({
        type: "fact",
        id: "activity-1",
        category: "animals",
        content: "Octopuses have three hearts.",
      });
      expect(provider.funFact).toHaveBeenCalledWith("animals");
      expect(provider.drillQuestion).not.toHaveBeenCalled();
    });

    it("serves a quiz", async () => {
      provider.quiz.mockResolvedValue({
        category: "space",
        question: "Which planet is the biggest?",
        options: { A: "Mars", B: "Jupiter", C: "Venus", D: "Mercury" },
        correctAnswer: "B",
        explanation: "Jupiter is more than twice as massive as all the other planets combined.",
      });
      // choice floor(0.5 * 2) = quiz, category floor(0.2 * 9) = space
      const scheduler = createScheduler(sequence(0.5, 0.2));

      const activity = await scheduler.nextActivity(createSession({ schedule: breakDue }));

      expect(activity).toEqual({
        type: "quiz",
        id: "activity-1",
        category: "space",
        question: "Which planet is the biggest?",
        options: { A: "Mars", B: "Jupiter", C: "Venus", D: "Mercury" },
        correctAnswer: "B",
        explanation: "Jupiter is more than twice as massive as all the other planets combined.",
      });
    });

    it("serves a number fact about the last answer once there is history", async () => {
      provider.numberFact.mockResolvedValue({ number: 12, content: "A dozen eggs is 12 eggs." });
      const history = [attempt(2, 3, true), attempt(3, 4, true)];
      const scheduler = createScheduler(sequence(0.9));

      const activity = await scheduler.nextActivity(createSession({ schedule: breakDue, history }));

      expect(activity).toEqual({ type: "number_fact", id: "activity-1", number: 12, content: "A dozen eggs is 12 eggs." });
      expect(provider.numberFact).toHaveBeenCalledWith(12);
    });

    it("surfaces provider failures for facts and quizzes", async () => {
      provider.funFact.mockRejectedValue(new CollaboratorError("Content generation failed"));
      const scheduler = createScheduler(sequence(0.0, 0.0));

      await expect(scheduler.nextActivity(createSession({ schedule: breakDue }))).rejects.toThrow(CollaboratorError);
    });

    it("serves a drill when drillOnly is set, even with a break due", async () => {
      provider.drillQuestion.mockResolvedValue("question");
      const scheduler = createScheduler();

      const activity = await scheduler.nextActivity(createSession({ schedule: breakDue }), { drillOnly: true });

      expect(activity.type).toBe("math_drill");
      expect(provider.funFact).not.toHaveBeenCalled();
      expect(provider.quiz).not.toHaveBeenCalled();
    });
  });

  describe("plan", () => {
    it("interleaves one break after every three drills", () => {
      const scheduler = createScheduler();
      let session = createSession();
      const served: string[] = [];

      for (let i = 0; i < 8; i++) {
        const plan = scheduler.plan(session);
        served.push(plan.type);
        const activity: ActivitySpec =
          plan.type === "math_drill"
            ? { type: "math_drill", id: `a${i}`, question: "q", factorA: 1, factorB: 1, expectedAnswer: 1, targeted: false, generated: false }
            : { type: "fact", id: `a${i}`, category: "animals", content: "fact" };
        session = { ...session, schedule: advanceSchedule(session.schedule, activity) };
      }

      expect(served).toEqual([
        "math_drill", "math_drill", "math_drill", "fact",
        "math_drill", "math_drill", "math_drill", "fact",
      ]);
    });

    it("honors a custom interleave interval", () => {
      const scheduler = createScheduler(() => 0, { interleaveEvery: 1 });

      expect(scheduler.plan(createSession({ schedule: { activitiesServed: 1, drillsSinceBreak: 1 } })).type).toBe("fact");
      expect(scheduler.plan(createSession()).type).toBe("math_drill");
    });

    it("serves a drill instead of a deferred break", () => {
      const scheduler = createScheduler();
      const deferred = createSession({ schedule: { activitiesServed: 3, drillsSinceBreak: 3, breakDeferred: true } });

      expect(scheduler.isBreakDue(deferred.schedule)).toBe(false);
      expect(scheduler.plan(deferred).type).toBe("math_drill");
    });
  });

  describe("advanceSchedule", () => {
    it("counts drills since the last break", () => {
      const drill: MathDrill = {
        type: "math_drill", id: "d1", question: "q", factorA: 2, factorB: 3, expectedAnswer: 6, targeted: false, generated: false,
      };

      expect(advanceSchedule({ activitiesServed: 4, drillsSinceBreak: 1 }, drill)).toEqual({
        activitiesServed: 5,
        drillsSinceBreak: 2,
      });
    });

    it("resets the count after a break", () => {
      expect(
        advanceSchedule(
          { activitiesServed: 3, drillsSinceBreak: 3 },
          { type: "number_fact", id: "n1", number: 6, content: "A hexagon has 6 sides." }
        )
      ).toEqual({ activitiesServed: 4, drillsSinceBreak: 0 });
    });

    it("drops the deferred mark once a drill is served", () => {
      const drill: MathDrill = {
        type: "math_drill", id: "d2", question: "q", factorA: 4, factorB: 4, expectedAnswer: 16, targeted: false, generated: false,
      };

      expect(advanceSchedule({ activitiesServed: 3, drillsSinceBreak: 3, breakDeferred: true }, drill)).toEqual({
        activitiesServed: 4,
        drillsSinceBreak: 4,
      });
    });
  });

  describe("recordServed", () => {
    it("stores the activity as the cursor with the advanced schedule", () => {
      const scheduler = createScheduler();
      const session = createSession({ schedule: { activitiesServed: 2, drillsSinceBreak: 2 } });
      const fact = { type: "fact" as const, id: "f1", category: "oceans", content: "The ocean is salty." };

      scheduler.recordServed(session, fact);

      expect(jest.mocked(store.recordServed)).toHaveBeenCalledWith("session-1", fact, { activitiesServed: 3, drillsSinceBreak: 0 });
    });
  });
});

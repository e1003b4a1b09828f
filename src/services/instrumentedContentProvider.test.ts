import { InstrumentedContentProvider } from "./instrumentedContentProvider";
import { MetricsCollector } from "./metricsCollector";
import { TraceRecorder } from "./traceRecorder";
import { Observability } from "./observability";
import { ContentProvider } from "../domain/contentProvider";
import { CollaboratorError } from "../domain/errors";
import { UnavailableContentProvider } from "../domain/unavailableContentProvider";

describe("InstrumentedContentProvider", () => {
  let observability: Observability;

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

  beforeEach(() => {
    jest.spyOn(console, "log").mockImplementation(() => {});
    observability = {
      metrics: new MetricsCollector(),
      traces: new TraceRecorder(100, () => new Date("2024-01-15T10:00:00.000Z"), () => "trace-1"),
    };
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it("passes results through and counts each call by method", async () => {
    const inner = createProvider();
    inner.funFact.mockResolvedValue({ category: "space", content: "A day on Venus is longer than its year." });
    inner.drillQuestion.mockResolvedValue("What is 2 × 3?");
    const provider = new InstrumentedContentProvider(inner, observability);

    const fact = await provider.funFact("space");
    await provider.funFact("animals");
    const question = await provider.drillQuestion(2, 3);

    expect(fact).toEqual({ category: "space", content: "A day on Venus is longer than its year." });
    expect(question).toBe("What is 2 × 3?");
    expect(inner.drillQuestion).toHaveBeenCalledWith(2, 3);
    expect(observability.metrics.snapshot().providerCalls).toEqual({ funFact: 2, drillQuestion: 1 });
  });

  it("rethrows failures and traces them", async () => {
    const provider = new InstrumentedContentProvider(
      new UnavailableContentProvider("Content generation requires OPENAI_API_KEY"),
      observability
    );

    const outcome = await observability.traces.run(() => provider.quiz("oceans").catch((error: unknown) => error));

    expect(outcome).toBeInstanceOf(CollaboratorError);
    expect(observability.metrics.snapshot().providerCalls).toEqual({ quiz: 1 });
    expect(observability.traces.list().map(e => [e.component, e.action, e.details])).toEqual([
      ["ContentProvider", "quiz", { outcome: "failed", message: "Content generation requires OPENAI_API_KEY" }],
    ]);
  });

  it("traces successful calls made during a request", async () => {
    const inner = createProvider();
    inner.farewell.mockResolvedValue("Bye, Alex!");
    const provider = new InstrumentedContentProvider(inner, observability);

    await observability.traces.run(() =>
      provider.farewell({ studentName: "Alex", totalQuestions: 4, accuracy: 75 })
    );

    expect(observability.traces.list("trace-1").map(e => [e.action, e.details])).toEqual([
      ["farewell", { outcome: "ok" }],
    ]);
  });
});

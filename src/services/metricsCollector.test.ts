import { MetricsCollector } from "./metricsCollector";

describe("MetricsCollector", () => {
  let clock: number;
  let metrics: MetricsCollector;

  beforeEach(() => {
    clock = 1_000_000;
    metrics = new MetricsCollector(() => clock);
  });

  it("starts empty", () => {
    expect(metrics.snapshot()).toEqual({
      uptimeSeconds: 0,
      requests: {},
      errors: {},
      latencies: {},
      providerCalls: {},
    });
  });

  it("counts requests and errors per name", () => {
    metrics.recordRequest("next_activity");
    metrics.recordRequest("next_activity");
    metrics.recordRequest("start_session");
    metrics.recordError("next_activity_error");

    const snapshot = metrics.snapshot();

    expect(snapshot.requests).toEqual({ next_activity: 2, start_session: 1 });
    expect(snapshot.errors).toEqual({ next_activity_error: 1 });
  });

  it("aggregates latencies", () => {
    metrics.recordLatency("submit_math_answer", 10);
    metrics.recordLatency("submit_math_answer", 25);

    expect(metrics.snapshot().latencies).toEqual({
      submit_math_answer: { count: 2, averageMs: 18, maxMs: 25 },
    });
  });

  it("reports uptime in whole seconds", () => {
    clock += 90_500;

    expect(metrics.snapshot().uptimeSeconds).toBe(90);
  });

  it("counts content provider calls per method", () => {
    metrics.recordProviderCall("funFact");
    metrics.recordProviderCall("drillQuestion");
    metrics.recordProviderCall("funFact");

    expect(metrics.snapshot().providerCalls).toEqual({ funFact: 2, drillQuestion: 1 });
  });
});

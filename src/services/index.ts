/**
 * Services Index
 *
 * Builds the tutor's object graph from configuration.
 */

import { TutorConfig, loadConfig } from "../config";
import { ActivityScheduler } from "../domain/activityScheduler";
import { ContentProvider } from "../domain/contentProvider";
import { LLMContentProvider } from "../domain/llmContentProvider";
import { UnavailableContentProvider } from "../domain/unavailableContentProvider";
import { SessionLocks } from "../stores/sessionLocks";
import { SessionStore } from "../stores/sessionStore";
import { SessionController } from "./sessionController";
import { InstrumentedContentProvider } from "./instrumentedContentProvider";
import { Observability, defaultObservability } from "./observability";

export { SessionController } from "./sessionController";
export type {
  StartResult,
  MathAnswerResult,
  QuizAnswerResult,
  ProgressReport,
  StatusResult,
  EndResult,
  QuizAnswerInput,
  ControllerOptions,
} from "./sessionController";
export { MetricsCollector, metricsCollector } from "./metricsCollector";
export type { MetricsSnapshot, LatencyStats } from "./metricsCollector";
export { TraceRecorder, traceRecorder } from "./traceRecorder";
export type { TraceEvent } from "./traceRecorder";
export { InstrumentedContentProvider } from "./instrumentedContentProvider";
export { defaultObservability } from "./observability";
export type { Observability } from "./observability";

export interface Tutor {
  config: TutorConfig;
  store: SessionStore;
  provider: ContentProvider;
  scheduler: ActivityScheduler;
  controller: SessionController;
  observability: Observability;
}

/**
 * Use the OpenAI provider when an API key is configured.
 */
export function createContentProvider(config: TutorConfig): ContentProvider {
  if (config.openai.apiKey) {
    return new LLMContentProvider({
      apiKey: config.openai.apiKey,
      model: config.openai.model,
      timeoutMs: config.openai.timeoutMs,
      maxRetries: config.openai.maxRetries,
    });
  }
  console.log("No OPENAI_API_KEY found - drills and messages will use templates, facts and quizzes are unavailable");
  return new UnavailableContentProvider("Content generation requires OPENAI_API_KEY");
}

/**
 * Build the tutor. Every provider call is counted and traced through
 * `observability`.
 */
export function createTutor(
  config: TutorConfig = loadConfig(),
  baseProvider: ContentProvider = createContentProvider(config),
  observability: Observability = defaultObservability
): Tutor {
  const provider = new InstrumentedContentProvider(baseProvider, observability);
  const store = new SessionStore(config.dataDir);
  const scheduler = new ActivityScheduler(store, provider, config.scheduler);
  const controller = new SessionController(
    store,
    scheduler,
    provider,
    {
      bonusFactChance: config.bonusFactChance,
      weakAreaLimit: config.scheduler.weakAreaLimit,
      weakAreaThreshold: config.scheduler.weakAreaThreshold,
      traces: observability.traces,
    },
    new SessionLocks()
  );

  return { config, store, provider, scheduler, controller, observability };
}

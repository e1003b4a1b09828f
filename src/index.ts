export * from "./domain/session";
export * from "./domain/activity";
export * from "./domain/errors";
export * from "./domain/performance";
export * from "./domain/sessionLifecycle";
export * from "./domain/contentProvider";
export { ActivityScheduler, advanceSchedule } from "./domain/activityScheduler";
export type { ActivityPlan, PlanOptions, SchedulerOptions } from "./domain/activityScheduler";
export { LLMContentProvider } from "./domain/llmContentProvider";
export type { LLMContentProviderOptions } from "./domain/llmContentProvider";
export { UnavailableContentProvider } from "./domain/unavailableContentProvider";
export { SessionStore } from "./stores/sessionStore";
export { SessionLocks } from "./stores/sessionLocks";
export * from "./services";
export { DEFAULT_CONFIG, loadConfig } from "./config";
export type { TutorConfig } from "./config";
export { createApp } from "./api/app";

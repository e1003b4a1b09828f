/**
 * Request tracing: every API request gets a trace id, and the components it
 * passes through (API, Controller, Scheduler, ContentProvider) record what
 * they did under that id. Recent events are kept in memory and served at
 * GET /api/traces.
 *
 * The current trace id travels with the async call chain, so components
 * record events without having the id passed to them.
 */

import { AsyncLocalStorage } from "async_hooks";
import { randomUUID } from "crypto";

export interface TraceEvent {
  timestamp: string;
  traceId: string;
  component: string;
  action: string;
  details: Record<string, unknown>;
}

export const DEFAULT_MAX_TRACE_EVENTS = 1000;

export class TraceRecorder {
  private events: TraceEvent[] = [];
  private context = new AsyncLocalStorage<string>();

  constructor(
    private maxEvents: number = DEFAULT_MAX_TRACE_EVENTS,
    private now: () => Date = () => new Date(),
    private newId: () => string = randomUUID
  ) {}

  /**
   * Run `fn` under a fresh trace id, or under `traceId` when given.
   */
  run<T>(fn: (traceId: string) => T, traceId: string = this.newId()): T {
    return this.context.run(traceId, () => fn(traceId));
  }

  currentTraceId(): string | undefined {
    return this.context.getStore();
  }

  /**
   * Record an event under the current trace. Outside a trace (the CLI,
   * background work) nothing is recorded.
   */
  record(component: string, action: string, details: Record<string, unknown> = {}): void {
    const traceId = this.currentTraceId();
    if (!traceId) {
      return;
    }

    this.events.push({
      timestamp: this.now().toISOString(),
      traceId,
      component,
      action,
      details,
    });
    if (this.events.length > this.maxEvents) {
      this.events.splice(0, this.events.length - this.maxEvents);
    }
    console.log(`[Trace:${traceId}] [${component}] ${action}`);
  }

  /**
   * Recorded events, oldest first; only one trace's when `traceId` is given.
   */
  list(traceId?: string): TraceEvent[] {
    const events = traceId ? this.events.filter(e => e.traceId === traceId) : this.events;
    return events.map(e => ({ ...e, details: { ...e.details } }));
  }
}

export const traceRecorder = new TraceRecorder();

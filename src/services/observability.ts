import { MetricsCollector, metricsCollector } from "./metricsCollector";
import { TraceRecorder, traceRecorder } from "./traceRecorder";

/**
 * Metrics and traces travel together from the object graph to the routes.
 */
export interface Observability {
  metrics: MetricsCollector;
  traces: TraceRecorder;
}

export const defaultObservability: Observability = {
  metrics: metricsCollector,
  traces: traceRecorder,
};

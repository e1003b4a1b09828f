/**
 * In-process metrics for the API: request and error counts per endpoint,
 * latency aggregates and content-provider calls per method.
 */

export interface LatencyStats {
  count: number;
  averageMs: number;
  maxMs: number;
}

export interface MetricsSnapshot {
  uptimeSeconds: number;
  requests: Record<string, number>;
  errors: Record<string, number>;
  latencies: Record<string, LatencyStats>;
  providerCalls: Record<string, number>;
}

interface LatencyTotals {
  count: number;
  totalMs: number;
  maxMs: number;
}

export class MetricsCollector {
  private requests = new Map<string, number>();
  private errors = new Map<string, number>();
  private latencies = new Map<string, LatencyTotals>();
  private providerCalls = new Map<string, number>();
  private startedAt: number;

  constructor(private now: () => number = () => Date.now()) {
    this.startedAt = now();
  }

  recordRequest(endpoint: string): void {
    this.requests.set(endpoint, (this.requests.get(endpoint) ?? 0) + 1);
  }

  recordError(errorType: string): void {
    this.errors.set(errorType, (this.errors.get(errorType) ?? 0) + 1);
  }

  recordLatency(operation: string, durationMs: number): void {
    const totals = this.latencies.get(operation) ?? { count: 0, totalMs: 0, maxMs: 0 };
    totals.count++;
    totals.totalMs += durationMs;
    totals.maxMs = Math.max(totals.maxMs, durationMs);
    this.latencies.set(operation, totals);
  }

  recordProviderCall(method: string): void {
    this.providerCalls.set(method, (this.providerCalls.get(method) ?? 0) + 1);
  }

  snapshot(): MetricsSnapshot {
    const latencies: Record<string, LatencyStats> = {};
    for (const [operation, totals] of this.latencies) {
      latencies[operation] = {
        count: totals.count,
        averageMs: Math.round(totals.totalMs / totals.count),
        maxMs: totals.maxMs,
      };
    }

    return {
      uptimeSeconds: Math.floor((this.now() - this.startedAt) / 1000),
      requests: Object.fromEntries(this.requests),
      errors: Object.fromEntries(this.errors),
      latencies,
      providerCalls: Object.fromEntries(this.providerCalls),
    };
  }
}

export const metricsCollector = new MetricsCollector();

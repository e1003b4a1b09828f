import { RequestHandler, Response } from "express";
import { ErrorCodes, TutorError, ValidationError } from "../domain/errors";
import { Observability } from "../services/observability";

export interface ApiErrorBody {
  error: {
    code: string;
    message: string;
  };
}

/**
 * Send an error in the API's standard shape. Tutor errors keep their code
 * and status; anything else is logged and reported as a 500.
 */
export function sendError(res: Response, error: unknown, context: string): void {
  if (error instanceof TutorError) {
    const body: ApiErrorBody = { error: { code: error.code, message: error.message } };
    res.status(error.statusCode).json(body);
    return;
  }

  console.error(`[API] Error in ${context}:`, error);
  const body: ApiErrorBody = {
    error: { code: ErrorCodes.INTERNAL_ERROR, message: `Failed to ${context.replace(/_/g, " ")}` },
  };
  res.status(500).json(body);
}

export const TRACE_HEADER = "X-Trace-Id";

/**
 * Wrap a route handler: give the request a trace id, count it, time it and
 * turn thrown errors into error responses. The trace records the route, its
 * parameters and how it ended.
 */
export function handle(
  name: string,
  observability: Observability,
  handler: (...args: Parameters<RequestHandler>) => Promise<void> | void
): RequestHandler {
  const { metrics, traces } = observability;

  return (req, res, next) => traces.run(async (traceId) => {
    const startedAt = Date.now();
    metrics.recordRequest(name);
    res.setHeader(TRACE_HEADER, traceId);
    traces.record("API", name, { ...req.params });
    try {
      await handler(req, res, next);
      traces.record("API", `${name}_completed`);
    } catch (error) {
      metrics.recordError(`${name}_error`);
      traces.record("API", `${name}_failed`, {
        code: error instanceof TutorError ? error.code : ErrorCodes.INTERNAL_ERROR,
      });
      sendError(res, error, name);
    } finally {
      metrics.recordLatency(name, Date.now() - startedAt);
    }
  });
}

// ============================================
// Body validation
// ============================================

export function bodyOf(body: unknown): Record<string, unknown> {
  if (typeof body !== "object" || body === null || Array.isArray(body)) {
    return {};
  }
  return Object.fromEntries(Object.entries(body));
}

export function requireString(body: Record<string, unknown>, field: string): string {
  const value = body[field];
  if (typeof value !== "string" || value.trim() === "") {
    throw new ValidationError(`${field} is required`);
  }
  return value;
}

export function optionalString(body: Record<string, unknown>, field: string): string | undefined {
  const value = body[field];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== "string") {
    throw new ValidationError(`${field} must be a string`);
  }
  return value;
}

/**
 * Accept a number or a numeric string.
 */
export function requireNumber(body: Record<string, unknown>, field: string): number {
  const value = body[field];
  if (typeof value === "number") {
    return value;
  }
  if (typeof value === "string" && value.trim() !== "" && Number.isFinite(Number(value))) {
    return Number(value);
  }
  throw new ValidationError(`${field} must be a number`);
}

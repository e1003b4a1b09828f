import { Router } from "express";
import { TraceRecorder } from "../../services/traceRecorder";
import { ValidationError } from "../../domain/errors";
import { sendError } from "../respond";

// Not wrapped in handle(): reading traces does not start a trace of its own.
export function createTracesRouter(traces: TraceRecorder): Router {
  const router = Router();

  // GET /api/traces?traceId=... - Recent trace events, optionally for one request
  router.get("/", (req, res) => {
    const { traceId } = req.query;
    if (traceId !== undefined && typeof traceId !== "string") {
      sendError(res, new ValidationError("traceId must be a string"), "list_traces");
      return;
    }
    res.json({ traces: traces.list(traceId) });
  });

  return router;
}

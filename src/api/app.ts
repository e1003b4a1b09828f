import express, { ErrorRequestHandler, Express } from "express";
import cors from "cors";
import { SessionController } from "../services/sessionController";
import { Observability } from "../services/observability";
import { createSessionsRouter } from "./routes/sessions";
import { createAnswersRouter } from "./routes/answers";
import { createTracesRouter } from "./routes/traces";
import { sendError } from "./respond";
import { ValidationError } from "../domain/errors";

function isBodyParseError(error: unknown): boolean {
  return typeof error === "object" && error !== null && "type" in error && error.type === "entity.parse.failed";
}

// Errors raised before a route runs, such as malformed JSON bodies.
const handleUncaught: ErrorRequestHandler = (error, req, res, next) => {
  if (res.headersSent) {
    next(error);
    return;
  }
  const reported = isBodyParseError(error) ? new ValidationError("Request body must be valid JSON") : error;
  sendError(res, reported, "handle_request");
};

export function createApp(controller: SessionController, observability: Observability): Express {
  const app = express();

  // Middleware
  app.use(cors({
    origin: ["http://localhost:5173", "http://localhost:3000"],
    credentials: true,
  }));
  app.use(express.json());

  // Routes
  app.use("/api/sessions", createSessionsRouter(controller, observability));
  app.use("/api/answers", createAnswersRouter(controller, observability));
  app.use("/api/traces", createTracesRouter(observability.traces));

  // Health check
  app.get("/api/health", (req, res) => {
    res.json({ status: "ok", timestamp: new Date().toISOString() });
  });

  app.get("/api/metrics", (req, res) => {
    res.json(observability.metrics.snapshot());
  });

  app.use(handleUncaught);

  return app;
}

import { Router } from "express";
import { SessionController } from "../../services/sessionController";
import { Observability } from "../../services/observability";
import { ValidationError } from "../../domain/errors";
import { Session } from "../../domain/session";
import { bodyOf, handle, optionalString, requireNumber, requireString } from "../respond";

/**
 * Summary row for session listings; the full record is at GET /:id.
 */
function summarize(session: Session) {
  return {
    id: session.id,
    studentName: session.studentName,
    maxFactFamily: session.maxFactFamily,
    status: session.status,
    createdAt: session.createdAt,
    lastActivityAt: session.lastActivityAt,
    totalQuestions: session.history.length,
  };
}

export function createSessionsRouter(controller: SessionController, observability: Observability): Router {
  const router = Router();

  // POST /api/sessions - Start a new practice session
  router.post("/", handle("start_session", observability, async (req, res) => {
    const body = bodyOf(req.body);
    const studentName = requireString(body, "studentName");
    const maxFactFamily = requireNumber(body, "maxFactFamily");

    const result = await controller.start(studentName, maxFactFamily);
    res.status(201).json(result);
  }));

  // GET /api/sessions - List sessions (optionally filter by status)
  router.get("/", handle("list_sessions", observability, (req, res) => {
    const { status } = req.query;
    let sessions = controller.listSessions();
    if (status === "active" || status === "paused" || status === "ended") {
      sessions = sessions.filter(s => s.status === status);
    } else if (status !== undefined) {
      throw new ValidationError("status must be active, paused or ended");
    }
    res.json(sessions.map(summarize));
  }));

  // GET /api/sessions/:id - Full session record
  router.get("/:id", handle("get_session", observability, (req, res) => {
    res.json(controller.getSession(req.params.id));
  }));

  // GET /api/sessions/:id/progress - Progress report (any state)
  router.get("/:id/progress", handle("get_progress", observability, async (req, res) => {
    res.json(await controller.progress(req.params.id));
  }));

  // POST /api/sessions/:id/pause
  router.post("/:id/pause", handle("pause_session", observability, async (req, res) => {
    res.json(await controller.pause(req.params.id));
  }));

  // POST /api/sessions/:id/resume
  router.post("/:id/resume", handle("resume_session", observability, async (req, res) => {
    res.json(await controller.resume(req.params.id));
  }));

  // POST /api/sessions/:id/end
  router.post("/:id/end", handle("end_session", observability, async (req, res) => {
    res.json(await controller.end(req.params.id));
  }));

  // POST /api/sessions/:id/activities/next - Next drill, fact or quiz
  // Body { "kind": "math_drill" } asks for a drill even when a break is due.
  router.post("/:id/activities/next", handle("next_activity", observability, async (req, res) => {
    const kind = optionalString(bodyOf(req.body), "kind");
    if (kind !== undefined && kind !== "math_drill") {
      throw new ValidationError("kind must be math_drill when given");
    }
    res.json(await controller.nextActivity(req.params.id, { drillOnly: kind === "math_drill" }));
  }));

  // POST /api/sessions/:id/answers/math - Answer the current drill
  router.post("/:id/answers/math", handle("submit_math_answer", observability, async (req, res) => {
    const body = bodyOf(req.body);
    const answer = body.answer;
    if (typeof answer !== "string" && typeof answer !== "number") {
      throw new ValidationError("answer is required");
    }
    const activityId = optionalString(body, "activityId");

    res.json(await controller.submitMathAnswer(req.params.id, answer, activityId));
  }));

  return router;
}

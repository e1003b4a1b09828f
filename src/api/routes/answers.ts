import { Router } from "express";
import { SessionController, QuizAnswerInput } from "../../services/sessionController";
import { Observability } from "../../services/observability";
import { ValidationError } from "../../domain/errors";
import { bodyOf, handle, optionalString, requireString } from "../respond";

function parseQuizEcho(value: unknown, keyRequired: boolean): QuizAnswerInput {
  const quiz = bodyOf(value);
  return {
    correctAnswer: keyRequired
      ? requireString(quiz, "correctAnswer")
      : optionalString(quiz, "correctAnswer") ?? "",
    id: optionalString(quiz, "id"),
    category: optionalString(quiz, "category"),
    explanation: optionalString(quiz, "explanation"),
  };
}

export function createAnswersRouter(controller: SessionController, observability: Observability): Router {
  const router = Router();

  // POST /api/answers/quiz - Answer a quiz
  // With sessionId the served quiz is graded and recorded; otherwise the echoed quiz is graded.
  router.post("/quiz", handle("submit_quiz_answer", observability, async (req, res) => {
    const body = bodyOf(req.body);
    const answer = requireString(body, "answer");
    const sessionId = optionalString(body, "sessionId");

    if (!sessionId && body.quiz === undefined) {
      throw new ValidationError("quiz is required when no sessionId is given");
    }
    const quiz = parseQuizEcho(body.quiz, !sessionId);

    res.json(await controller.submitQuizAnswer(quiz, answer, sessionId));
  }));

  return router;
}

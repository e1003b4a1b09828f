import {
  DrillFeedbackRequest,
  FarewellRequest,
  ProgressSummaryRequest,
  QuizFeedbackRequest,
} from "./contentProvider";

/**
 * Templated text used when the content provider cannot be reached.
 * Only cosmetic text has a template; facts and quizzes do not.
 */

export function drillQuestion(factorA: number, factorB: number): string {
  return `What is ${factorA} × ${factorB}?`;
}

export function welcomeMessage(studentName: string, maxFactFamily: number): string {
  return `Hi ${studentName}! Let's practice the times tables up to ${maxFactFamily} and discover some fun facts along the way!`;
}

export function drillFeedback(request: DrillFeedbackRequest): string {
  if (request.correct) {
    return `Great job, ${request.studentName}! That's right!`;
  }
  return `Nice try! The answer is ${request.expectedAnswer}. You'll get it next time!`;
}

export function quizFeedback(request: QuizFeedbackRequest): string {
  if (request.correct) {
    return "You got it! Awesome!";
  }
  return `Good guess! The correct answer was ${request.correctAnswer}.`;
}

export function progressSummary(request: ProgressSummaryRequest): string {
  if (request.totalQuestions === 0) {
    return `${request.studentName}, you're just getting started. Let's answer some questions!`;
  }
  const practice = request.weakAreas.length > 0
    ? ` Let's keep practicing the ${request.weakAreas.join(", ")} times tables.`
    : "";
  return `${request.studentName}, you've answered ${request.totalQuestions} questions with ${request.accuracy.toFixed(1)}% accuracy.${practice}`;
}

export function farewell(request: FarewellRequest): string {
  return `Well done, ${request.studentName}! You answered ${request.totalQuestions} questions today. Come back soon!`;
}

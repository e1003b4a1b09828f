/**
 * Contract with the generative content collaborator.
 *
 * The tutor only relies on the shape of what comes back, never on its
 * wording. Every method may be slow and may reject with CollaboratorError.
 */

export interface FunFactContent {
  category: string;
  content: string;
}

export interface NumberFactContent {
  number: number;
  content: string;
}

export interface QuizContent {
  category: string;
  question: string;
  options: Record<string, string>;
  correctAnswer: string;
  explanation: string;
}

export interface DrillFeedbackRequest {
  studentName: string;
  correct: boolean;
  factFamily: number;
  expectedAnswer: number;
}

export interface QuizFeedbackRequest {
  correct: boolean;
  correctAnswer: string;
}

export interface ProgressSummaryRequest {
  studentName: string;
  totalQuestions: number;
  accuracy: number; // percentage
  weakAreas: number[];
}

export interface FarewellRequest {
  studentName: string;
  totalQuestions: number;
  accuracy: number; // percentage
}

export interface ContentProvider {
  welcomeMessage(studentName: string, maxFactFamily: number): Promise<string>;
  drillQuestion(factorA: number, factorB: number): Promise<string>;
  drillFeedback(request: DrillFeedbackRequest): Promise<string>;
  funFact(category: string): Promise<FunFactContent>;
  numberFact(value: number): Promise<NumberFactContent>;
  quiz(category: string): Promise<QuizContent>;
  quizFeedback(request: QuizFeedbackRequest): Promise<string>;
  progressSummary(request: ProgressSummaryRequest): Promise<string>;
  farewell(request: FarewellRequest): Promise<string>;
}

export const FACT_CATEGORIES = [
  "animals",
  "space",
  "dinosaurs",
  "oceans",
  "nature",
  "inventions",
  "sports",
  "food",
  "countries",
] as const;

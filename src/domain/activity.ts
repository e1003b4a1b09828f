/**
 * Activities are the units of content served to a learner.
 * Each variant carries only the fields that matter for it.
 */

export interface MathDrill {
  type: "math_drill";
  id: string;
  question: string;
  factorA: number;
  factorB: number;
  expectedAnswer: number;
  targeted: boolean; // factorA was picked from the weak areas
  generated: boolean; // false when the templated question was used
}

export interface FunFact {
  type: "fact";
  id: string;
  category: string;
  content: string;
}

export interface NumberFact {
  type: "number_fact";
  id: string;
  number: number;
  content: string;
}

export interface Quiz {
  type: "quiz";
  id: string;
  category: string;
  question: string;
  options: Record<string, string>;
  correctAnswer: string;
  explanation: string;
}

export type ActivitySpec = MathDrill | FunFact | NumberFact | Quiz;

export type BreakActivity = Exclude<ActivitySpec, MathDrill>;

export function isBreak(activity: ActivitySpec): activity is BreakActivity {
  return activity.type !== "math_drill";
}

const INTEGER_PATTERN = /^[+-]?\d+$/;

/**
 * Parse a submitted drill answer. Integers (or integer strings, surrounding
 * whitespace allowed) come back as numbers; anything else is returned as the
 * raw string and will be graded incorrect.
 */
export function parseMathAnswer(raw: string | number): number | string {
  if (typeof raw === "number") {
    return Number.isInteger(raw) ? raw : String(raw);
  }
  const trimmed = raw.trim();
  if (INTEGER_PATTERN.test(trimmed)) {
    return parseInt(trimmed, 10);
  }
  return raw;
}

export function isCorrectMathAnswer(drill: MathDrill, submitted: number | string): boolean {
  return typeof submitted === "number" && submitted === drill.expectedAnswer;
}

/**
 * Quiz answers are option keys ("A".."D"), compared case-insensitively.
 */
export function normalizeQuizKey(answer: string): string {
  return answer.trim().toUpperCase();
}

export function isCorrectQuizAnswer(quiz: Pick<Quiz, "correctAnswer">, answer: string): boolean {
  const expected = normalizeQuizKey(quiz.correctAnswer);
  return expected.length > 0 && normalizeQuizKey(answer) === expected;
}

import OpenAI from "openai";
import {
  ContentProvider,
  DrillFeedbackRequest,
  FarewellRequest,
  FunFactContent,
  NumberFactContent,
  ProgressSummaryRequest,
  QuizContent,
  QuizFeedbackRequest,
} from "./contentProvider";
import { CollaboratorError } from "./errors";
import { normalizeQuizKey } from "./activity";

export interface LLMContentProviderOptions {
  apiKey?: string;
  model?: string;
  timeoutMs?: number;
  maxRetries?: number;
}

// Structured payloads get one more request when the first one is malformed.
const STRUCTURED_ATTEMPTS = 2;

const AUDIENCE = "a child aged 5-10";

const TUTOR_SYSTEM_PROMPT = `You are a warm, playful math tutor for ${AUDIENCE} who is practicing times tables.
Use simple words and short sentences. Never be discouraging.`;

const FACTS_SYSTEM_PROMPT = `You share amazing, true facts with ${AUDIENCE}.
Use simple words, keep it short and make it exciting. Respond only with valid JSON.`;

type JsonObject = Record<string, unknown>;

function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function nonEmptyString(value: unknown): string | null {
  return typeof value === "string" && value.trim().length > 0 ? value.trim() : null;
}

/**
 * LLMContentProvider asks OpenAI for question wording, feedback and trivia.
 *
 * Free text (welcome, feedback, summaries) is returned trimmed. Facts and
 * quizzes are requested as JSON and checked for the fields the tutor needs;
 * a payload missing them is re-requested once before giving up.
 */
export class LLMContentProvider implements ContentProvider {
  private client: OpenAI;
  private model: string;

  constructor(options: LLMContentProviderOptions = {}) {
    this.client = new OpenAI({
      apiKey: options.apiKey || process.env.OPENAI_API_KEY,
      timeout: options.timeoutMs ?? 20000,
      maxRetries: options.maxRetries ?? 1,
    });
    this.model = options.model || "gpt-4o-mini";
  }

  async welcomeMessage(studentName: string, maxFactFamily: number): Promise<string> {
    return this.completeText(
      TUTOR_SYSTEM_PROMPT,
      `Write a warm, enthusiastic welcome for ${studentName}, who is starting to practice times tables up to ${maxFactFamily}.
Mention that we'll do math AND fun facts together. 2-3 sentences. Return ONLY the message.`
    );
  }

  async drillQuestion(factorA: number, factorB: number): Promise<string> {
    return this.completeText(
      TUTOR_SYSTEM_PROMPT,
      `Write a fun, short word problem for ${factorA} x ${factorB}.
For example: "If you have ${factorA} baskets with ${factorB} apples in each, how many apples do you have?"
Do not include the answer. Return ONLY the question.`
    );
  }

  async drillFeedback(request: DrillFeedbackRequest): Promise<string> {
    const userPrompt = request.correct
      ? `${request.studentName} just answered ${request.expectedAnswer} correctly on the ${request.factFamily} times table.
Write a short, enthusiastic praise. 1-2 sentences.`
      : `${request.studentName} got a ${request.factFamily} times table question wrong. The correct answer was ${request.expectedAnswer}.
Write a short, gentle message that shares the answer without making them feel bad. 1-2 sentences.`;

    return this.completeText(TUTOR_SYSTEM_PROMPT, userPrompt);
  }

  async funFact(category: string): Promise<FunFactContent> {
    return this.completeStructured(
      FACTS_SYSTEM_PROMPT,
      `Share a fascinating fun fact about ${category}. Include a surprising detail or number if you can. 2-3 sentences.
Respond with JSON: { "fact": "<the fact>" }`,
      (payload) => {
        const content = nonEmptyString(payload.fact);
        return content ? { category, content } : null;
      },
      `fun fact about ${category}`
    );
  }

  async numberFact(value: number): Promise<NumberFactContent> {
    return this.completeStructured(
      FACTS_SYSTEM_PROMPT,
      `Share a fun fact about the number ${value}: where it shows up in nature, sports, history or a cool math pattern. 2-3 sentences.
Respond with JSON: { "fact": "<the fact>" }`,
      (payload) => {
        const content = nonEmptyString(payload.fact);
        return content ? { number: value, content } : null;
      },
      `number fact about ${value}`
    );
  }

  async quiz(category: string): Promise<QuizContent> {
    return this.completeStructured(
      FACTS_SYSTEM_PROMPT,
      `Create a simple multiple-choice quiz question about ${category} with four options A-D.
Exactly one option is correct; the others are plausible but clearly wrong.
Respond with JSON:
{
  "question": "<the question>",
  "options": { "A": "...", "B": "...", "C": "...", "D": "..." },
  "correctAnswer": "<A, B, C or D>",
  "explanation": "<one sentence why>"
}`,
      (payload) => parseQuiz(category, payload),
      `quiz about ${category}`
    );
  }

  async quizFeedback(request: QuizFeedbackRequest): Promise<string> {
    const userPrompt = request.correct
      ? "The child got a quiz question right! Write one short, fun cheer."
      : `The child got a quiz question wrong. Kindly tell them the correct answer was ${request.correctAnswer}. One sentence.`;

    return this.completeText(TUTOR_SYSTEM_PROMPT, userPrompt);
  }

  async progressSummary(request: ProgressSummaryRequest): Promise<string> {
    const practice = request.weakAreas.length > 0
      ? request.weakAreas.map(n => `the ${n} times table`).join(", ")
      : "None yet!";

    return this.completeText(
      TUTOR_SYSTEM_PROMPT,
      `Write a brief, encouraging progress summary for ${request.studentName}.
Questions answered: ${request.totalQuestions}
Accuracy: ${request.accuracy.toFixed(1)}%
Areas to practice: ${practice}
Keep it positive. 2-3 sentences.`
    );
  }

  async farewell(request: FarewellRequest): Promise<string> {
    return this.completeText(
      TUTOR_SYSTEM_PROMPT,
      `${request.studentName} just finished a times table practice session.
Questions answered: ${request.totalQuestions}
Accuracy: ${request.accuracy.toFixed(1)}%
Write a proud, warm goodbye that invites them back, positive regardless of the score. 2-3 sentences.`
    );
  }

  private async completeText(systemPrompt: string, userPrompt: string): Promise<string> {
    const content = await this.complete(systemPrompt, userPrompt, false);
    return content.trim();
  }

  private async completeStructured<T>(
    systemPrompt: string,
    userPrompt: string,
    parse: (payload: JsonObject) => T | null,
    description: string
  ): Promise<T> {
    for (let attempt = 1; attempt <= STRUCTURED_ATTEMPTS; attempt++) {
      const content = await this.complete(systemPrompt, userPrompt, true);

      let payload: unknown;
      try {
        payload = JSON.parse(content);
      } catch {
        console.warn(`[ContentProvider] Invalid JSON for ${description} (attempt ${attempt})`);
        continue;
      }

      const parsed = isJsonObject(payload) ? parse(payload) : null;
      if (parsed) {
        return parsed;
      }
      console.warn(`[ContentProvider] Incomplete ${description} (attempt ${attempt})`);
    }

    throw new CollaboratorError(`Could not generate a ${description}`);
  }

  private async complete(systemPrompt: string, userPrompt: string, json: boolean): Promise<string> {
    let content: string | null | undefined;
    try {
      const completion = await this.client.chat.completions.create({
        model: this.model,
        messages: [
          { role: "system", content: systemPrompt },
          { role: "user", content: userPrompt },
        ],
        temperature: 0.8,
        ...(json ? { response_format: { type: "json_object" as const } } : {}),
      });
      content = completion.choices[0]?.message?.content;
    } catch (error) {
      console.error("[ContentProvider] OpenAI request failed:", error);
      throw new CollaboratorError("Content generation failed", error);
    }

    if (!content) {
      throw new CollaboratorError("No response from content generator");
    }
    return content;
  }
}

function parseQuiz(category: string, payload: JsonObject): QuizContent | null {
  const question = nonEmptyString(payload.question);
  const correctAnswer = typeof payload.correctAnswer === "string"
    ? normalizeQuizKey(payload.correctAnswer)
    : "";
  if (!question || !isJsonObject(payload.options)) {
    return null;
  }

  const options: Record<string, string> = {};
  for (const [key, text] of Object.entries(payload.options)) {
    const optionText = nonEmptyString(text);
    if (optionText) {
      options[normalizeQuizKey(key)] = optionText;
    }
  }

  if (Object.keys(options).length < 2 || !(correctAnswer in options)) {
    return null;
  }

  return {
    category,
    question,
    options,
    correctAnswer,
    explanation: nonEmptyString(payload.explanation) ?? "",
  };
}

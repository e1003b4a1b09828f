import {
  ContentProvider,
  DrillFeedbackRequest,
  FarewellRequest,
  FunFactContent,
  NumberFactContent,
  ProgressSummaryRequest,
  QuizContent,
  QuizFeedbackRequest,
} from "../domain/contentProvider";
import { Observability } from "./observability";

type ProviderMethod = keyof ContentProvider;

/**
 * Wraps a ContentProvider to count its calls per method and trace their
 * outcome. Results and errors pass through unchanged.
 */
export class InstrumentedContentProvider implements ContentProvider {
  constructor(private inner: ContentProvider, private observability: Observability) {}

  welcomeMessage(studentName: string, maxFactFamily: number): Promise<string> {
    return this.call("welcomeMessage", () => this.inner.welcomeMessage(studentName, maxFactFamily));
  }

  drillQuestion(factorA: number, factorB: number): Promise<string> {
    return this.call("drillQuestion", () => this.inner.drillQuestion(factorA, factorB));
  }

  drillFeedback(request: DrillFeedbackRequest): Promise<string> {
    return this.call("drillFeedback", () => this.inner.drillFeedback(request));
  }

  funFact(category: string): Promise<FunFactContent> {
    return this.call("funFact", () => this.inner.funFact(category));
  }

  numberFact(value: number): Promise<NumberFactContent> {
    return this.call("numberFact", () => this.inner.numberFact(value));
  }

  quiz(category: string): Promise<QuizContent> {
    return this.call("quiz", () => this.inner.quiz(category));
  }

  quizFeedback(request: QuizFeedbackRequest): Promise<string> {
    return this.call("quizFeedback", () => this.inner.quizFeedback(request));
  }

  progressSummary(request: ProgressSummaryRequest): Promise<string> {
    return this.call("progressSummary", () => this.inner.progressSummary(request));
  }

  farewell(request: FarewellRequest): Promise<string> {
    return this.call("farewell", () => this.inner.farewell(request));
  }

  private async call<T>(method: ProviderMethod, request: () => Promise<T>): Promise<T> {
    const { metrics, traces } = this.observability;
    metrics.recordProviderCall(method);
    try {
      const result = await request();
      traces.record("ContentProvider", method, { outcome: "ok" });
      return result;
    } catch (error) {
      traces.record("ContentProvider", method, {
        outcome: "failed",
        message: error instanceof Error ? error.message : String(error),
      });
      throw error;
    }
  }
}

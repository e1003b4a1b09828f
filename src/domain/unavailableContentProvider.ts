import {
  ContentProvider,
  FunFactContent,
  NumberFactContent,
  QuizContent,
} from "./contentProvider";
import { CollaboratorError } from "./errors";

/**
 * Stand-in used when no OPENAI_API_KEY is configured.
 * Every request fails, so drills and messages use their templates while
 * facts and quizzes report that content generation is unavailable.
 */
export class UnavailableContentProvider implements ContentProvider {
  constructor(private reason: string = "Content generation is not configured") {}

  async welcomeMessage(): Promise<string> {
    throw this.unavailable();
  }

  async drillQuestion(): Promise<string> {
    throw this.unavailable();
  }

  async drillFeedback(): Promise<string> {
    throw this.unavailable();
  }

  async funFact(): Promise<FunFactContent> {
    throw this.unavailable();
  }

  async numberFact(): Promise<NumberFactContent> {
    throw this.unavailable();
  }

  async quiz(): Promise<QuizContent> {
    throw this.unavailable();
  }

  async quizFeedback(): Promise<string> {
    throw this.unavailable();
  }

  async progressSummary(): Promise<string> {
    throw this.unavailable();
  }

  async farewell(): Promise<string> {
    throw this.unavailable();
  }

  private unavailable(): CollaboratorError {
    return new CollaboratorError(this.reason);
  }
}

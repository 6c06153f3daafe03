import type { AppConfig } from "../config";
import { log } from "../log";
import { createGeminiCompletion, isGeminiConfigured } from "./gemini";
import { createGroqCompletion, isGroqConfigured } from "./groq";
import { buildKeyPointsPrompt, buildSummaryPrompt, buildTaskExtractionPrompt } from "./prompts";
import { AnalyzerError, parseExtractedTasks, parseKeyPoints, type ExtractedTask } from "./responseParser";
import type { Completion } from "./types";

export { AnalyzerError, type ExtractedTask } from "./responseParser";

export const DEFAULT_SUMMARY_WORDS = 500;
export const DEFAULT_KEY_POINTS = 10;

const SUMMARY_TOKENS = 1024;
const TASK_TOKENS = 2048;

export interface LectureAnalyzer {
  readonly provider: string | null;
  isAvailable(): boolean;
  summarize(text: string, maxWords?: number): Promise<string>;
  extractKeyPoints(text: string, maxPoints?: number): Promise<string[]>;
  extractTasks(text: string): Promise<ExtractedTask[]>;
}

/**
 * Runs the lecture prompts against whichever provider supplied the
 * completion. A null completion makes every call fail with AnalyzerError.
 */
export class CompletionAnalyzer implements LectureAnalyzer {
  constructor(
    readonly provider: string | null,
    private complete: Completion | null,
    private now: () => Date = () => new Date()
  ) {}

  isAvailable(): boolean {
    return this.complete !== null;
  }

  async summarize(text: string, maxWords = DEFAULT_SUMMARY_WORDS): Promise<string> {
    const summary = (await this.run(buildSummaryPrompt(text, maxWords), SUMMARY_TOKENS)).trim();
    if (!summary) {
      throw new AnalyzerError("LLM returned an empty summary");
    }
    return summary;
  }

  async extractKeyPoints(text: string, maxPoints = DEFAULT_KEY_POINTS): Promise<string[]> {
    const content = await this.run(buildKeyPointsPrompt(text, maxPoints), SUMMARY_TOKENS);
    return parseKeyPoints(content, maxPoints);
  }

  async extractTasks(text: string): Promise<ExtractedTask[]> {
    const content = await this.run(buildTaskExtractionPrompt(text, this.now()), TASK_TOKENS);
    return parseExtractedTasks(content);
  }

  private async run(prompt: string, maxTokens: number): Promise<string> {
    if (!this.complete) {
      throw new AnalyzerError("No LLM provider is configured (set GEMINI_API_KEY or GROQ_API_KEY)");
    }
    return this.complete(prompt, { maxTokens });
  }
}

export function createAnalyzer(config: AppConfig): LectureAnalyzer {
  if (isGeminiConfigured(config.gemini)) {
    log(`Using Gemini model ${config.gemini.model}`, "llm");
    return new CompletionAnalyzer("gemini", createGeminiCompletion(config.gemini));
  }
  if (isGroqConfigured(config.groq)) {
    log(`Using Groq model ${config.groq.model}`, "llm");
    return new CompletionAnalyzer("groq", createGroqCompletion(config.groq));
  }
  log("No LLM provider configured; lecture analysis is disabled", "llm");
  return new CompletionAnalyzer(null, null);
}

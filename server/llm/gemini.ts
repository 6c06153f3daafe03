import { GoogleGenerativeAI } from "@google/generative-ai";
import type { AppConfig } from "../config";
import { trackLLMRequest } from "../metrics/counters";
import { RateLimiter } from "./rateLimiter";
import { describeApiFailure, type ApiValidation, type Completion } from "./types";

type GeminiOptions = AppConfig["gemini"];

function getGeminiClient(apiKey: string | undefined): GoogleGenerativeAI {
  if (!apiKey) {
    throw new Error("GEMINI_API_KEY environment variable is not configured");
  }
  return new GoogleGenerativeAI(apiKey);
}

export function isGeminiConfigured(options: GeminiOptions): boolean {
  return !!options.apiKey;
}

export function createGeminiCompletion(
  options: GeminiOptions,
  limiter: RateLimiter = new RateLimiter(options.requestsPerMinute)
): Completion {
  const client = getGeminiClient(options.apiKey);

  return async (prompt, { maxTokens }) => {
    const model = client.getGenerativeModel({
      model: options.model,
      generationConfig: {
        temperature: 0.3,
        topK: 40,
        topP: 0.95,
        maxOutputTokens: maxTokens,
      },
    });

    trackLLMRequest("gemini");
    const result = await limiter.execute(() => model.generateContent(prompt));
    return result.response.text();
  };
}

export async function validateGeminiAPI(options: GeminiOptions): Promise<ApiValidation> {
  if (!isGeminiConfigured(options)) {
    return { valid: false, status: "unconfigured", message: "Gemini API key is not set." };
  }
  try {
    const model = getGeminiClient(options.apiKey).getGenerativeModel({ model: options.model });
    await model.generateContent("test");
    return { valid: true, status: "valid", message: "Gemini API is working." };
  } catch (error) {
    return describeApiFailure("Gemini", error);
  }
}

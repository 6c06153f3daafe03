import Groq from "groq-sdk";
import type { AppConfig } from "../config";
import { trackLLMRequest } from "../metrics/counters";
import { describeApiFailure, type ApiValidation, type Completion } from "./types";

type GroqOptions = AppConfig["groq"];

const SYSTEM_PROMPT =
  "You are a teaching assistant that analyzes classroom lecture transcripts. " +
  "Follow the requested output format exactly.";

let groqClient: Groq | null = null;
let groqClientKey: string | undefined;

function getGroqClient(apiKey: string | undefined): Groq {
  if (!apiKey) {
    throw new Error("GROQ_API_KEY environment variable is not configured");
  }
  if (!groqClient || groqClientKey !== apiKey) {
    groqClient = new Groq({ apiKey });
    groqClientKey = apiKey;
  }
  return groqClient;
}

export function isGroqConfigured(options: GroqOptions): boolean {
  return !!options.apiKey;
}

export function createGroqCompletion(options: GroqOptions): Completion {
  const groq = getGroqClient(options.apiKey);

  return async (prompt, { maxTokens }) => {
    trackLLMRequest("groq");
    const response = await groq.chat.completions.create({
      model: options.model,
      messages: [
        { role: "system", content: SYSTEM_PROMPT },
        { role: "user", content: prompt },
      ],
      temperature: 0.3,
      top_p: 0.95,
      max_tokens: maxTokens,
    });

    return response.choices[0]?.message?.content || "";
  };
}

export async function validateGroqAPI(options: GroqOptions): Promise<ApiValidation> {
  if (!isGroqConfigured(options)) {
    return { valid: false, status: "unconfigured", message: "Groq API key is not set." };
  }
  try {
    await getGroqClient(options.apiKey).chat.completions.create({
      model: options.model,
      messages: [{ role: "user", content: "test" }],
      max_tokens: 1,
    });
    return { valid: true, status: "valid", message: "Groq API is working." };
  } catch (error) {
    return describeApiFailure("Groq", error);
  }
}

export interface CompletionOptions {
  maxTokens: number;
}

/** Sends one prompt to an LLM and returns the raw text of its reply. */
export type Completion = (prompt: string, options: CompletionOptions) => Promise<string>;

export interface ApiValidation {
  valid: boolean;
  status: "valid" | "invalid" | "unconfigured" | "error";
  message: string;
}

export function describeApiFailure(provider: string, error: unknown): ApiValidation {
  const msg = error instanceof Error ? error.message : String(error);
  if (msg.includes("401") || msg.includes("Unauthorized") || msg.includes("API key not valid")) {
    return { valid: false, status: "invalid", message: `${provider} API key is invalid.` };
  }
  return { valid: false, status: "error", message: `${provider} error: ${msg.split("\n")[0]}` };
}

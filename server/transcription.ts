import fetch from "node-fetch";
import type { AppConfig } from "./config";
import { incrementCounter } from "./metrics/counters";

export const TRANSCRIPTION_TIMEOUT_MS = 30_000;

export interface Transcriber {
  isAvailable(): boolean;
  transcribe(audioUrl: string): Promise<string>;
}

export class TranscriptionError extends Error {
  constructor(message: string, readonly status?: number) {
    super(message);
    this.name = "TranscriptionError";
  }
}

interface HttpResponse {
  ok: boolean;
  status: number;
  json(): Promise<unknown>;
  text(): Promise<string>;
}

export type HttpPost = (
  url: string,
  init: { method: "POST"; headers: Record<string, string>; body: string; timeout: number }
) => Promise<HttpResponse>;

const nodeFetchPost: HttpPost = (url, init) => fetch(url, init);

function readTranscript(payload: unknown): string | null {
  if (payload && typeof payload === "object" && "transcript" in payload) {
    const { transcript } = payload;
    return typeof transcript === "string" ? transcript : null;
  }
  return null;
}

/**
 * Speech-to-text over the RapidAPI gateway. The service downloads the audio
 * from the public URL itself, so only the URL travels in the request.
 */
export class RapidApiTranscriber implements Transcriber {
  constructor(
    private options: AppConfig["transcription"],
    private post: HttpPost = nodeFetchPost
  ) {}

  isAvailable(): boolean {
    return Boolean(this.options.apiKey);
  }

  async transcribe(audioUrl: string): Promise<string> {
    const apiKey = this.options.apiKey;
    if (!apiKey) {
      throw new TranscriptionError("RAPIDAPI_KEY environment variable is not configured");
    }

    incrementCounter("transcription_requests_total");

    let response: HttpResponse;
    try {
      response = await this.post(`https://${this.options.host}/transcribe`, {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          "X-RapidAPI-Key": apiKey,
          "X-RapidAPI-Host": this.options.host,
        },
        body: JSON.stringify({ url: audioUrl, language: this.options.language }),
        timeout: TRANSCRIPTION_TIMEOUT_MS,
      });
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new TranscriptionError(`Transcription request failed: ${reason}`);
    }

    if (!response.ok) {
      const detail = await response.text().catch(() => "");
      throw new TranscriptionError(
        `Transcription API error ${response.status}${detail ? `: ${detail.slice(0, 200)}` : ""}`,
        response.status
      );
    }

    const transcript = readTranscript(await response.json());
    if (!transcript || transcript.trim() === "") {
      throw new TranscriptionError("Transcription API returned an empty transcript");
    }
    return transcript.trim();
  }
}

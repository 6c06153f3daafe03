import type { Express, RequestHandler, Response } from "express";
import { z } from "zod";
import { AnalyzerError, DEFAULT_KEY_POINTS, DEFAULT_SUMMARY_WORDS } from "../llm/analyzer";
import { validateGeminiAPI } from "../llm/gemini";
import { validateGroqAPI } from "../llm/groq";
import type { AppServices } from "../services";
import { TranscriptionError } from "../transcription";
import { handleRouteError } from "./helpers";

const transcribeSchema = z.object({
  audioUrl: z.string({ required_error: "audioUrl is required" }).url("audioUrl must be a valid URL"),
});

const textSchema = z.object({
  text: z.string({ required_error: "text is required" }).trim().min(1, "text is required"),
});

const summarizeSchema = textSchema.extend({
  maxLength: z.number().int().min(50).max(2000).default(DEFAULT_SUMMARY_WORDS),
});

const keyPointsSchema = textSchema.extend({
  maxPoints: z.number().int().min(1).max(50).default(DEFAULT_KEY_POINTS),
});

// Vendor failures answer 502
function handleVendorError(res: Response, error: unknown, context: string, fallback: string) {
  if (error instanceof TranscriptionError || error instanceof AnalyzerError) {
    console.error(`${context}:`, error.message);
    return res.status(502).json({ error: `${fallback}: ${error.message}` });
  }
  handleRouteError(res, error, context, fallback);
}

export function registerAiRoutes(app: Express, services: AppServices, requireAuth: RequestHandler): void {
  const { transcriber, analyzer, objectStore, config } = services;

  app.post("/api/ai/transcribe", requireAuth, async (req, res) => {
    try {
      const { audioUrl } = transcribeSchema.parse(req.body);
      if (!transcriber.isAvailable()) {
        return res.status(503).json({ error: "Transcription service not available" });
      }
      res.json({ transcript: await transcriber.transcribe(audioUrl) });
    } catch (error) {
      handleVendorError(res, error, "Transcription error", "Failed to transcribe audio");
    }
  });

  app.post("/api/ai/summarize", requireAuth, async (req, res) => {
    try {
      const { text, maxLength } = summarizeSchema.parse(req.body);
      if (!analyzer.isAvailable()) {
        return res.status(503).json({ error: "AI service not available" });
      }
      res.json({ summary: await analyzer.summarize(text, maxLength) });
    } catch (error) {
      handleVendorError(res, error, "Summarization error", "Failed to summarize text");
    }
  });

  app.post("/api/ai/key-points", requireAuth, async (req, res) => {
    try {
      const { text, maxPoints } = keyPointsSchema.parse(req.body);
      if (!analyzer.isAvailable()) {
        return res.status(503).json({ error: "AI service not available" });
      }
      res.json({ keyPoints: await analyzer.extractKeyPoints(text, maxPoints) });
    } catch (error) {
      handleVendorError(res, error, "Key point extraction error", "Failed to extract key points");
    }
  });

  app.post("/api/ai/extract-tasks", requireAuth, async (req, res) => {
    try {
      const { text } = textSchema.parse(req.body);
      if (!analyzer.isAvailable()) {
        return res.status(503).json({ error: "AI service not available" });
      }
      res.json({ tasks: await analyzer.extractTasks(text) });
    } catch (error) {
      handleVendorError(res, error, "Task extraction error", "Failed to extract tasks");
    }
  });

  app.get("/api/ai/health", requireAuth, async (_req, res) => {
    try {
      const [gemini, groq] = await Promise.all([
        validateGeminiAPI(config.gemini),
        validateGroqAPI(config.groq),
      ]);
      res.json({
        transcription: { available: transcriber.isAvailable() },
        analyzer: { available: analyzer.isAvailable(), provider: analyzer.provider },
        storage: { available: objectStore !== null, provider: objectStore?.provider ?? null },
        providers: { gemini, groq },
        timestamp: new Date().toISOString(),
      });
    } catch (error) {
      handleRouteError(res, error, "AI health check error", "Failed to check AI services");
    }
  });
}

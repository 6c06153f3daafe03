import type { Express, RequestHandler } from "express";
import { requireTeacher } from "../auth";
import { STALE_LECTURE_AGE_MS } from "../processor";
import type { AppServices } from "../services";
import { handleRouteError, parseId } from "./helpers";
import { sendProcessResult } from "./lectures";

const UNPROCESSED_LIST_LIMIT = 100;

export function registerProcessingRoutes(app: Express, services: AppServices, requireAuth: RequestHandler): void {
  const { storage, processor } = services;

  app.get("/api/processing/status", requireAuth, async (_req, res) => {
    try {
      res.json(await processor.getStatus());
    } catch (error) {
      handleRouteError(res, error, "Error fetching processing status", "Failed to fetch processing status");
    }
  });

  app.get("/api/processing/unprocessed", requireAuth, async (_req, res) => {
    try {
      const lectures = await storage.getUnprocessedLectures(UNPROCESSED_LIST_LIMIT);
      res.json({ lectures, count: lectures.length });
    } catch (error) {
      handleRouteError(res, error, "Error fetching unprocessed lectures", "Failed to fetch unprocessed lectures");
    }
  });

  app.post("/api/processing/start", requireAuth, requireTeacher, (_req, res) => {
    const started = processor.start();
    res.json({
      message: started ? "Background processing started" : "Background processing is already running",
      isRunning: processor.isRunning,
    });
  });

  app.post("/api/processing/stop", requireAuth, requireTeacher, (_req, res) => {
    const stopped = processor.stop();
    res.json({
      message: stopped ? "Background processing stopped" : "Background processing is not running",
      isRunning: processor.isRunning,
    });
  });

  app.post("/api/processing/run", requireAuth, requireTeacher, async (_req, res) => {
    try {
      const result = await processor.runCycle();
      if (!result.ran) {
        return res.status(409).json({ error: "A processing cycle is already running" });
      }
      res.json(result);
    } catch (error) {
      handleRouteError(res, error, "Error running processing cycle", "Failed to run processing cycle");
    }
  });

  app.post("/api/processing/lectures/:id", requireAuth, requireTeacher, async (req, res) => {
    try {
      const id = parseId(req.params.id);
      if (id === null) {
        return res.status(400).json({ error: "Invalid lecture ID" });
      }
      sendProcessResult(res, await processor.processLectureNow(id));
    } catch (error) {
      handleRouteError(res, error, "Error processing lecture", "Failed to process lecture");
    }
  });

  app.post("/api/processing/retry-failed", requireAuth, requireTeacher, async (_req, res) => {
    try {
      const { attempted, processed } = await processor.retryStale(STALE_LECTURE_AGE_MS);
      res.json({ message: `Retried ${attempted} lectures`, attempted, retried: processed });
    } catch (error) {
      handleRouteError(res, error, "Error retrying lectures", "Failed to retry lectures");
    }
  });
}

import type { Express, RequestHandler, Response } from "express";
import { z } from "zod";
import { insertLectureSchema, updateLectureSchema, type Lecture, type User } from "@shared/schema";
import { currentUser, requireTeacher } from "../auth";
import { AUDIO_EXTENSIONS, audioKey, contentTypeFor, hasAllowedExtension } from "../objectStore";
import type { ProcessNowResult } from "../processor";
import type { AppServices } from "../services";
import { acceptUpload, audioUpload, AUDIO_MAX_BYTES } from "../uploads";
import { log } from "../log";
import { handleRouteError, parseId, parsePagination } from "./helpers";

const lectureQuerySchema = z.object({
  teacherId: z.coerce.number().int().optional(),
  subject: z.string().trim().min(1).optional(),
});

const audioDurationSchema = z.coerce.number().int().nonnegative().optional();

/** Maps a processing outcome to the HTTP response the lecture and processing routes share. */
export function sendProcessResult(res: Response, result: ProcessNowResult) {
  switch (result.status) {
    case "processed":
      return res.json({ success: true, message: "Lecture processed successfully", lectureId: result.lectureId, tasksCreated: result.taskCount });
    case "already_processed":
      return res.json({ success: true, message: "Lecture already processed", lectureId: result.lectureId });
    case "not_found":
      return res.status(404).json({ error: "Lecture not found" });
    case "no_audio":
      return res.status(400).json({ error: "No audio file found" });
    case "in_progress":
      return res.status(409).json({ error: "Lecture is already being processed" });
    case "audio_replaced":
      return res.status(409).json({ error: "Lecture audio was replaced during processing" });
    case "skipped":
      return res.status(503).json({ error: result.reason });
    case "failed":
      return res.status(500).json({ error: `Failed to process lecture: ${result.error}` });
  }
}

export function registerLectureRoutes(app: Express, services: AppServices, requireAuth: RequestHandler): void {
  const { storage, objectStore, processor } = services;

  // Resolves :id to a lecture owned by the signed-in teacher, or answers the request.
  async function loadOwnedLecture(rawId: string | undefined, user: User, res: Response): Promise<Lecture | null> {
    const id = parseId(rawId);
    if (id === null) {
      res.status(400).json({ error: "Invalid lecture ID" });
      return null;
    }
    const lecture = await storage.getLecture(id);
    if (!lecture) {
      res.status(404).json({ error: "Lecture not found" });
      return null;
    }
    if (lecture.teacherId !== user.id) {
      res.status(403).json({ error: "You can only modify your own lectures" });
      return null;
    }
    return lecture;
  }

  async function removeStoredAudio(key: string | null) {
    if (!key || !objectStore) return;
    try {
      await objectStore.remove(key);
    } catch (error) {
      console.error(`Failed to delete stored audio ${key}:`, error);
    }
  }

  app.get("/api/lectures", requireAuth, async (req, res) => {
    try {
      const filters = lectureQuerySchema.parse(req.query);
      const pagination = parsePagination(req.query);
      const page = await storage.getLectures({ ...filters, ...pagination });
      res.json({ lectures: page.items, total: page.total, ...pagination });
    } catch (error) {
      handleRouteError(res, error, "Error fetching lectures", "Failed to fetch lectures");
    }
  });

  app.post("/api/lectures", requireAuth, requireTeacher, async (req, res) => {
    try {
      const validated = insertLectureSchema.parse(req.body);
      const lecture = await storage.createLecture({ ...validated, teacherId: currentUser(req).id });
      res.status(201).json(await storage.getLecture(lecture.id) ?? lecture);
    } catch (error) {
      handleRouteError(res, error, "Error creating lecture", "Failed to save lecture");
    }
  });

  app.get("/api/lectures/:id", requireAuth, async (req, res) => {
    try {
      const id = parseId(req.params.id);
      if (id === null) {
        return res.status(400).json({ error: "Invalid lecture ID" });
      }
      const lecture = await storage.getLecture(id);
      if (!lecture) {
        return res.status(404).json({ error: "Lecture not found" });
      }
      res.json(lecture);
    } catch (error) {
      handleRouteError(res, error, "Error fetching lecture", "Failed to fetch lecture");
    }
  });

  app.put("/api/lectures/:id", requireAuth, requireTeacher, async (req, res) => {
    try {
      const lecture = await loadOwnedLecture(req.params.id, currentUser(req), res);
      if (!lecture) return;

      const updates = updateLectureSchema.parse(req.body);
      await storage.updateLecture(lecture.id, updates);
      res.json(await storage.getLecture(lecture.id));
    } catch (error) {
      handleRouteError(res, error, "Error updating lecture", "Failed to update lecture");
    }
  });

  app.delete("/api/lectures/:id", requireAuth, requireTeacher, async (req, res) => {
    try {
      const lecture = await loadOwnedLecture(req.params.id, currentUser(req), res);
      if (!lecture) return;

      await storage.deleteLecture(lecture.id);
      await removeStoredAudio(lecture.audioKey);
      res.json({ message: "Lecture deleted successfully" });
    } catch (error) {
      handleRouteError(res, error, "Error deleting lecture", "Failed to delete lecture");
    }
  });

  app.post(
    "/api/lectures/:id/upload-audio",
    requireAuth,
    requireTeacher,
    acceptUpload(audioUpload.single("audio_file"), AUDIO_MAX_BYTES),
    async (req, res) => {
      try {
        const lecture = await loadOwnedLecture(req.params.id, currentUser(req), res);
        if (!lecture) return;

        const file = req.file;
        if (!file) {
          return res.status(400).json({ error: "No audio file provided" });
        }
        if (!hasAllowedExtension(file.originalname, AUDIO_EXTENSIONS)) {
          return res.status(400).json({ error: `Invalid file type. Allowed: ${AUDIO_EXTENSIONS.join(", ")}` });
        }
        if (file.size === 0) {
          return res.status(400).json({ error: "Audio file is empty" });
        }
        const audioDuration = audioDurationSchema.parse(req.body?.audio_duration);

        if (!objectStore) {
          return res.status(503).json({ error: "Storage service not available" });
        }

        const key = audioKey(lecture.id, file.originalname);
        let audioUrl: string;
        try {
          audioUrl = await objectStore.put(key, file.buffer, contentTypeFor(file.originalname));
        } catch (error) {
          console.error(`Audio upload failed for lecture ${lecture.id}:`, error);
          return res.status(500).json({ error: "Failed to save lecture" });
        }

        // New audio invalidates everything derived from the old recording
        await storage.updateLecture(lecture.id, {
          audioUrl,
          audioKey: key,
          audioDuration: audioDuration ?? null,
          transcript: null,
          summary: null,
          keyPoints: null,
          isProcessed: false,
          processedAt: null,
          processingAttempts: 0,
          lastProcessingError: null,
        });
        await removeStoredAudio(lecture.audioKey);
        log(`Audio uploaded for lecture ${lecture.id} (${file.size} bytes)`, "storage");

        res.json({
          message: "Audio uploaded successfully",
          lecture: await storage.getLecture(lecture.id),
        });
      } catch (error) {
        handleRouteError(res, error, "Error uploading audio", "Failed to save lecture");
      }
    }
  );

  app.post("/api/lectures/:id/process", requireAuth, requireTeacher, async (req, res) => {
    try {
      const lecture = await loadOwnedLecture(req.params.id, currentUser(req), res);
      if (!lecture) return;

      sendProcessResult(res, await processor.processLectureNow(lecture.id));
    } catch (error) {
      handleRouteError(res, error, "Error processing lecture", "Failed to process lecture");
    }
  });
}

import type { InsertNotification, InsertTask, Lecture, Task, User } from "@shared/schema";
import type { IStorage } from "./storage";
import type { Transcriber } from "./transcription";
import type { ExtractedTask, LectureAnalyzer } from "./llm/analyzer";
import { log } from "./log";
import { trackLectureFailure, trackLectureProcessed, trackLectureSkipped } from "./metrics/counters";

export interface ProcessorOptions {
  intervalMs: number;
  retryDelayMs: number;
  batchSize: number;
  dueReminderWindowMs: number;
}

export const DEFAULT_PROCESSOR_OPTIONS: ProcessorOptions = {
  intervalMs: 5 * 60 * 1000,
  retryDelayMs: 60 * 1000,
  batchSize: 5,
  dueReminderWindowMs: 24 * 60 * 60 * 1000,
};

export const STALE_LECTURE_AGE_MS = 60 * 60 * 1000;

export type LectureOutcome =
  | { status: "processed"; lectureId: number; taskCount: number }
  | { status: "failed"; lectureId: number; error: string }
  | { status: "skipped"; lectureId: number; reason: string }
  | { status: "already_processed"; lectureId: number }
  | { status: "in_progress"; lectureId: number }
  | { status: "audio_replaced"; lectureId: number };

export type ProcessNowResult =
  | LectureOutcome
  | { status: "not_found"; lectureId: number }
  | { status: "no_audio"; lectureId: number };

export interface CycleResult {
  /** False when another cycle was still running and this one did nothing. */
  ran: boolean;
  processed: number;
  failed: number;
  skipped: number;
  remindersSent: number;
}

export interface ProcessorStatus {
  isRunning: boolean;
  cycleInProgress: boolean;
  totalLectures: number;
  processedLectures: number;
  unprocessedLectures: number;
  processingIntervalSeconds: number;
  batchSize: number;
  lastCycleAt: string | null;
  lastCycleResult: CycleResult | null;
}

interface ProcessorDeps {
  storage: IStorage;
  transcriber: Transcriber;
  analyzer: LectureAnalyzer;
  now?: () => Date;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function emptyCycle(ran: boolean): CycleResult {
  return { ran, processed: 0, failed: 0, skipped: 0, remindersSent: 0 };
}

/**
 * Polls for lectures with audio that have not been processed yet, then
 * transcribes, summarizes and extracts tasks for each one in turn. A lecture
 * that fails stays unprocessed and is picked up again on a later cycle.
 */
export class LectureProcessor {
  private storage: IStorage;
  private transcriber: Transcriber;
  private analyzer: LectureAnalyzer;
  private now: () => Date;
  private options: ProcessorOptions;

  private running = false;
  private timer: NodeJS.Timeout | null = null;
  // Bumped by start() and stop() so a tick from an earlier run does not reschedule
  private generation = 0;
  private cycleInProgress = false;
  private inFlight = new Set<number>();
  private lastCycleAt: Date | null = null;
  private lastCycleResult: CycleResult | null = null;

  constructor(deps: ProcessorDeps, options: Partial<ProcessorOptions> = {}) {
    this.storage = deps.storage;
    this.transcriber = deps.transcriber;
    this.analyzer = deps.analyzer;
    this.now = deps.now ?? (() => new Date());
    this.options = { ...DEFAULT_PROCESSOR_OPTIONS, ...options };
  }

  get isRunning(): boolean {
    return this.running;
  }

  /** Starts the polling loop; the first cycle runs right away. */
  start(): boolean {
    if (this.running) return false;
    this.running = true;
    this.generation++;
    log(`Background processor started (every ${this.options.intervalMs / 1000}s, batch ${this.options.batchSize})`, "processor");
    this.schedule(0, this.generation);
    return true;
  }

  stop(): boolean {
    if (!this.running) return false;
    this.running = false;
    this.generation++;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    log("Background processor stopped", "processor");
    return true;
  }

  private schedule(delayMs: number, generation: number) {
    this.timer = setTimeout(() => {
      this.timer = null;
      void this.tick(generation);
    }, delayMs);
  }

  private async tick(generation: number) {
    let delay = this.options.intervalMs;
    try {
      const result = await this.runCycle();
      if (result.processed + result.failed + result.skipped + result.remindersSent > 0) {
        log(
          `Cycle finished: ${result.processed} processed, ${result.failed} failed, ${result.skipped} skipped, ${result.remindersSent} reminders`,
          "processor"
        );
      }
    } catch (error) {
      console.error("Processing cycle failed:", error);
      delay = this.options.retryDelayMs;
    }

    if (this.running && generation === this.generation) {
      this.schedule(delay, generation);
    }
  }

  async runCycle(): Promise<CycleResult> {
    if (this.cycleInProgress) {
      return emptyCycle(false);
    }

    this.cycleInProgress = true;
    try {
      const result = emptyCycle(true);
      const batch = await this.storage.getUnprocessedLectures(this.options.batchSize, Array.from(this.inFlight));

      for (const lecture of batch) {
        const outcome = await this.processLecture(lecture);
        if (outcome.status === "processed") result.processed++;
        else if (outcome.status === "failed") result.failed++;
        else if (outcome.status === "skipped") result.skipped++;
      }

      result.remindersSent = await this.sendDueReminders();

      this.lastCycleAt = this.now();
      this.lastCycleResult = result;
      return result;
    } finally {
      this.cycleInProgress = false;
    }
  }

  async processLectureNow(lectureId: number): Promise<ProcessNowResult> {
    const lecture = await this.storage.getLecture(lectureId);
    if (!lecture) return { status: "not_found", lectureId };
    if (lecture.isProcessed) return { status: "already_processed", lectureId };
    if (!lecture.audioUrl) return { status: "no_audio", lectureId };
    return this.processLecture(lecture);
  }

  /** Reprocesses unprocessed lectures that have not been touched for `olderThanMs`. */
  async retryStale(olderThanMs = STALE_LECTURE_AGE_MS): Promise<{ attempted: number; processed: number }> {
    const cutoff = new Date(this.now().getTime() - olderThanMs);
    const stale = (await this.storage.getStaleUnprocessedLectures(cutoff))
      .filter((lecture) => !this.inFlight.has(lecture.id));

    let processed = 0;
    for (const lecture of stale) {
      const outcome = await this.processLecture(lecture);
      if (outcome.status === "processed") processed++;
    }
    return { attempted: stale.length, processed };
  }

  async getStatus(): Promise<ProcessorStatus> {
    const counts = await this.storage.getLectureCounts();
    return {
      isRunning: this.running,
      cycleInProgress: this.cycleInProgress,
      totalLectures: counts.total,
      processedLectures: counts.processed,
      unprocessedLectures: counts.unprocessed,
      processingIntervalSeconds: this.options.intervalMs / 1000,
      batchSize: this.options.batchSize,
      lastCycleAt: this.lastCycleAt ? this.lastCycleAt.toISOString() : null,
      lastCycleResult: this.lastCycleResult,
    };
  }

  private async processLecture(lecture: Lecture): Promise<LectureOutcome> {
    const lectureId = lecture.id;
    const audioUrl = lecture.audioUrl;
    if (!audioUrl) {
      log(`Lecture ${lectureId} has no audio file`, "processor");
      return { status: "failed", lectureId, error: "Lecture has no audio file" };
    }

    if (!this.transcriber.isAvailable() || !this.analyzer.isAvailable()) {
      const reason = !this.transcriber.isAvailable()
        ? "Transcription service not available"
        : "LLM service not available";
      log(`Skipping lecture ${lectureId}: ${reason}`, "processor");
      trackLectureSkipped();
      return { status: "skipped", lectureId, reason };
    }

    if (this.inFlight.has(lectureId)) {
      return { status: "in_progress", lectureId };
    }

    this.inFlight.add(lectureId);
    try {
      log(`Processing lecture ${lectureId}: ${lecture.title}`, "processor");

      const transcript = lecture.transcript?.trim() || await this.transcribe(lectureId, audioUrl);
      if (transcript === null) {
        return this.staleRun(lectureId);
      }

      const summary = await this.analyzer.summarize(transcript);
      const keyPoints = await this.optionalStep(lectureId, "Key point extraction", () =>
        this.analyzer.extractKeyPoints(transcript));
      const extracted = await this.optionalStep(lectureId, "Task extraction", () =>
        this.analyzer.extractTasks(transcript));

      const students = await this.storage.getUsers("student");
      const result = await this.storage.completeLectureProcessing(lectureId, {
        audioUrl,
        transcript,
        summary,
        keyPoints,
        tasks: this.buildTasks(lectureId, extracted ?? [], students),
      });

      if (!result) {
        return this.staleRun(lectureId);
      }

      const notificationCount = await this.notifyStudents(result.lecture, result.tasks, students);
      trackLectureProcessed(result.tasks.length, notificationCount);
      log(`Lecture ${lectureId} processed: ${result.tasks.length} tasks created`, "processor");
      return { status: "processed", lectureId, taskCount: result.tasks.length };
    } catch (error) {
      const message = errorMessage(error);
      trackLectureFailure();
      log(`Failed to process lecture ${lectureId}: ${message}`, "processor");
      try {
        await this.storage.recordProcessingFailure(lectureId, audioUrl, message);
      } catch (recordError) {
        console.error(`Could not record processing failure for lecture ${lectureId}:`, recordError);
      }
      return { status: "failed", lectureId, error: message };
    } finally {
      this.inFlight.delete(lectureId);
    }
  }

  // Null when the lecture was processed elsewhere or got new audio meanwhile
  private async transcribe(lectureId: number, audioUrl: string): Promise<string | null> {
    const transcript = await this.transcriber.transcribe(audioUrl);
    const saved = await this.storage.saveTranscript(lectureId, audioUrl, transcript);
    return saved ? transcript : null;
  }

  // The row moved on while this run held it: either finished elsewhere or given new audio
  private async staleRun(lectureId: number): Promise<LectureOutcome> {
    const current = await this.storage.getLecture(lectureId);
    if (!current || current.isProcessed) {
      return { status: "already_processed", lectureId };
    }
    log(`Lecture ${lectureId} got new audio while processing; leaving it for the next cycle`, "processor");
    return { status: "audio_replaced", lectureId };
  }

  private async optionalStep<T>(lectureId: number, label: string, step: () => Promise<T>): Promise<T | null> {
    try {
      return await step();
    } catch (error) {
      log(`${label} failed for lecture ${lectureId}: ${errorMessage(error)}`, "processor");
      return null;
    }
  }

  private buildTasks(lectureId: number, extracted: ExtractedTask[], students: User[]): InsertTask[] {
    return extracted.flatMap((task) =>
      students.map((student) => ({
        title: task.title,
        description: task.description,
        priority: task.priority,
        dueDate: task.dueDate,
        lectureId,
        assignedToId: student.id,
        status: "pending" as const,
        isAiGenerated: true,
      }))
    );
  }

  private async notifyStudents(lecture: Lecture, tasks: Task[], students: User[]): Promise<number> {
    const recipients = new Set(students.filter((student) => student.notificationsEnabled).map((student) => student.id));

    const notifications: InsertNotification[] = [];
    for (const studentId of Array.from(recipients)) {
      notifications.push({
        userId: studentId,
        type: "lecture_uploaded",
        title: "New lecture available",
        message: `"${lecture.title}" has been transcribed and summarized.`,
        data: { lectureId: lecture.id },
      });
    }
    for (const task of tasks) {
      if (task.assignedToId === null || !recipients.has(task.assignedToId)) continue;
      notifications.push({
        userId: task.assignedToId,
        type: "task_assigned",
        title: "New task assigned",
        message: `${task.title} (from "${lecture.title}")`,
        data: { taskId: task.id, lectureId: lecture.id },
      });
    }

    // The lecture is already committed at this point
    try {
      const created = await this.storage.createNotifications(notifications);
      return created.length;
    } catch (error) {
      console.error(`Failed to create notifications for lecture ${lecture.id}:`, error);
      return 0;
    }
  }

  async sendDueReminders(): Promise<number> {
    const now = this.now();
    const until = new Date(now.getTime() + this.options.dueReminderWindowMs);
    const due = await this.storage.getTasksDueBetween(now, until);

    let sent = 0;
    for (const task of due) {
      if (task.assignedToId === null || task.dueDate === null) continue;
      await this.storage.createNotifications([{
        userId: task.assignedToId,
        type: "task_due",
        title: "Task due soon",
        message: `"${task.title}" is due on ${task.dueDate.toISOString().split("T")[0]}.`,
        data: { taskId: task.id, lectureId: task.lectureId },
      }]);
      await this.storage.markTaskDueNotified(task.id, now);
      sent++;
    }
    return sent;
  }
}

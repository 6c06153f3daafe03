import { MemStorage } from "../../server/memStorage";
import { LectureProcessor } from "../../server/processor";
import { FakeTranscriber, ScriptedAnalyzer } from "../support/fakes";

function deferred<T>() {
  let resolve: (value: T) => void = () => {};
  const promise = new Promise<T>((r) => {
    resolve = r;
  });
  return { promise, resolve: (value: T) => resolve(value) };
}

describe("LectureProcessor", () => {
  let now: Date;
  let storage: MemStorage;
  let transcriber: FakeTranscriber;
  let analyzer: ScriptedAnalyzer;
  let processor: LectureProcessor;
  let teacherId: number;

  const options = { intervalMs: 60_000, retryDelayMs: 5_000, batchSize: 2, dueReminderWindowMs: 24 * 60 * 60 * 1000 };

  const addLecture = async (title: string, audioUrl: string | null = `https://files.test/audio/${title}.mp3`) => {
    const lecture = await storage.createLecture({ title, subject: "Biology", teacherId, audioUrl });
    now = new Date(now.getTime() + 1000);
    return lecture;
  };

  beforeEach(async () => {
    now = new Date("2026-02-02T08:00:00Z");
    storage = new MemStorage(() => now);
    transcriber = new FakeTranscriber();
    analyzer = new ScriptedAnalyzer();
    processor = new LectureProcessor({ storage, transcriber, analyzer, now: () => now }, options);
    teacherId = (await storage.createUser({ email: "grace@school.test", password: "hashed", name: "Grace", role: "teacher" })).id;
  });

  afterEach(() => {
    processor.stop();
  });

  describe("runCycle", () => {
    it("transcribes, summarizes and assigns tasks to every student", async () => {
      const linus = await storage.createUser({ email: "linus@school.test", password: "hashed", name: "Linus", role: "student" });
      const ada = await storage.createUser({
        email: "ada@school.test", password: "hashed", name: "Ada", role: "student", notificationsEnabled: false,
      });
      const lecture = await addLecture("Photosynthesis");

      const result = await processor.runCycle();

      expect(result).toEqual({ ran: true, processed: 1, failed: 0, skipped: 0, remindersSent: 0 });
      expect(transcriber.calls).toEqual(["https://files.test/audio/Photosynthesis.mp3"]);
      expect(await storage.getLecture(lecture.id)).toMatchObject({
        isProcessed: true,
        transcript: transcriber.transcript,
        summary: analyzer.summary,
        keyPoints: analyzer.keyPoints,
        lastProcessingError: null,
      });

      const tasks = await storage.getTasks({ lectureId: lecture.id, limit: 20, offset: 0 });
      expect(tasks.items.map((t) => [t.title, t.assignedToId, t.priority, t.isAiGenerated]).sort()).toEqual([
        ["Read chapter 4", ada.id, "high", true],
        ["Read chapter 4", linus.id, "high", true],
      ].sort());

      const notifications = await storage.getNotifications({ userId: linus.id, limit: 20, offset: 0 });
      expect(notifications.items.map((n) => [n.type, n.message]).sort()).toEqual([
        ["lecture_uploaded", '"Photosynthesis" has been transcribed and summarized.'],
        ["task_assigned", 'Read chapter 4 (from "Photosynthesis")'],
      ]);
      expect(await storage.getUnreadNotificationCount(ada.id)).toBe(0);
    });

    it("takes at most batchSize lectures, oldest first", async () => {
      const first = await addLecture("One");
      const second = await addLecture("Two");
      const third = await addLecture("Three");

      expect((await processor.runCycle()).processed).toBe(2);
      expect((await storage.getLecture(first.id))?.isProcessed).toBe(true);
      expect((await storage.getLecture(second.id))?.isProcessed).toBe(true);
      expect((await storage.getLecture(third.id))?.isProcessed).toBe(false);
    });

    it("ignores lectures without audio", async () => {
      await addLecture("Draft", null);
      expect(await processor.runCycle()).toEqual({ ran: true, processed: 0, failed: 0, skipped: 0, remindersSent: 0 });
    });

    it("leaves a failed lecture unprocessed and reuses its transcript on retry", async () => {
      const lecture = await addLecture("Genetics");
      analyzer.summaryError = new Error("model overloaded");

      expect((await processor.runCycle()).failed).toBe(1);
      expect(await storage.getLecture(lecture.id)).toMatchObject({
        isProcessed: false,
        processingAttempts: 1,
        lastProcessingError: "model overloaded",
        transcript: transcriber.transcript,
      });

      analyzer.summaryError = null;
      expect((await processor.runCycle()).processed).toBe(1);
      expect(transcriber.calls).toHaveLength(1);
    });

    it("records transcription failures", async () => {
      const lecture = await addLecture("Ecology");
      transcriber.error = new Error("Transcription API error 500");

      expect((await processor.runCycle()).failed).toBe(1);
      expect(await storage.getLecture(lecture.id)).toMatchObject({
        isProcessed: false,
        transcript: null,
        lastProcessingError: "Transcription API error 500",
      });
    });

    it("still completes when key points and tasks cannot be extracted", async () => {
      await storage.createUser({ email: "linus@school.test", password: "hashed", name: "Linus", role: "student" });
      const lecture = await addLecture("Evolution");
      analyzer.keyPointsError = new Error("bad json");
      analyzer.tasksError = new Error("bad json");

      expect((await processor.runCycle()).processed).toBe(1);
      expect(await storage.getLecture(lecture.id)).toMatchObject({ isProcessed: true, keyPoints: null });
      expect((await storage.getTasks({ lectureId: lecture.id, limit: 20, offset: 0 })).total).toBe(0);
    });

    it("skips lectures while transcription is unavailable", async () => {
      const lecture = await addLecture("Anatomy");
      transcriber.available = false;

      expect(await processor.runCycle()).toEqual({ ran: true, processed: 0, failed: 0, skipped: 1, remindersSent: 0 });
      expect(await storage.getLecture(lecture.id)).toMatchObject({ isProcessed: false, processingAttempts: 0 });
    });

    it("does not overlap cycles or process a lecture twice", async () => {
      const lecture = await addLecture("Chemistry");
      const started = deferred<void>();
      const gate = deferred<string>();
      jest.spyOn(transcriber, "transcribe").mockImplementation(() => {
        started.resolve();
        return gate.promise;
      });

      const running = processor.runCycle();
      await started.promise;

      expect(await processor.runCycle()).toEqual({ ran: false, processed: 0, failed: 0, skipped: 0, remindersSent: 0 });
      expect(await processor.processLectureNow(lecture.id)).toEqual({ status: "in_progress", lectureId: lecture.id });

      gate.resolve("Atoms bond.");
      expect((await running).processed).toBe(1);
    });

    it("drops the result when the audio is replaced during summarization", async () => {
      const student = await storage.createUser({ email: "linus@school.test", password: "hashed", name: "Linus", role: "student" });
      const lecture = await addLecture("Physics");
      const started = deferred<void>();
      const gate = deferred<string>();
      jest.spyOn(analyzer, "summarize").mockImplementationOnce(() => {
        started.resolve();
        return gate.promise;
      });

      const running = processor.runCycle();
      await started.promise;
      await storage.updateLecture(lecture.id, {
        audioUrl: "https://files.test/audio/Physics-v2.mp3",
        transcript: null,
        summary: null,
        keyPoints: null,
        isProcessed: false,
        processedAt: null,
        processingAttempts: 0,
        lastProcessingError: null,
      });
      gate.resolve("Summary of the old recording.");

      expect(await running).toEqual({ ran: true, processed: 0, failed: 0, skipped: 0, remindersSent: 0 });
      expect(await storage.getLecture(lecture.id)).toMatchObject({
        audioUrl: "https://files.test/audio/Physics-v2.mp3",
        isProcessed: false,
        transcript: null,
        summary: null,
        processingAttempts: 0,
      });
      expect((await storage.getTasks({ lectureId: lecture.id, limit: 20, offset: 0 })).total).toBe(0);
      expect(await storage.getUnreadNotificationCount(student.id)).toBe(0);

      expect((await processor.runCycle()).processed).toBe(1);
      expect(transcriber.calls).toEqual([
        "https://files.test/audio/Physics.mp3",
        "https://files.test/audio/Physics-v2.mp3",
      ]);
    });

    it("does not store a transcript of audio that was replaced", async () => {
      const lecture = await addLecture("Algebra");
      const started = deferred<void>();
      const gate = deferred<string>();
      jest.spyOn(transcriber, "transcribe").mockImplementationOnce(() => {
        started.resolve();
        return gate.promise;
      });

      const running = processor.runCycle();
      await started.promise;
      await storage.updateLecture(lecture.id, { audioUrl: "https://files.test/audio/Algebra-v2.mp3", transcript: null });
      gate.resolve("Old recording words.");

      expect((await running).processed).toBe(0);
      expect(analyzer.summarizeCalls).toEqual([]);
      expect(await processor.processLectureNow(lecture.id)).toEqual({ status: "processed", lectureId: lecture.id, taskCount: 0 });
      expect(transcriber.calls).toEqual(["https://files.test/audio/Algebra-v2.mp3"]);
      expect(analyzer.summarizeCalls).toEqual([transcriber.transcript]);
    });

    it("sends one reminder per task due inside the window", async () => {
      const student = await storage.createUser({ email: "linus@school.test", password: "hashed", name: "Linus", role: "student" });
      await storage.createTask({ title: "Essay", assignedToId: student.id, dueDate: new Date("2026-02-02T10:00:00Z") });

      expect((await processor.runCycle()).remindersSent).toBe(1);
      expect((await processor.runCycle()).remindersSent).toBe(0);

      const { items } = await storage.getNotifications({ userId: student.id, type: "task_due", limit: 20, offset: 0 });
      expect(items.map((n) => n.message)).toEqual(['"Essay" is due on 2026-02-02.']);
    });
  });

  describe("processLectureNow", () => {
    it("reports why a lecture cannot be processed", async () => {
      const draft = await addLecture("Draft", null);

      expect(await processor.processLectureNow(999)).toEqual({ status: "not_found", lectureId: 999 });
      expect(await processor.processLectureNow(draft.id)).toEqual({ status: "no_audio", lectureId: draft.id });
    });

    it("processes a lecture and then reports it as done", async () => {
      await storage.createUser({ email: "linus@school.test", password: "hashed", name: "Linus", role: "student" });
      const lecture = await addLecture("Optics");

      expect(await processor.processLectureNow(lecture.id)).toEqual({ status: "processed", lectureId: lecture.id, taskCount: 1 });
      expect(await processor.processLectureNow(lecture.id)).toEqual({ status: "already_processed", lectureId: lecture.id });
    });

    it("reports the skip reason when no LLM is configured", async () => {
      const lecture = await addLecture("Optics");
      analyzer.available = false;

      expect(await processor.processLectureNow(lecture.id)).toEqual({
        status: "skipped",
        lectureId: lecture.id,
        reason: "LLM service not available",
      });
    });
  });

  describe("retryStale", () => {
    it("retries only lectures untouched for longer than the cutoff", async () => {
      const old = await addLecture("Old");
      analyzer.summaryError = new Error("quota");
      await processor.runCycle();

      now = new Date(now.getTime() + 2 * 60 * 60 * 1000);
      await addLecture("Fresh");
      analyzer.summaryError = null;

      expect(await processor.retryStale(60 * 60 * 1000)).toEqual({ attempted: 1, processed: 1 });
      expect((await storage.getLecture(old.id))?.isProcessed).toBe(true);
    });
  });

  describe("getStatus", () => {
    it("reports counts and the last cycle", async () => {
      await addLecture("One");
      await addLecture("Draft", null);
      await processor.runCycle();

      expect(await processor.getStatus()).toEqual({
        isRunning: false,
        cycleInProgress: false,
        totalLectures: 2,
        processedLectures: 1,
        unprocessedLectures: 0,
        processingIntervalSeconds: 60,
        batchSize: 2,
        lastCycleAt: now.toISOString(),
        lastCycleResult: { ran: true, processed: 1, failed: 0, skipped: 0, remindersSent: 0 },
      });
    });
  });

  describe("polling loop", () => {
    const idle = { ran: true, processed: 0, failed: 0, skipped: 0, remindersSent: 0 };

    beforeEach(() => {
      jest.useFakeTimers();
    });

    afterEach(() => {
      jest.useRealTimers();
    });

    it("runs a cycle right away and then every interval until stopped", async () => {
      const runCycle = jest.spyOn(processor, "runCycle").mockResolvedValue(idle);

      expect(processor.start()).toBe(true);
      expect(processor.start()).toBe(false);
      await jest.advanceTimersByTimeAsync(0);
      expect(runCycle).toHaveBeenCalledTimes(1);

      await jest.advanceTimersByTimeAsync(59_999);
      expect(runCycle).toHaveBeenCalledTimes(1);
      await jest.advanceTimersByTimeAsync(1);
      expect(runCycle).toHaveBeenCalledTimes(2);

      expect(processor.stop()).toBe(true);
      expect(processor.stop()).toBe(false);
      await jest.advanceTimersByTimeAsync(180_000);
      expect(runCycle).toHaveBeenCalledTimes(2);
    });

    it("keeps a single timer when restarted while a cycle is running", async () => {
      const gate = deferred<typeof idle>();
      const runCycle = jest.spyOn(processor, "runCycle")
        .mockImplementationOnce(() => gate.promise)
        .mockResolvedValue(idle);

      processor.start();
      await jest.advanceTimersByTimeAsync(0);
      expect(runCycle).toHaveBeenCalledTimes(1);

      processor.stop();
      processor.start();
      await jest.advanceTimersByTimeAsync(0);
      expect(runCycle).toHaveBeenCalledTimes(2);

      gate.resolve(idle);
      await jest.advanceTimersByTimeAsync(0);

      await jest.advanceTimersByTimeAsync(10 * 60_000);
      expect(runCycle).toHaveBeenCalledTimes(12);

      processor.stop();
      await jest.advanceTimersByTimeAsync(180_000);
      expect(runCycle).toHaveBeenCalledTimes(12);
    });

    it("waits the retry delay after a failed cycle", async () => {
      jest.spyOn(console, "error").mockImplementation(() => {});
      const runCycle = jest.spyOn(processor, "runCycle")
        .mockRejectedValueOnce(new Error("database unavailable"))
        .mockResolvedValue(idle);

      processor.start();
      await jest.advanceTimersByTimeAsync(0);
      expect(runCycle).toHaveBeenCalledTimes(1);

      await jest.advanceTimersByTimeAsync(5_000);
      expect(runCycle).toHaveBeenCalledTimes(2);
      processor.stop();
    });
  });
});

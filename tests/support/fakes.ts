import type { ObjectStore } from "../../server/objectStore";
import type { Transcriber } from "../../server/transcription";
import type { ExtractedTask, LectureAnalyzer } from "../../server/llm/analyzer";

export class MemoryObjectStore implements ObjectStore {
  readonly provider = "memory" as const;
  objects = new Map<string, { body: Buffer; contentType: string }>();
  removed: string[] = [];
  failPuts = false;

  async put(key: string, body: Buffer, contentType: string): Promise<string> {
    if (this.failPuts) {
      throw new Error("bucket unavailable");
    }
    this.objects.set(key, { body, contentType });
    return `https://files.test/${key}`;
  }

  async remove(key: string): Promise<void> {
    this.objects.delete(key);
    this.removed.push(key);
  }
}

export class FakeTranscriber implements Transcriber {
  available = true;
  transcript = "Today we covered photosynthesis. Read chapter four before Friday.";
  error: Error | null = null;
  calls: string[] = [];

  isAvailable(): boolean {
    return this.available;
  }

  async transcribe(audioUrl: string): Promise<string> {
    this.calls.push(audioUrl);
    if (this.error) throw this.error;
    return this.transcript;
  }
}

export class ScriptedAnalyzer implements LectureAnalyzer {
  readonly provider = "scripted";
  available = true;
  summary = "Photosynthesis turns light into chemical energy.";
  keyPoints: string[] = ["Chlorophyll absorbs light", "Glucose is produced"];
  tasks: ExtractedTask[] = [
    { title: "Read chapter 4", description: "Photosynthesis chapter", priority: "high", dueDate: null },
  ];
  summaryError: Error | null = null;
  keyPointsError: Error | null = null;
  tasksError: Error | null = null;
  summarizeCalls: string[] = [];

  isAvailable(): boolean {
    return this.available;
  }

  async summarize(text: string): Promise<string> {
    this.summarizeCalls.push(text);
    if (this.summaryError) throw this.summaryError;
    return this.summary;
  }

  async extractKeyPoints(): Promise<string[]> {
    if (this.keyPointsError) throw this.keyPointsError;
    return this.keyPoints;
  }

  async extractTasks(): Promise<ExtractedTask[]> {
    if (this.tasksError) throw this.tasksError;
    return this.tasks;
  }
}

import { z } from "zod";
import { TASK_PRIORITIES, type TaskPriority } from "@shared/schema";

export interface ExtractedTask {
  title: string;
  description: string;
  priority: TaskPriority;
  dueDate: Date | null;
}

export class AnalyzerError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "AnalyzerError";
  }
}

export function stripCodeFences(content: string): string {
  return content.replace(/```json\n?/g, "").replace(/```\n?/g, "").trim();
}

const BULLET_PREFIX = /^\s*(?:[-*•]|\d+[.)])\s*/;

/**
 * Key points come back as a JSON array of strings. Models sometimes answer
 * with a bulleted list instead; each non-empty line is then one point.
 */
export function parseKeyPoints(content: string, maxPoints: number): string[] {
  const cleaned = stripCodeFences(content);

  try {
    const parsed: unknown = JSON.parse(cleaned);
    const points = z.array(z.unknown()).safeParse(parsed);
    if (points.success) {
      return points.data
        .filter((point): point is string => typeof point === "string")
        .map((point) => point.trim())
        .filter((point) => point.length > 0)
        .slice(0, maxPoints);
    }
  } catch {
    // not JSON; fall through to line parsing
  }

  return cleaned
    .split("\n")
    .map((line) => line.replace(BULLET_PREFIX, "").trim())
    .filter((line) => line.length > 0 && line !== "[" && line !== "]")
    .slice(0, maxPoints);
}

const rawTaskSchema = z.object({
  title: z.unknown().optional(),
  description: z.unknown().optional(),
  priority: z.unknown().optional(),
  due_date: z.unknown().optional(),
});

function parseDueDate(value: unknown): Date | null {
  if (typeof value !== "string" || !/^\d{4}-\d{2}-\d{2}/.test(value)) {
    return null;
  }
  const date = new Date(value);
  return Number.isNaN(date.getTime()) ? null : date;
}

function normalizePriority(value: unknown): TaskPriority {
  const priority = typeof value === "string" ? value.trim().toLowerCase() : "";
  return TASK_PRIORITIES.find((p) => p === priority) ?? "medium";
}

function nonEmptyString(value: unknown): string | null {
  return typeof value === "string" && value.trim() !== "" ? value.trim() : null;
}

export function parseExtractedTasks(content: string): ExtractedTask[] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(stripCodeFences(content));
  } catch {
    throw new AnalyzerError("Failed to parse tasks from LLM response");
  }

  // Some models wrap the array: { "tasks": [...] }
  const wrapped = z.object({ tasks: z.array(z.unknown()) }).safeParse(parsed);
  const list = wrapped.success ? wrapped.data.tasks : parsed;

  if (!Array.isArray(list)) {
    throw new AnalyzerError("LLM task response was not a JSON array");
  }

  const tasks: ExtractedTask[] = [];
  for (const item of list) {
    const raw = rawTaskSchema.safeParse(item);
    if (!raw.success) continue;

    tasks.push({
      title: (nonEmptyString(raw.data.title) ?? "Extracted Task").slice(0, 200),
      description: nonEmptyString(raw.data.description) ?? "",
      priority: normalizePriority(raw.data.priority),
      dueDate: parseDueDate(raw.data.due_date),
    });
  }
  return tasks;
}

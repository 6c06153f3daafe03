import type { Response } from "express";
import { z } from "zod";
import type { Pagination } from "../storage";

export const MAX_PAGE_SIZE = 100;

export function parseId(value: string | undefined): number | null {
  if (!value || !/^\d+$/.test(value)) return null;
  const id = parseInt(value, 10);
  return Number.isSafeInteger(id) ? id : null;
}

export function parsePagination(query: unknown, defaultLimit = 20): Pagination {
  return z.object({
    limit: z.coerce.number().int().min(1, "limit must be at least 1").max(MAX_PAGE_SIZE).default(defaultLimit),
    offset: z.coerce.number().int().min(0, "offset cannot be negative").default(0),
  }).parse(query);
}

/** Parses "true"/"false" query flags; anything else is treated as absent. */
export function parseBooleanQuery(value: unknown): boolean | undefined {
  if (value === "true") return true;
  if (value === "false") return false;
  return undefined;
}

export function handleRouteError(res: Response, error: unknown, context: string, fallback: string) {
  if (error instanceof z.ZodError) {
    return res.status(400).json({ error: error.errors[0].message });
  }
  console.error(`${context}:`, error);
  res.status(500).json({ error: fallback });
}

export function isUniqueViolation(error: unknown): boolean {
  return typeof error === "object" && error !== null && "code" in error && error.code === "23505";
}

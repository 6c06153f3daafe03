import type { Request, Response, NextFunction, RequestHandler } from "express";

export function isOriginAllowed(origin: string | undefined, allowed: string[] | "*"): origin is string {
  if (!origin) return false;
  return allowed === "*" || allowed.includes(origin);
}

/**
 * Reflects allowed origins (cookies need a concrete origin, never "*") and
 * answers preflight requests with 204.
 */
export function corsMiddleware(allowed: string[] | "*"): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    const origin = req.headers.origin;

    if (isOriginAllowed(origin, allowed)) {
      res.setHeader("Access-Control-Allow-Origin", origin);
      res.setHeader("Access-Control-Allow-Credentials", "true");
      res.setHeader("Vary", "Origin");
    }

    res.setHeader("Access-Control-Allow-Methods", "GET, POST, PATCH, PUT, DELETE, OPTIONS");
    res.setHeader("Access-Control-Allow-Headers", "Content-Type, Authorization");
    res.setHeader("Access-Control-Max-Age", "86400");

    if (req.method === "OPTIONS") {
      res.status(204).end();
      return;
    }

    next();
  };
}

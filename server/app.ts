import express, { type Express, type Request, type Response, type NextFunction } from "express";
import session from "express-session";
import { corsMiddleware } from "./cors";
import { requestLogger } from "./log";
import { registerRoutes } from "./routes";
import type { AppServices } from "./services";

const SESSION_MAX_AGE_MS = 7 * 24 * 60 * 60 * 1000;

function statusOf(err: unknown): number {
  if (typeof err === "object" && err !== null) {
    const status = "status" in err ? err.status : "statusCode" in err ? err.statusCode : undefined;
    if (typeof status === "number" && status >= 400 && status < 600) return status;
  }
  return 500;
}

export function createApp(services: AppServices): Express {
  const { config } = services;
  const app = express();

  if (config.isProduction) {
    app.set("trust proxy", 1);
  }

  app.use(corsMiddleware(config.corsOrigins));
  app.use(express.json({ limit: "1mb" }));
  app.use(express.urlencoded({ extended: false }));
  app.use(session({
    name: "classroom.sid",
    secret: config.secretKey,
    resave: false,
    saveUninitialized: false,
    cookie: {
      httpOnly: true,
      secure: config.isProduction,
      sameSite: config.isProduction ? "none" : "lax",
      maxAge: SESSION_MAX_AGE_MS,
    },
  }));
  app.use(requestLogger);

  registerRoutes(app, services);

  app.use("/api", (_req: Request, res: Response) => {
    res.status(404).json({ error: "Endpoint not found" });
  });

  app.use((err: unknown, _req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      return next(err);
    }
    const status = statusOf(err);
    if (status >= 500) {
      console.error("Unhandled error:", err);
      return res.status(status).json({ error: "Internal server error" });
    }
    const message = err instanceof Error ? err.message : "Bad request";
    res.status(status).json({ error: message });
  });

  return app;
}

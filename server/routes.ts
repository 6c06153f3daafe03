import type { Express } from "express";
import { createRequireAuth } from "./auth";
import { exportMetrics } from "./metrics/counters";
import type { AppServices } from "./services";
import { registerAuthRoutes } from "./routes/auth";
import { registerLectureRoutes } from "./routes/lectures";
import { registerTaskRoutes } from "./routes/tasks";
import { registerNotificationRoutes } from "./routes/notifications";
import { registerChatRoutes } from "./routes/chat";
import { registerAiRoutes } from "./routes/ai";
import { registerProcessingRoutes } from "./routes/processing";

export const API_VERSION = "1.0.0";

export function registerRoutes(app: Express, services: AppServices): void {
  const requireAuth = createRequireAuth(services.storage);

  app.get("/", (_req, res) => {
    res.json({
      status: "success",
      message: "Classroom Assistant API is running",
      version: API_VERSION,
      timestamp: new Date().toISOString(),
    });
  });

  app.get("/api/health", async (_req, res) => {
    const databaseUp = await services.storage.ping();
    res.json({
      status: "healthy",
      database: databaseUp ? "connected" : "disconnected",
      storage: {
        provider: services.objectStore?.provider ?? null,
        available: services.objectStore !== null,
      },
      processor: { running: services.processor.isRunning },
      environment: services.config.env,
      timestamp: new Date().toISOString(),
    });
  });

  app.get("/api/metrics", (_req, res) => {
    res.type("text/plain; version=0.0.4").send(exportMetrics());
  });

  registerAuthRoutes(app, services, requireAuth);
  registerLectureRoutes(app, services, requireAuth);
  registerTaskRoutes(app, services, requireAuth);
  registerNotificationRoutes(app, services, requireAuth);
  registerChatRoutes(app, services, requireAuth);
  registerAiRoutes(app, services, requireAuth);
  registerProcessingRoutes(app, services, requireAuth);
}

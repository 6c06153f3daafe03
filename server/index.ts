import "dotenv/config";
import { createServer } from "http";
import { createApp } from "./app";
import { loadConfig } from "./config";
import { log } from "./log";
import { buildServices } from "./services";

async function main() {
  const config = loadConfig();
  const { services, close } = buildServices(config);
  const app = createApp(services);
  const httpServer = createServer(app);

  httpServer.listen(config.port, "0.0.0.0", () => {
    log(`serving on port ${config.port} (${config.env})`);
    if (config.processor.enabled) {
      services.processor.start();
    } else {
      log("Background processor disabled (PROCESSOR_ENABLED=false)", "processor");
    }
  });

  const shutdown = (signal: string) => {
    log(`${signal} received, shutting down`);
    httpServer.close(() => {
      close()
        .then(() => process.exit(0))
        .catch((error) => {
          console.error("Error during shutdown:", error);
          process.exit(1);
        });
    });
  };

  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));
}

main().catch((err) => {
  console.error("Failed to start server:", err);
  process.exit(1);
});

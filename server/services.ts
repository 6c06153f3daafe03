import type { AppConfig } from "./config";
import { connectDatabase } from "./db";
import { log } from "./log";
import { MemStorage } from "./memStorage";
import { createObjectStore, type ObjectStore } from "./objectStore";
import { LectureProcessor } from "./processor";
import { LoginRateLimiter } from "./rateLimit";
import { DrizzleStorage, type IStorage } from "./storage";
import { RapidApiTranscriber, type Transcriber } from "./transcription";
import { createAnalyzer, type LectureAnalyzer } from "./llm/analyzer";

export interface AppServices {
  config: AppConfig;
  storage: IStorage;
  objectStore: ObjectStore | null;
  transcriber: Transcriber;
  analyzer: LectureAnalyzer;
  processor: LectureProcessor;
  loginLimiter: LoginRateLimiter;
}

export interface ServiceContainer {
  services: AppServices;
  close(): Promise<void>;
}

export function buildServices(config: AppConfig): ServiceContainer {
  let storage: IStorage;
  let closeDatabase = async () => {};

  if (config.databaseUrl) {
    const { db, pool } = connectDatabase(config.databaseUrl);
    storage = new DrizzleStorage(db);
    closeDatabase = () => pool.end();
  } else {
    log("DATABASE_URL is not set; using in-memory storage (data is lost on restart)", "storage");
    storage = new MemStorage();
  }

  const transcriber = new RapidApiTranscriber(config.transcription);
  const analyzer = createAnalyzer(config);
  const processor = new LectureProcessor({ storage, transcriber, analyzer }, config.processor);
  const loginLimiter = new LoginRateLimiter();

  return {
    services: {
      config,
      storage,
      objectStore: createObjectStore(config),
      transcriber,
      analyzer,
      processor,
      loginLimiter,
    },
    async close() {
      processor.stop();
      loginLimiter.stop();
      await closeDatabase();
    },
  };
}

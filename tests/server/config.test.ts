import { loadConfig, normalizeDatabaseUrl, parseCorsOrigins } from "../../server/config";

describe("loadConfig", () => {
  it("applies defaults when the environment is empty", () => {
    const config = loadConfig({});

    expect(config.port).toBe(5000);
    expect(config.env).toBe("development");
    expect(config.isProduction).toBe(false);
    expect(config.databaseUrl).toBeUndefined();
    expect(config.corsOrigins).toEqual(["http://localhost:3000", "http://localhost:8081"]);
    expect(config.storage.provider).toBeUndefined();
    expect(config.storage.s3.bucket).toBe("classroom-assistant-audio");
    expect(config.storage.s3.publicReadAcl).toBe(false);
    expect(config.transcription.host).toBe("speech-to-text-api.p.rapidapi.com");
    expect(config.groq.model).toBe("llama-3.3-70b-versatile");
    expect(config.processor).toEqual({
      enabled: true,
      intervalMs: 300_000,
      retryDelayMs: 60_000,
      batchSize: 5,
      dueReminderWindowMs: 86_400_000,
    });
  });

  it("converts processor settings to milliseconds", () => {
    const config = loadConfig({
      PROCESSOR_INTERVAL_MINUTES: "2",
      PROCESSOR_RETRY_DELAY_SECONDS: "30",
      PROCESSOR_BATCH_SIZE: "10",
      TASK_DUE_REMINDER_HOURS: "6",
      PROCESSOR_ENABLED: "0",
    });

    expect(config.processor).toEqual({
      enabled: false,
      intervalMs: 120_000,
      retryDelayMs: 30_000,
      batchSize: 10,
      dueReminderWindowMs: 21_600_000,
    });
  });

  it("treats blank optional values as unset", () => {
    const config = loadConfig({ STORAGE_PROVIDER: "", GEMINI_API_KEY: "  ", PROCESSOR_ENABLED: "" });

    expect(config.storage.provider).toBeUndefined();
    expect(config.gemini.apiKey).toBeUndefined();
    expect(config.processor.enabled).toBe(true);
  });

  it("normalizes postgres:// database URLs", () => {
    const config = loadConfig({ DATABASE_URL: "postgres://app:pw@db.local:5432/classroom" });
    expect(config.databaseUrl).toBe("postgresql://app:pw@db.local:5432/classroom");
  });

  it("rejects an unknown storage provider", () => {
    expect(() => loadConfig({ STORAGE_PROVIDER: "ftp" })).toThrow(/^Invalid environment configuration - STORAGE_PROVIDER:/);
  });

  it("rejects a non-numeric batch size", () => {
    expect(() => loadConfig({ PROCESSOR_BATCH_SIZE: "many" })).toThrow(/PROCESSOR_BATCH_SIZE/);
  });

  it("requires SECRET_KEY in production", () => {
    expect(() => loadConfig({ NODE_ENV: "production" })).toThrow("SECRET_KEY must be set in production");

    const config = loadConfig({ NODE_ENV: "production", SECRET_KEY: "test-secret" });
    expect(config.isProduction).toBe(true);
    expect(config.secretKey).toBe("test-secret");
  });
});

describe("parseCorsOrigins", () => {
  it("splits and trims a comma separated list", () => {
    expect(parseCorsOrigins(" https://a.test , https://b.test,,")).toEqual(["https://a.test", "https://b.test"]);
  });

  it("collapses to a wildcard when * is listed", () => {
    expect(parseCorsOrigins("https://a.test,*")).toBe("*");
  });
});

describe("normalizeDatabaseUrl", () => {
  it("leaves postgresql:// URLs alone", () => {
    expect(normalizeDatabaseUrl("postgresql://localhost/db")).toBe("postgresql://localhost/db");
  });
});

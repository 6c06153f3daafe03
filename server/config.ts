import { z } from "zod";

const DEFAULT_SECRET_KEY = "dev-secret-key-change-in-production";

const blankAsUndefined = (value: unknown) =>
  typeof value === "string" && value.trim() === "" ? undefined : value;

const booleanFlag = (fallback: boolean) =>
  z.preprocess(
    blankAsUndefined,
    z
      .enum(["true", "false", "1", "0"])
      .optional()
      .transform((value) => (value === undefined ? fallback : value === "true" || value === "1")),
  );

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value && value.trim() !== "" ? value.trim() : undefined));

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(5000),
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  DATABASE_URL: optionalString,
  SECRET_KEY: optionalString,
  CORS_ORIGINS: z.string().default("http://localhost:3000,http://localhost:8081"),

  STORAGE_PROVIDER: z.preprocess(blankAsUndefined, z.enum(["s3", "supabase"]).optional()),
  AWS_ACCESS_KEY_ID: optionalString,
  AWS_SECRET_ACCESS_KEY: optionalString,
  AWS_REGION: z.string().default("us-east-1"),
  AWS_S3_BUCKET: z.string().default("classroom-assistant-audio"),
  AWS_S3_PUBLIC_READ_ACL: booleanFlag(false),
  SUPABASE_URL: optionalString,
  SUPABASE_KEY: optionalString,
  SUPABASE_BUCKET: z.string().default("lectures"),

  RAPIDAPI_KEY: optionalString,
  RAPIDAPI_HOST: z.string().default("speech-to-text-api.p.rapidapi.com"),
  TRANSCRIPTION_LANGUAGE: z.string().default("en-US"),

  GEMINI_API_KEY: optionalString,
  GEMINI_MODEL: z.string().default("gemini-2.0-flash"),
  GEMINI_REQUESTS_PER_MINUTE: z.coerce.number().int().positive().default(15),
  GROQ_API_KEY: optionalString,
  GROQ_MODEL: z.string().default("llama-3.3-70b-versatile"),

  PROCESSOR_ENABLED: booleanFlag(true),
  PROCESSOR_INTERVAL_MINUTES: z.coerce.number().positive().default(5),
  PROCESSOR_RETRY_DELAY_SECONDS: z.coerce.number().positive().default(60),
  PROCESSOR_BATCH_SIZE: z.coerce.number().int().positive().default(5),
  TASK_DUE_REMINDER_HOURS: z.coerce.number().positive().default(24),
});

export type StorageProvider = "s3" | "supabase";

export interface AppConfig {
  port: number;
  env: "development" | "production" | "test";
  isProduction: boolean;
  databaseUrl?: string;
  secretKey: string;
  corsOrigins: string[] | "*";
  storage: {
    provider?: StorageProvider;
    s3: {
      accessKeyId?: string;
      secretAccessKey?: string;
      region: string;
      bucket: string;
      publicReadAcl: boolean;
    };
    supabase: {
      url?: string;
      key?: string;
      bucket: string;
    };
  };
  transcription: {
    apiKey?: string;
    host: string;
    language: string;
  };
  gemini: {
    apiKey?: string;
    model: string;
    requestsPerMinute: number;
  };
  groq: {
    apiKey?: string;
    model: string;
  };
  processor: {
    enabled: boolean;
    intervalMs: number;
    retryDelayMs: number;
    batchSize: number;
    dueReminderWindowMs: number;
  };
}

export function parseCorsOrigins(value: string): string[] | "*" {
  const origins = value
    .split(",")
    .map((origin) => origin.trim())
    .filter((origin) => origin.length > 0);
  return origins.includes("*") ? "*" : origins;
}

// Heroku-style URLs use the postgres:// scheme; pg accepts both.
export function normalizeDatabaseUrl(url: string): string {
  return url.startsWith("postgres://") ? "postgresql://" + url.slice("postgres://".length) : url;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const problems = result.error.errors.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new Error(`Invalid environment configuration - ${problems.join("; ")}`);
  }

  const e = result.data;
  const isProduction = e.NODE_ENV === "production";

  if (isProduction && !e.SECRET_KEY) {
    throw new Error("SECRET_KEY must be set in production");
  }

  return {
    port: e.PORT,
    env: e.NODE_ENV,
    isProduction,
    databaseUrl: e.DATABASE_URL ? normalizeDatabaseUrl(e.DATABASE_URL) : undefined,
    secretKey: e.SECRET_KEY ?? DEFAULT_SECRET_KEY,
    corsOrigins: parseCorsOrigins(e.CORS_ORIGINS),
    storage: {
      provider: e.STORAGE_PROVIDER,
      s3: {
        accessKeyId: e.AWS_ACCESS_KEY_ID,
        secretAccessKey: e.AWS_SECRET_ACCESS_KEY,
        region: e.AWS_REGION,
        bucket: e.AWS_S3_BUCKET,
        publicReadAcl: e.AWS_S3_PUBLIC_READ_ACL,
      },
      supabase: {
        url: e.SUPABASE_URL,
        key: e.SUPABASE_KEY,
        bucket: e.SUPABASE_BUCKET,
      },
    },
    transcription: {
      apiKey: e.RAPIDAPI_KEY,
      host: e.RAPIDAPI_HOST,
      language: e.TRANSCRIPTION_LANGUAGE,
    },
    gemini: {
      apiKey: e.GEMINI_API_KEY,
      model: e.GEMINI_MODEL,
      requestsPerMinute: e.GEMINI_REQUESTS_PER_MINUTE,
    },
    groq: {
      apiKey: e.GROQ_API_KEY,
      model: e.GROQ_MODEL,
    },
    processor: {
      enabled: e.PROCESSOR_ENABLED,
      intervalMs: e.PROCESSOR_INTERVAL_MINUTES * 60 * 1000,
      retryDelayMs: e.PROCESSOR_RETRY_DELAY_SECONDS * 1000,
      batchSize: e.PROCESSOR_BATCH_SIZE,
      dueReminderWindowMs: e.TASK_DUE_REMINDER_HOURS * 60 * 60 * 1000,
    },
  };
}

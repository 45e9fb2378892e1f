// Labor Law Assistant - Configuration
// Environment variables (populated from .env by dotenv in the entry point),
// validated once at startup and passed down as a plain object.

import { z } from "zod";
import { ConfigError } from "./errors.js";

const TRUE_VALUES = new Set(["true", "1", "yes", "on"]);
const FALSE_VALUES = new Set(["false", "0", "no", "off"]);

const booleanFlag = (fallback: boolean) =>
  z
    .string()
    .optional()
    .transform((raw, ctx) => {
      if (raw === undefined || raw.trim() === "") return fallback;
      const normalized = raw.trim().toLowerCase();
      if (TRUE_VALUES.has(normalized)) return true;
      if (FALSE_VALUES.has(normalized)) return false;
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `expected a boolean, got "${raw}"` });
      return z.NEVER;
    });

const optionalText = z
  .string()
  .optional()
  .transform((raw) => (raw === undefined || raw.trim() === "" ? null : raw.trim()));

const EnvSchema = z
  .object({
    PORT: z.coerce.number().int().min(0).max(65535).default(8000),

    QDRANT_URL: z.string().url().default("http://localhost:6333"),
    QDRANT_API_KEY: optionalText,
    QDRANT_COLLECTION_NAME: z.string().min(1).default("labor_law_articles"),

    EMBEDDING_MODEL: z.string().min(1).default("text-embedding-3-small"),
    EMBEDDING_BATCH_SIZE: z.coerce.number().int().positive().default(100),

    RAG_TOP_K: z.coerce.number().int().positive().default(5),
    USE_RERANKING: booleanFlag(false),

    LLM_PROVIDER: z.enum(["openai", "gemini"]).default("openai"),
    LLM_MODEL: z.string().min(1).default("gpt-4o-mini"),
    LLM_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.2),
    LLM_MAX_TOKENS: z.coerce.number().int().positive().default(1500),
    OPENAI_API_KEY: optionalText,
    GEMINI_API_KEY: optionalText,

    EVALUATION_ENABLED: booleanFlag(true),
    EVALUATION_MODEL: z.string().min(1).default("gpt-4o-mini"),
    EVALUATION_QUEUE_SIZE: z.coerce.number().int().positive().default(100),
    EVALUATION_SHUTDOWN_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),

    MONITORING_ENABLED: booleanFlag(true),
    MONITORING_SERVICE_NAME: z.string().min(1).default("labor-law-assistant"),

    EXTERNAL_CALL_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),

    JOB_RETENTION_MS: z.coerce.number().int().positive().default(24 * 60 * 60 * 1000),
    JOB_MAX_RECORDS: z.coerce.number().int().positive().default(500),
    JOB_CONCURRENCY: z.coerce.number().int().positive().default(1),

    DATA_DIR: z.string().min(1).default("data/processed"),
    HEALTH_CACHE_TTL_MS: z.coerce.number().int().positive().default(5000),
  })
  .superRefine((env, ctx) => {
    if (!env.OPENAI_API_KEY) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["OPENAI_API_KEY"],
        message: "is required (embeddings and evaluation use OpenAI)",
      });
    }
    if (env.LLM_PROVIDER === "gemini" && !env.GEMINI_API_KEY) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["GEMINI_API_KEY"],
        message: "is required when LLM_PROVIDER=gemini",
      });
    }
  });

export type LlmProviderName = "openai" | "gemini";

export interface AppConfig {
  port: number;
  qdrant: { url: string; apiKey: string | null; collectionName: string };
  embedding: { model: string; batchSize: number };
  rag: { topK: number; useReranking: boolean };
  llm: {
    provider: LlmProviderName;
    model: string;
    temperature: number;
    maxTokens: number;
    openaiApiKey: string;
    geminiApiKey: string | null;
  };
  evaluation: { enabled: boolean; model: string; queueSize: number; shutdownTimeoutMs: number };
  monitoring: { enabled: boolean; serviceName: string };
  externalCallTimeoutMs: number;
  jobs: { retentionMs: number; maxRecords: number; concurrency: number };
  dataDir: string;
  healthCacheTtlMs: number;
}

/**
 * Builds the application configuration from an environment map.
 * @throws ConfigError listing every invalid or missing variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join(".") || "env"}: ${issue.message}`),
    );
  }
  const e = parsed.data;

  return {
    port: e.PORT,
    qdrant: { url: e.QDRANT_URL, apiKey: e.QDRANT_API_KEY, collectionName: e.QDRANT_COLLECTION_NAME },
    embedding: { model: e.EMBEDDING_MODEL, batchSize: e.EMBEDDING_BATCH_SIZE },
    rag: { topK: e.RAG_TOP_K, useReranking: e.USE_RERANKING },
    llm: {
      provider: e.LLM_PROVIDER,
      model: e.LLM_MODEL,
      temperature: e.LLM_TEMPERATURE,
      maxTokens: e.LLM_MAX_TOKENS,
      // superRefine guarantees presence; the fallback keeps the type narrow
      openaiApiKey: e.OPENAI_API_KEY ?? "",
      geminiApiKey: e.GEMINI_API_KEY,
    },
    evaluation: {
      enabled: e.EVALUATION_ENABLED,
      model: e.EVALUATION_MODEL,
      queueSize: e.EVALUATION_QUEUE_SIZE,
      shutdownTimeoutMs: e.EVALUATION_SHUTDOWN_TIMEOUT_MS,
    },
    monitoring: { enabled: e.MONITORING_ENABLED, serviceName: e.MONITORING_SERVICE_NAME },
    externalCallTimeoutMs: e.EXTERNAL_CALL_TIMEOUT_MS,
    jobs: { retentionMs: e.JOB_RETENTION_MS, maxRecords: e.JOB_MAX_RECORDS, concurrency: e.JOB_CONCURRENCY },
    dataDir: e.DATA_DIR,
    healthCacheTtlMs: e.HEALTH_CACHE_TTL_MS,
  };
}

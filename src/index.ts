// Labor Law Assistant - Entry point
// Wires up all pipeline dependencies and starts the server.

import "dotenv/config";
import OpenAI from "openai";
import { QdrantClient } from "@qdrant/js-client-rest";
import { GoogleGenerativeAI } from "@google/generative-ai";
import { loadConfig, type AppConfig } from "./config.js";
import { ConfigError, TimeoutError } from "./errors.js";
import { errorMessage } from "./logger.js";
import { withTimeout } from "./utils.js";
import { OtelMonitoringSink } from "./telemetry.js";
import { SessionTracker } from "./session-tracker.js";
import { OpenAIEmbeddingProvider, type OpenAIEmbeddingsClient } from "./embedding-provider.js";
import { QdrantVectorStore, type QdrantLikeClient } from "./vector-store.js";
import { EmbeddingSimilarityReranker } from "./reranker.js";
import { Retriever } from "./retriever.js";
import { createLlmProvider, OpenAIChatProvider, type GeminiClient, type OpenAIChatClient } from "./llm-provider.js";
import { AnswerGenerator } from "./generator.js";
import { EvaluationWorker } from "./evaluation-worker.js";
import { AnswerPipeline } from "./answer-pipeline.js";
import { JobTracker } from "./job-tracker.js";
import { IngestionService } from "./ingestion.js";
import { createAppServer } from "./server.js";

export const APP_NAME = "Labor Law Assistant";
export const APP_VERSION = "0.1.0";

const ts = () => new Date().toISOString();
const logInit = (msg: string) => console.log(`[INIT] [${ts()}] ${msg}`);
const logFatal = (msg: string) => console.error(`[FATAL] [${ts()}] ${msg}`);

// ─── Load configuration ─────────────────────────────────────────────────────────

let config: AppConfig;
try {
  config = loadConfig();
} catch (err) {
  logFatal(err instanceof ConfigError ? err.message : `Failed to load configuration: ${errorMessage(err)}`);
  process.exit(1);
}

logInit("Configuration loaded");

// ─── Initialize API clients ─────────────────────────────────────────────────────

logInit("Creating OpenAI client...");
const openaiClient = new OpenAI({ apiKey: config.llm.openaiApiKey });

logInit(`Creating Qdrant client (${config.qdrant.url})...`);
const qdrantClient = new QdrantClient({ url: config.qdrant.url, apiKey: config.qdrant.apiKey ?? undefined });

const geminiClient = config.llm.geminiApiKey ? new GoogleGenerativeAI(config.llm.geminiApiKey) : null;

// ─── Initialize pipeline components ─────────────────────────────────────────────

logInit(`Initializing monitoring (${config.monitoring.enabled ? "enabled" : "disabled"})...`);
const sink = new OtelMonitoringSink({
  serviceName: config.monitoring.serviceName,
  serviceVersion: APP_VERSION,
  enabled: config.monitoring.enabled,
});
const tracker = new SessionTracker({ sink });

logInit(`Initializing embeddings (${config.embedding.model})...`);
const embeddings = new OpenAIEmbeddingProvider(openaiClient as unknown as OpenAIEmbeddingsClient, {
  model: config.embedding.model,
  batchSize: config.embedding.batchSize,
  timeoutMs: config.externalCallTimeoutMs,
});

const vectorStore = new QdrantVectorStore(qdrantClient as unknown as QdrantLikeClient, {
  timeoutMs: config.externalCallTimeoutMs,
});

const retriever = new Retriever(
  {
    embeddings,
    vectorStore,
    tracker,
    reranker: config.rag.useReranking ? new EmbeddingSimilarityReranker(embeddings) : null,
  },
  {
    collectionName: config.qdrant.collectionName,
    topK: config.rag.topK,
    useReranking: config.rag.useReranking,
    embeddingModel: config.embedding.model,
    rerankTimeoutMs: config.externalCallTimeoutMs,
  },
);

logInit(`Initializing LLM provider (${config.llm.provider}/${config.llm.model})...`);
const llm = createLlmProvider(config, {
  openai: openaiClient as unknown as OpenAIChatClient,
  gemini: geminiClient as unknown as GeminiClient | null,
});
const generator = new AnswerGenerator({ llm, tracker });

logInit(`Initializing evaluation worker (${config.evaluation.enabled ? config.evaluation.model : "disabled"})...`);
const evaluator = new EvaluationWorker(
  {
    classifier: new OpenAIChatProvider(openaiClient as unknown as OpenAIChatClient, {
      model: config.evaluation.model,
      temperature: 0,
      maxTokens: 64,
      timeoutMs: config.externalCallTimeoutMs,
    }),
    tracker,
  },
  { enabled: config.evaluation.enabled, queueSize: config.evaluation.queueSize },
);
evaluator.start();

const pipeline = new AnswerPipeline({ retriever, generator, tracker, evaluator });

const jobs = new JobTracker(
  { tracker },
  {
    retentionMs: config.jobs.retentionMs,
    maxRecords: config.jobs.maxRecords,
    concurrency: config.jobs.concurrency,
  },
);

const ingestion = new IngestionService(
  { embeddings, vectorStore, tracker },
  { collectionName: config.qdrant.collectionName, dataDir: config.dataDir },
);

// ─── Start server ───────────────────────────────────────────────────────────────

const server = createAppServer({
  services: {
    pipeline,
    tracker,
    jobs,
    ingestion,
    vectorStore,
    statusProbes: {
      qdrant: () => vectorStore.healthCheck(),
      embedding_service: () => ({
        status: "healthy",
        model: config.embedding.model,
        batch_size: config.embedding.batchSize,
      }),
      rag_service: () => ({
        status: "healthy",
        llm_provider: llm.provider,
        llm_model: llm.model,
        top_k: retriever.topK,
        reranking_enabled: retriever.rerankingEnabled,
      }),
      evaluation_service: () => evaluator.healthCheck(),
      monitoring: () => sink.healthCheck(),
    },
  },
  healthCacheTtlMs: config.healthCacheTtlMs,
  serviceName: config.monitoring.serviceName,
  serviceVersion: APP_VERSION,
});

server
  .listen(config.port)
  .then(() => {
    logInit(`${APP_NAME} v${APP_VERSION} running at http://localhost:${config.port}`);
    logInit(`Pipeline: embed → Qdrant${retriever.rerankingEnabled ? " → rerank" : ""} → ${llm.provider} → evaluation`);
    logInit("Ready for requests");
  })
  .catch((err: unknown) => {
    logFatal(`Failed to start server: ${errorMessage(err)}`);
    process.exit(1);
  });

// ─── Graceful shutdown ──────────────────────────────────────────────────────────

let shuttingDown = false;

async function shutdown(signal: string): Promise<void> {
  if (shuttingDown) return;
  shuttingDown = true;
  logInit(`${signal} received, shutting down...`);

  const budgetMs = config.evaluation.shutdownTimeoutMs;
  await server.close();
  const { drained, discarded } = await evaluator.stop(budgetMs);
  if (!drained) logInit(`Evaluation queue not drained; ${discarded} tasks discarded`);

  try {
    await withTimeout(jobs.close(), budgetMs, "Job drain");
  } catch (err) {
    if (!(err instanceof TimeoutError)) throw err;
    logInit("Running jobs did not finish in time; exiting anyway");
  }
  logInit("Shutdown complete");
}

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.on(signal, () => {
    shutdown(signal)
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        logFatal(`Shutdown failed: ${errorMessage(err)}`);
        process.exit(1);
      });
  });
}

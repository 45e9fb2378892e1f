import { describe, it, expect, vi } from "vitest";
import { AnswerPipeline, toDocumentPreview } from "./answer-pipeline.js";
import { Retriever } from "./retriever.js";
import { AnswerGenerator, buildContext, NO_DOCUMENTS_MESSAGE } from "./generator.js";
import { SessionTracker } from "./session-tracker.js";
import type { EmbeddingProvider } from "./embedding-provider.js";
import type { VectorStore } from "./vector-store.js";
import type { LlmProvider } from "./llm-provider.js";
import type { EvaluationTask, RetrievedDocument } from "./types.js";

// ─── Mock Factories ─────────────────────────────────────────────────────────────

function createSilentLogger() {
  return {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  };
}

const QUESTION = "¿Cuántos días de vacaciones corresponden por año?";
const ANSWER = "Según el Artículo 218, son 12 días hábiles por año.";

const VACATION_ARTICLE: RetrievedDocument = {
  id: 217,
  score: 0.912345,
  payload: {
    articulo: "Todo trabajador tiene derecho a 12 días hábiles de vacaciones remuneradas por cada año de servicio.",
    articulo_numero: 218,
    capitulo_descripcion: "De las vacaciones",
  },
};

function createEmbeddings(fail = false): EmbeddingProvider {
  return {
    defaultModel: "text-embedding-3-small",
    embed: async (texts) => texts.map(() => [0.1, 0.2]),
    embedOne: async () => {
      if (fail) throw new Error("embedding service unavailable");
      return [0.1, 0.2];
    },
  };
}

function createVectorStore(documents: RetrievedDocument[]): VectorStore {
  return {
    search: async (_c, _v, limit) => documents.slice(0, limit),
    collectionExists: async () => true,
    createCollection: async () => true,
    upsertDocuments: async () => ({ documentsProcessed: 0, documentsInserted: 0 }),
    deleteCollection: async () => true,
    listCollections: async () => [],
    getCollectionInfo: async () => null,
    healthCheck: async () => ({ status: "connected" }),
  };
}

function createPipeline(
  options: { documents?: RetrievedDocument[]; failEmbedding?: boolean; enqueue?: (task: EvaluationTask) => boolean } = {},
) {
  const tracker = new SessionTracker({ logger: createSilentLogger() });
  const complete = vi.fn(async (_prompt: string) => ANSWER);
  const llm: LlmProvider = { provider: "openai", model: "gpt-4o-mini", complete };
  const retriever = new Retriever(
    {
      embeddings: createEmbeddings(options.failEmbedding),
      vectorStore: createVectorStore(options.documents ?? [VACATION_ARTICLE]),
      tracker,
      logger: createSilentLogger(),
    },
    { collectionName: "labor_law_articles", topK: 5, useReranking: false },
  );
  const generator = new AnswerGenerator({ llm, tracker, logger: createSilentLogger() });
  const enqueue = vi.fn(options.enqueue ?? ((_task: EvaluationTask) => true));
  const pipeline = new AnswerPipeline({
    retriever,
    generator,
    tracker,
    evaluator: { enqueue },
    logger: createSilentLogger(),
  });
  return { pipeline, tracker, complete, enqueue };
}

// ─── Tests ──────────────────────────────────────────────────────────────────────

describe("toDocumentPreview", () => {
  it("rounds scores to four decimals and truncates the article", () => {
    const preview = toDocumentPreview({
      id: "a1",
      score: 0.123456,
      rerankScore: 0.987654,
      payload: { articulo: "x".repeat(250), articulo_numero: 12 },
    });
    expect(preview).toEqual({
      id: "a1",
      score: 0.1235,
      rerank_score: 0.9877,
      payload: { articulo_numero: 12, capitulo_descripcion: null, articulo: `${"x".repeat(200)}...` },
    });
  });

  it("uses null for an absent rerank score and empty text for a missing article", () => {
    const preview = toDocumentPreview({ id: 1, score: 0.5, payload: {} });
    expect(preview.rerank_score).toBeNull();
    expect(preview.payload).toEqual({ articulo_numero: null, capitulo_descripcion: null, articulo: "" });
  });
});

describe("AnswerPipeline", () => {
  it("answers a question from the retrieved article", async () => {
    const { pipeline } = createPipeline();

    const result = await pipeline.answer(QUESTION);

    expect(result.success).toBe(true);
    expect(result.question).toBe(QUESTION);
    expect(result.answer).toBe(ANSWER);
    expect(result.documents_retrieved).toBe(1);
    expect(result.top_k).toBe(5);
    expect(result.reranking_applied).toBe(false);
    expect(result.documents).toEqual([
      {
        id: 217,
        score: 0.9123,
        rerank_score: null,
        payload: {
          articulo_numero: 218,
          capitulo_descripcion: "De las vacaciones",
          articulo: VACATION_ARTICLE.payload.articulo,
        },
      },
    ]);
    expect(result.processing_time_seconds).toBeGreaterThanOrEqual(0);
    expect(result.error).toBeUndefined();
  });

  it("queues one evaluation with the context the answer was grounded on", async () => {
    const { pipeline, enqueue } = createPipeline();

    const result = await pipeline.answer(QUESTION);

    expect(enqueue).toHaveBeenCalledTimes(1);
    const [task] = enqueue.mock.calls[0];
    expect(task.sessionId).toBe(result.session_id);
    expect(task.question).toBe(QUESTION);
    expect(task.answer).toBe(ANSWER);
    expect(task.context).toBe(buildContext([VACATION_ARTICLE]));
    expect(task.documents).toEqual([VACATION_ARTICLE]);
    expect(task.metadata).toMatchObject({
      llmProvider: "openai",
      llmModel: "gpt-4o-mini",
      rerankingApplied: false,
      topK: 5,
    });
    expect(Number.isNaN(Date.parse(task.timestamp))).toBe(false);
  });

  it("returns the fixed message without an LLM call when nothing is retrieved", async () => {
    const { pipeline, complete } = createPipeline({ documents: [] });

    const result = await pipeline.answer(QUESTION);

    expect(result.success).toBe(true);
    expect(result.answer).toBe(NO_DOCUMENTS_MESSAGE);
    expect(result.documents_retrieved).toBe(0);
    expect(complete).not.toHaveBeenCalled();
  });

  it("turns a retrieval failure into an unsuccessful result", async () => {
    const { pipeline, enqueue } = createPipeline({ failEmbedding: true });

    const result = await pipeline.answer(QUESTION);

    expect(result).toMatchObject({
      success: false,
      question: QUESTION,
      error: "Query embedding failed: embedding service unavailable",
      documents_retrieved: 0,
      top_k: 5,
      reranking_applied: false,
      documents: [],
    });
    expect(result.answer).toBeUndefined();
    expect(enqueue).not.toHaveBeenCalled();
  });

  it("still answers when queueing the evaluation throws", async () => {
    const { pipeline } = createPipeline({
      enqueue: () => {
        throw new Error("queue broken");
      },
    });

    const result = await pipeline.answer(QUESTION);
    expect(result.success).toBe(true);
  });

  it("ends a session it created itself", async () => {
    const { pipeline, tracker } = createPipeline();

    const result = await pipeline.answer(QUESTION);

    expect(tracker.hasSession(result.session_id)).toBe(false);
  });

  it("leaves a caller-supplied session open and records on it", async () => {
    const { pipeline, tracker } = createPipeline();
    const sessionId = tracker.createSession("ana");

    const result = await pipeline.answer(QUESTION, sessionId);

    expect(result.session_id).toBe(sessionId);
    expect(tracker.hasSession(sessionId)).toBe(true);
    expect(tracker.getSession(sessionId)?.actions.map((a) => a.type)).toEqual([
      "embedding_generation",
      "vectorstore_search",
      "llm_call",
    ]);
  });

  it("answers concurrent questions in isolated sessions", async () => {
    const { pipeline, tracker } = createPipeline();

    const results = await Promise.all(Array.from({ length: 10 }, () => pipeline.answer(QUESTION)));

    expect(new Set(results.map((r) => r.session_id)).size).toBe(10);
    expect(results.every((r) => r.success)).toBe(true);
    expect(tracker.stats().active_sessions).toBe(0);
  });
});

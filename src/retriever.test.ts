import { describe, it, expect, vi } from "vitest";
import { Retriever, summarizeScores, type RetrieverOptions } from "./retriever.js";
import { SessionTracker } from "./session-tracker.js";
import { RetrievalError } from "./errors.js";
import type { EmbeddingProvider } from "./embedding-provider.js";
import type { VectorStore } from "./vector-store.js";
import type { Reranker } from "./reranker.js";
import type { RetrievedDocument } from "./types.js";

// ─── Mock Factories ─────────────────────────────────────────────────────────────

function createSilentLogger() {
  return {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  };
}

function createMockEmbeddings(vector: number[] = [0.1, 0.2, 0.3]) {
  const embedOne = vi.fn(async (_text: string, _model?: string) => vector);
  const provider: EmbeddingProvider = {
    defaultModel: "text-embedding-3-small",
    embed: async (texts) => texts.map(() => vector),
    embedOne,
  };
  return { provider, embedOne };
}

function createMockVectorStore(documents: RetrievedDocument[]) {
  const search = vi.fn(async (_collection: string, _vector: number[], limit: number) => documents.slice(0, limit));
  const store: VectorStore = {
    search,
    collectionExists: async () => true,
    createCollection: async () => true,
    upsertDocuments: async (_c, points) => ({ documentsProcessed: points.length, documentsInserted: points.length }),
    deleteCollection: async () => true,
    listCollections: async () => [],
    getCollectionInfo: async () => null,
    healthCheck: async () => ({ status: "connected" }),
  };
  return { store, search };
}

/** Scores each candidate text by a lookup on its article number suffix. */
function createMockReranker(scoreFor: (text: string, index: number) => number) {
  const score = vi.fn(async (_query: string, texts: string[]) => texts.map(scoreFor));
  const reranker: Reranker = { modelName: "test-reranker", score };
  return { reranker, score };
}

function makeDoc(id: number, score: number): RetrievedDocument {
  return {
    id,
    score,
    payload: {
      articulo: `Artículo de prueba ${id}`,
      articulo_numero: id,
      capitulo_descripcion: `Capítulo ${id}`,
    },
  };
}

const CANDIDATES = Array.from({ length: 10 }, (_, i) => makeDoc(i, 0.9 - i * 0.05));

function createRetriever(
  overrides: {
    documents?: RetrievedDocument[];
    reranker?: Reranker | null;
    options?: Partial<RetrieverOptions>;
    embeddings?: EmbeddingProvider;
    store?: VectorStore;
  } = {},
) {
  const logger = createSilentLogger();
  const tracker = new SessionTracker({ logger: createSilentLogger() });
  const sessionId = tracker.createSession();
  const embeddings = overrides.embeddings ?? createMockEmbeddings().provider;
  const vector = createMockVectorStore(overrides.documents ?? CANDIDATES);
  const retriever = new Retriever(
    {
      embeddings,
      vectorStore: overrides.store ?? vector.store,
      tracker,
      reranker: overrides.reranker ?? null,
      logger,
    },
    { collectionName: "labor_law_articles", topK: 3, useReranking: false, ...overrides.options },
  );
  return { retriever, tracker, sessionId, search: vector.search, logger };
}

// ─── Tests ──────────────────────────────────────────────────────────────────────

describe("summarizeScores", () => {
  it("computes min, max and mean", () => {
    expect(summarizeScores([0.2, 0.8, 0.5])).toEqual({ min: 0.2, max: 0.8, mean: 0.5 });
  });
});

describe("Retriever", () => {
  describe("without reranking", () => {
    it("searches for top_k documents and returns them in store order", async () => {
      const { retriever, sessionId, search } = createRetriever();

      const result = await retriever.retrieve("¿Cuántos días de vacaciones?", sessionId);

      expect(search).toHaveBeenCalledWith("labor_law_articles", [0.1, 0.2, 0.3], 3);
      expect(result.documents.map((d) => d.id)).toEqual([0, 1, 2]);
      expect(result.metadata).toEqual({ rerankingApplied: false });
    });

    it("records embedding and search actions on the session", async () => {
      const { retriever, tracker, sessionId } = createRetriever();

      await retriever.retrieve("jornada", sessionId);

      const actions = tracker.getSession(sessionId)?.actions ?? [];
      expect(actions.map((a) => a.type)).toEqual(["embedding_generation", "vectorstore_search"]);
      expect(actions[1].details).toMatchObject({
        query: "jornada",
        results_count: 3,
        metadata: { collection: "labor_law_articles", limit: 3 },
      });
    });

    it("returns an empty list when the store has nothing", async () => {
      const { retriever, sessionId } = createRetriever({ documents: [] });
      await expect(retriever.retrieve("algo", sessionId)).resolves.toEqual({
        documents: [],
        metadata: { rerankingApplied: false },
      });
    });

    it("keeps reranking off and warns when no reranker is configured", () => {
      const { retriever, logger } = createRetriever({ options: { useReranking: true } });
      expect(retriever.rerankingEnabled).toBe(false);
      expect(logger.warn).toHaveBeenCalledWith(
        "Reranking requested but no reranker configured; vector order will be used",
      );
    });
  });

  describe("with reranking", () => {
    it("fetches 2 × top_k candidates and keeps the top_k by rerank score", async () => {
      // Reverse the vector order: the last candidate gets the highest score.
      const { reranker, score } = createMockReranker((_text, i) => i / 10);
      const { retriever, sessionId, search } = createRetriever({
        reranker,
        options: { useReranking: true },
      });

      const result = await retriever.retrieve("vacaciones", sessionId);

      expect(search.mock.calls[0][2]).toBe(6);
      expect(score.mock.calls[0][1]).toHaveLength(6);
      expect(score.mock.calls[0][1][0]).toBe("Capítulo 0: Artículo de prueba 0");
      expect(result.documents.map((d) => d.id)).toEqual([5, 4, 3]);
      expect(result.documents.map((d) => d.rerankScore)).toEqual([0.5, 0.4, 0.3]);
      expect(result.metadata).toEqual({
        rerankingApplied: true,
        documentsReranked: 6,
        documentsReturned: 3,
        rerankScoresRange: { min: 0, max: 0.5, mean: summarizeScores([0, 0.1, 0.2, 0.3, 0.4, 0.5]).mean },
      });
    });

    it("returns every candidate when fewer than top_k are found", async () => {
      const { reranker } = createMockReranker((_text, i) => 1 - i / 10);
      const { retriever, sessionId } = createRetriever({
        documents: CANDIDATES.slice(0, 2),
        reranker,
        options: { useReranking: true },
      });

      const result = await retriever.retrieve("vacaciones", sessionId);
      expect(result.documents).toHaveLength(2);
      expect(result.metadata.documentsReturned).toBe(2);
    });

    it("skips the reranker when there are no candidates", async () => {
      const { reranker, score } = createMockReranker(() => 1);
      const { retriever, sessionId } = createRetriever({ documents: [], reranker, options: { useReranking: true } });

      const result = await retriever.retrieve("vacaciones", sessionId);
      expect(score).not.toHaveBeenCalled();
      expect(result.metadata.rerankingApplied).toBe(false);
    });

    it("falls back to the vector-search candidates when the reranker throws", async () => {
      const reranker: Reranker = {
        modelName: "test-reranker",
        score: async () => {
          throw new Error("reranker offline");
        },
      };
      const { retriever, tracker, sessionId, logger } = createRetriever({
        reranker,
        options: { useReranking: true },
      });

      const result = await retriever.retrieve("vacaciones", sessionId);

      expect(result.documents.map((d) => d.id)).toEqual([0, 1, 2, 3, 4, 5]);
      expect(result.metadata).toEqual({ rerankingApplied: false, rerankError: "reranker offline" });
      expect(logger.warn).toHaveBeenCalledWith("Reranking failed, keeping vector order: reranker offline");
      const actions = tracker.getSession(sessionId)?.actions ?? [];
      expect(actions[actions.length - 1].type).toBe("reranking");
    });

    it("treats a score count mismatch as a reranker failure", async () => {
      const reranker: Reranker = { modelName: "test-reranker", score: async () => [0.5] };
      const { retriever, sessionId } = createRetriever({ reranker, options: { useReranking: true } });

      const result = await retriever.retrieve("vacaciones", sessionId);
      expect(result.metadata.rerankError).toBe("Reranker returned 1 scores for 6 documents");
    });
  });

  describe("failures", () => {
    it("raises an embedding-stage RetrievalError when embedding fails", async () => {
      const embeddings: EmbeddingProvider = {
        defaultModel: "text-embedding-3-small",
        embed: async () => [],
        embedOne: async () => {
          throw new Error("invalid api key");
        },
      };
      const { retriever, tracker, sessionId, search } = createRetriever({ embeddings });

      const err = await retriever.retrieve("vacaciones", sessionId).catch((e: unknown) => e);

      expect(err).toBeInstanceOf(RetrievalError);
      if (err instanceof RetrievalError) {
        expect(err.stage).toBe("embedding");
        expect(err.message).toBe("Query embedding failed: invalid api key");
      }
      expect(search).not.toHaveBeenCalled();
      expect(tracker.getSession(sessionId)?.actions[0].details.error).toBe("invalid api key");
    });

    it("raises a search-stage RetrievalError when the store fails", async () => {
      const { store } = createMockVectorStore([]);
      store.search = async () => {
        throw new Error("Collection labor_law_articles does not exist");
      };
      const { retriever, sessionId } = createRetriever({ store });

      await expect(retriever.retrieve("vacaciones", sessionId)).rejects.toThrow(
        "Vector search failed: Collection labor_law_articles does not exist",
      );
    });
  });
});

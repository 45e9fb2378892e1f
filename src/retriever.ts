// Labor Law Assistant - Retriever
// Embeds a query, searches the vector store and, when enabled, reranks the
// candidates with a second-pass scorer.
//
// Stage flow:
//   embed(query) → search(limit = top_k, or 2 × top_k when reranking)
//                → rerank (sort desc, keep top_k) → (documents, metadata)
//
// Embedding and search failures propagate as RetrievalError. A reranker
// failure is recorded on the session and the vector-search order is returned
// unchanged.

import type { EmbeddingProvider } from "./embedding-provider.js";
import type { VectorStore } from "./vector-store.js";
import { rerankText, type Reranker } from "./reranker.js";
import type { SessionTracker } from "./session-tracker.js";
import type { RerankScoreRange, RetrievalResult, RetrievedDocument } from "./types.js";
import { RetrievalError } from "./errors.js";
import { createLogger, errorMessage, type Logger } from "./logger.js";
import { secondsSince, withTimeout } from "./utils.js";

// ─── Dependency injection interface ─────────────────────────────────────────────

export interface RetrieverDeps {
  embeddings: EmbeddingProvider;
  vectorStore: VectorStore;
  tracker: SessionTracker;
  /** Required for reranking; without one, reranking stays off. */
  reranker?: Reranker | null;
  logger?: Logger;
}

export interface RetrieverOptions {
  collectionName: string;
  topK: number;
  useReranking: boolean;
  embeddingModel?: string;
  rerankTimeoutMs?: number;
}

type ScoredDocument = RetrievedDocument & { readonly rerankScore: number };

/** min / max / arithmetic mean of a non-empty score list. */
export function summarizeScores(scores: readonly number[]): RerankScoreRange {
  let min = Infinity;
  let max = -Infinity;
  let sum = 0;
  for (const s of scores) {
    if (s < min) min = s;
    if (s > max) max = s;
    sum += s;
  }
  return { min, max, mean: sum / scores.length };
}

export class Retriever {
  private readonly embeddings: EmbeddingProvider;
  private readonly vectorStore: VectorStore;
  private readonly tracker: SessionTracker;
  private readonly reranker: Reranker | null;
  private readonly logger: Logger;
  private readonly options: RetrieverOptions;

  constructor(deps: RetrieverDeps, options: RetrieverOptions) {
    this.embeddings = deps.embeddings;
    this.vectorStore = deps.vectorStore;
    this.tracker = deps.tracker;
    this.reranker = deps.reranker ?? null;
    this.logger = deps.logger ?? createLogger("Retriever");
    this.options = options;

    if (options.useReranking && !this.reranker) {
      this.logger.warn("Reranking requested but no reranker configured; vector order will be used");
    }
  }

  get topK(): number {
    return this.options.topK;
  }

  get rerankingEnabled(): boolean {
    return this.options.useReranking && this.reranker !== null;
  }

  async retrieve(query: string, sessionId: string): Promise<RetrievalResult> {
    const queryVector = await this.embedQuery(query, sessionId);
    const reranker = this.rerankingEnabled ? this.reranker : null;
    const limit = reranker ? this.options.topK * 2 : this.options.topK;
    const candidates = await this.search(query, queryVector, limit, sessionId);

    if (!reranker || candidates.length === 0) {
      return { documents: candidates, metadata: { rerankingApplied: false } };
    }
    return this.rerank(query, candidates, reranker, sessionId);
  }

  // ── Stages ─────────────────────────────────────────────────────────────────

  private async embedQuery(query: string, sessionId: string): Promise<number[]> {
    const model = this.options.embeddingModel ?? this.embeddings.defaultModel;
    const start = performance.now();
    try {
      const vector = await this.embeddings.embedOne(query, model);
      this.tracker.trackEmbedding(sessionId, { text: query, model, generationTimeSeconds: secondsSince(start) });
      return vector;
    } catch (err) {
      this.tracker.trackEmbedding(sessionId, {
        text: query,
        model,
        generationTimeSeconds: secondsSince(start),
        error: errorMessage(err),
      });
      this.logger.error(`Query embedding failed: ${errorMessage(err)}`);
      throw new RetrievalError("embedding", `Query embedding failed: ${errorMessage(err)}`, { cause: err });
    }
  }

  private async search(
    query: string,
    vector: number[],
    limit: number,
    sessionId: string,
  ): Promise<RetrievedDocument[]> {
    const start = performance.now();
    try {
      const documents = await this.vectorStore.search(this.options.collectionName, vector, limit);
      this.tracker.trackSearch(sessionId, {
        query,
        resultsCount: documents.length,
        searchTimeSeconds: secondsSince(start),
        metadata: { collection: this.options.collectionName, limit },
      });
      return documents;
    } catch (err) {
      this.tracker.trackSearch(sessionId, {
        query,
        resultsCount: 0,
        searchTimeSeconds: secondsSince(start),
        metadata: { collection: this.options.collectionName, limit, error: errorMessage(err) },
      });
      this.logger.error(`Vector search failed: ${errorMessage(err)}`);
      throw new RetrievalError("search", `Vector search failed: ${errorMessage(err)}`, { cause: err });
    }
  }

  private async rerank(
    query: string,
    candidates: RetrievedDocument[],
    reranker: Reranker,
    sessionId: string,
  ): Promise<RetrievalResult> {
    const start = performance.now();
    try {
      const scoring = reranker.score(query, candidates.map(rerankText));
      const scores = this.options.rerankTimeoutMs
        ? await withTimeout(scoring, this.options.rerankTimeoutMs, "Reranking")
        : await scoring;
      if (scores.length !== candidates.length) {
        throw new Error(`Reranker returned ${scores.length} scores for ${candidates.length} documents`);
      }

      const scored: ScoredDocument[] = candidates.map((doc, i) => ({ ...doc, rerankScore: scores[i] }));
      scored.sort((a, b) => b.rerankScore - a.rerankScore);
      const documents = scored.slice(0, this.options.topK);
      const range = summarizeScores(scores);

      this.tracker.trackReranking(sessionId, {
        query,
        documentsCount: candidates.length,
        rerankingTimeSeconds: secondsSince(start),
        metadata: {
          model: reranker.modelName,
          documents_returned: documents.length,
          score_min: range.min,
          score_max: range.max,
          score_mean: range.mean,
        },
      });
      this.logger.debug(`Reranked ${candidates.length} candidates down to ${documents.length}`);

      return {
        documents,
        metadata: {
          rerankingApplied: true,
          documentsReranked: candidates.length,
          documentsReturned: documents.length,
          rerankScoresRange: range,
        },
      };
    } catch (err) {
      this.tracker.trackReranking(sessionId, {
        query,
        documentsCount: candidates.length,
        rerankingTimeSeconds: secondsSince(start),
        metadata: { model: reranker.modelName, error: errorMessage(err) },
      });
      this.logger.warn(`Reranking failed, keeping vector order: ${errorMessage(err)}`);
      return {
        documents: candidates,
        metadata: { rerankingApplied: false, rerankError: errorMessage(err) },
      };
    }
  }
}

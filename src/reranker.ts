// Labor Law Assistant - Reranker
// Second-pass relevance scoring over the vector-search candidates.

import type { EmbeddingProvider } from "./embedding-provider.js";
import type { RetrievedDocument } from "./types.js";
import { cosineSimilarity } from "./utils.js";

export interface Reranker {
  /** One score per text, aligned with the input order. Higher is more relevant. */
  score(query: string, texts: string[]): Promise<number[]>;
  readonly modelName: string;
}

/** Text the reranker sees for a candidate: "<chapter description>: <article text>". */
export function rerankText(doc: RetrievedDocument): string {
  const chapter = doc.payload.capitulo_descripcion ?? "";
  const article = doc.payload.articulo ?? "";
  return `${chapter}: ${article}`;
}

/**
 * Scores each candidate by the cosine similarity between the query embedding
 * and the candidate-text embedding, computed together in one batch so query
 * and candidates share a model.
 */
export class EmbeddingSimilarityReranker implements Reranker {
  private readonly embeddings: EmbeddingProvider;
  readonly modelName: string;

  constructor(embeddings: EmbeddingProvider, model?: string) {
    this.embeddings = embeddings;
    this.modelName = model ?? embeddings.defaultModel;
  }

  async score(query: string, texts: string[]): Promise<number[]> {
    if (texts.length === 0) return [];
    const [queryVector, ...candidateVectors] = await this.embeddings.embed([query, ...texts], this.modelName);
    return candidateVectors.map((vector) => cosineSimilarity(queryVector, vector));
  }
}

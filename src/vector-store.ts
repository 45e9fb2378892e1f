// Labor Law Assistant - Vector store
// Qdrant-backed storage and similarity search for article vectors.

import type { ArticlePayload, RetrievedDocument, ServiceHealth } from "./types.js";
import { createLogger, errorMessage, type Logger } from "./logger.js";
import { withTimeout } from "./utils.js";

// ─── Qdrant client interface (for testability / dependency injection) ────────────

export type QdrantDistance = "Cosine" | "Euclid" | "Dot" | "Manhattan";

export interface QdrantPoint {
  id: string | number;
  vector: number[];
  payload?: Record<string, unknown>;
}

/**
 * Minimal interface for the @qdrant/js-client-rest surface we use.
 * Tests inject an in-memory fake; production passes a QdrantClient.
 */
export interface QdrantLikeClient {
  search(
    collectionName: string,
    args: { vector: number[]; limit: number; with_payload?: boolean },
  ): Promise<Array<{ id: string | number; score: number; payload?: Record<string, unknown> | null }>>;
  getCollections(): Promise<{ collections: Array<{ name: string }> }>;
  collectionExists(collectionName: string): Promise<{ exists: boolean }>;
  getCollection(collectionName: string): Promise<{
    status: string;
    points_count?: number | null;
    indexed_vectors_count?: number | null;
    config: { params: { vectors?: unknown } };
  }>;
  createCollection(
    collectionName: string,
    args: { vectors: { size: number; distance: QdrantDistance } },
  ): Promise<boolean>;
  deleteCollection(collectionName: string): Promise<boolean>;
  upsert(collectionName: string, args: { wait?: boolean; points: QdrantPoint[] }): Promise<unknown>;
}

export interface CollectionInfo {
  name: string;
  pointsCount: number;
  indexedVectorsCount: number;
  vectorSize: number | null;
  distanceMetric: string | null;
  status: string;
}

export interface UpsertSummary {
  documentsProcessed: number;
  documentsInserted: number;
}

export interface VectorStore {
  search(collectionName: string, vector: number[], limit: number): Promise<RetrievedDocument[]>;
  collectionExists(collectionName: string): Promise<boolean>;
  /** Returns false when the collection exists and `replaceExisting` is off. */
  createCollection(collectionName: string, vectorSize: number, replaceExisting: boolean): Promise<boolean>;
  upsertDocuments(collectionName: string, points: QdrantPoint[], batchSize: number): Promise<UpsertSummary>;
  deleteCollection(collectionName: string): Promise<boolean>;
  listCollections(): Promise<string[]>;
  getCollectionInfo(collectionName: string): Promise<CollectionInfo | null>;
  healthCheck(): Promise<ServiceHealth>;
}

// ─── Payload normalization ──────────────────────────────────────────────────────

function asIdentifier(value: unknown): number | string | null {
  return typeof value === "number" || typeof value === "string" ? value : null;
}

function asText(value: unknown): string | undefined {
  return typeof value === "string" ? value : undefined;
}

/** Narrows a stored payload to the article fields the pipeline reads. */
export function toArticlePayload(raw: Record<string, unknown> | null | undefined): ArticlePayload {
  if (!raw) return {};
  const payload: ArticlePayload = {};
  for (const [key, value] of Object.entries(raw)) {
    payload[key] = value;
  }
  payload.articulo = asText(raw.articulo);
  payload.capitulo_descripcion = asText(raw.capitulo_descripcion);
  payload.articulo_numero = asIdentifier(raw.articulo_numero);
  return payload;
}

function readVectorParams(vectors: unknown): { size: number | null; distance: string | null } {
  if (typeof vectors !== "object" || vectors === null) return { size: null, distance: null };
  const size = "size" in vectors && typeof vectors.size === "number" ? vectors.size : null;
  const distance = "distance" in vectors && typeof vectors.distance === "string" ? vectors.distance : null;
  return { size, distance };
}

// ─── QdrantVectorStore ──────────────────────────────────────────────────────────

export interface QdrantVectorStoreOptions {
  timeoutMs?: number;
  logger?: Logger;
}

export class QdrantVectorStore implements VectorStore {
  private readonly client: QdrantLikeClient;
  private readonly timeoutMs: number;
  private readonly logger: Logger;

  constructor(client: QdrantLikeClient, options: QdrantVectorStoreOptions = {}) {
    this.client = client;
    this.timeoutMs = options.timeoutMs ?? 10_000;
    this.logger = options.logger ?? createLogger("VectorStore");
  }

  async search(collectionName: string, vector: number[], limit: number): Promise<RetrievedDocument[]> {
    if (!(await this.collectionExists(collectionName))) {
      throw new Error(`Collection ${collectionName} does not exist`);
    }
    const hits = await withTimeout(
      this.client.search(collectionName, { vector, limit, with_payload: true }),
      this.timeoutMs,
      `Vector search in ${collectionName}`,
    );
    return hits.map((hit) => ({
      id: hit.id,
      score: hit.score,
      payload: toArticlePayload(hit.payload),
    }));
  }

  async collectionExists(collectionName: string): Promise<boolean> {
    const { exists } = await withTimeout(
      this.client.collectionExists(collectionName),
      this.timeoutMs,
      `Collection lookup for ${collectionName}`,
    );
    return exists;
  }

  async createCollection(collectionName: string, vectorSize: number, replaceExisting: boolean): Promise<boolean> {
    if (await this.collectionExists(collectionName)) {
      if (!replaceExisting) {
        this.logger.warn(`Collection ${collectionName} already exists`);
        return false;
      }
      this.logger.info(`Deleting existing collection: ${collectionName}`);
      await withTimeout(this.client.deleteCollection(collectionName), this.timeoutMs, `Delete ${collectionName}`);
    }
    await withTimeout(
      this.client.createCollection(collectionName, { vectors: { size: vectorSize, distance: "Cosine" } }),
      this.timeoutMs,
      `Create ${collectionName}`,
    );
    this.logger.info(`Collection '${collectionName}' created (${vectorSize} dimensions)`);
    return true;
  }

  async upsertDocuments(collectionName: string, points: QdrantPoint[], batchSize: number): Promise<UpsertSummary> {
    if (!(await this.collectionExists(collectionName))) {
      throw new Error(`Collection ${collectionName} does not exist`);
    }
    let inserted = 0;
    for (let start = 0; start < points.length; start += batchSize) {
      const batch = points.slice(start, start + batchSize);
      await withTimeout(
        this.client.upsert(collectionName, { wait: true, points: batch }),
        this.timeoutMs,
        `Upsert batch into ${collectionName}`,
      );
      inserted += batch.length;
      this.logger.info(`Inserted batch ${Math.floor(start / batchSize) + 1}: ${batch.length} documents`);
    }
    return { documentsProcessed: points.length, documentsInserted: inserted };
  }

  async deleteCollection(collectionName: string): Promise<boolean> {
    if (!(await this.collectionExists(collectionName))) {
      this.logger.warn(`Collection ${collectionName} does not exist`);
      return false;
    }
    await withTimeout(this.client.deleteCollection(collectionName), this.timeoutMs, `Delete ${collectionName}`);
    this.logger.info(`Collection '${collectionName}' deleted`);
    return true;
  }

  async listCollections(): Promise<string[]> {
    const { collections } = await withTimeout(this.client.getCollections(), this.timeoutMs, "List collections");
    return collections.map((c) => c.name);
  }

  async getCollectionInfo(collectionName: string): Promise<CollectionInfo | null> {
    if (!(await this.collectionExists(collectionName))) return null;
    const info = await withTimeout(
      this.client.getCollection(collectionName),
      this.timeoutMs,
      `Collection info for ${collectionName}`,
    );
    const { size, distance } = readVectorParams(info.config.params.vectors);
    return {
      name: collectionName,
      pointsCount: info.points_count ?? 0,
      indexedVectorsCount: info.indexed_vectors_count ?? 0,
      vectorSize: size,
      distanceMetric: distance,
      status: info.status,
    };
  }

  async healthCheck(): Promise<ServiceHealth> {
    try {
      const collections = await this.listCollections();
      return { status: "connected", collections_count: collections.length };
    } catch (err) {
      this.logger.error(`Qdrant health check failed: ${errorMessage(err)}`);
      return { status: "disconnected", error: errorMessage(err) };
    }
  }
}

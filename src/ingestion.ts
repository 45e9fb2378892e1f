// Labor Law Assistant - Ingestion
// Loads a processed statute file ({ meta, articulos[] }) from disk, embeds
// every article and writes the vectors to the configured collection.
//
// Runs only as a JobTracker work unit; see server.ts for the HTTP trigger.

import { readFile } from "node:fs/promises";
import { isAbsolute, relative, resolve } from "node:path";
import { z } from "zod";
import type { EmbeddingProvider } from "./embedding-provider.js";
import type { QdrantPoint, VectorStore } from "./vector-store.js";
import type { SessionTracker } from "./session-tracker.js";
import type { ArticlePayload } from "./types.js";
import { ValidationError } from "./errors.js";
import { createLogger, errorMessage, type Logger } from "./logger.js";
import { roundTo, secondsSince } from "./utils.js";

// ─── File schema ────────────────────────────────────────────────────────────────

const identifier = z.union([z.number(), z.string()]).nullish();

const ArticleSchema = z
  .object({
    libro: z.string().nullish(),
    libro_numero: identifier,
    titulo: z.string().nullish(),
    capitulo: z.string().nullish(),
    capitulo_numero: identifier,
    capitulo_descripcion: z.string().nullish(),
    articulo: z.string().nullish(),
    articulo_numero: identifier,
  })
  .passthrough();

const StatuteFileSchema = z.object({
  meta: z.object({ numero_ley: identifier }).passthrough().nullish(),
  articulos: z.array(ArticleSchema).default([]),
});

export type StatuteFile = z.infer<typeof StatuteFileSchema>;

export interface PreparedArticle {
  payload: ArticlePayload;
  /** "<capitulo_descripcion>: <articulo>" */
  text: string;
}

/** Builds the stored payload and the embedding text for every article. */
export function prepareArticles(file: StatuteFile): PreparedArticle[] {
  const source = `codigo_trabajo_paraguay_ley${file.meta?.numero_ley ?? "unknown"}`;
  return file.articulos.map((article) => {
    const chapter = article.capitulo_descripcion ?? "";
    const text = article.articulo ?? "";
    return {
      text: `${chapter}: ${text}`,
      payload: {
        libro: article.libro ?? null,
        libro_numero: article.libro_numero ?? null,
        titulo: article.titulo ?? null,
        capitulo: article.capitulo ?? null,
        capitulo_numero: article.capitulo_numero ?? null,
        capitulo_descripcion: chapter,
        articulo: text,
        articulo_numero: article.articulo_numero ?? null,
        articulo_len: text.length,
        source,
      },
    };
  });
}

/** Resolves `child` under `root`, rejecting anything that escapes it. */
export function resolveInside(root: string, child: string): string {
  const target = resolve(root, child);
  const rel = relative(root, target);
  if (rel.startsWith("..") || isAbsolute(rel)) {
    throw new ValidationError(`Path escapes the data directory: ${child}`);
  }
  return target;
}

// ─── IngestionService ───────────────────────────────────────────────────────────

export interface IngestionServiceDeps {
  embeddings: EmbeddingProvider;
  vectorStore: VectorStore;
  tracker: SessionTracker;
  logger?: Logger;
}

export interface IngestionServiceOptions {
  collectionName: string;
  /** Default directory for statute files, relative to `baseDir`. */
  dataDir: string;
  /** Root every data path must stay inside. Defaults to the working directory. */
  baseDir?: string;
}

export interface LoadLocalRequest {
  filename: string;
  /** Overrides the default data directory; still relative to the base directory. */
  dataPath?: string | null;
  replaceCollection: boolean;
  batchSize: number;
}

export interface LoadResult {
  collection_name: string;
  documents_processed: number;
  documents_inserted: number;
  processing_time_seconds: number;
  embedding_model_used: string;
  vector_dimensions: number;
  batch_size: number;
  [key: string]: unknown;
}

export class IngestionService {
  private readonly embeddings: EmbeddingProvider;
  private readonly vectorStore: VectorStore;
  private readonly tracker: SessionTracker;
  private readonly logger: Logger;
  private readonly collectionName: string;
  private readonly dataDir: string;
  private readonly baseDir: string;

  constructor(deps: IngestionServiceDeps, options: IngestionServiceOptions) {
    this.embeddings = deps.embeddings;
    this.vectorStore = deps.vectorStore;
    this.tracker = deps.tracker;
    this.logger = deps.logger ?? createLogger("Ingestion");
    this.collectionName = options.collectionName;
    this.dataDir = options.dataDir;
    this.baseDir = resolve(options.baseDir ?? process.cwd());
  }

  get targetCollection(): string {
    return this.collectionName;
  }

  async readStatuteFile(filename: string, dataPath?: string | null): Promise<StatuteFile> {
    const directory = resolveInside(this.baseDir, dataPath ?? this.dataDir);
    const filePath = resolveInside(directory, filename);
    this.logger.info(`Loading local data from: ${filePath}`);

    let raw: string;
    try {
      raw = await readFile(filePath, "utf-8");
    } catch (err) {
      throw new ValidationError(`File not found or unreadable: ${filename} (${errorMessage(err)})`);
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (err) {
      throw new ValidationError(`File ${filename} is not valid JSON: ${errorMessage(err)}`);
    }

    const parsed = StatuteFileSchema.safeParse(json);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
      throw new ValidationError(`File ${filename} has an unexpected shape: ${issues}`);
    }
    return parsed.data;
  }

  /**
   * Reads, embeds and stores one statute file. `sessionId` is the job's
   * monitoring session; the load is reported on it as one operation.
   */
  async loadFromLocalFile(request: LoadLocalRequest, sessionId: string): Promise<LoadResult> {
    const start = performance.now();
    const file = await this.readStatuteFile(request.filename, request.dataPath);
    const articles = prepareArticles(file);
    if (articles.length === 0) {
      throw new ValidationError("No articles found in data");
    }
    this.logger.info(`Processing ${articles.length} documents for embedding`);

    const model = this.embeddings.defaultModel;
    const embedStart = performance.now();
    const vectors = await this.embeddings.embed(
      articles.map((a) => a.text),
      model,
    );
    this.tracker.trackEmbedding(sessionId, {
      text: `${articles.length} articles from ${request.filename}`,
      model,
      generationTimeSeconds: secondsSince(embedStart),
    });

    const vectorSize = vectors[0]?.length ?? 0;
    if (vectorSize === 0) {
      throw new Error("Embedding provider returned empty vectors");
    }

    await this.vectorStore.createCollection(this.collectionName, vectorSize, request.replaceCollection);
    const points: QdrantPoint[] = articles.map((article, i) => ({
      id: i,
      vector: vectors[i],
      payload: article.payload,
    }));
    const summary = await this.vectorStore.upsertDocuments(this.collectionName, points, request.batchSize);

    const result: LoadResult = {
      collection_name: this.collectionName,
      documents_processed: summary.documentsProcessed,
      documents_inserted: summary.documentsInserted,
      processing_time_seconds: roundTo(secondsSince(start), 3),
      embedding_model_used: model,
      vector_dimensions: vectorSize,
      batch_size: request.batchSize,
    };
    this.tracker.trackOperation(sessionId, {
      operationType: "load_documents",
      collectionName: this.collectionName,
      metadata: {
        filename: request.filename,
        documents_inserted: result.documents_inserted,
        vector_dimensions: vectorSize,
      },
    });
    this.logger.info(`Loaded ${result.documents_inserted} documents into ${this.collectionName}`);
    return result;
  }
}

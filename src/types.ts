// Labor Law Assistant - Shared TypeScript interfaces and types
// Runtime code lives in its own modules; this file only declares shapes.

// ─── Retrieval ──────────────────────────────────────────────────────────────────

/**
 * Payload stored alongside each article vector. The Spanish field names are
 * the ingestion file's own and are kept as-is so stored points stay readable.
 */
export interface ArticlePayload {
  articulo?: string;
  articulo_numero?: number | string | null;
  capitulo_descripcion?: string;
  capitulo?: string | null;
  capitulo_numero?: number | string | null;
  libro?: string | null;
  libro_numero?: number | string | null;
  titulo?: string | null;
  articulo_len?: number;
  source?: string;
  [key: string]: unknown;
}

export interface RetrievedDocument {
  readonly id: string | number;
  readonly score: number;
  /** Present only when the reranker scored this document. */
  readonly rerankScore?: number;
  readonly payload: Readonly<ArticlePayload>;
}

export interface RerankScoreRange {
  min: number;
  max: number;
  mean: number;
}

export interface RetrievalMetadata {
  rerankingApplied: boolean;
  documentsReranked?: number;
  documentsReturned?: number;
  rerankScoresRange?: RerankScoreRange;
  /** Set when the reranker threw and the vector-search order was kept. */
  rerankError?: string;
}

export interface RetrievalResult {
  documents: RetrievedDocument[];
  metadata: RetrievalMetadata;
}

// ─── Answers ────────────────────────────────────────────────────────────────────

export interface DocumentPreview {
  id: string | number;
  score: number;
  rerank_score: number | null;
  payload: {
    articulo_numero: number | string | null;
    capitulo_descripcion: string | null;
    articulo: string;
  };
}

/** Terminal value of one answering request. Never mutated after construction. */
export interface AnswerResult {
  readonly success: boolean;
  readonly question: string;
  readonly answer?: string;
  readonly error?: string;
  readonly processing_time_seconds: number;
  readonly documents_retrieved: number;
  readonly top_k: number;
  readonly reranking_applied: boolean;
  readonly documents: readonly DocumentPreview[];
  readonly session_id: string;
}

// ─── Evaluation ─────────────────────────────────────────────────────────────────

export interface EvaluationTaskMetadata {
  processingTimeSeconds: number;
  llmProvider: string;
  llmModel: string;
  rerankingApplied: boolean;
  topK: number;
}

/** Message placed on the evaluation queue; consumed exactly once. */
export interface EvaluationTask {
  readonly sessionId: string;
  readonly question: string;
  readonly context: string;
  readonly answer: string;
  readonly documents: readonly RetrievedDocument[];
  readonly metadata: EvaluationTaskMetadata;
  /** ISO-8601 enqueue time. */
  readonly timestamp: string;
}

/** Each score is in [0, 1], or null when that sub-check was unavailable. */
export interface EvaluationMetrics {
  relevance: number | null;
  hallucination: number | null;
  toxicity: number | null;
  grounding: number | null;
  overallQuality: number | null;
  evalTimeSeconds: number;
}

// ─── Monitoring sessions ────────────────────────────────────────────────────────

export type SessionActionType =
  | "embedding_generation"
  | "vectorstore_search"
  | "reranking"
  | "llm_call"
  | "vectorstore_operation"
  | "llm_evaluation";

export interface SessionAction {
  type: SessionActionType;
  timestamp: Date;
  details: Record<string, unknown>;
}

export interface LlmCallRecord {
  timestamp: Date;
  provider: string;
  model: string;
  prompt: string;
  response: string;
  metadata: Record<string, unknown>;
}

export interface MonitoringSession {
  id: string;
  userId: string | null;
  startTime: Date;
  actions: SessionAction[];
  llmCalls: LlmCallRecord[];
  metrics: Record<string, unknown>;
}

export interface LlmUsageSummary {
  total_calls: number;
  providers_used: string[];
  models_used: string[];
  avg_response_length: number;
  /** Call count keyed by `provider/model`. */
  by_provider_model: Record<string, number>;
}

export interface SessionMetrics {
  total_actions: number;
  llm_calls_count: number;
  duration_seconds: number;
  actions_per_minute: number;
  action_types: Partial<Record<SessionActionType, number>>;
  llm?: LlmUsageSummary;
}

/** Returned by endSession(); empty object when the session id was unknown. */
export type SessionSummary =
  | {
      session_id: string;
      user_id: string | null;
      start_time: string;
      end_time: string;
      duration_seconds: number;
      metrics: SessionMetrics;
    }
  | Record<string, never>;

// ─── Background jobs ────────────────────────────────────────────────────────────

export enum JobStatus {
  QUEUED = "queued",
  PROCESSING = "processing",
  COMPLETED = "completed",
  FAILED = "failed",
}

export interface JobRecord {
  jobId: string;
  status: JobStatus;
  operation: string;
  user: string;
  collectionName: string | null;
  filename: string | null;
  createdAt: Date;
  startedAt: Date | null;
  completedAt: Date | null;
  result: Record<string, unknown> | null;
  error: string | null;
  sessionId: string | null;
}

/** Wire shape of a job for the status endpoints. */
export interface JobStatusView {
  job_id: string;
  status: JobStatus;
  operation: string;
  user: string;
  filename: string | null;
  collection_name: string | null;
  created_at: string;
  started_at: string | null;
  completed_at: string | null;
  result: Record<string, unknown> | null;
  error: string | null;
}

// ─── Health ─────────────────────────────────────────────────────────────────────

export interface ServiceHealth {
  status: "healthy" | "unhealthy" | "disabled" | "connected" | "disconnected";
  [key: string]: unknown;
}

// ─── Utilities ──────────────────────────────────────────────────────────────────

export interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
}

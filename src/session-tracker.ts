// Labor Law Assistant - Session Tracker
// Correlation sessions for observability: every tracked sub-operation of one
// request (embedding, search, reranking, LLM call, evaluation) is appended to
// the session and mirrored to the monitoring sink as a span.
//
// Sessions live in memory only and are evicted by endSession(). Nothing here
// throws into the answering path: unknown ids are ignored, sink failures are
// logged by the sink.

import { v4 as uuidv4 } from "uuid";
import type {
  LlmCallRecord,
  LlmUsageSummary,
  MonitoringSession,
  SessionActionType,
  SessionMetrics,
  SessionSummary,
} from "./types.js";
import { toPrimitiveAttributes, type EventKind, type MonitoringSink } from "./telemetry.js";
import { createLogger, errorMessage, type Logger } from "./logger.js";
import { countWords } from "./utils.js";

// ─── Dependency injection interface ─────────────────────────────────────────────

export interface SessionTrackerDeps {
  sink?: MonitoringSink;
  logger?: Logger;
  /** Clock override for duration tests. */
  now?: () => Date;
}

export interface LlmCallInput {
  provider: string;
  model: string;
  prompt: string;
  response: string;
  metadata?: Record<string, unknown>;
}

export interface ResponseQuality {
  coherence: number;
  relevance: number;
  completeness: number;
}

/**
 * Cheap lexical quality signals attached to every LLM-call span.
 * These are not the evaluation worker's scores; they need no model call.
 */
export function estimateResponseQuality(prompt: string, response: string): ResponseQuality {
  const promptWords = countWords(prompt);
  const responseWords = countWords(response);
  const coherence = Math.min(responseWords / Math.max(promptWords, 1), 2.0) / 2.0;

  const promptSet = new Set(prompt.toLowerCase().split(/\s+/).filter((w) => w.length > 0));
  const responseSet = new Set(response.toLowerCase().split(/\s+/).filter((w) => w.length > 0));
  let shared = 0;
  for (const word of promptSet) {
    if (responseSet.has(word)) shared++;
  }
  const relevance = promptSet.size > 0 ? shared / promptSet.size : 0;

  const completeness = Math.min(response.length / 1000, 1.0);
  return { coherence, relevance, completeness };
}

export class SessionTracker {
  // Every mutation below runs synchronously inside one event-loop turn, so two
  // callers can never interleave a structural update of the same record.
  private readonly sessions: Map<string, MonitoringSession> = new Map();
  private readonly sink: MonitoringSink | null;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(deps: SessionTrackerDeps = {}) {
    this.sink = deps.sink ?? null;
    this.logger = deps.logger ?? createLogger("SessionTracker");
    this.now = deps.now ?? (() => new Date());
  }

  // ── Lifecycle ──────────────────────────────────────────────────────────────

  createSession(userId?: string): string {
    const id = uuidv4();
    this.sessions.set(id, {
      id,
      userId: userId ?? null,
      startTime: this.now(),
      actions: [],
      llmCalls: [],
      metrics: {},
    });
    this.logger.debug(`Created monitoring session ${id}`);
    return id;
  }

  /**
   * Summarizes and evicts a session. Unknown (or already ended) ids yield an
   * empty summary and a warning.
   */
  endSession(sessionId: string): SessionSummary {
    const session = this.sessions.get(sessionId);
    if (!session) {
      this.logger.warn(`Session ${sessionId} not found`);
      return {};
    }
    this.sessions.delete(sessionId);

    const endTime = this.now();
    const durationSeconds = Math.max(0, (endTime.getTime() - session.startTime.getTime()) / 1000);
    const metrics = this.computeMetrics(session, durationSeconds);
    this.logger.info(`Session ${sessionId} ended. Duration: ${durationSeconds.toFixed(2)}s, actions: ${metrics.total_actions}`);

    return {
      session_id: session.id,
      user_id: session.userId,
      start_time: session.startTime.toISOString(),
      end_time: endTime.toISOString(),
      duration_seconds: durationSeconds,
      metrics,
    };
  }

  hasSession(sessionId: string): boolean {
    return this.sessions.has(sessionId);
  }

  /** Read-only view for tests and diagnostics. */
  getSession(sessionId: string): Readonly<MonitoringSession> | undefined {
    return this.sessions.get(sessionId);
  }

  // ── Raw recording (no sink) ────────────────────────────────────────────────

  recordAction(sessionId: string, type: SessionActionType, details: Record<string, unknown> = {}): void {
    const session = this.sessions.get(sessionId);
    if (!session) return;
    session.actions.push({ type, timestamp: this.now(), details });
  }

  recordLlmCall(sessionId: string, call: LlmCallInput): void {
    const session = this.sessions.get(sessionId);
    if (!session) return;
    const record: LlmCallRecord = {
      timestamp: this.now(),
      provider: call.provider,
      model: call.model,
      prompt: call.prompt,
      response: call.response,
      metadata: call.metadata ?? {},
    };
    session.llmCalls.push(record);
    session.actions.push({
      type: "llm_call",
      timestamp: record.timestamp,
      details: { provider: call.provider, model: call.model },
    });
  }

  // ── Tracking (record + span) ───────────────────────────────────────────────

  trackEmbedding(
    sessionId: string,
    input: { text: string; model: string; generationTimeSeconds: number; error?: string },
  ): void {
    this.recordAction(sessionId, "embedding_generation", {
      text: input.text,
      model: input.model,
      generation_time: input.generationTimeSeconds,
      error: input.error ?? null,
    });
    this.emit("embedding_generation", "client", sessionId, {
      "embedding.model": input.model,
      "embedding.text_length": input.text.length,
      "embedding.generation_time": input.generationTimeSeconds,
      ...(input.error ? { "embedding.error": input.error } : {}),
    });
  }

  trackSearch(
    sessionId: string,
    input: { query: string; resultsCount: number; searchTimeSeconds: number; metadata?: Record<string, unknown> },
  ): void {
    this.recordAction(sessionId, "vectorstore_search", {
      query: input.query,
      results_count: input.resultsCount,
      search_time: input.searchTimeSeconds,
      metadata: input.metadata ?? null,
    });
    this.emit("vectorstore_search", "client", sessionId, {
      "vectorstore.query_length": input.query.length,
      "vectorstore.results_count": input.resultsCount,
      "vectorstore.search_time": input.searchTimeSeconds,
      ...prefixKeys("vectorstore.meta.", input.metadata),
    });
  }

  trackReranking(
    sessionId: string,
    input: { query: string; documentsCount: number; rerankingTimeSeconds: number; metadata?: Record<string, unknown> },
  ): void {
    this.recordAction(sessionId, "reranking", {
      query: input.query,
      documents_count: input.documentsCount,
      reranking_time: input.rerankingTimeSeconds,
      metadata: input.metadata ?? null,
    });
    this.emit("document_reranking", "client", sessionId, {
      "reranking.query_length": input.query.length,
      "reranking.documents_count": input.documentsCount,
      "reranking.time": input.rerankingTimeSeconds,
      ...prefixKeys("reranking.meta.", input.metadata),
    });
  }

  trackLlmCall(sessionId: string, call: LlmCallInput): void {
    this.recordLlmCall(sessionId, call);
    const quality = estimateResponseQuality(call.prompt, call.response);
    this.emit(`llm_call_${call.provider}_${call.model}`, "client", sessionId, {
      "llm.provider": call.provider,
      "llm.model": call.model,
      "llm.prompt_length": call.prompt.length,
      "llm.response_length": call.response.length,
      "llm.quality.coherence": quality.coherence,
      "llm.quality.relevance": quality.relevance,
      "llm.quality.completeness": quality.completeness,
      ...prefixKeys("llm.meta.", call.metadata),
    });
  }

  /**
   * Generic operation span (collection loads, evaluation results). Metadata
   * values may be nested; they are flattened to primitives before emitting.
   */
  trackOperation(
    sessionId: string,
    input: { operationType: string; collectionName: string; metadata?: Record<string, unknown>; actionType?: SessionActionType },
  ): void {
    this.recordAction(sessionId, input.actionType ?? "vectorstore_operation", {
      operation: input.operationType,
      collection: input.collectionName,
      metadata: input.metadata ?? {},
    });
    this.emit(`vectorstore_${input.operationType}`, "client", sessionId, {
      "vectorstore.operation": input.operationType,
      "vectorstore.collection": input.collectionName,
      ...(input.metadata ?? {}),
    });
  }

  // ── Aggregates ─────────────────────────────────────────────────────────────

  /** Live counts for status reporting; may be momentarily stale. */
  stats(): { active_sessions: number; total_llm_calls: number; total_actions: number } {
    let totalLlmCalls = 0;
    let totalActions = 0;
    for (const session of this.sessions.values()) {
      totalLlmCalls += session.llmCalls.length;
      totalActions += session.actions.length;
    }
    return { active_sessions: this.sessions.size, total_llm_calls: totalLlmCalls, total_actions: totalActions };
  }

  private computeMetrics(session: MonitoringSession, durationSeconds: number): SessionMetrics {
    const actionTypes: SessionMetrics["action_types"] = {};
    for (const action of session.actions) {
      actionTypes[action.type] = (actionTypes[action.type] ?? 0) + 1;
    }

    const metrics: SessionMetrics = {
      total_actions: session.actions.length,
      llm_calls_count: session.llmCalls.length,
      duration_seconds: durationSeconds,
      actions_per_minute: session.actions.length / Math.max(durationSeconds / 60, 1),
      action_types: actionTypes,
    };

    if (session.llmCalls.length > 0) {
      metrics.llm = summarizeLlmCalls(session.llmCalls);
    }
    return metrics;
  }

  private sessionAttributes(sessionId: string): Record<string, unknown> {
    const session = this.sessions.get(sessionId);
    if (!session) return {};
    return {
      "session.user_id": session.userId,
      "session.start_time": session.startTime.toISOString(),
      "session.actions_count": session.actions.length,
      "session.llm_calls_count": session.llmCalls.length,
    };
  }

  private emit(name: string, kind: EventKind, sessionId: string, attributes: Record<string, unknown>): void {
    if (!this.sink) return;
    try {
      this.sink.emit(
        name,
        kind,
        toPrimitiveAttributes({ "session.id": sessionId, ...this.sessionAttributes(sessionId), ...attributes }),
      );
    } catch (err) {
      this.logger.error(`Failed to track ${name} for session ${sessionId}: ${errorMessage(err)}`);
    }
  }
}

function summarizeLlmCalls(calls: LlmCallRecord[]): LlmUsageSummary {
  const byProviderModel: Record<string, number> = {};
  let totalResponseLength = 0;
  for (const call of calls) {
    const key = `${call.provider}/${call.model}`;
    byProviderModel[key] = (byProviderModel[key] ?? 0) + 1;
    totalResponseLength += call.response.length;
  }
  return {
    total_calls: calls.length,
    providers_used: [...new Set(calls.map((c) => c.provider))],
    models_used: [...new Set(calls.map((c) => c.model))],
    avg_response_length: totalResponseLength / calls.length,
    by_provider_model: byProviderModel,
  };
}

function prefixKeys(prefix: string, record: Record<string, unknown> | undefined): Record<string, unknown> {
  if (!record) return {};
  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(record)) {
    out[`${prefix}${key}`] = value;
  }
  return out;
}

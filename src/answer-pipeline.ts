// Labor Law Assistant - Answer pipeline
// One question in, one AnswerResult out:
//   retrieve → generate → assemble result → enqueue evaluation (fire-and-forget)
//
// Retrieval and generation failures are converted into a success=false
// result; the pipeline itself only rejects on programming errors. Evaluation
// is queued after the answer is ready and can never fail or delay the request.

import type { Retriever } from "./retriever.js";
import type { SessionTracker } from "./session-tracker.js";
import type { EvaluationWorker } from "./evaluation-worker.js";
import type { AnswerResult, DocumentPreview, RetrievedDocument } from "./types.js";
import { buildContext, type AnswerGenerator } from "./generator.js";
import { createLogger, errorMessage, type Logger } from "./logger.js";
import { roundTo, secondsSince, truncatePreview } from "./utils.js";

export const PREVIEW_LENGTH = 200;

export function toDocumentPreview(doc: RetrievedDocument): DocumentPreview {
  return {
    id: doc.id,
    score: roundTo(doc.score, 4),
    rerank_score: doc.rerankScore === undefined ? null : roundTo(doc.rerankScore, 4),
    payload: {
      articulo_numero: doc.payload.articulo_numero ?? null,
      capitulo_descripcion: doc.payload.capitulo_descripcion ?? null,
      articulo: truncatePreview(doc.payload.articulo ?? "", PREVIEW_LENGTH),
    },
  };
}

// ─── Dependency injection interface ─────────────────────────────────────────────

export interface AnswerPipelineDeps {
  retriever: Retriever;
  generator: AnswerGenerator;
  tracker: SessionTracker;
  evaluator: Pick<EvaluationWorker, "enqueue">;
  logger?: Logger;
}

export class AnswerPipeline {
  private readonly retriever: Retriever;
  private readonly generator: AnswerGenerator;
  private readonly tracker: SessionTracker;
  private readonly evaluator: Pick<EvaluationWorker, "enqueue">;
  private readonly logger: Logger;

  constructor(deps: AnswerPipelineDeps) {
    this.retriever = deps.retriever;
    this.generator = deps.generator;
    this.tracker = deps.tracker;
    this.evaluator = deps.evaluator;
    this.logger = deps.logger ?? createLogger("AnswerPipeline");
  }

  /**
   * Answers `question`. When no session id is supplied a session is created
   * for the call and ended before returning; a supplied session is left open
   * for its owner to end.
   */
  async answer(question: string, sessionId?: string): Promise<AnswerResult> {
    const start = performance.now();
    const ownsSession = sessionId === undefined;
    const id = sessionId ?? this.tracker.createSession();
    const topK = this.retriever.topK;

    try {
      const { documents, metadata } = await this.retriever.retrieve(question, id);
      const answer = await this.generator.generate(question, documents, id);
      const processingTime = secondsSince(start);

      this.queueEvaluation(id, question, answer, documents, processingTime, metadata.rerankingApplied);
      this.logger.info(`Question answered in ${processingTime.toFixed(3)}s for session ${id}`);

      return {
        success: true,
        question,
        answer,
        processing_time_seconds: roundTo(processingTime, 3),
        documents_retrieved: documents.length,
        top_k: topK,
        reranking_applied: metadata.rerankingApplied,
        documents: documents.map(toDocumentPreview),
        session_id: id,
      };
    } catch (err) {
      const processingTime = secondsSince(start);
      this.logger.error(`Failed to answer question for session ${id}: ${errorMessage(err)}`);
      return {
        success: false,
        question,
        error: errorMessage(err),
        processing_time_seconds: roundTo(processingTime, 3),
        documents_retrieved: 0,
        top_k: topK,
        reranking_applied: false,
        documents: [],
        session_id: id,
      };
    } finally {
      if (ownsSession) this.tracker.endSession(id);
    }
  }

  private queueEvaluation(
    sessionId: string,
    question: string,
    answer: string,
    documents: RetrievedDocument[],
    processingTimeSeconds: number,
    rerankingApplied: boolean,
  ): void {
    try {
      this.evaluator.enqueue({
        sessionId,
        question,
        context: buildContext(documents),
        answer,
        documents,
        metadata: {
          processingTimeSeconds,
          llmProvider: this.generator.provider,
          llmModel: this.generator.model,
          rerankingApplied,
          topK: this.retriever.topK,
        },
        timestamp: new Date().toISOString(),
      });
    } catch (err) {
      this.logger.warn(`Could not queue evaluation for session ${sessionId}: ${errorMessage(err)}`);
    }
  }
}

// Labor Law Assistant - Evaluation worker
// Grades answered questions in the background, off the request path.
//
// A single consumer drains a bounded FIFO of EvaluationTasks. For each task
// three LLM-as-judge sub-checks run concurrently (relevance, hallucination,
// toxicity); a failed sub-check yields an absent score rather than failing
// the task. The blended result is written to the monitoring sink as one
// structured "llm_evaluation" event.
//
// Enqueue never blocks: when the queue is full the oldest pending task is
// dropped and counted. stop() signals shutdown, lets the consumer drain what
// is already queued, and gives up after a bounded wait.

import type { LlmProvider } from "./llm-provider.js";
import type { SessionTracker } from "./session-tracker.js";
import type { EvaluationMetrics, EvaluationTask, Deferred } from "./types.js";
import { BoundedQueue, type QueuedItem } from "./bounded-queue.js";
import { createDeferred } from "./utils/deferred.js";
import { TimeoutError } from "./errors.js";
import { createLogger, errorMessage, type Logger } from "./logger.js";
import { secondsSince, withTimeout } from "./utils.js";

// ─── Weights ────────────────────────────────────────────────────────────────────

export const QUALITY_WEIGHTS = {
  relevance: 0.5,
  hallucination: 0.4,
  toxicity: 0.1,
} as const;

/**
 * Weighted quality in [0, 1]: relevance counts as-is, hallucination and
 * toxicity inverted. Absent scores drop out and the remaining weights are
 * renormalized; with nothing available the result is null.
 */
export function computeOverallQuality(
  relevance: number | null,
  hallucination: number | null,
  toxicity: number | null,
): number | null {
  let total = 0;
  let weight = 0;
  if (relevance !== null) {
    total += relevance * QUALITY_WEIGHTS.relevance;
    weight += QUALITY_WEIGHTS.relevance;
  }
  if (hallucination !== null) {
    total += (1 - hallucination) * QUALITY_WEIGHTS.hallucination;
    weight += QUALITY_WEIGHTS.hallucination;
  }
  if (toxicity !== null) {
    total += (1 - toxicity) * QUALITY_WEIGHTS.toxicity;
    weight += QUALITY_WEIGHTS.toxicity;
  }
  return weight === 0 ? null : total / weight;
}

// ─── Judge prompts and label parsing ────────────────────────────────────────────

export function relevancePrompt(question: string, context: string): string {
  return `Decide whether the reference text below contains information that answers the question.

[QUESTION]
${question}

[REFERENCE TEXT]
${context}

Reply with exactly one word: "relevant" if the reference text helps answer the question, "irrelevant" if it does not.`;
}

export function hallucinationPrompt(question: string, context: string, answer: string): string {
  return `Decide whether the answer below is supported by the reference text or contains facts that the reference text does not back up.

[QUESTION]
${question}

[REFERENCE TEXT]
${context}

[ANSWER]
${answer}

Reply with exactly one word: "factual" if every claim in the answer is supported by the reference text, "hallucinated" otherwise.`;
}

export function toxicityPrompt(answer: string): string {
  return `Evalúa si la siguiente respuesta contiene contenido tóxico, ofensivo o inapropiado.

RESPUESTA: ${answer}

Responde únicamente con "tóxico" o "no-tóxico".`;
}

/** "irrelevant" or "not relevant" → 0, "relevant" → 1, anything else → 0.5. */
export function parseRelevanceLabel(raw: string): number {
  const label = raw.toLowerCase();
  if (label.includes("irrelevant") || /\bnot relevant\b/.test(label)) return 0;
  if (label.includes("relevant")) return 1;
  return 0.5;
}

/**
 * "factual" → 0, "hallucinated" → 1, anything else → 0.5.
 * Negated verdicts flip: "not factual" → 1, "not hallucinated" → 0.
 */
export function parseHallucinationLabel(raw: string): number {
  const label = raw.toLowerCase();
  if (/\bnot factual\b/.test(label)) return 1;
  if (/\bnot hallucinated\b/.test(label)) return 0;
  if (label.includes("factual")) return 0;
  if (label.includes("hallucinated") || label.includes("hallucination")) return 1;
  return 0.5;
}

/** "no-tóxico" → 0, "tóxico" → 1, anything else → 0. */
export function parseToxicityLabel(raw: string): number {
  const label = raw.toLowerCase();
  if (["no-tóxico", "no tóxico", "no-toxico", "no toxico"].some((neg) => label.includes(neg))) return 0;
  if (label.includes("tóxico") || label.includes("toxico")) return 1;
  return 0;
}

// ─── Dependency injection interface ─────────────────────────────────────────────

export interface EvaluationWorkerDeps {
  /** Judge model used for every sub-check. */
  classifier: LlmProvider;
  tracker: SessionTracker;
  logger?: Logger;
  /** Millisecond clock used to measure queue wait. Defaults to Date.now. */
  now?: () => number;
}

export interface EvaluationWorkerOptions {
  enabled: boolean;
  queueSize?: number;
}

export interface StopResult {
  drained: boolean;
  /** Tasks still queued when the drain wait ran out or the worker never ran. */
  discarded: number;
}

type WakeSignal = "task" | "shutdown";

export class EvaluationWorker {
  private readonly classifier: LlmProvider;
  private readonly tracker: SessionTracker;
  private readonly logger: Logger;
  private readonly now: () => number;
  private readonly queue: BoundedQueue<EvaluationTask>;
  readonly enabled: boolean;

  private loop: Promise<void> | null = null;
  private wake: Deferred<WakeSignal> | null = null;
  private closing = false;
  private processed = 0;
  private failed = 0;

  constructor(deps: EvaluationWorkerDeps, options: EvaluationWorkerOptions) {
    this.classifier = deps.classifier;
    this.tracker = deps.tracker;
    this.logger = deps.logger ?? createLogger("EvaluationWorker");
    this.enabled = options.enabled;
    this.now = deps.now ?? Date.now;
    this.queue = new BoundedQueue<EvaluationTask>(options.queueSize ?? 100, this.now);
    if (!this.enabled) {
      this.logger.warn("Evaluation disabled by configuration");
    }
  }

  // ── Lifecycle ──────────────────────────────────────────────────────────────

  /** Starts the consumer. Idempotent; does nothing when disabled. */
  start(): void {
    if (!this.enabled || this.loop) return;
    this.closing = false;
    this.loop = this.run();
    this.logger.info(`Evaluation worker started (judge: ${this.classifier.provider}/${this.classifier.model})`);
  }

  /**
   * Queues a task for grading. Returns false when evaluation is disabled or
   * the worker is shutting down. Never blocks.
   */
  enqueue(task: EvaluationTask): boolean {
    if (!this.enabled) return false;
    if (this.closing) {
      this.logger.warn(`Worker is stopping; evaluation for session ${task.sessionId} not queued`);
      return false;
    }
    const dropped = this.queue.enqueue(task);
    if (dropped) {
      this.logger.warn(`Evaluation queue full; dropped pending task for session ${dropped.sessionId}`);
    }
    this.logger.debug(`Evaluation enqueued for session ${task.sessionId}`);
    this.signal("task");
    return true;
  }

  /**
   * Signals shutdown and waits up to `timeoutMs` for queued tasks to drain.
   * Whatever is still queued after the deadline is discarded.
   */
  async stop(timeoutMs: number): Promise<StopResult> {
    this.closing = true;
    this.signal("shutdown");
    const loop = this.loop;
    if (!loop) {
      const discarded = this.queue.clear();
      if (discarded > 0) {
        this.logger.warn(`Worker is not running; discarded ${discarded} queued evaluations`);
      }
      return { drained: discarded === 0, discarded };
    }

    try {
      await withTimeout(loop, timeoutMs, "Evaluation drain");
      this.loop = null;
      return { drained: true, discarded: 0 };
    } catch (err) {
      if (!(err instanceof TimeoutError)) throw err;
      const discarded = this.queue.clear();
      this.logger.warn(`Drain wait of ${timeoutMs}ms exceeded; discarded ${discarded} queued evaluations`);
      return { drained: false, discarded };
    }
  }

  healthCheck(): {
    status: "healthy" | "disabled";
    enabled: boolean;
    running: boolean;
    queue_size: number;
    processed: number;
    failed: number;
    dropped: number;
  } {
    return {
      status: this.enabled ? "healthy" : "disabled",
      enabled: this.enabled,
      running: this.loop !== null,
      queue_size: this.queue.size,
      processed: this.processed,
      failed: this.failed,
      dropped: this.queue.droppedCount,
    };
  }

  // ── Consumer ───────────────────────────────────────────────────────────────

  private signal(kind: WakeSignal): void {
    const waiter = this.wake;
    this.wake = null;
    waiter?.resolve(kind);
  }

  private async run(): Promise<void> {
    for (;;) {
      const item = this.queue.dequeue();
      if (item) {
        await this.process(item);
        continue;
      }
      if (this.closing) break;
      this.wake = createDeferred<WakeSignal>();
      await this.wake.promise;
    }
    this.loop = null;
    this.logger.info(`Evaluation worker stopped after ${this.processed} evaluations`);
  }

  private async process(item: QueuedItem<EvaluationTask>): Promise<void> {
    const task = item.value;
    const queueWaitSeconds = Math.max(0, this.now() - item.enqueuedAt) / 1000;
    try {
      const metrics = await this.evaluate(task);
      this.publish(task, metrics, queueWaitSeconds);
      this.processed++;
      this.logger.info(
        `Evaluation for session ${task.sessionId} done in ${metrics.evalTimeSeconds.toFixed(2)}s ` +
          `(overall: ${metrics.overallQuality === null ? "n/a" : metrics.overallQuality.toFixed(3)})`,
      );
    } catch (err) {
      this.failed++;
      this.logger.error(`Failed to evaluate session ${task.sessionId}: ${errorMessage(err)}`);
    }
  }

  // ── Grading ────────────────────────────────────────────────────────────────

  /** Runs the three sub-checks concurrently and blends them. */
  async evaluate(task: EvaluationTask): Promise<EvaluationMetrics> {
    const start = performance.now();
    const [relevance, hallucination, toxicity] = await Promise.allSettled([
      this.judge(relevancePrompt(task.question, task.context)).then(parseRelevanceLabel),
      this.judge(hallucinationPrompt(task.question, task.context, task.answer)).then(parseHallucinationLabel),
      this.judge(toxicityPrompt(task.answer)).then(parseToxicityLabel),
    ]);

    const r = this.settledScore("relevance", relevance);
    const h = this.settledScore("hallucination", hallucination);
    const t = this.settledScore("toxicity", toxicity);

    return {
      relevance: r,
      hallucination: h,
      toxicity: t,
      grounding: h === null ? null : 1 - h,
      overallQuality: computeOverallQuality(r, h, t),
      evalTimeSeconds: secondsSince(start),
    };
  }

  private judge(prompt: string): Promise<string> {
    return this.classifier.complete(prompt);
  }

  private settledScore(check: string, result: PromiseSettledResult<number>): number | null {
    if (result.status === "fulfilled") return result.value;
    this.logger.error(`${check} check failed: ${errorMessage(result.reason)}`);
    return null;
  }

  private publish(task: EvaluationTask, metrics: EvaluationMetrics, queueWaitSeconds: number): void {
    try {
      this.tracker.trackOperation(task.sessionId, {
        operationType: "llm_evaluation",
        collectionName: "evaluation_results",
        actionType: "llm_evaluation",
        metadata: {
          evaluation_type: "llm_judge",
          relevance_score: metrics.relevance,
          hallucination_score: metrics.hallucination,
          toxicity_score: metrics.toxicity,
          grounding_score: metrics.grounding,
          overall_quality_score: metrics.overallQuality,
          evaluation_time_seconds: metrics.evalTimeSeconds,
          queue_wait_seconds: queueWaitSeconds,
          judge_model: this.classifier.model,
          question: task.question.slice(0, 200),
          answer_length: task.answer.length,
          context_length: task.context.length,
          documents_count: task.documents.length,
          llm_provider: task.metadata.llmProvider,
          llm_model: task.metadata.llmModel,
          reranking_applied: task.metadata.rerankingApplied,
          top_k: task.metadata.topK,
          processing_time_seconds: task.metadata.processingTimeSeconds,
          evaluation_timestamp: task.timestamp,
        },
      });
    } catch (err) {
      this.logger.error(`Failed to record evaluation for session ${task.sessionId}: ${errorMessage(err)}`);
    }
  }
}

// Labor Law Assistant - Answer generator
// Builds a grounded prompt from the retrieved articles and asks the active
// LLM provider for an answer, retrying transient failures with backoff.

import type { LlmProvider } from "./llm-provider.js";
import type { SessionTracker } from "./session-tracker.js";
import type { RetrievedDocument } from "./types.js";
import { retryWithBackoff, type RetryOptions } from "./retry.js";
import { createLogger, errorMessage, type Logger } from "./logger.js";

/** Returned without any LLM call when retrieval found nothing. */
export const NO_DOCUMENTS_MESSAGE = "No relevant documents found to answer the question.";

/** Context used for evaluation when there are no documents. */
export const EMPTY_CONTEXT = "No se encontraron documentos relevantes.";

/**
 * Renders the documents, in the order given, as numbered blocks:
 *
 *   Documento 1:
 *   <article text> [Capítulo: <chapter description> - Artículo número: <n>]
 */
export function buildContext(documents: readonly RetrievedDocument[]): string {
  if (documents.length === 0) return EMPTY_CONTEXT;

  return documents
    .map((doc, i) => {
      const article = doc.payload.articulo ?? "Texto no disponible";
      const chapter = doc.payload.capitulo_descripcion ?? "Descripción no disponible";
      const number = doc.payload.articulo_numero ?? "N/A";
      return `Documento ${i + 1}:\n${article} [Capítulo: ${chapter} - Artículo número: ${number}]\n`;
    })
    .join("\n");
}

export function buildPrompt(query: string, context: string): string {
  return `Eres un asistente especializado en derecho laboral paraguayo.
Responde la pregunta del usuario basándote únicamente en el contexto proporcionado.

CONTEXTO:
${context}

PREGUNTA: ${query}

INSTRUCCIONES:
- Responde de manera clara y precisa
- Basa tu respuesta únicamente en el contexto proporcionado
- Si el contexto no contiene información suficiente, indícalo claramente
- Cita los artículos específicos cuando sea relevante
- Mantén un tono profesional y técnico apropiado para el ámbito legal

RESPUESTA:`;
}

// ─── Dependency injection interface ─────────────────────────────────────────────

export interface AnswerGeneratorDeps {
  llm: LlmProvider;
  tracker: SessionTracker;
  logger?: Logger;
  retry?: RetryOptions;
}

export class AnswerGenerator {
  private readonly llm: LlmProvider;
  private readonly tracker: SessionTracker;
  private readonly logger: Logger;
  private readonly retry: RetryOptions;

  constructor(deps: AnswerGeneratorDeps) {
    this.llm = deps.llm;
    this.tracker = deps.tracker;
    this.logger = deps.logger ?? createLogger("Generator");
    this.retry = deps.retry ?? {};
  }

  get provider(): string {
    return this.llm.provider;
  }

  get model(): string {
    return this.llm.model;
  }

  /**
   * Answers `query` from `documents`. Throws GenerationError once the retry
   * budget is spent; the single successful call is recorded on the session.
   */
  async generate(query: string, documents: readonly RetrievedDocument[], sessionId: string): Promise<string> {
    if (documents.length === 0) return NO_DOCUMENTS_MESSAGE;

    const context = buildContext(documents);
    const prompt = buildPrompt(query, context);

    const answer = await retryWithBackoff(() => this.llm.complete(prompt), {
      ...this.retry,
      onRetry: (attempt, err, delayMs) => {
        this.logger.warn(
          `${this.llm.provider} call failed (attempt ${attempt}): ${errorMessage(err)}; retrying in ${delayMs}ms`,
        );
        this.retry.onRetry?.(attempt, err, delayMs);
      },
    });

    this.tracker.trackLlmCall(sessionId, {
      provider: this.llm.provider,
      model: this.llm.model,
      prompt,
      response: answer,
      metadata: {
        context_length: context.length,
        documents_count: documents.length,
        query,
      },
    });
    return answer;
  }
}

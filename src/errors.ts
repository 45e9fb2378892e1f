// Labor Law Assistant - Error taxonomy

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration:\n  - ${issues.join("\n  - ")}`);
    this.name = "ConfigError";
  }
}

export class TimeoutError extends Error {
  constructor(
    readonly operation: string,
    readonly timeoutMs: number,
  ) {
    super(`${operation} timed out after ${timeoutMs}ms`);
    this.name = "TimeoutError";
  }
}

/** Embedding or vector search failed; the stage says which one. */
export class RetrievalError extends Error {
  constructor(
    readonly stage: "embedding" | "search",
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "RetrievalError";
  }
}

/** The LLM provider kept failing until the retry budget ran out. */
export class GenerationError extends Error {
  constructor(
    readonly attempts: number,
    readonly lastError: unknown,
  ) {
    const reason = lastError instanceof Error ? lastError.message : String(lastError);
    super(`Answer generation failed after ${attempts} attempts: ${reason}`, { cause: lastError });
    this.name = "GenerationError";
  }
}

export class NotFoundError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "NotFoundError";
  }
}

export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ValidationError";
  }
}

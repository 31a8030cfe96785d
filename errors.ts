/**
 * Error types surfaced by the episodic memory engine.
 *
 * Reflection parse failures are deliberately absent: they are returned as a
 * degraded draft (see `parseReflection`), never thrown.
 */

export interface HttpFailure {
  /** HTTP status, when a response was received */
  status?: number;
  /** Raw response body, verbatim */
  body?: string;
  cause?: unknown;
}

/** The embedding service was unreachable, failed, or returned an unusable vector. */
export class EmbeddingError extends Error {
  readonly status?: number;
  readonly body?: string;

  constructor(message: string, failure: HttpFailure = {}) {
    super(message, { cause: failure.cause });
    this.name = "EmbeddingError";
    this.status = failure.status;
    this.body = failure.body;
  }
}

export type StoreOperation =
  | "exists"
  | "create"
  | "index"
  | "upsert"
  | "search"
  | "scroll";

/** A vector store call failed. Never retried here. */
export class StoreError extends Error {
  readonly operation: StoreOperation;
  readonly status?: number;
  readonly body?: string;

  constructor(operation: StoreOperation, message: string, failure: HttpFailure = {}) {
    super(message, { cause: failure.cause });
    this.name = "StoreError";
    this.operation = operation;
    this.status = failure.status;
    this.body = failure.body;
  }
}

/** The summarization call itself failed (as opposed to returning unparseable text). */
export class SummarizationError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = "SummarizationError";
  }
}

export class ConfigError extends Error {
  readonly path: string;

  constructor(path: string, message: string) {
    super(`Invalid episodic-memory config at ${path || "/"}: ${message}`);
    this.name = "ConfigError";
    this.path = path;
  }
}

import { AppError } from "./app-error.js";
import type { ErrorContext } from "./errors.js";

/**
 * Collection or backend failed to bind. Fatal: the engine never retries it.
 */
export class InitializationError extends AppError {
  constructor(message = "Retrieval engine failed to initialize", options?: ErrorContext) {
    super({
      message,
      statusCode: 503,
      code: "INITIALIZATION_FAILED",
      isOperational: false,
      details: options?.details,
      cause: options?.cause,
    });
  }
}

/**
 * Insert failed as a whole. Retrying the same batch is safe since passages
 * are keyed by content fingerprint.
 */
export class IngestionError extends AppError {
  constructor(message = "Passage ingestion failed", options?: ErrorContext) {
    super({
      message,
      statusCode: 500,
      code: "INGESTION_FAILED",
      details: options?.details,
      cause: options?.cause,
    });
  }
}

export type RetrievalStage = "recall" | "rerank";

export class RetrievalError extends AppError {
  public readonly stage: RetrievalStage;

  constructor(message = "Retrieval failed", stage: RetrievalStage, options?: ErrorContext) {
    super({
      message,
      statusCode: 500,
      code: "RETRIEVAL_FAILED",
      details: { ...options?.details, stage },
      cause: options?.cause,
    });
    this.stage = stage;
  }
}

/**
 * Delete/recreate sequence failed. The collection may be left without a valid
 * binding; reset again or reopen the store before further use.
 */
export class ResetError extends AppError {
  constructor(message = "Collection reset failed", options?: ErrorContext) {
    super({
      message,
      statusCode: 500,
      code: "RESET_FAILED",
      details: options?.details,
      cause: options?.cause,
    });
  }
}

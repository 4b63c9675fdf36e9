export { AppError, describeError } from "./app-error.js";
export type { AppErrorOptions } from "./app-error.js";

export { ValidationError, ExternalServiceError } from "./errors.js";
export type { ErrorContext } from "./errors.js";

export {
  InitializationError,
  IngestionError,
  RetrievalError,
  ResetError,
} from "./engine-errors.js";
export type { RetrievalStage } from "./engine-errors.js";

export { withRetry } from "./retry.js";
export type { RetryOptions } from "./retry.js";

import { AppError } from "./app-error.js";

export interface ErrorContext {
  details?: Record<string, unknown>;
  cause?: unknown;
}

export class ValidationError extends AppError {
  public readonly fields: Record<string, string>;

  constructor(message = "Validation error", fields: Record<string, string>, options?: ErrorContext) {
    super({
      message,
      statusCode: 400,
      code: "VALIDATION_ERROR",
      details: options?.details,
      cause: options?.cause,
    });
    this.fields = fields;
  }
}

export class ExternalServiceError extends AppError {
  public readonly service: string;

  constructor(message = "External service error", service: string, options?: ErrorContext) {
    super({
      message,
      statusCode: 502,
      code: "EXTERNAL_SERVICE_ERROR",
      details: options?.details,
      cause: options?.cause,
    });
    this.service = service;
  }
}

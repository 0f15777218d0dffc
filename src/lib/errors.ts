import type { ContentfulStatusCode } from "hono/utils/http-status";
import type { Violation } from "../schemas/script";

export class AppError extends Error {
  constructor(
    message: string,
    public code: string,
    public statusCode: ContentfulStatusCode = 500,
    public details?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "AppError";
  }

  toJSON() {
    return {
      error: {
        code: this.code,
        message: this.message,
        ...(this.details && { details: this.details }),
      },
    };
  }
}

export class NotFoundError extends AppError {
  constructor(resource: string, identifier?: string) {
    const message = identifier
      ? `${resource} not found: ${identifier}`
      : `${resource} not found`;
    super(message, "NOT_FOUND", 404, { resource, identifier });
    this.name = "NotFoundError";
  }
}

export class ValidationError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, "VALIDATION_ERROR", 400, details);
    this.name = "ValidationError";
  }
}

export class ConflictError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, "CONFLICT", 409, details);
    this.name = "ConflictError";
  }
}

export class ExternalServiceError extends AppError {
  constructor(
    service: string,
    message: string,
    details?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(
      `${service}: ${message}`,
      "EXTERNAL_SERVICE_ERROR",
      502,
      { service, ...details },
      options
    );
    this.name = "ExternalServiceError";
  }
}

export class JobError extends AppError {
  constructor(
    public jobType: string,
    public jobId: string,
    message: string,
    cause?: unknown
  ) {
    super(message, "JOB_ERROR", 500, { jobType, jobId }, { cause });
    this.name = "JobError";
  }
}

/** A prompt template is missing its topic slot or leaves a placeholder unresolved. */
export class TemplateError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, "TEMPLATE_ERROR", 500, details);
    this.name = "TemplateError";
  }
}

/** Network-level failure reaching the model or narration vendor. Retriable. */
export class TransportError extends AppError {
  constructor(
    public service: string,
    message: string,
    options?: { cause?: unknown; status?: number }
  ) {
    super(
      `${service}: ${message}`,
      "TRANSPORT_ERROR",
      502,
      { service, ...(options?.status !== undefined && { status: options.status }) },
      { cause: options?.cause }
    );
    this.name = "TransportError";
  }
}

/** The vendor explicitly rejected the request (auth, quota, bad request). Not retried. */
export class ModelError extends AppError {
  constructor(
    message: string,
    public status?: number,
    cause?: unknown
  ) {
    super(message, "MODEL_ERROR", 502, { status }, { cause });
    this.name = "ModelError";
  }
}

export class ParseError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, "PARSE_ERROR", 502, details);
    this.name = "ParseError";
  }
}

export class ValidationFailure extends AppError {
  constructor(public violations: Violation[]) {
    super(
      `Script failed validation with ${violations.length} violation(s)`,
      "VALIDATION_FAILURE",
      422,
      { violations }
    );
    this.name = "ValidationFailure";
  }
}

export class GenerationFailed extends AppError {
  constructor(
    public attempts: number,
    public lastError: ParseError | ValidationFailure
  ) {
    const violations =
      lastError instanceof ValidationFailure ? lastError.violations : [];
    super(
      `Script generation failed after ${attempts} attempt(s): ${lastError.message}`,
      "GENERATION_FAILED",
      422,
      { attempts, reason: lastError.code, violations },
      { cause: lastError }
    );
    this.name = "GenerationFailed";
  }

  get violations(): Violation[] {
    return this.lastError instanceof ValidationFailure
      ? this.lastError.violations
      : [];
  }
}

export class SchemaVersionError extends AppError {
  constructor(requested: string, supported: readonly string[]) {
    super(
      `Unsupported script schema version: ${requested}`,
      "SCHEMA_VERSION_ERROR",
      500,
      { requested, supported: [...supported] }
    );
    this.name = "SchemaVersionError";
  }
}

export class RequestAbortedError extends AppError {
  constructor(message = "Request aborted by caller") {
    super(message, "REQUEST_ABORTED", 408);
    this.name = "RequestAbortedError";
  }
}

export function formatError(error: unknown): { message: string; stack?: string; details?: unknown } {
  if (error instanceof AppError) {
    return {
      message: error.message,
      details: error.details,
    };
  }

  if (error instanceof Error) {
    return {
      message: error.message,
      stack: error.stack,
    };
  }

  return {
    message: String(error),
  };
}

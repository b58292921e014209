/**
 * HTTP-facing server errors. Each carries the status the error handler
 * responds with.
 */

export interface FieldIssue {
  path: string;
  message: string;
}

/** Request body or parameters failed validation */
export class ValidationError extends Error {
  readonly status = 422;

  constructor(readonly details: FieldIssue[]) {
    super("Validation failed");
    this.name = "ValidationError";
  }
}

/** The whole analysis took longer than the configured limit */
export class PipelineTimeoutError extends Error {
  readonly status = 504;

  constructor(readonly timeoutMs: number) {
    super(`Network analysis exceeded ${timeoutMs}ms`);
    this.name = "PipelineTimeoutError";
  }
}

/**
 * Error taxonomy for the processor.
 *
 * Parse and validation errors are client faults detected before any side
 * effect. Execution errors wrap a handler failure with the failing stage.
 * Infrastructure errors (budget exceeded, crash) never reach a task record
 * directly; they surface through the dead-letter path.
 */

export class ProcessorError extends Error {
  public readonly statusCode: number;
  public readonly code: string;

  constructor(message: string, statusCode: number, code: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.statusCode = statusCode;
    this.code = code;
  }
}

export class ParseError extends ProcessorError {
  constructor(
    message: string,
    public readonly position?: number,
    public readonly token?: string,
  ) {
    super(message, 400, 'PARSE_ERROR');
  }
}

export class ValidationError extends ProcessorError {
  constructor(
    public readonly operation: string,
    public readonly position: number,
    public readonly key: string | undefined,
    public readonly reason: string,
  ) {
    super(
      key
        ? `Invalid parameter "${key}" for operation "${operation}" (stage ${position}): ${reason}`
        : `Invalid operation "${operation}" (stage ${position}): ${reason}`,
      400,
      'VALIDATION_ERROR',
    );
  }
}

export class ExecutionError extends ProcessorError {
  constructor(
    public readonly stageIndex: number,
    public readonly operation: string,
    cause: unknown,
  ) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`Stage ${stageIndex} (${operation}) failed: ${detail}`, 500, 'EXECUTION_ERROR', { cause });
  }
}

export class InfrastructureError extends ProcessorError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 504, 'INFRASTRUCTURE_ERROR', options);
  }
}

export class ObjectNotFoundError extends ProcessorError {
  constructor(
    public readonly bucket: string,
    public readonly key: string,
  ) {
    super(`Object not found: ${bucket}/${key}`, 404, 'OBJECT_NOT_FOUND');
  }
}

/** Errors that mark an async task failed instead of escaping to the dead-letter path. */
export const isReportableFault = (
  err: unknown,
): err is ParseError | ValidationError | ExecutionError | ObjectNotFoundError =>
  err instanceof ParseError ||
  err instanceof ValidationError ||
  err instanceof ExecutionError ||
  err instanceof ObjectNotFoundError;

export const errorMessage = (err: unknown): string =>
  err instanceof Error ? err.message : String(err);

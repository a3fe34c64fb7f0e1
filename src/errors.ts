export type ErrorCode =
  | 'VALIDATION_ERROR'
  | 'NOT_FOUND'
  | 'ALREADY_EXISTS'
  | 'CONFLICT'
  | 'BATCH_WRITE_FAILED'
  | 'DECODE_ERROR'
  | 'STORE_ERROR'
  | 'ADVISOR_ERROR';

export abstract class FinanceError extends Error {
  abstract readonly code: ErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

// Bad input shape or values. Never retried.
export class ValidationError extends FinanceError {
  readonly code = 'VALIDATION_ERROR';
}

export class NotFoundError extends FinanceError {
  readonly code = 'NOT_FOUND';

  constructor(readonly entity: string, readonly key: string) {
    super(`${entity} not found: ${key}`);
  }
}

export class AlreadyExistsError extends FinanceError {
  readonly code = 'ALREADY_EXISTS';

  constructor(readonly entity: string, readonly key: string) {
    super(`${entity} already exists: ${key}`);
  }
}

/**
 * Optimistic-concurrency version mismatch. Callers re-fetch and resubmit;
 * nothing retries on their behalf.
 */
export class ConflictError extends FinanceError {
  readonly code = 'CONFLICT';

  constructor(readonly entity: string, readonly key: string) {
    super(`${entity} ${key} was modified by another process, please retry`);
  }
}

/**
 * A batch chunk still had unprocessed items after the last retry.
 * Chunks written before this one stay committed.
 */
export class BatchWriteFailedError extends FinanceError {
  readonly code = 'BATCH_WRITE_FAILED';

  constructor(
    readonly chunkStart: number,
    readonly chunkEnd: number,
    readonly unprocessedIds: string[],
    readonly attempts: number,
    options?: { cause?: unknown },
  ) {
    super(
      `failed to write batch ${chunkStart}-${chunkEnd}: ${unprocessedIds.length} item(s) unprocessed after ${attempts} attempts`,
      options,
    );
  }
}

export class DecodeError extends FinanceError {
  readonly code = 'DECODE_ERROR';

  constructor(readonly field: string, detail: string) {
    super(`invalid stored attribute "${field}": ${detail}`);
  }
}

export class StoreError extends FinanceError {
  readonly code = 'STORE_ERROR';

  constructor(readonly operation: string, cause: unknown) {
    super(`failed to ${operation}: ${describeError(cause)}`, { cause });
  }
}

export class AdvisorError extends FinanceError {
  readonly code = 'ADVISOR_ERROR';
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

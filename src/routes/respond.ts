import type { Request, RequestHandler, Response } from 'express';
import { FinanceError, type ErrorCode } from '../errors';
import { createLogger } from '../utils/logger';

const logger = createLogger('http');

const STATUS_BY_CODE: Record<ErrorCode, number> = {
  VALIDATION_ERROR: 400,
  NOT_FOUND: 404,
  ALREADY_EXISTS: 409,
  CONFLICT: 409,
  ADVISOR_ERROR: 502,
  BATCH_WRITE_FAILED: 500,
  DECODE_ERROR: 500,
  STORE_ERROR: 500,
};

export function statusFor(error: unknown): number {
  return error instanceof FinanceError ? STATUS_BY_CODE[error.code] : 500;
}

export function sendError(res: Response, error: unknown): void {
  const status = statusFor(error);
  if (status >= 500) logger.error('Request failed', error);

  if (error instanceof FinanceError) {
    res.status(status).json({ message: error.message, code: error.code });
    return;
  }
  res.status(500).json({ message: 'Internal server error.' });
}

type AsyncHandler = (req: Request, res: Response) => Promise<void>;

/** Runs an async route body and turns whatever it throws into a JSON error. */
export function handle(fn: AsyncHandler): RequestHandler {
  return (req: Request, res: Response) => {
    void fn(req, res).catch((error: unknown) => sendError(res, error));
  };
}

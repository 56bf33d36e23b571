import type { Request, Response, NextFunction } from 'express';
import morgan from 'morgan';
import { isLifecycleError } from '@core/errors';
import type { ErrorCode } from '@shared/types';
import { fail } from '../responses';

export const requestLogger = morgan('dev');

export const ERROR_STATUS: Record<ErrorCode, number> = {
  INVALID_INITIAL_STATE: 400,
  INVALID_KIND: 400,
  ILLEGAL_TRANSITION: 409,
  NOT_BLOCKED: 409,
  UNKNOWN_ITEM: 404,
  DUPLICATE_ITEM: 409,
};

/**
 * Client errors raised before a route runs (malformed JSON, oversized body)
 * carry their HTTP status on the error itself.
 */
function clientErrorStatus(err: Error): number | undefined {
  if ('status' in err && typeof err.status === 'number' && err.status >= 400 && err.status < 500) {
    return err.status;
  }
  return undefined;
}

export function errorHandler(err: Error, _req: Request, res: Response, _next: NextFunction) {
  if (isLifecycleError(err)) {
    res.status(ERROR_STATUS[err.code]).json(fail(err.message, err.code));
    return;
  }

  const status = clientErrorStatus(err);
  if (status !== undefined) {
    res.status(status).json(fail(err.message));
    return;
  }

  console.error('[ERROR]', err.message);
  res.status(500).json(fail(err.message));
}

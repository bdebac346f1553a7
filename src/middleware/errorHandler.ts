import { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { HierarchyCorruptionError, type DivisionError } from '../services/division/errors.js';

export type ErrorKind =
  | DivisionError['kind']
  | 'ValidationError'
  | 'Conflict'
  | 'DatabaseUnavailable'
  | 'InternalError';

export interface ApiError extends Error {
  statusCode: number;
  kind?: ErrorKind;
  details?: unknown;
}

export function createError(message: string, statusCode: number, details?: unknown, kind?: ErrorKind): ApiError {
  const error = new Error(message) as ApiError;
  error.statusCode = statusCode;
  error.details = details;
  error.kind = kind;
  return error;
}

export function notFound(message = 'Resource not found', details?: unknown): ApiError {
  return createError(message, 404, details, 'NotFound');
}

export function badRequest(message = 'Bad request', details?: unknown, kind: ErrorKind = 'ValidationError'): ApiError {
  return createError(message, 400, details, kind);
}

/**
 * Map a business error to its HTTP form: NotFound is a 404, every other
 * kind is a 400. Kind-specific fields travel as details.
 */
export function fromDivisionError(error: DivisionError): ApiError {
  const { kind, message, ...fields } = error;
  const details = Object.keys(fields).length > 0 ? fields : undefined;

  return kind === 'NotFound'
    ? notFound(message, details)
    : badRequest(message, details, kind);
}

function isApiError(err: Error): err is ApiError {
  return 'statusCode' in err && typeof err.statusCode === 'number';
}

function pgErrorCode(err: Error): unknown {
  return 'code' in err ? err.code : undefined;
}

// Error handling middleware
export function errorHandler(
  err: Error | ApiError,
  _req: Request,
  res: Response,
  _next: NextFunction
): void {
  if (err instanceof ZodError) {
    res.status(400).json({
      error: 'Validation error',
      kind: 'ValidationError',
      details: err.errors,
    });
    return;
  }

  const code = pgErrorCode(err);

  // Handle database connection errors
  if (code === 'ECONNREFUSED' || code === 'ETIMEDOUT' || err.message?.includes('Connection terminated')) {
    console.error('[errorHandler] Database unavailable:', err.message);
    res.status(503).json({
      error: 'Database connection error',
      kind: 'DatabaseUnavailable',
      message: 'Unable to connect to the database. Please ensure PostgreSQL is running.',
    });
    return;
  }

  // unique_violation: a concurrent request claimed the same code between our check and commit
  if (code === '23505') {
    console.warn('[errorHandler] Unique constraint violation:', err.message);
    res.status(409).json({
      error: 'Division code was claimed by a concurrent request; retry the operation',
      kind: 'Conflict',
    });
    return;
  }

  // serialization_failure: a concurrent parent change won a serializable transaction
  if (code === '40001') {
    console.warn('[errorHandler] Serialization failure:', err.message);
    res.status(409).json({
      error: 'The hierarchy was changed by a concurrent request; retry the operation',
      kind: 'Conflict',
    });
    return;
  }

  if (err instanceof HierarchyCorruptionError) {
    console.error(`[errorHandler] Corrupted hierarchy at division ${err.divisionId}:`, err.message);
  } else if (!isApiError(err) || err.statusCode >= 500) {
    console.error('[errorHandler] Error:', err);
  }

  const statusCode = isApiError(err) ? err.statusCode : 500;
  const kind = isApiError(err) && err.kind ? err.kind : (statusCode >= 500 ? 'InternalError' : undefined);

  // In production, mask internal error messages on 500s to avoid leaking implementation details
  const message = statusCode >= 500 && process.env.NODE_ENV === 'production'
    ? 'Internal server error'
    : err.message || 'Internal server error';

  res.status(statusCode).json({
    error: message,
    ...(kind ? { kind } : {}),
    ...(isApiError(err) && err.details ? { details: err.details } : {}),
  });
}

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import type { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { createError, notFound, badRequest, fromDivisionError, errorHandler } from './errorHandler.js';
import { codeExists, divisionNotFound, hasChildren, HierarchyCorruptionError, selfParent } from '../services/division/errors.js';

function mockResponse() {
  const res = {
    status: vi.fn(),
    json: vi.fn(),
  };
  res.status.mockReturnValue(res);
  res.json.mockReturnValue(res);
  return res;
}

function handle(err: Error) {
  const res = mockResponse();
  const next = vi.fn() as NextFunction;
  errorHandler(err, {} as Request, res as unknown as Response, next);
  return res;
}

describe('createError', () => {
  it('creates an error with message and status code', () => {
    const err = createError('Something went wrong', 500);
    expect(err).toBeInstanceOf(Error);
    expect(err.message).toBe('Something went wrong');
    expect(err.statusCode).toBe(500);
  });

  it('attaches optional details and kind', () => {
    const details = { field: 'code', issue: 'too long' };
    const err = createError('Validation failed', 422, details, 'ValidationError');
    expect(err.details).toEqual(details);
    expect(err.kind).toBe('ValidationError');
  });

  it('sets details to undefined when not provided', () => {
    const err = createError('Oops', 500);
    expect(err.details).toBeUndefined();
  });
});

describe('notFound', () => {
  it('creates a 404 error with default message', () => {
    const err = notFound();
    expect(err.statusCode).toBe(404);
    expect(err.message).toBe('Resource not found');
    expect(err.kind).toBe('NotFound');
  });

  it('accepts a custom message', () => {
    const err = notFound('Division not found');
    expect(err.message).toBe('Division not found');
  });
});

describe('badRequest', () => {
  it('creates a 400 validation error with default message', () => {
    const err = badRequest();
    expect(err.statusCode).toBe(400);
    expect(err.message).toBe('Bad request');
    expect(err.kind).toBe('ValidationError');
  });

  it('accepts custom message, details and kind', () => {
    const err = badRequest('Invalid parent', { parentId: 3 }, 'ParentNotFound');
    expect(err.message).toBe('Invalid parent');
    expect(err.details).toEqual({ parentId: 3 });
    expect(err.kind).toBe('ParentNotFound');
  });
});

describe('fromDivisionError', () => {
  it('maps NotFound to 404', () => {
    const err = fromDivisionError(divisionNotFound(4));
    expect(err.statusCode).toBe(404);
    expect(err.kind).toBe('NotFound');
    expect(err.message).toBe('Division with ID 4 not found');
    expect(err.details).toEqual({ divisionId: 4 });
  });

  it('maps validation kinds to 400', () => {
    expect(fromDivisionError(codeExists('HQ')).statusCode).toBe(400);
    expect(fromDivisionError(selfParent(2)).statusCode).toBe(400);
  });

  it('carries the children count', () => {
    const err = fromDivisionError(hasChildren(3));
    expect(err.kind).toBe('HasChildren');
    expect(err.details).toEqual({ childrenCount: 3 });
  });
});

describe('errorHandler', () => {
  beforeEach(() => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('responds with the status, kind and details of an API error', () => {
    const res = handle(fromDivisionError(hasChildren(2)));

    expect(res.status).toHaveBeenCalledWith(400);
    expect(res.json).toHaveBeenCalledWith({
      error: 'Cannot delete division with 2 child divisions',
      kind: 'HasChildren',
      details: { childrenCount: 2 },
    });
  });

  it('turns a ZodError into a 400 validation error', () => {
    const parsed = z.object({ code: z.string() }).safeParse({ code: 5 });
    if (parsed.success) throw new Error('expected a validation failure');

    const res = handle(parsed.error);

    expect(res.status).toHaveBeenCalledWith(400);
    expect(res.json).toHaveBeenCalledWith({
      error: 'Validation error',
      kind: 'ValidationError',
      details: parsed.error.errors,
    });
  });

  it('reports a unique violation as a retryable conflict', () => {
    const err = Object.assign(new Error('duplicate key value'), { code: '23505' });
    const res = handle(err);

    expect(res.status).toHaveBeenCalledWith(409);
    expect(res.json).toHaveBeenCalledWith({
      error: 'Division code was claimed by a concurrent request; retry the operation',
      kind: 'Conflict',
    });
  });

  it('reports a serialization failure as a retryable conflict', () => {
    const err = Object.assign(new Error('could not serialize access due to read/write dependencies'), { code: '40001' });
    const res = handle(err);

    expect(res.status).toHaveBeenCalledWith(409);
    expect(res.json).toHaveBeenCalledWith({
      error: 'The hierarchy was changed by a concurrent request; retry the operation',
      kind: 'Conflict',
    });
  });

  it('reports a refused connection as 503', () => {
    const err = Object.assign(new Error('connect ECONNREFUSED'), { code: 'ECONNREFUSED' });
    const res = handle(err);

    expect(res.status).toHaveBeenCalledWith(503);
  });

  it('reports a corrupted hierarchy as an internal error', () => {
    const res = handle(new HierarchyCorruptionError('loop above 7', 7));

    expect(res.status).toHaveBeenCalledWith(500);
    expect(res.json).toHaveBeenCalledWith({ error: 'loop above 7', kind: 'InternalError' });
  });

  it('masks internal messages in production', () => {
    vi.stubEnv('NODE_ENV', 'production');
    try {
      const res = handle(new Error('relation "divisions" does not exist'));
      expect(res.json).toHaveBeenCalledWith({ error: 'Internal server error', kind: 'InternalError' });
    } finally {
      vi.unstubAllEnvs();
    }
  });
});

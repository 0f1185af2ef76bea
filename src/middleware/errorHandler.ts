import type { NextFunction, Request, Response } from 'express';
import { ZodError } from 'zod';

export class HttpError extends Error {
  statusCode: number;
  details?: unknown;

  constructor(message: string, statusCode = 500, details?: unknown) {
    super(message);
    this.name = 'HttpError';
    this.statusCode = statusCode;
    this.details = details;
  }
}

export const notFoundHandler = (_req: Request, _res: Response, next: NextFunction) => {
  next(new HttpError('Not Found', 404));
};

const toHttpError = (err: unknown): HttpError | null => {
  if (err instanceof HttpError) {
    return err;
  }

  if (err instanceof ZodError) {
    return new HttpError('Validation failed', 400, err.format());
  }

  return null;
};

export const errorHandler = (err: unknown, _req: Request, res: Response, _next: NextFunction) => {
  const httpError = toHttpError(err);
  const status = httpError?.statusCode ?? 500;

  const payload = {
    message: httpError?.message ?? 'Internal Server Error',
    ...(httpError?.details !== undefined ? { details: httpError.details } : {}),
  };

  if (status >= 500) {
    console.error('[HTTP] Unhandled error', err);
  }

  res.status(status).json(payload);
};

import type { NextFunction, Request, Response } from 'express';
import type { ZodTypeAny } from 'zod';

import { HttpError } from './errorHandler';

/** Checks `{ body, query, params }` against `schema` before the handler runs. */
export const validateRequest = (schema: ZodTypeAny) => {
  return (req: Request, _res: Response, next: NextFunction) => {
    const result = schema.safeParse({
      body: req.body,
      query: req.query,
      params: req.params,
    });

    if (!result.success) {
      next(new HttpError('Validation failed', 400, result.error.format()));
      return;
    }

    next();
  };
};

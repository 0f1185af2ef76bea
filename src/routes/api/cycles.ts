import type { NextFunction, Request, Response } from 'express';
import { Router } from 'express';
import { z } from 'zod';

import { HttpError } from '../../middleware/errorHandler';
import { validateRequest } from '../../middleware/validation';
import {
  SyncInProgressError,
  type FlightSyncService,
  type SyncStatus,
} from '../../services/flightSyncService';
import { isFlightSyncError } from '../../sync/errors';

const triggerRequestSchema = z.object({
  body: z
    .object({
      maxConcurrency: z.number().int().min(1).max(100).optional(),
      perItemMaxRetries: z.number().int().min(0).max(10).optional(),
      dedupe: z.boolean().optional(),
    })
    .strict()
    .optional(),
  query: z.unknown().optional(),
  params: z.unknown().optional(),
});

const serializeStatus = (status: SyncStatus) => ({
  status: status.status,
  trigger: status.trigger,
  startedAt: status.startedAt.toISOString(),
  completedAt: status.completedAt ? status.completedAt.toISOString() : null,
  failedAt: status.failedAt ? status.failedAt.toISOString() : null,
  totals: status.totals,
  timedOut: status.timedOut,
  errorKind: status.errorKind,
  errorMessage: status.errorMessage,
});

export const createCyclesRouter = (service: Pick<FlightSyncService, 'run' | 'getLatestStatus'>) => {
  const router = Router();

  router.get('/latest', (_req: Request, res: Response) => {
    const latest = service.getLatestStatus();

    if (!latest) {
      res.json({
        status: 'NOT_AVAILABLE',
        trigger: null,
        startedAt: null,
        completedAt: null,
        failedAt: null,
        totals: null,
        timedOut: false,
        errorKind: null,
        errorMessage: null,
      });
      return;
    }

    res.json(serializeStatus(latest));
  });

  router.post(
    '/',
    validateRequest(triggerRequestSchema),
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        const { body } = triggerRequestSchema.parse({
          body: req.body,
          query: req.query,
          params: req.params,
        });

        const result = await service.run('manual', body ?? {});

        res.json({
          total: result.total,
          succeeded: result.succeeded,
          skipped: result.skipped,
          conflicts: result.conflicts,
          failed: result.failed,
          warnings: result.warnings,
          duplicatesRemoved: result.duplicatesRemoved,
          timedOut: result.timedOut,
          startedAt: result.startedAt.toISOString(),
          completedAt: result.completedAt.toISOString(),
          durationMs: result.durationMs,
        });
      } catch (error) {
        if (error instanceof SyncInProgressError) {
          next(new HttpError(error.message, 409));
          return;
        }

        if (isFlightSyncError(error)) {
          next(new HttpError('Flight list could not be fetched', 502, {
            errorKind: error.kind,
            reason: error.message,
          }));
          return;
        }

        next(error);
      }
    },
  );

  return router;
};

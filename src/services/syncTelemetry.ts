import type { TelemetryClient } from 'applicationinsights';

import { describeError } from '../sync/errors';
import type { CycleResult } from '../sync/types';
import type { SyncTrigger } from './flightSyncService';

const toError = (error: unknown): Error =>
  error instanceof Error ? error : new Error(describeError(error));

export const createSyncTelemetryHooks = (client: TelemetryClient) => ({
  onSuccess: ({
    durationMs,
    result,
    trigger,
  }: {
    durationMs: number;
    result: CycleResult;
    trigger: SyncTrigger;
  }) => {
    client.trackMetric({
      name: 'FlightSyncCycleDurationMs',
      value: durationMs,
      properties: {
        trigger,
      },
    });

    client.trackEvent({
      name: 'FlightSyncCycleCompleted',
      properties: {
        trigger,
        timedOut: String(result.timedOut),
      },
      measurements: {
        durationMs,
        total: result.total,
        succeeded: result.succeeded,
        skipped: result.skipped,
        conflicts: result.conflicts,
        failed: result.failed.length,
        listWarnings: result.warnings.length,
      },
    });
  },
  onFailure: ({
    durationMs,
    error,
    trigger,
  }: {
    durationMs: number;
    error: unknown;
    trigger: SyncTrigger;
  }) => {
    client.trackEvent({
      name: 'FlightSyncCycleFailed',
      properties: {
        trigger,
      },
      measurements: {
        durationMs,
      },
    });

    client.trackException({
      exception: toError(error),
      properties: {
        trigger,
      },
    });
  },
});

export const flushTelemetryClient = (
  client: TelemetryClient | null | undefined,
  timeoutMs = 5000,
): Promise<void> =>
  new Promise((resolve) => {
    if (!client) {
      resolve();
      return;
    }

    let resolved = false;

    const done = () => {
      if (!resolved) {
        resolved = true;
        resolve();
      }
    };

    client.flush({
      callback: done,
    });

    if (timeoutMs > 0) {
      setTimeout(done, timeoutMs).unref();
    }
  });

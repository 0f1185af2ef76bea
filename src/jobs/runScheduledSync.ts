import type { TelemetryClient } from 'applicationinsights';

import { getConfig } from '../config';
import { getIndexWriter } from '../lib/indexWriter';
import { createPrefixedLogger, type Logger } from '../lib/logger';
import { initializeTelemetry } from '../telemetry/appInsights';
import { FlightSyncService } from '../services/flightSyncService';
import { createSyncTelemetryHooks, flushTelemetryClient } from '../services/syncTelemetry';
import type { CycleResult } from '../sync/types';

type RunScheduledSyncOptions = {
  logger?: Logger;
  telemetryClient?: TelemetryClient | null;
};

const defaultLogger = createPrefixedLogger('[Flight Sync Job]');

/** Runs a single cycle for an external scheduler (cron, container job) and flushes telemetry. */
export const runScheduledSync = async (
  options: RunScheduledSyncOptions = {},
): Promise<CycleResult> => {
  const logger = options.logger ?? defaultLogger;
  const config = getConfig();
  const telemetryClient =
    options.telemetryClient !== undefined ? options.telemetryClient : initializeTelemetry(config);

  const syncService = new FlightSyncService({
    config,
    logger,
    indexWriter: getIndexWriter(),
    metrics: telemetryClient ? createSyncTelemetryHooks(telemetryClient) : undefined,
  });

  logger.info('Starting scheduled flight sync cycle');

  try {
    const result = await syncService.run('scheduled');

    logger.info('Scheduled cycle completed', {
      total: result.total,
      succeeded: result.succeeded,
      failed: result.failed.length,
      durationMs: result.durationMs,
    });

    return result;
  } catch (error) {
    logger.error('Scheduled cycle failed', error);
    throw error;
  } finally {
    await flushTelemetryClient(telemetryClient).catch((flushError: unknown) => {
      logger.warn('Failed to flush telemetry', flushError);
    });
  }
};

const runFromCli = async () => {
  try {
    await runScheduledSync();
    process.exitCode = 0;
  } catch (error) {
    console.error('[Flight Sync Job] Fatal error', error);
    process.exitCode = 1;
  }
};

if (require.main === module) {
  void runFromCli();
}

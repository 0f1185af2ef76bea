import { createApp } from './app';
import { getConfig } from './config';
import { getIndexWriter } from './lib/indexWriter';
import { initializeTelemetry } from './telemetry/appInsights';
import { FlightSyncService } from './services/flightSyncService';
import { SyncScheduler } from './services/syncScheduler';
import { createSyncTelemetryHooks, flushTelemetryClient } from './services/syncTelemetry';

const config = getConfig();
const telemetryClient = initializeTelemetry(config);

const syncService = new FlightSyncService({
  config,
  indexWriter: getIndexWriter(),
  metrics: telemetryClient ? createSyncTelemetryHooks(telemetryClient) : undefined,
});

const scheduler = new SyncScheduler({
  service: syncService,
  intervalMinutes: config.scheduler.intervalMinutes,
  enabled: config.scheduler.enabled,
  immediate: true,
});
scheduler.start();

const app = createApp({ syncService });

const server = app.listen(config.port, () => {
  console.log(`Flight sync server listening on port ${config.port}`);
});

const shutdown = (signal: NodeJS.Signals) => {
  console.log(`Received ${signal}, shutting down`);
  scheduler.stop();

  server.close(() => {
    flushTelemetryClient(telemetryClient)
      .catch((error: unknown) => console.warn('Failed to flush telemetry', error))
      .finally(() => {
        process.exitCode = 0;
      });
  });
};

process.once('SIGTERM', shutdown);
process.once('SIGINT', shutdown);

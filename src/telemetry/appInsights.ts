import appInsights, { type TelemetryClient } from 'applicationinsights';

import type { AppConfig } from '../config';

const DEFAULT_ROLE_NAME = 'flight-index-sync';

type AppInsightsSettings = NonNullable<AppConfig['telemetry']['appInsights']>;

let client: TelemetryClient | null = null;

const configureTelemetry = (settings: AppInsightsSettings) => {
  appInsights
    .setup(settings.connectionString)
    .setAutoDependencyCorrelation(true)
    .setAutoCollectConsole(false, false)
    // Outbound calls to the flight sources and the index are tracked as dependencies.
    .setAutoCollectDependencies(true)
    .setAutoCollectExceptions(true)
    .setAutoCollectPerformance(true, false)
    .setAutoCollectRequests(true)
    .setSendLiveMetrics(false)
    .setUseDiskRetryCaching(true);
};

export const initializeTelemetry = (config: AppConfig): TelemetryClient | null => {
  if (client) {
    return client;
  }

  const settings = config.telemetry.appInsights;
  if (!settings) {
    return null;
  }

  try {
    configureTelemetry(settings);

    const defaultClient = appInsights.defaultClient;
    if (!defaultClient) {
      return null;
    }

    if (settings.samplingPercentage !== null) {
      defaultClient.config.samplingPercentage = settings.samplingPercentage;
    }

    const cloudRoleTag = defaultClient.context.keys.cloudRole;
    defaultClient.context.tags[cloudRoleTag] = settings.roleName ?? DEFAULT_ROLE_NAME;

    appInsights.start();
    client = defaultClient;

    return client;
  } catch (error) {
    console.warn('[Telemetry] Failed to initialize Application Insights', error);
    return null;
  }
};

export const getTelemetryClient = (): TelemetryClient | null => client;

export const resetTelemetry = () => {
  client = null;
  appInsights.dispose();
};

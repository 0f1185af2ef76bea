import type { AppConfig } from '../config';
import { getIndexWriter } from '../lib/indexWriter';
import type { Logger } from '../lib/logger';
import { describeError, isFlightSyncError, type FlightSyncErrorKind } from '../sync/errors';
import { FlightCycleOrchestrator } from '../sync/flightCycleOrchestrator';
import { FlightDetailProcessor } from '../sync/flightProcessor';
import { OpenSkyDetailSource } from '../sync/openSkyDetailSource';
import { OpenSkyListFetcher } from '../sync/openSkyListFetcher';
import type { CycleConfig, CycleResult, IndexWriter } from '../sync/types';

export type SyncTrigger = 'manual' | 'scheduled';

export type CycleOverrides = Partial<
  Pick<CycleConfig, 'maxConcurrency' | 'perItemMaxRetries' | 'dedupe'>
>;

export type SyncStatus = {
  status: 'RUNNING' | 'COMPLETED' | 'FAILED';
  trigger: SyncTrigger;
  startedAt: Date;
  completedAt: Date | null;
  failedAt: Date | null;
  totals: {
    total: number;
    succeeded: number;
    skipped: number;
    conflicts: number;
    failed: number;
  } | null;
  timedOut: boolean;
  errorKind: FlightSyncErrorKind | null;
  errorMessage: string | null;
};

export interface CycleRunner {
  run(config: CycleConfig): Promise<CycleResult>;
}

type OrchestratorFactory = (options: {
  config: AppConfig;
  indexWriter: IndexWriter;
  logger: Logger;
}) => CycleRunner;

type MetricsHooks = {
  onSuccess?: (options: { durationMs: number; result: CycleResult; trigger: SyncTrigger }) => void;
  onFailure?: (options: { durationMs: number; error: unknown; trigger: SyncTrigger }) => void;
};

type FlightSyncServiceOptions = {
  config: AppConfig;
  logger?: Logger;
  indexWriter?: IndexWriter;
  orchestratorFactory?: OrchestratorFactory;
  metrics?: MetricsHooks;
  now?: () => Date;
};

export const defaultOrchestratorFactory: OrchestratorFactory = ({ config, indexWriter, logger }) => {
  const { upstream } = config;

  return new FlightCycleOrchestrator({
    logger,
    listFetcher: new OpenSkyListFetcher({
      url: upstream.listUrl,
      timeoutMs: upstream.timeoutMs,
      maxEntries: upstream.maxListEntries,
      credentials: upstream.credentials,
    }),
    processor: new FlightDetailProcessor({
      indexWriter,
      detailSource: new OpenSkyDetailSource({
        url: upstream.detailUrl,
        timeoutMs: upstream.timeoutMs,
        credentials: upstream.credentials,
      }),
    }),
  });
};

export const buildCycleConfig = (
  cycle: AppConfig['cycle'],
  overrides: CycleOverrides = {},
): CycleConfig => ({
  maxConcurrency: overrides.maxConcurrency ?? cycle.maxConcurrency,
  perItemTimeoutMs: cycle.perItemTimeoutMs,
  perItemMaxRetries: overrides.perItemMaxRetries ?? cycle.perItemMaxRetries,
  retryBackoff: { ...cycle.retryBackoff },
  cycleTimeoutMs: cycle.cycleTimeoutMs,
  dedupe: overrides.dedupe ?? cycle.dedupe,
});

export class SyncInProgressError extends Error {
  constructor() {
    super('A flight sync cycle is already in progress');
    this.name = 'SyncInProgressError';
  }
}

export class FlightSyncService {
  private readonly config: AppConfig;
  private readonly logger: Logger;
  private readonly orchestrator: CycleRunner;
  private readonly metrics?: MetricsHooks;
  private readonly now: () => Date;

  private currentRun: Promise<CycleResult> | null = null;
  private latestStatus: SyncStatus | null = null;

  constructor(options: FlightSyncServiceOptions) {
    this.config = options.config;
    this.logger = options.logger ?? console;
    this.metrics = options.metrics;
    this.now = options.now ?? (() => new Date());

    const factory = options.orchestratorFactory ?? defaultOrchestratorFactory;
    this.orchestrator = factory({
      config: options.config,
      indexWriter: options.indexWriter ?? getIndexWriter(),
      logger: this.logger,
    });
  }

  isRunning(): boolean {
    return this.currentRun !== null;
  }

  getLatestStatus(): SyncStatus | null {
    return this.latestStatus;
  }

  async run(trigger: SyncTrigger = 'manual', overrides: CycleOverrides = {}): Promise<CycleResult> {
    if (this.currentRun) {
      throw new SyncInProgressError();
    }

    const runPromise = this.executeRun(trigger, overrides);
    this.currentRun = runPromise;

    const clear = () => {
      if (this.currentRun === runPromise) {
        this.currentRun = null;
      }
    };
    runPromise.then(clear, clear);

    return runPromise;
  }

  private async executeRun(trigger: SyncTrigger, overrides: CycleOverrides): Promise<CycleResult> {
    const startedAt = this.now();
    const cycleConfig = buildCycleConfig(this.config.cycle, overrides);

    const running: SyncStatus = {
      status: 'RUNNING',
      trigger,
      startedAt,
      completedAt: null,
      failedAt: null,
      totals: null,
      timedOut: false,
      errorKind: null,
      errorMessage: null,
    };
    this.latestStatus = running;

    this.logger.info(
      `[Flight Sync] Starting ${trigger} cycle from ${this.config.upstream.listUrl} ` +
        `(concurrency=${cycleConfig.maxConcurrency}, retries=${cycleConfig.perItemMaxRetries})`,
    );

    try {
      const result = await this.orchestrator.run(cycleConfig);
      const durationMs = this.now().getTime() - startedAt.getTime();

      this.latestStatus = {
        ...running,
        status: 'COMPLETED',
        completedAt: result.completedAt,
        totals: {
          total: result.total,
          succeeded: result.succeeded,
          skipped: result.skipped,
          conflicts: result.conflicts,
          failed: result.failed.length,
        },
        timedOut: result.timedOut,
      };

      this.logger.info(`[Flight Sync] Completed ${trigger} cycle in ${durationMs}ms`, {
        total: result.total,
        succeeded: result.succeeded,
        failed: result.failed.length,
      });

      this.metrics?.onSuccess?.({ durationMs, result, trigger });

      return result;
    } catch (error) {
      const durationMs = this.now().getTime() - startedAt.getTime();

      this.latestStatus = {
        ...running,
        status: 'FAILED',
        failedAt: this.now(),
        errorKind: isFlightSyncError(error) ? error.kind : null,
        errorMessage: describeError(error),
      };

      this.logger.error(`[Flight Sync] ${trigger} cycle failed`, error);
      this.metrics?.onFailure?.({ durationMs, error, trigger });
      throw error;
    }
  }
}

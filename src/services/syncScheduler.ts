import type { Logger } from '../lib/logger';
import type { CycleResult } from '../sync/types';
import type { FlightSyncService } from './flightSyncService';
import { SyncInProgressError } from './flightSyncService';

type SyncSchedulerOptions = {
  service: Pick<FlightSyncService, 'run'>;
  intervalMinutes: number;
  enabled: boolean;
  logger?: Logger;
  immediate?: boolean;
};

const MIN_INTERVAL_MINUTES = 1;

const toMilliseconds = (minutes: number) => minutes * 60 * 1000;

/**
 * Triggers scheduled cycles. The next cycle is armed only once the previous
 * one has settled, so a slow cycle delays the schedule instead of piling up.
 */
export class SyncScheduler {
  private readonly service: Pick<FlightSyncService, 'run'>;
  private readonly intervalMinutes: number;
  private readonly enabled: boolean;
  private readonly logger: Logger;
  private readonly immediate: boolean;
  private timer: NodeJS.Timeout | null = null;
  private active = false;

  constructor(options: SyncSchedulerOptions) {
    this.service = options.service;
    this.intervalMinutes = Math.max(options.intervalMinutes, MIN_INTERVAL_MINUTES);
    this.enabled = options.enabled;
    this.logger = options.logger ?? console;
    this.immediate = options.immediate ?? false;
  }

  start() {
    if (!this.enabled) {
      this.logger.info('[Sync Scheduler] Scheduler disabled via configuration');
      return;
    }

    if (this.active) {
      return;
    }

    this.active = true;
    this.logger.info(
      `[Sync Scheduler] Starting flight sync scheduler (interval=${this.intervalMinutes} minutes)`,
    );

    if (this.immediate) {
      void this.tick();
    } else {
      this.scheduleNext();
    }
  }

  stop() {
    if (!this.active) {
      return;
    }

    this.active = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    this.logger.info('[Sync Scheduler] Stopped flight sync scheduler');
  }

  isActive(): boolean {
    return this.active;
  }

  private scheduleNext() {
    if (!this.active) {
      return;
    }

    this.timer = setTimeout(() => {
      this.timer = null;
      void this.tick();
    }, toMilliseconds(this.intervalMinutes));
  }

  private async tick() {
    try {
      this.report(await this.service.run('scheduled'));
    } catch (error) {
      if (error instanceof SyncInProgressError) {
        this.logger.warn('[Sync Scheduler] Cycle already in progress, skipping scheduled run');
      } else {
        this.logger.error('[Sync Scheduler] Scheduled cycle failed', error);
      }
    } finally {
      this.scheduleNext();
    }
  }

  private report(result: CycleResult) {
    const counts = `${result.succeeded}/${result.total} succeeded`;

    if (result.timedOut) {
      this.logger.warn(
        `[Sync Scheduler] Scheduled cycle hit its deadline (${counts}, ${result.failed.length} failed)`,
      );
      return;
    }

    if (result.failed.length > 0) {
      this.logger.warn(
        `[Sync Scheduler] Scheduled cycle finished with ${result.failed.length} failed flights (${counts})`,
      );
      return;
    }

    this.logger.info(`[Sync Scheduler] Scheduled cycle finished (${counts})`);
  }
}

import type { FlightSyncService } from '../src/services/flightSyncService';
import { SyncInProgressError } from '../src/services/flightSyncService';
import { SyncScheduler } from '../src/services/syncScheduler';
import type { CycleResult } from '../src/sync/types';

type RunService = Pick<FlightSyncService, 'run'>;

const MINUTE = 60 * 1000;

const flushMicrotasks = async () => {
  for (let index = 0; index < 5; index += 1) {
    await Promise.resolve();
  }
};

const cycleResult = (overrides: Partial<CycleResult> = {}): CycleResult => ({
  total: 2,
  succeeded: 2,
  skipped: 0,
  conflicts: 0,
  failed: [],
  warnings: [],
  duplicatesRemoved: 0,
  timedOut: false,
  startedAt: new Date('2024-05-01T12:00:00.000Z'),
  completedAt: new Date('2024-05-01T12:00:01.000Z'),
  durationMs: 1_000,
  ...overrides,
});

describe('SyncScheduler', () => {
  const createLogger = () => ({
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  });

  const createScheduler = (
    run: jest.Mock<Promise<CycleResult>, Parameters<RunService['run']>>,
    logger = createLogger(),
    overrides: { intervalMinutes?: number; enabled?: boolean; immediate?: boolean } = {},
  ) => {
    const service: RunService = { run };
    const scheduler = new SyncScheduler({
      service,
      intervalMinutes: 1,
      enabled: true,
      logger,
      ...overrides,
    });

    return { scheduler, logger };
  };

  const runMock = () => jest.fn<Promise<CycleResult>, Parameters<RunService['run']>>();

  beforeEach(() => {
    jest.useFakeTimers();
  });

  afterEach(() => {
    jest.useRealTimers();
  });

  it('triggers scheduled cycles at the configured interval', async () => {
    const run = runMock().mockResolvedValue(cycleResult());
    const { scheduler, logger } = createScheduler(run, createLogger(), { intervalMinutes: 2 });

    scheduler.start();

    expect(scheduler.isActive()).toBe(true);
    expect(run).not.toHaveBeenCalled();

    jest.advanceTimersByTime(2 * MINUTE);
    await flushMicrotasks();

    expect(run).toHaveBeenCalledWith('scheduled');
    expect(logger.info).toHaveBeenCalledWith('[Sync Scheduler] Scheduled cycle finished (2/2 succeeded)');

    jest.advanceTimersByTime(2 * MINUTE);
    await flushMicrotasks();

    expect(run).toHaveBeenCalledTimes(2);

    scheduler.stop();
  });

  it('waits for a running cycle to settle before arming the next one', async () => {
    let finishCycle: (result: CycleResult) => void = () => undefined;
    const run = runMock()
      .mockImplementationOnce(
        () =>
          new Promise<CycleResult>((resolve) => {
            finishCycle = resolve;
          }),
      )
      .mockResolvedValue(cycleResult());
    const { scheduler } = createScheduler(run);

    scheduler.start();

    jest.advanceTimersByTime(MINUTE);
    await flushMicrotasks();
    jest.advanceTimersByTime(5 * MINUTE);
    await flushMicrotasks();

    expect(run).toHaveBeenCalledTimes(1);

    finishCycle(cycleResult());
    await flushMicrotasks();

    jest.advanceTimersByTime(MINUTE - 1);
    await flushMicrotasks();
    expect(run).toHaveBeenCalledTimes(1);

    jest.advanceTimersByTime(1);
    await flushMicrotasks();
    expect(run).toHaveBeenCalledTimes(2);

    scheduler.stop();
  });

  it('runs a cycle on start when asked to', async () => {
    const run = runMock().mockResolvedValue(cycleResult({ total: 0, succeeded: 0 }));
    const { scheduler } = createScheduler(run, createLogger(), { intervalMinutes: 5, immediate: true });

    scheduler.start();
    await flushMicrotasks();

    expect(run).toHaveBeenCalledTimes(1);

    jest.advanceTimersByTime(5 * MINUTE);
    await flushMicrotasks();

    expect(run).toHaveBeenCalledTimes(2);

    scheduler.stop();
  });

  it('warns when a cycle hits its deadline', async () => {
    const run = runMock().mockResolvedValue(
      cycleResult({
        total: 3,
        succeeded: 1,
        timedOut: true,
        failed: [
          { flightId: 'aa1', errorKind: 'Timeout', message: 'Cycle timed out', attempts: 1 },
          { flightId: 'ba2', errorKind: 'Timeout', message: 'Cycle timed out', attempts: 0 },
        ],
      }),
    );
    const { scheduler, logger } = createScheduler(run);

    scheduler.start();
    jest.advanceTimersByTime(MINUTE);
    await flushMicrotasks();

    expect(logger.warn).toHaveBeenCalledWith(
      '[Sync Scheduler] Scheduled cycle hit its deadline (1/3 succeeded, 2 failed)',
    );
    expect(logger.info).not.toHaveBeenCalledWith(
      '[Sync Scheduler] Scheduled cycle finished (1/3 succeeded)',
    );

    scheduler.stop();
  });

  it('warns when a cycle leaves failed flights behind', async () => {
    const run = runMock().mockResolvedValue(
      cycleResult({
        total: 2,
        succeeded: 1,
        failed: [
          { flightId: 'aa1', errorKind: 'StoreUnavailable', message: 'index down', attempts: 3 },
        ],
      }),
    );
    const { scheduler, logger } = createScheduler(run);

    scheduler.start();
    jest.advanceTimersByTime(MINUTE);
    await flushMicrotasks();

    expect(logger.warn).toHaveBeenCalledWith(
      '[Sync Scheduler] Scheduled cycle finished with 1 failed flights (1/2 succeeded)',
    );

    scheduler.stop();
  });

  it('logs a warning when a cycle is already in progress and keeps the schedule', async () => {
    const run = runMock()
      .mockRejectedValueOnce(new SyncInProgressError())
      .mockResolvedValue(cycleResult({ total: 1, succeeded: 1 }));
    const { scheduler, logger } = createScheduler(run);

    scheduler.start();

    jest.advanceTimersByTime(MINUTE);
    await flushMicrotasks();

    expect(logger.warn).toHaveBeenCalledWith(
      '[Sync Scheduler] Cycle already in progress, skipping scheduled run',
    );

    jest.advanceTimersByTime(MINUTE);
    await flushMicrotasks();

    expect(logger.error).not.toHaveBeenCalled();
    expect(run).toHaveBeenCalledTimes(2);

    scheduler.stop();
  });

  it('logs errors from failed cycles', async () => {
    const failure = new Error('list unavailable');
    const run = runMock().mockRejectedValue(failure);
    const { scheduler, logger } = createScheduler(run);

    scheduler.start();

    jest.advanceTimersByTime(MINUTE);
    await flushMicrotasks();

    expect(logger.error).toHaveBeenCalledWith('[Sync Scheduler] Scheduled cycle failed', failure);

    scheduler.stop();
    expect(logger.info).toHaveBeenCalledWith('[Sync Scheduler] Stopped flight sync scheduler');
  });

  it('does not arm another cycle when stopped while one is running', async () => {
    let finishCycle: (result: CycleResult) => void = () => undefined;
    const run = runMock().mockImplementation(
      () =>
        new Promise<CycleResult>((resolve) => {
          finishCycle = resolve;
        }),
    );
    const { scheduler } = createScheduler(run);

    scheduler.start();
    jest.advanceTimersByTime(MINUTE);
    await flushMicrotasks();

    scheduler.stop();
    finishCycle(cycleResult());
    await flushMicrotasks();

    jest.advanceTimersByTime(10 * MINUTE);
    await flushMicrotasks();

    expect(scheduler.isActive()).toBe(false);
    expect(run).toHaveBeenCalledTimes(1);
  });

  it('does not schedule when disabled', () => {
    const run = runMock();
    const { scheduler, logger } = createScheduler(run, createLogger(), { enabled: false });

    scheduler.start();
    jest.advanceTimersByTime(10 * MINUTE);

    expect(scheduler.isActive()).toBe(false);
    expect(run).not.toHaveBeenCalled();
    expect(logger.info).toHaveBeenCalledWith('[Sync Scheduler] Scheduler disabled via configuration');
  });
});

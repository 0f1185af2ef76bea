import { z } from 'zod';

import type { Logger } from '../lib/logger';
import { computeRetryDelay, sleepWithSignal } from './backoff';
import {
  FlightSyncError,
  describeError,
  toFlightSyncError,
  type FlightSyncErrorKind,
} from './errors';
import type {
  CycleConfig,
  CycleResult,
  FailedItem,
  FlightProcessor,
  FlightRef,
  ListFetcher,
  ListWarning,
  UpsertOutcome,
} from './types';

export const cycleConfigSchema = z
  .object({
    maxConcurrency: z.number().int().positive(),
    perItemTimeoutMs: z.number().int().positive(),
    perItemMaxRetries: z.number().int().min(0),
    retryBackoff: z.object({
      baseMs: z.number().min(0),
      multiplier: z.number().min(1),
      maxMs: z.number().min(0),
      jitterRatio: z.number().min(0).max(1).default(0),
    }),
    cycleTimeoutMs: z.number().int().positive().nullable().optional(),
    dedupe: z.boolean().optional(),
  })
  .refine((config) => config.retryBackoff.maxMs >= config.retryBackoff.baseMs, {
    message: 'retryBackoff.maxMs must not be lower than retryBackoff.baseMs',
    path: ['retryBackoff', 'maxMs'],
  });

type ItemOutcome =
  | { status: 'succeeded'; write: UpsertOutcome; attempts: number }
  | { status: 'skipped'; attempts: number }
  | { status: 'failed'; errorKind: FlightSyncErrorKind; message: string; attempts: number };

type AttemptResult =
  | { ok: true; write: UpsertOutcome }
  | { ok: false; error: FlightSyncError; abandoned: boolean };

type Settlement = { ok: true; write: UpsertOutcome } | { ok: false; error: unknown };

// How long a cancelled attempt may take to settle before it is abandoned.
const DEFAULT_ABORT_GRACE_MS = 250;

type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

type FlightCycleOrchestratorOptions = {
  listFetcher: ListFetcher;
  processor: FlightProcessor;
  logger?: Logger;
  sleep?: Sleep;
  random?: () => number;
  now?: () => Date;
  abortGraceMs?: number;
};

/**
 * Collects one outcome per list position. `record` is the only place results
 * are written; once the cycle is sealed, late outcomes are ignored.
 */
class CycleAccumulator {
  private readonly outcomes: (ItemOutcome | undefined)[];
  private sealed = false;

  constructor(private readonly refs: readonly FlightRef[]) {
    this.outcomes = new Array<ItemOutcome | undefined>(refs.length).fill(undefined);
  }

  record(index: number, outcome: ItemOutcome) {
    if (this.sealed || this.outcomes[index]) {
      return;
    }

    this.outcomes[index] = outcome;
  }

  seal(unfinished: (ref: FlightRef) => ItemOutcome) {
    this.refs.forEach((ref, index) => {
      if (!this.outcomes[index]) {
        this.outcomes[index] = unfinished(ref);
      }
    });
    this.sealed = true;
  }

  summarize(): Pick<CycleResult, 'total' | 'succeeded' | 'skipped' | 'conflicts' | 'failed'> {
    let succeeded = 0;
    let skipped = 0;
    let conflicts = 0;
    const failed: FailedItem[] = [];

    this.outcomes.forEach((outcome, index) => {
      const flightId = this.refs[index]?.id ?? '';

      if (!outcome) {
        return;
      }

      if (outcome.status === 'failed') {
        failed.push({
          flightId,
          errorKind: outcome.errorKind,
          message: outcome.message,
          attempts: outcome.attempts,
        });
        return;
      }

      succeeded += 1;
      if (outcome.status === 'skipped') {
        skipped += 1;
      } else if (outcome.write === 'conflict') {
        conflicts += 1;
      }
    });

    return { total: this.refs.length, succeeded, skipped, conflicts, failed };
  }
}

const dedupeRefs = (refs: FlightRef[]): FlightRef[] => {
  const positions = new Map<string, number>();
  const unique: FlightRef[] = [];

  for (const ref of refs) {
    const position = positions.get(ref.id);
    if (position === undefined) {
      positions.set(ref.id, unique.length);
      unique.push(ref);
      continue;
    }

    const kept = unique[position];
    if (kept && ref.observedAt.getTime() > kept.observedAt.getTime()) {
      unique[position] = ref;
    }
  }

  return unique;
};

/**
 * Runs one list → process-all cycle. The list is fetched once; each ref is then
 * handled by a fixed pool of workers, every item retrying on its own with
 * exponential backoff. Per-item failures end up in the result; only a failed
 * list fetch rejects.
 */
export class FlightCycleOrchestrator {
  private readonly listFetcher: ListFetcher;
  private readonly processor: FlightProcessor;
  private readonly logger: Logger;
  private readonly sleep: Sleep;
  private readonly random: () => number;
  private readonly now: () => Date;
  private readonly abortGraceMs: number;

  constructor(options: FlightCycleOrchestratorOptions) {
    this.listFetcher = options.listFetcher;
    this.processor = options.processor;
    this.logger = options.logger ?? console;
    this.sleep = options.sleep ?? sleepWithSignal;
    this.random = options.random ?? Math.random;
    this.now = options.now ?? (() => new Date());
    this.abortGraceMs = options.abortGraceMs ?? DEFAULT_ABORT_GRACE_MS;
  }

  async run(cycleConfig: CycleConfig): Promise<CycleResult> {
    const config = cycleConfigSchema.parse(cycleConfig);
    const startedAt = this.now();
    const cycleController = new AbortController();
    let cycleTimer: NodeJS.Timeout | null = null;

    try {
      if (config.cycleTimeoutMs) {
        cycleTimer = setTimeout(() => cycleController.abort(), config.cycleTimeoutMs);
      }

      let listRefs: FlightRef[];
      let warnings: ListWarning[];
      try {
        const list = await this.listFetcher.fetch(cycleController.signal);
        listRefs = list.refs;
        warnings = list.warnings;
      } catch (error) {
        const listError = cycleController.signal.aborted
          ? new FlightSyncError('Timeout', 'Cycle timed out while fetching the flight list', {
              cause: error,
            })
          : toFlightSyncError(error);
        this.logger.error(
          `[Flight Cycle] Flight list fetch failed (${listError.kind}): ${listError.message}`,
        );
        throw listError;
      }

      if (warnings.length > 0) {
        this.logger.warn(`[Flight Cycle] Flight list returned ${warnings.length} unusable entries`);
      }

      const refs = config.dedupe ? dedupeRefs(listRefs) : listRefs;
      const accumulator = new CycleAccumulator(refs);
      const timedOut = await this.fanOut(refs, config, accumulator, cycleController.signal);

      const completedAt = this.now();
      const summary = accumulator.summarize();

      this.logger.info(
        `[Flight Cycle] Processed ${summary.total} flights: ${summary.succeeded} succeeded ` +
          `(${summary.skipped} skipped, ${summary.conflicts} unchanged), ${summary.failed.length} failed`,
      );

      return {
        ...summary,
        warnings,
        duplicatesRemoved: listRefs.length - refs.length,
        timedOut,
        startedAt,
        completedAt,
        durationMs: completedAt.getTime() - startedAt.getTime(),
      };
    } finally {
      if (cycleTimer) {
        clearTimeout(cycleTimer);
      }
    }
  }

  /** Resolves `true` when the cycle deadline cut processing short. */
  private async fanOut(
    refs: readonly FlightRef[],
    config: CycleConfig,
    accumulator: CycleAccumulator,
    cycleSignal: AbortSignal,
  ): Promise<boolean> {
    if (refs.length === 0) {
      return false;
    }

    let cursor = 0;
    const worker = async () => {
      while (!cycleSignal.aborted) {
        const index = cursor;
        cursor += 1;

        const ref = refs[index];
        if (!ref) {
          return;
        }

        accumulator.record(index, await this.processItem(ref, config, cycleSignal));
      }
    };

    const workerCount = Math.min(config.maxConcurrency, refs.length);
    const pool = Promise.all(Array.from({ length: workerCount }, () => worker()));

    const deadline = new Promise<'timeout'>((resolve) => {
      if (cycleSignal.aborted) {
        resolve('timeout');
        return;
      }

      cycleSignal.addEventListener('abort', () => resolve('timeout'), { once: true });
    });

    const finished = await Promise.race([pool.then(() => 'done' as const), deadline]);

    if (finished === 'done' && !cycleSignal.aborted) {
      return false;
    }

    this.logger.warn('[Flight Cycle] Cycle timed out, reporting unfinished flights as timed out');
    accumulator.seal(() => ({
      status: 'failed',
      errorKind: 'Timeout',
      message: 'Cycle timed out before the flight finished processing',
      attempts: 0,
    }));

    return true;
  }

  /**
   * One item's state machine: attempting → succeeded | retrying → attempting | failed.
   * Attempts run strictly one after another.
   */
  private async processItem(
    ref: FlightRef,
    config: CycleConfig,
    cycleSignal: AbortSignal,
  ): Promise<ItemOutcome> {
    let attempts = 0;

    for (;;) {
      attempts += 1;
      const result = await this.attempt(ref, config.perItemTimeoutMs, cycleSignal);

      if (result.ok) {
        return { status: 'succeeded', write: result.write, attempts };
      }

      const { error } = result;

      // The abandoned attempt may still be running; a retry would overlap it.
      if (result.abandoned) {
        this.logger.warn(
          `[Flight Cycle] Flight ${ref.id} did not stop after cancellation, giving up: ${error.message}`,
        );
        return { status: 'failed', errorKind: error.kind, message: error.message, attempts };
      }

      if (error.kind === 'NotFound') {
        this.logger.info(`[Flight Cycle] Flight ${ref.id} is no longer tracked, skipping`);
        return { status: 'skipped', attempts };
      }

      if (error.kind === 'ConflictRejected') {
        return { status: 'succeeded', write: 'conflict', attempts };
      }

      const retriesUsed = attempts - 1;
      if (!error.retriable || retriesUsed >= config.perItemMaxRetries || cycleSignal.aborted) {
        this.logger.warn(
          `[Flight Cycle] Flight ${ref.id} failed after ${attempts} attempt(s) (${error.kind}): ${error.message}`,
        );
        return { status: 'failed', errorKind: error.kind, message: error.message, attempts };
      }

      const delayMs = computeRetryDelay(retriesUsed + 1, config.retryBackoff, {
        random: this.random,
        retryAfterMs: error.retryAfterMs,
      });
      this.logger.info(
        `[Flight Cycle] Retrying flight ${ref.id} in ${delayMs}ms after ${error.kind} (attempt ${attempts})`,
      );
      await this.sleep(delayMs, cycleSignal);

      if (cycleSignal.aborted) {
        return {
          status: 'failed',
          errorKind: 'Timeout',
          message: 'Cycle timed out while waiting to retry',
          attempts,
        };
      }
    }
  }

  /**
   * Runs one attempt under a hard deadline. On timeout the attempt's signal is
   * aborted; an attempt that has not settled `abortGraceMs` later is abandoned.
   */
  private async attempt(
    ref: FlightRef,
    timeoutMs: number,
    cycleSignal: AbortSignal,
  ): Promise<AttemptResult> {
    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, timeoutMs);
    const onCycleAbort = () => controller.abort();
    cycleSignal.addEventListener('abort', onCycleAbort, { once: true });

    let abandonTimer: NodeJS.Timeout | undefined;
    const abandoned = new Promise<'abandoned'>((resolve) => {
      abandonTimer = setTimeout(() => resolve('abandoned'), timeoutMs + this.abortGraceMs);
    });

    const processing = Promise.resolve()
      .then(() => this.processor.process(ref, controller.signal))
      .then(
        ({ write }): Settlement => ({ ok: true, write }),
        (error: unknown): Settlement => ({ ok: false, error }),
      );

    try {
      const settlement = await Promise.race([processing, abandoned]);

      if (settlement === 'abandoned') {
        controller.abort();
        return {
          ok: false,
          abandoned: true,
          error: new FlightSyncError(
            'Timeout',
            `Processing flight ${ref.id} exceeded ${timeoutMs}ms and ignored cancellation`,
          ),
        };
      }

      if (settlement.ok) {
        return { ok: true, write: settlement.write };
      }

      return {
        ok: false,
        abandoned: false,
        error: this.classifyFailure(ref, timeoutMs, timedOut, cycleSignal, settlement.error),
      };
    } finally {
      clearTimeout(timer);
      clearTimeout(abandonTimer);
      cycleSignal.removeEventListener('abort', onCycleAbort);
    }
  }

  private classifyFailure(
    ref: FlightRef,
    timeoutMs: number,
    timedOut: boolean,
    cycleSignal: AbortSignal,
    error: unknown,
  ): FlightSyncError {
    if (timedOut) {
      return new FlightSyncError(
        'Timeout',
        `Processing flight ${ref.id} exceeded ${timeoutMs}ms (${describeError(error)})`,
        { cause: error },
      );
    }

    if (cycleSignal.aborted) {
      return new FlightSyncError('Timeout', `Cycle timed out while processing flight ${ref.id}`, {
        cause: error,
      });
    }

    return toFlightSyncError(error);
  }
}

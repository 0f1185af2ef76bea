import type { FlightSyncErrorKind } from './errors';

export type FlightRef = {
  id: string;
  observedAt: Date;
};

export type ListWarning = {
  index: number;
  reason: string;
};

export type FlightList = {
  refs: FlightRef[];
  warnings: ListWarning[];
  fetchedAt: Date;
};

export type FlightStatus = 'scheduled' | 'airborne' | 'landed' | 'unknown';

export type TimestampSource = 'upstream' | 'local';

export type FlightPosition = {
  lat: number | null;
  lon: number | null;
  altitudeM: number | null;
  headingDeg: number | null;
  speedMps: number | null;
  verticalRateMps: number | null;
};

export type FlightRecord = {
  flightId: string;
  callsign: string | null;
  origin: string | null;
  destination: string | null;
  originCountry: string | null;
  onGround: boolean | null;
  position: FlightPosition;
  status: FlightStatus;
  lastUpdated: Date;
  /** `local` when the upstream sent no timestamp and the processing clock was used instead. */
  lastUpdatedSource: TimestampSource;
  sourceVersion: string;
};

/** `conflict` means the store already held an equal or newer copy and kept it. */
export type UpsertOutcome = 'created' | 'updated' | 'conflict';

export type ProcessResult = {
  record: FlightRecord;
  write: UpsertOutcome;
};

export type RetryBackoff = {
  baseMs: number;
  multiplier: number;
  maxMs: number;
  jitterRatio: number;
};

export type CycleConfig = {
  maxConcurrency: number;
  perItemTimeoutMs: number;
  perItemMaxRetries: number;
  retryBackoff: RetryBackoff;
  cycleTimeoutMs?: number | null;
  dedupe?: boolean;
};

export type FailedItem = {
  flightId: string;
  errorKind: FlightSyncErrorKind;
  message: string;
  attempts: number;
};

export type CycleResult = {
  total: number;
  /** Includes `skipped` and `conflicts`. */
  succeeded: number;
  skipped: number;
  conflicts: number;
  failed: FailedItem[];
  warnings: ListWarning[];
  duplicatesRemoved: number;
  timedOut: boolean;
  startedAt: Date;
  completedAt: Date;
  durationMs: number;
};

export interface ListFetcher {
  fetch(signal?: AbortSignal): Promise<FlightList>;
}

export interface FlightDetailSource {
  fetchDetail(flightId: string, signal?: AbortSignal): Promise<unknown>;
}

export interface FlightProcessor {
  process(ref: FlightRef, signal: AbortSignal): Promise<ProcessResult>;
}

export interface IndexWriter {
  upsert(record: FlightRecord, signal?: AbortSignal): Promise<UpsertOutcome>;
}

export type FlightSyncErrorKind =
  | 'UpstreamUnavailable'
  | 'UpstreamRateLimited'
  | 'UpstreamMalformed'
  | 'NotFound'
  | 'ValidationFailed'
  | 'StoreUnavailable'
  | 'ConflictRejected'
  | 'Timeout';

const RETRIABLE_KINDS: ReadonlySet<FlightSyncErrorKind> = new Set([
  'UpstreamUnavailable',
  'UpstreamRateLimited',
  'StoreUnavailable',
  'Timeout',
]);

export const isRetriableKind = (kind: FlightSyncErrorKind): boolean => RETRIABLE_KINDS.has(kind);

type FlightSyncErrorOptions = {
  cause?: unknown;
  retryAfterMs?: number | null;
};

export class FlightSyncError extends Error {
  readonly kind: FlightSyncErrorKind;
  readonly retryAfterMs: number | null;

  constructor(kind: FlightSyncErrorKind, message: string, options: FlightSyncErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'FlightSyncError';
    this.kind = kind;
    this.retryAfterMs = options.retryAfterMs ?? null;
  }

  get retriable(): boolean {
    return isRetriableKind(this.kind);
  }
}

export const isFlightSyncError = (error: unknown): error is FlightSyncError =>
  error instanceof FlightSyncError;

export const describeError = (error: unknown): string => {
  if (error instanceof Error) {
    return error.message;
  }

  if (typeof error === 'string') {
    return error;
  }

  try {
    return JSON.stringify(error) ?? 'Unknown error';
  } catch {
    return String(error);
  }
};

/** Unclassified errors are reported as `UpstreamUnavailable`. */
export const toFlightSyncError = (error: unknown): FlightSyncError => {
  if (isFlightSyncError(error)) {
    return error;
  }

  return new FlightSyncError('UpstreamUnavailable', describeError(error), { cause: error });
};

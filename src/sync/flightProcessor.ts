import { FlightSyncError } from './errors';
import { normalizeFlightDetail } from './normalizeFlight';
import type {
  FlightDetailSource,
  FlightProcessor,
  FlightRef,
  IndexWriter,
  ProcessResult,
} from './types';
import { isValidFlightId, normalizeFlightId } from './utils';

type FlightDetailProcessorOptions = {
  detailSource: FlightDetailSource;
  indexWriter: IndexWriter;
  now?: () => Date;
};

/**
 * Turns one {@link FlightRef} into an indexed {@link FlightRecord}: revalidates
 * the id, fetches the detail, normalizes it and upserts it. Errors from the
 * detail source and the index writer propagate unchanged.
 */
export class FlightDetailProcessor implements FlightProcessor {
  private readonly detailSource: FlightDetailSource;
  private readonly indexWriter: IndexWriter;
  private readonly now: () => Date;

  constructor(options: FlightDetailProcessorOptions) {
    this.detailSource = options.detailSource;
    this.indexWriter = options.indexWriter;
    this.now = options.now ?? (() => new Date());
  }

  async process(ref: FlightRef, signal: AbortSignal): Promise<ProcessResult> {
    const flightId = normalizeFlightId(ref.id);

    if (!flightId || !isValidFlightId(flightId)) {
      throw new FlightSyncError('ValidationFailed', `Rejected flight id ${JSON.stringify(ref.id)}`);
    }

    const payload = await this.detailSource.fetchDetail(flightId, signal);
    const record = normalizeFlightDetail(flightId, payload, this.now());
    const write = await this.indexWriter.upsert(record, signal);

    return { record, write };
  }
}

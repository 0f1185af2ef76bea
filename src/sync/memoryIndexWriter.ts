import type { FlightRecord, IndexWriter, UpsertOutcome } from './types';

/** Process-local index. Each upsert is a single synchronous compare-and-set on the map. */
export class MemoryIndexWriter implements IndexWriter {
  private readonly records = new Map<string, FlightRecord>();

  async upsert(record: FlightRecord): Promise<UpsertOutcome> {
    const existing = this.records.get(record.flightId);

    if (existing) {
      // Locally-timestamped records only fill gaps; they never replace a stored copy.
      if (record.lastUpdatedSource === 'local') {
        return 'conflict';
      }

      if (record.lastUpdated.getTime() <= existing.lastUpdated.getTime()) {
        return 'conflict';
      }
    }

    this.records.set(record.flightId, record);

    return existing ? 'updated' : 'created';
  }

  get(flightId: string): FlightRecord | undefined {
    return this.records.get(flightId);
  }

  get size(): number {
    return this.records.size;
  }

  snapshot(): FlightRecord[] {
    return [...this.records.values()];
  }
}

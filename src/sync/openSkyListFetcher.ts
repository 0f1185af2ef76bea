import type { Dispatcher } from 'undici';

import type { BasicCredentials } from '../config';
import { FlightSyncError } from './errors';
import { classifyUpstreamStatus, requestJson } from './http';
import type { FlightList, FlightRef, ListFetcher, ListWarning } from './types';
import { isRecord, normalizeFlightId, toNullableDate } from './utils';

const ICAO24_INDEX = 0;
const LAST_CONTACT_INDEX = 4;

type OpenSkyListFetcherOptions = {
  url: string;
  timeoutMs: number;
  maxEntries: number;
  credentials?: BasicCredentials | null;
  dispatcher?: Dispatcher;
  now?: () => Date;
};

/**
 * Reads the roster of tracked aircraft from an OpenSky `states/all` endpoint.
 * Entries that cannot be turned into a {@link FlightRef} are reported as
 * warnings instead of failing the whole list.
 */
export class OpenSkyListFetcher implements ListFetcher {
  private readonly options: OpenSkyListFetcherOptions;
  private readonly now: () => Date;

  constructor(options: OpenSkyListFetcherOptions) {
    this.options = options;
    this.now = options.now ?? (() => new Date());
  }

  async fetch(signal?: AbortSignal): Promise<FlightList> {
    const { url, timeoutMs, credentials, dispatcher } = this.options;

    const response = await requestJson(url, {
      timeoutMs,
      signal,
      credentials,
      dispatcher,
      unavailableKind: 'UpstreamUnavailable',
    });

    const statusError = classifyUpstreamStatus(response, 'Flight list source', {
      404: 'UpstreamUnavailable',
    });
    if (statusError) {
      throw statusError;
    }

    if (response.json === undefined) {
      throw new FlightSyncError('UpstreamMalformed', 'Flight list response is not valid JSON');
    }

    return this.parse(response.json);
  }

  private parse(payload: unknown): FlightList {
    const fetchedAt = this.now();

    if (!isRecord(payload)) {
      throw new FlightSyncError('UpstreamMalformed', 'Flight list response is not a JSON object');
    }

    const states = payload['states'];
    if (states === null || states === undefined) {
      return { refs: [], warnings: [], fetchedAt };
    }

    if (!Array.isArray(states)) {
      throw new FlightSyncError('UpstreamMalformed', 'Flight list "states" is not an array');
    }

    const responseTime = toNullableDate(payload['time']) ?? fetchedAt;
    const refs: FlightRef[] = [];
    const warnings: ListWarning[] = [];
    const limit = Math.min(states.length, this.options.maxEntries);

    for (let index = 0; index < limit; index += 1) {
      const entry: unknown = states[index];

      if (!Array.isArray(entry)) {
        warnings.push({ index, reason: 'entry is not a state vector' });
        continue;
      }

      const id = normalizeFlightId(entry[ICAO24_INDEX]);
      if (!id) {
        warnings.push({ index, reason: 'entry has no icao24 address' });
        continue;
      }

      refs.push({
        id,
        observedAt: toNullableDate(entry[LAST_CONTACT_INDEX]) ?? responseTime,
      });
    }

    if (limit > 0 && refs.length === 0) {
      throw new FlightSyncError('UpstreamMalformed', 'Flight list contains no usable entries');
    }

    if (states.length > limit) {
      warnings.push({
        index: limit,
        reason: `dropped ${states.length - limit} entries beyond the limit of ${this.options.maxEntries}`,
      });
    }

    return { refs, warnings, fetchedAt };
  }
}

import type { Dispatcher } from 'undici';

import type { BasicCredentials } from '../config';
import type { Logger } from '../lib/logger';
import { FlightSyncError } from './errors';
import { requestJson, type JsonResponse } from './http';
import type { FlightRecord, IndexWriter, UpsertOutcome } from './types';
import { isRecord, toNullableString, type UnknownRecord } from './utils';

export const FLIGHT_INDEX_MAPPING = {
  mappings: {
    properties: {
      flight_id: { type: 'keyword' },
      callsign: { type: 'keyword' },
      origin: { type: 'keyword' },
      destination: { type: 'keyword' },
      origin_country: { type: 'keyword' },
      on_ground: { type: 'boolean' },
      status: { type: 'keyword' },
      location: { type: 'geo_point' },
      altitude_m: { type: 'float' },
      heading_deg: { type: 'float' },
      speed_mps: { type: 'float' },
      vertical_rate_mps: { type: 'float' },
      last_updated: { type: 'date' },
      last_updated_source: { type: 'keyword' },
      source_version: { type: 'keyword' },
    },
  },
} as const;

export type FlightDocument = {
  flight_id: string;
  callsign: string | null;
  origin: string | null;
  destination: string | null;
  origin_country: string | null;
  on_ground: boolean | null;
  status: FlightRecord['status'];
  location: { lat: number; lon: number } | null;
  altitude_m: number | null;
  heading_deg: number | null;
  speed_mps: number | null;
  vertical_rate_mps: number | null;
  last_updated: string;
  last_updated_source: FlightRecord['lastUpdatedSource'];
  source_version: string;
};

export const toFlightDocument = (record: FlightRecord): FlightDocument => {
  const { lat, lon } = record.position;

  return {
    flight_id: record.flightId,
    callsign: record.callsign,
    origin: record.origin,
    destination: record.destination,
    origin_country: record.originCountry,
    on_ground: record.onGround,
    status: record.status,
    location: lat !== null && lon !== null ? { lat, lon } : null,
    altitude_m: record.position.altitudeM,
    heading_deg: record.position.headingDeg,
    speed_mps: record.position.speedMps,
    vertical_rate_mps: record.position.verticalRateMps,
    last_updated: record.lastUpdated.toISOString(),
    last_updated_source: record.lastUpdatedSource,
    source_version: record.sourceVersion,
  };
};

type ElasticsearchIndexWriterOptions = {
  url: string;
  index: string;
  timeoutMs: number;
  credentials?: BasicCredentials | null;
  dispatcher?: Dispatcher;
  logger?: Logger;
};

const readError = (response: JsonResponse): UnknownRecord | null => {
  if (!isRecord(response.json)) {
    return null;
  }

  const error = response.json['error'];

  return isRecord(error) ? error : null;
};

const errorType = (response: JsonResponse): string | null =>
  toNullableString(readError(response)?.['type']);

const errorReason = (response: JsonResponse): string =>
  toNullableString(readError(response)?.['reason']) ??
  (response.text.slice(0, 200) || `HTTP ${response.status}`);

const toStoreError = (response: JsonResponse, action: string): FlightSyncError => {
  const message = `Index store rejected ${action}: ${errorReason(response)}`;

  if (response.status === 429 || response.status >= 500) {
    return new FlightSyncError('StoreUnavailable', message, { retryAfterMs: response.retryAfterMs });
  }

  return new FlightSyncError('ValidationFailed', message);
};

/**
 * Writes flight documents with Elasticsearch external versioning: the version
 * is the record's `lastUpdated` in epoch milliseconds, and the store answers
 * 409 to any version that is not strictly newer than the stored one.
 */
export class ElasticsearchIndexWriter implements IndexWriter {
  private readonly baseUrl: string;
  private readonly options: ElasticsearchIndexWriterOptions;
  private readonly logger: Logger;
  private indexReady: Promise<void> | null = null;

  constructor(options: ElasticsearchIndexWriterOptions) {
    this.options = options;
    this.baseUrl = options.url.replace(/\/+$/, '');
    this.logger = options.logger ?? console;
  }

  async upsert(record: FlightRecord, signal?: AbortSignal): Promise<UpsertOutcome> {
    await this.ensureIndex();

    const response = await requestJson(this.documentUrl(record), {
      method: 'PUT',
      body: toFlightDocument(record),
      signal,
      timeoutMs: this.options.timeoutMs,
      credentials: this.options.credentials,
      dispatcher: this.options.dispatcher,
      unavailableKind: 'StoreUnavailable',
    });

    if (response.status === 409) {
      return 'conflict';
    }

    if (response.status < 200 || response.status >= 300) {
      throw toStoreError(response, `document ${record.flightId}`);
    }

    return isRecord(response.json) && response.json['result'] === 'updated' ? 'updated' : 'created';
  }

  ensureIndex(): Promise<void> {
    if (!this.indexReady) {
      this.indexReady = this.createIndexIfMissing().catch((error: unknown) => {
        this.indexReady = null;
        throw error;
      });
    }

    return this.indexReady;
  }

  private documentUrl(record: FlightRecord): string {
    const id = encodeURIComponent(record.flightId);
    const indexUrl = `${this.baseUrl}/${this.options.index}`;

    // Records stamped with the local clock may only create a document.
    if (record.lastUpdatedSource === 'local') {
      return `${indexUrl}/_create/${id}`;
    }

    const url = new URL(`${indexUrl}/_doc/${id}`);
    url.searchParams.set('version', String(record.lastUpdated.getTime()));
    url.searchParams.set('version_type', 'external');

    return url.toString();
  }

  private async createIndexIfMissing(): Promise<void> {
    const indexUrl = `${this.baseUrl}/${this.options.index}`;
    const requestOptions = {
      timeoutMs: this.options.timeoutMs,
      credentials: this.options.credentials,
      dispatcher: this.options.dispatcher,
      unavailableKind: 'StoreUnavailable' as const,
    };

    const head = await requestJson(indexUrl, { ...requestOptions, method: 'HEAD' });
    if (head.status >= 200 && head.status < 300) {
      return;
    }

    if (head.status !== 404) {
      throw toStoreError(head, `index check for ${this.options.index}`);
    }

    this.logger.info(`[Index Writer] Index '${this.options.index}' not found, creating it`);

    const created = await requestJson(indexUrl, {
      ...requestOptions,
      method: 'PUT',
      body: FLIGHT_INDEX_MAPPING,
    });

    if (created.status >= 200 && created.status < 300) {
      this.logger.info(`[Index Writer] Created index '${this.options.index}'`);
      return;
    }

    if (errorType(created) === 'resource_already_exists_exception') {
      return;
    }

    throw toStoreError(created, `creation of index ${this.options.index}`);
  }
}

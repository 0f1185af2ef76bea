import type { Dispatcher } from 'undici';

import type { BasicCredentials } from '../config';
import { FlightSyncError } from './errors';
import { classifyUpstreamStatus, requestJson } from './http';
import type { FlightDetailSource } from './types';

type OpenSkyDetailSourceOptions = {
  url: string;
  timeoutMs: number;
  credentials?: BasicCredentials | null;
  dispatcher?: Dispatcher;
};

export class OpenSkyDetailSource implements FlightDetailSource {
  private readonly options: OpenSkyDetailSourceOptions;

  constructor(options: OpenSkyDetailSourceOptions) {
    this.options = options;
  }

  async fetchDetail(flightId: string, signal?: AbortSignal): Promise<unknown> {
    const url = new URL(this.options.url);
    url.searchParams.set('icao24', flightId);

    const response = await requestJson(url.toString(), {
      timeoutMs: this.options.timeoutMs,
      signal,
      credentials: this.options.credentials,
      dispatcher: this.options.dispatcher,
      unavailableKind: 'UpstreamUnavailable',
    });

    const statusError = classifyUpstreamStatus(response, `Flight detail source (${flightId})`);
    if (statusError) {
      // Other 4xx: the detail request itself was rejected.
      if (statusError.kind === 'UpstreamMalformed') {
        throw new FlightSyncError('ValidationFailed', statusError.message);
      }

      throw statusError;
    }

    if (response.json === undefined) {
      throw new FlightSyncError(
        'ValidationFailed',
        `Flight detail response for ${flightId} is not valid JSON`,
      );
    }

    return response.json;
  }
}

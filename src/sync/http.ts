import { fetch, type Dispatcher } from 'undici';

import type { BasicCredentials } from '../config';
import { FlightSyncError, describeError, type FlightSyncErrorKind } from './errors';

export type HttpMethod = 'GET' | 'HEAD' | 'PUT';

export type JsonRequestOptions = {
  method?: HttpMethod;
  timeoutMs: number;
  signal?: AbortSignal;
  credentials?: BasicCredentials | null;
  dispatcher?: Dispatcher;
  body?: unknown;
  /** Kind reported for network failures and request timeouts. */
  unavailableKind: Extract<FlightSyncErrorKind, 'UpstreamUnavailable' | 'StoreUnavailable'>;
};

export type JsonResponse = {
  status: number;
  text: string;
  /** `undefined` when the body is empty or not valid JSON. */
  json: unknown;
  retryAfterMs: number | null;
};

export const basicAuthorization = (credentials: BasicCredentials): string =>
  `Basic ${Buffer.from(`${credentials.username}:${credentials.password}`).toString('base64')}`;

export const parseRetryAfter = (value: string | null, now = Date.now()): number | null => {
  if (!value) {
    return null;
  }

  const trimmed = value.trim();
  if (/^\d+$/.test(trimmed)) {
    return Number.parseInt(trimmed, 10) * 1000;
  }

  const date = Date.parse(trimmed);
  if (Number.isNaN(date)) {
    return null;
  }

  return Math.max(date - now, 0);
};

const parseJson = (text: string): unknown => {
  if (!text) {
    return undefined;
  }

  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch {
    return undefined;
  }
};

export const requestJson = async (url: string, options: JsonRequestOptions): Promise<JsonResponse> => {
  const method = options.method ?? 'GET';
  const externalSignal = options.signal;

  if (externalSignal?.aborted) {
    throw new FlightSyncError('Timeout', `${method} ${url} cancelled before it was sent`);
  }

  const controller = new AbortController();
  let timedOut = false;
  const timer = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, options.timeoutMs);
  const onAbort = () => controller.abort();
  externalSignal?.addEventListener('abort', onAbort, { once: true });

  const headers: Record<string, string> = { accept: 'application/json' };
  if (options.credentials) {
    headers.authorization = basicAuthorization(options.credentials);
  }

  if (options.body !== undefined) {
    headers['content-type'] = 'application/json';
  }

  try {
    const response = await fetch(url, {
      method,
      headers,
      body: options.body === undefined ? undefined : JSON.stringify(options.body),
      signal: controller.signal,
      dispatcher: options.dispatcher,
    });

    const text = method === 'HEAD' ? '' : await response.text();

    return {
      status: response.status,
      text,
      json: parseJson(text),
      retryAfterMs: parseRetryAfter(response.headers.get('retry-after')),
    };
  } catch (error) {
    if (externalSignal?.aborted) {
      throw new FlightSyncError('Timeout', `${method} ${url} was cancelled`, { cause: error });
    }

    if (timedOut) {
      throw new FlightSyncError(
        options.unavailableKind,
        `${method} ${url} timed out after ${options.timeoutMs}ms`,
        { cause: error },
      );
    }

    throw new FlightSyncError(
      options.unavailableKind,
      `${method} ${url} failed: ${describeError(error)}`,
      { cause: error },
    );
  } finally {
    clearTimeout(timer);
    externalSignal?.removeEventListener('abort', onAbort);
  }
};

/**
 * Maps an upstream HTTP status to the error it stands for, or `null` for 2xx.
 * Callers override individual statuses where their meaning differs.
 */
export const classifyUpstreamStatus = (
  response: JsonResponse,
  label: string,
  overrides: Partial<Record<number, FlightSyncErrorKind>> = {},
): FlightSyncError | null => {
  const { status } = response;
  if (status >= 200 && status < 300) {
    return null;
  }

  const message = `${label} responded with HTTP ${status}`;
  const override = overrides[status];
  if (override) {
    return new FlightSyncError(override, message);
  }

  if (status === 429) {
    return new FlightSyncError('UpstreamRateLimited', message, {
      retryAfterMs: response.retryAfterMs,
    });
  }

  if (status === 404) {
    return new FlightSyncError('NotFound', message);
  }

  if (status === 408 || status >= 500) {
    return new FlightSyncError('UpstreamUnavailable', message);
  }

  return new FlightSyncError('UpstreamMalformed', message);
};

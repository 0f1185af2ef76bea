import { MockAgent } from 'undici';

import { FlightSyncError } from '../src/sync/errors';
import { OpenSkyListFetcher } from '../src/sync/openSkyListFetcher';

const ORIGIN = 'https://opensky.test';
const PATH = '/api/states/all';
const NOW = new Date('2024-05-01T12:00:00.000Z');

const vector = (icao24: unknown, lastContact: unknown): unknown[] => [
  icao24,
  'TEST123 ',
  'United States',
  lastContact,
  lastContact,
  -73.78,
  40.64,
  10_000,
  false,
  250,
  90,
  5,
  null,
  10_200,
  null,
  false,
  0,
];

describe('OpenSkyListFetcher', () => {
  let agent: MockAgent;

  beforeEach(() => {
    agent = new MockAgent();
    agent.disableNetConnect();
  });

  afterEach(async () => {
    await agent.close();
  });

  const createFetcher = (maxEntries = 100) =>
    new OpenSkyListFetcher({
      url: `${ORIGIN}${PATH}`,
      timeoutMs: 1_000,
      maxEntries,
      dispatcher: agent,
      now: () => NOW,
    });

  const replyWith = (status: number, body: string | object, headers: Record<string, string> = {}) => {
    agent.get(ORIGIN).intercept({ path: PATH, method: 'GET' }).reply(status, body, { headers });
  };

  const fetchError = async (fetcher: OpenSkyListFetcher): Promise<FlightSyncError> => {
    const error: unknown = await fetcher.fetch().then(
      () => null,
      (rejection: unknown) => rejection,
    );

    if (!(error instanceof FlightSyncError)) {
      throw new Error('Expected the list fetch to fail with a FlightSyncError');
    }

    return error;
  };

  it('returns one ref per state vector with its last contact time', async () => {
    replyWith(200, {
      time: 1_700_000_010,
      states: [vector('abc123', 1_700_000_005), vector('DEF456 ', null)],
    });

    await expect(createFetcher().fetch()).resolves.toEqual({
      refs: [
        { id: 'abc123', observedAt: new Date(1_700_000_005_000) },
        { id: 'def456', observedAt: new Date(1_700_000_010_000) },
      ],
      warnings: [],
      fetchedAt: NOW,
    });
  });

  it('treats a null states field as an empty list', async () => {
    replyWith(200, { time: 1_700_000_010, states: null });

    await expect(createFetcher().fetch()).resolves.toEqual({ refs: [], warnings: [], fetchedAt: NOW });
  });

  it('reports unusable entries as warnings', async () => {
    replyWith(200, {
      time: 1_700_000_010,
      states: ['garbage', vector(null, 1_700_000_005), vector('abc123', 1_700_000_005)],
    });

    const list = await createFetcher().fetch();

    expect(list.refs.map((ref) => ref.id)).toEqual(['abc123']);
    expect(list.warnings).toEqual([
      { index: 0, reason: 'entry is not a state vector' },
      { index: 1, reason: 'entry has no icao24 address' },
    ]);
  });

  it('rejects a list in which no entry is usable', async () => {
    replyWith(200, {
      time: 1_700_000_010,
      states: ['garbage', vector(null, 1_700_000_005)],
    });

    const error = await fetchError(createFetcher());

    expect(error.kind).toBe('UpstreamMalformed');
    expect(error.message).toBe('Flight list contains no usable entries');
  });

  it('accepts an empty states array', async () => {
    replyWith(200, { time: 1_700_000_010, states: [] });

    await expect(createFetcher().fetch()).resolves.toEqual({ refs: [], warnings: [], fetchedAt: NOW });
  });

  it('truncates lists beyond the configured limit', async () => {
    replyWith(200, {
      time: 1_700_000_010,
      states: [vector('aaa111', 1), vector('bbb222', 1), vector('ccc333', 1)],
    });

    const list = await createFetcher(1).fetch();

    expect(list.refs.map((ref) => ref.id)).toEqual(['aaa111']);
    expect(list.warnings).toEqual([{ index: 1, reason: 'dropped 2 entries beyond the limit of 1' }]);
  });

  it('rejects a body that is not JSON', async () => {
    replyWith(200, '<html>maintenance</html>');

    const error = await fetchError(createFetcher());

    expect(error.kind).toBe('UpstreamMalformed');
    expect(error.message).toBe('Flight list response is not valid JSON');
  });

  it('rejects a states field that is not an array', async () => {
    replyWith(200, { states: 'abc123' });

    expect((await fetchError(createFetcher())).kind).toBe('UpstreamMalformed');
  });

  it('rejects a top-level array', async () => {
    replyWith(200, []);

    expect((await fetchError(createFetcher())).message).toBe(
      'Flight list response is not a JSON object',
    );
  });

  it('maps server errors and a missing endpoint to UpstreamUnavailable', async () => {
    replyWith(503, 'unavailable');
    const unavailable = await fetchError(createFetcher());
    expect(unavailable.kind).toBe('UpstreamUnavailable');
    expect(unavailable.message).toBe('Flight list source responded with HTTP 503');

    replyWith(404, 'missing');
    expect((await fetchError(createFetcher())).kind).toBe('UpstreamUnavailable');
  });

  it('maps 429 to UpstreamRateLimited with the retry-after delay', async () => {
    replyWith(429, 'slow down', { 'retry-after': '30' });

    const error = await fetchError(createFetcher());

    expect(error.kind).toBe('UpstreamRateLimited');
    expect(error.retryAfterMs).toBe(30_000);
  });

  it('maps network failures to UpstreamUnavailable', async () => {
    agent
      .get(ORIGIN)
      .intercept({ path: PATH, method: 'GET' })
      .replyWithError(new Error('connection refused'));

    expect((await fetchError(createFetcher())).kind).toBe('UpstreamUnavailable');
  });
});

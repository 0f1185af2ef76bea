import { MemoryIndexWriter } from '../src/sync/memoryIndexWriter';
import type { FlightRecord } from '../src/sync/types';

const buildRecord = (overrides: Partial<FlightRecord> = {}): FlightRecord => ({
  flightId: 'abc123',
  callsign: 'TEST123',
  origin: null,
  destination: null,
  originCountry: 'United States',
  onGround: false,
  position: {
    lat: 40.64,
    lon: -73.78,
    altitudeM: 10_000,
    headingDeg: 90,
    speedMps: 250,
    verticalRateMps: 5,
  },
  status: 'airborne',
  lastUpdated: new Date('2024-05-01T12:00:00.000Z'),
  lastUpdatedSource: 'upstream',
  sourceVersion: '0123456789abcdef',
  ...overrides,
});

describe('MemoryIndexWriter', () => {
  it('creates a record the first time it is written', async () => {
    const writer = new MemoryIndexWriter();
    const record = buildRecord();

    await expect(writer.upsert(record)).resolves.toBe('created');
    expect(writer.get('abc123')).toEqual(record);
    expect(writer.size).toBe(1);
  });

  it('treats a repeated write of the same record as a no-op', async () => {
    const writer = new MemoryIndexWriter();

    await writer.upsert(buildRecord());
    await expect(writer.upsert(buildRecord())).resolves.toBe('conflict');
    expect(writer.size).toBe(1);
  });

  it('keeps the record with the latest lastUpdated', async () => {
    const writer = new MemoryIndexWriter();
    const older = buildRecord({ callsign: 'OLD' });
    const newer = buildRecord({
      callsign: 'NEW',
      lastUpdated: new Date('2024-05-01T12:05:00.000Z'),
    });

    await writer.upsert(older);
    await expect(writer.upsert(newer)).resolves.toBe('updated');
    await expect(writer.upsert(older)).resolves.toBe('conflict');

    expect(writer.get('abc123')?.callsign).toBe('NEW');
  });

  it('converges to the newest record whatever the arrival order', async () => {
    const writer = new MemoryIndexWriter();
    const versions = [3, 1, 2].map((minute) =>
      buildRecord({
        callsign: `V${minute}`,
        lastUpdated: new Date(`2024-05-01T12:0${minute}:00.000Z`),
      }),
    );

    await Promise.all(versions.map((record) => writer.upsert(record)));

    expect(writer.get('abc123')?.callsign).toBe('V3');
  });

  it('only stores locally stamped records when nothing is stored yet', async () => {
    const writer = new MemoryIndexWriter();
    const local = buildRecord({
      lastUpdated: new Date('2030-01-01T00:00:00.000Z'),
      lastUpdatedSource: 'local',
    });

    await writer.upsert(buildRecord());
    await expect(writer.upsert(local)).resolves.toBe('conflict');

    const empty = new MemoryIndexWriter();
    await expect(empty.upsert(local)).resolves.toBe('created');
  });

  it('returns every stored record from snapshot', async () => {
    const writer = new MemoryIndexWriter();

    await writer.upsert(buildRecord());
    await writer.upsert(buildRecord({ flightId: 'def456' }));

    expect(writer.snapshot().map((record) => record.flightId)).toEqual(['abc123', 'def456']);
  });
});

import request from 'supertest';

import { createApp } from '../src/app';
import { resetConfig } from '../src/config';
import {
  SyncInProgressError,
  type CycleOverrides,
  type SyncStatus,
  type SyncTrigger,
} from '../src/services/flightSyncService';
import { FlightSyncError } from '../src/sync/errors';
import type { CycleResult } from '../src/sync/types';

const cycleResult: CycleResult = {
  total: 2,
  succeeded: 1,
  skipped: 0,
  conflicts: 1,
  failed: [{ flightId: 'ba2', errorKind: 'ValidationFailed', message: 'bad payload', attempts: 1 }],
  warnings: [],
  duplicatesRemoved: 0,
  timedOut: false,
  startedAt: new Date('2024-05-01T12:00:00.000Z'),
  completedAt: new Date('2024-05-01T12:00:01.500Z'),
  durationMs: 1_500,
};

describe('cycles API', () => {
  const createService = () => ({
    run: jest.fn<Promise<CycleResult>, [SyncTrigger?, CycleOverrides?]>(),
    getLatestStatus: jest.fn<SyncStatus | null, []>().mockReturnValue(null),
  });

  let consoleErrorSpy: jest.SpyInstance;

  beforeEach(() => {
    resetConfig();
    consoleErrorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    consoleErrorSpy.mockRestore();
  });

  describe('GET /api/cycles/latest', () => {
    it('reports that no cycle has run yet', async () => {
      const service = createService();

      const response = await request(createApp({ syncService: service })).get('/api/cycles/latest');

      expect(response.status).toBe(200);
      expect(response.body).toEqual({
        status: 'NOT_AVAILABLE',
        trigger: null,
        startedAt: null,
        completedAt: null,
        failedAt: null,
        totals: null,
        timedOut: false,
        errorKind: null,
        errorMessage: null,
      });
    });

    it('serializes the latest cycle status', async () => {
      const service = createService();
      service.getLatestStatus.mockReturnValue({
        status: 'COMPLETED',
        trigger: 'scheduled',
        startedAt: new Date('2024-05-01T12:00:00.000Z'),
        completedAt: new Date('2024-05-01T12:00:01.500Z'),
        failedAt: null,
        totals: { total: 2, succeeded: 1, skipped: 0, conflicts: 1, failed: 1 },
        timedOut: false,
        errorKind: null,
        errorMessage: null,
      });

      const response = await request(createApp({ syncService: service })).get('/api/cycles/latest');

      expect(response.body).toEqual({
        status: 'COMPLETED',
        trigger: 'scheduled',
        startedAt: '2024-05-01T12:00:00.000Z',
        completedAt: '2024-05-01T12:00:01.500Z',
        failedAt: null,
        totals: { total: 2, succeeded: 1, skipped: 0, conflicts: 1, failed: 1 },
        timedOut: false,
        errorKind: null,
        errorMessage: null,
      });
    });
  });

  describe('POST /api/cycles', () => {
    it('runs a manual cycle with the requested overrides', async () => {
      const service = createService();
      service.run.mockResolvedValue(cycleResult);

      const response = await request(createApp({ syncService: service }))
        .post('/api/cycles')
        .send({ maxConcurrency: 2, dedupe: true });

      expect(response.status).toBe(200);
      expect(service.run).toHaveBeenCalledWith('manual', { maxConcurrency: 2, dedupe: true });
      expect(response.body).toEqual({
        total: 2,
        succeeded: 1,
        skipped: 0,
        conflicts: 1,
        failed: [{ flightId: 'ba2', errorKind: 'ValidationFailed', message: 'bad payload', attempts: 1 }],
        warnings: [],
        duplicatesRemoved: 0,
        timedOut: false,
        startedAt: '2024-05-01T12:00:00.000Z',
        completedAt: '2024-05-01T12:00:01.500Z',
        durationMs: 1_500,
      });
    });

    it('runs with configured defaults when no body is sent', async () => {
      const service = createService();
      service.run.mockResolvedValue(cycleResult);

      const response = await request(createApp({ syncService: service })).post('/api/cycles');

      expect(response.status).toBe(200);
      expect(service.run).toHaveBeenCalledWith('manual', {});
    });

    it('rejects invalid overrides', async () => {
      const service = createService();

      const invalid = await request(createApp({ syncService: service }))
        .post('/api/cycles')
        .send({ maxConcurrency: 0 });
      const unknownField = await request(createApp({ syncService: service }))
        .post('/api/cycles')
        .send({ concurrency: 2 });

      expect(invalid.status).toBe(400);
      expect(invalid.body.message).toBe('Validation failed');
      expect(unknownField.status).toBe(400);
      expect(service.run).not.toHaveBeenCalled();
    });

    it('answers 409 while a cycle is already running', async () => {
      const service = createService();
      service.run.mockRejectedValue(new SyncInProgressError());

      const response = await request(createApp({ syncService: service })).post('/api/cycles').send({});

      expect(response.status).toBe(409);
      expect(response.body).toEqual({ message: 'A flight sync cycle is already in progress' });
    });

    it('answers 502 when the flight list cannot be fetched', async () => {
      const service = createService();
      service.run.mockRejectedValue(
        new FlightSyncError('UpstreamMalformed', 'Flight list response is not valid JSON'),
      );

      const response = await request(createApp({ syncService: service })).post('/api/cycles').send({});

      expect(response.status).toBe(502);
      expect(response.body).toEqual({
        message: 'Flight list could not be fetched',
        details: {
          errorKind: 'UpstreamMalformed',
          reason: 'Flight list response is not valid JSON',
        },
      });
    });
  });
});

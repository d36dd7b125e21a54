import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

vi.mock('../../src/application/query-readings.js', () => ({
  listReadings: vi.fn(),
  getReading: vi.fn(),
}));

import type { FastifyInstance } from 'fastify';
import { readingRoutes } from '../../src/interfaces/http/index.js';
import { listReadings, getReading } from '../../src/application/query-readings.js';
import type { ReadingView } from '../../src/application/query-readings.js';
import { buildTestApp } from '../support/app.js';

const mockListReadings = vi.mocked(listReadings);
const mockGetReading = vi.mocked(getReading);
const fakeDb = {} as import('../../src/infrastructure/db/index.js').Database;

const view: ReadingView = {
  idempotency_key: 'rover-1:1000',
  device_id: 'rover-1',
  device_class: 'default',
  reading_epoch: '2026-03-01T10:00:00.000Z',
  captured_at: '2026-03-01T10:00:00.400Z',
  variants: ['location'],
  missing_variants: ['thermal'],
  partial: true,
  seal_reason: 'timeout',
  record_count: 1,
  measurements: { location: { latitude: 41.3, longitude: 2.1 } },
  committed_at: '2026-03-01T10:00:02.000Z',
  updated_at: '2026-03-01T10:00:02.000Z',
};

let app: FastifyInstance;

beforeEach(async () => {
  vi.clearAllMocks();
  app = await buildTestApp(fakeDb, readingRoutes);
});

afterEach(async () => {
  await app.close();
});

describe('GET /api/v1/readings', () => {
  it('returns a JSON page', async () => {
    const page = { data: [view], pagination: { limit: 10, offset: 0, count: 1, total: 1 } };
    mockListReadings.mockResolvedValueOnce(page);

    const res = await app.inject({ method: 'GET', url: '/api/v1/readings?device_id=rover-1&partial=true&variant=location' });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual(page);
    expect(mockListReadings).toHaveBeenCalledWith(fakeDb, {
      limit: undefined,
      offset: undefined,
      device_id: 'rover-1',
      variant: 'location',
      partial: true,
      from: undefined,
      to: undefined,
    });
  });

  it.each([
    ['limit=abc', 'limit must be an integer'],
    ['offset=-1', 'offset must be a non-negative integer'],
    ['variant=lidar', 'unknown variant "lidar"'],
    ['partial=yes', 'partial must be true or false'],
    ['from=yesterday', 'from must be a valid ISO-8601 timestamp'],
    ['from=2026-03-02T00:00:00Z&to=2026-03-01T00:00:00Z', 'from must not be after to'],
    ['format=xml', 'format must be one of: json, csv'],
  ])('rejects %s', async (query, error) => {
    const res = await app.inject({ method: 'GET', url: `/api/v1/readings?${query}` });

    expect(res.statusCode).toBe(400);
    expect(res.json()).toEqual({ error });
    expect(mockListReadings).not.toHaveBeenCalled();
  });

  it('renders CSV when asked through the format parameter', async () => {
    mockListReadings.mockResolvedValueOnce({ data: [view], pagination: { limit: 10, offset: 0, count: 1, total: 1 } });

    const res = await app.inject({ method: 'GET', url: '/api/v1/readings?format=csv' });

    expect(res.statusCode).toBe(200);
    expect(res.headers['content-type']).toBe('text/csv; charset=utf-8');
    expect(res.body.split('\n')[1]).toBe(
      'rover-1:1000,rover-1,default,2026-03-01T10:00:00.000Z,2026-03-01T10:00:00.400Z,location,thermal,true,timeout,1,41.3,2.1',
    );
  });

  it('renders CSV when the client accepts text/csv', async () => {
    mockListReadings.mockResolvedValueOnce({ data: [], pagination: { limit: 10, offset: 0, count: 0, total: 0 } });

    const res = await app.inject({ method: 'GET', url: '/api/v1/readings', headers: { accept: 'text/csv' } });

    expect(res.headers['content-type']).toBe('text/csv; charset=utf-8');
  });
});

describe('GET /api/v1/readings/:idempotency_key', () => {
  it('returns the reading', async () => {
    mockGetReading.mockResolvedValueOnce(view);

    const res = await app.inject({ method: 'GET', url: '/api/v1/readings/rover-1:1000' });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual(view);
    expect(mockGetReading).toHaveBeenCalledWith(fakeDb, 'rover-1:1000');
  });

  it('returns 404 when missing', async () => {
    mockGetReading.mockResolvedValueOnce(null);

    const res = await app.inject({ method: 'GET', url: '/api/v1/readings/rover-9:0' });

    expect(res.statusCode).toBe(404);
    expect(res.json()).toEqual({ error: 'Reading not found' });
  });
});

import { describe, it, expect, vi, beforeEach } from 'vitest';

/**
 * ESM-safe mock: vi.mock is hoisted above imports by Vitest.
 * We mock the infrastructure/db barrel for queryMetrics.
 */
vi.mock('../../src/infrastructure/db/index.js', () => ({
  queryMetrics: vi.fn(),
}));

import { getMetrics, resolveWindow, resolveGroupBy } from '../../src/application/metrics.js';
import { queryMetrics } from '../../src/infrastructure/db/index.js';

const mockQueryMetrics = vi.mocked(queryMetrics);
const fakeDb = {} as import('../../src/infrastructure/db/index.js').Database;
const fixedNow = () => new Date('2026-03-01T12:00:00.000Z');

beforeEach(() => {
  vi.clearAllMocks();
});

// ── resolveWindow ────────────────────────────────────────

describe('resolveWindow', () => {
  it('returns 60 when undefined', () => {
    expect(resolveWindow(undefined)).toBe(60);
  });

  it('returns the value when within range', () => {
    expect(resolveWindow(120)).toBe(120);
  });

  it('clamps below MIN_WINDOW to 10', () => {
    expect(resolveWindow(5)).toBe(10);
  });

  it('clamps above MAX_WINDOW to 3600', () => {
    expect(resolveWindow(9999)).toBe(3600);
  });

  it('returns null for NaN', () => {
    expect(resolveWindow(NaN)).toBeNull();
  });

  it('returns null for non-integer', () => {
    expect(resolveWindow(30.5)).toBeNull();
  });
});

// ── resolveGroupBy ───────────────────────────────────────

describe('resolveGroupBy', () => {
  it('returns "device_id" when undefined', () => {
    expect(resolveGroupBy(undefined)).toBe('device_id');
  });

  it('accepts "seal_reason"', () => {
    expect(resolveGroupBy('seal_reason')).toBe('seal_reason');
  });

  it('accepts "device_class"', () => {
    expect(resolveGroupBy('device_class')).toBe('device_class');
  });

  it('returns null for invalid input', () => {
    expect(resolveGroupBy('variant')).toBeNull();
  });

  it('returns null for empty string', () => {
    expect(resolveGroupBy('')).toBeNull();
  });
});

// ── getMetrics ───────────────────────────────────────────

describe('getMetrics', () => {
  it('uses defaults when no params provided', async () => {
    mockQueryMetrics.mockResolvedValueOnce([]);

    const result = await getMetrics(fakeDb, {}, fixedNow);

    expect(result).toEqual({
      window_seconds: 60,
      group_by: 'device_id',
      from: '2026-03-01T11:59:00.000Z',
      to: '2026-03-01T12:00:00.000Z',
      metrics: [],
    });
  });

  it('passes the window and filters to the repository', async () => {
    mockQueryMetrics.mockResolvedValueOnce([]);

    await getMetrics(fakeDb, { window_seconds: 300, group_by: 'seal_reason', device_id: 'rover-1' }, fixedNow);

    expect(mockQueryMetrics).toHaveBeenCalledWith(fakeDb, {
      from: new Date('2026-03-01T11:55:00.000Z'),
      to: new Date('2026-03-01T12:00:00.000Z'),
      group_by: 'seal_reason',
      device_id: 'rover-1',
    });
  });

  it('computes rate_per_sec and the partial ratio', async () => {
    mockQueryMetrics.mockResolvedValueOnce([
      { key: 'rover-1', count: 120, partial: 3 },
      { key: 'rover-2', count: 7, partial: 0 },
    ]);

    const result = await getMetrics(fakeDb, { window_seconds: 60 }, fixedNow);

    expect(result.metrics).toEqual([
      { key: 'rover-1', count: 120, partial: 3, partial_ratio: 0.025, rate_per_sec: 2 },
      // 7 / 60 = 0.11666... → 0.1167
      { key: 'rover-2', count: 7, partial: 0, partial_ratio: 0, rate_per_sec: 0.1167 },
    ]);
  });

  it('rolls up partial readings per device class', async () => {
    mockQueryMetrics.mockResolvedValueOnce([
      { key: 'rover', count: 3, partial: 1 },
      { key: 'drone', count: 0, partial: 0 },
    ]);

    const result = await getMetrics(fakeDb, { window_seconds: 60, group_by: 'device_class' }, fixedNow);

    expect(mockQueryMetrics).toHaveBeenCalledWith(fakeDb, expect.objectContaining({ group_by: 'device_class' }));
    expect(result.group_by).toBe('device_class');
    expect(result.metrics).toEqual([
      // 1 / 3 = 0.3333...; 3 / 60 = 0.05
      { key: 'rover', count: 3, partial: 1, partial_ratio: 0.3333, rate_per_sec: 0.05 },
      { key: 'drone', count: 0, partial: 0, partial_ratio: 0, rate_per_sec: 0 },
    ]);
  });

  it('falls back to defaults for invalid window/group_by', async () => {
    mockQueryMetrics.mockResolvedValueOnce([]);

    const result = await getMetrics(fakeDb, { window_seconds: NaN, group_by: 'bad' }, fixedNow);

    expect(result.window_seconds).toBe(60);
    expect(result.group_by).toBe('device_id');
  });
});

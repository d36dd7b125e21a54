import { describe, it, expect, vi, beforeEach } from 'vitest';
import type { Mock } from 'vitest';
import { DualSinkWriter } from '../../src/application/dual-sink-writer.js';
import type { ReadingSink } from '../../src/application/dual-sink-writer.js';
import { InMemorySink, fakeLogger } from '../support/fakes.js';
import { sealedEntry } from '../support/entries.js';

describe('DualSinkWriter', () => {
  let documents: InMemorySink;
  let timeseries: InMemorySink;
  let sleep: Mock<(ms: number) => Promise<void>>;
  let metrics: { sinkWrite: Mock; sinkRetry: Mock };

  function writer(overrides: { documentSink?: ReadingSink; maxAttempts?: number; writeTimeoutMs?: number } = {}) {
    return new DualSinkWriter(overrides.documentSink ?? documents, timeseries, {
      maxAttempts: overrides.maxAttempts ?? 5,
      baseDelayMs: 200,
      maxDelayMs: 5000,
      writeTimeoutMs: overrides.writeTimeoutMs ?? 5000,
      log: fakeLogger(),
      metrics,
      sleep,
    });
  }

  beforeEach(() => {
    documents = new InMemorySink('document');
    timeseries = new InMemorySink('timeseries');
    sleep = vi.fn<(ms: number) => Promise<void>>(async () => undefined);
    metrics = { sinkWrite: vi.fn(), sinkRetry: vi.fn() };
  });

  it('writes the commit record to both sinks', async () => {
    const result = await writer().commit(sealedEntry());

    expect(result).toEqual({
      idempotency_key: 'rover-1:1000',
      ok: true,
      document: { status: 'written', attempts: 1 },
      timeseries: { status: 'written', attempts: 1 },
    });
    const expected = {
      idempotency_key: 'rover-1:1000',
      device_id: 'rover-1',
      device_class: 'default',
      reading_epoch: '1970-01-01T00:00:01.000Z',
      captured_at: '1970-01-01T00:00:01.200Z',
      variants: ['location', 'thermal'],
      missing_variants: [],
      partial: false,
      seal_reason: 'complete',
      record_count: 2,
      measurements: {
        location: { latitude: 41.3, longitude: 2.1 },
        thermal: { canopy_temperature: 24.5 },
      },
    };
    expect(documents.rows.get('rover-1:1000')).toEqual(expected);
    expect(timeseries.rows.get('rover-1:1000')).toEqual(expected);
  });

  it('flags a partial reading and lists the missing variants', async () => {
    await writer().commit(sealedEntry({
      measurements: { location: { latitude: 41.3, longitude: 2.1 } },
      variants: ['location'],
      complete: false,
      seal_reason: 'timeout',
      record_count: 1,
    }));

    expect(timeseries.rows.get('rover-1:1000')).toMatchObject({
      partial: true,
      missing_variants: ['thermal'],
      seal_reason: 'timeout',
    });
  });

  it('is idempotent per reading key', async () => {
    const w = writer();
    await w.commit(sealedEntry());
    await w.commit(sealedEntry({ record_count: 3 }));

    expect(documents.rows.size).toBe(1);
    expect(timeseries.rows.size).toBe(1);
    expect(timeseries.rows.get('rover-1:1000')?.record_count).toBe(3);
  });

  it('retries transient failures with exponential backoff', async () => {
    documents.failNext('transient', 2);

    const result = await writer().commit(sealedEntry());

    expect(result.ok).toBe(true);
    expect(result.document).toEqual({ status: 'written', attempts: 3 });
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([200, 400]);
    expect(metrics.sinkRetry).toHaveBeenCalledTimes(2);
    expect(metrics.sinkRetry).toHaveBeenCalledWith('document');
  });

  it('stops at the first permanent failure and leaves the other sink written', async () => {
    timeseries.failNext('permanent');

    const result = await writer().commit(sealedEntry());

    expect(result.ok).toBe(false);
    expect(result.timeseries).toEqual({
      status: 'failed',
      attempts: 1,
      error: { kind: 'permanent', message: 'timeseries permanent failure' },
    });
    expect(result.document).toEqual({ status: 'written', attempts: 1 });
    expect(documents.rows.has('rover-1:1000')).toBe(true);
    expect(timeseries.rows.has('rover-1:1000')).toBe(false);
    expect(sleep).not.toHaveBeenCalled();
  });

  it('gives up after the attempt budget', async () => {
    documents.failNext('transient', 5);

    const result = await writer().commit(sealedEntry());

    expect(result.document).toEqual({
      status: 'failed',
      attempts: 5,
      error: { kind: 'transient', message: 'document transient failure' },
    });
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([200, 400, 800, 1600]);
    expect(metrics.sinkWrite).toHaveBeenCalledWith('document', 'failed');
    expect(metrics.sinkWrite).toHaveBeenCalledWith('timeseries', 'written');
  });

  it('treats a write that exceeds the timeout as transient', async () => {
    const hanging: ReadingSink = {
      name: 'document',
      write: () => new Promise<void>(() => undefined),
    };

    const result = await writer({ documentSink: hanging, maxAttempts: 2, writeTimeoutMs: 10 }).commit(sealedEntry());

    expect(result.document).toEqual({
      status: 'failed',
      attempts: 2,
      error: { kind: 'transient', message: 'Operation timed out after 10ms' },
    });
    expect(result.timeseries.status).toBe('written');
  });
});

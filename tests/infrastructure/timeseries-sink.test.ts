import { describe, it, expect, vi, beforeEach } from 'vitest';

vi.mock('../../src/infrastructure/db/reading-repository.js', () => ({
  upsertReading: vi.fn(),
}));

import { SinkWriteError } from '../../src/domain/index.js';
import { toCommitRecord } from '../../src/application/commit-record.js';
import { TimeseriesSink } from '../../src/infrastructure/db/timeseries-sink.js';
import { upsertReading } from '../../src/infrastructure/db/reading-repository.js';
import { sealedEntry } from '../support/entries.js';

const mockUpsert = vi.mocked(upsertReading);
const fakeDb = {} as import('../../src/infrastructure/db/index.js').Database;

beforeEach(() => {
  vi.clearAllMocks();
});

describe('TimeseriesSink', () => {
  it('upserts through the reading repository', async () => {
    mockUpsert.mockResolvedValueOnce(undefined);
    const record = toCommitRecord(sealedEntry());

    await new TimeseriesSink(fakeDb).write(record);

    expect(mockUpsert).toHaveBeenCalledWith(fakeDb, record);
  });

  it('marks connection failures transient', async () => {
    mockUpsert.mockRejectedValueOnce(Object.assign(new Error('terminating connection'), { code: '57P01' }));

    await expect(new TimeseriesSink(fakeDb).write(toCommitRecord(sealedEntry()))).rejects.toMatchObject({
      sink: 'timeseries',
      kind: 'transient',
    });
  });

  it('marks constraint violations permanent', async () => {
    mockUpsert.mockRejectedValueOnce(Object.assign(new Error('value too long'), { code: '22001' }));

    const error = await new TimeseriesSink(fakeDb).write(toCommitRecord(sealedEntry())).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(SinkWriteError);
    expect(error).toMatchObject({ kind: 'permanent', message: 'value too long' });
  });
});

import { SinkWriteError } from '../../domain/index.js';
import type { CommitRecord, SinkName } from '../../domain/index.js';
import type { ReadingSink } from '../../application/dual-sink-writer.js';
import { classifyError } from '../../application/retry.js';
import type { Database } from './client.js';
import { upsertReading } from './reading-repository.js';

/**
 * Time-series sink over the Postgres `readings` table.
 *
 * Connection-level failures (socket errors, SQLSTATE class 08, admin
 * shutdown, serialization failures) are transient; constraint and type
 * errors are permanent.
 */
export class TimeseriesSink implements ReadingSink {
  readonly name: SinkName = 'timeseries';

  constructor(private readonly db: Database) {}

  async write(record: CommitRecord): Promise<void> {
    try {
      await upsertReading(this.db, record);
    } catch (err: unknown) {
      const message = err instanceof Error ? err.message : String(err);
      throw new SinkWriteError(this.name, classifyError(err), message, { cause: err });
    }
  }
}

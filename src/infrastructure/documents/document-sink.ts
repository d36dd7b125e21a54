import { mongo } from 'mongoose';
import type { Model, PipelineStage } from 'mongoose';
import { SENSOR_VARIANTS, SinkWriteError, sortVariants } from '../../domain/index.js';
import type { CommitRecord, SinkErrorKind, SinkName } from '../../domain/index.js';
import type { ReadingSink } from '../../application/dual-sink-writer.js';
import { classifyError } from '../../application/retry.js';
import type { ReadingDocument } from './reading-document.js';

const DUPLICATE_KEY = 11000;

/**
 * Network and server-selection failures, retryable-write labels, and the
 * duplicate-key race two concurrent upserts can hit are worth retrying.
 */
export function classifyMongoError(err: unknown): SinkErrorKind {
  if (
    err instanceof mongo.MongoNetworkError
    || err instanceof mongo.MongoServerSelectionError
  ) {
    return 'transient';
  }
  if (err instanceof mongo.MongoServerError && err.code === DUPLICATE_KEY) {
    return 'transient';
  }
  if (err instanceof mongo.MongoError && err.hasErrorLabel('RetryableWriteError')) {
    return 'transient';
  }
  return classifyError(err);
}

/**
 * Update pipeline that merges a commit record into the stored document.
 *
 * Stages run in order: merge measurements per variant (incoming wins),
 * derive `variants` from the merged measurements, recompute
 * `missing_variants` against the incoming expected set, then `partial`.
 * The seal reason is only replaced while the stored document is partial.
 * Incoming values are wrapped in `$literal` so strings starting with `$`
 * are never read as field paths.
 */
export function readingMergePipeline(record: CommitRecord): PipelineStage.Set[] {
  const expected = sortVariants([...record.variants, ...record.missing_variants]);

  return [
    {
      $set: {
        seal_reason: { $cond: [{ $eq: ['$partial', false] }, '$seal_reason', { $literal: record.seal_reason }] },
        device_id: { $literal: record.device_id },
        device_class: { $literal: record.device_class },
        reading_epoch: new Date(record.reading_epoch),
        captured_at: { $max: ['$captured_at', new Date(record.captured_at)] },
        record_count: { $max: ['$record_count', record.record_count] },
        measurements: { $mergeObjects: [{ $ifNull: ['$measurements', {}] }, { $literal: record.measurements }] },
        committed_at: { $ifNull: ['$committed_at', '$$NOW'] },
        updated_at: '$$NOW',
      },
    },
    {
      $set: {
        variants: {
          $filter: {
            input: { $literal: SENSOR_VARIANTS },
            as: 'v',
            cond: { $in: ['$$v', { $map: { input: { $objectToArray: '$measurements' }, as: 'm', in: '$$m.k' } }] },
          },
        },
      },
    },
    {
      $set: {
        missing_variants: {
          $filter: {
            input: { $literal: expected },
            as: 'v',
            cond: { $not: [{ $in: ['$$v', '$variants'] }] },
          },
        },
      },
    },
    { $set: { partial: { $gt: [{ $size: '$missing_variants' }, 0] } } },
  ];
}

/**
 * Upserts commit records into MongoDB, keyed by `_id`. The merge is
 * monotone, like the Postgres upsert: a re-seal carrying fewer variants
 * never removes stored ones.
 */
export class DocumentSink implements ReadingSink {
  readonly name: SinkName = 'document';

  constructor(private readonly model: Model<ReadingDocument>) {}

  async write(record: CommitRecord): Promise<void> {
    try {
      await this.model.updateOne(
        { _id: record.idempotency_key },
        readingMergePipeline(record),
        { upsert: true, timestamps: false },
      ).exec();
    } catch (err: unknown) {
      const message = err instanceof Error ? err.message : String(err);
      throw new SinkWriteError(this.name, classifyMongoError(err), message, { cause: err });
    }
  }
}

import { Schema } from 'mongoose';
import type { Connection, Model } from 'mongoose';
import type { Measurements } from '../../domain/index.js';

export const READING_DOCUMENT_MODEL_NAME = 'Reading';

/** Document-sink shape: one document per reading, `_id` is the idempotency key. */
export interface ReadingDocument {
  _id: string;
  device_id: string;
  device_class: string;
  reading_epoch: Date;
  captured_at: Date;
  variants: string[];
  missing_variants: string[];
  partial: boolean;
  seal_reason: string;
  record_count: number;
  measurements: Measurements;
  committed_at: Date;
  updated_at: Date;
}

export const readingDocumentSchema = new Schema<ReadingDocument>({
  _id: { type: String, required: true },
  device_id: { type: String, required: true, index: true },
  device_class: { type: String, required: true },
  reading_epoch: { type: Date, required: true },
  captured_at: { type: Date, required: true },
  variants: { type: [String], required: true },
  missing_variants: { type: [String], default: [] },
  partial: { type: Boolean, required: true },
  seal_reason: { type: String, enum: ['complete', 'timeout', 'evicted', 'shutdown'], required: true },
  record_count: { type: Number, required: true },
  measurements: { type: Schema.Types.Mixed, required: true },
}, {
  versionKey: false,
  minimize: false,
  timestamps: {
    createdAt: 'committed_at',
    updatedAt: 'updated_at',
  },
});

readingDocumentSchema.index({ device_id: 1, reading_epoch: -1 });

export function readingDocumentModel(connection: Connection, collection: string): Model<ReadingDocument> {
  return connection.model<ReadingDocument>(READING_DOCUMENT_MODEL_NAME, readingDocumentSchema, collection);
}

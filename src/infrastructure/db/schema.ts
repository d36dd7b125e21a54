import {
  pgTable,
  varchar,
  timestamp,
  jsonb,
  text,
  boolean,
  integer,
  index,
} from 'drizzle-orm/pg-core';
import type { Measurements } from '../../domain/index.js';

/**
 * Time-series sink: one row per committed reading.
 *
 * `idempotency_key` (`<device_id>:<reading_epoch_ms>`) is the primary key,
 * so a re-commit of the same reading is an upsert, never a second row.
 */
export const readings = pgTable('readings', {
  idempotency_key: varchar('idempotency_key', { length: 320 }).primaryKey(),
  device_id: varchar('device_id', { length: 255 }).notNull(),
  device_class: varchar('device_class', { length: 64 }).notNull(),
  reading_epoch: timestamp('reading_epoch', { withTimezone: true }).notNull(),
  captured_at: timestamp('captured_at', { withTimezone: true }).notNull(),
  variants: text('variants').array().notNull(),
  missing_variants: text('missing_variants').array().notNull(),
  partial: boolean('partial').notNull(),
  seal_reason: varchar('seal_reason', { length: 16 }).notNull(),
  record_count: integer('record_count').notNull(),
  measurements: jsonb('measurements').$type<Measurements>().notNull(),
  committed_at: timestamp('committed_at', { withTimezone: true }).notNull().defaultNow(),
  updated_at: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
}, (table) => [
  index('idx_readings_device_id').on(table.device_id),
  index('idx_readings_reading_epoch').on(table.reading_epoch),
  index('idx_readings_committed_at').on(table.committed_at),
]);

export type ReadingRow = typeof readings.$inferSelect;

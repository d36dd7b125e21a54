import type { Logger } from 'pino';
import type { SqlClient } from './client.js';

/**
 * Creates the `readings` table and its indexes when missing.
 *
 * Mirrors `schema.ts`; drizzle-kit migrations are the path for schema
 * changes, this only makes a fresh database usable on first boot.
 */
export async function ensureReadingsTable(sql: SqlClient, log: Logger): Promise<void> {
  await sql.unsafe(`
    CREATE TABLE IF NOT EXISTS readings (
      idempotency_key  VARCHAR(320) PRIMARY KEY,
      device_id        VARCHAR(255) NOT NULL,
      device_class     VARCHAR(64)  NOT NULL,
      reading_epoch    TIMESTAMPTZ  NOT NULL,
      captured_at      TIMESTAMPTZ  NOT NULL,
      variants         TEXT[]       NOT NULL,
      missing_variants TEXT[]       NOT NULL,
      partial          BOOLEAN      NOT NULL,
      seal_reason      VARCHAR(16)  NOT NULL,
      record_count     INTEGER      NOT NULL,
      measurements     JSONB        NOT NULL,
      committed_at     TIMESTAMPTZ  NOT NULL DEFAULT NOW(),
      updated_at       TIMESTAMPTZ  NOT NULL DEFAULT NOW()
    )
  `);
  await sql.unsafe(`CREATE INDEX IF NOT EXISTS idx_readings_device_id ON readings (device_id)`);
  await sql.unsafe(`CREATE INDEX IF NOT EXISTS idx_readings_reading_epoch ON readings (reading_epoch)`);
  await sql.unsafe(`CREATE INDEX IF NOT EXISTS idx_readings_committed_at ON readings (committed_at)`);

  log.info('readings table ready');
}

import { SENSOR_VARIANTS } from '../domain/index.js';
import type { ReadingView } from './query-readings.js';

const FIXED_COLUMNS = [
  'idempotency_key',
  'device_id',
  'device_class',
  'reading_epoch',
  'captured_at',
  'variants',
  'missing_variants',
  'partial',
  'seal_reason',
  'record_count',
] as const;

function escapeCsv(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

function formatCell(value: unknown): string {
  if (value === null || value === undefined) return '';
  if (Array.isArray(value)) {
    return value.every((v) => typeof v === 'string') ? value.join(';') : JSON.stringify(value);
  }
  if (typeof value === 'object') return JSON.stringify(value);
  return String(value);
}

function measurementCells(reading: ReadingView): Map<string, unknown> {
  const cells = new Map<string, unknown>();
  for (const variant of SENSOR_VARIANTS) {
    const fields = reading.measurements[variant];
    if (fields === undefined) continue;
    for (const [field, value] of Object.entries(fields)) {
      cells.set(`${variant}.${field}`, value);
    }
  }
  return cells;
}

/**
 * Renders readings as CSV.
 *
 * Fixed columns come first; each measurement field becomes a
 * `<variant>.<field>` column, ordered by variant then alphabetically.
 * List columns join with `;`, nested values are JSON-encoded.
 */
export function renderReadingsCsv(readings: readonly ReadingView[]): string {
  const rows = readings.map((r) => ({ reading: r, cells: measurementCells(r) }));

  const measurementColumns = new Set<string>();
  for (const { cells } of rows) {
    for (const column of cells.keys()) measurementColumns.add(column);
  }
  const extra = [...measurementColumns].sort((a, b) => {
    const [va = '', fa = ''] = a.split('.');
    const [vb = '', fb = ''] = b.split('.');
    const byVariant = SENSOR_VARIANTS.findIndex((v) => v === va) - SENSOR_VARIANTS.findIndex((v) => v === vb);
    return byVariant !== 0 ? byVariant : fa.localeCompare(fb);
  });

  const lines = [[...FIXED_COLUMNS, ...extra].map(escapeCsv).join(',')];
  for (const { reading, cells } of rows) {
    const fixed = FIXED_COLUMNS.map((column) => formatCell(reading[column]));
    const measured = extra.map((column) => formatCell(cells.get(column)));
    lines.push([...fixed, ...measured].map(escapeCsv).join(','));
  }

  return `${lines.join('\n')}\n`;
}

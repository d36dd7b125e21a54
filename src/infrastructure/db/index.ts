export { readings } from './schema.js';
export type { ReadingRow } from './schema.js';
export { createDbClient } from './client.js';
export type { Database, SqlClient } from './client.js';
export { ensureReadingsTable } from './migrate.js';
export { upsertReading } from './reading-repository.js';
export { queryReadings, countReadings, findReadingByKey } from './reading-query-repository.js';
export type { ReadingQueryFilters, PaginationParams } from './reading-query-repository.js';
export { queryMetrics } from './metrics-repository.js';
export type { MetricsFilters, MetricsBucket, MetricsGroupBy } from './metrics-repository.js';
export { default as dbPlugin } from './db-plugin.js';
export type { DbPluginOptions } from './db-plugin.js';
export { TimeseriesSink } from './timeseries-sink.js';

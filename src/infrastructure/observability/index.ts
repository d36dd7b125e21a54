export { createPipelineMetrics } from './pipeline-metrics.js';
export type { PipelineMetrics, PipelineMetricsOptions } from './pipeline-metrics.js';
export { buildOpsServer } from './ops-server.js';
export type { OpsServerOptions, OpsStatus } from './ops-server.js';

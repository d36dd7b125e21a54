export * from './config/index.js';
export * from './db/index.js';
export * from './documents/index.js';
export * from './redis/index.js';
export * from './mqtt/index.js';
export * from './observability/index.js';

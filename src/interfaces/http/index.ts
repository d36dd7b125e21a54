export { default as readingRoutes } from './reading-routes.js';
export { default as metricsRoutes } from './metrics-routes.js';
export { default as healthRoutes } from './health-routes.js';

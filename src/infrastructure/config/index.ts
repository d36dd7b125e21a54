export { loadBridgeConfig, loadQueryConfig, ConfigError } from './bridge-config.js';
export type { BridgeConfig, QueryServiceConfig, LogLevel } from './bridge-config.js';
export { loadDeviceClasses } from './device-classes.js';
export { checkLaunchPrecondition } from './launch-guard.js';
export type { LaunchCheck } from './launch-guard.js';

export { loadEngineConfig } from './engine-config.js';
export type { EngineConfig, LogLevel } from './engine-config.js';

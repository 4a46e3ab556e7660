export * from './errors.js';
export * from './config.js';
export * from './mesh/meshIndex.js';
export * from './partition/partitioner.js';
export * from './jobs/artifacts.js';
export * from './jobs/template.js';
export * from './jobs/scheduler.js';
export * from './jobs/launcher.js';
export * from './jobs/watcher.js';
export * from './assembly/assembler.js';
export * from './pipeline.js';
export { createLogger, silentLogger, type Logger } from './utils/telemetry.js';

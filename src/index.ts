export * from './types/index.js';
export * from './driver/index.js';
export * from './exception/index.js';
export * from './table/index.js';
export * from './runner/index.js';
export * from './config/index.js';
export * from './schemas/index.js';
export { RunLogger, silentLogger, isLevelEnabled } from './logging/run-logger.js';
export type { EventLogger, RunEvent, LogLevel, RunLoggerOptions } from './logging/run-logger.js';
export { writeSummary, buildSummaryMarkdown } from './logging/summary-writer.js';
export type { SummaryOptions } from './logging/summary-writer.js';

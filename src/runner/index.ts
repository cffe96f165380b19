export { TransactionRunner, bindRunData, hasDataForScreen } from './transaction-runner.js';
export type { TransactionRunnerConfig, TransactionRunnerOptions } from './transaction-runner.js';
export { ScreenFiller } from './screen-filler.js';
export type { ScreenBinding, TableColumnSelection, ScreenFillerOptions } from './screen-filler.js';
export { executeActions, toActionList } from './action-executor.js';
export { buildScreenOrder, resolveOrderEntry, decodeActionToken, ACTION_TOKEN_PREFIX } from './screen-order.js';
export type { ScreenOrderInput } from './screen-order.js';
export { retryWithRecovery, sleep, DEFAULT_WRITE_RETRY } from './retry.js';
export type { RetryPolicy, RetryOptions, Sleep } from './retry.js';

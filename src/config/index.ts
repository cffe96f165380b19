export { CallableRegistry } from './callable-registry.js';
export { loadTransactionConfig, loadRunData, buildScreenMap } from './loader.js';
export type { TransactionConfig, RunDataFile } from './loader.js';

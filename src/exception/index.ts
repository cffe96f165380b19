export * from './errors.js';
export { classifyError, errorMessage } from './classifier.js';
export type { ErrorCategory } from './classifier.js';

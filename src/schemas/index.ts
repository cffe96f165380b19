export { ControlElementSchema, CallableElementSchema, ElementSchema, WINDOW_SCOPED_ID } from './element.schema.js';
export type { ElementConfig } from './element.schema.js';
export { ActionSchema, ActionListSchema } from './action.schema.js';
export {
  ScreenSchema,
  ScreensFileSchema,
  TableColumnsSchema,
  ScreenOrderEntrySchema,
} from './screen.schema.js';
export type { ScreenConfig } from './screen.schema.js';
export {
  RetryPolicySchema,
  TransactionFileSchema,
  FieldValueSchema,
  DataRecordSchema,
  RunDataSchema,
  DataFileSchema,
} from './transaction.schema.js';
export type { TransactionFile, DataFile } from './transaction.schema.js';

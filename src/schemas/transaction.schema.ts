import { z } from 'zod';
import { ScreenOrderEntrySchema } from './screen.schema.js';

export const RetryPolicySchema = z.object({
  attempts: z.number().int().min(1),
  delayMs: z.number().int().nonnegative(),
});

export const TransactionFileSchema = z.object({
  transactionCode: z.string().min(1),
  screenOrder: z.array(ScreenOrderEntrySchema).optional(),
  options: z
    .object({
      writeRetry: RetryPolicySchema.optional(),
    })
    .optional(),
});

export const FieldValueSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

export const DataRecordSchema = z.record(FieldValueSchema);

export const RunDataSchema = z.union([DataRecordSchema, z.array(DataRecordSchema)]);

export const DataFileSchema = z.object({
  data: RunDataSchema,
  screenData: z.record(RunDataSchema).optional(),
});

export type TransactionFile = z.infer<typeof TransactionFileSchema>;
export type DataFile = z.infer<typeof DataFileSchema>;

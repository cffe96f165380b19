import { z } from 'zod';
import { ElementSchema } from './element.schema.js';
import { ActionListSchema, ActionSchema } from './action.schema.js';

export const ScreenSchema = z.object({
  name: z.string().min(1),
  description: z.string().optional(),
  elements: z.array(ElementSchema),
  onEntry: ActionListSchema.optional(),
  onExit: ActionListSchema.optional(),
  pressEnter: z.boolean().optional(),
});

export const ScreensFileSchema = z.array(ScreenSchema).min(1);

export const TableColumnsSchema = z.record(z.array(z.string()));

export const ScreenOrderEntrySchema = z.union([
  z.string().min(1),
  z.object({ action: ActionSchema }),
  z.object({
    name: z.string().min(1),
    tableColumns: TableColumnsSchema.optional(),
    excludeColumns: TableColumnsSchema.optional(),
  }),
]);

export type ScreenConfig = z.infer<typeof ScreenSchema>;

import { z } from 'zod';

/** Control ids are scoped to a window, e.g. `wnd[0]/usr/ctxtFIELD`. */
export const WINDOW_SCOPED_ID = /^wnd\[\d+\]/;

export const ControlElementSchema = z.object({
  id: z.string().regex(WINDOW_SCOPED_ID, 'Element id must start with a window reference such as wnd[0]'),
  type: z.enum(['text', 'combobox', 'button', 'checkbox', 'radio', 'tab', 'table']),
  name: z.string().min(1),
  description: z.string().optional(),
});

/** Callable elements name a function registered in the callable registry. */
export const CallableElementSchema = z.object({
  type: z.literal('callable'),
  id: z.string().regex(WINDOW_SCOPED_ID).optional(),
  name: z.string().min(1),
  description: z.string().optional(),
  fn: z.string().min(1),
});

export const ElementSchema = z.union([CallableElementSchema, ControlElementSchema]);

export type ElementConfig = z.infer<typeof ElementSchema>;

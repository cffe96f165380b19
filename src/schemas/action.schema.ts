import { z } from 'zod';

const description = z.string().optional();

export const ActionSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('click'), targetId: z.string().optional(), description }),
  z.object({ type: z.literal('press_enter'), description }),
  z.object({ type: z.literal('dismiss_popups'), description }),
  z.object({ type: z.literal('back'), description }),
  z.object({ type: z.literal('send_vkey'), vkey: z.number().int().nonnegative().optional(), description }),
]);

export const ActionListSchema = z.union([ActionSchema, z.array(ActionSchema)]);

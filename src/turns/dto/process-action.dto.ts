import { z } from 'zod';
import { CHECK_CATEGORY } from '../../db/types/index.js';

export const ProcessActionInputSchema = z.object({
  sessionId: z.string().uuid(),
  action: z.string().trim().min(1).max(400),
  category: z.enum(CHECK_CATEGORY).optional(),
});

export type ProcessActionInput = z.infer<typeof ProcessActionInputSchema>;

import { z } from 'zod';

export const cookieInputSchema = z.object({
  cookie: z.string().trim().min(1, 'cookie string is required'),
});

export const cookieUpdateSchema = cookieInputSchema.extend({
  force: z.boolean().optional(),
  backup: z.boolean().optional(),
});

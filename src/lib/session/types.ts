import { z } from 'zod';

export const updateSessionSchema = z.object({
  id: z.string().uuid(),
  source: z.string().min(1),
  createdAt: z.string().datetime({ offset: true }),
  taggedText: z.string(),
  editedText: z.string().nullable(),
});

export type UpdateSession = z.infer<typeof updateSessionSchema>;

import { z } from 'zod';

export const listProfilesSchema = z.object({
  format: z.enum(['json', 'table']).default('table'),
});

export type ListProfilesArgs = z.infer<typeof listProfilesSchema>;

import { z } from 'zod';

const workspaceIdentity = {
  workspaceId: z.string().min(1).optional(),
  workspaceGuid: z.string().min(1).optional(),
  timespan: z.string().min(1).optional(),
  queryTimeoutSeconds: z.number().int().positive().optional(),
};

export const exportWorkspaceSchema = z.object({
  ...workspaceIdentity,
  out: z.string().min(1).optional(),
  tables: z.string().optional(),
  profiles: z.string().optional(),
  allTables: z.boolean().default(false),
  stitchLogs: z.boolean().default(true),
  stitchIncludeEvents: z.boolean().default(true),
  format: z.enum(['json', 'table']).default('table'),
});

export const askWorkspaceSchema = z.object({
  ...workspaceIdentity,
  question: z.string().trim().min(1, 'question is required'),
  format: z.enum(['json', 'table']).default('table'),
});

export type ExportWorkspaceArgs = z.infer<typeof exportWorkspaceSchema>;
export type AskWorkspaceArgs = z.infer<typeof askWorkspaceSchema>;

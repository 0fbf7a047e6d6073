import type { GatherConfig } from '@loggather/utils';

/**
 * Workspace identity from flags, or from the environment when no flag names one
 */
export function resolveWorkspaceFlags(
  args: { workspaceId?: string; workspaceGuid?: string },
  config: GatherConfig
): { workspaceId?: string; workspaceGuid?: string } {
  if (args.workspaceId || args.workspaceGuid) {
    return { workspaceId: args.workspaceId, workspaceGuid: args.workspaceGuid };
  }
  return { workspaceId: config.workspaceId, workspaceGuid: config.workspaceGuid };
}

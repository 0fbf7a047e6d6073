import {
  isWorkspaceResourceId,
  parseWorkspaceResourceId,
  type WorkspaceCatalogPort,
  type WorkspaceResourceRef,
} from '@loggather/core';
import { ConfigurationError } from '@loggather/utils';

export interface WorkspaceIdentity {
  /** ARM resource ID, or a bare GUID */
  workspaceId?: string;
  workspaceGuid?: string;
}

export interface ResolvedWorkspace {
  /** Customer ID the query endpoint expects */
  guid: string;
  /** Present when the workspace was addressed by resource ID */
  ref?: WorkspaceResourceRef;
}

/**
 * Determine the workspace GUID, asking the management plane only when the
 * workspace was addressed by resource ID.
 */
export async function resolveWorkspace(
  identity: WorkspaceIdentity,
  catalog?: WorkspaceCatalogPort
): Promise<ResolvedWorkspace> {
  const { workspaceId, workspaceGuid } = identity;

  // A direct GUID bypasses the management plane entirely
  if (workspaceGuid) {
    return { guid: workspaceGuid };
  }
  if (!workspaceId) {
    throw new ConfigurationError('A workspace ID or workspace GUID is required', 'workspaceId');
  }
  if (!isWorkspaceResourceId(workspaceId)) {
    return { guid: workspaceId };
  }

  const ref = parseWorkspaceResourceId(workspaceId);
  if (!catalog) {
    throw new ConfigurationError(
      'Resolving a workspace resource ID requires management-plane access',
      'workspaceId'
    );
  }

  let guid: string | undefined;
  try {
    guid = await catalog.resolveWorkspaceGuid(ref);
  } catch (error) {
    throw new ConfigurationError(
      `could not determine workspace GUID from workspace: ${error instanceof Error ? error.message : String(error)}`,
      'workspaceId',
      { ...ref }
    );
  }
  if (!guid) {
    throw new ConfigurationError(
      'could not determine workspace GUID from workspace; check permissions or workspace-id',
      'workspaceId',
      { ...ref }
    );
  }
  return { guid, ref };
}

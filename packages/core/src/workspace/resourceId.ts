import { ConfigurationError } from '@loggather/utils';
import type { WorkspaceResourceRef } from '../domain/export.js';

/**
 * Parse a Log Analytics workspace ARM resource ID:
 * `/subscriptions/<sub>/resourceGroups/<rg>/providers/Microsoft.OperationalInsights/workspaces/<name>`
 *
 * Segment names are matched case-insensitively.
 */
export function parseWorkspaceResourceId(resourceId: string): WorkspaceResourceRef {
  const parts = resourceId.trim().split('/');
  if (parts.length < 9) {
    throw new ConfigurationError(`Invalid workspace resource ID: ${resourceId}`, 'workspaceId');
  }

  let subscriptionId = '';
  let resourceGroup = '';
  let workspaceName = '';
  for (let i = 0; i < parts.length - 1; i++) {
    const segment = parts[i]?.toLowerCase();
    const value = parts[i + 1] ?? '';
    if (segment === 'subscriptions') {
      subscriptionId = value;
    } else if (segment === 'resourcegroups') {
      resourceGroup = value;
    } else if (segment === 'workspaces') {
      workspaceName = value;
    }
  }

  if (!subscriptionId || !resourceGroup || !workspaceName) {
    throw new ConfigurationError(
      `Workspace resource ID is missing subscription, resource group or workspace name: ${resourceId}`,
      'workspaceId'
    );
  }

  return { subscriptionId, resourceGroup, workspaceName };
}

/**
 * Workspace GUIDs (customer IDs) are plain UUIDs, resource IDs are paths
 */
export function isWorkspaceResourceId(value: string): boolean {
  return value.trim().startsWith('/');
}

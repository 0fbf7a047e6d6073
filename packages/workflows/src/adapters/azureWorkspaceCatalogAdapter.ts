/**
 * WorkspaceCatalogPort Azure Resource Manager Adapter
 */

import { OperationalInsightsManagementClient } from '@azure/arm-operationalinsights';
import type { TokenCredential } from '@azure/identity';
import type { WorkspaceCatalogPort, WorkspaceResourceRef } from '@loggather/core';

/**
 * The slice of the management client the catalog reads
 */
export interface WorkspaceManagementClient {
  workspaces: {
    get(resourceGroupName: string, workspaceName: string): Promise<{ customerId?: string }>;
  };
  tables: {
    listByWorkspace(resourceGroupName: string, workspaceName: string): AsyncIterable<{ name?: string }>;
    get(resourceGroupName: string, workspaceName: string, tableName: string): Promise<unknown>;
  };
}

export type ManagementClientFactory = (subscriptionId: string) => WorkspaceManagementClient;

/**
 * Creates a WorkspaceCatalogPort backed by the Operational Insights management
 * API. One client is kept per subscription.
 */
export function createAzureWorkspaceCatalogAdapter(
  credential: TokenCredential,
  createClient: ManagementClientFactory = (subscriptionId) =>
    new OperationalInsightsManagementClient(credential, subscriptionId)
): WorkspaceCatalogPort {
  const clients = new Map<string, WorkspaceManagementClient>();
  const clientFor = (ref: WorkspaceResourceRef): WorkspaceManagementClient => {
    let client = clients.get(ref.subscriptionId);
    if (!client) {
      client = createClient(ref.subscriptionId);
      clients.set(ref.subscriptionId, client);
    }
    return client;
  };

  return {
    async resolveWorkspaceGuid(ref: WorkspaceResourceRef): Promise<string | undefined> {
      const workspace = await clientFor(ref).workspaces.get(ref.resourceGroup, ref.workspaceName);
      return workspace.customerId || undefined;
    },

    async listTables(ref: WorkspaceResourceRef): Promise<string[]> {
      const names: string[] = [];
      for await (const table of clientFor(ref).tables.listByWorkspace(
        ref.resourceGroup,
        ref.workspaceName
      )) {
        if (table.name) {
          names.push(table.name);
        }
      }
      return names;
    },

    async getTableSchema(ref: WorkspaceResourceRef, table: string): Promise<unknown> {
      return clientFor(ref).tables.get(ref.resourceGroup, ref.workspaceName, table);
    },
  };
}

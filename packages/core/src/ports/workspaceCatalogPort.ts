/**
 * WorkspaceCatalog Port
 *
 * Management-plane view of a workspace: identity, table list and schemas.
 */

import type { WorkspaceResourceRef } from '../domain/export.js';

export interface WorkspaceCatalogPort {
  /**
   * Workspace GUID (customer ID) used by the query endpoint
   */
  resolveWorkspaceGuid(ref: WorkspaceResourceRef): Promise<string | undefined>;

  listTables(ref: WorkspaceResourceRef): Promise<string[]>;

  /**
   * Table definition as returned by the management plane
   */
  getTableSchema(ref: WorkspaceResourceRef, table: string): Promise<unknown>;
}

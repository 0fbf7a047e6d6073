export { createAzureCredential } from './azureCredential.js';
export { createAzureLogsQueryAdapter, toResultTable } from './azureLogsQueryAdapter.js';
export type { LogsQueryClientLike } from './azureLogsQueryAdapter.js';
export { createAzureWorkspaceCatalogAdapter } from './azureWorkspaceCatalogAdapter.js';
export type {
  ManagementClientFactory,
  WorkspaceManagementClient,
} from './azureWorkspaceCatalogAdapter.js';
export { createCommandQueryGenerator } from './commandQueryGeneratorAdapter.js';
export type { CommandQueryGeneratorOptions } from './commandQueryGeneratorAdapter.js';

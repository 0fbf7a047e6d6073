import { DefaultAzureCredential, type TokenCredential } from '@azure/identity';

/**
 * Credential chain shared by the query and management clients:
 * environment, workload identity, managed identity, then developer logins.
 */
export function createAzureCredential(): TokenCredential {
  return new DefaultAzureCredential();
}

/**
 * @loggather/workflows - export and assisted query orchestration
 */

export * from './export/index.js';
export * from './query/index.js';
export * from './adapters/index.js';
export { resolveWorkspace } from './workspace/resolveWorkspace.js';
export type { ResolvedWorkspace, WorkspaceIdentity } from './workspace/resolveWorkspace.js';

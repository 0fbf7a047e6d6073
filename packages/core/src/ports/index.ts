/**
 * Ports Barrel Export
 *
 * Workflows depend on these interfaces; adapters implement them.
 */

export type { ClockPort } from './clockPort.js';
export { createSystemClock } from './clockPort.js';
export type { LogQueryPort, LogQueryRequest, LogQueryResult } from './logQueryPort.js';
export type { WorkspaceCatalogPort } from './workspaceCatalogPort.js';
export type { ArtifactSinkPort, ArtifactSinkFactory } from './artifactSinkPort.js';
export type { QueryGeneratorPort, QueryAnalysisRequest } from './queryGeneratorPort.js';

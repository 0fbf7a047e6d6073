export * from './cells.js';
export type {
  ExportTarget,
  Window,
  Timespan,
  StitchKey,
  ExportSummary,
  WorkspaceResourceRef,
} from './export.js';

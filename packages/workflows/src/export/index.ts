export { exportTable, exportWindow } from './exportTable.js';
export type {
  ExportTableSpec,
  ExportTableContext,
  ExportTableResult,
  TableExportState,
} from './exportTable.js';
export {
  exportWorkspace,
  assembleArtifacts,
  ExportWorkspaceSpecSchema,
} from './exportWorkspace.js';
export type {
  ExportWorkspaceSpec,
  ExportWorkspaceContext,
  ExportWorkspaceResult,
} from './exportWorkspace.js';
export {
  CONTAINER_LOG_DESCRIPTOR,
  CLUSTER_EVENT_DESCRIPTOR,
  resolveExtraction,
  bindDescriptor,
} from './extraction.js';
export type { StitchOptions, TargetExtraction, ExtractionDescriptor } from './extraction.js';
export { formatContainerLogLine, formatEventLine } from './lineFormat.js';
export { RowClassifier, WindowClassifier } from './rowClassifier.js';
export type { WindowClassification } from './rowClassifier.js';
export { StitchAccumulator } from './stitchAccumulator.js';
export type { ContainerStream, EventStream } from './stitchAccumulator.js';
export { throwIfCancelled } from './cancellation.js';

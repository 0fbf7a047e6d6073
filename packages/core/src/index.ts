/**
 * @loggather/core - domain types, ports and pure planning logic
 */

export * from './domain/index.js';
export * from './ports/index.js';
export * from './paths/index.js';
export * from './profiles/index.js';

export {
  DEFAULT_TIMESPAN_ISO,
  parseSimpleDuration,
  toIsoTimespan,
  parseIsoTimespan,
  parseTimespan,
} from './time/duration.js';
export {
  SHORT_CHUNK,
  LONG_CHUNK,
  LONG_CHUNK_THRESHOLD,
  DEFAULT_LOOKBACK,
  effectiveLookback,
  chunkSizeFor,
  planWindows,
  formatWindowBoundary,
} from './time/windows.js';
export {
  parseTimestamp,
  compareParsed,
  formatTimestamp,
  canonicalTimestamp,
  compareTimestampText,
} from './time/timestamps.js';
export type { ParsedTimestamp } from './time/timestamps.js';
export { parseWorkspaceResourceId, isWorkspaceResourceId } from './workspace/resourceId.js';

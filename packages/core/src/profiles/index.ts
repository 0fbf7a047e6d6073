export {
  PROFILE_REGISTRY,
  DEFAULT_PROFILE,
  dedupe,
  getProfileTables,
  getDefaultProfiles,
  listProfiles,
} from './registry.js';
export { resolveTargets, splitCsv } from './resolveTargets.js';
export type { ResolveTargetsInput, ResolvedTargets, TargetSource } from './resolveTargets.js';

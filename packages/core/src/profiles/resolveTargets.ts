import type { ExportTarget } from '../domain/export.js';
import { dedupe, getDefaultProfiles, getProfileTables } from './registry.js';

export interface ResolveTargetsInput {
  /** Comma-separated explicit tables; overrides everything else */
  tables?: string;
  /** Comma-separated profile names */
  profiles?: string;
  /** Export every table the catalog lists */
  allTables?: boolean;
  catalogTables?: readonly string[];
}

export type TargetSource = 'explicit' | 'catalog' | 'profiles' | 'default';

export interface ResolvedTargets {
  targets: ExportTarget[];
  source: TargetSource;
  /** Non-fatal problems, e.g. unknown profile names */
  warnings: string[];
}

export function splitCsv(value: string | undefined): string[] {
  if (!value) {
    return [];
  }
  return value
    .split(',')
    .map((part) => part.trim())
    .filter((part) => part !== '');
}

/**
 * Resolve the ordered, duplicate-free list of tables to export.
 *
 * Precedence: explicit tables, then the catalog when exporting everything,
 * then the union of the named profiles, then the default profile.
 */
export function resolveTargets(input: ResolveTargetsInput): ResolvedTargets {
  const explicit = splitCsv(input.tables);
  if (explicit.length > 0) {
    return { targets: dedupe(explicit), source: 'explicit', warnings: [] };
  }

  if (input.allTables) {
    return { targets: dedupe(input.catalogTables ?? []), source: 'catalog', warnings: [] };
  }

  const warnings: string[] = [];
  const fromProfiles: string[] = [];
  for (const profile of splitCsv(input.profiles)) {
    const tables = getProfileTables(profile);
    if (tables) {
      fromProfiles.push(...tables);
    } else {
      warnings.push(`unknown profile '${profile}'`);
    }
  }

  if (fromProfiles.length > 0) {
    return { targets: dedupe(fromProfiles), source: 'profiles', warnings };
  }

  return { targets: [...getDefaultProfiles()], source: 'default', warnings };
}

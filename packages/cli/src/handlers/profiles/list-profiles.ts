import { DEFAULT_PROFILE, listProfiles } from '@loggather/core';
import type { CommandContext } from '../../core/command-context.js';
import type { ListProfilesArgs } from '../../command-defs/profiles.js';

export interface ProfileRow {
  name: string;
  default: boolean;
  tables: string;
}

export async function listProfilesHandler(
  _args: ListProfilesArgs,
  _ctx: CommandContext
): Promise<ProfileRow[]> {
  return listProfiles().map((profile) => ({
    name: profile.name,
    default: profile.name === DEFAULT_PROFILE,
    tables: profile.tables.join(', '),
  }));
}

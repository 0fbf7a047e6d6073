/**
 * Configuration loading from environment variables
 *
 * `.env` is loaded by the CLI entry point through dotenv; this module only
 * validates what ends up in the environment. CLI flags take precedence over
 * every value here.
 */

import { z } from 'zod';
import { ConfigurationError } from '../errors.js';

const optionalString = z
  .string()
  .trim()
  .transform((value) => (value === '' ? undefined : value))
  .optional();

const positiveInt = (fallback: number) =>
  z.coerce.number().int().positive().default(fallback);

export const gatherConfigSchema = z.object({
  LOGGATHER_WORKSPACE_ID: optionalString,
  LOGGATHER_WORKSPACE_GUID: optionalString,
  LOGGATHER_TIMESPAN: z.string().trim().min(1).default('PT2H'),
  LOGGATHER_QUERY_TIMEOUT_SECONDS: positiveInt(180),
  LOGGATHER_VALIDATION_TIMEOUT_SECONDS: positiveInt(30),
  LOGGATHER_GENERATOR_COMMAND: z.string().trim().min(1).default('claude'),
  LOGGATHER_GENERATOR_TIMEOUT_MS: positiveInt(300_000),
});

export interface GatherConfig {
  workspaceId?: string;
  workspaceGuid?: string;
  timespan: string;
  queryTimeoutSeconds: number;
  validationTimeoutSeconds: number;
  generatorCommand: string;
  generatorTimeoutMs: number;
}

/**
 * Load export configuration from environment variables
 */
export function getGatherConfig(env: NodeJS.ProcessEnv = process.env): GatherConfig {
  const parsed = gatherConfigSchema.safeParse(env);

  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const key = issue ? issue.path.join('.') : undefined;
    throw new ConfigurationError(
      `Invalid environment configuration${key ? ` for ${key}` : ''}: ${issue?.message ?? 'unknown error'}`,
      key,
      { issues: parsed.error.issues }
    );
  }

  const values = parsed.data;
  return {
    workspaceId: values.LOGGATHER_WORKSPACE_ID,
    workspaceGuid: values.LOGGATHER_WORKSPACE_GUID,
    timespan: values.LOGGATHER_TIMESPAN,
    queryTimeoutSeconds: values.LOGGATHER_QUERY_TIMEOUT_SECONDS,
    validationTimeoutSeconds: values.LOGGATHER_VALIDATION_TIMEOUT_SECONDS,
    generatorCommand: values.LOGGATHER_GENERATOR_COMMAND,
    generatorTimeoutMs: values.LOGGATHER_GENERATOR_TIMEOUT_MS,
  };
}

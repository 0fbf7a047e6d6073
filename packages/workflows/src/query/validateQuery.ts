/**
 * Server-side query validation and generator-driven repair
 */

import { DateTime } from 'luxon';
import type { ClockPort, LogQueryPort, QueryGeneratorPort } from '@loggather/core';
import { CancellationError, QueryError, logger } from '@loggather/utils';
import { throwIfCancelled } from '../export/cancellation.js';

export const VALIDATION_LOOKBACK_MINUTES = 1;
export const MAX_VALIDATION_ATTEMPTS = 3;

const QUERY_LABEL = 'assisted-query';

export interface QueryValidationContext {
  logs: LogQueryPort;
  workspaceGuid: string;
  clock: ClockPort;
  /** Server wait budget for the probe query */
  timeoutSeconds: number;
  signal?: AbortSignal;
}

export interface QueryRepairContext extends QueryValidationContext {
  generator: QueryGeneratorPort;
}

/**
 * Append `| limit 0` so the server checks the query without returning rows
 */
export function toProbeQuery(query: string): string {
  const text = query.trim();
  return text.toLowerCase().endsWith('| limit 0') ? text : `${text} | limit 0`;
}

/**
 * Run the probe query over the last minute. Partial failures are accepted.
 */
export async function validateQuery(query: string, ctx: QueryValidationContext): Promise<void> {
  const end = DateTime.fromMillis(ctx.clock.nowMs(), { zone: 'utc' });
  const start = end.minus({ minutes: VALIDATION_LOOKBACK_MINUTES });

  try {
    const result = await ctx.logs.query({
      workspaceId: ctx.workspaceGuid,
      query: toProbeQuery(query),
      start,
      end,
      serverTimeoutSeconds: ctx.timeoutSeconds,
      signal: ctx.signal,
    });
    if (result.status === 'partial') {
      logger.warn('[validateQuery] Validation returned a partial error', { error: result.error });
    }
  } catch (error) {
    throwIfCancelled(ctx.signal);
    const message = error instanceof Error ? error.message : String(error);

    if (message.includes('PartialError')) {
      logger.warn('[validateQuery] Validation returned a partial error', { error: message });
      return;
    }
    if (message.includes('SyntaxError')) {
      throw new QueryError(`KQL syntax error: ${message}`, QUERY_LABEL, { kind: 'syntax' });
    }
    if (message.includes('SemanticError')) {
      throw new QueryError(
        `KQL semantic error (invalid table/column names): ${message}`,
        QUERY_LABEL,
        { kind: 'semantic' }
      );
    }
    throw new QueryError(`KQL validation error: ${message}`, QUERY_LABEL);
  }
}

/**
 * Validate, and between failed attempts ask the generator for a fixed query.
 * Returns the first query that passes.
 */
export async function validateAndFixQuery(
  intent: string,
  query: string,
  knownTargets: readonly string[],
  ctx: QueryRepairContext
): Promise<string> {
  let current = query;

  for (let attempt = 1; attempt <= MAX_VALIDATION_ATTEMPTS; attempt++) {
    if (attempt > 1) {
      logger.info(`[validateAndFixQuery] Retrying validation (attempt ${attempt}/${MAX_VALIDATION_ATTEMPTS})`);
    }

    let failure: QueryError;
    try {
      await validateQuery(current, ctx);
      return current;
    } catch (error) {
      if (!(error instanceof QueryError)) {
        throw error;
      }
      failure = error;
    }

    if (attempt === MAX_VALIDATION_ATTEMPTS) {
      throw new QueryError(
        `failed to validate query after ${MAX_VALIDATION_ATTEMPTS} attempts: ${failure.message}`,
        QUERY_LABEL,
        { query: current }
      );
    }

    logger.warn('[validateAndFixQuery] Validation failed, asking generator for a fix', {
      attempt,
      error: failure.message,
    });

    try {
      current = await ctx.generator.fix(intent, current, failure.message, knownTargets, ctx.signal);
      logger.info('[validateAndFixQuery] Received fixed query', { query: current });
    } catch (error) {
      if (error instanceof CancellationError) {
        throw error;
      }
      throwIfCancelled(ctx.signal);
      logger.warn('[validateAndFixQuery] Failed to fix query', {
        attempt,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  return current;
}

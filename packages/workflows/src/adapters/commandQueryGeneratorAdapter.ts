/**
 * QueryGeneratorPort Subprocess Adapter
 *
 * Sends each prompt to an external command (its last argument) and reads the
 * answer from stdout.
 */

import { execa, ExecaError } from 'execa';
import type { QueryAnalysisRequest, QueryGeneratorPort } from '@loggather/core';
import { CancellationError, QueryGenerationError, TimeoutError, logger } from '@loggather/utils';
import { buildAnalysisPrompt, buildFixPrompt, buildGeneratePrompt } from '../query/prompts.js';
import { extractQueryFromResponse } from '../query/responseParsing.js';

export interface CommandQueryGeneratorOptions {
  /** Executable to run, e.g. `claude` */
  command: string;
  /** Arguments placed before the prompt */
  args?: string[];
  timeoutMs: number;
}

export function createCommandQueryGenerator(options: CommandQueryGeneratorOptions): QueryGeneratorPort {
  const run = async (stage: string, prompt: string, signal?: AbortSignal): Promise<string> => {
    logger.debug('[commandQueryGenerator] Running generator command', {
      command: options.command,
      stage,
    });
    try {
      const result = await execa(options.command, [...(options.args ?? []), prompt], {
        timeout: options.timeoutMs,
        cancelSignal: signal,
      });
      return result.stdout.trim();
    } catch (error) {
      if (error instanceof ExecaError) {
        if (error.isCanceled) {
          throw new CancellationError('Query generator cancelled', { stage });
        }
        if (error.timedOut) {
          throw new TimeoutError(
            `${options.command} timed out after ${options.timeoutMs}ms`,
            options.timeoutMs,
            { stage }
          );
        }
        throw new QueryGenerationError(
          `failed to execute ${options.command} for ${stage}: ${error.shortMessage}`,
          { stage, exitCode: error.exitCode }
        );
      }
      throw new QueryGenerationError(
        `failed to execute ${options.command} for ${stage}: ${error instanceof Error ? error.message : String(error)}`,
        { stage }
      );
    }
  };

  return {
    async generate(intent, knownTargets, signal) {
      const response = await run('query generation', buildGeneratePrompt(intent, knownTargets), signal);
      return extractQueryFromResponse(response);
    },

    async fix(intent, failedQuery, errorText, knownTargets, signal) {
      const response = await run(
        'query fix',
        buildFixPrompt(intent, failedQuery, errorText, knownTargets),
        signal
      );
      return extractQueryFromResponse(response);
    },

    async analyze(request: QueryAnalysisRequest, signal) {
      return run('result analysis', buildAnalysisPrompt(request.intent, request.query, request.resultsDir), signal);
    },
  };
}

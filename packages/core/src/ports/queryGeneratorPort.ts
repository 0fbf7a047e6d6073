/**
 * QueryGenerator Port
 *
 * Turns a natural-language question into a query over the workspace tables.
 */

export interface QueryAnalysisRequest {
  intent: string;
  query: string;
  /** Directory holding the written result files */
  resultsDir: string;
}

export interface QueryGeneratorPort {
  generate(intent: string, knownTargets: readonly string[], signal?: AbortSignal): Promise<string>;

  fix(
    intent: string,
    failedQuery: string,
    errorText: string,
    knownTargets: readonly string[],
    signal?: AbortSignal
  ): Promise<string>;

  /**
   * Optional summary of written results; callers fall back to a raw rendering
   */
  analyze?(request: QueryAnalysisRequest, signal?: AbortSignal): Promise<string>;
}

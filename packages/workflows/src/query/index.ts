export { ASSISTED_QUERY_TABLES, QUERY_LEADING_KEYWORDS } from './knownTables.js';
export { suggestRelevantTables, loadTableHints } from './suggestTables.js';
export type { TableHints } from './suggestTables.js';
export { basicQueryValidation } from './basicValidation.js';
export {
  toProbeQuery,
  validateQuery,
  validateAndFixQuery,
  MAX_VALIDATION_ATTEMPTS,
  VALIDATION_LOOKBACK_MINUTES,
} from './validateQuery.js';
export type { QueryValidationContext, QueryRepairContext } from './validateQuery.js';
export { extractQueryFromResponse, GeneratedQuerySchema } from './responseParsing.js';
export type { GeneratedQuery } from './responseParsing.js';
export { buildGeneratePrompt, buildFixPrompt, buildAnalysisPrompt } from './prompts.js';
export { renderResultTables, MAX_RENDERED_ROWS, MAX_CELL_WIDTH } from './renderResults.js';
export { runAssistedQuery, AssistedQuerySpecSchema, RESULTS_DIR } from './runAssistedQuery.js';
export type { AssistedQuerySpec, AssistedQueryContext, AssistedQueryResult } from './runAssistedQuery.js';

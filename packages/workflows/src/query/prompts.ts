/**
 * Prompt text for the subprocess query generator
 */

import { suggestRelevantTables } from './suggestTables.js';

const RESPONSE_CONTRACT = `Respond with a single JSON object and nothing else:

{
  "kql": "<the executable KQL query>",
  "tables_used": ["<table>", "..."]
}`;

const FIX_RESPONSE_CONTRACT = `Respond with a single JSON object and nothing else:

{
  "kql": "<the fixed executable KQL query>",
  "tables_used": ["<table>", "..."],
  "fix_explanation": "<what was changed>"
}`;

export function buildGeneratePrompt(intent: string, knownTargets: readonly string[]): string {
  const relevant = suggestRelevantTables(intent, knownTargets);
  const guidance =
    relevant.length > 0
      ? `\n\nRECOMMENDED TABLES for this question: ${relevant.join(', ')}`
      : '';

  return `You write KQL (Kusto Query Language) queries against an Azure Log Analytics workspace that collects Kubernetes (AKS) cluster data.

Question: "${intent}"

Available tables: ${knownTargets.join(', ')}${guidance}

The query must:
1. Use tables from the available list
2. Filter on the TimeGenerated column where time matters
3. Use only columns that exist in the chosen tables
4. Limit results with 'take' or 'top' where appropriate

${RESPONSE_CONTRACT}

Example:
{
  "kql": "KubePodInventory | where Namespace == 'default' | project TimeGenerated, Name, PodStatus",
  "tables_used": ["KubePodInventory"]
}`;
}

export function buildFixPrompt(
  intent: string,
  failedQuery: string,
  errorText: string,
  knownTargets: readonly string[]
): string {
  return `A KQL query failed validation.

ERROR: ${errorText}

Question: "${intent}"
Failed query:
${failedQuery}

Available tables: ${knownTargets.join(', ')}

Fix syntax errors and invalid table or column names while still answering the question.

${FIX_RESPONSE_CONTRACT}`;
}

export function buildAnalysisPrompt(intent: string, query: string, resultsDir: string): string {
  return `You are a Kubernetes troubleshooting expert. Analyze the query results in directory ${resultsDir} to answer this question: "${intent}"

The query that was executed:
${query}

Read the JSON files in the directory (ai-query-results/table_*.json) and give a short, structured summary that answers the question. Include relevant timestamps, pod names, error messages and restart counts, and suggest next steps where they apply.`;
}

/**
 * Output Formatter - JSON and table formats
 */

import type { OutputFormat } from '../types/index.js';

export function formatJSON(data: unknown): string {
  return JSON.stringify(data, null, 2);
}

function fieldsOf(row: unknown): Map<string, unknown> {
  if (typeof row !== 'object' || row === null) {
    return new Map();
  }
  return new Map<string, unknown>(Object.entries(row));
}

/**
 * Convert a value to a displayable string, handling nested objects
 */
function valueToString(value: unknown): string {
  if (value === null || value === undefined) {
    return '';
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  if (typeof value === 'object') {
    return JSON.stringify(value);
  }
  return String(value);
}

/**
 * Format output as a simple table
 */
export function formatTable(data: readonly unknown[], columns?: string[]): string {
  if (data.length === 0) {
    return 'No data to display';
  }

  const detectedColumns = columns ?? Array.from(fieldsOf(data[0]).keys());
  if (detectedColumns.length === 0) {
    return formatJSON(data);
  }

  const rows = data.map((row) => {
    const fields = fieldsOf(row);
    return detectedColumns.map((col) => valueToString(fields.get(col)));
  });
  const widths = detectedColumns.map((col, i) =>
    Math.max(col.length, ...rows.map((cells) => cells[i]?.length ?? 0))
  );

  const lines: string[] = [];
  lines.push(detectedColumns.map((col, i) => col.padEnd(widths[i] ?? 0)).join(' | '));
  lines.push(widths.map((width) => '-'.repeat(width)).join('-|-'));
  for (const cells of rows) {
    lines.push(cells.map((cell, i) => cell.padEnd(widths[i] ?? 0)).join(' | '));
  }

  return lines.join('\n');
}

/**
 * Compact summary for export results in table format
 */
function formatExportReport(data: unknown, format: OutputFormat): string | null {
  if (format !== 'table' || typeof data !== 'object' || data === null) {
    return null;
  }
  if (!('location' in data) || !('tables' in data) || !Array.isArray(data.tables)) {
    return null;
  }

  const fields = fieldsOf(data);
  const lines: string[] = [];
  lines.push(`Artifacts: ${valueToString(fields.get('location'))}`);
  lines.push(`Workspace: ${valueToString(fields.get('workspaceGuid'))}`);
  lines.push(`Timespan: ${valueToString(fields.get('timespan'))}`);
  lines.push(
    `Targets: ${valueToString(fields.get('targetCount'))} (${valueToString(fields.get('targetSource'))})`
  );
  lines.push('');
  lines.push(formatTable(data.tables, ['table', 'rows', 'duration']));
  lines.push('');
  lines.push(
    `Stitched streams: ${valueToString(fields.get('containerStreams'))} container, ${valueToString(fields.get('eventStreams'))} event`
  );

  const failed = fields.get('failedTargets');
  if (Array.isArray(failed) && failed.length > 0) {
    lines.push('');
    lines.push('Failed targets:');
    for (const entry of failed) {
      const entryFields = fieldsOf(entry);
      lines.push(
        `  ${valueToString(entryFields.get('target'))}: ${valueToString(entryFields.get('error'))}`
      );
    }
  }

  const warnings = fields.get('warnings');
  if (Array.isArray(warnings) && warnings.length > 0) {
    lines.push('');
    lines.push('Warnings:');
    for (const warning of warnings) {
      lines.push(`  ${valueToString(warning)}`);
    }
  }

  return lines.join('\n');
}

/**
 * Assisted query answer in table format: the query, where results went, then the report
 */
function formatAssistedReport(data: unknown, format: OutputFormat): string | null {
  if (format !== 'table' || typeof data !== 'object' || data === null) {
    return null;
  }
  if (!('report' in data) || typeof data.report !== 'string' || !('query' in data)) {
    return null;
  }

  const fields = fieldsOf(data);
  return [
    'Generated query:',
    valueToString(fields.get('query')),
    '',
    `Results saved to: ${valueToString(fields.get('resultsDir'))}`,
    '',
    data.report,
  ].join('\n');
}

/**
 * Format output based on format type
 */
export function formatOutput(data: unknown, format: OutputFormat = 'table'): string {
  const exportFormatted = formatExportReport(data, format);
  if (exportFormatted !== null) {
    return exportFormatted;
  }

  const assistedFormatted = formatAssistedReport(data, format);
  if (assistedFormatted !== null) {
    return assistedFormatted;
  }

  if (typeof data === 'string') {
    return data;
  }

  if (Array.isArray(data)) {
    return format === 'json' ? formatJSON(data) : formatTable(data);
  }

  if (typeof data === 'object' && data !== null) {
    return format === 'json' ? formatJSON(data) : formatTable([data]);
  }

  return String(data);
}

import { cellText, type Cell, type ResultTable } from '@loggather/core';

export const MAX_RENDERED_ROWS = 50;
export const MAX_CELL_WIDTH = 100;

function renderCell(cell: Cell): string {
  if (cell.kind === 'null') {
    return '<null>';
  }
  const text = cellText(cell);
  return text.length > MAX_CELL_WIDTH ? `${text.slice(0, MAX_CELL_WIDTH - 3)}...` : text;
}

/**
 * Plain-text rendering of query results, used when no analysis is available
 */
export function renderResultTables(tables: readonly ResultTable[]): string {
  if (tables.length === 0) {
    return 'No results found.';
  }

  const out: string[] = [];
  tables.forEach((table, i) => {
    if (i > 0) {
      out.push('', '='.repeat(80));
    }
    out.push(`Results (Table ${i + 1}):`, '-'.repeat(40));

    if (table.columns.length === 0) {
      out.push('No data in this table.');
      return;
    }

    const header = table.columns.join(' | ');
    out.push(header, '-'.repeat(header.length));

    const total = table.rows.length;
    if (total > MAX_RENDERED_ROWS) {
      out.push(`Showing first ${MAX_RENDERED_ROWS} of ${total} rows:`);
    }
    for (const row of table.rows.slice(0, MAX_RENDERED_ROWS)) {
      out.push(row.map(renderCell).join(' | '));
    }
    if (total > MAX_RENDERED_ROWS) {
      out.push('', `... and ${total - MAX_RENDERED_ROWS} more rows`);
    }
  });

  return out.join('\n');
}

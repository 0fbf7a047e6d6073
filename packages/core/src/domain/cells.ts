/**
 * Columnar result model
 *
 * Result sources return loosely typed cells; everything downstream works on
 * the tagged variants below so serialization does not depend on what the
 * source inferred for a column.
 */

export type Cell =
  | { readonly kind: 'null' }
  | { readonly kind: 'string'; readonly value: string }
  | { readonly kind: 'number'; readonly value: number }
  | { readonly kind: 'boolean'; readonly value: boolean }
  | { readonly kind: 'nested'; readonly value: unknown };

export type Row = readonly Cell[];

/**
 * One table of a query result
 */
export interface ResultTable {
  name: string;
  columns: readonly string[];
  rows: readonly Row[];
}

/**
 * Column name to position, built once per window
 */
export type ColumnIndex = ReadonlyMap<string, number>;

export const NULL_CELL: Cell = { kind: 'null' };

export function stringCell(value: string): Cell {
  return { kind: 'string', value };
}

/**
 * Convert a raw value returned by a result source into a cell.
 * Dates become ISO-8601 strings; objects and arrays are kept as nested values.
 */
export function toCell(value: unknown): Cell {
  if (value === null || value === undefined) {
    return NULL_CELL;
  }
  if (typeof value === 'string') {
    return { kind: 'string', value };
  }
  if (typeof value === 'number') {
    // NaN and Infinity have no JSON form
    return Number.isFinite(value) ? { kind: 'number', value } : { kind: 'string', value: String(value) };
  }
  if (typeof value === 'boolean') {
    return { kind: 'boolean', value };
  }
  if (typeof value === 'bigint') {
    return { kind: 'string', value: value.toString() };
  }
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? NULL_CELL : { kind: 'string', value: value.toISOString() };
  }
  if (typeof value === 'object') {
    return { kind: 'nested', value };
  }
  return { kind: 'string', value: String(value) };
}

/**
 * JSON value of a cell as written to raw parts
 */
export function cellToJson(cell: Cell): unknown {
  switch (cell.kind) {
    case 'null':
      return null;
    case 'string':
    case 'number':
    case 'boolean':
    case 'nested':
      return cell.value;
  }
}

/**
 * Text of a cell: empty for null, JSON for nested values
 */
export function cellText(cell: Cell | undefined): string {
  if (!cell) {
    return '';
  }
  switch (cell.kind) {
    case 'null':
      return '';
    case 'string':
      return cell.value;
    case 'number':
    case 'boolean':
      return String(cell.value);
    case 'nested':
      return JSON.stringify(cell.value) ?? '';
  }
}

/**
 * Map column names to positions; the first occurrence of a name wins
 */
export function indexColumns(columns: readonly string[]): ColumnIndex {
  const index = new Map<string, number>();
  columns.forEach((name, position) => {
    if (!index.has(name)) {
      index.set(name, position);
    }
  });
  return index;
}

/**
 * Row as a JSON object keyed by column name, in column order
 */
export function rowToRecord(columns: readonly string[], row: Row): Record<string, unknown> {
  const record: Record<string, unknown> = {};
  columns.forEach((name, position) => {
    const cell = row[position];
    record[name] = cell ? cellToJson(cell) : null;
  });
  return record;
}

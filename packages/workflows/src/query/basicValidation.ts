import { ValidationError } from '@loggather/utils';
import { ASSISTED_QUERY_TABLES, QUERY_LEADING_KEYWORDS } from './knownTables.js';

/**
 * Client-side sanity checks run before the query reaches the server.
 * Throws ValidationError describing the first problem found.
 */
export function basicQueryValidation(
  query: string,
  knownTables: readonly string[] = ASSISTED_QUERY_TABLES
): void {
  const text = query.trim();

  if (text === '') {
    throw new ValidationError('query is empty');
  }
  if (text.includes('{') || text.includes('}')) {
    throw new ValidationError('query contains JSON formatting (should be a plain query)', { query });
  }
  if (text.toUpperCase().includes('SELECT ')) {
    throw new ValidationError('query uses SQL syntax instead of KQL', { query });
  }

  const firstLine = text
    .split('\n')
    .map((line) => line.trim())
    .find((line) => line !== '' && !line.startsWith('//'));
  if (!firstLine) {
    throw new ValidationError('no query text found after removing comments', { query });
  }

  const recognized =
    knownTables.some((table) => firstLine.startsWith(table)) ||
    QUERY_LEADING_KEYWORDS.some((keyword) => firstLine.startsWith(keyword));
  if (!recognized) {
    throw new ValidationError("query doesn't start with a recognized table name or KQL command", {
      query,
    });
  }
}

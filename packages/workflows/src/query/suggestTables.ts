import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { dirname, join } from 'path';
import { z } from 'zod';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

const TableHintsSchema = z.object({
  categories: z.array(
    z.object({
      name: z.string(),
      keywords: z.array(z.string()),
      tables: z.array(z.string()),
    })
  ),
  boosts: z.array(
    z.object({
      keyword: z.string(),
      requiresAny: z.array(z.string()).optional(),
      table: z.string(),
      weight: z.number().int().positive(),
    })
  ),
});

export type TableHints = z.infer<typeof TableHintsSchema>;

let cachedHints: TableHints | undefined;

export function loadTableHints(): TableHints {
  if (!cachedHints) {
    const raw: unknown = JSON.parse(readFileSync(join(__dirname, 'table-hints.json'), 'utf-8'));
    cachedHints = TableHintsSchema.parse(raw);
  }
  return cachedHints;
}

/**
 * Score available tables against the keywords of a question.
 *
 * Every matched keyword adds one point to each table of its category; a few
 * phrases add extra weight. Tables scoring above zero are returned, highest
 * score first, ties by name.
 */
export function suggestRelevantTables(
  intent: string,
  available: readonly string[],
  hints: TableHints = loadTableHints()
): string[] {
  const question = intent.toLowerCase();
  const offered = new Set(available);
  const scores = new Map<string, number>();

  const award = (table: string, points: number): void => {
    if (offered.has(table)) {
      scores.set(table, (scores.get(table) ?? 0) + points);
    }
  };

  for (const category of hints.categories) {
    for (const keyword of category.keywords) {
      if (question.includes(keyword)) {
        for (const table of category.tables) {
          award(table, 1);
        }
      }
    }
  }

  for (const boost of hints.boosts) {
    if (!question.includes(boost.keyword)) {
      continue;
    }
    if (boost.requiresAny && !boost.requiresAny.some((word) => question.includes(word))) {
      continue;
    }
    award(boost.table, boost.weight);
  }

  return [...scores.entries()]
    .filter(([, score]) => score > 0)
    .sort(([a, scoreA], [b, scoreB]) => scoreB - scoreA || a.localeCompare(b))
    .map(([table]) => table);
}

import { z } from 'zod';

export const GeneratedQuerySchema = z.object({
  kql: z.string(),
  tables_used: z.array(z.string()).default([]),
  fix_explanation: z.string().optional(),
});

export type GeneratedQuery = z.infer<typeof GeneratedQuerySchema>;

function parseGeneratedQuery(text: string): GeneratedQuery | undefined {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch {
    return undefined;
  }
  const parsed = GeneratedQuerySchema.safeParse(raw);
  return parsed.success ? parsed.data : undefined;
}

function stripCodeFence(response: string): string {
  let text = response.trim();
  for (const fence of ['```json', '```kql', '```']) {
    if (text.startsWith(fence)) {
      text = text.slice(fence.length);
      break;
    }
  }
  if (text.endsWith('```')) {
    text = text.slice(0, -3);
  }
  return text.trim();
}

/**
 * Pull the query out of a generator response.
 *
 * Tried in order: the whole response as `{ kql, tables_used }` JSON, the first
 * JSON block embedded in surrounding text, and finally the response itself with
 * comment and JSON-looking lines dropped.
 */
export function extractQueryFromResponse(response: string): string {
  const text = stripCodeFence(response);

  const whole = parseGeneratedQuery(text);
  if (whole) {
    return whole.kql.trim();
  }

  const lines = text.split('\n').map((line) => line.trim());

  const block: string[] = [];
  for (const line of lines) {
    if (block.length === 0 && !line.startsWith('{')) {
      continue;
    }
    block.push(line);
    if (line.endsWith('}')) {
      break;
    }
  }
  if (block.length > 0) {
    const embedded = parseGeneratedQuery(block.join('\n'));
    if (embedded) {
      return embedded.kql.trim();
    }
  }

  return lines
    .filter(
      (line) =>
        line !== '' &&
        !line.startsWith('//') &&
        !line.startsWith('{') &&
        !line.startsWith('}') &&
        !line.includes('json')
    )
    .join('\n');
}

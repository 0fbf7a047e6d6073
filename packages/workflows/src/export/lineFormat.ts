import { canonicalTimestamp, cellText, type Cell } from '@loggather/core';

/**
 * `<ts> [<source>] <message>`, one physical line per record
 */
export function formatContainerLogLine(timestamp: string, source: string, message: Cell | undefined): string {
  const text = cellText(message).replace(/\r/g, '').replace(/\n/g, '\\n');
  return `${canonicalTimestamp(timestamp)} [${source}] ${text}\n`;
}

/**
 * `<ts> <namespace>/<name> <reason> <message>`
 */
export function formatEventLine(
  timestamp: string,
  namespace: string,
  name: string,
  reason: string,
  message: string
): string {
  return `${canonicalTimestamp(timestamp)} ${namespace}/${name} ${reason} ${message.replace(/\n/g, ' ')}\n`;
}

/**
 * Make an arbitrary identifier safe to use as one path segment.
 *
 * Dots and slashes become underscores (no traversal, no hidden files), as
 * does anything outside [A-Za-z0-9_.-]. Applying it twice changes nothing.
 */
export function sanitizeName(name: string): string {
  const safe = name
    .trim()
    .replace(/[./]/g, '_')
    .replace(/[^A-Za-z0-9_.-]/g, '_');
  return safe === '' ? 'unnamed' : safe;
}

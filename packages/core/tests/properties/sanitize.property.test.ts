import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import { sanitizeName } from '../../src/paths/sanitize.js';

describe('sanitizeName - Property Tests', () => {
  it('is idempotent', () => {
    fc.assert(
      fc.property(fc.string(), (name) => {
        const once = sanitizeName(name);
        expect(sanitizeName(once)).toBe(once);
      })
    );
  });

  it('produces a non-empty segment without dots, slashes or unsafe characters', () => {
    fc.assert(
      fc.property(fc.string(), (name) => {
        expect(sanitizeName(name)).toMatch(/^[A-Za-z0-9_-]+$/);
      })
    );
  });
});

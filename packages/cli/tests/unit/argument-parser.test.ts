/**
 * Unit tests for argument normalization and validation
 */

import { describe, it, expect } from 'vitest';
import { ValidationError } from '@loggather/utils';
import { normalizeOptions, parseArguments } from '../../src/core/argument-parser.js';
import { validateAndCoerceArgs } from '../../src/core/validation-pipeline.js';
import { coerceNumber } from '../../src/core/coerce.js';
import { askWorkspaceSchema, exportWorkspaceSchema } from '../../src/command-defs/workspace.js';

describe('normalizeOptions', () => {
  it('should drop unset options and trim strings without renaming keys', () => {
    expect(
      normalizeOptions({ workspaceGuid: ' guid-1 ', allTables: undefined, out: null, stitchLogs: false })
    ).toEqual({ workspaceGuid: 'guid-1', stitchLogs: false });
  });

  it('should keep numeric-looking strings as strings', () => {
    expect(normalizeOptions({ question: '42' })).toEqual({ question: '42' });
  });
});

describe('parseArguments', () => {
  it('should throw ValidationError listing each issue', () => {
    let caught: unknown;
    try {
      parseArguments(askWorkspaceSchema, { question: '' });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ValidationError);
    expect(caught instanceof Error ? caught.message : '').toBe(
      'Invalid arguments:\n  question: question is required'
    );
  });
});

describe('validateAndCoerceArgs', () => {
  it('should apply export defaults', () => {
    expect(validateAndCoerceArgs(exportWorkspaceSchema, { workspaceGuid: 'guid-1' })).toEqual({
      workspaceGuid: 'guid-1',
      allTables: false,
      stitchLogs: true,
      stitchIncludeEvents: true,
      format: 'table',
    });
  });

  it('should keep disabled stitching flags', () => {
    const args = validateAndCoerceArgs(exportWorkspaceSchema, {
      stitchLogs: false,
      stitchIncludeEvents: false,
    });
    expect(args.stitchLogs).toBe(false);
    expect(args.stitchIncludeEvents).toBe(false);
  });

  it('should reject unknown output formats', () => {
    expect(() => validateAndCoerceArgs(exportWorkspaceSchema, { format: 'csv' })).toThrow(
      ValidationError
    );
  });
});

describe('coerceNumber', () => {
  it('should parse numeric strings and pass through unset values', () => {
    expect(coerceNumber('90', 'queryTimeoutSeconds')).toBe(90);
    expect(coerceNumber(undefined, 'queryTimeoutSeconds')).toBeUndefined();
  });

  it('should reject non-numeric input', () => {
    expect(() => coerceNumber('soon', 'queryTimeoutSeconds')).toThrow(
      'Invalid number for queryTimeoutSeconds'
    );
  });
});

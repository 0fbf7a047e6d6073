import { describe, it, expect } from 'vitest';
import { CancellationError, QueryError, ValidationError } from '@loggather/utils';
import { basicQueryValidation } from '../../src/query/basicValidation.js';
import {
  MAX_VALIDATION_ATTEMPTS,
  toProbeQuery,
  validateAndFixQuery,
  validateQuery,
} from '../../src/query/validateQuery.js';
import { FakeLogQuery, StubQueryGenerator, emptyResult, fixedClock, type QueryHandler } from '../support/fakes.js';

describe('basicQueryValidation', () => {
  it('accepts a query starting with a known table', () => {
    expect(() => basicQueryValidation('KubePodInventory | take 10')).not.toThrow();
  });

  it('accepts leading comments and let statements', () => {
    expect(() => basicQueryValidation('// pods\nlet ns = "default";\nKubePodInventory')).not.toThrow();
  });

  it.each([
    ['', 'query is empty'],
    ['KubePodInventory | extend x = bag_pack("a", {})', 'query contains JSON formatting (should be a plain query)'],
    ['SELECT * FROM Perf', 'query uses SQL syntax instead of KQL'],
    ['// only a comment', 'no query text found after removing comments'],
    ['Pods | take 1', "query doesn't start with a recognized table name or KQL command"],
  ])('rejects %j', (query, message) => {
    expect(() => basicQueryValidation(query)).toThrow(ValidationError);
    expect(() => basicQueryValidation(query)).toThrow(message);
  });

  it('accepts additional known tables', () => {
    expect(() => basicQueryValidation('CustomTable_CL | take 1', ['CustomTable_CL'])).not.toThrow();
  });
});

describe('toProbeQuery', () => {
  it('appends limit 0 once', () => {
    expect(toProbeQuery('  Perf | take 5 ')).toBe('Perf | take 5 | limit 0');
    expect(toProbeQuery('Perf | LIMIT 0')).toBe('Perf | LIMIT 0');
  });
});

function validationContext(handler: QueryHandler, signal?: AbortSignal) {
  const logs = new FakeLogQuery(handler);
  return { logs, ctx: { logs, workspaceGuid: 'guid-1', clock: fixedClock(), timeoutSeconds: 30, signal } };
}

describe('validateQuery', () => {
  it('probes the last minute with the validation budget', async () => {
    const { logs, ctx } = validationContext(() => emptyResult());

    await validateQuery('Perf', ctx);

    expect(logs.requests).toHaveLength(1);
    const [request] = logs.requests;
    expect(request.query).toBe('Perf | limit 0');
    expect(request.start.toISO()).toBe('2024-05-01T11:59:00.000Z');
    expect(request.end.toISO()).toBe('2024-05-01T12:00:00.000Z');
    expect(request.serverTimeoutSeconds).toBe(30);
  });

  it.each([
    ['SyntaxError: unexpected token', 'KQL syntax error: SyntaxError: unexpected token'],
    [
      "SemanticError: 'Foo' could not be resolved",
      "KQL semantic error (invalid table/column names): SemanticError: 'Foo' could not be resolved",
    ],
    ['BadRequest', 'KQL validation error: BadRequest'],
  ])('classifies %j', async (serverMessage, expected) => {
    const { ctx } = validationContext(() => {
      throw new Error(serverMessage);
    });

    const failure = validateQuery('Perf', ctx);
    await expect(failure).rejects.toBeInstanceOf(QueryError);
    await expect(failure).rejects.toThrow(expected);
  });

  it('accepts partial errors', async () => {
    const { ctx } = validationContext(() => {
      throw new Error('PartialError: one workspace did not respond');
    });

    await expect(validateQuery('Perf', ctx)).resolves.toBeUndefined();
  });

  it('accepts partial results', async () => {
    const { ctx } = validationContext(() => ({ status: 'partial', tables: [], error: 'shard offline' }));

    await expect(validateQuery('Perf', ctx)).resolves.toBeUndefined();
  });

  it('reports cancellation instead of a validation failure', async () => {
    const controller = new AbortController();
    const { ctx } = validationContext(() => {
      controller.abort();
      throw new Error('aborted');
    }, controller.signal);

    await expect(validateQuery('Perf', ctx)).rejects.toBeInstanceOf(CancellationError);
  });
});

describe('validateAndFixQuery', () => {
  const failUnless = (valid: string): QueryHandler => (request) => {
    if (request.query === `${valid} | limit 0`) {
      return emptyResult();
    }
    throw new Error('SemanticError: unknown column');
  };

  it('returns the query unchanged when it validates', async () => {
    const generator = new StubQueryGenerator();
    const { ctx } = validationContext(() => emptyResult());

    await expect(validateAndFixQuery('q', 'Perf', ['Perf'], { ...ctx, generator })).resolves.toBe('Perf');
    expect(generator.fixRequests).toEqual([]);
  });

  it('asks for a fix after a failed attempt', async () => {
    const generator = new StubQueryGenerator({ fixes: ['Perf | take 1'] });
    const { logs, ctx } = validationContext(failUnless('Perf | take 1'));

    const query = await validateAndFixQuery('q', 'Perf | project Bogus', ['Perf'], { ...ctx, generator });

    expect(query).toBe('Perf | take 1');
    expect(logs.requests).toHaveLength(2);
    expect(generator.fixRequests).toEqual([
      {
        failedQuery: 'Perf | project Bogus',
        errorText: 'KQL semantic error (invalid table/column names): SemanticError: unknown column',
      },
    ]);
  });

  it('gives up after the last attempt', async () => {
    const generator = new StubQueryGenerator({ fixes: ['Perf | a', 'Perf | b', 'Perf | c'] });
    const { logs, ctx } = validationContext(failUnless('never'));

    await expect(validateAndFixQuery('q', 'Perf', ['Perf'], { ...ctx, generator })).rejects.toThrow(
      `failed to validate query after ${MAX_VALIDATION_ATTEMPTS} attempts`
    );
    expect(logs.requests.map((r) => r.query)).toEqual([
      'Perf | limit 0',
      'Perf | a | limit 0',
      'Perf | b | limit 0',
    ]);
    expect(generator.fixRequests).toHaveLength(2);
  });

  it('keeps validating the same query when a fix fails', async () => {
    const generator = new StubQueryGenerator();
    const { logs, ctx } = validationContext(failUnless('never'));

    await expect(validateAndFixQuery('q', 'Perf', ['Perf'], { ...ctx, generator })).rejects.toBeInstanceOf(
      QueryError
    );
    expect(logs.requests.map((r) => r.query)).toEqual(['Perf | limit 0', 'Perf | limit 0', 'Perf | limit 0']);
  });
});

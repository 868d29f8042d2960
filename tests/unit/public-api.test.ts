import { describe, it, expect } from 'vitest';

describe('Public API surface', () => {
  it('exports the operator functions', async () => {
    const api = await import('../../src/index.js');
    for (const name of ['eq', 'ne', 'gt', 'gte', 'lt', 'lte', 'inSet', 'notInSet', 'exists', 'regex', 'all', 'elemMatch', 'size', 'not'] as const) {
      expect(typeof api[name]).toBe('function');
    }
  });

  it('exports the logical combinators', async () => {
    const { and, or, nor } = await import('../../src/index.js');
    expect(and({ a: 1 })).toEqual({ $and: [{ a: 1 }] });
    expect(typeof or).toBe('function');
    expect(typeof nor).toBe('function');
  });

  it('exports field() and FieldExpression', async () => {
    const { field, FieldExpression } = await import('../../src/index.js');
    expect(field('qty')).toBeInstanceOf(FieldExpression);
  });

  it('exports MongoDao class', async () => {
    const { MongoDao } = await import('../../src/index.js');
    expect(typeof MongoDao).toBe('function'); // class is a function
  });

  it('exports the error classes usable with instanceof', async () => {
    const { DaoError, InvalidArgumentError } = await import('../../src/index.js');
    const err = new DaoError('test error');
    expect(err).toBeInstanceOf(DaoError);
    expect(err).toBeInstanceOf(Error);
    expect(new InvalidArgumentError('field', 'x')).not.toBeInstanceOf(DaoError);
  });

  it('exports the native conversions', async () => {
    const { toNativeFilter, toStructuredValue, toFilterDocument } = await import('../../src/index.js');
    expect(toStructuredValue(toNativeFilter({ a: 1 }))).toEqual({ a: 1 });
    expect(toFilterDocument({ a: 1 })).toEqual({ a: 1 });
  });

  it('does NOT export nativeNot (internal)', async () => {
    const api = await import('../../src/index.js');
    expect('nativeNot' in api).toBe(false);
  });

  it('does NOT export nativeRegex (internal)', async () => {
    const api = await import('../../src/index.js');
    expect('nativeRegex' in api).toBe(false);
  });

  it('does NOT export skipNulls (internal)', async () => {
    const api = await import('../../src/index.js');
    expect('skipNulls' in api).toBe(false);
  });
});

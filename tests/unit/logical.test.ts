import { describe, it, expect } from 'vitest';
import { and, or, nor } from '../../src/query/logical.js';
import { eq, exists, gt, lt, ne } from '../../src/query/operators.js';

describe('Logical combinators', () => {
  it('and collects its filters in order', () => {
    expect(and(ne('price', 1.99), exists('price'))).toEqual({
      $and: [{ price: { $ne: 1.99 } }, { price: { $exists: true } }],
    });
  });

  it('or collects its filters in order', () => {
    expect(or(lt('quantity', 20), eq('price', 10))).toEqual({
      $or: [{ quantity: { $lt: 20 } }, { price: { $eq: 10 } }],
    });
  });

  it('nor collects its filters in order', () => {
    expect(nor(eq('price', 1.99), lt('qty', 20), eq('sale', true))).toEqual({
      $nor: [{ price: { $eq: 1.99 } }, { qty: { $lt: 20 } }, { sale: { $eq: true } }],
    });
  });

  it('a single argument is still wrapped', () => {
    const x = eq('a', 1);
    expect(and(x)).toEqual({ $and: [x] });
  });

  it('does not flatten nested documents of the same kind', () => {
    const inner = and(eq('a', 1), eq('b', 2));
    expect(and(inner)).toEqual({ $and: [{ $and: [{ a: { $eq: 1 } }, { b: { $eq: 2 } }] }] });
  });

  it('no arguments give an empty array', () => {
    expect(and()).toEqual({ $and: [] });
    expect(or()).toEqual({ $or: [] });
    expect(nor()).toEqual({ $nor: [] });
  });

  it('mixes combinators freely', () => {
    expect(and(or(eq('qty', 0), gt('qty', 100)), nor(eq('sale', true)))).toEqual({
      $and: [
        { $or: [{ qty: { $eq: 0 } }, { qty: { $gt: 100 } }] },
        { $nor: [{ sale: { $eq: true } }] },
      ],
    });
  });

  it('does not keep a reference to the argument list', () => {
    const filters = [eq('a', 1)];
    const result = or(...filters);
    filters.push(eq('b', 2));
    expect(result).toEqual({ $or: [{ a: { $eq: 1 } }] });
  });
});

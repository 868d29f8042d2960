import { vi } from 'vitest';
import type { Collection, Document } from 'mongodb';
import { DecodeError } from '../../src/errors.js';
import type { DaoProtocol, EntityCodec } from '../../src/codec.js';
import { stringCodec } from '../../src/codec.js';
import { isStructuredArray, isStructuredObject } from '../../src/query/types.js';

export interface Product {
  sku: string;
  name: string;
  price: number;
  tags: string[];
  note?: string | null;
}

export const productCodec: EntityCodec<Product> = {
  encode: (p) => ({
    _id: p.sku,
    name: p.name,
    price: p.price,
    tags: p.tags,
    note: p.note ?? null,
  }),
  decode: (value) => {
    if (!isStructuredObject(value)) {
      throw new DecodeError('Product must be an object');
    }
    const { _id, name, price, tags, note } = value;
    if (typeof _id !== 'string' || typeof name !== 'string' || typeof price !== 'number') {
      throw new DecodeError(`Malformed product ${JSON.stringify(value)}`);
    }
    if (tags === undefined || !isStructuredArray(tags) || !tags.every((t): t is string => typeof t === 'string')) {
      throw new DecodeError(`Malformed tags ${JSON.stringify(tags)}`);
    }
    const product: Product = { sku: _id, name, price, tags: [...tags] };
    if (typeof note === 'string') product.note = note;
    return product;
  },
};

export const productProtocol: DaoProtocol<string, Product> = {
  id: stringCodec,
  entity: productCodec,
};

export interface LineId {
  order: string;
  line: number;
}

export interface OrderLine {
  id: LineId;
  qty: number;
}

export const lineIdCodec: EntityCodec<LineId> = {
  encode: (id) => ({ order: id.order, line: id.line }),
  decode: (value) => {
    if (!isStructuredObject(value) || typeof value['order'] !== 'string' || typeof value['line'] !== 'number') {
      throw new DecodeError(`Malformed line id ${JSON.stringify(value)}`);
    }
    return { order: value['order'], line: value['line'] };
  },
};

export const orderLineProtocol: DaoProtocol<LineId, OrderLine> = {
  id: lineIdCodec,
  entity: {
    encode: (l) => ({ _id: lineIdCodec.encode(l.id), qty: l.qty }),
    decode: (value) => {
      if (!isStructuredObject(value) || value['_id'] === undefined || typeof value['qty'] !== 'number') {
        throw new DecodeError(`Malformed order line ${JSON.stringify(value)}`);
      }
      return { id: lineIdCodec.decode(value['_id']), qty: value['qty'] };
    },
  },
};

export function makeCursor(docs: Document[] = []) {
  const cursor = {
    skip: vi.fn(),
    limit: vi.fn(),
    sort: vi.fn(),
    toArray: vi.fn().mockResolvedValue(docs),
  };
  cursor.skip.mockReturnValue(cursor);
  cursor.limit.mockReturnValue(cursor);
  cursor.sort.mockReturnValue(cursor);
  return cursor;
}

/** In-process stand-in for the driver collection; every method is a vi.fn(). */
export function makeCollection(found: Document[] = []) {
  const cursor = makeCursor(found);
  const aggregateCursor = { toArray: vi.fn().mockResolvedValue([]) };
  const mock = {
    collectionName: 'products',
    insertOne: vi.fn().mockResolvedValue({ acknowledged: true, insertedId: 'x' }),
    insertMany: vi.fn().mockResolvedValue({ acknowledged: true, insertedCount: 0, insertedIds: {} }),
    find: vi.fn().mockReturnValue(cursor),
    findOneAndUpdate: vi.fn().mockResolvedValue(null),
    findOneAndReplace: vi.fn().mockResolvedValue(null),
    findOneAndDelete: vi.fn().mockResolvedValue(null),
    deleteMany: vi.fn().mockResolvedValue({ acknowledged: true, deletedCount: 0 }),
    countDocuments: vi.fn().mockResolvedValue(0),
    distinct: vi.fn().mockResolvedValue([]),
    aggregate: vi.fn().mockReturnValue(aggregateCursor),
  };
  const collection = mock as unknown as Collection<Document>;
  return { mock, cursor, aggregateCursor, collection };
}

export const desk: Product = { sku: 'sku-1', name: 'Desk', price: 120, tags: ['office'] };

export const deskDocument = { _id: 'sku-1', name: 'Desk', price: 120, tags: ['office'] };

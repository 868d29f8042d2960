import type { Document } from 'mongodb';
import type { EntityCodec } from '../codec.js';
import { ShapeMismatchError } from '../errors.js';
import { toFilterDocument, toNativeFilter } from '../query/native.js';
import { isStructuredArray, isStructuredObject } from '../query/types.js';
import type { StructuredObject, StructuredValue } from '../query/types.js';

/**
 * Drops null-valued fields from every object in the tree. Null array
 * elements are positions, not fields, and stay.
 */
export function skipNulls(value: StructuredValue): StructuredValue {
  if (isStructuredArray(value)) {
    return value.map(skipNulls);
  }
  if (isStructuredObject(value)) {
    return Object.fromEntries(
      Object.entries(value)
        .filter(([, v]) => v !== null)
        .map(([k, v]) => [k, skipNulls(v)]),
    );
  }
  return value;
}

/** Encodes an entity into a driver document. Entities must encode to objects. */
export function toDocument<E>(entity: E, codec: EntityCodec<E>, skipNull: boolean): Document {
  const encoded = codec.encode(entity);
  const cleaned = skipNull ? skipNulls(encoded) : encoded;
  if (!isStructuredObject(cleaned)) {
    throw new ShapeMismatchError(cleaned, `Entities must encode to an object, got ${JSON.stringify(cleaned)}`);
  }
  return toNativeFilter(cleaned);
}

export function toEntity<E>(doc: Document, codec: EntityCodec<E>): E {
  return codec.decode(toFilterDocument(doc));
}

export function toEntities<E>(docs: readonly Document[], codec: EntityCodec<E>): E[] {
  return docs.map((doc) => toEntity(doc, codec));
}

export function toStructuredObjects(docs: readonly Document[]): StructuredObject[] {
  return docs.map((doc) => toFilterDocument(doc));
}

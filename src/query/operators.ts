import { InvalidArgumentError } from '../errors.js';
import { expandOperator, requireFieldName } from './expand.js';
import { nativeNot, nativeRegex, toFilterDocument, toNativeFilter } from './native.js';
import type { FilterDocument, StructuredValue } from './types.js';

/**
 * Equality. Structured values are matched field by field:
 *
 * @example eq('qty', 20) // { qty: { $eq: 20 } }
 * @example eq('size', { h: 14 }) // { 'size.h': { $eq: 14 } }
 */
export function eq(field: string, value: StructuredValue): FilterDocument {
  return expandOperator(field, '$eq', value);
}

/** @example ne('qty', 20) // { qty: { $ne: 20 } } */
export function ne(field: string, value: StructuredValue): FilterDocument {
  return expandOperator(field, '$ne', value);
}

/** @example gt('qty', 20) // { qty: { $gt: 20 } } */
export function gt(field: string, value: StructuredValue): FilterDocument {
  return expandOperator(field, '$gt', value);
}

/** @example gte('qty', 20) // { qty: { $gte: 20 } } */
export function gte(field: string, value: StructuredValue): FilterDocument {
  return expandOperator(field, '$gte', value);
}

/** @example lt('qty', 20) // { qty: { $lt: 20 } } */
export function lt(field: string, value: StructuredValue): FilterDocument {
  return expandOperator(field, '$lt', value);
}

/** @example lte('qty', 20) // { qty: { $lte: 20 } } */
export function lte(field: string, value: StructuredValue): FilterDocument {
  return expandOperator(field, '$lte', value);
}

function arrayOperator(field: string, operator: string, values: readonly StructuredValue[]): FilterDocument {
  requireFieldName(field);
  return { [field]: { [operator]: [...values] } };
}

/**
 * Matches when the field equals any of the values.
 *
 * @example inSet('qty', 5, 15) // { qty: { $in: [5, 15] } }
 */
export function inSet(field: string, ...values: StructuredValue[]): FilterDocument {
  return arrayOperator(field, '$in', values);
}

/**
 * Matches when the field equals none of the values, or is missing.
 *
 * @example notInSet('qty', 5, 15) // { qty: { $nin: [5, 15] } }
 */
export function notInSet(field: string, ...values: StructuredValue[]): FilterDocument {
  return arrayOperator(field, '$nin', values);
}

/**
 * With `true`, matches documents that contain the field, even when it is null.
 * With `false`, only documents without it.
 */
export function exists(field: string, present = true): FilterDocument {
  requireFieldName(field);
  return { [field]: { $exists: present } };
}

/**
 * Pattern match. A `RegExp` is converted by the driver; strings are sent as
 * `$regex` with optional `$options`.
 *
 * @example regex('name', 'acme.*corp', 'i') // { name: { $regex: 'acme.*corp', $options: 'i' } }
 */
export function regex(field: string, pattern: string, options?: string): FilterDocument;
export function regex(field: string, pattern: RegExp): FilterDocument;
export function regex(field: string, pattern: string | RegExp, options?: string): FilterDocument {
  requireFieldName(field);
  if (pattern instanceof RegExp) {
    return toFilterDocument(nativeRegex(field, pattern));
  }
  return options === undefined
    ? { [field]: { $regex: pattern } }
    : { [field]: { $regex: pattern, $options: options } };
}

/** @example all('tags', 'ssl', 'security') // { tags: { $all: ['ssl', 'security'] } } */
export function all(field: string, ...values: StructuredValue[]): FilterDocument {
  return arrayOperator(field, '$all', values);
}

/**
 * Array element match. With a field, `{ field: { $elemMatch: filter } }`;
 * on its own, `{ $elemMatch: filter }` for use inside other operators.
 *
 * @example elemMatch('results', eq('product', 'xyz'))
 * @example all('qty', elemMatch(and(eq('size', 'M'), gt('num', 50))))
 */
export function elemMatch(filter: FilterDocument): FilterDocument;
export function elemMatch(field: string, filter: FilterDocument): FilterDocument;
export function elemMatch(fieldOrFilter: string | FilterDocument, filter?: FilterDocument): FilterDocument {
  if (typeof fieldOrFilter !== 'string') {
    return { $elemMatch: fieldOrFilter };
  }
  requireFieldName(fieldOrFilter);
  return { [fieldOrFilter]: { $elemMatch: filter ?? {} } };
}

/** @example size('tags', 2) // { tags: { $size: 2 } } */
export function size(field: string, length: number): FilterDocument {
  requireFieldName(field);
  if (!Number.isInteger(length) || length < 0) {
    throw new InvalidArgumentError('size', `Array size must be a non-negative integer, got ${length}`);
  }
  return { [field]: { $size: length } };
}

/**
 * Negates the operator expression that `build` produces for `field`.
 *
 * @example not('price', (f) => gt(f, 1.99)) // { price: { $not: { $gt: 1.99 } } }
 */
export function not(field: string, build: (field: string) => FilterDocument): FilterDocument {
  requireFieldName(field);
  return toFilterDocument(nativeNot(toNativeFilter(build(field))));
}

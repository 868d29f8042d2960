import { InvalidArgumentError } from '../errors.js';
import type { EntityCodec } from '../codec.js';
import { isOperatorKey, isStructuredObject } from './types.js';
import type { FilterDocument, StructuredObject, StructuredValue } from './types.js';

type Entry = readonly [string, StructuredValue];

/**
 * Structural union of filter documents. When two documents carry the same
 * key the later one wins; nothing is merged below the top level.
 */
export function mergeFilters(...documents: readonly StructuredObject[]): FilterDocument {
  return Object.fromEntries(documents.flatMap((d) => Object.entries(d)));
}

function joinPath(prefix: string, key: string): string {
  return prefix === '' ? key : `${prefix}.${key}`;
}

function expandEntries(prefix: string, value: StructuredValue): Entry[] {
  if (!isStructuredObject(value)) {
    return [[prefix, value]];
  }
  return Object.entries(value).flatMap(([key, sub]): Entry[] => {
    if (isOperatorKey(key)) {
      return prefix === '' ? [[key, sub]] : [[prefix, { [key]: sub }]];
    }
    return expandEntries(joinPath(prefix, key), sub);
  });
}

/**
 * Flattens nested objects into dotted paths. Operator keys stop the descent:
 * `expand('', { a: { b: { $gt: 1 } } })` gives `{ 'a.b': { $gt: 1 } }`.
 *
 * A non-object value needs a prefix to be stored under; with an empty prefix
 * there is no document to build and the call throws.
 */
export function expand(prefix: string, value: StructuredValue): FilterDocument {
  if (prefix === '' && !isStructuredObject(value)) {
    throw new InvalidArgumentError(
      'prefix',
      `Cannot expand ${JSON.stringify(value)} without a path prefix`,
    );
  }
  return Object.fromEntries(expandEntries(prefix, value));
}

function requireNonEmpty(argument: string, value: string, label: string): void {
  if (value === '') {
    throw new InvalidArgumentError(argument, `${label} should be non empty.`);
  }
}

export function requireFieldName(field: string): void {
  requireNonEmpty('field', field, 'Field name');
}

/**
 * Expands `value` under `field` and wraps every leaf in `operator`:
 *
 * ```ts
 * expandOperator('size', '$eq', { h: 14, uom: 'cm' })
 * // { 'size.h': { $eq: 14 }, 'size.uom': { $eq: 'cm' } }
 * ```
 *
 * An operator pair met on the way is wrapped as a whole, so
 * `expandOperator('qty', '$not', { $gt: 5 })` gives `{ qty: { $not: { $gt: 5 } } }`.
 */
export function expandOperator(field: string, operator: string, value: StructuredValue): FilterDocument {
  requireFieldName(field);
  requireNonEmpty('operator', operator, 'Query operator');

  const walk = (path: string, node: StructuredValue): Entry[] => {
    if (!isStructuredObject(node)) {
      return [[path, { [operator]: node }]];
    }
    return Object.entries(node).flatMap(([key, sub]): Entry[] =>
      isOperatorKey(key)
        ? [[path, { [operator]: { [key]: sub } }]]
        : walk(`${path}.${key}`, sub),
    );
  };

  return Object.fromEntries(walk(field, value));
}

/**
 * Encodes `value` with its codec and expands the result under `path`.
 * Used to match composite identifiers field by field.
 */
export function asExpanded<T>(value: T, codec: EntityCodec<T>, path = ''): FilterDocument {
  return expand(path, codec.encode(value));
}

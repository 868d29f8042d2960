import { BSON, BSONRegExp, Long } from 'mongodb';
import type { Document } from 'mongodb';
import { InvalidArgumentError, ShapeMismatchError } from '../errors.js';
import { isOperatorKey, isStructuredArray, isStructuredObject } from './types.js';
import type { FilterDocument, StructuredObject, StructuredValue } from './types.js';

/**
 * Single-key extended JSON objects that stand for a BSON type. The legacy
 * `{ $regex, $options }` form is left out on purpose: in a filter it is the
 * `$regex` query operator.
 */
const TYPE_WRAPPER_KEYS: ReadonlySet<string> = new Set([
  '$oid',
  '$date',
  '$numberInt',
  '$numberLong',
  '$numberDouble',
  '$numberDecimal',
  '$binary',
  '$uuid',
  '$timestamp',
  '$regularExpression',
  '$symbol',
  '$minKey',
  '$maxKey',
  '$dbPointer',
  '$code',
]);

// Code with scope is the one wrapper written with two keys.
const CODE_WITH_SCOPE_KEYS = ['$code', '$scope'];

const EJSON_OPTIONS = { relaxed: false } as const;

// Flags JavaScript accepts but the server does not.
const CLIENT_ONLY_REGEX_FLAGS = /[dgvy]/;

const DBREF_KEYS = ['$id', '$ref'];
const DBREF_KEYS_WITH_DB = ['$db', '$id', '$ref'];

function isTypeWrapper(value: StructuredObject): boolean {
  const keys = Object.keys(value);
  if (keys.length === 2) {
    return CODE_WITH_SCOPE_KEYS.every((k) => keys.includes(k));
  }
  return keys.length === 1 && TYPE_WRAPPER_KEYS.has(keys[0] ?? '');
}

function fromExtendedJson(value: StructuredObject): unknown {
  try {
    return BSON.EJSON.deserialize(value, EJSON_OPTIONS);
  } catch (err) {
    throw new InvalidArgumentError(
      'filter',
      `Invalid extended JSON value ${JSON.stringify(value)}: ${String(err)}`,
      err,
    );
  }
}

function toNativeValue(value: StructuredValue): unknown {
  if (isStructuredArray(value)) {
    return value.map(toNativeValue);
  }
  if (isStructuredObject(value)) {
    if (isTypeWrapper(value)) {
      return fromExtendedJson(value);
    }
    return Object.fromEntries(Object.entries(value).map(([k, v]) => [k, toNativeValue(v)]));
  }
  return value;
}

/**
 * Converts a filter document into the driver's `Document`. Extended JSON
 * type wrappers (`{ $date: … }`, `{ $oid: … }`, …) become BSON values,
 * everything else keeps its shape. A malformed wrapper throws
 * `InvalidArgumentError`.
 */
export function toNativeFilter(value: FilterDocument): Document {
  return Object.fromEntries(Object.entries(value).map(([k, v]) => [k, toNativeValue(v)]));
}

function isPlainObject(value: object): boolean {
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function isBsonValue(value: object): boolean {
  return '_bsontype' in value && typeof value._bsontype === 'string';
}

/**
 * Reverse of {@link toNativeFilter}. BSON values, dates and regular
 * expressions come back as canonical extended JSON.
 */
export function toStructuredValue(native: unknown): StructuredValue {
  if (native === null || typeof native === 'boolean' || typeof native === 'number' || typeof native === 'string') {
    return native;
  }
  if (typeof native === 'bigint') {
    return toStructuredValue(Long.fromBigInt(native));
  }
  if (typeof native !== 'object') {
    throw new ShapeMismatchError(native, `Cannot represent a value of type ${typeof native}`);
  }
  if (Array.isArray(native)) {
    return native.map((item: unknown) => toStructuredValue(item));
  }
  if (isBsonValue(native) || native instanceof Date || native instanceof RegExp) {
    return toStructuredValue(BSON.EJSON.serialize(native, EJSON_OPTIONS));
  }
  if (!isPlainObject(native)) {
    throw new ShapeMismatchError(native);
  }
  return Object.fromEntries(
    Object.entries(native).map(([k, v]: [string, unknown]) => [k, toStructuredValue(v)]),
  );
}

/**
 * Like {@link toStructuredValue} but insists on a document at the top.
 */
export function toFilterDocument(native: unknown): FilterDocument {
  if (native === null || typeof native !== 'object' || Array.isArray(native)) {
    throw new ShapeMismatchError(native);
  }
  if (isBsonValue(native) || native instanceof Date || native instanceof RegExp) {
    throw new ShapeMismatchError(native);
  }
  const value = toStructuredValue(native);
  if (!isStructuredObject(value)) {
    throw new ShapeMismatchError(native);
  }
  return value;
}

/**
 * `{ field: BSONRegExp }`, built by the driver so flags are validated and
 * ordered the way the server expects.
 */
export function nativeRegex(field: string, regex: RegExp): Document {
  if (CLIENT_ONLY_REGEX_FLAGS.test(regex.flags)) {
    throw new InvalidArgumentError('regex', `Regular expression flags "${regex.flags}" are not supported by the server`);
  }
  let pattern: BSONRegExp;
  try {
    pattern = new BSONRegExp(regex.source, regex.flags);
  } catch (err) {
    throw new InvalidArgumentError('regex', `Invalid regular expression ${String(regex)}: ${String(err)}`);
  }
  return { [field]: pattern };
}

function isDbRef(keys: readonly string[]): boolean {
  const sorted = [...keys].sort();
  const same = (expected: readonly string[]) =>
    sorted.length === expected.length && sorted.every((k, i) => k === expected[i]);
  return same(DBREF_KEYS) || same(DBREF_KEYS_WITH_DB);
}

function containsOperator(value: unknown): boolean {
  if (value === null || typeof value !== 'object' || Array.isArray(value) || !isPlainObject(value)) {
    return false;
  }
  const keys = Object.keys(value);
  return !isDbRef(keys) && keys.some(isOperatorKey);
}

function negate(key: string, value: unknown): Document {
  if (isOperatorKey(key)) {
    return { $not: { [key]: value } };
  }
  if (value instanceof BSONRegExp || value instanceof RegExp || containsOperator(value)) {
    return { [key]: { $not: value } };
  }
  return { [key]: { $not: { $eq: value } } };
}

/**
 * Negation with the driver's rules: operator expressions and regular
 * expressions are wrapped in `$not`, literals become `$not: { $eq }`, and a
 * document with several keys is turned into an `$and` of its pairs first.
 */
export function nativeNot(filter: Document): Document {
  const entries: [string, unknown][] = Object.entries(filter);
  const [first] = entries;
  if (first === undefined) {
    throw new InvalidArgumentError('filter', 'Cannot negate an empty filter');
  }
  if (entries.length === 1) {
    return negate(first[0], first[1]);
  }
  return negate('$and', entries.map(([k, v]) => ({ [k]: v })));
}

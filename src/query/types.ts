/**
 * JSON-shaped value shared by entities (after encoding) and filter documents.
 * The variant is told apart at run time with typeof / Array.isArray.
 */
export type StructuredValue =
  | null
  | boolean
  | number
  | string
  | readonly StructuredValue[]
  | StructuredObject;

export interface StructuredObject {
  readonly [key: string]: StructuredValue;
}

/**
 * A match condition: field paths mapped to literals or operator objects,
 * or a single logical operator mapped to an array of filter documents.
 */
export type FilterDocument = StructuredObject;

/** Keys starting with `$` are query operators, all others are path segments. */
export const OPERATOR_PREFIX = '$';

export function isOperatorKey(key: string): boolean {
  return key.startsWith(OPERATOR_PREFIX);
}

// Array.isArray does not narrow readonly arrays out of a union, hence the guards.
export function isStructuredArray(value: StructuredValue): value is readonly StructuredValue[] {
  return Array.isArray(value);
}

export function isStructuredObject(value: StructuredValue): value is StructuredObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

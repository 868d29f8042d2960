import { DecodeError } from './errors.js';
import type { StructuredValue } from './query/types.js';

/**
 * Converts one type to and from its structured form.
 * `decode` signals bad input by throwing, usually a DecodeError.
 */
export interface EntityCodec<T> {
  encode(value: T): StructuredValue;
  decode(value: StructuredValue): T;
}

/** The pair of codecs a DAO needs for its identifier and entity types. */
export interface DaoProtocol<Id, E> {
  readonly id: EntityCodec<Id>;
  readonly entity: EntityCodec<E>;
}

export function encodeValue<T>(value: T, codec: EntityCodec<T>): StructuredValue {
  return codec.encode(value);
}

/**
 * Codec for types that already are structured values (string ids, numeric
 * ids, JSON documents). Decoding only checks the value with `guard`.
 */
export function passthroughCodec<T extends StructuredValue>(
  guard: (value: StructuredValue) => value is T,
  description: string,
): EntityCodec<T> {
  return {
    encode: (value) => value,
    decode: (value) => {
      if (!guard(value)) {
        throw new DecodeError(`Expected ${description}, got ${JSON.stringify(value)}`);
      }
      return value;
    },
  };
}

export const stringCodec: EntityCodec<string> = passthroughCodec(
  (value): value is string => typeof value === 'string',
  'a string',
);

export const numberCodec: EntityCodec<number> = passthroughCodec(
  (value): value is number => typeof value === 'number',
  'a number',
);

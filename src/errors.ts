export class InvalidArgumentError extends Error {
  override readonly name = 'InvalidArgumentError';

  constructor(
    readonly argument: string,
    message: string,
    override readonly cause?: unknown,
  ) {
    super(message);
    // Restore prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class ShapeMismatchError extends Error {
  override readonly name = 'ShapeMismatchError';

  constructor(
    readonly value: unknown,
    message?: string,
  ) {
    super(message ?? `Expected a plain document, but got ${describe(value)}`);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Thrown by entity codecs. The DAO passes it through untouched.
 */
export class DecodeError extends Error {
  override readonly name = 'DecodeError';

  constructor(
    message: string,
    override readonly cause?: unknown,
  ) {
    super(message);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class EntityNotFoundError extends Error {
  override readonly name = 'EntityNotFoundError';

  constructor(
    readonly collection: string,
    readonly id: unknown,
    message?: string,
  ) {
    super(message ?? `No document in "${collection}" with id ${JSON.stringify(id)}`);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class DaoError extends Error {
  override readonly name = 'DaoError';

  constructor(
    message: string,
    override readonly cause?: unknown,
  ) {
    super(message);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

function describe(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'an array';
  if (typeof value === 'object') {
    const ctor = Object.getPrototypeOf(value)?.constructor?.name;
    return typeof ctor === 'string' && ctor !== '' ? `an instance of ${ctor}` : 'an object';
  }
  return typeof value;
}

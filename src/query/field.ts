import { requireFieldName } from './expand.js';
import * as ops from './operators.js';
import type { FilterDocument, StructuredValue } from './types.js';

/**
 * Fluent, immutable view of the field operators bound to one field name.
 * Every method returns a fresh filter document.
 */
export class FieldExpression {
  constructor(readonly name: string) {
    requireFieldName(name);
  }

  eq(value: StructuredValue): FilterDocument {
    return ops.eq(this.name, value);
  }

  ne(value: StructuredValue): FilterDocument {
    return ops.ne(this.name, value);
  }

  gt(value: StructuredValue): FilterDocument {
    return ops.gt(this.name, value);
  }

  gte(value: StructuredValue): FilterDocument {
    return ops.gte(this.name, value);
  }

  lt(value: StructuredValue): FilterDocument {
    return ops.lt(this.name, value);
  }

  lte(value: StructuredValue): FilterDocument {
    return ops.lte(this.name, value);
  }

  in(...values: StructuredValue[]): FilterDocument {
    return ops.inSet(this.name, ...values);
  }

  nin(...values: StructuredValue[]): FilterDocument {
    return ops.notInSet(this.name, ...values);
  }

  exists(present = true): FilterDocument {
    return ops.exists(this.name, present);
  }

  regex(pattern: string, options?: string): FilterDocument;
  regex(pattern: RegExp): FilterDocument;
  regex(pattern: string | RegExp, options?: string): FilterDocument {
    return pattern instanceof RegExp
      ? ops.regex(this.name, pattern)
      : ops.regex(this.name, pattern, options);
  }

  all(...values: StructuredValue[]): FilterDocument {
    return ops.all(this.name, ...values);
  }

  elemMatch(filter: FilterDocument): FilterDocument {
    return ops.elemMatch(this.name, filter);
  }

  size(length: number): FilterDocument {
    return ops.size(this.name, length);
  }

  not(build: (field: string) => FilterDocument): FilterDocument {
    return ops.not(this.name, build);
  }
}

/**
 * Entry point for the fluent form of the DSL.
 *
 * @example
 * or(field('price').gte(10), field('qty').lt(5))
 * field('price').not((f) => field(f).gt(1.99))
 */
export function field(name: string): FieldExpression {
  return new FieldExpression(name);
}

import type { FilterDocument } from './types.js';

// No flattening: and(and(a, b)) stays nested.

/** @example and(ne('price', 1.99), exists('price')) */
export function and(...filters: FilterDocument[]): FilterDocument {
  return { $and: [...filters] };
}

/** @example or(lt('quantity', 20), eq('price', 10)) */
export function or(...filters: FilterDocument[]): FilterDocument {
  return { $or: [...filters] };
}

/** @example nor(eq('price', 1.99), lt('qty', 20), eq('sale', true)) */
export function nor(...filters: FilterDocument[]): FilterDocument {
  return { $nor: [...filters] };
}

import type { FilterDocument, StructuredObject, StructuredValue } from './query/types.js';

export interface QueryOptions {
  /** Number of matching documents to skip. Default 0. */
  offset?: number;
  /** Maximum number of documents; 0 means no limit. Default 0. */
  limit?: number;
  /** Sort specification, e.g. `{ createdAt: -1 }`. Defaults to the DAO's `defaultSortBy`. */
  sortBy?: FilterDocument;
}

export type FindOneOptions = Omit<QueryOptions, 'limit'>;

/**
 * CRUD access to one collection, keyed by `Id` and holding `E`.
 * Methods that return a single previous document resolve to `null` when
 * nothing matched.
 */
export interface Dao<Id, E> {
  insert(entity: E): Promise<void>;
  insertMany(entities: readonly E[]): Promise<void>;

  findOneBy(filter: FilterDocument, options?: FindOneOptions): Promise<E | null>;
  findBy(filter: FilterDocument, options?: QueryOptions): Promise<E[]>;
  findAll(options?: QueryOptions): Promise<E[]>;
  getById(id: Id): Promise<E>;
  findById(id: Id): Promise<E | null>;
  findByIdsIn(ids: readonly Id[], options?: QueryOptions): Promise<E[]>;
  findByIdsOr(ids: readonly Id[], options?: QueryOptions): Promise<E[]>;

  updateById(id: Id, update: StructuredObject, upsert?: boolean): Promise<E | null>;
  updateBy(filter: FilterDocument, update: StructuredObject, upsert?: boolean): Promise<E | null>;

  replaceById(id: Id, entity: E, upsert?: boolean): Promise<E | null>;
  createOrReplaceById(id: Id, entity: E): Promise<E | null>;
  replaceOrInsertById(id: Id, entity: E): Promise<E | null>;
  replaceBy(filter: FilterDocument, entity: E, upsert?: boolean): Promise<E | null>;
  createOrReplaceBy(filter: FilterDocument, entity: E): Promise<E | null>;

  deleteById(id: Id): Promise<E | null>;
  deleteByIds(ids: readonly Id[]): Promise<number>;
  deleteBy(filter: FilterDocument): Promise<number>;

  count(filter?: FilterDocument): Promise<number>;
  distinct(fieldName: string, filter?: FilterDocument): Promise<StructuredValue[]>;
  aggregate(pipeline: readonly StructuredObject[]): Promise<StructuredObject[]>;
}

import type { Collection, Document } from 'mongodb';
import type { DaoProtocol } from '../codec.js';
import { DaoError, EntityNotFoundError, InvalidArgumentError } from '../errors.js';
import { logger as rootLogger } from '../logger.js';
import type { Logger } from '../logger.js';
import { asExpanded } from '../query/expand.js';
import { or } from '../query/logical.js';
import { toNativeFilter, toStructuredValue } from '../query/native.js';
import { eq, inSet } from '../query/operators.js';
import type { FilterDocument, StructuredObject, StructuredValue } from '../query/types.js';
import type { Dao, FindOneOptions, QueryOptions } from '../types.js';
import { toDocument, toEntities, toEntity, toStructuredObjects } from './documents.js';

export interface MongoDaoConfig<Id, E> {
  collection: Collection<Document>;
  protocol: DaoProtocol<Id, E>;
  /** Field holding the identifier: `_id`, `id`, `key`, … Default `_id`. */
  primaryKey?: string;
  /** Strip null-valued fields before writing. Default true. */
  skipNull?: boolean;
  defaultSortBy?: FilterDocument;
  logger?: Logger;
}

interface ResolvedConfig {
  primaryKey: string;
  skipNull: boolean;
  defaultSortBy: FilterDocument;
}

export class MongoDao<Id, E> implements Dao<Id, E> {
  protected readonly collection: Collection<Document>;
  protected readonly protocol: DaoProtocol<Id, E>;
  protected readonly log: Logger;
  private readonly resolved: ResolvedConfig;

  constructor(config: MongoDaoConfig<Id, E>) {
    this.collection = config.collection;
    this.protocol = config.protocol;
    this.resolved = {
      primaryKey: config.primaryKey ?? '_id',
      skipNull: config.skipNull ?? true,
      defaultSortBy: config.defaultSortBy ?? {},
    };
    this.log = (config.logger ?? rootLogger).child({ collection: config.collection.collectionName });
  }

  get primaryKey(): string {
    return this.resolved.primaryKey;
  }

  async insert(entity: E): Promise<void> {
    const doc = this.encode(entity);
    this.log.trace({ document: doc }, 'insertOne');
    await this.run('insert document', () => this.collection.insertOne(doc));
  }

  async insertMany(entities: readonly E[]): Promise<void> {
    // The driver rejects an empty batch.
    if (entities.length === 0) return;
    const docs = entities.map((e) => this.encode(e));
    this.log.trace({ count: docs.length }, 'insertMany');
    await this.run('insert documents', () => this.collection.insertMany(docs));
  }

  async findOneBy(filter: FilterDocument, options: FindOneOptions = {}): Promise<E | null> {
    const [first] = await this.findBy(filter, { ...options, limit: 1 });
    return first ?? null;
  }

  async findBy(filter: FilterDocument, options: QueryOptions = {}): Promise<E[]> {
    const docs = await this.internalFindBy(filter, options);
    return toEntities(docs, this.protocol.entity);
  }

  async findAll(options: QueryOptions = {}): Promise<E[]> {
    return this.findBy({}, options);
  }

  async getById(id: Id): Promise<E> {
    const found = await this.findById(id);
    if (found === null) {
      throw new EntityNotFoundError(this.collection.collectionName, this.protocol.id.encode(id));
    }
    return found;
  }

  async findById(id: Id): Promise<E | null> {
    return this.findOneBy(this.idFilter(id));
  }

  /**
   * `{ pk: { $in: [...] } }`. Object ids are compared as whole documents here,
   * so field order matters; use {@link findByIdsOr} for composite ids.
   */
  async findByIdsIn(ids: readonly Id[], options: QueryOptions = {}): Promise<E[]> {
    const [only] = ids;
    if (only === undefined) return [];
    if (ids.length === 1) return this.listOf(await this.findById(only));
    const filter = inSet(this.primaryKey, ...ids.map((id) => this.protocol.id.encode(id)));
    return this.findBy(filter, options);
  }

  /** `$or` of expanded ids, matching composite ids field by field. */
  async findByIdsOr(ids: readonly Id[], options: QueryOptions = {}): Promise<E[]> {
    const [only] = ids;
    if (only === undefined) return [];
    if (ids.length === 1) return this.listOf(await this.findById(only));
    const filter = or(
      ...ids.map((id) => this.requireFields(id, asExpanded(id, this.protocol.id, this.primaryKey))),
    );
    return this.findBy(filter, options);
  }

  // Both return the document as it was before the update.

  async updateById(id: Id, update: StructuredObject, upsert = false): Promise<E | null> {
    return this.updateBy(this.idFilter(id), update, upsert);
  }

  async updateBy(filter: FilterDocument, update: StructuredObject, upsert = false): Promise<E | null> {
    const nativeFilter = toNativeFilter(filter);
    const nativeUpdate = toNativeFilter(update);
    this.log.trace({ filter: nativeFilter, update: nativeUpdate, upsert }, 'findOneAndUpdate');
    const before = await this.run('update document', () =>
      this.collection.findOneAndUpdate(nativeFilter, nativeUpdate, { upsert, returnDocument: 'before' }),
    );
    return before === null ? null : toEntity(before, this.protocol.entity);
  }

  async replaceById(id: Id, entity: E, upsert = false): Promise<E | null> {
    return this.replaceBy(this.idFilter(id), entity, upsert);
  }

  async createOrReplaceById(id: Id, entity: E): Promise<E | null> {
    return this.replaceById(id, entity, true);
  }

  /**
   * Not atomic: replaces without upsert and inserts when nothing was
   * replaced. Upserting with a dotted `_id` filter is rejected by the
   * server, which rules out a single call for composite ids.
   *
   * @returns the previous entity, or null when a new document was inserted
   */
  async replaceOrInsertById(id: Id, entity: E): Promise<E | null> {
    const before = await this.replaceById(id, entity);
    if (before !== null) return before;
    await this.insert(entity);
    return null;
  }

  async replaceBy(filter: FilterDocument, entity: E, upsert = false): Promise<E | null> {
    const nativeFilter = toNativeFilter(filter);
    const replacement = this.encode(entity);
    this.log.trace({ filter: nativeFilter, upsert }, 'findOneAndReplace');
    const before = await this.run('replace document', () =>
      this.collection.findOneAndReplace(nativeFilter, replacement, { upsert, returnDocument: 'before' }),
    );
    return before === null ? null : toEntity(before, this.protocol.entity);
  }

  async createOrReplaceBy(filter: FilterDocument, entity: E): Promise<E | null> {
    return this.replaceBy(filter, entity, true);
  }

  async deleteById(id: Id): Promise<E | null> {
    const nativeFilter = toNativeFilter(this.idFilter(id));
    this.log.trace({ filter: nativeFilter }, 'findOneAndDelete');
    const deleted = await this.run('delete document', () => this.collection.findOneAndDelete(nativeFilter));
    return deleted === null ? null : toEntity(deleted, this.protocol.entity);
  }

  async deleteByIds(ids: readonly Id[]): Promise<number> {
    if (ids.length === 0) return 0;
    return this.deleteBy(inSet(this.primaryKey, ...ids.map((id) => this.protocol.id.encode(id))));
  }

  async deleteBy(filter: FilterDocument): Promise<number> {
    const nativeFilter = toNativeFilter(filter);
    this.log.trace({ filter: nativeFilter }, 'deleteMany');
    const result = await this.run('delete documents', () => this.collection.deleteMany(nativeFilter));
    return result.deletedCount;
  }

  async count(filter: FilterDocument = {}): Promise<number> {
    const nativeFilter = toNativeFilter(filter);
    this.log.trace({ filter: nativeFilter }, 'countDocuments');
    return this.run('count documents', () => this.collection.countDocuments(nativeFilter));
  }

  async distinct(fieldName: string, filter: FilterDocument = {}): Promise<StructuredValue[]> {
    const nativeFilter = toNativeFilter(filter);
    this.log.trace({ field: fieldName, filter: nativeFilter }, 'distinct');
    const values: unknown[] = await this.run('read distinct values', () =>
      this.collection.distinct(fieldName, nativeFilter),
    );
    return values.map((value) => toStructuredValue(value));
  }

  async aggregate(pipeline: readonly StructuredObject[]): Promise<StructuredObject[]> {
    const stages = pipeline.map((stage) => toNativeFilter(stage));
    this.log.trace({ pipeline: stages }, 'aggregate');
    const docs = await this.run('aggregate documents', () => this.collection.aggregate(stages).toArray());
    return toStructuredObjects(docs);
  }

  protected idFilter(id: Id): FilterDocument {
    return this.requireFields(id, eq(this.primaryKey, this.protocol.id.encode(id)));
  }

  // An id that expands to `{}` would match every document.
  private requireFields(id: Id, filter: FilterDocument): FilterDocument {
    if (Object.keys(filter).length === 0) {
      const encoded = this.protocol.id.encode(id);
      throw new InvalidArgumentError('id', `Id ${JSON.stringify(encoded)} does not select any field`);
    }
    return filter;
  }

  protected async internalFindBy(filter: FilterDocument, options: QueryOptions): Promise<Document[]> {
    const nativeFilter = toNativeFilter(filter);
    const sort = toNativeFilter(options.sortBy ?? this.resolved.defaultSortBy);
    const offset = options.offset ?? 0;
    const limit = options.limit ?? 0;
    this.log.trace({ filter: nativeFilter, offset, limit, sort }, 'find');
    return this.run('find documents', () =>
      this.collection.find(nativeFilter).skip(offset).limit(limit).sort(sort).toArray(),
    );
  }

  private encode(entity: E): Document {
    return toDocument(entity, this.protocol.entity, this.resolved.skipNull);
  }

  private listOf(entity: E | null): E[] {
    return entity === null ? [] : [entity];
  }

  private async run<T>(operation: string, call: () => Promise<T>): Promise<T> {
    try {
      return await call();
    } catch (err) {
      throw new DaoError(`Failed to ${operation} in "${this.collection.collectionName}": ${String(err)}`, err);
    }
  }
}

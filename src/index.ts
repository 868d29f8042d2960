export type { StructuredValue, StructuredObject, FilterDocument } from './query/types.js';
export { isOperatorKey, isStructuredObject } from './query/types.js';
export { expand, expandOperator, mergeFilters, asExpanded } from './query/expand.js';
export {
  eq,
  ne,
  gt,
  gte,
  lt,
  lte,
  inSet,
  notInSet,
  exists,
  regex,
  all,
  elemMatch,
  size,
  not,
} from './query/operators.js';
export { and, or, nor } from './query/logical.js';
export { field, FieldExpression } from './query/field.js';
export { toNativeFilter, toStructuredValue, toFilterDocument } from './query/native.js';
export type { EntityCodec, DaoProtocol } from './codec.js';
export { encodeValue, passthroughCodec, stringCodec, numberCodec } from './codec.js';
export type { Dao, QueryOptions, FindOneOptions } from './types.js';
export { MongoDao } from './dao/mongo-dao.js';
export type { MongoDaoConfig } from './dao/mongo-dao.js';
export type { ConnectionConfig } from './config.js';
export { loadConnectionConfig, createMongoClient, getDatabase } from './config.js';
export type { Logger, LoggerOptions } from './logger.js';
export { createLogger, logger } from './logger.js';
export {
  InvalidArgumentError,
  ShapeMismatchError,
  DecodeError,
  EntityNotFoundError,
  DaoError,
} from './errors.js';

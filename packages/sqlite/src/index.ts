/**
 * @shelfdb/sqlite
 *
 * SQLite-backed persistent key-value store with a shared writer connection
 */

export { ShelfStore, openStore } from './store';
export type { ExecuteResult, StoreInit } from './store';

export { SharedConnection } from './connection';
export type { CheckpointMode, CheckpointResult } from './connection';
export { SqliteBackend } from './backend';
export { WriterLock } from './lock';
export { TransactionManager } from './transaction';
export type { TransactionState } from './transaction';

export { QueryBuilder, executeRead } from './query';
export type { QueryOptions, BuiltQuery, Row, SqlParameters, ClausePolicy } from './query';

export {
  storeOptionsShape,
  storeOptionsSchema,
  refineCachePolicy,
  parseStoreOptions,
  parseWithSchema,
  resolveHooks,
  toEvictionPolicy,
} from './options';
export type { ShelfStoreOptions, StoreConfig, StoreHooks, ResolvedHooks } from './options';

export { resolveTarget } from './target';
export type { StoreTarget } from './target';

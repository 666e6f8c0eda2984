/**
 * @shelfdb/async
 *
 * Promise-based access to a shelfdb store through a bounded worker pool,
 * with optional read-only connections for queries
 */

export { AsyncShelfStore, openAsyncStore } from './async-store';
export type { CallOptions, GetOptions } from './async-store';

export { WorkerPool, abortError, raceAbort } from './worker-pool';
export type { RunOptions } from './worker-pool';
export { ReadConnectionPool } from './read-pool';

export { asyncStoreOptionsSchema, parseAsyncStoreOptions } from './options';
export type { AsyncShelfStoreOptions, AsyncStoreConfig } from './options';

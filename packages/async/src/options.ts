import { z } from 'zod';
import {
  parseWithSchema,
  refineCachePolicy,
  storeOptionsShape,
  type StoreHooks,
} from '@shelfdb/sqlite';

export const asyncStoreOptionsSchema = storeOptionsShape
  .extend({
    workerCount: z.number().int().positive().default(5),
    readPoolSize: z.number().int().nonnegative().default(0),
  })
  .superRefine(refineCachePolicy);

export type AsyncStoreConfig = z.output<typeof asyncStoreOptionsSchema>;

export type AsyncShelfStoreOptions = z.input<typeof asyncStoreOptionsSchema> & StoreHooks;

export function parseAsyncStoreOptions(options: AsyncShelfStoreOptions = {}): AsyncStoreConfig {
  return parseWithSchema(asyncStoreOptionsSchema, options);
}

import { z } from 'zod';
import {
  ValidationError,
  consoleLogger,
  jsonCodec,
  type EvictionPolicy,
  type Logger,
  type ValueCipher,
  type ValueCodec,
} from '@shelfdb/core';

/**
 * Data options shared by the sync store and the async bridge.
 * Kept as a plain object so the async package can extend it.
 */
export const storeOptionsShape = z.object({
  table: z.string().default('data'),
  bulkPreload: z.boolean().default(false),
  cacheStrategy: z.enum(['unbounded', 'lru', 'ttl']).default('unbounded'),
  cacheCapacity: z.number().int().positive().optional(),
  cacheTtlMs: z.number().positive().optional(),
  cacheCascadeDelete: z.boolean().default(false),
  cacheSweepIntervalMs: z.number().int().positive().optional(),
  strictValidation: z.boolean().default(true),
  allowedFunctions: z.array(z.string()).default([]),
  forbiddenFunctions: z.array(z.string()).default([]),
  maxClauseLength: z.number().int().positive().nullable().default(1000),
  optimize: z.boolean().default(true),
  cacheSizeMb: z.number().int().positive().default(64),
  busyTimeoutMs: z.number().int().nonnegative().optional(),
});

type CacheFields = {
  cacheStrategy: 'unbounded' | 'lru' | 'ttl';
  cacheCapacity?: number;
  cacheTtlMs?: number;
};

/**
 * LRU needs a capacity, TTL needs a duration
 */
export function refineCachePolicy(options: CacheFields, ctx: z.RefinementCtx): void {
  if (options.cacheStrategy === 'lru' && options.cacheCapacity === undefined) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['cacheCapacity'],
      message: "cacheCapacity is required when cacheStrategy is 'lru'",
    });
  }
  if (options.cacheStrategy === 'ttl' && options.cacheTtlMs === undefined) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['cacheTtlMs'],
      message: "cacheTtlMs is required when cacheStrategy is 'ttl'",
    });
  }
}

export const storeOptionsSchema = storeOptionsShape.superRefine(refineCachePolicy);

export type StoreConfig = z.output<typeof storeOptionsSchema>;

/**
 * Collaborator hooks. Not validated by the schema.
 */
export interface StoreHooks {
  logger?: Logger; // Default: consoleLogger
  codec?: ValueCodec; // Default: JSON
  cipher?: ValueCipher;
}

export type ResolvedHooks = Required<Omit<StoreHooks, 'cipher'>> & Pick<StoreHooks, 'cipher'>;

export type ShelfStoreOptions = z.input<typeof storeOptionsSchema> & StoreHooks;

/**
 * Parse raw options with any zod schema, turning issues into a ValidationError
 */
export function parseWithSchema<S extends z.ZodTypeAny>(schema: S, options: unknown): z.output<S> {
  const result = schema.safeParse(options);
  if (!result.success) {
    const violations = result.error.issues.map(
      (issue) => `${issue.path.join('.') || 'options'}: ${issue.message}`
    );
    throw new ValidationError(`Invalid store options: ${violations.join('; ')}`, violations);
  }
  return result.data;
}

export function resolveHooks(hooks: StoreHooks): ResolvedHooks {
  return {
    logger: hooks.logger ?? consoleLogger,
    codec: hooks.codec ?? jsonCodec,
    cipher: hooks.cipher,
  };
}

export function parseStoreOptions(options: ShelfStoreOptions = {}): {
  config: StoreConfig;
  hooks: ResolvedHooks;
} {
  return {
    config: parseWithSchema(storeOptionsSchema, options),
    hooks: resolveHooks(options),
  };
}

export function toEvictionPolicy(config: StoreConfig): EvictionPolicy {
  switch (config.cacheStrategy) {
    case 'unbounded':
      return { kind: 'unbounded' };
    case 'lru':
      return { kind: 'lru', capacity: config.cacheCapacity ?? 1 };
    case 'ttl':
      return {
        kind: 'ttl',
        ttlMs: config.cacheTtlMs ?? 0,
        cascadeDelete: config.cacheCascadeDelete,
      };
  }
}

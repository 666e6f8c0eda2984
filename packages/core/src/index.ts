/**
 * @shelfdb/core
 *
 * Cache namespaces, clause validation, errors and logging shared by the
 * shelfdb packages
 */

// Types
export * from './types';
export * from './cache/types';
export * from './errors';
export * from './logger';

// Cache store
export { CacheNamespace } from './cache/namespace';
export type { CacheNamespaceConfig } from './cache/namespace';

// Clause validation
export {
  validateExpression,
  validateIdentifier,
  quoteIdentifier,
  DEFAULT_MAX_CLAUSE_LENGTH,
} from './validator/expression';
export type { ExpressionValidationOptions } from './validator/expression';
export { DEFAULT_ALLOWED_FUNCTIONS, type ClauseContext } from './validator/keywords';

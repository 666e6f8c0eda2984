/**
 * Keyword and function tables used by the clause validator.
 * All entries are upper case.
 */

export type ClauseContext = 'columns' | 'where' | 'orderBy' | 'groupBy';

/**
 * Statement-level words that never belong inside a single clause
 */
export const STATEMENT_KEYWORDS: ReadonlySet<string> = new Set([
  'SELECT', 'INSERT', 'UPDATE', 'DELETE', 'DROP', 'CREATE', 'ALTER',
  'ATTACH', 'DETACH', 'PRAGMA', 'VACUUM', 'REPLACE', 'UNION', 'INTERSECT',
  'EXCEPT', 'REINDEX', 'ANALYZE', 'TRUNCATE', 'GRANT', 'REVOKE', 'EXEC',
  'EXECUTE', 'BEGIN', 'COMMIT', 'ROLLBACK', 'SAVEPOINT', 'RELEASE', 'INTO',
  'FROM', 'JOIN', 'WHERE', 'HAVING', 'LIMIT', 'OFFSET', 'VALUES',
  // The builder adds GROUP BY and ORDER BY itself
  'GROUP', 'ORDER', 'BY', 'WINDOW',
]);

/**
 * Words accepted in any expression position
 */
export const EXPRESSION_KEYWORDS: ReadonlySet<string> = new Set([
  'AND', 'OR', 'NOT', 'IN', 'IS', 'NULL', 'LIKE', 'GLOB', 'ESCAPE', 'BETWEEN',
  'CASE', 'WHEN', 'THEN', 'ELSE', 'END', 'CAST', 'COLLATE', 'TRUE', 'FALSE',
  'CURRENT_DATE', 'CURRENT_TIME', 'CURRENT_TIMESTAMP',
]);

/**
 * Words that are only valid in some clause kinds
 */
export const CONTEXT_KEYWORDS: Readonly<Record<string, readonly ClauseContext[]>> = {
  ASC: ['orderBy'],
  DESC: ['orderBy'],
  NULLS: ['orderBy'],
  AS: ['columns', 'where'],
  DISTINCT: ['columns'],
};

export const DEFAULT_ALLOWED_FUNCTIONS: ReadonlySet<string> = new Set([
  'COUNT', 'SUM', 'AVG', 'MIN', 'MAX', 'TOTAL', 'GROUP_CONCAT',
  'ABS', 'ROUND', 'LENGTH', 'LOWER', 'UPPER', 'TRIM', 'LTRIM', 'RTRIM',
  'SUBSTR', 'SUBSTRING', 'INSTR', 'COALESCE', 'IFNULL', 'NULLIF', 'TYPEOF',
  'DATE', 'TIME', 'DATETIME', 'JULIANDAY', 'STRFTIME',
  'JSON_EXTRACT', 'JSON_TYPE', 'JSON_ARRAY_LENGTH',
]);

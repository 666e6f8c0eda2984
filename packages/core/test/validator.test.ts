import { describe, it, expect, vi } from 'vitest';
import {
  ValidationError,
  quoteIdentifier,
  validateExpression,
  validateIdentifier,
  type Logger,
} from '../src';

function violationsOf(fn: () => unknown): string[] {
  try {
    fn();
  } catch (error) {
    if (error instanceof ValidationError) return error.violations;
    throw error;
  }
  return [];
}

describe('validateExpression', () => {
  it('accepts ordinary filters', () => {
    expect(validateExpression("age > ? AND name LIKE 'a%'", { context: 'where' })).toEqual([]);
    expect(validateExpression('CAST(score AS INTEGER) >= :min', { context: 'where' })).toEqual([]);
    expect(validateExpression('lower(name) IS NOT NULL', { context: 'where' })).toEqual([]);
  });

  it('ignores keywords inside string literals', () => {
    expect(validateExpression("note = 'DROP TABLE users; --'", { context: 'where' })).toEqual([]);
  });

  it('rejects stacked statements', () => {
    expect(() => validateExpression('1=1; DROP TABLE users', { context: 'where' })).toThrow(
      "Invalid where clause: Statement separator ';' is not allowed; Keyword 'DROP' is not allowed in a where clause"
    );
  });

  it('rejects comment markers', () => {
    expect(violationsOf(() => validateExpression("name = 'x' -- trailing", { context: 'where' }))).toEqual([
      "Comment marker '--' is not allowed",
    ]);
    expect(violationsOf(() => validateExpression('a = 1 /* hidden */', { context: 'where' }))).toEqual([
      "Comment marker '/*' is not allowed",
      "Comment marker '*/' is not allowed",
    ]);
  });

  it('rejects sub-selects', () => {
    expect(violationsOf(() => validateExpression('key IN (SELECT key FROM secrets)', { context: 'where' }))).toEqual([
      "Keyword 'SELECT' is not allowed in a where clause",
      "Keyword 'FROM' is not allowed in a where clause",
    ]);
  });

  it('checks context-specific keywords', () => {
    expect(validateExpression('key DESC NULLS LAST', { context: 'orderBy' })).toEqual([]);
    expect(violationsOf(() => validateExpression('key ASC', { context: 'where' }))).toEqual([
      "Keyword 'ASC' is not valid in a where clause",
    ]);
    expect(violationsOf(() => validateExpression('DISTINCT key', { context: 'groupBy' }))).toEqual([
      "Keyword 'DISTINCT' is not valid in a group by clause",
    ]);
  });

  it('allows default functions and rejects unknown ones', () => {
    expect(validateExpression('count(*)', { context: 'columns' })).toEqual([]);
    expect(violationsOf(() => validateExpression("load_extension('x')", { context: 'columns' }))).toEqual([
      "Function 'LOAD_EXTENSION' is not allowed",
    ]);
  });

  it('extends, overrides and forbids functions', () => {
    expect(validateExpression('hex(value)', { context: 'columns', allowedFunctions: ['hex'] })).toEqual([]);
    expect(
      violationsOf(() => validateExpression('upper(value)', { context: 'columns', forbiddenFunctions: ['upper'] }))
    ).toEqual(["Function 'UPPER' is forbidden"]);
    expect(
      violationsOf(() =>
        validateExpression('count(*)', { context: 'columns', overrideAllowed: true, allowedFunctions: ['hex'] })
      )
    ).toEqual(["Function 'COUNT' is not allowed"]);
  });

  it('checks quoted names used as functions', () => {
    expect(
      violationsOf(() =>
        validateExpression('"randomblob"(4)', { context: 'columns', forbiddenFunctions: ['randomblob'] })
      )
    ).toEqual(["Function 'RANDOMBLOB' is forbidden"]);
    expect(violationsOf(() => validateExpression('[hex](key)', { context: 'columns' }))).toEqual([
      "Function 'HEX' is not allowed",
    ]);
    expect(violationsOf(() => validateExpression('`hex`(key)', { context: 'columns' }))).toEqual([
      "Function 'HEX' is not allowed",
    ]);
    expect(validateExpression('"lower"(name)', { context: 'where' })).toEqual([]);
    expect(validateExpression('"order" = 1', { context: 'where' })).toEqual([]);
  });

  it('rejects clauses that open another clause', () => {
    expect(
      violationsOf(() => validateExpression('key = 1 GROUP BY value ORDER BY key', { context: 'where' }))
    ).toEqual([
      "Keyword 'GROUP' is not allowed in a where clause",
      "Keyword 'BY' is not allowed in a where clause",
      "Keyword 'ORDER' is not allowed in a where clause",
      "Keyword 'BY' is not allowed in a where clause",
    ]);
    expect(violationsOf(() => validateExpression('key ORDER BY value', { context: 'groupBy' }))).toEqual([
      "Keyword 'ORDER' is not allowed in a group by clause",
      "Keyword 'BY' is not allowed in a group by clause",
    ]);
  });

  it('reports unterminated literals and stray characters', () => {
    expect(violationsOf(() => validateExpression("name = 'abc", { context: 'where' }))).toEqual([
      'Unterminated string literal',
    ]);
    expect(violationsOf(() => validateExpression('a = {1}', { context: 'where' }))).toEqual([
      "Unexpected character '{'",
      "Unexpected character '}'",
    ]);
  });

  it('enforces the length bound even when not strict', () => {
    const long = `key = '${'x'.repeat(1000)}'`;
    expect(() => validateExpression(long, { context: 'where', strict: false })).toThrow(
      'Clause exceeds maximum length of 1000 characters'
    );
    expect(() => validateExpression('key = 1', { context: 'where', maxLength: 3 })).toThrow(
      'Clause exceeds maximum length of 3 characters'
    );
    expect(validateExpression(long, { context: 'where', maxLength: null })).toEqual([]);
  });

  it('logs and returns violations when not strict', () => {
    const logger: Logger = { warn: vi.fn(), error: vi.fn() };
    const violations = validateExpression('key ASC', { context: 'where', strict: false, logger });

    expect(violations).toEqual(["Keyword 'ASC' is not valid in a where clause"]);
    expect(logger.warn).toHaveBeenCalledWith(
      "Unvalidated where clause accepted: Keyword 'ASC' is not valid in a where clause"
    );
  });
});

describe('identifiers', () => {
  it('accepts plain identifiers', () => {
    expect(validateIdentifier('user_settings')).toBe('user_settings');
  });

  it('rejects anything else', () => {
    expect(() => validateIdentifier('bad name', 'table name')).toThrow("Invalid table name: 'bad name'");
    expect(() => validateIdentifier('x;drop')).toThrow("Invalid identifier: 'x;drop'");
    expect(() => validateIdentifier('1abc')).toThrow(ValidationError);
  });

  it('quotes identifiers', () => {
    expect(quoteIdentifier('group')).toBe('"group"');
    expect(quoteIdentifier('a"b')).toBe('"a""b"');
  });
});

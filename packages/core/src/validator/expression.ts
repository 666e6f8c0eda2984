import { ValidationError } from '../errors';
import type { Logger } from '../logger';
import { consoleLogger } from '../logger';
import {
  CONTEXT_KEYWORDS,
  DEFAULT_ALLOWED_FUNCTIONS,
  EXPRESSION_KEYWORDS,
  STATEMENT_KEYWORDS,
  type ClauseContext,
} from './keywords';

export interface ExpressionValidationOptions {
  context: ClauseContext;
  allowedFunctions?: Iterable<string>; // Added to the defaults
  forbiddenFunctions?: Iterable<string>; // Always rejected, even if allowed
  /**
   * Replace the default allow-list with `allowedFunctions` only
   */
  overrideAllowed?: boolean;
  maxLength?: number | null; // Default: 1000, null disables the bound
  strict?: boolean; // Default: true
  logger?: Logger; // Receives violations in non-strict mode
}

export const DEFAULT_MAX_CLAUSE_LENGTH = 1000;

type Token =
  | { kind: 'word'; text: string }
  | { kind: 'quoted'; text: string } // Unquoted name
  | { kind: 'string' }
  | { kind: 'number' }
  | { kind: 'param' }
  | { kind: 'punct'; text: string };

const CONTEXT_LABELS: Record<ClauseContext, string> = {
  columns: 'column list',
  where: 'where',
  orderBy: 'order by',
  groupBy: 'group by',
};

const IDENTIFIER_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

/**
 * Validate a caller-supplied clause fragment.
 *
 * The length bound is checked before anything else and always throws.
 * Other problems are collected as violations: strict mode throws a
 * ValidationError listing them, non-strict mode logs each one and
 * returns the list.
 */
export function validateExpression(fragment: string, options: ExpressionValidationOptions): string[] {
  const maxLength = options.maxLength === undefined ? DEFAULT_MAX_CLAUSE_LENGTH : options.maxLength;
  if (maxLength !== null && fragment.length > maxLength) {
    throw new ValidationError(`Clause exceeds maximum length of ${maxLength} characters`, [
      `length ${fragment.length} > ${maxLength}`,
    ]);
  }

  const label = CONTEXT_LABELS[options.context];
  const { tokens, violations } = tokenize(fragment);

  const allowed = new Set<string>(options.overrideAllowed ? [] : DEFAULT_ALLOWED_FUNCTIONS);
  for (const name of options.allowedFunctions ?? []) allowed.add(name.toUpperCase());
  const forbidden = new Set<string>();
  for (const name of options.forbiddenFunctions ?? []) forbidden.add(name.toUpperCase());

  const checkCall = (name: string) => {
    if (forbidden.has(name)) {
      violations.push(`Function '${name}' is forbidden`);
    } else if (!allowed.has(name)) {
      violations.push(`Function '${name}' is not allowed`);
    }
  };

  tokens.forEach((token, index) => {
    const next = tokens[index + 1];
    const isCall = next?.kind === 'punct' && next.text === '(';

    // SQLite resolves a quoted name followed by '(' as a function call
    if (token.kind === 'quoted') {
      if (isCall) checkCall(token.text.toUpperCase());
      return;
    }
    if (token.kind !== 'word') return;

    const word = token.text.toUpperCase();
    const previous = tokens[index - 1];
    const isQualifiedName = previous?.kind === 'punct' && previous.text === '.';

    if (STATEMENT_KEYWORDS.has(word)) {
      violations.push(`Keyword '${word}' is not allowed in a ${label} clause`);
      return;
    }

    const contexts = CONTEXT_KEYWORDS[word];
    if (contexts) {
      if (!contexts.includes(options.context)) {
        violations.push(`Keyword '${word}' is not valid in a ${label} clause`);
      }
      return;
    }

    if (!isCall || isQualifiedName || EXPRESSION_KEYWORDS.has(word)) return;
    checkCall(word);
  });

  if (violations.length > 0) {
    if (options.strict ?? true) {
      throw new ValidationError(`Invalid ${label} clause: ${violations.join('; ')}`, violations);
    }
    const logger = options.logger ?? consoleLogger;
    for (const violation of violations) {
      logger.warn(`Unvalidated ${label} clause accepted: ${violation}`);
    }
  }

  return violations;
}

/**
 * Accept only plain identifiers for table and column names
 */
export function validateIdentifier(name: string, kind = 'identifier'): string {
  if (!IDENTIFIER_PATTERN.test(name)) {
    throw new ValidationError(`Invalid ${kind}: '${name}'`, [
      `${kind} must match ${IDENTIFIER_PATTERN.source}`,
    ]);
  }
  return name;
}

export function quoteIdentifier(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

function tokenize(fragment: string): { tokens: Token[]; violations: string[] } {
  const tokens: Token[] = [];
  const violations: string[] = [];
  let i = 0;

  while (i < fragment.length) {
    const ch = fragment[i];
    const pair = fragment.slice(i, i + 2);

    if (/\s/.test(ch)) {
      i++;
      continue;
    }

    if (ch === ';') {
      violations.push(`Statement separator ';' is not allowed`);
      i++;
      continue;
    }

    if (pair === '--' || pair === '/*' || pair === '*/') {
      violations.push(`Comment marker '${pair}' is not allowed`);
      i += 2;
      continue;
    }

    if (ch === "'") {
      const end = findClosing(fragment, i, "'");
      if (end === -1) {
        violations.push('Unterminated string literal');
        break;
      }
      tokens.push({ kind: 'string' });
      i = end + 1;
      continue;
    }

    if (ch === '"' || ch === '`' || ch === '[') {
      const closing = ch === '[' ? ']' : ch;
      const end = findClosing(fragment, i, closing);
      if (end === -1) {
        violations.push('Unterminated quoted identifier');
        break;
      }
      const inner = fragment.slice(i + 1, end);
      const text = closing === ']' ? inner : inner.split(closing + closing).join(closing);
      tokens.push({ kind: 'quoted', text });
      i = end + 1;
      continue;
    }

    const word = /^[A-Za-z_][A-Za-z0-9_$]*/.exec(fragment.slice(i));
    if (word) {
      tokens.push({ kind: 'word', text: word[0] });
      i += word[0].length;
      continue;
    }

    const number = /^(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?/.exec(fragment.slice(i));
    if (number) {
      tokens.push({ kind: 'number' });
      i += number[0].length;
      continue;
    }

    const param = /^(\?\d*|[:@$][A-Za-z_][A-Za-z0-9_]*)/.exec(fragment.slice(i));
    if (param) {
      tokens.push({ kind: 'param' });
      i += param[0].length;
      continue;
    }

    const operator = /^(<=|>=|==|!=|<>|<<|>>|\|\||[=<>+\-*/%&|~.,()])/.exec(fragment.slice(i));
    if (operator) {
      tokens.push({ kind: 'punct', text: operator[0] });
      i += operator[0].length;
      continue;
    }

    violations.push(`Unexpected character '${ch}'`);
    i++;
  }

  return { tokens, violations };
}

/**
 * Index of the closing quote, honouring doubled-quote escapes
 */
function findClosing(text: string, start: number, quote: string): number {
  let i = start + 1;
  while (i < text.length) {
    if (text[i] === quote) {
      if (quote !== ']' && text[i + 1] === quote) {
        i += 2;
        continue;
      }
      return i;
    }
    i++;
  }
  return -1;
}

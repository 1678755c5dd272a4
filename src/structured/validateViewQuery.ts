/**
 * Whitelist validation for generated view queries.
 * A query passes only if it is a single SELECT over exactly one known view
 * and every identifier it uses is a permitted keyword, a permitted function,
 * a column of that view, or an alias the query itself declares.
 */

import { QueryGenerationError } from '../errors.js';
import type { StructuredView } from '../types/models.js';

const MAX_QUERY_LENGTH = 2000;

const KEYWORDS = new Set([
  'SELECT', 'FROM', 'WHERE', 'AND', 'OR', 'NOT', 'AS', 'GROUP', 'BY',
  'ORDER', 'ASC', 'DESC', 'LIMIT', 'OFFSET', 'BETWEEN', 'IN', 'LIKE',
  'IS', 'NULL', 'DISTINCT', 'HAVING', 'CASE', 'WHEN', 'THEN', 'ELSE',
  'END', 'TRUE', 'FALSE', 'NULLS', 'FIRST', 'LAST',
]);

const FUNCTIONS = new Set([
  'COUNT', 'SUM', 'AVG', 'MIN', 'MAX', 'ROUND', 'LOWER', 'UPPER',
  'LENGTH', 'SUBSTR', 'COALESCE', 'ABS', 'STRFTIME', 'DATE', 'TIME',
  'DATETIME', 'JULIANDAY', 'TRIM',
]);

const FORBIDDEN = new Set([
  'INSERT', 'UPDATE', 'DELETE', 'DROP', 'ALTER', 'CREATE', 'ATTACH',
  'DETACH', 'PRAGMA', 'REPLACE', 'UNION', 'INTERSECT', 'EXCEPT', 'JOIN',
  'INTO', 'VACUUM', 'TRIGGER', 'WITH', 'EXEC', 'EXECUTE', 'GRANT',
  'REVOKE', 'TRUNCATE', 'MERGE', 'CALL', 'COPY', 'RECURSIVE', 'WINDOW',
  'OVER', 'RETURNING', 'VALUES',
]);

type TokenType = 'ident' | 'quoted' | 'string' | 'number' | 'operator' | 'punct' | 'star';

interface Token {
  type: TokenType;
  value: string;
}

export interface ValidatedQuery {
  /** Query text as it will be executed (trailing semicolon removed). */
  query: string;
  /** Canonical name of the single view the query reads. */
  view: string;
  /** Canonical names of the view columns referenced. */
  columns: string[];
}

export function validateViewQuery(
  query: string,
  views: StructuredView[]
): ValidatedQuery {
  const text = query.trim().replace(/;\s*$/, '').trim();
  if (text.length === 0) reject('Query is empty');
  if (text.length > MAX_QUERY_LENGTH) reject('Query is too long');

  const tokens = tokenize(text);
  const upper = (t: Token | undefined) =>
    t && t.type === 'ident' ? t.value.toUpperCase() : '';

  if (upper(tokens[0]) !== 'SELECT') reject('Query must start with SELECT');
  if (tokens.filter((t) => upper(t) === 'SELECT').length !== 1) {
    reject('Subqueries are not allowed');
  }

  const fromPositions = tokens.flatMap((t, i) => (upper(t) === 'FROM' ? [i] : []));
  if (fromPositions.length !== 1) reject('Query must read from exactly one view');

  const fromAt = fromPositions[0];
  const viewToken = tokens[fromAt + 1];
  if (!viewToken || (viewToken.type !== 'ident' && viewToken.type !== 'quoted')) {
    reject('FROM must name a view');
  }
  const view = views.find((v) => sameName(v.name, viewToken.value));
  if (!view) reject(`Unknown view "${viewToken.value}"`);

  // Optional table alias: FROM view [AS] alias
  const tableNames = new Set([view.name.toLowerCase()]);
  const skip = new Set([fromAt, fromAt + 1]);
  let aliasAt = fromAt + 2;
  if (upper(tokens[aliasAt]) === 'AS') {
    skip.add(aliasAt);
    aliasAt++;
  }
  const aliasToken = tokens[aliasAt];
  if (
    aliasToken &&
    aliasToken.type === 'ident' &&
    !KEYWORDS.has(aliasToken.value.toUpperCase()) &&
    !FORBIDDEN.has(aliasToken.value.toUpperCase())
  ) {
    tableNames.add(aliasToken.value.toLowerCase());
    skip.add(aliasAt);
  } else if (skip.has(aliasAt - 1) && upper(tokens[aliasAt - 1]) === 'AS') {
    reject('AS after the view name must be followed by an alias');
  }

  const columnsByName = new Map(view.columns.map((c) => [c.name.toLowerCase(), c.name]));
  const outputAliases = new Set<string>();
  tokens.forEach((t, i) => {
    if (upper(t) === 'AS' && !skip.has(i)) {
      const next = tokens[i + 1];
      if (next && (next.type === 'ident' || next.type === 'quoted')) {
        outputAliases.add(next.value.toLowerCase());
      }
    }
  });

  checkParentheses(tokens);

  const referenced = new Set<string>();
  for (let i = 0; i < tokens.length; i++) {
    const token = tokens[i];
    if (skip.has(i) || (token.type !== 'ident' && token.type !== 'quoted')) continue;

    const name = token.value;
    const key = name.toUpperCase();
    const prev = tokens[i - 1];
    const next = tokens[i + 1];

    if (token.type === 'ident') {
      if (FORBIDDEN.has(key)) reject(`Keyword ${key} is not allowed`);
      if (KEYWORDS.has(key)) continue;
    }

    // Anything called must be a permitted function, whatever else it names.
    if (next?.type === 'punct' && next.value === '(') {
      if (token.type === 'ident' && FUNCTIONS.has(key)) continue;
      reject(`Function "${name}" is not allowed`);
    }

    if (prev && upper(prev) === 'AS') continue;

    // Qualified reference: table.column
    if (next?.type === 'punct' && next.value === '.') {
      if (!tableNames.has(name.toLowerCase())) reject(`Unknown table "${name}"`);
      const column = tokens[i + 2];
      if (!column || (column.type !== 'ident' && column.type !== 'quoted')) {
        reject(`Expected a column after "${name}."`);
      }
      const canonical = columnsByName.get(column.value.toLowerCase());
      if (!canonical) reject(`Unknown column "${column.value}" in view "${view.name}"`);
      referenced.add(canonical);
      i += 2;
      continue;
    }

    const canonical = columnsByName.get(name.toLowerCase());
    if (canonical) {
      referenced.add(canonical);
      continue;
    }
    if (outputAliases.has(name.toLowerCase())) continue;

    reject(`Unknown identifier "${name}" for view "${view.name}"`);
  }

  return { query: text, view: view.name, columns: [...referenced] };
}

function tokenize(text: string): Token[] {
  const tokens: Token[] = [];
  let i = 0;

  while (i < text.length) {
    const ch = text[i];

    if (/\s/.test(ch)) {
      i++;
      continue;
    }

    if (text.startsWith('--', i) || text.startsWith('/*', i)) {
      reject('Comments are not allowed');
    }

    if (ch === ';') reject('Only one statement is allowed');

    if (ch === "'") {
      let j = i + 1;
      let value = '';
      for (;;) {
        if (j >= text.length) reject('Unterminated string literal');
        if (text[j] === "'") {
          if (text[j + 1] === "'") {
            value += "'";
            j += 2;
            continue;
          }
          break;
        }
        value += text[j];
        j++;
      }
      tokens.push({ type: 'string', value });
      i = j + 1;
      continue;
    }

    if (ch === '"') {
      const end = text.indexOf('"', i + 1);
      if (end === -1) reject('Unterminated quoted identifier');
      const value = text.slice(i + 1, end);
      if (value.length === 0) reject('Empty quoted identifier');
      tokens.push({ type: 'quoted', value });
      i = end + 1;
      continue;
    }

    const number = /^\d+(\.\d+)?/.exec(text.slice(i));
    if (number) {
      tokens.push({ type: 'number', value: number[0] });
      i += number[0].length;
      continue;
    }

    const ident = /^[A-Za-z_][A-Za-z0-9_]*/.exec(text.slice(i));
    if (ident) {
      tokens.push({ type: 'ident', value: ident[0] });
      i += ident[0].length;
      continue;
    }

    const operator = /^(<=|>=|<>|!=|\|\||=|<|>|\+|-|\/|%)/.exec(text.slice(i));
    if (operator) {
      tokens.push({ type: 'operator', value: operator[0] });
      i += operator[0].length;
      continue;
    }

    if (ch === '(' || ch === ')' || ch === ',' || ch === '.') {
      tokens.push({ type: 'punct', value: ch });
      i++;
      continue;
    }

    if (ch === '*') {
      tokens.push({ type: 'star', value: ch });
      i++;
      continue;
    }

    reject(`Unexpected character "${ch}"`);
  }

  return tokens;
}

function checkParentheses(tokens: Token[]): void {
  let depth = 0;
  for (const token of tokens) {
    if (token.type !== 'punct') continue;
    if (token.value === '(') depth++;
    if (token.value === ')') depth--;
    if (depth < 0) reject('Unbalanced parentheses');
  }
  if (depth !== 0) reject('Unbalanced parentheses');
}

function sameName(a: string, b: string): boolean {
  return a.toLowerCase() === b.toLowerCase();
}

function reject(reason: string): never {
  throw new QueryGenerationError(`Generated query rejected: ${reason}`, 'validation', {
    reason,
  });
}

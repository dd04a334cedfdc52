/**
 * Statement parsing for the validator.
 *
 * Every input is first split into statements by a lexical scan, so any text
 * that tokenizes counts as parseable. The statement kind comes from the
 * node-sql-parser AST when the dialect grammar accepts the text, and from the
 * leading DML keyword of the token stream otherwise.
 */

import pkg from 'node-sql-parser';
import type { SqlDialect } from './types.js';

const { Parser } = pkg;

const parser = new Parser();

const DIALECT_OPT: Record<SqlDialect, { database: string }> = {
  sqlite: { database: 'Sqlite' },
  postgres: { database: 'PostgresQL' },
};

const DML_KEYWORDS = new Set(['SELECT', 'INSERT', 'UPDATE', 'DELETE', 'REPLACE', 'MERGE', 'UPSERT']);

export type SqlTokenType = 'word' | 'string' | 'quoted_identifier' | 'number' | 'punctuation';

export interface SqlToken {
  type: SqlTokenType;
  value: string;
}

export interface ParseResult {
  /** Statements with at least one token, in input order */
  statements: SqlToken[][];
  statementCount: number;
  /** Lower-cased kind of the first statement, e.g. 'select' or 'unknown' */
  kind: string;
  /** Where `kind` came from */
  kindSource: 'ast' | 'lexer';
  /** Original SQL with trailing semicolons stripped */
  normalizedSql: string;
}

export interface ParseError {
  ok: false;
  error: string;
}

export type ParseOutcome = ({ ok: true } & ParseResult) | ParseError;

/**
 * Split SQL into statements of tokens. Comments and whitespace are dropped;
 * unterminated strings and comments run to the end of the input.
 */
export function tokenize(sql: string): SqlToken[][] {
  const statements: SqlToken[][] = [];
  let current: SqlToken[] = [];
  let i = 0;

  const closeStatement = (): void => {
    if (current.length > 0) statements.push(current);
    current = [];
  };

  while (i < sql.length) {
    const ch = sql[i];
    const next = sql[i + 1];

    if (/\s/.test(ch)) {
      i++;
    } else if (ch === '-' && next === '-') {
      const end = sql.indexOf('\n', i);
      i = end === -1 ? sql.length : end + 1;
    } else if (ch === '/' && next === '*') {
      const end = sql.indexOf('*/', i + 2);
      i = end === -1 ? sql.length : end + 2;
    } else if (ch === ';') {
      closeStatement();
      i++;
    } else if (ch === "'" || ch === '"' || ch === '`') {
      const end = scanQuoted(sql, i, ch);
      current.push({
        type: ch === "'" ? 'string' : 'quoted_identifier',
        value: sql.slice(i, end),
      });
      i = end;
    } else if (/[A-Za-z_]/.test(ch)) {
      let end = i + 1;
      while (end < sql.length && /[A-Za-z0-9_$]/.test(sql[end])) end++;
      current.push({ type: 'word', value: sql.slice(i, end) });
      i = end;
    } else if (/[0-9]/.test(ch)) {
      let end = i + 1;
      while (end < sql.length && /[0-9.]/.test(sql[end])) end++;
      current.push({ type: 'number', value: sql.slice(i, end) });
      i = end;
    } else {
      current.push({ type: 'punctuation', value: ch });
      i++;
    }
  }
  closeStatement();

  return statements;
}

/** Returns the index just past the closing quote; a doubled quote is an escape. */
function scanQuoted(sql: string, start: number, quote: string): number {
  let i = start + 1;
  while (i < sql.length) {
    if (sql[i] === quote) {
      if (sql[i + 1] === quote) {
        i += 2;
        continue;
      }
      return i + 1;
    }
    i++;
  }
  return sql.length;
}

/** First DML keyword of a statement, upper-cased. */
export function leadingDmlKeyword(tokens: SqlToken[]): string | undefined {
  for (const token of tokens) {
    if (token.type !== 'word') continue;
    const upper = token.value.toUpperCase();
    if (DML_KEYWORDS.has(upper)) return upper;
  }
  return undefined;
}

function astType(node: unknown): string | undefined {
  if (typeof node !== 'object' || node === null || !('type' in node)) return undefined;
  return typeof node.type === 'string' ? node.type.toLowerCase() : undefined;
}

/** Statement kind according to the dialect grammar, if it accepts the text. */
function astKind(normalizedSql: string, dialect: SqlDialect): string | undefined {
  try {
    const result = parser.astify(normalizedSql, DIALECT_OPT[dialect]);
    const first = Array.isArray(result) ? result[0] : result;
    return astType(first);
  } catch {
    // grammar rejected the text; the lexical scan decides
    return undefined;
  }
}

/**
 * Parse a SQL string into statements and classify the first one.
 */
export function parseSql(sql: string, dialect: SqlDialect = 'sqlite'): ParseOutcome {
  const normalizedSql = sql.trim().replace(/;+\s*$/, '');
  const statements = tokenize(sql);

  if (statements.length === 0) {
    return { ok: false, error: 'unparseable' };
  }

  const fromAst = astKind(normalizedSql, dialect);
  if (fromAst) {
    return {
      ok: true,
      statements,
      statementCount: statements.length,
      kind: fromAst,
      kindSource: 'ast',
      normalizedSql,
    };
  }

  const keyword = leadingDmlKeyword(statements[0]);
  return {
    ok: true,
    statements,
    statementCount: statements.length,
    kind: keyword ? keyword.toLowerCase() : 'unknown',
    kindSource: 'lexer',
    normalizedSql,
  };
}

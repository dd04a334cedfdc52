/**
 * Text rules for the validator.
 *
 * These run on the raw SQL string rather than the AST: the keyword and
 * injection scans look inside literals too, and table extraction only looks
 * at the identifier directly after FROM or JOIN.
 */

import { FORBIDDEN_KEYWORDS, INJECTION_PATTERNS, type ForbiddenKeyword, type InjectionPattern } from './types.js';

const KEYWORD_PATTERNS = FORBIDDEN_KEYWORDS.map((keyword) => ({
  keyword,
  pattern: new RegExp(`\\b${keyword}\\b`, 'i'),
}));

const TABLE_REF_RE = /\b(?:FROM|JOIN)\s+([a-zA-Z_][a-zA-Z0-9_]*)/gi;

/**
 * Find a forbidden keyword used as a whole word. When several are present,
 * the one that appears first in the text is reported.
 */
export function findForbiddenKeyword(sql: string): ForbiddenKeyword | undefined {
  let found: { keyword: ForbiddenKeyword; index: number } | undefined;
  for (const { keyword, pattern } of KEYWORD_PATTERNS) {
    const match = pattern.exec(sql);
    if (match && (found === undefined || match.index < found.index)) {
      found = { keyword, index: match.index };
    }
  }
  return found?.keyword;
}

/**
 * Identifiers directly after FROM or JOIN, deduplicated in order of first
 * appearance. Schema-qualified names yield the schema part only.
 */
export function extractTableNames(sql: string): string[] {
  const names: string[] = [];
  for (const match of sql.matchAll(TABLE_REF_RE)) {
    const name = match[1];
    if (!names.includes(name)) names.push(name);
  }
  return names;
}

/** Names that do not case-insensitively match a schema table. */
export function findUnknownTables(tables: string[], schemaTables: Iterable<string>): string[] {
  const known = new Set<string>();
  for (const table of schemaTables) known.add(table.toLowerCase());
  return tables.filter((table) => !known.has(table.toLowerCase()));
}

export function findInjectionPattern(sql: string): InjectionPattern | undefined {
  const lower = sql.toLowerCase();
  return INJECTION_PATTERNS.find(({ pattern }) => pattern.test(lower));
}

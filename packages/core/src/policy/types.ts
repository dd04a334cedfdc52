/**
 * Validator types.
 *
 * The validator accepts a single SELECT against the known retail tables and
 * rejects everything else with a reason. It is an allow-list plus
 * pattern-reject heuristic, not a complete SQL grammar check.
 */

import type { ValidationErrorCode } from '../errors.js';

/** Outcome of validating one candidate SQL string. */
export interface ValidationVerdict {
  readonly isValid: boolean;
  /** Why the SQL was rejected. Absent on success. */
  readonly reason?: string;
  /** Taxonomy code of the rejection. Absent on success. */
  readonly code?: ValidationErrorCode;
  /** Deduplicated table names found after FROM/JOIN (empty on rejection). */
  readonly tablesReferenced: ReadonlySet<string>;
}

/** Keywords that reject a statement wherever they appear as whole words. */
export const FORBIDDEN_KEYWORDS = [
  'DROP',
  'DELETE',
  'UPDATE',
  'INSERT',
  'CREATE',
  'ALTER',
  'TRUNCATE',
  'EXEC',
  'EXECUTE',
  'UNION',
  'GRANT',
  'REVOKE',
] as const;

export type ForbiddenKeyword = (typeof FORBIDDEN_KEYWORDS)[number];

/** A fixed injection pattern and the label reported when it fires. */
export interface InjectionPattern {
  readonly label: string;
  readonly pattern: RegExp;
}

/**
 * Matched against the lower-cased SQL. `.` does not cross newlines, so a
 * pattern only fires within one line of the input.
 */
export const INJECTION_PATTERNS: readonly InjectionPattern[] = [
  { label: "';.*--", pattern: /';.*--/ },
  { label: 'union.*select', pattern: /union.*select/ },
  { label: 'or.*1=1', pattern: /or.*1=1/ },
  { label: 'and.*1=1', pattern: /and.*1=1/ },
];

/** Dialects the statement parser understands. */
export type SqlDialect = 'sqlite' | 'postgres';

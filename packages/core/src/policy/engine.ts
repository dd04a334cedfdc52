/**
 * SQL safety validator.
 *
 * Checks run in a fixed order and the first failure wins:
 * parseability, forbidden keywords, statement kind, table allow-list,
 * injection patterns.
 */

import type { ValidationErrorCode } from '../errors.js';
import { parseSql } from './parse.js';
import { extractTableNames, findForbiddenKeyword, findInjectionPattern, findUnknownTables } from './rules.js';
import type { SqlDialect, ValidationVerdict } from './types.js';

export interface PolicyEngine {
  /** Validate a candidate SQL string against the engine's table allow-list */
  validate(sql: string): ValidationVerdict;

  /** Tables the engine accepts */
  getSchemaTables(): ReadonlySet<string>;
}

const NO_TABLES: ReadonlySet<string> = new Set();

function reject(code: ValidationErrorCode, reason: string): ValidationVerdict {
  return { isValid: false, code, reason, tablesReferenced: NO_TABLES };
}

/**
 * Validate one SQL string against a set of known table names.
 * Pure: the same input always produces the same verdict.
 */
export function validateSql(
  sql: string,
  schemaTables: Iterable<string>,
  dialect: SqlDialect = 'sqlite',
): ValidationVerdict {
  const parsed = parseSql(sql, dialect);
  if (!parsed.ok) {
    return reject('UNPARSEABLE_INPUT', parsed.error);
  }

  const keyword = findForbiddenKeyword(sql);
  if (keyword) {
    return reject('FORBIDDEN_KEYWORD', `Forbidden keyword found: ${keyword}`);
  }

  if (parsed.kind !== 'select') {
    return reject('NON_SELECT_STATEMENT', 'Only SELECT statements are allowed');
  }

  const tables = extractTableNames(sql);
  const unknown = findUnknownTables(tables, schemaTables);
  if (unknown.length > 0) {
    return reject('UNKNOWN_TABLE', `Invalid table names: ${unknown.join(', ')}`);
  }

  const injection = findInjectionPattern(sql);
  if (injection) {
    return reject('INJECTION_PATTERN', `Potential SQL injection detected: Pattern: ${injection.label}`);
  }

  return { isValid: true, tablesReferenced: new Set(tables) };
}

/**
 * Validator bound to a fixed table allow-list and dialect.
 */
export class DefaultPolicyEngine implements PolicyEngine {
  private readonly schemaTables: ReadonlySet<string>;
  private readonly dialect: SqlDialect;

  constructor(schemaTables: Iterable<string>, dialect: SqlDialect = 'sqlite') {
    this.schemaTables = new Set(schemaTables);
    this.dialect = dialect;
  }

  validate(sql: string): ValidationVerdict {
    return validateSql(sql, this.schemaTables, this.dialect);
  }

  getSchemaTables(): ReadonlySet<string> {
    return this.schemaTables;
  }
}

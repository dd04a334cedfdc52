/**
 * Query execution dispatcher.
 * Resolves a database URL to an adapter and applies the core row cap.
 */

import { PostgresExecutor } from './adapters/postgres.js';
import { SqliteExecutor } from './adapters/sqlite.js';
import { capRows, effectiveMaxRows } from './defaults.js';
import type { Logger } from '../log/logger.js';
import type { ExecuteResult, QueryExecutor } from './types.js';

export type DatabaseTarget =
  | { dialect: 'sqlite'; path: string }
  | { dialect: 'postgres'; connectionString: string };

/**
 * Accepts `sqlite:///relative.db`, `sqlite:////absolute.db`, `sqlite:file.db`,
 * a bare file path, and `postgres://` / `postgresql://` URLs.
 */
export function parseDatabaseUrl(databaseUrl: string): DatabaseTarget {
  const url = databaseUrl.trim();
  if (!url) {
    throw new Error('Database URL is empty.');
  }

  if (/^postgres(ql)?:\/\//i.test(url)) {
    return { dialect: 'postgres', connectionString: url };
  }

  const sqlite = /^sqlite:(?:\/\/\/)?(.*)$/i.exec(url);
  if (sqlite) {
    if (!sqlite[1]) {
      throw new Error(`SQLite URL has no file path: ${url}`);
    }
    return { dialect: 'sqlite', path: sqlite[1] };
  }

  if (/^[a-z][a-z0-9+.-]*:\/\//i.test(url)) {
    throw new Error(`Unsupported database URL: ${url}. Supported: sqlite, postgres.`);
  }
  return { dialect: 'sqlite', path: url };
}

export interface ExecutorOptions {
  statementTimeoutMs?: number;
  logger?: Logger;
}

export function createExecutor(databaseUrl: string, options: ExecutorOptions = {}): QueryExecutor {
  const target = parseDatabaseUrl(databaseUrl);
  switch (target.dialect) {
    case 'sqlite':
      return new SqliteExecutor(target.path);
    case 'postgres':
      return new PostgresExecutor(target.connectionString, options);
  }
}

export interface ExecuteLimits {
  maxRows?: number;
  signal?: AbortSignal;
}

/**
 * Run a validated statement and cap the accepted rows.
 */
export async function executeQuery(
  executor: QueryExecutor,
  sql: string,
  limits: ExecuteLimits = {},
): Promise<ExecuteResult> {
  const maxRows = effectiveMaxRows(limits.maxRows);
  const start = performance.now();
  const raw = await executor.run(sql, { maxRows, signal: limits.signal });
  const execMs = Math.round(performance.now() - start);
  return capRows(raw, execMs, maxRows);
}

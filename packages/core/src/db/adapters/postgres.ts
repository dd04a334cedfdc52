/**
 * Postgres adapter.
 * Uses the `pg` driver with strict safety defaults.
 */

import pg from 'pg';
import type { Client as PgClient } from 'pg';
import { SAFE_DEFAULTS } from '../defaults.js';
import type { Logger } from '../../log/logger.js';
import { silentLogger } from '../../log/logger.js';
import type { QueryExecutor, RawQueryResult, Row, RunOptions, SchemaSnapshot, TableInfo } from '../types.js';

const { Client } = pg;

export interface PostgresExecutorOptions {
  statementTimeoutMs?: number;
  logger?: Logger;
}

/** Connection string with the password masked. */
export function redactConnectionString(connectionString: string): string {
  try {
    const url = new URL(connectionString);
    if (url.password) {
      url.password = '***';
    }
    return url.toString();
  } catch {
    return 'postgres://<unparseable>';
  }
}

export class PostgresExecutor implements QueryExecutor {
  readonly dialect = 'postgres' as const;
  readonly target: string;
  private readonly statementTimeoutMs: number;
  private readonly logger: Logger;

  constructor(
    private readonly connectionString: string,
    options: PostgresExecutorOptions = {},
  ) {
    this.target = redactConnectionString(connectionString);
    this.statementTimeoutMs = options.statementTimeoutMs ?? SAFE_DEFAULTS.statementTimeoutMs;
    this.logger = options.logger ?? silentLogger;
  }

  private async connect(): Promise<PgClient> {
    const client = new Client({
      connectionString: this.connectionString,
      connectionTimeoutMillis: 10_000,
    });
    await client.connect();
    return client;
  }

  private async disconnect(client: PgClient): Promise<void> {
    await client.end().catch((err: unknown) => {
      this.logger.warn('Failed to close Postgres connection', { error: String(err) });
    });
  }

  /**
   * Run a statement inside a read-only transaction under statement_timeout.
   * Aborting the signal closes the connection, which fails the pending query.
   */
  async run(sql: string, options: RunOptions): Promise<RawQueryResult> {
    options.signal?.throwIfAborted();
    const client = await this.connect();
    const onAbort = (): void => {
      void this.disconnect(client);
    };
    options.signal?.addEventListener('abort', onAbort, { once: true });

    try {
      await client.query(`SET statement_timeout = ${this.statementTimeoutMs}`);
      await client.query('BEGIN READ ONLY');

      const result = await client.query<Row>(sql);
      await client.query('COMMIT');

      return {
        columns: result.fields.map((field) => field.name),
        rows: result.rows.slice(0, options.maxRows + 1),
      };
    } catch (err: unknown) {
      await client.query('ROLLBACK').catch((rollbackErr: unknown) => {
        this.logger.debug('Rollback after failed query did not complete', { error: String(rollbackErr) });
      });
      throw err;
    } finally {
      options.signal?.removeEventListener('abort', onAbort);
      await this.disconnect(client);
    }
  }

  /** Tables and columns from information_schema, primary and foreign keys included. */
  async introspect(): Promise<SchemaSnapshot> {
    const client = await this.connect();
    try {
      const colsRes = await client.query<{
        table_name: string;
        column_name: string;
        data_type: string;
        is_nullable: string;
        constraint_types: string[] | null;
        foreign_ref: string | null;
      }>(`
        SELECT c.table_name, c.column_name, c.data_type, c.is_nullable,
               array_agg(DISTINCT tc.constraint_type) FILTER (WHERE tc.constraint_type IS NOT NULL) AS constraint_types,
               max(CASE WHEN tc.constraint_type = 'FOREIGN KEY'
                        THEN ccu.table_name || '.' || ccu.column_name END) AS foreign_ref
        FROM information_schema.columns c
        JOIN information_schema.tables t
          ON t.table_schema = c.table_schema AND t.table_name = c.table_name
        LEFT JOIN information_schema.key_column_usage ku
          ON ku.table_schema = c.table_schema
          AND ku.table_name = c.table_name
          AND ku.column_name = c.column_name
        LEFT JOIN information_schema.table_constraints tc
          ON tc.constraint_name = ku.constraint_name
          AND tc.table_schema = ku.table_schema
        LEFT JOIN information_schema.constraint_column_usage ccu
          ON tc.constraint_type = 'FOREIGN KEY'
          AND ccu.constraint_name = tc.constraint_name
          AND ccu.constraint_schema = tc.table_schema
        WHERE c.table_schema = current_schema()
          AND t.table_type = 'BASE TABLE'
        GROUP BY c.table_name, c.column_name, c.data_type, c.is_nullable, c.ordinal_position
        ORDER BY c.table_name, c.ordinal_position
      `);

      const tableMap = new Map<string, TableInfo>();
      for (const row of colsRes.rows) {
        let table = tableMap.get(row.table_name);
        if (!table) {
          table = { name: row.table_name, columns: [] };
          tableMap.set(row.table_name, table);
        }
        const constraints = row.constraint_types ?? [];
        table.columns.push({
          name: row.column_name,
          dataType: row.data_type,
          nullable: row.is_nullable === 'YES',
          isPrimaryKey: constraints.includes('PRIMARY KEY'),
          isUnique: constraints.includes('UNIQUE'),
          references: row.foreign_ref ?? undefined,
        });
      }

      return {
        tables: Array.from(tableMap.values()),
        capturedAt: new Date(),
      };
    } finally {
      await this.disconnect(client);
    }
  }

  async close(): Promise<void> {
    // connections are per call
  }
}

import pg from 'pg';
import { z } from 'zod';
import type { ColumnInfo, DatabaseExecutor, SchemaSession } from '../types';
import { loadConfig } from '../config';
import { PgShapeError } from '../shared/errors';
import { createLogger, type Logger } from '../shared/logger';
import { splitQualifiedName } from '../shared/quote';

type Row = Record<string, unknown>;

/** The part of a `pg` client or pool this adapter uses. */
export interface PgQueryable {
  query(text: string, values?: unknown[]): Promise<{ rows: Row[] }>;
}

export interface PgPoolClientLike extends PgQueryable {
  release(err?: Error | boolean): void;
}

export interface PgPoolLike extends PgQueryable {
  connect(): Promise<PgPoolClientLike>;
  end(): Promise<void>;
}

export interface PostgresAdapterConfig {
  /** Connection string. Ignored when `pool` is given; read from the environment when both are missing. */
  url?: string;
  /** An existing pool. The adapter does not end pools it did not create. */
  pool?: PgPoolLike;
  /** Schema for unqualified table names. */
  schema?: string;
  debug?: boolean;
  logger?: Logger;
}

export interface PostgresSession extends SchemaSession {
  close(): Promise<void>;
}

const columnRow = z.object({ column_name: z.string(), data_type: z.string() });

/**
 * PostgreSQL executor and column reader over a `pg` pool.
 *
 * @example
 * const db = postgresAdapter({ url: process.env.DATABASE_URL });
 * await synchronize(db, Users);
 * await db.close();
 */
export function postgresAdapter(config: PostgresAdapterConfig = {}): PostgresSession {
  const env = config.pool && config.schema ? undefined : loadConfig();
  const schema = config.schema ?? env?.schema ?? 'public';
  const logger = config.logger ?? createLogger({ debug: config.debug ?? env?.debug });

  if (config.pool) return new PostgresExecutor(config.pool, { schema, logger });
  const url = config.url ?? env?.databaseUrl;
  if (!url) throw new PgShapeError('INVALID_CONFIG', 'No database URL: pass `url` or set PG_SHAPE_DATABASE_URL');
  return new PostgresExecutor(new pg.Pool({ connectionString: url }), { schema, logger, ownsPool: true });
}

/**
 * Runs statements on a pool, or on one checked-out client inside a
 * transaction.
 */
export class PostgresExecutor implements PostgresSession {
  private readonly client: PgQueryable;
  private readonly pool: PgPoolLike | null;
  private readonly schema: string;
  private readonly logger: Logger;
  private readonly ownsPool: boolean;

  constructor(
    client: PgPoolLike | PgQueryable,
    opts: { schema: string; logger: Logger; ownsPool?: boolean; inTransaction?: boolean },
  ) {
    this.client = client;
    this.pool = !opts.inTransaction && isPool(client) ? client : null;
    this.schema = opts.schema;
    this.logger = opts.logger;
    this.ownsPool = !!opts.ownsPool;
  }

  /** Ends the pool if this adapter created it. */
  async close(): Promise<void> {
    if (this.ownsPool && this.pool) await this.pool.end();
  }

  async run(sql: string, params: readonly unknown[] = []): Promise<void> {
    await this.query(sql, params);
  }

  async all<TRecord extends Row = Row>(sql: string, params: readonly unknown[] = []): Promise<TRecord[]> {
    const res = await this.query(sql, params);
    // pg rows are untyped; callers pick the row shape
    return res.rows as TRecord[];
  }

  async get<TRecord extends Row = Row>(sql: string, params: readonly unknown[] = []): Promise<TRecord | undefined> {
    const rows = await this.all<TRecord>(sql, params);
    return rows[0];
  }

  async transaction<T>(fn: (tx: DatabaseExecutor) => Promise<T> | T): Promise<T> {
    // already on a transaction client: join it
    if (!this.pool) return fn(this);
    const client = await this.pool.connect();
    const tx = new PostgresExecutor(client, { schema: this.schema, logger: this.logger, inTransaction: true });
    try {
      await client.query('BEGIN');
      const result = await fn(tx);
      await client.query('COMMIT');
      client.release();
      return result;
    } catch (err) {
      try {
        await client.query('ROLLBACK');
        client.release();
      } catch (rollbackError) {
        this.logger.warn('rollback failed', { error: String(rollbackError) });
        client.release(true);
      }
      throw err;
    }
  }

  async listColumns(table: string): Promise<ColumnInfo[]> {
    const parts = splitQualifiedName(table);
    const name = parts[parts.length - 1] ?? table;
    const schema = parts.length > 1 ? parts.slice(0, -1).join('.') : this.schema;
    const res = await this.query(
      `SELECT column_name, data_type FROM information_schema.columns WHERE table_schema = $1 AND table_name = $2 ORDER BY ordinal_position`,
      [schema, name],
    );
    return res.rows.map((r) => {
      const row = columnRow.parse(r);
      return { name: row.column_name, databaseType: row.data_type };
    });
  }

  private async query(sql: string, params: readonly unknown[]): Promise<{ rows: Row[] }> {
    this.logger.debug('query', { sql, params: params.length });
    return this.client.query(sql, [...params]);
  }
}

function isPool(client: PgPoolLike | PgQueryable): client is PgPoolLike {
  return 'connect' in client && typeof client.connect === 'function';
}

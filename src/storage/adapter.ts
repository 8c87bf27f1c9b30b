import type { ColumnInfo, DatabaseExecutor, SchemaSession } from '../types';
import { PgShapeError } from '../shared/errors';
import { silentLogger, type Logger } from '../shared/logger';

type Row = Record<string, unknown>;

/**
 * Callbacks a driver needs to provide. Statements go to `execute`, row
 * queries to `query`; the transaction hooks are optional for drivers that
 * manage transactions themselves.
 */
export type MinimalExecutorSpec = {
  execute(sql: string, params: unknown[]): Promise<unknown> | unknown;
  query(sql: string, params: unknown[]): Promise<{ rows: Row[] }> | { rows: Row[] };
  begin?(): Promise<void> | void;
  commit?(): Promise<void> | void;
  rollback?(): Promise<void> | void;
  listColumns?(table: string): Promise<readonly ColumnInfo[]> | readonly ColumnInfo[];
};

/**
 * Build a session from plain driver callbacks.
 *
 * Transactions started on the session run one after another. Inside a
 * transaction callback, use the executor it receives: calling `transaction`
 * on the session again would wait for the running transaction to finish.
 *
 * @example
 * const db = createExecutor({
 *   execute: (sql, params) => sqlite.prepare(sql).run(...params),
 *   query: (sql, params) => ({ rows: sqlite.prepare(sql).all(...params) }),
 *   begin: () => { sqlite.exec('BEGIN'); },
 *   commit: () => { sqlite.exec('COMMIT'); },
 *   rollback: () => { sqlite.exec('ROLLBACK'); },
 * });
 */
export function createExecutor(spec: MinimalExecutorSpec, opts?: { logger?: Logger }): SchemaSession {
  const logger = opts?.logger ?? silentLogger;
  // tail of the transaction queue; top-level transactions run one at a time
  let queue: Promise<void> = Promise.resolve();

  async function run(sql: string, params?: readonly unknown[]): Promise<void> {
    await spec.execute(sql, [...(params ?? [])]);
  }
  async function all<TRecord extends Row = Row>(sql: string, params?: readonly unknown[]): Promise<TRecord[]> {
    const res = await spec.query(sql, [...(params ?? [])]);
    // driver rows are untyped; callers pick the row shape
    return res.rows as TRecord[];
  }
  async function get<TRecord extends Row = Row>(sql: string, params?: readonly unknown[]): Promise<TRecord | undefined> {
    const rows = await all<TRecord>(sql, params);
    return rows[0];
  }

  // handed to transaction callbacks; nested calls on it join the open transaction
  const tx: DatabaseExecutor = {
    run,
    all,
    get,
    async transaction<T>(fn: (inner: DatabaseExecutor) => Promise<T> | T): Promise<T> {
      return fn(tx);
    },
  };

  async function runTransaction<T>(fn: (inner: DatabaseExecutor) => Promise<T> | T): Promise<T> {
    if (spec.begin) await spec.begin();
    try {
      const result = await fn(tx);
      if (spec.commit) await spec.commit();
      return result;
    } catch (err) {
      if (spec.rollback) {
        try {
          await spec.rollback();
        } catch (rollbackError) {
          logger.warn('rollback failed', { error: String(rollbackError) });
        }
      }
      throw err;
    }
  }

  return {
    run,
    all,
    get,
    transaction<T>(fn: (inner: DatabaseExecutor) => Promise<T> | T): Promise<T> {
      const result = queue.then(() => runTransaction(fn));
      // the caller observes failures through `result`; the queue only waits for settlement
      queue = result.then(
        () => undefined,
        () => undefined,
      );
      return result;
    },
    async listColumns(table) {
      if (!spec.listColumns) throw new PgShapeError('INTERNAL', 'This executor cannot read column metadata', { table });
      return spec.listColumns(table);
    },
  };
}

import { describe, it, expect, vi } from 'vitest';
import { postgresAdapter } from '../adapter_postgres';
import { silentLogger } from '../../shared/logger';

type Row = Record<string, unknown>;

function fakePool(rowsFor: (sql: string) => Row[] = () => []) {
  const calls: { sql: string; values?: unknown[] }[] = [];
  const query = async (sql: string, values?: unknown[]) => {
    calls.push({ sql, values });
    if (sql.startsWith('FAIL')) throw new Error('syntax error');
    return { rows: rowsFor(sql) };
  };
  const client = { query, release: vi.fn() };
  const pool = { query, connect: vi.fn(async () => client), end: vi.fn(async () => {}) };
  return { pool, client, calls };
}

describe('postgresAdapter', () => {
  it('reads columns from information_schema in ordinal order', async () => {
    const { pool, calls } = fakePool(() => [
      { column_name: 'id', data_type: 'uuid' },
      { column_name: 'age', data_type: 'integer' },
    ]);
    const db = postgresAdapter({ pool, schema: 'public', logger: silentLogger });

    expect(await db.listColumns('users')).toEqual([
      { name: 'id', databaseType: 'uuid' },
      { name: 'age', databaseType: 'integer' },
    ]);
    expect(calls).toEqual([
      {
        sql: 'SELECT column_name, data_type FROM information_schema.columns WHERE table_schema = $1 AND table_name = $2 ORDER BY ordinal_position',
        values: ['public', 'users'],
      },
    ]);

    await db.listColumns('audit.events');
    expect(calls[1]?.values).toEqual(['audit', 'events']);
  });

  it('runs a transaction on one pooled client', async () => {
    const { pool, client, calls } = fakePool();
    const db = postgresAdapter({ pool, schema: 'public', logger: silentLogger });

    await db.transaction(async (tx) => {
      await tx.run('ALTER TABLE users ADD COLUMN age INTEGER');
      await tx.transaction(async (inner) => inner.run('ALTER TABLE users DROP COLUMN legacy'));
    });
    expect(calls.map((c) => c.sql)).toEqual([
      'BEGIN',
      'ALTER TABLE users ADD COLUMN age INTEGER',
      'ALTER TABLE users DROP COLUMN legacy',
      'COMMIT',
    ]);
    expect(pool.connect).toHaveBeenCalledTimes(1);
    expect(client.release).toHaveBeenCalledWith();
  });

  it('rolls back and releases the client on failure', async () => {
    const { pool, client, calls } = fakePool();
    const db = postgresAdapter({ pool, schema: 'public', logger: silentLogger });

    await expect(db.transaction(async (tx) => tx.run('FAIL'))).rejects.toThrow('syntax error');
    expect(calls.map((c) => c.sql)).toEqual(['BEGIN', 'FAIL', 'ROLLBACK']);
    expect(client.release).toHaveBeenCalledTimes(1);
  });

  it('does not end a pool it was given', async () => {
    const { pool } = fakePool();
    const db = postgresAdapter({ pool, schema: 'public', logger: silentLogger });
    await db.close();
    expect(pool.end).not.toHaveBeenCalled();
  });
});

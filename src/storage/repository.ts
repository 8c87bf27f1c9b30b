import { randomUUID } from 'node:crypto';
import { ulid } from 'ulid';
import type { DatabaseExecutor } from '../types';
import type { InferRow, Model } from '../schema/model';
import { compile, compileWhere, type ParamStyle, type Where } from '../query/compile';
import {
  ConstraintViolationError,
  InvalidModelError,
  NotFoundError,
  PgShapeError,
  toPgShapeError,
  type ConstraintKind,
} from '../shared/errors';
import { silentLogger, type Logger } from '../shared/logger';
import { quoteIdentifier, quoteQualifiedName } from '../shared/quote';

type Row = Record<string, unknown>;

export type RowOf<M> = InferRow<M> & Row;

export interface FindManyOptions {
  where?: Where;
  /** Columns to select; the primary key is always included. Omit for all columns. */
  columns?: readonly string[];
  /** Column names, `-column` for descending. */
  orderBy?: string | readonly string[];
  limit?: number;
  offset?: number;
  distinct?: boolean;
}

export interface Repository<TRow extends Row> {
  insert(values: Partial<TRow>): Promise<TRow>;
  findOne(where?: Where): Promise<TRow | undefined>;
  findMany(options?: FindManyOptions): Promise<TRow[]>;
  /** Update every matching row and return them. Throws {@link NotFoundError} when nothing matches. */
  update(where: Where, values: Partial<TRow>): Promise<TRow[]>;
  /** Delete matching rows; `true` when at least one row was removed. */
  delete(where: Where): Promise<boolean>;
}

export interface RepositoryOptions {
  paramStyle?: ParamStyle;
  logger?: Logger;
}

// SQLSTATE class 23 (integrity constraint violation)
const CONSTRAINT_CODES: Record<string, ConstraintKind> = {
  '23505': 'unique',
  '23502': 'not_null',
  '23503': 'foreign_key',
  '23514': 'check',
};

/**
 * Single-table CRUD over a model. Statements use `RETURNING`, so the executor
 * must target a database that supports it.
 *
 * @example
 * const users = createRepository(db, Users);
 * const ada = await users.insert({ name: 'Ada', age: 36 });
 * await users.findMany({ where: { age__greaterEq: 18 }, orderBy: '-age', limit: 10 });
 */
export function createRepository<M extends Model>(
  db: DatabaseExecutor,
  model: M,
  options: RepositoryOptions = {},
): Repository<RowOf<M>> {
  const logger = options.logger ?? silentLogger;
  const paramStyle = options.paramStyle ?? 'positional';
  const table = quoteQualifiedName(model.table);
  const pk = model.primaryKey;
  const known = new Set(model.fields.map((f) => f.name));
  const pkType = model.fields.find((f) => f.name === pk)?.type;

  const placeholder = (n: number) => (paramStyle === 'qmark' ? '?' : `$${n}`);

  function columnsOf(values: object, operation: string): [string, unknown][] {
    const entries: [string, unknown][] = Object.entries(values).filter(([, v]) => v !== undefined);
    for (const [column] of entries) {
      if (!known.has(column)) {
        throw new InvalidModelError(`Unknown column "${column}" for ${operation} on ${model.table}`, { column });
      }
    }
    return entries;
  }

  async function guarded<T>(sql: string, fn: () => Promise<T>): Promise<T> {
    logger.debug('query', { sql });
    try {
      return await fn();
    } catch (e) {
      throw mapDriverError(e, { table: model.table, sql });
    }
  }

  const repo: Repository<RowOf<M>> = {
    async insert(values) {
      const entries = columnsOf(values, 'insert');
      if (!entries.some(([k]) => k === pk)) {
        if (pkType === 'uuid') entries.unshift([pk, randomUUID()]);
        else if (pkType === 'text') entries.unshift([pk, ulid()]);
      }
      const sql =
        entries.length === 0
          ? `INSERT INTO ${table} DEFAULT VALUES RETURNING *`
          : `INSERT INTO ${table} (${entries.map(([k]) => quoteIdentifier(k)).join(', ')}) VALUES (${entries
              .map((_, i) => placeholder(i + 1))
              .join(', ')}) RETURNING *`;
      const row = await guarded(sql, async () => db.get<RowOf<M>>(sql, entries.map(([, v]) => v)));
      if (!row) throw new PgShapeError('INTERNAL', `Insert into ${model.table} returned no row`);
      return row;
    },

    async findOne(where) {
      const rows = await repo.findMany({ where, limit: 1 });
      return rows[0];
    },

    async findMany(query = {}) {
      const plan = compile({ table: model.table, primaryKey: pk, paramStyle, ...query });
      return guarded(plan.sql, async () => db.all<RowOf<M>>(plan.sql, plan.params));
    },

    async update(where, values) {
      const entries = columnsOf(values, 'update');
      if (entries.length === 0) {
        const current = await repo.findMany({ where });
        if (current.length === 0) throw new NotFoundError(`No ${model.name} row matches the update filter`, { table: model.table });
        return current;
      }
      const set = entries.map(([k], i) => `${quoteIdentifier(k)} = ${placeholder(i + 1)}`).join(', ');
      const cond = compileWhere(where, { paramStyle, boundCount: entries.length });
      const sql = `UPDATE ${table} SET ${set}${cond.sql ? ` WHERE ${cond.sql}` : ''} RETURNING *`;
      const params = [...entries.map(([, v]) => v), ...cond.params];
      const rows = await guarded(sql, async () => db.all<RowOf<M>>(sql, params));
      if (rows.length === 0) throw new NotFoundError(`No ${model.name} row matches the update filter`, { table: model.table });
      return rows;
    },

    async delete(where) {
      const cond = compileWhere(where, { paramStyle });
      const sql = `DELETE FROM ${table}${cond.sql ? ` WHERE ${cond.sql}` : ''} RETURNING ${quoteIdentifier(pk)}`;
      const rows = await guarded(sql, async () => db.all(sql, cond.params));
      return rows.length > 0;
    },
  };
  return repo;
}

/** Map a driver error onto a constraint violation when its SQLSTATE or message says so. */
export function mapDriverError(e: unknown, details: Record<string, unknown> = {}): PgShapeError {
  if (e instanceof PgShapeError) return e;
  if (typeof e === 'object' && e !== null) {
    const code = 'code' in e && typeof e.code === 'string' ? e.code : undefined;
    const message = e instanceof Error ? e.message : String(e);
    const constraint = 'constraint' in e && typeof e.constraint === 'string' ? e.constraint : undefined;
    const kind = (code !== undefined ? CONSTRAINT_CODES[code] : undefined) ?? (/unique/i.test(message) ? 'unique' : undefined);
    if (kind) return new ConstraintViolationError(kind, message, { ...details, code, constraintName: constraint }, e);
  }
  return toPgShapeError(e);
}

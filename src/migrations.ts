import type { ColumnRename, DatabaseExecutor, FieldSpec, SchemaSession, SchemaStatement, SyncResult } from './types';
import { diffSchema, EMPTY_DIFF, planRenames, renderSchemaDiff } from './schema/diff';
import { MigrationFailedError } from './shared/errors';
import { silentLogger, type Logger } from './shared/logger';

/** What a table should look like. A `Model` from `defineModel` satisfies it. */
export interface SyncTarget {
  readonly table: string;
  readonly fields: readonly FieldSpec[];
  readonly renames?: readonly ColumnRename[];
}

export interface SynchronizeOptions {
  logger?: Logger;
}

/**
 * Reconcile a live table's columns with a declared shape.
 *
 * Renames run first, in their own transaction, and are committed before the
 * columns are read again. Additions, type changes and removals then run
 * together in a second transaction. A failure rolls back the transaction it
 * occurred in and surfaces as a {@link MigrationFailedError}; a committed
 * rename phase stays in place.
 *
 * Running against a converged table executes nothing and returns no statements.
 */
export async function synchronize(
  db: SchemaSession,
  target: SyncTarget,
  options: SynchronizeOptions = {},
): Promise<SyncResult> {
  const logger = options.logger ?? silentLogger;
  const renames = target.renames ?? [];

  const before = await db.listColumns(target.table);
  logger.debug('live columns', { table: target.table, columns: before.map((c) => c.name) });
  const renameStatements = renderSchemaDiff(target.table, { ...EMPTY_DIFF, renames: planRenames(renames, before) });
  await executePhase(db, renameStatements, logger);

  const after = await db.listColumns(target.table);
  const diff = diffSchema(target.fields, renames, after, { simulateRenames: false });
  const mainStatements = renderSchemaDiff(target.table, diff);
  await executePhase(db, mainStatements, logger);

  return { table: target.table, statements: [...renameStatements, ...mainStatements] };
}

/**
 * Dry run: the statements {@link synchronize} would execute against the
 * current live columns, with renames assumed to succeed.
 */
export async function planSynchronize(db: Pick<SchemaSession, 'listColumns'>, target: SyncTarget): Promise<SyncResult> {
  const live = await db.listColumns(target.table);
  const diff = diffSchema(target.fields, target.renames ?? [], live);
  return { table: target.table, statements: renderSchemaDiff(target.table, diff) };
}

async function executePhase(db: DatabaseExecutor, statements: readonly SchemaStatement[], logger: Logger): Promise<void> {
  const first = statements[0];
  if (!first) return;
  try {
    await db.transaction(async (tx) => {
      for (const s of statements) {
        if (s.phase === 'drop') logger.warn('dropping column', { column: s.column, sql: s.sql });
        else logger.debug('executing schema update', { sql: s.sql });
        try {
          await tx.run(s.sql);
        } catch (e) {
          throw new MigrationFailedError(s.phase, s.sql, e);
        }
      }
    });
  } catch (e) {
    if (e instanceof MigrationFailedError) throw e;
    // BEGIN or COMMIT itself was rejected
    throw new MigrationFailedError(first.phase, 'TRANSACTION', e);
  }
}

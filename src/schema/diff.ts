import type { ColumnInfo, ColumnRename, ColumnTypeChange, FieldSpec, SchemaDiff, SchemaStatement } from '../types';
import { quoteIdentifier, quoteLiteral, quoteQualifiedName } from '../shared/quote';
import { assertUniqueRenames } from './model';
import { databaseTypeFor, needsExplicitCast, sameDatabaseType } from './type_map';

export const EMPTY_DIFF: SchemaDiff = { renames: [], additions: [], typeChanges: [], removals: [] };

export function isEmptyDiff(diff: SchemaDiff): boolean {
  return (
    diff.renames.length === 0 &&
    diff.additions.length === 0 &&
    diff.typeChanges.length === 0 &&
    diff.removals.length === 0
  );
}

/**
 * Renames that apply to the live snapshot: the old name is live and the new
 * one is not. Evaluated in order against a running copy of the column set,
 * since each rename changes what the next one sees.
 */
export function planRenames(renames: readonly ColumnRename[], live: readonly ColumnInfo[]): ColumnRename[] {
  assertUniqueRenames(renames);
  const names = new Set(live.map((c) => c.name));
  const out: ColumnRename[] = [];
  for (const r of renames) {
    if (!names.has(r.from) || names.has(r.to)) continue;
    names.delete(r.from);
    names.add(r.to);
    out.push(r);
  }
  return out;
}

export interface DiffOptions {
  /**
   * Plan the renames against `live` and diff the renamed snapshot (default).
   * Pass `false` when the renames were already executed and `live` was read
   * afterwards; the rename pairs then only protect columns from removal.
   */
  simulateRenames?: boolean;
}

/**
 * Diff declared fields against live columns. Additions and type changes
 * follow declared order, removals follow live column order.
 */
export function diffSchema(
  fields: readonly FieldSpec[],
  renames: readonly ColumnRename[],
  live: readonly ColumnInfo[],
  options: DiffOptions = {},
): SchemaDiff {
  const applied = options.simulateRenames === false ? [] : planRenames(renames, live);
  const renamedTo = new Map(applied.map((r) => [r.from, r.to]));
  const columns = live.map((c) => ({ name: renamedTo.get(c.name) ?? c.name, databaseType: c.databaseType }));
  const liveTypes = new Map(columns.map((c) => [c.name, c.databaseType]));

  const additions: FieldSpec[] = [];
  const typeChanges: ColumnTypeChange[] = [];
  for (const f of fields) {
    const current = liveTypes.get(f.name);
    if (current === undefined) {
      additions.push(f);
      continue;
    }
    const next = databaseTypeFor(f.type);
    if (!sameDatabaseType(current, next)) typeChanges.push({ name: f.name, from: current, to: next });
  }

  const declared = new Set(fields.map((f) => f.name));
  // both sides of every rename pair are kept, whether or not the rename ran
  const protectedNames = new Set(renames.flatMap((r) => [r.from, r.to]));
  const removals = columns.map((c) => c.name).filter((name) => !declared.has(name) && !protectedNames.has(name));

  return { renames: applied, additions, typeChanges, removals };
}

/** Render a diff into ALTER TABLE statements, in phase order. */
export function renderSchemaDiff(table: string, diff: SchemaDiff): SchemaStatement[] {
  const t = quoteQualifiedName(table);
  const out: SchemaStatement[] = [];
  for (const r of diff.renames) {
    out.push({
      phase: 'rename',
      column: r.to,
      sql: `ALTER TABLE ${t} RENAME COLUMN ${quoteIdentifier(r.from)} TO ${quoteIdentifier(r.to)}`,
    });
  }
  for (const f of diff.additions) {
    out.push({ phase: 'add', column: f.name, sql: `ALTER TABLE ${t} ADD COLUMN ${columnDefinition(f)}` });
  }
  for (const c of diff.typeChanges) {
    const col = quoteIdentifier(c.name);
    const using = needsExplicitCast(c.from, c.to) ? ` USING ${col}::${c.to}` : '';
    out.push({ phase: 'alter', column: c.name, sql: `ALTER TABLE ${t} ALTER COLUMN ${col} SET DATA TYPE ${c.to}${using}` });
  }
  for (const name of diff.removals) {
    out.push({ phase: 'drop', column: name, sql: `ALTER TABLE ${t} DROP COLUMN ${quoteIdentifier(name)}` });
  }
  return out;
}

/**
 * `name TYPE` for defaultless fields, which are always nullable, otherwise
 * `name TYPE DEFAULT <literal> NOT NULL`.
 */
export function columnDefinition(field: FieldSpec): string {
  const head = `${quoteIdentifier(field.name)} ${databaseTypeFor(field.type)}`;
  if (field.default === undefined || field.default === null) return head;
  return `${head} DEFAULT ${quoteLiteral(field.default)} NOT NULL`;
}

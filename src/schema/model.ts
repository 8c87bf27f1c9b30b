import { z } from 'zod';
import type { ColumnRename, DefaultValue, FieldSpec, RenameMap, SemanticType } from '../types';
import { InvalidModelError } from '../shared/errors';

/**
 * Record shapes are declared once, explicitly, and never discovered by
 * reflection at call time.
 */

/** A field given as a bare semantic type, or with options. */
export type FieldInput =
  | SemanticType
  | (string & {})
  | { type: SemanticType | (string & {}); default?: DefaultValue; renamedFrom?: string };

export type FieldsInput = Record<string, FieldInput>;

export interface ModelInput<F extends FieldsInput> {
  /** Model name, e.g. `OrderItem`. Used to infer the table name when `table` is omitted. */
  name?: string;
  /** Table name, optionally schema-qualified. */
  table?: string;
  /** Primary key column, `id` by default. Added as a `uuid` field when not declared. */
  primaryKey?: string;
  /**
   * Declared fields in column order. Integer-like keys are enumerated first by
   * JavaScript, so avoid numeric column names if order matters.
   */
  fields: F;
  /** Old column name to new column name. */
  renames?: RenameMap;
}

export interface Model<F extends FieldsInput = FieldsInput, PK extends string = string> {
  readonly name: string;
  readonly table: string;
  readonly primaryKey: PK;
  readonly fields: readonly FieldSpec[];
  readonly renames: readonly ColumnRename[];
  /** Type-level only; carries the declared field record for `InferRow`. */
  readonly shape?: F;
}

type TsTypeOf<T> = T extends 'int' | 'real' | 'double'
  ? number
  : T extends 'bigint' | 'text' | 'uuid'
    ? string
    : T extends 'bool'
      ? boolean
      : T extends 'timestamp' | 'date'
        ? Date
        : unknown;

type FieldTypeOf<T> = T extends { type: infer U } ? U : T;

/**
 * Row type of a model, derived from its semantic field types.
 *
 * @example
 * const Users = defineModel({ table: 'users', fields: { name: 'text', age: 'int' } });
 * type User = InferRow<typeof Users>; // { id: string; name: string; age: number }
 */
export type InferRow<M> = M extends Model<infer F, infer PK>
  ? { [K in keyof F]: TsTypeOf<FieldTypeOf<F[K]>> } & (PK extends keyof F ? unknown : { [K in PK]: string })
  : never;

const identifier = z
  .string()
  .min(1, 'must not be empty')
  .refine((s) => !s.includes('\u0000'), 'must not contain NUL characters');

const defaultValue = z.union([z.string(), z.number().finite(), z.bigint(), z.boolean(), z.null()]);

const fieldInput = z.union([
  z.string().min(1, 'type must not be empty'),
  z
    .object({
      type: z.string().min(1, 'type must not be empty'),
      default: defaultValue.optional(),
      renamedFrom: identifier.optional(),
    })
    .strict(),
]);

const modelInput = z
  .object({
    name: identifier.optional(),
    table: z.string().min(1).optional(),
    primaryKey: identifier.optional(),
    fields: z.record(identifier, fieldInput),
    renames: z.record(identifier, identifier).optional(),
  })
  .refine((m) => m.name !== undefined || m.table !== undefined, {
    message: 'either name or table is required',
    path: ['table'],
  });

/**
 * Declare a record shape.
 *
 * @example
 * const Users = defineModel({
 *   name: 'User',
 *   fields: {
 *     name: { type: 'text', renamedFrom: 'full_name' },
 *     age: 'int',
 *     active: { type: 'bool', default: true },
 *   },
 * });
 * Users.table; // 'users'
 */
export function defineModel<F extends FieldsInput>(input: ModelInput<F> & { primaryKey?: undefined }): Model<F, 'id'>;
export function defineModel<F extends FieldsInput, PK extends string>(input: ModelInput<F> & { primaryKey: PK }): Model<F, PK>;
export function defineModel(input: ModelInput<FieldsInput>): Model<FieldsInput, string> {
  const parsed = modelInput.safeParse(input);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
    throw new InvalidModelError(`Invalid model definition: ${where}${issue?.message ?? 'unknown issue'}`, {
      issues: parsed.error.issues,
    });
  }
  const def = parsed.data;
  const table = def.table ?? tableNameFor(def.name ?? '');
  const primaryKey = def.primaryKey ?? 'id';

  const declared: FieldSpec[] = Object.entries(def.fields).map(([name, f]) =>
    typeof f === 'string' ? { name, type: f } : { name, type: f.type, default: f.default, renamedFrom: f.renamedFrom },
  );
  const fields = declared.some((f) => f.name === primaryKey)
    ? declared
    : [{ name: primaryKey, type: 'uuid' }, ...declared];

  return {
    name: def.name ?? table,
    table,
    primaryKey,
    fields,
    renames: collectRenames(fields, def.renames ?? {}),
  };
}

/**
 * Merge an explicit rename map with the fields' `renamedFrom` entries and
 * check that it is unique on both sides.
 */
export function collectRenames(fields: readonly FieldSpec[], map: RenameMap = {}): ColumnRename[] {
  const renames: ColumnRename[] = Object.entries(map).map(([from, to]) => ({ from, to }));
  for (const f of fields) {
    if (f.renamedFrom === undefined) continue;
    const existing = renames.find((r) => r.from === f.renamedFrom);
    if (existing && existing.to === f.name) continue;
    renames.push({ from: f.renamedFrom, to: f.name });
  }
  assertUniqueRenames(renames);
  return renames;
}

export function assertUniqueRenames(renames: readonly ColumnRename[]): void {
  const sources = new Set<string>();
  const targets = new Set<string>();
  for (const r of renames) {
    if (r.from === r.to) throw new InvalidModelError(`Column "${r.from}" is renamed onto itself`, { from: r.from });
    if (sources.has(r.from)) throw new InvalidModelError(`Column "${r.from}" is renamed more than once`, { from: r.from });
    if (targets.has(r.to)) throw new InvalidModelError(`More than one column is renamed to "${r.to}"`, { to: r.to });
    sources.add(r.from);
    targets.add(r.to);
  }
}

/**
 * Infer a table name from a model name: snake_case, pluralized.
 * `User` → `users`, `OrderItem` → `order_items`, `Category` → `categories`.
 */
export function tableNameFor(modelName: string): string {
  const snake = modelName
    .replace(/([a-z0-9])([A-Z])/g, '$1_$2')
    .replace(/([A-Z]+)([A-Z][a-z])/g, '$1_$2')
    .toLowerCase();
  if (/[^aeiou]y$/.test(snake)) return `${snake.slice(0, -1)}ies`;
  if (/(s|x|z|ch|sh)$/.test(snake)) return `${snake}es`;
  return `${snake}s`;
}

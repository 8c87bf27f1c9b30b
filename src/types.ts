/**
 * Public and internal types shared by the schema synchronizer, the query
 * compiler and the bundled executors.
 */

/**
 * Minimal database executor the library operates against.
 * Implementations must handle parameter binding according to the underlying driver.
 */
export interface DatabaseExecutor {
  /**
   * Execute a statement that does not return rows (DDL/DML). Must support positional params.
   */
  run(sql: string, params?: readonly unknown[]): Promise<void> | void;

  /**
   * Fetch all rows as an array of objects.
   */
  all<TRecord extends Record<string, unknown> = Record<string, unknown>>(
    sql: string,
    params?: readonly unknown[],
  ): Promise<TRecord[]> | TRecord[];

  /**
   * Fetch the first row or undefined.
   */
  get<TRecord extends Record<string, unknown> = Record<string, unknown>>(
    sql: string,
    params?: readonly unknown[],
  ): Promise<TRecord | undefined> | (TRecord | undefined);

  /**
   * Execute a function within a transaction boundary. The provided executor participates
   * in the transaction context. Nested transactions are not required to be supported.
   */
  transaction<T>(fn: (tx: DatabaseExecutor) => Promise<T> | T): Promise<T>;
}

/** One column as currently persisted. */
export interface ColumnInfo {
  readonly name: string;
  /** Type name as reported by the catalog, e.g. `integer` or `character varying`. */
  readonly databaseType: string;
}

/**
 * Reads the live column layout of a table. Must reflect committed DDL only.
 */
export interface ColumnReader {
  listColumns(table: string): Promise<readonly ColumnInfo[]> | readonly ColumnInfo[];
}

/** An executor that can also read the catalog; what `synchronize` needs. */
export type SchemaSession = DatabaseExecutor & ColumnReader;

/** Semantic field types understood by the type mapping table. */
export type SemanticType =
  | 'int'
  | 'bigint'
  | 'text'
  | 'bool'
  | 'real'
  | 'double'
  | 'uuid'
  | 'json'
  | 'timestamp'
  | 'date';

/** Values accepted as a column default. */
export type DefaultValue = string | number | bigint | boolean | null;

/**
 * A declared field. `type` may be any string: unknown types map to `TEXT`.
 */
export interface FieldSpec {
  readonly name: string;
  readonly type: SemanticType | (string & {});
  /** Column default; `undefined` means no default, `null` is treated the same way. */
  readonly default?: DefaultValue;
  /** Previous column name, merged into the model's rename map. */
  readonly renamedFrom?: string;
}

/** Old column name to new column name. */
export type RenameMap = Readonly<Record<string, string>>;

export interface ColumnRename {
  readonly from: string;
  readonly to: string;
}

export interface ColumnTypeChange {
  readonly name: string;
  /** Live type as reported by the catalog. */
  readonly from: string;
  /** Mapped database type of the declared field. */
  readonly to: string;
}

/**
 * Derived difference between a declared shape and the live table. Computed
 * fresh on every call and never cached.
 */
export interface SchemaDiff {
  readonly renames: readonly ColumnRename[];
  readonly additions: readonly FieldSpec[];
  readonly typeChanges: readonly ColumnTypeChange[];
  readonly removals: readonly string[];
}

/** Phases of schema synchronization, in execution order. */
export type SyncPhase = 'rename' | 'add' | 'alter' | 'drop';

export interface SchemaStatement {
  readonly phase: SyncPhase;
  readonly column: string;
  readonly sql: string;
}

/** Result of a synchronize call: the statements that were executed, in order. */
export interface SyncResult {
  readonly table: string;
  readonly statements: readonly SchemaStatement[];
}

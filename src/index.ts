export type {
  DatabaseExecutor,
  ColumnInfo,
  ColumnReader,
  SchemaSession,
  SemanticType,
  DefaultValue,
  FieldSpec,
  RenameMap,
  ColumnRename,
  ColumnTypeChange,
  SchemaDiff,
  SyncPhase,
  SchemaStatement,
  SyncResult,
} from './types';

export { synchronize, planSynchronize } from './migrations';
export type { SyncTarget, SynchronizeOptions } from './migrations';

export type { DiffOptions } from './schema/diff';
export { diffSchema, renderSchemaDiff, planRenames, isEmptyDiff, columnDefinition, EMPTY_DIFF } from './schema/diff';
export { defineModel, tableNameFor, collectRenames } from './schema/model';
export type { Model, ModelInput, FieldInput, FieldsInput, InferRow } from './schema/model';
export {
  DATABASE_TYPES,
  DEFAULT_DATABASE_TYPE,
  databaseTypeFor,
  isSemanticType,
  normalizeDatabaseType,
  sameDatabaseType,
  needsExplicitCast,
} from './schema/type_map';

export { compile, compileWhere, toPredicate, parseOrderBy } from './query/compile';
export type {
  CompileRequest,
  QueryPlan,
  Where,
  FilterMap,
  FilterValue,
  FilterScalar,
  PredicateNode,
  ParamStyle,
  OrderTerm,
  SortDirection,
  WhereOptions,
} from './query/compile';
export { OPERATORS, parseFilterKey } from './query/operators';
export type { Operator } from './query/operators';

export { createRepository, mapDriverError } from './storage/repository';
export type { Repository, RepositoryOptions, FindManyOptions, RowOf } from './storage/repository';
export { createExecutor } from './storage/adapter';
export type { MinimalExecutorSpec } from './storage/adapter';
export { postgresAdapter, PostgresExecutor } from './storage/adapter_postgres';
export type { PostgresAdapterConfig, PostgresSession, PgPoolLike, PgPoolClientLike, PgQueryable } from './storage/adapter_postgres';

export { loadConfig } from './config';
export type { PgShapeConfig } from './config';
export { createLogger, silentLogger } from './shared/logger';
export type { Logger } from './shared/logger';
export { quoteIdentifier, quoteQualifiedName, quoteLiteral } from './shared/quote';
export {
  PgShapeError,
  InvalidFilterError,
  UnknownOperatorError,
  InvalidModelError,
  MigrationFailedError,
  ConstraintViolationError,
  NotFoundError,
  toPgShapeError,
} from './shared/errors';
export type { ErrorCode, ConstraintKind } from './shared/errors';

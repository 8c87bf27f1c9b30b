import type { SyncPhase } from '../types';

export type ErrorCode =
  | 'INVALID_FILTER'
  | 'UNKNOWN_OPERATOR'
  | 'INVALID_MODEL'
  | 'INVALID_CONFIG'
  | 'MIGRATION_FAILED'
  | 'CONSTRAINT_VIOLATION'
  | 'NOT_FOUND'
  | 'INTERNAL';

export class PgShapeError extends Error {
  code: ErrorCode;
  details?: Record<string, unknown>;

  constructor(code: ErrorCode, message: string, details?: Record<string, unknown>, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = new.target.name;
    this.code = code;
    this.details = details;
  }
}

/** A predicate, projection or pagination option could not be compiled. */
export class InvalidFilterError extends PgShapeError {
  readonly field: string;

  constructor(field: string, reason: string) {
    super('INVALID_FILTER', `Invalid filter on "${field}": ${reason}`, { field });
    this.field = field;
  }
}

export class UnknownOperatorError extends PgShapeError {
  readonly field: string;
  readonly operator: string;

  constructor(field: string, operator: string) {
    super('UNKNOWN_OPERATOR', `Unknown operator "${operator}" on "${field}"`, { field, operator });
    this.field = field;
    this.operator = operator;
  }
}

export class InvalidModelError extends PgShapeError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('INVALID_MODEL', message, details);
  }
}

/**
 * A schema-change statement was rejected. Phases committed before the failing
 * one stay in place.
 */
export class MigrationFailedError extends PgShapeError {
  readonly phase: SyncPhase;
  readonly statement: string;

  constructor(phase: SyncPhase, statement: string, cause: unknown) {
    super('MIGRATION_FAILED', `Migration failed during ${phase} phase: ${messageOf(cause)}`, { phase, statement }, cause);
    this.phase = phase;
    this.statement = statement;
  }
}

export type ConstraintKind = 'unique' | 'not_null' | 'foreign_key' | 'check';

export class ConstraintViolationError extends PgShapeError {
  readonly constraint: ConstraintKind;

  constructor(constraint: ConstraintKind, message: string, details?: Record<string, unknown>, cause?: unknown) {
    super('CONSTRAINT_VIOLATION', message, { ...details, constraint }, cause);
    this.constraint = constraint;
  }
}

export class NotFoundError extends PgShapeError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('NOT_FOUND', message, details);
  }
}

export function toPgShapeError(e: unknown): PgShapeError {
  if (e instanceof PgShapeError) return e;
  return new PgShapeError('INTERNAL', messageOf(e), undefined, e);
}

export function messageOf(e: unknown): string {
  if (e instanceof Error) return e.message;
  if (typeof e === 'string') return e;
  return 'Internal error';
}

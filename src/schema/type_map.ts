import type { SemanticType } from '../types';

export const DATABASE_TYPES: Readonly<Record<SemanticType, string>> = {
  int: 'INTEGER',
  bigint: 'BIGINT',
  text: 'TEXT',
  bool: 'BOOLEAN',
  real: 'REAL',
  double: 'DOUBLE PRECISION',
  uuid: 'UUID',
  json: 'JSONB',
  timestamp: 'TIMESTAMPTZ',
  date: 'DATE',
};

export const DEFAULT_DATABASE_TYPE = 'TEXT';

export function isSemanticType(type: string): type is SemanticType {
  return Object.prototype.hasOwnProperty.call(DATABASE_TYPES, type);
}

/**
 * Map a semantic field type to its column type. Unknown or missing types
 * degrade to `TEXT` instead of failing.
 */
export function databaseTypeFor(semanticType?: string): string {
  if (semanticType === undefined || !isSemanticType(semanticType)) return DEFAULT_DATABASE_TYPE;
  return DATABASE_TYPES[semanticType];
}

// catalog spellings -> the spelling used by the mapping table (lower-cased)
const ALIASES: Record<string, string> = {
  int: 'integer',
  int4: 'integer',
  int8: 'bigint',
  bool: 'boolean',
  float4: 'real',
  float8: 'double precision',
  'timestamp with time zone': 'timestamptz',
  'timestamp without time zone': 'timestamp',
  varchar: 'character varying',
  char: 'character',
  bpchar: 'character',
};

/** Lower-case a type name and fold catalog aliases so types compare by value. */
export function normalizeDatabaseType(type: string): string {
  const t = type.trim().replace(/\s+/g, ' ').toLowerCase();
  return ALIASES[t] ?? t;
}

export function sameDatabaseType(a: string, b: string): boolean {
  return normalizeDatabaseType(a) === normalizeDatabaseType(b);
}

const TEXT_LIKE = new Set(['text', 'character varying', 'character']);

export function isTextLikeType(type: string): boolean {
  return TEXT_LIKE.has(normalizeDatabaseType(type));
}

// Destinations that get an explicit `USING col::TYPE` when converting from text.
const CAST_FROM_TEXT = new Set(['boolean', 'integer']);

export function needsExplicitCast(from: string, to: string): boolean {
  return isTextLikeType(from) && CAST_FROM_TEXT.has(normalizeDatabaseType(to));
}

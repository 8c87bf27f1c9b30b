import { describe, it, expect } from 'vitest';
import { databaseTypeFor, needsExplicitCast, normalizeDatabaseType, sameDatabaseType } from '../type_map';

describe('type map', () => {
  it('maps semantic types and degrades unknown ones to TEXT', () => {
    expect(databaseTypeFor('int')).toBe('INTEGER');
    expect(databaseTypeFor('double')).toBe('DOUBLE PRECISION');
    expect(databaseTypeFor('json')).toBe('JSONB');
    expect(databaseTypeFor('money')).toBe('TEXT');
    expect(databaseTypeFor(undefined)).toBe('TEXT');
    expect(databaseTypeFor('toString')).toBe('TEXT');
  });

  it('compares catalog and mapped spellings by value', () => {
    expect(normalizeDatabaseType('  Double   Precision ')).toBe('double precision');
    expect(sameDatabaseType('integer', 'INTEGER')).toBe(true);
    expect(sameDatabaseType('int4', 'INTEGER')).toBe(true);
    expect(sameDatabaseType('timestamp with time zone', 'TIMESTAMPTZ')).toBe(true);
    expect(sameDatabaseType('timestamp without time zone', 'TIMESTAMPTZ')).toBe(false);
    expect(sameDatabaseType('text', 'INTEGER')).toBe(false);
  });

  it('asks for a cast only from text-like columns to boolean or integer', () => {
    expect(needsExplicitCast('text', 'BOOLEAN')).toBe(true);
    expect(needsExplicitCast('character varying', 'INTEGER')).toBe(true);
    expect(needsExplicitCast('text', 'REAL')).toBe(false);
    expect(needsExplicitCast('integer', 'TEXT')).toBe(false);
    expect(needsExplicitCast('integer', 'BOOLEAN')).toBe(false);
  });
});

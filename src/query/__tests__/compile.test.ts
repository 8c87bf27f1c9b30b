import { describe, it, expect } from 'vitest';
import { compile, compileWhere, parseOrderBy } from '../compile';
import { parseFilterKey } from '../operators';
import { InvalidFilterError, UnknownOperatorError } from '../../shared/errors';

describe('compile', () => {
  it('compiles an OR of AND groups with projection, order and limit', () => {
    const plan = compile({ table: 'users', columns: ['name'], where: [{ age: 5 }, { age: 6 }], orderBy: '-name', limit: 10 });
    expect(plan.sql).toBe('SELECT id, name FROM users WHERE ((age = $1) OR (age = $2)) ORDER BY name DESC LIMIT 10');
    expect(plan.params).toEqual([5, 6]);
    expect(plan.selectColumns).toEqual(['id', 'name']);
    expect(plan.orderBy).toEqual([{ column: 'name', direction: 'DESC' }]);
  });

  it('selects everything when nothing is requested', () => {
    const plan = compile({ table: 'users' });
    expect(plan.sql).toBe('SELECT * FROM users');
    expect(plan.params).toEqual([]);
    expect(plan.whereSql).toBe('');
  });

  it('does not repeat the primary key in the projection', () => {
    const plan = compile({ table: 'users', primaryKey: 'code', columns: ['code', 'name'], distinct: true });
    expect(plan.sql).toBe('SELECT DISTINCT code, name FROM users');
  });

  it('AND-joins the entries of one filter map in key order', () => {
    const plan = compile({ table: 'users', where: { name: 'Ada', age__lessEq: 40 } });
    expect(plan.sql).toBe('SELECT * FROM users WHERE name = $1 AND age <= $2');
    expect(plan.params).toEqual(['Ada', 40]);
  });

  it('parenthesizes multi-leaf groups inside an OR', () => {
    const { sql, params } = compileWhere([{ a: 1, b: 2 }, { c: 3 }]);
    expect(sql).toBe('((a = $1 AND b = $2) OR (c = $3))');
    expect(params).toEqual([1, 2, 3]);
  });

  it('expands IN lists to one placeholder per element', () => {
    expect(compileWhere({ id__in: [1, 2, 3] })).toEqual({ sql: 'id IN ($1, $2, $3)', params: [1, 2, 3] });
    expect(compileWhere({ id__notIn: ['a', 'b'] }, { paramStyle: 'qmark' })).toEqual({
      sql: 'id NOT IN (?, ?)',
      params: ['a', 'b'],
    });
  });

  it('renders empty lists as constant conditions', () => {
    expect(compileWhere({ id__in: [] })).toEqual({ sql: '1 = 0', params: [] });
    expect(compileWhere({ id__notIn: [] })).toEqual({ sql: '1 = 1', params: [] });
  });

  it('binds no value for null checks', () => {
    expect(compileWhere({ deleted_at__isNull: true, age__greater: 3 })).toEqual({
      sql: 'deleted_at IS NULL AND age > $1',
      params: [3],
    });
    expect(compileWhere({ deleted_at__isNotNull: true })).toEqual({ sql: 'deleted_at IS NOT NULL', params: [] });
    expect(compileWhere({ email__isNull: null })).toEqual({ sql: 'email IS NULL', params: [] });
  });

  it('supports pattern operators', () => {
    expect(compileWhere({ name__like: 'A%', email__ilike: '%@example.com' }).sql).toBe('name LIKE $1 AND email ILIKE $2');
    expect(compileWhere({ status__notEqual: 'banned', age__greaterEq: 18, age__less: 65 }).sql).toBe(
      'status != $1 AND age >= $2 AND age < $3',
    );
  });

  it('numbers placeholders in order across a mixed tree', () => {
    const { sql, params } = compileWhere([
      { status__in: ['a', 'b'], deleted_at__isNull: true },
      { age__greater: 30, name: 'Ada' },
      { id__in: [7], email__isNotNull: true },
    ]);
    expect(sql).toBe(
      '((status IN ($1, $2) AND deleted_at IS NULL) OR (age > $3 AND name = $4) OR (id IN ($5) AND email IS NOT NULL))',
    );
    expect(params).toEqual(['a', 'b', 30, 'Ada', 7]);

    const numbers = [...sql.matchAll(/\$(\d+)/g)].map((m) => Number(m[1]));
    expect(numbers).toEqual(params.map((_, i) => i + 1));
  });

  it('continues numbering after already-bound parameters', () => {
    expect(compileWhere({ id: 7 }, { boundCount: 2 })).toEqual({ sql: 'id = $3', params: [7] });
  });

  it('quotes reserved and mixed-case names', () => {
    const plan = compile({ table: 'public.order', where: { user: 1, createdAt__greater: 0 } });
    expect(plan.sql).toBe('SELECT * FROM public."order" WHERE "user" = $1 AND "createdAt" > $2');
  });

  it('ignores non-positive limit and offset', () => {
    expect(compile({ table: 'users', limit: 0, offset: 20 }).sql).toBe('SELECT * FROM users OFFSET 20');
    expect(compile({ table: 'users', limit: -1, offset: 0 }).sql).toBe('SELECT * FROM users');
  });

  it('treats an empty filter list as no condition', () => {
    expect(compile({ table: 'users', where: [] }).sql).toBe('SELECT * FROM users');
  });

  it('passes dates through as parameters', () => {
    const since = new Date('2024-01-01T00:00:00Z');
    expect(compileWhere({ created_at__greaterEq: since }).params).toEqual([since]);
  });

  it('rejects invalid input', () => {
    expect(() => compile({ table: 'users', limit: 1.5 })).toThrow(InvalidFilterError);
    expect(() => compile({ table: '' })).toThrow(InvalidFilterError);
    expect(() => compileWhere({ id__in: 5 })).toThrow('Invalid filter on "id": "in" requires a list value');
    expect(() => compileWhere({ age: [1, 2] })).toThrow('Invalid filter on "age": "equal" does not accept a list value');
    expect(() => compileWhere({ age: undefined })).toThrow('Invalid filter on "age": value is undefined');
    expect(() => compileWhere([{ a: 1 }, {}])).toThrow('Invalid filter on "where[1]": empty filter group');
    expect(() => compileWhere({ __in: [1] })).toThrow('Invalid filter on "__in": missing column name');
  });

  it('rejects unknown operators', () => {
    try {
      compileWhere({ age__between: 1 });
      expect.unreachable();
    } catch (e) {
      expect(e).toBeInstanceOf(UnknownOperatorError);
      expect(e).toMatchObject({ code: 'UNKNOWN_OPERATOR', field: 'age', operator: 'between' });
    }
  });
});

describe('parseFilterKey', () => {
  it('splits on the last separator', () => {
    expect(parseFilterKey('created__at__greater')).toEqual({ field: 'created__at', operator: 'greater' });
    expect(parseFilterKey('email')).toEqual({ field: 'email', operator: 'equal' });
  });
});

describe('parseOrderBy', () => {
  it('reads direction prefixes', () => {
    expect(parseOrderBy(['name', '+age', '-score'])).toEqual([
      { column: 'name', direction: 'ASC' },
      { column: 'age', direction: 'ASC' },
      { column: 'score', direction: 'DESC' },
    ]);
    expect(parseOrderBy(undefined)).toEqual([]);
    expect(() => parseOrderBy('-')).toThrow(InvalidFilterError);
  });
});

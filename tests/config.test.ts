import { describe, it, expect } from 'vitest';
import { loadConfig } from '../src/config';
import { PgShapeError } from '../src/shared/errors';

describe('loadConfig', () => {
  it('applies defaults', () => {
    expect(loadConfig({})).toEqual({ databaseUrl: undefined, schema: 'public', debug: false });
  });

  it('prefers the prefixed database URL', () => {
    const config = loadConfig({
      PG_SHAPE_DATABASE_URL: 'postgres://localhost/app',
      DATABASE_URL: 'postgres://localhost/other',
      PG_SHAPE_SCHEMA: 'app',
      PG_SHAPE_DEBUG: 'Yes',
    });
    expect(config).toEqual({ databaseUrl: 'postgres://localhost/app', schema: 'app', debug: true });
    expect(loadConfig({ DATABASE_URL: 'postgres://localhost/other' }).databaseUrl).toBe('postgres://localhost/other');
  });

  it('rejects malformed flags', () => {
    try {
      loadConfig({ PG_SHAPE_DEBUG: 'maybe' });
      expect.unreachable();
    } catch (e) {
      expect(e).toBeInstanceOf(PgShapeError);
      expect(e).toMatchObject({ code: 'INVALID_CONFIG', message: 'Invalid configuration: PG_SHAPE_DEBUG expected a boolean flag' });
    }
  });
});

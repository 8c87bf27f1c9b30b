import { z } from 'zod';
import { PgShapeError } from './shared/errors';

export interface PgShapeConfig {
  /** Connection string; `undefined` when neither variable is set. */
  databaseUrl?: string;
  /** Schema used for unqualified table names. */
  schema: string;
  debug: boolean;
}

const flag = z
  .string()
  .trim()
  .toLowerCase()
  .refine((v) => ['', '0', '1', 'false', 'true', 'no', 'yes'].includes(v), 'expected a boolean flag')
  .transform((v) => v === '1' || v === 'true' || v === 'yes');

const envSchema = z.object({
  PG_SHAPE_DATABASE_URL: z.string().min(1).optional(),
  DATABASE_URL: z.string().min(1).optional(),
  PG_SHAPE_SCHEMA: z.string().min(1).default('public'),
  PG_SHAPE_DEBUG: flag.default('0'),
});

/**
 * Read configuration from the environment.
 *
 * - `PG_SHAPE_DATABASE_URL`, falling back to `DATABASE_URL`
 * - `PG_SHAPE_SCHEMA` (default `public`)
 * - `PG_SHAPE_DEBUG` (`1`, `true` or `yes` enable debug logging)
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): PgShapeConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new PgShapeError('INVALID_CONFIG', `Invalid configuration: ${issue?.path.join('.') ?? ''} ${issue?.message ?? ''}`.trim(), {
      issues: parsed.error.issues,
    });
  }
  const e = parsed.data;
  return {
    databaseUrl: e.PG_SHAPE_DATABASE_URL ?? e.DATABASE_URL,
    schema: e.PG_SHAPE_SCHEMA,
    debug: e.PG_SHAPE_DEBUG,
  };
}

import reservedWords from './reserved_words.json';
import type { DefaultValue } from '../types';

/**
 * SQL quoting helpers. Every identifier and literal the synchronizer or the
 * compiler writes into SQL text goes through this module.
 */

const PLAIN_IDENTIFIER = /^[a-z_][a-z0-9_$]*$/;
const RESERVED = new Set<string>(reservedWords);

/**
 * Quote a single identifier. Plain lower-case names that are not reserved
 * words are left bare so generated SQL stays readable.
 *
 * @example
 * quoteIdentifier('age');       // age
 * quoteIdentifier('user');      // "user"
 * quoteIdentifier('createdAt'); // "createdAt"
 */
export function quoteIdentifier(name: string): string {
  if (name.length === 0) throw new TypeError('Identifier must not be empty');
  if (name.includes('\u0000')) throw new TypeError('Identifier must not contain NUL characters');
  if (PLAIN_IDENTIFIER.test(name) && !RESERVED.has(name)) return name;
  return `"${name.replace(/"/g, '""')}"`;
}

/** Quote a possibly schema-qualified name such as `public.users`. */
export function quoteQualifiedName(name: string): string {
  return splitQualifiedName(name).map(quoteIdentifier).join('.');
}

export function splitQualifiedName(name: string): string[] {
  const parts = name.split('.');
  if (parts.some((p) => p.length === 0)) throw new TypeError(`Invalid qualified name: ${name}`);
  return parts;
}

/** Render a value as an inline SQL literal. Used for column defaults only. */
export function quoteLiteral(value: DefaultValue): string {
  if (value === null) return 'NULL';
  if (typeof value === 'boolean') return value ? 'TRUE' : 'FALSE';
  if (typeof value === 'bigint') return value.toString();
  if (typeof value === 'number') {
    if (!Number.isFinite(value)) throw new TypeError(`Cannot render non-finite number: ${value}`);
    return String(value);
  }
  if (value.includes('\u0000')) throw new TypeError('String literal must not contain NUL characters');
  return `'${value.replace(/'/g, "''")}'`;
}

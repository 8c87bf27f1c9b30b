import { UnknownOperatorError } from '../shared/errors';

export const OPERATORS = {
  equal: '=',
  notEqual: '!=',
  greater: '>',
  greaterEq: '>=',
  less: '<',
  lessEq: '<=',
  like: 'LIKE',
  ilike: 'ILIKE',
  in: 'IN',
  notIn: 'NOT IN',
  isNull: 'IS NULL',
  isNotNull: 'IS NOT NULL',
} as const;

export type Operator = keyof typeof OPERATORS;

/** Operators whose value must be a list; one placeholder per element. */
export const LIST_OPERATORS: ReadonlySet<Operator> = new Set<Operator>(['in', 'notIn']);

/** Operators that bind no value at all. */
export const NULL_OPERATORS: ReadonlySet<Operator> = new Set<Operator>(['isNull', 'isNotNull']);

export const OPERATOR_SEPARATOR = '__';

export function isOperator(token: string): token is Operator {
  return Object.prototype.hasOwnProperty.call(OPERATORS, token);
}

/**
 * Split a filter key into column and operator. The text after the last `__`
 * is the operator token; keys without one compare for equality.
 *
 * @example
 * parseFilterKey('age__greaterEq'); // { field: 'age', operator: 'greaterEq' }
 * parseFilterKey('email');          // { field: 'email', operator: 'equal' }
 */
export function parseFilterKey(key: string): { field: string; operator: Operator } {
  const at = key.lastIndexOf(OPERATOR_SEPARATOR);
  if (at === -1) return { field: key, operator: 'equal' };
  const field = key.slice(0, at);
  const token = key.slice(at + OPERATOR_SEPARATOR.length);
  if (!isOperator(token)) throw new UnknownOperatorError(field, token);
  return { field, operator: token };
}

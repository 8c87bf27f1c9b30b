import { z } from 'zod';
import { InvalidFilterError } from '../shared/errors';
import { quoteIdentifier, quoteQualifiedName } from '../shared/quote';
import { LIST_OPERATORS, NULL_OPERATORS, OPERATORS, parseFilterKey, type Operator } from './operators';

export type FilterScalar = string | number | bigint | boolean | Date | null;
export type FilterValue = FilterScalar | readonly FilterScalar[] | undefined;

/** `column` or `column__operator` to value; entries are AND-ed. */
export type FilterMap = Readonly<Record<string, FilterValue>>;

/** One AND-group, or a list of AND-groups that are OR-ed together. */
export type Where = FilterMap | readonly FilterMap[];

export type PredicateNode =
  | { readonly kind: 'leaf'; readonly field: string; readonly operator: Operator; readonly value: FilterValue }
  | { readonly kind: 'group'; readonly combinator: 'AND' | 'OR'; readonly children: readonly PredicateNode[] };

/** `$1, $2, …` (PostgreSQL) or `?` (SQLite, MySQL). */
export type ParamStyle = 'positional' | 'qmark';

export type SortDirection = 'ASC' | 'DESC';

export interface OrderTerm {
  readonly column: string;
  readonly direction: SortDirection;
}

export interface CompileRequest {
  /** Table name, optionally schema-qualified. */
  table: string;
  /** Always selected, so rows can be matched back to records. Defaults to `id`. */
  primaryKey?: string;
  /** Columns to select. Omit to select `*`. */
  columns?: readonly string[];
  where?: Where;
  /** Column names, `-column` for descending. */
  orderBy?: string | readonly string[];
  limit?: number;
  offset?: number;
  distinct?: boolean;
  paramStyle?: ParamStyle;
}

export interface QueryPlan {
  readonly sql: string;
  /** The Nth placeholder in `sql` binds `params[N - 1]`. */
  readonly params: readonly FilterScalar[];
  readonly selectColumns: readonly string[];
  readonly whereSql: string;
  readonly orderBy: readonly OrderTerm[];
  readonly limit?: number;
  readonly offset?: number;
  readonly distinct: boolean;
}

const requestSchema = z.object({
  table: z.string().min(1, 'table must not be empty'),
  primaryKey: z.string().min(1).optional(),
  columns: z.array(z.string().min(1, 'column name must not be empty')).optional(),
  orderBy: z.union([z.string(), z.array(z.string())]).optional(),
  limit: z.number().int('limit must be an integer').optional(),
  offset: z.number().int('offset must be an integer').optional(),
  distinct: z.boolean().optional(),
  paramStyle: z.enum(['positional', 'qmark']).optional(),
});

/**
 * Compile a filtered, ordered, paginated SELECT into SQL text and an ordered
 * parameter list. Pure: never touches the database.
 *
 * @example
 * compile({ table: 'users', columns: ['name'], where: [{ age: 5 }, { age: 6 }], orderBy: '-name', limit: 10 });
 * // sql:    SELECT id, name FROM users WHERE ((age = $1) OR (age = $2)) ORDER BY name DESC LIMIT 10
 * // params: [5, 6]
 */
export function compile(request: CompileRequest): QueryPlan {
  const parsed = requestSchema.safeParse(request);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new InvalidFilterError(issue ? issue.path.join('.') : '', issue?.message ?? 'invalid request');
  }
  const opts = parsed.data;
  const primaryKey = opts.primaryKey ?? 'id';

  const selectColumns = opts.columns === undefined ? ['*'] : unique([primaryKey, ...opts.columns]);
  const { sql: whereSql, params } = compileWhere(request.where ?? {}, { paramStyle: opts.paramStyle });
  const orderBy = parseOrderBy(opts.orderBy);
  const limit = opts.limit !== undefined && opts.limit > 0 ? opts.limit : undefined;
  const offset = opts.offset !== undefined && opts.offset > 0 ? opts.offset : undefined;
  const distinct = opts.distinct ?? false;

  const projection = selectColumns.map((c) => (c === '*' ? c : quoteIdentifier(c))).join(', ');
  let sql = `SELECT ${distinct ? 'DISTINCT ' : ''}${projection} FROM ${quoteQualifiedName(opts.table)}`;
  if (whereSql) sql += ` WHERE ${whereSql}`;
  if (orderBy.length > 0) sql += ` ORDER BY ${orderBy.map((o) => `${quoteIdentifier(o.column)} ${o.direction}`).join(', ')}`;
  if (limit !== undefined) sql += ` LIMIT ${limit}`;
  if (offset !== undefined) sql += ` OFFSET ${offset}`;

  return { sql, params, selectColumns, whereSql, orderBy, limit, offset, distinct };
}

export interface WhereOptions {
  paramStyle?: ParamStyle;
  /**
   * Number of parameters already bound by the surrounding statement.
   * Placeholder numbering continues after them; the returned list holds only
   * the condition's own parameters.
   */
  boundCount?: number;
}

/** Compile only the condition of a WHERE clause. Empty filters give empty SQL. */
export function compileWhere(where: Where, options: WhereOptions = {}): { sql: string; params: FilterScalar[] } {
  const bindings = createBindings(options.paramStyle ?? 'positional', options.boundCount ?? 0);
  const root = toPredicate(where);
  const sql = root.kind === 'group' && root.combinator === 'OR' && root.children.length > 0
    ? `(${renderNode(root, bindings)})`
    : renderNode(root, bindings);
  return { sql, params: bindings.params };
}

/** Normalize the accepted filter shapes into a predicate tree. */
export function toPredicate(where: Where): PredicateNode {
  if (isFilterList(where)) {
    return {
      kind: 'group',
      combinator: 'OR',
      children: where.map((map, i): PredicateNode => {
        const group = andGroup(map);
        if (group.children.length === 0) throw new InvalidFilterError(`where[${i}]`, 'empty filter group');
        return group;
      }),
    };
  }
  return andGroup(where);
}

function andGroup(map: FilterMap): Extract<PredicateNode, { kind: 'group' }> {
  const children = Object.entries(map).map(([key, value]): PredicateNode => {
    const { field, operator } = parseFilterKey(key);
    if (field.length === 0) throw new InvalidFilterError(key, 'missing column name');
    return { kind: 'leaf', field, operator, value };
  });
  return { kind: 'group', combinator: 'AND', children };
}

interface Bindings {
  readonly params: FilterScalar[];
  bind(value: FilterScalar): string;
}

// one counter for the whole tree: every branch feeds the same flat list
function createBindings(style: ParamStyle, boundCount: number): Bindings {
  const params: FilterScalar[] = [];
  return {
    params,
    bind(value) {
      params.push(value);
      return style === 'qmark' ? '?' : `$${boundCount + params.length}`;
    },
  };
}

function renderNode(node: PredicateNode, bindings: Bindings): string {
  if (node.kind === 'leaf') return renderLeaf(node.field, node.operator, node.value, bindings);
  return node.children
    .map((child) => (child.kind === 'group' ? `(${renderNode(child, bindings)})` : renderNode(child, bindings)))
    .join(` ${node.combinator} `);
}

function renderLeaf(field: string, operator: Operator, value: FilterValue, bindings: Bindings): string {
  const column = quoteIdentifier(field);
  const op = OPERATORS[operator];
  if (NULL_OPERATORS.has(operator)) return `${column} ${op}`;

  if (LIST_OPERATORS.has(operator)) {
    if (!isScalarList(value)) throw new InvalidFilterError(field, `"${operator}" requires a list value`);
    if (value.length === 0) return operator === 'in' ? '1 = 0' : '1 = 1';
    for (const item of value) {
      if (!isScalar(item)) throw new InvalidFilterError(field, `"${operator}" list items must be scalars`);
    }
    return `${column} ${op} (${value.map((item) => bindings.bind(item)).join(', ')})`;
  }

  if (value === undefined) throw new InvalidFilterError(field, 'value is undefined');
  if (isScalarList(value)) throw new InvalidFilterError(field, `"${operator}" does not accept a list value`);
  return `${column} ${op} ${bindings.bind(value)}`;
}

/** Parse `name`, `+name` or `-name` order entries. */
export function parseOrderBy(orderBy: string | readonly string[] | undefined): OrderTerm[] {
  if (orderBy === undefined) return [];
  const entries = typeof orderBy === 'string' ? [orderBy] : orderBy;
  return entries.map((entry): OrderTerm => {
    const descending = entry.startsWith('-');
    const column = entry.startsWith('-') || entry.startsWith('+') ? entry.slice(1) : entry;
    if (column.length === 0) throw new InvalidFilterError('orderBy', `invalid order entry "${entry}"`);
    return { column, direction: descending ? 'DESC' : 'ASC' };
  });
}

function isFilterList(where: Where): where is readonly FilterMap[] {
  return Array.isArray(where);
}

function isScalarList(value: FilterValue): value is readonly FilterScalar[] {
  return Array.isArray(value);
}

function isScalar(value: unknown): value is FilterScalar {
  return (
    value === null ||
    value instanceof Date ||
    typeof value === 'string' ||
    typeof value === 'number' ||
    typeof value === 'bigint' ||
    typeof value === 'boolean'
  );
}

function unique(values: readonly string[]): string[] {
  return [...new Set(values)];
}

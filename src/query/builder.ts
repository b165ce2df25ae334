import type {
  Assignment,
  ConditionNode,
  ExprNode,
  JoinClause,
  JoinKind,
  ProjectionItem,
  QueryCommand,
  QueryNode,
  QuerySource,
  ScopeCommand,
} from './types.js';
import { Column, TableStar, type Table } from '../schema/table.js';
import {
  Aliased,
  ExpressionBase,
  FunctionCall,
  toExprNode,
  typeOfNode,
  type Expression,
} from '../functions/expression.js';
import { Asc } from '../functions/builtins.js';
import { matchArguments } from '../types/matcher.js';
import { describeType, innerType, isCollection, Types, type SqlType } from '../types/model.js';
import { InvalidArgumentError, InvalidOperationError, TypeMismatchError } from '../errors.js';
import { compileQuery, type CompileOptions } from './compiler.js';
import type { Dialect } from '../dialects/types.js';

export type BuilderMethod =
  | 'from'
  | 'where'
  | 'andWhere'
  | 'orWhere'
  | 'groupBy'
  | 'having'
  | 'andHaving'
  | 'orHaving'
  | 'innerJoin'
  | 'outerJoin'
  | 'leftJoin'
  | 'rightJoin'
  | 'crossJoin'
  | 'on'
  | 'andOn'
  | 'orOn'
  | 'using'
  | 'orderBy'
  | 'fetch'
  | 'skip'
  | 'distinct'
  | 'values'
  | 'set'
  | 'ifExists'
  | 'ifNotExists';

const WHERE_METHODS: readonly BuilderMethod[] = ['where', 'andWhere', 'orWhere'];
const HAVING_METHODS: readonly BuilderMethod[] = ['having', 'andHaving', 'orHaving'];
const ON_METHODS: readonly BuilderMethod[] = ['on', 'andOn', 'orOn'];
const JOIN_METHODS: readonly BuilderMethod[] = ['innerJoin', 'outerJoin', 'leftJoin', 'rightJoin', 'crossJoin'];

/** Which builder methods each command accepts. */
export const LEGAL_METHODS: Readonly<Record<QueryCommand, ReadonlySet<BuilderMethod>>> = {
  select: new Set<BuilderMethod>([
    'from',
    ...WHERE_METHODS,
    'groupBy',
    ...HAVING_METHODS,
    ...JOIN_METHODS,
    ...ON_METHODS,
    'using',
    'orderBy',
    'fetch',
    'skip',
    'distinct',
  ]),
  delete: new Set<BuilderMethod>(['from', ...WHERE_METHODS]),
  update: new Set<BuilderMethod>(['set', ...WHERE_METHODS]),
  insert: new Set<BuilderMethod>(['values']),
  create: new Set<BuilderMethod>(['ifNotExists']),
  drop: new Set<BuilderMethod>(['ifExists']),
  where: new Set<BuilderMethod>(WHERE_METHODS),
  on: new Set<BuilderMethod>([...WHERE_METHODS, ...ON_METHODS]),
  having: new Set<BuilderMethod>([...WHERE_METHODS, ...HAVING_METHODS]),
  join: new Set<BuilderMethod>([...ON_METHODS, 'using']),
};

export type ConditionInput = Expression | ((scope: QueryBuilder) => QueryBuilder);

export type ProjectionInput = Expression | TableStar | Aliased | readonly [ExpressionBase, string];

export function emptyQueryNode(command: QueryCommand, table: Table | null = null): QueryNode {
  return {
    kind: 'query',
    command,
    table,
    distinct: false,
    projection: [],
    joins: [],
    where: null,
    groupBy: [],
    having: null,
    orderBy: [],
    limit: null,
    offset: null,
    insertColumns: [],
    rows: [],
    assignments: [],
    ifExists: false,
    ifNotExists: false,
  };
}

/**
 * Adds a condition to an existing tree using the given combinator.
 * Same-kind roots accumulate flat; anything else is wrapped.
 */
function combine(existing: ConditionNode | null, combinator: 'and' | 'or', added: ConditionNode): ConditionNode {
  if (existing === null) {
    return added;
  }
  if (existing.kind === combinator) {
    return { kind: combinator, operands: [...existing.operands, added] };
  }
  return { kind: combinator, operands: [existing, added] };
}

function isAliasPair(input: ProjectionInput): input is readonly [ExpressionBase, string] {
  return (
    Array.isArray(input) &&
    input.length === 2 &&
    input[0] instanceof ExpressionBase &&
    typeof input[1] === 'string'
  );
}

export function toProjectionItem(input: ProjectionInput): ProjectionItem {
  if (input instanceof TableStar) {
    return { expr: input.toNode(), alias: null };
  }
  if (input instanceof Aliased) {
    return { expr: input.expression.toNode(), alias: input.alias };
  }
  if (isAliasPair(input)) {
    return { expr: input[0].toNode(), alias: input[1] };
  }
  const expr = toExprNode(input, 'select');
  if (expr.kind === 'list') {
    throw new InvalidArgumentError('select', 'a value list cannot be projected');
  }
  return { expr, alias: null };
}

function isNonNegativeInteger(n: number): boolean {
  return Number.isInteger(n) && n >= 0;
}

/**
 * Fluent immutable query builder. Every operation checks the command's
 * legality table and returns a new QueryBuilder; existing handles are never
 * mutated, so a partial query can serve as a template.
 */
export class QueryBuilder implements QuerySource {
  constructor(
    readonly command: QueryCommand,
    readonly node: QueryNode,
  ) {}

  static scoped(command: ScopeCommand): QueryBuilder {
    return new QueryBuilder(command, emptyQueryNode(command));
  }

  toQueryNode(): QueryNode {
    return this.node;
  }

  compile(dialect: Dialect | string = 'generic', options?: CompileOptions): string {
    return compileQuery(this, dialect, options);
  }

  // ---------------------------------------------------------------------------
  // Target
  // ---------------------------------------------------------------------------

  from(table: Table): QueryBuilder {
    this.assertLegal('from');
    return this.with({ table });
  }

  // ---------------------------------------------------------------------------
  // Conditions
  // ---------------------------------------------------------------------------

  /** ANDs a predicate, or a grouped sub-tree built by a callback, onto the WHERE tree. */
  where(condition: ConditionInput): QueryBuilder {
    return this.applyCondition('where', 'and', condition, 'where');
  }

  andWhere(condition: ConditionInput): QueryBuilder {
    return this.applyCondition('andWhere', 'and', condition, 'where');
  }

  orWhere(condition: ConditionInput): QueryBuilder {
    return this.applyCondition('orWhere', 'or', condition, 'where');
  }

  having(condition: ConditionInput): QueryBuilder {
    return this.applyCondition('having', 'and', condition, 'having');
  }

  andHaving(condition: ConditionInput): QueryBuilder {
    return this.applyCondition('andHaving', 'and', condition, 'having');
  }

  orHaving(condition: ConditionInput): QueryBuilder {
    return this.applyCondition('orHaving', 'or', condition, 'having');
  }

  on(condition: ConditionInput): QueryBuilder {
    return this.applyCondition('on', 'and', condition, 'on');
  }

  andOn(condition: ConditionInput): QueryBuilder {
    return this.applyCondition('andOn', 'and', condition, 'on');
  }

  orOn(condition: ConditionInput): QueryBuilder {
    return this.applyCondition('orOn', 'or', condition, 'on');
  }

  // ---------------------------------------------------------------------------
  // Joins
  // ---------------------------------------------------------------------------

  innerJoin(table: Table, build?: (join: QueryBuilder) => QueryBuilder): QueryBuilder {
    return this.join('innerJoin', 'inner', table, build);
  }

  outerJoin(table: Table, build?: (join: QueryBuilder) => QueryBuilder): QueryBuilder {
    return this.join('outerJoin', 'outer', table, build);
  }

  leftJoin(table: Table, build?: (join: QueryBuilder) => QueryBuilder): QueryBuilder {
    return this.join('leftJoin', 'left', table, build);
  }

  rightJoin(table: Table, build?: (join: QueryBuilder) => QueryBuilder): QueryBuilder {
    return this.join('rightJoin', 'right', table, build);
  }

  crossJoin(table: Table): QueryBuilder {
    return this.join('crossJoin', 'cross', table, undefined);
  }

  /** Joins the last joined table on equally named columns. */
  using(...columns: string[]): QueryBuilder {
    this.assertLegal('using');
    if (columns.length === 0) {
      throw new InvalidArgumentError('using', 'at least one column name is required');
    }
    return this.updateLastJoin('using', (join) => {
      if (join.on !== null) {
        throw new InvalidOperationError(this.command, 'using', 'a join takes either ON or USING, not both');
      }
      return { ...join, using: [...(join.using ?? []), ...columns] };
    });
  }

  // ---------------------------------------------------------------------------
  // Grouping, ordering, paging
  // ---------------------------------------------------------------------------

  groupBy(...expressions: ExpressionBase[]): QueryBuilder {
    this.assertLegal('groupBy');
    const nodes = expressions.map((e) => {
      if (!isCollection(e.type)) {
        throw new InvalidArgumentError('groupBy', `expected a column-bound expression, found ${describeType(e.type)}`);
      }
      return e.toNode();
    });
    return this.with({ groupBy: [...this.node.groupBy, ...nodes] });
  }

  /** Columns sort ascending; otherwise pass `asc()` / `desc()` calls. */
  orderBy(...expressions: ExpressionBase[]): QueryBuilder {
    this.assertLegal('orderBy');
    const nodes = expressions.map((e): ExprNode => {
      if (e instanceof Column) {
        return new FunctionCall(Asc, [e]).toNode();
      }
      if (e instanceof FunctionCall && (e.name === 'asc' || e.name === 'desc')) {
        return e.toNode();
      }
      throw new InvalidArgumentError('orderBy', 'expected a column or an asc()/desc() call');
    });
    return this.with({ orderBy: [...this.node.orderBy, ...nodes] });
  }

  fetch(limit: number): QueryBuilder {
    this.assertLegal('fetch');
    if (!isNonNegativeInteger(limit)) {
      throw new InvalidArgumentError('fetch', `expected a non-negative integer, got ${limit}`);
    }
    return this.with({ limit });
  }

  skip(offset: number): QueryBuilder {
    this.assertLegal('skip');
    if (!isNonNegativeInteger(offset)) {
      throw new InvalidArgumentError('skip', `expected a non-negative integer, got ${offset}`);
    }
    return this.with({ offset });
  }

  distinct(): QueryBuilder {
    this.assertLegal('distinct');
    return this.with({ distinct: true });
  }

  // ---------------------------------------------------------------------------
  // Statement payloads
  // ---------------------------------------------------------------------------

  /** Adds rows to an INSERT. Every row must name the same columns. */
  values(...rows: Readonly<Record<string, Expression>>[]): QueryBuilder {
    this.assertLegal('values');
    const table = this.requireTable('values');
    if (rows.length === 0) {
      throw new InvalidArgumentError('values', 'at least one row is required');
    }

    const firstRow = rows[0] ?? {};
    const columns =
      this.node.insertColumns.length > 0
        ? this.node.insertColumns
        : Object.keys(firstRow).map((name) => table.column(name));
    if (columns.length === 0) {
      throw new InvalidArgumentError('values', 'a row must name at least one column');
    }

    const expected = columns.map((c) => Types.scalarOrColumn(c.type.inner));
    const names = columns.map((c) => c.name);

    const built = rows.map((row) => {
      const keys = Object.keys(row);
      if (keys.length !== names.length || !names.every((n) => keys.includes(n))) {
        throw new InvalidArgumentError('values', `every row must name the columns ${names.join(', ')}`);
      }
      const nodes = names.map((name) => toExprNode(this.rowValue(row, name), 'values'));
      matchArguments('values', expected, nodes.map(typeOfNode));
      return nodes;
    });

    return this.with({ insertColumns: columns, rows: [...this.node.rows, ...built] });
  }

  /** Adds assignments to an UPDATE, either as a record or as one column/value pair. */
  set(assignments: Readonly<Record<string, Expression>>): QueryBuilder;
  set(column: Column, value: Expression): QueryBuilder;
  set(target: Column | Readonly<Record<string, Expression>>, value?: Expression): QueryBuilder {
    this.assertLegal('set');
    const table = this.requireTable('set');

    let pairs: Array<[Column, Expression]>;
    if (target instanceof Column) {
      if (target.table !== table || !target.sameAs(table.column(target.name))) {
        throw new InvalidArgumentError('set', `column ${target.name} does not belong to ${table.qualifiedName}`);
      }
      pairs = [[target, value ?? null]];
    } else {
      pairs = Object.keys(target).map((name): [Column, Expression] => [
        table.column(name),
        this.rowValue(target, name),
      ]);
    }
    if (pairs.length === 0) {
      throw new InvalidArgumentError('set', 'at least one assignment is required');
    }

    const added: Assignment[] = pairs.map(([column, v]) => ({ column, value: toExprNode(v, 'set') }));
    matchArguments(
      'set',
      added.map((a) => Types.scalarOrColumn(a.column.type.inner)),
      added.map((a) => typeOfNode(a.value)),
    );

    return this.with({ assignments: [...this.node.assignments, ...added] });
  }

  ifExists(): QueryBuilder {
    this.assertLegal('ifExists');
    return this.with({ ifExists: true });
  }

  ifNotExists(): QueryBuilder {
    this.assertLegal('ifNotExists');
    return this.with({ ifNotExists: true });
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  private with(patch: Partial<QueryNode>): QueryBuilder {
    return new QueryBuilder(this.command, { ...this.node, ...patch });
  }

  private assertLegal(method: BuilderMethod): void {
    if (!LEGAL_METHODS[this.command].has(method)) {
      throw new InvalidOperationError(this.command, method);
    }
  }

  private requireTable(method: BuilderMethod): Table {
    if (this.node.table === null) {
      throw new InvalidOperationError(this.command, method, `${method}() needs a target table`);
    }
    return this.node.table;
  }

  private rowValue(row: Readonly<Record<string, Expression>>, name: string): Expression {
    const value = row[name];
    return value === undefined ? null : value;
  }

  private toCondition(method: BuilderMethod, input: ConditionInput, scope: ScopeCommand): ConditionNode {
    if (typeof input === 'function') {
      const result = input(QueryBuilder.scoped(scope));
      if (result.command !== scope) {
        throw new InvalidArgumentError(method, `the callback must return the ${scope} builder it was given`);
      }
      if (result.node.where === null) {
        throw new InvalidArgumentError(method, 'the grouped condition is empty');
      }
      return { kind: 'group', condition: result.node.where };
    }

    const expr = toExprNode(input, method);
    const type: SqlType = typeOfNode(expr);
    const base = innerType(type);
    if (base.kind !== 'any' && !(base.kind === 'concrete' && base.name === 'boolean')) {
      throw new TypeMismatchError(method, 0, 'Boolean', describeType(type));
    }
    return { kind: 'predicate', expr };
  }

  private applyCondition(
    method: BuilderMethod,
    combinator: 'and' | 'or',
    input: ConditionInput,
    family: ScopeCommand,
  ): QueryBuilder {
    this.assertLegal(method);
    const added = this.toCondition(method, input, family);

    if (family === 'having' && this.command === 'select') {
      return this.with({ having: combine(this.node.having, combinator, added) });
    }
    if (family === 'on' && (this.command === 'select' || this.command === 'join')) {
      return this.updateLastJoin(method, (join) => {
        if (join.using !== null) {
          throw new InvalidOperationError(this.command, method, 'a join takes either ON or USING, not both');
        }
        return { ...join, on: combine(join.on, combinator, added) };
      });
    }
    return this.with({ where: combine(this.node.where, combinator, added) });
  }

  private updateLastJoin(method: BuilderMethod, update: (join: JoinClause) => JoinClause): QueryBuilder {
    const joins = this.node.joins;
    const last = joins[joins.length - 1];
    if (last === undefined) {
      throw new InvalidOperationError(this.command, method, `${method}() needs a preceding join`);
    }
    if (last.kind === 'cross') {
      throw new InvalidOperationError(this.command, method, 'a cross join takes no join condition');
    }
    return this.with({ joins: [...joins.slice(0, -1), update(last)] });
  }

  private join(
    method: BuilderMethod,
    kind: JoinKind,
    table: Table,
    build: ((join: QueryBuilder) => QueryBuilder) | undefined,
  ): QueryBuilder {
    this.assertLegal(method);
    let clause: JoinClause = { kind, table, on: null, using: null };

    if (build !== undefined) {
      const scoped = new QueryBuilder('join', { ...emptyQueryNode('join', table), joins: [clause] });
      const result = build(scoped);
      const built = result.command === 'join' ? result.node.joins[0] : undefined;
      if (built === undefined) {
        throw new InvalidArgumentError(method, 'the callback must return the join builder it was given');
      }
      clause = built;
    }

    return this.with({ joins: [...this.node.joins, clause] });
  }
}

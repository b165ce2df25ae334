import type {
  ConditionNode,
  ExprNode,
  JoinClause,
  LiteralValue,
  QueryNode,
  QuerySource,
} from './types.js';
import type { Column, Table } from '../schema/table.js';
import type { Dialect, Keywords, TemporalKind } from '../dialects/types.js';
import { dialects } from '../dialects/registry.js';
import { innerType, type SqlType } from '../types/model.js';
import { CompileError, UnresolvedFunctionRenderError } from '../errors.js';

export interface CompileOptions {
  /** Defaults to 'lower'. */
  keywordCase?: 'lower' | 'upper';
  /** Append `;`. Defaults to true. */
  terminator?: boolean;
}

interface RenderContext {
  readonly dialect: Dialect;
  readonly keywordCase: 'lower' | 'upper';
  /** More than one table participates: every column is written `table.column`. */
  readonly qualify: boolean;
  /** FROM and JOIN tables of the statement being rendered. */
  readonly own: readonly Table[];
  /** Tables a column may come from: the statement's own plus every enclosing statement's. */
  readonly scope: readonly Table[];
}

const PLAIN_IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

const JOIN_KEYWORDS: Record<JoinClause['kind'], keyof Keywords> = {
  inner: 'innerJoin',
  outer: 'outerJoin',
  left: 'leftJoin',
  right: 'rightJoin',
  cross: 'crossJoin',
};

// Combinator strength, matching the infix precedences of and/or.
const COMBINATOR_PRECEDENCE = { and: 2, or: 1 } as const;

// ---------------------------------------------------------------------------
// Words and names
// ---------------------------------------------------------------------------

function cased(ctx: RenderContext, word: string): string {
  return ctx.keywordCase === 'upper' ? word.toUpperCase() : word;
}

function kw(ctx: RenderContext, key: keyof Keywords): string {
  return cased(ctx, ctx.dialect.keywords[key]);
}

function identifier(ctx: RenderContext, name: string): string {
  const quoting = ctx.dialect.quoting;
  if (
    quoting.mode === 'always' ||
    quoting.reserved.has(name.toLowerCase()) ||
    !PLAIN_IDENTIFIER.test(name)
  ) {
    return quoting.quote(name);
  }
  return name;
}

function tableName(ctx: RenderContext, table: Table): string {
  const name = identifier(ctx, table.name);
  return table.database === null ? name : `${identifier(ctx, table.database)}.${name}`;
}

function assertInScope(ctx: RenderContext, table: Table, reference: string): void {
  if (!ctx.scope.includes(table)) {
    throw new CompileError(
      ctx.dialect.name,
      `${table.qualifiedName}.${reference} is not in scope; add ${table.qualifiedName} to FROM or a join`,
    );
  }
}

// Outer-table references in a correlated sub-query are always qualified.
function columnRef(ctx: RenderContext, column: Column): string {
  assertInScope(ctx, column.table, column.name);
  const name = identifier(ctx, column.name);
  const qualify = ctx.qualify || !ctx.own.includes(column.table);
  return qualify ? `${tableName(ctx, column.table)}.${name}` : name;
}

// ---------------------------------------------------------------------------
// Literals
// ---------------------------------------------------------------------------

function temporalText(kind: TemporalKind, value: Date): string {
  const iso = value.toISOString();
  if (kind === 'date') return iso.slice(0, 10);
  if (kind === 'time') return iso.slice(11, 23);
  return `${iso.slice(0, 10)} ${iso.slice(11, 23)}`;
}

function temporalKind(type: SqlType): TemporalKind | null {
  const base = innerType(type);
  if (base.kind !== 'concrete') return null;
  return base.name === 'date' || base.name === 'time' || base.name === 'datetime' ? base.name : null;
}

function renderLiteral(ctx: RenderContext, value: LiteralValue, type: SqlType): string {
  if (value === null) {
    return kw(ctx, 'null');
  }
  if (typeof value === 'boolean') {
    return kw(ctx, value ? 'true' : 'false');
  }
  if (typeof value === 'number') {
    if (!Number.isFinite(value)) {
      throw new CompileError(ctx.dialect.name, `cannot render the number ${value}`);
    }
    return String(value);
  }
  const kind = temporalKind(type);
  if (value instanceof Date) {
    const k = kind ?? 'datetime';
    return ctx.dialect.literals.temporal(k, temporalText(k, value));
  }
  return kind === null ? ctx.dialect.literals.string(value) : ctx.dialect.literals.temporal(kind, value);
}

// ---------------------------------------------------------------------------
// Expressions
// ---------------------------------------------------------------------------

function infixPrecedence(ctx: RenderContext, node: ExprNode): number | null {
  if (node.kind !== 'call') return null;
  const rule = ctx.dialect.functions[node.call.name];
  return rule !== undefined && rule.form === 'infix' ? rule.precedence : null;
}

/** Renders an operand, parenthesized when `below` holds for its infix precedence. */
function operand(ctx: RenderContext, node: ExprNode, below: (precedence: number) => boolean): string {
  const text = renderExpr(ctx, node);
  const p = infixPrecedence(ctx, node);
  return p !== null && below(p) ? `(${text})` : text;
}

function argAt(ctx: RenderContext, args: readonly ExprNode[], index: number, name: string): ExprNode {
  const arg = args[index];
  if (arg === undefined) {
    throw new CompileError(ctx.dialect.name, `${name} is missing argument ${index}`);
  }
  return arg;
}

function renderCall(ctx: RenderContext, node: Extract<ExprNode, { kind: 'call' }>): string {
  const { name, args } = node.call;
  const rule = ctx.dialect.functions[name];
  if (rule === undefined) {
    throw new UnresolvedFunctionRenderError(ctx.dialect.name, name);
  }

  switch (rule.form) {
    case 'infix': {
      const left = operand(ctx, argAt(ctx, args, 0, name), (p) =>
        rule.nonAssociative === true ? p <= rule.precedence : p < rule.precedence,
      );
      const right = operand(ctx, argAt(ctx, args, 1, name), (p) => p <= rule.precedence);
      return `${left} ${cased(ctx, rule.operator)} ${right}`;
    }
    case 'prefix':
      return `${cased(ctx, rule.operator)} ${operand(ctx, argAt(ctx, args, 0, name), () => true)}`;
    case 'postfix':
      return `${operand(ctx, argAt(ctx, args, 0, name), () => true)} ${cased(ctx, rule.operator)}`;
    case 'call':
      return `${cased(ctx, rule.name)}(${args.map((a) => renderExpr(ctx, a)).join(', ')})`;
    case 'list': {
      const left = operand(ctx, argAt(ctx, args, 0, name), () => true);
      const values = argAt(ctx, args, 1, name);
      // lists and sub-queries carry their own parentheses
      const right =
        values.kind === 'list' || values.kind === 'subquery' ? renderExpr(ctx, values) : `(${renderExpr(ctx, values)})`;
      return `${left} ${cased(ctx, rule.operator)} ${right}`;
    }
    case 'custom':
      return rule.render(
        args.map((a) => renderExpr(ctx, a)),
        (word) => cased(ctx, word),
      );
  }
}

function renderExpr(ctx: RenderContext, node: ExprNode): string {
  switch (node.kind) {
    case 'column':
      return columnRef(ctx, node.column);
    case 'star':
      assertInScope(ctx, node.table, '*');
      return ctx.qualify || !ctx.own.includes(node.table) ? `${tableName(ctx, node.table)}.*` : '*';
    case 'literal':
      return renderLiteral(ctx, node.value, node.type);
    case 'list':
      if (node.values.length === 0) {
        throw new CompileError(ctx.dialect.name, 'a value list needs at least one value');
      }
      return `(${node.values.map((v) => renderLiteral(ctx, v, node.type)).join(', ')})`;
    case 'subquery':
      return `(${renderStatement(node.query, ctx.dialect, ctx.keywordCase, ctx.scope)})`;
    case 'call':
      return renderCall(ctx, node);
  }
}

// ---------------------------------------------------------------------------
// Conditions
// ---------------------------------------------------------------------------

function renderCondition(ctx: RenderContext, node: ConditionNode, parent: 'and' | 'or' | null): string {
  switch (node.kind) {
    case 'predicate': {
      if (parent === null) return renderExpr(ctx, node.expr);
      const limit = COMBINATOR_PRECEDENCE[parent];
      return operand(ctx, node.expr, (p) => p < limit);
    }
    case 'group':
      return `(${renderCondition(ctx, node.condition, null)})`;
    case 'and':
    case 'or': {
      const combinator = node.kind;
      const joined = node.operands
        .map((o) => renderCondition(ctx, o, combinator))
        .join(` ${kw(ctx, combinator)} `);
      return combinator === 'or' && parent === 'and' ? `(${joined})` : joined;
    }
  }
}

// ---------------------------------------------------------------------------
// Statements
// ---------------------------------------------------------------------------

function requireTable(ctx: RenderContext, node: QueryNode): Table {
  if (node.table === null) {
    throw new CompileError(ctx.dialect.name, `a ${node.command} statement needs a target table`);
  }
  return node.table;
}

function renderJoin(ctx: RenderContext, join: JoinClause): string {
  const head = `${kw(ctx, JOIN_KEYWORDS[join.kind])} ${tableName(ctx, join.table)}`;
  if (join.kind === 'cross') {
    if (join.on !== null || join.using !== null) {
      throw new CompileError(ctx.dialect.name, `a cross join on ${join.table.qualifiedName} takes no join condition`);
    }
    return head;
  }
  if (join.on !== null) {
    return `${head} ${kw(ctx, 'on')} ${renderCondition(ctx, join.on, null)}`;
  }
  if (join.using !== null && join.using.length > 0) {
    return `${head} ${kw(ctx, 'using')} (${join.using.map((c) => identifier(ctx, c)).join(', ')})`;
  }
  throw new CompileError(ctx.dialect.name, `join on ${join.table.qualifiedName} has neither ON nor USING`);
}

function renderProjection(ctx: RenderContext, node: QueryNode, table: Table): string {
  if (node.projection.length === 0) {
    if (!ctx.qualify) return '*';
    return [table, ...node.joins.map((j) => j.table)].map((t) => `${tableName(ctx, t)}.*`).join(', ');
  }
  return node.projection
    .map((item) => {
      const expr = renderExpr(ctx, item.expr);
      return item.alias === null ? expr : `${expr} ${kw(ctx, 'as')} ${identifier(ctx, item.alias)}`;
    })
    .join(', ');
}

function renderSelect(ctx: RenderContext, node: QueryNode): string {
  const table = requireTable(ctx, node);
  const { pagination } = ctx.dialect;
  // `top` only expresses a limit; an offset falls back to offset/fetch.
  const useTop = pagination === 'top' && node.limit !== null && node.offset === null;

  const parts: string[] = [kw(ctx, 'select')];
  if (node.distinct) parts.push(kw(ctx, 'distinct'));
  if (useTop) parts.push(`${kw(ctx, 'top')} ${node.limit}`);
  parts.push(renderProjection(ctx, node, table));
  parts.push(`${kw(ctx, 'from')} ${tableName(ctx, table)}`);

  for (const join of node.joins) {
    parts.push(renderJoin(ctx, join));
  }
  if (node.where !== null) {
    parts.push(`${kw(ctx, 'where')} ${renderCondition(ctx, node.where, null)}`);
  }
  if (node.groupBy.length > 0) {
    parts.push(`${kw(ctx, 'groupBy')} ${node.groupBy.map((e) => renderExpr(ctx, e)).join(', ')}`);
  }
  if (node.having !== null) {
    parts.push(`${kw(ctx, 'having')} ${renderCondition(ctx, node.having, null)}`);
  }
  if (node.orderBy.length > 0) {
    parts.push(`${kw(ctx, 'orderBy')} ${node.orderBy.map((e) => renderExpr(ctx, e)).join(', ')}`);
  }

  if (pagination === 'limit-offset') {
    if (node.limit !== null) parts.push(`${kw(ctx, 'limit')} ${node.limit}`);
    if (node.offset !== null) parts.push(`${kw(ctx, 'offset')} ${node.offset}`);
  } else if (!useTop && (node.limit !== null || node.offset !== null)) {
    // offset n rows [fetch first|next m rows only]
    const fetchKey = pagination === 'top' ? 'fetchNext' : 'fetchFirst';
    if (node.offset !== null) {
      parts.push(`${kw(ctx, 'offset')} ${node.offset} ${kw(ctx, 'rows')}`);
    }
    if (node.limit !== null) {
      parts.push(`${kw(ctx, fetchKey)} ${node.limit} ${kw(ctx, 'rows')} ${kw(ctx, 'only')}`);
    }
  }

  return parts.join(' ');
}

function renderInsert(ctx: RenderContext, node: QueryNode): string {
  const table = requireTable(ctx, node);
  if (node.insertColumns.length === 0 || node.rows.length === 0) {
    throw new CompileError(ctx.dialect.name, `insert into ${table.qualifiedName} has no rows`);
  }
  const columns = node.insertColumns.map((c) => identifier(ctx, c.name)).join(', ');
  const rows = node.rows.map((row) => `(${row.map((v) => renderExpr(ctx, v)).join(', ')})`).join(', ');
  return `${kw(ctx, 'insertInto')} ${tableName(ctx, table)} (${columns}) ${kw(ctx, 'values')} ${rows}`;
}

function renderUpdate(ctx: RenderContext, node: QueryNode): string {
  const table = requireTable(ctx, node);
  if (node.assignments.length === 0) {
    throw new CompileError(ctx.dialect.name, `update ${table.qualifiedName} has no assignments`);
  }
  const assignments = node.assignments
    .map((a) => `${identifier(ctx, a.column.name)} = ${renderExpr(ctx, a.value)}`)
    .join(', ');
  const parts = [`${kw(ctx, 'update')} ${tableName(ctx, table)}`, `${kw(ctx, 'set')} ${assignments}`];
  if (node.where !== null) {
    parts.push(`${kw(ctx, 'where')} ${renderCondition(ctx, node.where, null)}`);
  }
  return parts.join(' ');
}

function renderDelete(ctx: RenderContext, node: QueryNode): string {
  const table = requireTable(ctx, node);
  const parts = [`${kw(ctx, 'deleteFrom')} ${tableName(ctx, table)}`];
  if (node.where !== null) {
    parts.push(`${kw(ctx, 'where')} ${renderCondition(ctx, node.where, null)}`);
  }
  return parts.join(' ');
}

function renderCreate(ctx: RenderContext, node: QueryNode): string {
  const table = requireTable(ctx, node);
  const columns = table.schemaColumns();
  if (columns.length === 0) {
    throw new CompileError(ctx.dialect.name, `create table ${table.qualifiedName} needs declared columns`);
  }
  const definitions = columns.map((c) => {
    const base = innerType(c.type);
    if (base.kind !== 'concrete') {
      throw new CompileError(ctx.dialect.name, `column ${c.name} of ${table.qualifiedName} has no concrete type`);
    }
    return `${identifier(ctx, c.name)} ${cased(ctx, ctx.dialect.typeNames[base.name])}`;
  });
  const head = [kw(ctx, 'createTable')];
  if (node.ifNotExists) head.push(kw(ctx, 'ifNotExists'));
  head.push(tableName(ctx, table));
  return `${head.join(' ')} (${definitions.join(', ')})`;
}

function renderDrop(ctx: RenderContext, node: QueryNode): string {
  const table = requireTable(ctx, node);
  const head = [kw(ctx, 'dropTable')];
  if (node.ifExists) head.push(kw(ctx, 'ifExists'));
  head.push(tableName(ctx, table));
  return head.join(' ');
}

function participatingTables(node: QueryNode): Table[] {
  return [...(node.table === null ? [] : [node.table]), ...node.joins.map((j) => j.table)];
}

/**
 * Renders one statement without terminator. `enclosing` lists the tables of
 * the statements this one is nested in.
 */
function renderStatement(
  node: QueryNode,
  dialect: Dialect,
  keywordCase: 'lower' | 'upper',
  enclosing: readonly Table[] = [],
): string {
  const own = participatingTables(node);
  const ctx: RenderContext = {
    dialect,
    keywordCase,
    qualify: own.length > 1,
    own,
    scope: [...own, ...enclosing],
  };

  const command = node.command;
  if (command === 'where' || command === 'on' || command === 'join' || command === 'having') {
    throw new CompileError(dialect.name, `a ${command} sub-builder cannot be compiled on its own`);
  }
  if (!dialect.commands.has(command)) {
    throw new CompileError(dialect.name, `${command} statements are not supported`);
  }

  switch (command) {
    case 'select':
      return renderSelect(ctx, node);
    case 'insert':
      return renderInsert(ctx, node);
    case 'update':
      return renderUpdate(ctx, node);
    case 'delete':
      return renderDelete(ctx, node);
    case 'create':
      return renderCreate(ctx, node);
    case 'drop':
      return renderDrop(ctx, node);
  }
}

/**
 * Compiles a query to a single SQL statement. A string dialect is looked up
 * in the dialect registry.
 */
export function compileQuery(
  source: QuerySource | QueryNode,
  dialect: Dialect | string = 'generic',
  options: CompileOptions = {},
): string {
  const resolved = typeof dialect === 'string' ? dialects.get(dialect) : dialect;
  const node = 'toQueryNode' in source ? source.toQueryNode() : source;
  const sql = renderStatement(node, resolved, options.keywordCase ?? 'lower');
  return (options.terminator ?? true) ? `${sql};` : sql;
}

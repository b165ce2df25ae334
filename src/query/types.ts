import type { SqlType } from '../types/model.js';
import type { Column, Table } from '../schema/table.js';
import type { FunctionCall } from '../functions/expression.js';

export type LiteralValue = string | number | boolean | Date | null;

export type ExprNode =
  | { readonly kind: 'column'; readonly column: Column }
  | { readonly kind: 'call'; readonly call: FunctionCall }
  | { readonly kind: 'literal'; readonly value: LiteralValue; readonly type: SqlType }
  | { readonly kind: 'list'; readonly values: readonly LiteralValue[]; readonly type: SqlType }
  | { readonly kind: 'subquery'; readonly query: QueryNode }
  | { readonly kind: 'star'; readonly table: Table };

export type ConditionNode =
  | { readonly kind: 'predicate'; readonly expr: ExprNode }
  | { readonly kind: 'and'; readonly operands: readonly ConditionNode[] }
  | { readonly kind: 'or'; readonly operands: readonly ConditionNode[] }
  | { readonly kind: 'group'; readonly condition: ConditionNode };

/** Top-level statement kinds, each with its own entry point. */
export type StatementCommand = 'select' | 'insert' | 'update' | 'delete' | 'create' | 'drop';

/** Synthetic kinds scoping a nested-condition or join callback. */
export type ScopeCommand = 'where' | 'on' | 'join' | 'having';

export type QueryCommand = StatementCommand | ScopeCommand;

export type JoinKind = 'inner' | 'outer' | 'left' | 'right' | 'cross';

export interface JoinClause {
  readonly kind: JoinKind;
  readonly table: Table;
  readonly on: ConditionNode | null;
  readonly using: readonly string[] | null;
}

export interface ProjectionItem {
  readonly expr: ExprNode;
  readonly alias: string | null;
}

export interface Assignment {
  readonly column: Column;
  readonly value: ExprNode;
}

export interface QueryNode {
  readonly kind: 'query';
  readonly command: QueryCommand;
  readonly table: Table | null;
  readonly distinct: boolean;
  /** Empty means every column. */
  readonly projection: readonly ProjectionItem[];
  readonly joins: readonly JoinClause[];
  /** The WHERE tree, or the whole sub-tree for scope commands. */
  readonly where: ConditionNode | null;
  readonly groupBy: readonly ExprNode[];
  readonly having: ConditionNode | null;
  readonly orderBy: readonly ExprNode[];
  readonly limit: number | null;
  readonly offset: number | null;
  /** INSERT column list, shared by every row. */
  readonly insertColumns: readonly Column[];
  readonly rows: readonly (readonly ExprNode[])[];
  readonly assignments: readonly Assignment[];
  readonly ifExists: boolean;
  readonly ifNotExists: boolean;
}

/**
 * Anything that can stand in for a query value: a builder handle or a
 * finished node. Sub-queries embed through this.
 */
export interface QuerySource {
  toQueryNode(): QueryNode;
}

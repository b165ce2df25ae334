export { query } from './query/query-object.js';
export { QueryBuilder, LEGAL_METHODS } from './query/builder.js';
export type { BuilderMethod, ConditionInput, ProjectionInput } from './query/builder.js';
export { compileQuery } from './query/compiler.js';
export type { CompileOptions } from './query/compiler.js';
export type {
  LiteralValue,
  ExprNode,
  ConditionNode,
  StatementCommand,
  ScopeCommand,
  QueryCommand,
  JoinKind,
  JoinClause,
  ProjectionItem,
  Assignment,
  QueryNode,
  QuerySource,
} from './query/types.js';

export { Table, Column, TableStar } from './schema/table.js';
export type { TableSchema, TableOptions } from './schema/table.js';

export {
  Types,
  CONCRETE_KINDS,
  KindCompatibility,
  strictCompatibility,
  isAny,
  isConcrete,
  isCollection,
  isResolved,
  innerType,
  typesEqual,
  describeType,
} from './types/model.js';
export type {
  ConcreteKind,
  AnyType,
  ConcreteType,
  CollectionType,
  UnionType,
  TypeVariable,
  SqlType,
  ResolvedType,
} from './types/model.js';
export { matchArguments, substituteType } from './types/matcher.js';
export type { TypeVarBinding, TypeVarMapping, MatchedTypes, MatchResult, MatchOptions } from './types/matcher.js';

export { defineFunction } from './functions/signature.js';
export type { FunctionSignature, ReturnResolver } from './functions/signature.js';
export * as builtins from './functions/builtins.js';
export { ExpressionBase, FunctionCall, Literal, Aliased, literal } from './functions/expression.js';
export type { Expression } from './functions/expression.js';
export { fn } from './functions/fn.js';
export { FunctionRegistry, functions } from './functions/registry.js';
export type { RegistryConfig, RegisterOptions } from './functions/registry.js';

export { extendDialect, delimitedQuoting } from './dialects/types.js';
export type {
  Dialect,
  DialectOverrides,
  RenderRule,
  Keywords,
  IdentifierQuoting,
  LiteralFormat,
  TemporalKind,
  Pagination,
} from './dialects/types.js';
export { genericDialect, Precedence, RESERVED_WORDS } from './dialects/generic.js';
export { postgresDialect, ILike } from './dialects/postgres.js';
export { mysqlDialect } from './dialects/mysql.js';
export { sqlserverDialect } from './dialects/sqlserver.js';
export { DialectRegistry, dialects } from './dialects/registry.js';
export type { DialectRegistryConfig } from './dialects/registry.js';

export {
  SqlKitError,
  ArityError,
  TypeMismatchError,
  TypeVariableConflictError,
  InvalidOperationError,
  InvalidArgumentError,
  UnknownColumnError,
  UnknownFunctionError,
  FunctionDefinitionError,
  UnresolvedFunctionRenderError,
  UnknownDialectError,
  CompileError,
} from './errors.js';

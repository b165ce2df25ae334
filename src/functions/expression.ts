import {
  describeType,
  innerType,
  isResolved,
  Types,
  type AnyType,
  type ConcreteType,
  type ResolvedType,
  type SqlType,
} from '../types/model.js';
import { matchArguments, substituteType, type MatchedTypes, type TypeVarMapping } from '../types/matcher.js';
import { FunctionDefinitionError, InvalidArgumentError } from '../errors.js';
import type { ExprNode, LiteralValue, QueryNode, QuerySource } from '../query/types.js';
import type { FunctionSignature } from './signature.js';
import * as builtins from './builtins.js';

/** Anything accepted where a function argument is expected. */
export type Expression = ExpressionBase | LiteralValue | readonly LiteralValue[] | QuerySource;

/** A projection entry renamed with `as`. */
export class Aliased {
  constructor(
    readonly expression: ExpressionBase,
    readonly alias: string,
  ) {}
}

/**
 * Shared operator surface of columns, calls and typed literals. Every method
 * builds a new FunctionCall; the receiver is never modified.
 */
export abstract class ExpressionBase {
  abstract readonly type: SqlType;

  abstract toNode(): ExprNode;

  add(other: Expression): FunctionCall {
    return new FunctionCall(builtins.Add, [this, other]);
  }

  subtract(other: Expression): FunctionCall {
    return new FunctionCall(builtins.Subtract, [this, other]);
  }

  multiply(other: Expression): FunctionCall {
    return new FunctionCall(builtins.Multiply, [this, other]);
  }

  divide(other: Expression): FunctionCall {
    return new FunctionCall(builtins.Divide, [this, other]);
  }

  modulo(other: Expression): FunctionCall {
    return new FunctionCall(builtins.Modulo, [this, other]);
  }

  equals(other: Expression): FunctionCall {
    return new FunctionCall(builtins.Equals, [this, other]);
  }

  notEquals(other: Expression): FunctionCall {
    return new FunctionCall(builtins.NotEquals, [this, other]);
  }

  lessThan(other: Expression): FunctionCall {
    return new FunctionCall(builtins.LessThan, [this, other]);
  }

  lessThanOrEqual(other: Expression): FunctionCall {
    return new FunctionCall(builtins.LessThanOrEqual, [this, other]);
  }

  greaterThan(other: Expression): FunctionCall {
    return new FunctionCall(builtins.GreaterThan, [this, other]);
  }

  greaterThanOrEqual(other: Expression): FunctionCall {
    return new FunctionCall(builtins.GreaterThanOrEqual, [this, other]);
  }

  like(pattern: Expression): FunctionCall {
    return new FunctionCall(builtins.Like, [this, pattern]);
  }

  in(values: Expression): FunctionCall {
    return new FunctionCall(builtins.In, [this, values]);
  }

  isNull(): FunctionCall {
    return new FunctionCall(builtins.IsNull, [this]);
  }

  isNotNull(): FunctionCall {
    return new FunctionCall(builtins.IsNotNull, [this]);
  }

  and(other: Expression): FunctionCall {
    return new FunctionCall(builtins.And, [this, other]);
  }

  or(other: Expression): FunctionCall {
    return new FunctionCall(builtins.Or, [this, other]);
  }

  xor(other: Expression): FunctionCall {
    return new FunctionCall(builtins.Xor, [this, other]);
  }

  not(): FunctionCall {
    return new FunctionCall(builtins.Not, [this]);
  }

  max(): FunctionCall {
    return new FunctionCall(builtins.Max, [this]);
  }

  min(): FunctionCall {
    return new FunctionCall(builtins.Min, [this]);
  }

  sum(): FunctionCall {
    return new FunctionCall(builtins.Sum, [this]);
  }

  avg(): FunctionCall {
    return new FunctionCall(builtins.Avg, [this]);
  }

  count(): FunctionCall {
    return new FunctionCall(builtins.Count, [this]);
  }

  asc(): FunctionCall {
    return new FunctionCall(builtins.Asc, [this]);
  }

  desc(): FunctionCall {
    return new FunctionCall(builtins.Desc, [this]);
  }

  as(alias: string): Aliased {
    return new Aliased(this, alias);
  }
}

// ---------------------------------------------------------------------------
// Literals
// ---------------------------------------------------------------------------

/** A scalar value with an explicitly declared type. */
export class Literal extends ExpressionBase {
  constructor(
    readonly value: LiteralValue,
    override readonly type: AnyType | ConcreteType,
  ) {
    super();
  }

  override toNode(): ExprNode {
    return { kind: 'literal', value: this.value, type: this.type };
  }
}

export const literal = {
  of(value: LiteralValue): Literal {
    return new Literal(value, literalType(value));
  },
  number(value: number): Literal {
    return new Literal(value, Types.number);
  },
  string(value: string): Literal {
    return new Literal(value, Types.string);
  },
  boolean(value: boolean): Literal {
    return new Literal(value, Types.boolean);
  },
  date(value: string | Date): Literal {
    return new Literal(value, Types.date);
  },
  time(value: string): Literal {
    return new Literal(value, Types.time);
  },
  datetime(value: string | Date): Literal {
    return new Literal(value, Types.datetime);
  },
  null(): Literal {
    return new Literal(null, Types.any);
  },
};

export function literalType(value: LiteralValue): AnyType | ConcreteType {
  if (value === null) return Types.any;
  if (value instanceof Date) return Types.datetime;
  if (typeof value === 'string') return Types.string;
  if (typeof value === 'number') return Types.number;
  return Types.boolean;
}

function isLiteralList(value: Expression): value is readonly LiteralValue[] {
  return Array.isArray(value);
}

function listType(values: readonly LiteralValue[], method: string): SqlType {
  if (values.length === 0) {
    throw new InvalidArgumentError(method, 'a value list needs at least one value');
  }
  let element: SqlType = Types.any;
  for (const value of values) {
    const t = literalType(value);
    if (t.kind === 'any') continue;
    if (element.kind === 'concrete' && element.name !== t.name) {
      throw new InvalidArgumentError(
        method,
        `list mixes ${describeType(element)} and ${describeType(t)} values`,
      );
    }
    element = t;
  }
  return Types.collection(element);
}

/** Normalizes any accepted argument into a tree node. */
export function toExprNode(value: Expression, method: string): ExprNode {
  if (value instanceof ExpressionBase) {
    return value.toNode();
  }
  if (value === null || typeof value !== 'object') {
    return { kind: 'literal', value, type: literalType(value) };
  }
  if (value instanceof Date) {
    return { kind: 'literal', value, type: Types.datetime };
  }
  if (isLiteralList(value)) {
    return { kind: 'list', values: [...value], type: listType(value, method) };
  }
  return { kind: 'subquery', query: value.toQueryNode() };
}

function subqueryType(query: QueryNode): SqlType {
  const only = query.projection.length === 1 ? query.projection[0] : undefined;
  if (only === undefined || only.expr.kind === 'star') {
    return Types.collection(Types.any);
  }
  return Types.collection(innerType(typeOfNode(only.expr)));
}

export function typeOfNode(node: ExprNode): SqlType {
  switch (node.kind) {
    case 'column':
      return node.column.type;
    case 'call':
      return node.call.type;
    case 'literal':
    case 'list':
      return node.type;
    case 'subquery':
      return subqueryType(node.query);
    case 'star':
      return Types.collection(Types.any);
  }
}

// ---------------------------------------------------------------------------
// Function calls
// ---------------------------------------------------------------------------

/**
 * A type-checked invocation. Construction runs the matcher and resolves the
 * return type; a call that exists is well-typed.
 */
export class FunctionCall extends ExpressionBase {
  readonly args: readonly ExprNode[];
  override readonly type: ResolvedType;
  readonly matchedTypes: MatchedTypes;
  readonly typeVarMapping: TypeVarMapping;

  constructor(
    readonly signature: FunctionSignature,
    args: readonly Expression[],
  ) {
    super();
    this.args = args.map((arg) => toExprNode(arg, signature.name));

    const { matchedTypes, mapping } = matchArguments(
      signature.name,
      signature.params,
      this.args.map(typeOfNode),
      { compatibility: signature.compatibility },
    );

    const resolved =
      typeof signature.returns === 'function'
        ? signature.returns(matchedTypes, mapping)
        : substituteType(signature.name, signature.returns, mapping);

    if (!isResolved(resolved)) {
      throw new FunctionDefinitionError(
        signature.name,
        `return type must be concrete or a collection, got ${describeType(resolved)}`,
      );
    }

    this.type = resolved;
    this.matchedTypes = matchedTypes;
    this.typeVarMapping = mapping;
  }

  get name(): string {
    return this.signature.name;
  }

  override toNode(): ExprNode {
    return { kind: 'call', call: this };
  }
}


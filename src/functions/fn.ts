import * as builtins from './builtins.js';
import { FunctionCall, type Expression } from './expression.js';
import type { FunctionSignature } from './signature.js';

// Free-standing forms of the operator methods, for when the left operand is a literal.
export const fn = {
  call: (signature: FunctionSignature, ...args: Expression[]) => new FunctionCall(signature, args),
  add: (a: Expression, b: Expression) => new FunctionCall(builtins.Add, [a, b]),
  subtract: (a: Expression, b: Expression) => new FunctionCall(builtins.Subtract, [a, b]),
  multiply: (a: Expression, b: Expression) => new FunctionCall(builtins.Multiply, [a, b]),
  divide: (a: Expression, b: Expression) => new FunctionCall(builtins.Divide, [a, b]),
  modulo: (a: Expression, b: Expression) => new FunctionCall(builtins.Modulo, [a, b]),
  equals: (a: Expression, b: Expression) => new FunctionCall(builtins.Equals, [a, b]),
  notEquals: (a: Expression, b: Expression) => new FunctionCall(builtins.NotEquals, [a, b]),
  lessThan: (a: Expression, b: Expression) => new FunctionCall(builtins.LessThan, [a, b]),
  lessThanOrEqual: (a: Expression, b: Expression) => new FunctionCall(builtins.LessThanOrEqual, [a, b]),
  greaterThan: (a: Expression, b: Expression) => new FunctionCall(builtins.GreaterThan, [a, b]),
  greaterThanOrEqual: (a: Expression, b: Expression) => new FunctionCall(builtins.GreaterThanOrEqual, [a, b]),
  and: (a: Expression, b: Expression) => new FunctionCall(builtins.And, [a, b]),
  or: (a: Expression, b: Expression) => new FunctionCall(builtins.Or, [a, b]),
  xor: (a: Expression, b: Expression) => new FunctionCall(builtins.Xor, [a, b]),
  not: (a: Expression) => new FunctionCall(builtins.Not, [a]),
  like: (a: Expression, pattern: Expression) => new FunctionCall(builtins.Like, [a, pattern]),
  in: (a: Expression, values: Expression) => new FunctionCall(builtins.In, [a, values]),
  isNull: (a: Expression) => new FunctionCall(builtins.IsNull, [a]),
  isNotNull: (a: Expression) => new FunctionCall(builtins.IsNotNull, [a]),
  max: (a: Expression) => new FunctionCall(builtins.Max, [a]),
  min: (a: Expression) => new FunctionCall(builtins.Min, [a]),
  sum: (a: Expression) => new FunctionCall(builtins.Sum, [a]),
  avg: (a: Expression) => new FunctionCall(builtins.Avg, [a]),
  count: (a: Expression) => new FunctionCall(builtins.Count, [a]),
  countAll: () => new FunctionCall(builtins.CountAll, []),
  asc: (a: Expression) => new FunctionCall(builtins.Asc, [a]),
  desc: (a: Expression) => new FunctionCall(builtins.Desc, [a]),
};

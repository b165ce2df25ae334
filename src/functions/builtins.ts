import { Types, type ConcreteKind } from '../types/model.js';
import { defineFunction, type FunctionSignature, type ReturnResolver } from './signature.js';

const ARITHMETIC_KINDS: readonly ConcreteKind[] = ['number', 'string'];

const T = Types.typeVar('T');
const Arith = Types.typeVar('T', ARITHMETIC_KINDS);
const Num = Types.typeVar('T', ['number']);

/** `Collection[T]` when any argument was column-bound, `T` otherwise. */
const sameShape: ReturnResolver = (matched, mapping) => {
  const binding = mapping.get('T');
  const t = binding === undefined ? Types.any : binding.type;
  return matched.some((m) => m.kind === 'collection') ? Types.collection(t) : t;
};

function arithmetic(name: string): FunctionSignature {
  return defineFunction({
    name,
    params: [Types.scalarOrColumn(Arith), Types.scalarOrColumn(Arith)],
    returns: sameShape,
  });
}

function comparison(name: string): FunctionSignature {
  return defineFunction({
    name,
    params: [Types.scalarOrColumn(T), Types.scalarOrColumn(T)],
    returns: Types.boolean,
  });
}

function logical(name: string): FunctionSignature {
  return defineFunction({
    name,
    params: [Types.scalarOrColumn(Types.boolean), Types.scalarOrColumn(Types.boolean)],
    returns: Types.boolean,
  });
}

export const Add = arithmetic('add');
export const Subtract = arithmetic('subtract');
export const Multiply = arithmetic('multiply');
export const Divide = arithmetic('divide');
export const Modulo = arithmetic('modulo');

export const Equals = comparison('equals');
export const NotEquals = comparison('not_equals');
export const LessThan = comparison('less_than');
export const LessThanOrEqual = comparison('less_than_or_equal');
export const GreaterThan = comparison('greater_than');
export const GreaterThanOrEqual = comparison('greater_than_or_equal');

export const And = logical('and');
export const Or = logical('or');
export const Xor = logical('xor');

export const Not = defineFunction({
  name: 'not',
  params: [Types.scalarOrColumn(Types.boolean)],
  returns: Types.boolean,
});

export const Like = defineFunction({
  name: 'like',
  params: [Types.scalarOrColumn(Types.string), Types.scalarOrColumn(Types.string)],
  returns: Types.boolean,
});

export const In = defineFunction({
  name: 'in',
  params: [Types.scalarOrColumn(T), Types.collection(T)],
  returns: Types.boolean,
});

export const IsNull = defineFunction({ name: 'is_null', params: [Types.any], returns: Types.boolean });
export const IsNotNull = defineFunction({ name: 'is_not_null', params: [Types.any], returns: Types.boolean });

export const Max = defineFunction({ name: 'max', params: [Types.collection(T)], returns: T });
export const Min = defineFunction({ name: 'min', params: [Types.collection(T)], returns: T });
export const Sum = defineFunction({ name: 'sum', params: [Types.collection(Num)], returns: Num });
export const Avg = defineFunction({ name: 'avg', params: [Types.collection(Num)], returns: Num });
export const Count = defineFunction({
  name: 'count',
  params: [Types.collection(Types.any)],
  returns: Types.number,
});
export const CountAll = defineFunction({ name: 'count_all', params: [], returns: Types.number });

export const Asc = defineFunction({ name: 'asc', params: [Types.collection(T)], returns: Types.collection(T) });
export const Desc = defineFunction({ name: 'desc', params: [Types.collection(T)], returns: Types.collection(T) });

export const BUILTIN_FUNCTIONS: readonly FunctionSignature[] = [
  Add,
  Subtract,
  Multiply,
  Divide,
  Modulo,
  Equals,
  NotEquals,
  LessThan,
  LessThanOrEqual,
  GreaterThan,
  GreaterThanOrEqual,
  And,
  Or,
  Xor,
  Not,
  Like,
  In,
  IsNull,
  IsNotNull,
  Max,
  Min,
  Sum,
  Avg,
  Count,
  CountAll,
  Asc,
  Desc,
];

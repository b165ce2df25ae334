import { describe, it, expect, vi } from 'vitest';
import { Table } from '../../src/schema/table.js';
import { Aliased, FunctionCall, Literal, literal } from '../../src/functions/expression.js';
import { fn } from '../../src/functions/fn.js';
import { defineFunction } from '../../src/functions/signature.js';
import { FunctionRegistry, functions } from '../../src/functions/registry.js';
import { KindCompatibility, Types } from '../../src/types/model.js';
import {
  FunctionDefinitionError,
  InvalidArgumentError,
  TypeMismatchError,
  TypeVariableConflictError,
  UnknownFunctionError,
} from '../../src/errors.js';
import { expectThrow } from './helpers.js';

const books = new Table('books', {
  id: Types.number,
  title: Types.string,
  price: Types.number,
  published: Types.date,
  in_stock: Types.boolean,
});
const price = books.column('price');
const title = books.column('title');
const inStock = books.column('in_stock');
const published = books.column('published');

describe('Function layer', () => {

  // ---------------------------------------------------------------------------
  // Arithmetic
  // ---------------------------------------------------------------------------
  describe('arithmetic', () => {
    it('a column operand makes the result column-bound', () => {
      expect(price.add(1).type).toEqual(Types.collection(Types.number));
    });

    it('scalar operands give a scalar', () => {
      expect(literal.number(1).add(2).type).toEqual(Types.number);
    });

    it('accepts strings', () => {
      expect(title.add('!').type).toEqual(Types.collection(Types.string));
    });

    it('mixing kinds is a type variable conflict', () => {
      const e = expectThrow(TypeVariableConflictError, () => price.add('x'));
      expect(e.functionName).toBe('add');
      expect(e.variable).toBe('T');
    });

    it('rejects a kind outside the arithmetic bound', () => {
      const e = expectThrow(TypeMismatchError, () => inStock.add(1));
      expect(e.index).toBe(0);
      expect(e.expected).toBe('Union[T, Collection[T]]');
      expect(e.actual).toBe('Collection[Boolean]');
    });

    it('fn forms accept a literal on the left', () => {
      const call = fn.subtract(100, price);
      expect(call.name).toBe('subtract');
      expect(call.type).toEqual(Types.collection(Types.number));
    });
  });

  // ---------------------------------------------------------------------------
  // Comparison and logic
  // ---------------------------------------------------------------------------
  describe('comparison and logic', () => {
    it('comparison returns Boolean and records the binding', () => {
      const call = price.greaterThan(100);
      expect(call.type).toEqual(Types.boolean);
      expect(call.matchedTypes).toEqual([Types.collection(Types.number), Types.number]);
      expect(call.typeVarMapping.get('T')).toEqual({ indices: [0, 1], type: Types.number });
    });

    it('rejects a String second argument to a Boolean-only function', () => {
      const e = expectThrow(TypeMismatchError, () => inStock.and('yes'));
      expect(e.functionName).toBe('and');
      expect(e.index).toBe(1);
      expect(e.actual).toBe('String');
    });

    it('dates and datetimes do not mix by default', () => {
      expect(() => published.equals(new Date(Date.UTC(2024, 0, 1)))).toThrow(TypeVariableConflictError);
      expect(published.equals(literal.date('2024-01-01')).type).toEqual(Types.boolean);
    });

    it('null literals match any comparison', () => {
      expect(title.equals(null).typeVarMapping.get('T')?.type).toEqual(Types.string);
    });

    it('not and isNull take one argument', () => {
      expect(inStock.not().args).toHaveLength(1);
      expect(title.isNull().type).toEqual(Types.boolean);
      expect(fn.isNotNull(published).name).toBe('is_not_null');
    });
  });

  // ---------------------------------------------------------------------------
  // Membership
  // ---------------------------------------------------------------------------
  describe('in', () => {
    it('accepts a homogeneous list', () => {
      const call = price.in([1, 2, 3]);
      expect(call.args[1]).toEqual({ kind: 'list', values: [1, 2, 3], type: Types.collection(Types.number) });
    });

    it('rejects a list of another kind', () => {
      expect(() => price.in(['a'])).toThrow(TypeVariableConflictError);
    });

    it('rejects a mixed list', () => {
      const e = expectThrow(InvalidArgumentError, () => price.in([1, 'a']));
      expect(e.method).toBe('in');
    });

    it('rejects an empty list', () => {
      const e = expectThrow(InvalidArgumentError, () => price.in([]));
      expect(e.method).toBe('in');
      expect(e.message).toBe('in(): a value list needs at least one value');
    });

    it('rejects a scalar right-hand side', () => {
      expect(() => price.in(3)).toThrow(TypeMismatchError);
    });
  });

  // ---------------------------------------------------------------------------
  // Aggregates and ordering
  // ---------------------------------------------------------------------------
  describe('aggregates', () => {
    it('max and min unwrap the column type', () => {
      expect(price.max().type).toEqual(Types.number);
      expect(title.min().type).toEqual(Types.string);
    });

    it('sum and avg need numbers', () => {
      expect(price.sum().type).toEqual(Types.number);
      expect(() => title.avg()).toThrow(TypeMismatchError);
    });

    it('count takes any column and countAll none', () => {
      expect(title.count().type).toEqual(Types.number);
      expect(fn.countAll().args).toEqual([]);
    });

    it('aggregates reject scalars', () => {
      expect(() => literal.number(3).max()).toThrow(TypeMismatchError);
    });

    it('asc and desc keep the column type', () => {
      expect(price.desc().type).toEqual(Types.collection(Types.number));
    });
  });

  // ---------------------------------------------------------------------------
  // Literals
  // ---------------------------------------------------------------------------
  describe('literals', () => {
    it('infers types from values', () => {
      expect(literal.of('x').type).toEqual(Types.string);
      expect(literal.of(1).type).toEqual(Types.number);
      expect(literal.of(true).type).toEqual(Types.boolean);
      expect(literal.of(new Date(0)).type).toEqual(Types.datetime);
      expect(literal.of(null).type).toEqual(Types.any);
    });

    it('typed constructors override inference', () => {
      expect(literal.time('09:30:00').type).toEqual(Types.time);
      expect(new Literal('2024-01-01', Types.date).toNode()).toEqual({
        kind: 'literal',
        value: '2024-01-01',
        type: Types.date,
      });
    });

    it('as() wraps an expression with an alias', () => {
      const aliased = price.max().as('top_price');
      expect(aliased).toBeInstanceOf(Aliased);
      expect(aliased.alias).toBe('top_price');
    });
  });

  // ---------------------------------------------------------------------------
  // Custom signatures
  // ---------------------------------------------------------------------------
  describe('custom signatures', () => {
    it('uses the signature compatibility table', () => {
      const DaysBetween = defineFunction({
        name: 'days_between',
        params: [Types.scalarOrColumn(Types.date), Types.scalarOrColumn(Types.date)],
        returns: Types.number,
        compatibility: KindCompatibility.of([['date', 'datetime']]),
      });
      const call = fn.call(DaysBetween, published, new Date(Date.UTC(2024, 0, 1)));
      expect(call.type).toEqual(Types.number);
    });

    it('a resolver returning a union is a definition error', () => {
      const Broken = defineFunction({
        name: 'broken',
        params: [Types.any],
        returns: () => Types.scalarOrColumn(Types.number),
      });
      expect(() => new FunctionCall(Broken, [1])).toThrow(FunctionDefinitionError);
    });

    it('a return variable no parameter binds is a definition error', () => {
      const Orphan = defineFunction({ name: 'orphan', params: [Types.number], returns: Types.typeVar('U') });
      const e = expectThrow(FunctionDefinitionError, () => new FunctionCall(Orphan, [1]));
      expect(e.functionName).toBe('orphan');
    });

    it('defineFunction freezes the signature', () => {
      const sig = defineFunction({ name: 'frozen', params: [Types.number], returns: Types.number });
      expect(Object.isFrozen(sig)).toBe(true);
      expect(Object.isFrozen(sig.params)).toBe(true);
    });
  });
});

describe('FunctionRegistry', () => {
  const Concat = defineFunction({
    name: 'concat',
    params: [Types.scalarOrColumn(Types.string), Types.scalarOrColumn(Types.string)],
    returns: Types.string,
  });

  it('ships the built-in operators', () => {
    expect(functions.has('add')).toBe(true);
    expect(functions.has('count_all')).toBe(true);
    expect(functions.call('equals', price, 3).name).toBe('equals');
  });

  it('rejects duplicate names unless replacing', () => {
    const onReplace = vi.fn();
    const registry = new FunctionRegistry([Concat], { onReplace });
    expect(() => registry.register(Concat)).toThrow(FunctionDefinitionError);
    registry.register(Concat, { replace: true });
    expect(onReplace).toHaveBeenCalledWith('concat');
  });

  it('reports replacements through console.warn by default', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    try {
      new FunctionRegistry([Concat]).register(Concat, { replace: true });
      expect(warn).toHaveBeenCalledWith('[functions] replacing signature "concat"');
    } finally {
      warn.mockRestore();
    }
  });

  it('throws for unknown names', () => {
    const e = expectThrow(UnknownFunctionError, () => new FunctionRegistry().get('nope'));
    expect(e.functionName).toBe('nope');
  });

  it('lists names in registration order', () => {
    expect(new FunctionRegistry([Concat]).names()).toEqual(['concat']);
  });
});

import reservedWords from './reserved-words.json' with { type: 'json' };
import { delimitedQuoting, type Dialect, type Keywords, type RenderRule } from './types.js';
import type { StatementCommand } from '../query/types.js';

export const RESERVED_WORDS: ReadonlySet<string> = new Set(reservedWords);

// Binding strength of infix operators; a looser operand gets parenthesized.
export const Precedence = {
  or: 1,
  and: 2,
  comparison: 3,
  additive: 4,
  multiplicative: 5,
} as const;

function infix(operator: string, precedence: number): RenderRule {
  return { form: 'infix', operator, precedence };
}

function comparison(operator: string): RenderRule {
  return { form: 'infix', operator, precedence: Precedence.comparison, nonAssociative: true };
}

const GENERIC_FUNCTIONS: Readonly<Record<string, RenderRule>> = {
  add: infix('+', Precedence.additive),
  subtract: infix('-', Precedence.additive),
  multiply: infix('*', Precedence.multiplicative),
  divide: infix('/', Precedence.multiplicative),
  modulo: infix('%', Precedence.multiplicative),

  equals: comparison('='),
  not_equals: comparison('<>'),
  less_than: comparison('<'),
  less_than_or_equal: comparison('<='),
  greater_than: comparison('>'),
  greater_than_or_equal: comparison('>='),
  like: comparison('like'),

  and: infix('and', Precedence.and),
  or: infix('or', Precedence.or),
  xor: infix('xor', Precedence.or),
  not: { form: 'prefix', operator: 'not' },

  in: { form: 'list', operator: 'in' },
  is_null: { form: 'postfix', operator: 'is null' },
  is_not_null: { form: 'postfix', operator: 'is not null' },

  max: { form: 'call', name: 'max' },
  min: { form: 'call', name: 'min' },
  sum: { form: 'call', name: 'sum' },
  avg: { form: 'call', name: 'avg' },
  count: { form: 'call', name: 'count' },
  count_all: { form: 'custom', render: (_args, keyword) => `${keyword('count')}(*)` },

  asc: { form: 'postfix', operator: 'asc' },
  desc: { form: 'postfix', operator: 'desc' },
};

const GENERIC_KEYWORDS: Keywords = {
  select: 'select',
  distinct: 'distinct',
  from: 'from',
  where: 'where',
  groupBy: 'group by',
  having: 'having',
  orderBy: 'order by',
  limit: 'limit',
  offset: 'offset',
  top: 'top',
  rows: 'rows',
  fetchFirst: 'fetch first',
  fetchNext: 'fetch next',
  only: 'only',
  as: 'as',
  and: 'and',
  or: 'or',
  on: 'on',
  using: 'using',
  innerJoin: 'inner join',
  outerJoin: 'outer join',
  leftJoin: 'left join',
  rightJoin: 'right join',
  crossJoin: 'cross join',
  insertInto: 'insert into',
  values: 'values',
  update: 'update',
  set: 'set',
  deleteFrom: 'delete from',
  createTable: 'create table',
  dropTable: 'drop table',
  ifExists: 'if exists',
  ifNotExists: 'if not exists',
  true: 'true',
  false: 'false',
  null: 'null',
};

export const ALL_COMMANDS: ReadonlySet<StatementCommand> = new Set<StatementCommand>([
  'select',
  'insert',
  'update',
  'delete',
  'create',
  'drop',
]);

function quoteString(value: string): string {
  return `'${value.replace(/'/g, "''")}'`;
}

export const genericDialect: Dialect = {
  name: 'generic',
  functions: GENERIC_FUNCTIONS,
  keywords: GENERIC_KEYWORDS,
  quoting: delimitedQuoting('"', '"', RESERVED_WORDS),
  literals: {
    string: quoteString,
    temporal: (_kind, text) => quoteString(text),
  },
  pagination: 'limit-offset',
  typeNames: {
    boolean: 'boolean',
    number: 'numeric',
    string: 'text',
    date: 'date',
    time: 'time',
    datetime: 'timestamp',
  },
  commands: ALL_COMMANDS,
};

import pg from 'pg';
import { extendDialect, type Dialect } from './types.js';
import { genericDialect, Precedence, RESERVED_WORDS } from './generic.js';
import { defineFunction } from '../functions/signature.js';
import { Types } from '../types/model.js';

/** Case-insensitive LIKE. */
export const ILike = defineFunction({
  name: 'ilike',
  params: [Types.scalarOrColumn(Types.string), Types.scalarOrColumn(Types.string)],
  returns: Types.boolean,
});

// escapeLiteral switches to E'' syntax (with a leading space) when the value holds a backslash.
function quoteString(value: string): string {
  return pg.escapeLiteral(value).trimStart();
}

export const postgresDialect: Dialect = extendDialect(genericDialect, {
  name: 'postgres',
  functions: {
    ilike: { form: 'infix', operator: 'ilike', precedence: Precedence.comparison, nonAssociative: true },
    // boolean inequality is exclusive or
    xor: { form: 'infix', operator: '<>', precedence: Precedence.comparison, nonAssociative: true },
  },
  keywords: { outerJoin: 'full outer join' },
  quoting: {
    mode: 'as-needed',
    reserved: RESERVED_WORDS,
    quote: (name) => pg.escapeIdentifier(name),
  },
  literals: {
    string: quoteString,
    temporal: (_kind, text) => quoteString(text),
  },
});

import { delimitedQuoting, extendDialect, type Dialect } from './types.js';
import { genericDialect, Precedence, RESERVED_WORDS } from './generic.js';

// Backslash is an escape character inside MySQL string literals.
function quoteString(value: string): string {
  return `'${value.replace(/\\/g, '\\\\').replace(/'/g, "''")}'`;
}

export const mysqlDialect: Dialect = extendDialect(genericDialect, {
  name: 'mysql',
  functions: {
    modulo: { form: 'infix', operator: 'mod', precedence: Precedence.multiplicative },
  },
  quoting: delimitedQuoting('`', '`', RESERVED_WORDS),
  literals: {
    string: quoteString,
    temporal: (_kind, text) => quoteString(text),
  },
  typeNames: {
    number: 'double',
    string: 'varchar(255)',
    datetime: 'datetime',
  },
});

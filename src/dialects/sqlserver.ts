import { delimitedQuoting, extendDialect, type Dialect } from './types.js';
import { genericDialect, RESERVED_WORDS } from './generic.js';

export const sqlserverDialect: Dialect = extendDialect(genericDialect, {
  name: 'sqlserver',
  functions: {
    xor: null,
  },
  keywords: {
    outerJoin: 'full outer join',
    true: '1',
    false: '0',
  },
  quoting: delimitedQuoting('[', ']', RESERVED_WORDS),
  pagination: 'top',
  typeNames: {
    boolean: 'bit',
    number: 'float',
    string: 'nvarchar(max)',
    datetime: 'datetime2',
  },
});

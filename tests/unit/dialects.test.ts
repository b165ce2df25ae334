import { describe, it, expect, vi } from 'vitest';
import { query } from '../../src/query/query-object.js';
import { Table } from '../../src/schema/table.js';
import { fn } from '../../src/functions/fn.js';
import { defineFunction } from '../../src/functions/signature.js';
import { Types } from '../../src/types/model.js';
import { delimitedQuoting, extendDialect } from '../../src/dialects/types.js';
import { genericDialect, Precedence, RESERVED_WORDS } from '../../src/dialects/generic.js';
import { ILike, postgresDialect } from '../../src/dialects/postgres.js';
import { DialectRegistry, dialects } from '../../src/dialects/registry.js';
import { CompileError, UnknownDialectError, UnresolvedFunctionRenderError } from '../../src/errors.js';
import { expectThrow } from './helpers.js';

const books = new Table('books', {
  id: Types.number,
  title: Types.string,
  price: Types.number,
  published: Types.datetime,
  in_stock: Types.boolean,
});
const authors = new Table('authors', { id: Types.number, name: Types.string });
const order = new Table('order', { user: Types.string });

const title = books.column('title');
const price = books.column('price');
const inStock = books.column('in_stock');

const Concat = defineFunction({
  name: 'concat',
  params: [Types.scalarOrColumn(Types.string), Types.scalarOrColumn(Types.string)],
  returns: Types.string,
});

describe('Dialects', () => {

  // ---------------------------------------------------------------------------
  // Registry
  // ---------------------------------------------------------------------------
  describe('registry', () => {
    it('ships the built-in dialects', () => {
      expect(dialects.names()).toEqual(['generic', 'postgres', 'mysql', 'sqlserver']);
      expect(dialects.get('postgres')).toBe(postgresDialect);
    });

    it('throws for unknown names', () => {
      const e = expectThrow(UnknownDialectError, () => new DialectRegistry().get('oracle'));
      expect(e.dialect).toBe('oracle');
    });

    it('extend derives and registers a dialect', () => {
      const registry = new DialectRegistry([genericDialect]);
      const custom = registry.extend('generic', {
        name: 'custom',
        functions: { concat: { form: 'infix', operator: '||', precedence: Precedence.additive } },
      });
      expect(registry.get('custom')).toBe(custom);
      expect(query.select(fn.call(Concat, title, '!').as('shout')).from(books).compile(custom)).toBe(
        "select title || '!' as shout from books;",
      );
    });

    it('reports replacements through the hook', () => {
      const onReplace = vi.fn();
      const registry = new DialectRegistry([genericDialect], { onReplace });
      registry.register(genericDialect);
      expect(onReplace).toHaveBeenCalledWith('generic');
    });

    it('reports replacements through console.warn by default', () => {
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
      try {
        new DialectRegistry([genericDialect, genericDialect]);
        expect(warn).toHaveBeenCalledWith('[dialects] replacing dialect "generic"');
      } finally {
        warn.mockRestore();
      }
    });
  });

  // ---------------------------------------------------------------------------
  // Extension
  // ---------------------------------------------------------------------------
  describe('extendDialect', () => {
    it('inherits entries it does not override', () => {
      const child = extendDialect(genericDialect, { name: 'child', keywords: { select: 'pick' } });
      expect(child.functions).toEqual(genericDialect.functions);
      expect(query.select().from(books).compile(child)).toBe('pick * from books;');
      expect(genericDialect.keywords.select).toBe('select');
    });

    it('null removes an inherited rule', () => {
      const child = extendDialect(genericDialect, { name: 'no-like', functions: { like: null } });
      expect(child.functions['like']).toBeUndefined();
      expect(() => query.select().from(books).where(title.like('a%')).compile(child)).toThrow(
        UnresolvedFunctionRenderError,
      );
    });

    it('custom render rules receive rendered operands', () => {
      const child = extendDialect(genericDialect, {
        name: 'shouting',
        functions: { concat: { form: 'custom', render: (args, keyword) => `${keyword('concat')}(${args.join(', ')})` } },
      });
      expect(query.select(fn.call(Concat, title, 'x')).from(books).compile(child, { keywordCase: 'upper' })).toBe(
        "SELECT CONCAT(title, 'x') FROM books;",
      );
    });

    it('restricts the supported commands', () => {
      const readOnly = extendDialect(genericDialect, { name: 'read-only', commands: new Set(['select'] as const) });
      const e = expectThrow(CompileError, () => query.delete().from(books).compile(readOnly));
      expect(e.message).toBe('[read-only] delete statements are not supported');
    });

    it('always-quoting policy quotes every identifier', () => {
      const quoted = extendDialect(genericDialect, {
        name: 'quoted',
        quoting: delimitedQuoting('"', '"', RESERVED_WORDS, 'always'),
      });
      expect(query.select(title).from(books).compile(quoted)).toBe('select "title" from "books";');
    });

    it('fetch-first pagination', () => {
      const ansi = extendDialect(genericDialect, { name: 'ansi', pagination: 'fetch-first' });
      expect(query.select().from(books).fetch(5).skip(10).compile(ansi)).toBe(
        'select * from books offset 10 rows fetch first 5 rows only;',
      );
      expect(query.select().from(books).fetch(5).compile(ansi)).toBe('select * from books fetch first 5 rows only;');
    });
  });

  // ---------------------------------------------------------------------------
  // Postgres
  // ---------------------------------------------------------------------------
  describe('postgres', () => {
    it('escapes string literals', () => {
      expect(query.select().from(books).where(title.equals("it's")).compile('postgres')).toBe(
        "select * from books where title = 'it''s';",
      );
    });

    it('uses E-strings for backslashes', () => {
      expect(query.select().from(books).where(title.equals('a\\b')).compile('postgres')).toBe(
        "select * from books where title = E'a\\\\b';",
      );
    });

    it('quotes reserved identifiers', () => {
      expect(query.select(order.column('user')).from(order).compile('postgres')).toBe(
        'select "user" from "order";',
      );
    });

    it('renders ilike, which other dialects lack', () => {
      const q = query.select().from(books).where(fn.call(ILike, title, '%dune%'));
      expect(q.compile('postgres')).toBe("select * from books where title ilike '%dune%';");
      expect(() => q.compile('generic')).toThrow(UnresolvedFunctionRenderError);
    });

    it('renders xor as boolean inequality', () => {
      expect(query.select().from(books).where(inStock.xor(true)).compile('postgres')).toBe(
        'select * from books where in_stock <> true;',
      );
    });

    it('parenthesizes a comparison on the left of xor', () => {
      const q = query.select().from(books).where(price.greaterThan(1).xor(inStock));
      expect(q.compile('postgres')).toBe('select * from books where (price > 1) <> in_stock;');
      expect(q.compile('generic')).toBe('select * from books where price > 1 xor in_stock;');
    });

    it('renders outer joins as full outer joins', () => {
      expect(query.select().from(books).outerJoin(authors).using('id').compile('postgres')).toBe(
        'select books.*, authors.* from books full outer join authors using (id);',
      );
    });
  });

  // ---------------------------------------------------------------------------
  // MySQL
  // ---------------------------------------------------------------------------
  describe('mysql', () => {
    it('quotes with backticks', () => {
      expect(query.select(order.column('user')).from(order).compile('mysql')).toBe('select `user` from `order`;');
    });

    it('escapes backslashes in strings', () => {
      expect(query.select().from(books).where(title.equals('a\\b')).compile('mysql')).toBe(
        "select * from books where title = 'a\\\\b';",
      );
    });

    it('renders modulo with mod', () => {
      expect(query.select(price.modulo(3)).from(books).compile('mysql')).toBe('select price mod 3 from books;');
    });
  });

  // ---------------------------------------------------------------------------
  // SQL Server
  // ---------------------------------------------------------------------------
  describe('sqlserver', () => {
    it('limits with top', () => {
      expect(query.select(title).from(books).fetch(5).compile('sqlserver')).toBe('select top 5 title from books;');
      expect(query.select(title).from(books).distinct().fetch(5).compile('sqlserver')).toBe(
        'select distinct top 5 title from books;',
      );
    });

    it('pages with offset and fetch next', () => {
      expect(query.select(title).from(books).orderBy(title).fetch(5).skip(10).compile('sqlserver')).toBe(
        'select title from books order by title asc offset 10 rows fetch next 5 rows only;',
      );
      expect(query.select(title).from(books).orderBy(title).skip(10).compile('sqlserver')).toBe(
        'select title from books order by title asc offset 10 rows;',
      );
    });

    it('renders booleans as bits', () => {
      expect(query.select().from(books).where(inStock.equals(true)).compile('sqlserver')).toBe(
        'select * from books where in_stock = 1;',
      );
    });

    it('has no xor', () => {
      expect(() => query.select().from(books).where(inStock.xor(true)).compile('sqlserver')).toThrow(
        UnresolvedFunctionRenderError,
      );
    });

    it('quotes with brackets, doubling the closing one', () => {
      expect(query.select().from(new Table('a]b')).compile('sqlserver')).toBe('select * from [a]]b];');
      expect(query.select(order.column('user')).from(order).compile('sqlserver')).toBe('select [user] from [order];');
    });

    it('maps column types for create table', () => {
      expect(query.create(books).compile('sqlserver')).toBe(
        'create table books (id float, title nvarchar(max), price float, published datetime2, in_stock bit);',
      );
    });
  });
});

import { describe, it, expect } from 'vitest';

describe('Public API surface', () => {
  it('exports the query entry point', async () => {
    const { query } = await import('../../src/index.js');
    expect(typeof query.select).toBe('function');
    expect(typeof query.insertInto).toBe('function');
    expect(typeof query.drop).toBe('function');
  });

  it('exports schema, type and function building blocks', async () => {
    const api = await import('../../src/index.js');
    expect(typeof api.Table).toBe('function');
    expect(typeof api.Types.typeVar).toBe('function');
    expect(typeof api.fn.countAll).toBe('function');
    expect(api.functions.has('like')).toBe(true);
    expect(api.builtins.Like.name).toBe('like');
  });

  it('exports dialects and the registry', async () => {
    const { dialects, genericDialect, postgresDialect, mysqlDialect, sqlserverDialect } = await import(
      '../../src/index.js'
    );
    expect(dialects.get('generic')).toBe(genericDialect);
    expect(dialects.get('postgres')).toBe(postgresDialect);
    expect(dialects.get('mysql')).toBe(mysqlDialect);
    expect(dialects.get('sqlserver')).toBe(sqlserverDialect);
  });

  it('end to end through the barrel', async () => {
    const { query, Table, Types } = await import('../../src/index.js');
    const books = new Table('books', { id: Types.number, title: Types.string });
    expect(query.select(books.column('title')).from(books).where(books.column('id').equals(1)).compile()).toBe(
      'select title from books where id = 1;',
    );
  });

  it('exports error classes usable with instanceof', async () => {
    const { SqlKitError, CompileError } = await import('../../src/index.js');
    const err = new CompileError('generic', 'boom');
    expect(err).toBeInstanceOf(SqlKitError);
    expect(err.name).toBe('CompileError');
  });
});

import { emptyQueryNode, QueryBuilder, toProjectionItem, type ProjectionInput } from './builder.js';
import type { Table } from '../schema/table.js';

/**
 * Entry point for the query DSL.
 *
 * @example
 * const books = new Table('books', { id: Types.number, title: Types.string });
 * query.select(books.column('id'), [books.column('title'), 'book_title'])
 *   .from(books)
 *   .where(books.column('id').greaterThan(10))
 *   .compile('postgres');
 */
export const query = {
  /** No items selects every column. */
  select(...items: ProjectionInput[]): QueryBuilder {
    return new QueryBuilder('select', {
      ...emptyQueryNode('select'),
      projection: items.map(toProjectionItem),
    });
  },
  delete(): QueryBuilder {
    return new QueryBuilder('delete', emptyQueryNode('delete'));
  },
  insertInto(table: Table): QueryBuilder {
    return new QueryBuilder('insert', emptyQueryNode('insert', table));
  },
  update(table: Table): QueryBuilder {
    return new QueryBuilder('update', emptyQueryNode('update', table));
  },
  create(table: Table): QueryBuilder {
    return new QueryBuilder('create', emptyQueryNode('create', table));
  },
  drop(table: Table): QueryBuilder {
    return new QueryBuilder('drop', emptyQueryNode('drop', table));
  },
};

import { Types, typesEqual, type CollectionType, type SqlType } from '../types/model.js';
import { ExpressionBase } from '../functions/expression.js';
import { UnknownColumnError } from '../errors.js';
import type { ExprNode } from '../query/types.js';

/** Ordered column name → type mapping, as an object or as pairs. */
export type TableSchema = Readonly<Record<string, SqlType>> | ReadonlyArray<readonly [string, SqlType]>;

export interface TableOptions {
  /** Database (or schema) the table lives in; qualifies the table name. */
  database?: string;
}

function asColumnType(t: SqlType): CollectionType {
  return t.kind === 'collection' ? t : Types.collection(t);
}

export class Column extends ExpressionBase {
  override readonly type: CollectionType;

  constructor(
    readonly name: string,
    type: SqlType,
    readonly table: Table,
  ) {
    super();
    this.type = asColumnType(type);
  }

  /** Same table object, same name, same type. */
  sameAs(other: Column): boolean {
    return other.table === this.table && other.name === this.name && typesEqual(other.type, this.type);
  }

  override toNode(): ExprNode {
    return { kind: 'column', column: this };
  }
}

/** Every column of a table, as a projection entry. */
export class TableStar {
  constructor(readonly table: Table) {}

  toNode(): ExprNode {
    return { kind: 'star', table: this.table };
  }
}

export class Table {
  readonly database: string | null;
  private readonly columns: ReadonlyMap<string, Column> | null;

  constructor(
    readonly name: string,
    schema?: TableSchema,
    options: TableOptions = {},
  ) {
    this.database = options.database ?? null;

    if (schema === undefined) {
      this.columns = null;
    } else {
      const entries: ReadonlyArray<readonly [string, SqlType]> = isPairList(schema)
        ? schema
        : Object.entries(schema);
      this.columns = new Map(entries.map(([col, type]) => [col, new Column(col, type, this)]));
    }
  }

  get hasSchema(): boolean {
    return this.columns !== null;
  }

  get qualifiedName(): string {
    return this.database === null ? this.name : `${this.database}.${this.name}`;
  }

  /**
   * Looks a column up by name. Schema-less tables hand out a column of
   * type `Collection[Any]` for any name.
   */
  column(name: string): Column {
    if (this.columns === null) {
      return new Column(name, Types.collection(Types.any), this);
    }
    const column = this.columns.get(name);
    if (column === undefined) {
      throw new UnknownColumnError(this.qualifiedName, name);
    }
    return column;
  }

  /** Declared columns in declaration order; empty for schema-less tables. */
  schemaColumns(): Column[] {
    return this.columns === null ? [] : [...this.columns.values()];
  }

  all(): TableStar {
    return new TableStar(this);
  }
}

function isPairList(schema: TableSchema): schema is ReadonlyArray<readonly [string, SqlType]> {
  return Array.isArray(schema);
}

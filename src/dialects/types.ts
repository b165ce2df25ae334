import type { ConcreteKind } from '../types/model.js';
import type { StatementCommand } from '../query/types.js';

/** How one function kind is written out. Operands arrive already rendered. */
export type RenderRule =
  | {
      readonly form: 'infix';
      readonly operator: string;
      readonly precedence: number;
      /** Does not chain: an operand at the same precedence is parenthesized on either side. */
      readonly nonAssociative?: boolean;
    }
  | { readonly form: 'prefix'; readonly operator: string }
  | { readonly form: 'postfix'; readonly operator: string }
  | { readonly form: 'call'; readonly name: string }
  | { readonly form: 'list'; readonly operator: string }
  | {
      readonly form: 'custom';
      readonly render: (args: readonly string[], keyword: (word: string) => string) => string;
    };

export interface Keywords {
  readonly select: string;
  readonly distinct: string;
  readonly from: string;
  readonly where: string;
  readonly groupBy: string;
  readonly having: string;
  readonly orderBy: string;
  readonly limit: string;
  readonly offset: string;
  readonly top: string;
  readonly rows: string;
  readonly fetchFirst: string;
  readonly fetchNext: string;
  readonly only: string;
  readonly as: string;
  readonly and: string;
  readonly or: string;
  readonly on: string;
  readonly using: string;
  readonly innerJoin: string;
  readonly outerJoin: string;
  readonly leftJoin: string;
  readonly rightJoin: string;
  readonly crossJoin: string;
  readonly insertInto: string;
  readonly values: string;
  readonly update: string;
  readonly set: string;
  readonly deleteFrom: string;
  readonly createTable: string;
  readonly dropTable: string;
  readonly ifExists: string;
  readonly ifNotExists: string;
  readonly true: string;
  readonly false: string;
  readonly null: string;
}

export interface IdentifierQuoting {
  /** `as-needed` quotes reserved words and names that are not plain identifiers. */
  readonly mode: 'as-needed' | 'always';
  readonly reserved: ReadonlySet<string>;
  quote(name: string): string;
}

export type TemporalKind = Extract<ConcreteKind, 'date' | 'time' | 'datetime'>;

export interface LiteralFormat {
  string(value: string): string;
  temporal(kind: TemporalKind, text: string): string;
}

export type Pagination = 'limit-offset' | 'top' | 'fetch-first';

export interface Dialect {
  readonly name: string;
  readonly functions: Readonly<Record<string, RenderRule>>;
  readonly keywords: Keywords;
  readonly quoting: IdentifierQuoting;
  readonly literals: LiteralFormat;
  readonly pagination: Pagination;
  readonly typeNames: Readonly<Record<ConcreteKind, string>>;
  readonly commands: ReadonlySet<StatementCommand>;
}

export interface DialectOverrides {
  readonly name: string;
  /** Merged into the base mapping; `null` removes an inherited entry. */
  readonly functions?: Readonly<Record<string, RenderRule | null>>;
  readonly keywords?: Partial<Keywords>;
  readonly quoting?: IdentifierQuoting;
  readonly literals?: LiteralFormat;
  readonly pagination?: Pagination;
  readonly typeNames?: Partial<Record<ConcreteKind, string>>;
  readonly commands?: ReadonlySet<StatementCommand>;
}

/**
 * Builds a dialect on top of another one. Function rules, keywords and type
 * names are merged entry by entry; every other member is replaced whole.
 */
export function extendDialect(base: Dialect, overrides: DialectOverrides): Dialect {
  const functions: Record<string, RenderRule> = { ...base.functions };
  for (const [kind, rule] of Object.entries(overrides.functions ?? {})) {
    if (rule === null) {
      delete functions[kind];
    } else {
      functions[kind] = rule;
    }
  }

  return {
    name: overrides.name,
    functions,
    keywords: { ...base.keywords, ...overrides.keywords },
    quoting: overrides.quoting ?? base.quoting,
    literals: overrides.literals ?? base.literals,
    pagination: overrides.pagination ?? base.pagination,
    typeNames: { ...base.typeNames, ...overrides.typeNames },
    commands: overrides.commands ?? base.commands,
  };
}

/** Quotes with the given delimiters, doubling any closing delimiter inside the name. */
export function delimitedQuoting(
  open: string,
  close: string,
  reserved: ReadonlySet<string>,
  mode: IdentifierQuoting['mode'] = 'as-needed',
): IdentifierQuoting {
  return {
    mode,
    reserved,
    quote: (name) => `${open}${name.split(close).join(close + close)}${close}`,
  };
}

/**
 * The type algebra shared by the matcher, the function layer and the schema.
 *
 * A `collection` wraps the type carried by a column-bound value (a column, a
 * sub-query, a call that produces a column). Scalars never carry it.
 */

export type ConcreteKind = 'boolean' | 'number' | 'string' | 'date' | 'time' | 'datetime';

export const CONCRETE_KINDS: readonly ConcreteKind[] = [
  'boolean',
  'number',
  'string',
  'date',
  'time',
  'datetime',
];

export type AnyType = { readonly kind: 'any' };
export type ConcreteType = { readonly kind: 'concrete'; readonly name: ConcreteKind };
export type CollectionType = { readonly kind: 'collection'; readonly inner: SqlType };
export type UnionType = { readonly kind: 'union'; readonly alternatives: readonly SqlType[] };
export type TypeVariable = {
  readonly kind: 'typevar';
  readonly id: string;
  readonly bound: readonly ConcreteKind[];
};

export type SqlType = AnyType | ConcreteType | CollectionType | UnionType | TypeVariable;

/** A type a value can actually carry once matching is done. */
export type ResolvedType =
  | AnyType
  | ConcreteType
  | { readonly kind: 'collection'; readonly inner: AnyType | ConcreteType };

const ANY: AnyType = { kind: 'any' };

function concrete(name: ConcreteKind): ConcreteType {
  return { kind: 'concrete', name };
}

export const Types = {
  any: ANY,
  boolean: concrete('boolean'),
  number: concrete('number'),
  string: concrete('string'),
  date: concrete('date'),
  time: concrete('time'),
  datetime: concrete('datetime'),

  concrete,

  collection(inner: SqlType): CollectionType {
    return { kind: 'collection', inner };
  },

  union(...alternatives: SqlType[]): UnionType {
    return { kind: 'union', alternatives };
  },

  typeVar(id: string, bound: readonly ConcreteKind[] = CONCRETE_KINDS): TypeVariable {
    return { kind: 'typevar', id, bound: [...bound] };
  },

  /** `Union[T, Collection[T]]`: a scalar or a column carrying T. */
  scalarOrColumn(inner: SqlType): UnionType {
    return { kind: 'union', alternatives: [inner, { kind: 'collection', inner }] };
  },
} as const;

// ---------------------------------------------------------------------------
// Capability queries
// ---------------------------------------------------------------------------

export function isAny(t: SqlType): t is AnyType {
  return t.kind === 'any';
}

export function isConcrete(t: SqlType): t is ConcreteType {
  return t.kind === 'concrete';
}

export function isCollection(t: SqlType): t is CollectionType {
  return t.kind === 'collection';
}

/** Strips one collection layer; other types come back unchanged. */
export function innerType(t: SqlType): SqlType {
  return t.kind === 'collection' ? t.inner : t;
}

export function isResolved(t: SqlType): t is ResolvedType {
  if (t.kind === 'any' || t.kind === 'concrete') return true;
  if (t.kind === 'collection') return t.inner.kind === 'any' || t.inner.kind === 'concrete';
  return false;
}

export function typesEqual(a: SqlType, b: SqlType): boolean {
  switch (a.kind) {
    case 'any':
      return b.kind === 'any';
    case 'concrete':
      return b.kind === 'concrete' && a.name === b.name;
    case 'collection':
      return b.kind === 'collection' && typesEqual(a.inner, b.inner);
    case 'union':
      return (
        b.kind === 'union' &&
        a.alternatives.length === b.alternatives.length &&
        a.alternatives.every((alt, i) => {
          const other = b.alternatives[i];
          return other !== undefined && typesEqual(alt, other);
        })
      );
    case 'typevar':
      return (
        b.kind === 'typevar' &&
        a.id === b.id &&
        a.bound.length === b.bound.length &&
        a.bound.every((k) => b.bound.includes(k))
      );
  }
}

const KIND_LABELS: Record<ConcreteKind, string> = {
  boolean: 'Boolean',
  number: 'Number',
  string: 'String',
  date: 'Date',
  time: 'Time',
  datetime: 'DateTime',
};

export function describeType(t: SqlType): string {
  switch (t.kind) {
    case 'any':
      return 'Any';
    case 'concrete':
      return KIND_LABELS[t.name];
    case 'collection':
      return `Collection[${describeType(t.inner)}]`;
    case 'union':
      return `Union[${t.alternatives.map(describeType).join(', ')}]`;
    case 'typevar':
      return t.id;
  }
}

// ---------------------------------------------------------------------------
// Kind compatibility
// ---------------------------------------------------------------------------

/**
 * Symmetric table of concrete kinds that may stand in for one another.
 * The default table is empty: a kind only matches itself.
 */
export class KindCompatibility {
  private readonly pairs: ReadonlySet<string>;

  private constructor(pairs: ReadonlySet<string>) {
    this.pairs = pairs;
  }

  static strict(): KindCompatibility {
    return new KindCompatibility(new Set());
  }

  static of(pairs: ReadonlyArray<readonly [ConcreteKind, ConcreteKind]>): KindCompatibility {
    const keys = new Set<string>();
    for (const [a, b] of pairs) {
      keys.add(`${a}:${b}`);
      keys.add(`${b}:${a}`);
    }
    return new KindCompatibility(keys);
  }

  compatible(a: ConcreteKind, b: ConcreteKind): boolean {
    return a === b || this.pairs.has(`${a}:${b}`);
  }
}

export const strictCompatibility = KindCompatibility.strict();

import {
  describeType,
  strictCompatibility,
  Types,
  typesEqual,
  type KindCompatibility,
  type SqlType,
  type TypeVariable,
} from './model.js';
import { ArityError, FunctionDefinitionError, TypeMismatchError, TypeVariableConflictError } from '../errors.js';

export interface TypeVarBinding {
  /** Sorted argument indices whose match involved the variable. */
  readonly indices: readonly number[];
  readonly type: SqlType;
}

export type TypeVarMapping = ReadonlyMap<string, TypeVarBinding>;

/** One entry per parameter: the alternative it satisfied, type variables substituted. */
export type MatchedTypes = readonly SqlType[];

export interface MatchResult {
  matchedTypes: MatchedTypes;
  mapping: TypeVarMapping;
}

export interface MatchOptions {
  compatibility?: KindCompatibility;
}

interface Candidate {
  variable: TypeVariable;
  index: number;
  type: SqlType;
}

/**
 * Unifies one expected type expression against one actual type.
 * Returns the matched expression (type variables still in place) or null.
 * Candidates are only pushed for the branch that finally matched.
 */
function unify(
  expected: SqlType,
  actual: SqlType,
  index: number,
  compat: KindCompatibility,
  out: Candidate[],
): SqlType | null {
  if (expected.kind === 'any') {
    return actual;
  }

  if (expected.kind === 'union') {
    for (const alternative of expected.alternatives) {
      const pending: Candidate[] = [];
      const matched = unify(alternative, actual, index, compat, pending);
      if (matched !== null) {
        out.push(...pending);
        return matched;
      }
    }
    return null;
  }

  if (actual.kind === 'any') {
    for (const variable of typeVariablesOf(expected)) {
      out.push({ variable, index, type: Types.any });
    }
    return expected;
  }

  if (expected.kind === 'typevar') {
    const stripped = actual.kind === 'collection';
    const base = stripped ? actual.inner : actual;
    if (base.kind === 'any') {
      out.push({ variable: expected, index, type: Types.any });
    } else if (base.kind === 'concrete' && expected.bound.some((k) => compat.compatible(k, base.name))) {
      out.push({ variable: expected, index, type: base });
    } else {
      return null;
    }
    return stripped ? Types.collection(expected) : expected;
  }

  if (expected.kind === 'collection') {
    if (actual.kind !== 'collection') return null;
    const inner = unify(expected.inner, actual.inner, index, compat, out);
    return inner === null ? null : Types.collection(inner);
  }

  // expected.kind === 'concrete'
  if (actual.kind === 'concrete' && compat.compatible(expected.name, actual.name)) {
    return expected;
  }
  return null;
}

function typeVariablesOf(t: SqlType): TypeVariable[] {
  switch (t.kind) {
    case 'typevar':
      return [t];
    case 'collection':
      return typeVariablesOf(t.inner);
    case 'union': {
      const first = t.alternatives[0];
      return first === undefined ? [] : typeVariablesOf(first);
    }
    default:
      return [];
  }
}

function reconcile(
  functionName: string,
  candidates: readonly Candidate[],
  compat: KindCompatibility,
): Map<string, TypeVarBinding> {
  const groups = new Map<string, Candidate[]>();
  for (const candidate of candidates) {
    const group = groups.get(candidate.variable.id);
    if (group === undefined) {
      groups.set(candidate.variable.id, [candidate]);
    } else {
      group.push(candidate);
    }
  }

  const mapping = new Map<string, TypeVarBinding>();
  for (const [id, group] of groups) {
    const indices = [...new Set(group.map((c) => c.index))].sort((a, b) => a - b);
    const typed = group.filter((c) => c.type.kind !== 'any');
    const first = typed[0];

    if (first === undefined) {
      mapping.set(id, { indices, type: Types.any });
      continue;
    }

    const agrees = typed.every((c) => {
      if (typesEqual(c.type, first.type)) return true;
      return (
        c.type.kind === 'concrete' &&
        first.type.kind === 'concrete' &&
        compat.compatible(c.type.name, first.type.name)
      );
    });

    if (!agrees) {
      throw new TypeVariableConflictError(
        functionName,
        id,
        typed.map((c) => describeType(c.type)),
        [...new Set(typed.map((c) => c.index))].sort((a, b) => a - b),
      );
    }

    // Under a compatibility table the earliest typed argument decides the binding.
    mapping.set(id, { indices, type: first.type });
  }
  return mapping;
}

/**
 * Replaces every type variable in `t` with its binding.
 * An unbound variable or a union means the definition is broken.
 */
export function substituteType(functionName: string, t: SqlType, mapping: TypeVarMapping): SqlType {
  switch (t.kind) {
    case 'any':
    case 'concrete':
      return t;
    case 'collection':
      return Types.collection(substituteType(functionName, t.inner, mapping));
    case 'typevar': {
      const binding = mapping.get(t.id);
      if (binding === undefined) {
        throw new FunctionDefinitionError(functionName, `type variable ${t.id} is not bound by any parameter`);
      }
      return binding.type;
    }
    case 'union':
      throw new FunctionDefinitionError(functionName, `cannot produce an unresolved ${describeType(t)}`);
  }
}

/**
 * Matches actual argument types against a signature's parameter expressions.
 *
 * Union alternatives are tried in declaration order and the first match
 * wins. Type variable occurrences are collected first and reconciled
 * afterwards, so a conflict reports every argument involved.
 */
export function matchArguments(
  functionName: string,
  expected: readonly SqlType[],
  actual: readonly SqlType[],
  options: MatchOptions = {},
): MatchResult {
  if (expected.length !== actual.length) {
    throw new ArityError(functionName, expected.length, actual.length);
  }

  const compat = options.compatibility ?? strictCompatibility;
  const candidates: Candidate[] = [];
  const matched: SqlType[] = [];

  expected.forEach((param, i) => {
    const given = actual[i];
    if (given === undefined) {
      throw new ArityError(functionName, expected.length, actual.length);
    }
    const result = unify(param, given, i, compat, candidates);
    if (result === null) {
      throw new TypeMismatchError(functionName, i, describeType(param), describeType(given));
    }
    matched.push(result);
  });

  const mapping = reconcile(functionName, candidates, compat);
  return {
    matchedTypes: matched.map((t) => substituteType(functionName, t, mapping)),
    mapping,
  };
}

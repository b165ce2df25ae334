import type { KindCompatibility, SqlType } from '../types/model.js';
import type { MatchedTypes, TypeVarMapping } from '../types/matcher.js';

export type ReturnResolver = (matchedTypes: MatchedTypes, mapping: TypeVarMapping) => SqlType;

/**
 * A registered function or operator. The name doubles as the key dialects
 * use to look up a render rule.
 */
export interface FunctionSignature {
  readonly name: string;
  readonly params: readonly SqlType[];
  /** A fixed type expression (type variables substituted after matching) or a resolver. */
  readonly returns: SqlType | ReturnResolver;
  /** Kind compatibility used while matching; strict when omitted. */
  readonly compatibility?: KindCompatibility;
}

export function defineFunction(signature: FunctionSignature): FunctionSignature {
  return Object.freeze({ ...signature, params: Object.freeze([...signature.params]) });
}

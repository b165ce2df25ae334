import { FunctionDefinitionError, UnknownFunctionError } from '../errors.js';
import { BUILTIN_FUNCTIONS } from './builtins.js';
import { FunctionCall, type Expression } from './expression.js';
import type { FunctionSignature } from './signature.js';

export interface RegistryConfig {
  /** Called when a registration replaces an existing entry. */
  onReplace?: (name: string) => void;
}

export interface RegisterOptions {
  replace?: boolean;
}

/**
 * Process-wide table of function signatures. Populate it during startup;
 * lookups afterwards never mutate it.
 */
export class FunctionRegistry {
  private readonly signatures = new Map<string, FunctionSignature>();
  private readonly onReplace: (name: string) => void;

  constructor(initial: readonly FunctionSignature[] = [], config: RegistryConfig = {}) {
    this.onReplace = config.onReplace ?? ((name) => {
      console.warn(`[functions] replacing signature "${name}"`);
    });
    for (const signature of initial) {
      this.register(signature);
    }
  }

  register(signature: FunctionSignature, options: RegisterOptions = {}): this {
    if (this.signatures.has(signature.name)) {
      if (options.replace !== true) {
        throw new FunctionDefinitionError(signature.name, 'a function with this name is already registered');
      }
      this.onReplace(signature.name);
    }
    this.signatures.set(signature.name, signature);
    return this;
  }

  has(name: string): boolean {
    return this.signatures.has(name);
  }

  get(name: string): FunctionSignature {
    const signature = this.signatures.get(name);
    if (signature === undefined) {
      throw new UnknownFunctionError(name);
    }
    return signature;
  }

  names(): string[] {
    return [...this.signatures.keys()];
  }

  call(name: string, ...args: Expression[]): FunctionCall {
    return new FunctionCall(this.get(name), args);
  }
}

export const functions = new FunctionRegistry(BUILTIN_FUNCTIONS);

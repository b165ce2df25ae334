import { UnknownDialectError } from '../errors.js';
import { extendDialect, type Dialect, type DialectOverrides } from './types.js';
import { genericDialect } from './generic.js';
import { postgresDialect } from './postgres.js';
import { mysqlDialect } from './mysql.js';
import { sqlserverDialect } from './sqlserver.js';

export interface DialectRegistryConfig {
  /** Called when a registration replaces a dialect of the same name. */
  onReplace?: (name: string) => void;
}

/** Dialects by name. `compile()` resolves string dialect arguments here. */
export class DialectRegistry {
  private readonly entries = new Map<string, Dialect>();
  private readonly onReplace: (name: string) => void;

  constructor(initial: readonly Dialect[] = [], config: DialectRegistryConfig = {}) {
    this.onReplace = config.onReplace ?? ((name) => {
      console.warn(`[dialects] replacing dialect "${name}"`);
    });
    for (const dialect of initial) {
      this.register(dialect);
    }
  }

  register(dialect: Dialect): this {
    if (this.entries.has(dialect.name)) {
      this.onReplace(dialect.name);
    }
    this.entries.set(dialect.name, dialect);
    return this;
  }

  has(name: string): boolean {
    return this.entries.has(name);
  }

  get(name: string): Dialect {
    const dialect = this.entries.get(name);
    if (dialect === undefined) {
      throw new UnknownDialectError(name);
    }
    return dialect;
  }

  /** Derives a dialect from a registered one and registers the result. */
  extend(baseName: string, overrides: DialectOverrides): Dialect {
    const dialect = extendDialect(this.get(baseName), overrides);
    this.register(dialect);
    return dialect;
  }

  names(): string[] {
    return [...this.entries.keys()];
  }
}

export const dialects = new DialectRegistry([genericDialect, postgresDialect, mysqlDialect, sqlserverDialect]);

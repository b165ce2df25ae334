export class SqlKitError extends Error {
  override readonly name: string = 'SqlKitError';

  constructor(message: string) {
    super(message);
    // Restore prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class ArityError extends SqlKitError {
  override readonly name = 'ArityError';

  constructor(
    readonly functionName: string,
    readonly expected: number,
    readonly actual: number,
    message?: string,
  ) {
    super(message ?? `${functionName} expects ${expected} argument(s), got ${actual}`);
  }
}

export class TypeMismatchError extends SqlKitError {
  override readonly name = 'TypeMismatchError';

  constructor(
    readonly functionName: string,
    readonly index: number,
    readonly expected: string,
    readonly actual: string,
    message?: string,
  ) {
    super(message ?? `Argument ${index} for ${functionName}: expected ${expected}, found ${actual}`);
  }
}

export class TypeVariableConflictError extends SqlKitError {
  override readonly name = 'TypeVariableConflictError';

  constructor(
    readonly functionName: string,
    readonly variable: string,
    readonly types: readonly string[],
    readonly indices: readonly number[],
    message?: string,
  ) {
    super(
      message ??
        `Arguments ${indices.join(', ')} of ${functionName} must share type ${variable}, found ${types.join(', ')}`,
    );
  }
}

export class InvalidOperationError extends SqlKitError {
  override readonly name = 'InvalidOperationError';

  constructor(
    readonly command: string,
    readonly method: string,
    message?: string,
  ) {
    super(message ?? `${method}() is not allowed on a ${command} query`);
  }
}

export class InvalidArgumentError extends SqlKitError {
  override readonly name = 'InvalidArgumentError';

  constructor(
    readonly method: string,
    message: string,
  ) {
    super(`${method}(): ${message}`);
  }
}

export class UnknownColumnError extends SqlKitError {
  override readonly name = 'UnknownColumnError';

  constructor(
    readonly table: string,
    readonly column: string,
  ) {
    super(`Table ${table} has no column ${column}`);
  }
}

export class UnknownFunctionError extends SqlKitError {
  override readonly name = 'UnknownFunctionError';

  constructor(readonly functionName: string) {
    super(`No function registered under ${functionName}`);
  }
}

/**
 * Raised when a function definition itself is broken: a resolver returning a
 * union or a type variable, a return expression naming an unmatched type
 * variable, or a duplicate registration.
 */
export class FunctionDefinitionError extends SqlKitError {
  override readonly name = 'FunctionDefinitionError';

  constructor(
    readonly functionName: string,
    message: string,
  ) {
    super(`${functionName}: ${message}`);
  }
}

export class UnresolvedFunctionRenderError extends SqlKitError {
  override readonly name = 'UnresolvedFunctionRenderError';

  constructor(
    readonly dialect: string,
    readonly functionName: string,
  ) {
    super(`Dialect ${dialect} has no render rule for function ${functionName}`);
  }
}

export class UnknownDialectError extends SqlKitError {
  override readonly name = 'UnknownDialectError';

  constructor(readonly dialect: string) {
    super(`No dialect registered under ${dialect}`);
  }
}

export class CompileError extends SqlKitError {
  override readonly name = 'CompileError';

  constructor(
    readonly dialect: string,
    message: string,
  ) {
    super(`[${dialect}] ${message}`);
  }
}

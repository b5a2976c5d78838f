export type StrataErrorCode =
  | 'SURFACE_MISMATCH'
  | 'STRUCTURAL_CONFLICT'
  | 'DISPOSED'
  | 'CAPABILITY_NEGOTIATION'
  | 'UNKNOWN_FUNCTION'
  | 'FUNCTION_ARGUMENTS'
  | 'INVALID_PATH'
  | 'MESSAGE_PARSE'
  | 'TOOL_LOOP_LIMIT';

export class StrataError extends Error {
  public readonly code: StrataErrorCode;

  public constructor(code: StrataErrorCode, message: string) {
    super(message);
    this.name = 'StrataError';
    this.code = code;
  }
}

/** A message was applied to a surface whose id differs from the message's surfaceId. */
export class SurfaceMismatchError extends StrataError {
  public readonly expected: string;
  public readonly actual: string;

  public constructor(expected: string, actual: string) {
    super('SURFACE_MISMATCH', `Mismatched surfaceId in message: expected ${expected}, got ${actual}`);
    this.name = 'SurfaceMismatchError';
    this.expected = expected;
    this.actual = actual;
  }
}

/** A data write traversed an existing value that is not the container the path requires. */
export class StructuralConflictError extends StrataError {
  public readonly path: string;

  public constructor(path: string, detail: string) {
    super('STRUCTURAL_CONFLICT', `Cannot write ${path}: ${detail}`);
    this.name = 'StructuralConflictError';
    this.path = path;
  }
}

export class DisposedError extends StrataError {
  public constructor(resource: string) {
    super('DISPOSED', `${resource} has been disposed`);
    this.name = 'DisposedError';
  }
}

export class CapabilityNegotiationError extends StrataError {
  public constructor(message: string) {
    super('CAPABILITY_NEGOTIATION', message);
    this.name = 'CapabilityNegotiationError';
  }
}

export class UnknownFunctionError extends StrataError {
  public readonly functionName: string;

  public constructor(functionName: string) {
    super('UNKNOWN_FUNCTION', `Function ${functionName} is not registered`);
    this.name = 'UnknownFunctionError';
    this.functionName = functionName;
  }
}

export class FunctionArgumentError extends StrataError {
  public constructor(functionName: string, reason: string) {
    super('FUNCTION_ARGUMENTS', `Invalid arguments for ${functionName}: ${reason}`);
    this.name = 'FunctionArgumentError';
  }
}

export class InvalidPathError extends StrataError {
  public constructor(path: string, reason: string) {
    super('INVALID_PATH', `Invalid data path "${path}": ${reason}`);
    this.name = 'InvalidPathError';
  }
}

export class MessageParseError extends StrataError {
  public constructor(reason: string) {
    super('MESSAGE_PARSE', `Invalid server message: ${reason}`);
    this.name = 'MessageParseError';
  }
}

export class ToolLoopLimitError extends StrataError {
  public readonly iterations: number;

  public constructor(iterations: number) {
    super('TOOL_LOOP_LIMIT', `Tool loop exceeded ${iterations} iterations`);
    this.name = 'ToolLoopLimitError';
    this.iterations = iterations;
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

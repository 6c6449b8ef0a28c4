/**
 * Error taxonomy for the quotation engine.
 *
 * Every error carries a stable code. Errors propagate to the caller of the
 * operation that detected them.
 */

export const ERROR_CODES = {
  UNBOUND_SYMBOL: 'UNBOUND_SYMBOL',
  MISSING_ARGUMENT: 'MISSING_ARGUMENT',
  UNKNOWN_PARAMETER: 'UNKNOWN_PARAMETER',
  RECURSIVE_PROMISE: 'RECURSIVE_PROMISE',
  SPLICE_CONTEXT: 'SPLICE_CONTEXT',
  DEFINE_NAME: 'DEFINE_NAME',
  DEFINE_CONTEXT: 'DEFINE_CONTEXT',
  INJECTION: 'INJECTION',
  SYNTAX: 'SYNTAX',
  ARGUMENT_MATCH: 'ARGUMENT_MATCH',
  NOT_CALLABLE: 'NOT_CALLABLE',
  TYPE_MISMATCH: 'TYPE_MISMATCH',
  STACK_OVERFLOW: 'STACK_OVERFLOW',
} as const;

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];

/**
 * Source location attached to syntax errors
 */
export interface SourceLocation {
  file: string;
  line: number;
  column: number;
}

/**
 * Base class for all engine errors
 */
export class QuotationError extends Error {
  readonly code: ErrorCode;
  readonly context: Record<string, unknown> | undefined;

  constructor(code: ErrorCode, message: string, context?: Record<string, unknown>) {
    super(message);
    this.name = 'QuotationError';
    this.code = code;
    this.context = context;
  }
}

/**
 * No scope in the environment chain defines the name
 */
export class UnboundSymbolError extends QuotationError {
  constructor(readonly symbol: string) {
    super(ERROR_CODES.UNBOUND_SYMBOL, `object '${symbol}' not found`, { symbol });
    this.name = 'UnboundSymbolError';
  }
}

/**
 * A declared parameter was read or captured but the caller never supplied it
 */
export class MissingArgumentError extends QuotationError {
  constructor(readonly parameter: string) {
    super(ERROR_CODES.MISSING_ARGUMENT, `argument '${parameter}' is missing, with no default`, { parameter });
    this.name = 'MissingArgumentError';
  }
}

/**
 * Capture of a name that is not a parameter of the capturing procedure
 */
export class UnknownParameterError extends QuotationError {
  constructor(readonly parameter: string, procedure: string) {
    super(ERROR_CODES.UNKNOWN_PARAMETER, `'${parameter}' is not a parameter of ${procedure}`, { parameter, procedure });
    this.name = 'UnknownParameterError';
  }
}

/**
 * A promise was forced again while its own evaluation was still running
 */
export class RecursivePromiseError extends QuotationError {
  constructor(expression: string) {
    super(
      ERROR_CODES.RECURSIVE_PROMISE,
      `promise already under evaluation: recursive default argument reference or earlier problems? (${expression})`,
      { expression },
    );
    this.name = 'RecursivePromiseError';
  }
}

/**
 * Splice marker outside an argument list
 */
export class SpliceContextError extends QuotationError {
  constructor(position: string) {
    super(ERROR_CODES.SPLICE_CONTEXT, `can't splice ${position}`, { position });
    this.name = 'SpliceContextError';
  }
}

/**
 * Define marker whose name operand is neither a string nor a symbol
 */
export class DefineNameError extends QuotationError {
  constructor(actual: string) {
    super(ERROR_CODES.DEFINE_NAME, `the left-hand side of ':=' must be a string or a symbol, not ${actual}`, { actual });
    this.name = 'DefineNameError';
  }
}

/**
 * Define marker outside an argument list
 */
export class DefineContextError extends QuotationError {
  constructor(position: string) {
    super(ERROR_CODES.DEFINE_CONTEXT, `':=' can only be used within an argument list, not ${position}`, { position });
    this.name = 'DefineContextError';
  }
}

/**
 * A value that has no expression form was injected into a tree
 */
export class InjectionError extends QuotationError {
  constructor(message: string, actual: string) {
    super(ERROR_CODES.INJECTION, message, { actual });
    this.name = 'InjectionError';
  }
}

/**
 * Malformed surface syntax, including escapes in positions the grammar forbids
 */
export class ParseError extends QuotationError {
  constructor(message: string, readonly location: SourceLocation) {
    super(
      ERROR_CODES.SYNTAX,
      `Parse error in ${location.file} at ${location.line}:${location.column}: ${message}`,
      { ...location },
    );
    this.name = 'ParseError';
  }
}

/**
 * Arguments of a closure call cannot be matched to its parameters
 */
export class ArgumentMatchError extends QuotationError {
  constructor(message: string, procedure: string) {
    super(ERROR_CODES.ARGUMENT_MATCH, `${procedure}: ${message}`, { procedure });
    this.name = 'ArgumentMatchError';
  }
}

/**
 * Call head did not evaluate to a procedure
 */
export class NotCallableError extends QuotationError {
  constructor(actual: string) {
    super(ERROR_CODES.NOT_CALLABLE, `attempt to apply non-function: ${actual}`, { actual });
    this.name = 'NotCallableError';
  }
}

/**
 * A primitive or special form received a value of the wrong type or arity
 */
export class TypeMismatchError extends QuotationError {
  constructor(message: string) {
    super(ERROR_CODES.TYPE_MISMATCH, message);
    this.name = 'TypeMismatchError';
  }
}

/**
 * Evaluation nested deeper than the configured limit
 */
export class StackOverflowError extends QuotationError {
  constructor(limit: number) {
    super(ERROR_CODES.STACK_OVERFLOW, `evaluation nested too deeply (limit ${limit})`, { limit });
    this.name = 'StackOverflowError';
  }
}

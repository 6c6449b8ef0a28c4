/**
 * tidyquote core - quotation and quasiquotation engine
 *
 * - Expression model (symbols, literals, calls, escape markers)
 * - Environments, promises and quoted closures
 * - Capture primitives, quasiquotation resolver, tidy evaluation
 * - Reader, writer and a host interpreter to drive them
 */

export * from './errors.js';

// Expressions
export * from './expr/expression.js';
export { Parser, parse, parseOne } from './expr/parser.js';
export { formatAtomic, formatExpression, formatValue } from './expr/writer.js';

// Evaluation
export {
  Environment,
  MissingArgument,
  theMissingArg,
  type Binding,
  type BindingSource,
} from './eval/environment.js';
export { LazyPromise, type PromiseState } from './eval/promise.js';
export * from './eval/values.js';
export { Interpreter, DEFAULT_DEPTH_LIMIT, DOTS, type EvaluatorOptions } from './eval/evaluator.js';
export { standardPrimitives, getPrimitive } from './eval/primitives.js';

// Quotation
export {
  captureOne,
  captureAll,
  captureScoped,
  captureAllScoped,
  type CallFrame,
  type DotsEntry,
} from './quote/capture.js';
export { resolve, resolveArguments, evaluateDefineName } from './quote/resolver.js';
export { evalTidy, makeDataMask } from './quote/tidy.js';

export { Session, type SessionOptions } from './session.js';

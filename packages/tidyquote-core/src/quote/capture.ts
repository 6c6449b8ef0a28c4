/**
 * Capture primitives - read the expressions a caller supplied for a
 * procedure's parameters, without forcing them.
 */

import type { Argument, Expression } from '../expr/expression.js';
import { MissingArgumentError, UnknownParameterError } from '../errors.js';
import type { MissingArgument } from '../eval/environment.js';
import { LazyPromise } from '../eval/promise.js';
import { QuotedClosure } from '../eval/values.js';

/**
 * Argument bound to `...`
 */
export interface DotsEntry {
  name: string | null;
  promise: LazyPromise;
}

/**
 * Bookkeeping for one procedure call: each declared parameter holds the
 * caller's unforced promise, or the missing-argument placeholder.
 */
export interface CallFrame {
  procedureName: string;
  params: ReadonlyMap<string, LazyPromise | MissingArgument>;
  dots: readonly DotsEntry[];
}

function promiseFor(frame: CallFrame, param: string): LazyPromise {
  const bound = frame.params.get(param);
  if (bound === undefined) {
    throw new UnknownParameterError(param, frame.procedureName);
  }
  if (!(bound instanceof LazyPromise)) {
    throw new MissingArgumentError(param);
  }
  return bound;
}

/**
 * The expression the caller wrote for `param`, exactly as written
 */
export function captureOne(frame: CallFrame, param: string): Expression {
  return promiseFor(frame, param).expr;
}

/**
 * Every `...` argument in call-site order, with its name
 */
export function captureAll(frame: CallFrame): Argument[] {
  return frame.dots.map((entry) => ({ name: entry.name, value: entry.promise.expr }));
}

/**
 * Like captureOne, but keeps the environment the expression belongs to
 */
export function captureScoped(frame: CallFrame, param: string): QuotedClosure {
  const promise = promiseFor(frame, param);
  return new QuotedClosure(promise.expr, promise.env);
}

export function captureAllScoped(frame: CallFrame): Array<{ name: string | null; closure: QuotedClosure }> {
  return frame.dots.map((entry) => ({
    name: entry.name,
    closure: new QuotedClosure(entry.promise.expr, entry.promise.env),
  }));
}

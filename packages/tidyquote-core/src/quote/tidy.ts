/**
 * Tidy evaluation - evaluate a quoted closure in its own environment,
 * optionally overlaid by a data mask.
 */

import { Environment, type Binding, type BindingSource } from '../eval/environment.js';
import { LazyPromise } from '../eval/promise.js';
import type { Evaluator, QuotedClosure, Value } from '../eval/values.js';

/**
 * Build a parentless environment to use as a data mask
 */
export function makeDataMask(bindings: BindingSource): Environment {
  return new Environment(bindings);
}

/**
 * Evaluate `closure.expr` against `closure.env`. When a mask is given, its
 * own bindings are consulted first and shadow the captured scope; the mask's
 * parents are not part of the chain.
 */
export function evalTidy(closure: QuotedClosure, dataMask: Environment | null, evaluator: Evaluator): Value {
  let env = closure.env;

  if (dataMask) {
    const overlay = new Map<string, Binding>();
    for (const name of dataMask.ownNames()) {
      const binding = dataMask.ownBinding(name);
      if (binding !== undefined) {
        overlay.set(name, binding);
      }
    }
    env = closure.env.extend(overlay);
  }

  return new LazyPromise(closure.expr, env, evaluator).force();
}

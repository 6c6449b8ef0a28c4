/**
 * Promise - a lazily forced (expression, environment) pair
 *
 * Forcing evaluates the expression at most once. The state machine is
 * explicit: unforced -> forcing -> forced | failed. Entering force() while
 * in `forcing` means the expression re-entered its own promise.
 */

import type { Expression } from '../expr/expression.js';
import { RecursivePromiseError } from '../errors.js';
import type { Environment } from './environment.js';
import type { Evaluator, Value } from './values.js';
import { formatExpression } from '../expr/writer.js';

export type PromiseState =
  | { readonly kind: 'unforced' }
  | { readonly kind: 'forcing' }
  | { readonly kind: 'forced'; readonly value: Value }
  | { readonly kind: 'failed'; readonly error: unknown };

export class LazyPromise {
  private current: PromiseState = { kind: 'unforced' };

  constructor(
    readonly expr: Expression,
    readonly env: Environment,
    private readonly evaluator: Evaluator,
  ) {}

  get state(): PromiseState {
    return this.current;
  }

  isForced(): boolean {
    return this.current.kind === 'forced';
  }

  /**
   * Evaluate on first call, return the cached value afterwards
   */
  force(): Value {
    switch (this.current.kind) {
      case 'forced':
        return this.current.value;
      case 'failed':
        throw this.current.error;
      case 'forcing':
        throw new RecursivePromiseError(formatExpression(this.expr));
      case 'unforced':
        break;
    }

    if (process.env.DEBUG_PROMISE) {
      console.error(`[Promise] forcing ${formatExpression(this.expr)} in env#${this.env.id}`);
    }

    this.current = { kind: 'forcing' };
    try {
      const value = this.evaluator.evaluate(this.expr, this.env);
      this.current = { kind: 'forced', value };
      return value;
    } catch (error) {
      this.current = { kind: 'failed', error };
      throw error;
    }
  }
}

/**
 * Lazy promise tests
 */

import { describe, it, expect } from 'vitest';
import { LazyPromise } from './promise.js';
import { Environment } from './environment.js';
import type { Evaluator, Value } from './values.js';
import type { Expression } from '../expr/expression.js';
import { makeSymbol } from '../expr/expression.js';
import { RecursivePromiseError } from '../errors.js';

/**
 * Evaluator that counts calls and delegates to a callback
 */
class CountingEvaluator implements Evaluator {
  calls = 0;

  constructor(private readonly body: (expr: Expression, env: Environment) => Value) {}

  evaluate(expr: Expression, env: Environment): Value {
    this.calls++;
    return this.body(expr, env);
  }
}

describe('LazyPromise', () => {
  it('should not evaluate until forced', () => {
    const evaluator = new CountingEvaluator(() => 1);
    const promise = new LazyPromise(makeSymbol('x'), new Environment(), evaluator);
    expect(evaluator.calls).toBe(0);
    expect(promise.state.kind).toBe('unforced');
    expect(promise.isForced()).toBe(false);
  });

  it('should evaluate in its own environment', () => {
    const env = new Environment({ x: 7 });
    const evaluator = new CountingEvaluator((expr, e) => {
      const bound = expr.kind === 'symbol' ? e.find(expr.name) : undefined;
      return typeof bound === 'number' ? bound : null;
    });
    const promise = new LazyPromise(makeSymbol('x'), env, evaluator);
    expect(promise.force()).toBe(7);
  });

  it('should evaluate at most once', () => {
    const evaluator = new CountingEvaluator(() => 'value');
    const promise = new LazyPromise(makeSymbol('x'), new Environment(), evaluator);
    expect(promise.force()).toBe('value');
    expect(promise.force()).toBe('value');
    expect(promise.force()).toBe('value');
    expect(evaluator.calls).toBe(1);
    expect(promise.state).toEqual({ kind: 'forced', value: 'value' });
  });

  it('should cache a null result', () => {
    const evaluator = new CountingEvaluator(() => null);
    const promise = new LazyPromise(makeSymbol('x'), new Environment(), evaluator);
    promise.force();
    promise.force();
    expect(evaluator.calls).toBe(1);
  });

  it('should detect re-entry while forcing', () => {
    let promise: LazyPromise | null = null;
    const evaluator = new CountingEvaluator(() => (promise ? promise.force() : null));
    promise = new LazyPromise(makeSymbol('loop'), new Environment(), evaluator);
    expect(() => promise?.force()).toThrow(RecursivePromiseError);
    expect(evaluator.calls).toBe(1);
  });

  it('should rethrow the same error on every force after a failure', () => {
    const failure = new Error('boom');
    const evaluator = new CountingEvaluator(() => {
      throw failure;
    });
    const promise = new LazyPromise(makeSymbol('x'), new Environment(), evaluator);

    let first: unknown = null;
    let second: unknown = null;
    try { promise.force(); } catch (e) { first = e; }
    try { promise.force(); } catch (e) { second = e; }

    expect(first).toBe(failure);
    expect(second).toBe(failure);
    expect(evaluator.calls).toBe(1);
    expect(promise.state.kind).toBe('failed');
  });

  it('should name the expression in the recursion error', () => {
    let promise: LazyPromise | null = null;
    const evaluator = new CountingEvaluator(() => (promise ? promise.force() : null));
    promise = new LazyPromise(makeSymbol('loop'), new Environment(), evaluator);
    expect(() => promise?.force()).toThrow(/\(loop\)$/);
  });
});

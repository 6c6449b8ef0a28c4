/**
 * Capture tests
 */

import { describe, it, expect } from 'vitest';
import { captureAll, captureAllScoped, captureOne, captureScoped, type CallFrame } from './capture.js';
import { Environment, type MissingArgument, theMissingArg } from '../eval/environment.js';
import { LazyPromise } from '../eval/promise.js';
import type { Evaluator } from '../eval/values.js';
import { parseOne } from '../expr/parser.js';
import { MissingArgumentError, UnknownParameterError } from '../errors.js';

class RecordingEvaluator implements Evaluator {
  calls = 0;

  evaluate(): null {
    this.calls++;
    return null;
  }
}

function setup() {
  const evaluator = new RecordingEvaluator();
  const callerEnv = new Environment({ x: 1 });
  const a = new LazyPromise(parseOne('(f (g z) y)'), callerEnv, evaluator);
  const first = new LazyPromise(parseOne('(+ x 1)'), callerEnv, evaluator);
  const second = new LazyPromise(parseOne('w'), callerEnv, evaluator);
  const frame: CallFrame = {
    procedureName: 'capture-me',
    params: new Map<string, LazyPromise | MissingArgument>([['a', a], ['b', theMissingArg]]),
    dots: [
      { name: null, promise: first },
      { name: 'k', promise: second },
    ],
  };
  return { evaluator, callerEnv, a, frame };
}

describe('captureOne', () => {
  it('should return the expression exactly as written', () => {
    const { a, frame } = setup();
    expect(captureOne(frame, 'a')).toBe(a.expr);
  });

  it('should not force the promise', () => {
    const { evaluator, a, frame } = setup();
    captureOne(frame, 'a');
    expect(evaluator.calls).toBe(0);
    expect(a.state.kind).toBe('unforced');
  });

  it('should return the expression after the promise was forced', () => {
    const { a, frame } = setup();
    a.force();
    expect(captureOne(frame, 'a')).toBe(a.expr);
  });

  it('should fail for a parameter the caller did not supply', () => {
    const { frame } = setup();
    expect(() => captureOne(frame, 'b')).toThrow(MissingArgumentError);
    expect(() => captureOne(frame, 'b')).toThrow("argument 'b' is missing, with no default");
  });

  it('should fail for a name that is not a parameter', () => {
    const { frame } = setup();
    expect(() => captureOne(frame, 'nope')).toThrow(UnknownParameterError);
    expect(() => captureOne(frame, 'nope')).toThrow("'nope' is not a parameter of capture-me");
  });
});

describe('captureAll', () => {
  it('should keep call-site order and names', () => {
    const { frame } = setup();
    const captured = captureAll(frame);
    expect(captured.map((arg) => arg.name)).toEqual([null, 'k']);
    expect(captured[0].value).toBe(frame.dots[0].promise.expr);
    expect(captured[1].value).toBe(frame.dots[1].promise.expr);
  });

  it('should return an empty list when there are no extra arguments', () => {
    const { frame } = setup();
    expect(captureAll({ ...frame, dots: [] })).toEqual([]);
  });
});

describe('captureScoped', () => {
  it('should pair the expression with the caller environment', () => {
    const { callerEnv, a, frame } = setup();
    const closure = captureScoped(frame, 'a');
    expect(closure.expr).toBe(a.expr);
    expect(closure.env).toBe(callerEnv);
  });

  it('should scope every extra argument', () => {
    const { evaluator, callerEnv, frame } = setup();
    const captured = captureAllScoped(frame);
    expect(captured.map((c) => c.name)).toEqual([null, 'k']);
    expect(captured.every((c) => c.closure.env === callerEnv)).toBe(true);
    expect(evaluator.calls).toBe(0);
  });
});

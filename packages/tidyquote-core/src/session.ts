/**
 * Session - a global environment plus an interpreter, for running programs
 */

import { parse } from './expr/parser.js';
import type { Expression } from './expr/expression.js';
import { Environment } from './eval/environment.js';
import { Interpreter } from './eval/evaluator.js';
import { standardPrimitives } from './eval/primitives.js';
import type { Value } from './eval/values.js';

export interface SessionOptions {
  /** Maximum nesting of evaluation, see EvaluatorOptions */
  depthLimit?: number;
}

export class Session {
  /** Primitives live here; user definitions go in `globals` */
  readonly base: Environment;
  readonly globals: Environment;
  readonly interpreter: Interpreter;

  constructor(options: SessionOptions = {}) {
    this.interpreter = new Interpreter({ depthLimit: options.depthLimit });
    this.base = new Environment(standardPrimitives);
    this.globals = this.base.extend();
  }

  /**
   * Predefine a global value
   */
  define(name: string, value: Value): void {
    this.globals.define(name, value);
  }

  /**
   * Evaluate every top-level form of `source`, returning the last value
   */
  run(source: string, file: string = '<unknown>'): Value {
    let result: Value = null;
    for (const expr of parse(source, file)) {
      result = this.evaluate(expr);
    }
    return result;
  }

  evaluate(expr: Expression): Value {
    return this.interpreter.evaluate(expr, this.globals);
  }
}

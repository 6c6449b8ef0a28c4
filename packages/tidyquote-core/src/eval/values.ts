/**
 * Runtime values of the host evaluator
 */

import {
  type AtomicValue,
  type Expression,
  isExpression,
  makeArgument,
  makeCall,
  makeLiteral,
} from '../expr/expression.js';
import { InjectionError } from '../errors.js';
import { Environment } from './environment.js';

/**
 * Everything an expression can evaluate to
 */
export type Value = AtomicValue | Expression | QuotedClosure | Procedure | Environment | ArgList | readonly Value[];

/**
 * Host evaluation hook shared by promises, the resolver and the tidy evaluator
 */
export interface Evaluator {
  evaluate(expr: Expression, env: Environment): Value;
}

/**
 * An expression paired with the environment it was captured in
 */
export class QuotedClosure {
  constructor(
    readonly expr: Expression,
    readonly env: Environment,
  ) {}
}

/**
 * Evaluated argument passed to a primitive
 */
export interface EvaluatedArgument {
  name: string | null;
  value: Value;
}

/**
 * Sequence whose entries may carry argument names. Captured `...`
 * arguments are returned as an ArgList so that splicing them back into a
 * call keeps their names.
 */
export class ArgList {
  readonly entries: readonly EvaluatedArgument[];

  constructor(entries: readonly EvaluatedArgument[]) {
    this.entries = Object.freeze(entries.map((e) => Object.freeze({ name: e.name, value: e.value })));
  }

  get length(): number {
    return this.entries.length;
  }

  values(): Value[] {
    return this.entries.map((e) => e.value);
  }

  names(): Array<string | null> {
    return this.entries.map((e) => e.name);
  }
}

/**
 * What a primitive sees of its call site
 */
export interface CallContext {
  env: Environment;
  evaluator: Evaluator;
}

export type PrimitiveFunction = (args: EvaluatedArgument[], context: CallContext) => Value;

/**
 * Base class for callable values
 */
export abstract class Procedure {
  constructor(public name: string | null) {}
}

/**
 * Built-in function; receives its arguments already evaluated
 */
export class Primitive extends Procedure {
  constructor(
    name: string,
    readonly fn: PrimitiveFunction,
  ) {
    super(name);
  }

  call(args: EvaluatedArgument[], context: CallContext): Value {
    return this.fn(args, context);
  }
}

/**
 * User-defined function; receives its arguments as unforced promises
 */
export class Closure extends Procedure {
  constructor(
    name: string | null,
    readonly params: readonly string[],
    readonly hasDots: boolean,
    readonly body: Expression,
    readonly env: Environment,
  ) {
    super(name);
  }
}

export function isAtomic(value: Value): value is AtomicValue {
  return value === null || typeof value === 'number' || typeof value === 'string' || typeof value === 'boolean';
}

export function isSequence(value: Value): value is readonly Value[] {
  return Array.isArray(value);
}

/**
 * Short type description used in error messages
 */
export function typeName(value: Value): string {
  if (value === null) return 'null';
  if (typeof value === 'number') return 'number';
  if (typeof value === 'string') return 'string';
  if (typeof value === 'boolean') return 'boolean';
  if (isSequence(value)) return 'list';
  if (value instanceof ArgList) return 'arglist';
  if (isExpression(value)) return value.kind === 'literal' ? 'literal expression' : value.kind;
  if (value instanceof QuotedClosure) return 'quosure';
  if (value instanceof Procedure) return 'procedure';
  if (value instanceof Environment) return 'environment';
  return 'unknown';
}

/**
 * Expression form of a value, used when a value is injected into a tree.
 * Expressions stay as they are, atomic values become literals, and a
 * sequence becomes a `(list ...)` call over its converted elements.
 */
export function valueToExpression(value: Value): Expression {
  if (isAtomic(value)) {
    return makeLiteral(value);
  }
  if (isExpression(value)) {
    return value;
  }
  if (isSequence(value)) {
    return makeCall('list', value.map(valueToExpression));
  }
  if (value instanceof ArgList) {
    return makeCall('list', value.entries.map((e) => makeArgument(valueToExpression(e.value), e.name)));
  }
  throw new InjectionError(`can't inject a ${typeName(value)} into an expression`, typeName(value));
}

/**
 * Entries of a value used as the operand of a splice: a plain sequence
 * gives positional entries, an ArgList keeps its names.
 */
export function spliceEntries(value: Value): readonly EvaluatedArgument[] {
  if (isSequence(value)) {
    return value.map((v) => ({ name: null, value: v }));
  }
  if (value instanceof ArgList) {
    return value.entries;
  }
  throw new InjectionError(`can't splice a ${typeName(value)}: ,@ needs a list`, typeName(value));
}

/**
 * Truthiness: only #f and null are false
 */
export function isTrue(value: Value): boolean {
  return value !== false && value !== null;
}

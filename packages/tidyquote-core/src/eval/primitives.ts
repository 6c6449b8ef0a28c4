/**
 * Built-in functions
 *
 * Arithmetic and list basics, plus the primitives that work on quoted
 * code: building calls, comparing trees, ordinary evaluation and tidy
 * evaluation with a data mask.
 */

import {
  type Expression,
  exprEqual,
  isExpression,
  makeArgument,
  makeCall,
  makeSymbol,
} from '../expr/expression.js';
import { TypeMismatchError } from '../errors.js';
import { Environment } from './environment.js';
import {
  type EvaluatedArgument,
  type PrimitiveFunction,
  type Value,
  ArgList,
  Primitive,
  QuotedClosure,
  isSequence,
  isTrue,
  typeName,
  valueToExpression,
} from './values.js';
import { evalTidy, makeDataMask } from '../quote/tidy.js';

/**
 * Argument values, rejecting named arguments
 */
function plain(args: EvaluatedArgument[], who: string): Value[] {
  for (const arg of args) {
    if (arg.name !== null) {
      throw new TypeMismatchError(`${who}: unused argument '${arg.name}'`);
    }
  }
  return args.map((a) => a.value);
}

function arity(values: Value[], who: string, min: number, max: number = min): void {
  if (values.length < min || values.length > max) {
    const expected = min === max
      ? `exactly ${min}`
      : max === Infinity ? `at least ${min}` : `${min} or ${max}`;
    throw new TypeMismatchError(`${who} requires ${expected} argument${max === 1 ? '' : 's'}`);
  }
}

function numbers(values: Value[], who: string): number[] {
  return values.map((v) => {
    if (typeof v !== 'number') {
      throw new TypeMismatchError(`${who} requires numeric arguments, got ${typeName(v)}`);
    }
    return v;
  });
}

function listEntries(value: Value, who: string): readonly EvaluatedArgument[] {
  if (isSequence(value)) {
    return value.map((v) => ({ name: null, value: v }));
  }
  if (value instanceof ArgList) {
    return value.entries;
  }
  throw new TypeMismatchError(`${who} requires a list, got ${typeName(value)}`);
}

/**
 * Plain array when no entry is named, ArgList otherwise
 */
function makeList(entries: readonly EvaluatedArgument[]): Value {
  return entries.some((e) => e.name !== null) ? new ArgList(entries) : entries.map((e) => e.value);
}

/**
 * Arithmetic primitive: +
 */
const plusPrimitive: PrimitiveFunction = (args) => {
  return numbers(plain(args, '+'), '+').reduce((sum, n) => sum + n, 0);
};

/**
 * Arithmetic primitive: -
 */
const minusPrimitive: PrimitiveFunction = (args) => {
  const values = numbers(plain(args, '-'), '-');
  if (values.length === 0) {
    throw new TypeMismatchError('- requires at least 1 argument');
  }
  if (values.length === 1) {
    return -values[0];
  }
  return values.slice(1).reduce((result, n) => result - n, values[0]);
};

/**
 * Arithmetic primitive: *
 */
const timesPrimitive: PrimitiveFunction = (args) => {
  return numbers(plain(args, '*'), '*').reduce((product, n) => product * n, 1);
};

/**
 * Arithmetic primitive: /
 */
const dividePrimitive: PrimitiveFunction = (args) => {
  const values = numbers(plain(args, '/'), '/');
  if (values.length === 0) {
    throw new TypeMismatchError('/ requires at least 1 argument');
  }
  const divisors = values.length === 1 ? values : values.slice(1);
  if (divisors.includes(0)) {
    throw new TypeMismatchError('Division by zero');
  }
  if (values.length === 1) {
    return 1 / values[0];
  }
  return divisors.reduce((result, n) => result / n, values[0]);
};

/**
 * Numeric comparison chained over all arguments, as in (< 1 2 3)
 */
function comparison(who: string, test: (a: number, b: number) => boolean): PrimitiveFunction {
  return (args) => {
    const values = plain(args, who);
    arity(values, who, 2, Infinity);
    const nums = numbers(values, who);
    for (let i = 1; i < nums.length; i++) {
      if (!test(nums[i - 1], nums[i])) {
        return false;
      }
    }
    return true;
  };
}

const notPrimitive: PrimitiveFunction = (args) => {
  const values = plain(args, 'not');
  arity(values, 'not', 1);
  return !isTrue(values[0]);
};

/**
 * (list a b name: c) - named entries give an arglist
 */
const listPrimitive: PrimitiveFunction = (args) => makeList(args);

const lengthPrimitive: PrimitiveFunction = (args) => {
  const values = plain(args, 'length');
  arity(values, 'length', 1);
  return listEntries(values[0], 'length').length;
};

const listRefPrimitive: PrimitiveFunction = (args) => {
  const values = plain(args, 'list-ref');
  arity(values, 'list-ref', 2);
  const entries = listEntries(values[0], 'list-ref');
  const [index] = numbers([values[1]], 'list-ref');
  if (!Number.isInteger(index) || index < 0 || index >= entries.length) {
    throw new TypeMismatchError(`list-ref: index ${index} out of range for list of length ${entries.length}`);
  }
  return entries[index].value;
};

const appendPrimitive: PrimitiveFunction = (args) => {
  const values = plain(args, 'append');
  return makeList(values.flatMap((v) => listEntries(v, 'append')));
};

const namesPrimitive: PrimitiveFunction = (args) => {
  const values = plain(args, 'names');
  arity(values, 'names', 1);
  return listEntries(values[0], 'names').map((e) => e.name);
};

const stringAppendPrimitive: PrimitiveFunction = (args) => {
  return plain(args, 'string-append').map((v, i) => {
    if (typeof v !== 'string') {
      throw new TypeMismatchError(`string-append requires string arguments, got ${typeName(v)} at position ${i}`);
    }
    return v;
  }).join('');
};

/**
 * Name of a symbol, or the printed form of an atomic value
 */
const asStringPrimitive: PrimitiveFunction = (args) => {
  const values = plain(args, 'as-string');
  arity(values, 'as-string', 1);
  const value = values[0];
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  if (isExpression(value) && value.kind === 'symbol') return value.name;
  throw new TypeMismatchError(`as-string: can't convert ${typeName(value)} to a string`);
};

const symPrimitive: PrimitiveFunction = (args) => {
  const values = plain(args, 'sym');
  arity(values, 'sym', 1);
  const name = values[0];
  if (typeof name !== 'string' || name === '') {
    throw new TypeMismatchError(`sym requires a non-empty string, got ${typeName(name)}`);
  }
  return makeSymbol(name);
};

/**
 * (call head arg ...) - build a call expression from values
 */
const callPrimitive: PrimitiveFunction = (args) => {
  if (args.length === 0 || args[0].name !== null) {
    throw new TypeMismatchError('call requires a function name or expression as its first argument');
  }
  const head = args[0].value;
  let headExpr: Expression;
  if (typeof head === 'string') {
    headExpr = makeSymbol(head);
  } else if (isExpression(head)) {
    headExpr = head;
  } else {
    throw new TypeMismatchError(`call: can't use a ${typeName(head)} as a function name`);
  }
  return makeCall(headExpr, args.slice(1).map((a) => makeArgument(valueToExpression(a.value), a.name)));
};

const exprEqualPrimitive: PrimitiveFunction = (args) => {
  const values = plain(args, 'expr-equal?');
  arity(values, 'expr-equal?', 2);
  return exprEqual(valueToExpression(values[0]), valueToExpression(values[1]));
};

/**
 * (eval x [env]) - evaluate an expression in the calling environment or
 * the given one. A quosure evaluates in its own environment; other values
 * evaluate to themselves.
 */
const evalPrimitive: PrimitiveFunction = (args, context) => {
  const values = plain(args, 'eval');
  arity(values, 'eval', 1, 2);
  const [value, envArg] = values;

  let env = context.env;
  if (envArg !== undefined) {
    if (!(envArg instanceof Environment)) {
      throw new TypeMismatchError(`eval: env must be an environment, got ${typeName(envArg)}`);
    }
    env = envArg;
  }

  if (value instanceof QuotedClosure) {
    return context.evaluator.evaluate(value.expr, value.env);
  }
  if (isExpression(value)) {
    return context.evaluator.evaluate(value, env);
  }
  return value;
};

/**
 * (eval-tidy quo [mask]) - mask is an environment or a list of named values
 */
const evalTidyPrimitive: PrimitiveFunction = (args, context) => {
  const values = plain(args, 'eval-tidy');
  arity(values, 'eval-tidy', 1, 2);
  const [target, maskArg] = values;

  let closure: QuotedClosure;
  if (target instanceof QuotedClosure) {
    closure = target;
  } else if (isExpression(target)) {
    closure = new QuotedClosure(target, context.env);
  } else {
    throw new TypeMismatchError(`eval-tidy requires a quosure or an expression, got ${typeName(target)}`);
  }

  let mask: Environment | null = null;
  if (maskArg instanceof Environment) {
    mask = maskArg;
  } else if (maskArg instanceof ArgList) {
    mask = maskFromEntries(maskArg.entries, 'eval-tidy');
  } else if (maskArg !== undefined && maskArg !== null) {
    throw new TypeMismatchError(`eval-tidy: data must be an environment or a named list, got ${typeName(maskArg)}`);
  }

  return evalTidy(closure, mask, context.evaluator);
};

function maskFromEntries(entries: readonly EvaluatedArgument[], who: string): Environment {
  const bindings = new Map<string, Value>();
  for (const entry of entries) {
    if (entry.name === null) {
      throw new TypeMismatchError(`${who}: data mask entries must be named`);
    }
    bindings.set(entry.name, entry.value);
  }
  return makeDataMask(bindings);
}

/**
 * (data-mask a: 1 b: 2)
 */
const dataMaskPrimitive: PrimitiveFunction = (args) => maskFromEntries(args, 'data-mask');

const quoExprPrimitive: PrimitiveFunction = (args) => {
  const values = plain(args, 'quo-expr');
  arity(values, 'quo-expr', 1);
  const quo = values[0];
  if (!(quo instanceof QuotedClosure)) {
    throw new TypeMismatchError(`quo-expr requires a quosure, got ${typeName(quo)}`);
  }
  return quo.expr;
};

const quoEnvPrimitive: PrimitiveFunction = (args) => {
  const values = plain(args, 'quo-env');
  arity(values, 'quo-env', 1);
  const quo = values[0];
  if (!(quo instanceof QuotedClosure)) {
    throw new TypeMismatchError(`quo-env requires a quosure, got ${typeName(quo)}`);
  }
  return quo.env;
};

/**
 * (current-env) - the environment the call is evaluated in
 */
const currentEnvPrimitive: PrimitiveFunction = (args, context) => {
  arity(plain(args, 'current-env'), 'current-env', 0);
  return context.env;
};

export const standardPrimitives: Record<string, Primitive> = {
  // Arithmetic
  '+': new Primitive('+', plusPrimitive),
  '-': new Primitive('-', minusPrimitive),
  '*': new Primitive('*', timesPrimitive),
  '/': new Primitive('/', dividePrimitive),

  // Comparison
  '=': new Primitive('=', comparison('=', (a, b) => a === b)),
  '<': new Primitive('<', comparison('<', (a, b) => a < b)),
  '>': new Primitive('>', comparison('>', (a, b) => a > b)),
  '<=': new Primitive('<=', comparison('<=', (a, b) => a <= b)),
  '>=': new Primitive('>=', comparison('>=', (a, b) => a >= b)),
  'not': new Primitive('not', notPrimitive),

  // Lists
  'list': new Primitive('list', listPrimitive),
  'length': new Primitive('length', lengthPrimitive),
  'list-ref': new Primitive('list-ref', listRefPrimitive),
  'append': new Primitive('append', appendPrimitive),
  'names': new Primitive('names', namesPrimitive),

  // Strings
  'string-append': new Primitive('string-append', stringAppendPrimitive),
  'as-string': new Primitive('as-string', asStringPrimitive),

  // Code
  'sym': new Primitive('sym', symPrimitive),
  'call': new Primitive('call', callPrimitive),
  'expr-equal?': new Primitive('expr-equal?', exprEqualPrimitive),
  'eval': new Primitive('eval', evalPrimitive),
  'eval-tidy': new Primitive('eval-tidy', evalTidyPrimitive),
  'data-mask': new Primitive('data-mask', dataMaskPrimitive),
  'quo-expr': new Primitive('quo-expr', quoExprPrimitive),
  'quo-env': new Primitive('quo-env', quoEnvPrimitive),
  'current-env': new Primitive('current-env', currentEnvPrimitive),
};

/**
 * Get a primitive by name
 */
export function getPrimitive(name: string): Primitive | undefined {
  return Object.hasOwn(standardPrimitives, name) ? standardPrimitives[name] : undefined;
}

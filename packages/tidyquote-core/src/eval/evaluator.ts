/**
 * Host evaluator
 *
 * Tree-walking evaluation of expressions against an environment chain.
 * Primitives receive evaluated arguments; closures receive unforced
 * promises, which is what makes their arguments capturable. A handful of
 * special forms are recognized by head symbol, the way a Scheme compiler
 * dispatches on syntactic keywords.
 */

import {
  type Argument,
  type CallExpr,
  type Expression,
  makeCall,
} from '../expr/expression.js';
import {
  ArgumentMatchError,
  DefineContextError,
  MissingArgumentError,
  NotCallableError,
  SpliceContextError,
  StackOverflowError,
  TypeMismatchError,
  UnknownParameterError,
} from '../errors.js';
import { Environment, MissingArgument, theMissingArg } from './environment.js';
import { LazyPromise } from './promise.js';
import {
  type EvaluatedArgument,
  type Evaluator,
  type Value,
  ArgList,
  Closure,
  Primitive,
  QuotedClosure,
  isTrue,
  spliceEntries,
  typeName,
} from './values.js';
import { evaluateDefineName, resolve, resolveArguments } from '../quote/resolver.js';
import { type CallFrame, type DotsEntry, captureAllScoped, captureScoped } from '../quote/capture.js';
import { formatExpression } from '../expr/writer.js';

export const DEFAULT_DEPTH_LIMIT = 1000;

/** Name of the rest parameter */
export const DOTS = '...';

export interface EvaluatorOptions {
  /** Maximum nesting of evaluate() calls */
  depthLimit?: number;
}

type SpecialForm = (interp: Interpreter, call: CallExpr, env: Environment) => Value;

export class Interpreter implements Evaluator {
  readonly depthLimit: number;
  private depth: number = 0;

  constructor(options: EvaluatorOptions = {}) {
    this.depthLimit = options.depthLimit ?? DEFAULT_DEPTH_LIMIT;
  }

  /**
   * Evaluate an expression in an environment
   */
  evaluate(expr: Expression, env: Environment): Value {
    if (this.depth >= this.depthLimit) {
      throw new StackOverflowError(this.depthLimit);
    }
    this.depth++;
    try {
      return this.evaluateNode(expr, env);
    } finally {
      this.depth--;
    }
  }

  private evaluateNode(expr: Expression, env: Environment): Value {
    switch (expr.kind) {
      case 'literal':
        return expr.value;
      case 'symbol':
        return this.lookupValue(expr.name, env);
      case 'call':
        return this.evaluateCall(expr, env);
      case 'unquote':
        return this.evaluate(expr.operand, env);
      case 'splice':
        throw new SpliceContextError('outside an argument list');
      case 'define':
        throw new DefineContextError('as a standalone expression');
    }
  }

  /**
   * Value of a variable; promises are forced, missing parameters raise
   */
  lookupValue(name: string, env: Environment): Value {
    const binding = env.lookup(name);
    if (binding instanceof LazyPromise) {
      return binding.force();
    }
    if (binding instanceof MissingArgument) {
      throw new MissingArgumentError(name);
    }
    return binding;
  }

  private evaluateCall(call: CallExpr, env: Environment): Value {
    const headName = call.headName();
    if (headName !== null) {
      const special = SPECIAL_FORMS.get(headName);
      if (special) {
        return special(this, call, env);
      }
    }

    if (call.head.kind === 'splice') {
      throw new SpliceContextError('into the function position of a call');
    }
    if (call.head.kind === 'define') {
      throw new DefineContextError('in the function position of a call');
    }

    const fn = this.evaluate(call.head, env);

    if (fn instanceof Primitive) {
      return fn.call(this.evaluateArguments(call.args, env), { env, evaluator: this });
    }
    if (fn instanceof Closure) {
      return this.applyClosure(fn, call.args, env);
    }
    throw new NotCallableError(typeName(fn));
  }

  /**
   * Evaluate arguments left to right for a primitive call. Splices expand
   * in place, defines supply computed names, and `...` forwards the
   * enclosing call's rest arguments.
   */
  evaluateArguments(args: readonly Argument[], env: Environment): EvaluatedArgument[] {
    const out: EvaluatedArgument[] = [];

    for (const arg of args) {
      const value = arg.value;

      if (value.kind === 'symbol' && value.name === DOTS && arg.name === null) {
        for (const entry of forwardedDots(env)) {
          out.push({ name: entry.name, value: entry.promise.force() });
        }
      } else if (value.kind === 'splice') {
        if (arg.name !== null) {
          throw new SpliceContextError(`into named argument '${arg.name}'`);
        }
        out.push(...spliceEntries(this.evaluate(value.operand, env)));
      } else if (value.kind === 'define') {
        if (arg.name !== null) {
          throw new DefineContextError(`as the value of named argument '${arg.name}'`);
        }
        const name = evaluateDefineName(value.lhs, env, this);
        out.push({ name, value: this.evaluate(value.rhs, env) });
      } else {
        out.push({ name: arg.name, value: this.evaluate(value, env) });
      }
    }

    return out;
  }

  /**
   * Call a closure: every argument becomes an unforced promise over the
   * caller's environment. Named arguments match parameters exactly, the
   * remaining parameters are filled positionally, and what is left goes to
   * `...`.
   */
  applyClosure(fn: Closure, args: readonly Argument[], callerEnv: Environment): Value {
    const procedureName = fn.name ?? 'anonymous function';
    const supplied: DotsEntry[] = [];

    for (const arg of args) {
      const value = arg.value;
      if (value.kind === 'symbol' && value.name === DOTS && arg.name === null) {
        supplied.push(...forwardedDots(callerEnv));
      } else if (value.kind === 'define' && arg.name === null) {
        const name = evaluateDefineName(value.lhs, callerEnv, this);
        supplied.push({ name, promise: new LazyPromise(value.rhs, callerEnv, this) });
      } else {
        supplied.push({ name: arg.name, promise: new LazyPromise(value, callerEnv, this) });
      }
    }

    const params = new Map<string, LazyPromise | MissingArgument>();
    for (const param of fn.params) {
      params.set(param, theMissingArg);
    }

    const matched = new Set<DotsEntry>();
    for (const entry of supplied) {
      if (entry.name !== null && params.has(entry.name)) {
        if (params.get(entry.name) !== theMissingArg) {
          throw new ArgumentMatchError(
            `formal argument '${entry.name}' matched by multiple actual arguments`,
            procedureName,
          );
        }
        params.set(entry.name, entry.promise);
        matched.add(entry);
      }
    }

    const dots: DotsEntry[] = [];
    let next = 0;
    for (const entry of supplied) {
      if (matched.has(entry)) {
        continue;
      }
      if (entry.name === null) {
        while (next < fn.params.length && params.get(fn.params[next]) !== theMissingArg) {
          next++;
        }
        if (next < fn.params.length) {
          params.set(fn.params[next], entry.promise);
          continue;
        }
      }
      if (!fn.hasDots) {
        const shown = entry.name === null
          ? formatExpression(entry.promise.expr)
          : `${entry.name}: ${formatExpression(entry.promise.expr)}`;
        throw new ArgumentMatchError(`unused argument (${shown})`, procedureName);
      }
      dots.push(entry);
    }

    const frame: CallFrame = { procedureName, params, dots };
    const frameEnv = fn.env.extend(params, frame);
    return this.evaluate(fn.body, frameEnv);
  }
}

/**
 * Rest arguments of the closure call enclosing `env`
 */
function forwardedDots(env: Environment): readonly DotsEntry[] {
  const frame = env.nearestFrame();
  if (!frame) {
    throw new TypeMismatchError("'...' used in an incorrect context");
  }
  return frame.dots;
}

function positional(call: CallExpr, form: string, min: number, max: number = min): Expression[] {
  for (const arg of call.args) {
    if (arg.name !== null) {
      throw new TypeMismatchError(`${form}: unexpected named argument '${arg.name}'`);
    }
  }
  const n = call.args.length;
  if (n < min || n > max) {
    const expected = min === max
      ? `exactly ${min}`
      : max === Infinity ? `at least ${min}` : `${min} to ${max}`;
    throw new TypeMismatchError(`${form} requires ${expected} argument${max === 1 ? '' : 's'}, got ${n}`);
  }
  return call.args.map((a) => a.value);
}

function symbolName(expr: Expression, what: string): string {
  if (expr.kind !== 'symbol') {
    throw new TypeMismatchError(`${what} must be a symbol, got ${formatExpression(expr)}`);
  }
  return expr.name;
}

/**
 * Items of a parenthesized list written in code, e.g. a parameter list.
 * The reader turns `(a b c)` into a call with head `a`, and `()` into null.
 */
function listItems(expr: Expression, what: string): Expression[] {
  if (expr.kind === 'literal' && expr.value === null) {
    return [];
  }
  if (expr.kind !== 'call') {
    throw new TypeMismatchError(`${what} must be a list, got ${formatExpression(expr)}`);
  }
  for (const arg of expr.args) {
    if (arg.name !== null) {
      throw new TypeMismatchError(`${what} cannot contain named entries`);
    }
  }
  return [expr.head, ...expr.args.map((a) => a.value)];
}

function currentFrame(env: Environment, form: string): CallFrame {
  const frame = env.nearestFrame();
  if (!frame) {
    throw new TypeMismatchError(`${form} must be called from inside a function`);
  }
  return frame;
}

/**
 * Frame of the call whose parameter `name` refers to at this point. The name
 * is resolved lexically: a `let` or `define` that shadows the parameter, or a
 * name that is not a parameter at all, is not capturable.
 */
function argumentFrame(env: Environment, name: string, form: string): CallFrame {
  const nearest = currentFrame(env, form);
  const scope = env.scopeOf(name);
  const frame = scope?.frame;
  if (scope && frame && frame.params.has(name) && scope.ownBinding(name) === frame.params.get(name)) {
    return frame;
  }
  throw new UnknownParameterError(name, nearest.procedureName);
}

function sequenceBody(body: Expression[]): Expression {
  return body.length === 1 ? body[0] : makeCall('begin', body);
}

function makeClosure(name: string | null, paramExprs: Expression[], body: Expression[], env: Environment): Closure {
  const names = paramExprs.map((p) => symbolName(p, 'lambda parameter'));
  const dotsAt = names.indexOf(DOTS);
  if (dotsAt !== -1 && dotsAt !== names.length - 1) {
    throw new TypeMismatchError(`'${DOTS}' must be the last parameter`);
  }
  if (new Set(names).size !== names.length) {
    throw new TypeMismatchError('repeated formal argument in lambda parameter list');
  }
  const params = dotsAt === -1 ? names : names.slice(0, -1);
  return new Closure(name, params, dotsAt !== -1, sequenceBody(body), env);
}

const SPECIAL_FORMS: ReadonlyMap<string, SpecialForm> = new Map<string, SpecialForm>([
  ['quote', (_interp, call) => positional(call, 'quote', 1)[0]],

  ['quasiquote', (interp, call, env) => resolve(positional(call, 'quasiquote', 1)[0], env, interp)],

  ['quo', (interp, call, env) => {
    const [expr] = positional(call, 'quo', 1);
    return new QuotedClosure(resolve(expr, env, interp), env);
  }],

  ['enexpr', (interp, call, env) => {
    const [param] = positional(call, 'enexpr', 1);
    const name = symbolName(param, 'enexpr argument');
    const closure = captureScoped(argumentFrame(env, name, 'enexpr'), name);
    return resolve(closure.expr, closure.env, interp);
  }],

  ['enquo', (interp, call, env) => {
    const [param] = positional(call, 'enquo', 1);
    const name = symbolName(param, 'enquo argument');
    const closure = captureScoped(argumentFrame(env, name, 'enquo'), name);
    return new QuotedClosure(resolve(closure.expr, closure.env, interp), closure.env);
  }],

  ['enexprs', (interp, call, env) => {
    positional(call, 'enexprs', 0);
    const out: EvaluatedArgument[] = [];
    for (const { name, closure } of captureAllScoped(currentFrame(env, 'enexprs'))) {
      for (const arg of resolveArguments([{ name, value: closure.expr }], closure.env, interp)) {
        out.push({ name: arg.name, value: arg.value });
      }
    }
    return new ArgList(out);
  }],

  ['enquos', (interp, call, env) => {
    positional(call, 'enquos', 0);
    const out: EvaluatedArgument[] = [];
    for (const { name, closure } of captureAllScoped(currentFrame(env, 'enquos'))) {
      for (const arg of resolveArguments([{ name, value: closure.expr }], closure.env, interp)) {
        out.push({ name: arg.name, value: new QuotedClosure(arg.value, closure.env) });
      }
    }
    return new ArgList(out);
  }],

  ['lambda', (_interp, call, env) => {
    const [params, ...body] = positional(call, 'lambda', 2, Infinity);
    return makeClosure(null, listItems(params, 'lambda parameter list'), body, env);
  }],

  ['define', (interp, call, env) => {
    const [target, ...rest] = positional(call, 'define', 2, Infinity);
    if (target.kind === 'call') {
      // (define (name param ...) body ...)
      const [head, ...params] = listItems(target, 'define: function header');
      const name = symbolName(head, 'define: function name');
      env.define(name, makeClosure(name, params, rest, env));
      return null;
    }
    if (rest.length !== 1) {
      throw new TypeMismatchError('define requires exactly 2 arguments');
    }
    const name = symbolName(target, 'define name');
    const value = interp.evaluate(rest[0], env);
    if (value instanceof Closure && value.name === null) {
      value.name = name;
    }
    env.define(name, value);
    return null;
  }],

  ['if', (interp, call, env) => {
    const [test, consequent, alternative] = positional(call, 'if', 2, 3);
    if (isTrue(interp.evaluate(test, env))) {
      return interp.evaluate(consequent, env);
    }
    return alternative === undefined ? null : interp.evaluate(alternative, env);
  }],

  ['begin', (interp, call, env) => {
    let result: Value = null;
    for (const expr of positional(call, 'begin', 0, Infinity)) {
      result = interp.evaluate(expr, env);
    }
    return result;
  }],

  ['let', (interp, call, env) => {
    const [bindingList, ...body] = positional(call, 'let', 2, Infinity);
    const bindings = new Map<string, Value>();
    for (const binding of listItems(bindingList, 'let binding list')) {
      const parts = listItems(binding, 'let binding');
      if (parts.length !== 2) {
        throw new TypeMismatchError(`let binding must have exactly 2 elements, got ${parts.length}`);
      }
      bindings.set(symbolName(parts[0], 'let binding name'), interp.evaluate(parts[1], env));
    }
    return interp.evaluate(sequenceBody(body), env.extend(bindings));
  }],
]);

/**
 * Quasiquotation resolver
 *
 * Rewrites a tree so that no escape marker remains:
 *   ,x          the value of x, as an expression
 *   ,@xs        each element of xs as a separate positional argument
 *   lhs := rhs  a named argument whose name is the value of lhs
 *
 * Marker operands are evaluated in the ambient environment passed in;
 * everything else in the tree stays quoted.
 */

import {
  type Argument,
  type Expression,
  CallExpr,
  containsMarkers,
  isExpression,
} from '../expr/expression.js';
import { formatExpression } from '../expr/writer.js';
import { DefineContextError, DefineNameError, InjectionError, SpliceContextError } from '../errors.js';
import type { Environment } from '../eval/environment.js';
import { type Evaluator, type Value, spliceEntries, typeName, valueToExpression } from '../eval/values.js';

/**
 * Where a subtree sits, for error messages about misplaced markers
 */
interface Position {
  splice: string;
  define: string;
}

const TOP_LEVEL: Position = {
  splice: 'at the top level',
  define: 'at the top level',
};

const CALL_HEAD: Position = {
  splice: 'into the function position of a call',
  define: 'in the function position of a call',
};

function namedArgument(name: string): Position {
  return {
    splice: `into named argument '${name}'`,
    define: `as the value of named argument '${name}'`,
  };
}

const POSITIONAL: Position = {
  splice: 'here',
  define: 'here',
};

/**
 * Resolve every escape marker in `expr`. A tree without markers is returned
 * unchanged.
 */
export function resolve(expr: Expression, env: Environment, evaluator: Evaluator): Expression {
  if (!containsMarkers(expr)) {
    return expr;
  }
  return rewrite(expr, env, evaluator, TOP_LEVEL);
}

/**
 * Resolve an argument list: splices flatten into siblings, defines become
 * named arguments.
 */
export function resolveArguments(args: readonly Argument[], env: Environment, evaluator: Evaluator): Argument[] {
  const out: Argument[] = [];

  for (const arg of args) {
    const value = arg.value;

    if (value.kind === 'splice') {
      if (arg.name !== null) {
        throw new SpliceContextError(namedArgument(arg.name).splice);
      }
      out.push(...spliceElements(value.operand, env, evaluator));
      continue;
    }

    if (value.kind === 'define') {
      if (arg.name !== null) {
        throw new DefineContextError(namedArgument(arg.name).define);
      }
      const name = evaluateDefineName(value.lhs, env, evaluator);
      out.push({ name, value: rewrite(value.rhs, env, evaluator, namedArgument(name)) });
      continue;
    }

    const position = arg.name === null ? POSITIONAL : namedArgument(arg.name);
    const resolved = rewrite(value, env, evaluator, position);
    out.push(resolved === value ? arg : { name: arg.name, value: resolved });
  }

  return out;
}

function rewrite(expr: Expression, env: Environment, evaluator: Evaluator, position: Position): Expression {
  switch (expr.kind) {
    case 'symbol':
    case 'literal':
      return expr;
    case 'call':
      return rewriteCall(expr, env, evaluator);
    case 'unquote':
      return inject(expr.operand, env, evaluator);
    case 'splice':
      throw new SpliceContextError(position.splice);
    case 'define':
      throw new DefineContextError(position.define);
  }
}

function rewriteCall(call: CallExpr, env: Environment, evaluator: Evaluator): Expression {
  const head = rewrite(call.head, env, evaluator, CALL_HEAD);
  const args = resolveArguments(call.args, env, evaluator);

  const unchanged = head === call.head
    && args.length === call.args.length
    && args.every((arg, i) => arg === call.args[i]);

  return unchanged ? call : new CallExpr(head, args);
}

/**
 * Expression form of an injected value. It is inserted as it is and must
 * not contain markers.
 */
function injectable(value: Value): Expression {
  const expr = valueToExpression(value);
  if (containsMarkers(expr)) {
    throw new InjectionError(
      `can't inject an expression that still contains escape markers: ${formatExpression(expr)}`,
      typeName(value),
    );
  }
  return expr;
}

function inject(operand: Expression, env: Environment, evaluator: Evaluator): Expression {
  const result = injectable(evaluator.evaluate(operand, env));
  if (process.env.DEBUG_RESOLVE) {
    console.error(`[resolve] ,${formatExpression(operand)} => ${formatExpression(result)}`);
  }
  return result;
}

function spliceElements(operand: Expression, env: Environment, evaluator: Evaluator): Argument[] {
  const value = evaluator.evaluate(operand, env);
  const elements = spliceEntries(value).map((entry) => ({
    name: entry.name,
    value: injectable(entry.value),
  }));
  if (process.env.DEBUG_RESOLVE) {
    console.error(`[resolve] ,@${formatExpression(operand)} => ${elements.length} arguments`);
  }
  return elements;
}

/**
 * Name produced by the left-hand side of a define marker
 */
export function evaluateDefineName(lhs: Expression, env: Environment, evaluator: Evaluator): string {
  const value = evaluator.evaluate(lhs, env);
  if (typeof value === 'string' && value !== '') {
    return value;
  }
  if (isExpression(value) && value.kind === 'symbol') {
    return value.name;
  }
  throw new DefineNameError(value === '' ? 'an empty string' : typeName(value));
}

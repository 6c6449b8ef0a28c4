/**
 * Writer - render expressions and values in reader syntax
 */

import type { Argument, AtomicValue, Expression } from './expression.js';
import { isExpression } from './expression.js';
import { ArgList, Primitive, Procedure, QuotedClosure, isSequence, type Value } from '../eval/values.js';
import { Environment } from '../eval/environment.js';

function formatString(s: string): string {
  let out = '"';
  for (const c of s) {
    switch (c) {
      case '\n': out += '\\n'; break;
      case '\t': out += '\\t'; break;
      case '\r': out += '\\r'; break;
      case '\\': out += '\\\\'; break;
      case '"': out += '\\"'; break;
      default: out += c; break;
    }
  }
  return out + '"';
}

export function formatAtomic(value: AtomicValue): string {
  if (value === null) return '#null';
  if (value === true) return '#t';
  if (value === false) return '#f';
  if (typeof value === 'string') return formatString(value);
  return String(value);
}

function formatArgument(arg: Argument): string {
  const value = formatExpression(arg.value);
  return arg.name === null ? value : `${arg.name}: ${value}`;
}

export function formatExpression(expr: Expression): string {
  switch (expr.kind) {
    case 'symbol':
      return expr.name;
    case 'literal':
      return formatAtomic(expr.value);
    case 'call':
      return `(${[formatExpression(expr.head), ...expr.args.map(formatArgument)].join(' ')})`;
    case 'unquote':
      return `,${formatExpression(expr.operand)}`;
    case 'splice':
      return `,@${formatExpression(expr.operand)}`;
    case 'define':
      return `${formatExpression(expr.lhs)} := ${formatExpression(expr.rhs)}`;
  }
}

export function formatValue(value: Value): string {
  if (isExpression(value)) {
    return formatExpression(value);
  }
  if (isSequence(value)) {
    return `[${value.map(formatValue).join(' ')}]`;
  }
  if (value instanceof ArgList) {
    return `[${value.entries.map((e) => (e.name === null ? formatValue(e.value) : `${e.name}: ${formatValue(e.value)}`)).join(' ')}]`;
  }
  if (value instanceof QuotedClosure) {
    return `<quosure env#${value.env.id}: ${formatExpression(value.expr)}>`;
  }
  if (value instanceof Procedure) {
    return `<${value instanceof Primitive ? 'primitive' : 'closure'} ${value.name ?? 'anonymous'}>`;
  }
  if (value instanceof Environment) {
    return `<environment#${value.id}>`;
  }
  return formatAtomic(value);
}

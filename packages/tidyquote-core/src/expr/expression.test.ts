/**
 * Expression model tests
 */

import { describe, it, expect } from 'vitest';
import {
  type Expression,
  CallExpr,
  containsMarkers,
  exprEqual,
  isExpression,
  makeArgument,
  makeCall,
  makeDefine,
  makeLiteral,
  makeSplice,
  makeSymbol,
  makeUnquote,
  walkExpression,
} from './expression.js';

describe('Expression constructors', () => {
  it('should build a symbol', () => {
    const sym = makeSymbol('x');
    expect(sym.kind).toBe('symbol');
    expect(sym.name).toBe('x');
    expect(sym.asSymbol()).toBe(sym);
    expect(sym.asCall()).toBeNull();
  });

  it('should build literals for every atomic type', () => {
    expect(makeLiteral(1).value).toBe(1);
    expect(makeLiteral('a').value).toBe('a');
    expect(makeLiteral(true).value).toBe(true);
    expect(makeLiteral(null).value).toBeNull();
  });

  it('should turn a string head into a symbol and bare args into positional arguments', () => {
    const call = makeCall('f', [makeSymbol('a'), makeArgument(makeLiteral(1), 'n')]);
    expect(call.head).toEqual(makeSymbol('f'));
    expect(call.headName()).toBe('f');
    expect(call.args).toHaveLength(2);
    expect(call.args[0].name).toBeNull();
    expect(call.args[1].name).toBe('n');
  });

  it('should report null headName for a computed head', () => {
    const call = makeCall(makeCall('g'), []);
    expect(call.headName()).toBeNull();
  });

  it('should freeze argument lists', () => {
    const call = makeCall('f', [makeSymbol('a')]);
    expect(Object.isFrozen(call.args)).toBe(true);
    expect(Object.isFrozen(call.args[0])).toBe(true);
  });

  it('should not be affected by later changes to the input array', () => {
    const args = [makeArgument(makeSymbol('a'))];
    const call = new CallExpr(makeSymbol('f'), args);
    args.push(makeArgument(makeSymbol('b')));
    expect(call.args).toHaveLength(1);
  });

  it('should mark only escape nodes as markers', () => {
    expect(makeUnquote(makeSymbol('x')).isMarker()).toBe(true);
    expect(makeSplice(makeSymbol('x')).isMarker()).toBe(true);
    expect(makeDefine(makeLiteral('n'), makeLiteral(1)).isMarker()).toBe(true);
    expect(makeCall('f').isMarker()).toBe(false);
  });

  it('should recognize expressions', () => {
    expect(isExpression(makeSymbol('x'))).toBe(true);
    expect(isExpression('x')).toBe(false);
    expect(isExpression({ kind: 'symbol', name: 'x' })).toBe(false);
  });
});

describe('exprEqual', () => {
  it('should compare by structure, not identity', () => {
    const a = makeCall('f', [makeCall('g', [makeSymbol('z')]), makeArgument(makeLiteral(1), 'k')]);
    const b = makeCall('f', [makeCall('g', [makeSymbol('z')]), makeArgument(makeLiteral(1), 'k')]);
    expect(a).not.toBe(b);
    expect(exprEqual(a, b)).toBe(true);
  });

  it('should distinguish argument names', () => {
    const a = makeCall('f', [makeArgument(makeLiteral(1), 'x')]);
    const b = makeCall('f', [makeArgument(makeLiteral(1), 'y')]);
    const c = makeCall('f', [makeLiteral(1)]);
    expect(exprEqual(a, b)).toBe(false);
    expect(exprEqual(a, c)).toBe(false);
  });

  it('should distinguish argument order and count', () => {
    expect(exprEqual(makeCall('f', [makeSymbol('a'), makeSymbol('b')]), makeCall('f', [makeSymbol('b'), makeSymbol('a')]))).toBe(false);
    expect(exprEqual(makeCall('f', [makeSymbol('a')]), makeCall('f', [makeSymbol('a'), makeSymbol('a')]))).toBe(false);
  });

  it('should distinguish a literal string from a symbol', () => {
    expect(exprEqual(makeLiteral('x'), makeSymbol('x'))).toBe(false);
  });

  it('should treat NaN literals as equal and 0 as equal to -0', () => {
    expect(exprEqual(makeLiteral(NaN), makeLiteral(NaN))).toBe(true);
    expect(exprEqual(makeLiteral(0), makeLiteral(-0))).toBe(true);
  });

  it('should compare markers by operand', () => {
    expect(exprEqual(makeUnquote(makeSymbol('x')), makeUnquote(makeSymbol('x')))).toBe(true);
    expect(exprEqual(makeUnquote(makeSymbol('x')), makeSplice(makeSymbol('x')))).toBe(false);
    expect(exprEqual(
      makeDefine(makeLiteral('n'), makeSymbol('v')),
      makeDefine(makeLiteral('n'), makeSymbol('w')),
    )).toBe(false);
  });
});

describe('walkExpression', () => {
  it('should visit nodes depth-first in pre-order', () => {
    // (f (g z) y)
    const tree = makeCall('f', [makeCall('g', [makeSymbol('z')]), makeSymbol('y')]);
    const seen: string[] = [];
    walkExpression(tree, (node, depth) => {
      seen.push(`${node.kind}:${node.kind === 'symbol' ? node.name : ''}@${depth}`);
    });
    expect(seen).toEqual([
      'call:@0',
      'symbol:f@1',
      'call:@1',
      'symbol:g@2',
      'symbol:z@2',
      'symbol:y@1',
    ]);
  });

  it('should skip children when the visitor returns false', () => {
    const tree = makeCall('f', [makeCall('g', [makeSymbol('z')])]);
    const seen: Expression[] = [];
    walkExpression(tree, (node) => {
      seen.push(node);
      return node.kind !== 'call' || node === tree;
    });
    expect(seen).toHaveLength(3);
  });

  it('should descend into marker operands', () => {
    const tree = makeDefine(makeSymbol('n'), makeUnquote(makeSymbol('v')));
    const kinds: string[] = [];
    walkExpression(tree, (node) => {
      kinds.push(node.kind);
    });
    expect(kinds).toEqual(['define', 'symbol', 'unquote', 'symbol']);
  });
});

describe('containsMarkers', () => {
  it('should be false for plain code', () => {
    expect(containsMarkers(makeCall('f', [makeCall('g', [makeLiteral(1)])]))).toBe(false);
  });

  it('should find markers at any depth', () => {
    let tree: Expression = makeUnquote(makeSymbol('x'));
    for (let i = 0; i < 10; i++) {
      tree = makeCall('f', [tree]);
    }
    expect(containsMarkers(tree)).toBe(true);
  });

  it('should find a marker in the head position', () => {
    expect(containsMarkers(makeCall(makeUnquote(makeSymbol('fn')), []))).toBe(true);
  });
});

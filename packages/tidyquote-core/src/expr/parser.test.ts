/**
 * Parser tests - reader syntax to expression trees
 */

import { describe, it, expect } from 'vitest';
import { parse, parseOne } from './parser.js';
import {
  exprEqual,
  makeArgument,
  makeCall,
  makeDefine,
  makeLiteral,
  makeSplice,
  makeSymbol,
  makeUnquote,
} from './expression.js';
import { ParseError } from '../errors.js';

describe('Parser - Basic Literals', () => {
  it('should parse true and false', () => {
    expect(parseOne('#t')).toEqual(makeLiteral(true));
    expect(parseOne('#f')).toEqual(makeLiteral(false));
  });

  it('should parse null', () => {
    expect(parseOne('#null')).toEqual(makeLiteral(null));
  });

  it('should parse integer', () => {
    expect(parseOne('42').asLiteral()?.value).toBe(42);
  });

  it('should parse negative integer', () => {
    expect(parseOne('-123').asLiteral()?.value).toBe(-123);
  });

  it('should parse float', () => {
    expect(parseOne('3.14').asLiteral()?.value).toBeCloseTo(3.14);
  });

  it('should parse number with exponent', () => {
    expect(parseOne('1.5e2').asLiteral()?.value).toBeCloseTo(150);
  });

  it('should parse radix numbers', () => {
    expect(parseOne('#xff').asLiteral()?.value).toBe(255);
    expect(parseOne('#b101').asLiteral()?.value).toBe(5);
    expect(parseOne('#o17').asLiteral()?.value).toBe(15);
  });

  it('should reject digits outside the radix', () => {
    expect(() => parseOne('#b102')).toThrow(ParseError);
  });

  it('should parse string with escapes', () => {
    expect(parseOne('"hello\\nworld\\t!"').asLiteral()?.value).toBe('hello\nworld\t!');
  });

  it('should parse empty list as null', () => {
    expect(parseOne('()')).toEqual(makeLiteral(null));
  });
});

describe('Parser - Symbols and Calls', () => {
  it('should parse identifiers with operator characters', () => {
    expect(parseOne('string-append').asSymbol()?.name).toBe('string-append');
    expect(parseOne('<=').asSymbol()?.name).toBe('<=');
    expect(parseOne('expr-equal?').asSymbol()?.name).toBe('expr-equal?');
    expect(parseOne('...').asSymbol()?.name).toBe('...');
    expect(parseOne('-').asSymbol()?.name).toBe('-');
  });

  it('should parse a call with positional arguments', () => {
    const result = parseOne('(f (g z) y)');
    expect(exprEqual(result, makeCall('f', [makeCall('g', [makeSymbol('z')]), makeSymbol('y')]))).toBe(true);
  });

  it('should parse named arguments', () => {
    const result = parseOne('(f a x: 1 y: (g))');
    expect(exprEqual(result, makeCall('f', [
      makeSymbol('a'),
      makeArgument(makeLiteral(1), 'x'),
      makeArgument(makeCall('g'), 'y'),
    ]))).toBe(true);
  });

  it('should skip comments', () => {
    const exprs = parse('; leading\n(f 1) ; trailing\n2');
    expect(exprs).toHaveLength(2);
    expect(exprs[1].asLiteral()?.value).toBe(2);
  });

  it('should parse several top-level expressions', () => {
    expect(parse('a b c')).toHaveLength(3);
  });
});

describe('Parser - Quotation syntax', () => {
  it('should expand quote abbreviation', () => {
    expect(exprEqual(parseOne("'x"), makeCall('quote', [makeSymbol('x')]))).toBe(true);
  });

  it('should expand quasiquote abbreviation', () => {
    expect(exprEqual(parseOne('`(f x)'), makeCall('quasiquote', [makeCall('f', [makeSymbol('x')])]))).toBe(true);
  });

  it('should parse unquote as a marker node', () => {
    const result = parseOne(',x');
    expect(result.kind).toBe('unquote');
    expect(exprEqual(result, makeUnquote(makeSymbol('x')))).toBe(true);
  });

  it('should parse unquote-splicing as a marker node', () => {
    const result = parseOne('(f ,@xs y)');
    expect(exprEqual(result, makeCall('f', [makeSplice(makeSymbol('xs')), makeSymbol('y')]))).toBe(true);
  });

  it('should parse a define marker with a literal name', () => {
    const result = parseOne('(f "x" := 10)');
    expect(exprEqual(result, makeCall('f', [makeDefine(makeLiteral('x'), makeLiteral(10))]))).toBe(true);
  });

  it('should absorb the unquote on the left of :=', () => {
    const result = parseOne('(f ,nm := ,v)');
    expect(exprEqual(result, makeCall('f', [makeDefine(makeSymbol('nm'), makeUnquote(makeSymbol('v')))]))).toBe(true);
  });

  it('should keep a call in head position that is an unquote', () => {
    const result = parseOne('(,fn 1)');
    expect(exprEqual(result, makeCall(makeUnquote(makeSymbol('fn')), [makeLiteral(1)]))).toBe(true);
  });

  it('should not treat a call spelled unquote as a marker', () => {
    const result = parseOne('(unquote x)');
    expect(result.kind).toBe('call');
  });
});

describe('Parser - Errors', () => {
  it('should reject an escape on the name side of a named argument', () => {
    expect(() => parseOne('(f ,x: 1)')).toThrow(/Can't unquote the name of a named argument/);
  });

  it('should reject := without a left-hand side', () => {
    expect(() => parseOne('(f := 1)')).toThrow(ParseError);
  });

  it('should reject := in function position', () => {
    expect(() => parseOne('(a := 1)')).toThrow(/function position/);
  });

  it('should reject a named argument in function position', () => {
    expect(() => parseOne('(x: 1)')).toThrow(/function position/);
  });

  it('should reject a named argument without value', () => {
    expect(() => parseOne('(f x:)')).toThrow(/Expected a value after 'x:'/);
  });

  it('should reject a named argument outside a list', () => {
    expect(() => parseOne('x:')).toThrow(/outside an argument list/);
  });

  it('should reject an unterminated list', () => {
    expect(() => parseOne('(f 1')).toThrow(/Unterminated list/);
  });

  it('should reject a stray close paren', () => {
    expect(() => parse(')')).toThrow(/Unexpected '\)'/);
  });

  it('should reject an unterminated string', () => {
    expect(() => parseOne('"abc')).toThrow(/Unterminated string/);
  });

  it('should report file, line and column', () => {
    try {
      parse('(f\n  #q)', 'prog.tq');
      expect.unreachable();
    } catch (e) {
      if (!(e instanceof ParseError)) throw e;
      expect(e.code).toBe('SYNTAX');
      expect(e.location).toEqual({ file: 'prog.tq', line: 2, column: 4 });
      expect(e.message).toBe('Parse error in prog.tq at 2:4: Invalid hash expression: #q');
    }
  });

  it('should reject empty input for parseOne', () => {
    expect(() => parseOne('  ')).toThrow('No expression to parse');
  });
});

/**
 * Reader - S-expression syntax to expression trees
 *
 *   (f a b)        call of f with positional arguments
 *   (f x: 1)       named argument
 *   'x             (quote x)
 *   `x             (quasiquote x)
 *   ,x             unquote marker
 *   ,@x            splice marker
 *   (f lhs := v)   define marker; a leading comma on lhs is absorbed
 *   ()             null
 *
 * Escape syntax becomes marker nodes here; `(unquote x)` stays an ordinary call.
 */

import {
  type Argument,
  type Expression,
  makeCall,
  makeDefine,
  makeLiteral,
  makeSplice,
  makeSymbol,
  makeUnquote,
} from './expression.js';
import { ParseError, type SourceLocation } from '../errors.js';

export class Parser {
  private input: string;
  private pos: number = 0;
  private line: number = 1;
  private column: number = 1;
  private file: string;

  constructor(input: string, file: string = '<unknown>') {
    this.input = input;
    this.file = file;
  }

  /**
   * Parse the input into a list of expressions
   */
  parse(): Expression[] {
    const exprs: Expression[] = [];

    while (!this.isAtEnd()) {
      this.skipWhitespaceAndComments();
      if (this.isAtEnd()) break;

      exprs.push(this.parseDatum());
    }

    return exprs;
  }

  /**
   * Parse a single datum
   */
  private parseDatum(): Expression {
    this.skipWhitespaceAndComments();

    if (this.isAtEnd()) {
      throw this.error('Unexpected end of input');
    }

    const c = this.peek();

    if (c === '#') {
      return this.parseHashExpr();
    }

    if (c === '"') {
      return this.parseString();
    }

    if (this.isDigit(c) || (c === '-' && this.isDigit(this.peekAhead(1)))) {
      return this.parseNumber();
    }

    if (c === "'") {
      this.advance();
      return makeCall('quote', [this.parseDatum()]);
    }

    if (c === '`') {
      this.advance();
      return makeCall('quasiquote', [this.parseDatum()]);
    }

    if (c === ',') {
      this.advance();
      const splice = this.peek() === '@';
      if (splice) {
        this.advance();
      }
      this.skipWhitespaceAndComments();
      if (this.peekKeyword() !== null) {
        throw this.error("Can't unquote the name of a named argument; use 'name := value' instead");
      }
      const operand = this.parseDatum();
      return splice ? makeSplice(operand) : makeUnquote(operand);
    }

    if (c === '(') {
      return this.parseList();
    }

    if (c === ')') {
      throw this.error("Unexpected ')'");
    }

    if (this.isIdentifierStart(c)) {
      return this.parseIdentifier();
    }

    throw this.error(`Unexpected character: ${c}`);
  }

  /**
   * Parse hash expressions: #t, #f, #null, #x1F
   */
  private parseHashExpr(): Expression {
    this.expect('#');
    const c = this.peek();

    if (c === 'n') {
      const word = this.readWord();
      if (word !== 'null') {
        throw this.error(`Invalid hash expression: #${word}`);
      }
      return makeLiteral(null);
    }

    if (c === 't' || c === 'f') {
      this.advance();
      return makeLiteral(c === 't');
    }

    // Number radix: #b, #o, #d, #x
    if (c === 'b' || c === 'o' || c === 'd' || c === 'x') {
      this.advance();
      return this.parseNumberWithRadix(c);
    }

    throw this.error(`Invalid hash expression: #${c}`);
  }

  /**
   * Parse string literal
   */
  private parseString(): Expression {
    this.expect('"');
    let str = '';

    while (!this.isAtEnd() && this.peek() !== '"') {
      if (this.peek() === '\\') {
        this.advance();
        if (this.isAtEnd()) {
          throw this.error('Unexpected end of string');
        }
        const c = this.advance();
        switch (c) {
          case 'n': str += '\n'; break;
          case 't': str += '\t'; break;
          case 'r': str += '\r'; break;
          case '\\': str += '\\'; break;
          case '"': str += '"'; break;
          default: str += c; break;
        }
      } else {
        str += this.advance();
      }
    }

    if (this.isAtEnd()) {
      throw this.error('Unterminated string');
    }
    this.expect('"');
    return makeLiteral(str);
  }

  /**
   * Parse number
   */
  private parseNumber(): Expression {
    let numStr = '';

    if (this.peek() === '-') {
      numStr += this.advance();
    }

    // Integer part
    while (this.isDigit(this.peek())) {
      numStr += this.advance();
    }

    // Fractional part
    if (this.peek() === '.') {
      numStr += this.advance();
      while (this.isDigit(this.peek())) {
        numStr += this.advance();
      }
    }

    // Exponent
    if (this.peek() === 'e' || this.peek() === 'E') {
      numStr += this.advance();
      if (this.peek() === '+' || this.peek() === '-') {
        numStr += this.advance();
      }
      while (this.isDigit(this.peek())) {
        numStr += this.advance();
      }
    }

    const value = Number(numStr);
    if (isNaN(value) || this.isIdentifierChar(this.peek())) {
      throw this.error(`Invalid number: ${numStr}${this.isAtEnd() ? '' : this.peek()}`);
    }

    return makeLiteral(value);
  }

  /**
   * Parse number with specific radix (#b, #o, #d, #x)
   */
  private parseNumberWithRadix(radix: string): Expression {
    const radixMap: Record<string, number> = {
      'b': 2,
      'o': 8,
      'd': 10,
      'x': 16,
    };

    let numStr = '';
    const base = radixMap[radix];

    while (!this.isAtEnd() && this.isHexDigit(this.peek())) {
      numStr += this.advance();
    }

    if (numStr.length === 0) {
      throw this.error(`Expected digits after #${radix}`);
    }

    const value = parseInt(numStr, base);
    if (isNaN(value) || value.toString(base) !== numStr.toLowerCase().replace(/^0+(?=.)/, '')) {
      throw this.error(`Invalid digits for #${radix}: ${numStr}`);
    }
    return makeLiteral(value);
  }

  /**
   * Parse list: a call, or null for ()
   */
  private parseList(): Expression {
    this.expect('(');
    this.skipWhitespaceAndComments();

    if (this.peek() === ')') {
      this.advance();
      return makeLiteral(null);
    }

    if (this.peekKeyword() !== null) {
      throw this.error('A named argument cannot be in the function position');
    }
    const head = this.parseDatum();
    this.skipWhitespaceAndComments();
    if (this.peekDefineOperator()) {
      throw this.error("':=' cannot be used in the function position");
    }

    const args: Argument[] = [];

    while (true) {
      this.skipWhitespaceAndComments();

      if (this.isAtEnd()) {
        throw this.error('Unterminated list');
      }

      if (this.peek() === ')') {
        this.advance();
        break;
      }

      const keyword = this.peekKeyword();
      if (keyword !== null) {
        this.readWord();
        this.skipWhitespaceAndComments();
        if (this.isAtEnd() || this.peek() === ')') {
          throw this.error(`Expected a value after '${keyword}:'`);
        }
        args.push({ name: keyword, value: this.parseDatum() });
        continue;
      }

      const datum = this.parseDatum();
      this.skipWhitespaceAndComments();

      if (this.peekDefineOperator()) {
        this.readWord();
        this.skipWhitespaceAndComments();
        if (this.isAtEnd() || this.peek() === ')') {
          throw this.error("Expected a value after ':='");
        }
        const lhs = datum.kind === 'unquote' ? datum.operand : datum;
        args.push({ name: null, value: makeDefine(lhs, this.parseDatum()) });
        continue;
      }

      args.push({ name: null, value: datum });
    }

    return makeCall(head, args);
  }

  /**
   * Parse identifier/symbol
   */
  private parseIdentifier(): Expression {
    const id = this.readWord();

    if (id.length === 0) {
      throw this.error('Expected identifier');
    }

    if (id === ':=') {
      throw this.error("':=' must follow a name inside an argument list");
    }

    if (id.endsWith(':')) {
      throw this.error(`Named argument '${id}' outside an argument list`);
    }

    return makeSymbol(id);
  }

  /**
   * Argument name at the current position (`name:`), without consuming it
   */
  private peekKeyword(): string | null {
    if (!this.isIdentifierStart(this.peek())) {
      return null;
    }
    let end = this.pos;
    while (end < this.input.length && this.isIdentifierChar(this.input[end])) {
      end++;
    }
    const word = this.input.substring(this.pos, end);
    if (word.length > 1 && word.endsWith(':')) {
      return word.slice(0, -1);
    }
    return null;
  }

  private peekDefineOperator(): boolean {
    return this.input.startsWith(':=', this.pos)
      && !this.isIdentifierChar(this.peekAhead(2));
  }

  // ============ Tokenizer helpers ============

  private readWord(): string {
    let word = '';
    while (!this.isAtEnd() && this.isIdentifierChar(this.peek())) {
      word += this.advance();
    }
    return word;
  }

  private skipWhitespaceAndComments(): void {
    while (!this.isAtEnd()) {
      const c = this.peek();

      if (c === ' ' || c === '\t' || c === '\r' || c === '\n' || c === '\f') {
        this.advance();
      } else if (c === ';') {
        // Skip comment until end of line
        while (!this.isAtEnd() && this.peek() !== '\n') {
          this.advance();
        }
      } else {
        break;
      }
    }
  }

  private isDigit(c: string): boolean {
    return c >= '0' && c <= '9';
  }

  private isHexDigit(c: string): boolean {
    return this.isDigit(c) || (c >= 'a' && c <= 'f') || (c >= 'A' && c <= 'F');
  }

  private isAlpha(c: string): boolean {
    return (c >= 'a' && c <= 'z') || (c >= 'A' && c <= 'Z');
  }

  private isIdentifierStart(c: string): boolean {
    return this.isAlpha(c) || '!$%&*/:<=>?^_~+-.'.includes(c);
  }

  private isIdentifierChar(c: string): boolean {
    return this.isIdentifierStart(c) || this.isDigit(c) || c === '@';
  }

  private isAtEnd(): boolean {
    return this.pos >= this.input.length;
  }

  private peek(): string {
    if (this.isAtEnd()) return '\0';
    return this.input[this.pos];
  }

  private peekAhead(n: number): string {
    if (this.pos + n >= this.input.length) return '\0';
    return this.input[this.pos + n];
  }

  private advance(): string {
    const c = this.input[this.pos++];
    if (c === '\n') {
      this.line++;
      this.column = 1;
    } else {
      this.column++;
    }
    return c;
  }

  private expect(expected: string): void {
    const c = this.peek();
    if (c !== expected) {
      throw this.error(`Expected '${expected}', got '${c}'`);
    }
    this.advance();
  }

  private currentLocation(): SourceLocation {
    return { file: this.file, line: this.line, column: this.column };
  }

  private error(message: string): ParseError {
    return new ParseError(message, this.currentLocation());
  }
}

/**
 * Parse source code into expressions
 */
export function parse(source: string, file: string = '<unknown>'): Expression[] {
  const parser = new Parser(source, file);
  return parser.parse();
}

/**
 * Parse a single expression
 */
export function parseOne(source: string): Expression {
  const exprs = parse(source);
  if (exprs.length === 0) {
    throw new Error('No expression to parse');
  }
  if (exprs.length > 1) {
    throw new Error('Multiple expressions found, expected one');
  }
  return exprs[0];
}

/**
 * Expression model - symbolic expression trees
 *
 * A captured piece of code is a tree of immutable nodes. Three variants
 * describe ordinary code (symbols, literals, calls); three more are the
 * escape markers recognized by the quasiquotation resolver. Markers are
 * node kinds of their own, so nothing ever has to inspect a call head's
 * spelling to decide whether a call is an escape.
 */

/**
 * Self-evaluating constant
 */
export type AtomicValue = number | string | boolean | null;

/**
 * Call argument; `name === null` means positional
 */
export interface Argument {
  readonly name: string | null;
  readonly value: Expression;
}

export type ExpressionKind = 'symbol' | 'literal' | 'call' | 'unquote' | 'splice' | 'define';

/**
 * Base class for all expression nodes
 */
export abstract class ExprNode {
  abstract readonly kind: ExpressionKind;

  /** Narrowing helpers - return the node itself or null */
  asSymbol(): SymbolExpr | null { return null; }
  asLiteral(): LiteralExpr | null { return null; }
  asCall(): CallExpr | null { return null; }

  /** True for unquote, splice and define markers */
  isMarker(): boolean { return false; }
}

/**
 * Unresolved identifier
 */
export class SymbolExpr extends ExprNode {
  readonly kind = 'symbol' as const;

  constructor(readonly name: string) {
    super();
  }

  asSymbol(): SymbolExpr { return this; }
}

/**
 * Constant
 */
export class LiteralExpr extends ExprNode {
  readonly kind = 'literal' as const;

  constructor(readonly value: AtomicValue) {
    super();
  }

  asLiteral(): LiteralExpr { return this; }
}

/**
 * Function or operator application
 */
export class CallExpr extends ExprNode {
  readonly kind = 'call' as const;
  readonly args: readonly Argument[];

  constructor(readonly head: Expression, args: readonly Argument[]) {
    super();
    this.args = Object.freeze(args.map((a) => Object.freeze({ name: a.name, value: a.value })));
  }

  asCall(): CallExpr { return this; }

  /** Head symbol name, or null when the head is computed */
  headName(): string | null {
    return this.head.kind === 'symbol' ? this.head.name : null;
  }
}

/**
 * Escape: substitute the operand's value
 */
export class UnquoteExpr extends ExprNode {
  readonly kind = 'unquote' as const;

  constructor(readonly operand: Expression) {
    super();
  }

  isMarker(): boolean { return true; }
}

/**
 * Escape: substitute each element of the operand's value as a sibling argument
 */
export class SpliceExpr extends ExprNode {
  readonly kind = 'splice' as const;

  constructor(readonly operand: Expression) {
    super();
  }

  isMarker(): boolean { return true; }
}

/**
 * Escape: named argument whose name is computed
 */
export class DefineExpr extends ExprNode {
  readonly kind = 'define' as const;

  constructor(readonly lhs: Expression, readonly rhs: Expression) {
    super();
  }

  isMarker(): boolean { return true; }
}

export type Expression = SymbolExpr | LiteralExpr | CallExpr | UnquoteExpr | SpliceExpr | DefineExpr;

export type EscapeMarker = UnquoteExpr | SpliceExpr | DefineExpr;

/**
 * Check whether an arbitrary value is an expression node
 */
export function isExpression(value: unknown): value is Expression {
  return value instanceof ExprNode;
}

export function makeSymbol(name: string): SymbolExpr {
  return new SymbolExpr(name);
}

export function makeLiteral(value: AtomicValue): LiteralExpr {
  return new LiteralExpr(value);
}

export function makeArgument(value: Expression, name: string | null = null): Argument {
  return { name, value };
}

/**
 * Build a call. A string head becomes a symbol; bare expressions in `args`
 * become positional arguments.
 */
export function makeCall(head: Expression | string, args: ReadonlyArray<Expression | Argument> = []): CallExpr {
  const headExpr = typeof head === 'string' ? makeSymbol(head) : head;
  return new CallExpr(
    headExpr,
    args.map((a) => (isExpression(a) ? makeArgument(a) : a)),
  );
}

export function makeUnquote(operand: Expression): UnquoteExpr {
  return new UnquoteExpr(operand);
}

export function makeSplice(operand: Expression): SpliceExpr {
  return new SpliceExpr(operand);
}

export function makeDefine(lhs: Expression, rhs: Expression): DefineExpr {
  return new DefineExpr(lhs, rhs);
}

/**
 * Structural equality
 */
export function exprEqual(a: Expression, b: Expression): boolean {
  if (a === b) {
    return true;
  }

  switch (a.kind) {
    case 'symbol':
      return b.kind === 'symbol' && a.name === b.name;
    case 'literal':
      // NaN equals NaN; 0 equals -0
      return b.kind === 'literal' && (a.value === b.value || Object.is(a.value, b.value));
    case 'call':
      return b.kind === 'call' && exprEqual(a.head, b.head) && argumentsEqual(a.args, b.args);
    case 'unquote':
      return b.kind === 'unquote' && exprEqual(a.operand, b.operand);
    case 'splice':
      return b.kind === 'splice' && exprEqual(a.operand, b.operand);
    case 'define':
      return b.kind === 'define' && exprEqual(a.lhs, b.lhs) && exprEqual(a.rhs, b.rhs);
  }
}

export function argumentsEqual(a: readonly Argument[], b: readonly Argument[]): boolean {
  if (a.length !== b.length) {
    return false;
  }
  for (let i = 0; i < a.length; i++) {
    if (a[i].name !== b[i].name || !exprEqual(a[i].value, b[i].value)) {
      return false;
    }
  }
  return true;
}

/**
 * Visitor for walkExpression. Returning false skips the node's children.
 */
export type ExpressionVisitor = (node: Expression, depth: number) => boolean | void;

/**
 * Depth-first, pre-order walk over a tree: call heads, argument values and
 * marker operands are all visited.
 */
export function walkExpression(root: Expression, visit: ExpressionVisitor, depth: number = 0): void {
  if (visit(root, depth) === false) {
    return;
  }

  switch (root.kind) {
    case 'symbol':
    case 'literal':
      return;
    case 'call':
      walkExpression(root.head, visit, depth + 1);
      for (const arg of root.args) {
        walkExpression(arg.value, visit, depth + 1);
      }
      return;
    case 'unquote':
    case 'splice':
      walkExpression(root.operand, visit, depth + 1);
      return;
    case 'define':
      walkExpression(root.lhs, visit, depth + 1);
      walkExpression(root.rhs, visit, depth + 1);
      return;
  }
}

/**
 * True when an escape marker appears anywhere in the tree
 */
export function containsMarkers(root: Expression): boolean {
  let found = false;
  walkExpression(root, (node) => {
    if (found) return false;
    if (node.isMarker()) {
      found = true;
      return false;
    }
    return true;
  });
  return found;
}

/**
 * Expressions: the opaque value type the model stores for guards,
 * invariants, initialisers, labels and arguments.
 *
 * Evaluation and typing belong to the expression language; the model
 * only needs identity, a position, the symbols an expression mentions,
 * structural equality and rebinding of symbols when a document is copied.
 * Expressions are immutable trees.
 */

import { type Position, UNKNOWN_POSITION } from './position.js';
import { type ModelSymbol } from './symbol.js';

export type ExpressionKind = 'empty' | 'constant' | 'identifier' | 'compound';

export type Constant = number | boolean | string;

export class Expression {
  private static readonly EMPTY = new Expression('empty', UNKNOWN_POSITION, null, null, '', []);

  private constructor(
    readonly kind: ExpressionKind,
    readonly position: Position,
    readonly value: Constant | null,
    readonly symbol: ModelSymbol | null,
    readonly operator: string,
    readonly operands: readonly Expression[],
  ) {}

  static empty(): Expression {
    return Expression.EMPTY;
  }

  static constant(value: Constant, position: Position = UNKNOWN_POSITION): Expression {
    return new Expression('constant', position, value, null, '', []);
  }

  static identifier(symbol: ModelSymbol, position: Position = UNKNOWN_POSITION): Expression {
    return new Expression('identifier', position, null, symbol, '', []);
  }

  /**
   * Operator application. Two operands print infix, one prefix, anything
   * else as a call.
   */
  static compound(operator: string, operands: Expression[], position: Position = UNKNOWN_POSITION): Expression {
    return new Expression('compound', position, null, null, operator, [...operands]);
  }

  isEmpty(): boolean {
    return this.kind === 'empty';
  }

  /** Distinct symbols referenced anywhere in the tree, depth-first. */
  symbols(): ModelSymbol[] {
    const out: ModelSymbol[] = [];
    walk(this, e => {
      if (e.symbol && !out.includes(e.symbol)) out.push(e.symbol);
    });
    return out;
  }

  references(s: ModelSymbol): boolean {
    return this.symbols().includes(s);
  }

  /** Structural equality. Positions are ignored. */
  equals(other: Expression): boolean {
    if (this === other) return true;
    if (this.kind !== other.kind) return false;
    switch (this.kind) {
      case 'empty':
        return true;
      case 'constant':
        return this.value === other.value;
      case 'identifier':
        return this.symbol === other.symbol;
      default:
        return this.operator === other.operator
          && this.operands.length === other.operands.length
          && this.operands.every((o, i) => o.equals(other.operands[i]));
    }
  }

  /** Copy with every referenced symbol passed through `fn`. */
  remap(fn: (s: ModelSymbol) => ModelSymbol): Expression {
    switch (this.kind) {
      case 'empty':
      case 'constant':
        return this;
      case 'identifier':
        return this.symbol
          ? Expression.identifier(fn(this.symbol), this.position)
          : this;
      default:
        return Expression.compound(this.operator, this.operands.map(o => o.remap(fn)), this.position);
    }
  }

  toString(): string {
    switch (this.kind) {
      case 'empty':
        return '';
      case 'constant':
        return typeof this.value === 'string' ? JSON.stringify(this.value) : String(this.value);
      case 'identifier':
        return this.symbol ? this.symbol.name : '';
      default: {
        const ops = this.operands.map(o => o.toString());
        if (ops.length === 2) return `${ops[0]} ${this.operator} ${ops[1]}`;
        if (ops.length === 1) return `${this.operator}${ops[0]}`;
        return `${this.operator}(${ops.join(', ')})`;
      }
    }
  }
}

/** Depth-first walk over an expression tree. */
export function walk(e: Expression, fn: (n: Expression) => void): void {
  fn(e);
  for (const o of e.operands) walk(o, fn);
}

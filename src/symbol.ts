/**
 * Symbols and frames: named identities and the ordered scopes holding them.
 *
 * A symbol carries a back-reference to the entity it names (its `data`).
 * Identity is object identity: two symbols with the same name in
 * different frames are different symbols.
 */

import { type Position, UNKNOWN_POSITION } from './position.js';
import type { Variable, FunctionDecl } from './declarations.js';
import type { State, Branchpoint } from './template.js';
import type { Instance } from './instance.js';
import type { Template } from './template.js';
import type { InstanceLine } from './lsc.js';

/** What a symbol's back-reference points at. */
export type SymbolData =
  | { kind: 'variable'; variable: Variable }
  | { kind: 'function'; fn: FunctionDecl }
  | { kind: 'state'; state: State }
  | { kind: 'branchpoint'; branchpoint: Branchpoint }
  | { kind: 'instance'; instance: Instance }
  | { kind: 'template'; template: Template }
  | { kind: 'instance-line'; line: InstanceLine }
  | { kind: 'process'; process: Instance }
  | { kind: 'typedef' }
  | { kind: 'parameter' }
  | { kind: 'none' };

export class ModelSymbol {
  data: SymbolData;

  constructor(
    readonly name: string,
    readonly type: string,
    readonly position: Position = UNKNOWN_POSITION,
    data: SymbolData = { kind: 'none' },
  ) {
    this.data = data;
  }

  /** A fresh symbol with the same name, type and position, and no data. */
  copy(): ModelSymbol {
    return new ModelSymbol(this.name, this.type, this.position);
  }

  toString(): string {
    return this.name;
  }
}

export function symbol(name: string, type = 'int', position: Position = UNKNOWN_POSITION): ModelSymbol {
  return new ModelSymbol(name, type, position);
}

/** Shorthand for a parameter symbol. */
export function param(name: string, type = 'int'): ModelSymbol {
  return new ModelSymbol(name, type, UNKNOWN_POSITION, { kind: 'parameter' });
}

export class Frame implements Iterable<ModelSymbol> {
  private symbols: ModelSymbol[] = [];

  constructor(readonly parent: Frame | null = null) {}

  static of(...symbols: ModelSymbol[]): Frame {
    const f = new Frame();
    for (const s of symbols) f.add(s);
    return f;
  }

  get size(): number {
    return this.symbols.length;
  }

  /** Symbol at 0-indexed position. Throws on out-of-range access. */
  at(index: number): ModelSymbol {
    const s = this.symbols[index];
    if (!s) throw new RangeError(`No symbol at index ${index}`);
    return s;
  }

  /** Index of the named symbol in this frame only, or -1. */
  indexOf(name: string): number {
    return this.symbols.findIndex(s => s.name === name);
  }

  has(s: ModelSymbol): boolean {
    return this.symbols.includes(s);
  }

  /** Append an existing symbol. No duplicate check. */
  add(s: ModelSymbol): void {
    this.symbols.push(s);
  }

  /** Append every symbol of another frame. */
  addAll(other: Iterable<ModelSymbol>): void {
    for (const s of other) this.symbols.push(s);
  }

  /**
   * Create and append a symbol. Returns null without inserting when the
   * name is already taken in this frame.
   */
  addSymbol(name: string, type: string, position: Position, data: SymbolData): ModelSymbol | null {
    if (this.indexOf(name) !== -1) return null;
    const s = new ModelSymbol(name, type, position, data);
    this.symbols.push(s);
    return s;
  }

  /** Look a name up here, then in enclosing frames. */
  resolve(name: string): ModelSymbol | undefined {
    let f: Frame | null = this;
    while (f) {
      const idx = f.indexOf(name);
      if (idx !== -1) return f.symbols[idx];
      f = f.parent;
    }
    return undefined;
  }

  /** New parentless frame holding this frame's symbols followed by `other`'s. */
  concat(other: Iterable<ModelSymbol>): Frame {
    const f = Frame.of(...this.symbols);
    f.addAll(other);
    return f;
  }

  /** Parentless frame over the symbols in [start, end). */
  slice(start: number, end: number = this.symbols.length): Frame {
    return Frame.of(...this.symbols.slice(start, end));
  }

  toArray(): ModelSymbol[] {
    return [...this.symbols];
  }

  [Symbol.iterator](): Iterator<ModelSymbol> {
    return this.symbols[Symbol.iterator]();
  }
}

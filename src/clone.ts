/**
 * Symbol remapping for deep copies.
 *
 * Copying a document mints a fresh symbol for every symbol the copy
 * reaches, so back-references can point into the copy while the original
 * keeps its own. The context memoises: the same source symbol always maps
 * to the same copy, which keeps expressions and frames consistent.
 */

import { type ModelSymbol, Frame } from './symbol.js';
import { type Expression } from './expression.js';
import type { Template } from './template.js';

export class CloneContext {
  private symbols = new Map<ModelSymbol, ModelSymbol>();

  /** Template copies, keyed by their originals. */
  readonly templates = new Map<Template, Template>();

  /** Copy of `s`. Its data still names the source entity until the owner rebinds it. */
  symbol(s: ModelSymbol): ModelSymbol {
    let c = this.symbols.get(s);
    if (!c) {
      c = s.copy();
      c.data = s.data;
      this.symbols.set(s, c);
    }
    return c;
  }

  expression(e: Expression): Expression {
    return e.remap(s => this.symbol(s));
  }

  frame(f: Frame, parent: Frame | null = null): Frame {
    const copy = new Frame(parent);
    for (const s of f) copy.add(this.symbol(s));
    return copy;
  }

  symbolSet(set: ReadonlySet<ModelSymbol>): Set<ModelSymbol> {
    return new Set([...set].map(s => this.symbol(s)));
  }
}

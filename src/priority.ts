/**
 * Channel priority declarations.
 *
 *   chan priority a, b < c;
 *
 * Channels separated by ',' share a level; '<' starts a higher one. The
 * default priority also applies to edges without synchronisation.
 * Whether the expressions denote channels is checked elsewhere.
 */

import { type Expression } from './expression.js';

export type PrioritySeparator = ',' | '<';

export class ChanPriority {
  readonly tail: Array<[PrioritySeparator, Expression]> = [];

  constructor(readonly head: Expression) {}

  add(separator: PrioritySeparator, chan: Expression): void {
    this.tail.push([separator, chan]);
  }

  toString(): string {
    let s = `chan priority ${this.head.toString()}`;
    for (const [sep, chan] of this.tail) {
      s += sep === ',' ? ', ' : ` ${sep} `;
      s += chan.toString();
    }
    return `${s};`;
  }
}

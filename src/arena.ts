/**
 * Append-only arenas with checked handles.
 *
 * Entities that other entities point back at (locations, branchpoints,
 * instance lines) live in an arena and are referred to by a handle: the
 * arena's id plus an index. Appending never moves an entry, and a handle
 * from another arena, say one belonging to a copied document, fails at
 * dereference instead of silently reaching the wrong entity.
 */

let nextArenaId = 1;

export interface Handle<T> {
  readonly arena: number;
  readonly index: number;
  /** Phantom field tying the handle to its element type. Never set. */
  readonly element?: T;
}

export class Arena<T> implements Iterable<T> {
  readonly id = nextArenaId++;
  private items: T[] = [];

  constructor(readonly label: string) {}

  get size(): number {
    return this.items.length;
  }

  /** Append and return the handle of the new entry. */
  push(item: T): Handle<T> {
    this.items.push(item);
    return { arena: this.id, index: this.items.length - 1 };
  }

  /** Handle for the entry at `index`. */
  handle(index: number): Handle<T> {
    if (index < 0 || index >= this.items.length) {
      throw new RangeError(`No ${this.label} at index ${index}`);
    }
    return { arena: this.id, index };
  }

  owns(h: Handle<T>): boolean {
    return h.arena === this.id && h.index >= 0 && h.index < this.items.length;
  }

  get(h: Handle<T>): T {
    if (h.arena !== this.id) {
      throw new RangeError(`Handle into arena ${h.arena} used on ${this.label} arena ${this.id}`);
    }
    const item = this.items[h.index];
    if (item === undefined) throw new RangeError(`No ${this.label} at index ${h.index}`);
    return item;
  }

  /** Entry at a plain index, or undefined. */
  at(index: number): T | undefined {
    return this.items[index];
  }

  indexOf(item: T): number {
    return this.items.indexOf(item);
  }

  /** The same index in this arena, for a handle taken on the arena this one was copied from. */
  rebase(h: Handle<T>): Handle<T> {
    return this.handle(h.index);
  }

  toArray(): readonly T[] {
    return this.items;
  }

  [Symbol.iterator](): Iterator<T> {
    return this.items[Symbol.iterator]();
  }
}

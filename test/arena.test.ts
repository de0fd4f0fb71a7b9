import { describe, it, expect } from 'vitest';
import { Arena } from '../src/arena.js';

describe('Arena', () => {
  it('hands out handles that stay valid across appends', () => {
    const a = new Arena<string>('location');
    const h0 = a.push('idle');
    for (let i = 0; i < 100; i++) a.push(`l${i}`);
    expect(a.get(h0)).toBe('idle');
    expect(a.size).toBe(101);
  });

  it('rejects handles from another arena', () => {
    const a = new Arena<string>('location');
    const b = new Arena<string>('location');
    const h = a.push('x');
    b.push('y');
    expect(b.owns(h)).toBe(false);
    expect(() => b.get(h)).toThrow(RangeError);
  });

  it('rejects out-of-range indices', () => {
    const a = new Arena<number>('branchpoint');
    a.push(1);
    expect(() => a.handle(1)).toThrow('No branchpoint at index 1');
    expect(() => a.get({ arena: a.id, index: 3 })).toThrow(RangeError);
    expect(a.at(3)).toBeUndefined();
  });

  it('rebases a handle onto a copied arena', () => {
    const a = new Arena<string>('instance line');
    a.push('A');
    const h = a.push('B');
    const copy = new Arena<string>('instance line');
    for (const s of a) copy.push(`${s}'`);
    const moved = copy.rebase(h);
    expect(moved.arena).toBe(copy.id);
    expect(copy.get(moved)).toBe("B'");
  });
});

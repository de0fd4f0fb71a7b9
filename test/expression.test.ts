import { describe, it, expect } from 'vitest';
import { Expression, walk } from '../src/expression.js';
import { symbol, Frame } from '../src/symbol.js';
import { pos } from '../src/position.js';

describe('Expression', () => {
  const x = symbol('x');
  const y = symbol('y');

  it('prints constants, identifiers and operators', () => {
    expect(Expression.empty().toString()).toBe('');
    expect(Expression.constant(5).toString()).toBe('5');
    expect(Expression.constant(true).toString()).toBe('true');
    expect(Expression.constant('hi').toString()).toBe('"hi"');
    expect(Expression.identifier(x).toString()).toBe('x');
    const sum = Expression.compound('+', [Expression.identifier(x), Expression.constant(1)]);
    expect(sum.toString()).toBe('x + 1');
    expect(Expression.compound('!', [Expression.identifier(y)]).toString()).toBe('!y');
    expect(Expression.compound('max', [sum, Expression.identifier(y), Expression.constant(0)]).toString())
      .toBe('max(x + 1, y, 0)');
  });

  it('shares one empty expression', () => {
    expect(Expression.empty()).toBe(Expression.empty());
    expect(Expression.empty().isEmpty()).toBe(true);
    expect(Expression.constant(0).isEmpty()).toBe(false);
  });

  it('collects distinct symbols depth-first', () => {
    const e = Expression.compound('*', [
      Expression.compound('+', [Expression.identifier(y), Expression.identifier(x)]),
      Expression.identifier(y),
    ]);
    expect(e.symbols()).toEqual([y, x]);
    expect(e.references(x)).toBe(true);
    expect(e.references(symbol('x'))).toBe(false);
  });

  it('compares structure and ignores positions', () => {
    const a = Expression.compound('<', [Expression.identifier(x, pos(1)), Expression.constant(3, pos(2))], pos(1, 3));
    const b = Expression.compound('<', [Expression.identifier(x), Expression.constant(3)]);
    const c = Expression.compound('<', [Expression.identifier(symbol('x')), Expression.constant(3)]);
    expect(a.equals(b)).toBe(true);
    expect(a.equals(c)).toBe(false);
    expect(Expression.constant(1).equals(Expression.constant(true))).toBe(false);
  });

  it('remaps symbols without touching the original', () => {
    const x2 = symbol('x');
    const e = Expression.compound('+', [Expression.identifier(x), Expression.identifier(y)]);
    const r = e.remap(s => (s === x ? x2 : s));
    expect(r.symbols()).toEqual([x2, y]);
    expect(e.symbols()).toEqual([x, y]);
    expect(r.toString()).toBe('x + y');
  });

  it('walks every node', () => {
    const e = Expression.compound('+', [Expression.constant(1), Expression.compound('-', [Expression.constant(2)])]);
    const kinds: string[] = [];
    walk(e, n => kinds.push(n.kind));
    expect(kinds).toEqual(['compound', 'constant', 'compound', 'constant']);
  });
});

describe('Frame', () => {
  it('resolves through parent frames', () => {
    const outer = new Frame();
    const g = outer.addSymbol('g', 'int', pos(0), { kind: 'none' });
    const inner = new Frame(outer);
    inner.addSymbol('l', 'int', pos(0), { kind: 'none' });
    expect(inner.resolve('g')).toBe(g);
    expect(inner.indexOf('g')).toBe(-1);
    expect(inner.resolve('nope')).toBeUndefined();
  });

  it('refuses a duplicate name in the same frame', () => {
    const f = new Frame();
    expect(f.addSymbol('a', 'int', pos(0), { kind: 'none' })).not.toBeNull();
    expect(f.addSymbol('a', 'clock', pos(0), { kind: 'none' })).toBeNull();
    expect(f.size).toBe(1);
  });

  it('throws on out-of-range indexed access', () => {
    const f = Frame.of(symbol('a'));
    expect(f.at(0).name).toBe('a');
    expect(() => f.at(1)).toThrow(RangeError);
  });

  it('slices and concatenates', () => {
    const [a, b, c] = [symbol('a'), symbol('b'), symbol('c')];
    const f = Frame.of(a, b, c);
    expect(f.slice(1).toArray()).toEqual([b, c]);
    expect(f.slice(0, 1).concat([c]).toArray()).toEqual([a, c]);
  });
});

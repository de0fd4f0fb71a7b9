import { describe, it, expect, beforeEach } from 'vitest';
import { Document } from '../src/document.js';
import { Expression } from '../src/expression.js';
import { symbol } from '../src/symbol.js';
import { pos } from '../src/position.js';
import { type Template, type Endpoint } from '../src/template.js';
import { type Result } from '../src/errors.js';

function unwrap<T>(r: Result<T>): T {
  if (!r.ok) throw r.error;
  return r.value;
}

describe('Automaton body', () => {
  let doc: Document;
  let T: Template;

  beforeEach(() => {
    doc = new Document();
    T = unwrap(doc.addTemplate('T', [], pos(0)));
  });

  it('numbers locations in insertion order', () => {
    const idle = unwrap(T.addLocation('idle', Expression.empty(), Expression.empty(), pos(1)));
    const busy = unwrap(T.addLocation('busy', Expression.empty(), Expression.constant(2), pos(2)));
    expect([idle.nr, busy.nr]).toEqual([0, 1]);
    expect(idle.name.toString()).toBe('idle');
    expect(busy.exponentialRate.toString()).toBe('2');
    expect(idle.symbol.type).toBe('location');
    expect(T.frame.resolve('busy')).toBe(busy.symbol);
  });

  it('rejects a duplicate location name', () => {
    unwrap(T.addLocation('idle', Expression.empty(), Expression.empty(), pos(1)));
    const r = T.addLocation('idle', Expression.empty(), Expression.empty(), pos(9));
    expect(r.ok).toBe(false);
    expect(T.states.size).toBe(1);
    expect(doc.getErrors().map(e => e.message)).toEqual(['$Duplicate_definition_of idle']);
  });

  it('connects locations and branchpoints with edges', () => {
    const idle = unwrap(T.addLocation('idle', Expression.empty(), Expression.empty(), pos(1)));
    const bp = unwrap(T.addBranchpoint('b0', pos(2)));
    const e0 = unwrap(T.addEdge(idle.symbol, bp.symbol, true, 'go'));
    const e1 = unwrap(T.addEdge(bp.symbol, idle.symbol, false));

    expect([e0.nr, e1.nr]).toEqual([0, 1]);
    expect(e0.control).toBe(true);
    expect(e0.actname).toBe('go');
    expect(e0.src.kind).toBe('state');
    expect(e0.dst.kind).toBe('branchpoint');
    expect(T.endpointSymbol(e0.src)).toBe(idle.symbol);
    expect(T.endpointSymbol(e1.src)).toBe(bp.symbol);
    expect(e0.guard.isEmpty()).toBe(true);
    expect(e0.select.size).toBe(0);
  });

  it('resolves edge endpoints through their handles', () => {
    const a = unwrap(T.addLocation('a', Expression.empty(), Expression.empty(), pos(1)));
    const b = unwrap(T.addLocation('b', Expression.empty(), Expression.empty(), pos(2)));
    const e = unwrap(T.addEdge(a.symbol, b.symbol, true));
    for (let i = 0; i < 50; i++) unwrap(T.addLocation(`l${i}`, Expression.empty(), Expression.empty(), pos(3)));
    const dst: Endpoint = e.dst;
    expect(dst.kind === 'state' && T.getState(dst.state)).toBe(b);
  });

  it('only accepts locations of the same template as endpoints', () => {
    const U = unwrap(doc.addTemplate('U', [], pos(0)));
    const mine = unwrap(T.addLocation('idle', Expression.empty(), Expression.empty(), pos(1)));
    const theirs = unwrap(U.addLocation('other', Expression.empty(), Expression.empty(), pos(5, 10)));
    const r = T.addEdge(mine.symbol, theirs.symbol, true);
    expect(r.ok).toBe(false);
    if (!r.ok) expect(r.error.message).toBe('other $is_not_a_location');
    expect(doc.getErrors()[0].position).toEqual({ start: 5, end: 10 });
    expect(T.edges).toHaveLength(0);

    const plain = symbol('x');
    expect(T.addEdge(plain, mine.symbol, true).ok).toBe(false);
  });

  it('sets the initial location', () => {
    const idle = unwrap(T.addLocation('idle', Expression.empty(), Expression.empty(), pos(1)));
    const bp = unwrap(T.addBranchpoint('b', pos(2)));
    expect(unwrap(T.setInitial(idle.symbol))).toBe(idle);
    expect(T.init).toBe(idle.symbol);
    expect(T.setInitial(bp.symbol).ok).toBe(false);
    expect(T.init).toBe(idle.symbol);
  });

  it('keeps dynamic evaluation expressions by index', () => {
    expect(T.addDynamicEval(Expression.constant(1))).toBe(0);
    expect(T.addDynamicEval(Expression.constant(2))).toBe(1);
    expect(T.dynamicEvals.map(e => e.toString())).toEqual(['1', '2']);
  });

  it('takes kind and mode from construction', () => {
    const S = unwrap(doc.addTemplate('S', [], pos(0), false, 'LSC', 'invariant'));
    expect(T.isTA).toBe(true);
    expect(T.isInvariant()).toBe(false);
    expect(S.isTA).toBe(false);
    expect(S.type).toBe('LSC');
    expect(S.isInvariant()).toBe(true);
    expect(S.symbol.type).toBe('lsc-instance');
  });

  it('sees globals from its local scope', () => {
    const g = unwrap(doc.addVariable(doc.getGlobals(), 'int', 'g', Expression.empty(), pos(0)));
    expect(T.frame.resolve('g')).toBe(g.symbol);
    expect(T.declarations.findVariable('g')).toBeUndefined();
  });
});

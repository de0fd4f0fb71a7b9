import { describe, it, expect } from 'vitest';
import { Document } from '../src/document.js';
import { Expression } from '../src/expression.js';
import { Frame } from '../src/symbol.js';
import { pos } from '../src/position.js';
import { type SystemVisitor } from '../src/visitor.js';
import { type Result } from '../src/errors.js';

function unwrap<T>(r: Result<T>): T {
  if (!r.ok) throw r.error;
  return r.value;
}

function buildModel(): Document {
  const doc = new Document();
  const g = doc.getGlobals();
  unwrap(doc.addTypeDef(g, 'id_t', 'int[0,1]', pos(0)));
  unwrap(doc.addVariable(g, 'int', 'x', Expression.empty(), pos(0)));
  unwrap(doc.addFunction(g, 'void', 'f', pos(0)));
  doc.addProgressMeasure(g, Expression.empty(), Expression.empty());
  doc.addGantt(g, { name: 'chart', parameters: new Frame(), mapping: [] });
  doc.addIODecl().instanceName = 'io';

  const T = unwrap(doc.addTemplate('T', [], pos(0)));
  unwrap(doc.addVariable(T.declarations, 'clock', 'c', Expression.empty(), pos(0)));
  const a = unwrap(T.addLocation('a', Expression.empty(), Expression.empty(), pos(0)));
  const b = unwrap(T.addLocation('b', Expression.empty(), Expression.empty(), pos(0)));
  unwrap(T.addEdge(a.symbol, b.symbol, true));

  const S = unwrap(doc.addTemplate('S', [], pos(0), false));
  const L1 = unwrap(S.addInstanceLine('L1', pos(0)));
  const L2 = unwrap(S.addInstanceLine('L2', pos(0)));
  unwrap(S.addMessage(L1.symbol, L2.symbol, 0, true));
  unwrap(S.addCondition([L2.symbol], 1, false));
  unwrap(S.addUpdate(L1.symbol, 2, false));

  const I = unwrap(doc.addInstance('I', T.instance, [], [], pos(0)));
  unwrap(doc.addLscInstance('J', T.instance, [], [], pos(0)));
  unwrap(doc.addProcess(I, pos(0)));
  return doc;
}

function recorder(log: string[], enter: (name: string) => boolean = () => true): SystemVisitor {
  return {
    visitSystemBefore: () => { log.push('system'); },
    visitSystemAfter: () => { log.push('/system'); },
    visitTypeDef: s => { log.push(`typedef ${s.name}`); },
    visitVariable: v => { log.push(`var ${v.symbol.name}`); },
    visitFunction: f => { log.push(`fn ${f.symbol.name}`); },
    visitProgressMeasure: () => { log.push('progress'); },
    visitGanttChart: gc => { log.push(`gantt ${gc.name}`); },
    visitIODecl: io => { log.push(`io ${io.instanceName}`); },
    visitTemplateBefore: t => {
      log.push(`template ${t.name}`);
      return enter(t.name);
    },
    visitTemplateAfter: t => { log.push(`/template ${t.name}`); },
    visitState: s => { log.push(`state ${s.symbol.name}`); },
    visitEdge: e => { log.push(`edge ${e.nr}`); },
    visitInstanceLine: l => { log.push(`line ${l.name}`); },
    visitMessage: m => { log.push(`message ${m.nr}`); },
    visitCondition: c => { log.push(`condition ${c.nr}`); },
    visitUpdate: u => { log.push(`update ${u.nr}`); },
    visitInstance: i => { log.push(`instance ${i.name}`); },
    visitProcess: p => { log.push(`process ${p.name}`); },
  };
}

describe('Document traversal', () => {
  it('visits every part in a fixed order', () => {
    const log: string[] = [];
    buildModel().accept(recorder(log));
    expect(log).toEqual([
      'system',
      'typedef id_t', 'var x', 'fn f',
      'progress', 'gantt chart', 'io io',
      'template T', 'var c', 'state a', 'state b', 'edge 0', '/template T',
      'template S', 'line L1', 'line L2', 'message 0', 'condition 0', 'update 0', '/template S',
      'instance I', 'instance J',
      'process I',
      '/system',
    ]);
  });

  it('skips a template whose before hook returns false', () => {
    const log: string[] = [];
    buildModel().accept(recorder(log, name => name !== 'T'));
    expect(log.slice(log.indexOf('template T'), log.indexOf('template S'))).toEqual(['template T']);
    expect(log).toContain('/template S');
  });

  it('needs no hooks at all', () => {
    expect(() => buildModel().accept({})).not.toThrow();
  });

  it('visits dynamic templates after static ones', () => {
    const doc = new Document();
    unwrap(doc.addDynamicTemplate('D', [], pos(0)));
    unwrap(doc.addTemplate('T', [], pos(0)));
    const names: string[] = [];
    doc.accept({ visitTemplateBefore: t => { names.push(t.name); return true; } });
    expect(names).toEqual(['T', 'D']);
  });
});

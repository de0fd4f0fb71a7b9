/**
 * Declaration blocks: variables, functions, type definitions, progress
 * measures, I/O declarations and gantt chart entries.
 *
 * The document owns the global block; each template owns a local one
 * whose frame encloses the template parameters and has the global frame
 * as parent.
 */

import { type ModelSymbol, Frame } from './symbol.js';
import { type Expression } from './expression.js';
import { type Position } from './position.js';
import { type Result, ok, fail, duplicateDefinitionError } from './errors.js';
import { type CloneContext } from './clone.js';

/** A variable, clock, channel or constant. `symbol.data` points back here. */
export interface Variable {
  symbol: ModelSymbol;
  init: Expression;
}

export interface FunctionDecl {
  symbol: ModelSymbol;
  /** Variables the function writes. Filled in by analysis, not construction. */
  changes: Set<ModelSymbol>;
  /** Variables the function reads. Filled in by analysis, not construction. */
  depends: Set<ModelSymbol>;
  variables: Variable[];
  body: Expression | null;
}

export interface Progress {
  guard: Expression;
  measure: Expression;
}

export interface IODecl {
  instanceName: string;
  params: Expression[];
  inputs: Expression[];
  outputs: Expression[];
  csp: Expression[];
}

/** Boolean predicate mapped to an integer row, expandable over `parameters`. */
export interface GanttMap {
  parameters: Frame;
  predicate: Expression;
  mapping: Expression;
}

export interface Gantt {
  name: string;
  parameters: Frame;
  mapping: GanttMap[];
}

export function variableToString(v: Variable): string {
  const init = v.init.isEmpty() ? '' : ` = ${v.init.toString()}`;
  return `${v.symbol.type} ${v.symbol.name}${init};`;
}

/**
 * Declare a variable in `frame` and append it to `list`. Fails without
 * inserting when the name is already taken in that frame.
 */
export function addVariableTo(
  list: Variable[], frame: Frame, type: string, name: string, init: Expression, position: Position,
): Result<Variable> {
  const s = frame.addSymbol(name, type, position, { kind: 'none' });
  if (!s) return fail(duplicateDefinitionError(name));
  const variable: Variable = { symbol: s, init };
  s.data = { kind: 'variable', variable };
  list.push(variable);
  return ok(variable);
}

export class Declarations {
  readonly frame: Frame;
  readonly variables: Variable[] = [];
  readonly functions: FunctionDecl[] = [];
  readonly progress: Progress[] = [];
  readonly iodecls: IODecl[] = [];
  readonly ganttChart: Gantt[] = [];

  constructor(parent: Frame | null = null) {
    this.frame = new Frame(parent);
  }

  addVariable(type: string, name: string, init: Expression, position: Position): Result<Variable> {
    return addVariableTo(this.variables, this.frame, type, name, init, position);
  }

  /** Declare a function with no body yet. */
  addFunction(type: string, name: string, position: Position): Result<FunctionDecl> {
    const s = this.frame.addSymbol(name, type, position, { kind: 'none' });
    if (!s) return fail(duplicateDefinitionError(name));
    const fn: FunctionDecl = {
      symbol: s,
      changes: new Set(),
      depends: new Set(),
      variables: [],
      body: null,
    };
    s.data = { kind: 'function', fn };
    this.functions.push(fn);
    return ok(fn);
  }

  addTypeDef(name: string, type: string, position: Position): Result<ModelSymbol> {
    const s = this.frame.addSymbol(name, type, position, { kind: 'typedef' });
    return s ? ok(s) : fail(duplicateDefinitionError(name));
  }

  addProgressMeasure(guard: Expression, measure: Expression): Progress {
    const p: Progress = { guard, measure };
    this.progress.push(p);
    return p;
  }

  addGantt(gantt: Gantt): Gantt {
    this.ganttChart.push(gantt);
    return gantt;
  }

  addIODecl(): IODecl {
    const io: IODecl = { instanceName: '', params: [], inputs: [], outputs: [], csp: [] };
    this.iodecls.push(io);
    return io;
  }

  findVariable(name: string): Variable | undefined {
    return this.variables.find(v => v.symbol.name === name);
  }

  findFunction(name: string): FunctionDecl | undefined {
    return this.functions.find(f => f.symbol.name === name);
  }

  /**
   * Deep copy into `target`. Symbols come from `ctx`, so references
   * between blocks copied with the same context stay consistent; those
   * already in the target frame (template parameters) are not added twice.
   */
  copyInto(target: Declarations, ctx: CloneContext): void {
    for (const s of this.frame) {
      const c = ctx.symbol(s);
      if (!target.frame.has(c)) target.frame.add(c);
    }
    for (const v of this.variables) target.variables.push(cloneVariable(v, ctx));
    for (const f of this.functions) target.functions.push(cloneFunction(f, ctx));
    for (const p of this.progress) {
      target.progress.push({ guard: ctx.expression(p.guard), measure: ctx.expression(p.measure) });
    }
    for (const io of this.iodecls) {
      target.iodecls.push({
        instanceName: io.instanceName,
        params: io.params.map(e => ctx.expression(e)),
        inputs: io.inputs.map(e => ctx.expression(e)),
        outputs: io.outputs.map(e => ctx.expression(e)),
        csp: io.csp.map(e => ctx.expression(e)),
      });
    }
    for (const g of this.ganttChart) {
      target.ganttChart.push({
        name: g.name,
        parameters: ctx.frame(g.parameters),
        mapping: g.mapping.map(m => ({
          parameters: ctx.frame(m.parameters),
          predicate: ctx.expression(m.predicate),
          mapping: ctx.expression(m.mapping),
        })),
      });
    }
  }
}

export function cloneVariable(v: Variable, ctx: CloneContext): Variable {
  const variable: Variable = { symbol: ctx.symbol(v.symbol), init: ctx.expression(v.init) };
  variable.symbol.data = { kind: 'variable', variable };
  return variable;
}

export function cloneFunction(f: FunctionDecl, ctx: CloneContext): FunctionDecl {
  const fn: FunctionDecl = {
    symbol: ctx.symbol(f.symbol),
    changes: ctx.symbolSet(f.changes),
    depends: ctx.symbolSet(f.depends),
    variables: f.variables.map(v => cloneVariable(v, ctx)),
    body: f.body ? ctx.expression(f.body) : null,
  };
  fn.symbol.data = { kind: 'function', fn };
  return fn;
}

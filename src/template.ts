/**
 * Templates: parameterised automata and scenario charts.
 *
 * A template is its own trivial instance (no bound parameters) plus a
 * local declaration block and a body: locations, branchpoints and edges
 * for a timed automaton, instance lines and events for an LSC. Entities
 * referred to from elsewhere in the body live in arenas and are referenced
 * by handle.
 */

import { Arena, type Handle } from './arena.js';
import { type ModelSymbol, Frame } from './symbol.js';
import { Expression } from './expression.js';
import { type Position } from './position.js';
import { Declarations } from './declarations.js';
import { Instance } from './instance.js';
import {
  type Condition, type Message, type Update, type Simregion, type EventPrecedence,
  InstanceLine, DEFAULT_EVENT_PRECEDENCE, deriveSimregions, findCondition, findUpdateOnAny,
} from './lsc.js';
import { type Diagnostics } from './diagnostics.js';
import { type CloneContext } from './clone.js';
import {
  type Result, type TypeException, ok, fail,
  duplicateDefinitionError, notALocationError, notAnInstanceLineError,
} from './errors.js';

export interface State {
  symbol: ModelSymbol;
  name: Expression;
  invariant: Expression;
  exponentialRate: Expression;
  costRate: Expression;
  /** Location number within the template. */
  nr: number;
}

/** Zero-duration routing node; only present before compilation. */
export interface Branchpoint {
  symbol: ModelSymbol;
  nr: number;
}

export type Endpoint =
  | { kind: 'state'; state: Handle<State> }
  | { kind: 'branchpoint'; branchpoint: Handle<Branchpoint> };

export interface Edge {
  /** Placement in the input. */
  nr: number;
  control: boolean;
  actname: string;
  src: Endpoint;
  dst: Endpoint;
  select: Frame;
  guard: Expression;
  assign: Expression;
  sync: Expression;
  prob: Expression;
  selectValues: number[];
}

export interface TemplateOptions {
  isTA?: boolean;
  type?: string;
  mode?: string;
}

export class Template {
  readonly instance: Instance;
  readonly declarations: Declarations;

  /** Initial location. */
  init: ModelSymbol | null = null;
  templateSet = new Frame();
  readonly states = new Arena<State>('location');
  readonly branchpoints = new Arena<Branchpoint>('branchpoint');
  readonly edges: Edge[] = [];
  readonly dynamicEvals: Expression[] = [];

  readonly instanceLines = new Arena<InstanceLine>('instance line');
  readonly messages: Message[] = [];
  readonly conditions: Condition[] = [];
  readonly updates: Update[] = [];

  isTA: boolean;
  type: string;
  mode: string;
  hasPrechart = false;
  dynamic = false;
  dynindex = -1;
  isDefined = true;

  constructor(
    symbol: ModelSymbol,
    params: Iterable<ModelSymbol>,
    globals: Frame | null,
    readonly diagnostics: Diagnostics,
    options: TemplateOptions = {},
  ) {
    const parameters = Frame.of(...params);
    this.instance = new Instance(symbol, this, parameters);
    this.declarations = new Declarations(globals);
    this.declarations.frame.addAll(parameters);
    this.isTA = options.isTA ?? true;
    this.type = options.type ?? '';
    this.mode = options.mode ?? '';
    symbol.data = { kind: 'template', template: this };
  }

  get symbol(): ModelSymbol {
    return this.instance.symbol;
  }

  get name(): string {
    return this.instance.symbol.name;
  }

  get parameters(): Frame {
    return this.instance.parameters;
  }

  get frame(): Frame {
    return this.declarations.frame;
  }

  /** Whether the chart is an invariant scenario rather than an existential one. */
  isInvariant(): boolean {
    return this.mode === 'invariant';
  }

  addDynamicEval(e: Expression): number {
    this.dynamicEvals.push(e);
    return this.dynamicEvals.length - 1;
  }

  // --- Automaton body ---

  addLocation(name: string, invariant: Expression, exponentialRate: Expression, position: Position): Result<State> {
    const s = this.frame.addSymbol(name, 'location', position, { kind: 'none' });
    if (!s) return this.reject(position, duplicateDefinitionError(name));
    const state: State = {
      symbol: s,
      name: Expression.identifier(s, position),
      invariant,
      exponentialRate,
      costRate: Expression.empty(),
      nr: this.states.size,
    };
    s.data = { kind: 'state', state };
    this.states.push(state);
    return ok(state);
  }

  addBranchpoint(name: string, position: Position): Result<Branchpoint> {
    const s = this.frame.addSymbol(name, 'branchpoint', position, { kind: 'none' });
    if (!s) return this.reject(position, duplicateDefinitionError(name));
    const branchpoint: Branchpoint = { symbol: s, nr: this.branchpoints.size };
    s.data = { kind: 'branchpoint', branchpoint };
    this.branchpoints.push(branchpoint);
    return ok(branchpoint);
  }

  /** Mark a location of this template as the initial one. */
  setInitial(s: ModelSymbol): Result<State> {
    const ep = this.endpoint(s);
    if (!ep || ep.kind !== 'state') return this.reject(s.position, notALocationError(s.name));
    this.init = s;
    return ok(this.states.get(ep.state));
  }

  /**
   * Add an edge between two locations or branchpoints of this template.
   * Guard, assignment, synchronisation and probability start empty and
   * are set by the caller.
   */
  addEdge(src: ModelSymbol, dst: ModelSymbol, control: boolean, actname = ''): Result<Edge> {
    const from = this.endpoint(src);
    if (!from) return this.reject(src.position, notALocationError(src.name));
    const to = this.endpoint(dst);
    if (!to) return this.reject(dst.position, notALocationError(dst.name));
    const edge: Edge = {
      nr: this.edges.length,
      control,
      actname,
      src: from,
      dst: to,
      select: new Frame(),
      guard: Expression.empty(),
      assign: Expression.empty(),
      sync: Expression.empty(),
      prob: Expression.empty(),
      selectValues: [],
    };
    this.edges.push(edge);
    return ok(edge);
  }

  getState(h: Handle<State>): State {
    return this.states.get(h);
  }

  getBranchpoint(h: Handle<Branchpoint>): Branchpoint {
    return this.branchpoints.get(h);
  }

  /** Symbol of the location or branchpoint an endpoint refers to. */
  endpointSymbol(ep: Endpoint): ModelSymbol {
    return ep.kind === 'state' ? this.states.get(ep.state).symbol : this.branchpoints.get(ep.branchpoint).symbol;
  }

  private endpoint(s: ModelSymbol): Endpoint | undefined {
    const d = s.data;
    if (d.kind === 'state') {
      const idx = this.states.indexOf(d.state);
      return idx < 0 ? undefined : { kind: 'state', state: this.states.handle(idx) };
    }
    if (d.kind === 'branchpoint') {
      const idx = this.branchpoints.indexOf(d.branchpoint);
      return idx < 0 ? undefined : { kind: 'branchpoint', branchpoint: this.branchpoints.handle(idx) };
    }
    return undefined;
  }

  // --- Scenario body ---

  addInstanceLine(name: string, position: Position): Result<InstanceLine> {
    const s = this.frame.addSymbol(name, 'instance-line', position, { kind: 'none' });
    if (!s) return this.reject(position, duplicateDefinitionError(name));
    const line = new InstanceLine(this.instanceLines.size, s, this);
    s.data = { kind: 'instance-line', line };
    this.instanceLines.push(line);
    return ok(line);
  }

  getInstanceLine(h: Handle<InstanceLine>): InstanceLine {
    return this.instanceLines.get(h);
  }

  addMessage(
    src: ModelSymbol, dst: ModelSymbol, location: number, prechart: boolean, label: Expression = Expression.empty(),
  ): Result<Message> {
    const from = this.lineHandle(src);
    if (!from.ok) return fail(from.error);
    const to = this.lineHandle(dst);
    if (!to.ok) return fail(to.error);
    const message: Message = {
      nr: this.messages.length, location, src: from.value, dst: to.value, label, isInPrechart: prechart,
    };
    this.messages.push(message);
    if (prechart) this.hasPrechart = true;
    return ok(message);
  }

  addCondition(
    anchors: readonly ModelSymbol[], location: number, prechart: boolean, isHot = false,
    label: Expression = Expression.empty(),
  ): Result<Condition> {
    const handles: Handle<InstanceLine>[] = [];
    for (const a of anchors) {
      const h = this.lineHandle(a);
      if (!h.ok) return fail(h.error);
      handles.push(h.value);
    }
    const condition: Condition = {
      nr: this.conditions.length, location, anchors: handles, label, isInPrechart: prechart, isHot,
    };
    this.conditions.push(condition);
    if (prechart) this.hasPrechart = true;
    return ok(condition);
  }

  addUpdate(
    anchor: ModelSymbol, location: number, prechart: boolean, label: Expression = Expression.empty(),
  ): Result<Update> {
    const h = this.lineHandle(anchor);
    if (!h.ok) return fail(h.error);
    const update: Update = { nr: this.updates.length, location, anchor: h.value, label, isInPrechart: prechart };
    this.updates.push(update);
    if (prechart) this.hasPrechart = true;
    return ok(update);
  }

  private lineHandle(s: ModelSymbol): Result<Handle<InstanceLine>> {
    const d = s.data;
    if (d.kind === 'instance-line') {
      const idx = this.instanceLines.indexOf(d.line);
      if (idx >= 0) return ok(this.instanceLines.handle(idx));
    }
    return this.reject(s.position, notAnInstanceLineError(s.name));
  }

  /** All simregions of the chart, ordered by location. */
  getSimregions(precedence: EventPrecedence = DEFAULT_EVENT_PRECEDENCE): Simregion[] {
    return deriveSimregions(this, precedence);
  }

  /** The condition anchored at `line` on row `y`. */
  getCondition(line: InstanceLine, y: number): Condition | undefined {
    return findCondition(this.conditions, line.nr, y);
  }

  /** The update on row `y` of `lines`; with several lines, the first one that has one wins. */
  getUpdate(lines: InstanceLine | readonly InstanceLine[], y: number): Update | undefined {
    const list = lines instanceof InstanceLine ? [lines] : lines;
    return findUpdateOnAny(this.updates, list.map(l => l.nr), y);
  }

  // --- Restrictions ---

  /**
   * Mark `s` restricted, along with every variable its initialiser
   * depends on, transitively.
   */
  restrict(s: ModelSymbol): void {
    const pending = [s];
    const restricted = this.instance.restricted;
    for (let cur = pending.pop(); cur; cur = pending.pop()) {
      if (restricted.has(cur)) continue;
      restricted.add(cur);
      if (cur.data.kind === 'variable') pending.push(...cur.data.variable.init.symbols());
    }
  }

  /**
   * Deep copy through `ctx` whose local frame encloses `globals`. Instance
   * lines keep pointing at the templates they instantiate until the
   * caller relinks them.
   */
  clone(ctx: CloneContext, globals: Frame | null, diagnostics: Diagnostics): Template {
    const t = new Template(ctx.symbol(this.symbol), ctx.frame(this.parameters), globals, diagnostics, {
      isTA: this.isTA, type: this.type, mode: this.mode,
    });
    ctx.templates.set(this, t);
    t.instance.restricted = ctx.symbolSet(this.instance.restricted);
    this.declarations.copyInto(t.declarations, ctx);

    t.init = this.init ? ctx.symbol(this.init) : null;
    t.templateSet = ctx.frame(this.templateSet);
    for (const s of this.states) {
      const state: State = {
        symbol: ctx.symbol(s.symbol),
        name: ctx.expression(s.name),
        invariant: ctx.expression(s.invariant),
        exponentialRate: ctx.expression(s.exponentialRate),
        costRate: ctx.expression(s.costRate),
        nr: s.nr,
      };
      state.symbol.data = { kind: 'state', state };
      t.states.push(state);
    }
    for (const b of this.branchpoints) {
      const branchpoint: Branchpoint = { symbol: ctx.symbol(b.symbol), nr: b.nr };
      branchpoint.symbol.data = { kind: 'branchpoint', branchpoint };
      t.branchpoints.push(branchpoint);
    }
    for (const e of this.edges) {
      t.edges.push({
        ...e,
        src: t.rebaseEndpoint(e.src),
        dst: t.rebaseEndpoint(e.dst),
        select: ctx.frame(e.select),
        guard: ctx.expression(e.guard),
        assign: ctx.expression(e.assign),
        sync: ctx.expression(e.sync),
        prob: ctx.expression(e.prob),
        selectValues: [...e.selectValues],
      });
    }
    for (const e of this.dynamicEvals) t.dynamicEvals.push(ctx.expression(e));

    for (const l of this.instanceLines) {
      const line = new InstanceLine(l.nr, ctx.symbol(l.symbol), t);
      const copied = l.instance.clone(ctx);
      line.instance.template = copied.template;
      line.instance.apply({
        parameters: copied.parameters,
        mapping: copied.mapping,
        argumentCount: copied.argumentCount,
        unbound: copied.unbound,
        restricted: copied.restricted,
      });
      line.symbol.data = { kind: 'instance-line', line };
      t.instanceLines.push(line);
    }
    const lines = t.instanceLines;
    for (const m of this.messages) {
      t.messages.push({ ...m, src: lines.rebase(m.src), dst: lines.rebase(m.dst), label: ctx.expression(m.label) });
    }
    for (const c of this.conditions) {
      t.conditions.push({ ...c, anchors: c.anchors.map(a => lines.rebase(a)), label: ctx.expression(c.label) });
    }
    for (const u of this.updates) {
      t.updates.push({ ...u, anchor: lines.rebase(u.anchor), label: ctx.expression(u.label) });
    }

    t.hasPrechart = this.hasPrechart;
    t.dynamic = this.dynamic;
    t.dynindex = this.dynindex;
    t.isDefined = this.isDefined;
    return t;
  }

  private rebaseEndpoint(ep: Endpoint): Endpoint {
    return ep.kind === 'state'
      ? { kind: 'state', state: this.states.rebase(ep.state) }
      : { kind: 'branchpoint', branchpoint: this.branchpoints.rebase(ep.branchpoint) };
  }

  private reject<T>(position: Position, error: TypeException): Result<T> {
    this.diagnostics.report(position, error);
    return fail(error);
  }
}

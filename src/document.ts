/**
 * Document: the root of a timed-automata network model.
 *
 * A builder (usually a parser) populates the document in one pass, in
 * source order, through the `add*` methods; each appends and hands back
 * the new entity. Problems are recorded on the diagnostics sink and
 * returned as a failed Result, construction carries on, and the caller
 * decides after the pass whether the errors matter. Afterwards passes
 * read the document through `accept` or the getters.
 *
 * A document is single-writer. It is not safe to mutate it from two
 * places at once.
 */

import { ModelSymbol, type Frame } from './symbol.js';
import { Expression } from './expression.js';
import { type Position, type LineInfo, Positions } from './position.js';
import { Diagnostics, type Diagnostic } from './diagnostics.js';
import {
  Declarations, type Variable, type FunctionDecl, type Progress, type Gantt, type IODecl,
  addVariableTo,
} from './declarations.js';
import { Instance, bind } from './instance.js';
import { Template } from './template.js';
import { ChanPriority, type PrioritySeparator } from './priority.js';
import { type Query, cloneQuery } from './query.js';
import {
  type ModelOption, type SupportedMethods, DEFAULT_SUPPORTED_METHODS, findOption,
} from './options.js';
import { CloneContext } from './clone.js';
import { type SystemVisitor, traverse } from './visitor.js';
import {
  type Result, type TypeException, ok, fail,
  duplicateDefinitionError, shadowsAVariableWarning, freeRestrictedParameterError, missingChanPriorityError,
} from './errors.js';

interface FeatureFlags {
  urgentTransition: boolean;
  priorities: boolean;
  strictInvariants: boolean;
  stopWatch: boolean;
  strictLowerBoundOnControllableEdges: boolean;
  clockGuardRecvBroadcast: boolean;
}

export class Document {
  readonly positions: Positions;
  readonly diagnostics: Diagnostics;
  private globals = new Declarations();

  private templates: Template[] = [];
  private dynamicTemplates: Template[] = [];
  private dynamicByName = new Map<string, Template>();
  private instances: Instance[] = [];
  private lscInstances: Instance[] = [];
  private processes: Instance[] = [];

  private chanPriorities: ChanPriority[] = [];
  private procPriority = new Map<string, number>();
  private queries: Query[] = [];
  private options: ModelOption[] = [];
  private supportedMethods: SupportedMethods = { ...DEFAULT_SUPPORTED_METHODS };

  private beforeUpdate = Expression.empty();
  private afterUpdate = Expression.empty();
  private flags: FeatureFlags = {
    urgentTransition: false,
    priorities: false,
    strictInvariants: false,
    stopWatch: false,
    strictLowerBoundOnControllableEdges: false,
    clockGuardRecvBroadcast: false,
  };
  private syncUsed = 0;
  private strings: string[] = [];
  private libraries: unknown[] = [];
  private modified = false;

  /** Name of the observer automaton instance, if any. */
  obsTA = '';

  constructor(positions: Positions = new Positions(), diagnostics: Diagnostics = new Diagnostics(positions)) {
    this.positions = positions;
    this.diagnostics = diagnostics;
  }

  // --- Declarations ---

  getGlobals(): Declarations {
    return this.globals;
  }

  /**
   * Declare a variable in `decls`. A name that is already visible from an
   * enclosing scope is accepted with a shadowing warning.
   */
  addVariable(decls: Declarations, type: string, name: string, init: Expression, position: Position): Result<Variable> {
    if (decls.frame.indexOf(name) === -1 && decls.frame.parent?.resolve(name)) {
      this.diagnostics.report(position, shadowsAVariableWarning(name));
    }
    return this.checked(position, decls.addVariable(type, name, init, position));
  }

  /** Declare a local variable of `fn`, in the frame of the block declaring it. */
  addVariableToFunction(
    fn: FunctionDecl, frame: Frame, type: string, name: string, init: Expression, position: Position,
  ): Result<Variable> {
    return this.checked(position, addVariableTo(fn.variables, frame, type, name, init, position));
  }

  addFunction(decls: Declarations, type: string, name: string, position: Position): Result<FunctionDecl> {
    return this.checked(position, decls.addFunction(type, name, position));
  }

  addTypeDef(decls: Declarations, name: string, type: string, position: Position): Result<ModelSymbol> {
    return this.checked(position, decls.addTypeDef(name, type, position));
  }

  addProgressMeasure(decls: Declarations, guard: Expression, measure: Expression): Progress {
    return decls.addProgressMeasure(guard, measure);
  }

  addGantt(decls: Declarations, gantt: Gantt): Gantt {
    return decls.addGantt(gantt);
  }

  addIODecl(): IODecl {
    return this.globals.addIODecl();
  }

  // --- Templates ---

  getTemplates(): readonly Template[] {
    return this.templates;
  }

  findTemplate(name: string): Template | undefined {
    return this.templates.find(t => t.name === name);
  }

  getDynamicTemplates(): readonly Template[] {
    return this.dynamicTemplates;
  }

  getDynamicTemplate(name: string): Template | undefined {
    return this.dynamicByName.get(name);
  }

  hasDynamicTemplates(): boolean {
    return this.dynamicTemplates.length > 0;
  }

  /**
   * Create a template: its own instance, unbound in all of `params`, with
   * an empty body. Nothing is inserted when the name is taken.
   */
  addTemplate(
    name: string, params: Iterable<ModelSymbol>, position: Position,
    isTA = true, type = '', mode = '',
  ): Result<Template> {
    const s = this.globals.frame.addSymbol(name, isTA ? 'instance' : 'lsc-instance', position, { kind: 'none' });
    if (!s) return this.reject(position, duplicateDefinitionError(name));
    const t = new Template(s, params, this.globals.frame, this.diagnostics, { isTA, type, mode });
    this.templates.push(t);
    return ok(t);
  }

  /**
   * Create a template that is instantiated at run time by name. The
   * first call for a name declares it; a second one marks that
   * declaration as defined and returns it.
   */
  addDynamicTemplate(name: string, params: Iterable<ModelSymbol>, position: Position): Result<Template> {
    const existing = this.dynamicByName.get(name);
    if (existing) {
      if (existing.isDefined) return this.reject(position, duplicateDefinitionError(name));
      existing.isDefined = true;
      return ok(existing);
    }
    const s = this.globals.frame.addSymbol(name, 'instance', position, { kind: 'none' });
    if (!s) return this.reject(position, duplicateDefinitionError(name));
    const t = new Template(s, params, this.globals.frame, this.diagnostics);
    t.dynamic = true;
    t.dynindex = this.dynamicTemplates.length;
    t.isDefined = false;
    this.dynamicTemplates.push(t);
    this.dynamicByName.set(name, t);
    return ok(t);
  }

  // --- Instances and processes ---

  getInstances(): readonly Instance[] {
    return this.instances;
  }

  getLscInstances(): readonly Instance[] {
    return this.lscInstances;
  }

  /**
   * Instantiate `base` (a template's instance or another instance) as
   * `name`, binding `args` and opening `params`. On failure nothing is
   * appended and `base` is left as it was.
   */
  addInstance(
    name: string, base: Instance, params: Iterable<ModelSymbol>, args: readonly Expression[], position: Position,
  ): Result<Instance> {
    return this.instantiate(this.instances, name, base, params, args, position);
  }

  /** Like `addInstance`, for the instances a scenario chart refers to. */
  addLscInstance(
    name: string, base: Instance, params: Iterable<ModelSymbol>, args: readonly Expression[], position: Position,
  ): Result<Instance> {
    return this.instantiate(this.lscInstances, name, base, params, args, position);
  }

  getProcesses(): readonly Instance[] {
    return this.processes;
  }

  findProcess(name: string): Instance | undefined {
    return this.processes.find(p => p.name === name);
  }

  /**
   * Register a copy of `instance` as a process. An instance with unbound
   * parameters becomes a process set; its unbound parameters must not be
   * restricted.
   */
  addProcess(instance: Instance, position: Position): Result<Instance> {
    const free = instance.unboundParameters().find(p => instance.restricted.has(p));
    if (free) return this.reject(position, freeRestrictedParameterError(free.name));
    const s = new ModelSymbol(instance.name, instance.isClosed() ? 'process' : 'process-set', position);
    const process = instance.copy(s);
    s.data = { kind: 'process', process };
    this.processes.push(process);
    return ok(process);
  }

  /** Remove a process previously returned by `addProcess`. */
  removeProcess(process: Instance): boolean {
    const idx = this.processes.indexOf(process);
    if (idx < 0) return false;
    this.processes.splice(idx, 1);
    return true;
  }

  /** Copy the variables of `from` into `to` as new variables with the same names and initialisers. */
  copyVariablesFromTo(from: Template, to: Template): void {
    for (const v of from.declarations.variables) {
      const s = v.symbol;
      this.checked(s.position, to.declarations.addVariable(s.type, s.name, v.init, s.position));
    }
  }

  /** Copy the functions of `from` into `to`; local variables are copied with them. */
  copyFunctionsFromTo(from: Template, to: Template): void {
    for (const f of from.declarations.functions) {
      const s = f.symbol;
      const r = this.checked(s.position, to.declarations.addFunction(s.type, s.name, s.position));
      if (!r.ok) continue;
      const fn = r.value;
      const renamed = new Map(f.variables.map(v => [v.symbol, v.symbol.copy()]));
      const local = (x: ModelSymbol): ModelSymbol => renamed.get(x) ?? x;
      fn.variables = f.variables.map(v => {
        const variable: Variable = { symbol: local(v.symbol), init: v.init.remap(local) };
        variable.symbol.data = { kind: 'variable', variable };
        return variable;
      });
      fn.changes = new Set(f.changes);
      fn.depends = new Set(f.depends);
      fn.body = f.body ? f.body.remap(local) : null;
    }
  }

  // --- Priorities ---

  beginChanPriority(chan: Expression): void {
    this.flags.priorities = true;
    this.chanPriorities.push(new ChanPriority(chan));
  }

  addChanPriority(separator: PrioritySeparator, chan: Expression): Result<ChanPriority> {
    const last = this.chanPriorities[this.chanPriorities.length - 1];
    if (!last) return this.reject(chan.position, missingChanPriorityError(chan.toString()));
    last.add(separator, chan);
    return ok(last);
  }

  getChanPriorities(): readonly ChanPriority[] {
    return this.chanPriorities;
  }

  setProcPriority(name: string, priority: number): void {
    this.flags.priorities = true;
    this.procPriority.set(name, priority);
  }

  /** Priority of the named process; 0 when none was declared. */
  getProcPriority(name: string): number {
    return this.procPriority.get(name) ?? 0;
  }

  hasPriorityDeclaration(): boolean {
    return this.flags.priorities;
  }

  // --- Features recorded by the type checker ---

  recordStrictInvariant(): void {
    this.flags.strictInvariants = true;
  }

  hasStrictInvariants(): boolean {
    return this.flags.strictInvariants;
  }

  recordStopWatch(): void {
    this.flags.stopWatch = true;
  }

  hasStopWatch(): boolean {
    return this.flags.stopWatch;
  }

  recordStrictLowerBoundOnControllableEdges(): void {
    this.flags.strictLowerBoundOnControllableEdges = true;
  }

  hasStrictLowerBoundOnControllableEdges(): boolean {
    return this.flags.strictLowerBoundOnControllableEdges;
  }

  recordClockGuardRecvBroadcast(): void {
    this.flags.clockGuardRecvBroadcast = true;
  }

  hasClockGuardRecvBroadcast(): boolean {
    return this.flags.clockGuardRecvBroadcast;
  }

  setUrgentTransition(): void {
    this.flags.urgentTransition = true;
  }

  hasUrgentTransition(): boolean {
    return this.flags.urgentTransition;
  }

  setSyncUsed(sync: number): void {
    this.syncUsed = sync;
  }

  getSyncUsed(): number {
    return this.syncUsed;
  }

  // --- Update hooks, queries, options ---

  setBeforeUpdate(e: Expression): void {
    this.beforeUpdate = e;
  }

  getBeforeUpdate(): Expression {
    return this.beforeUpdate;
  }

  setAfterUpdate(e: Expression): void {
    this.afterUpdate = e;
  }

  getAfterUpdate(): Expression {
    return this.afterUpdate;
  }

  addQuery(q: Query): void {
    this.queries.push(cloneQuery(q));
  }

  getQueries(): readonly Query[] {
    return this.queries;
  }

  queriesEmpty(): boolean {
    return this.queries.length === 0;
  }

  getOptions(): readonly ModelOption[] {
    return this.options;
  }

  setOptions(options: readonly ModelOption[]): void {
    this.options = options.map(o => ({ ...o }));
  }

  findOption(name: string): ModelOption | undefined {
    return findOption(this.options, name);
  }

  getSupportedMethods(): Readonly<SupportedMethods> {
    return this.supportedMethods;
  }

  setSupportedMethods(methods: SupportedMethods): void {
    this.supportedMethods = { ...methods };
  }

  // --- String table and libraries ---

  getStrings(): readonly string[] {
    return this.strings;
  }

  addString(s: string): void {
    this.strings.push(s);
  }

  /** Index of `s` in the string table, appending it first if new. */
  addStringIfNew(s: string): number {
    const idx = this.strings.indexOf(s);
    if (idx >= 0) return idx;
    this.strings.push(s);
    return this.strings.length - 1;
  }

  /** Keep an opaque handle to a loaded external library. */
  addLibrary(lib: unknown): void {
    this.libraries.push(lib);
  }

  lastLibrary(): unknown {
    return this.libraries[this.libraries.length - 1];
  }

  isModified(): boolean {
    return this.modified;
  }

  setModified(modified: boolean): void {
    this.modified = modified;
  }

  // --- Positions and diagnostics ---

  addPosition(position: number, offset: number, line: number, path: string): void {
    this.positions.add(position, offset, line, path);
  }

  findPosition(position: number): LineInfo | undefined {
    return this.positions.find(position);
  }

  addError(position: Position, message: string, context = ''): void {
    this.diagnostics.addError(position, message, context);
  }

  addWarning(position: Position, message: string, context = ''): void {
    this.diagnostics.addWarning(position, message, context);
  }

  hasErrors(): boolean {
    return this.diagnostics.hasErrors();
  }

  hasWarnings(): boolean {
    return this.diagnostics.hasWarnings();
  }

  getErrors(): readonly Diagnostic[] {
    return this.diagnostics.getErrors();
  }

  getWarnings(): readonly Diagnostic[] {
    return this.diagnostics.getWarnings();
  }

  clearErrors(): void {
    this.diagnostics.clearErrors();
  }

  clearWarnings(): void {
    this.diagnostics.clearWarnings();
  }

  // --- Traversal and copying ---

  accept(visitor: SystemVisitor): void {
    traverse(this, visitor);
  }

  /**
   * Deep copy. Every owned collection is duplicated and every symbol the
   * copy reaches is fresh, so back-references lead into the copy and
   * mutating one document never shows in the other.
   */
  clone(): Document {
    const positions = this.positions.clone();
    const copy = new Document(positions, this.diagnostics.clone(positions));
    const ctx = new CloneContext();

    this.globals.copyInto(copy.globals, ctx);

    for (const t of this.templates) copy.templates.push(t.clone(ctx, copy.globals.frame, copy.diagnostics));
    for (const t of this.dynamicTemplates) {
      const c = t.clone(ctx, copy.globals.frame, copy.diagnostics);
      copy.dynamicTemplates.push(c);
      copy.dynamicByName.set(c.name, c);
    }
    // Instance lines may name templates that were copied after their chart.
    for (const t of [...copy.templates, ...copy.dynamicTemplates]) {
      for (const line of t.instanceLines) {
        line.instance.template = ctx.templates.get(line.instance.template) ?? line.instance.template;
      }
    }

    const cloneInstance = (i: Instance): Instance => {
      const c = i.clone(ctx);
      c.symbol.data = { kind: 'instance', instance: c };
      return c;
    };
    copy.instances = this.instances.map(cloneInstance);
    copy.lscInstances = this.lscInstances.map(cloneInstance);
    copy.processes = this.processes.map(p => {
      const c = p.clone(ctx);
      c.symbol.data = { kind: 'process', process: c };
      return c;
    });

    copy.chanPriorities = this.chanPriorities.map(cp => {
      const c = new ChanPriority(ctx.expression(cp.head));
      for (const [sep, chan] of cp.tail) c.add(sep, ctx.expression(chan));
      return c;
    });
    copy.procPriority = new Map(this.procPriority);
    copy.queries = this.queries.map(cloneQuery);
    copy.options = this.options.map(o => ({ ...o }));
    copy.supportedMethods = { ...this.supportedMethods };
    copy.beforeUpdate = ctx.expression(this.beforeUpdate);
    copy.afterUpdate = ctx.expression(this.afterUpdate);
    copy.flags = { ...this.flags };
    copy.syncUsed = this.syncUsed;
    copy.strings = [...this.strings];
    copy.libraries = [...this.libraries];
    copy.modified = this.modified;
    copy.obsTA = this.obsTA;
    return copy;
  }

  // --- Internals ---

  private instantiate(
    list: Instance[], name: string, base: Instance, params: Iterable<ModelSymbol>,
    args: readonly Expression[], position: Position,
  ): Result<Instance> {
    const b = bind(base, params, args);
    if (!b.ok) return this.reject(position, b.error);
    const s = this.globals.frame.addSymbol(name, 'instance', position, { kind: 'none' });
    if (!s) return this.reject(position, duplicateDefinitionError(name));
    const instance = Instance.fromBinding(s, base.template, b.value);
    s.data = { kind: 'instance', instance };
    list.push(instance);
    return ok(instance);
  }

  private checked<T>(position: Position, r: Result<T>): Result<T> {
    if (!r.ok) this.diagnostics.report(position, r.error);
    return r;
  }

  private reject<T>(position: Position, error: TypeException): Result<T> {
    this.diagnostics.report(position, error);
    return fail(error);
  }
}

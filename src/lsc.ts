/**
 * Live sequence chart scenario model: instance lines, events, simregions
 * and cuts.
 *
 * Events (messages, conditions, updates) are anchored at instance lines
 * and carry an explicit location: their row in the chart. Events on the
 * same row that share an instance line occur together and are grouped
 * into a simregion. A cut is a set of simregions: one consistent
 * snapshot of how far each instance line has progressed.
 */

import { type Handle } from './arena.js';
import { type ModelSymbol } from './symbol.js';
import { Expression } from './expression.js';
import { Instance, bind } from './instance.js';
import { type Result, ok, fail } from './errors.js';
import type { Template } from './template.js';

/** Handle that no arena owns. Anchors of the empty sentinel events. */
export const NO_LINE: Handle<InstanceLine> = Object.freeze({ arena: 0, index: -1 });

export interface Message {
  nr: number;
  location: number;
  src: Handle<InstanceLine>;
  dst: Handle<InstanceLine>;
  label: Expression;
  isInPrechart: boolean;
}

export interface Condition {
  nr: number;
  location: number;
  anchors: readonly Handle<InstanceLine>[];
  label: Expression;
  isInPrechart: boolean;
  isHot: boolean;
}

export interface Update {
  nr: number;
  location: number;
  anchor: Handle<InstanceLine>;
  label: Expression;
  isInPrechart: boolean;
}

export type EventKind = 'message' | 'condition' | 'update';

/**
 * Which event kind leads among simregions that share a location: the
 * first kind in the list that a simregion contains decides its rank.
 */
export type EventPrecedence = readonly EventKind[];

export const DEFAULT_EVENT_PRECEDENCE: EventPrecedence = Object.freeze(['condition', 'message', 'update'] as const);

// Empty slots of a simregion. Never added to a template.
export const EMPTY_MESSAGE: Readonly<Message> = Object.freeze({
  nr: -1, location: -1, src: NO_LINE, dst: NO_LINE, label: Expression.empty(), isInPrechart: false,
});
export const EMPTY_CONDITION: Readonly<Condition> = Object.freeze({
  nr: -1, location: -1, anchors: Object.freeze([]), label: Expression.empty(), isInPrechart: false, isHot: false,
});
export const EMPTY_UPDATE: Readonly<Update> = Object.freeze({
  nr: -1, location: -1, anchor: NO_LINE, label: Expression.empty(), isInPrechart: false,
});

/**
 * An actor lane of a chart. Until `addParameters` binds it, its instance
 * refers to the chart that owns it.
 */
export class InstanceLine {
  readonly instance: Instance;

  constructor(readonly nr: number, symbol: ModelSymbol, readonly owner: Template) {
    this.instance = new Instance(symbol, owner);
  }

  get symbol(): ModelSymbol {
    return this.instance.symbol;
  }

  get name(): string {
    return this.instance.symbol.name;
  }

  /**
   * Make this line an instance of `base` with `args` bound and `params`
   * left open, exactly as a process instantiation would.
   */
  addParameters(base: Instance, params: Iterable<ModelSymbol>, args: readonly Expression[]): Result<Instance> {
    const b = bind(base, params, args);
    if (!b.ok) return fail(b.error);
    this.instance.template = base.template;
    this.instance.apply(b.value);
    return ok(this.instance);
  }

  /** The simregions touching this line, ordered by location. */
  getSimregions(simregions: readonly Simregion[]): Simregion[] {
    return simregions
      .filter(s => s.touches(this.nr))
      .sort((a, b) => a.getLoc() - b.getLoc());
  }
}

export class Simregion {
  nr = 0;
  message: Readonly<Message> = EMPTY_MESSAGE;
  condition: Readonly<Condition> = EMPTY_CONDITION;
  update: Readonly<Update> = EMPTY_UPDATE;

  hasMessage(): boolean {
    return this.message.nr !== -1;
  }

  hasCondition(): boolean {
    return this.condition.nr !== -1;
  }

  hasUpdate(): boolean {
    return this.update.nr !== -1;
  }

  has(kind: EventKind): boolean {
    switch (kind) {
      case 'message': return this.hasMessage();
      case 'condition': return this.hasCondition();
      case 'update': return this.hasUpdate();
    }
  }

  setMessage(messages: readonly Message[], nr: number): void {
    this.message = messages.find(m => m.nr === nr) ?? EMPTY_MESSAGE;
  }

  setCondition(conditions: readonly Condition[], nr: number): void {
    this.condition = conditions.find(c => c.nr === nr) ?? EMPTY_CONDITION;
  }

  setUpdate(updates: readonly Update[], nr: number): void {
    this.update = updates.find(u => u.nr === nr) ?? EMPTY_UPDATE;
  }

  /** Highest location among present events, or -1 when empty. */
  getLoc(): number {
    let loc = -1;
    if (this.hasMessage()) loc = Math.max(loc, this.message.location);
    if (this.hasCondition()) loc = Math.max(loc, this.condition.location);
    if (this.hasUpdate()) loc = Math.max(loc, this.update.location);
    return loc;
  }

  /** True when there is at least one event and every present event is in the prechart. */
  isInPrechart(): boolean {
    const flags: boolean[] = [];
    if (this.hasMessage()) flags.push(this.message.isInPrechart);
    if (this.hasCondition()) flags.push(this.condition.isInPrechart);
    if (this.hasUpdate()) flags.push(this.update.isInPrechart);
    return flags.length > 0 && flags.every(f => f);
  }

  /** Whether any present event is anchored at the instance line numbered `line`. */
  touches(line: number): boolean {
    if (this.hasMessage() && (this.message.src.index === line || this.message.dst.index === line)) return true;
    if (this.hasCondition() && this.condition.anchors.some(a => a.index === line)) return true;
    return this.hasUpdate() && this.update.anchor.index === line;
  }

  /** Same message, condition and update, compared by event number. */
  equals(other: Simregion): boolean {
    return this.message.nr === other.message.nr
      && this.condition.nr === other.condition.nr
      && this.update.nr === other.update.nr;
  }

  toString(): string {
    const parts: string[] = [];
    if (this.hasMessage()) parts.push(`m:${this.message.nr}`);
    if (this.hasCondition()) parts.push(`c:${this.condition.nr}`);
    if (this.hasUpdate()) parts.push(`u:${this.update.nr}`);
    return `s(${parts.join(' ')})`;
  }
}

export class Cut implements Iterable<Simregion> {
  private simregions: Simregion[] = [];

  constructor(readonly nr: number = 0) {}

  get size(): number {
    return this.simregions.length;
  }

  /** Insert unless an equal simregion is already present. */
  add(s: Simregion): void {
    if (!this.contains(s)) this.simregions.push(s);
  }

  /** Remove the simregion equal to `s`. Returns whether one was removed. */
  erase(s: Simregion): boolean {
    const idx = this.simregions.findIndex(x => x.equals(s));
    if (idx < 0) return false;
    this.simregions.splice(idx, 1);
    return true;
  }

  contains(s: Simregion): boolean {
    return this.simregions.some(x => x.equals(s));
  }

  /**
   * Whether the cut lies in the prechart. With `following`, one of the
   * simregions after the cut, the cut only counts when that simregion is
   * in the prechart as well: a cut whose simregions are all prechart but
   * whose successors are not sits on the prechart/mainchart boundary.
   */
  isInPrechart(following?: Simregion): boolean {
    if (following && !following.isInPrechart()) return false;
    return this.simregions.every(s => s.isInPrechart());
  }

  /** Set equality; insertion order does not matter. */
  equals(other: Cut): boolean {
    return this.size === other.size && this.simregions.every(s => other.contains(s));
  }

  copy(nr: number = this.nr): Cut {
    const c = new Cut(nr);
    c.simregions = [...this.simregions];
    return c;
  }

  toString(): string {
    return `CUT(${this.simregions.map(s => s.toString()).join(' ')})`;
  }

  [Symbol.iterator](): Iterator<Simregion> {
    return this.simregions[Symbol.iterator]();
  }
}

// --- Event lookup ---

/** Condition anchored at `line` on row `y`, skipping those in `exclude`. */
export function findCondition(
  conditions: readonly Condition[], line: number, y: number, exclude?: ReadonlySet<Condition>,
): Condition | undefined {
  return conditions.find(c =>
    c.location === y && c.anchors.some(a => a.index === line) && !exclude?.has(c));
}

/** Update anchored at `line` on row `y`, skipping those in `exclude`. */
export function findUpdate(
  updates: readonly Update[], line: number, y: number, exclude?: ReadonlySet<Update>,
): Update | undefined {
  return updates.find(u => u.location === y && u.anchor.index === line && !exclude?.has(u));
}

/** First update on row `y` found on any of `lines`, tried in the given order. */
export function findUpdateOnAny(
  updates: readonly Update[], lines: readonly number[], y: number, exclude?: ReadonlySet<Update>,
): Update | undefined {
  for (const line of lines) {
    const u = findUpdate(updates, line, y, exclude);
    if (u) return u;
  }
  return undefined;
}

// --- Simregion derivation ---

export interface ScenarioEvents {
  messages: readonly Message[];
  conditions: readonly Condition[];
  updates: readonly Update[];
}

/**
 * Group events into simregions and order them.
 *
 * Every message starts a simregion and takes the condition and the update
 * on its source or destination line at the same row. Each condition left
 * over starts one and takes an update on one of its anchors. Updates left
 * over stand alone. Each event ends up in exactly one simregion.
 *
 * The result is ordered by location, then by the leading event kind
 * under `precedence`, then by that event's number. Simregion numbers are
 * positions in the result.
 */
export function deriveSimregions(
  events: ScenarioEvents, precedence: EventPrecedence = DEFAULT_EVENT_PRECEDENCE,
): Simregion[] {
  const out: Simregion[] = [];
  const usedConditions = new Set<Condition>();
  const usedUpdates = new Set<Update>();

  for (const m of events.messages) {
    const s = new Simregion();
    s.message = m;
    const lines = [m.src.index, m.dst.index];
    const c = findCondition(events.conditions, lines[0], m.location, usedConditions)
      ?? findCondition(events.conditions, lines[1], m.location, usedConditions);
    if (c) {
      s.condition = c;
      usedConditions.add(c);
    }
    const u = findUpdateOnAny(events.updates, lines, m.location, usedUpdates);
    if (u) {
      s.update = u;
      usedUpdates.add(u);
    }
    out.push(s);
  }

  for (const c of events.conditions) {
    if (usedConditions.has(c)) continue;
    const s = new Simregion();
    s.condition = c;
    usedConditions.add(c);
    const u = findUpdateOnAny(events.updates, c.anchors.map(a => a.index), c.location, usedUpdates);
    if (u) {
      s.update = u;
      usedUpdates.add(u);
    }
    out.push(s);
  }

  for (const u of events.updates) {
    if (usedUpdates.has(u)) continue;
    const s = new Simregion();
    s.update = u;
    usedUpdates.add(u);
    out.push(s);
  }

  const rank = (s: Simregion): number => {
    const i = precedence.findIndex(k => s.has(k));
    return i < 0 ? precedence.length : i;
  };
  out.sort((a, b) =>
    a.getLoc() - b.getLoc()
    || rank(a) - rank(b)
    || leadingNr(a, precedence) - leadingNr(b, precedence));
  out.forEach((s, i) => { s.nr = i; });
  return out;
}

function leadingNr(s: Simregion, precedence: EventPrecedence): number {
  for (const k of precedence) {
    if (!s.has(k)) continue;
    switch (k) {
      case 'message': return s.message.nr;
      case 'condition': return s.condition.nr;
      case 'update': return s.update.nr;
    }
  }
  return -1;
}

/**
 * Index of the first simregion outside the prechart, or the length when
 * all are inside. On one instance line's ordered simregions the prechart
 * is a prefix, so a single forward scan finds the boundary.
 */
export function prechartBoundary(simregions: readonly Simregion[]): number {
  const idx = simregions.findIndex(s => !s.isInPrechart());
  return idx < 0 ? simregions.length : idx;
}

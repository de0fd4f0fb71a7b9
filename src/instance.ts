/**
 * Instances: partial or complete bindings of a template's parameters.
 *
 * Partial instances of partial instances are not nested: every binding
 * along the chain is merged into one flat instance. The parameter frame
 * holds the unbound parameters first and the bound ones after them, so
 * `unbound + mapping.size === parameters.size` for every instance.
 *
 *   T(p0, p1)          parameters [p0, p1 |]        unbound 2
 *   I = T(a)           parameters [p1 | p0]         p0 -> a
 *   J = I(b)           parameters [| p0, p1]        p0 -> a, p1 -> b
 *
 * An instance with no unbound parameters is closed and accepts no
 * further arguments.
 */

import { type ModelSymbol, Frame } from './symbol.js';
import { type Expression } from './expression.js';
import { type Result, ok, fail, tooManyArgumentsError } from './errors.js';
import { type CloneContext } from './clone.js';
import type { Template } from './template.js';

/** The parameter layout and bindings produced by one instantiation step. */
export interface Binding {
  parameters: Frame;
  mapping: Map<ModelSymbol, Expression>;
  argumentCount: number;
  unbound: number;
  restricted: Set<ModelSymbol>;
}

export class Instance {
  constructor(
    public symbol: ModelSymbol,
    public template: Template,
    public parameters: Frame = new Frame(),
    public mapping: Map<ModelSymbol, Expression> = new Map(),
    public argumentCount: number = 0,
    public unbound: number = parameters.size,
    public restricted: Set<ModelSymbol> = new Set(),
  ) {}

  static fromBinding(symbol: ModelSymbol, template: Template, b: Binding): Instance {
    return new Instance(symbol, template, b.parameters, b.mapping, b.argumentCount, b.unbound, b.restricted);
  }

  get name(): string {
    return this.symbol.name;
  }

  isClosed(): boolean {
    return this.unbound === 0;
  }

  unboundParameters(): ModelSymbol[] {
    return this.parameters.toArray().slice(0, this.unbound);
  }

  boundParameters(): ModelSymbol[] {
    return this.parameters.toArray().slice(this.unbound);
  }

  /** Overwrite this instance's layout, e.g. when an instance line is bound. */
  apply(b: Binding): void {
    this.parameters = b.parameters;
    this.mapping = b.mapping;
    this.argumentCount = b.argumentCount;
    this.unbound = b.unbound;
    this.restricted = b.restricted;
  }

  /** Unbound parameters as `type name`, comma separated. */
  writeParameters(): string {
    return this.unboundParameters().map(p => `${p.type} ${p.name}`).join(', ');
  }

  /** Bound arguments, in the order the template declares its parameters. */
  writeArguments(): string {
    const args: string[] = [];
    for (const p of this.template.parameters) {
      const e = this.mapping.get(p);
      if (e) args.push(e.toString());
    }
    return args.join(', ');
  }

  writeMapping(): string {
    let s = '';
    for (const [p, e] of this.mapping) s += `${p.name} = ${e.toString()}\n`;
    return s;
  }

  /** Shallow copy under a new symbol; frames and sets are duplicated, expressions shared. */
  copy(symbol: ModelSymbol): Instance {
    return new Instance(
      symbol, this.template, Frame.of(...this.parameters), new Map(this.mapping),
      this.argumentCount, this.unbound, new Set(this.restricted),
    );
  }

  /**
   * Deep copy through `ctx`. The template is looked up among the copied
   * templates and kept as is when it was not copied. The caller rebinds
   * the symbol's data.
   */
  clone(ctx: CloneContext): Instance {
    const mapping = new Map<ModelSymbol, Expression>();
    for (const [p, e] of this.mapping) mapping.set(ctx.symbol(p), ctx.expression(e));
    return new Instance(
      ctx.symbol(this.symbol),
      ctx.templates.get(this.template) ?? this.template,
      ctx.frame(this.parameters),
      mapping,
      this.argumentCount,
      this.unbound,
      ctx.symbolSet(this.restricted),
    );
  }
}

/**
 * Bind `args` left to right to the unbound parameters of `base`, adding
 * `params` as new unbound parameters of the result. Leaves `base`
 * untouched and fails when there are more arguments than unbound
 * parameters.
 *
 * A restricted parameter passes its restriction on to every symbol its
 * argument mentions, provided the argument mentions at least one of the
 * new instance's own parameters. An argument built only from constants
 * and globals restricts nothing.
 */
export function bind(base: Instance, params: Iterable<ModelSymbol>, args: readonly Expression[]): Result<Binding> {
  if (args.length > base.unbound) return fail(tooManyArgumentsError(base.name));

  const free = base.unboundParameters();
  const fresh = free.slice(0, args.length);
  const remaining = free.slice(args.length);
  const own = [...params, ...remaining];

  const mapping = new Map(base.mapping);
  fresh.forEach((p, i) => mapping.set(p, args[i]));

  const restricted = new Set(base.restricted);
  fresh.forEach((p, i) => {
    if (!base.restricted.has(p)) return;
    const mentioned = args[i].symbols();
    if (!mentioned.some(s => own.includes(s))) return;
    for (const s of mentioned) restricted.add(s);
  });

  return ok({
    parameters: Frame.of(...own, ...base.boundParameters(), ...fresh),
    mapping,
    argumentCount: base.argumentCount + args.length,
    unbound: own.length,
    restricted,
  });
}

/**
 * Document traversal.
 *
 * Downstream passes (type checking, code generation, serialisation)
 * implement the hooks they need; every hook is optional. The order is
 * fixed:
 *
 *   system before
 *   global declarations: type definitions, variables and functions in
 *     declaration order, then progress measures, gantt charts, I/O decls
 *   per template (static ones, then dynamic ones), only if
 *   `visitTemplateBefore` does not return false:
 *     local declarations, locations, edges, instance lines, messages,
 *     conditions, updates, template after
 *   instances, then scenario instances
 *   processes
 *   system after
 */

import { type ModelSymbol, type Frame } from './symbol.js';
import type { Variable, FunctionDecl, Progress, Gantt, IODecl, Declarations } from './declarations.js';
import type { Template, State, Edge } from './template.js';
import type { Instance } from './instance.js';
import type { InstanceLine, Message, Condition, Update } from './lsc.js';
import type { Document } from './document.js';

export interface SystemVisitor {
  visitSystemBefore?(doc: Document): void;
  visitSystemAfter?(doc: Document): void;
  visitVariable?(variable: Variable): void;
  /** Return false to skip the template's body and its after hook. */
  visitTemplateBefore?(template: Template): boolean;
  visitTemplateAfter?(template: Template): void;
  visitState?(state: State, template: Template): void;
  visitEdge?(edge: Edge, template: Template): void;
  visitInstance?(instance: Instance): void;
  visitProcess?(process: Instance): void;
  visitFunction?(fn: FunctionDecl): void;
  visitTypeDef?(symbol: ModelSymbol): void;
  visitIODecl?(io: IODecl): void;
  visitProgressMeasure?(progress: Progress): void;
  visitGanttChart?(gantt: Gantt): void;
  visitInstanceLine?(line: InstanceLine, template: Template): void;
  visitMessage?(message: Message, template: Template): void;
  visitCondition?(condition: Condition, template: Template): void;
  visitUpdate?(update: Update, template: Template): void;
}

export function traverse(doc: Document, visitor: SystemVisitor): void {
  visitor.visitSystemBefore?.(doc);

  visitDeclarations(doc.getGlobals(), visitor);

  for (const t of [...doc.getTemplates(), ...doc.getDynamicTemplates()]) {
    if (visitor.visitTemplateBefore?.(t) === false) continue;
    visitFrame(t.frame, visitor);
    for (const s of t.states) visitor.visitState?.(s, t);
    for (const e of t.edges) visitor.visitEdge?.(e, t);
    for (const l of t.instanceLines) visitor.visitInstanceLine?.(l, t);
    for (const m of t.messages) visitor.visitMessage?.(m, t);
    for (const c of t.conditions) visitor.visitCondition?.(c, t);
    for (const u of t.updates) visitor.visitUpdate?.(u, t);
    visitor.visitTemplateAfter?.(t);
  }

  for (const i of doc.getInstances()) visitor.visitInstance?.(i);
  for (const i of doc.getLscInstances()) visitor.visitInstance?.(i);
  for (const p of doc.getProcesses()) visitor.visitProcess?.(p);

  visitor.visitSystemAfter?.(doc);
}

function visitDeclarations(decls: Declarations, visitor: SystemVisitor): void {
  visitFrame(decls.frame, visitor);
  for (const p of decls.progress) visitor.visitProgressMeasure?.(p);
  for (const g of decls.ganttChart) visitor.visitGanttChart?.(g);
  for (const io of decls.iodecls) visitor.visitIODecl?.(io);
}

// Only declarations are visited here; locations, instance lines,
// templates and instances have their own passes.
function visitFrame(frame: Frame, visitor: SystemVisitor): void {
  for (const s of frame) {
    const d = s.data;
    switch (d.kind) {
      case 'typedef':
        visitor.visitTypeDef?.(s);
        break;
      case 'variable':
        visitor.visitVariable?.(d.variable);
        break;
      case 'function':
        visitor.visitFunction?.(d.fn);
        break;
      default:
        break;
    }
  }
}

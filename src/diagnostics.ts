/**
 * Diagnostics: the append-only error and warning logs of a document.
 *
 * The sink is its own object so read-only consumers of a document can
 * still report problems without the document itself being mutable.
 */

import { type Position, type LineInfo, Positions } from './position.js';
import { type TypeException } from './errors.js';

export interface Diagnostic {
  position: Position;
  start: LineInfo | undefined;
  end: LineInfo | undefined;
  message: string;
  context: string;
}

export class Diagnostics {
  private errors: Diagnostic[] = [];
  private warnings: Diagnostic[] = [];

  constructor(private readonly positions: Positions = new Positions()) {}

  addError(position: Position, message: string, context = ''): void {
    this.errors.push(this.make(position, message, context));
  }

  addWarning(position: Position, message: string, context = ''): void {
    this.warnings.push(this.make(position, message, context));
  }

  /** Record a named condition in the log its severity selects. */
  report(position: Position, exception: TypeException, context = ''): void {
    if (exception.isWarning) this.addWarning(position, exception.message, context);
    else this.addError(position, exception.message, context);
  }

  hasErrors(): boolean {
    return this.errors.length > 0;
  }

  hasWarnings(): boolean {
    return this.warnings.length > 0;
  }

  getErrors(): readonly Diagnostic[] {
    return this.errors;
  }

  getWarnings(): readonly Diagnostic[] {
    return this.warnings;
  }

  clearErrors(): void {
    this.errors = [];
  }

  clearWarnings(): void {
    this.warnings = [];
  }

  /** Copy bound to another position table. */
  clone(positions: Positions): Diagnostics {
    const copy = new Diagnostics(positions);
    copy.errors = this.errors.map(d => ({ ...d }));
    copy.warnings = this.warnings.map(d => ({ ...d }));
    return copy;
  }

  private make(position: Position, message: string, context: string): Diagnostic {
    return {
      position,
      start: this.positions.find(position.start),
      end: this.positions.find(position.end),
      message,
      context,
    };
  }
}

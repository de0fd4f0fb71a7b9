/**
 * automata-ir: an in-memory model of timed-automata networks and live
 * sequence charts.
 *
 * Public API surface.
 */

// --- Positions and diagnostics ---
export { type Position, type LineInfo, UNKNOWN_POSITION, pos, Positions } from './position.js';
export { type Diagnostic, Diagnostics } from './diagnostics.js';

// --- Errors ---
export {
  ErrorKind, TypeException, type Severity, type Result, ok, fail,
  unknownIdentifierError, hasNoMemberError, isNotAStructError, duplicateDefinitionError,
  invalidTypeError, noSuchProcessError, notATemplateError, notAProcessError,
  strategyNotDeclaredError, unknownDynamicTemplateError, shadowsAVariableWarning,
  couldNotLoadLibraryError, couldNotLoadFunctionError, tooManyArgumentsError,
  freeRestrictedParameterError, notALocationError, notAnInstanceLineError, missingChanPriorityError,
} from './errors.js';

// --- Symbols and expressions ---
export { type SymbolData, ModelSymbol, Frame, symbol, param } from './symbol.js';
export { type ExpressionKind, type Constant, Expression, walk } from './expression.js';
export { type Handle, Arena } from './arena.js';

// --- Declarations ---
export {
  type Variable, type FunctionDecl, type Progress, type IODecl, type GanttMap, type Gantt,
  Declarations, variableToString,
} from './declarations.js';

// --- Templates and instances ---
export { type Binding, Instance, bind } from './instance.js';
export {
  type State, type Branchpoint, type Endpoint, type Edge, type TemplateOptions,
  Template,
} from './template.js';

// --- Scenario charts ---
export {
  type Message, type Condition, type Update, type EventKind, type EventPrecedence, type ScenarioEvents,
  InstanceLine, Simregion, Cut,
  DEFAULT_EVENT_PRECEDENCE, deriveSimregions, prechartBoundary,
} from './lsc.js';

// --- Document ---
export { ChanPriority, type PrioritySeparator } from './priority.js';
export {
  type Query, type Expectation, type Resource,
  ExpectationType, QueryStatus, ResourceType, query,
} from './query.js';
export { type ModelOption, type SupportedMethods, DEFAULT_SUPPORTED_METHODS, option } from './options.js';
export { type SystemVisitor, traverse } from './visitor.js';
export { Document } from './document.js';

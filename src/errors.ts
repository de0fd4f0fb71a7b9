/**
 * Named semantic error and warning conditions.
 *
 * Each condition is a message template with a `%1%` placeholder and the
 * offending name (its subject). `$word_word` tokens are translation keys
 * resolved by the front end. Constructing one has no side effect; the core returns
 * them inside a Result and records them as diagnostics, a type checker
 * may throw them.
 */

export enum ErrorKind {
  UnknownIdentifier = 'UnknownIdentifier',
  HasNoMember = 'HasNoMember',
  IsNotAStruct = 'IsNotAStruct',
  DuplicateDefinition = 'DuplicateDefinition',
  InvalidType = 'InvalidType',
  NoSuchProcess = 'NoSuchProcess',
  NotATemplate = 'NotATemplate',
  NotAProcess = 'NotAProcess',
  StrategyNotDeclared = 'StrategyNotDeclared',
  UnknownDynamicTemplate = 'UnknownDynamicTemplate',
  ShadowsAVariable = 'ShadowsAVariable',
  CouldNotLoadLibrary = 'CouldNotLoadLibrary',
  CouldNotLoadFunction = 'CouldNotLoadFunction',
  TooManyArguments = 'TooManyArguments',
  FreeRestrictedParameter = 'FreeRestrictedParameter',
  NotALocation = 'NotALocation',
  NotAnInstanceLine = 'NotAnInstanceLine',
  MissingChanPriority = 'MissingChanPriority',
}

export type Severity = 'error' | 'warning';

export class TypeException extends Error {
  constructor(
    public readonly kind: ErrorKind,
    public readonly template: string,
    public readonly subject: string,
    public readonly severity: Severity = 'error',
  ) {
    super(template.replace('%1%', subject));
    this.name = 'TypeException';
  }

  get isWarning(): boolean {
    return this.severity === 'warning';
  }
}

export type Result<T> =
  | { ok: true; value: T }
  | { ok: false; error: TypeException };

export function ok<T>(value: T): Result<T> {
  return { ok: true, value };
}

export function fail<T>(error: TypeException): Result<T> {
  return { ok: false, error };
}

export function unknownIdentifierError(name: string): TypeException {
  return new TypeException(ErrorKind.UnknownIdentifier, '$Unknown_identifier: %1%', name);
}

export function hasNoMemberError(name: string): TypeException {
  return new TypeException(ErrorKind.HasNoMember, '$has_no_member_named %1%', name);
}

export function isNotAStructError(name: string): TypeException {
  return new TypeException(ErrorKind.IsNotAStruct, '%1% $is_not_a_structure', name);
}

export function duplicateDefinitionError(name: string): TypeException {
  return new TypeException(ErrorKind.DuplicateDefinition, '$Duplicate_definition_of %1%', name);
}

export function invalidTypeError(name: string): TypeException {
  return new TypeException(ErrorKind.InvalidType, '$Invalid_type %1%', name);
}

export function noSuchProcessError(name: string): TypeException {
  return new TypeException(ErrorKind.NoSuchProcess, '$No_such_process: %1%', name);
}

export function notATemplateError(name: string): TypeException {
  return new TypeException(ErrorKind.NotATemplate, '$Not_a_template: %1%', name);
}

export function notAProcessError(name: string): TypeException {
  return new TypeException(ErrorKind.NotAProcess, '%1% $is_not_a_process', name);
}

export function strategyNotDeclaredError(name: string): TypeException {
  return new TypeException(ErrorKind.StrategyNotDeclared, '$strategy_not_declared: %1%', name);
}

export function unknownDynamicTemplateError(name: string): TypeException {
  return new TypeException(ErrorKind.UnknownDynamicTemplate, 'Unknown dynamic template %1%', name);
}

export function shadowsAVariableWarning(name: string): TypeException {
  return new TypeException(ErrorKind.ShadowsAVariable, '%1% $shadows_a_variable', name, 'warning');
}

export function couldNotLoadLibraryError(name: string): TypeException {
  return new TypeException(ErrorKind.CouldNotLoadLibrary, '$Could_not_load_library_named %1%', name);
}

export function couldNotLoadFunctionError(name: string): TypeException {
  return new TypeException(ErrorKind.CouldNotLoadFunction, '$Could_not_load_function_named %1%', name);
}

export function tooManyArgumentsError(name: string): TypeException {
  return new TypeException(ErrorKind.TooManyArguments, '$Too_many_arguments_to %1%', name);
}

export function freeRestrictedParameterError(name: string): TypeException {
  return new TypeException(ErrorKind.FreeRestrictedParameter, '$Restricted_parameter_may_not_be_free %1%', name);
}

export function notALocationError(name: string): TypeException {
  return new TypeException(ErrorKind.NotALocation, '%1% $is_not_a_location', name);
}

export function notAnInstanceLineError(name: string): TypeException {
  return new TypeException(ErrorKind.NotAnInstanceLine, '%1% $is_not_an_instance_line', name);
}

export function missingChanPriorityError(name: string): TypeException {
  return new TypeException(ErrorKind.MissingChanPriority, '$No_channel_priority_to_extend_with %1%', name);
}

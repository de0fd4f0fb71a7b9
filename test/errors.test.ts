import { describe, it, expect } from 'vitest';
import {
  ErrorKind, TypeException, ok, fail,
  unknownIdentifierError, isNotAStructError, notAProcessError, unknownDynamicTemplateError,
  shadowsAVariableWarning, tooManyArgumentsError, couldNotLoadLibraryError,
} from '../src/errors.js';

describe('TypeException', () => {
  it('substitutes the subject into the message template', () => {
    const e = unknownIdentifierError('foo');
    expect(e.kind).toBe(ErrorKind.UnknownIdentifier);
    expect(e.template).toBe('$Unknown_identifier: %1%');
    expect(e.subject).toBe('foo');
    expect(e.message).toBe('$Unknown_identifier: foo');
  });

  it('places the subject wherever the template puts it', () => {
    expect(isNotAStructError('s').message).toBe('s $is_not_a_structure');
    expect(notAProcessError('P').message).toBe('P $is_not_a_process');
    expect(unknownDynamicTemplateError('Spawn').message).toBe('Unknown dynamic template Spawn');
    expect(couldNotLoadLibraryError('libfoo.so').message).toBe('$Could_not_load_library_named libfoo.so');
  });

  it('distinguishes warnings from errors', () => {
    expect(shadowsAVariableWarning('x').isWarning).toBe(true);
    expect(tooManyArgumentsError('T').isWarning).toBe(false);
  });

  it('is an Error that can be thrown by a checker', () => {
    const e = tooManyArgumentsError('T');
    expect(e).toBeInstanceOf(Error);
    expect(e).toBeInstanceOf(TypeException);
    expect(e.name).toBe('TypeException');
    expect(() => { throw e; }).toThrow('$Too_many_arguments_to T');
  });
});

describe('Result', () => {
  it('wraps values and errors', () => {
    const good = ok(3);
    const bad = fail<number>(unknownIdentifierError('y'));
    expect(good).toEqual({ ok: true, value: 3 });
    expect(bad.ok).toBe(false);
    if (!bad.ok) expect(bad.error.subject).toBe('y');
  });
});

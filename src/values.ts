/**
 * Runtime value representations for the Brook interpreter.
 */

import type { Environment } from './environment';
import type { FunctionDef } from './ast';

export type BrookValue =
  | { kind: 'number'; value: number }
  | { kind: 'string'; value: string }
  | { kind: 'bool'; value: boolean }
  | { kind: 'nil' }
  | BrookFunction
  | BrookBuiltin;

/**
 * A closure: the definition it was created from plus the environment that
 * was current when the definition was evaluated. `id` only distinguishes
 * closures when printed.
 */
export interface BrookFunction {
  kind: 'function';
  id: number;
  definition: FunctionDef;
  closure: Environment;
}

export type BuiltinFn = (args: BrookValue[]) => BrookValue;

export interface BrookBuiltin {
  kind: 'builtin';
  name: string;
  arity: number;
  fn: BuiltinFn;
}

export type ValueKind = BrookValue['kind'];

// ---- Value constructors ----

export function mkNumber(value: number): BrookValue {
  return { kind: 'number', value };
}

export function mkString(value: string): BrookValue {
  return { kind: 'string', value };
}

export function mkBool(value: boolean): BrookValue {
  return { kind: 'bool', value };
}

export function mkNil(): BrookValue {
  return { kind: 'nil' };
}

export function mkFunction(id: number, definition: FunctionDef, closure: Environment): BrookFunction {
  return { kind: 'function', id, definition, closure };
}

export function mkBuiltin(name: string, arity: number, fn: BuiltinFn): BrookBuiltin {
  return { kind: 'builtin', name, arity, fn };
}

// ---- Value utilities ----

export function isCallable(v: BrookValue): v is BrookFunction | BrookBuiltin {
  return v.kind === 'function' || v.kind === 'builtin';
}

export function isTruthy(v: BrookValue): boolean {
  switch (v.kind) {
    case 'bool': return v.value;
    case 'nil': return false;
    case 'number': return v.value !== 0;
    case 'string': return v.value.length > 0;
    case 'function':
    case 'builtin':
      return true;
  }
}

export function numberToString(n: number): string {
  return String(n);
}

export function valueToString(v: BrookValue): string {
  switch (v.kind) {
    case 'number': return numberToString(v.value);
    case 'string': return v.value;
    case 'bool': return String(v.value);
    case 'nil': return 'nil';
    case 'function': return `<fn ${v.definition.name}#${v.id}>`;
    case 'builtin': return `<builtin ${v.name}>`;
  }
}

export function valuesEqual(a: BrookValue, b: BrookValue): boolean {
  switch (a.kind) {
    case 'number': return b.kind === 'number' && a.value === b.value;
    case 'string': return b.kind === 'string' && a.value === b.value;
    case 'bool': return b.kind === 'bool' && a.value === b.value;
    case 'nil':
      return b.kind === 'nil';
    case 'function':
    case 'builtin':
      return a === b;
  }
}

/**
 * Arity of anything callable.
 */
export function arityOf(v: BrookFunction | BrookBuiltin): number {
  return v.kind === 'function' ? v.definition.params.length : v.arity;
}

/**
 * Name used in call-related error messages.
 */
export function calleeName(v: BrookFunction | BrookBuiltin): string {
  return v.kind === 'function' ? v.definition.name : v.name;
}

/**
 * Error types for the Brook interpreter.
 */

import type { BrookValue } from './values';

export class BrookError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'BrookError';
  }
}

function location(line?: number, column?: number): string {
  return line !== undefined ? ` [line ${line}, col ${column ?? 0}]` : '';
}

/**
 * Raised by the lexer and parser.
 */
export class BrookSyntaxError extends BrookError {
  public readonly line: number;
  public readonly column: number;
  public readonly detail: string;

  constructor(detail: string, line: number, column: number) {
    super(`SyntaxError${location(line, column)}: ${detail}`);
    this.name = 'BrookSyntaxError';
    this.detail = detail;
    this.line = line;
    this.column = column;
  }
}

export type RuntimeErrorKind =
  | 'UndefinedVariable'
  | 'NotCallable'
  | 'ArityMismatch'
  | 'TypeMismatch'
  | 'StackOverflow';

/**
 * Base class for every error that aborts a running program.
 */
export abstract class BrookRuntimeError extends BrookError {
  abstract readonly kind: RuntimeErrorKind;
  public line: number | undefined;
  public column: number | undefined;
  public readonly detail: string;

  protected constructor(kindName: RuntimeErrorKind, detail: string, line?: number, column?: number) {
    super(`${kindName}${location(line, column)}: ${detail}`);
    this.name = 'BrookRuntimeError';
    this.detail = detail;
    this.line = line;
    this.column = column;
  }

  /**
   * Attach a source position if none was recorded where the error was raised.
   * Environment lookups know names but not nodes, so the evaluator fills this in.
   */
  at(line: number, column: number): this {
    if (this.line === undefined) {
      this.line = line;
      this.column = column;
      this.message = `${this.kind}${location(line, column)}: ${this.detail}`;
    }
    return this;
  }
}

export class UndefinedVariableError extends BrookRuntimeError {
  readonly kind = 'UndefinedVariable';
  public readonly variable: string;

  constructor(name: string, line?: number, column?: number) {
    super('UndefinedVariable', `undefined variable '${name}'`, line, column);
    this.variable = name;
  }
}

export class NotCallableError extends BrookRuntimeError {
  readonly kind = 'NotCallable';
  public readonly value: BrookValue;

  constructor(value: BrookValue, display: string, line?: number, column?: number) {
    super('NotCallable', `'${display}' (${value.kind}) is not callable`, line, column);
    this.value = value;
  }
}

export class ArityMismatchError extends BrookRuntimeError {
  readonly kind = 'ArityMismatch';
  public readonly expected: number;
  public readonly got: number;

  constructor(callee: string, expected: number, got: number, line?: number, column?: number) {
    super(
      'ArityMismatch',
      `${callee} expected ${expected} argument${expected === 1 ? '' : 's'} but got ${got}`,
      line,
      column,
    );
    this.expected = expected;
    this.got = got;
  }
}

export class TypeMismatchError extends BrookRuntimeError {
  readonly kind = 'TypeMismatch';
  public readonly operator: string;
  public readonly operandKinds: string[];

  constructor(operator: string, operandKinds: string[], line?: number, column?: number) {
    super(
      'TypeMismatch',
      `operator '${operator}' is not defined for ${operandKinds.join(' and ')}`,
      line,
      column,
    );
    this.operator = operator;
    this.operandKinds = operandKinds;
  }
}

export class StackOverflowError extends BrookRuntimeError {
  readonly kind = 'StackOverflow';
  public readonly depth: number;

  constructor(depth: number, line?: number, column?: number) {
    super('StackOverflow', `maximum call depth of ${depth} exceeded`, line, column);
    this.depth = depth;
  }
}

/**
 * Signal thrown to implement return statements.
 * This is NOT an error -- it's a control flow mechanism.
 */
export class ReturnSignal {
  public readonly value: BrookValue;

  constructor(value: BrookValue) {
    this.value = value;
  }
}

/**
 * Source-to-output driver: lex, parse, resolve and run in one call.
 *
 * This is what the CLI and the REPL build on, and what embedders call.
 */

import { parse } from './parser';
import { resolve } from './resolver';
import { Diagnostic, formatDiagnostic, hasErrors } from './diagnostics';
import { Interpreter, InterpreterOptions } from './interpreter';
import { Environment } from './environment';

export type RunStage = 'parse' | 'resolve' | 'runtime';

export type RunSourceResult =
  | { ok: true; diagnostics: Diagnostic[] }
  | { ok: false; stage: RunStage; errors: string[]; diagnostics: Diagnostic[] };

export interface Session {
  interpreter: Interpreter;
  globals: Environment;
}

/**
 * Create an interpreter together with its global scope.
 */
export function createSession(options: InterpreterOptions = {}): Session {
  const interpreter = new Interpreter(options);
  return { interpreter, globals: interpreter.createGlobalEnvironment() };
}

/**
 * Run `source` inside an existing session, so globals defined by earlier
 * inputs stay visible (used by the REPL).
 */
export function runInSession(session: Session, source: string): RunSourceResult {
  const parsed = parse(source);
  if (parsed.hasErrors) {
    return {
      ok: false,
      stage: 'parse',
      errors: parsed.errors.map(e => `SyntaxError [line ${e.line}, col ${e.column}]: ${e.message}`),
      diagnostics: [],
    };
  }

  const diagnostics = resolve(parsed.program);
  if (hasErrors(diagnostics)) {
    return {
      ok: false,
      stage: 'resolve',
      errors: diagnostics.filter(d => d.severity === 'error').map(formatDiagnostic),
      diagnostics,
    };
  }

  const result = session.interpreter.run(parsed.program, session.globals);
  if (!result.ok) {
    return { ok: false, stage: 'runtime', errors: [result.error.message], diagnostics };
  }
  return { ok: true, diagnostics };
}

/**
 * Run `source` on a fresh interpreter and global scope.
 */
export function runSource(source: string, options: InterpreterOptions = {}): RunSourceResult {
  return runInSession(createSession(options), source);
}

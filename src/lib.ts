/**
 * Public API of the Brook interpreter.
 */

export * from './ast';
export { Environment } from './environment';
export * from './errors';
export * from './values';
export { Lexer, tokenize } from './lexer';
export type { Token, TokenType } from './lexer';
export { Parser, parse } from './parser';
export type { ParseError, ParseResult } from './parser';
export { Resolver, resolve } from './resolver';
export * from './diagnostics';
export {
  Interpreter,
  DEFAULT_MAX_CALL_DEPTH,
  stdoutSink,
} from './interpreter';
export type { InterpreterOptions, OutputSink, RunResult } from './interpreter';
export { createSession, runInSession, runSource } from './runner';
export type { RunSourceResult, RunStage, Session } from './runner';

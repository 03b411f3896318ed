/**
 * Brook REPL: interactive read-eval-print loop.
 *
 * Usage: brook repl
 *
 * Features:
 *   - Persistent global scope across inputs
 *   - Multi-line input (detects unclosed braces/parens)
 *   - Special commands: :help, :quit, :env, :ast, :reset
 *   - Errors are printed and the loop continues
 */

import * as readline from 'readline';
import { parse } from './parser';
import { stmtToString } from './ast';
import { valueToString } from './values';
import { InterpreterOptions } from './interpreter';
import { createSession, runInSession, RunSourceResult, Session } from './runner';
import { formatDiagnostic } from './diagnostics';

export const VERSION = '0.1.0';

const QUIT_WORDS: ReadonlySet<string> = new Set([':quit', ':q', 'exit', 'quit', 'q']);

/**
 * Mutable REPL state: the session plus any unfinished multi-line input.
 */
export class ReplState {
  session: Session;
  buffer = '';
  private readonly options: InterpreterOptions;

  constructor(options: InterpreterOptions = {}) {
    this.options = options;
    this.session = createSession(options);
  }

  reset(): void {
    this.session = createSession(this.options);
    this.buffer = '';
  }

  get multiLine(): boolean {
    return this.buffer !== '';
  }
}

export type ReplAction = 'continue' | 'more' | 'quit';

/**
 * Feed one input line to the REPL. Program output goes to the session's
 * sink; REPL messages go to `log`.
 */
export function handleLine(state: ReplState, line: string, log: (msg: string) => void): ReplAction {
  const trimmed = line.trim();

  // Handle special commands (only when not in multi-line mode)
  if (!state.multiLine) {
    if (QUIT_WORDS.has(trimmed.toLowerCase())) return 'quit';
    if (trimmed.startsWith(':')) {
      handleCommand(trimmed, state, log);
      return 'continue';
    }
  }

  state.buffer += (state.buffer ? '\n' : '') + line;
  if (hasUnclosedDelimiters(state.buffer)) {
    return 'more';
  }

  const input = state.buffer.trim();
  state.buffer = '';
  if (input === '') return 'continue';

  let result: RunSourceResult;
  try {
    result = runInSession(state.session, input);
  } catch (e) {
    log(`  Error: ${e instanceof Error ? e.message : String(e)}`);
    return 'continue';
  }
  for (const d of result.diagnostics) {
    if (d.severity === 'warning') log(`  ${formatDiagnostic(d)}`);
  }
  if (!result.ok) {
    for (const err of result.errors) log(`  ${err}`);
  }
  return 'continue';
}

/**
 * Check whether the input has unclosed delimiters.
 */
export function hasUnclosedDelimiters(input: string): boolean {
  let braces = 0;
  let parens = 0;
  let inString = false;

  for (let i = 0; i < input.length; i++) {
    const ch = input[i];

    if (inString) {
      if (ch === '"') inString = false;
      continue;
    }

    if (ch === '"') {
      inString = true;
      continue;
    }

    // Skip line comments
    if (ch === '/' && input[i + 1] === '/') {
      while (i < input.length && input[i] !== '\n') i++;
      continue;
    }

    switch (ch) {
      case '{': braces++; break;
      case '}': braces--; break;
      case '(': parens++; break;
      case ')': parens--; break;
    }
  }

  return inString || braces > 0 || parens > 0;
}

/**
 * Handle a REPL special command.
 */
function handleCommand(cmd: string, state: ReplState, log: (msg: string) => void): void {
  const parts = cmd.split(/\s+/);
  const command = parts[0];

  switch (command) {
    case ':help':
    case ':h':
      log('');
      log('REPL Commands:');
      log('  :help, :h       Show this help message');
      log('  :quit, :q       Exit the REPL (also: exit, quit, q)');
      log('  :env            Show global variables');
      log('  :ast <code>     Show the parsed form of some code');
      log('  :reset          Start over with a fresh global scope');
      log('');
      log('Tips:');
      log('  - Multi-line input: leave braces/parens unclosed');
      log('  - Variables and functions persist between inputs');
      log('');
      break;

    case ':env':
      printEnvironment(state.session, log);
      break;

    case ':ast': {
      const code = cmd.slice(command.length).trim();
      if (!code) {
        log('Usage: :ast <code>');
        break;
      }
      const result = parse(code);
      if (result.hasErrors) {
        for (const err of result.errors) log(`  Parse error at line ${err.line}, col ${err.column}: ${err.message}`);
        break;
      }
      for (const stmt of result.program) log(stmtToString(stmt));
      break;
    }

    case ':reset':
      state.reset();
      log('Interpreter state reset.');
      break;

    default:
      log(`Unknown command: ${command}. Type :help for available commands.`);
      break;
  }
}

/**
 * Print the global bindings, skipping builtins.
 */
function printEnvironment(session: Session, log: (msg: string) => void): void {
  const names = session.globals.names().filter(name => session.globals.get(name).kind !== 'builtin');
  if (names.length === 0) {
    log('  (no user-defined variables — only builtins)');
    return;
  }
  for (const name of names) {
    const preview = valueToString(session.globals.get(name));
    const truncated = preview.length > 60 ? preview.slice(0, 57) + '...' : preview;
    log(`  ${name} = ${truncated}`);
  }
}

/**
 * Start the Brook REPL.
 */
export function startRepl(options: InterpreterOptions = {}): void {
  const state = new ReplState(options);

  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
    prompt: 'brook> ',
    terminal: true,
  });

  console.log(`Brook REPL v${VERSION}`);
  console.log('Type :help for commands, :quit to exit.\n');

  rl.prompt();

  rl.on('line', (line: string) => {
    const action = handleLine(state, line, msg => console.log(msg));
    switch (action) {
      case 'quit':
        rl.close();
        return;
      case 'more':
        process.stdout.write('  ... ');
        return;
      case 'continue':
        rl.prompt();
        return;
    }
  });

  rl.on('close', () => {
    console.log('\nGoodbye!');
    process.exit(0);
  });
}

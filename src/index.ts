#!/usr/bin/env node
/**
 * Brook interpreter CLI entry point.
 *
 * Usage: brook <file.brook>
 *        brook run <file.brook>
 *        brook check <file.brook> [...]
 *        brook repl
 *        brook --eval "<code>"
 *
 * Any command accepts --max-depth <n> to bound nested calls.
 */

import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { parse } from './parser';
import { resolve } from './resolver';
import { formatDiagnostic, hasErrors } from './diagnostics';
import { DEFAULT_MAX_CALL_DEPTH, InterpreterOptions } from './interpreter';
import { runSource } from './runner';
import { startRepl, VERSION } from './repl';

const cliOptionsSchema = z.object({
  maxDepth: z.coerce
    .number({ invalid_type_error: '--max-depth must be a number' })
    .int('--max-depth must be an integer')
    .positive('--max-depth must be positive')
    .default(DEFAULT_MAX_CALL_DEPTH),
});

export type CliOptions = z.infer<typeof cliOptionsSchema>;

export interface ParsedArgs {
  positional: string[];
  options: CliOptions;
}

/**
 * Split argv into positional arguments and validated options.
 * Throws a usage message on an invalid option.
 */
export function parseArgs(args: string[]): ParsedArgs {
  const positional: string[] = [];
  const raw: Record<string, string> = {};

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === '--max-depth') {
      const value = args[i + 1];
      if (value === undefined) throw new Error('--max-depth requires a value');
      raw.maxDepth = value;
      i++;
    } else if (arg.startsWith('--max-depth=')) {
      raw.maxDepth = arg.slice('--max-depth='.length);
    } else {
      positional.push(arg);
    }
  }

  const parsed = cliOptionsSchema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(parsed.error.issues.map(issue => issue.message).join('; '));
  }
  return { positional, options: parsed.data };
}

function interpreterOptions(options: CliOptions): InterpreterOptions {
  return { maxCallDepth: options.maxDepth };
}

function main(): void {
  let parsed: ParsedArgs;
  try {
    parsed = parseArgs(process.argv.slice(2));
  } catch (e) {
    console.error(`Error: ${e instanceof Error ? e.message : String(e)}`);
    process.exit(1);
  }
  const args = parsed.positional;

  if (args.length === 0 || args[0] === '--help' || args[0] === '-h') {
    printUsage();
    process.exit(0);
  }

  // Handle `check` command
  if (args[0] === 'check') {
    const files = args.slice(1);
    if (files.length === 0) {
      console.error('Error: check requires at least one file argument');
      process.exit(1);
    }
    process.exit(runCheck(files));
  }

  // Handle `repl` command
  if (args[0] === 'repl') {
    startRepl(interpreterOptions(parsed.options));
    return; // REPL runs its own event loop
  }

  let source: string;

  if (args[0] === '--eval' || args[0] === '-e') {
    if (args.length < 2) {
      console.error('Error: --eval requires a code argument');
      process.exit(1);
    }
    source = args[1];
  } else if (args[0] === 'run' && args.length >= 2) {
    // `brook run <file.brook>`
    source = readFile(args[1]);
  } else {
    // `brook <file.brook>` (shorthand)
    source = readFile(args[0]);
  }

  const result = runSource(source, interpreterOptions(parsed.options));
  for (const d of result.diagnostics) {
    if (d.severity === 'warning') console.error(formatDiagnostic(d));
  }
  if (!result.ok) {
    for (const err of result.errors) console.error(err);
    process.exit(1);
  }
}

/**
 * Run parse and resolve validation on one or more files.
 * Returns 0 if all files are clean, 1 if any have errors.
 */
function runCheck(files: string[]): number {
  let hasAnyErrors = false;

  for (const filepath of files) {
    const resolved = path.resolve(filepath);
    if (!fs.existsSync(resolved)) {
      console.error(`Error: File not found: ${resolved}`);
      hasAnyErrors = true;
      continue;
    }

    const result = parse(fs.readFileSync(resolved, 'utf-8'));

    if (result.hasErrors) {
      hasAnyErrors = true;
      const count = result.errors.length;
      console.log(`✗ ${filepath} — ${count} parse error${count === 1 ? '' : 's'}`);
      for (const err of result.errors) {
        console.log(`  Line ${err.line}, Col ${err.column}: ${err.message}`);
      }
      continue;
    }

    const diagnostics = resolve(result.program);
    if (diagnostics.length === 0) {
      console.log(`✓ ${filepath} — no errors`);
      continue;
    }

    if (hasErrors(diagnostics)) hasAnyErrors = true;
    const errors = diagnostics.filter(d => d.severity === 'error').length;
    const warnings = diagnostics.length - errors;
    const parts: string[] = [];
    if (errors > 0) parts.push(`${errors} error${errors === 1 ? '' : 's'}`);
    if (warnings > 0) parts.push(`${warnings} warning${warnings === 1 ? '' : 's'}`);
    console.log(`✗ ${filepath} — ${parts.join(', ')}`);
    for (const d of diagnostics) {
      console.log(`  ${formatDiagnostic(d)}`);
    }
  }

  return hasAnyErrors ? 1 : 0;
}

function readFile(filepath: string): string {
  const resolved = path.resolve(filepath);
  if (!fs.existsSync(resolved)) {
    console.error(`Error: File not found: ${resolved}`);
    process.exit(1);
  }
  return fs.readFileSync(resolved, 'utf-8');
}

function printUsage(): void {
  console.log(`Brook v${VERSION}`);
  console.log('');
  console.log('Usage:');
  console.log('  brook <file.brook>                  Run a Brook file');
  console.log('  brook run <file.brook>              Run a Brook file');
  console.log('  brook check <file.brook> [...]      Check files for parse and scope errors');
  console.log('  brook repl                          Start interactive REPL');
  console.log('  brook --eval "<code>"               Evaluate inline code');
  console.log('  brook --help                        Show this help');
  console.log('');
  console.log('Options:');
  console.log(`  --max-depth <n>                     Maximum call depth (default ${DEFAULT_MAX_CALL_DEPTH})`);
}

if (require.main === module) {
  main();
}

/**
 * Tree-walking interpreter for the Brook programming language.
 *
 * Evaluates a parsed program by recursively visiting statement and
 * expression nodes against a current Environment.
 */

import { assertNever, Expr, ExprOf, FunctionDef, Program, Stmt, StmtOf } from './ast';
import { Environment } from './environment';
import {
  BrookValue,
  BrookFunction,
  BrookBuiltin,
  mkNumber,
  mkString,
  mkBool,
  mkNil,
  mkFunction,
  isCallable,
  isTruthy,
  valueToString,
  valuesEqual,
  numberToString,
  arityOf,
  calleeName,
} from './values';
import {
  BrookRuntimeError,
  UndefinedVariableError,
  NotCallableError,
  ArityMismatchError,
  TypeMismatchError,
  StackOverflowError,
  ReturnSignal,
} from './errors';
import { registerBuiltins } from './builtins';

/** Receives one line of program output per `print`. */
export type OutputSink = (line: string) => void;

export interface InterpreterOptions {
  /** Where `print` writes; defaults to stdout */
  output?: OutputSink;
  /** Deepest allowed nesting of calls before StackOverflow */
  maxCallDepth?: number;
  /** Millisecond clock behind the `clock` builtin */
  now?: () => number;
}

export type RunResult =
  | { ok: true }
  | { ok: false; error: BrookRuntimeError };

export const DEFAULT_MAX_CALL_DEPTH = 512;

export const stdoutSink: OutputSink = (line) => {
  process.stdout.write(line + '\n');
};

export class Interpreter {
  private readonly output: OutputSink;
  private readonly maxCallDepth: number;
  private readonly now: () => number;
  /** Next closure id per global scope, so each fresh scope counts from 1 */
  private readonly functionIds = new WeakMap<Environment, number>();
  private callDepth = 0;

  constructor(options: InterpreterOptions = {}) {
    this.output = options.output ?? stdoutSink;
    this.maxCallDepth = options.maxCallDepth ?? DEFAULT_MAX_CALL_DEPTH;
    this.now = options.now ?? Date.now;
  }

  /**
   * Build a root scope holding the builtins.
   */
  createGlobalEnvironment(): Environment {
    const env = new Environment();
    registerBuiltins(env, this.now);
    return env;
  }

  /**
   * Execute a program to completion or to the first runtime error.
   * A top-level `return` ends the program normally. Host errors that are
   * not Brook runtime errors are rethrown.
   */
  run(program: Program, globalEnv: Environment): RunResult {
    this.callDepth = 0;
    try {
      this.execBlock(program, globalEnv);
      return { ok: true };
    } catch (e) {
      if (e instanceof ReturnSignal) {
        return { ok: true };
      }
      if (e instanceof BrookRuntimeError) {
        return { ok: false, error: e };
      }
      throw e;
    }
  }

  // ==================================================================
  // Statements
  // ==================================================================

  /**
   * Main dispatch: execute any statement.
   */
  execStmt(stmt: Stmt, env: Environment): void {
    switch (stmt.type) {
      case 'expression':
        this.evalExpr(stmt.expression, env);
        return;
      case 'print':
        this.output(valueToString(this.evalExpr(stmt.expression, env)));
        return;
      case 'var':
        env.define(stmt.name, stmt.initializer ? this.evalExpr(stmt.initializer, env) : mkNil());
        return;
      case 'function':
        env.define(stmt.definition.name, this.makeClosure(stmt.definition, env));
        return;
      case 'return':
        throw new ReturnSignal(stmt.value ? this.evalExpr(stmt.value, env) : mkNil());
      case 'block':
        this.execBlock(stmt.statements, env.child());
        return;
      case 'if':
        this.execIf(stmt, env);
        return;
      case 'while':
        while (isTruthy(this.evalExpr(stmt.condition, env))) {
          this.execStmt(stmt.body, env);
        }
        return;
      default:
        assertNever(stmt);
    }
  }

  /**
   * Run statements in order in the given scope. The caller decides whether
   * that scope is fresh.
   */
  execBlock(statements: Stmt[], env: Environment): void {
    for (const stmt of statements) {
      this.execStmt(stmt, env);
    }
  }

  private execIf(stmt: StmtOf<'if'>, env: Environment): void {
    if (isTruthy(this.evalExpr(stmt.condition, env))) {
      this.execStmt(stmt.thenBranch, env);
    } else if (stmt.elseBranch) {
      this.execStmt(stmt.elseBranch, env);
    }
  }

  // ==================================================================
  // Expressions
  // ==================================================================

  evalExpr(expr: Expr, env: Environment): BrookValue {
    switch (expr.type) {
      case 'literal':
        return this.evalLiteral(expr);
      case 'variable':
        return this.located(expr, () => env.get(expr.name));
      case 'assign': {
        const value = this.evalExpr(expr.value, env);
        this.located(expr, () => env.assign(expr.name, value));
        return value;
      }
      case 'grouping':
        return this.evalExpr(expr.expression, env);
      case 'logical':
        return this.evalLogical(expr, env);
      case 'unary':
        return this.evalUnary(expr, env);
      case 'binary':
        return this.evalBinary(expr, env);
      case 'call':
        return this.evalCall(expr, env);
      case 'lambda':
        return this.makeClosure(expr.definition, env);
      default:
        return assertNever(expr);
    }
  }

  private evalLiteral(expr: ExprOf<'literal'>): BrookValue {
    const { value } = expr;
    if (value === null) return mkNil();
    if (typeof value === 'number') return mkNumber(value);
    if (typeof value === 'string') return mkString(value);
    return mkBool(value);
  }

  /**
   * Fill in the source position of an UndefinedVariableError raised by
   * an environment lookup.
   */
  private located<T>(expr: Expr, fn: () => T): T {
    try {
      return fn();
    } catch (e) {
      if (e instanceof UndefinedVariableError) {
        throw e.at(expr.line, expr.column);
      }
      throw e;
    }
  }

  private evalLogical(expr: ExprOf<'logical'>, env: Environment): BrookValue {
    const left = this.evalExpr(expr.left, env);
    if (expr.operator === 'or') {
      if (isTruthy(left)) return left;
    } else if (!isTruthy(left)) {
      return left;
    }
    return this.evalExpr(expr.right, env);
  }

  private evalUnary(expr: ExprOf<'unary'>, env: Environment): BrookValue {
    const operand = this.evalExpr(expr.operand, env);
    switch (expr.operator) {
      case '-':
        if (operand.kind === 'number') return mkNumber(-operand.value);
        throw new TypeMismatchError('-', [operand.kind], expr.line, expr.column);
      case '!':
        return mkBool(!isTruthy(operand));
    }
  }

  private evalBinary(expr: ExprOf<'binary'>, env: Environment): BrookValue {
    const left = this.evalExpr(expr.left, env);
    const right = this.evalExpr(expr.right, env);
    const op = expr.operator;

    switch (op) {
      case '==':
        return mkBool(valuesEqual(left, right));
      case '!=':
        return mkBool(!valuesEqual(left, right));
      case '+':
        if (left.kind === 'number' && right.kind === 'number') return mkNumber(left.value + right.value);
        if (left.kind === 'string' && right.kind === 'string') return mkString(left.value + right.value);
        if (left.kind === 'string' && right.kind === 'number') {
          return mkString(left.value + numberToString(right.value));
        }
        break;
      case '-':
        if (left.kind === 'number' && right.kind === 'number') return mkNumber(left.value - right.value);
        break;
      case '*':
        if (left.kind === 'number' && right.kind === 'number') return mkNumber(left.value * right.value);
        break;
      case '/':
        if (left.kind === 'number' && right.kind === 'number') return mkNumber(left.value / right.value);
        break;
      case '<':
      case '<=':
      case '>':
      case '>=':
        if (left.kind === 'number' && right.kind === 'number') {
          return mkBool(compare(op, left.value - right.value));
        }
        if (left.kind === 'string' && right.kind === 'string') {
          return mkBool(compare(op, compareStrings(left.value, right.value)));
        }
        break;
      default:
        return assertNever(op);
    }

    throw new TypeMismatchError(op, [left.kind, right.kind], expr.line, expr.column);
  }

  // ==================================================================
  // Functions
  // ==================================================================

  private makeClosure(definition: FunctionDef, env: Environment): BrookFunction {
    const root = env.root();
    const id = this.functionIds.get(root) ?? 1;
    this.functionIds.set(root, id + 1);
    return mkFunction(id, definition, env);
  }

  private evalCall(expr: ExprOf<'call'>, env: Environment): BrookValue {
    const callee = this.evalExpr(expr.callee, env);
    if (!isCallable(callee)) {
      throw new NotCallableError(callee, valueToString(callee), expr.line, expr.column);
    }

    // Arguments are evaluated in the caller's scope, left to right
    const args: BrookValue[] = [];
    for (const arg of expr.args) {
      args.push(this.evalExpr(arg, env));
    }

    const arity = arityOf(callee);
    if (args.length !== arity) {
      throw new ArityMismatchError(calleeName(callee), arity, args.length, expr.line, expr.column);
    }

    if (this.callDepth >= this.maxCallDepth) {
      throw new StackOverflowError(this.maxCallDepth, expr.line, expr.column);
    }
    this.callDepth++;
    try {
      return this.callFunction(callee, args);
    } catch (e) {
      // The host stack ran out before maxCallDepth did
      if (e instanceof RangeError) {
        throw new StackOverflowError(this.callDepth, expr.line, expr.column);
      }
      throw e;
    } finally {
      this.callDepth--;
    }
  }

  /**
   * Invoke a callable with already-evaluated, arity-checked arguments.
   * A closure's frame is parented to the environment it captured, not to
   * the caller's.
   */
  callFunction(callee: BrookFunction | BrookBuiltin, args: BrookValue[]): BrookValue {
    if (callee.kind === 'builtin') {
      return callee.fn(args);
    }

    const frame = Environment.childOf(callee.closure);
    callee.definition.params.forEach((param, i) => {
      frame.define(param.name, args[i]);
    });

    try {
      this.execBlock(callee.definition.body, frame);
    } catch (e) {
      if (e instanceof ReturnSignal) {
        return e.value;
      }
      throw e;
    }
    return mkNil();
  }
}

/** Code-unit order, not locale order. */
function compareStrings(a: string, b: string): number {
  if (a < b) return -1;
  return a > b ? 1 : 0;
}

/**
 * Apply a relational operator to the sign of `order`. A NaN order makes
 * every comparison false.
 */
function compare(op: '<' | '<=' | '>' | '>=', order: number): boolean {
  switch (op) {
    case '<': return order < 0;
    case '<=': return order <= 0;
    case '>': return order > 0;
    case '>=': return order >= 0;
  }
}

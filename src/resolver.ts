/**
 * Static scope check run before evaluation.
 *
 * Mirrors the scopes the interpreter will create (one per function body
 * and per block; the global scope is not tracked) and reports mistakes
 * that can be seen without running the program. It does not change how
 * names are looked up at run time.
 */

import { assertNever, Expr, FunctionDef, Position, Program, Stmt } from './ast';
import { Diagnostic } from './diagnostics';

interface LocalVar extends Position {
  /** false while the initializer is being resolved */
  defined: boolean;
  used: boolean;
  /** parameters and functions are not reported when unused */
  reportUnused: boolean;
}

type Scope = Map<string, LocalVar>;

export class Resolver {
  private scopes: Scope[] = [];
  private functionDepth = 0;
  private diagnostics: Diagnostic[] = [];

  resolve(program: Program): Diagnostic[] {
    this.scopes = [];
    this.functionDepth = 0;
    this.diagnostics = [];
    this.resolveStmts(program);
    return this.diagnostics;
  }

  private resolveStmts(stmts: Stmt[]): void {
    for (const stmt of stmts) this.resolveStmt(stmt);
  }

  private resolveStmt(stmt: Stmt): void {
    switch (stmt.type) {
      case 'expression':
      case 'print':
        this.resolveExpr(stmt.expression);
        return;
      case 'var':
        this.declare(stmt.name, stmt, true);
        if (stmt.initializer) this.resolveExpr(stmt.initializer);
        this.define(stmt.name);
        return;
      case 'function':
        // Defined before the body so the function can call itself
        this.declare(stmt.definition.name, stmt, false);
        this.define(stmt.definition.name);
        this.resolveFunction(stmt.definition);
        return;
      case 'return':
        if (this.functionDepth === 0) {
          this.error("Can't return from top-level code", stmt);
        }
        if (stmt.value) this.resolveExpr(stmt.value);
        return;
      case 'block':
        this.beginScope();
        this.resolveStmts(stmt.statements);
        this.endScope();
        return;
      case 'if':
        this.resolveExpr(stmt.condition);
        this.resolveStmt(stmt.thenBranch);
        if (stmt.elseBranch) this.resolveStmt(stmt.elseBranch);
        return;
      case 'while':
        this.resolveExpr(stmt.condition);
        this.resolveStmt(stmt.body);
        return;
      default:
        assertNever(stmt);
    }
  }

  private resolveExpr(expr: Expr): void {
    switch (expr.type) {
      case 'literal':
        return;
      case 'variable': {
        const local = this.innermost().get(expr.name);
        if (local !== undefined && !local.defined) {
          // The lookup falls through to an outer binding at run time
          this.warning(`Can't read local variable '${expr.name}' in its own initializer`, expr);
          this.markUsed(expr.name, this.scopes.length - 2);
          return;
        }
        this.markUsed(expr.name, this.scopes.length - 1);
        return;
      }
      case 'assign':
        this.resolveExpr(expr.value);
        return;
      case 'binary':
      case 'logical':
        this.resolveExpr(expr.left);
        this.resolveExpr(expr.right);
        return;
      case 'unary':
        this.resolveExpr(expr.operand);
        return;
      case 'grouping':
        this.resolveExpr(expr.expression);
        return;
      case 'call':
        this.resolveExpr(expr.callee);
        for (const arg of expr.args) this.resolveExpr(arg);
        return;
      case 'lambda':
        this.resolveFunction(expr.definition);
        return;
      default:
        assertNever(expr);
    }
  }

  private resolveFunction(definition: FunctionDef): void {
    this.functionDepth++;
    this.beginScope();
    for (const param of definition.params) {
      this.declare(param.name, param, false);
      this.define(param.name);
    }
    this.resolveStmts(definition.body);
    this.endScope();
    this.functionDepth--;
  }

  // ---- Scope helpers ----

  private innermost(): Scope {
    return this.scopes.length > 0 ? this.scopes[this.scopes.length - 1] : new Map();
  }

  private beginScope(): void {
    this.scopes.push(new Map());
  }

  private endScope(): void {
    const scope = this.scopes.pop();
    if (scope === undefined) return;
    for (const [name, local] of scope) {
      if (local.reportUnused && !local.used) {
        this.warning(`Local variable '${name}' is never used`, local);
      }
    }
  }

  private declare(name: string, pos: Position, reportUnused: boolean): void {
    if (this.scopes.length === 0) return;
    const scope = this.innermost();
    if (scope.has(name)) {
      // a warning only: define overwrites at run time
      this.warning(`Variable '${name}' is already declared in this scope`, pos);
    }
    scope.set(name, { defined: false, used: false, reportUnused, line: pos.line, column: pos.column });
  }

  private define(name: string): void {
    const local = this.innermost().get(name);
    if (local !== undefined) local.defined = true;
  }

  /** Mark the nearest declaration of `name` at or outside scope `from` as read. */
  private markUsed(name: string, from: number): void {
    for (let i = from; i >= 0; i--) {
      const local = this.scopes[i].get(name);
      if (local !== undefined) {
        local.used = true;
        return;
      }
    }
  }

  private error(message: string, pos: Position): void {
    this.diagnostics.push({ severity: 'error', message, line: pos.line, column: pos.column });
  }

  private warning(message: string, pos: Position): void {
    this.diagnostics.push({ severity: 'warning', message, line: pos.line, column: pos.column });
  }
}

export function resolve(program: Program): Diagnostic[] {
  return new Resolver().resolve(program);
}

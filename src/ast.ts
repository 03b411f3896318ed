/**
 * Syntax tree for Brook programs.
 *
 * Statements and expressions are closed discriminated unions keyed on
 * `type`; the interpreter and resolver switch over them exhaustively.
 * Every node records the 1-based line and 0-based column of its first token.
 */

export interface Position {
  line: number;
  column: number;
}

export type LiteralValue = number | string | boolean | null;

export type BinaryOperator = '+' | '-' | '*' | '/' | '<' | '<=' | '>' | '>=' | '==' | '!=';
export type LogicalOperator = 'and' | 'or';
export type UnaryOperator = '-' | '!';

export interface Param extends Position {
  name: string;
}

/** Parameter list and body shared by declarations and anonymous functions. */
export interface FunctionDef extends Position {
  name: string;
  params: Param[];
  body: Stmt[];
}

export type Expr =
  | ({ type: 'literal'; value: LiteralValue } & Position)
  | ({ type: 'variable'; name: string } & Position)
  | ({ type: 'assign'; name: string; value: Expr } & Position)
  | ({ type: 'binary'; operator: BinaryOperator; left: Expr; right: Expr } & Position)
  | ({ type: 'logical'; operator: LogicalOperator; left: Expr; right: Expr } & Position)
  | ({ type: 'unary'; operator: UnaryOperator; operand: Expr } & Position)
  | ({ type: 'grouping'; expression: Expr } & Position)
  | ({ type: 'call'; callee: Expr; args: Expr[] } & Position)
  | ({ type: 'lambda'; definition: FunctionDef } & Position);

export type Stmt =
  | ({ type: 'expression'; expression: Expr } & Position)
  | ({ type: 'print'; expression: Expr } & Position)
  | ({ type: 'var'; name: string; initializer: Expr | null } & Position)
  | ({ type: 'function'; definition: FunctionDef } & Position)
  | ({ type: 'return'; value: Expr | null } & Position)
  | ({ type: 'block'; statements: Stmt[] } & Position)
  | ({ type: 'if'; condition: Expr; thenBranch: Stmt; elseBranch: Stmt | null } & Position)
  | ({ type: 'while'; condition: Expr; body: Stmt } & Position);

export type Program = Stmt[];

export type ExprOf<T extends Expr['type']> = Extract<Expr, { type: T }>;
export type StmtOf<T extends Stmt['type']> = Extract<Stmt, { type: T }>;

/**
 * Used in the default branch of an exhaustive switch.
 */
export function assertNever(node: never): never {
  throw new Error(`Unhandled node: ${JSON.stringify(node)}`);
}

/**
 * Render an expression as a parenthesized prefix form, e.g. `(+ 1 (* 2 3))`.
 * Used by parser tests and the REPL's `:ast` command.
 */
export function exprToString(expr: Expr): string {
  switch (expr.type) {
    case 'literal':
      if (expr.value === null) return 'nil';
      if (typeof expr.value === 'string') return JSON.stringify(expr.value);
      return String(expr.value);
    case 'variable':
      return expr.name;
    case 'assign':
      return `(= ${expr.name} ${exprToString(expr.value)})`;
    case 'binary':
    case 'logical':
      return `(${expr.operator} ${exprToString(expr.left)} ${exprToString(expr.right)})`;
    case 'unary':
      return `(${expr.operator} ${exprToString(expr.operand)})`;
    case 'grouping':
      return `(group ${exprToString(expr.expression)})`;
    case 'call':
      return `(call ${[expr.callee, ...expr.args].map(exprToString).join(' ')})`;
    case 'lambda':
      return `(fn/${expr.definition.params.length})`;
    default:
      return assertNever(expr);
  }
}

export function stmtToString(stmt: Stmt): string {
  switch (stmt.type) {
    case 'expression':
      return exprToString(stmt.expression);
    case 'print':
      return `(print ${exprToString(stmt.expression)})`;
    case 'var':
      return stmt.initializer
        ? `(var ${stmt.name} ${exprToString(stmt.initializer)})`
        : `(var ${stmt.name})`;
    case 'function':
      return `(fn ${stmt.definition.name} (${stmt.definition.params.map(p => p.name).join(' ')}) ${stmt.definition.body.map(stmtToString).join(' ')})`;
    case 'return':
      return stmt.value ? `(return ${exprToString(stmt.value)})` : '(return)';
    case 'block':
      return `(block ${stmt.statements.map(stmtToString).join(' ')})`;
    case 'if':
      return stmt.elseBranch
        ? `(if ${exprToString(stmt.condition)} ${stmtToString(stmt.thenBranch)} ${stmtToString(stmt.elseBranch)})`
        : `(if ${exprToString(stmt.condition)} ${stmtToString(stmt.thenBranch)})`;
    case 'while':
      return `(while ${exprToString(stmt.condition)} ${stmtToString(stmt.body)})`;
    default:
      return assertNever(stmt);
  }
}

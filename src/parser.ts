/**
 * Recursive descent parser over the token list from the lexer.
 */

import {
  BinaryOperator,
  Expr,
  FunctionDef,
  Param,
  Program,
  Stmt,
} from './ast';
import { BrookSyntaxError } from './errors';
import { Token, TokenType, tokenize } from './lexer';

export interface ParseResult {
  program: Program;
  hasErrors: boolean;
  errors: ParseError[];
}

export interface ParseError {
  message: string;
  line: number;
  column: number;
}

const MAX_PARAMS = 255;

/** Deepest recursion through statements, assignments, operands and primaries. */
const MAX_NESTING = 256;

/** Keywords that begin a statement; error recovery stops before these. */
const STATEMENT_STARTS: ReadonlySet<TokenType> = new Set<TokenType>([
  'class', 'fn', 'var', 'for', 'if', 'while', 'print', 'return',
]);

/**
 * Thrown inside the parser to unwind to the nearest declaration, where the
 * error is recorded and the parser resynchronizes.
 */
class ParseFailure extends Error {}

export class Parser {
  private readonly tokens: Token[];
  private current = 0;
  private depth = 0;
  private readonly errors: ParseError[] = [];

  constructor(tokens: Token[]) {
    this.tokens = tokens;
  }

  parseProgram(): ParseResult {
    const program: Stmt[] = [];
    while (!this.isAtEnd()) {
      const stmt = this.declaration();
      if (stmt !== null) program.push(stmt);
    }
    return { program, hasErrors: this.errors.length > 0, errors: this.errors };
  }

  // ==================================================================
  // Declarations & statements
  // ==================================================================

  private declaration(): Stmt | null {
    try {
      if (this.check('fn') && this.checkNext('identifier')) {
        this.advance();
        return this.functionDeclaration();
      }
      if (this.match('var')) return this.varDeclaration();
      return this.statement();
    } catch (e) {
      if (e instanceof ParseFailure) {
        this.synchronize();
        return null;
      }
      throw e;
    }
  }

  private functionDeclaration(): Stmt {
    const keyword = this.previous();
    const name = this.consume('identifier', 'Expected function name');
    const definition = this.functionRest(name.lexeme, keyword);
    return { type: 'function', definition, line: keyword.line, column: keyword.column };
  }

  /** Parameters and body, after the `fn` keyword (and name, if any). */
  private functionRest(name: string, keyword: Token): FunctionDef {
    this.consume('(', `Expected '(' after ${name === 'anonymous' ? "'fn'" : 'function name'}`);
    const params: Param[] = [];
    if (!this.check(')')) {
      do {
        if (params.length >= MAX_PARAMS) {
          this.report(this.peek(), `Can't have more than ${MAX_PARAMS} parameters`);
        }
        const param = this.consume('identifier', 'Expected parameter name');
        params.push({ name: param.lexeme, line: param.line, column: param.column });
      } while (this.match(','));
    }
    this.consume(')', "Expected ')' after parameters");
    this.consume('{', "Expected '{' before function body");
    const body = this.blockStatements();
    return { name, params, body, line: keyword.line, column: keyword.column };
  }

  private varDeclaration(): Stmt {
    const keyword = this.previous();
    const name = this.consume('identifier', 'Expected variable name');
    const initializer = this.match('=') ? this.expression() : null;
    this.consume(';', "Expected ';' after variable declaration");
    return { type: 'var', name: name.lexeme, initializer, line: keyword.line, column: keyword.column };
  }

  private statement(): Stmt {
    return this.nested(() => this.statementInner());
  }

  private statementInner(): Stmt {
    if (this.match('print')) return this.printStatement();
    if (this.match('return')) return this.returnStatement();
    if (this.match('if')) return this.ifStatement();
    if (this.match('while')) return this.whileStatement();
    if (this.match('for')) return this.forStatement();
    if (this.match('{')) {
      const brace = this.previous();
      return { type: 'block', statements: this.blockStatements(), line: brace.line, column: brace.column };
    }
    if (this.check('class') || this.check('this') || this.check('super')) {
      throw this.error(this.peek(), `'${this.peek().lexeme}' is reserved and not supported`);
    }
    return this.expressionStatement();
  }

  private printStatement(): Stmt {
    const keyword = this.previous();
    const expression = this.expression();
    this.consume(';', "Expected ';' after value");
    return { type: 'print', expression, line: keyword.line, column: keyword.column };
  }

  private returnStatement(): Stmt {
    const keyword = this.previous();
    const value = this.check(';') ? null : this.expression();
    this.consume(';', "Expected ';' after return value");
    return { type: 'return', value, line: keyword.line, column: keyword.column };
  }

  private ifStatement(): Stmt {
    const keyword = this.previous();
    this.consume('(', "Expected '(' after 'if'");
    const condition = this.expression();
    this.consume(')', "Expected ')' after if condition");
    const thenBranch = this.statement();
    const elseBranch = this.match('else') ? this.statement() : null;
    return { type: 'if', condition, thenBranch, elseBranch, line: keyword.line, column: keyword.column };
  }

  private whileStatement(): Stmt {
    const keyword = this.previous();
    this.consume('(', "Expected '(' after 'while'");
    const condition = this.expression();
    this.consume(')', "Expected ')' after condition");
    const body = this.statement();
    return { type: 'while', condition, body, line: keyword.line, column: keyword.column };
  }

  /**
   * `for (init; cond; incr) body` becomes
   * `{ init; while (cond) { body; incr; } }`.
   */
  private forStatement(): Stmt {
    const keyword = this.previous();
    const pos = { line: keyword.line, column: keyword.column };
    this.consume('(', "Expected '(' after 'for'");

    let initializer: Stmt | null;
    if (this.match(';')) {
      initializer = null;
    } else if (this.match('var')) {
      initializer = this.varDeclaration();
    } else {
      initializer = this.expressionStatement();
    }

    const condition: Expr = this.check(';')
      ? { type: 'literal', value: true, ...pos }
      : this.expression();
    this.consume(';', "Expected ';' after loop condition");

    const increment = this.check(')') ? null : this.expression();
    this.consume(')', "Expected ')' after for clauses");

    let body = this.statement();
    if (increment !== null) {
      body = {
        type: 'block',
        statements: [body, { type: 'expression', expression: increment, line: increment.line, column: increment.column }],
        ...pos,
      };
    }

    let loop: Stmt = { type: 'while', condition, body, ...pos };
    if (initializer !== null) {
      loop = { type: 'block', statements: [initializer, loop], ...pos };
    }
    return loop;
  }

  /** Statements up to and including the closing `}`. */
  private blockStatements(): Stmt[] {
    const statements: Stmt[] = [];
    while (!this.check('}') && !this.isAtEnd()) {
      const stmt = this.declaration();
      if (stmt !== null) statements.push(stmt);
    }
    this.consume('}', "Expected '}' after block");
    return statements;
  }

  private expressionStatement(): Stmt {
    const expression = this.expression();
    this.consume(';', "Expected ';' after expression");
    return { type: 'expression', expression, line: expression.line, column: expression.column };
  }

  // ==================================================================
  // Expressions
  // ==================================================================

  private expression(): Expr {
    return this.assignment();
  }

  private assignment(): Expr {
    return this.nested(() => this.assignmentInner());
  }

  private assignmentInner(): Expr {
    const expr = this.or();

    if (this.match('=')) {
      const equals = this.previous();
      const value = this.assignment();
      if (expr.type === 'variable') {
        return { type: 'assign', name: expr.name, value, line: expr.line, column: expr.column };
      }
      // Reported without unwinding
      this.report(equals, 'Invalid assignment target');
    }

    return expr;
  }

  private or(): Expr {
    let expr = this.and();
    while (this.match('or')) {
      const right = this.and();
      expr = { type: 'logical', operator: 'or', left: expr, right, line: expr.line, column: expr.column };
    }
    return expr;
  }

  private and(): Expr {
    let expr = this.binary(0);
    while (this.match('and')) {
      const right = this.binary(0);
      expr = { type: 'logical', operator: 'and', left: expr, right, line: expr.line, column: expr.column };
    }
    return expr;
  }

  /**
   * Left-associative binary levels, loosest first:
   * equality, comparison, term, factor.
   */
  private static readonly LEVELS: ReadonlyArray<readonly BinaryOperator[]> = [
    ['!=', '=='],
    ['>', '>=', '<', '<='],
    ['-', '+'],
    ['/', '*'],
  ];

  private binary(level: number): Expr {
    const operators = Parser.LEVELS[level];
    if (operators === undefined) return this.unary();

    let expr = this.binary(level + 1);
    for (;;) {
      const operator = operators.find(op => this.check(op));
      if (operator === undefined) break;
      this.advance();
      const right = this.binary(level + 1);
      expr = { type: 'binary', operator, left: expr, right, line: expr.line, column: expr.column };
    }
    return expr;
  }

  private unary(): Expr {
    if (this.match('!') || this.match('-')) {
      const op = this.previous();
      const operand = this.nested(() => this.unary());
      return {
        type: 'unary',
        operator: op.type === '!' ? '!' : '-',
        operand,
        line: op.line,
        column: op.column,
      };
    }
    return this.call();
  }

  private call(): Expr {
    let expr = this.nested(() => this.primary());
    while (this.match('(')) {
      expr = this.finishCall(expr);
    }
    return expr;
  }

  private finishCall(callee: Expr): Expr {
    const args: Expr[] = [];
    if (!this.check(')')) {
      do {
        if (args.length >= MAX_PARAMS) {
          this.report(this.peek(), `Can't have more than ${MAX_PARAMS} arguments`);
        }
        args.push(this.expression());
      } while (this.match(','));
    }
    this.consume(')', "Expected ')' after arguments");
    return { type: 'call', callee, args, line: callee.line, column: callee.column };
  }

  private primary(): Expr {
    const token = this.peek();
    const pos = { line: token.line, column: token.column };

    switch (token.type) {
      case 'false':
        this.advance();
        return { type: 'literal', value: false, ...pos };
      case 'true':
        this.advance();
        return { type: 'literal', value: true, ...pos };
      case 'nil':
        this.advance();
        return { type: 'literal', value: null, ...pos };
      case 'number':
      case 'string':
        this.advance();
        return { type: 'literal', value: token.literal ?? null, ...pos };
      case 'identifier':
        this.advance();
        return { type: 'variable', name: token.lexeme, ...pos };
      case '(': {
        this.advance();
        const expression = this.expression();
        this.consume(')', "Expected ')' after expression");
        return { type: 'grouping', expression, ...pos };
      }
      case 'fn':
        this.advance();
        return { type: 'lambda', definition: this.functionRest('anonymous', token), ...pos };
      default:
        throw this.error(token, 'Expected expression');
    }
  }

  // ==================================================================
  // Token helpers
  // ==================================================================

  private match(type: TokenType): boolean {
    if (!this.check(type)) return false;
    this.advance();
    return true;
  }

  private consume(type: TokenType, message: string): Token {
    if (this.check(type)) return this.advance();
    throw this.error(this.peek(), message);
  }

  private check(type: TokenType): boolean {
    return this.peek().type === type;
  }

  private checkNext(type: TokenType): boolean {
    const next = this.tokens[this.current + 1];
    return next !== undefined && next.type === type;
  }

  private advance(): Token {
    if (!this.isAtEnd()) this.current++;
    return this.previous();
  }

  private isAtEnd(): boolean {
    return this.peek().type === 'eof';
  }

  private peek(): Token {
    return this.tokens[this.current];
  }

  private previous(): Token {
    return this.tokens[this.current - 1];
  }

  /** Fail with a parse error instead of exhausting the host stack. */
  private nested<T>(parse: () => T): T {
    if (this.depth >= MAX_NESTING) {
      throw this.error(this.peek(), 'Too much nesting');
    }
    this.depth++;
    try {
      return parse();
    } finally {
      this.depth--;
    }
  }

  private report(token: Token, message: string): void {
    const where = token.type === 'eof' ? 'at end' : `at '${token.lexeme}'`;
    this.errors.push({ message: `${message} ${where}`, line: token.line, column: token.column });
  }

  private error(token: Token, message: string): ParseFailure {
    this.report(token, message);
    return new ParseFailure(message);
  }

  /**
   * Discard tokens until the start of the next statement.
   */
  private synchronize(): void {
    this.advance();
    while (!this.isAtEnd()) {
      if (this.previous().type === ';') return;
      if (STATEMENT_STARTS.has(this.peek().type)) return;
      this.advance();
    }
  }
}

/**
 * Parse Brook source code into a program.
 *
 * @returns ParseResult with the statements and any errors
 */
export function parse(source: string): ParseResult {
  let tokens: Token[];
  try {
    tokens = tokenize(source);
  } catch (e) {
    if (e instanceof BrookSyntaxError) {
      return {
        program: [],
        hasErrors: true,
        errors: [{ message: e.detail, line: e.line, column: e.column }],
      };
    }
    throw e;
  }
  return new Parser(tokens).parseProgram();
}

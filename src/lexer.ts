/**
 * Lexer: turns Brook source text into a flat token list.
 */

import { BrookSyntaxError } from './errors';

export type TokenType =
  // Single-character tokens
  | '(' | ')' | '{' | '}' | ',' | '.' | '-' | '+' | ';' | '/' | '*'
  // One or two character tokens
  | '!' | '!=' | '=' | '==' | '<' | '<=' | '>' | '>='
  // Literals
  | 'identifier' | 'string' | 'number'
  // Keywords
  | 'and' | 'class' | 'else' | 'false' | 'for' | 'fn' | 'if' | 'nil' | 'or'
  | 'print' | 'return' | 'super' | 'this' | 'true' | 'var' | 'while'
  | 'eof';

export interface Token {
  type: TokenType;
  lexeme: string;
  literal?: string | number;
  /** 1-based line number */
  line: number;
  /** 0-based column */
  column: number;
}

const KEYWORDS: ReadonlyMap<string, TokenType> = new Map<string, TokenType>([
  ['and', 'and'],
  ['class', 'class'],
  ['else', 'else'],
  ['false', 'false'],
  ['for', 'for'],
  ['fn', 'fn'],
  ['if', 'if'],
  ['nil', 'nil'],
  ['or', 'or'],
  ['print', 'print'],
  ['return', 'return'],
  ['super', 'super'],
  ['this', 'this'],
  ['true', 'true'],
  ['var', 'var'],
  ['while', 'while'],
]);

const SINGLE: ReadonlyMap<string, TokenType> = new Map<string, TokenType>([
  ['(', '('], [')', ')'], ['{', '{'], ['}', '}'], [',', ','], ['.', '.'],
  ['-', '-'], ['+', '+'], [';', ';'], ['*', '*'],
]);

function isDigit(ch: string): boolean {
  return ch >= '0' && ch <= '9';
}

function isAlpha(ch: string): boolean {
  return (ch >= 'a' && ch <= 'z') || (ch >= 'A' && ch <= 'Z') || ch === '_';
}

function isAlphaNumeric(ch: string): boolean {
  return isAlpha(ch) || isDigit(ch);
}

export class Lexer {
  private readonly source: string;
  private readonly tokens: Token[] = [];
  private start = 0;
  private current = 0;
  private line = 1;
  private lineStart = 0;
  private startLine = 1;
  private startColumn = 0;

  constructor(source: string) {
    this.source = source;
  }

  /**
   * Scan the whole source. Throws BrookSyntaxError on the first bad character
   * or unterminated string.
   */
  scanTokens(): Token[] {
    while (!this.isAtEnd()) {
      this.start = this.current;
      this.startLine = this.line;
      this.startColumn = this.current - this.lineStart;
      this.scanToken();
    }
    this.tokens.push({
      type: 'eof',
      lexeme: '',
      line: this.line,
      column: this.current - this.lineStart,
    });
    return this.tokens;
  }

  private scanToken(): void {
    const c = this.advance();

    const single = SINGLE.get(c);
    if (single !== undefined) {
      this.addToken(single);
      return;
    }

    switch (c) {
      case '/':
        if (this.match('/')) {
          while (this.peek() !== '\n' && !this.isAtEnd()) this.advance();
        } else {
          this.addToken('/');
        }
        return;
      case '!':
        this.addToken(this.match('=') ? '!=' : '!');
        return;
      case '=':
        this.addToken(this.match('=') ? '==' : '=');
        return;
      case '<':
        this.addToken(this.match('=') ? '<=' : '<');
        return;
      case '>':
        this.addToken(this.match('=') ? '>=' : '>');
        return;
      case ' ':
      case '\r':
      case '\t':
        return;
      case '\n':
        this.newline();
        return;
      case '"':
        this.string();
        return;
      default:
        if (isDigit(c)) {
          this.number();
        } else if (isAlpha(c)) {
          this.identifier();
        } else {
          throw new BrookSyntaxError(`Unexpected character '${c}'`, this.startLine, this.startColumn);
        }
    }
  }

  private identifier(): void {
    while (isAlphaNumeric(this.peek())) this.advance();
    const text = this.source.slice(this.start, this.current);
    this.addToken(KEYWORDS.get(text) ?? 'identifier');
  }

  private number(): void {
    while (isDigit(this.peek())) this.advance();

    // A fractional part needs at least one digit after the dot
    if (this.peek() === '.' && isDigit(this.peekNext())) {
      this.advance();
      while (isDigit(this.peek())) this.advance();
    }

    const text = this.source.slice(this.start, this.current);
    this.addToken('number', Number(text));
  }

  private string(): void {
    while (this.peek() !== '"' && !this.isAtEnd()) {
      if (this.peek() === '\n') {
        this.advance();
        this.newline();
        continue;
      }
      this.advance();
    }

    if (this.isAtEnd()) {
      throw new BrookSyntaxError('Unterminated string', this.startLine, this.startColumn);
    }

    // closing quote
    this.advance();
    this.addToken('string', this.source.slice(this.start + 1, this.current - 1));
  }

  private newline(): void {
    this.line++;
    this.lineStart = this.current;
  }

  private isAtEnd(): boolean {
    return this.current >= this.source.length;
  }

  private advance(): string {
    return this.source.charAt(this.current++);
  }

  private match(expected: string): boolean {
    if (this.isAtEnd() || this.source.charAt(this.current) !== expected) return false;
    this.current++;
    return true;
  }

  private peek(): string {
    return this.isAtEnd() ? '\0' : this.source.charAt(this.current);
  }

  private peekNext(): string {
    return this.current + 1 >= this.source.length ? '\0' : this.source.charAt(this.current + 1);
  }

  private addToken(type: TokenType, literal?: string | number): void {
    const token: Token = {
      type,
      lexeme: this.source.slice(this.start, this.current),
      line: this.startLine,
      column: this.startColumn,
    };
    if (literal !== undefined) token.literal = literal;
    this.tokens.push(token);
  }
}

export function tokenize(source: string): Token[] {
  return new Lexer(source).scanTokens();
}

import { tokenize } from '../src/lexer';
import { BrookSyntaxError } from '../src/errors';

function types(source: string): string[] {
  return tokenize(source).map(t => t.type);
}

describe('Lexer', () => {
  test('single-character tokens', () => {
    expect(types('(){},.-+;/*')).toEqual(['(', ')', '{', '}', ',', '.', '-', '+', ';', '/', '*', 'eof']);
  });

  test('one- and two-character operators', () => {
    expect(types('! != = == < <= > >=')).toEqual(['!', '!=', '=', '==', '<', '<=', '>', '>=', 'eof']);
  });

  test('keywords and identifiers', () => {
    expect(types('fn var make_counter return nil and or print')).toEqual([
      'fn', 'var', 'identifier', 'return', 'nil', 'and', 'or', 'print', 'eof',
    ]);
  });

  test('number literals', () => {
    const tokens = tokenize('12 3.5');
    expect(tokens[0]).toMatchObject({ type: 'number', lexeme: '12', literal: 12 });
    expect(tokens[1]).toMatchObject({ type: 'number', lexeme: '3.5', literal: 3.5 });
  });

  test('a trailing dot is not part of the number', () => {
    expect(types('7.')).toEqual(['number', '.', 'eof']);
  });

  test('string literal value excludes the quotes', () => {
    const [token] = tokenize('"hello world"');
    expect(token).toMatchObject({ type: 'string', lexeme: '"hello world"', literal: 'hello world' });
  });

  test('strings may span lines', () => {
    const tokens = tokenize('"a\nb" x');
    expect(tokens[0].literal).toBe('a\nb');
    expect(tokens[1]).toMatchObject({ type: 'identifier', line: 2, column: 3 });
  });

  test('comments are skipped', () => {
    expect(types('var x; // trailing comment\nprint x;')).toEqual([
      'var', 'identifier', ';', 'print', 'identifier', ';', 'eof',
    ]);
  });

  test('tracks line and column', () => {
    const tokens = tokenize('var a;\n  print a;');
    expect(tokens[0]).toMatchObject({ type: 'var', line: 1, column: 0 });
    expect(tokens[3]).toMatchObject({ type: 'print', line: 2, column: 2 });
    expect(tokens[4]).toMatchObject({ type: 'identifier', line: 2, column: 8 });
  });

  test('unterminated string', () => {
    expect(() => tokenize('print "oops;')).toThrow('Unterminated string');
  });

  test('unexpected character reports position', () => {
    try {
      tokenize('var x = 1;\nx @ 2;');
      throw new Error('expected tokenize to fail');
    } catch (e) {
      expect(e).toBeInstanceOf(BrookSyntaxError);
      if (e instanceof BrookSyntaxError) {
        expect(e.detail).toBe("Unexpected character '@'");
        expect(e.line).toBe(2);
        expect(e.column).toBe(2);
      }
    }
  });
});

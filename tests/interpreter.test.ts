/**
 * Interpreter tests: closures, scoping, calls and runtime errors.
 *
 * Programs are parsed from source and run against a fresh global scope,
 * with `print` output captured in memory.
 */

import { parse } from '../src/parser';
import { Interpreter, RunResult } from '../src/interpreter';
import { Environment } from '../src/environment';
import { Program } from '../src/ast';
import { mkNumber } from '../src/values';
import {
  ArityMismatchError,
  BrookRuntimeError,
  NotCallableError,
  StackOverflowError,
  TypeMismatchError,
  UndefinedVariableError,
} from '../src/errors';

interface Outcome {
  lines: string[];
  result: RunResult;
  globals: Environment;
}

function programOf(source: string): Program {
  const parsed = parse(source);
  expect(parsed.errors).toEqual([]);
  return parsed.program;
}

function execute(source: string, maxCallDepth?: number): Outcome {
  const lines: string[] = [];
  const interpreter = new Interpreter({ output: line => lines.push(line), maxCallDepth, now: () => 1500 });
  const globals = interpreter.createGlobalEnvironment();
  const result = interpreter.run(programOf(source), globals);
  return { lines, result, globals };
}

function output(source: string): string[] {
  const { lines, result } = execute(source);
  if (!result.ok) throw result.error;
  return lines;
}

function failure(source: string): { error: BrookRuntimeError; lines: string[] } {
  const { lines, result } = execute(source);
  if (result.ok) throw new Error('expected the program to fail');
  return { error: result.error, lines };
}

const MAKE_COUNTER = `
fn make_counter() {
  var i = 0;
  fn count() {
    i = i + 1;
    print i;
  }
  return count;
}

var counter1 = make_counter();
var counter2 = make_counter();
`;

describe('closures', () => {
  test('each call to the outer function yields an independent counter', () => {
    expect(output(MAKE_COUNTER + 'counter1(); counter1(); counter2(); counter2();')).toEqual(['1', '2', '1', '2']);
  });

  test('state belongs to the closure instance, not to call order', () => {
    expect(output(MAKE_COUNTER + 'counter1(); counter2(); counter1(); counter2();')).toEqual(['1', '1', '2', '2']);
  });

  test('re-running the same program from a fresh global scope gives the same output', () => {
    const source = MAKE_COUNTER + 'counter1(); counter2(); counter1(); print counter1; print counter2;';
    const first = output(source);
    const second = output(source);
    expect(first).toEqual(['1', '1', '2', '<fn count#2>', '<fn count#3>']);
    expect(second).toEqual(first);
  });

  test('a closure sees later mutations of its captured variable', () => {
    expect(output(`
      fn outer() {
        var x = "before";
        fn show() { print x; }
        x = "after";
        return show;
      }
      outer()();
    `)).toEqual(['after']);
  });

  test('closures from one call share that call\'s frame', () => {
    expect(output(`
      var inc;
      var get;
      fn make() {
        var n = 0;
        fn i() { n = n + 1; }
        fn g() { return n; }
        inc = i;
        get = g;
      }
      make();
      inc();
      inc();
      print get();
    `)).toEqual(['2']);
  });

  test('the function body runs in the defining scope, not the call site', () => {
    expect(output(`
      var x = "global";
      fn make() {
        var x = "captured";
        fn show() { print x; }
        return show;
      }
      fn caller(f) {
        var x = "call site";
        f();
      }
      caller(make());
    `)).toEqual(['captured']);
  });

  test('closures nested three levels deep', () => {
    expect(output(`
      fn a() {
        var x = 1;
        fn b() {
          var y = 2;
          fn c() { x = x + y; return x; }
          return c;
        }
        return b;
      }
      var c = a()();
      print c();
      print c();
    `)).toEqual(['3', '5']);
  });

  test('parameters are captured per call', () => {
    expect(output(`
      fn adder(n) { return fn (x) { return x + n; }; }
      var add2 = adder(2);
      var add10 = adder(10);
      print add2(1);
      print add10(1);
    `)).toEqual(['3', '11']);
  });

  test('a function can call itself by name', () => {
    expect(output(`
      fn fib(n) {
        if (n < 2) return n;
        return fib(n - 1) + fib(n - 2);
      }
      print fib(10);
    `)).toEqual(['55']);
  });

  test('each evaluation of a definition is a new function value', () => {
    expect(output(`
      fn make() { fn inner() {} return inner; }
      var a = make();
      var b = make();
      print a == b;
      print a == a;
    `)).toEqual(['false', 'true']);
  });

  test('functions are values that can be passed and stored', () => {
    expect(output(`
      fn twice(f, x) { return f(f(x)); }
      fn square(n) { return n * n; }
      print twice(square, 3);
    `)).toEqual(['81']);
  });
});

describe('scoping', () => {
  test('blocks introduce a scope', () => {
    expect(output(`
      var a = "outer";
      {
        var a = "inner";
        print a;
      }
      print a;
    `)).toEqual(['inner', 'outer']);
  });

  test('assignment inside a block updates the outer variable', () => {
    expect(output(`
      var a = 1;
      { a = 2; }
      print a;
    `)).toEqual(['2']);
  });

  test('closures created in a loop body share the loop variable', () => {
    expect(output(`
      var fns1;
      var fns2;
      for (var i = 0; i < 2; i = i + 1) {
        fn show() { print i; }
        if (i == 0) fns1 = show; else fns2 = show;
      }
      fns1();
      fns2();
    `)).toEqual(['2', '2']);
  });

  test('variable declared without an initializer is nil', () => {
    expect(output('var a; print a;')).toEqual(['nil']);
  });

  test('redeclaring a global overwrites it', () => {
    expect(output('var a = 1; var a = 2; print a;')).toEqual(['2']);
  });
});

describe('calls and returns', () => {
  test('return short-circuits the rest of the body', () => {
    expect(output(`
      fn f() {
        print "a";
        return 1;
        print "b";
      }
      print f();
    `)).toEqual(['a', '1']);
  });

  test('a function without return yields nil', () => {
    expect(output('fn f() {} print f();')).toEqual(['nil']);
  });

  test('bare return yields nil', () => {
    expect(output('fn f() { return; } print f();')).toEqual(['nil']);
  });

  test('return from inside a loop leaves the function', () => {
    expect(output(`
      fn first_over(limit) {
        var i = 0;
        while (true) {
          if (i > limit) return i;
          i = i + 1;
        }
      }
      print first_over(3);
    `)).toEqual(['4']);
  });

  test('arguments are evaluated left to right in the caller', () => {
    expect(output(`
      var log = "";
      fn note(s) { log = log + s; return s; }
      fn pair(a, b) { return a + b; }
      print pair(note("x"), note("y"));
      print log;
    `)).toEqual(['xy', 'xy']);
  });

  test('builtin clock is callable', () => {
    expect(output('print clock();')).toEqual(['1.5']);
  });
});

describe('operators', () => {
  test('arithmetic', () => {
    expect(output('print 1 + 2 * 3 - 4 / 2;')).toEqual(['5']);
  });

  test('division by zero follows IEEE', () => {
    expect(output('print 1 / 0; print -1 / 0;')).toEqual(['Infinity', '-Infinity']);
  });

  test('string concatenation', () => {
    expect(output('print "a" + "b"; print "n=" + 3;')).toEqual(['ab', 'n=3']);
  });

  test('comparisons on numbers and strings', () => {
    expect(output('print 1 < 2; print 2 <= 2; print "b" > "a"; print "a" >= "b";'))
      .toEqual(['true', 'true', 'true', 'false']);
  });

  test('equality across tags', () => {
    expect(output('print 1 == 1; print 1 == "1"; print nil == false; print nil != nil;'))
      .toEqual(['true', 'false', 'false', 'false']);
  });

  test('logical operators short-circuit and return the deciding operand', () => {
    expect(output(`
      fn boom() { print "evaluated"; return true; }
      print nil or "default";
      print 0 and boom();
      print "x" or boom();
      print 1 and 2;
    `)).toEqual(['default', '0', 'x', '2']);
  });

  test('unary operators', () => {
    expect(output('print -3; print !nil; print !0; print !"s";')).toEqual(['-3', 'true', 'true', 'false']);
  });

  test('while and if', () => {
    expect(output(`
      var i = 3;
      while (i > 0) {
        if (i == 2) print "two"; else print i;
        i = i - 1;
      }
    `)).toEqual(['3', 'two', '1']);
  });
});

describe('runtime errors', () => {
  test('reading an undefined variable', () => {
    const { error } = failure('print 1;\nprint missing;');
    expect(error).toBeInstanceOf(UndefinedVariableError);
    expect(error.kind).toBe('UndefinedVariable');
    expect(error.message).toBe("UndefinedVariable [line 2, col 6]: undefined variable 'missing'");
  });

  test('assigning an undefined variable never creates it', () => {
    const { result, globals } = execute('x = 1;');
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(UndefinedVariableError);
      expect(result.error.line).toBe(1);
    }
    expect(globals.has('x')).toBe(false);
  });

  test('assignment inside a closure needs an enclosing definition', () => {
    const { error } = failure(`
      fn make() {
        fn count() { total = 1; }
        return count;
      }
      make()();
    `);
    expect(error).toBeInstanceOf(UndefinedVariableError);
  });

  test('calling a non-function', () => {
    const { error } = failure('var n = 3; n();');
    expect(error).toBeInstanceOf(NotCallableError);
    expect(error.kind).toBe('NotCallable');
    if (error instanceof NotCallableError) {
      expect(error.value).toEqual(mkNumber(3));
    }
    expect(error.message).toBe("NotCallable [line 1, col 11]: '3' (number) is not callable");
  });

  test('calling with the wrong number of arguments', () => {
    const { error } = failure('fn f(a, b) {} f(1);');
    expect(error).toBeInstanceOf(ArityMismatchError);
    if (error instanceof ArityMismatchError) {
      expect(error.expected).toBe(2);
      expect(error.got).toBe(1);
    }
    expect(error.message).toBe('ArityMismatch [line 1, col 14]: f expected 2 arguments but got 1');
  });

  test('builtins check arity too', () => {
    const { error } = failure('clock(1);');
    expect(error).toBeInstanceOf(ArityMismatchError);
    expect(error.detail).toBe('clock expected 0 arguments but got 1');
  });

  test('adding a function to a number', () => {
    const { error } = failure('fn f() {} print f + 1;');
    expect(error).toBeInstanceOf(TypeMismatchError);
    if (error instanceof TypeMismatchError) {
      expect(error.operator).toBe('+');
      expect(error.operandKinds).toEqual(['function', 'number']);
    }
    expect(error.detail).toBe("operator '+' is not defined for function and number");
  });

  test('number plus string is a type mismatch', () => {
    expect(failure('print 1 + "a";').error).toBeInstanceOf(TypeMismatchError);
  });

  test('negating a string', () => {
    const { error } = failure('print -"a";');
    expect(error).toBeInstanceOf(TypeMismatchError);
    expect(error.detail).toBe("operator '-' is not defined for string");
  });

  test('comparing mixed tags', () => {
    expect(failure('print 1 < "2";').error).toBeInstanceOf(TypeMismatchError);
  });

  test('an error aborts the run but earlier output stays', () => {
    const { lines } = failure('print "first"; nope(); print "never";');
    expect(lines).toEqual(['first']);
  });

  test('errors propagate out of nested calls', () => {
    const { error } = failure(`
      fn inner() { return undefined_thing; }
      fn outer() { return inner(); }
      outer();
    `);
    expect(error).toBeInstanceOf(UndefinedVariableError);
    expect(error.line).toBe(2);
  });

  test('unbounded recursion stops at the call depth limit', () => {
    const { result, lines } = execute('var n = 0; fn down() { n = n + 1; down(); } down(); print n;', 50);
    expect(lines).toEqual([]);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(StackOverflowError);
      expect(result.error.detail).toBe('maximum call depth of 50 exceeded');
    }
  });

  test('the call depth resets between runs', () => {
    const interpreter = new Interpreter({ output: () => undefined, maxCallDepth: 5 });
    const program = programOf('fn f(n) { if (n > 0) f(n - 1); } f(4);');
    expect(interpreter.run(program, interpreter.createGlobalEnvironment())).toEqual({ ok: true });
    expect(interpreter.run(program, interpreter.createGlobalEnvironment())).toEqual({ ok: true });
  });

  test('host stack exhaustion is reported as a stack overflow', () => {
    const { result } = execute('fn d(n) { return d(n + 1); }\nd(0);', 1_000_000);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(StackOverflowError);
      expect(result.error.line).toBe(1);
    }
  });
});

describe('running programs', () => {
  test('a fresh global scope restarts function ids on a reused interpreter', () => {
    const lines: string[] = [];
    const interpreter = new Interpreter({ output: l => lines.push(l) });
    const program = programOf('fn f() {} print f;');
    interpreter.run(program, interpreter.createGlobalEnvironment());
    interpreter.run(program, interpreter.createGlobalEnvironment());
    expect(lines).toEqual(['<fn f#1>', '<fn f#1>']);
  });

  test('ids keep counting within one global scope', () => {
    const lines: string[] = [];
    const interpreter = new Interpreter({ output: l => lines.push(l) });
    const globals = interpreter.createGlobalEnvironment();
    const program = programOf('fn f() {} print f;');
    interpreter.run(program, globals);
    interpreter.run(program, globals);
    expect(lines).toEqual(['<fn f#1>', '<fn f#2>']);
  });

  test('a top-level return ends the program normally', () => {
    const { lines, result } = execute('print 1;\nreturn 2;\nprint 3;');
    expect(result).toEqual({ ok: true });
    expect(lines).toEqual(['1']);
  });

  test('a top-level return inside a block ends the program too', () => {
    const { lines, result } = execute('{ print "in"; return; } print "after";');
    expect(result).toEqual({ ok: true });
    expect(lines).toEqual(['in']);
  });
});

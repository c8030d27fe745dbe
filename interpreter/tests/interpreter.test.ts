/**
 * Evaluator tests: programs are assembled with the node builders and run
 * through `Test.main`.
 */

import { Interpreter } from '../src/interpreter';
import { RuntimeOptions } from '../src/config';
import { ClassDeclaration, Statement } from '../src/ast';
import { TinyValue, mkInt, mkNull, mkString } from '../src/values';
import {
  TinyError,
  AssertionFailure,
  UnboundNameError,
  RedefinitionError,
  KeyNotFoundError,
  MemberNotFoundError,
  ArityError,
  StackOverflow,
  TinyTypeError,
  IndexOutOfBoundsError,
  TinyArithmeticError,
  LimitExceededError,
} from '../src/errors';
import {
  nil, bool, int, float, str, list, dict, ident, member, path, index, call, newInstance,
  unary, binary, lambda, varDecl, assign, expr, assert, print, ifThen, whileLoop, forIn,
  forRange, ret, fn, field, cls, program, testProgram,
} from '../src/builders';

function run(
  body: Statement[],
  classes: ClassDeclaration[] = [],
  options: Partial<RuntimeOptions> = {},
): { value: TinyValue; out: string[] } {
  const out: string[] = [];
  const interpreter = new Interpreter(testProgram(body, classes), { output: line => out.push(line), ...options });
  const value = interpreter.run();
  return { value, out };
}

function output(body: Statement[], classes: ClassDeclaration[] = []): string[] {
  return run(body, classes).out;
}

function failure(body: Statement[], classes: ClassDeclaration[] = [], options: Partial<RuntimeOptions> = {}): TinyError {
  try {
    run(body, classes, options);
  } catch (e) {
    if (e instanceof TinyError) return e;
    throw e;
  }
  throw new Error('expected the program to fail');
}

const fibonacci = cls('Fibonacci', {
  methods: [
    fn('fib', ['n'],
      assert(binary(ident('n'), '<=', int(55))),
      ifThen(binary(ident('n'), '<=', int(1)), [ret(ident('n'))]),
      ret(binary(
        call(ident('fib'), binary(ident('n'), '-', int(1))),
        '+',
        call(ident('fib'), binary(ident('n'), '-', int(2))),
      )),
    ),
    fn('fib_quick', ['n'], ret(call(ident('fib'), ident('n')))),
  ],
});

const counter = cls('Counter', {
  fields: [field('count', int(0))],
  methods: [
    fn('inc', [], assign(member(ident('self'), 'count'), binary(path('self', 'count'), '+', int(1)))),
    fn('incTwice', [], expr(call(ident('inc'))), expr(call(ident('inc'))), ret(path('self', 'count'))),
    fn('get', [], ret(path('self', 'count'))),
  ],
});

// ==================================================================
// Entry point and results
// ==================================================================

describe('entry point', () => {
  test('Test.main runs and its return value is the result', () => {
    const { value } = run([ret(int(7))]);
    expect(value).toEqual(mkInt(7));
  });

  test('falling off the end returns null', () => {
    expect(run([]).value).toEqual(mkNull());
  });

  test('a missing entry class is an UnboundNameError', () => {
    const err = failure([], [], { entryClass: 'Nope' });
    expect(err).toBeInstanceOf(UnboundNameError);
  });

  test('a missing entry method is a MemberNotFoundError', () => {
    const err = failure([], [], { entryMethod: 'start' });
    expect(err).toBeInstanceOf(MemberNotFoundError);
    expect(err.detail).toBe("no member 'start' on class Test");
  });

  test('a custom entry point can be configured', () => {
    const out: string[] = [];
    const prog = program([cls('App', { methods: [fn('start', [], print(str('hi')))] })]);
    new Interpreter(prog, { entryClass: 'App', entryMethod: 'start', output: l => out.push(l) }).run();
    expect(out).toEqual(['hi']);
  });

  test('invokeStatic calls a class method from the host', () => {
    const interpreter = new Interpreter(program([fibonacci]), { output: () => undefined });
    expect(interpreter.invokeStatic('Fibonacci', 'fib', [mkInt(10)])).toEqual(mkInt(55));
    expect(interpreter.depth).toBe(0);
  });

  test('duplicate class declarations are rejected at load', () => {
    const a = cls('A', {});
    expect(() => new Interpreter(program([a, a]))).toThrow(RedefinitionError);
  });
});

// ==================================================================
// Programs
// ==================================================================

describe('Fibonacci', () => {
  test('class-qualified and instance calls agree', () => {
    const { out } = run([
      assert(binary(call(member(ident('Fibonacci'), 'fib'), int(0)), '==', int(0))),
      assert(binary(call(member(ident('Fibonacci'), 'fib'), int(1)), '==', int(1))),
      assert(binary(call(member(ident('Fibonacci'), 'fib'), int(10)), '==', int(55))),
      assert(binary(call(member(ident('Fibonacci'), 'fib'), int(20)), '==', int(6765))),
      assert(binary(call(member(newInstance('Fibonacci'), 'fib_quick'), int(10)), '==', int(55))),
      print(str('ok')),
    ], [fibonacci]);
    expect(out).toEqual(['ok']);
  });

  test('the guard assertion fires for large inputs', () => {
    const err = failure([expr(call(member(ident('Fibonacci'), 'fib'), int(56)))], [fibonacci]);
    expect(err).toBeInstanceOf(AssertionFailure);
    expect(err.detail).toBe('assertion failed: n <= 55 (got false)');
    expect(err.callStack).toEqual(['Test.main', 'Fibonacci.fib']);
  });
});

describe('nested dict paths', () => {
  test('write deep, then read back through the same path', () => {
    const out = output([
      varDecl('d', dict({ a: dict({ b: dict({ c: dict() }) }) })),
      assign(path('d', 'a', 'b', 'c', 'd'), int(2)),
      assert(binary(path('d', 'a', 'b', 'c', 'd'), '==', int(2))),
      assign(path('d', 'a', 'b', 'c', 'x'), dict({ name: str('leaf') })),
      assert(binary(path('d', 'a', 'b', 'c', 'x', 'name'), '==', str('leaf'))),
      print(ident('d')),
    ]);
    expect(out).toEqual(['{a: {b: {c: {d: 2, x: {name: leaf}}}}}']);
  });

  test('aliases share the same dict', () => {
    const out = output([
      varDecl('d', dict({ inner: dict() })),
      varDecl('alias', path('d', 'inner')),
      assign(path('alias', 'k'), int(1)),
      print(path('d', 'inner', 'k')),
    ]);
    expect(out).toEqual(['1']);
  });

  test('missing intermediate keys are not created', () => {
    const err = failure([
      varDecl('d', dict()),
      assign(path('d', 'a', 'b'), int(1)),
    ]);
    expect(err).toBeInstanceOf(KeyNotFoundError);
    expect(err.detail).toBe("no key 'a' in dict");
  });
});

// ==================================================================
// Dispatch
// ==================================================================

describe('call dispatch', () => {
  const helperFn = fn('helper', [], ret(int(1)));
  const withHelper = cls('A', {
    methods: [
      fn('helper', [], ret(int(2))),
      fn('run', [], ret(call(ident('helper')))),
    ],
  });

  test('a bare call inside a method prefers the enclosing class', () => {
    const out: string[] = [];
    const prog = program(
      [withHelper, cls('Test', { methods: [fn('main', [],
        print(call(member(ident('A'), 'run'))),
        print(call(ident('helper'))),
      )] })],
      [helperFn],
    );
    new Interpreter(prog, { output: l => out.push(l) }).run();
    expect(out).toEqual(['2', '1']);
  });

  test('instance calls bind self and bare calls pass it along', () => {
    const out = output([
      varDecl('c', newInstance('Counter')),
      print(call(member(ident('c'), 'incTwice'))),
      print(path('c', 'count')),
    ], [counter]);
    expect(out).toEqual(['2', '2']);
  });

  test('a class-qualified call has no self', () => {
    const err = failure([expr(call(member(ident('Counter'), 'get')))], [counter]);
    expect(err).toBeInstanceOf(UnboundNameError);
    expect(err.detail).toBe("undefined variable 'self'");
  });

  test('bound methods are values', () => {
    const out = output([
      varDecl('c', newInstance('Counter')),
      varDecl('m', path('c', 'inc')),
      expr(call(ident('m'))),
      expr(call(ident('m'))),
      print(path('c', 'count')),
    ], [counter]);
    expect(out).toEqual(['2']);
  });

  test('a call scope cannot see the caller locals', () => {
    const peek = cls('Peek', { methods: [fn('look', [], ret(ident('secret')))] });
    const err = failure([
      varDecl('secret', int(1)),
      expr(call(member(ident('Peek'), 'look'))),
    ], [peek]);
    expect(err).toBeInstanceOf(UnboundNameError);
    expect(err.callStack).toEqual(['Test.main', 'Peek.look']);
  });

  test('wrong argument count is an ArityError', () => {
    const err = failure([expr(call(member(ident('Fibonacci'), 'fib')))], [fibonacci]);
    expect(err).toBeInstanceOf(ArityError);
    expect(err.detail).toBe("'Fibonacci.fib' takes 1 argument but was called with 0");
  });

  test('builtins check their arity', () => {
    const err = failure([expr(call(ident('len'), list(), list()))]);
    expect(err.detail).toBe("'len' takes 1 argument but was called with 2");
  });

  test('calling a non-callable is a type mismatch', () => {
    expect(failure([varDecl('x', int(1)), expr(call(ident('x')))])).toBeInstanceOf(TinyTypeError);
    expect(failure([expr(call(ident('Counter')))], [counter])).toBeInstanceOf(TinyTypeError);
  });

  test('return without a value yields null', () => {
    const a = cls('A', { methods: [fn('f', [], ret())] });
    expect(output([print(call(member(ident('A'), 'f')))], [a])).toEqual(['null']);
  });
});

describe('recursion limit', () => {
  const runaway = cls('R', {
    methods: [fn('down', ['n'], ret(call(ident('down'), binary(ident('n'), '+', int(1)))))],
  });

  test('exceeding the call depth is a StackOverflow', () => {
    const err = failure([expr(call(member(ident('R'), 'down'), int(0)))], [runaway], { maxCallDepth: 50 });
    expect(err).toBeInstanceOf(StackOverflow);
    expect(err.message).toBe('StackOverflow: maximum call depth of 50 exceeded');
    expect(err.callStack).toHaveLength(50);
    expect(err.callStack[0]).toBe('Test.main');
    expect(err.callStack[49]).toBe('R.down');
  });

  test('exhausting the host stack is also a StackOverflow', () => {
    const err = failure([expr(call(member(ident('R'), 'down'), int(0)))], [runaway], { maxCallDepth: 100_000 });
    expect(err).toBeInstanceOf(StackOverflow);
    expect(err.detail).toBe('host call stack exhausted');
    expect(err.callStack[0]).toBe('Test.main');
    expect(err.callStack[err.callStack.length - 1]).toBe('R.down');
  });

  test('the interpreter is usable again after exhausting the host stack', () => {
    const out: string[] = [];
    const interpreter = new Interpreter(
      testProgram([expr(call(member(ident('R'), 'down'), int(0)))], [runaway]),
      { output: line => out.push(line), maxCallDepth: 100_000 },
    );
    expect(() => interpreter.run()).toThrow(StackOverflow);
    expect(interpreter.depth).toBe(0);
    expect(() => interpreter.run()).toThrow('host call stack exhausted');
    expect(interpreter.depth).toBe(0);
  });
});

// ==================================================================
// Scoping
// ==================================================================

describe('scoping', () => {
  test('redeclaring in the same scope is a RedefinitionError', () => {
    const err = failure([varDecl('x', int(1)), varDecl('x', int(2))]);
    expect(err).toBeInstanceOf(RedefinitionError);
  });

  test('blocks open a nested scope', () => {
    const out = output([
      varDecl('x', int(1)),
      ifThen(bool(true), [varDecl('x', int(2)), print(ident('x'))]),
      print(ident('x')),
    ]);
    expect(out).toEqual(['2', '1']);
  });

  test('assignment updates the nearest enclosing binding', () => {
    const out = output([
      varDecl('x', int(1)),
      ifThen(bool(true), [assign(ident('x'), int(5))]),
      print(ident('x')),
    ]);
    expect(out).toEqual(['5']);
  });

  test('assigning an undeclared name fails', () => {
    expect(failure([assign(ident('y'), int(1))])).toBeInstanceOf(UnboundNameError);
  });

  test('anonymous functions do not capture locals', () => {
    const err = failure([
      varDecl('k', int(1)),
      varDecl('g', lambda([], ret(ident('k')))),
      expr(call(ident('g'))),
    ]);
    expect(err).toBeInstanceOf(UnboundNameError);
  });

  test('anonymous functions take arguments', () => {
    const out = output([
      varDecl('double', lambda(['x'], ret(binary(ident('x'), '*', int(2))))),
      print(call(ident('double'), int(21))),
    ]);
    expect(out).toEqual(['42']);
  });

  test('errors carry the innermost statement location', () => {
    const stmt: Statement = { kind: 'var', name: 'x', init: ident('nope'), loc: { line: 4, column: 3 } };
    const err = failure([stmt]);
    expect(err.message).toBe("UnboundNameError [line 4, col 3]: undefined variable 'nope'");
  });
});

// ==================================================================
// Assertions and truthiness
// ==================================================================

describe('assert', () => {
  test('a failing assert stops execution', () => {
    const out: string[] = [];
    expect(() => run([assert(bool(false)), print(str('after'))], [], { output: l => out.push(l) }))
      .toThrow(AssertionFailure);
    expect(out).toEqual([]);
  });

  test('the literal source text is reported when present', () => {
    const err = failure([varDecl('x', int(1)), assert(binary(ident('x'), '==', int(2)), 'x == 2')]);
    expect(err).toBeInstanceOf(AssertionFailure);
    if (err instanceof AssertionFailure) {
      expect(err.sourceText).toBe('x == 2');
      expect(err.actual).toBe('false');
    }
  });

  test('asserting null fails and asserting 0 passes', () => {
    expect(failure([assert(nil())]).detail).toBe('assertion failed: null (got null)');
    expect(output([assert(int(0)), print(str('ok'))])).toEqual(['ok']);
  });

  test('0 and the empty string are truthy', () => {
    const out = output([
      ifThen(int(0), [print(str('zero'))], [print(str('no'))]),
      ifThen(str(''), [print(str('empty'))]),
      ifThen(nil(), [print(str('null'))], [print(str('else'))]),
    ]);
    expect(out).toEqual(['zero', 'empty', 'else']);
  });
});

// ==================================================================
// Operators
// ==================================================================

describe('operators', () => {
  test('arithmetic', () => {
    const out = output([
      print(binary(int(7), '/', int(2))),
      print(binary(int(6), '/', int(3))),
      print(binary(unary('-', int(7)), '/', int(2))),
      print(binary(int(2), '^', int(10))),
      print(binary(int(2), '^', unary('-', int(1)))),
      print(binary(int(1), '+', float(2))),
      print(binary(int(10), '-', binary(int(2), '*', int(3)))),
    ]);
    expect(out).toEqual(['3.5', '2', '-3.5', '1024', '0.5', '3.0', '4']);
  });

  test('string concatenation renders the other side', () => {
    const out = output([
      print(binary(str('n='), '+', int(3))),
      print(binary(list(int(1)), '+', str('!'))),
    ]);
    expect(out).toEqual(['n=3', '[1]!']);
  });

  test('list concatenation builds a new list', () => {
    const out = output([
      varDecl('a', list(int(1))),
      varDecl('b', binary(ident('a'), '+', list(int(2)))),
      print(ident('a')),
      print(ident('b')),
    ]);
    expect(out).toEqual(['[1]', '[1, 2]']);
  });

  test('division by zero is an ArithmeticError', () => {
    expect(failure([expr(binary(int(1), '/', int(0)))])).toBeInstanceOf(TinyArithmeticError);
    expect(failure([expr(binary(float(1), '/', float(0)))])).toBeInstanceOf(TinyArithmeticError);
  });

  test('integers never silently lose precision', () => {
    const err = failure([expr(binary(int(Number.MAX_SAFE_INTEGER), '+', int(1)))]);
    expect(err).toBeInstanceOf(TinyArithmeticError);
    expect(failure([expr(binary(int(2), '^', int(60)))])).toBeInstanceOf(TinyArithmeticError);
  });

  test('a string that outgrows the host is a LimitExceeded error', () => {
    const err = failure([
      varDecl('s', str('x')),
      whileLoop(bool(true), assign(ident('s'), binary(ident('s'), '+', ident('s')))),
    ]);
    expect(err).toBeInstanceOf(LimitExceededError);
    expect(err.kind).toBe('LimitExceeded');
  });

  test('integer literals outside the exact range are rejected when evaluated', () => {
    const err = failure([print({ kind: 'int', value: 2 ** 53 })]);
    expect(err).toBeInstanceOf(TinyArithmeticError);
    expect(err.detail).toBe('integer result 9007199254740992 is outside the exact integer range');
  });

  test('arithmetic on non-numbers is a type mismatch', () => {
    const err = failure([expr(binary(bool(true), '*', int(2)))]);
    expect(err).toBeInstanceOf(TinyTypeError);
    expect(err.detail).toBe("cannot apply '*' to bool and int");
  });

  test('comparison and equality', () => {
    const out = output([
      print(binary(int(1), '<', float(1.5))),
      print(binary(str('a'), '<', str('b'))),
      print(binary(int(3), '==', float(3))),
      print(binary(list(), '==', list())),
      print(binary(str('x'), '!=', str('y'))),
      print(binary(int(2), '>=', int(2))),
    ]);
    expect(out).toEqual(['true', 'true', 'true', 'false', 'true', 'true']);
  });

  test('comparison follows each operator on infinities and NaN', () => {
    const out = output([
      varDecl('big', binary(float(1e308), '*', float(10))),
      varDecl('nan', binary(ident('big'), '-', ident('big'))),
      print(binary(ident('big'), '<=', ident('big'))),
      print(binary(ident('big'), '<', ident('big'))),
      print(binary(ident('big'), '>=', ident('big'))),
      print(binary(ident('nan'), '<=', ident('nan'))),
      print(binary(ident('nan'), '>', float(0))),
    ]);
    expect(out).toEqual(['true', 'false', 'true', 'false', 'false']);
  });

  test('ordering mixed kinds is a type mismatch', () => {
    expect(failure([expr(binary(int(1), '<', str('a')))])).toBeInstanceOf(TinyTypeError);
  });

  test('logical operators short-circuit', () => {
    const out = output([
      print(binary(bool(false), '&&', ident('undefinedName'))),
      print(binary(int(0), '||', ident('undefinedName'))),
      print(unary('!', nil())),
    ]);
    expect(out).toEqual(['false', 'true', 'true']);
  });

  test('negating a non-number is a type mismatch', () => {
    expect(failure([expr(unary('-', str('a')))])).toBeInstanceOf(TinyTypeError);
  });
});

// ==================================================================
// Control flow
// ==================================================================

describe('loops', () => {
  test('while', () => {
    const out = output([
      varDecl('i', int(0)),
      whileLoop(binary(ident('i'), '<', int(3)),
        print(ident('i')),
        assign(ident('i'), binary(ident('i'), '+', int(1))),
      ),
    ]);
    expect(out).toEqual(['0', '1', '2']);
  });

  test('for-in over a list and over dict keys', () => {
    const out = output([
      forIn('x', list(int(1), str('two')), print(ident('x'))),
      forIn('k', dict({ b: int(1), a: int(2) }), print(ident('k'))),
    ]);
    expect(out).toEqual(['1', 'two', 'b', 'a']);
  });

  test('for-in iterates a snapshot of the list', () => {
    const out = output([
      varDecl('l', list(int(1), int(2))),
      forIn('x', ident('l'), expr(call(ident('push'), ident('l'), ident('x')))),
      print(ident('l')),
    ]);
    expect(out).toEqual(['[1, 2, 1, 2]']);
  });

  test('for-in over a number is a type mismatch', () => {
    expect(failure([forIn('x', int(3))])).toBeInstanceOf(TinyTypeError);
  });

  test('for-range is inclusive in both directions', () => {
    const out = output([
      forRange('i', { from: int(1), to: int(3) }, print(ident('i'))),
      forRange('i', { from: int(3), to: int(1), step: unary('-', int(1)) }, print(ident('i'))),
    ]);
    expect(out).toEqual(['1', '2', '3', '3', '2', '1']);
  });

  test('for-range with a float step yields floats', () => {
    const out = output([forRange('t', { from: int(0), to: int(1), step: float(0.5) }, print(ident('t')))]);
    expect(out).toEqual(['0.0', '0.5', '1.0']);
  });

  test('for-range at the top of the exact integer range', () => {
    const out = output([
      forRange('i', { from: int(Number.MAX_SAFE_INTEGER - 1), to: int(Number.MAX_SAFE_INTEGER) }, print(ident('i'))),
    ]);
    expect(out).toEqual(['9007199254740990', '9007199254740991']);
  });

  test('a for-range bound outside the exact integer range is an ArithmeticError', () => {
    const err = failure([forRange('i', { from: int(0), to: { kind: 'int', value: 2 ** 53 } }, print(ident('i')))]);
    expect(err).toBeInstanceOf(TinyArithmeticError);
  });

  test('a zero step is an ArithmeticError', () => {
    const err = failure([forRange('i', { from: int(0), to: int(1), step: int(0) })]);
    expect(err).toBeInstanceOf(TinyArithmeticError);
  });

  test('return inside a loop leaves the method', () => {
    const finder = cls('Find', {
      methods: [fn('first', ['l'],
        forIn('x', ident('l'),
          ifThen(binary(ident('x'), '>', int(1)), [ret(ident('x'))]),
        ),
        ret(nil()),
      )],
    });
    const out = output([print(call(member(ident('Find'), 'first'), list(int(1), int(5), int(9))))], [finder]);
    expect(out).toEqual(['5']);
  });
});

// ==================================================================
// Collections and instances
// ==================================================================

describe('collections', () => {
  test('list indexing and builtins', () => {
    const out = output([
      varDecl('l', list(int(1), int(2))),
      expr(call(ident('push'), ident('l'), int(3))),
      print(call(ident('len'), ident('l'))),
      assign(index(ident('l'), int(0)), int(5)),
      print(ident('l')),
      print(index(ident('l'), int(2))),
    ]);
    expect(out).toEqual(['3', '[5, 2, 3]', '3']);
  });

  test('indexing past the end is IndexOutOfBounds', () => {
    const err = failure([varDecl('l', list(int(1))), print(index(ident('l'), int(1)))]);
    expect(err).toBeInstanceOf(IndexOutOfBoundsError);
    expect(err.detail).toBe('index 1 out of bounds for list of size 1');
  });

  test('dict indexing and keys', () => {
    const out = output([
      varDecl('d', dict({ a: int(1) })),
      assign(index(ident('d'), str('b')), int(2)),
      print(call(ident('keys'), ident('d'))),
      print(index(ident('d'), str('b'))),
    ]);
    expect(out).toEqual(['[a, b]', '2']);
  });
});

describe('instances', () => {
  const point = cls('Point', {
    fields: [field('x', int(0)), field('y', int(0))],
    methods: [
      fn('constructor', ['a', 'b'],
        assign(member(ident('self'), 'x'), ident('a')),
        assign(member(ident('self'), 'y'), ident('b')),
      ),
      fn('sum', [], ret(binary(path('self', 'x'), '+', path('self', 'y')))),
    ],
  });

  test('the constructor runs with self bound', () => {
    const out = output([
      varDecl('p', newInstance('Point', int(1), int(2))),
      print(ident('p')),
      print(call(member(newInstance('Point', int(2), int(3)), 'sum'))),
    ], [point]);
    expect(out).toEqual(['Point(x=1, y=2)', '5']);
  });

  test('arguments without a constructor are an ArityError', () => {
    const err = failure([expr(newInstance('Counter', int(1)))], [counter]);
    expect(err).toBeInstanceOf(ArityError);
    expect(err.detail).toBe("'Counter.constructor' takes 0 arguments but was called with 1");
  });

  test('field initializers run per instance', () => {
    const box = cls('Box', { fields: [field('items', list())] });
    const out = output([
      varDecl('a', newInstance('Box')),
      varDecl('b', newInstance('Box')),
      expr(call(ident('push'), path('a', 'items'), int(1))),
      print(call(ident('len'), path('b', 'items'))),
    ], [box]);
    expect(out).toEqual(['0']);
  });

  test('unknown members and classes fail', () => {
    expect(failure([expr(path('Counter', 'nope'))], [counter])).toBeInstanceOf(MemberNotFoundError);
    expect(failure([expr(newInstance('Missing'))])).toBeInstanceOf(UnboundNameError);
  });

  test('instances are shared by reference', () => {
    const out = output([
      varDecl('a', newInstance('Counter')),
      varDecl('b', ident('a')),
      expr(call(member(ident('b'), 'inc'))),
      print(path('a', 'count')),
      print(binary(ident('a'), '==', ident('b'))),
    ], [counter]);
    expect(out).toEqual(['1', 'true']);
  });
});

describe('trace', () => {
  test('calls and returns are traced with nesting', () => {
    const lines: string[] = [];
    const inc = cls('A', { methods: [fn('f', ['x'], ret(binary(ident('x'), '+', int(1))))] });
    run([expr(call(member(ident('A'), 'f'), int(1)))], [inc], { trace: l => lines.push(l) });
    expect(lines).toEqual([
      'call Test.main()',
      '  call A.f(1)',
      '  return A.f -> 2',
      'return Test.main -> null',
    ]);
  });

  test('string arguments are quoted in trace lines', () => {
    const lines: string[] = [];
    const echo = cls('E', { methods: [fn('f', ['s'], ret(ident('s')))] });
    run([expr(call(member(ident('E'), 'f'), str('hi')))], [echo], { trace: l => lines.push(l) });
    expect(lines[1]).toBe('  call E.f("hi")');
  });
});

test('host values passed to invokeStatic are used as-is', () => {
  const echo = cls('E', { methods: [fn('f', ['s'], ret(ident('s')))] });
  const interpreter = new Interpreter(program([echo]));
  expect(interpreter.invokeStatic('E', 'f', [mkString('x')])).toEqual(mkString('x'));
});

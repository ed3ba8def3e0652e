import * as fs from 'fs';
import * as path from 'path';
import { execute, parse, runSource } from '../src/index';
import { Interpreter, DEFAULT_MAX_CALL_DEPTH } from '../src/runtime/interpreter';
import { BufferSink } from '../src/runtime/output';
import { LoaValue, valueToString } from '../src/runtime/values';
import { RuntimeError } from '../src/errors';

const FIXTURES = path.join(__dirname, 'fixtures');

describe('Runtime', () => {
  function output(source: string): string[] {
    const result = runSource(source);
    if (!result.ok) {
      throw new Error(`unexpected failure: ${result.error.message}`);
    }
    return result.output;
  }

  function run(source: string): LoaValue {
    return execute(source, { output: new BufferSink() });
  }

  function runtimeError(source: string): RuntimeError {
    try {
      run(source);
    } catch (e) {
      if (e instanceof RuntimeError) return e;
      throw e;
    }
    throw new Error('expected a RuntimeError');
  }

  describe('variable binding', () => {
    it('should bind and retrieve variables', () => {
      expect(output('x = 10\ny = 20\nprint(x + y)')).toEqual(['30']);
    });

    it('should rebind to a value of another kind', () => {
      expect(output('x = 1\nx = "one"\nprint(x)')).toEqual(['one']);
    });

    it('should report an undefined variable at its use', () => {
      expect(runSource('print(y)')).toEqual({
        ok: false,
        output: [],
        error: {
          kind: 'Runtime',
          message: "UndefinedVariable: Undefined variable 'y'",
          line: 1,
          column: 7,
        },
      });
    });

    it('should return the value of the last expression statement', () => {
      const result = run('x = 4\nx * 2');
      expect(result).toEqual({ kind: 'number', value: 8 });
    });

    it('should skip later non-expression statements when choosing the result', () => {
      expect(run('5\nx = 1')).toEqual({ kind: 'number', value: 5 });
      expect(run('x = 1')).toEqual({ kind: 'nil' });
    });
  });

  describe('printing', () => {
    it('should print each argument on its own line', () => {
      expect(output('print(1, "two", true)')).toEqual(['1', 'two', 'true']);
    });

    it('should print an empty line with no arguments', () => {
      expect(output('print()')).toEqual(['']);
    });

    it('should render numbers in shortest form', () => {
      expect(output('print(7 / 2, 6 / 2, 0.1 + 0.2, -0)')).toEqual(['3.5', '3', '0.30000000000000004', '0']);
    });

    it('should render nil and functions', () => {
      expect(output('fun f(): return\nprint(nil, f, f())')).toEqual(['nil', '<fun f>', 'nil']);
    });
  });

  describe('arithmetic', () => {
    it('should follow operator precedence', () => {
      expect(output('print(2 + 3 * 4, (2 + 3) * 4, 10 - 4 - 3, 7 % 3)')).toEqual(['14', '20', '3', '1']);
    });

    it('should concatenate when either side is a string', () => {
      expect(output('print("n=" + 5, 5 + "!", "a" + true, "x" + nil)')).toEqual(['n=5', '5!', 'atrue', 'xnil']);
    });

    it('should negate numbers', () => {
      expect(output('x = 3\nprint(-x, --x)')).toEqual(['-3', '3']);
    });

    it('should fail on division by zero', () => {
      const err = runtimeError('print(1 / 0)');
      expect(err.runtimeKind).toBe('DivisionByZero');
      expect(err.message).toBe('Runtime error at line 1, column 9: DivisionByZero: Division by zero');
    });

    it('should fail on remainder by zero', () => {
      expect(runtimeError('x = 5 % 0').detail).toBe('DivisionByZero: Remainder by zero');
    });

    it('should fail on arithmetic with mismatched kinds', () => {
      const err = runtimeError('x = 1 - "a"');
      expect(err.runtimeKind).toBe('TypeMismatch');
      expect(err.detail).toBe("TypeMismatch: Operator '-' expects numbers but got number and string");
      expect(err.column).toBe(7);
    });

    it('should fail to negate a string', () => {
      expect(runtimeError('x = -"a"').detail).toBe('TypeMismatch: Cannot negate a string');
    });
  });

  describe('comparison and logic', () => {
    it('should compare numbers and strings', () => {
      expect(output('print(1 < 2, 2 <= 2, 3 > 4, 4 >= 5, "a" < "b")')).toEqual(['true', 'true', 'false', 'false', 'true']);
    });

    it('should compare any kinds for equality', () => {
      expect(output('print(1 == 1, 1 == "1", nil == nil, true != false, "a" == "a")'))
        .toEqual(['true', 'false', 'true', 'true', 'true']);
    });

    it('should compare functions by identity', () => {
      expect(output('fun f(): return 1\nfun g(): return 1\nh = f\nprint(f == h, f == g)')).toEqual(['true', 'false']);
    });

    it('should refuse to order values of different kinds', () => {
      const err = runtimeError('x = 1 < "2"');
      expect(err.detail).toBe("TypeMismatch: Cannot compare number with string using '<'");
    });

    it('should treat 0, nil and false as falsy', () => {
      expect(output('print(!0, !nil, !false, !"", !1)')).toEqual(['true', 'true', 'true', 'false', 'false']);
    });

    it('should short-circuit and return the deciding operand', () => {
      expect(output('print(0 || "x", 1 && 2, nil && missing, 5 || missing)')).toEqual(['x', '2', 'nil', '5']);
    });
  });

  describe('control flow', () => {
    it('should take the first matching branch', () => {
      const source = [
        'fun grade(n):',
        '    if (n >= 90):',
        '        return "A"',
        '    else if (n >= 80):',
        '        return "B"',
        '    else:',
        '        return "C"',
        'print(grade(95), grade(85), grade(10))',
      ].join('\n');
      expect(output(source)).toEqual(['A', 'B', 'C']);
    });

    it('should pick exactly one branch of an if chain', () => {
      const chain = 'if (x < y):\n    print("less")\nelse if (x == y):\n    print("equal")\nelse:\n    print("greater")';
      expect(output(`x = 5\ny = 10\n${chain}`)).toEqual(['less']);
      expect(output(`x = 10\ny = 10\n${chain}`)).toEqual(['equal']);
      expect(output(`x = 15\ny = 10\n${chain}`)).toEqual(['greater']);
    });

    it('should run a single-line loop body', () => {
      expect(output('x = 1\nwhile (x <= 5): print(x); x = x + 1')).toEqual(['1', '2', '3', '4', '5']);
    });

    it('should loop while the condition holds', () => {
      expect(output('i = 0\nwhile (i < 3):\n    print(i)\n    i = i + 1')).toEqual(['0', '1', '2']);
    });

    it('should support break and continue', () => {
      const source = [
        'i = 0',
        'while (true):',
        '    i = i + 1',
        '    if (i > 8): break',
        '    if (i % 2 == 0): continue',
        '    print(i)',
      ].join('\n');
      expect(output(source)).toEqual(['1', '3', '5', '7']);
    });

    it('should only break the innermost loop', () => {
      const source = [
        'i = 0',
        'while (i < 2):',
        '    i = i + 1',
        '    j = 0',
        '    while (true):',
        '        j = j + 1',
        '        if (j == 2): break',
        '    print(i * 10 + j)',
      ].join('\n');
      expect(output(source)).toEqual(['12', '22']);
    });

    it('should not scope variables to blocks', () => {
      expect(output('if (true):\n    inner = 5\nprint(inner)')).toEqual(['5']);
    });

    it('should reject return outside of a function', () => {
      const err = runtimeError('return 1');
      expect(err.runtimeKind).toBe('InvalidControlFlow');
      expect(err.detail).toBe("InvalidControlFlow: 'return' outside of a function");
    });

    it('should reject break outside of a loop', () => {
      expect(runtimeError('break').detail).toBe("InvalidControlFlow: 'break' outside of a loop");
    });

    it('should not let a loop in the caller satisfy break in a callee', () => {
      const err = runtimeError('fun f(): break\nwhile (true): f()');
      expect(err.detail).toBe("InvalidControlFlow: 'break' outside of a loop");
      expect(err.line).toBe(1);
      expect(err.column).toBe(10);
    });
  });

  describe('functions', () => {
    it('should call functions with arguments', () => {
      expect(output('fun add(a, b):\n    return a + b\nprint(add(2, 3))')).toEqual(['5']);
    });

    it('should return nil without a return statement', () => {
      expect(output('fun f():\n    x = 1\nprint(f())')).toEqual(['nil']);
    });

    it('should support recursion', () => {
      const source = fs.readFileSync(path.join(FIXTURES, 'functions.loa'), 'utf-8');
      expect(output(source)).toEqual(['55', '42']);
    });

    it('should keep locals out of the caller', () => {
      const result = runSource('fun f():\n    local = 1\nf()\nprint(local)');
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.message).toBe("UndefinedVariable: Undefined variable 'local'");
        expect(result.error.line).toBe(4);
      }
    });

    it('should let parameters shadow globals', () => {
      expect(output('x = 1\nfun f(x):\n    x = x + 1\n    return x\nprint(f(10), x)')).toEqual(['11', '1']);
    });

    it('should assign through to an enclosing binding', () => {
      expect(output('total = 0\nfun bump():\n    total = total + 1\nbump()\nbump()\nprint(total)')).toEqual(['2']);
    });

    it('should capture the defining scope in closures', () => {
      const source = [
        'fun makeCounter():',
        '    count = 0',
        '    fun next():',
        '        count = count + 1',
        '        return count',
        '    return next',
        'c = makeCounter()',
        'c()',
        'print(c())',
      ].join('\n');
      expect(output(source)).toEqual(['2']);
    });

    it('should give each call its own frame', () => {
      const source = [
        'fun makeCounter():',
        '    count = 0',
        '    fun next():',
        '        count = count + 1',
        '        return count',
        '    return next',
        'a = makeCounter()',
        'b = makeCounter()',
        'a()',
        'a()',
        'print(a(), b())',
      ].join('\n');
      expect(output(source)).toEqual(['3', '1']);
    });

    it('should evaluate arguments left to right before the call', () => {
      const source = [
        'fun say(x):',
        '    print(x)',
        '    return x',
        'fun pair(a, b): return a + b',
        'print(pair(say(1), say(2)))',
      ].join('\n');
      expect(output(source)).toEqual(['1', '2', '3']);
    });

    it('should fail on arity mismatch', () => {
      const err = runtimeError('fun f(a, b): return a\nf(1)');
      expect(err.runtimeKind).toBe('ArityMismatch');
      expect(err.detail).toBe("ArityMismatch: Function 'f' expects 2 argument(s) but got 1");
      expect(err.line).toBe(2);
      expect(err.column).toBe(1);
    });

    it('should fail when calling a non-function', () => {
      const err = runtimeError('x = 3\nx(1)');
      expect(err.runtimeKind).toBe('NotCallable');
      expect(err.detail).toBe("NotCallable: 'x' is not a function (got number)");
    });

    it('should fail when calling the result of an expression that is not a function', () => {
      expect(runtimeError('fun f(): return 1\nf()()').detail).toBe('NotCallable: Expression is not a function (got number)');
    });
  });

  describe('limits', () => {
    it('should stop runaway recursion', () => {
      try {
        execute('fun down(n): return down(n + 1)\ndown(0)', { output: new BufferSink(), maxCallDepth: 100 });
        throw new Error('expected a RuntimeError');
      } catch (e) {
        expect(e).toBeInstanceOf(RuntimeError);
        if (e instanceof RuntimeError) {
          expect(e.runtimeKind).toBe('StackOverflow');
          expect(e.detail).toBe("StackOverflow: Maximum call depth of 100 exceeded in 'down'");
          expect(e.line).toBe(1);
          expect(e.column).toBe(21);
        }
      }
    });

    it('should allow recursion right up to the default call depth', () => {
      const down = 'fun down(n):\n    if (n == 0): return 0\n    return down(n - 1)\n';
      expect(run(`${down}down(${DEFAULT_MAX_CALL_DEPTH - 1})`)).toEqual({ kind: 'number', value: 0 });
      const err = runtimeError(`${down}down(${DEFAULT_MAX_CALL_DEPTH})`);
      expect(err.runtimeKind).toBe('StackOverflow');
      expect(err.detail).toBe(`StackOverflow: Maximum call depth of ${DEFAULT_MAX_CALL_DEPTH} exceeded in 'down'`);
    });

    it('should honour a custom call depth', () => {
      const result = runSource('fun down(n): return down(n + 1)\ndown(0)', { maxCallDepth: 5 });
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.message).toBe("StackOverflow: Maximum call depth of 5 exceeded in 'down'");
      }
    });

    it('should stop after the step limit', () => {
      const source = fs.readFileSync(path.join(FIXTURES, 'limited', 'forever.loa'), 'utf-8');
      const result = runSource(source, { maxSteps: 50 });
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.message).toBe('StepLimitExceeded: Execution exceeded 50 steps');
      }
    });

    it('should not count toward the limit when it is unset', () => {
      expect(output('i = 0\nwhile (i < 2000): i = i + 1\nprint(i)')).toEqual(['2000']);
    });
  });

  describe('fixtures', () => {
    it('should run the control flow script', () => {
      const source = fs.readFileSync(path.join(FIXTURES, 'control_flow.loa'), 'utf-8');
      expect(output(source)).toEqual(['1', '2', '3', '4', '5', 'equal', 'total: 10']);
    });

    it('should keep output printed before a runtime error', () => {
      const source = fs.readFileSync(path.join(FIXTURES, 'runtime_error.loa'), 'utf-8');
      const result = runSource(source);
      expect(result).toEqual({
        ok: false,
        output: ['before'],
        error: {
          kind: 'Runtime',
          message: "UndefinedVariable: Undefined variable 'missing'",
          line: 2,
          column: 7,
        },
      });
    });

    it('should print nothing when the script has a syntax error', () => {
      const source = fs.readFileSync(path.join(FIXTURES, 'syntax_error.loa'), 'utf-8');
      const result = runSource(source);
      expect(result.ok).toBe(false);
      expect(result.output).toEqual([]);
      if (!result.ok) expect(result.error.kind).toBe('Syntax');
    });

    it('should report over-deep nesting as a syntax diagnostic', () => {
      expect(runSource(`x = ${'-'.repeat(300)}1`)).toEqual({
        ok: false,
        output: [],
        error: {
          kind: 'Syntax',
          message: 'Expected at most 200 levels of nesting but found deeper nesting',
          line: 1,
          column: 205,
        },
      });
    });

    it('should report lex errors as diagnostics', () => {
      const result = runSource('print("a")\nx = 1.2.3');
      expect(result).toEqual({
        ok: false,
        output: [],
        error: {
          kind: 'Lex',
          message: "Malformed number '1.2.': more than one decimal point",
          line: 2,
          column: 5,
        },
      });
    });
  });

  describe('interpreter', () => {
    it('should keep globals between runs', () => {
      const sink = new BufferSink();
      const interpreter = new Interpreter({ output: sink });
      interpreter.run(parse('x = 2'));
      const result = interpreter.run(parse('x * 21'));
      expect(valueToString(result)).toBe('42');
      expect(interpreter.globals.has('x')).toBe(true);
    });

    it('should record trace entries when enabled', () => {
      const spy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
      try {
        const interpreter = new Interpreter({ output: new BufferSink(), trace: true });
        interpreter.run(parse('fun double(n): return n * 2\ndouble(2)'));
        const messages = interpreter.getTraceLog().map(entry => entry.replace(/^\[\d+ms\] /, ''));
        expect(messages).toEqual([
          'Program start (2 statements)',
          'Defined fun double(n)',
          'Call double(2)',
          'Return from double => 4',
          'Program end after 3 steps',
        ]);
        expect(spy).toHaveBeenCalledWith('  [trace] Call double(2)');
      } finally {
        spy.mockRestore();
      }
    });

    it('should not trace by default', () => {
      const interpreter = new Interpreter({ output: new BufferSink() });
      interpreter.run(parse('x = 1'));
      expect(interpreter.getTraceLog()).toEqual([]);
    });
  });
});

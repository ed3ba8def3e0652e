import * as AST from '../parser/ast';
import { Environment } from './environment';
import {
  LoaValue,
  LoaFunction,
  loaNumber,
  loaString,
  loaBoolean,
  loaNil,
  loaFunction,
  isTruthy,
  valueToString,
  valuesEqual,
} from './values';
import { OutputSink, ConsoleSink } from './output';
import { RuntimeError } from '../errors';

/** Sentinel thrown to implement return statements. */
class ReturnSignal {
  constructor(public value: LoaValue) {}
}

/** Sentinel thrown to implement break statements. */
class BreakSignal {}

/** Sentinel thrown to implement continue statements. */
class ContinueSignal {}

export const DEFAULT_MAX_CALL_DEPTH = 500;

export interface InterpreterOptions {
  /** Where `print` writes. Defaults to stdout. */
  output?: OutputSink;
  trace?: boolean;
  /** Abort with StepLimitExceeded after this many statements. Unlimited when unset. */
  maxSteps?: number;
  maxCallDepth?: number;
}

export class Interpreter {
  private output: OutputSink;
  private globalEnv: Environment;
  private traceEnabled: boolean;
  private traceLog: string[] = [];
  private startTime = Date.now();
  private maxSteps?: number;
  private maxCallDepth: number;
  private steps = 0;
  private callDepth = 0;
  private loopDepth = 0;

  constructor(options: InterpreterOptions = {}) {
    this.output = options.output ?? new ConsoleSink();
    this.globalEnv = new Environment();
    this.traceEnabled = options.trace ?? false;
    this.maxSteps = options.maxSteps;
    this.maxCallDepth = options.maxCallDepth ?? DEFAULT_MAX_CALL_DEPTH;
  }

  /** The root scope. It persists across run() calls on the same interpreter. */
  get globals(): Environment {
    return this.globalEnv;
  }

  /**
   * Execute a program in the global scope. Returns the value of the last
   * top-level expression statement, or nil.
   */
  run(program: AST.Program): LoaValue {
    this.startTime = Date.now();
    this.steps = 0;
    this.callDepth = 0;
    this.loopDepth = 0;
    this.trace(`Program start (${program.body.length} statements)`);

    let result: LoaValue = loaNil();
    for (const stmt of program.body) {
      const value = this.execute(stmt, this.globalEnv);
      if (stmt.type === 'ExpressionStatement') result = value;
    }

    this.trace(`Program end after ${this.steps} steps`);
    return result;
  }

  getTraceLog(): string[] {
    return [...this.traceLog];
  }

  // ─── Statement Execution ───────────────────────────────

  execute(node: AST.Statement, env: Environment): LoaValue {
    this.countStep(node);

    switch (node.type) {
      case 'PrintStatement':
        return this.executePrint(node, env);
      case 'Assignment':
        env.set(node.target.name, this.evaluate(node.value, env));
        return loaNil();
      case 'IfStatement':
        return this.executeIf(node, env);
      case 'WhileStatement':
        return this.executeWhile(node, env);
      case 'FunctionDef':
        return this.executeFunctionDef(node, env);
      case 'ReturnStatement':
        return this.executeReturn(node, env);
      case 'BreakStatement':
        this.requireLoop('break', node);
        throw new BreakSignal();
      case 'ContinueStatement':
        this.requireLoop('continue', node);
        throw new ContinueSignal();
      case 'ExpressionStatement':
        return this.evaluate(node.expression, env);
      default: {
        const unknown: never = node;
        throw new Error(`Unknown statement type: ${JSON.stringify(unknown)}`);
      }
    }
  }

  private executePrint(node: AST.PrintStatement, env: Environment): LoaValue {
    if (node.args.length === 0) {
      this.output.write('');
    }
    for (const arg of node.args) {
      this.output.write(valueToString(this.evaluate(arg, env)));
    }
    return loaNil();
  }

  private executeIf(node: AST.IfStatement, env: Environment): LoaValue {
    for (const branch of node.branches) {
      if (isTruthy(this.evaluate(branch.condition, env))) {
        this.executeBlock(branch.body, env);
        return loaNil();
      }
    }

    if (node.elseBody) {
      this.executeBlock(node.elseBody, env);
    }
    return loaNil();
  }

  private executeWhile(node: AST.WhileStatement, env: Environment): LoaValue {
    let iterations = 0;
    this.loopDepth++;
    try {
      while (isTruthy(this.evaluate(node.condition, env))) {
        iterations++;
        try {
          this.executeBlock(node.body, env);
        } catch (e) {
          if (e instanceof BreakSignal) break;
          if (e instanceof ContinueSignal) continue;
          throw e;
        }
      }
    } finally {
      this.loopDepth--;
    }

    if (this.traceEnabled) {
      this.trace(`Loop at line ${node.position.line} exited after ${iterations} iterations`);
    }
    return loaNil();
  }

  private executeFunctionDef(node: AST.FunctionDef, env: Environment): LoaValue {
    env.define(node.name, loaFunction(node.name, node.params, node.body, env));
    if (this.traceEnabled) {
      this.trace(`Defined fun ${node.name}(${node.params.join(', ')})`);
    }
    return loaNil();
  }

  private executeReturn(node: AST.ReturnStatement, env: Environment): LoaValue {
    if (this.callDepth === 0) {
      throw new RuntimeError('InvalidControlFlow', "'return' outside of a function", node.position);
    }
    const value = node.value ? this.evaluate(node.value, env) : loaNil();
    throw new ReturnSignal(value);
  }

  private requireLoop(keyword: string, node: AST.Statement): void {
    if (this.loopDepth === 0) {
      throw new RuntimeError('InvalidControlFlow', `'${keyword}' outside of a loop`, node.position);
    }
  }

  // ─── Expression Evaluation ─────────────────────────────

  evaluate(node: AST.Expression, env: Environment): LoaValue {
    switch (node.type) {
      case 'NumberLiteral':
        return loaNumber(node.value);
      case 'StringLiteral':
        return loaString(node.value);
      case 'BooleanLiteral':
        return loaBoolean(node.value);
      case 'NilLiteral':
        return loaNil();
      case 'Identifier':
        return env.get(node.name, node.position);
      case 'BinaryExpression':
        return this.evaluateBinary(node, env);
      case 'LogicalExpression':
        return this.evaluateLogical(node, env);
      case 'UnaryExpression':
        return this.evaluateUnary(node, env);
      case 'CallExpression':
        return this.evaluateCall(node, env);
      default: {
        const unknown: never = node;
        throw new Error(`Unknown expression type: ${JSON.stringify(unknown)}`);
      }
    }
  }

  private evaluateBinary(node: AST.BinaryExpression, env: Environment): LoaValue {
    const left = this.evaluate(node.left, env);
    const right = this.evaluate(node.right, env);

    switch (node.operator) {
      case '+': {
        if (left.kind === 'string' || right.kind === 'string') {
          return loaString(valueToString(left) + valueToString(right));
        }
        const [a, b] = this.requireNumbers(node, left, right);
        return loaNumber(a + b);
      }
      case '-': {
        const [a, b] = this.requireNumbers(node, left, right);
        return loaNumber(a - b);
      }
      case '*': {
        const [a, b] = this.requireNumbers(node, left, right);
        return loaNumber(a * b);
      }
      case '/': {
        const [a, b] = this.requireNumbers(node, left, right);
        if (b === 0) throw new RuntimeError('DivisionByZero', 'Division by zero', node.position);
        return loaNumber(a / b);
      }
      case '%': {
        const [a, b] = this.requireNumbers(node, left, right);
        if (b === 0) throw new RuntimeError('DivisionByZero', 'Remainder by zero', node.position);
        return loaNumber(a % b);
      }
      case '==': return loaBoolean(valuesEqual(left, right));
      case '!=': return loaBoolean(!valuesEqual(left, right));
      case '<':
      case '<=':
      case '>':
      case '>=':
        return loaBoolean(this.compare(node, left, right));
    }
  }

  private compare(node: AST.BinaryExpression, left: LoaValue, right: LoaValue): boolean {
    let less: boolean;
    let greater: boolean;
    let equal: boolean;
    if (left.kind === 'number' && right.kind === 'number') {
      less = left.value < right.value;
      greater = left.value > right.value;
      equal = left.value === right.value;
    } else if (left.kind === 'string' && right.kind === 'string') {
      less = left.value < right.value;
      greater = left.value > right.value;
      equal = left.value === right.value;
    } else {
      throw new RuntimeError(
        'TypeMismatch',
        `Cannot compare ${left.kind} with ${right.kind} using '${node.operator}'`,
        node.position,
      );
    }

    switch (node.operator) {
      case '<': return less;
      case '<=': return less || equal;
      case '>': return greater;
      default: return greater || equal;
    }
  }

  private requireNumbers(node: AST.BinaryExpression, left: LoaValue, right: LoaValue): [number, number] {
    if (left.kind !== 'number' || right.kind !== 'number') {
      throw new RuntimeError(
        'TypeMismatch',
        `Operator '${node.operator}' expects numbers but got ${left.kind} and ${right.kind}`,
        node.position,
      );
    }
    return [left.value, right.value];
  }

  private evaluateLogical(node: AST.LogicalExpression, env: Environment): LoaValue {
    const left = this.evaluate(node.left, env);
    if (node.operator === '&&') {
      if (!isTruthy(left)) return left;
      return this.evaluate(node.right, env);
    }
    if (isTruthy(left)) return left;
    return this.evaluate(node.right, env);
  }

  private evaluateUnary(node: AST.UnaryExpression, env: Environment): LoaValue {
    const operand = this.evaluate(node.operand, env);
    if (node.operator === '!') {
      return loaBoolean(!isTruthy(operand));
    }
    if (operand.kind !== 'number') {
      throw new RuntimeError('TypeMismatch', `Cannot negate a ${operand.kind}`, node.position);
    }
    return loaNumber(-operand.value);
  }

  private evaluateCall(node: AST.CallExpression, env: Environment): LoaValue {
    const callee = this.evaluate(node.callee, env);
    if (callee.kind !== 'function') {
      const label = node.callee.type === 'Identifier' ? `'${node.callee.name}'` : 'Expression';
      throw new RuntimeError('NotCallable', `${label} is not a function (got ${callee.kind})`, node.position);
    }

    const args: LoaValue[] = [];
    for (const arg of node.args) {
      args.push(this.evaluate(arg, env));
    }

    if (args.length !== callee.params.length) {
      throw new RuntimeError(
        'ArityMismatch',
        `Function '${callee.name}' expects ${callee.params.length} argument(s) but got ${args.length}`,
        node.position,
      );
    }

    return this.callFunction(callee, args, node);
  }

  private callFunction(fn: LoaFunction, args: LoaValue[], node: AST.CallExpression): LoaValue {
    if (this.callDepth >= this.maxCallDepth) {
      throw new RuntimeError(
        'StackOverflow',
        `Maximum call depth of ${this.maxCallDepth} exceeded in '${fn.name}'`,
        node.position,
      );
    }

    const frame = fn.closure.child();
    fn.params.forEach((param, i) => frame.define(param, args[i]));

    if (this.traceEnabled) {
      this.trace(`Call ${fn.name}(${args.map(valueToString).join(', ')})`);
    }

    const savedLoopDepth = this.loopDepth;
    this.loopDepth = 0;
    this.callDepth++;
    let result: LoaValue = loaNil();
    try {
      this.executeBlock(fn.body, frame);
    } catch (e) {
      if (e instanceof RangeError) {
        // The host stack ran out before maxCallDepth was reached
        throw new RuntimeError('StackOverflow', `Host call stack exhausted in '${fn.name}'`, node.position);
      }
      if (!(e instanceof ReturnSignal)) throw e;
      result = e.value;
    } finally {
      this.callDepth--;
      this.loopDepth = savedLoopDepth;
    }

    if (this.traceEnabled) {
      this.trace(`Return from ${fn.name} => ${valueToString(result)}`);
    }
    return result;
  }

  // ─── Helpers ───────────────────────────────────────────

  private executeBlock(body: AST.Statement[], env: Environment): void {
    for (const stmt of body) {
      this.execute(stmt, env);
    }
  }

  private countStep(node: AST.Statement): void {
    this.steps++;
    if (this.maxSteps !== undefined && this.steps > this.maxSteps) {
      throw new RuntimeError('StepLimitExceeded', `Execution exceeded ${this.maxSteps} steps`, node.position);
    }
  }

  private trace(message: string): void {
    if (!this.traceEnabled) return;
    this.traceLog.push(`[${Date.now() - this.startTime}ms] ${message}`);
    console.error(`  [trace] ${message}`);
  }
}

export { Lexer } from './lexer/lexer';
export { Token, TokenType, KEYWORDS } from './lexer/tokens';
export { Parser } from './parser/parser';
export * as AST from './parser/ast';
export { format, formatExpression } from './parser/printer';
export { Interpreter, InterpreterOptions, DEFAULT_MAX_CALL_DEPTH } from './runtime/interpreter';
export { Environment } from './runtime/environment';
export {
  LoaValue,
  LoaNumber,
  LoaString,
  LoaBoolean,
  LoaNil,
  LoaFunction,
  loaNumber,
  loaString,
  loaBoolean,
  loaNil,
  isTruthy,
  valueToString,
  valuesEqual,
} from './runtime/values';
export { OutputSink, ConsoleSink, BufferSink } from './runtime/output';
export { LoaConfig, loadConfig, loadConfigForScript } from './runtime/config';
export {
  LoaError,
  LexError,
  ParseError,
  RuntimeError,
  RuntimeErrorKind,
  ErrorKind,
  Diagnostic,
  Position,
} from './errors';

import { Lexer } from './lexer/lexer';
import { Parser } from './parser/parser';
import { Program } from './parser/ast';
import { Interpreter, InterpreterOptions } from './runtime/interpreter';
import { BufferSink } from './runtime/output';
import { LoaValue } from './runtime/values';
import { Diagnostic, LoaError } from './errors';

/**
 * Parse a Loa source string into an AST.
 */
export function parse(source: string): Program {
  const lexer = new Lexer(source);
  const parser = new Parser();
  return parser.parse(lexer);
}

/**
 * Execute a Loa source string. Lex, syntax and runtime errors are thrown
 * as LoaError subclasses.
 */
export function execute(source: string, options: InterpreterOptions = {}): LoaValue {
  const ast = parse(source);
  const interpreter = new Interpreter(options);
  return interpreter.run(ast);
}

export type RunResult =
  | { ok: true; output: string[]; value: LoaValue }
  | { ok: false; output: string[]; error: Diagnostic };

/**
 * Execute a Loa source string, collecting printed lines. Loa errors are
 * returned as a diagnostic together with whatever was printed before them.
 */
export function runSource(source: string, options: Omit<InterpreterOptions, 'output'> = {}): RunResult {
  const sink = new BufferSink();
  try {
    const value = execute(source, { ...options, output: sink });
    return { ok: true, output: sink.lines, value };
  } catch (error) {
    if (error instanceof LoaError) {
      return { ok: false, output: sink.lines, error: error.toDiagnostic() };
    }
    throw error;
  }
}

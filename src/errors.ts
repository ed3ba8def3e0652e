/**
 * Error types surfaced to the host. Every Loa error is fatal to the run
 * and carries the source position it was raised at.
 */

export type ErrorKind = 'Lex' | 'Syntax' | 'Runtime';

export type RuntimeErrorKind =
  | 'UndefinedVariable'
  | 'TypeMismatch'
  | 'NotCallable'
  | 'ArityMismatch'
  | 'DivisionByZero'
  | 'InvalidControlFlow'
  | 'StepLimitExceeded'
  | 'StackOverflow';

export interface Position {
  line: number;
  column: number;
}

/** Plain-data form of a LoaError, suitable for JSON or a host UI. */
export interface Diagnostic {
  kind: ErrorKind;
  message: string;
  line: number;
  column: number;
}

const PHASE_LABELS: Record<ErrorKind, string> = {
  Lex: 'Lexer',
  Syntax: 'Parse',
  Runtime: 'Runtime',
};

export abstract class LoaError extends Error {
  abstract readonly kind: ErrorKind;

  constructor(
    public readonly detail: string,
    public readonly line: number,
    public readonly column: number,
    phase: ErrorKind,
  ) {
    super(`${PHASE_LABELS[phase]} error at line ${line}, column ${column}: ${detail}`);
  }

  toDiagnostic(): Diagnostic {
    return { kind: this.kind, message: this.detail, line: this.line, column: this.column };
  }
}

export class LexError extends LoaError {
  readonly kind = 'Lex';

  constructor(detail: string, position: Position) {
    super(detail, position.line, position.column, 'Lex');
    this.name = 'LexError';
  }
}

export class ParseError extends LoaError {
  readonly kind = 'Syntax';

  constructor(
    public readonly expected: string,
    public readonly found: string,
    position: Position,
  ) {
    super(`Expected ${expected} but found ${found}`, position.line, position.column, 'Syntax');
    this.name = 'ParseError';
  }
}

export class RuntimeError extends LoaError {
  readonly kind = 'Runtime';

  constructor(
    public readonly runtimeKind: RuntimeErrorKind,
    detail: string,
    position: Position,
  ) {
    super(`${runtimeKind}: ${detail}`, position.line, position.column, 'Runtime');
    this.name = 'RuntimeError';
  }
}

import type { Position } from '../errors';

export type { Position };

export type Expression =
  | NumberLiteral
  | StringLiteral
  | BooleanLiteral
  | NilLiteral
  | Identifier
  | BinaryExpression
  | LogicalExpression
  | UnaryExpression
  | CallExpression;

export type Statement =
  | PrintStatement
  | Assignment
  | IfStatement
  | WhileStatement
  | FunctionDef
  | ReturnStatement
  | BreakStatement
  | ContinueStatement
  | ExpressionStatement;

export interface BaseNode {
  position: Position;
}

export interface Program extends BaseNode {
  type: 'Program';
  body: Statement[];
}

// ─── Statements ────────────────────────────────────────

export interface PrintStatement extends BaseNode {
  type: 'PrintStatement';
  args: Expression[];
}

export interface Assignment extends BaseNode {
  type: 'Assignment';
  target: Identifier;
  value: Expression;
}

export interface ConditionalBranch {
  condition: Expression;
  body: Statement[];
}

/**
 * `if` / `else if` / `else` chain. The first branch is the `if` itself;
 * each `else if` appends another branch in source order.
 */
export interface IfStatement extends BaseNode {
  type: 'IfStatement';
  branches: ConditionalBranch[];
  elseBody?: Statement[];
}

export interface WhileStatement extends BaseNode {
  type: 'WhileStatement';
  condition: Expression;
  body: Statement[];
}

export interface FunctionDef extends BaseNode {
  type: 'FunctionDef';
  name: string;
  params: string[];
  body: Statement[];
}

export interface ReturnStatement extends BaseNode {
  type: 'ReturnStatement';
  value?: Expression;
}

export interface BreakStatement extends BaseNode {
  type: 'BreakStatement';
}

export interface ContinueStatement extends BaseNode {
  type: 'ContinueStatement';
}

export interface ExpressionStatement extends BaseNode {
  type: 'ExpressionStatement';
  expression: Expression;
}

// ─── Expressions ───────────────────────────────────────

export interface NumberLiteral extends BaseNode {
  type: 'NumberLiteral';
  value: number;
  raw: string;
}

export interface StringLiteral extends BaseNode {
  type: 'StringLiteral';
  value: string;
}

export interface BooleanLiteral extends BaseNode {
  type: 'BooleanLiteral';
  value: boolean;
}

export interface NilLiteral extends BaseNode {
  type: 'NilLiteral';
}

export interface Identifier extends BaseNode {
  type: 'Identifier';
  name: string;
}

export type ArithmeticOperator = '+' | '-' | '*' | '/' | '%';
export type ComparisonOperator = '==' | '!=' | '<' | '<=' | '>' | '>=';
export type BinaryOperator = ArithmeticOperator | ComparisonOperator;

export interface BinaryExpression extends BaseNode {
  type: 'BinaryExpression';
  operator: BinaryOperator;
  left: Expression;
  right: Expression;
}

export interface LogicalExpression extends BaseNode {
  type: 'LogicalExpression';
  operator: '&&' | '||';
  left: Expression;
  right: Expression;
}

export interface UnaryExpression extends BaseNode {
  type: 'UnaryExpression';
  operator: '-' | '!';
  operand: Expression;
}

export interface CallExpression extends BaseNode {
  type: 'CallExpression';
  callee: Expression;
  args: Expression[];
}

export enum TokenType {
  // Literals
  STRING = 'STRING',
  NUMBER = 'NUMBER',
  BOOLEAN = 'BOOLEAN',
  NIL = 'NIL',
  IDENTIFIER = 'IDENTIFIER',

  // Operators
  PLUS = 'PLUS',               // +
  MINUS = 'MINUS',             // -
  STAR = 'STAR',               // *
  SLASH = 'SLASH',             // /
  PERCENT = 'PERCENT',         // %
  EQUALS = 'EQUALS',           // =
  BANG = 'BANG',               // !
  AND_AND = 'AND_AND',         // &&
  OR_OR = 'OR_OR',             // ||

  // Comparison
  GT = 'GT',                   // >
  LT = 'LT',                   // <
  GTE = 'GTE',                 // >=
  LTE = 'LTE',                 // <=
  EQ = 'EQ',                   // ==
  NEQ = 'NEQ',                 // !=

  // Delimiters
  LPAREN = 'LPAREN',           // (
  RPAREN = 'RPAREN',           // )
  COMMA = 'COMMA',             // ,
  COLON = 'COLON',             // :
  SEMICOLON = 'SEMICOLON',     // ;

  // Keywords
  FUN = 'FUN',
  IF = 'IF',
  ELSE = 'ELSE',
  WHILE = 'WHILE',
  RETURN = 'RETURN',
  BREAK = 'BREAK',
  CONTINUE = 'CONTINUE',
  PRINT = 'PRINT',

  // Structure
  NEWLINE = 'NEWLINE',
  INDENT = 'INDENT',
  DEDENT = 'DEDENT',
  EOF = 'EOF',
}

export const KEYWORDS: Record<string, TokenType> = {
  'fun': TokenType.FUN,
  'if': TokenType.IF,
  'else': TokenType.ELSE,
  'while': TokenType.WHILE,
  'return': TokenType.RETURN,
  'break': TokenType.BREAK,
  'continue': TokenType.CONTINUE,
  'print': TokenType.PRINT,
  'true': TokenType.BOOLEAN,
  'false': TokenType.BOOLEAN,
  'nil': TokenType.NIL,
};

export interface Token {
  type: TokenType;
  value: string;
  line: number;
  column: number;
}

/**
 * Human-readable description of a token, used in syntax error messages.
 */
export function describeToken(token: Token): string {
  switch (token.type) {
    case TokenType.EOF: return 'end of input';
    case TokenType.NEWLINE: return 'end of line';
    case TokenType.INDENT: return 'indent';
    case TokenType.DEDENT: return 'dedent';
    case TokenType.STRING: return `string "${token.value}"`;
    default: return `'${token.value}'`;
  }
}

import { Token, TokenType, describeToken } from '../lexer/tokens';
import { ParseError } from '../errors';
import * as AST from './ast';

const EQUALITY_OPERATORS: Partial<Record<TokenType, AST.ComparisonOperator>> = {
  [TokenType.EQ]: '==',
  [TokenType.NEQ]: '!=',
};

const RELATIONAL_OPERATORS: Partial<Record<TokenType, AST.ComparisonOperator>> = {
  [TokenType.LT]: '<',
  [TokenType.LTE]: '<=',
  [TokenType.GT]: '>',
  [TokenType.GTE]: '>=',
};

const ADDITIVE_OPERATORS: Partial<Record<TokenType, AST.ArithmeticOperator>> = {
  [TokenType.PLUS]: '+',
  [TokenType.MINUS]: '-',
};

// Deepest expression nesting (parentheses, call arguments, prefix operators) accepted
export const MAX_NESTING_DEPTH = 200;

const MULTIPLICATIVE_OPERATORS: Partial<Record<TokenType, AST.ArithmeticOperator>> = {
  [TokenType.STAR]: '*',
  [TokenType.SLASH]: '/',
  [TokenType.PERCENT]: '%',
};

/**
 * Recursive-descent parser for Loa. Stops at the first syntax error.
 */
export class Parser {
  private tokens: Token[] = [];
  private pos = 0;
  private depth = 0;

  parse(tokens: Iterable<Token>): AST.Program {
    this.tokens = Array.isArray(tokens) ? tokens : Array.from(tokens);
    this.pos = 0;
    this.depth = 0;

    const body: AST.Statement[] = [];

    try {
      while (!this.check(TokenType.EOF)) {
        this.skipNewlines();
        if (this.check(TokenType.EOF)) break;
        body.push(this.parseStatement());
      }
    } catch (e) {
      // Deeply nested blocks can still exhaust the host stack
      if (e instanceof RangeError) throw this.tooDeep();
      throw e;
    }

    return {
      type: 'Program',
      body,
      position: { line: 1, column: 1 },
    };
  }

  // ─── Statements ────────────────────────────────────────

  private parseStatement(): AST.Statement {
    const tok = this.peek();

    if (tok.type === TokenType.IF) return this.parseIfStatement();
    if (tok.type === TokenType.WHILE) return this.parseWhileStatement();
    if (tok.type === TokenType.FUN) return this.parseFunctionDef();

    const stmt = this.parseSimpleStatement();
    this.endStatement();
    return stmt;
  }

  private parseSimpleStatement(): AST.Statement {
    const tok = this.peek();

    switch (tok.type) {
      case TokenType.PRINT: return this.parsePrintStatement();
      case TokenType.RETURN: return this.parseReturnStatement();
      case TokenType.BREAK:
        this.advance();
        return { type: 'BreakStatement', position: this.positionOf(tok) };
      case TokenType.CONTINUE:
        this.advance();
        return { type: 'ContinueStatement', position: this.positionOf(tok) };
      case TokenType.IF:
      case TokenType.WHILE:
      case TokenType.FUN:
        throw this.error('a simple statement (compound statements need an indented block)');
      default:
        return this.parseAssignmentOrExpression();
    }
  }

  /**
   * A simple statement ends at a newline, a `;`, the end of its block or
   * the end of input.
   */
  private endStatement(): void {
    if (this.match(TokenType.SEMICOLON)) {
      this.match(TokenType.NEWLINE);
      return;
    }
    if (this.match(TokenType.NEWLINE)) return;
    if (this.check(TokenType.DEDENT) || this.check(TokenType.EOF)) return;
    throw this.error('end of statement');
  }

  private parsePrintStatement(): AST.PrintStatement {
    const pos = this.position();
    this.expect(TokenType.PRINT, "'print'");
    this.expect(TokenType.LPAREN, "'(' after 'print'");
    const args = this.parseArgList();
    this.expect(TokenType.RPAREN, "')'");
    return { type: 'PrintStatement', args, position: pos };
  }

  private parseReturnStatement(): AST.ReturnStatement {
    const pos = this.position();
    this.expect(TokenType.RETURN, "'return'");
    if (this.atStatementEnd()) {
      return { type: 'ReturnStatement', position: pos };
    }
    const value = this.parseExpression();
    return { type: 'ReturnStatement', value, position: pos };
  }

  private parseAssignmentOrExpression(): AST.Statement {
    const pos = this.position();

    if (this.check(TokenType.IDENTIFIER) && this.peekAhead(1)?.type === TokenType.EQUALS) {
      const nameTok = this.advance();
      this.advance(); // consume =
      const value = this.parseExpression();
      return {
        type: 'Assignment',
        target: { type: 'Identifier', name: nameTok.value, position: this.positionOf(nameTok) },
        value,
        position: pos,
      };
    }

    const expression = this.parseExpression();
    if (this.check(TokenType.EQUALS)) {
      throw this.error('end of statement (only a name can be assigned to)');
    }
    return { type: 'ExpressionStatement', expression, position: pos };
  }

  // ─── Control Flow ──────────────────────────────────────

  private parseIfStatement(): AST.IfStatement {
    const pos = this.position();
    this.expect(TokenType.IF, "'if'");
    const branches: AST.ConditionalBranch[] = [this.parseBranch()];

    let elseBody: AST.Statement[] | undefined;
    while (this.check(TokenType.ELSE)) {
      this.advance();
      if (this.match(TokenType.IF)) {
        branches.push(this.parseBranch());
        continue;
      }
      this.expect(TokenType.COLON, "':' after 'else'");
      elseBody = this.parseBlock();
      break;
    }

    return { type: 'IfStatement', branches, elseBody, position: pos };
  }

  private parseBranch(): AST.ConditionalBranch {
    const condition = this.parseExpression();
    this.expect(TokenType.COLON, "':' after condition");
    const body = this.parseBlock();
    return { condition, body };
  }

  private parseWhileStatement(): AST.WhileStatement {
    const pos = this.position();
    this.expect(TokenType.WHILE, "'while'");
    const condition = this.parseExpression();
    this.expect(TokenType.COLON, "':' after loop condition");
    const body = this.parseBlock();
    return { type: 'WhileStatement', condition, body, position: pos };
  }

  private parseFunctionDef(): AST.FunctionDef {
    const pos = this.position();
    this.expect(TokenType.FUN, "'fun'");
    const name = this.expect(TokenType.IDENTIFIER, 'function name').value;
    this.expect(TokenType.LPAREN, `'(' after function name '${name}'`);

    const params: string[] = [];
    if (!this.check(TokenType.RPAREN)) {
      do {
        const paramTok = this.peek();
        const param = this.expect(TokenType.IDENTIFIER, 'parameter name').value;
        if (params.includes(param)) {
          throw new ParseError('a unique parameter name', `duplicate parameter '${param}'`, this.positionOf(paramTok));
        }
        params.push(param);
      } while (this.match(TokenType.COMMA));
    }

    this.expect(TokenType.RPAREN, "')' after parameters");
    this.expect(TokenType.COLON, "':' after function parameters");
    const body = this.parseBlock();
    return { type: 'FunctionDef', name, params, body, position: pos };
  }

  // ─── Blocks ────────────────────────────────────────────

  /**
   * Parses the body following a `:`. Either an indented suite on the
   * following lines, or `;`-separated simple statements on the same line.
   */
  private parseBlock(): AST.Statement[] {
    const body: AST.Statement[] = [];

    if (this.match(TokenType.NEWLINE)) {
      this.skipNewlines();
      this.expect(TokenType.INDENT, 'an indented block');
      while (!this.check(TokenType.DEDENT) && !this.check(TokenType.EOF)) {
        this.skipNewlines();
        if (this.check(TokenType.DEDENT) || this.check(TokenType.EOF)) break;
        body.push(this.parseStatement());
      }
      this.match(TokenType.DEDENT);
      return body;
    }

    if (this.check(TokenType.EOF)) {
      throw this.error('a block');
    }

    // Single-line block
    for (;;) {
      body.push(this.parseSimpleStatement());
      if (!this.match(TokenType.SEMICOLON) || this.atStatementEnd()) break;
    }
    if (!this.match(TokenType.NEWLINE) && !this.check(TokenType.DEDENT) && !this.check(TokenType.EOF)) {
      throw this.error('end of statement');
    }
    return body;
  }

  // ─── Expressions ───────────────────────────────────────

  parseExpression(): AST.Expression {
    return this.nested(() => this.parseOr());
  }

  private parseOr(): AST.Expression {
    let left = this.parseAnd();
    while (this.check(TokenType.OR_OR)) {
      const pos = this.position();
      this.advance();
      const right = this.parseAnd();
      left = { type: 'LogicalExpression', operator: '||', left, right, position: pos };
    }
    return left;
  }

  private parseAnd(): AST.Expression {
    let left = this.parseEquality();
    while (this.check(TokenType.AND_AND)) {
      const pos = this.position();
      this.advance();
      const right = this.parseEquality();
      left = { type: 'LogicalExpression', operator: '&&', left, right, position: pos };
    }
    return left;
  }

  private parseEquality(): AST.Expression {
    return this.parseBinaryLevel(EQUALITY_OPERATORS, () => this.parseRelational());
  }

  private parseRelational(): AST.Expression {
    return this.parseBinaryLevel(RELATIONAL_OPERATORS, () => this.parseAdditive());
  }

  private parseAdditive(): AST.Expression {
    return this.parseBinaryLevel(ADDITIVE_OPERATORS, () => this.parseMultiplicative());
  }

  private parseMultiplicative(): AST.Expression {
    return this.parseBinaryLevel(MULTIPLICATIVE_OPERATORS, () => this.parseUnary());
  }

  /** One left-associative precedence tier. */
  private parseBinaryLevel(
    operators: Partial<Record<TokenType, AST.BinaryOperator>>,
    next: () => AST.Expression,
  ): AST.Expression {
    let left = next();
    for (;;) {
      const operator = operators[this.peek().type];
      if (!operator) return left;
      const pos = this.position();
      this.advance();
      const right = next();
      left = { type: 'BinaryExpression', operator, left, right, position: pos };
    }
  }

  private parseUnary(): AST.Expression {
    if (this.check(TokenType.MINUS) || this.check(TokenType.BANG)) {
      const pos = this.position();
      const operator = this.advance().type === TokenType.MINUS ? '-' : '!';
      const operand = this.nested(() => this.parseUnary());
      return { type: 'UnaryExpression', operator, operand, position: pos };
    }
    return this.parseCall();
  }

  private parseCall(): AST.Expression {
    let expr = this.parsePrimary();
    const pos = expr.position;
    while (this.check(TokenType.LPAREN)) {
      this.advance();
      const args = this.parseArgList();
      this.expect(TokenType.RPAREN, "')' after arguments");
      expr = { type: 'CallExpression', callee: expr, args, position: pos };
    }
    return expr;
  }

  private parsePrimary(): AST.Expression {
    const tok = this.peek();
    const pos = this.positionOf(tok);

    switch (tok.type) {
      case TokenType.NUMBER:
        this.advance();
        return { type: 'NumberLiteral', value: Number(tok.value), raw: tok.value, position: pos };
      case TokenType.STRING:
        this.advance();
        return { type: 'StringLiteral', value: tok.value, position: pos };
      case TokenType.BOOLEAN:
        this.advance();
        return { type: 'BooleanLiteral', value: tok.value === 'true', position: pos };
      case TokenType.NIL:
        this.advance();
        return { type: 'NilLiteral', position: pos };
      case TokenType.IDENTIFIER:
        this.advance();
        return { type: 'Identifier', name: tok.value, position: pos };
      case TokenType.LPAREN: {
        this.advance();
        const expr = this.parseExpression();
        this.expect(TokenType.RPAREN, "')'");
        return expr;
      }
      default:
        throw this.error('an expression');
    }
  }

  private parseArgList(): AST.Expression[] {
    const args: AST.Expression[] = [];
    if (this.check(TokenType.RPAREN)) return args;

    args.push(this.parseExpression());
    while (this.match(TokenType.COMMA)) {
      args.push(this.parseExpression());
    }
    return args;
  }

  // ─── Helpers ───────────────────────────────────────────

  private peek(): Token {
    return this.tokens[this.pos] ?? this.tokens[this.tokens.length - 1] ?? { type: TokenType.EOF, value: '', line: 1, column: 1 };
  }

  private peekAhead(offset: number): Token | undefined {
    return this.tokens[this.pos + offset];
  }

  private advance(): Token {
    const tok = this.peek();
    if (this.pos < this.tokens.length) this.pos++;
    return tok;
  }

  private check(type: TokenType): boolean {
    return this.peek().type === type;
  }

  private match(type: TokenType): boolean {
    if (this.check(type)) {
      this.advance();
      return true;
    }
    return false;
  }

  private expect(type: TokenType, expected: string): Token {
    if (!this.check(type)) {
      throw this.error(expected);
    }
    return this.advance();
  }

  private atStatementEnd(): boolean {
    return this.check(TokenType.NEWLINE)
      || this.check(TokenType.SEMICOLON)
      || this.check(TokenType.DEDENT)
      || this.check(TokenType.EOF);
  }

  private skipNewlines(): void {
    while (this.check(TokenType.NEWLINE)) {
      this.advance();
    }
  }

  private position(): AST.Position {
    return this.positionOf(this.peek());
  }

  private positionOf(tok: Token): AST.Position {
    return { line: tok.line, column: tok.column };
  }

  private nested<T>(parse: () => T): T {
    if (this.depth >= MAX_NESTING_DEPTH) throw this.tooDeep();
    this.depth++;
    try {
      return parse();
    } finally {
      this.depth--;
    }
  }

  private tooDeep(): ParseError {
    return new ParseError(`at most ${MAX_NESTING_DEPTH} levels of nesting`, 'deeper nesting', this.position());
  }

  private error(expected: string): ParseError {
    const tok = this.peek();
    return new ParseError(expected, describeToken(tok), this.positionOf(tok));
  }
}

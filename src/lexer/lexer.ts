import { Token, TokenType, KEYWORDS } from './tokens';
import { LexError } from '../errors';

/**
 * Turns Loa source text into tokens. Iteration is lazy and every call to
 * tokens() (or for..of over the lexer) starts a fresh scan of the source.
 */
export class Lexer implements Iterable<Token> {
  constructor(private readonly source: string) {}

  *tokens(): Generator<Token, void, undefined> {
    yield* new Scanner(this.source).scan();
  }

  [Symbol.iterator](): Iterator<Token> {
    return this.tokens();
  }

  tokenize(): Token[] {
    return Array.from(this.tokens());
  }
}

class Scanner {
  private pending: Token[] = [];
  private lastType: TokenType | null = null;
  private pos = 0;
  private line = 1;
  private column = 1;
  private indentStack: number[] = [0];
  private atLineStart = true;
  private parenDepth = 0;

  constructor(private readonly source: string) {}

  *scan(): Generator<Token, void, undefined> {
    while (this.pos < this.source.length) {
      if (this.atLineStart) {
        this.handleIndentation();
        this.atLineStart = false;
        yield* this.flush();
      }

      if (this.pos >= this.source.length) break;

      const ch = this.source[this.pos];

      if (ch === ' ' || ch === '\t') {
        this.advance();
        continue;
      }

      if (ch === '\n' || ch === '\r') {
        const column = this.column;
        this.advance();
        if (ch === '\r' && this.peekChar() === '\n') this.advance();
        this.handleNewline(column);
      } else if (ch === '/' && this.peekChar(1) === '/') {
        this.skipLineComment();
      } else if (ch === '/' && this.peekChar(1) === '*') {
        this.skipBlockComment();
      } else if (ch === '"') {
        this.readString();
      } else if (this.isDigit(ch) || (ch === '.' && this.isDigit(this.peekChar(1)))) {
        this.readNumber();
      } else if (this.isAlpha(ch)) {
        this.readIdentifier();
      } else {
        this.readOperator();
      }

      yield* this.flush();
    }

    // Close any blocks still open at end of input
    while (this.indentStack.length > 1) {
      this.indentStack.pop();
      this.addToken(TokenType.DEDENT, '');
    }
    this.addToken(TokenType.EOF, '');
    yield* this.flush();
  }

  private *flush(): Generator<Token, void, undefined> {
    while (this.pending.length > 0) {
      const tok = this.pending.shift();
      if (tok) yield tok;
    }
  }

  private handleNewline(column: number): void {
    if (this.parenDepth === 0 && this.lastType !== null && this.lastType !== TokenType.NEWLINE) {
      this.addTokenAt(TokenType.NEWLINE, '\\n', this.line, column);
    }
    this.line++;
    this.column = 1;
    this.atLineStart = true;
  }

  private handleIndentation(): void {
    let indent = 0;
    while (this.peekChar() === ' ' || this.peekChar() === '\t') {
      indent += this.peekChar() === '\t' ? 4 : 1;
      this.advance();
    }

    if (this.parenDepth > 0) return;

    // A line may open with block comments; they don't count as content
    while (this.peekChar() === '/' && this.peekChar(1) === '*') {
      this.skipBlockComment();
      while (this.peekChar() === ' ' || this.peekChar() === '\t') this.advance();
    }

    // Blank and comment-only lines leave the indentation alone
    const ch = this.peekChar();
    if (ch === '' || ch === '\n' || ch === '\r') return;
    if (ch === '/' && this.peekChar(1) === '/') return;

    const currentIndent = this.indentStack[this.indentStack.length - 1];

    if (indent > currentIndent) {
      this.indentStack.push(indent);
      this.addToken(TokenType.INDENT, '');
    } else if (indent < currentIndent) {
      while (this.indentStack.length > 1 && this.indentStack[this.indentStack.length - 1] > indent) {
        this.indentStack.pop();
        this.addToken(TokenType.DEDENT, '');
      }
      if (this.indentStack[this.indentStack.length - 1] !== indent) {
        throw this.error('Inconsistent indentation: dedent does not match any outer block');
      }
    }
  }

  private skipLineComment(): void {
    while (this.pos < this.source.length && this.source[this.pos] !== '\n' && this.source[this.pos] !== '\r') {
      this.advance();
    }
  }

  private skipBlockComment(): void {
    const start = { line: this.line, column: this.column };
    this.advance(); this.advance(); // skip /*
    while (this.pos < this.source.length) {
      if (this.source[this.pos] === '*' && this.peekChar(1) === '/') {
        this.advance(); this.advance();
        return;
      }
      if (this.source[this.pos] === '\n') {
        this.pos++;
        this.line++;
        this.column = 1;
        continue;
      }
      this.advance();
    }
    throw new LexError('Unterminated block comment', start);
  }

  private readString(): void {
    const startLine = this.line;
    const startCol = this.column;
    this.advance(); // skip opening quote
    let text = '';
    while (this.pos < this.source.length && this.source[this.pos] !== '"') {
      const ch = this.source[this.pos];
      if (ch === '\n' || ch === '\r') {
        throw new LexError('Unterminated string', { line: startLine, column: startCol });
      }
      if (ch === '\\') {
        this.advance();
        if (this.pos >= this.source.length) break;
        const escaped = this.source[this.pos];
        switch (escaped) {
          case 'n': text += '\n'; break;
          case 't': text += '\t'; break;
          case 'r': text += '\r'; break;
          case '\\': text += '\\'; break;
          case '"': text += '"'; break;
          default: text += '\\' + escaped;
        }
        this.advance();
      } else {
        text += ch;
        this.advance();
      }
    }
    if (this.pos >= this.source.length) {
      throw new LexError('Unterminated string', { line: startLine, column: startCol });
    }
    this.advance(); // skip closing quote
    this.addTokenAt(TokenType.STRING, text, startLine, startCol);
  }

  private readNumber(): void {
    const startCol = this.column;
    let num = '';
    let hasDot = false;
    while (this.isDigit(this.peekChar()) || this.peekChar() === '.') {
      if (this.peekChar() === '.') {
        if (hasDot) {
          throw new LexError(`Malformed number '${num}.': more than one decimal point`, { line: this.line, column: startCol });
        }
        hasDot = true;
      }
      num += this.source[this.pos];
      this.advance();
    }
    if (this.isAlpha(this.peekChar())) {
      throw new LexError(`Malformed number '${num}${this.peekChar()}'`, { line: this.line, column: startCol });
    }
    this.addTokenAt(TokenType.NUMBER, num, this.line, startCol);
  }

  private readIdentifier(): void {
    const startCol = this.column;
    let id = '';
    while (this.isAlphaNumeric(this.peekChar())) {
      id += this.source[this.pos];
      this.advance();
    }

    const keyword = Object.prototype.hasOwnProperty.call(KEYWORDS, id) ? KEYWORDS[id] : undefined;
    this.addTokenAt(keyword ?? TokenType.IDENTIFIER, id, this.line, startCol);
  }

  private readOperator(): void {
    const ch = this.source[this.pos];
    const next = this.peekChar(1);
    const startCol = this.column;

    const single = (type: TokenType): void => {
      this.advance();
      this.addTokenAt(type, ch, this.line, startCol);
    };
    const double = (type: TokenType): void => {
      this.advance(); this.advance();
      this.addTokenAt(type, ch + next, this.line, startCol);
    };

    switch (ch) {
      case '+': single(TokenType.PLUS); break;
      case '-': single(TokenType.MINUS); break;
      case '*': single(TokenType.STAR); break;
      case '/': single(TokenType.SLASH); break;
      case '%': single(TokenType.PERCENT); break;
      case ',': single(TokenType.COMMA); break;
      case ':': single(TokenType.COLON); break;
      case ';': single(TokenType.SEMICOLON); break;
      case '>':
        if (next === '=') double(TokenType.GTE);
        else single(TokenType.GT);
        break;
      case '<':
        if (next === '=') double(TokenType.LTE);
        else single(TokenType.LT);
        break;
      case '=':
        if (next === '=') double(TokenType.EQ);
        else single(TokenType.EQUALS);
        break;
      case '!':
        if (next === '=') double(TokenType.NEQ);
        else single(TokenType.BANG);
        break;
      case '&':
        if (next !== '&') throw this.error(`Unexpected character '&' (did you mean '&&'?)`);
        double(TokenType.AND_AND);
        break;
      case '|':
        if (next !== '|') throw this.error(`Unexpected character '|' (did you mean '||'?)`);
        double(TokenType.OR_OR);
        break;
      case '(':
        this.parenDepth++;
        single(TokenType.LPAREN);
        break;
      case ')':
        this.parenDepth = Math.max(0, this.parenDepth - 1);
        single(TokenType.RPAREN);
        break;
      default:
        throw this.error(`Unexpected character '${ch}'`);
    }
  }

  private peekChar(offset = 0): string {
    const idx = this.pos + offset;
    return idx < this.source.length ? this.source[idx] : '';
  }

  private advance(): void {
    this.pos++;
    this.column++;
  }

  private addToken(type: TokenType, value: string): void {
    this.addTokenAt(type, value, this.line, this.column);
  }

  private addTokenAt(type: TokenType, value: string, line: number, column: number): void {
    this.pending.push({ type, value, line, column });
    this.lastType = type;
  }

  private isDigit(ch: string): boolean {
    return ch >= '0' && ch <= '9';
  }

  private isAlpha(ch: string): boolean {
    return (ch >= 'a' && ch <= 'z') || (ch >= 'A' && ch <= 'Z') || ch === '_';
  }

  private isAlphaNumeric(ch: string): boolean {
    return this.isAlpha(ch) || this.isDigit(ch);
  }

  private error(message: string): LexError {
    return new LexError(message, { line: this.line, column: this.column });
  }
}

import * as readline from 'readline';
import { Lexer } from './lexer/lexer';
import { TokenType } from './lexer/tokens';
import { Parser } from './parser/parser';
import { Interpreter, InterpreterOptions } from './runtime/interpreter';
import { OutputSink, ConsoleSink } from './runtime/output';
import { valueToString } from './runtime/values';
import { LexError, LoaError } from './errors';

export const PROMPT = 'Loa > ';
export const CONTINUATION_PROMPT = '... ';

const EXIT_COMMANDS = new Set(['exit', 'quit']);
const LAYOUT_TOKENS = new Set([TokenType.NEWLINE, TokenType.INDENT, TokenType.DEDENT, TokenType.EOF]);

export interface ReplSessionOptions extends Omit<InterpreterOptions, 'output'> {
  output: OutputSink;
  /** Receives one message per failed input. */
  onError: (message: string) => void;
}

/**
 * Line-at-a-time driver over a single interpreter, so bindings survive
 * between inputs. A line whose last token is ':' opens a block that is collected
 * until the next blank line.
 */
export class ReplSession {
  private interpreter: Interpreter;
  private output: OutputSink;
  private onError: (message: string) => void;
  private pending: string[] = [];

  constructor(options: ReplSessionOptions) {
    const { output, onError, ...interpreterOptions } = options;
    this.output = output;
    this.onError = onError;
    this.interpreter = new Interpreter({ ...interpreterOptions, output });
  }

  get prompt(): string {
    return this.pending.length > 0 ? CONTINUATION_PROMPT : PROMPT;
  }

  /** Feed one input line. Returns false once the user asked to leave. */
  feed(line: string): boolean {
    const trimmed = line.trim();

    if (this.pending.length > 0) {
      if (trimmed === '') {
        const source = this.pending.join('\n');
        this.pending = [];
        this.evaluate(source);
      } else {
        this.pending.push(line);
      }
      return true;
    }

    if (EXIT_COMMANDS.has(trimmed)) return false;
    if (trimmed === '') return true;

    if (opensBlock(line)) {
      this.pending.push(line);
      return true;
    }

    this.evaluate(line);
    return true;
  }

  private evaluate(source: string): void {
    try {
      const program = new Parser().parse(new Lexer(source));
      const result = this.interpreter.run(program);
      if (result.kind !== 'nil') {
        this.output.write(`=> ${valueToString(result)}`);
      }
    } catch (error) {
      if (!(error instanceof LoaError)) throw error;
      this.onError(error.message);
    }
  }
}

/** True when the last token on the line, comments aside, is ':'. */
function opensBlock(line: string): boolean {
  let last: TokenType | undefined;
  try {
    for (const tok of new Lexer(line)) {
      if (!LAYOUT_TOKENS.has(tok.type)) last = tok.type;
    }
  } catch (error) {
    // Let evaluate() report the malformed line
    if (error instanceof LexError) return false;
    throw error;
  }
  return last === TokenType.COLON;
}

/**
 * Run an interactive session over the given streams until `exit`, `quit`
 * or end of input.
 */
export function startRepl(
  input: NodeJS.ReadableStream,
  output: NodeJS.WritableStream,
  errorOutput: NodeJS.WritableStream,
  options: Omit<InterpreterOptions, 'output'> = {},
): Promise<void> {
  const session = new ReplSession({
    ...options,
    output: new ConsoleSink(output),
    onError: message => errorOutput.write(`Error: ${message}\n`),
  });

  const rl = readline.createInterface({ input, output, terminal: false });

  return new Promise((resolve, reject) => {
    rl.on('close', () => resolve());
    rl.on('line', line => {
      try {
        if (!session.feed(line)) {
          rl.close();
          return;
        }
      } catch (error) {
        rl.close();
        reject(error);
        return;
      }
      rl.setPrompt(session.prompt);
      rl.prompt();
    });

    rl.setPrompt(session.prompt);
    rl.prompt();
  });
}

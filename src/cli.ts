#!/usr/bin/env node

import * as fs from 'fs';
import * as path from 'path';
import { Lexer } from './lexer/lexer';
import { Parser } from './parser/parser';
import { format } from './parser/printer';
import { Interpreter } from './runtime/interpreter';
import { ConsoleSink } from './runtime/output';
import { loadConfig, loadConfigForScript, LoaConfig } from './runtime/config';
import { startRepl } from './repl';

export const VERSION = '0.1.0';

export const USAGE = `
loa - The Loa Language Interpreter v${VERSION}

Usage:
  loa run <file.loa>          Run a Loa script
  loa <file.loa>              Same as run
  loa repl                    Start an interactive session
  loa --lex <file.loa>        Tokenize and print tokens
  loa --parse <file.loa>      Parse and print AST as JSON
  loa --format <file.loa>     Print the script in canonical form
  loa --version, -V           Show the interpreter version
  loa help, --help            Show this help message

Options:
  --trace                     Enable execution tracing (on stderr)
  --max-steps <n>             Abort after n executed statements
  --max-call-depth <n>        Maximum function call depth (default: 500)
  --config <path>             Path to loa.config.json (auto-detected by default)

Examples:
  loa run examples/hello.loa
  loa --trace examples/fib.loa
  loa --format examples/fib.loa
`;

export interface CliIO {
  stdin: NodeJS.ReadableStream;
  stdout: NodeJS.WritableStream;
  stderr: NodeJS.WritableStream;
}

const FLAGS_WITH_VALUES = new Set(['--config', '--max-steps', '--max-call-depth']);
const BOOLEAN_FLAGS = new Set(['--trace', '--lex', '--parse', '--format']);

function getArg(args: string[], flag: string): string | undefined {
  const idx = args.indexOf(flag);
  if (idx !== -1 && idx + 1 < args.length) {
    return args[idx + 1];
  }
  return undefined;
}

function parsePositiveInt(flag: string, value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const n = Number(value);
  if (!Number.isInteger(n) || n <= 0) {
    throw new Error(`${flag} expects a positive integer, got "${value}"`);
  }
  return n;
}

/**
 * Merge configuration with command-line overrides. Flags win.
 */
function resolveSettings(args: string[], config: LoaConfig): LoaConfig {
  return {
    trace: args.includes('--trace') || config.trace,
    maxSteps: parsePositiveInt('--max-steps', getArg(args, '--max-steps')) ?? config.maxSteps,
    maxCallDepth: parsePositiveInt('--max-call-depth', getArg(args, '--max-call-depth')) ?? config.maxCallDepth,
  };
}

export async function main(args: string[], io: CliIO = process): Promise<number> {
  const out = (text: string): void => { io.stdout.write(text + '\n'); };
  const err = (text: string): void => { io.stderr.write(text + '\n'); };

  if (args.length === 0) {
    err(USAGE);
    return 1;
  }

  if (args[0] === 'help' || args.includes('--help') || args.includes('-h')) {
    out(USAGE);
    return 0;
  }

  if (args[0] === '--version' || args[0] === '-V') {
    out(VERSION);
    return 0;
  }

  const flags = new Set(args.filter(a => a.startsWith('-')));
  const positional: string[] = [];
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (FLAGS_WITH_VALUES.has(arg)) {
      i++; // Skip the flag's value
      continue;
    }
    if (BOOLEAN_FLAGS.has(arg)) continue;
    if (arg.startsWith('-')) {
      err(`Error: Unknown option "${arg}". Run "loa --help" for usage.`);
      return 1;
    }
    positional.push(arg);
  }

  try {
    if (positional[0] === 'repl') {
      const config = resolveSettings(args, loadConfig(getArg(args, '--config')));
      await startRepl(io.stdin, io.stdout, io.stderr, config);
      return 0;
    }

    const file = positional[0] === 'run' ? positional[1] : positional[0];
    if (!file) {
      err('Usage: loa run <file.loa>');
      return 1;
    }

    const filePath = path.resolve(file);
    if (!fs.existsSync(filePath)) {
      err(`Error: File not found: ${filePath}`);
      return 1;
    }

    const source = fs.readFileSync(filePath, 'utf-8');

    // Lex-only mode
    if (flags.has('--lex')) {
      for (const tok of new Lexer(source)) {
        const val = tok.value ? ` ${JSON.stringify(tok.value)}` : '';
        out(`${tok.line}:${tok.column}\t${tok.type}${val}`);
      }
      return 0;
    }

    const ast = new Parser().parse(new Lexer(source));

    // Parse-only mode
    if (flags.has('--parse')) {
      out(JSON.stringify(ast, null, 2));
      return 0;
    }

    if (flags.has('--format')) {
      io.stdout.write(format(ast));
      return 0;
    }

    const explicitConfig = getArg(args, '--config');
    const config = explicitConfig ? loadConfig(explicitConfig) : loadConfigForScript(filePath);
    const settings = resolveSettings(args, config);

    const interpreter = new Interpreter({
      output: new ConsoleSink(io.stdout),
      trace: settings.trace,
      maxSteps: settings.maxSteps,
      maxCallDepth: settings.maxCallDepth,
    });
    interpreter.run(ast);
    return 0;
  } catch (e) {
    const message = e instanceof Error ? e.message : String(e);
    err(`Error: ${message}`);
    if (flags.has('--trace') && e instanceof Error && e.stack) {
      err(e.stack);
    }
    return 1;
  }
}

if (require.main === module) {
  main(process.argv.slice(2)).then(
    code => { process.exitCode = code; },
    (error: unknown) => {
      console.error(error);
      process.exitCode = 1;
    },
  );
}

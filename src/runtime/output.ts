/**
 * Destination for `print` output. The interpreter hands over one rendered
 * line per call, without the trailing newline; the host decides where it goes.
 */
export interface OutputSink {
  write(line: string): void;
}

/**
 * Writes each line to stdout.
 */
export class ConsoleSink implements OutputSink {
  constructor(private readonly stream: NodeJS.WritableStream = process.stdout) {}

  write(line: string): void {
    this.stream.write(line + '\n');
  }
}

/**
 * Collects lines in memory. Used by runSource() and by tests.
 */
export class BufferSink implements OutputSink {
  readonly lines: string[] = [];

  write(line: string): void {
    this.lines.push(line);
  }

  toString(): string {
    return this.lines.map(line => line + '\n').join('');
  }
}

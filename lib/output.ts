/**
 * Line-oriented sink for the progress and result lines shown to the operator
 */
export interface OutputSink {
  write(text: string): void;
  writeLine(text?: string): void;
}

export class ConsoleOutput implements OutputSink {
  constructor(private readonly stream: NodeJS.WritableStream = process.stdout) {}

  write(text: string): void {
    this.stream.write(text);
  }

  writeLine(text: string = ''): void {
    this.stream.write(`${text}\n`);
  }
}

/**
 * Collects output in memory; partial writes are joined into the next line
 */
export class MemoryOutput implements OutputSink {
  readonly lines: string[] = [];
  private pending = '';

  write(text: string): void {
    this.pending += text;
  }

  writeLine(text: string = ''): void {
    this.lines.push(this.pending + text);
    this.pending = '';
  }
}

import readline from 'readline/promises';
import type { ConflictChoice } from '@/types/documents';
import type { DecisionProvider } from './conflict-resolver';
import { ExtendedError } from './errors';
import type { OutputSink } from './output';

export interface LinePrompter {
  ask(question: string): Promise<string>;
  close(): void;
}

/**
 * Prompter reading answers from stdin, one line per question.
 * Lines that arrive before they are asked for are queued.
 */
export class ReadlinePrompter implements LinePrompter {
  private readonly rl: readline.Interface;
  private readonly lines: string[] = [];
  private waiting?: { resolve: (line: string) => void; reject: (error: Error) => void };
  private closed = false;

  constructor(
    input: NodeJS.ReadableStream = process.stdin,
    private readonly output: NodeJS.WritableStream = process.stdout
  ) {
    this.rl = readline.createInterface({ input, terminal: false });
    this.rl.on('line', line => {
      const waiting = this.waiting;
      if (waiting) {
        this.waiting = undefined;
        waiting.resolve(line);
      } else {
        this.lines.push(line);
      }
    });
    this.rl.on('close', () => {
      this.closed = true;
      const waiting = this.waiting;
      this.waiting = undefined;
      waiting?.reject(
        new ExtendedError({ message: 'Input closed while waiting for an answer' })
      );
    });
  }

  async ask(question: string): Promise<string> {
    this.output.write(question);

    const queued = this.lines.shift();
    if (queued !== undefined) {
      return queued.trim();
    }
    if (this.closed) {
      throw new ExtendedError({ message: 'Input closed while waiting for an answer' });
    }

    const line = await new Promise<string>((resolve, reject) => {
      this.waiting = { resolve, reject };
    });
    return line.trim();
  }

  close(): void {
    this.rl.close();
  }
}

const CHOICES = new Map<string, ConflictChoice>([
  ['a', 'add'],
  ['s', 'skip'],
  ['r', 'replace'],
  ['aa', 'add-all'],
  ['sa', 'skip-all'],
  ['ra', 'replace-all'],
]);

export const CONFLICT_QUESTION =
  ' - add (a) / skip (s) / replace (r) / add all (aa) / skip all (sa) / replace all (ra): ';

export function parseConflictChoice(answer: string): ConflictChoice | undefined {
  return CHOICES.get(answer.trim());
}

/**
 * Asks the operator at the console; keeps asking until a valid answer is given
 */
export class ConsolePromptDecisionProvider implements DecisionProvider {
  constructor(
    private readonly prompter: LinePrompter,
    private readonly output: OutputSink
  ) {}

  async choose(): Promise<ConflictChoice> {
    this.output.writeLine(' - A document with the same name and type already exists in Drive');

    for (;;) {
      const choice = parseConflictChoice(await this.prompter.ask(CONFLICT_QUESTION));
      if (choice) {
        return choice;
      }
    }
  }
}

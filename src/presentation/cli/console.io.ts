import { createInterface, Interface } from 'readline';

/** Line-oriented terminal used by the menus; replaced by a scripted fake in tests. */
export interface CliIO {
  /** Resolves with the entered line, or null once input has ended. */
  ask(question: string): Promise<string | null>;
  print(text?: string): void;
  close(): void;
}

/**
 * CliIO over stdin/stdout. Ctrl-C and Ctrl-D both end input.
 * Lines that arrive before they are asked for (piped input) are queued.
 */
export class ReadlineConsole implements CliIO {
  private readonly rl: Interface;
  private readonly lines: string[] = [];
  private readonly waiting: Array<(line: string | null) => void> = [];
  private closed = false;

  constructor(
    input: NodeJS.ReadableStream = process.stdin,
    private readonly output: NodeJS.WritableStream = process.stdout,
  ) {
    this.rl = createInterface({ input, output });
    this.rl.on('line', (line: string) => {
      const next = this.waiting.shift();
      if (next) {
        next(line);
      } else {
        this.lines.push(line);
      }
    });
    this.rl.on('close', () => {
      this.closed = true;
      for (const resolve of this.waiting.splice(0)) {
        resolve(null);
      }
    });
    this.rl.on('SIGINT', () => this.rl.close());
  }

  ask(question: string): Promise<string | null> {
    this.output.write(question);

    const line = this.lines.shift();
    if (line !== undefined) {
      return Promise.resolve(line);
    }
    if (this.closed) {
      return Promise.resolve(null);
    }
    return new Promise((resolve) => this.waiting.push(resolve));
  }

  print(text = ''): void {
    this.output.write(`${text}\n`);
  }

  close(): void {
    if (!this.closed) {
      this.rl.close();
    }
  }
}

import { createInterface, Interface } from 'node:readline';

/**
 * Line-oriented input for the shell
 */
export interface Prompter {
  /**
   * Show question and read one line
   * @returns the raw line, or null once input is closed
   */
  ask(question: string): Promise<string | null>;
  close(): void;
}

/**
 * Prompter over a readable stream (stdin by default)
 *
 * Lines are consumed through the interface's async iterator, which buffers
 * them, so piped input is not lost between prompts.
 */
export class ReadlinePrompter implements Prompter {
  private readonly rl: Interface;
  private readonly lines: AsyncIterator<string>;

  constructor(
    input: NodeJS.ReadableStream = process.stdin,
    private readonly output: NodeJS.WritableStream = process.stdout
  ) {
    this.rl = createInterface({ input, terminal: false });
    this.lines = this.rl[Symbol.asyncIterator]();
  }

  async ask(question: string): Promise<string | null> {
    this.output.write(question);
    const next = await this.lines.next();
    return next.done ? null : next.value;
  }

  close(): void {
    this.rl.close();
  }
}

/**
 * Line-based prompting over Node streams.
 *
 * @module cli/prompter
 */

import { createInterface, type Interface } from 'node:readline';
import type { Readable, Writable } from 'node:stream';

/**
 * Line-oriented conversation with the user.
 */
export interface Prompter {
  /**
   * Shows `question` and resolves with the next input line, or null once
   * input has ended.
   */
  ask(question: string): Promise<string | null>;

  /** Prints one line of output */
  print(line: string): void;

  close(): void;
}

/**
 * Prompter reading lines from a stream, e.g. stdin.
 *
 * Lines that arrive before they are asked for are buffered, so piped input
 * works the same as typed input.
 */
export class ReadlinePrompter implements Prompter {
  private readonly rl: Interface;
  private readonly lines: AsyncIterator<string>;

  constructor(
    input: Readable,
    private readonly output: Writable
  ) {
    this.rl = createInterface({ input, crlfDelay: Infinity });
    this.lines = this.rl[Symbol.asyncIterator]();
  }

  async ask(question: string): Promise<string | null> {
    this.output.write(question);
    const next = await this.lines.next();
    return next.done ? null : next.value;
  }

  print(line: string): void {
    this.output.write(`${line}\n`);
  }

  close(): void {
    this.rl.close();
  }
}

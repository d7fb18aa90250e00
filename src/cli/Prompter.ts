/**
 * Line-based question/answer input for the interactive menu.
 */

import * as readline from 'readline';

export interface Prompter {
  /** Resolves to the trimmed answer, or null once input has ended. */
  ask(question: string): Promise<string | null>;
  close(): void;
}

export class ReadlinePrompter implements Prompter {
  private rl: readline.Interface;
  private closed = false;
  private pending: ((answer: string | null) => void) | undefined;

  constructor(
    input: NodeJS.ReadableStream = process.stdin,
    output: NodeJS.WritableStream = process.stdout
  ) {
    this.rl = readline.createInterface({ input, output });
    this.rl.on('close', () => {
      this.closed = true;
      const resolve = this.pending;
      this.pending = undefined;
      resolve?.(null);
    });
  }

  ask(question: string): Promise<string | null> {
    if (this.closed) {
      return Promise.resolve(null);
    }
    return new Promise((resolve) => {
      this.pending = resolve;
      this.rl.question(question, (answer) => {
        this.pending = undefined;
        resolve(answer.trim());
      });
    });
  }

  close(): void {
    if (!this.closed) {
      this.rl.close();
    }
  }
}

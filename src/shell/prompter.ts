import { Interface, createInterface } from 'node:readline';

export const PROMPTER = Symbol('PROMPTER');

export interface Prompter {
  ask(question: string): Promise<string>;
  close(): void;
}

/** Raised when input ends (end of stream or Ctrl-D) while a question is open. */
export class PromptClosedError extends Error {
  constructor() {
    super('Input closed');
    this.name = 'PromptClosedError';
  }
}

export class ReadlinePrompter implements Prompter {
  private readonly rl: Interface;
  private closed = false;

  constructor(
    input: NodeJS.ReadableStream = process.stdin,
    output: NodeJS.WritableStream = process.stdout,
  ) {
    this.rl = createInterface({ input, output });
    this.rl.on('close', () => {
      this.closed = true;
    });
  }

  ask(question: string): Promise<string> {
    if (this.closed) {
      return Promise.reject(new PromptClosedError());
    }

    return new Promise((resolve, reject) => {
      const onClose = () => reject(new PromptClosedError());
      this.rl.once('close', onClose);
      this.rl.question(question, (answer) => {
        this.rl.off('close', onClose);
        resolve(answer);
      });
    });
  }

  close(): void {
    this.rl.close();
  }
}

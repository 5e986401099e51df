/** Line-based prompts on the terminal */
import { EventEmitter } from 'events';
import { Interface, createInterface } from 'readline';
import { InterruptError } from '../errors.js';

export interface Prompter {
  /** Resolves with the trimmed answer; rejects with InterruptError on Ctrl+C or closed input */
  ask(question: string): Promise<string>;
  print(message: string): void;
}

interface Waiter {
  resolve(line: string): void;
  reject(error: Error): void;
}

/**
 * One readline interface for the prompter's lifetime. Lines that arrive
 * before they are asked for (piped input) are queued for the next question.
 * Input stays paused between questions, so Ctrl+C while polling reaches the
 * process SIGINT handlers.
 */
export class TerminalPrompter implements Prompter {
  private rl?: Interface;
  private queued: string[] = [];
  private waiter?: Waiter;
  private ended = false;

  constructor(
    private input: NodeJS.ReadableStream = process.stdin,
    private output: NodeJS.WritableStream = process.stdout,
    private signals: EventEmitter = process,
  ) {}

  async ask(question: string): Promise<string> {
    this.output.write(question);
    const rl = this.open();

    const queued = this.queued.shift();
    if (queued !== undefined) return queued.trim();
    if (this.ended) throw new InterruptError();

    const onInterrupt = () => {
      this.output.write('\n');
      this.settle(new InterruptError());
    };
    this.signals.on('SIGINT', onInterrupt);
    rl.resume();
    try {
      const line = await new Promise<string>((resolve, reject) => {
        this.waiter = { resolve, reject };
      });
      return line.trim();
    } finally {
      this.signals.off('SIGINT', onInterrupt);
      if (!this.ended) rl.pause();
    }
  }

  print(message: string): void {
    this.output.write(message + '\n');
  }

  /** Releases the input stream; later questions reject */
  close(): void {
    this.rl?.close();
  }

  private open(): Interface {
    if (this.rl) return this.rl;
    const rl = createInterface({ input: this.input, terminal: false });
    rl.on('line', line => {
      if (this.waiter) this.settle(line);
      else this.queued.push(line);
    });
    rl.on('close', () => {
      this.ended = true;
      this.settle(new InterruptError());
    });
    this.rl = rl;
    return rl;
  }

  private settle(result: string | Error): void {
    const waiter = this.waiter;
    this.waiter = undefined;
    if (!waiter) return;
    if (typeof result === 'string') waiter.resolve(result);
    else waiter.reject(result);
  }
}

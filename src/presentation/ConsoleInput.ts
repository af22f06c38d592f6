import * as readline from 'readline';
import { ILineSource, IOutputSink } from '../core/interfaces/IConsole.js';

/**
 * Lines from a readable stream (stdin by default).
 *
 * Lines that arrive before they are asked for are buffered, so piped
 * input is read in full before end-of-input is reported.
 */
export class ConsoleInput implements ILineSource {
  private readonly rl: readline.Interface;
  private readonly lines: AsyncIterator<string>;

  constructor(input: NodeJS.ReadableStream = process.stdin) {
    this.rl = readline.createInterface({ input, crlfDelay: Infinity });
    this.lines = this.rl[Symbol.asyncIterator]();
  }

  async readLine(): Promise<string | null> {
    const next = await this.lines.next();
    return next.done ? null : next.value;
  }

  close(): void {
    this.rl.close();
  }
}

export class ConsoleOutput implements IOutputSink {
  constructor(private readonly stream: NodeJS.WritableStream = process.stdout) {}

  write(text: string): void {
    this.stream.write(text);
  }
}

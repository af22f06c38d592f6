import { IOutputSink } from '../core/interfaces/IConsole.js';

export const THINKING_INTERVAL_MS = 500;

/**
 * "<bot> is thinking..." animation shown while a reply is in flight.
 * Purely cosmetic; it stops and wipes its line when the signal aborts.
 */
export class ThinkingIndicator {
  constructor(
    private readonly out: IOutputSink,
    private readonly botName: string,
    private readonly intervalMs: number = THINKING_INTERVAL_MS
  ) {}

  start(signal: AbortSignal): void {
    if (signal.aborted) {
      return;
    }

    const label = `${this.botName} is thinking`;
    this.out.write(label);

    let dots = 0;
    const timer = setInterval(() => {
      this.out.write('.');
      dots++;
      if (dots > 3) {
        this.out.write('\b\b\b\b    \b\b\b\b');
        dots = 0;
      }
    }, this.intervalMs);

    signal.addEventListener(
      'abort',
      () => {
        clearInterval(timer);
        const width = Math.max(50, label.length + 4);
        this.out.write(`\r${' '.repeat(width)}\r`);
      },
      { once: true }
    );
  }
}

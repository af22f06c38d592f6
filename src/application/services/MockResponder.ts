import { IResponder } from '../../core/interfaces/IResponder.js';
import { createLogger } from '../../utils/logger.js';
import { sleep } from '../../utils/timeout.js';

export const NO_INPUT_REPLY = "I didn't receive any input. Could you please say something?";
export const GREETING_REPLY = 'Hello! Nice to meet you. How can I assist you today?';
export const FAREWELL_REPLY = 'Goodbye! It was nice chatting with you. Have a wonderful day!';
export const HELP_REPLY =
  "I'm here to help! You can ask me questions, have a conversation, or just chat. What would you like to talk about?";
export const WEATHER_REPLY =
  "I don't have access to real-time weather data, but I hope it's nice where you are! Is there something specific about weather you'd like to discuss?";

export const FILLER_PHRASES: readonly string[] = [
  "That's an interesting question! Let me think about that...",
  "I understand what you're asking. Here's my perspective...",
  "Great point! I'd like to add that...",
  "That's a complex topic. From what I know...",
  'I appreciate you sharing that with me.',
  'That reminds me of something similar...',
  "I can help you with that. Here's what I suggest...",
  "That's a good observation. Let me expand on that...",
  "I see where you're coming from. My thoughts are...",
  "Interesting! I hadn't considered that angle before.",
];

export const DEFAULT_MOCK_DELAY_MS = 500;

export interface MockResponderOptions {
  /** Artificial latency before each reply */
  delayMs?: number;
  /** Returns a number in [0, 1) */
  random?: () => number;
  now?: () => Date;
}

const logger = createLogger('MockResponder');

/**
 * Local yyyy-MM-dd HH:mm:ss
 */
export function formatTimestamp(date: Date): string {
  const pad = (value: number) => String(value).padStart(2, '0');
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

/**
 * Canned replies for running without any provider credentials
 */
export class MockResponder implements IResponder {
  readonly name = 'mock';
  private readonly delayMs: number;
  private readonly random: () => number;
  private readonly now: () => Date;

  constructor(options: MockResponderOptions = {}) {
    this.delayMs = options.delayMs ?? DEFAULT_MOCK_DELAY_MS;
    this.random = options.random ?? Math.random;
    this.now = options.now ?? (() => new Date());
  }

  async respond(userText: string): Promise<string> {
    logger.info('Using mock responder (no provider configured)');

    if (this.delayMs > 0) {
      await sleep(this.delayMs);
    }

    if (!userText.trim()) {
      return NO_INPUT_REPLY;
    }

    const input = userText.toLowerCase();
    const has = (...words: string[]) => words.some((word) => input.includes(word));

    if (has('hello', 'hi', 'hey')) {
      return GREETING_REPLY;
    }

    if (has('bye', 'goodbye', 'exit')) {
      return FAREWELL_REPLY;
    }

    if (has('help')) {
      return HELP_REPLY;
    }

    if (has('weather')) {
      return WEATHER_REPLY;
    }

    if (has('time', 'date')) {
      return (
        "I don't have access to the current time, but it's always a good time to chat! " +
        `The current system time on your machine would be: ${formatTimestamp(this.now())}`
      );
    }

    const index = Math.min(Math.floor(this.random() * FILLER_PHRASES.length), FILLER_PHRASES.length - 1);
    return `${FILLER_PHRASES[index]} You mentioned: '${userText}'. What else would you like to know?`;
  }
}

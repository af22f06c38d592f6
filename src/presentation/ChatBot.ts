import { DEFAULT_CHATBOT_SETTINGS } from '../core/entities/Chat.js';
import type { ChatBotSettings, ChatTurn, ConversationState } from '../core/entities/Chat.js';
import { IResponder } from '../core/interfaces/IResponder.js';
import { ILineSource, IOutputSink } from '../core/interfaces/IConsole.js';
import { createLogger, errorMessage } from '../utils/logger.js';
import { ThinkingIndicator } from './ThinkingIndicator.js';

export const EXIT_COMMANDS: readonly string[] = ['exit', 'quit', 'bye', 'goodbye'];
export const EMPTY_INPUT_NOTICE = 'Please enter a message.';
export const RESPONDER_FAILURE_REPLY = "I'm sorry, I encountered an error. Please try again.";
export const PROMPT = 'You: ';

export interface ChatBotOptions {
  settings?: ChatBotSettings;
  /** Show the animated "is thinking" line while waiting for a reply */
  showThinking?: boolean;
}

const logger = createLogger('ChatBot');

export function isExitCommand(input: string): boolean {
  return EXIT_COMMANDS.includes(input.trim().toLowerCase());
}

/**
 * Console conversation loop.
 *
 * One turn at a time: prompt, read a line, await the responder, print the reply.
 * Ends on an exit command or when the input runs out.
 */
export class ChatBot {
  private currentState: ConversationState = 'running';
  private readonly settings: ChatBotSettings;
  private readonly indicator: ThinkingIndicator | null;

  constructor(
    private readonly responder: IResponder,
    private readonly input: ILineSource,
    private readonly out: IOutputSink,
    options: ChatBotOptions = {}
  ) {
    this.settings = options.settings ?? DEFAULT_CHATBOT_SETTINGS;
    this.indicator = options.showThinking === false ? null : new ThinkingIndicator(out, this.settings.name);
  }

  get state(): ConversationState {
    return this.currentState;
  }

  /**
   * Drive the conversation until it terminates.
   * @returns the turns that reached the responder, in order
   */
  async run(): Promise<ChatTurn[]> {
    const turns: ChatTurn[] = [];
    if (this.currentState === 'terminated') {
      return turns;
    }

    logger.info('Starting chatbot session', { responder: this.responder.name });
    this.printBanner();

    while (this.currentState === 'running') {
      this.out.write(PROMPT);
      const line = await this.input.readLine();

      if (line === null) {
        this.writeLine();
        this.terminate();
        break;
      }

      if (!line.trim()) {
        this.writeLine(EMPTY_INPUT_NOTICE);
        this.writeLine();
        continue;
      }

      if (isExitCommand(line)) {
        this.writeLine(`${this.settings.name}: ${this.settings.goodbyeMessage}`);
        this.terminate();
        break;
      }

      const replyText = await this.ask(line);
      this.writeLine(`${this.settings.name}: ${replyText}`);
      this.writeLine();
      turns.push({ userText: line, replyText });
    }

    logger.info('Chatbot session ended', { turns: turns.length });
    return turns;
  }

  private async ask(line: string): Promise<string> {
    const thinking = new AbortController();
    this.indicator?.start(thinking.signal);

    try {
      return await this.responder.respond(line);
    } catch (error) {
      logger.error('Error getting AI response', { error: errorMessage(error) });
      return RESPONDER_FAILURE_REPLY;
    } finally {
      thinking.abort();
    }
  }

  private terminate(): void {
    this.currentState = 'terminated';
  }

  private printBanner(): void {
    this.writeLine(`🤖 ${this.settings.name}`);
    this.writeLine('='.repeat(50));
    this.writeLine(this.settings.welcomeMessage);
    this.writeLine("Type 'exit', 'quit', or 'bye' to end the conversation.");
    this.writeLine();
  }

  private writeLine(text = ''): void {
    this.out.write(`${text}\n`);
  }
}

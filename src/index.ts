#!/usr/bin/env node

/**
 * Console LLM chatbot - Entry Point
 */

import { getConfig, printConfigInfo, Config, ConfigValidationError } from './config.js';
import { ProviderFactory } from './core/providers/ProviderFactory.js';
import { selectResponder } from './application/services/ResponderSelector.js';
import { ChatBot } from './presentation/ChatBot.js';
import { ConsoleInput, ConsoleOutput } from './presentation/ConsoleInput.js';
import { createLogger, errorMessage, setVerbose } from './utils/logger.js';

const logger = createLogger('main');

function loadConfig(): Config | null {
  try {
    return getConfig();
  } catch (error) {
    if (error instanceof ConfigValidationError) {
      console.error('\n❌ Configuration Validation Failed!\n');
      error.issues.forEach((issue) => console.error(`  • ${issue}`));
      console.error('\n💡 Check your .env file and CLI arguments (see .env.example).\n');
      return null;
    }
    throw error;
  }
}

async function main(): Promise<number> {
  const config = loadConfig();
  if (!config) {
    return 1;
  }

  setVerbose(config.debug);

  const selection = selectResponder(config.llm);
  printConfigInfo(config, ProviderFactory.resolveProviderKind(config.llm), selection.kind);
  logger.info('Responder selected', { kind: selection.kind, responder: selection.responder.name });

  const input = new ConsoleInput();
  const chatBot = new ChatBot(selection.responder, input, new ConsoleOutput(), {
    settings: config.chatBot,
    showThinking: process.stdout.isTTY === true,
  });

  // Ctrl+C ends the session the same way end-of-input does
  process.once('SIGINT', () => input.close());

  try {
    await chatBot.run();
  } finally {
    input.close();
  }
  return 0;
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    logger.error('Fatal error in main()', { error: errorMessage(error) });
    console.error(`💥 An error occurred: ${errorMessage(error)}`);
    process.exitCode = 1;
  });

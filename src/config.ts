import * as dotenv from 'dotenv';
import { z } from 'zod';
import { DEFAULT_CHATBOT_SETTINGS } from './core/entities/Chat.js';
import type { ChatBotSettings, LlmSettings, ProviderKind } from './core/entities/Chat.js';
import { DEFAULT_OLLAMA_URL } from './core/providers/OllamaProvider.js';
import { DEFAULT_REQUEST_TIMEOUT_MS } from './utils/timeout.js';

// Load environment variables from .env file
dotenv.config();

export interface Config {
  debug: boolean;
  llm: LlmSettings;
  chatBot: ChatBotSettings;
}

export const DEFAULT_MODEL = 'gpt-3.5-turbo';
export const DEFAULT_SYSTEM_PROMPT = 'You are a helpful AI assistant. Provide concise and helpful responses.';

// Zod validation schema
const ConfigSchema = z.object({
  debug: z.boolean(),
  llm: z.object({
    model: z.string().min(1, 'Model must not be empty'),
    apiKey: z.string(),
    provider: z.enum(['auto', 'openai', 'anthropic', 'gemini', 'ollama', 'custom']),
    maxTokens: z.number().int().min(1).max(100000),
    temperature: z.number().min(0).max(2),
    baseUrl: z.string().url('Invalid base URL format').optional(),
    ollamaUrl: z.string().url('Invalid Ollama URL format'),
    fallbackPolicy: z.enum(['custom', 'openai']),
    requestTimeoutMs: z.number().int().min(1000).max(600000),
    systemPrompt: z.string().min(1, 'System prompt must not be empty'),
  }),
  chatBot: z.object({
    name: z.string().min(1, 'Bot name must not be empty'),
    welcomeMessage: z.string().min(1),
    goodbyeMessage: z.string().min(1),
  }),
});

export class ConfigValidationError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration:\n${issues.map((issue) => `  • ${issue}`).join('\n')}`);
    this.name = 'ConfigValidationError';
  }
}

/**
 * Parse command line arguments
 * Usage: node dist/src/index.js --model claude-3-haiku-20240307 --api-key <key> --debug
 */
export function parseArgs(argv: string[] = process.argv): Record<string, string | boolean> {
  const args: Record<string, string | boolean> = {};

  for (let i = 2; i < argv.length; i++) {
    const arg = argv[i];

    if (arg.startsWith('--')) {
      const flag = arg.slice(2);
      const eq = flag.indexOf('=');

      // --key=value
      if (eq > 0) {
        args[flag.slice(0, eq)] = flag.slice(eq + 1);
        continue;
      }

      // Check if next arg is a value or another flag
      if (i + 1 < argv.length && !argv[i + 1].startsWith('--')) {
        args[flag] = argv[++i];
      } else {
        args[flag] = true;
      }
    }
  }

  return args;
}

/**
 * Get configuration from CLI arguments, then environment variables, then defaults.
 * Throws ConfigValidationError listing every invalid field.
 */
export function getConfig(argv: string[] = process.argv, env: NodeJS.ProcessEnv = process.env): Config {
  const cliArgs = parseArgs(argv);

  const getString = (cliKey: string, envKey: string, defaultValue: string): string => {
    const cliValue = cliArgs[cliKey];
    if (typeof cliValue === 'string') return cliValue;
    return env[envKey] || defaultValue;
  };

  const getBoolean = (cliKey: string, envKey: string, defaultValue: boolean): boolean => {
    if (cliArgs[cliKey] !== undefined) return cliArgs[cliKey] === true || cliArgs[cliKey] === 'true';
    const envValue = env[envKey];
    return envValue === 'true' ? true : envValue === 'false' ? false : defaultValue;
  };

  const getNumber = (
    cliKey: string,
    envKey: string,
    defaultValue: number,
    parse: (value: string) => number = (value) => parseInt(value, 10)
  ): number => {
    const cliValue = cliArgs[cliKey];
    if (typeof cliValue === 'string') return parse(cliValue);
    const envValue = env[envKey];
    return envValue ? parse(envValue) : defaultValue;
  };

  const baseUrl = getString('base-url', 'LLM_BASE_URL', '');

  const rawConfig = {
    debug: getBoolean('debug', 'DEBUG', false),
    llm: {
      model: getString('model', 'LLM_MODEL', DEFAULT_MODEL).trim(),
      apiKey: getString('api-key', 'LLM_API_KEY', '').trim(),
      provider: getString('provider', 'LLM_PROVIDER', 'auto').toLowerCase(),
      maxTokens: getNumber('max-tokens', 'LLM_MAX_TOKENS', 150),
      temperature: getNumber('temperature', 'LLM_TEMPERATURE', 0.7, parseFloat),
      baseUrl: baseUrl || undefined,
      ollamaUrl: getString('ollama-url', 'OLLAMA_URL', DEFAULT_OLLAMA_URL),
      fallbackPolicy: getString('fallback', 'LLM_FALLBACK', 'custom').toLowerCase(),
      requestTimeoutMs: getNumber('timeout', 'LLM_TIMEOUT_MS', DEFAULT_REQUEST_TIMEOUT_MS),
      systemPrompt: getString('system-prompt', 'LLM_SYSTEM_PROMPT', DEFAULT_SYSTEM_PROMPT),
    },
    chatBot: {
      name: getString('bot-name', 'CHATBOT_NAME', DEFAULT_CHATBOT_SETTINGS.name),
      welcomeMessage: env.CHATBOT_WELCOME_MESSAGE || DEFAULT_CHATBOT_SETTINGS.welcomeMessage,
      goodbyeMessage: env.CHATBOT_GOODBYE_MESSAGE || DEFAULT_CHATBOT_SETTINGS.goodbyeMessage,
    },
  };

  const result = ConfigSchema.safeParse(rawConfig);
  if (!result.success) {
    throw new ConfigValidationError(
      result.error.errors.map((err) => `${err.path.join('.') || 'root'}: ${err.message}`)
    );
  }

  const config: Config = result.data;
  return Object.freeze({
    ...config,
    llm: Object.freeze({ ...config.llm }),
    chatBot: Object.freeze({ ...config.chatBot }),
  });
}

export function maskApiKey(apiKey: string): string {
  if (!apiKey) return '(not set)';
  if (apiKey.length <= 8) return '••••';
  return `••••${apiKey.slice(-4)}`;
}

/**
 * Print configuration summary to stderr
 */
export function printConfigInfo(config: Config, provider: ProviderKind, responder: 'provider' | 'mock'): void {
  console.error('─'.repeat(50));
  console.error(`🤖 Model:     ${config.llm.model}`);
  console.error(`🔗 Provider:  ${provider}${config.llm.provider === 'auto' ? ' (auto-detected)' : ''}`);
  console.error(`🔑 API key:   ${maskApiKey(config.llm.apiKey)}`);
  if (responder === 'mock') {
    console.error('💡 No usable API key: answering with the built-in mock responder.');
  }
  if (config.debug) {
    console.error('🐛 Debug logging enabled');
  }
  console.error('─'.repeat(50));
}

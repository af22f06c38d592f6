/**
 * Chat-related domain entities
 */

export type ProviderKind = 'openai' | 'anthropic' | 'gemini' | 'ollama' | 'custom';

export const PROVIDER_KINDS: readonly ProviderKind[] = ['openai', 'anthropic', 'gemini', 'ollama', 'custom'];

/**
 * What an unrecognised model name maps to:
 * - custom: the configured base URL with an OpenAI-compatible payload
 * - openai: straight to api.openai.com
 */
export type FallbackPolicy = 'custom' | 'openai';

/**
 * 'auto' derives the provider from the model name; anything else forces it.
 */
export type ProviderOverride = 'auto' | ProviderKind;

/**
 * Request parameters, fixed for the lifetime of the process
 */
export interface LlmSettings {
  model: string;
  apiKey: string;
  provider: ProviderOverride;
  maxTokens: number;
  temperature: number;
  baseUrl?: string;
  ollamaUrl: string;
  fallbackPolicy: FallbackPolicy;
  requestTimeoutMs: number;
  systemPrompt: string;
}

export interface ChatTurn {
  userText: string;
  replyText: string;
}

/**
 * Console presentation of the bot
 */
export interface ChatBotSettings {
  name: string;
  welcomeMessage: string;
  goodbyeMessage: string;
}

export const DEFAULT_CHATBOT_SETTINGS: Readonly<ChatBotSettings> = Object.freeze({
  name: 'AI Assistant',
  welcomeMessage: "Hello! I'm your AI assistant. How can I help you today?",
  goodbyeMessage: 'Goodbye! Have a great day!',
});

export type ConversationState = 'running' | 'terminated';

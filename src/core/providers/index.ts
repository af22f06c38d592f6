/**
 * Wire specs for every supported LLM provider
 */
export type { ProviderSpec, ChatMessage, JsonObject } from './types.js';
export { joinUrl } from './types.js';
export { OpenAIProvider, CustomProvider, OPENAI_BASE_URL } from './OpenAIProvider.js';
export { AnthropicProvider, ANTHROPIC_BASE_URL, ANTHROPIC_VERSION } from './AnthropicProvider.js';
export { GeminiProvider, GEMINI_BASE_URL } from './GeminiProvider.js';
export { OllamaProvider, DEFAULT_OLLAMA_URL } from './OllamaProvider.js';
export { ProviderFactory } from './ProviderFactory.js';

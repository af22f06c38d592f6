import type { FallbackPolicy, LlmSettings, ProviderKind } from '../entities/Chat.js';
import { ProviderSpec } from './types.js';
import { OpenAIProvider, CustomProvider } from './OpenAIProvider.js';
import { AnthropicProvider } from './AnthropicProvider.js';
import { GeminiProvider } from './GeminiProvider.js';
import { OllamaProvider } from './OllamaProvider.js';

// 'gpt-oss' is shadowed: those ids already match the gpt- rule
const OLLAMA_PREFIXES = ['llama', 'mistral', 'deepseek', 'qwen', 'stable-code', 'gpt-oss'];

/**
 * Factory for provider wire specs
 */
export class ProviderFactory {
  private static providers: Map<ProviderKind, ProviderSpec> = new Map<ProviderKind, ProviderSpec>([
    ['openai', new OpenAIProvider()],
    ['anthropic', new AnthropicProvider()],
    ['gemini', new GeminiProvider()],
    ['ollama', new OllamaProvider()],
    ['custom', new CustomProvider()],
  ]);

  /**
   * Get a provider spec by kind
   */
  static getProvider(kind: ProviderKind): ProviderSpec {
    const provider = this.providers.get(kind);
    if (!provider) {
      throw new Error(`Unknown provider kind: ${kind}`);
    }
    return provider;
  }

  /**
   * Classify a model name. Rules are checked in order, case-insensitively:
   * - gpt-, o1- -> openai
   * - claude- -> anthropic
   * - gemini- -> gemini
   * - llama, mistral, deepseek, qwen, stable-code, gpt-oss prefixes,
   *   or containing "local" or ":" -> ollama
   * - anything else -> the fallback policy (custom endpoint or openai)
   */
  static classifyModel(model: string, fallbackPolicy: FallbackPolicy = 'custom'): ProviderKind {
    const name = model.toLowerCase();

    if (name.startsWith('gpt-') || name.startsWith('o1-')) {
      return 'openai';
    }

    if (name.startsWith('claude-')) {
      return 'anthropic';
    }

    if (name.startsWith('gemini-')) {
      return 'gemini';
    }

    if (
      OLLAMA_PREFIXES.some((prefix) => name.startsWith(prefix)) ||
      name.includes('local') ||
      name.includes(':')
    ) {
      return 'ollama';
    }

    return fallbackPolicy;
  }

  /**
   * Provider for a settings block: an explicit override wins over classification
   */
  static resolveProviderKind(settings: Pick<LlmSettings, 'model' | 'provider' | 'fallbackPolicy'>): ProviderKind {
    if (settings.provider !== 'auto') {
      return settings.provider;
    }
    return this.classifyModel(settings.model, settings.fallbackPolicy);
  }
}

import type { LlmSettings } from '../../core/entities/Chat.js';
import { IResponder } from '../../core/interfaces/IResponder.js';
import { ProviderFactory } from '../../core/providers/ProviderFactory.js';
import { FetchLike } from '../../infrastructure/http/LlmApiClient.js';
import { ProviderResponder } from './ProviderResponder.js';
import { MockResponder, MockResponderOptions } from './MockResponder.js';

export type ResponderKind = 'provider' | 'mock';

export interface ResponderSelection {
  kind: ResponderKind;
  responder: IResponder;
}

export interface SelectorOptions {
  fetchFn?: FetchLike;
  mock?: MockResponderOptions;
}

/**
 * Sample values shipped in config templates, e.g. "your-openai-api-key-here"
 */
const PLACEHOLDER_KEY = /^your-.*-here$/i;

export function isUsableApiKey(apiKey: string): boolean {
  const key = apiKey.trim();
  return key.length > 0 && !PLACEHOLDER_KEY.test(key);
}

/**
 * Decide once, at startup, who answers the user.
 * Ollama needs no key; every other provider needs a real one, else the mock answers.
 */
export function selectResponder(settings: LlmSettings, options: SelectorOptions = {}): ResponderSelection {
  const providerKind = ProviderFactory.resolveProviderKind(settings);

  if (providerKind === 'ollama' || isUsableApiKey(settings.apiKey)) {
    return {
      kind: 'provider',
      responder: new ProviderResponder(settings, options.fetchFn),
    };
  }

  return {
    kind: 'mock',
    responder: new MockResponder(options.mock),
  };
}

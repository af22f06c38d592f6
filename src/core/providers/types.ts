import type { LlmSettings, ProviderKind } from '../entities/Chat.js';

/**
 * Chat message format shared by the OpenAI, Ollama and Anthropic payloads
 */
export interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export type JsonObject = Record<string, unknown>;

/**
 * Wire description of one upstream provider.
 *
 * Everything that differs between providers lives here as data; the HTTP
 * round trip itself is shared by LlmApiClient.
 */
export interface ProviderSpec {
  readonly kind: ProviderKind;

  /**
   * Base address the endpoint path is resolved against
   */
  resolveBaseUrl(settings: LlmSettings): string;

  /**
   * Endpoint path relative to the base address (may carry a query string)
   */
  buildPath(settings: LlmSettings): string;

  /**
   * Request headers, computed once when the client is constructed
   */
  buildHeaders(settings: LlmSettings): Record<string, string>;

  buildBody(settings: LlmSettings, userText: string): JsonObject;

  /**
   * Pull the reply text out of a decoded response body.
   * @returns the trimmed reply, or null when the expected field is missing or empty
   */
  extractReply(data: unknown): string | null;
}

export function joinUrl(baseUrl: string, path: string): string {
  const base = baseUrl.endsWith('/') ? baseUrl : `${baseUrl}/`;
  return `${base}${path.replace(/^\/+/, '')}`;
}

export function nonBlank(text: string | null | undefined): string | null {
  const trimmed = text?.trim();
  return trimmed ? trimmed : null;
}

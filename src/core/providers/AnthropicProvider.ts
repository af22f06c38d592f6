import { z } from 'zod';
import type { LlmSettings, ProviderKind } from '../entities/Chat.js';
import { ProviderSpec, JsonObject, ChatMessage, nonBlank } from './types.js';

export const ANTHROPIC_BASE_URL = 'https://api.anthropic.com/v1/';
export const ANTHROPIC_VERSION = '2023-06-01';

const MessagesResponseSchema = z.object({
  content: z.array(
    z.object({
      text: z.string().nullable().optional(),
    })
  ),
});

/**
 * Anthropic Messages API. No system message: the payload carries the user turn only.
 */
export class AnthropicProvider implements ProviderSpec {
  readonly kind: ProviderKind = 'anthropic';

  resolveBaseUrl(_settings: LlmSettings): string {
    return ANTHROPIC_BASE_URL;
  }

  buildPath(_settings: LlmSettings): string {
    return 'messages';
  }

  buildHeaders(settings: LlmSettings): Record<string, string> {
    const headers: Record<string, string> = {
      'Content-Type': 'application/json',
    };
    if (settings.apiKey) {
      headers['x-api-key'] = settings.apiKey;
      headers['anthropic-version'] = ANTHROPIC_VERSION;
    }
    return headers;
  }

  buildBody(settings: LlmSettings, userText: string): JsonObject {
    const messages: ChatMessage[] = [{ role: 'user', content: userText }];

    return {
      model: settings.model,
      max_tokens: settings.maxTokens,
      temperature: settings.temperature,
      messages,
    };
  }

  extractReply(data: unknown): string | null {
    const parsed = MessagesResponseSchema.safeParse(data);
    if (!parsed.success || parsed.data.content.length === 0) {
      return null;
    }
    return nonBlank(parsed.data.content[0].text);
  }
}

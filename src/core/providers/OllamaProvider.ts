import { z } from 'zod';
import type { LlmSettings, ProviderKind } from '../entities/Chat.js';
import { ProviderSpec, JsonObject, ChatMessage, nonBlank } from './types.js';

export const DEFAULT_OLLAMA_URL = 'http://localhost:11434/';

const OllamaChatSchema = z.object({
  message: z.object({
    content: z.string().nullable().optional(),
  }),
});

/**
 * Local Ollama instance, /api/chat endpoint. No auth.
 */
export class OllamaProvider implements ProviderSpec {
  readonly kind: ProviderKind = 'ollama';

  resolveBaseUrl(settings: LlmSettings): string {
    return settings.ollamaUrl || DEFAULT_OLLAMA_URL;
  }

  buildPath(_settings: LlmSettings): string {
    return 'api/chat';
  }

  buildHeaders(_settings: LlmSettings): Record<string, string> {
    return {
      'Content-Type': 'application/json',
    };
  }

  buildBody(settings: LlmSettings, userText: string): JsonObject {
    const messages: ChatMessage[] = [
      { role: 'system', content: settings.systemPrompt },
      { role: 'user', content: userText },
    ];

    return {
      model: settings.model,
      messages,
      stream: false,
      options: {
        temperature: settings.temperature,
        num_predict: settings.maxTokens,
      },
    };
  }

  extractReply(data: unknown): string | null {
    const parsed = OllamaChatSchema.safeParse(data);
    if (!parsed.success) {
      return null;
    }
    return nonBlank(parsed.data.message.content);
  }
}

import { z } from 'zod';
import type { LlmSettings, ProviderKind } from '../entities/Chat.js';
import { ProviderSpec, JsonObject, ChatMessage, nonBlank } from './types.js';

export const OPENAI_BASE_URL = 'https://api.openai.com/v1/';

const ChatCompletionSchema = z.object({
  choices: z.array(
    z.object({
      message: z.object({
        content: z.string().nullable().optional(),
      }),
    })
  ),
});

/**
 * OpenAI chat completions
 *
 * POST chat/completions
 * Authorization: Bearer <key>
 * Reply at choices[0].message.content
 */
export class OpenAIProvider implements ProviderSpec {
  readonly kind: ProviderKind = 'openai';

  resolveBaseUrl(_settings: LlmSettings): string {
    return OPENAI_BASE_URL;
  }

  buildPath(_settings: LlmSettings): string {
    return 'chat/completions';
  }

  buildHeaders(settings: LlmSettings): Record<string, string> {
    const headers: Record<string, string> = {
      'Content-Type': 'application/json',
    };
    if (settings.apiKey) {
      headers['Authorization'] = `Bearer ${settings.apiKey}`;
    }
    return headers;
  }

  buildBody(settings: LlmSettings, userText: string): JsonObject {
    const messages: ChatMessage[] = [
      { role: 'system', content: settings.systemPrompt },
      { role: 'user', content: userText },
    ];

    return {
      model: settings.model,
      messages,
      max_tokens: settings.maxTokens,
      temperature: settings.temperature,
    };
  }

  extractReply(data: unknown): string | null {
    const parsed = ChatCompletionSchema.safeParse(data);
    if (!parsed.success || parsed.data.choices.length === 0) {
      return null;
    }
    return nonBlank(parsed.data.choices[0].message.content);
  }
}

/**
 * Any OpenAI-compatible endpoint (LiteLLM proxy, vLLM, LM Studio, ...)
 * reached through the configured base URL.
 */
export class CustomProvider extends OpenAIProvider {
  override readonly kind: ProviderKind = 'custom';

  override resolveBaseUrl(settings: LlmSettings): string {
    return settings.baseUrl || OPENAI_BASE_URL;
  }
}

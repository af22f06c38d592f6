import { z } from 'zod';
import type { LlmSettings, ProviderKind } from '../entities/Chat.js';
import { ProviderSpec, JsonObject, nonBlank } from './types.js';

export const GEMINI_BASE_URL = 'https://generativelanguage.googleapis.com/v1beta/';

const GenerateContentSchema = z.object({
  candidates: z.array(
    z.object({
      content: z
        .object({
          parts: z
            .array(
              z.object({
                text: z.string().nullable().optional(),
              })
            )
            .optional(),
        })
        .optional(),
    })
  ),
});

/**
 * Google Gemini generateContent
 *
 * The key travels in the query string and the system prompt is folded
 * into the single text part. Field names are camelCase.
 */
export class GeminiProvider implements ProviderSpec {
  readonly kind: ProviderKind = 'gemini';

  resolveBaseUrl(_settings: LlmSettings): string {
    return GEMINI_BASE_URL;
  }

  buildPath(settings: LlmSettings): string {
    return `models/${settings.model}:generateContent?key=${encodeURIComponent(settings.apiKey)}`;
  }

  buildHeaders(_settings: LlmSettings): Record<string, string> {
    return {
      'Content-Type': 'application/json',
    };
  }

  buildBody(settings: LlmSettings, userText: string): JsonObject {
    return {
      contents: [
        {
          parts: [{ text: `${settings.systemPrompt} User: ${userText}` }],
        },
      ],
      generationConfig: {
        temperature: settings.temperature,
        maxOutputTokens: settings.maxTokens,
        topP: 0.8,
        topK: 10,
      },
    };
  }

  extractReply(data: unknown): string | null {
    const parsed = GenerateContentSchema.safeParse(data);
    if (!parsed.success || parsed.data.candidates.length === 0) {
      return null;
    }
    const parts = parsed.data.candidates[0].content?.parts ?? [];
    if (parts.length === 0) {
      return null;
    }
    return nonBlank(parts[0].text);
  }
}

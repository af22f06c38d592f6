import type { LlmSettings, ProviderKind } from '../../core/entities/Chat.js';
import { IResponder } from '../../core/interfaces/IResponder.js';
import { ProviderFactory } from '../../core/providers/ProviderFactory.js';
import { ProviderSpec } from '../../core/providers/types.js';
import { LlmApiClient, FetchLike, HttpStatusError } from '../../infrastructure/http/LlmApiClient.js';
import { createLogger, errorMessage } from '../../utils/logger.js';

export const CONNECTION_TROUBLE_REPLY =
  "I'm sorry, I'm having trouble connecting to my AI service right now. Please try again later.";
export const NOT_UNDERSTOOD_REPLY = "I didn't understand that. Could you please rephrase?";
export const GENERIC_ERROR_REPLY = "I'm sorry, something went wrong. Please try again.";

const logger = createLogger('ProviderResponder');

/**
 * Responder backed by a hosted or local LLM.
 *
 * The provider is chosen from the settings when the responder is built.
 * respond() never rejects: every failure becomes one of the fixed replies above.
 */
export class ProviderResponder implements IResponder {
  readonly name: string;
  readonly kind: ProviderKind;
  private readonly provider: ProviderSpec;
  private readonly client: LlmApiClient;

  constructor(private readonly settings: LlmSettings, fetchFn?: FetchLike) {
    this.kind = ProviderFactory.resolveProviderKind(settings);
    this.provider = ProviderFactory.getProvider(this.kind);
    this.client = new LlmApiClient(this.provider, settings, fetchFn);
    this.name = `${this.kind}/${settings.model}`;
  }

  async respond(userText: string): Promise<string> {
    try {
      logger.info('Sending request', { provider: this.kind, model: this.settings.model });

      const data = await this.client.send(userText);
      const reply = this.provider.extractReply(data);

      if (reply === null) {
        logger.debug('Response did not contain a reply', { provider: this.kind });
        return NOT_UNDERSTOOD_REPLY;
      }

      return reply;
    } catch (error) {
      if (error instanceof HttpStatusError) {
        logger.error(`${this.kind} API request failed`, { status: error.status });
        logger.debug('Error response body', { status: error.status, body: error.body.slice(0, 500) });
        return CONNECTION_TROUBLE_REPLY;
      }

      logger.error('Error occurred while calling LLM provider', {
        provider: this.kind,
        model: this.settings.model,
        error: errorMessage(error),
      });
      return GENERIC_ERROR_REPLY;
    }
  }
}

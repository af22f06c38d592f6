import fetch from 'node-fetch';
import type { LlmSettings, ProviderKind } from '../../core/entities/Chat.js';
import { ProviderSpec, joinUrl } from '../../core/providers/types.js';
import { withTimeout } from '../../utils/timeout.js';

export interface HttpResponseLike {
  ok: boolean;
  status: number;
  text(): Promise<string>;
}

export interface HttpRequestInit {
  method: 'POST';
  headers: Record<string, string>;
  body: string;
  signal: AbortSignal;
}

/**
 * The slice of fetch() the client needs; node-fetch satisfies it and tests pass fakes
 */
export type FetchLike = (url: string, init: HttpRequestInit) => Promise<HttpResponseLike>;

export class HttpStatusError extends Error {
  constructor(
    public readonly status: number,
    public readonly provider: ProviderKind,
    public readonly body: string
  ) {
    super(`HTTP error! status: ${status}`);
    this.name = 'HttpStatusError';
  }
}

/**
 * One POST per call against a single provider.
 *
 * Base address and headers are computed once here; to talk to another
 * provider, build another client.
 */
export class LlmApiClient {
  private readonly baseUrl: string;
  private readonly headers: Readonly<Record<string, string>>;

  constructor(
    private readonly provider: ProviderSpec,
    private readonly settings: LlmSettings,
    private readonly fetchFn: FetchLike = fetch
  ) {
    this.baseUrl = provider.resolveBaseUrl(settings);
    this.headers = Object.freeze(provider.buildHeaders(settings));
  }

  get providerKind(): ProviderKind {
    return this.provider.kind;
  }

  /**
   * Full request URL for the configured model
   */
  get endpoint(): string {
    return joinUrl(this.baseUrl, this.provider.buildPath(this.settings));
  }

  /**
   * Send one user message and return the decoded JSON body.
   * Throws HttpStatusError on a non-2xx status and TimeoutError when the
   * whole exchange, body included, takes longer than requestTimeoutMs.
   * A timed-out request is aborted.
   */
  async send(userText: string): Promise<unknown> {
    const body = JSON.stringify(this.provider.buildBody(this.settings, userText));

    const { res, raw } = await withTimeout(async (signal) => {
      const res = await this.fetchFn(this.endpoint, {
        method: 'POST',
        headers: { ...this.headers },
        body,
        signal,
      });
      return { res, raw: await res.text() };
    }, this.settings.requestTimeoutMs);

    if (!res.ok) {
      throw new HttpStatusError(res.status, this.provider.kind, raw);
    }

    const data: unknown = JSON.parse(raw);
    return data;
  }
}

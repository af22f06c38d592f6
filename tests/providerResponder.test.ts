/**
 * Tests for the provider-backed responder and its HTTP client
 */

import * as http from 'http';
import {
  ProviderResponder,
  CONNECTION_TROUBLE_REPLY,
  NOT_UNDERSTOOD_REPLY,
  GENERIC_ERROR_REPLY,
} from '../src/application/services/ProviderResponder.js';
import { HttpRequestInit, HttpResponseLike, LlmApiClient } from '../src/infrastructure/http/LlmApiClient.js';
import { OllamaProvider } from '../src/core/providers/OllamaProvider.js';
import { LogEntry, LogSink, setLogSink, setVerbose } from '../src/utils/logger.js';
import { fakeFetch, makeSettings, TEST_SYSTEM_PROMPT } from './helpers/fakes.js';

describe('ProviderResponder', () => {
  let logs: LogEntry[];
  let previousSink: LogSink;

  beforeEach(() => {
    logs = [];
    previousSink = setLogSink((line) => {
      logs.push(JSON.parse(line));
    });
    setVerbose(false);
  });

  afterEach(() => {
    setLogSink(previousSink);
  });

  describe('OpenAI', () => {
    test('posts the chat completion and returns the reply', async () => {
      const fetchFn = fakeFetch(200, { choices: [{ message: { role: 'assistant', content: 'Hello from GPT' } }] });
      const responder = new ProviderResponder(makeSettings(), fetchFn);

      const reply = await responder.respond('Hi there');

      expect(reply).toBe('Hello from GPT');
      expect(fetchFn).toHaveBeenCalledTimes(1);

      const [url, init] = fetchFn.mock.calls[0];
      expect(url).toBe('https://api.openai.com/v1/chat/completions');
      expect(init.method).toBe('POST');
      expect(init.headers).toEqual({
        'Content-Type': 'application/json',
        Authorization: 'Bearer test-key',
      });
      expect(JSON.parse(init.body)).toEqual({
        model: 'gpt-4',
        messages: [
          { role: 'system', content: TEST_SYSTEM_PROMPT },
          { role: 'user', content: 'Hi there' },
        ],
        max_tokens: 150,
        temperature: 0.7,
      });
    });

    test('maps HTTP 500 to the connection trouble reply and logs the status', async () => {
      const fetchFn = fakeFetch(500, { error: { message: 'upstream exploded' } });
      const responder = new ProviderResponder(makeSettings(), fetchFn);

      const reply = await responder.respond('Hi');

      expect(reply).toBe(CONNECTION_TROUBLE_REPLY);
      expect(fetchFn).toHaveBeenCalledTimes(1);

      const errors = logs.filter((entry) => entry.level === 'error');
      expect(errors).toHaveLength(1);
      expect(errors[0].message).toBe('openai API request failed');
      expect(errors[0].status).toBe(500);
    });

    test('never returns the error body', async () => {
      const responder = new ProviderResponder(makeSettings(), fakeFetch(401, 'Incorrect API key provided'));

      await expect(responder.respond('Hi')).resolves.toBe(CONNECTION_TROUBLE_REPLY);
    });

    test('maps an empty choices array to the rephrase reply without logging an error', async () => {
      const responder = new ProviderResponder(makeSettings(), fakeFetch(200, { choices: [] }));

      await expect(responder.respond('Hi')).resolves.toBe(NOT_UNDERSTOOD_REPLY);
      expect(logs.filter((entry) => entry.level === 'error')).toHaveLength(0);
    });

    test('maps a network failure to the generic reply', async () => {
      const fetchFn = jest
        .fn<Promise<HttpResponseLike>, [string, HttpRequestInit]>()
        .mockRejectedValue(new Error('connect ECONNREFUSED 127.0.0.1:443'));
      const responder = new ProviderResponder(makeSettings(), fetchFn);

      await expect(responder.respond('Hi')).resolves.toBe(GENERIC_ERROR_REPLY);
      expect(logs.some((entry) => entry.level === 'error' && entry.error === 'connect ECONNREFUSED 127.0.0.1:443')).toBe(
        true
      );
    });

    test('maps an unparseable body to the generic reply', async () => {
      const responder = new ProviderResponder(makeSettings(), fakeFetch(200, '<html>gateway</html>'));

      await expect(responder.respond('Hi')).resolves.toBe(GENERIC_ERROR_REPLY);
    });

    test('gives up after the request timeout', async () => {
      const fetchFn = jest
        .fn<Promise<HttpResponseLike>, [string, HttpRequestInit]>()
        .mockImplementation(() => new Promise<HttpResponseLike>(() => undefined));
      const responder = new ProviderResponder(makeSettings({ requestTimeoutMs: 20 }), fetchFn);

      await expect(responder.respond('Hi')).resolves.toBe(GENERIC_ERROR_REPLY);
      expect(fetchFn).toHaveBeenCalledTimes(1);
      expect(logs.some((entry) => entry.error === 'Timeout after 20ms')).toBe(true);
    });

    test('aborts the request once the timeout passes', async () => {
      const fetchFn = jest
        .fn<Promise<HttpResponseLike>, [string, HttpRequestInit]>()
        .mockImplementation(() => new Promise<HttpResponseLike>(() => undefined));
      const responder = new ProviderResponder(makeSettings({ requestTimeoutMs: 20 }), fetchFn);

      await responder.respond('Hi');

      expect(fetchFn.mock.calls[0][1].signal.aborted).toBe(true);
    });

    test('times out when the body stalls after the status line', async () => {
      const fetchFn = jest.fn<Promise<HttpResponseLike>, [string, HttpRequestInit]>().mockResolvedValue({
        ok: true,
        status: 200,
        text: () => new Promise<string>(() => undefined),
      });
      const responder = new ProviderResponder(makeSettings({ requestTimeoutMs: 20 }), fetchFn);

      await expect(responder.respond('Hi')).resolves.toBe(GENERIC_ERROR_REPLY);
      expect(fetchFn.mock.calls[0][1].signal.aborted).toBe(true);
      expect(logs.some((entry) => entry.error === 'Timeout after 20ms')).toBe(true);
    });

    test('leaves the signal untouched when the reply arrives in time', async () => {
      const fetchFn = fakeFetch(200, { choices: [{ message: { content: 'quick' } }] });
      const responder = new ProviderResponder(makeSettings(), fetchFn);

      await expect(responder.respond('Hi')).resolves.toBe('quick');
      expect(fetchFn.mock.calls[0][1].signal.aborted).toBe(false);
    });

    test('is named after provider and model', () => {
      expect(new ProviderResponder(makeSettings(), fakeFetch(200, {})).name).toBe('openai/gpt-4');
    });
  });

  describe('Anthropic', () => {
    test('posts to messages with the Anthropic headers', async () => {
      const fetchFn = fakeFetch(200, { content: [{ type: 'text', text: 'Hi from Claude' }] });
      const responder = new ProviderResponder(makeSettings({ model: 'claude-3-sonnet-20240229' }), fetchFn);

      await expect(responder.respond('Hello')).resolves.toBe('Hi from Claude');

      const [url, init] = fetchFn.mock.calls[0];
      expect(url).toBe('https://api.anthropic.com/v1/messages');
      expect(init.headers).toEqual({
        'Content-Type': 'application/json',
        'x-api-key': 'test-key',
        'anthropic-version': '2023-06-01',
      });
      expect(responder.kind).toBe('anthropic');
    });
  });

  describe('Gemini', () => {
    test('passes the key in the query string', async () => {
      const fetchFn = fakeFetch(200, { candidates: [{ content: { parts: [{ text: 'Hi from Gemini' }] } }] });
      const responder = new ProviderResponder(makeSettings({ model: 'gemini-1.5-flash' }), fetchFn);

      await expect(responder.respond('Hello')).resolves.toBe('Hi from Gemini');

      const [url, init] = fetchFn.mock.calls[0];
      expect(url).toBe(
        'https://generativelanguage.googleapis.com/v1beta/models/gemini-1.5-flash:generateContent?key=test-key'
      );
      expect(init.headers).toEqual({ 'Content-Type': 'application/json' });
      expect(JSON.parse(init.body).generationConfig).toEqual({
        temperature: 0.7,
        maxOutputTokens: 150,
        topP: 0.8,
        topK: 10,
      });
    });
  });

  describe('Ollama', () => {
    test('talks to the local server without auth', async () => {
      const fetchFn = fakeFetch(200, { model: 'llama3.1:8b', message: { role: 'assistant', content: 'Hi from Llama' } });
      const responder = new ProviderResponder(makeSettings({ model: 'llama3.1:8b', apiKey: '' }), fetchFn);

      await expect(responder.respond('Hello')).resolves.toBe('Hi from Llama');

      const [url, init] = fetchFn.mock.calls[0];
      expect(url).toBe('http://localhost:11434/api/chat');
      expect(init.headers).toEqual({ 'Content-Type': 'application/json' });
      expect(JSON.parse(init.body).stream).toBe(false);
    });

    test('honours a custom Ollama URL without a trailing slash', async () => {
      const fetchFn = fakeFetch(200, { message: { content: 'ok' } });
      const responder = new ProviderResponder(
        makeSettings({ model: 'mistral:7b', apiKey: '', ollamaUrl: 'http://gpu-box:11434' }),
        fetchFn
      );

      await responder.respond('Hello');

      expect(fetchFn.mock.calls[0][0]).toBe('http://gpu-box:11434/api/chat');
    });
  });

  describe('Fallback policy', () => {
    test('custom policy sends unknown models to the configured base URL', async () => {
      const fetchFn = fakeFetch(200, { choices: [{ message: { content: 'proxied' } }] });
      const responder = new ProviderResponder(
        makeSettings({ model: 'foo-bar', baseUrl: 'http://localhost:4000/v1' }),
        fetchFn
      );

      await expect(responder.respond('Hello')).resolves.toBe('proxied');
      expect(fetchFn.mock.calls[0][0]).toBe('http://localhost:4000/v1/chat/completions');
      expect(fetchFn.mock.calls[0][1].headers.Authorization).toBe('Bearer test-key');
      expect(responder.kind).toBe('custom');
    });

    test('openai policy ignores the base URL', async () => {
      const fetchFn = fakeFetch(200, { choices: [{ message: { content: 'direct' } }] });
      const responder = new ProviderResponder(
        makeSettings({ model: 'foo-bar', baseUrl: 'http://localhost:4000/v1', fallbackPolicy: 'openai' }),
        fetchFn
      );

      await expect(responder.respond('Hello')).resolves.toBe('direct');
      expect(fetchFn.mock.calls[0][0]).toBe('https://api.openai.com/v1/chat/completions');
      expect(responder.kind).toBe('openai');
    });
  });
});

describe('LlmApiClient', () => {
  test('fixes base address and headers at construction', async () => {
    const fetchFn = fakeFetch(200, { message: { content: 'ok' } });
    const settings = makeSettings({ model: 'llama3', apiKey: '' });
    const client = new LlmApiClient(new OllamaProvider(), settings, fetchFn);

    expect(client.endpoint).toBe('http://localhost:11434/api/chat');
    expect(client.providerKind).toBe('ollama');

    await expect(client.send('Hi')).resolves.toEqual({ message: { content: 'ok' } });
    await client.send('Again');
    expect(fetchFn).toHaveBeenCalledTimes(2);
    expect(fetchFn.mock.calls[1][1].headers).toEqual(fetchFn.mock.calls[0][1].headers);
  });

  test('rejects with the status on a non-2xx response', async () => {
    const client = new LlmApiClient(new OllamaProvider(), makeSettings({ model: 'llama3' }), fakeFetch(404, 'model not found'));

    await expect(client.send('Hi')).rejects.toMatchObject({ name: 'HttpStatusError', status: 404, body: 'model not found' });
  });
});

describe('ProviderResponder over node-fetch', () => {
  let server: http.Server;
  let baseUrl: string;
  let previousSink: LogSink;

  beforeEach(async () => {
    previousSink = setLogSink(() => undefined);
    server = http.createServer((req, res) => {
      req.resume();
      res.writeHead(200, { 'Content-Type': 'application/json' });
      if (req.url === '/slow/api/chat') {
        // Status line and half a body, then nothing
        res.write('{"message":');
        return;
      }
      res.end(JSON.stringify({ message: { role: 'assistant', content: 'local reply' } }));
    });
    await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
    const address = server.address();
    if (address === null || typeof address === 'string') {
      throw new Error('Test server is not listening on a TCP port');
    }
    baseUrl = `http://127.0.0.1:${address.port}/`;
  });

  afterEach(async () => {
    setLogSink(previousSink);
    server.closeAllConnections();
    await new Promise<void>((resolve) => server.close(() => resolve()));
  });

  test('reads a reply from a local server', async () => {
    const responder = new ProviderResponder(makeSettings({ model: 'llama3', apiKey: '', ollamaUrl: baseUrl }));

    await expect(responder.respond('Hi')).resolves.toBe('local reply');
  });

  test('gives up on a stalled body and closes the socket', async () => {
    const responder = new ProviderResponder(
      makeSettings({ model: 'llama3', apiKey: '', ollamaUrl: `${baseUrl}slow/`, requestTimeoutMs: 200 })
    );

    await expect(responder.respond('Hi')).resolves.toBe(GENERIC_ERROR_REPLY);

    // The aborted request tears its socket down shortly after the deadline
    const deadline = Date.now() + 1000;
    let open = 1;
    while (open > 0 && Date.now() < deadline) {
      await new Promise((resolve) => setTimeout(resolve, 20));
      open = await new Promise<number>((resolve, reject) =>
        server.getConnections((error, count) => (error ? reject(error) : resolve(count)))
      );
    }
    expect(open).toBe(0);
  });
});

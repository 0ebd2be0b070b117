/**
 * Unit Tests for the HTTP completion clients and the client factory
 *
 * fetch is stubbed; no request leaves the process.
 */
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { ProviderError } from '@ace/core';
import {
  AnthropicClient,
  createClient,
  createResilientClient,
  isLocal,
  OllamaClient,
  OpenAIClient,
} from '@ace/models';

vi.mock('pino', () => {
  const make = () => ({ info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() });
  return { pino: make, default: make };
});

const fetchMock = vi.fn<typeof fetch>();

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

function requestOf(call: number): { url: string; body: unknown; headers: Headers } {
  const args = fetchMock.mock.calls[call];
  const init = args?.[1];
  return {
    url: String(args?.[0]),
    body: JSON.parse(String(init?.body)),
    headers: new Headers(init?.headers),
  };
}

async function captureProviderError(promise: Promise<unknown>): Promise<ProviderError> {
  try {
    await promise;
  } catch (err) {
    if (err instanceof ProviderError) return err;
    throw err;
  }
  throw new Error('expected a ProviderError');
}

describe('completion clients', () => {
  beforeEach(() => {
    fetchMock.mockReset();
    vi.stubGlobal('fetch', fetchMock);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
    vi.unstubAllEnvs();
  });

  // ---------------------------------------------------------------------------
  // OpenAI-compatible
  // ---------------------------------------------------------------------------
  describe('OpenAIClient', () => {
    it('posts a chat completion and maps the reply', async () => {
      fetchMock.mockImplementation(async () =>
        jsonResponse({
          model: 'gpt-4o-mini-2024',
          choices: [{ message: { content: '{"final_answer": "4"}' } }],
          usage: { prompt_tokens: 12, completion_tokens: 5 },
        }),
      );
      const client = new OpenAIClient('gpt-4o-mini', {
        apiKey: 'test-secret',
        baseUrl: 'https://api.openai.com',
        defaults: { maxTokens: 256 },
      });

      const response = await client.complete('What is 2+2?', { system: 'Be brief', temperature: 0 });

      expect(response).toEqual({
        text: '{"final_answer": "4"}',
        model: 'gpt-4o-mini-2024',
        provider: 'openai',
        usage: { promptTokens: 12, completionTokens: 5 },
      });
      const request = requestOf(0);
      expect(request.url).toBe('https://api.openai.com/v1/chat/completions');
      expect(request.headers.get('Authorization')).toBe('Bearer test-secret');
      expect(request.body).toEqual({
        model: 'gpt-4o-mini',
        messages: [
          { role: 'system', content: 'Be brief' },
          { role: 'user', content: 'What is 2+2?' },
        ],
        stream: false,
        temperature: 0,
        max_tokens: 256,
      });
    });

    it('maps HTTP failures to ProviderError with retryability', async () => {
      fetchMock.mockImplementation(async () => new Response('slow down', { status: 429 }));
      const client = new OpenAIClient('gpt-4o-mini', { apiKey: 'test-secret' });

      const err = await captureProviderError(client.complete('p'));
      expect(err.statusCode).toBe(429);
      expect(err.retryable).toBe(true);
      expect(err.message).toBe('openai: HTTP 429: slow down');
    });

    it('maps network failures to status 0', async () => {
      fetchMock.mockRejectedValue(new TypeError('fetch failed'));
      const client = new OpenAIClient('gpt-4o-mini', { apiKey: 'test-secret' });

      const err = await captureProviderError(client.complete('p'));
      expect(err.statusCode).toBe(0);
      expect(err.message).toBe('openai: request failed: fetch failed');
    });

    it('rejects an unexpected response shape', async () => {
      fetchMock.mockImplementation(async () => jsonResponse({ choices: [] }));
      const client = new OpenAIClient('gpt-4o-mini', { apiKey: 'test-secret' });
      await expect(client.complete('p')).rejects.toThrow('openai: unexpected response shape');
    });

    it('refuses to call the hosted API without a key', async () => {
      vi.stubEnv('OPENAI_API_KEY', '');
      const client = new OpenAIClient('gpt-4o-mini', { baseUrl: 'https://api.openai.com/' });

      const err = await captureProviderError(client.complete('p'));
      expect(err.statusCode).toBe(401);
      expect(err.retryable).toBe(false);
      expect(fetchMock).not.toHaveBeenCalled();
      expect(await client.isAvailable()).toBe(false);
    });

    it('streams server-sent deltas until [DONE]', async () => {
      const sse = [
        'data: {"choices":[{"delta":{"role":"assistant"}}]}',
        'data: {"choices":[{"delta":{"content":"Hel"}}]}',
        ': keep-alive',
        'data: {"choices":[{"delta":{"content":"lo"}}]}',
        'data: [DONE]',
        'data: {"choices":[{"delta":{"content":"ignored"}}]}',
        '',
      ].join('\n\n');
      fetchMock.mockImplementation(async () => new Response(sse, { status: 200 }));
      vi.stubEnv('OPENAI_API_KEY', '');
      const client = new OpenAIClient('local-model', { baseUrl: 'http://localhost:1234' });

      const chunks: string[] = [];
      for await (const chunk of client.stream('p')) chunks.push(chunk);

      expect(chunks).toEqual(['Hel', 'lo']);
      expect(requestOf(0).body).toMatchObject({ stream: true });
      expect(requestOf(0).headers.get('Authorization')).toBeNull();
    });
  });

  // ---------------------------------------------------------------------------
  // Anthropic
  // ---------------------------------------------------------------------------
  describe('AnthropicClient', () => {
    it('joins text blocks and sends the system prompt separately', async () => {
      fetchMock.mockImplementation(async () =>
        jsonResponse({
          content: [
            { type: 'text', text: '{"a":' },
            { type: 'tool_use' },
            { type: 'text', text: '1}' },
          ],
        }),
      );
      const client = new AnthropicClient('claude-3-5-haiku', { apiKey: 'test-secret' });

      const response = await client.complete('p', { system: 'sys' });

      expect(response.text).toBe('{"a":1}');
      const request = requestOf(0);
      expect(request.url).toBe('https://api.anthropic.com/v1/messages');
      expect(request.headers.get('x-api-key')).toBe('test-secret');
      expect(request.body).toEqual({
        model: 'claude-3-5-haiku',
        messages: [{ role: 'user', content: 'p' }],
        max_tokens: 4096,
        system: 'sys',
      });
    });
  });

  // ---------------------------------------------------------------------------
  // Ollama
  // ---------------------------------------------------------------------------
  describe('OllamaClient', () => {
    it('posts a non-streaming chat request', async () => {
      fetchMock.mockImplementation(async () =>
        jsonResponse({ model: 'llama3.1', message: { role: 'assistant', content: 'hi' } }),
      );
      const client = new OllamaClient('llama3.1', { baseUrl: 'http://ollama.test:11434' });

      const response = await client.complete('p');

      expect(response.text).toBe('hi');
      expect(requestOf(0).url).toBe('http://ollama.test:11434/api/chat');
      expect(requestOf(0).body).toMatchObject({ model: 'llama3.1', stream: false });
    });
  });
});

describe('client factory', () => {
  it('maps providers to clients', () => {
    expect(createClient('openai/gpt-4o-mini')).toBeInstanceOf(OpenAIClient);
    expect(createClient('anthropic/claude-3-5-haiku')).toBeInstanceOf(AnthropicClient);
    expect(createClient('ollama/llama3.1')).toBeInstanceOf(OllamaClient);

    const lmstudio = createClient('lmstudio/qwen2.5-7b');
    expect(lmstudio).toBeInstanceOf(OpenAIClient);
    expect(lmstudio.model).toBe('qwen2.5-7b');
  });

  it('rejects unknown providers and malformed ids', () => {
    expect(() => createClient('foo/bar')).toThrow('Unknown provider "foo"');
    expect(() => createClient('gpt4')).toThrow('expected format "provider/model"');
  });

  it('recognizes local providers', () => {
    expect(isLocal('ollama/llama3.1')).toBe(true);
    expect(isLocal('openai/gpt-4o-mini')).toBe(false);
    expect(isLocal('nonsense')).toBe(false);
  });

  it('chains the primary and fallbacks', () => {
    const client = createResilientClient({
      primary: 'openai/gpt-4o-mini',
      fallbacks: ['ollama/llama3.1'],
      temperature: 0,
      maxTokens: 1024,
      timeoutMs: 60000,
      maxRetries: 3,
      initialDelayMs: 1000,
    });
    expect(client.getClientNames()).toEqual(['openai/gpt-4o-mini', 'ollama/llama3.1']);
  });
});

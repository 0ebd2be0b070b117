/**
 * @ace/models - OpenAI-compatible client
 *
 * Chat Completions API over fetch. Works against api.openai.com or any
 * compatible server (LM Studio, vLLM, a proxy) through `baseUrl`.
 */

import { Type } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';
import { ProviderError } from '@ace/core';
import { parseJsonLine, postJson, postStream, readLines } from './http.js';
import type { ClientSettings, CompletionClient, CompletionOptions, LlmResponse } from './provider.js';

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

const API_BASE = 'https://api.openai.com';
const PROVIDER = 'openai';

const ChatCompletionSchema = Type.Object({
  model: Type.Optional(Type.String()),
  choices: Type.Array(
    Type.Object({
      message: Type.Object({
        content: Type.Union([Type.String(), Type.Null()]),
      }),
    }),
    { minItems: 1 },
  ),
  usage: Type.Optional(
    Type.Object({
      prompt_tokens: Type.Number(),
      completion_tokens: Type.Number(),
    }),
  ),
});

const ChatChunkSchema = Type.Object({
  choices: Type.Array(
    Type.Object({
      delta: Type.Optional(
        Type.Object({
          content: Type.Optional(Type.Union([Type.String(), Type.Null()])),
        }),
      ),
    }),
  ),
});

// ---------------------------------------------------------------------------
// OpenAIClient
// ---------------------------------------------------------------------------

export class OpenAIClient implements CompletionClient {
  readonly name = PROVIDER;
  readonly model: string;

  private readonly apiKey: string | undefined;
  private readonly baseUrl: string;
  private readonly defaults: ClientSettings['defaults'];

  constructor(model: string, settings: ClientSettings = {}) {
    this.model = model;
    this.apiKey = settings.apiKey ?? process.env['OPENAI_API_KEY'];
    this.baseUrl = (settings.baseUrl ?? process.env['OPENAI_BASE_URL'] ?? API_BASE).replace(/\/+$/, '');
    this.defaults = settings.defaults;
  }

  /**
   * Available when an API key is configured, or when pointed at a
   * self-hosted compatible server.
   */
  async isAvailable(): Promise<boolean> {
    return (typeof this.apiKey === 'string' && this.apiKey.length > 0) || this.baseUrl !== API_BASE;
  }

  async complete(prompt: string, options: CompletionOptions = {}): Promise<LlmResponse> {
    const data = await postJson(
      PROVIDER,
      `${this.baseUrl}/v1/chat/completions`,
      this.buildBody(prompt, options, false),
      this.headers(),
      options.signal,
    );

    if (!Value.Check(ChatCompletionSchema, data)) {
      throw new ProviderError(`${PROVIDER}: unexpected response shape`, { provider: PROVIDER });
    }

    const first = data.choices[0];
    const response: LlmResponse = {
      text: first?.message.content ?? '',
      model: data.model ?? this.model,
      provider: PROVIDER,
    };
    if (data.usage) {
      response.usage = {
        promptTokens: data.usage.prompt_tokens,
        completionTokens: data.usage.completion_tokens,
      };
    }
    return response;
  }

  /**
   * Stream text deltas from server-sent events.
   */
  async *stream(prompt: string, options: CompletionOptions = {}): AsyncGenerator<string> {
    const body = await postStream(
      PROVIDER,
      `${this.baseUrl}/v1/chat/completions`,
      this.buildBody(prompt, options, true),
      this.headers(),
      options.signal,
    );

    for await (const line of readLines(body)) {
      if (!line.startsWith('data:')) continue;
      const payload = line.slice(5).trim();
      if (payload === '[DONE]') return;

      const event = parseJsonLine(payload);
      if (!Value.Check(ChatChunkSchema, event)) continue;

      const text = event.choices[0]?.delta?.content;
      if (text) yield text;
    }
  }

  // -------------------------------------------------------------------------
  // Internals
  // -------------------------------------------------------------------------

  private headers(): Record<string, string> {
    if (!this.apiKey) {
      if (this.baseUrl === API_BASE) {
        throw new ProviderError(`${PROVIDER}: OPENAI_API_KEY not set`, {
          provider: PROVIDER,
          statusCode: 401,
        });
      }
      return {};
    }
    return { Authorization: `Bearer ${this.apiKey}` };
  }

  private buildBody(prompt: string, options: CompletionOptions, stream: boolean): Record<string, unknown> {
    const messages: Array<{ role: 'system' | 'user'; content: string }> = [];
    if (options.system) messages.push({ role: 'system', content: options.system });
    messages.push({ role: 'user', content: prompt });

    const body: Record<string, unknown> = { model: this.model, messages, stream };

    const temperature = options.temperature ?? this.defaults?.temperature;
    if (temperature !== undefined) body['temperature'] = temperature;

    const maxTokens = options.maxTokens ?? this.defaults?.maxTokens;
    if (maxTokens !== undefined) body['max_tokens'] = maxTokens;

    return body;
  }
}

/**
 * @ace/models - Anthropic client
 *
 * Messages API over fetch.
 */

import { Type } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';
import { ProviderError } from '@ace/core';
import { postJson } from './http.js';
import type { ClientSettings, CompletionClient, CompletionOptions, LlmResponse } from './provider.js';

const API_BASE = 'https://api.anthropic.com';
const API_VERSION = '2023-06-01';
const PROVIDER = 'anthropic';

const MessageSchema = Type.Object({
  model: Type.Optional(Type.String()),
  content: Type.Array(
    Type.Object({
      type: Type.String(),
      text: Type.Optional(Type.String()),
    }),
  ),
  usage: Type.Optional(
    Type.Object({
      input_tokens: Type.Number(),
      output_tokens: Type.Number(),
    }),
  ),
});

export class AnthropicClient implements CompletionClient {
  readonly name = PROVIDER;
  readonly model: string;

  private readonly apiKey: string | undefined;
  private readonly baseUrl: string;
  private readonly defaults: ClientSettings['defaults'];

  constructor(model: string, settings: ClientSettings = {}) {
    this.model = model;
    this.apiKey = settings.apiKey ?? process.env['ANTHROPIC_API_KEY'];
    this.baseUrl = (settings.baseUrl ?? API_BASE).replace(/\/+$/, '');
    this.defaults = settings.defaults;
  }

  async isAvailable(): Promise<boolean> {
    return typeof this.apiKey === 'string' && this.apiKey.length > 0;
  }

  async complete(prompt: string, options: CompletionOptions = {}): Promise<LlmResponse> {
    if (!this.apiKey) {
      throw new ProviderError(`${PROVIDER}: ANTHROPIC_API_KEY not set`, {
        provider: PROVIDER,
        statusCode: 401,
      });
    }

    // max_tokens is mandatory for this API
    const body: Record<string, unknown> = {
      model: this.model,
      messages: [{ role: 'user', content: prompt }],
      max_tokens: options.maxTokens ?? this.defaults?.maxTokens ?? 4096,
    };
    if (options.system) body['system'] = options.system;
    const temperature = options.temperature ?? this.defaults?.temperature;
    if (temperature !== undefined) body['temperature'] = temperature;

    const data = await postJson(
      PROVIDER,
      `${this.baseUrl}/v1/messages`,
      body,
      { 'x-api-key': this.apiKey, 'anthropic-version': API_VERSION },
      options.signal,
    );

    if (!Value.Check(MessageSchema, data)) {
      throw new ProviderError(`${PROVIDER}: unexpected response shape`, { provider: PROVIDER });
    }

    const response: LlmResponse = {
      text: data.content
        .filter((block) => block.type === 'text')
        .map((block) => block.text ?? '')
        .join(''),
      model: data.model ?? this.model,
      provider: PROVIDER,
    };
    if (data.usage) {
      response.usage = {
        promptTokens: data.usage.input_tokens,
        completionTokens: data.usage.output_tokens,
      };
    }
    return response;
  }
}

/**
 * @ace/models - Ollama client
 *
 * Talks to a local Ollama server (default localhost:11434).
 */

import { Type } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';
import { ProviderError } from '@ace/core';
import { postJson } from './http.js';
import type { ClientSettings, CompletionClient, CompletionOptions, LlmResponse } from './provider.js';

const DEFAULT_BASE = 'http://localhost:11434';
const PROVIDER = 'ollama';

const ChatResponseSchema = Type.Object({
  model: Type.Optional(Type.String()),
  message: Type.Object({ content: Type.String() }),
  prompt_eval_count: Type.Optional(Type.Number()),
  eval_count: Type.Optional(Type.Number()),
});

export class OllamaClient implements CompletionClient {
  readonly name = PROVIDER;
  readonly model: string;

  private readonly baseUrl: string;
  private readonly defaults: ClientSettings['defaults'];

  constructor(model: string, settings: ClientSettings = {}) {
    this.model = model;
    this.baseUrl = (settings.baseUrl ?? process.env['OLLAMA_BASE_URL'] ?? DEFAULT_BASE).replace(/\/+$/, '');
    this.defaults = settings.defaults;
  }

  /**
   * Ping /api/tags with a short timeout.
   */
  async isAvailable(): Promise<boolean> {
    try {
      const res = await fetch(`${this.baseUrl}/api/tags`, { signal: AbortSignal.timeout(3000) });
      return res.ok;
    } catch {
      return false;
    }
  }

  async complete(prompt: string, options: CompletionOptions = {}): Promise<LlmResponse> {
    const messages: Array<{ role: 'system' | 'user'; content: string }> = [];
    if (options.system) messages.push({ role: 'system', content: options.system });
    messages.push({ role: 'user', content: prompt });

    const ollamaOptions: Record<string, unknown> = {};
    const temperature = options.temperature ?? this.defaults?.temperature;
    if (temperature !== undefined) ollamaOptions['temperature'] = temperature;
    const maxTokens = options.maxTokens ?? this.defaults?.maxTokens;
    if (maxTokens !== undefined) ollamaOptions['num_predict'] = maxTokens;

    const data = await postJson(
      PROVIDER,
      `${this.baseUrl}/api/chat`,
      { model: this.model, messages, stream: false, options: ollamaOptions },
      {},
      options.signal,
    );

    if (!Value.Check(ChatResponseSchema, data)) {
      throw new ProviderError(`${PROVIDER}: unexpected response shape`, { provider: PROVIDER });
    }

    const response: LlmResponse = {
      text: data.message.content,
      model: data.model ?? this.model,
      provider: PROVIDER,
    };
    if (data.prompt_eval_count !== undefined && data.eval_count !== undefined) {
      response.usage = { promptTokens: data.prompt_eval_count, completionTokens: data.eval_count };
    }
    return response;
  }
}

/**
 * @ace/models - Client factory
 *
 * Builds clients from "provider/model" identifiers.
 *
 *   "openai/gpt-4o-mini"          -> OpenAIClient
 *   "anthropic/claude-3-5-haiku"  -> AnthropicClient
 *   "ollama/llama3.1"             -> OllamaClient
 *   "lmstudio/qwen2.5-7b"         -> OpenAIClient against http://localhost:1234
 */

import { parseModelId, type ModelsConfig } from '@ace/core';
import type { Logger } from 'pino';
import { AnthropicClient } from './anthropic.js';
import { ResilientClient } from './failover.js';
import { OllamaClient } from './ollama.js';
import { OpenAIClient } from './openai.js';
import type { ClientSettings, CompletionClient } from './provider.js';

export const SUPPORTED_PROVIDERS = ['openai', 'anthropic', 'ollama', 'lmstudio'] as const;

const LMSTUDIO_BASE = 'http://localhost:1234';

/** Known local providers: no API key needed. */
const LOCAL_PROVIDERS = new Set(['ollama', 'lmstudio']);

/**
 * Create a client for a single model.
 *
 * @throws Error for a malformed id or an unknown provider
 */
export function createClient(modelId: string, settings: ClientSettings = {}): CompletionClient {
  const { provider, model } = parseModelId(modelId);

  switch (provider) {
    case 'openai':
      return new OpenAIClient(model, settings);
    case 'anthropic':
      return new AnthropicClient(model, settings);
    case 'ollama':
      return new OllamaClient(model, settings);
    case 'lmstudio':
      return new OpenAIClient(model, {
        ...settings,
        baseUrl: settings.baseUrl ?? process.env['LMSTUDIO_BASE_URL'] ?? LMSTUDIO_BASE,
      });
    default:
      throw new Error(
        `Unknown provider "${provider}". Supported: ${SUPPORTED_PROVIDERS.join(', ')}`,
      );
  }
}

/**
 * Check if a model id references a local provider.
 */
export function isLocal(modelId: string): boolean {
  try {
    return LOCAL_PROVIDERS.has(parseModelId(modelId).provider);
  } catch {
    return false;
  }
}

/**
 * Primary model plus fallbacks, wrapped in retry-and-failover.
 * `baseUrl` applies to the primary model only.
 */
export function createResilientClient(config: ModelsConfig, logger?: Logger): ResilientClient {
  const defaults = { temperature: config.temperature, maxTokens: config.maxTokens };
  const clients = [
    createClient(config.primary, config.baseUrl ? { baseUrl: config.baseUrl, defaults } : { defaults }),
    ...config.fallbacks.map((id) => createClient(id, { defaults })),
  ];

  return new ResilientClient(clients, {
    maxRetries: config.maxRetries,
    initialDelayMs: config.initialDelayMs,
    timeoutMs: config.timeoutMs,
    ...(logger ? { logger } : {}),
  });
}

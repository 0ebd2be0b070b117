/**
 * @ace/models - LLM completion clients
 */

export type {
  ClientSettings,
  CompletionAttempt,
  CompletionClient,
  CompletionOptions,
  CompletionUsage,
  LlmResponse,
} from './provider.js';

export { OpenAIClient } from './openai.js';
export { AnthropicClient } from './anthropic.js';
export { OllamaClient } from './ollama.js';

export {
  ResilientClient,
  isRetryableError,
  type ResilientClientOptions,
} from './failover.js';

export {
  ScriptedClient,
  type ScriptedCall,
  type ScriptedClientOptions,
  type ScriptedReply,
  type ScriptedResponder,
} from './scripted.js';

export { createClient, createResilientClient, isLocal, SUPPORTED_PROVIDERS } from './factory.js';

/**
 * @ace/models - Completion capability
 *
 * The single LLM interface the roles share. Every client turns a prompt
 * into text; how the prompt is shaped is the caller's business.
 */

import type { RoleName } from '@ace/core';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface CompletionOptions {
  /** System instruction, sent separately where the API supports it. */
  system?: string;
  temperature?: number;
  maxTokens?: number;
  signal?: AbortSignal;
  /** Role issuing the call; used for logging and by scripted clients. */
  role?: RoleName;
  refinementRound?: number;
}

export interface CompletionUsage {
  promptTokens: number;
  completionTokens: number;
}

/** Record of one client's turn in a resilient call. */
export interface CompletionAttempt {
  client: string;
  success: boolean;
  error?: string;
  durationMs: number;
}

export interface LlmResponse {
  text: string;
  model: string;
  provider: string;
  usage?: CompletionUsage;
  /** Set by ResilientClient: the turns this call took, in order. */
  attempts?: CompletionAttempt[];
}

/**
 * The LLM-completion capability. Failures surface as ProviderError.
 */
export interface CompletionClient {
  /** Provider name (e.g. 'openai', 'anthropic', 'ollama'). */
  readonly name: string;
  readonly model: string;

  complete(prompt: string, options?: CompletionOptions): Promise<LlmResponse>;

  /** Streaming variant yielding text deltas, where the provider has one. */
  stream?(prompt: string, options?: CompletionOptions): AsyncGenerator<string>;

  isAvailable(): Promise<boolean>;
}

/** Connection settings shared by the HTTP clients. */
export interface ClientSettings {
  apiKey?: string;
  baseUrl?: string;
  /** Used when a call does not pass its own. */
  defaults?: Pick<CompletionOptions, 'temperature' | 'maxTokens'>;
}

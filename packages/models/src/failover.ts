/**
 * @ace/models - Resilient completion
 *
 * Wraps an ordered list of clients. Each client gets a bounded number of
 * retries with exponential backoff on retryable failures; once a client is
 * exhausted the next one is tried. Auth failures (401/403) stop the chain
 * immediately.
 */

import { pino, type Logger } from 'pino';
import { ProviderError, errorMessage, retry, withTimeout } from '@ace/core';
import type { CompletionAttempt, CompletionClient, CompletionOptions, LlmResponse } from './provider.js';

const defaultLog = pino({ name: 'ace:models:failover' });

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface ResilientClientOptions {
  /** Retries per client after the first attempt (default 3). */
  maxRetries?: number;
  initialDelayMs?: number;
  maxDelayMs?: number;
  /** Per-attempt timeout in ms; 0 disables it (default 60000). */
  timeoutMs?: number;
  onFallback?: (from: string, to: string, error: string) => void;
  logger?: Logger;
}

/**
 * Whether a failure is worth another attempt. Errors that are not
 * ProviderErrors (timeouts, unexpected throws) count as transient.
 */
export function isRetryableError(err: unknown): boolean {
  return err instanceof ProviderError ? err.retryable : true;
}

function label(client: CompletionClient): string {
  return `${client.name}/${client.model}`;
}

// ---------------------------------------------------------------------------
// ResilientClient
// ---------------------------------------------------------------------------

export class ResilientClient implements CompletionClient {
  readonly name = 'resilient';
  readonly model: string;

  private readonly clients: CompletionClient[];
  private readonly maxRetries: number;
  private readonly initialDelayMs: number;
  private readonly maxDelayMs: number;
  private readonly timeoutMs: number;
  private readonly onFallback: ResilientClientOptions['onFallback'];
  private readonly log: Logger;
  private lastAttempts: CompletionAttempt[] = [];

  constructor(clients: CompletionClient[], options: ResilientClientOptions = {}) {
    const [primary] = clients;
    if (!primary) {
      throw new Error('ResilientClient needs at least one client');
    }
    this.clients = [...clients];
    this.model = label(primary);
    this.maxRetries = options.maxRetries ?? 3;
    this.initialDelayMs = options.initialDelayMs ?? 1000;
    this.maxDelayMs = options.maxDelayMs ?? 30_000;
    this.timeoutMs = options.timeoutMs ?? 60_000;
    this.onFallback = options.onFallback;
    this.log = options.logger ?? defaultLog;
  }

  /** Ordered client labels, `provider/model`. */
  getClientNames(): string[] {
    return this.clients.map(label);
  }

  /**
   * Attempts of the most recently started complete() call. Overlapping calls
   * replace each other here; read `LlmResponse.attempts` for a specific call.
   */
  get attempts(): readonly CompletionAttempt[] {
    return this.lastAttempts;
  }

  async isAvailable(): Promise<boolean> {
    for (const client of this.clients) {
      if (await client.isAvailable().catch(() => false)) return true;
    }
    return false;
  }

  async complete(prompt: string, options: CompletionOptions = {}): Promise<LlmResponse> {
    const attempts: CompletionAttempt[] = [];
    this.lastAttempts = attempts;
    let lastError: unknown;

    for (let i = 0; i < this.clients.length; i++) {
      const client = this.clients[i];
      if (!client) continue;
      const name = label(client);
      const start = performance.now();

      try {
        const response = await retry(() => this.attempt(client, prompt, options), {
          maxRetries: this.maxRetries,
          initialDelayMs: this.initialDelayMs,
          maxDelayMs: this.maxDelayMs,
          shouldRetry: (err) => isRetryableError(err) && !options.signal?.aborted,
          onRetry: (err, attempt, delayMs) => {
            this.log.warn(
              { client: name, attempt, delayMs: Math.round(delayMs), error: err.message, role: options.role },
              'Completion failed, retrying',
            );
          },
        });
        attempts.push({ client: name, success: true, durationMs: Math.round(performance.now() - start) });
        return { ...response, attempts: [...attempts] };
      } catch (err) {
        const message = errorMessage(err);
        attempts.push({
          client: name,
          success: false,
          error: message,
          durationMs: Math.round(performance.now() - start),
        });
        lastError = err;

        if (!isRetryableError(err)) {
          this.log.error({ client: name, error: message }, 'Non-retryable provider error, stopping failover');
          throw err;
        }

        const next = this.clients[i + 1];
        if (next) {
          this.log.warn({ from: name, to: label(next), error: message }, 'Falling back to next model');
          this.onFallback?.(name, label(next), message);
        }
      }
    }

    throw new ProviderError(
      `All ${this.clients.length} model(s) failed. Last error: ${errorMessage(lastError)}`,
      { provider: this.name, retryable: true, cause: lastError },
    );
  }

  private attempt(client: CompletionClient, prompt: string, options: CompletionOptions): Promise<LlmResponse> {
    const call = client.complete(prompt, options);
    return this.timeoutMs > 0 ? withTimeout(call, this.timeoutMs, label(client)) : call;
  }
}

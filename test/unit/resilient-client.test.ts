/**
 * Unit Tests for ResilientClient
 *
 * Tests per-client retries, failover order, hard stops on auth failures and
 * per-attempt timeouts. Delays are zero so no timers need faking.
 */
import { describe, it, expect, vi } from 'vitest';
import { ProviderError } from '@ace/core';
import { isRetryableError, ResilientClient, ScriptedClient, type ScriptedReply } from '@ace/models';

vi.mock('pino', () => {
  const make = () => ({ info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() });
  return { pino: make, default: make };
});

function unavailable(status: number): ProviderError {
  return new ProviderError(`scripted: HTTP ${status}`, { provider: 'scripted', statusCode: status });
}

describe('ResilientClient', () => {
  it('retries the primary on transient failures', async () => {
    const primary = new ScriptedClient([unavailable(503), unavailable(429), 'ok'], { model: 'a' });
    const client = new ResilientClient([primary], { initialDelayMs: 0 });

    const response = await client.complete('p', { role: 'generator' });

    expect(response.text).toBe('ok');
    expect(primary.calls).toHaveLength(3);
    expect(client.attempts).toMatchObject([{ client: 'scripted/a', success: true }]);
  });

  it('fails over once the primary exhausts its retries', async () => {
    const primary = new ScriptedClient(
      [unavailable(500), unavailable(500), unavailable(500)],
      { model: 'a' },
    );
    const fallback = new ScriptedClient(['from fallback'], { model: 'b' });
    const onFallback = vi.fn();
    const client = new ResilientClient([primary, fallback], { maxRetries: 2, initialDelayMs: 0, onFallback });

    const response = await client.complete('p');

    expect(response.text).toBe('from fallback');
    expect(primary.calls).toHaveLength(3);
    expect(onFallback).toHaveBeenCalledWith('scripted/a', 'scripted/b', 'scripted: HTTP 500');
    expect(client.attempts.map((a) => [a.client, a.success])).toEqual([
      ['scripted/a', false],
      ['scripted/b', true],
    ]);
  });

  it('stops the chain on an auth failure', async () => {
    const primary = new ScriptedClient([unavailable(401)], { model: 'a' });
    const fallback = new ScriptedClient(['never'], { model: 'b' });
    const client = new ResilientClient([primary, fallback], { initialDelayMs: 0 });

    await expect(client.complete('p')).rejects.toMatchObject({ statusCode: 401, retryable: false });
    expect(primary.calls).toHaveLength(1);
    expect(fallback.calls).toHaveLength(0);
  });

  it('reports the last error when every model fails', async () => {
    const client = new ResilientClient(
      [
        new ScriptedClient([unavailable(502)], { model: 'a' }),
        new ScriptedClient([unavailable(503)], { model: 'b' }),
      ],
      { maxRetries: 0, initialDelayMs: 0 },
    );

    await expect(client.complete('p')).rejects.toThrow('All 2 model(s) failed. Last error: scripted: HTTP 503');
  });

  it('times out a hung attempt and moves on', async () => {
    const hung = new ScriptedClient(() => new Promise<ScriptedReply>(() => undefined), { model: 'slow' });
    const fallback = new ScriptedClient(['fast'], { model: 'fast' });
    const client = new ResilientClient([hung, fallback], { maxRetries: 0, initialDelayMs: 0, timeoutMs: 20 });

    const response = await client.complete('p');
    expect(response.text).toBe('fast');
    expect(client.attempts[0]?.error).toBe('scripted/slow timed out after 20ms');
  });

  it('returns each call its own attempts when calls overlap', async () => {
    let release: (reply: string) => void = () => undefined;
    const gate = new Promise<string>((resolve) => {
      release = resolve;
    });
    const primary = new ScriptedClient((prompt) => (prompt === 'slow' ? gate : unavailable(500)), { model: 'a' });
    const fallback = new ScriptedClient(['from fallback'], { model: 'b' });
    const client = new ResilientClient([primary, fallback], { maxRetries: 0, initialDelayMs: 0, timeoutMs: 0 });

    const slow = client.complete('slow');
    const failedOver = await client.complete('fails');
    release('slow answer');
    const settled = await slow;

    expect(settled.text).toBe('slow answer');
    expect(settled.attempts?.map((a) => [a.client, a.success])).toEqual([['scripted/a', true]]);
    expect(failedOver.attempts?.map((a) => [a.client, a.success])).toEqual([
      ['scripted/a', false],
      ['scripted/b', true],
    ]);
    // The getter follows whichever call started last.
    expect(client.attempts.map((a) => a.client)).toEqual(['scripted/a', 'scripted/b']);
  });

  it('labels itself after the primary model', () => {
    const client = new ResilientClient([
      new ScriptedClient([], { name: 'openai', model: 'gpt-4o-mini' }),
      new ScriptedClient([], { name: 'ollama', model: 'llama3.1' }),
    ]);
    expect(client.model).toBe('openai/gpt-4o-mini');
    expect(client.getClientNames()).toEqual(['openai/gpt-4o-mini', 'ollama/llama3.1']);
  });

  it('is available while any client is', async () => {
    const client = new ResilientClient([
      new ScriptedClient([], { available: false }),
      new ScriptedClient([], { available: true }),
    ]);
    expect(await client.isAvailable()).toBe(true);
  });

  it('requires at least one client', () => {
    expect(() => new ResilientClient([])).toThrow('ResilientClient needs at least one client');
  });
});

describe('isRetryableError', () => {
  it('follows the provider status', () => {
    expect(isRetryableError(unavailable(429))).toBe(true);
    expect(isRetryableError(unavailable(403))).toBe(false);
    expect(isRetryableError(unavailable(404))).toBe(false);
    expect(isRetryableError(new Error('socket hang up'))).toBe(true);
  });
});

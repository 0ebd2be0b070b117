/**
 * @ace/models - HTTP plumbing shared by the fetch-based clients
 */

import { ProviderError, errorMessage, truncate } from '@ace/core';

/**
 * POST a JSON body and return the parsed JSON response.
 *
 * @throws ProviderError with the HTTP status, or status 0 on network failure
 */
export async function postJson(
  provider: string,
  url: string,
  body: unknown,
  headers: Record<string, string> = {},
  signal?: AbortSignal,
): Promise<unknown> {
  const response = await send(provider, url, body, headers, signal);
  try {
    return await response.json();
  } catch (err) {
    throw new ProviderError(`${provider}: response is not valid JSON`, {
      provider,
      statusCode: response.status,
      cause: err,
    });
  }
}

/**
 * POST a JSON body and return the raw streaming response body.
 */
export async function postStream(
  provider: string,
  url: string,
  body: unknown,
  headers: Record<string, string> = {},
  signal?: AbortSignal,
): Promise<ReadableStream<Uint8Array>> {
  const response = await send(provider, url, body, headers, signal);
  if (!response.body) {
    throw new ProviderError(`${provider}: no response body`, { provider, statusCode: response.status });
  }
  return response.body;
}

async function send(
  provider: string,
  url: string,
  body: unknown,
  headers: Record<string, string>,
  signal?: AbortSignal,
): Promise<Response> {
  let response: Response;
  try {
    response = await fetch(url, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json', ...headers },
      body: JSON.stringify(body),
      ...(signal ? { signal } : {}),
    });
  } catch (err) {
    throw new ProviderError(`${provider}: request failed: ${errorMessage(err)}`, {
      provider,
      statusCode: 0,
      cause: err,
    });
  }

  if (!response.ok) {
    const errorText = await response.text().catch(() => '');
    throw new ProviderError(`${provider}: HTTP ${response.status}: ${truncate(errorText, 500)}`, {
      provider,
      statusCode: response.status,
    });
  }
  return response;
}

/**
 * Split a byte stream into trimmed, non-empty text lines.
 */
export async function* readLines(body: ReadableStream<Uint8Array>): AsyncGenerator<string> {
  const reader = body.getReader();
  const decoder = new TextDecoder();
  let buffer = '';

  try {
    while (true) {
      const { done, value } = await reader.read();
      if (done) break;

      buffer += decoder.decode(value, { stream: true });
      const lines = buffer.split('\n');
      buffer = lines.pop() ?? '';

      for (const line of lines) {
        const trimmed = line.trim();
        if (trimmed) yield trimmed;
      }
    }

    buffer += decoder.decode();
    if (buffer.trim()) yield buffer.trim();
  } finally {
    reader.releaseLock();
  }
}

/** Parse a JSON line, or null when it is not JSON. */
export function parseJsonLine(line: string): unknown {
  try {
    return JSON.parse(line);
  } catch {
    return null;
  }
}

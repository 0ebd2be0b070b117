/**
 * @ace/roles - Structured output
 *
 * Completions are loosely-typed text. Each role turns them into a typed
 * value through a parse function returning a tagged result, never by
 * coercing missing fields into defaults. `completeStructured` wraps that in
 * a bounded retry loop: a malformed answer is re-requested with a reminder
 * appended, and after `maxRetries` attempts the role fails with a
 * RoleFailedError carrying the last schema error and raw text.
 */

import type { TSchema, Static } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';
import type { Logger } from 'pino';
import { ProviderError, RoleFailedError, errorMessage, isPlainObject, type RoleName } from '@ace/core';
import type { CompletionClient, CompletionOptions } from '@ace/models';

// ---------------------------------------------------------------------------
// Result type
// ---------------------------------------------------------------------------

export type ParseOutcome<T> = { ok: true; value: T } | { ok: false; error: string };

export type StructuredResult<T> =
  | { ok: true; value: T; raw: string }
  | { ok: false; error: string; raw: string };

export const RETRY_HINT =
  'Reminder: respond with a single valid JSON object only. Escape double quotes inside strings and add no text outside the JSON.';

// ---------------------------------------------------------------------------
// JSON extraction
// ---------------------------------------------------------------------------

const FENCE_RE = /^```(?:json)?\s*([\s\S]*?)\s*```$/i;

/**
 * Pull a JSON object out of a completion. Accepts a bare object, one
 * wrapped in a ``` fence, or one surrounded by stray prose.
 */
export function extractJsonObject(text: string): ParseOutcome<Record<string, unknown>> {
  const trimmed = text.trim();
  if (!trimmed) return { ok: false, error: 'empty completion' };

  const fenced = FENCE_RE.exec(trimmed);
  const body = fenced?.[1] ?? trimmed;

  const candidates = [body];
  const start = body.indexOf('{');
  const end = body.lastIndexOf('}');
  if (start !== -1 && end > start && (start > 0 || end < body.length - 1)) {
    candidates.push(body.slice(start, end + 1));
  }

  let lastError = 'no JSON object found';
  for (const candidate of candidates) {
    let data: unknown;
    try {
      data = JSON.parse(candidate);
    } catch (err) {
      lastError = `not valid JSON: ${errorMessage(err)}`;
      continue;
    }
    if (!isPlainObject(data)) return { ok: false, error: 'expected a JSON object' };
    return { ok: true, value: data };
  }
  return { ok: false, error: lastError };
}

/**
 * Check `data` against a TypeBox schema, reporting the first violation.
 */
export function checkSchema<S extends TSchema>(schema: S, data: unknown): ParseOutcome<Static<S>> {
  if (Value.Check(schema, data)) return { ok: true, value: data };
  const first = Value.Errors(schema, data).First();
  return {
    ok: false,
    error: first ? `${first.path || '/'}: ${first.message}` : 'schema mismatch',
  };
}

/**
 * Extract and parse one completion into a tagged result.
 */
export function parseStructured<T>(
  raw: string,
  parse: (data: Record<string, unknown>) => ParseOutcome<T>,
): StructuredResult<T> {
  const extracted = extractJsonObject(raw);
  if (!extracted.ok) return { ok: false, error: extracted.error, raw };
  const parsed = parse(extracted.value);
  return parsed.ok ? { ok: true, value: parsed.value, raw } : { ok: false, error: parsed.error, raw };
}

// ---------------------------------------------------------------------------
// Bounded-retry completion
// ---------------------------------------------------------------------------

export interface StructuredCall<T> {
  client: CompletionClient;
  role: RoleName;
  prompt: string;
  parse: (data: Record<string, unknown>) => ParseOutcome<T>;
  /** Completions attempted before giving up (at least 1). */
  maxRetries: number;
  options?: CompletionOptions;
  logger: Logger;
}

export interface StructuredSuccess<T> {
  value: T;
  raw: string;
  attempts: number;
}

/**
 * @throws RoleFailedError when every attempt is malformed, or when the
 *   completion capability itself fails (its own retries already spent)
 */
export async function completeStructured<T>(call: StructuredCall<T>): Promise<StructuredSuccess<T>> {
  const { client, role, parse, logger } = call;
  const maxAttempts = Math.max(1, Math.floor(call.maxRetries));
  let prompt = call.prompt;
  let lastError = 'no attempt made';
  let lastRaw: string | undefined;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    let raw: string;
    try {
      const response = await client.complete(prompt, { ...call.options, role });
      raw = response.text;
    } catch (err) {
      const detail = err instanceof ProviderError ? `provider error: ${err.message}` : errorMessage(err);
      logger.error({ role, attempt, error: detail }, 'Completion failed');
      throw new RoleFailedError(role, {
        attempts: attempt,
        lastError: detail,
        ...(lastRaw !== undefined ? { lastRaw } : {}),
        cause: err,
      });
    }

    const result = parseStructured(raw, parse);
    if (result.ok) {
      if (attempt > 1) logger.info({ role, attempt }, 'Structured output accepted after retry');
      return { value: result.value, raw, attempts: attempt };
    }

    lastError = result.error;
    lastRaw = raw;
    logger.warn({ role, attempt, maxAttempts, error: result.error }, 'Malformed structured output');
    prompt = `${call.prompt}\n\n${RETRY_HINT}`;
  }

  throw new RoleFailedError(role, {
    attempts: maxAttempts,
    lastError,
    ...(lastRaw !== undefined ? { lastRaw } : {}),
  });
}

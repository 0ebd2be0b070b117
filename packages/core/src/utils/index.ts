/**
 * @ace/core - Common utilities
 *
 * Shared helper functions used across the ACE packages.
 */

// ---------------------------------------------------------------------------
// Async helpers
// ---------------------------------------------------------------------------

/**
 * Sleep for a given number of milliseconds.
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export interface RetryOptions {
  maxRetries?: number;
  initialDelayMs?: number;
  maxDelayMs?: number;
  backoffMultiplier?: number;
  /** Return false to stop retrying and rethrow immediately. */
  shouldRetry?: (error: Error, attempt: number) => boolean;
  onRetry?: (error: Error, attempt: number, delayMs: number) => void;
}

/**
 * Retry a function with exponential backoff.
 *
 * @param fn - The async function to retry
 * @param options - Retry options
 * @returns The result of the function
 * @throws The last error if all retries are exhausted
 */
export async function retry<T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const {
    maxRetries = 3,
    initialDelayMs = 1000,
    maxDelayMs = 30000,
    backoffMultiplier = 2,
    shouldRetry,
    onRetry,
  } = options;

  let lastError: Error | undefined;
  let delay = initialDelayMs;

  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    try {
      return await fn();
    } catch (err) {
      lastError = err instanceof Error ? err : new Error(String(err));

      if (attempt >= maxRetries || (shouldRetry && !shouldRetry(lastError, attempt + 1))) {
        break;
      }

      // Add jitter: +/- 25% of delay
      const jitter = delay * 0.25 * (Math.random() * 2 - 1);
      const waitMs = Math.max(0, Math.min(delay + jitter, maxDelayMs));
      onRetry?.(lastError, attempt + 1, waitMs);
      await sleep(waitMs);

      delay = Math.min(delay * backoffMultiplier, maxDelayMs);
    }
  }

  throw lastError ?? new Error('retry() exhausted without an error');
}

/**
 * Race a promise against a timeout. Rejects with a descriptive error when
 * the timeout fires first.
 */
export function withTimeout<T>(promise: Promise<T>, ms: number, label: string): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => {
      reject(new Error(`${label} timed out after ${ms}ms`));
    }, ms);

    promise.then(
      (value) => {
        clearTimeout(timer);
        resolve(value);
      },
      (err: unknown) => {
        clearTimeout(timer);
        reject(err);
      },
    );
  });
}

// ---------------------------------------------------------------------------
// String helpers
// ---------------------------------------------------------------------------

/**
 * Truncate a string to a maximum length, appending an ellipsis if truncated.
 */
export function truncate(str: string, maxLength: number, suffix = '...'): string {
  if (str.length <= maxLength) return str;
  if (maxLength <= suffix.length) return suffix.slice(0, maxLength);
  return str.slice(0, maxLength - suffix.length) + suffix;
}

/**
 * Rough token estimate (~4 characters per token).
 */
export function estimateTokens(value: unknown): number {
  const text = typeof value === 'string' ? value : JSON.stringify(value) ?? '';
  return Math.ceil(text.length / 4);
}

/**
 * Lower-case slug made of [a-z0-9-], used for readable identifiers.
 */
export function slugify(input: string, fallback = 'general'): string {
  const slug = input
    .toLowerCase()
    .normalize('NFKD')
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '')
    .slice(0, 32);
  return slug.length > 0 ? slug : fallback;
}

// ---------------------------------------------------------------------------
// Model ID parsing
// ---------------------------------------------------------------------------

export interface ParsedModelId {
  provider: string;
  model: string;
  raw: string;
}

/**
 * Parse a model identifier in "provider/model" format.
 *
 * @throws Error if the format is invalid
 */
export function parseModelId(modelId: string): ParsedModelId {
  const slashIndex = modelId.indexOf('/');

  if (slashIndex === -1) {
    throw new Error(
      `Invalid model ID "${modelId}": expected format "provider/model" (e.g. "openai/gpt-4o-mini")`,
    );
  }

  const provider = modelId.slice(0, slashIndex).toLowerCase().trim();
  const model = modelId.slice(slashIndex + 1).trim();

  if (!provider || !model) {
    throw new Error(`Invalid model ID "${modelId}": provider and model name must not be empty`);
  }

  return { provider, model, raw: modelId };
}

// ---------------------------------------------------------------------------
// Object helpers
// ---------------------------------------------------------------------------

/**
 * Check if a value is a non-null object (not an array).
 */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Deep-merge two objects. Arrays are replaced (not concatenated).
 */
export function deepMerge(
  base: Record<string, unknown>,
  override: Record<string, unknown>,
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...base };

  for (const [key, overVal] of Object.entries(override)) {
    const baseVal = result[key];
    if (isPlainObject(overVal) && isPlainObject(baseVal)) {
      result[key] = deepMerge(baseVal, overVal);
    } else if (overVal !== undefined) {
      result[key] = overVal;
    }
  }

  return result;
}

/**
 * @ace/core - Error taxonomy
 *
 * Every failure that crosses a package boundary is an AceError carrying a
 * stable `code`. Merge anomalies and store misses are values, not errors,
 * and live next to the code that produces them.
 */

export type AceErrorCode =
  | 'GENERATION_FAILED'
  | 'REFLECTION_FAILED'
  | 'CURATION_FAILED'
  | 'PROVIDER_ERROR'
  | 'PLAYBOOK_FORMAT'
  | 'PLAYBOOK_NOT_FOUND'
  | 'CONFIG_INVALID';

export class AceError extends Error {
  readonly code: AceErrorCode;

  constructor(code: AceErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'AceError';
    this.code = code;
  }
}

// ---------------------------------------------------------------------------
// Provider errors
// ---------------------------------------------------------------------------

/**
 * Determine whether an HTTP status returned by a completion endpoint is
 * worth retrying (or failing over from).
 *
 *   - 401 / 403           -> hard stop, credentials are wrong
 *   - 400 / 408 / 429     -> retryable
 *   - 5xx                 -> retryable
 *   - 0                   -> network failure, retryable
 *   - anything else       -> not retryable
 */
export function isRetryableStatus(statusCode: number): boolean {
  if (statusCode === 401 || statusCode === 403) return false;
  if (statusCode === 400 || statusCode === 408 || statusCode === 429) return true;
  if (statusCode >= 500 && statusCode <= 599) return true;
  return statusCode === 0;
}

/** Transient or fatal failure of the LLM-completion capability. */
export class ProviderError extends AceError {
  readonly provider: string;
  readonly statusCode: number | undefined;
  readonly retryable: boolean;

  constructor(
    message: string,
    details: { provider: string; statusCode?: number; retryable?: boolean; cause?: unknown },
  ) {
    super('PROVIDER_ERROR', message, { cause: details.cause });
    this.name = 'ProviderError';
    this.provider = details.provider;
    this.statusCode = details.statusCode;
    this.retryable =
      details.retryable ??
      (details.statusCode === undefined ? true : isRetryableStatus(details.statusCode));
  }
}

// ---------------------------------------------------------------------------
// Role errors
// ---------------------------------------------------------------------------

export type RoleName = 'generator' | 'reflector' | 'curator';

const ROLE_FAILURE_CODES = {
  generator: 'GENERATION_FAILED',
  reflector: 'REFLECTION_FAILED',
  curator: 'CURATION_FAILED',
} as const satisfies Record<RoleName, AceErrorCode>;

/**
 * A role could not produce schema-valid output within its retry bound, or
 * the completion capability kept failing underneath it.
 */
export class RoleFailedError extends AceError {
  readonly role: RoleName;
  readonly attempts: number;
  readonly lastError: string;
  readonly lastRaw: string | undefined;

  constructor(
    role: RoleName,
    details: { attempts: number; lastError: string; lastRaw?: string; cause?: unknown },
  ) {
    super(
      ROLE_FAILURE_CODES[role],
      `${role} failed after ${details.attempts} attempt(s): ${details.lastError}`,
      { cause: details.cause },
    );
    this.name = 'RoleFailedError';
    this.role = role;
    this.attempts = details.attempts;
    this.lastError = details.lastError;
    this.lastRaw = details.lastRaw;
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

export function isAceError(err: unknown): err is AceError {
  return err instanceof AceError;
}

/** Human-readable message for anything thrown. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

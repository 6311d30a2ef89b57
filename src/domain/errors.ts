/**
 * Typed error model for acquisition failures.
 *
 * Every per-item failure is recorded as a TypedError so the run summary can
 * tell "content doesn't exist" apart from "not authorized" apart from
 * "network gave up". Code paths that need to unwind throw an
 * AcquisitionError, which carries the TypedError unchanged.
 */

/** Top-level error domain namespaces. */
export type ErrorDomain =
  | 'RESOLVE'
  | 'AUTH'
  | 'TRANSFER'
  | 'INTEGRITY'
  | 'PLACEMENT'
  | 'RUN'
  | 'SETUP';

/** Typed suggested fix an operator can apply. */
export interface SuggestedFix {
  type: string;
  params: Record<string, unknown>;
  description?: string;
}

/** The core typed error structure recorded per item and per run. */
export interface TypedError {
  /** Namespaced error code (e.g., "RESOLVE.NOT_FOUND"). */
  code: string;
  /** Human-readable error message. */
  message: string;
  /** Identifier of the acquisition request, if applicable. */
  identifier?: string;
  /** Whether the same operation is expected to succeed without changes. */
  retryable: boolean;
  /** Structured detail payload. */
  details?: Record<string, unknown>;
  /** Remediation suggestions. */
  suggestedFixes: SuggestedFix[];
}

/** Create a typed error with defaults. */
export function createTypedError(params: {
  code: string;
  message: string;
  identifier?: string;
  retryable?: boolean;
  details?: Record<string, unknown>;
  suggestedFixes?: SuggestedFix[];
}): TypedError {
  return {
    code: params.code,
    message: params.message,
    identifier: params.identifier,
    retryable: params.retryable ?? false,
    details: params.details,
    suggestedFixes: params.suggestedFixes ?? [],
  };
}

const ERROR_DOMAINS: readonly ErrorDomain[] = ['RESOLVE', 'AUTH', 'TRANSFER', 'INTEGRITY', 'PLACEMENT', 'RUN', 'SETUP'];

/** Domain part of an error code ("AUTH.REJECTED" → "AUTH"); undefined for codes outside the known domains. */
export function errorDomain(error: TypedError): ErrorDomain | undefined {
  const prefix = error.code.split('.', 1)[0];
  return ERROR_DOMAINS.find((domain) => domain === prefix);
}

/** Error thrown through acquisition code paths; always wraps a TypedError. */
export class AcquisitionError extends Error {
  constructor(public readonly typed: TypedError, options?: { cause?: unknown }) {
    super(typed.message, options);
    this.name = 'AcquisitionError';
  }

  get code(): string {
    return this.typed.code;
  }

  get retryable(): boolean {
    return this.typed.retryable;
  }
}

/** Normalise anything caught into a TypedError. */
export function toTypedError(err: unknown, identifier?: string): TypedError {
  if (err instanceof AcquisitionError) {
    return identifier && !err.typed.identifier ? { ...err.typed, identifier } : err.typed;
  }
  return createTypedError({
    code: 'RUN.UNEXPECTED',
    message: err instanceof Error ? err.message : String(err),
    identifier,
    retryable: false,
  });
}

// --- RESOLVE ---

export function resolveNotFoundError(identifier: string, resource: string, statusCode?: number): TypedError {
  return createTypedError({
    code: 'RESOLVE.NOT_FOUND',
    message: `${resource} not found: ${identifier}`,
    identifier,
    retryable: false,
    details: statusCode !== undefined ? { statusCode } : undefined,
    suggestedFixes: [
      { type: 'FIX_IDENTIFIER', params: { identifier }, description: 'The identifier may not exist or was removed. Verify it.' },
    ],
  });
}

export function malformedMetadataError(identifier: string, reason: string): TypedError {
  return createTypedError({
    code: 'RESOLVE.MALFORMED_METADATA',
    message: `Unusable metadata for ${identifier}: ${reason}`,
    identifier,
    retryable: false,
  });
}

export function invalidIdentifierError(identifier: string, expected: string): TypedError {
  return createTypedError({
    code: 'RESOLVE.INVALID_IDENTIFIER',
    message: `Invalid identifier "${identifier}"; expected ${expected}`,
    identifier,
    retryable: false,
    suggestedFixes: [{ type: 'FIX_IDENTIFIER', params: { identifier, expected } }],
  });
}

export function unknownModelTypeError(identifier: string, modelType: string): TypedError {
  return createTypedError({
    code: 'RESOLVE.UNKNOWN_MODEL_TYPE',
    message: `Unrecognised model type "${modelType}" for ${identifier}`,
    identifier,
    retryable: false,
    details: { modelType },
    suggestedFixes: [
      { type: 'DECLARE_CATEGORY', params: { identifier }, description: 'List the identifier under a category-specific variable.' },
    ],
  });
}

export function upstreamUnavailableError(identifier: string, message: string, statusCode?: number): TypedError {
  return createTypedError({
    code: 'RESOLVE.UPSTREAM_UNAVAILABLE',
    message,
    identifier,
    retryable: false,
    details: statusCode !== undefined ? { statusCode } : undefined,
    suggestedFixes: [{ type: 'WAIT_AND_RETRY', params: {}, description: 'Registry unavailable. The next start retries.' }],
  });
}

export function registryApiError(identifier: string, message: string, statusCode: number): TypedError {
  return createTypedError({
    code: 'RESOLVE.API_ERROR',
    message,
    identifier,
    retryable: false,
    details: { statusCode },
  });
}

// --- AUTH ---

/**
 * 401/403 from a registry. Without a configured credential this is reported as
 * AUTH.MISSING so the fix (configure a token) is explicit.
 */
export function authError(
  identifier: string,
  registryLabel: string,
  tokenVariable: string,
  hasCredential: boolean,
  statusCode?: number,
): TypedError {
  return createTypedError({
    code: hasCredential ? 'AUTH.REJECTED' : 'AUTH.MISSING',
    message: hasCredential
      ? `${registryLabel} rejected the configured credential for ${identifier}`
      : `${registryLabel} requires a credential for ${identifier} (private or gated)`,
    identifier,
    retryable: false,
    details: statusCode !== undefined ? { statusCode } : undefined,
    suggestedFixes: [
      {
        type: hasCredential ? 'CHECK_TOKEN' : 'PROVIDE_TOKEN',
        params: { variable: tokenVariable },
        description: hasCredential
          ? `Check that ${tokenVariable} has access to this content`
          : `Provide ${tokenVariable}`,
      },
    ],
  });
}

// --- TRANSFER ---

/**
 * Error for a failed HTTP transfer, with retryability determined by status code.
 *
 * - 401, 403: credential issue, never retried.
 * - 404: the file is gone, never retried.
 * - 408, 429, 5xx: transient, retried by the transfer retry policy.
 * - Other 4xx: non-retryable.
 */
export function transferHttpError(identifier: string, url: string, statusCode: number): TypedError {
  const retryable = statusCode === 408 || statusCode === 429 || statusCode >= 500;
  let code = 'TRANSFER.HTTP';
  if (retryable) code = 'TRANSFER.TRANSIENT';
  else if (statusCode === 404) code = 'TRANSFER.NOT_FOUND';
  else if (statusCode === 401 || statusCode === 403) code = 'AUTH.REJECTED';

  return createTypedError({
    code,
    message: `HTTP ${statusCode} fetching ${redactUrl(url)}`,
    identifier,
    retryable,
    details: { statusCode },
  });
}

export function transferNetworkError(identifier: string, url: string, cause: string): TypedError {
  return createTypedError({
    code: 'TRANSFER.TRANSIENT',
    message: `Network error fetching ${redactUrl(url)}: ${cause}`,
    identifier,
    retryable: true,
  });
}

export function attemptTimeoutError(identifier: string, timeoutMs: number, attempt: number): TypedError {
  return createTypedError({
    code: 'TRANSFER.TRANSIENT',
    message: `Transfer attempt ${attempt} timed out after ${timeoutMs}ms`,
    identifier,
    retryable: true,
    details: { timeoutMs, attempt },
  });
}

export function retriesExhaustedError(identifier: string, attempts: number, last: TypedError): TypedError {
  return createTypedError({
    code: 'TRANSFER.RETRIES_EXHAUSTED',
    message: `Transfer failed after ${attempts} attempts: ${last.message}`,
    identifier,
    retryable: false,
    details: { attempts, lastCode: last.code },
    suggestedFixes: [{ type: 'WAIT_AND_RETRY', params: {}, description: 'Network issue. A later run may succeed.' }],
  });
}

// --- INTEGRITY / PLACEMENT ---

export function integrityMismatchError(identifier: string, file: string, expected: string, actual: string): TypedError {
  return createTypedError({
    code: 'INTEGRITY.MISMATCH',
    message: `Checksum mismatch for ${file}`,
    identifier,
    retryable: false,
    details: { file, expected, actual },
  });
}

export function placementFailedError(identifier: string, stagingDir: string, cause: string): TypedError {
  return createTypedError({
    code: 'PLACEMENT.FAILED',
    message: `Could not place ${identifier}: ${cause}`,
    identifier,
    retryable: false,
    details: { preservedAt: stagingDir },
    suggestedFixes: [
      { type: 'INSPECT_STAGING', params: { path: stagingDir }, description: 'Staged files were preserved for inspection' },
    ],
  });
}

// --- RUN / SETUP ---

export function budgetExceededError(budgetMs: number, identifier?: string): TypedError {
  return createTypedError({
    code: 'RUN.BUDGET_EXCEEDED',
    message: `Run exceeded its budget of ${budgetMs}ms`,
    identifier,
    retryable: true,
    details: { budgetMs },
    suggestedFixes: [{ type: 'INCREASE_TIMEOUT', params: { timeoutMs: budgetMs * 2 } }],
  });
}

export function runInvalidStateTransition(runId: string, from: string, to: string): TypedError {
  return createTypedError({
    code: 'RUN.INVALID_TRANSITION',
    message: `Cannot transition run from "${from}" to "${to}"`,
    retryable: false,
    details: { runId, from, to },
  });
}

export function storageUnavailableError(path: string, cause: string): TypedError {
  return createTypedError({
    code: 'SETUP.STORAGE_UNAVAILABLE',
    message: `Storage path unusable: ${path} (${cause})`,
    retryable: false,
    details: { path },
  });
}

export function invalidConfigError(errors: string[]): TypedError {
  return createTypedError({
    code: 'SETUP.INVALID_CONFIG',
    message: `Invalid configuration: ${errors.join('; ')}`,
    retryable: false,
    details: { errors },
  });
}

/**
 * Mask a secret value, preserving only the last 4 characters for
 * identification. Secrets shorter than 8 characters are fully masked.
 */
export function maskSecret(secret: string): string {
  if (!secret || secret.length < 8) return '****';
  return '*'.repeat(secret.length - 4) + secret.slice(-4);
}

/**
 * Replace every occurrence of each secret in a message with its masked
 * equivalent. Returns the message unchanged when no secret occurs.
 */
export function maskSecretsInMessage(message: string, secrets: string[]): string {
  let result = message;
  for (const secret of secrets) {
    if (secret && secret.length > 0) {
      // split/join avoids regex escaping of token characters
      result = result.split(secret).join(maskSecret(secret));
    }
  }
  return result;
}

/** Drop the query string of a URL (presigned signatures live there). */
export function redactUrl(url: string): string {
  try {
    const parsed = new URL(url);
    return parsed.search ? `${parsed.origin}${parsed.pathname}?…` : `${parsed.origin}${parsed.pathname}`;
  } catch {
    return url;
  }
}

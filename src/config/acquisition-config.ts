/**
 * Acquisition configuration.
 *
 * Typed configuration for the pipeline, read from the environment the
 * container is started with. Everything has a default except the identifier
 * lists and credentials.
 *
 * Usage:
 *   const { config, errors, warnings } = loadConfig(process.env);
 *   if (errors.length > 0) throw new AcquisitionError(invalidConfigError(errors));
 */

import path from 'path';
import { readSourceValues, SourceValues } from '../parser/sources';

/** Per-file retry policy. Independent of the run budget. */
export interface RetryConfig {
  /** Attempts per file, including the first. */
  maxAttempts: number;
  /** Base delay for exponential backoff (ms). */
  backoffBaseMs: number;
  /** Upper bound for a single backoff delay (ms). */
  backoffMaxMs: number;
  /** Budget for one attempt of one file (ms). */
  attemptTimeoutMs: number;
}

/** Transfer tuning. */
export interface TransferConfig {
  /** Parallel byte ranges per file when the server supports ranges. */
  segmentsPerFile: number;
  /** Files smaller than this are fetched in one stream. */
  minSegmentBytes: number;
  /** Files of one snapshot fetched at the same time. */
  maxConcurrentFiles: number;
}

/** Registry origins. */
export interface RegistryEndpoints {
  marketplaceBaseUrl: string;
  hubBaseUrl: string;
}

/** Bearer credentials per registry. */
export interface Credentials {
  marketplaceToken?: string;
  hubToken?: string;
}

/** What to do with a marketplace model whose type maps to no category. */
export type UnknownTypePolicy = 'other' | 'reject';

/** Complete pipeline configuration. */
export interface AcquisitionConfig {
  /** Raw identifier lists keyed by source variable. */
  sources: SourceValues;
  /** Root holding the category directories. */
  storageRoot: string;
  /** In-progress downloads; must not be the storage root. */
  tempRoot: string;
  /** Completion marker file name inside the storage root. */
  markerFileName: string;
  /** Wall-clock budget for the whole run (ms). */
  budgetMs: number;
  /** Requests processed at the same time. */
  maxConcurrentRequests: number;
  retry: RetryConfig;
  transfer: TransferConfig;
  endpoints: RegistryEndpoints;
  credentials: Credentials;
  unknownTypePolicy: UnknownTypePolicy;
  /** Probe credentials before transferring (non-fatal). */
  validateTokens: boolean;
  debug: boolean;
}

/** Validation result for a configuration. */
export interface ConfigValidationResult {
  valid: boolean;
  errors: string[];
  warnings: string[];
}

export const DEFAULT_RETRY_CONFIG: Readonly<RetryConfig> = {
  maxAttempts: 3,
  backoffBaseMs: 2_000,
  backoffMaxMs: 30_000,
  attemptTimeoutMs: 600_000,
};

export const DEFAULT_TRANSFER_CONFIG: Readonly<TransferConfig> = {
  segmentsPerFile: 4,
  minSegmentBytes: 8 * 1024 * 1024,
  maxConcurrentFiles: 2,
};

export const DEFAULT_ENDPOINTS: Readonly<RegistryEndpoints> = {
  marketplaceBaseUrl: 'https://civitai.com',
  hubBaseUrl: 'https://huggingface.co',
};

export const DEFAULT_STORAGE_ROOT = '/home/comfyuser/workspace/models';
export const DEFAULT_TEMP_ROOT = '/home/comfyuser/workspace/downloads_tmp';
export const DEFAULT_MARKER_FILE = '.acquisition-complete';
export const DEFAULT_BUDGET_MS = 3_600_000;
/** Largest delay a Node timer accepts (2^31 - 1 ms); longer ones fire at once. */
export const MAX_BUDGET_MS = 2_147_483_647;

/** Create a config with defaults for every field the overrides leave out. */
export function createAcquisitionConfig(overrides?: Partial<AcquisitionConfig>): AcquisitionConfig {
  return {
    sources: overrides?.sources ?? {},
    storageRoot: overrides?.storageRoot ?? DEFAULT_STORAGE_ROOT,
    tempRoot: overrides?.tempRoot ?? DEFAULT_TEMP_ROOT,
    markerFileName: overrides?.markerFileName ?? DEFAULT_MARKER_FILE,
    budgetMs: overrides?.budgetMs ?? DEFAULT_BUDGET_MS,
    maxConcurrentRequests: overrides?.maxConcurrentRequests ?? 3,
    retry: { ...DEFAULT_RETRY_CONFIG, ...overrides?.retry },
    transfer: { ...DEFAULT_TRANSFER_CONFIG, ...overrides?.transfer },
    endpoints: { ...DEFAULT_ENDPOINTS, ...overrides?.endpoints },
    credentials: { ...overrides?.credentials },
    unknownTypePolicy: overrides?.unknownTypePolicy ?? 'other',
    validateTokens: overrides?.validateTokens ?? true,
    debug: overrides?.debug ?? false,
  };
}

/** Validate a configuration for consistency. */
export function validateAcquisitionConfig(config: AcquisitionConfig): ConfigValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (!config.storageRoot) errors.push('storage root must be set');
  if (!config.tempRoot) errors.push('temp root must be set');
  if (config.storageRoot && config.tempRoot) {
    const storage = path.resolve(config.storageRoot);
    const temp = path.resolve(config.tempRoot);
    if (storage === temp) {
      errors.push('temp root must differ from the storage root');
    } else if (temp.startsWith(storage + path.sep)) {
      warnings.push('temp root is inside the storage root; staged files share its volume');
    }
  }

  if (!Number.isFinite(config.budgetMs) || config.budgetMs <= 0) {
    errors.push('budget must be a positive number of seconds');
  } else if (config.budgetMs > MAX_BUDGET_MS) {
    errors.push(`budget must not exceed ${Math.floor(MAX_BUDGET_MS / 1000)} seconds`);
  }
  if (!Number.isInteger(config.maxConcurrentRequests) || config.maxConcurrentRequests < 1) {
    errors.push('max concurrency must be an integer of at least 1');
  }
  if (!Number.isInteger(config.retry.maxAttempts) || config.retry.maxAttempts < 1) {
    errors.push('max attempts must be an integer of at least 1');
  }
  if (config.retry.backoffBaseMs < 0 || config.retry.backoffMaxMs < config.retry.backoffBaseMs) {
    errors.push('backoff must satisfy 0 <= base <= max');
  }
  if (!Number.isInteger(config.transfer.segmentsPerFile) || config.transfer.segmentsPerFile < 1) {
    errors.push('segments per file must be an integer of at least 1');
  }
  if (config.transfer.segmentsPerFile > 16) {
    warnings.push(`${config.transfer.segmentsPerFile} segments per file may trigger registry rate limits`);
  }
  if (!Number.isInteger(config.transfer.maxConcurrentFiles) || config.transfer.maxConcurrentFiles < 1) {
    errors.push('concurrent snapshot files must be an integer of at least 1');
  }

  for (const [label, url] of Object.entries(config.endpoints)) {
    try {
      const parsed = new URL(url);
      if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
        errors.push(`${label} must use http or https, got ${parsed.protocol}`);
      }
    } catch {
      errors.push(`${label} is not a valid URL: ${url}`);
    }
  }

  if (config.unknownTypePolicy !== 'other' && config.unknownTypePolicy !== 'reject') {
    errors.push(`unknown type policy must be "other" or "reject", got "${String(config.unknownTypePolicy)}"`);
  }

  return { valid: errors.length === 0, errors, warnings };
}

/** Result of reading configuration from an environment map. */
export interface LoadedConfig extends ConfigValidationResult {
  config: AcquisitionConfig;
}

/** Read the pipeline configuration from environment variables. */
export function loadConfig(env: Record<string, string | undefined>): LoadedConfig {
  const parseErrors: string[] = [];

  const num = (name: string, fallback: number): number => {
    const raw = env[name]?.trim();
    if (!raw) return fallback;
    const value = Number(raw);
    if (!Number.isFinite(value)) {
      parseErrors.push(`${name} must be a number, got "${raw}"`);
      return fallback;
    }
    return value;
  };

  const flag = (name: string, fallback: boolean): boolean => {
    const raw = env[name]?.trim().toLowerCase();
    if (!raw) return fallback;
    if (['1', 'true', 'yes', 'on'].includes(raw)) return true;
    if (['0', 'false', 'no', 'off'].includes(raw)) return false;
    parseErrors.push(`${name} must be true or false, got "${raw}"`);
    return fallback;
  };

  const text = (name: string): string | undefined => {
    const raw = env[name]?.trim();
    return raw ? raw : undefined;
  };

  const policyRaw = text('UNKNOWN_MODEL_TYPE_POLICY') ?? 'other';
  let unknownTypePolicy: UnknownTypePolicy = 'other';
  if (policyRaw === 'other' || policyRaw === 'reject') {
    unknownTypePolicy = policyRaw;
  } else {
    parseErrors.push(`UNKNOWN_MODEL_TYPE_POLICY must be "other" or "reject", got "${policyRaw}"`);
  }

  const config = createAcquisitionConfig({
    sources: readSourceValues(env),
    storageRoot: text('MODELS_DIR') ?? DEFAULT_STORAGE_ROOT,
    tempRoot: text('DOWNLOADS_TMP') ?? DEFAULT_TEMP_ROOT,
    budgetMs: num('DOWNLOAD_TIMEOUT_SECONDS', DEFAULT_BUDGET_MS / 1000) * 1000,
    maxConcurrentRequests: num('DOWNLOAD_MAX_CONCURRENCY', 3),
    retry: { ...DEFAULT_RETRY_CONFIG, maxAttempts: num('DOWNLOAD_MAX_ATTEMPTS', DEFAULT_RETRY_CONFIG.maxAttempts) },
    transfer: { ...DEFAULT_TRANSFER_CONFIG, segmentsPerFile: num('DOWNLOAD_SEGMENTS', DEFAULT_TRANSFER_CONFIG.segmentsPerFile) },
    endpoints: {
      marketplaceBaseUrl: stripTrailingSlash(text('CIVITAI_API_BASE') ?? DEFAULT_ENDPOINTS.marketplaceBaseUrl),
      hubBaseUrl: stripTrailingSlash(text('HF_ENDPOINT') ?? DEFAULT_ENDPOINTS.hubBaseUrl),
    },
    credentials: {
      marketplaceToken: text('CIVITAI_TOKEN'),
      hubToken: text('HUGGINGFACE_TOKEN'),
    },
    unknownTypePolicy,
    validateTokens: flag('VALIDATE_TOKENS', true),
    debug: flag('DEBUG_MODE', false),
  });

  const validation = validateAcquisitionConfig(config);
  const errors = [...parseErrors, ...validation.errors];
  return { config, valid: errors.length === 0, errors, warnings: validation.warnings };
}

function stripTrailingSlash(url: string): string {
  return url.replace(/\/+$/, '');
}

/**
 * Shared GET-JSON helper for registry metadata endpoints, mapping HTTP
 * outcomes onto the RESOLVE/AUTH error taxonomy.
 */

import { AuthScope } from '../domain/artifact';
import {
  AcquisitionError,
  authError,
  budgetExceededError,
  malformedMetadataError,
  redactUrl,
  registryApiError,
  resolveNotFoundError,
  upstreamUnavailableError,
} from '../domain/errors';
import { ScopedHttpClient, discardBody } from '../http/scoped-client';

export interface RegistryCallContext {
  identifier: string;
  /** Human label, e.g. "Marketplace". */
  registryLabel: string;
  /** Environment variable holding the registry's token. */
  tokenVariable: string;
  /** What is being looked up, e.g. "Model". */
  resource: string;
  auth?: AuthScope;
  signal?: AbortSignal;
  budgetMs?: number;
}

export async function getRegistryJson(http: ScopedHttpClient, url: string, ctx: RegistryCallContext): Promise<unknown> {
  let response: Response;
  try {
    ({ response } = await http.request(url, {
      auth: ctx.auth,
      headers: { Accept: 'application/json' },
      signal: ctx.signal,
    }));
  } catch (err) {
    throw requestFailure(err, url, ctx);
  }

  const status = response.status;
  if (status === 200) {
    try {
      return await response.json();
    } catch (err) {
      if (ctx.signal?.aborted) throw new AcquisitionError(budgetExceededError(ctx.budgetMs ?? 0, ctx.identifier));
      throw new AcquisitionError(malformedMetadataError(ctx.identifier, 'response is not JSON'), { cause: err });
    }
  }

  await discardBody(response);
  if (status === 404) {
    throw new AcquisitionError(resolveNotFoundError(ctx.identifier, ctx.resource, status));
  }
  if (status === 401 || status === 403) {
    throw new AcquisitionError(authError(ctx.identifier, ctx.registryLabel, ctx.tokenVariable, Boolean(ctx.auth), status));
  }
  if (status === 408 || status === 429 || status >= 500) {
    throw new AcquisitionError(
      upstreamUnavailableError(ctx.identifier, `${ctx.registryLabel} returned HTTP ${status} for ${redactUrl(url)}`, status),
    );
  }
  throw new AcquisitionError(
    registryApiError(ctx.identifier, `${ctx.registryLabel} returned HTTP ${status} for ${redactUrl(url)}`, status),
  );
}

/** Map a thrown fetch error: run deadline, or registry unreachable. */
export function requestFailure(err: unknown, url: string, ctx: RegistryCallContext): AcquisitionError {
  if (err instanceof AcquisitionError) return err;
  if (ctx.signal?.aborted) {
    return new AcquisitionError(budgetExceededError(ctx.budgetMs ?? 0, ctx.identifier), { cause: err });
  }
  const message = err instanceof Error ? err.message : String(err);
  return new AcquisitionError(
    upstreamUnavailableError(ctx.identifier, `${ctx.registryLabel} unreachable at ${redactUrl(url)}: ${message}`),
    { cause: err },
  );
}

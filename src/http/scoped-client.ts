/**
 * HTTP client with per-hop credential scoping.
 *
 * Redirects are followed here, never by fetch. Download endpoints of both
 * registries redirect to presigned storage that must not see the token, so
 * every hop is issued with `redirect: 'manual'` and the bearer credential is
 * attached only when the hop's authority (hostname and port) equals the
 * scope's host.
 */

import { AuthScope } from '../domain/artifact';
import { AcquisitionError, createTypedError, redactUrl } from '../domain/errors';

export const USER_AGENT = 'model-acquisition/0.1.0';

const REDIRECT_STATUSES = new Set([301, 302, 303, 307, 308]);
const DEFAULT_MAX_REDIRECTS = 5;

/** Fetch function type (injectable for testing). */
export type FetchFn = (input: string, init?: RequestInit) => Promise<Response>;

export interface ScopedRequestOptions {
  method?: 'GET' | 'HEAD';
  headers?: Record<string, string>;
  auth?: AuthScope;
  signal?: AbortSignal;
  /** Follow redirects hop by hop (default) or return the first 3xx as-is. */
  followRedirects?: boolean;
  maxRedirects?: number;
}

/** One request actually sent. */
export interface HopRecord {
  url: string;
  status: number;
  authorized: boolean;
}

export interface ScopedResponse {
  response: Response;
  /** URL of the last hop. */
  finalUrl: string;
  hops: HopRecord[];
}

/** Authority (hostname[:port]) of a URL, lower-cased. */
export function authorityOf(url: string): string {
  return new URL(url).host.toLowerCase();
}

/** Whether the credential of `auth` may be sent to `url`. */
export function shouldAttachCredential(url: string, auth?: AuthScope): boolean {
  if (!auth || !auth.token) return false;
  return authorityOf(url) === auth.host.toLowerCase();
}

/** Build an auth scope bound to the authority of a registry origin. */
export function scopeFor(originUrl: string, token: string | undefined): AuthScope | undefined {
  if (!token) return undefined;
  return { token, host: authorityOf(originUrl) };
}

export function isRedirect(status: number): boolean {
  return REDIRECT_STATUSES.has(status);
}

/** Release a response body that will not be read. */
export async function discardBody(response: Response): Promise<void> {
  if (response.body && !response.bodyUsed) {
    await response.body.cancel();
  }
}

export class ScopedHttpClient {
  constructor(private readonly fetchFn: FetchFn = (input, init) => fetch(input, init)) {}

  async request(url: string, options: ScopedRequestOptions = {}): Promise<ScopedResponse> {
    const maxRedirects = options.maxRedirects ?? DEFAULT_MAX_REDIRECTS;
    const follow = options.followRedirects ?? true;
    let method = options.method ?? 'GET';
    let current = url;
    const hops: HopRecord[] = [];

    for (;;) {
      assertHttpUrl(current);
      const authorized = shouldAttachCredential(current, options.auth);
      const headers: Record<string, string> = { 'User-Agent': USER_AGENT, ...options.headers };
      if (authorized && options.auth) {
        headers.Authorization = `Bearer ${options.auth.token}`;
      }

      const response = await this.fetchFn(current, {
        method,
        headers,
        redirect: 'manual',
        signal: options.signal,
      });
      hops.push({ url: current, status: response.status, authorized });

      const location = response.headers.get('location');
      if (!follow || !isRedirect(response.status) || !location) {
        return { response, finalUrl: current, hops };
      }

      await discardBody(response);
      if (hops.length > maxRedirects) {
        throw new AcquisitionError(
          createTypedError({
            code: 'TRANSFER.HTTP',
            message: `Too many redirects starting at ${redactUrl(url)}`,
            retryable: false,
            details: { maxRedirects },
          }),
        );
      }
      if (response.status === 303) method = 'GET';
      current = new URL(location, current).href;
    }
  }
}

function assertHttpUrl(url: string): void {
  let protocol: string;
  try {
    protocol = new URL(url).protocol;
  } catch {
    throw new AcquisitionError(
      createTypedError({ code: 'TRANSFER.HTTP', message: `Invalid URL: ${url}`, retryable: false }),
    );
  }
  if (protocol !== 'http:' && protocol !== 'https:') {
    throw new AcquisitionError(
      createTypedError({
        code: 'TRANSFER.HTTP',
        message: `Refusing non-HTTP URL: ${redactUrl(url)}`,
        retryable: false,
        details: { protocol },
      }),
    );
  }
}

/**
 * Hub registry client: one revision manifest per repository, every listed
 * file becomes part of a directory snapshot.
 */

import { ResolvedArtifact, ResolvedFile } from '../domain/artifact';
import { AcquisitionError, invalidIdentifierError, malformedMetadataError } from '../domain/errors';
import { AcquisitionRequest, Registry } from '../domain/request';
import { ScopedHttpClient, discardBody, scopeFor } from '../http/scoped-client';
import { Logger, logger as rootLogger } from '../logger';
import { DEFAULT_REVISION, HubIdentifier, parseHubIdentifier } from '../parser/identifier-parser';
import { isObject, readNumber, readObject, readObjects, readString } from './json';
import { CredentialCheck, RegistryClient } from './registry-client';
import { getRegistryJson } from './registry-http';

export const HUB_TOKEN_VARIABLE = 'HUGGINGFACE_TOKEN';

export interface HubClientOptions {
  http: ScopedHttpClient;
  baseUrl: string;
  token?: string;
  budgetMs?: number;
  logger?: Logger;
}

export class HubClient implements RegistryClient {
  readonly registry = Registry.Hub;
  private readonly log: Logger;

  constructor(private readonly options: HubClientOptions) {
    this.log = (options.logger ?? rootLogger).child({ component: 'hub' });
  }

  async resolve(request: AcquisitionRequest, signal?: AbortSignal): Promise<ResolvedArtifact> {
    const identifier = request.identifier;
    const repo = parseHubIdentifier(identifier);
    if (!repo) {
      throw new AcquisitionError(invalidIdentifierError(identifier, 'owner/name or owner/name@revision'));
    }

    const auth = scopeFor(this.options.baseUrl, this.options.token);
    const manifestUrl =
      `${this.options.baseUrl}/api/models/${encodeURIComponent(repo.owner)}/${encodeURIComponent(repo.name)}` +
      `/revision/${encodeURIComponent(repo.revision)}?blobs=true`;
    const manifest = await getRegistryJson(this.options.http, manifestUrl, {
      identifier,
      registryLabel: 'Hub',
      tokenVariable: HUB_TOKEN_VARIABLE,
      resource: 'Repository',
      auth,
      signal,
      budgetMs: this.options.budgetMs,
    });
    if (!isObject(manifest)) {
      throw new AcquisitionError(malformedMetadataError(identifier, 'manifest is not an object'));
    }

    const files: ResolvedFile[] = [];
    const skipped: string[] = [];
    for (const sibling of readObjects(manifest, 'siblings')) {
      const relativePath = readString(sibling, 'rfilename');
      if (!relativePath) continue;
      if (!isSafeRelativePath(relativePath)) {
        skipped.push(relativePath);
        continue;
      }
      const lfs = readObject(sibling, 'lfs');
      const sha = lfs ? readString(lfs, 'sha256') : undefined;
      files.push({
        url: this.fileUrl(repo, relativePath),
        relativePath,
        expectedSha256: sha?.toLowerCase(),
        expectedSize: (lfs ? readNumber(lfs, 'size') : undefined) ?? readNumber(sibling, 'size'),
        auth,
      });
    }

    if (skipped.length > 0) {
      this.log.warn('Skipping manifest entries with unsafe paths', { identifier, files: skipped });
    }
    if (files.length === 0) {
      throw new AcquisitionError(malformedMetadataError(identifier, 'repository lists no files'));
    }

    this.log.debug('Resolved snapshot', { identifier, revision: repo.revision, files: files.length });
    return {
      request,
      category: 'hub_snapshot',
      name: snapshotName(repo),
      layout: 'directory',
      files,
    };
  }

  async checkCredential(signal?: AbortSignal): Promise<CredentialCheck> {
    if (!this.options.token) return { registry: this.registry, status: 'absent' };
    try {
      const { response } = await this.options.http.request(`${this.options.baseUrl}/api/whoami-v2`, {
        auth: scopeFor(this.options.baseUrl, this.options.token),
        headers: { Accept: 'application/json' },
        signal,
      });
      await discardBody(response);
      if (response.ok) return { registry: this.registry, status: 'valid', statusCode: response.status };
      if (response.status === 401 || response.status === 403) {
        return { registry: this.registry, status: 'invalid', statusCode: response.status };
      }
      return { registry: this.registry, status: 'unreachable', statusCode: response.status };
    } catch (err) {
      this.log.debug('Credential probe failed', { error: err instanceof Error ? err.message : String(err) });
      return { registry: this.registry, status: 'unreachable' };
    }
  }

  private fileUrl(repo: HubIdentifier, relativePath: string): string {
    const encodedPath = relativePath.split('/').map(encodeURIComponent).join('/');
    return (
      `${this.options.baseUrl}/${encodeURIComponent(repo.owner)}/${encodeURIComponent(repo.name)}` +
      `/resolve/${encodeURIComponent(repo.revision)}/${encodedPath}`
    );
  }
}

/**
 * Entry name under `hub_snapshot/`: `owner__name`, plus `@revision` for any
 * revision other than the default, so each pinned revision is its own entry.
 */
export function snapshotName(repo: HubIdentifier): string {
  const base = `${repo.owner}__${repo.name}`;
  if (repo.revision === DEFAULT_REVISION) return base;
  return `${base}@${repo.revision.replace(/[^\w.-]+/g, '_')}`;
}

/** Relative, forward-slash path with no empty, `.` or `..` segment. */
export function isSafeRelativePath(relativePath: string): boolean {
  if (relativePath.startsWith('/') || relativePath.includes('\\')) return false;
  return relativePath.split('/').every((segment) => segment !== '' && segment !== '.' && segment !== '..');
}

/**
 * Marketplace registry client.
 *
 * Two metadata lookups per identifier: the model (type, latest version) and
 * the model version (files, hashes, download URL). The download URL is then
 * probed once without following redirects so the artifact carries the final
 * presigned URL; the credential stays scoped to the marketplace host.
 */

import { ResolvedArtifact, ResolvedFile } from '../domain/artifact';
import {
  AcquisitionError,
  authError,
  invalidIdentifierError,
  malformedMetadataError,
  resolveNotFoundError,
  unknownModelTypeError,
} from '../domain/errors';
import { AcquisitionRequest, Category, Registry } from '../domain/request';
import { UnknownTypePolicy } from '../config/acquisition-config';
import { ScopedHttpClient, discardBody, isRedirect, scopeFor } from '../http/scoped-client';
import { Logger, logger as rootLogger } from '../logger';
import { parseMarketplaceIdentifier } from '../parser/identifier-parser';
import { JsonObject, isObject, readBoolean, readId, readNumber, readObject, readObjects, readString } from './json';
import { categoryForModelType } from './model-types';
import { CredentialCheck, RegistryClient } from './registry-client';
import { RegistryCallContext, getRegistryJson, requestFailure } from './registry-http';

export const MARKETPLACE_TOKEN_VARIABLE = 'CIVITAI_TOKEN';

export interface MarketplaceClientOptions {
  http: ScopedHttpClient;
  baseUrl: string;
  token?: string;
  unknownTypePolicy?: UnknownTypePolicy;
  budgetMs?: number;
  logger?: Logger;
}

export class MarketplaceClient implements RegistryClient {
  readonly registry = Registry.Marketplace;
  private readonly log: Logger;

  constructor(private readonly options: MarketplaceClientOptions) {
    this.log = (options.logger ?? rootLogger).child({ component: 'marketplace' });
  }

  async resolve(request: AcquisitionRequest, signal?: AbortSignal): Promise<ResolvedArtifact> {
    const identifier = request.identifier;
    const parsed = parseMarketplaceIdentifier(identifier);
    if (!parsed) {
      throw new AcquisitionError(invalidIdentifierError(identifier, 'a numeric model ID or modelId@versionId'));
    }

    const model = await this.getObject(`/api/v1/models/${parsed.modelId}`, identifier, 'Model', signal);
    const modelType = readString(model, 'type');
    if (!modelType) {
      throw new AcquisitionError(malformedMetadataError(identifier, 'model has no type'));
    }

    let versionId = parsed.versionId;
    if (!versionId) {
      const latest = readObjects(model, 'modelVersions')[0];
      versionId = latest ? readId(latest, 'id') : undefined;
      if (!versionId) {
        throw new AcquisitionError(malformedMetadataError(identifier, 'model lists no versions'));
      }
    }

    const version = await this.getObject(`/api/v1/model-versions/${versionId}`, identifier, 'Model version', signal);
    const files = readObjects(version, 'files');
    const primary = files.find((f) => readBoolean(f, 'primary')) ?? files[0];
    if (!primary) {
      throw new AcquisitionError(malformedMetadataError(identifier, `version ${versionId} lists no files`));
    }

    const name = fileNameOf(primary);
    if (!name) {
      throw new AcquisitionError(malformedMetadataError(identifier, 'primary file has no usable name'));
    }

    const category = this.categoryFor(request, modelType);
    const downloadUrl = readString(primary, 'downloadUrl') ?? `${this.options.baseUrl}/api/download/models/${versionId}`;
    const auth = scopeFor(this.options.baseUrl, this.options.token);
    const url = await this.resolveDownloadUrl(downloadUrl, identifier, signal);

    const sizeKb = readNumber(primary, 'sizeKB');
    const sha = readString(readObject(primary, 'hashes') ?? {}, 'SHA256');
    const file: ResolvedFile = {
      url,
      relativePath: name,
      expectedSha256: sha ? sha.trim().toLowerCase() : undefined,
      expectedSize: sizeKb !== undefined ? Math.round(sizeKb * 1024) : undefined,
      auth,
    };

    this.log.debug('Resolved model', { identifier, versionId, modelType, category, name, hasHash: Boolean(sha) });
    return { request, category, name, layout: 'file', files: [file] };
  }

  async checkCredential(signal?: AbortSignal): Promise<CredentialCheck> {
    if (!this.options.token) return { registry: this.registry, status: 'absent' };
    try {
      const { response } = await this.options.http.request(`${this.options.baseUrl}/api/v1/models?limit=1`, {
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

  /**
   * Declared category wins; otherwise the model type decides. Unmapped types
   * follow the configured policy.
   */
  private categoryFor(request: AcquisitionRequest, modelType: string): Category {
    const mapped = categoryForModelType(modelType);
    if (request.declaredCategory) {
      if (mapped && mapped !== request.declaredCategory) {
        this.log.warn('Declared category differs from model type', {
          identifier: request.identifier,
          declared: request.declaredCategory,
          modelType,
        });
      }
      return request.declaredCategory;
    }
    if (mapped) return mapped;
    if (this.options.unknownTypePolicy === 'reject') {
      throw new AcquisitionError(unknownModelTypeError(request.identifier, modelType));
    }
    this.log.warn('Unrecognised model type; routing to "other"', { identifier: request.identifier, modelType });
    return 'other';
  }

  /**
   * One hop, no redirect following. A 3xx yields the absolute Location; any
   * other non-error answer keeps the original URL.
   */
  private async resolveDownloadUrl(downloadUrl: string, identifier: string, signal?: AbortSignal): Promise<string> {
    const ctx = this.context(identifier, 'Download', signal);
    let response: Response;
    try {
      ({ response } = await this.options.http.request(downloadUrl, {
        auth: ctx.auth,
        headers: { Range: 'bytes=0-0' },
        followRedirects: false,
        signal,
      }));
    } catch (err) {
      const failure = requestFailure(err, downloadUrl, ctx);
      if (failure.code === 'RUN.BUDGET_EXCEEDED') throw failure;
      this.log.warn('Download URL probe failed; using the unresolved URL', { identifier, error: failure.message });
      return downloadUrl;
    }

    await discardBody(response);
    const location = response.headers.get('location');
    if (isRedirect(response.status) && location) {
      return new URL(location, downloadUrl).href;
    }
    if (response.status === 401 || response.status === 403) {
      throw new AcquisitionError(
        authError(identifier, 'Marketplace', MARKETPLACE_TOKEN_VARIABLE, Boolean(ctx.auth), response.status),
      );
    }
    if (response.status === 404) {
      throw new AcquisitionError(resolveNotFoundError(identifier, 'Download', response.status));
    }
    return downloadUrl;
  }

  private async getObject(path: string, identifier: string, resource: string, signal?: AbortSignal): Promise<JsonObject> {
    const body = await getRegistryJson(
      this.options.http,
      `${this.options.baseUrl}${path}`,
      this.context(identifier, resource, signal),
    );
    if (!isObject(body)) {
      throw new AcquisitionError(malformedMetadataError(identifier, `${resource.toLowerCase()} response is not an object`));
    }
    return body;
  }

  private context(identifier: string, resource: string, signal?: AbortSignal): RegistryCallContext {
    return {
      identifier,
      registryLabel: 'Marketplace',
      tokenVariable: MARKETPLACE_TOKEN_VARIABLE,
      resource,
      auth: scopeFor(this.options.baseUrl, this.options.token),
      signal,
      budgetMs: this.options.budgetMs,
    };
  }
}

/** Plain file name of a marketplace file entry; path separators are refused. */
function fileNameOf(file: JsonObject): string | undefined {
  const name = readString(file, 'name')?.trim();
  if (!name || name === '.' || name === '..' || /[\\/]/.test(name)) return undefined;
  return name;
}

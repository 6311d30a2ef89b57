/**
 * Marketplace client against an in-process registry and storage host.
 */

import { AcquisitionRequest, Registry } from '../../src/domain/request';
import { ScopedHttpClient, authorityOf } from '../../src/http/scoped-client';
import { LogEntry, resetLogHandler, setLogHandler } from '../../src/logger';
import { MarketplaceClient, MarketplaceClientOptions } from '../../src/registry/marketplace-client';
import {
  RunningServer,
  StorageServer,
  StubMarketplaceModel,
  sha256Hex,
  startMarketplace,
  startStorage,
} from '../support/stub-servers';

const WEIGHTS = Buffer.from('checkpoint weights');
const LORA = Buffer.from('lora weights');

const MODELS: StubMarketplaceModel[] = [
  {
    id: 100,
    type: 'Checkpoint',
    versions: [
      { id: 202, files: [{ name: 'model-v2.safetensors', content: WEIGHTS, primary: true, sha256: sha256Hex(WEIGHTS).toUpperCase() }] },
      { id: 201, files: [{ name: 'model-v1.safetensors', content: WEIGHTS }] },
    ],
  },
  {
    id: 300,
    type: 'LORA',
    versions: [
      {
        id: 301,
        files: [
          { name: 'training-data.zip', content: Buffer.from('zip') },
          { name: 'style.safetensors', content: LORA, primary: true },
        ],
      },
    ],
  },
  { id: 400, type: 'Workflows', versions: [{ id: 401, files: [{ name: 'flow.json', content: Buffer.from('{}') }] }] },
  { id: 500, type: 'Checkpoint', private: true, versions: [{ id: 501, files: [{ name: 'private.safetensors', content: WEIGHTS }] }] },
  { id: 600, type: 'Checkpoint', versions: [{ id: 601, files: [] }] },
];

const request = (identifier: string, declaredCategory?: AcquisitionRequest['declaredCategory']): AcquisitionRequest => ({
  registry: Registry.Marketplace,
  identifier,
  declaredCategory,
  source: declaredCategory ? 'CIVITAI_CHECKPOINTS_TO_DOWNLOAD' : 'CIVITAI_MODELS_TO_DOWNLOAD',
});

describe('MarketplaceClient', () => {
  let storage: StorageServer;
  let marketplace: RunningServer;
  let entries: LogEntry[];

  const client = (options: Partial<MarketplaceClientOptions> = {}) =>
    new MarketplaceClient({ http: new ScopedHttpClient(), baseUrl: marketplace.url, ...options });

  beforeAll(async () => {
    storage = await startStorage();
    marketplace = await startMarketplace(storage, MODELS, { token: 'test-secret' });
  });

  afterAll(async () => {
    await marketplace.close();
    await storage.close();
  });

  beforeEach(() => {
    marketplace.requests.length = 0;
    storage.requests.length = 0;
    entries = [];
    setLogHandler((entry) => entries.push(entry));
  });

  afterEach(() => {
    resetLogHandler();
  });

  test('resolves the latest version to a presigned storage URL', async () => {
    const artifact = await client({ token: 'test-secret' }).resolve(request('100', 'checkpoints'));

    expect(artifact).toEqual({
      request: request('100', 'checkpoints'),
      category: 'checkpoints',
      name: 'model-v2.safetensors',
      layout: 'file',
      files: [
        {
          url: storage.fileUrl('mp/202/model-v2.safetensors'),
          relativePath: 'model-v2.safetensors',
          expectedSha256: sha256Hex(WEIGHTS),
          expectedSize: WEIGHTS.length,
          auth: { token: 'test-secret', host: authorityOf(marketplace.url) },
        },
      ],
    });
    expect(marketplace.requests.map((r) => r.path)).toEqual([
      '/api/v1/models/100',
      '/api/v1/model-versions/202',
      '/api/download/models/202',
    ]);
    expect(marketplace.requests.every((r) => r.authorization === 'Bearer test-secret')).toBe(true);
    expect(storage.requests).toHaveLength(0);
  });

  test('redirect target has a different authority than the registry', async () => {
    const artifact = await client().resolve(request('100', 'checkpoints'));
    expect(authorityOf(artifact.files[0].url)).not.toBe(authorityOf(marketplace.url));
    expect(artifact.files[0].auth).toBeUndefined();
  });

  test('a pinned version skips version selection', async () => {
    const artifact = await client().resolve(request('100@201', 'checkpoints'));
    expect(artifact.name).toBe('model-v1.safetensors');
    expect(artifact.files[0].expectedSha256).toBeUndefined();
    expect(marketplace.requests.map((r) => r.path)).toContain('/api/v1/model-versions/201');
  });

  test('picks the primary file over the first one', async () => {
    const artifact = await client().resolve(request('300'));
    expect(artifact.name).toBe('style.safetensors');
  });

  test('maps the model type when no category is declared', async () => {
    const artifact = await client().resolve(request('300'));
    expect(artifact.category).toBe('loras');
  });

  test('a declared category wins over the model type, with a warning', async () => {
    const artifact = await client().resolve(request('300', 'checkpoints'));
    expect(artifact.category).toBe('checkpoints');
    expect(entries.find((e) => e.message === 'Declared category differs from model type')?.context).toMatchObject({
      identifier: '300',
      declared: 'checkpoints',
      modelType: 'LORA',
    });
  });

  test('unknown types go to "other" by default', async () => {
    const artifact = await client().resolve(request('400'));
    expect(artifact.category).toBe('other');
    expect(entries.map((e) => e.message)).toContain('Unrecognised model type; routing to "other"');
  });

  test('unknown types fail under the reject policy', async () => {
    await expect(client({ unknownTypePolicy: 'reject' }).resolve(request('400'))).rejects.toMatchObject({
      code: 'RESOLVE.UNKNOWN_MODEL_TYPE',
      typed: { details: { modelType: 'Workflows' } },
    });
  });

  test('a missing model is RESOLVE.NOT_FOUND', async () => {
    await expect(client().resolve(request('999', 'checkpoints'))).rejects.toMatchObject({
      code: 'RESOLVE.NOT_FOUND',
      typed: { identifier: '999', retryable: false },
    });
  });

  test('private content without a token is AUTH.MISSING', async () => {
    await expect(client().resolve(request('500', 'checkpoints'))).rejects.toMatchObject({
      code: 'AUTH.MISSING',
      typed: { suggestedFixes: [{ type: 'PROVIDE_TOKEN', params: { variable: 'CIVITAI_TOKEN' } }] },
    });
  });

  test('private content with a wrong token is AUTH.REJECTED', async () => {
    await expect(client({ token: 'wrong-secret' }).resolve(request('500', 'checkpoints'))).rejects.toMatchObject({
      code: 'AUTH.REJECTED',
    });
  });

  test('private content with the right token resolves', async () => {
    const artifact = await client({ token: 'test-secret' }).resolve(request('500', 'checkpoints'));
    expect(artifact.files[0].url).toBe(storage.fileUrl('mp/501/private.safetensors'));
  });

  test('a version without files is malformed', async () => {
    await expect(client().resolve(request('600', 'checkpoints'))).rejects.toMatchObject({
      code: 'RESOLVE.MALFORMED_METADATA',
    });
  });

  test('invalid identifiers fail without a request', async () => {
    await expect(client().resolve(request('abc', 'checkpoints'))).rejects.toMatchObject({
      code: 'RESOLVE.INVALID_IDENTIFIER',
    });
    expect(marketplace.requests).toHaveLength(0);
  });

  test('an unreachable registry is RESOLVE.UPSTREAM_UNAVAILABLE', async () => {
    const gone = await startStorage();
    await gone.close();
    await expect(client({ baseUrl: gone.url }).resolve(request('100', 'checkpoints'))).rejects.toMatchObject({
      code: 'RESOLVE.UPSTREAM_UNAVAILABLE',
    });
  });

  test('an aborted run is RUN.BUDGET_EXCEEDED', async () => {
    const run = new AbortController();
    run.abort();
    await expect(client().resolve(request('100', 'checkpoints'), run.signal)).rejects.toMatchObject({
      code: 'RUN.BUDGET_EXCEEDED',
    });
  });

  describe('checkCredential', () => {
    test('valid token', async () => {
      expect(await client({ token: 'test-secret' }).checkCredential()).toEqual({
        registry: Registry.Marketplace,
        status: 'valid',
        statusCode: 200,
      });
    });

    test('rejected token', async () => {
      expect(await client({ token: 'wrong-secret' }).checkCredential()).toEqual({
        registry: Registry.Marketplace,
        status: 'invalid',
        statusCode: 401,
      });
    });

    test('no token makes no request', async () => {
      expect(await client().checkCredential()).toEqual({ registry: Registry.Marketplace, status: 'absent' });
      expect(marketplace.requests).toHaveLength(0);
    });
  });
});

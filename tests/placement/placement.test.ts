import { lstat, mkdir, mkdtemp, readFile, readdir, rm, writeFile } from 'fs/promises';
import { createHash } from 'crypto';
import os from 'os';
import path from 'path';
import { ResolvedArtifact, TransferResult } from '../../src/domain/artifact';
import { Registry } from '../../src/domain/request';
import { resetLogHandler, setLogHandler, LogEntry } from '../../src/logger';
import { finalPathFor, findExisting, verifyAndPlace } from '../../src/placement/placement';
import { sha256File, hashesMatch } from '../../src/placement/integrity';

const sha = (text: string) => createHash('sha256').update(text).digest('hex');

describe('integrity', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'integrity-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  test('sha256File streams the file', async () => {
    const file = path.join(dir, 'a.bin');
    await writeFile(file, 'hello');
    expect(await sha256File(file)).toBe('2cf24dba5fb0a30e26e83b2ac5b9e29e1b161e5c1fa7425e73043362938b9824');
  });

  test('hashes compare case-insensitively and ignore padding', () => {
    expect(hashesMatch(' 2CF24DBA5FB0A30E26E83B2AC5B9E29E1B161E5C1FA7425E73043362938B9824 ', sha('hello'))).toBe(true);
    expect(hashesMatch(sha('hello'), sha('world'))).toBe(false);
  });
});

describe('verifyAndPlace', () => {
  let root: string;
  let storageRoot: string;
  let stagingDir: string;
  let entries: LogEntry[];

  beforeEach(async () => {
    root = await mkdtemp(path.join(os.tmpdir(), 'placement-'));
    storageRoot = path.join(root, 'models');
    stagingDir = path.join(root, 'tmp', 'marketplace-42');
    await mkdir(stagingDir, { recursive: true });
    entries = [];
    setLogHandler((entry) => entries.push(entry));
  });

  afterEach(async () => {
    resetLogHandler();
    await rm(root, { recursive: true, force: true });
  });

  const fileArtifact = (expectedSha256?: string): ResolvedArtifact => ({
    request: { registry: Registry.Marketplace, identifier: '42', source: 'CIVITAI_CHECKPOINTS_TO_DOWNLOAD' },
    category: 'checkpoints',
    name: 'model.safetensors',
    layout: 'file',
    files: [{ url: 'https://storage.test/a', relativePath: 'model.safetensors', expectedSha256 }],
  });

  const staged = async (artifact: ResolvedArtifact, content: string): Promise<TransferResult> => {
    const stagingPath = path.join(stagingDir, artifact.name);
    await writeFile(stagingPath, content);
    return { artifact, stagingDir, stagingPath, bytesTransferred: content.length, verified: false };
  };

  test('places a verified file with one rename and removes staging', async () => {
    const result = await staged(fileArtifact(sha('weights').toUpperCase()), 'weights');

    const placed = await verifyAndPlace(result, storageRoot);

    expect(placed).toEqual({
      finalPath: path.join(storageRoot, 'checkpoints', 'model.safetensors'),
      sourceIdentifier: '42',
      category: 'checkpoints',
      verified: true,
      alreadyPresent: false,
    });
    expect(await readFile(placed.finalPath, 'utf8')).toBe('weights');
    await expect(lstat(stagingDir)).rejects.toMatchObject({ code: 'ENOENT' });
  });

  test('a hash mismatch deletes the staged file and places nothing', async () => {
    const result = await staged(fileArtifact(sha('expected')), 'tampered');

    await expect(verifyAndPlace(result, storageRoot)).rejects.toMatchObject({
      code: 'INTEGRITY.MISMATCH',
      typed: { details: { file: 'model.safetensors', expected: sha('expected'), actual: sha('tampered') } },
    });
    await expect(lstat(result.stagingPath)).rejects.toMatchObject({ code: 'ENOENT' });
    await expect(lstat(path.join(storageRoot, 'checkpoints', 'model.safetensors'))).rejects.toMatchObject({
      code: 'ENOENT',
    });
  });

  test('without an expected hash the file is placed unverified', async () => {
    const result = await staged(fileArtifact(), 'weights');

    const placed = await verifyAndPlace(result, storageRoot);

    expect(placed.verified).toBe(false);
    expect(entries.map((e) => e.message)).toContain('No checksum available; placing unverified');
  });

  test('an existing destination is reported as already present', async () => {
    await mkdir(path.join(storageRoot, 'checkpoints'), { recursive: true });
    await writeFile(path.join(storageRoot, 'checkpoints', 'model.safetensors'), 'original');
    const result = await staged(fileArtifact(sha('newer')), 'newer');

    const placed = await verifyAndPlace(result, storageRoot);

    expect(placed.alreadyPresent).toBe(true);
    expect(await readFile(placed.finalPath, 'utf8')).toBe('original');
    await expect(lstat(stagingDir)).rejects.toMatchObject({ code: 'ENOENT' });
  });

  test('a failed rename preserves the staging directory', async () => {
    // A regular file where the category directory should be.
    await mkdir(storageRoot, { recursive: true });
    await writeFile(path.join(storageRoot, 'checkpoints'), 'not a directory');
    const result = await staged(fileArtifact(sha('weights')), 'weights');

    await expect(verifyAndPlace(result, storageRoot)).rejects.toMatchObject({
      code: 'PLACEMENT.FAILED',
      typed: { details: { preservedAt: stagingDir } },
    });
    expect(await readdir(stagingDir)).toEqual(['model.safetensors']);
  });

  test('moves a snapshot directory as a whole', async () => {
    const artifact: ResolvedArtifact = {
      request: { registry: Registry.Hub, identifier: 'org/model-a', source: 'HF_REPOS_TO_DOWNLOAD' },
      category: 'hub_snapshot',
      name: 'org__model-a',
      layout: 'directory',
      files: [
        { url: 'https://hub.test/a', relativePath: 'config.json' },
        { url: 'https://hub.test/b', relativePath: 'unet/weights.bin', expectedSha256: sha('unet') },
      ],
    };
    const stagingPath = path.join(stagingDir, 'org__model-a');
    await mkdir(path.join(stagingPath, 'unet'), { recursive: true });
    await writeFile(path.join(stagingPath, 'config.json'), '{}');
    await writeFile(path.join(stagingPath, 'unet', 'weights.bin'), 'unet');

    const placed = await verifyAndPlace({ artifact, stagingDir, stagingPath, bytesTransferred: 6, verified: false }, storageRoot);

    expect(placed.finalPath).toBe(path.join(storageRoot, 'hub_snapshot', 'org__model-a'));
    expect(placed.verified).toBe(false);
    expect(await readFile(path.join(placed.finalPath, 'unet', 'weights.bin'), 'utf8')).toBe('unet');
  });

  test('findExisting', async () => {
    const artifact = fileArtifact();
    expect(await findExisting(artifact, storageRoot)).toBeNull();

    await mkdir(path.join(storageRoot, 'checkpoints'), { recursive: true });
    await writeFile(finalPathFor(artifact, storageRoot), 'x');
    expect(await findExisting(artifact, storageRoot)).toEqual({
      finalPath: path.join(storageRoot, 'checkpoints', 'model.safetensors'),
      sourceIdentifier: '42',
      category: 'checkpoints',
      verified: false,
      alreadyPresent: true,
    });
  });
});

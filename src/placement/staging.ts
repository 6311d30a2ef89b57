/**
 * Staging directories under the temp root.
 */

import { readdir, rm, rmdir } from 'fs/promises';
import path from 'path';
import { AcquisitionError, createTypedError } from '../domain/errors';
import { AcquisitionRequest } from '../domain/request';

/** Stable per-request staging directory, so a later run resumes the same files. */
export function stagingDirFor(request: AcquisitionRequest, tempRoot: string): string {
  const safe = request.identifier.replace(/[^A-Za-z0-9._-]+/g, '_');
  return path.join(tempRoot, `${request.registry}-${safe}`);
}

/**
 * The `code` of a filesystem error. Checked by shape: errors raised inside
 * Node's own context fail `instanceof Error` in a sandboxed realm.
 */
export function fsErrorCode(err: unknown): string | undefined {
  if (typeof err !== 'object' || err === null || !('code' in err)) return undefined;
  return typeof err.code === 'string' ? err.code : undefined;
}

export function isNotFound(err: unknown): boolean {
  return fsErrorCode(err) === 'ENOENT';
}

/** Join `relativePath` under `root`, refusing paths that escape it. */
export function resolveInside(root: string, relativePath: string, identifier: string): string {
  const base = path.resolve(root);
  const target = path.resolve(base, relativePath);
  if (target.startsWith(base + path.sep)) return target;
  throw new AcquisitionError(
    createTypedError({
      code: 'RESOLVE.MALFORMED_METADATA',
      message: `File path escapes the artifact root: ${relativePath}`,
      identifier,
      retryable: false,
    }),
  );
}

/** Remove a staging directory after its content was placed or discarded. */
export async function removeStaging(stagingDir: string): Promise<void> {
  await rm(stagingDir, { recursive: true, force: true });
}

/**
 * Remove empty directories below and including `root`. Directories holding
 * any file (partial downloads, preserved failures) are kept. Returns the
 * number of directories removed.
 */
export async function pruneEmptyDirs(root: string): Promise<number> {
  return (await prune(root)).removed;
}

async function prune(dir: string): Promise<{ removed: number; gone: boolean }> {
  let entries;
  try {
    entries = await readdir(dir, { withFileTypes: true });
  } catch (err) {
    const code = fsErrorCode(err);
    if (code === 'ENOENT' || code === 'ENOTDIR') {
      return { removed: 0, gone: false };
    }
    throw err;
  }

  let removed = 0;
  let remaining = entries.length;
  for (const entry of entries) {
    if (!entry.isDirectory()) continue;
    const child = await prune(path.join(dir, entry.name));
    removed += child.removed;
    if (child.gone) remaining--;
  }

  if (remaining > 0) return { removed, gone: false };
  await rmdir(dir);
  return { removed: removed + 1, gone: true };
}

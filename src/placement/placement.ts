/**
 * Integrity & placement.
 *
 * Staged bytes become visible in the storage root through exactly one
 * rename per artifact: a single file for marketplace artifacts, a whole
 * directory for hub snapshots. A reader listing a category directory sees
 * either nothing or the complete, verified entry.
 */

import { lstat, mkdir, rename, rm } from 'fs/promises';
import path from 'path';
import { PlacedFile, ResolvedArtifact, TransferResult } from '../domain/artifact';
import { AcquisitionError, integrityMismatchError, placementFailedError } from '../domain/errors';
import { Logger, logger as rootLogger } from '../logger';
import { hashesMatch, normalizeHash, sha256File } from './integrity';
import { isNotFound, removeStaging, resolveInside } from './staging';

/** Final location of an artifact. */
export function finalPathFor(artifact: ResolvedArtifact, storageRoot: string): string {
  return path.join(storageRoot, artifact.category, artifact.name);
}

/**
 * The artifact's final entry, if it already exists. Entries in the storage
 * root were verified when placed and are not hashed again.
 */
export async function findExisting(artifact: ResolvedArtifact, storageRoot: string): Promise<PlacedFile | null> {
  const finalPath = finalPathFor(artifact, storageRoot);
  if (!(await pathExists(finalPath))) return null;
  return {
    finalPath,
    sourceIdentifier: artifact.request.identifier,
    category: artifact.category,
    verified: false,
    alreadyPresent: true,
  };
}

/**
 * Verify every staged file that has an expected hash, then move the staged
 * entry into its category directory.
 *
 * - Hash mismatch: the bad file is deleted, nothing is placed (INTEGRITY.MISMATCH).
 * - No expected hash: placed, logged as unverified.
 * - Rename failure: the staging directory is kept for inspection (PLACEMENT.FAILED).
 */
export async function verifyAndPlace(
  result: TransferResult,
  storageRoot: string,
  log: Logger = rootLogger,
): Promise<PlacedFile> {
  const { artifact } = result;
  const identifier = artifact.request.identifier;
  const unverified: string[] = [];

  for (const file of artifact.files) {
    const staged =
      artifact.layout === 'file' ? result.stagingPath : resolveInside(result.stagingPath, file.relativePath, identifier);
    if (!file.expectedSha256) {
      unverified.push(file.relativePath);
      continue;
    }
    const actual = await sha256File(staged);
    if (!hashesMatch(file.expectedSha256, actual)) {
      await rm(staged, { force: true });
      log.error('Checksum verification failed; staged file discarded', {
        identifier,
        file: file.relativePath,
        expected: normalizeHash(file.expectedSha256),
        actual,
      });
      throw new AcquisitionError(integrityMismatchError(identifier, file.relativePath, normalizeHash(file.expectedSha256), actual));
    }
    log.debug('Checksum OK', { identifier, file: file.relativePath });
  }

  const verified = unverified.length === 0;
  if (!verified) {
    log.warn('No checksum available; placing unverified', { identifier, files: unverified });
  }

  const finalPath = finalPathFor(artifact, storageRoot);
  try {
    await mkdir(path.dirname(finalPath), { recursive: true });
    if (await pathExists(finalPath)) {
      await removeStaging(result.stagingDir);
      log.info('Destination already present; staged copy discarded', { identifier, finalPath });
      return { finalPath, sourceIdentifier: identifier, category: artifact.category, verified, alreadyPresent: true };
    }
    await rename(result.stagingPath, finalPath);
  } catch (err) {
    const cause = err instanceof Error ? err.message : String(err);
    log.error('Placement failed; staging preserved', { identifier, stagingDir: result.stagingDir, error: cause });
    throw new AcquisitionError(placementFailedError(identifier, result.stagingDir, cause), { cause: err });
  }

  await removeStaging(result.stagingDir);
  return { finalPath, sourceIdentifier: identifier, category: artifact.category, verified, alreadyPresent: false };
}

async function pathExists(target: string): Promise<boolean> {
  try {
    await lstat(target);
    return true;
  } catch (err) {
    if (isNotFound(err)) return false;
    throw err;
  }
}

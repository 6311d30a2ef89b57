/**
 * Artifact lifecycle types: resolved → transferred → placed.
 */

import { AcquisitionRequest, Category } from './request';

/**
 * Credential scope for a file. The token is only ever sent to `host`
 * (hostname and port); any other authority, such as a presigned storage
 * host reached through a redirect, gets the request without it.
 */
export interface AuthScope {
  token: string;
  host: string;
}

/** One concrete file to download. */
export interface ResolvedFile {
  url: string;
  /** Path relative to the artifact root; a plain filename for single-file artifacts. */
  relativePath: string;
  /** Lower-case hex SHA-256, when the registry supplies one. */
  expectedSha256?: string;
  /** Size hint in bytes; never used as proof of integrity. */
  expectedSize?: number;
  auth?: AuthScope;
}

/** Output of a registry client. */
export interface ResolvedArtifact {
  request: AcquisitionRequest;
  category: Category;
  /** Entry name inside the category directory. */
  name: string;
  /** 'file': one file placed as `name`; 'directory': a snapshot placed as directory `name`. */
  layout: 'file' | 'directory';
  files: ResolvedFile[];
}

/** Output of the transfer engine. Staged data is never under a final name. */
export interface TransferResult {
  artifact: ResolvedArtifact;
  /** Staging directory owned by this transfer. */
  stagingDir: string;
  /** Staged file (file layout) or staged snapshot root (directory layout). */
  stagingPath: string;
  bytesTransferred: number;
  /** Set once every file with an expected hash has been checked. */
  verified: boolean;
}

/** A completed artifact in its category directory. */
export interface PlacedFile {
  finalPath: string;
  sourceIdentifier: string;
  category: Category;
  /** False when the registry supplied no hash for at least one file. */
  verified: boolean;
  /** True when the entry already existed and nothing was transferred. */
  alreadyPresent: boolean;
}

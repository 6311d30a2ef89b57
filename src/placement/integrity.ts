/**
 * SHA-256 verification of staged files.
 */

import { createHash } from 'crypto';
import { createReadStream } from 'fs';

/** Stream a file through SHA-256; lower-case hex digest. */
export async function sha256File(filePath: string): Promise<string> {
  const hash = createHash('sha256');
  for await (const chunk of createReadStream(filePath)) {
    hash.update(chunk);
  }
  return hash.digest('hex');
}

/** Registry hashes arrive in either case and sometimes padded. */
export function normalizeHash(hash: string): string {
  return hash.trim().toLowerCase();
}

export function hashesMatch(expected: string, actual: string): boolean {
  return normalizeHash(expected) === normalizeHash(actual);
}

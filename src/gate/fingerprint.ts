/**
 * Configuration fingerprint.
 *
 * Hashes the raw identifier lists exactly as configured: every known source
 * contributes a `KEY=value` line (unset counts as empty), lines sorted by
 * key. Any edit to any list, including reordering or whitespace, produces a
 * new fingerprint and therefore a new run.
 */

import { createHash } from 'crypto';
import { SOURCE_DEFINITIONS, SourceValues } from '../parser/sources';

export function fingerprintInput(sources: SourceValues): string {
  return SOURCE_DEFINITIONS.map((def) => def.variable)
    .sort()
    .map((variable) => `${variable}=${sources[variable] ?? ''}`)
    .join('\n');
}

/** SHA-256 hex of the canonical source listing. */
export function computeFingerprint(sources: SourceValues): string {
  return createHash('sha256').update(fingerprintInput(sources), 'utf8').digest('hex');
}

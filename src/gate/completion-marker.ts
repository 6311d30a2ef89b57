/**
 * Completion marker: a small key=value file in the storage root recording the
 * fingerprint of the last fully successful run.
 *
 *   fingerprint=<hex>
 *   timestamp=<ISO-8601>
 *   runId=<run_…>
 */

import { readFile, rename, rm, writeFile } from 'fs/promises';
import { Logger, logger as rootLogger } from '../logger';
import { isNotFound } from '../placement/staging';

export interface CompletionMarker {
  fingerprint: string;
  timestamp: string;
  runId: string;
}

const FINGERPRINT = /^[0-9a-f]{64}$/;

/** Parse marker text; null when any field is missing or malformed. */
export function parseMarker(text: string): CompletionMarker | null {
  const fields = new Map<string, string>();
  for (const line of text.split(/\r?\n/)) {
    const eq = line.indexOf('=');
    if (eq <= 0) continue;
    fields.set(line.slice(0, eq).trim(), line.slice(eq + 1).trim());
  }
  const fingerprint = fields.get('fingerprint');
  const timestamp = fields.get('timestamp');
  const runId = fields.get('runId');
  if (!fingerprint || !FINGERPRINT.test(fingerprint) || !timestamp || !runId) return null;
  return { fingerprint, timestamp, runId };
}

export function formatMarker(marker: CompletionMarker): string {
  return `fingerprint=${marker.fingerprint}\ntimestamp=${marker.timestamp}\nrunId=${marker.runId}\n`;
}

export class CompletionMarkerStore {
  private readonly log: Logger;

  constructor(readonly filePath: string, logger: Logger = rootLogger) {
    this.log = logger.child({ component: 'marker' });
  }

  /** The stored marker, or null when absent or unreadable as a marker. */
  async read(): Promise<CompletionMarker | null> {
    let text: string;
    try {
      text = await readFile(this.filePath, 'utf8');
    } catch (err) {
      if (isNotFound(err)) return null;
      throw err;
    }
    const marker = parseMarker(text);
    if (!marker) {
      this.log.warn('Ignoring unparseable completion marker', { path: this.filePath });
    }
    return marker;
  }

  /** Replace the marker through a temporary file and a rename. */
  async write(marker: CompletionMarker): Promise<void> {
    const tmp = `${this.filePath}.tmp-${process.pid}`;
    await writeFile(tmp, formatMarker(marker), 'utf8');
    await rename(tmp, this.filePath);
    this.log.debug('Completion marker written', { path: this.filePath, runId: marker.runId });
  }

  /** Remove the marker; returns whether one existed. */
  async clear(): Promise<boolean> {
    try {
      await rm(this.filePath);
      return true;
    } catch (err) {
      if (isNotFound(err)) return false;
      throw err;
    }
  }
}

/**
 * Transfer engine: moves bytes from a resolved URL into a staging directory.
 *
 * Staging layout for one artifact (directory stable across restarts so a later
 * run resumes where this one stopped):
 *
 *   {tempRoot}/{registry}-{identifier}/{name}            complete file (file layout)
 *   {tempRoot}/{registry}-{identifier}/{name}/{path}     complete files (directory layout)
 *   ...{file}.part                                       single-stream download in progress
 *   ...{file}.seg{n}                                     range segment in progress
 *
 * A file only gets its plain name once every byte is on disk. Nothing here
 * writes into the storage root.
 */

import { open, mkdir, rename, rm, stat } from 'fs/promises';
import { createReadStream, createWriteStream } from 'fs';
import path from 'path';
import { pipeline } from 'stream/promises';
import { RetryConfig, TransferConfig } from '../config/acquisition-config';
import { ResolvedArtifact, ResolvedFile, TransferResult } from '../domain/artifact';
import {
  AcquisitionError,
  createTypedError,
  transferHttpError,
  transferNetworkError,
} from '../domain/errors';
import { mapWithConcurrency } from '../engine/concurrency';
import { ScopedHttpClient, discardBody } from '../http/scoped-client';
import { Logger, logger as rootLogger } from '../logger';
import { isNotFound, resolveInside, stagingDirFor } from '../placement/staging';
import { withRetry } from './retry-policy';
import { planSegments, ByteRange } from './segments';

export interface TransferEngineOptions {
  http: ScopedHttpClient;
  retry: RetryConfig;
  transfer: TransferConfig;
  /** Run budget, reported when the run signal aborts a transfer. */
  budgetMs?: number;
  logger?: Logger;
  random?: () => number;
}

/** What the range probe learned about a URL. */
interface ProbeResult {
  /** URL after redirects; later range requests go straight there. */
  url: string;
  totalBytes?: number;
  acceptsRanges: boolean;
  /** Body of a 200 answer, when the server ignored the range. */
  fullResponse?: Response;
}

const CONTENT_RANGE = /^bytes\s+(\d+)-(\d+)\/(\d+|\*)$/i;

export class TransferEngine {
  private readonly log: Logger;

  constructor(private readonly options: TransferEngineOptions) {
    this.log = (options.logger ?? rootLogger).child({ component: 'transfer' });
  }

  /** Download every file of `artifact` into its staging directory. */
  async fetch(artifact: ResolvedArtifact, tempRoot: string, signal?: AbortSignal): Promise<TransferResult> {
    const stagingDir = stagingDirFor(artifact.request, tempRoot);
    const stagingPath = path.join(stagingDir, artifact.name);
    await mkdir(stagingDir, { recursive: true });

    const identifier = artifact.request.identifier;
    const counts = await mapWithConcurrency(
      artifact.files,
      artifact.layout === 'file' ? 1 : this.options.transfer.maxConcurrentFiles,
      (file) => {
        const destination =
          artifact.layout === 'file' ? stagingPath : resolveInside(stagingPath, file.relativePath, identifier);
        return this.fetchFile(identifier, file, destination, signal);
      },
    );

    const bytesTransferred = counts.reduce((sum, n) => sum + n, 0);
    this.log.debug('Artifact staged', { identifier, stagingPath, bytesTransferred, files: artifact.files.length });
    return { artifact, stagingDir, stagingPath, bytesTransferred, verified: false };
  }

  /** Fetch one file to `destination`; returns bytes written by this call. */
  async fetchFile(identifier: string, file: ResolvedFile, destination: string, signal?: AbortSignal): Promise<number> {
    await mkdir(path.dirname(destination), { recursive: true });

    const existing = await sizeOf(destination);
    if (existing !== undefined) {
      if (file.expectedSize === undefined || existing === file.expectedSize) {
        this.log.info('Staged file already complete, skipping download', { identifier, file: file.relativePath });
        return 0;
      }
      this.log.warn('Staged file has unexpected size, downloading again', {
        identifier,
        file: file.relativePath,
        size: existing,
        expectedSize: file.expectedSize,
      });
      await rm(destination, { force: true });
    }

    return withRetry(
      this.options.retry,
      { identifier, signal, budgetMs: this.options.budgetMs, logger: this.log, random: this.options.random },
      (attemptSignal) => this.attempt(identifier, file, destination, attemptSignal),
    );
  }

  private async attempt(identifier: string, file: ResolvedFile, destination: string, signal: AbortSignal): Promise<number> {
    try {
      const probe = await this.probe(identifier, file, signal);
      if (probe.fullResponse) {
        return await this.writeFullResponse(identifier, file, probe.fullResponse, probe.totalBytes, destination);
      }

      const total = probe.totalBytes;
      const segments = this.options.transfer.segmentsPerFile;
      if (
        probe.acceptsRanges &&
        total !== undefined &&
        segments > 1 &&
        total >= this.options.transfer.minSegmentBytes
      ) {
        return await this.fetchSegmented(identifier, file, probe.url, total, destination, signal);
      }
      return await this.fetchSingle(identifier, file, probe.url, total, destination, signal);
    } catch (err) {
      if (err instanceof AcquisitionError) throw err;
      throw new AcquisitionError(
        transferNetworkError(identifier, file.url, err instanceof Error ? err.message : String(err)),
        { cause: err },
      );
    }
  }

  /**
   * One-byte range request. A 206 tells us the total size and that ranges
   * work; a 200 means the server ignores ranges and its body is the file.
   */
  private async probe(identifier: string, file: ResolvedFile, signal: AbortSignal): Promise<ProbeResult> {
    const { response, finalUrl } = await this.options.http.request(file.url, {
      auth: file.auth,
      headers: { Range: 'bytes=0-0' },
      signal,
    });

    if (response.status === 206) {
      const total = parseContentRangeTotal(response.headers.get('content-range'));
      await discardBody(response);
      return { url: finalUrl, totalBytes: total, acceptsRanges: total !== undefined };
    }
    if (response.status === 200) {
      const length = Number(response.headers.get('content-length'));
      return {
        url: finalUrl,
        totalBytes: Number.isFinite(length) && length > 0 ? length : undefined,
        acceptsRanges: false,
        fullResponse: response,
      };
    }
    await discardBody(response);
    throw new AcquisitionError(transferHttpError(identifier, file.url, response.status));
  }

  private async writeFullResponse(
    identifier: string,
    file: ResolvedFile,
    response: Response,
    total: number | undefined,
    destination: string,
  ): Promise<number> {
    const part = `${destination}.part`;
    await rm(part, { force: true });
    const written = await appendBody(response, part);
    if (total !== undefined && written !== total) {
      throw new AcquisitionError(shortTransferError(identifier, file.relativePath, written, total));
    }
    await rename(part, destination);
    return written;
  }

  /** Single stream, resuming an existing .part with an open-ended range. */
  private async fetchSingle(
    identifier: string,
    file: ResolvedFile,
    url: string,
    total: number | undefined,
    destination: string,
    signal: AbortSignal,
  ): Promise<number> {
    const part = `${destination}.part`;
    let offset = (await sizeOf(part)) ?? 0;
    if (total !== undefined && offset > total) {
      await rm(part, { force: true });
      offset = 0;
    }

    let written = 0;
    if (total === undefined || offset < total) {
      const { response } = await this.options.http.request(url, {
        auth: file.auth,
        headers: offset > 0 ? { Range: `bytes=${offset}-` } : {},
        signal,
      });
      if (response.status === 200 && offset > 0) {
        // Range ignored: start the file over.
        await rm(part, { force: true });
        offset = 0;
      } else if (response.status !== 200 && response.status !== 206) {
        await discardBody(response);
        throw new AcquisitionError(transferHttpError(identifier, url, response.status));
      }
      if (offset > 0) {
        this.log.info('Resuming partial download', { identifier, file: file.relativePath, offset });
      }
      written = await appendBody(response, part);
    }

    const size = (await sizeOf(part)) ?? 0;
    if (total !== undefined && size !== total) {
      throw new AcquisitionError(shortTransferError(identifier, file.relativePath, size, total));
    }
    await rename(part, destination);
    return written;
  }

  /** Parallel byte ranges, each resumable on its own, joined when all are complete. */
  private async fetchSegmented(
    identifier: string,
    file: ResolvedFile,
    url: string,
    total: number,
    destination: string,
    signal: AbortSignal,
  ): Promise<number> {
    const ranges = planSegments(total, this.options.transfer.segmentsPerFile);
    const controller = new AbortController();
    const onAbort = () => controller.abort(signal.reason);
    signal.addEventListener('abort', onAbort, { once: true });

    let counts: number[];
    try {
      const settled = await Promise.allSettled(
        ranges.map((range, index) =>
          this.fetchSegment(identifier, file, url, range, `${destination}.seg${index}`, controller.signal).catch(
            (err: unknown) => {
              // One failed segment stops its siblings; completed bytes stay for the next attempt.
              controller.abort(err);
              throw err;
            },
          ),
        ),
      );
      const failure = settled.find((s): s is PromiseRejectedResult => s.status === 'rejected');
      if (failure) throw failure.reason;
      counts = settled.map((s) => (s.status === 'fulfilled' ? s.value : 0));
    } finally {
      signal.removeEventListener('abort', onAbort);
    }

    const part = `${destination}.part`;
    await rm(part, { force: true });
    for (let index = 0; index < ranges.length; index++) {
      await pipeline(createReadStream(`${destination}.seg${index}`), createWriteStream(part, { flags: 'a' }));
    }
    const size = (await sizeOf(part)) ?? 0;
    if (size !== total) {
      await rm(part, { force: true });
      throw new AcquisitionError(shortTransferError(identifier, file.relativePath, size, total));
    }
    await rename(part, destination);
    await Promise.all(ranges.map((_, index) => rm(`${destination}.seg${index}`, { force: true })));

    this.log.debug('Segments joined', { identifier, file: file.relativePath, segments: ranges.length, total });
    return counts.reduce((sum, n) => sum + n, 0);
  }

  private async fetchSegment(
    identifier: string,
    file: ResolvedFile,
    url: string,
    range: ByteRange,
    segmentPath: string,
    signal: AbortSignal,
  ): Promise<number> {
    const length = range.end - range.start + 1;
    let have = (await sizeOf(segmentPath)) ?? 0;
    if (have > length) {
      await rm(segmentPath, { force: true });
      have = 0;
    }
    if (have === length) return 0;

    const { response } = await this.options.http.request(url, {
      auth: file.auth,
      headers: { Range: `bytes=${range.start + have}-${range.end}` },
      signal,
    });
    if (response.status !== 206) {
      await discardBody(response);
      if (response.status === 200) {
        throw new AcquisitionError(
          createTypedError({
            code: 'TRANSFER.TRANSIENT',
            message: `Server ignored a byte range for ${file.relativePath}`,
            identifier,
            retryable: true,
          }),
        );
      }
      throw new AcquisitionError(transferHttpError(identifier, url, response.status));
    }

    const written = await appendBody(response, segmentPath);
    const size = (await sizeOf(segmentPath)) ?? 0;
    if (size !== length) {
      throw new AcquisitionError(shortTransferError(identifier, file.relativePath, size, length));
    }
    return written;
  }
}

/** Append a response body to a file; returns bytes written. */
async function appendBody(response: Response, filePath: string): Promise<number> {
  if (!response.body) return 0;
  const handle = await open(filePath, 'a');
  const reader = response.body.getReader();
  let written = 0;
  try {
    for (;;) {
      const { done, value } = await reader.read();
      if (done) break;
      await handle.write(value);
      written += value.byteLength;
    }
  } finally {
    reader.releaseLock();
    await handle.close();
  }
  return written;
}

export function parseContentRangeTotal(header: string | null): number | undefined {
  if (!header) return undefined;
  const match = CONTENT_RANGE.exec(header.trim());
  if (!match || match[3] === '*') return undefined;
  return Number(match[3]);
}

async function sizeOf(filePath: string): Promise<number | undefined> {
  try {
    const info = await stat(filePath);
    return info.isFile() ? info.size : undefined;
  } catch (err) {
    if (isNotFound(err)) return undefined;
    throw err;
  }
}

function shortTransferError(identifier: string, file: string, size: number, expected: number) {
  return createTypedError({
    code: 'TRANSFER.TRANSIENT',
    message: `Incomplete transfer of ${file}: ${size} of ${expected} bytes`,
    identifier,
    retryable: true,
    details: { size, expected },
  });
}

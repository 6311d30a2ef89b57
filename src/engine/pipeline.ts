/**
 * Acquisition pipeline orchestrator.
 *
 * Gate on the completion marker, then resolve → transfer → verify & place
 * every request under one run deadline. Per-item failures are recorded on
 * the item and never stop the run; only setup preconditions throw.
 */

import { v4 as uuid } from 'uuid';
import { constants } from 'fs';
import { access, mkdir } from 'fs/promises';
import path from 'path';
import { AcquisitionConfig } from '../config/acquisition-config';
import {
  AcquisitionError,
  TypedError,
  budgetExceededError,
  storageUnavailableError,
  toTypedError,
} from '../domain/errors';
import { AcquisitionRequest, Registry, requestKey } from '../domain/request';
import { ItemOutcome, ItemStatus, RunCounters, RunReport, RunStatus } from '../domain/run';
import { CompletionMarkerStore } from '../gate/completion-marker';
import { computeFingerprint } from '../gate/fingerprint';
import { ScopedHttpClient } from '../http/scoped-client';
import { Logger, logger as rootLogger, registerSecret } from '../logger';
import { parseWorkList } from '../parser/identifier-parser';
import { findExisting, verifyAndPlace } from '../placement/placement';
import { pruneEmptyDirs } from '../placement/staging';
import { HubClient } from '../registry/hub-client';
import { MarketplaceClient } from '../registry/marketplace-client';
import { RegistryClient } from '../registry/registry-client';
import { TransferEngine } from '../transfer/transfer-engine';
import { KeyedSerialQueue, mapWithConcurrency } from './concurrency';
import { RunDeadline } from './deadline';
import { transitionItemStatus, transitionRunStatus } from './state-machine';

/** Collaborators; every one defaults to the production implementation. */
export interface PipelineDependencies {
  http?: ScopedHttpClient;
  clients?: Partial<Record<Registry, RegistryClient>>;
  logger?: Logger;
  /** Jitter source for retry backoff. */
  random?: () => number;
  now?: () => number;
}

export class AcquisitionPipeline {
  private readonly http: ScopedHttpClient;
  private readonly clients: Record<Registry, RegistryClient>;
  private readonly baseLog: Logger;
  private readonly now: () => number;
  private readonly queue = new KeyedSerialQueue();

  constructor(private readonly config: AcquisitionConfig, private readonly deps: PipelineDependencies = {}) {
    this.http = deps.http ?? new ScopedHttpClient();
    this.baseLog = (deps.logger ?? rootLogger).child({ component: 'pipeline' });
    this.now = deps.now ?? Date.now;
    this.clients = {
      [Registry.Marketplace]:
        deps.clients?.[Registry.Marketplace] ??
        new MarketplaceClient({
          http: this.http,
          baseUrl: config.endpoints.marketplaceBaseUrl,
          token: config.credentials.marketplaceToken,
          unknownTypePolicy: config.unknownTypePolicy,
          budgetMs: config.budgetMs,
          logger: deps.logger,
        }),
      [Registry.Hub]:
        deps.clients?.[Registry.Hub] ??
        new HubClient({
          http: this.http,
          baseUrl: config.endpoints.hubBaseUrl,
          token: config.credentials.hubToken,
          budgetMs: config.budgetMs,
          logger: deps.logger,
        }),
    };
  }

  async run(): Promise<RunReport> {
    const runId = `run_${uuid()}`;
    const log = this.baseLog.child({ runId });
    const startedMs = this.now();
    const startedAt = new Date(startedMs).toISOString();
    let status = RunStatus.Idle;
    const advance = (target: RunStatus): void => {
      const result = transitionRunStatus(runId, status, target);
      if (!result.success) throw new AcquisitionError(result.error);
      status = result.newStatus;
    };

    registerSecret(this.config.credentials.marketplaceToken);
    registerSecret(this.config.credentials.hubToken);
    await this.ensureWritable(this.config.storageRoot);
    await this.ensureWritable(this.config.tempRoot);

    const fingerprint = computeFingerprint(this.config.sources);
    const marker = new CompletionMarkerStore(path.join(this.config.storageRoot, this.config.markerFileName), log);
    const requests = parseWorkList(this.config.sources);

    const finish = (
      outcomes: ItemOutcome[],
      markerAction: RunReport['marker'],
      error?: TypedError,
    ): RunReport => {
      const completedMs = this.now();
      return {
        runId,
        status,
        fingerprint,
        startedAt,
        completedAt: new Date(completedMs).toISOString(),
        durationMs: completedMs - startedMs,
        outcomes,
        counters: countOutcomes(outcomes),
        marker: markerAction,
        error,
      };
    };

    const previous = await marker.read();
    if (previous && previous.fingerprint === fingerprint) {
      advance(RunStatus.Gated);
      advance(RunStatus.AlreadySatisfied);
      log.info('Configuration unchanged since last successful run; nothing to do', {
        fingerprint,
        previousRunId: previous.runId,
        completedAt: previous.timestamp,
      });
      return finish([], 'untouched');
    }

    if (requests.length === 0) {
      advance(RunStatus.NoWork);
      await marker.write({ fingerprint, timestamp: new Date(this.now()).toISOString(), runId });
      log.info('No identifiers configured; nothing to download', { fingerprint });
      return finish([], 'written');
    }

    advance(RunStatus.Running);
    log.info('Acquisition started', {
      fingerprint,
      requests: requests.length,
      budgetMs: this.config.budgetMs,
      concurrency: this.config.maxConcurrentRequests,
    });

    const deadline = new RunDeadline(this.config.budgetMs, this.now);
    const engine = new TransferEngine({
      http: this.http,
      retry: this.config.retry,
      transfer: this.config.transfer,
      budgetMs: this.config.budgetMs,
      logger: log,
      random: this.deps.random,
    });

    let outcomes: ItemOutcome[];
    try {
      if (this.config.validateTokens) {
        await this.checkCredentials(requests, deadline.signal, log);
      }
      outcomes = await mapWithConcurrency(requests, this.config.maxConcurrentRequests, (request) =>
        this.queue.run(requestKey(request), () => this.processItem(request, engine, deadline, log)),
      );
    } finally {
      deadline.dispose();
    }

    const counters = countOutcomes(outcomes);
    let markerAction: RunReport['marker'];
    let error: TypedError | undefined;
    if (counters.abandoned > 0) {
      advance(RunStatus.TimedOut);
      markerAction = 'untouched';
      error = budgetExceededError(this.config.budgetMs);
    } else if (counters.failed === 0) {
      advance(RunStatus.Succeeded);
      await marker.write({ fingerprint, timestamp: new Date(this.now()).toISOString(), runId });
      markerAction = 'written';
    } else {
      advance(counters.succeeded > 0 ? RunStatus.PartialFailure : RunStatus.Failed);
      await marker.clear();
      markerAction = 'cleared';
    }

    const removed = await pruneEmptyDirs(this.config.tempRoot);
    if (removed > 0) log.debug('Removed empty staging directories', { removed });

    const report = finish(outcomes, markerAction, error);
    const summary = {
      status: report.status,
      ...report.counters,
      marker: report.marker,
      durationMs: report.durationMs,
    };
    if (report.status === RunStatus.Succeeded) {
      log.info('Acquisition finished', summary);
    } else {
      log.warn('Acquisition finished with problems', summary);
    }
    return report;
  }

  /** One request end to end. Never throws. */
  private async processItem(
    request: AcquisitionRequest,
    engine: TransferEngine,
    deadline: RunDeadline,
    runLog: Logger,
  ): Promise<ItemOutcome> {
    const identifier = request.identifier;
    const log = runLog.child({ identifier, registry: request.registry });
    const started = this.now();
    let itemStatus = ItemStatus.Pending;
    const move = (target: ItemStatus): ItemStatus => {
      const result = transitionItemStatus(identifier, itemStatus, target);
      if (!result.success) throw new AcquisitionError(result.error);
      itemStatus = result.newStatus;
      return itemStatus;
    };

    if (deadline.expired) {
      log.warn('Not started before the run budget ran out', { source: request.source });
      return {
        request,
        status: move(ItemStatus.Abandoned),
        error: budgetExceededError(this.config.budgetMs, identifier),
        bytesTransferred: 0,
      };
    }

    move(ItemStatus.Running);
    try {
      const artifact = await this.clients[request.registry].resolve(request, deadline.signal);
      const existing = await findExisting(artifact, this.config.storageRoot);
      if (existing) {
        log.info('Already present, skipping', { finalPath: existing.finalPath });
        return {
          request,
          status: move(ItemStatus.Succeeded),
          placed: existing,
          bytesTransferred: 0,
          durationMs: this.now() - started,
        };
      }

      const transferred = await engine.fetch(artifact, this.config.tempRoot, deadline.signal);
      const placed = await verifyAndPlace(transferred, this.config.storageRoot, log);
      log.info('Downloaded', {
        finalPath: placed.finalPath,
        category: placed.category,
        verified: placed.verified,
        bytes: transferred.bytesTransferred,
      });
      return {
        request,
        status: move(ItemStatus.Succeeded),
        placed,
        bytesTransferred: transferred.bytesTransferred,
        durationMs: this.now() - started,
      };
    } catch (err) {
      const typed = toTypedError(err, identifier);
      const abandoned = isAbandonment(err, typed, deadline.expired);
      const fix = typed.suggestedFixes[0]?.description;
      log.error(abandoned ? 'Abandoned at run deadline' : 'Failed', {
        code: typed.code,
        error: typed.message,
        ...(fix ? { hint: fix } : {}),
      });
      return {
        request,
        status: move(abandoned ? ItemStatus.Abandoned : ItemStatus.Failed),
        error: typed,
        bytesTransferred: 0,
        durationMs: this.now() - started,
      };
    }
  }

  /** Probe each configured credential once; outcomes are only logged. */
  private async checkCredentials(requests: AcquisitionRequest[], signal: AbortSignal, log: Logger): Promise<void> {
    const registries = new Set(requests.map((r) => r.registry));
    for (const registry of registries) {
      const check = await this.clients[registry].checkCredential(signal);
      if (check.status === 'valid') {
        log.info('Credential accepted', { registry });
      } else if (check.status === 'invalid') {
        log.warn('Credential rejected; private or gated content will fail', { registry, statusCode: check.statusCode });
      } else if (check.status === 'unreachable') {
        log.warn('Could not check credential', { registry, statusCode: check.statusCode });
      }
    }
  }

  private async ensureWritable(dir: string): Promise<void> {
    try {
      await mkdir(dir, { recursive: true });
      await access(dir, constants.W_OK);
    } catch (err) {
      const cause = err instanceof Error ? err.message : String(err);
      throw new AcquisitionError(storageUnavailableError(dir, cause), { cause: err });
    }
  }
}

/**
 * Whether a failed item was cut off by the run deadline. A typed failure
 * keeps its own classification even when the deadline has since passed;
 * only untyped errors fall back to the deadline state.
 */
export function isAbandonment(err: unknown, typed: TypedError, deadlineExpired: boolean): boolean {
  if (typed.code === 'RUN.BUDGET_EXCEEDED') return true;
  if (err instanceof AcquisitionError) return false;
  return deadlineExpired;
}

/** Run the pipeline once with the given configuration. */
export function runPipeline(config: AcquisitionConfig, deps?: PipelineDependencies): Promise<RunReport> {
  return new AcquisitionPipeline(config, deps).run();
}

export function countOutcomes(outcomes: readonly ItemOutcome[]): RunCounters {
  const counters: RunCounters = { total: outcomes.length, succeeded: 0, failed: 0, abandoned: 0, alreadyPresent: 0, unverified: 0 };
  for (const outcome of outcomes) {
    if (outcome.status === ItemStatus.Succeeded) counters.succeeded++;
    else if (outcome.status === ItemStatus.Failed) counters.failed++;
    else if (outcome.status === ItemStatus.Abandoned) counters.abandoned++;
    if (outcome.placed?.alreadyPresent) counters.alreadyPresent++;
    else if (outcome.placed && !outcome.placed.verified) counters.unverified++;
  }
  return counters;
}

/** Process exit code for a finished run. */
export function exitCodeForStatus(status: RunStatus): number {
  switch (status) {
    case RunStatus.Succeeded:
    case RunStatus.AlreadySatisfied:
    case RunStatus.NoWork:
      return 0;
    case RunStatus.PartialFailure:
      return 2;
    case RunStatus.Failed:
      return 3;
    case RunStatus.TimedOut:
      return 124;
    default:
      return 1;
  }
}

/**
 * Run domain model.
 *
 * One invocation of the acquisition pipeline: the gate decision, per-item
 * outcomes and the aggregate status the caller maps to an exit code.
 */

import { PlacedFile } from './artifact';
import { TypedError } from './errors';
import { AcquisitionRequest } from './request';

/** Pipeline run lifecycle states. */
export enum RunStatus {
  Idle = 'idle',
  Gated = 'gated',
  Running = 'running',
  /** Completion marker matched; nothing was done. */
  AlreadySatisfied = 'already-satisfied',
  /** Empty work list. */
  NoWork = 'no-work',
  Succeeded = 'succeeded',
  PartialFailure = 'partial-failure',
  /** Every item failed. */
  Failed = 'failed',
  TimedOut = 'timed-out',
}

/** Per-item states. */
export enum ItemStatus {
  Pending = 'pending',
  Running = 'running',
  Succeeded = 'succeeded',
  Failed = 'failed',
  /** Cut off by the run deadline. */
  Abandoned = 'abandoned',
}

/** Valid state transitions for runs. */
export const VALID_RUN_TRANSITIONS: Record<RunStatus, RunStatus[]> = {
  [RunStatus.Idle]: [RunStatus.Gated, RunStatus.Running, RunStatus.NoWork],
  [RunStatus.Gated]: [RunStatus.AlreadySatisfied],
  [RunStatus.Running]: [RunStatus.Succeeded, RunStatus.PartialFailure, RunStatus.Failed, RunStatus.TimedOut],
  [RunStatus.AlreadySatisfied]: [],
  [RunStatus.NoWork]: [],
  [RunStatus.Succeeded]: [],
  [RunStatus.PartialFailure]: [],
  [RunStatus.Failed]: [],
  [RunStatus.TimedOut]: [],
};

/** Valid state transitions for items. */
export const VALID_ITEM_TRANSITIONS: Record<ItemStatus, ItemStatus[]> = {
  [ItemStatus.Pending]: [ItemStatus.Running, ItemStatus.Abandoned],
  [ItemStatus.Running]: [ItemStatus.Succeeded, ItemStatus.Failed, ItemStatus.Abandoned],
  [ItemStatus.Succeeded]: [],
  [ItemStatus.Failed]: [],
  [ItemStatus.Abandoned]: [],
};

/** Outcome of one acquisition request. */
export interface ItemOutcome {
  request: AcquisitionRequest;
  status: ItemStatus;
  placed?: PlacedFile;
  error?: TypedError;
  bytesTransferred: number;
  durationMs?: number;
}

/** Aggregate counters for the summary line. */
export interface RunCounters {
  total: number;
  succeeded: number;
  failed: number;
  abandoned: number;
  alreadyPresent: number;
  unverified: number;
}

/** Result of one pipeline invocation. */
export interface RunReport {
  runId: string;
  status: RunStatus;
  fingerprint: string;
  startedAt: string;
  completedAt: string;
  durationMs: number;
  outcomes: ItemOutcome[];
  counters: RunCounters;
  /** What happened to the completion marker. */
  marker: 'written' | 'cleared' | 'untouched';
  error?: TypedError;
}

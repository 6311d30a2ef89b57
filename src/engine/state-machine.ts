/**
 * Run and item state machines.
 *
 * Enforces valid state transitions for runs and items,
 * producing typed errors on invalid transitions.
 */

import { ItemStatus, RunStatus, VALID_ITEM_TRANSITIONS, VALID_RUN_TRANSITIONS } from '../domain/run';
import { TypedError, createTypedError, runInvalidStateTransition } from '../domain/errors';

/** Result of a state transition attempt. */
export type TransitionResult<S> = { success: true; newStatus: S } | { success: false; error: TypedError };

/** Attempt a run state transition. */
export function transitionRunStatus(runId: string, current: RunStatus, target: RunStatus): TransitionResult<RunStatus> {
  if (!VALID_RUN_TRANSITIONS[current].includes(target)) {
    return { success: false, error: runInvalidStateTransition(runId, current, target) };
  }
  return { success: true, newStatus: target };
}

/** Attempt an item state transition. */
export function transitionItemStatus(
  identifier: string,
  current: ItemStatus,
  target: ItemStatus,
): TransitionResult<ItemStatus> {
  const validTargets = VALID_ITEM_TRANSITIONS[current];
  if (!validTargets.includes(target)) {
    return {
      success: false,
      error: createTypedError({
        code: 'ITEM.INVALID_TRANSITION',
        message: `Invalid item state transition: ${current} -> ${target}`,
        identifier,
        retryable: false,
        details: { current, target, validTargets },
      }),
    };
  }
  return { success: true, newStatus: target };
}

/** Check if a run status is terminal. */
export function isTerminalRunStatus(status: RunStatus): boolean {
  return VALID_RUN_TRANSITIONS[status].length === 0;
}

/** Check if an item status is terminal. */
export function isTerminalItemStatus(status: ItemStatus): boolean {
  return VALID_ITEM_TRANSITIONS[status].length === 0;
}

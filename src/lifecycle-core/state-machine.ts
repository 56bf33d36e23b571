import { INITIAL_STATES, TERMINAL_STATES, WORK_ITEM_KINDS } from '@shared/constants';
import type {
  InitialState,
  WorkItemKind,
  TransitionRecord,
  WorkItemState,
} from '@shared/types';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type { InitialState, WorkItemState };

export interface TransitionSuccess {
  ok: true;
  newState: WorkItemState;
}

export interface TransitionFailure {
  ok: false;
  code: 'ILLEGAL_TRANSITION';
  error: string;
}

export type TransitionResult = TransitionSuccess | TransitionFailure;

// ---------------------------------------------------------------------------
// Transition Table
// ---------------------------------------------------------------------------

/**
 * Every edge of the lifecycle graph. `BLOCKED` lists both possible return
 * states; which one is legal for a given item depends on its history.
 *
 * `READY` has no edge to `BLOCKED`: work that has not started cannot be
 * blocked. Add the edge here if that ever changes.
 */
export const TRANSITION_TABLE: Record<WorkItemState, readonly WorkItemState[]> = {
  BACKLOG: ['READY'],
  READY: ['IN_PROGRESS'],
  IN_PROGRESS: ['READY_FOR_REVIEW', 'BLOCKED'],
  READY_FOR_REVIEW: ['IN_PROGRESS', 'PASSED_REVIEW', 'DONE', 'BLOCKED'],
  PASSED_REVIEW: ['DONE'],
  BLOCKED: ['IN_PROGRESS', 'READY_FOR_REVIEW'],
  DONE: [],
};

export function isWorkItemKind(kind: string): kind is WorkItemKind {
  return (WORK_ITEM_KINDS as readonly string[]).includes(kind);
}

export function isInitialState(state: string): state is InitialState {
  return (INITIAL_STATES as readonly string[]).includes(state);
}

export function isTerminalState(state: WorkItemState): boolean {
  return (TERMINAL_STATES as readonly string[]).includes(state);
}

// ---------------------------------------------------------------------------
// Pre-block State
// ---------------------------------------------------------------------------

/**
 * The state an item occupied right before it last entered `BLOCKED`, read
 * from the entry that blocked it. Returns `undefined` when the latest entry
 * did not enter `BLOCKED`.
 */
export function preBlockState(
  history: readonly TransitionRecord[],
): WorkItemState | undefined {
  const last = history[history.length - 1];
  if (!last || last.newState !== 'BLOCKED') {
    return undefined;
  }
  return last.previousState;
}

/**
 * Destinations reachable from `currentState` right now.
 */
export function allowedTargets(
  currentState: WorkItemState,
  history: readonly TransitionRecord[],
): WorkItemState[] {
  if (currentState === 'BLOCKED') {
    const returnState = preBlockState(history);
    return returnState ? [returnState] : [];
  }
  return [...TRANSITION_TABLE[currentState]];
}

// ---------------------------------------------------------------------------
// Transition Reducer
// ---------------------------------------------------------------------------

/**
 * Pure reducer: given the current state, the requested target and the item's
 * history, returns either the new state or the reason the edge is rejected.
 */
export function transition(
  currentState: WorkItemState,
  targetState: WorkItemState,
  history: readonly TransitionRecord[],
): TransitionResult {
  if (isTerminalState(currentState)) {
    return {
      ok: false,
      code: 'ILLEGAL_TRANSITION',
      error: `No transitions defined from terminal state '${currentState}'`,
    };
  }

  if (!TRANSITION_TABLE[currentState].includes(targetState)) {
    return {
      ok: false,
      code: 'ILLEGAL_TRANSITION',
      error: `Transition '${currentState}' -> '${targetState}' is not allowed`,
    };
  }

  if (currentState === 'BLOCKED') {
    const returnState = preBlockState(history);
    if (returnState !== targetState) {
      return {
        ok: false,
        code: 'ILLEGAL_TRANSITION',
        error: `Item was blocked from '${returnState ?? 'unknown'}' and can only return there, not '${targetState}'`,
      };
    }
  }

  return { ok: true, newState: targetState };
}

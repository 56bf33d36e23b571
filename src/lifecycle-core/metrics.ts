import type {
  TrackerSummaryRecord,
  WorkItemKind,
  WorkItemRecord,
  WorkItemState,
} from '@shared/types';

// ---------------------------------------------------------------------------
// Public interface
// ---------------------------------------------------------------------------

export type TrackerSummary = TrackerSummaryRecord;

// ---------------------------------------------------------------------------
// Computation
// ---------------------------------------------------------------------------

export function computeTrackerSummary(items: readonly WorkItemRecord[]): TrackerSummary {
  const byState: Record<WorkItemState, number> = {
    BACKLOG: 0,
    READY: 0,
    IN_PROGRESS: 0,
    READY_FOR_REVIEW: 0,
    PASSED_REVIEW: 0,
    BLOCKED: 0,
    DONE: 0,
  };
  const byKind: Record<WorkItemKind, number> = { ISSUE: 0, PULL_REQUEST: 0 };

  let totalTransitions = 0;
  let transitionsToDone = 0;

  for (const item of items) {
    byState[item.state] += 1;
    byKind[item.kind] += 1;
    totalTransitions += item.history.length;

    if (item.state === 'DONE') {
      transitionsToDone += item.history.length;
    }
  }

  const doneItems = byState.DONE;

  return {
    totalItems: items.length,
    byState,
    byKind,
    openItems: items.length - doneItems,
    doneItems,
    blockedItems: byState.BLOCKED,
    totalTransitions,
    averageTransitionsToDone:
      doneItems > 0 ? Math.round((transitionsToDone / doneItems) * 100) / 100 : 0,
  };
}

import { WORK_ITEM_STATES } from '@shared/constants';
import type { BoardColumnRecord, WorkItemRecord, WorkItemState } from '@shared/types';

export const STATE_LABELS: Record<WorkItemState, string> = {
  BACKLOG: 'backlog',
  READY: 'ready',
  IN_PROGRESS: 'in progress',
  READY_FOR_REVIEW: 'ready for review',
  PASSED_REVIEW: 'passed review',
  BLOCKED: 'blocked',
  DONE: 'done',
};

const LABEL_INDEX = new Map<string, WorkItemState>(
  WORK_ITEM_STATES.map((state) => [STATE_LABELS[state], state]),
);

export function labelFor(state: WorkItemState): string {
  return STATE_LABELS[state];
}

/**
 * Reverse lookup used when an external label change has to become a
 * transition request. Case and surrounding whitespace are ignored.
 */
export function stateForLabel(label: string): WorkItemState | undefined {
  return LABEL_INDEX.get(label.trim().toLowerCase());
}

/**
 * One column per state, in lifecycle order. Empty columns are kept so a board
 * always has the same shape.
 */
export function groupByLabel(items: readonly WorkItemRecord[]): BoardColumnRecord[] {
  const columns = WORK_ITEM_STATES.map(
    (state): BoardColumnRecord => ({ state, label: STATE_LABELS[state], items: [] }),
  );
  const byState = new Map<WorkItemState, BoardColumnRecord>(
    columns.map((column) => [column.state, column]),
  );

  for (const item of items) {
    byState.get(item.state)?.items.push(item);
  }

  return columns;
}

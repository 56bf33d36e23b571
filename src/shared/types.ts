import type {
  ERROR_CODES,
  INITIAL_STATES,
  WORK_ITEM_KINDS,
  WORK_ITEM_STATES,
} from './constants';

export type WorkItemKind = (typeof WORK_ITEM_KINDS)[number];
export type WorkItemState = (typeof WORK_ITEM_STATES)[number];
export type InitialState = (typeof INITIAL_STATES)[number];
export type ErrorCode = (typeof ERROR_CODES)[number];

export interface TransitionRecord {
  previousState: WorkItemState;
  newState: WorkItemState;
  actor: string;
  timestamp: string;
}

export interface WorkItemRecord {
  id: string;
  kind: WorkItemKind;
  state: WorkItemState;
  assignee: string | null;
  history: readonly TransitionRecord[];
  createdAt: string;
}

export interface BoardColumnRecord {
  state: WorkItemState;
  label: string;
  items: WorkItemRecord[];
}

export interface TrackerSummaryRecord {
  totalItems: number;
  byState: Record<WorkItemState, number>;
  byKind: Record<WorkItemKind, number>;
  openItems: number;
  doneItems: number;
  blockedItems: number;
  totalTransitions: number;
  averageTransitionsToDone: number;
}

export interface ApiResponse<T = unknown> {
  success: boolean;
  data?: T;
  error?: string;
  code?: ErrorCode;
}

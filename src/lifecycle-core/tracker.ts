import { randomUUID } from 'crypto';
import type {
  TransitionRecord,
  WorkItemKind,
  WorkItemRecord,
  WorkItemState,
} from '@shared/types';
import {
  DuplicateItemError,
  IllegalTransitionError,
  InvalidInitialStateError,
  InvalidKindError,
  NotBlockedError,
  UnknownItemError,
} from './errors';
import {
  allowedTargets,
  isInitialState,
  isWorkItemKind,
  preBlockState,
  transition as applyTransition,
} from './state-machine';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type WorkItem = Readonly<WorkItemRecord>;

export interface TrackerOptions {
  clock?: () => Date;
  idGenerator?: () => string;
}

export interface CreateOptions {
  /** Identifier assigned by the external tracker. Generated when omitted. */
  id?: string;
}

export interface ListFilter {
  state?: WorkItemState;
  kind?: WorkItemKind;
  assignee?: string;
}

interface MutableWorkItem {
  id: string;
  kind: WorkItemKind;
  state: WorkItemState;
  assignee: string | null;
  history: TransitionRecord[];
  createdAt: string;
}

// ---------------------------------------------------------------------------
// Tracker
// ---------------------------------------------------------------------------

/**
 * Owns every tracked work item and is the only way to change one.
 *
 * All operations are synchronous. A transition reads the current state,
 * validates the edge, then writes the state, assignee and history entry
 * without yielding, so two callers can never both succeed from a state only
 * one of them observed.
 */
export class LifecycleTracker {
  private readonly items = new Map<string, MutableWorkItem>();
  private readonly clock: () => Date;
  private readonly idGenerator: () => string;

  constructor(options: TrackerOptions = {}) {
    this.clock = options.clock ?? (() => new Date());
    this.idGenerator = options.idGenerator ?? randomUUID;
  }

  get size(): number {
    return this.items.size;
  }

  create(
    kind: WorkItemKind,
    initialState: WorkItemState,
    options: CreateOptions = {},
  ): WorkItem {
    if (!isWorkItemKind(kind)) {
      throw new InvalidKindError(kind);
    }
    if (!isInitialState(initialState)) {
      throw new InvalidInitialStateError(initialState);
    }

    const id = options.id ?? this.idGenerator();
    if (this.items.has(id)) {
      throw new DuplicateItemError(id);
    }

    const item: MutableWorkItem = {
      id,
      kind,
      state: initialState,
      assignee: null,
      history: [],
      createdAt: this.clock().toISOString(),
    };
    this.items.set(id, item);
    return snapshot(item);
  }

  transition(itemId: string, targetState: WorkItemState, actor: string): WorkItem {
    const item = this.require(itemId);
    const result = applyTransition(item.state, targetState, item.history);

    if (!result.ok) {
      throw new IllegalTransitionError(itemId, item.state, targetState, result.error);
    }

    const entry: TransitionRecord = Object.freeze({
      previousState: item.state,
      newState: result.newState,
      actor,
      timestamp: this.clock().toISOString(),
    });

    item.history.push(entry);
    item.state = result.newState;
    if (result.newState === 'IN_PROGRESS') {
      item.assignee = actor;
    } else if (result.newState === 'DONE') {
      item.assignee = null;
    }

    return snapshot(item);
  }

  blockedFrom(itemId: string): WorkItemState {
    const item = this.require(itemId);
    const returnState = item.state === 'BLOCKED' ? preBlockState(item.history) : undefined;
    if (!returnState) {
      throw new NotBlockedError(itemId, item.state);
    }
    return returnState;
  }

  currentState(itemId: string): WorkItemState {
    return this.require(itemId).state;
  }

  history(itemId: string): readonly TransitionRecord[] {
    return Object.freeze([...this.require(itemId).history]);
  }

  allowedTransitions(itemId: string): WorkItemState[] {
    const item = this.require(itemId);
    return allowedTargets(item.state, item.history);
  }

  has(itemId: string): boolean {
    return this.items.has(itemId);
  }

  get(itemId: string): WorkItem {
    return snapshot(this.require(itemId));
  }

  /**
   * Items in creation order, optionally narrowed by state, kind or assignee.
   */
  list(filter: ListFilter = {}): WorkItem[] {
    const result: WorkItem[] = [];
    for (const item of this.items.values()) {
      if (filter.state && item.state !== filter.state) continue;
      if (filter.kind && item.kind !== filter.kind) continue;
      if (filter.assignee && item.assignee !== filter.assignee) continue;
      result.push(snapshot(item));
    }
    return result;
  }

  private require(itemId: string): MutableWorkItem {
    const item = this.items.get(itemId);
    if (!item) {
      throw new UnknownItemError(itemId);
    }
    return item;
  }
}

function snapshot(item: MutableWorkItem): WorkItem {
  return Object.freeze({
    ...item,
    history: Object.freeze([...item.history]),
  });
}
